/**
 * Collaborator adapters for the orchestration core
 */

export * from './shared';
export * from './runtime';
export * from './manifest/compose';
export * from './catalog';
export * from './persistence';
export * from './progress';
