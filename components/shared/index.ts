/**
 * Shared contracts and utilities
 */

export * from './interfaces';
export * from './utils/logging';
export * from './utils/error-handling';
export * from './utils/docker-naming';
