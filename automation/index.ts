/**
 * Orchestration core for stack and product deployments
 */

export { ProductDeploymentOrchestrator } from './product-deployment-orchestrator';
export type { OrchestratorDependencies, OrchestratorOptions, StackWorkItem, SequenceOutcome } from './product-deployment-orchestrator';
export { UpgradeCoordinator, compareVersions, captureSnapshot } from './upgrade-coordinator';
export { RollbackCoordinator } from './rollback-coordinator';
export { StackDeploymentEngine } from './stack-deployment-engine';
export type { StackRunMode, StackRunRequest, StackRunOutcome } from './stack-deployment-engine';
export { VariableResolver } from './variable-resolver';
export { OperationLockManager } from './operation-lock';
export { ProgressTracker } from './progress-tracker';
export { ConfigManager } from './config-manager';
export * from './product-deployment';
export * from './types';
