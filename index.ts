import {
    ConfigManager,
    OperationLockManager,
    OrchestratorOptions,
    ProductDeploymentOrchestrator,
    RollbackCoordinator,
    UpgradeCoordinator
} from './automation';
import {
    DeployProductRequest,
    OperationMode,
    OperationOptions,
    OrchestratorConfig,
    ProductDeployment,
    ProductDeploymentStatus,
    ProductOperationSummary,
    UpgradeCheckResult,
    UpgradeProductRequest
} from './automation/types';
import { FileProductCatalog } from './components/catalog';
import { ComposeManifestResolver } from './components/manifest/compose';
import { FileDeploymentRepository } from './components/persistence';
import { ProgressEventBus, ProgressListener } from './components/progress';
import { DockerDriverProvider } from './components/runtime';
import {
    DeploymentRepository,
    DriverProvider,
    ManifestResolver,
    ProductCatalog
} from './components/shared/interfaces';
import { RecoveryStrategy } from './components/shared/utils/error-handling';

export interface StackRolloutOptions extends OrchestratorOptions {
    catalog: ProductCatalog;
    repository: DeploymentRepository;
    drivers: DriverProvider;
    /** Defaults to the compose resolver */
    manifestResolver?: ManifestResolver;
    progress?: ProgressEventBus;
    locks?: OperationLockManager;
}

/**
 * Entry point wiring the orchestrator, the upgrade and rollback coordinators and their collaborators
 */
export class StackRollout {
    public readonly orchestrator: ProductDeploymentOrchestrator;
    public readonly upgrades: UpgradeCoordinator;
    public readonly rollbacks: RollbackCoordinator;
    public readonly progress: ProgressEventBus;

    constructor(options: StackRolloutOptions) {
        this.progress = options.progress ?? new ProgressEventBus();
        this.orchestrator = new ProductDeploymentOrchestrator({
            catalog: options.catalog,
            repository: options.repository,
            drivers: options.drivers,
            manifestResolver: options.manifestResolver ?? new ComposeManifestResolver(),
            progress: this.progress,
            locks: options.locks
        }, {
            continueOnError: options.continueOnError,
            forceRefresh: options.forceRefresh,
            pullRecovery: options.pullRecovery
        });
        this.upgrades = new UpgradeCoordinator(this.orchestrator, options.catalog, options.repository);
        this.rollbacks = new RollbackCoordinator(this.orchestrator, options.repository);
    }

    /**
     * Build an instance from an orchestrator config file: file catalog, file state, one engine per environment
     */
    static fromConfig(configPath: string): StackRollout {
        return StackRollout.fromOrchestratorConfig(ConfigManager.loadConfig(configPath));
    }

    static fromOrchestratorConfig(config: OrchestratorConfig): StackRollout {
        return new StackRollout({
            catalog: new FileProductCatalog(config.catalogPath),
            repository: new FileDeploymentRepository(config.stateDir),
            drivers: new DockerDriverProvider(config.environments),
            continueOnError: config.deploymentDefaults.continueOnError,
            forceRefresh: config.deploymentDefaults.forceRefresh,
            pullRecovery: {
                strategy: RecoveryStrategy.RETRY,
                maxRetries: config.deploymentDefaults.pullRetries,
                retryDelay: config.deploymentDefaults.pullRetryDelay
            }
        });
    }

    async deploy(request: DeployProductRequest, options?: OperationOptions): Promise<ProductOperationSummary> {
        return this.orchestrator.deploy(request, options);
    }

    async upgrade(productDeploymentId: string, request: UpgradeProductRequest, options?: OperationOptions): Promise<ProductOperationSummary> {
        return this.upgrades.upgrade(productDeploymentId, request, options);
    }

    async rollback(productDeploymentId: string, options?: OperationOptions): Promise<ProductOperationSummary> {
        return this.rollbacks.rollback(productDeploymentId, options);
    }

    async remove(productDeploymentId: string, options?: OperationOptions): Promise<ProductOperationSummary> {
        return this.orchestrator.remove(productDeploymentId, options);
    }

    async changeOperationMode(productDeploymentId: string, mode: OperationMode, reason?: string): Promise<ProductOperationSummary> {
        return this.orchestrator.changeOperationMode(productDeploymentId, mode, reason);
    }

    async markFailed(productDeploymentId: string, reason?: string): Promise<ProductOperationSummary> {
        return this.orchestrator.markFailed(productDeploymentId, reason);
    }

    async checkUpgrade(productDeploymentId: string): Promise<UpgradeCheckResult> {
        return this.upgrades.checkUpgrade(productDeploymentId);
    }

    async getStatus(productDeploymentId: string): Promise<ProductDeploymentStatus> {
        return this.orchestrator.getStatus(productDeploymentId);
    }

    async listDeployments(environmentId?: string): Promise<ProductDeployment[]> {
        return this.orchestrator.listDeployments(environmentId);
    }

    /**
     * Returns the unsubscribe function
     */
    onProgress(listener: ProgressListener): () => void {
        return this.progress.subscribe(listener);
    }
}

export * from './automation';
export * from './components';
