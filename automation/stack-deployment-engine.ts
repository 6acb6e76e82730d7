import { ContainerRuntimeDriver, DeploymentRepository, DriverProvider } from '../components/shared/interfaces';
import { ComponentLogger, PerformanceMonitor } from '../components/shared/utils/logging';
import {
    ErrorHandler,
    RecoveryOptions,
    RecoveryStrategy,
    RolloutError,
    toError
} from '../components/shared/utils/error-handling';
import { containerLabels, defaultNetworkName } from '../components/shared/utils/docker-naming';
import { transitionStack } from './product-deployment';
import { ProgressTracker } from './progress-tracker';
import {
    ContainerInfo,
    ContainerSpec,
    DeploymentPlan,
    OperationMode,
    ProgressPhase,
    ServiceSpec,
    StackDeployment,
    StackResult,
    StackStatus,
    VariableMap
} from './types';

export type StackRunMode = 'deploy' | 'upgrade' | 'rollback';

export interface StackRunRequest {
    stack: StackDeployment;
    plan: DeploymentPlan;
    variables: VariableMap;
    mode: StackRunMode;
    progress: ProgressTracker;
    signal?: AbortSignal;
    forceRefresh?: boolean;
    /** Called before each further pull attempt */
    onPullRetry?: (image: string, attempt: number, maxAttempts: number, delay: number) => void;
}

export interface StackRunOutcome {
    stack: StackDeployment;
    result: StackResult;
}

export interface StackEngineOptions {
    pullRecovery?: Partial<RecoveryOptions>;
}

const RUN_PHASE: Record<StackRunMode, ProgressPhase> = {
    deploy: 'deploying',
    upgrade: 'upgrading',
    rollback: 'rolling_back'
};

const RUN_VERB: Record<StackRunMode, string> = {
    deploy: 'Deploying',
    upgrade: 'Upgrading',
    rollback: 'Rolling back'
};

/**
 * Deploys, upgrades and removes a single stack's services. Owns every stack
 * status transition and persists each one as it happens.
 */
export class StackDeploymentEngine {
    private readonly logger = new ComponentLogger('StackDeploymentEngine', 'engine');
    private readonly pullRecovery: RecoveryOptions;

    constructor(
        private readonly drivers: DriverProvider,
        private readonly repository: DeploymentRepository,
        options: StackEngineOptions = {}
    ) {
        this.pullRecovery = {
            strategy: RecoveryStrategy.RETRY,
            maxRetries: 2,
            retryDelay: 1000,
            backoffMultiplier: 2,
            skipCondition: error => error instanceof RolloutError && !error.retryable,
            ...options.pullRecovery
        };
    }

    /**
     * Bring a stack to the given plan, service by service in declaration order.
     * Runtime failures end the stack as Failed; they are never thrown.
     */
    public async run(request: StackRunRequest): Promise<StackRunOutcome> {
        const { plan, mode, progress, signal } = request;
        const logger = this.logger.forStack(plan.stackName);
        const monitor = PerformanceMonitor.start(`${mode}:${plan.stackName}`, logger);
        const driver = this.drivers.getDriver(request.stack.environmentId);
        const totalServices = plan.services.length;

        const wasDeployed = request.stack.status === StackStatus.RUNNING || request.stack.status === StackStatus.FAILED;
        const runStatus = mode !== 'deploy' && wasDeployed ? StackStatus.UPGRADING : StackStatus.DEPLOYING;

        let stack = transitionStack(request.stack, runStatus, {
            version: plan.version,
            variables: { ...request.variables },
            services: plan.services,
            networks: plan.networks,
            volumes: plan.volumes,
            startedServices: 0,
            startedAt: new Date().toISOString(),
            completedAt: undefined,
            errorMessage: undefined
        });
        await this.repository.commit({ stacks: [stack] });

        await progress.emit(RUN_PHASE[mode], `${RUN_VERB[mode]} ${plan.stackName} (${totalServices} services)`, {
            percentComplete: progress.servicePercent(0, totalServices),
            totalServices,
            completedServices: 0
        });

        const ensuredNetworks = new Set<string>();
        let startedServices = 0;
        let pointOfNoReturnCrossed = false;
        let cancelled = false;
        let failure: Error | undefined;
        let failedService: string | undefined;

        for (const service of plan.services) {
            if (signal?.aborted) {
                cancelled = true;
                logger.warn(`Cancelled before service ${service.name}`, { startedServices, totalServices });
                break;
            }

            try {
                for (const network of this.requiredNetworks(service, plan)) {
                    if (!ensuredNetworks.has(network)) {
                        await driver.ensureNetwork(network);
                        ensuredNetworks.add(network);
                    }
                }

                await progress.emit('pulling', `Pulling ${service.image}`, {
                    percentComplete: progress.servicePercent(startedServices, totalServices),
                    currentService: service.name,
                    totalServices,
                    completedServices: startedServices
                });
                await this.ensureImage(driver, service.image, plan.stackName, request.forceRefresh === true, request.onPullRetry);

                const existing = await driver.findContainerByName(service.containerName);
                if (existing) {
                    logger.debug(`Replacing container ${existing.name}`, { containerId: existing.id });
                    await driver.remove(existing.id, true);
                }

                await progress.emit('starting', `Starting ${service.name}`, {
                    percentComplete: progress.servicePercent(startedServices, totalServices),
                    currentService: service.name,
                    totalServices,
                    completedServices: startedServices
                });
                const containerId = await driver.createAndStart(this.toContainerSpec(service, plan));
                startedServices++;
                pointOfNoReturnCrossed = true;
                logger.debug(`Started ${service.containerName}`, { containerId, serviceName: service.name });
                await progress.emit('starting', `Started ${service.name}`, {
                    percentComplete: progress.servicePercent(startedServices, totalServices),
                    currentService: service.name,
                    totalServices,
                    completedServices: startedServices
                });
            } catch (error) {
                failure = toError(error);
                failedService = service.name;
                logger.error(`Service ${service.name} failed`, failure, { serviceName: service.name });
                break;
            }
        }

        const success = failure === undefined && !cancelled;
        if (success && stack.operationMode === OperationMode.MAINTENANCE) {
            await this.restoreMaintenance(driver, plan.stackName, logger);
        }

        const errorMessage = failure
            ? `${failedService}: ${failure.message}`
            : cancelled ? `Cancelled after ${startedServices} of ${totalServices} services` : undefined;

        stack = transitionStack(stack, success ? StackStatus.RUNNING : StackStatus.FAILED, {
            startedServices,
            completedAt: new Date().toISOString(),
            errorMessage
        });
        await this.repository.commit({ stacks: [stack] });

        const duration = monitor.end({ startedServices, success });

        if (success) {
            await progress.emit('completed', `${plan.stackName} is running (${startedServices}/${totalServices} services)`, {
                percentComplete: progress.servicePercent(totalServices, totalServices),
                totalServices,
                completedServices: startedServices
            });
        } else {
            await progress.emit('error', `${plan.stackName} failed: ${errorMessage}`, {
                percentComplete: progress.servicePercent(startedServices, totalServices),
                currentService: failedService,
                totalServices,
                completedServices: startedServices
            });
        }

        return {
            stack,
            result: {
                stackDeploymentId: stack.id,
                stackName: stack.deploymentName,
                success,
                status: stack.status,
                startedServices,
                totalServices,
                pointOfNoReturnCrossed,
                cancelled,
                duration,
                error: errorMessage,
                failedService
            }
        };
    }

    /**
     * Stop and force-remove every container carrying the stack label, then mark the stack Removed.
     * Individual container failures are collected and do not stop the sweep.
     */
    public async remove(stack: StackDeployment, progress: ProgressTracker): Promise<StackRunOutcome> {
        const logger = this.logger.forStack(stack.deploymentName);
        const monitor = PerformanceMonitor.start(`remove:${stack.deploymentName}`, logger);

        let current = stack.status === StackStatus.REMOVING ? stack : transitionStack(stack, StackStatus.REMOVING);
        await this.repository.commit({ stacks: [current] });
        await progress.emit('removing', `Removing ${stack.deploymentName}`, {
            percentComplete: progress.servicePercent(0, 1),
            totalServices: stack.services.length
        });

        const { removed, errors } = await this.clearContainers(current);

        current = transitionStack(current, StackStatus.REMOVED, {
            completedAt: new Date().toISOString(),
            errorMessage: errors.length > 0 ? errors.join('; ') : undefined
        });
        await this.repository.commit({ stacks: [current] });

        const duration = monitor.end({ removed, errors: errors.length });
        await progress.emit('completed', `Removed ${stack.deploymentName} (${removed} containers)`, {
            percentComplete: progress.servicePercent(1, 1),
            totalServices: stack.services.length,
            completedServices: stack.services.length
        });

        return {
            stack: current,
            result: {
                stackDeploymentId: current.id,
                stackName: current.deploymentName,
                success: errors.length === 0,
                status: current.status,
                startedServices: 0,
                totalServices: stack.services.length,
                pointOfNoReturnCrossed: false,
                cancelled: false,
                duration,
                error: errors.length > 0 ? errors.join('; ') : undefined,
                affectedContainers: removed
            }
        };
    }

    /**
     * Enter or leave maintenance: stop or start the stack's containers, except those
     * labelled `maintenance=ignore`. The mode is only recorded when the driver call succeeds.
     */
    public async setOperationMode(stack: StackDeployment, mode: OperationMode): Promise<StackRunOutcome> {
        const logger = this.logger.forStack(stack.deploymentName);
        const monitor = PerformanceMonitor.start(`operation-mode:${stack.deploymentName}`, logger);
        const driver = this.drivers.getDriver(stack.environmentId);
        let current = stack;
        let affected: string[] = [];
        let errorMessage: string | undefined;

        try {
            affected = mode === OperationMode.MAINTENANCE
                ? await driver.stopStackContainers(stack.deploymentName)
                : await driver.startStackContainers(stack.deploymentName);
            current = { ...stack, operationMode: mode };
            await this.repository.commit({ stacks: [current] });
            logger.info(`Operation mode ${stack.operationMode} -> ${mode} (${affected.length} containers)`);
        } catch (error) {
            const modeError = toError(error);
            errorMessage = modeError.message;
            logger.error(`Could not switch to ${mode}`, modeError);
        }

        return {
            stack: current,
            result: {
                stackDeploymentId: current.id,
                stackName: current.deploymentName,
                success: errorMessage === undefined,
                status: current.status,
                startedServices: 0,
                totalServices: current.services.length,
                pointOfNoReturnCrossed: false,
                cancelled: false,
                duration: monitor.end(),
                error: errorMessage,
                affectedContainers: affected.length
            }
        };
    }

    /**
     * Stop and force-remove a stack's containers without touching its status.
     */
    public async clearContainers(stack: StackDeployment): Promise<{ removed: number; errors: string[] }> {
        const logger = this.logger.forStack(stack.deploymentName);
        const driver = this.drivers.getDriver(stack.environmentId);
        const errors: string[] = [];
        let removed = 0;

        let containers: ContainerInfo[];
        try {
            containers = await driver.listByStackLabel(stack.deploymentName);
        } catch (error) {
            const listError = toError(error);
            logger.runtimeOperationFailure('list', stack.deploymentName, listError);
            return { removed, errors: [listError.message] };
        }

        for (const container of containers) {
            if (container.state === 'running') {
                try {
                    await driver.stop(container.id);
                } catch (error) {
                    logger.warn(`Stop failed for ${container.name}, removing anyway: ${toError(error).message}`);
                }
            }

            try {
                await driver.remove(container.id, true);
                removed++;
            } catch (error) {
                const removeError = toError(error);
                logger.runtimeOperationFailure('remove', container.name, removeError);
                errors.push(`${container.name}: ${removeError.message}`);
            }
        }

        return { removed, errors };
    }

    private async ensureImage(
        driver: ContainerRuntimeDriver,
        image: string,
        stackName: string,
        forceRefresh: boolean,
        onRetry?: StackRunRequest['onPullRetry']
    ): Promise<void> {
        const present = await driver.imageExists(image);
        if (present && !forceRefresh) {
            this.logger.debug(`Using local image ${image}`, { stackName });
            return;
        }

        try {
            await ErrorHandler.executeWithRecovery(
                () => driver.pullImage(image),
                `pull ${image}`,
                'StackDeploymentEngine',
                stackName,
                {
                    ...this.pullRecovery,
                    onRetry: (attempt, maxAttempts, delay, error) => {
                        this.pullRecovery.onRetry?.(attempt, maxAttempts, delay, error);
                        onRetry?.(image, attempt, maxAttempts, delay);
                    }
                }
            );
        } catch (error) {
            if (!present) {
                throw error;
            }
            this.logger.warn(`Pull of ${image} failed, using local image: ${toError(error).message}`, { stackName });
        }
    }

    private async restoreMaintenance(driver: ContainerRuntimeDriver, stackName: string, logger: ComponentLogger): Promise<void> {
        try {
            const stopped = await driver.stopStackContainers(stackName);
            logger.info(`Stack is in maintenance, stopped ${stopped.length} containers`);
        } catch (error) {
            logger.warn(`Could not stop containers for maintenance: ${toError(error).message}`);
        }
    }

    private requiredNetworks(service: ServiceSpec, plan: DeploymentPlan): string[] {
        if (service.networks.length > 0) {
            const external = new Set(plan.networks.filter(network => network.external).map(network => network.name));
            return service.networks.filter(network => !external.has(network));
        }
        return [defaultNetworkName(plan.stackName)];
    }

    private toContainerSpec(service: ServiceSpec, plan: DeploymentPlan): ContainerSpec {
        return {
            name: service.containerName,
            image: service.image,
            environment: service.environment,
            ports: service.ports,
            volumes: service.volumes,
            networks: service.networks.length > 0 ? service.networks : [defaultNetworkName(plan.stackName)],
            labels: {
                ...service.labels,
                ...containerLabels(plan.stackName, service.name, plan.version)
            },
            command: service.command,
            restartPolicy: service.restartPolicy
        };
    }
}
