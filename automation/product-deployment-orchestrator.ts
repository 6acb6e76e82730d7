import { v4 as uuidv4 } from 'uuid';
import {
    DeploymentRepository,
    DriverProvider,
    ManifestResolver,
    ProductCatalog,
    ProgressSink
} from '../components/shared/interfaces';
import {
    DeploymentLogger,
    MetricsCollector,
    PerformanceMonitor
} from '../components/shared/utils/logging';
import {
    ErrorHandler,
    RecoveryOptions,
    ValidationError,
    ValidationUtils,
    toError
} from '../components/shared/utils/error-handling';
import { sanitizeName } from '../components/shared/utils/docker-naming';
import { OperationLockManager } from './operation-lock';
import {
    aggregateStatus,
    countStacks,
    createProductDeployment,
    createStackDeployment,
    progressPercent,
    recordPhase,
    transitionProduct,
    transitionStack,
    withCounts
} from './product-deployment';
import { ProgressTracker } from './progress-tracker';
import { StackDeploymentEngine, StackRunMode } from './stack-deployment-engine';
import { VariableResolver } from './variable-resolver';
import {
    DeploymentPlan,
    DeployProductRequest,
    OperationMode,
    OperationOptions,
    ProductDefinition,
    ProductDeployment,
    ProductDeploymentStatus,
    ProductOperation,
    ProductOperationSummary,
    ProductStatus,
    StackConfigRequest,
    StackDefinition,
    StackDeployment,
    StackResult,
    StackStatus,
    VariableMap
} from './types';

const COMPONENT = 'ProductDeploymentOrchestrator';

const MARK_FAILED_ELIGIBLE: readonly ProductStatus[] = [ProductStatus.DEPLOYING, ProductStatus.UPGRADING];

const IN_FLIGHT_STACK: readonly StackStatus[] = [StackStatus.DEPLOYING, StackStatus.UPGRADING];

export interface OrchestratorDependencies {
    catalog: ProductCatalog;
    repository: DeploymentRepository;
    drivers: DriverProvider;
    manifestResolver: ManifestResolver;
    progress?: ProgressSink;
    locks?: OperationLockManager;
}

export interface OrchestratorOptions {
    /** Used when a deploy request does not say */
    continueOnError?: boolean;
    forceRefresh?: boolean;
    pullRecovery?: Partial<RecoveryOptions>;
}

export interface StackWorkItem {
    stack: StackDeployment;
    plan: DeploymentPlan;
    variables: VariableMap;
}

export interface SequenceRequest {
    work: readonly StackWorkItem[];
    mode: StackRunMode;
    continueOnError: boolean;
    forceRefresh: boolean;
    tracker: ProgressTracker;
    logger: DeploymentLogger;
    metrics: MetricsCollector;
    signal?: AbortSignal;
    /** Runs right before each stack's engine run */
    beforeRun?: (item: StackWorkItem) => Promise<void>;
}

export interface SequenceOutcome {
    /** Final records in work order */
    stacks: StackDeployment[];
    results: StackResult[];
    cancelled: boolean;
    /** Stopped by a failure with continue-on-error off */
    aborted: boolean;
}

export interface SummaryFlags {
    cancelled?: boolean;
    snapshotRetained?: boolean;
    requiresManualIntervention?: boolean;
    retryCount?: number;
}

interface OrderedStackConfig {
    definition: StackDefinition;
    config: StackConfigRequest;
    deploymentName: string;
}

/**
 * Sequences stack deployments for a product and owns the product-level status
 */
export class ProductDeploymentOrchestrator {
    public readonly engine: StackDeploymentEngine;
    public readonly locks: OperationLockManager;
    private readonly deps: OrchestratorDependencies;
    private readonly options: Required<Omit<OrchestratorOptions, 'pullRecovery'>>;

    constructor(deps: OrchestratorDependencies, options: OrchestratorOptions = {}) {
        this.deps = deps;
        this.locks = deps.locks ?? new OperationLockManager();
        this.engine = new StackDeploymentEngine(deps.drivers, deps.repository, {
            pullRecovery: options.pullRecovery
        });
        this.options = {
            continueOnError: options.continueOnError ?? false,
            forceRefresh: options.forceRefresh ?? false
        };
    }

    public get forceRefresh(): boolean {
        return this.options.forceRefresh;
    }

    public get progressSink(): ProgressSink | undefined {
        return this.deps.progress;
    }

    /**
     * Deploy a product: validate, create the records, then deploy every requested
     * stack in manifest order.
     */
    public async deploy(request: DeployProductRequest, options: OperationOptions = {}): Promise<ProductOperationSummary> {
        this.validateRequest(request);
        this.deps.drivers.getDriver(request.environmentId);

        const definition = await this.deps.catalog.getProduct(request.productId);
        if (!definition) {
            throw new ValidationError(COMPONENT, request.productId, 'productId', `Unknown product '${request.productId}'`);
        }

        const lockKey = OperationLockManager.groupKey(request.environmentId, definition.groupId);
        return this.locks.runExclusive([lockKey], 'deploy', async () => {
            const active = await this.deps.repository.findActiveProduct(request.environmentId, definition.groupId);
            if (active) {
                throw new ValidationError(
                    COMPONENT,
                    definition.groupId,
                    'productId',
                    `Product '${definition.groupId}' already has an active deployment in environment '${request.environmentId}' (${active.id}, ${active.status})`,
                    { activeDeploymentId: active.id }
                );
            }

            const ordered = await this.orderStackConfigs(definition, request);
            const sharedVariables = { ...request.sharedVariables };
            const productDeploymentId = uuidv4();

            // Plans are resolved before anything is written so a bad manifest leaves no state
            const work: StackWorkItem[] = ordered.map((entry, index) => {
                const variables = VariableResolver.resolve(entry.definition.variables, sharedVariables, entry.config.variables);
                return {
                    stack: createStackDeployment({
                        id: uuidv4(),
                        environmentId: request.environmentId,
                        productDeploymentId,
                        stackId: entry.definition.id,
                        stackName: entry.definition.name,
                        deploymentName: entry.deploymentName,
                        version: definition.version,
                        order: index
                    }),
                    plan: this.resolvePlan(entry.definition, variables, entry.deploymentName, definition.version),
                    variables
                };
            });

            const product = createProductDeployment({
                id: productDeploymentId,
                environmentId: request.environmentId,
                productGroupId: definition.groupId,
                productId: definition.id,
                productName: definition.name,
                productVersion: definition.version,
                stackDeploymentIds: work.map(item => item.stack.id),
                sharedVariables,
                continueOnError: request.continueOnError ?? this.options.continueOnError,
                sessionId: request.sessionId ?? options.sessionId ?? `product-${definition.groupId}-${Date.now()}`
            });
            await this.deps.repository.commit({ product, stacks: work.map(item => item.stack) });

            return this.executeDeploy(product, work, request.forceRefresh ?? this.options.forceRefresh, options.signal);
        });
    }

    /**
     * Remove every stack of a product in reverse order and mark the product Removed.
     * Container removal failures are reported but never stop the removal.
     */
    public async remove(productDeploymentId: string, options: OperationOptions = {}): Promise<ProductOperationSummary> {
        const product = await this.requireProduct(productDeploymentId);
        if (product.status === ProductStatus.REMOVED) {
            throw new ValidationError(COMPONENT, productDeploymentId, 'status', 'Product deployment is already removed');
        }

        return this.locks.runExclusive(this.productLockKeys(product), 'remove', async () => {
            const stacks = await this.deps.repository.getStacks(product.stackDeploymentIds);
            const logger = this.createLogger(product);
            const monitor = PerformanceMonitor.start('remove', logger);
            const sessionId = options.sessionId ?? `product-remove-${product.productGroupId}-${Date.now()}`;
            const tracker = new ProgressTracker(this.deps.progress, {
                deploymentId: product.id,
                sessionId,
                totalStacks: stacks.length
            });

            let current = product.status === ProductStatus.REMOVING
                ? product
                : transitionProduct(product, ProductStatus.REMOVING, `Removing ${stacks.length} stacks`);
            await this.deps.repository.commit({ product: current });
            logger.deploymentStart('remove', stacks.length);

            const updated = [...stacks];
            const results: StackResult[] = [];
            let cancelled = false;

            for (let position = 0; position < stacks.length; position++) {
                const index = stacks.length - 1 - position;
                const stack = stacks[index];
                if (stack.status === StackStatus.REMOVED) {
                    continue;
                }
                if (options.signal?.aborted) {
                    cancelled = true;
                    break;
                }

                const outcome = await this.engine.remove(stack, tracker.forStack(stack.deploymentName, position));
                updated[index] = outcome.stack;
                results.push(outcome.result);
            }

            const counts = countStacks(updated);
            const hasErrors = results.some(result => !result.success);
            if (cancelled) {
                current = recordPhase(current, 'RemovalCancelled', `Removal cancelled with ${counts.total} stacks left`, withCounts(counts));
            } else {
                current = transitionProduct(
                    current,
                    ProductStatus.REMOVED,
                    hasErrors ? 'Removed with container cleanup errors' : 'Removed',
                    { ...withCounts(counts), errorMessage: hasErrors ? this.failureList(results) : undefined }
                );
                // A removed product can no longer be rolled back
                await this.deps.repository.deleteSnapshot(product.id);
            }
            await this.deps.repository.commit({ product: current });

            await tracker.emit(hasErrors ? 'error' : 'completed', cancelled ? 'Removal cancelled' : `Removed ${product.productName}`, {
                percentComplete: cancelled ? progressPercent(results.length, stacks.length) : 100
            });

            const duration = monitor.end();
            logger.deploymentComplete('remove', current.status, results.filter(result => result.success).length, results.filter(result => !result.success).length, duration);

            return this.buildSummary('remove', current, updated, results, duration, { cancelled });
        });
    }

    /**
     * Switch the running stacks of a product between Normal and Maintenance
     */
    public async changeOperationMode(
        productDeploymentId: string,
        mode: OperationMode,
        reason?: string
    ): Promise<ProductOperationSummary> {
        const product = await this.requireProduct(productDeploymentId);
        if (product.status !== ProductStatus.RUNNING && product.status !== ProductStatus.PARTIALLY_RUNNING) {
            throw new ValidationError(COMPONENT, productDeploymentId, 'status',
                `Operation mode can only change while Running or PartiallyRunning (current: ${product.status})`);
        }

        return this.locks.runExclusive(this.productLockKeys(product), 'operation-mode', async () => {
            const stacks = await this.deps.repository.getStacks(product.stackDeploymentIds);
            const targets = stacks.filter(stack => stack.status === StackStatus.RUNNING && stack.operationMode !== mode);
            if (targets.length === 0) {
                throw new ValidationError(COMPONENT, productDeploymentId, 'mode', `All running stacks are already in ${mode} mode`);
            }

            const logger = this.createLogger(product);
            const monitor = PerformanceMonitor.start('operation-mode', logger);
            const updated = [...stacks];
            const results: StackResult[] = [];

            for (const target of targets) {
                const outcome = await this.engine.setOperationMode(target, mode);
                updated[stacks.indexOf(target)] = outcome.stack;
                results.push(outcome.result);
            }

            const current = recordPhase(
                product,
                'OperationMode',
                `Operation mode changed to ${mode}${reason ? `: ${reason}` : ''}`
            );
            await this.deps.repository.commit({ product: current });

            return this.buildSummary('operation-mode', current, updated, results, monitor.end());
        });
    }

    /**
     * Mark a product left in Deploying or Upgrading as Failed, for when the process running
     * the operation died. Stacks still Deploying or Upgrading are marked Failed too.
     * An Upgrading product keeps its snapshot, so it can be rolled back afterwards.
     */
    public async markFailed(productDeploymentId: string, reason?: string): Promise<ProductOperationSummary> {
        const product = await this.requireProduct(productDeploymentId);

        return this.locks.runExclusive(this.productLockKeys(product), 'mark-failed', async () => {
            const latest = await this.requireProduct(productDeploymentId);
            if (!MARK_FAILED_ELIGIBLE.includes(latest.status)) {
                throw new ValidationError(COMPONENT, productDeploymentId, 'status',
                    `Only a Deploying or Upgrading product can be marked failed (current: ${latest.status})`);
            }

            const logger = this.createLogger(latest);
            const monitor = PerformanceMonitor.start('mark-failed', logger);
            const message = reason ?? 'Manually marked as failed';
            const stacks = await this.deps.repository.getStacks(latest.stackDeploymentIds);
            const updated = stacks.map(stack => IN_FLIGHT_STACK.includes(stack.status)
                ? transitionStack(stack, StackStatus.FAILED, { errorMessage: message, completedAt: new Date().toISOString() })
                : stack);
            const changed = updated.filter((stack, index) => stack !== stacks[index]);

            const counts = countStacks(updated);
            const current = transitionProduct(latest, ProductStatus.FAILED, `Marked failed (was ${latest.status}): ${message}`, {
                ...withCounts(counts),
                errorMessage: message
            });
            await this.deps.repository.commit({ product: current, stacks: changed });
            logger.warn(`Marked failed from ${latest.status}: ${message}`, { stacksFailed: changed.length });

            return this.buildSummary('mark-failed', current, updated, [], monitor.end());
        });
    }

    public async getStatus(productDeploymentId: string): Promise<ProductDeploymentStatus> {
        const deployment = await this.requireProduct(productDeploymentId);
        const stacks = await this.deps.repository.getStacks(deployment.stackDeploymentIds);
        const snapshot = await this.deps.repository.getSnapshot(productDeploymentId);
        return {
            deployment,
            stacks,
            hasSnapshot: snapshot !== undefined,
            rollbackVersion: snapshot?.productVersion
        };
    }

    public async listDeployments(environmentId?: string): Promise<ProductDeployment[]> {
        return this.deps.repository.listProducts(environmentId);
    }

    /**
     * Run stacks strictly one at a time in the given order. A failed stack stops the
     * sequence unless continue-on-error is set; cancellation is checked between stacks.
     */
    public async runStackSequence(request: SequenceRequest): Promise<SequenceOutcome> {
        const { work, tracker, logger, metrics } = request;
        const stacks = work.map(item => item.stack);
        const results: StackResult[] = [];
        let completed = 0;
        let cancelled = false;
        let aborted = false;

        for (let index = 0; index < work.length; index++) {
            const item = work[index];
            const name = item.plan.stackName;

            if (request.signal?.aborted) {
                cancelled = true;
                logger.warn(`Cancelled before stack ${name}; ${work.length - index} stacks not started`);
                break;
            }

            const stackTracker = tracker.forStack(name, index);
            await stackTracker.emit(this.phaseFor(request.mode), `Stack ${index + 1}/${work.length}: ${name}`, {
                percentComplete: progressPercent(completed, work.length),
                totalServices: item.plan.services.length
            });
            logger.stackStart(name, index, work.length);
            metrics.startStack(name);
            await request.beforeRun?.(item);

            const outcome = await this.engine.run({
                stack: item.stack,
                plan: item.plan,
                variables: item.variables,
                mode: request.mode,
                progress: stackTracker,
                signal: request.signal,
                forceRefresh: request.forceRefresh,
                onPullRetry: (image, attempt, maxAttempts, delay) => {
                    logger.retryAttempt(`pull ${image}`, attempt, maxAttempts, delay);
                    metrics.recordRetry(name);
                }
            });
            stacks[index] = outcome.stack;
            results.push(outcome.result);
            metrics.completeStack(name, outcome.result.success, outcome.result.error, outcome.result.startedServices);

            if (outcome.result.success) {
                completed++;
                logger.stackSuccess(name, outcome.result.duration, outcome.result.startedServices);
            } else {
                logger.stackFailure(name, outcome.result.error ?? 'unknown error', outcome.result.duration);
            }

            await stackTracker.emit(
                outcome.result.success ? 'completed' : 'error',
                `Stack ${index + 1}/${work.length} ${name}: ${outcome.stack.status}`,
                {
                    percentComplete: progressPercent(completed, work.length),
                    totalServices: outcome.result.totalServices,
                    completedServices: outcome.result.startedServices
                }
            );

            if (outcome.result.cancelled) {
                cancelled = true;
                break;
            }
            if (!outcome.result.success && !request.continueOnError) {
                aborted = index < work.length - 1;
                if (aborted) {
                    logger.warn(`Stopping after failed stack ${name}; ${work.length - index - 1} stacks left pending`);
                }
                break;
            }
        }

        return { stacks, results, cancelled, aborted };
    }

    /**
     * Turn a stack definition into a plan. Manifest errors become validation errors.
     */
    public resolvePlan(definition: StackDefinition, variables: VariableMap, deploymentName: string, version: string): DeploymentPlan {
        const resolver = this.deps.manifestResolver;
        try {
            return resolver.toDeploymentPlan(resolver.parse(definition.manifest), variables, deploymentName, version);
        } catch (error) {
            if (error instanceof ValidationError) {
                throw error;
            }
            throw new ValidationError(
                COMPONENT,
                deploymentName,
                'manifest',
                `Manifest of stack '${definition.id}' could not be resolved: ${toError(error).message}`
            );
        }
    }

    public async requireProduct(productDeploymentId: string): Promise<ProductDeployment> {
        const product = await this.deps.repository.getProduct(productDeploymentId);
        if (!product) {
            throw new ValidationError(COMPONENT, productDeploymentId, 'productDeploymentId', `Unknown product deployment '${productDeploymentId}'`);
        }
        return product;
    }

    public productLockKeys(product: ProductDeployment): string[] {
        return [
            OperationLockManager.productKey(product.id),
            OperationLockManager.groupKey(product.environmentId, product.productGroupId)
        ];
    }

    public createLogger(product: ProductDeployment): DeploymentLogger {
        return new DeploymentLogger(product.productName, {
            productDeploymentId: product.id,
            environmentId: product.environmentId,
            sessionId: product.sessionId
        });
    }

    public buildSummary(
        operation: ProductOperation,
        deployment: ProductDeployment,
        stacks: StackDeployment[],
        results: StackResult[],
        totalDuration: number,
        flags: SummaryFlags = {}
    ): ProductOperationSummary {
        const counts = countStacks(stacks);
        return {
            operation,
            deployment,
            stacks,
            results,
            totalStacks: counts.total,
            completedStacks: counts.completed,
            failedStacks: counts.failed,
            cancelled: flags.cancelled ?? false,
            snapshotRetained: flags.snapshotRetained ?? false,
            requiresManualIntervention: flags.requiresManualIntervention ?? false,
            retryCount: flags.retryCount ?? 0,
            hasErrors: results.some(result => !result.success),
            totalDuration
        };
    }

    /**
     * One-line description of how a sequence ended
     */
    public describeOutcome(status: ProductStatus, stacks: readonly StackDeployment[], results: readonly StackResult[], cancelled: boolean): string {
        const counts = countStacks(stacks);
        const failed = this.failureList(results);
        const base = status === ProductStatus.RUNNING
            ? `All ${counts.total} stacks running`
            : `${counts.completed}/${counts.total} stacks running${failed ? `; failed: ${failed}` : ''}`;
        return cancelled ? `${base} (cancelled)` : base;
    }

    public failureList(results: readonly StackResult[]): string | undefined {
        const failed = results.filter(result => !result.success).map(result => result.stackName);
        return failed.length > 0 ? failed.join(', ') : undefined;
    }

    private async executeDeploy(
        product: ProductDeployment,
        work: StackWorkItem[],
        forceRefresh: boolean,
        signal?: AbortSignal
    ): Promise<ProductOperationSummary> {
        const logger = this.createLogger(product);
        const metrics = new MetricsCollector(product.productName, 'deploy');
        const monitor = PerformanceMonitor.start('deploy', logger);
        const tracker = new ProgressTracker(this.deps.progress, {
            deploymentId: product.id,
            sessionId: product.sessionId,
            totalStacks: work.length
        });

        logger.deploymentStart('deploy', work.length);
        await tracker.emit('deploying', `Deploying ${product.productName} ${product.productVersion} (${work.length} stacks)`, {
            percentComplete: 0
        });

        try {
            const sequence = await this.runStackSequence({
                work,
                mode: 'deploy',
                continueOnError: product.continueOnError,
                forceRefresh,
                tracker,
                logger,
                metrics,
                signal
            });

            const counts = countStacks(sequence.stacks);
            const status = aggregateStatus(counts);
            const message = this.describeOutcome(status, sequence.stacks, sequence.results, sequence.cancelled);
            const current = transitionProduct(product, status, message, {
                ...withCounts(counts),
                errorMessage: status === ProductStatus.RUNNING ? undefined : message
            });
            await this.deps.repository.commit({ product: current });

            await tracker.emit(status === ProductStatus.FAILED ? 'error' : 'completed', message, {
                percentComplete: progressPercent(counts.completed, counts.total)
            });

            const duration = monitor.end();
            logger.deploymentComplete('deploy', status, counts.completed, counts.failed, duration);
            const collected = metrics.completeDeployment();
            logger.metricsCollected(collected);

            return this.buildSummary('deploy', current, sequence.stacks, sequence.results, duration, {
                cancelled: sequence.cancelled,
                retryCount: collected.retryCount
            });
        } catch (error) {
            const deploymentError = toError(error);
            logger.error('Deployment orchestration failed', deploymentError);
            await this.recordFailure(product, deploymentError.message);
            throw ErrorHandler.wrapError(deploymentError, COMPONENT, product.productName, 'deploy');
        }
    }

    /**
     * Best-effort move to Failed after an unexpected error
     */
    public async recordFailure(product: ProductDeployment, reason: string): Promise<void> {
        try {
            const latest = (await this.deps.repository.getProduct(product.id)) ?? product;
            const failed = transitionProduct(latest, ProductStatus.FAILED, `Operation failed: ${reason}`, { errorMessage: reason });
            await this.deps.repository.commit({ product: failed });
        } catch (error) {
            this.createLogger(product).error('Could not record failure on product deployment', toError(error));
        }
    }

    private phaseFor(mode: StackRunMode): 'deploying' | 'upgrading' | 'rolling_back' {
        switch (mode) {
            case 'deploy': return 'deploying';
            case 'upgrade': return 'upgrading';
            case 'rollback': return 'rolling_back';
        }
    }

    private validateRequest(request: DeployProductRequest): void {
        ValidationUtils.validateRequired(request.productId, 'productId', COMPONENT, 'request');
        ValidationUtils.validateRequired(request.environmentId, 'environmentId', COMPONENT, 'request');
        ValidationUtils.validateNonEmptyArray(request.stackConfigs, 'stackConfigs', COMPONENT, request.productId);

        const stackIds = new Set<string>();
        const names = new Set<string>();
        for (const config of request.stackConfigs) {
            ValidationUtils.validateRequired(config.stackId, 'stackId', COMPONENT, request.productId);
            ValidationUtils.validateRequired(config.deploymentStackName, 'deploymentStackName', COMPONENT, config.stackId);

            if (stackIds.has(config.stackId)) {
                throw new ValidationError(COMPONENT, request.productId, 'stackConfigs', `Stack '${config.stackId}' is configured twice`);
            }
            stackIds.add(config.stackId);

            const name = sanitizeName(config.deploymentStackName);
            if (names.has(name)) {
                throw new ValidationError(COMPONENT, request.productId, 'deploymentStackName', `Deployment name '${name}' is used twice`);
            }
            names.add(name);
        }
    }

    /**
     * Match request configs to catalog stacks, in the product's declaration order
     */
    private async orderStackConfigs(definition: ProductDefinition, request: DeployProductRequest): Promise<OrderedStackConfig[]> {
        for (const config of request.stackConfigs) {
            if (!definition.stacks.some(stack => stack.id === config.stackId)) {
                throw new ValidationError(COMPONENT, definition.id, 'stackId',
                    `Stack '${config.stackId}' is not part of product '${definition.id}'`);
            }
        }

        const ordered: OrderedStackConfig[] = [];
        for (const stackDefinition of definition.stacks) {
            const config = request.stackConfigs.find(candidate => candidate.stackId === stackDefinition.id);
            if (!config) {
                continue;
            }

            const deploymentName = sanitizeName(config.deploymentStackName);
            const taken = await this.deps.repository.findActiveStackByDeploymentName(request.environmentId, deploymentName);
            if (taken) {
                throw new ValidationError(COMPONENT, deploymentName, 'deploymentStackName',
                    `Deployment name '${deploymentName}' is already in use in environment '${request.environmentId}'`);
            }
            ordered.push({ definition: stackDefinition, config, deploymentName });
        }
        return ordered;
    }
}
