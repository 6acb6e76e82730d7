import { DeploymentRepository } from '../components/shared/interfaces';
import { MetricsCollector, PerformanceMonitor } from '../components/shared/utils/logging';
import { ErrorHandler, SnapshotUnavailableError, toError } from '../components/shared/utils/error-handling';
import { countStacks, progressPercent, transitionProduct, withCounts } from './product-deployment';
import { ProductDeploymentOrchestrator, StackWorkItem } from './product-deployment-orchestrator';
import { ProgressTracker } from './progress-tracker';
import {
    DeploymentSnapshot,
    OperationOptions,
    ProductDeployment,
    ProductOperationSummary,
    ProductStatus,
    StackDeployment,
    StackResult,
    StackStatus
} from './types';

const COMPONENT = 'RollbackCoordinator';

const ROLLBACK_ELIGIBLE: readonly ProductStatus[] = [
    ProductStatus.FAILED,
    ProductStatus.UPGRADING,
    ProductStatus.PARTIALLY_RUNNING
];

/**
 * Restores the stacks of a failed upgrade from the snapshot taken before it.
 * A rollback that fails is not retried; the product is left Failed for an operator.
 */
export class RollbackCoordinator {
    constructor(
        private readonly orchestrator: ProductDeploymentOrchestrator,
        private readonly repository: DeploymentRepository
    ) {}

    public async rollback(productDeploymentId: string, options: OperationOptions = {}): Promise<ProductOperationSummary> {
        const initial = await this.orchestrator.requireProduct(productDeploymentId);

        return this.orchestrator.locks.runExclusive(this.orchestrator.productLockKeys(initial), 'rollback', async () => {
            const product = await this.orchestrator.requireProduct(productDeploymentId);
            const snapshot = await this.repository.getSnapshot(productDeploymentId);
            if (!snapshot) {
                throw new SnapshotUnavailableError(productDeploymentId, 'no snapshot is stored for this deployment');
            }
            if (!ROLLBACK_ELIGIBLE.includes(product.status)) {
                throw new SnapshotUnavailableError(productDeploymentId,
                    `status ${product.status} is not eligible for rollback`);
            }
            const entries = snapshot.entries.filter(entry => entry.valid);
            if (entries.length === 0) {
                throw new SnapshotUnavailableError(productDeploymentId, 'every stack has passed its point of no return');
            }

            const stacks = await this.repository.getStacks(product.stackDeploymentIds);
            const sessionId = options.sessionId ?? `product-rollback-${product.productGroupId}-${Date.now()}`;
            const current = product.status === ProductStatus.UPGRADING
                ? { ...product, sessionId }
                : transitionProduct(product, ProductStatus.UPGRADING, `Rolling back to ${snapshot.productVersion}`, { sessionId });
            await this.repository.commit({ product: current });

            return this.executeRollback(current, stacks, snapshot, options.signal);
        });
    }

    private async executeRollback(
        product: ProductDeployment,
        stacks: StackDeployment[],
        snapshot: DeploymentSnapshot,
        signal?: AbortSignal
    ): Promise<ProductOperationSummary> {
        const logger = this.orchestrator.createLogger(product);
        const metrics = new MetricsCollector(product.productName, 'rollback');
        const monitor = PerformanceMonitor.start('rollback', logger);
        const entries = snapshot.entries.filter(entry => entry.valid).sort((a, b) => a.order - b.order);
        const added = stacks.filter(stack => stack.isNewInUpgrade && stack.status !== StackStatus.REMOVED);
        const tracker = new ProgressTracker(this.orchestrator.progressSink, {
            deploymentId: product.id,
            sessionId: product.sessionId,
            totalStacks: entries.length + added.length
        });

        metrics.recordRollback();
        logger.rollbackStart(`restoring ${entries.length} stacks to ${snapshot.productVersion}`);
        await tracker.emit('rolling_back', `Rolling back ${product.productName} to ${snapshot.productVersion}`, {
            percentComplete: 0
        });

        const updated = [...stacks];
        const replace = (stack: StackDeployment): void => {
            const index = updated.findIndex(candidate => candidate.id === stack.id);
            if (index >= 0) {
                updated[index] = stack;
            }
        };

        try {
            const work: StackWorkItem[] = [];
            for (const entry of entries) {
                const stack = updated.find(candidate => candidate.id === entry.stackDeploymentId);
                if (!stack) {
                    logger.warn(`Snapshot entry ${entry.deploymentName} has no stack record; skipped`);
                    continue;
                }
                work.push({
                    stack: { ...stack, operationMode: entry.operationMode },
                    plan: entry.plan,
                    variables: entry.variables
                });
            }

            const sequence = await this.orchestrator.runStackSequence({
                work,
                mode: 'rollback',
                continueOnError: false,
                forceRefresh: false,
                tracker,
                logger,
                metrics,
                signal,
                beforeRun: async item => {
                    const cleared = await this.orchestrator.engine.clearContainers(item.stack);
                    if (cleared.errors.length > 0) {
                        logger.warn(`Leftover containers of ${item.stack.deploymentName} could not all be removed: ${cleared.errors.join('; ')}`);
                    }
                }
            });
            sequence.stacks.forEach(replace);
            const results: StackResult[] = [...sequence.results];

            const restored = !sequence.cancelled && sequence.results.length === work.length
                && sequence.results.every(result => result.success);

            if (restored) {
                for (let index = 0; index < added.length; index++) {
                    const outcome = await this.orchestrator.engine.remove(added[index], tracker.forStack(added[index].deploymentName, work.length + index));
                    replace(outcome.stack);
                    results.push(outcome.result);
                }
            }

            const counts = countStacks(updated);
            let current: ProductDeployment;
            let message: string;
            if (restored) {
                message = `Rolled back to ${snapshot.productVersion}`;
                current = transitionProduct(product, snapshot.previousStatus, message, {
                    ...withCounts(counts),
                    productId: snapshot.productId,
                    productVersion: snapshot.productVersion,
                    sharedVariables: { ...snapshot.sharedVariables },
                    errorMessage: undefined
                });
            } else {
                const reason = sequence.cancelled
                    ? 'Rollback cancelled'
                    : `Rollback failed: ${this.orchestrator.failureList(sequence.results) ?? 'unknown stack'}`;
                message = `${reason}; manual intervention required`;
                current = transitionProduct(product, ProductStatus.FAILED, message, {
                    ...withCounts(counts),
                    errorMessage: message
                });
            }

            await this.repository.deleteSnapshot(product.id);
            await this.repository.commit({ product: current });

            await tracker.emit(restored ? 'completed' : 'error', message, {
                percentComplete: restored ? 100 : progressPercent(counts.completed, counts.total)
            });

            const duration = monitor.end();
            logger.rollbackComplete(restored, duration);
            logger.deploymentComplete('rollback', current.status, counts.completed, counts.failed, duration);
            const collected = metrics.completeDeployment();
            logger.metricsCollected(collected);

            return this.orchestrator.buildSummary('rollback', current, updated, results, duration, {
                cancelled: sequence.cancelled,
                requiresManualIntervention: !restored,
                retryCount: collected.retryCount
            });
        } catch (error) {
            const rollbackError = toError(error);
            logger.error('Rollback orchestration failed', rollbackError);
            await this.orchestrator.recordFailure(product, rollbackError.message);
            throw ErrorHandler.wrapError(rollbackError, COMPONENT, product.productName, 'rollback');
        }
    }
}
