import { v4 as uuidv4 } from 'uuid';
import { DeploymentRepository, ProductCatalog } from '../components/shared/interfaces';
import { MetricsCollector, PerformanceMonitor } from '../components/shared/utils/logging';
import { ErrorHandler, ValidationError, ValidationUtils, toError } from '../components/shared/utils/error-handling';
import { sanitizeName } from '../components/shared/utils/docker-naming';
import {
    aggregateStatus,
    countStacks,
    createStackDeployment,
    planFromStack,
    progressPercent,
    transitionProduct,
    withCounts
} from './product-deployment';
import { ProductDeploymentOrchestrator, StackWorkItem } from './product-deployment-orchestrator';
import { ProgressTracker } from './progress-tracker';
import { VariableResolver } from './variable-resolver';
import {
    AvailableVersion,
    DeploymentSnapshot,
    OperationOptions,
    ProductDefinition,
    ProductDeployment,
    ProductOperationSummary,
    ProductStatus,
    SnapshotEntry,
    StackDeployment,
    StackResult,
    StackStatus,
    UpgradeCheckResult,
    UpgradeProductRequest
} from './types';

const COMPONENT = 'UpgradeCoordinator';

const NUMERIC_SEGMENT = /^\d+$/;

/**
 * Compare dot-separated versions segment by segment. Numeric segments compare as
 * numbers, anything else as strings; a missing segment counts as 0.
 */
export function compareVersions(left: string, right: string): number {
    const a = left.split('.');
    const b = right.split('.');
    for (let i = 0; i < Math.max(a.length, b.length); i++) {
        const x = a[i] ?? '0';
        const y = b[i] ?? '0';
        if (NUMERIC_SEGMENT.test(x) && NUMERIC_SEGMENT.test(y)) {
            const diff = Number(x) - Number(y);
            if (diff !== 0) {
                return diff < 0 ? -1 : 1;
            }
        } else if (x !== y) {
            return x < y ? -1 : 1;
        }
    }
    return 0;
}

export function isComparableVersion(version: string): boolean {
    return version.split('.').every(segment => NUMERIC_SEGMENT.test(segment));
}

/**
 * Capture the restorable state of a product's stacks. Only running stacks get a
 * valid entry; anything else has no earlier version worth restoring.
 */
export function captureSnapshot(product: ProductDeployment, stacks: readonly StackDeployment[]): DeploymentSnapshot {
    return {
        productDeploymentId: product.id,
        productId: product.productId,
        productVersion: product.productVersion,
        previousStatus: product.status,
        sharedVariables: { ...product.sharedVariables },
        capturedAt: new Date().toISOString(),
        entries: stacks
            .filter(stack => stack.status !== StackStatus.REMOVED)
            .map((stack): SnapshotEntry => ({
                stackDeploymentId: stack.id,
                stackId: stack.stackId,
                deploymentName: stack.deploymentName,
                order: stack.order,
                version: stack.version,
                status: stack.status,
                variables: { ...stack.variables },
                plan: planFromStack(stack),
                operationMode: stack.operationMode,
                valid: stack.status === StackStatus.RUNNING
            }))
    };
}

interface UpgradeWork {
    items: StackWorkItem[];
    newStacks: StackDeployment[];
}

/**
 * Moves a product deployment to a newer catalog version, keeping a snapshot of
 * the stacks that can still be restored when the upgrade stops short.
 */
export class UpgradeCoordinator {
    constructor(
        private readonly orchestrator: ProductDeploymentOrchestrator,
        private readonly catalog: ProductCatalog,
        private readonly repository: DeploymentRepository
    ) {}

    /**
     * List newer catalog versions of the deployed product group
     */
    public async checkUpgrade(productDeploymentId: string): Promise<UpgradeCheckResult> {
        const product = await this.orchestrator.requireProduct(productDeploymentId);
        const versions = await this.catalog.listProductVersions(product.productGroupId);
        const newer = versions
            .filter(definition => compareVersions(definition.version, product.productVersion) > 0)
            .sort((a, b) => compareVersions(a.version, b.version));

        const availableVersions: AvailableVersion[] = newer.map(definition => ({
            version: definition.version,
            productId: definition.id,
            stackCount: definition.stacks.length
        }));

        const latest = newer[newer.length - 1];
        if (!latest) {
            return {
                productDeploymentId,
                currentVersion: product.productVersion,
                upgradeAvailable: false,
                availableVersions,
                newStacks: [],
                removedStacks: [],
                message: isComparableVersion(product.productVersion)
                    ? `${product.productName} ${product.productVersion} is the latest version`
                    : `Version '${product.productVersion}' is not numeric; no newer version found by string comparison`
            };
        }

        const stacks = await this.repository.getStacks(product.stackDeploymentIds);
        const deployed = new Set(stacks.filter(stack => stack.status !== StackStatus.REMOVED).map(stack => stack.stackId));
        const target = new Set(latest.stacks.map(stack => stack.id));

        return {
            productDeploymentId,
            currentVersion: product.productVersion,
            upgradeAvailable: true,
            latestVersion: latest.version,
            availableVersions,
            newStacks: latest.stacks.map(stack => stack.id).filter(id => !deployed.has(id)),
            removedStacks: [...deployed].filter(id => !target.has(id)),
            message: `Upgrade available: ${product.productVersion} -> ${latest.version}`
        };
    }

    /**
     * Upgrade a Running or PartiallyRunning product to the target version.
     * The snapshot is committed together with the Upgrading record, before any container changes.
     */
    public async upgrade(
        productDeploymentId: string,
        request: UpgradeProductRequest,
        options: OperationOptions = {}
    ): Promise<ProductOperationSummary> {
        ValidationUtils.validateRequired(request.targetVersion, 'targetVersion', COMPONENT, productDeploymentId);

        const initial = await this.orchestrator.requireProduct(productDeploymentId);
        return this.orchestrator.locks.runExclusive(this.orchestrator.productLockKeys(initial), 'upgrade', async () => {
            const product = await this.orchestrator.requireProduct(productDeploymentId);
            if (product.status !== ProductStatus.RUNNING && product.status !== ProductStatus.PARTIALLY_RUNNING) {
                throw new ValidationError(COMPONENT, productDeploymentId, 'status',
                    `Upgrade requires Running or PartiallyRunning (current: ${product.status})`);
            }

            const target = await this.resolveTarget(product, request.targetVersion);
            const stacks = await this.repository.getStacks(product.stackDeploymentIds);
            const work = await this.buildWork(product, stacks, target, request);

            const snapshot = captureSnapshot(product, stacks);
            const sharedVariables = { ...product.sharedVariables, ...request.sharedVariables };
            const started = transitionProduct(product, ProductStatus.UPGRADING, `Upgrading ${product.productVersion} -> ${target.version}`, {
                upgradeCount: product.upgradeCount + 1,
                previousVersion: product.productVersion,
                lastUpgradedAt: new Date().toISOString(),
                sharedVariables,
                stackDeploymentIds: [...product.stackDeploymentIds, ...work.newStacks.map(stack => stack.id)],
                sessionId: request.sessionId ?? options.sessionId ?? `product-upgrade-${product.productGroupId}-${Date.now()}`,
                errorMessage: undefined
            });
            await this.repository.commit({ product: started, stacks: work.newStacks, snapshot });

            return this.executeUpgrade(started, stacks, work.items, snapshot, target, request.forceRefresh ?? this.orchestrator.forceRefresh, options.signal);
        });
    }

    private async executeUpgrade(
        product: ProductDeployment,
        previousStacks: readonly StackDeployment[],
        work: StackWorkItem[],
        snapshot: DeploymentSnapshot,
        target: ProductDefinition,
        forceRefresh: boolean,
        signal?: AbortSignal
    ): Promise<ProductOperationSummary> {
        const logger = this.orchestrator.createLogger(product);
        const metrics = new MetricsCollector(product.productName, 'upgrade');
        const monitor = PerformanceMonitor.start('upgrade', logger);
        const tracker = new ProgressTracker(this.orchestrator.progressSink, {
            deploymentId: product.id,
            sessionId: product.sessionId,
            totalStacks: work.length
        });

        logger.snapshotCaptured(snapshot.entries.filter(entry => entry.valid).length, snapshot.productVersion, target.version);
        logger.deploymentStart('upgrade', work.length);
        await tracker.emit('upgrading', `Upgrading ${product.productName} ${snapshot.productVersion} -> ${target.version}`, {
            percentComplete: 0
        });

        try {
            const sequence = await this.orchestrator.runStackSequence({
                work,
                mode: 'upgrade',
                continueOnError: product.continueOnError,
                forceRefresh,
                tracker,
                logger,
                metrics,
                signal
            });

            for (const result of sequence.results) {
                if (result.pointOfNoReturnCrossed) {
                    logger.pointOfNoReturn(result.stackName);
                }
            }

            const allStacks = this.mergeStacks(previousStacks, sequence.stacks);
            const counts = countStacks(allStacks);
            const remaining = this.remainingEntries(snapshot, sequence.results);
            const failedBeforeSwap = sequence.results.some(result =>
                !result.success && !result.pointOfNoReturnCrossed && remaining.has(result.stackDeploymentId));
            const retain = failedBeforeSwap || (sequence.cancelled && remaining.size > 0);

            let status: ProductStatus;
            let retained: DeploymentSnapshot | undefined;
            if (retain) {
                const someSucceeded = sequence.results.some(result => result.success);
                status = product.continueOnError && someSucceeded ? ProductStatus.PARTIALLY_RUNNING : ProductStatus.FAILED;
                retained = {
                    ...snapshot,
                    entries: snapshot.entries.map(entry => ({ ...entry, valid: remaining.has(entry.stackDeploymentId) }))
                };
            } else {
                status = aggregateStatus(counts);
                await this.repository.deleteSnapshot(product.id);
            }

            const message = this.orchestrator.describeOutcome(status, allStacks, sequence.results, sequence.cancelled);
            const current = transitionProduct(product, status, retain ? `${message}; rollback to ${snapshot.productVersion} available` : message, {
                ...withCounts(counts),
                productId: target.id,
                productVersion: target.version,
                errorMessage: status === ProductStatus.RUNNING ? undefined : message
            });
            await this.repository.commit({ product: current, snapshot: retained });

            await tracker.emit(status === ProductStatus.FAILED ? 'error' : 'completed', message, {
                percentComplete: progressPercent(counts.completed, counts.total)
            });

            const duration = monitor.end();
            logger.deploymentComplete('upgrade', status, counts.completed, counts.failed, duration);
            const collected = metrics.completeDeployment();
            logger.metricsCollected(collected);

            return this.orchestrator.buildSummary('upgrade', current, allStacks, sequence.results, duration, {
                cancelled: sequence.cancelled,
                snapshotRetained: retain,
                retryCount: collected.retryCount
            });
        } catch (error) {
            const upgradeError = toError(error);
            logger.error('Upgrade orchestration failed', upgradeError);
            await this.orchestrator.recordFailure(product, upgradeError.message);
            throw ErrorHandler.wrapError(upgradeError, COMPONENT, product.productName, 'upgrade');
        }
    }

    /**
     * Snapshot entries still safe to restore: valid at capture, and the stack never started
     * a new container during this upgrade.
     */
    private remainingEntries(snapshot: DeploymentSnapshot, results: readonly StackResult[]): Set<string> {
        const crossed = new Set(results.filter(result => result.pointOfNoReturnCrossed).map(result => result.stackDeploymentId));
        return new Set(snapshot.entries
            .filter(entry => entry.valid && !crossed.has(entry.stackDeploymentId))
            .map(entry => entry.stackDeploymentId));
    }

    private mergeStacks(previous: readonly StackDeployment[], updated: readonly StackDeployment[]): StackDeployment[] {
        const byId = new Map(updated.map(stack => [stack.id, stack]));
        const merged = previous.map(stack => byId.get(stack.id) ?? stack);
        const known = new Set(previous.map(stack => stack.id));
        return [...merged, ...updated.filter(stack => !known.has(stack.id))];
    }

    private async resolveTarget(product: ProductDeployment, targetVersion: string): Promise<ProductDefinition> {
        const versions = await this.catalog.listProductVersions(product.productGroupId);
        const target = versions.find(definition => definition.version === targetVersion);
        if (!target) {
            throw new ValidationError(COMPONENT, product.id, 'targetVersion',
                `Version '${targetVersion}' of '${product.productGroupId}' is not in the catalog`);
        }
        if (compareVersions(target.version, product.productVersion) <= 0) {
            throw new ValidationError(COMPONENT, product.id, 'targetVersion',
                `Target version '${targetVersion}' must be newer than the deployed version '${product.productVersion}'`);
        }
        return target;
    }

    /**
     * Existing stacks in product order, then stacks new in the target in target order.
     * Every plan is resolved here so a bad manifest fails before the snapshot is taken.
     */
    private async buildWork(
        product: ProductDeployment,
        stacks: readonly StackDeployment[],
        target: ProductDefinition,
        request: UpgradeProductRequest
    ): Promise<UpgradeWork> {
        const logger = this.orchestrator.createLogger(product);
        const configs = request.stackConfigs ?? [];
        for (const config of configs) {
            if (!target.stacks.some(definition => definition.id === config.stackId)) {
                throw new ValidationError(COMPONENT, product.id, 'stackConfigs',
                    `Stack '${config.stackId}' is not part of ${target.id}`);
            }
        }

        const active = stacks.filter(stack => stack.status !== StackStatus.REMOVED);
        const items: StackWorkItem[] = [];

        for (const stack of active) {
            const definition = target.stacks.find(candidate => candidate.id === stack.stackId);
            if (!definition) {
                logger.warn(`Stack ${stack.deploymentName} is not part of ${target.version} and is left as it is`);
                continue;
            }
            const overrides = configs.find(config => config.stackId === stack.stackId)?.variables;
            const variables = VariableResolver.resolveForUpgrade(definition.variables, stack.variables, request.sharedVariables, overrides);
            items.push({
                stack: { ...stack, isNewInUpgrade: false },
                plan: this.orchestrator.resolvePlan(definition, variables, stack.deploymentName, target.version),
                variables
            });
        }

        const deployedIds = new Set(active.map(stack => stack.stackId));
        const sharedVariables = { ...product.sharedVariables, ...request.sharedVariables };
        const newStacks: StackDeployment[] = [];
        const names = new Set(active.map(stack => stack.deploymentName));

        for (const definition of target.stacks) {
            if (deployedIds.has(definition.id)) {
                continue;
            }
            const config = configs.find(candidate => candidate.stackId === definition.id);
            const deploymentName = sanitizeName(config?.deploymentStackName ?? `${product.productName}-${definition.name}`);
            const taken = names.has(deploymentName)
                || (await this.repository.findActiveStackByDeploymentName(product.environmentId, deploymentName)) !== undefined;
            if (taken) {
                throw new ValidationError(COMPONENT, deploymentName, 'deploymentStackName',
                    `Deployment name '${deploymentName}' for new stack '${definition.id}' is already in use`);
            }
            names.add(deploymentName);

            const variables = VariableResolver.resolve(definition.variables, sharedVariables, config?.variables);
            const stack = createStackDeployment({
                id: uuidv4(),
                environmentId: product.environmentId,
                productDeploymentId: product.id,
                stackId: definition.id,
                stackName: definition.name,
                deploymentName,
                version: target.version,
                order: product.stackDeploymentIds.length + newStacks.length,
                isNewInUpgrade: true
            });
            newStacks.push(stack);
            items.push({
                stack,
                plan: this.orchestrator.resolvePlan(definition, variables, deploymentName, target.version),
                variables
            });
        }

        return { items, newStacks };
    }
}
