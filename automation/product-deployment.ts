import { ValidationError } from '../components/shared/utils/error-handling';
import {
    DeploymentPlan,
    OperationMode,
    ProductDeployment,
    ProductStatus,
    StackDeployment,
    StackStatus,
    VariableMap
} from './types';

/**
 * State transitions for product and stack deployment records.
 * Each function returns a new record and never mutates its input.
 */

const STACK_TRANSITIONS: Readonly<Record<StackStatus, readonly StackStatus[]>> = {
    [StackStatus.NOT_DEPLOYED]: [StackStatus.DEPLOYING, StackStatus.REMOVING],
    [StackStatus.PENDING]: [StackStatus.DEPLOYING, StackStatus.REMOVING],
    // Removing from an in-flight state only happens when an earlier process died mid-run
    [StackStatus.DEPLOYING]: [StackStatus.RUNNING, StackStatus.FAILED, StackStatus.REMOVING],
    [StackStatus.UPGRADING]: [StackStatus.RUNNING, StackStatus.FAILED, StackStatus.REMOVING],
    [StackStatus.RUNNING]: [StackStatus.UPGRADING, StackStatus.REMOVING],
    // Failed stacks are redeployed by upgrades and rollbacks
    [StackStatus.FAILED]: [StackStatus.DEPLOYING, StackStatus.UPGRADING, StackStatus.REMOVING],
    [StackStatus.REMOVING]: [StackStatus.REMOVED],
    [StackStatus.REMOVED]: []
};

const PRODUCT_TRANSITIONS: Readonly<Record<ProductStatus, readonly ProductStatus[]>> = {
    [ProductStatus.DEPLOYING]: [ProductStatus.RUNNING, ProductStatus.PARTIALLY_RUNNING, ProductStatus.FAILED, ProductStatus.REMOVING],
    [ProductStatus.RUNNING]: [ProductStatus.UPGRADING, ProductStatus.REMOVING],
    [ProductStatus.PARTIALLY_RUNNING]: [ProductStatus.UPGRADING, ProductStatus.REMOVING],
    [ProductStatus.UPGRADING]: [ProductStatus.RUNNING, ProductStatus.PARTIALLY_RUNNING, ProductStatus.FAILED, ProductStatus.REMOVING],
    [ProductStatus.FAILED]: [ProductStatus.UPGRADING, ProductStatus.REMOVING],
    [ProductStatus.REMOVING]: [ProductStatus.REMOVED],
    [ProductStatus.REMOVED]: []
};

const SETTLED_PRODUCT_STATES: readonly ProductStatus[] = [
    ProductStatus.RUNNING,
    ProductStatus.PARTIALLY_RUNNING,
    ProductStatus.FAILED,
    ProductStatus.REMOVED
];

export function canTransitionStack(from: StackStatus, to: StackStatus): boolean {
    return STACK_TRANSITIONS[from].includes(to);
}

export function canTransitionProduct(from: ProductStatus, to: ProductStatus): boolean {
    return PRODUCT_TRANSITIONS[from].includes(to);
}

function now(): string {
    return new Date().toISOString();
}

export type StackChanges = Partial<Omit<StackDeployment, 'id' | 'environmentId' | 'productDeploymentId' | 'stackId' | 'status'>>;

export function transitionStack(stack: StackDeployment, to: StackStatus, changes: StackChanges = {}): StackDeployment {
    if (!canTransitionStack(stack.status, to)) {
        throw new ValidationError(
            'StackDeployment',
            stack.deploymentName,
            'status',
            `Invalid stack transition ${stack.status} -> ${to}`,
            { from: stack.status, to }
        );
    }
    return { ...stack, ...changes, status: to };
}

export type ProductChanges = Partial<Omit<ProductDeployment, 'id' | 'environmentId' | 'productGroupId' | 'status' | 'phaseHistory' | 'createdAt'>>;

export function transitionProduct(
    product: ProductDeployment,
    to: ProductStatus,
    message: string,
    changes: ProductChanges = {}
): ProductDeployment {
    if (!canTransitionProduct(product.status, to)) {
        throw new ValidationError(
            'ProductDeployment',
            product.id,
            'status',
            `Invalid product transition ${product.status} -> ${to}`,
            { from: product.status, to }
        );
    }
    const timestamp = now();
    return {
        ...product,
        ...changes,
        status: to,
        updatedAt: timestamp,
        completedAt: SETTLED_PRODUCT_STATES.includes(to) ? timestamp : undefined,
        phaseHistory: [...product.phaseHistory, { phase: to, message, timestamp }]
    };
}

/**
 * Append to the phase history without changing status
 */
export function recordPhase(product: ProductDeployment, phase: string, message: string, changes: ProductChanges = {}): ProductDeployment {
    const timestamp = now();
    return {
        ...product,
        ...changes,
        updatedAt: timestamp,
        phaseHistory: [...product.phaseHistory, { phase, message, timestamp }]
    };
}

export interface NewProductDeployment {
    id: string;
    environmentId: string;
    productGroupId: string;
    productId: string;
    productName: string;
    productVersion: string;
    stackDeploymentIds: readonly string[];
    sharedVariables: VariableMap;
    continueOnError: boolean;
    sessionId: string;
}

export function createProductDeployment(params: NewProductDeployment): ProductDeployment {
    const timestamp = now();
    return {
        ...params,
        status: ProductStatus.DEPLOYING,
        upgradeCount: 0,
        totalStacks: params.stackDeploymentIds.length,
        completedStacks: 0,
        failedStacks: 0,
        removedStacks: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
        phaseHistory: [{
            phase: ProductStatus.DEPLOYING,
            message: `Deploying ${params.productName} ${params.productVersion}`,
            timestamp
        }]
    };
}

export interface NewStackDeployment {
    id: string;
    environmentId: string;
    productDeploymentId?: string;
    stackId: string;
    stackName: string;
    deploymentName: string;
    version: string;
    order: number;
    isNewInUpgrade?: boolean;
}

export function createStackDeployment(params: NewStackDeployment): StackDeployment {
    return {
        ...params,
        status: params.productDeploymentId ? StackStatus.PENDING : StackStatus.NOT_DEPLOYED,
        variables: {},
        services: [],
        networks: [],
        volumes: [],
        operationMode: OperationMode.NORMAL,
        isNewInUpgrade: params.isNewInUpgrade ?? false,
        startedServices: 0
    };
}

/**
 * The plan a stack was last deployed with
 */
export function planFromStack(stack: StackDeployment): DeploymentPlan {
    return {
        stackName: stack.deploymentName,
        version: stack.version,
        services: stack.services,
        networks: stack.networks,
        volumes: stack.volumes
    };
}

export interface StackCounts {
    total: number;
    completed: number;
    failed: number;
    removed: number;
    pending: number;
}

export function countStacks(stacks: readonly StackDeployment[]): StackCounts {
    const active = stacks.filter(stack => stack.status !== StackStatus.REMOVED);
    return {
        total: active.length,
        completed: active.filter(stack => stack.status === StackStatus.RUNNING).length,
        failed: active.filter(stack => stack.status === StackStatus.FAILED).length,
        removed: stacks.length - active.length,
        pending: active.filter(stack => stack.status === StackStatus.PENDING || stack.status === StackStatus.NOT_DEPLOYED).length
    };
}

/**
 * Running when every stack runs, PartiallyRunning when some do, Failed when none do.
 */
export function aggregateStatus(counts: StackCounts): ProductStatus {
    if (counts.completed === 0) {
        return ProductStatus.FAILED;
    }
    if (counts.completed === counts.total) {
        return ProductStatus.RUNNING;
    }
    return ProductStatus.PARTIALLY_RUNNING;
}

export function withCounts(counts: StackCounts): ProductChanges {
    return {
        totalStacks: counts.total,
        completedStacks: counts.completed,
        failedStacks: counts.failed,
        removedStacks: counts.removed
    };
}

export function progressPercent(completedStacks: number, totalStacks: number): number {
    return totalStacks > 0 ? Math.floor(completedStacks * 100 / totalStacks) : 100;
}
