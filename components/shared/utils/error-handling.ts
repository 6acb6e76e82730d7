import { emitLog, LogLevel } from './logging';

export type ErrorContext = Record<string, string | number | boolean | string[] | undefined>;

/**
 * Base error for everything raised by the orchestration core and its adapters
 */
export class RolloutError extends Error {
    public readonly componentType: string;
    public readonly componentName: string;
    public readonly errorCode: string;
    public readonly timestamp: Date;
    public readonly retryable: boolean;
    public readonly context?: ErrorContext;

    constructor(
        componentType: string,
        componentName: string,
        message: string,
        errorCode: string = 'ROLLOUT_ERROR',
        context?: ErrorContext,
        retryable: boolean = false
    ) {
        super(`[${componentType}:${componentName}] ${message}`);
        this.name = 'RolloutError';
        this.componentType = componentType;
        this.componentName = componentName;
        this.errorCode = errorCode;
        this.timestamp = new Date();
        this.context = context;
        this.retryable = retryable;
    }
}

/**
 * Rejected request: unknown product or stack, conflicting deployment, ineligible state.
 * Raised before any state is written.
 */
export class ValidationError extends RolloutError {
    public readonly fieldName: string;

    constructor(
        componentType: string,
        componentName: string,
        fieldName: string,
        message: string,
        context?: ErrorContext
    ) {
        super(componentType, componentName, message, 'VALIDATION_ERROR', { fieldName, ...context }, false);
        this.name = 'ValidationError';
        this.fieldName = fieldName;
    }
}

export type RuntimeOperation = 'pull' | 'inspect' | 'network' | 'create' | 'start' | 'stop' | 'remove' | 'list';

/**
 * A container runtime call failed
 */
export class RuntimeOperationError extends RolloutError {
    public readonly operation: RuntimeOperation;
    public readonly resource: string;

    constructor(
        componentType: string,
        componentName: string,
        operation: RuntimeOperation,
        resource: string,
        message: string,
        context?: ErrorContext
    ) {
        super(componentType, componentName, `${operation} '${resource}' failed: ${message}`, 'RUNTIME_ERROR', {
            operation,
            resource,
            ...context
        }, true);
        this.name = 'RuntimeOperationError';
        this.operation = operation;
        this.resource = resource;
    }
}

export class ConcurrencyConflictError extends RolloutError {
    public readonly lockKey: string;

    constructor(lockKey: string, activeOperation: string) {
        super('OperationLock', lockKey, `Operation '${activeOperation}' is already in progress`, 'CONCURRENCY_CONFLICT', {
            lockKey,
            activeOperation
        }, false);
        this.name = 'ConcurrencyConflictError';
        this.lockKey = lockKey;
    }
}

export class SnapshotUnavailableError extends RolloutError {
    constructor(productDeploymentId: string, reason: string) {
        super('RollbackCoordinator', productDeploymentId, `No rollback snapshot available: ${reason}`, 'SNAPSHOT_UNAVAILABLE', {
            reason
        }, false);
        this.name = 'SnapshotUnavailableError';
    }
}

export class ConfigurationError extends RolloutError {
    public readonly configPath: string;

    constructor(
        componentType: string,
        componentName: string,
        configPath: string,
        message: string,
        context?: ErrorContext
    ) {
        super(componentType, componentName, `Configuration error at '${configPath}': ${message}`, 'CONFIGURATION_ERROR', {
            configPath,
            ...context
        });
        this.name = 'ConfigurationError';
        this.configPath = configPath;
    }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Error recovery strategies
 */
export enum RecoveryStrategy {
    RETRY = 'retry',
    FAIL_FAST = 'fail_fast'
}

export interface RecoveryOptions {
    strategy: RecoveryStrategy;
    maxRetries?: number;
    retryDelay?: number;
    backoffMultiplier?: number;
    /** Errors matching this are rethrown without further attempts */
    skipCondition?: (error: Error) => boolean;
    onRetry?: (attempt: number, maxAttempts: number, delay: number, error: Error) => void;
}

/**
 * Error handler with recovery mechanisms
 */
export class ErrorHandler {
    private static readonly DEFAULT_RETRY_DELAY = 1000;
    private static readonly DEFAULT_MAX_RETRIES = 2;
    private static readonly DEFAULT_BACKOFF_MULTIPLIER = 2;

    /**
     * Execute an operation, retrying with exponential backoff under RETRY.
     * Every failure that ends the attempts is wrapped with component context.
     */
    public static async executeWithRecovery<T>(
        operation: () => Promise<T>,
        operationName: string,
        componentType: string,
        componentName: string,
        options: RecoveryOptions
    ): Promise<T> {
        const maxRetries = options.strategy === RecoveryStrategy.RETRY
            ? options.maxRetries ?? this.DEFAULT_MAX_RETRIES
            : 0;
        let attempt = 0;

        for (;;) {
            try {
                return await operation();
            } catch (error) {
                const lastError = toError(error);
                attempt++;

                emitLog(LogLevel.WARN, `${operationName} failed (attempt ${attempt}/${maxRetries + 1}): ${lastError.message}`, {
                    componentType,
                    componentName,
                    operation: operationName
                });

                if (options.skipCondition && options.skipCondition(lastError)) {
                    throw this.wrapError(lastError, componentType, componentName, operationName, attempt);
                }

                if (options.strategy !== RecoveryStrategy.RETRY || attempt > maxRetries) {
                    throw this.wrapError(lastError, componentType, componentName, operationName, attempt);
                }

                const delay = this.calculateDelay(attempt, options);
                options.onRetry?.(attempt + 1, maxRetries + 1, delay, lastError);
                await this.sleep(delay);
            }
        }
    }

    /**
     * Wrap an error with component context. Errors from this module pass through.
     */
    public static wrapError(
        error: Error,
        componentType: string,
        componentName: string,
        operationName: string,
        attempts?: number
    ): RolloutError {
        if (error instanceof RolloutError) {
            return error;
        }

        return new RolloutError(
            componentType,
            componentName,
            `Operation '${operationName}' failed: ${error.message}`,
            'OPERATION_FAILED',
            {
                operationName,
                originalError: error.message,
                attempts
            }
        );
    }

    private static calculateDelay(attempt: number, options: RecoveryOptions): number {
        const baseDelay = options.retryDelay ?? this.DEFAULT_RETRY_DELAY;
        const multiplier = options.backoffMultiplier ?? this.DEFAULT_BACKOFF_MULTIPLIER;
        return baseDelay * Math.pow(multiplier, attempt - 1);
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}

/**
 * Validation helpers raising ValidationError
 */
export class ValidationUtils {
    public static validateRequired<T>(
        value: T | undefined | null,
        fieldName: string,
        componentType: string,
        componentName: string
    ): T {
        if (value === undefined || value === null || value === '') {
            throw new ValidationError(componentType, componentName, fieldName, `${fieldName} is required`);
        }
        return value;
    }

    public static validateNonEmptyArray<T>(
        value: readonly T[] | undefined,
        fieldName: string,
        componentType: string,
        componentName: string
    ): readonly T[] {
        if (!value || value.length === 0) {
            throw new ValidationError(componentType, componentName, fieldName, `${fieldName} must not be empty`);
        }
        return value;
    }

    public static validateEnum<T extends string>(
        value: string,
        fieldName: string,
        validValues: readonly T[],
        componentType: string,
        componentName: string
    ): T {
        const match = validValues.find(valid => valid === value);
        if (match === undefined) {
            throw new ValidationError(
                componentType,
                componentName,
                fieldName,
                `Invalid ${fieldName} '${value}': expected one of ${validValues.join(', ')}`,
                { validValues: [...validValues] }
            );
        }
        return match;
    }
}
