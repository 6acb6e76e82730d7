import { logs, SeverityNumber } from '@opentelemetry/api-logs';
import { trace, context as otelContext } from '@opentelemetry/api';

/**
 * Log levels for structured logging
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Get the minimum log level from environment variable
 * Default is INFO to reduce verbosity
 */
function getMinLogLevel(): LogLevel {
    const level = process.env.STACK_ROLLOUT_LOG_LEVEL?.toUpperCase();
    switch (level) {
        case 'DEBUG': return LogLevel.DEBUG;
        case 'INFO': return LogLevel.INFO;
        case 'WARN': return LogLevel.WARN;
        case 'ERROR': return LogLevel.ERROR;
        default: return LogLevel.INFO;
    }
}

function isTestRun(): boolean {
    return process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
}

export type LogValue = string | number | boolean | undefined | null | LogValue[] | { [key: string]: LogValue };

/**
 * Log context interface for structured logging
 */
export interface LogContext {
    componentType?: string;
    componentName?: string;
    operation?: string;
    environmentId?: string;
    productDeploymentId?: string;
    stackName?: string;
    serviceName?: string;
    sessionId?: string;
    timestamp?: string;
    duration?: number;
    [key: string]: LogValue;
}

const SEVERITY: Record<LogLevel, { number: SeverityNumber; text: string }> = {
    [LogLevel.DEBUG]: { number: SeverityNumber.DEBUG, text: 'DEBUG' },
    [LogLevel.INFO]: { number: SeverityNumber.INFO, text: 'INFO' },
    [LogLevel.WARN]: { number: SeverityNumber.WARN, text: 'WARN' },
    [LogLevel.ERROR]: { number: SeverityNumber.ERROR, text: 'ERROR' }
};

/**
 * Flatten a context into OpenTelemetry attributes. Nested values are serialized.
 */
function toAttributes(context: LogContext): Record<string, string | number | boolean> {
    const attributes: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(context)) {
        if (value === undefined || value === null) {
            continue;
        }
        attributes[key] = typeof value === 'object' ? JSON.stringify(value) : value;
    }
    return attributes;
}

/**
 * Write a record to the OpenTelemetry logger and, outside of tests, to the console.
 */
export function emitLog(level: LogLevel, message: string, context: LogContext = {}): void {
    const minLevel = getMinLogLevel();
    if (level < minLevel) {
        return;
    }

    const spanContext = trace.getSpan(otelContext.active())?.spanContext();
    const severity = SEVERITY[level];

    logs.getLogger('stack-rollout').emit({
        severityNumber: severity.number,
        severityText: severity.text,
        body: message,
        attributes: {
            ...toAttributes(context),
            ...(spanContext && {
                trace_id: spanContext.traceId,
                span_id: spanContext.spanId
            })
        }
    });

    if (isTestRun()) {
        return;
    }

    // Only include context in DEBUG mode or for ERROR level
    const includeContext = minLevel === LogLevel.DEBUG || level === LogLevel.ERROR;
    const contextString = includeContext && Object.keys(context).length > 0
        ? ` | Context: ${JSON.stringify(context)}`
        : '';
    const line = `${new Date().toISOString()} ${severity.text}: ${message}${contextString}`;

    if (level === LogLevel.ERROR) {
        console.error(line);
    } else if (level === LogLevel.WARN) {
        console.warn(line);
    } else {
        console.log(line);
    }
}

function errorContext(error?: Error): LogContext {
    return error ? {
        error: {
            name: error.name,
            message: error.message,
            stack: error.stack
        }
    } : {};
}

/**
 * Structured logger for adapters and the stack engine
 */
export class ComponentLogger {
    private readonly componentType: string;
    private readonly componentName: string;
    private readonly baseContext: LogContext;

    constructor(componentType: string, componentName: string, additionalContext?: LogContext) {
        this.componentType = componentType;
        this.componentName = componentName;
        this.baseContext = {
            componentType,
            componentName,
            ...additionalContext
        };
    }

    public debug(message: string, context?: LogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    public info(message: string, context?: LogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    public warn(message: string, context?: LogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    public error(message: string, error?: Error, context?: LogContext): void {
        this.log(LogLevel.ERROR, message, { ...errorContext(error), ...context });
    }

    /**
     * Log a container runtime call before it is made
     */
    public runtimeOperationStart(operation: string, resource: string, context?: LogContext): void {
        this.debug(`${operation}: ${resource}`, {
            operation: `${operation}_start`,
            resource,
            ...context
        });
    }

    /**
     * Log a container runtime call that failed
     */
    public runtimeOperationFailure(operation: string, resource: string, error: Error, context?: LogContext): void {
        this.error(`${operation} failed: ${resource}`, error, {
            operation: `${operation}_failure`,
            resource,
            ...context
        });
    }

    /**
     * Log operation timing
     */
    public operationTiming(operation: string, duration: number, context?: LogContext): void {
        this.debug(`Operation completed: ${operation} (${duration}ms)`, {
            operation,
            duration,
            ...context
        });
    }

    /**
     * Create a child logger scoped to one stack
     */
    public forStack(stackName: string): ComponentLogger {
        return new ComponentLogger(this.componentType, this.componentName, {
            ...this.baseContext,
            stackName
        });
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        emitLog(level, `[${this.componentType}:${this.componentName}] ${message}`, {
            ...this.baseContext,
            ...context
        });
    }
}

/**
 * Deployment logger for product-level operations
 */
export class DeploymentLogger {
    public readonly deploymentName: string;
    private readonly baseContext: LogContext;

    constructor(deploymentName: string, additionalContext?: LogContext) {
        this.deploymentName = deploymentName;
        this.baseContext = {
            deploymentName,
            ...additionalContext
        };
    }

    public deploymentStart(operation: string, totalStacks: number): void {
        this.log(LogLevel.INFO, `🚀 Starting ${operation}: ${this.deploymentName}`, {
            operation: `${operation}_start`,
            totalStacks
        });
    }

    public deploymentComplete(operation: string, status: string, completedStacks: number, failedStacks: number, duration: number): void {
        const level = failedStacks > 0 ? LogLevel.WARN : LogLevel.INFO;
        const emoji = failedStacks > 0 ? '⚠️' : '✅';

        this.log(level, `${emoji} ${operation} finished: ${this.deploymentName} (${status})`, {
            operation: `${operation}_complete`,
            status,
            completedStacks,
            failedStacks,
            duration
        });
    }

    public stackStart(stackName: string, stackIndex: number, totalStacks: number): void {
        this.log(LogLevel.INFO, `📦 Stack ${stackIndex + 1}/${totalStacks}: ${stackName}`, {
            operation: 'stack_start',
            stackName,
            stackIndex,
            totalStacks
        });
    }

    public stackSuccess(stackName: string, duration: number, startedServices: number): void {
        this.log(LogLevel.INFO, `✅ Stack running: ${stackName}`, {
            operation: 'stack_success',
            stackName,
            duration,
            startedServices
        });
    }

    public stackFailure(stackName: string, error: string, duration: number): void {
        this.log(LogLevel.ERROR, `❌ Stack failed: ${stackName}`, {
            operation: 'stack_failure',
            stackName,
            duration,
            error
        });
    }

    public snapshotCaptured(stackCount: number, fromVersion: string, toVersion: string): void {
        this.log(LogLevel.INFO, `📸 Snapshot captured for ${stackCount} stack(s) at ${fromVersion} before upgrade to ${toVersion}`, {
            operation: 'snapshot_captured',
            stackCount,
            fromVersion,
            toVersion
        });
    }

    public pointOfNoReturn(stackName: string): void {
        this.log(LogLevel.INFO, `Stack ${stackName} passed its point of no return`, {
            operation: 'point_of_no_return',
            stackName
        });
    }

    public retryAttempt(operation: string, attempt: number, maxAttempts: number, delay: number): void {
        this.log(LogLevel.WARN, `🔄 Retrying ${operation} (attempt ${attempt}/${maxAttempts}) after ${delay}ms`, {
            operation: 'retry_attempt',
            retryOperation: operation,
            attempt,
            maxAttempts,
            delay
        });
    }

    public metricsCollected(metrics: DeploymentMetrics): void {
        this.log(LogLevel.INFO, `📈 ${metrics.operation} metrics collected`, {
            operation: 'metrics_collected',
            totalStacks: metrics.totalStacks,
            successfulStacks: metrics.successfulStacks,
            failedStacks: metrics.failedStacks,
            retryCount: metrics.retryCount,
            rollbackCount: metrics.rollbackCount,
            duration: metrics.totalDuration
        });
    }

    public rollbackStart(reason: string): void {
        this.log(LogLevel.WARN, `🔙 Starting rollback: ${reason}`, {
            operation: 'rollback_start',
            reason
        });
    }

    public rollbackComplete(success: boolean, duration: number): void {
        const level = success ? LogLevel.INFO : LogLevel.ERROR;
        const emoji = success ? '✅' : '❌';

        this.log(level, `${emoji} Rollback ${success ? 'completed' : 'failed'}`, {
            operation: 'rollback_complete',
            success,
            duration
        });
    }

    public debug(message: string, context?: LogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    public info(message: string, context?: LogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    public warn(message: string, context?: LogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    public error(message: string, error?: Error, context?: LogContext): void {
        this.log(LogLevel.ERROR, message, { ...errorContext(error), ...context });
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        emitLog(level, message, { ...this.baseContext, ...context });
    }
}

/**
 * Performance monitoring utilities
 */
export class PerformanceMonitor {
    private readonly startTime: number;
    private readonly operation: string;
    private readonly logger: ComponentLogger | DeploymentLogger;

    constructor(operation: string, logger: ComponentLogger | DeploymentLogger) {
        this.operation = operation;
        this.logger = logger;
        this.startTime = Date.now();
    }

    public static start(operation: string, logger: ComponentLogger | DeploymentLogger): PerformanceMonitor {
        return new PerformanceMonitor(operation, logger);
    }

    /**
     * End timing and log the duration
     */
    public end(context?: LogContext): number {
        const duration = Date.now() - this.startTime;

        if (this.logger instanceof ComponentLogger) {
            this.logger.operationTiming(this.operation, duration, context);
        } else {
            this.logger.debug(`Operation completed: ${this.operation} (${duration}ms)`, {
                operation: this.operation,
                duration,
                ...context
            });
        }

        return duration;
    }
}

/**
 * Metrics for one orchestration operation
 */
export interface DeploymentMetrics {
    deploymentName: string;
    operation: string;
    startTime: number;
    endTime?: number;
    totalDuration?: number;
    stackMetrics: StackMetrics[];
    totalStacks: number;
    successfulStacks: number;
    failedStacks: number;
    retryCount: number;
    rollbackCount: number;
}

export interface StackMetrics {
    stackName: string;
    startTime: number;
    endTime?: number;
    duration?: number;
    success: boolean;
    retryCount: number;
    serviceCount?: number;
    error?: string;
}

/**
 * Metrics collector for orchestration operations
 */
export class MetricsCollector {
    private readonly metrics: DeploymentMetrics;

    constructor(deploymentName: string, operation: string) {
        this.metrics = {
            deploymentName,
            operation,
            startTime: Date.now(),
            stackMetrics: [],
            totalStacks: 0,
            successfulStacks: 0,
            failedStacks: 0,
            retryCount: 0,
            rollbackCount: 0
        };
    }

    public startStack(stackName: string): void {
        this.metrics.stackMetrics.push({
            stackName,
            startTime: Date.now(),
            success: false,
            retryCount: 0
        });
        this.metrics.totalStacks++;
    }

    public completeStack(stackName: string, success: boolean, error?: string, serviceCount?: number): void {
        const stackMetric = this.metrics.stackMetrics.find(s => s.stackName === stackName);
        if (stackMetric) {
            stackMetric.endTime = Date.now();
            stackMetric.duration = stackMetric.endTime - stackMetric.startTime;
            stackMetric.success = success;
            stackMetric.error = error;
            stackMetric.serviceCount = serviceCount;

            if (success) {
                this.metrics.successfulStacks++;
            } else {
                this.metrics.failedStacks++;
            }
        }
    }

    public recordRetry(stackName?: string): void {
        this.metrics.retryCount++;
        if (stackName) {
            const stackMetric = this.metrics.stackMetrics.find(s => s.stackName === stackName);
            if (stackMetric) {
                stackMetric.retryCount++;
            }
        }
    }

    public recordRollback(): void {
        this.metrics.rollbackCount++;
    }

    public completeDeployment(): DeploymentMetrics {
        this.metrics.endTime = Date.now();
        this.metrics.totalDuration = this.metrics.endTime - this.metrics.startTime;
        return { ...this.metrics, stackMetrics: [...this.metrics.stackMetrics] };
    }
}
