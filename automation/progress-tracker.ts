import { ProgressSink } from '../components/shared/interfaces';
import { ComponentLogger } from '../components/shared/utils/logging';
import { toError } from '../components/shared/utils/error-handling';
import { ProgressEvent, ProgressPhase } from './types';

interface TrackerScope {
    deploymentId: string;
    sessionId: string;
    totalStacks: number;
    stackName?: string;
    stackIndex?: number;
}

export interface ProgressUpdate {
    percentComplete: number;
    currentService?: string;
    totalServices?: number;
    completedServices?: number;
}

/**
 * Publishes progress events for one operation. A failing sink never fails the operation.
 */
export class ProgressTracker {
    private readonly logger = new ComponentLogger('ProgressTracker', 'progress');

    constructor(
        private readonly sink: ProgressSink | undefined,
        private readonly scope: TrackerScope
    ) {}

    public get sessionId(): string {
        return this.scope.sessionId;
    }

    public get totalStacks(): number {
        return this.scope.totalStacks;
    }

    public forStack(stackName: string, stackIndex: number): ProgressTracker {
        return new ProgressTracker(this.sink, { ...this.scope, stackName, stackIndex });
    }

    /**
     * Percent for a service-level event inside the current stack
     */
    public servicePercent(completedServices: number, totalServices: number): number {
        const stackIndex = this.scope.stackIndex ?? 0;
        const withinStack = totalServices > 0 ? completedServices / totalServices : 1;
        const total = Math.max(this.scope.totalStacks, 1);
        return Math.floor((stackIndex + withinStack) * 100 / total);
    }

    public async emit(phase: ProgressPhase, message: string, update: ProgressUpdate): Promise<void> {
        if (!this.sink) {
            return;
        }

        const event: ProgressEvent = {
            deploymentId: this.scope.deploymentId,
            sessionId: this.scope.sessionId,
            phase,
            message,
            percentComplete: Math.min(100, Math.max(0, update.percentComplete)),
            stackName: this.scope.stackName,
            stackIndex: this.scope.stackIndex,
            totalStacks: this.scope.totalStacks,
            currentService: update.currentService,
            totalServices: update.totalServices ?? 0,
            completedServices: update.completedServices ?? 0,
            isError: phase === 'error',
            timestamp: new Date().toISOString()
        };

        try {
            await this.sink.publish(event);
        } catch (error) {
            this.logger.debug(`Progress notification failed: ${toError(error).message}`, {
                sessionId: this.scope.sessionId,
                phase
            });
        }
    }
}
