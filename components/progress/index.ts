import { EventEmitter } from "events";
import { ProgressSink } from "../shared/interfaces";
import { ComponentLogger } from "../shared/utils/logging";
import { toError } from "../shared/utils/error-handling";
import { ProgressEvent } from "../../automation/types";

export type ProgressListener = (event: ProgressEvent) => void;

const EVENT = "progress";

/**
 * In-process publish/subscribe stream of progress events.
 * A throwing subscriber is logged and never reaches the publisher.
 */
export class ProgressEventBus implements ProgressSink {
    private readonly emitter = new EventEmitter();
    private readonly logger = new ComponentLogger("ProgressEventBus", "progress");

    public publish(event: ProgressEvent): void {
        this.emitter.emit(EVENT, event);
    }

    /**
     * Returns the unsubscribe function
     */
    public subscribe(listener: ProgressListener, filter?: (event: ProgressEvent) => boolean): () => void {
        const guarded = (event: ProgressEvent): void => {
            if (filter && !filter(event)) {
                return;
            }
            try {
                listener(event);
            } catch (error) {
                this.logger.warn(`Progress subscriber failed: ${toError(error).message}`, { phase: event.phase });
            }
        };
        this.emitter.on(EVENT, guarded);
        return () => {
            this.emitter.off(EVENT, guarded);
        };
    }

    /**
     * Subscribe to a single session's events
     */
    public subscribeToSession(sessionId: string, listener: ProgressListener): () => void {
        return this.subscribe(listener, event => event.sessionId === sessionId);
    }

    public get subscriberCount(): number {
        return this.emitter.listenerCount(EVENT);
    }
}

const PHASE_ICONS: Record<ProgressEvent["phase"], string> = {
    deploying: "🚀",
    pulling: "📥",
    starting: "▶️",
    upgrading: "⬆️",
    rolling_back: "↩️",
    removing: "🗑️",
    completed: "✅",
    error: "❌"
};

/**
 * Formats one progress event as a console line
 */
export function formatProgressEvent(event: ProgressEvent): string {
    const position = event.stackName !== undefined && event.stackIndex !== undefined && event.totalStacks !== undefined
        ? ` [${event.stackIndex + 1}/${event.totalStacks} ${event.stackName}]`
        : "";
    const service = event.currentService ? ` (${event.currentService})` : "";
    return `${PHASE_ICONS[event.phase]} ${String(event.percentComplete).padStart(3)}%${position} ${event.message}${service}`;
}

/**
 * Prints progress events for the CLI
 */
export class ConsoleProgressReporter {
    private unsubscribe?: () => void;

    constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

    public attach(bus: ProgressEventBus): void {
        this.detach();
        this.unsubscribe = bus.subscribe(event => this.write(formatProgressEvent(event)));
    }

    public detach(): void {
        this.unsubscribe?.();
        this.unsubscribe = undefined;
    }
}
