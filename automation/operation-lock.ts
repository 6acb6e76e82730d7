import { ConcurrencyConflictError } from '../components/shared/utils/error-handling';

/**
 * In-process exclusive locks for orchestration operations. A held key rejects
 * further acquisitions instead of queueing them.
 */
export class OperationLockManager {
    private readonly held = new Map<string, string>();

    public static productKey(productDeploymentId: string): string {
        return `product:${productDeploymentId}`;
    }

    public static groupKey(environmentId: string, productGroupId: string): string {
        return `group:${environmentId}:${productGroupId}`;
    }

    /**
     * Acquire every key or none. Returns the release function.
     */
    public acquire(keys: readonly string[], operation: string): () => void {
        for (const key of keys) {
            const active = this.held.get(key);
            if (active !== undefined) {
                throw new ConcurrencyConflictError(key, active);
            }
        }

        for (const key of keys) {
            this.held.set(key, operation);
        }

        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            for (const key of keys) {
                this.held.delete(key);
            }
        };
    }

    public async runExclusive<T>(keys: readonly string[], operation: string, work: () => Promise<T>): Promise<T> {
        const release = this.acquire(keys, operation);
        try {
            return await work();
        } finally {
            release();
        }
    }

    public isLocked(key: string): boolean {
        return this.held.has(key);
    }

    public activeOperation(key: string): string | undefined {
        return this.held.get(key);
    }
}
