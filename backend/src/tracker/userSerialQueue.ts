/**
 * Runs tasks one at a time per key while different keys proceed independently.
 *
 * Each user's operations are chained onto that user's previous task, so a slow lookup for one user
 * delays only that user's later operations.
 */
export class UserSerialQueue {
    private readonly tails = new Map<string, Promise<void>>();

    run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        const tail = result.then(
            () => undefined,
            () => undefined
        );

        this.tails.set(key, tail);
        void tail.then(() => {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        });

        return result;
    }

    /** Number of keys with queued or running work. */
    get pendingKeys(): number {
        return this.tails.size;
    }
}
