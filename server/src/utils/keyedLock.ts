/**
 * Keyed async lock
 *
 * Serializes work per key within one process: a second caller for the same
 * key waits until the first finishes. Used around ERP partner creation so two
 * orders from a new customer cannot both create a partner.
 * Cross-process exclusion comes from the unique constraints on the mapping
 * tables.
 */

export class KeyedLock {
    private tails = new Map<string, Promise<void>>();

    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
