/**
 * Promise-chain mutual exclusion. Each store owns one, so a write to one
 * store never waits on another.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        this.tail = new Promise<void>((resolve) => {
            release = resolve;
        });

        await previous;
        try {
            return await fn();
        } finally {
            release();
        }
    }
}
