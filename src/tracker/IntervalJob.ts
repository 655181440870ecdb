/**
 * Runs an async task on a fixed delay: the next run is scheduled only after
 * the previous one settles, so runs never overlap.
 */
export class IntervalJob {
    private timer: ReturnType<typeof setTimeout> | undefined;
    private running = false;

    public constructor(
        private readonly name: string,
        private readonly intervalMs: number,
        private readonly task: () => Promise<void>,
        /** Run once at start instead of waiting a full interval. */
        private readonly runImmediately = true,
    ) {}

    public get isRunning(): boolean {
        return this.running;
    }

    public async start(): Promise<void> {
        if (this.intervalMs <= 0) {
            console.log(`[${this.name}] Disabled (interval is 0)`);
            return;
        }
        this.running = true;
        console.log(`[${this.name}] Starting, every ${this.intervalMs / 1000}s`);
        if (this.runImmediately) {
            await this.run();
        } else {
            this.schedule();
        }
    }

    public stop(): void {
        if (!this.running) return;
        this.running = false;
        if (this.timer !== undefined) {
            clearTimeout(this.timer);
            this.timer = undefined;
        }
        console.log(`[${this.name}] Stopped.`);
    }

    private schedule(): void {
        if (this.running) {
            this.timer = setTimeout(() => void this.run(), this.intervalMs);
        }
    }

    private async run(): Promise<void> {
        if (!this.running) return;

        try {
            await this.task();
        } catch (err: unknown) {
            console.error(`[${this.name}] Error during run:`, err);
        }

        this.schedule();
    }
}
