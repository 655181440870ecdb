import { Mutex } from './Mutex.js';
import { appendLine, readTextIfExists } from './fileStore.js';

/**
 * Append-only set of processed payment identifiers, namespaced per wallet
 * as `{walletTag}_{paymentHash}`.
 *
 * Reads come from the in-memory set without locking; `record` holds the
 * lock for the whole check-append-add sequence.
 */
export class IdentifierLedger {
    private readonly seen = new Set<string>();
    private readonly lock = new Mutex();

    private constructor(private readonly path: string) {}

    /** Rebuild the in-memory set by reading the ledger file front to back. */
    public static async open(path: string): Promise<IdentifierLedger> {
        const ledger = new IdentifierLedger(path);
        const content = await readTextIfExists(path);
        if (content !== null) {
            for (const line of content.split('\n')) {
                const id = line.trim();
                if (id) ledger.seen.add(id);
            }
        }
        console.log(`[IdentifierLedger] Loaded ${ledger.seen.size} processed identifier(s)`);
        return ledger;
    }

    public static key(walletTag: string, paymentHash: string): string {
        return `${walletTag}_${paymentHash}`;
    }

    public get size(): number {
        return this.seen.size;
    }

    public has(id: string): boolean {
        return this.seen.has(id);
    }

    /**
     * Persist `id`. On I/O failure the error is logged and the in-memory set
     * still advances, so a restart may redeliver this tick's events.
     */
    public async record(id: string): Promise<void> {
        await this.lock.runExclusive(async () => {
            if (this.seen.has(id)) return;
            this.seen.add(id);
            try {
                await appendLine(this.path, id);
            } catch (err: unknown) {
                console.error(`[IdentifierLedger] Failed to persist ${id}:`, err);
            }
        });
    }
}
