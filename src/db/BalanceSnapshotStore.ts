import { join } from 'node:path';
import { Mutex } from './Mutex.js';
import { readTextIfExists, writeFileAtomic } from './fileStore.js';

/**
 * Last known balance (whole sats) per wallet tag, one file per wallet.
 */
export class BalanceSnapshotStore {
    private readonly cache = new Map<string, number>();
    private readonly lock = new Mutex();

    public constructor(private readonly dir: string) {}

    public pathFor(walletTag: string): string {
        return join(this.dir, `balance-${walletTag}.txt`);
    }

    /**
     * `null` means the wallet has never been observed. Unreadable or
     * unparseable content counts as a zero balance.
     */
    public async load(walletTag: string): Promise<number | null> {
        const cached = this.cache.get(walletTag);
        if (cached !== undefined) return cached;

        let content: string | null;
        try {
            content = await readTextIfExists(this.pathFor(walletTag));
        } catch (err: unknown) {
            console.error(`[BalanceSnapshot] Failed to read snapshot for ${walletTag}:`, err);
            return 0;
        }
        if (content === null) return null;

        const trimmed = content.trim();
        const value = Number(trimmed);
        if (trimmed === '' || !Number.isFinite(value)) {
            console.warn(`[BalanceSnapshot] Unparseable snapshot for ${walletTag} ("${trimmed}"), treating as 0`);
            return 0;
        }
        const balance = Math.trunc(value);
        this.cache.set(walletTag, balance);
        return balance;
    }

    /** Last loaded or saved value, without touching disk. */
    public peek(walletTag: string): number | null {
        return this.cache.get(walletTag) ?? null;
    }

    public async save(walletTag: string, balance: number): Promise<void> {
        await this.lock.runExclusive(async () => {
            this.cache.set(walletTag, balance);
            try {
                await writeFileAtomic(this.pathFor(walletTag), String(balance));
            } catch (err: unknown) {
                console.error(`[BalanceSnapshot] Failed to persist snapshot for ${walletTag}:`, err);
            }
        });
    }
}
