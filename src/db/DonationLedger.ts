import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { EMPTY_MEMO, sanitize } from '../tracker/MemoSanitizer.js';
import { Mutex } from './Mutex.js';
import { readTextIfExists, writeFileAtomic } from './fileStore.js';

export interface Donation {
    readonly id: string;
    /** ISO-8601 */
    readonly date: string;
    readonly memo: string;
    /** Whole sats. */
    readonly amount: number;
    readonly likes: number;
    readonly dislikes: number;
    /** `{walletTag}_{paymentHash}` of the payment this came from. */
    readonly paymentId: string | null;
}

export type NewDonation = Pick<Donation, 'date' | 'memo' | 'amount' | 'paymentId'>;

export type VoteType = 'like' | 'dislike';

export interface VoteCounts {
    readonly likes: number;
    readonly dislikes: number;
}

export interface DonationSnapshot {
    readonly totalDonations: number;
    readonly donations: readonly Donation[];
    readonly lastUpdate: Date;
}

// Accepts the current layout and the legacy one (snake_case total, donations
// without id or vote counts).
const StoredDonationSchema = z.object({
    id: z.string().min(1).optional(),
    date: z.string(),
    memo: z.string().nullish(),
    amount: z.number().finite(),
    likes: z.number().int().nonnegative().optional(),
    dislikes: z.number().int().nonnegative().optional(),
    paymentId: z.string().nullish(),
});

const StoredLedgerSchema = z.object({
    totalDonations: z.number().finite().optional(),
    total_donations: z.number().finite().optional(),
    donations: z.array(StoredDonationSchema).default([]),
});

function sumAmounts(donations: readonly Donation[]): number {
    return donations.reduce((sum, d) => sum + d.amount, 0);
}

/**
 * Attributed donations plus their running total, persisted as one JSON
 * document. Every mutation rewrites the whole document atomically, so the
 * stored total always matches the stored list.
 */
export class DonationLedger {
    private donations: Donation[] = [];
    private totalAmount = 0;
    private updatedAt: Date;
    private readonly lock = new Mutex();

    private constructor(
        private readonly path: string,
        private readonly now: () => Date,
    ) {
        this.updatedAt = now();
    }

    public static async open(path: string, now: () => Date = () => new Date()): Promise<DonationLedger> {
        const ledger = new DonationLedger(path, now);
        const content = await readTextIfExists(path);
        if (content === null) return ledger;

        let json: unknown;
        try {
            json = JSON.parse(content);
        } catch {
            throw new Error(`Donation ledger ${path} is not valid JSON`);
        }
        const parsed = StoredLedgerSchema.safeParse(json);
        if (!parsed.success) {
            throw new Error(`Donation ledger ${path} is malformed: ${parsed.error.message}`);
        }

        ledger.donations = parsed.data.donations.map((d) => ({
            id: d.id ?? randomUUID(),
            date: d.date,
            memo: d.memo ?? EMPTY_MEMO,
            amount: d.amount,
            likes: d.likes ?? 0,
            dislikes: d.dislikes ?? 0,
            paymentId: d.paymentId ?? null,
        }));
        ledger.totalAmount = sumAmounts(ledger.donations);

        const storedTotal = parsed.data.totalDonations ?? parsed.data.total_donations;
        if (storedTotal !== undefined && storedTotal !== ledger.total) {
            console.warn(
                `[DonationLedger] Stored total ${storedTotal} disagrees with donation sum ${ledger.total}; using the sum`,
            );
        }
        // Persist upgrades so assigned ids survive a restart.
        const upgraded = parsed.data.totalDonations === undefined
            || parsed.data.donations.some((d) => d.id === undefined || d.likes === undefined || d.dislikes === undefined);
        if (upgraded || storedTotal !== ledger.total) {
            await ledger.persist();
        }
        console.log(`[DonationLedger] Loaded ${ledger.donations.length} donation(s), total ${ledger.total} sats`);
        return ledger;
    }

    public get total(): number {
        return this.totalAmount;
    }

    public snapshot(): DonationSnapshot {
        return {
            totalDonations: this.total,
            donations: [...this.donations],
            lastUpdate: this.updatedAt,
        };
    }

    public get lastUpdate(): Date {
        return this.updatedAt;
    }

    public find(id: string): Donation | undefined {
        return this.donations.find((d) => d.id === id);
    }

    /**
     * Add a donation and persist. Returns `null` without changes when a
     * donation for the same payment is already recorded.
     */
    public async append(input: NewDonation): Promise<Donation | null> {
        return this.lock.runExclusive(async () => {
            if (input.paymentId !== null && this.donations.some((d) => d.paymentId === input.paymentId)) {
                return null;
            }
            const donation: Donation = { ...input, id: randomUUID(), likes: 0, dislikes: 0 };
            this.donations = [...this.donations, donation];
            this.totalAmount += donation.amount;
            this.updatedAt = this.now();
            await this.persist();
            console.log(`[DonationLedger] New donation: ${donation.amount} sats - ${donation.memo}`);
            return donation;
        });
    }

    /** Increment one vote counter; `null` when the donation does not exist. */
    public async vote(donationId: string, type: VoteType): Promise<VoteCounts | null> {
        return this.lock.runExclusive(async () => {
            const index = this.donations.findIndex((d) => d.id === donationId);
            const current = this.donations[index];
            if (current === undefined) return null;

            const updated: Donation = type === 'like'
                ? { ...current, likes: current.likes + 1 }
                : { ...current, dislikes: current.dislikes + 1 };
            this.donations = this.donations.map((d, i) => (i === index ? updated : d));
            this.updatedAt = this.now();
            await this.persist();
            return { likes: updated.likes, dislikes: updated.dislikes };
        });
    }

    /**
     * Re-apply the sanitizer to every stored memo. Runs only when asked to,
     * e.g. after a word is banned; returns the number of memos changed.
     */
    public async resanitizeAll(forbidden: readonly string[]): Promise<number> {
        return this.lock.runExclusive(async () => {
            let changed = 0;
            this.donations = this.donations.map((d) => {
                const memo = sanitize(d.memo, forbidden);
                if (memo === d.memo) return d;
                changed++;
                return { ...d, memo };
            });
            if (changed > 0) {
                this.updatedAt = this.now();
                await this.persist();
            }
            return changed;
        });
    }

    private async persist(): Promise<void> {
        const doc = { totalDonations: this.totalAmount, donations: this.donations };
        try {
            await writeFileAtomic(this.path, JSON.stringify(doc, null, 2));
        } catch (err: unknown) {
            console.error('[DonationLedger] Failed to persist donations:', err);
        }
    }
}
