import type { BalanceDeltaMode, WalletDescriptor } from '../config.js';
import type { PaymentRecord, WalletApi } from '../api/LnbitsClient.js';
import type { BalanceSnapshotStore } from '../db/BalanceSnapshotStore.js';
import type { DonationLedger } from '../db/DonationLedger.js';
import { IdentifierLedger } from '../db/IdentifierLedger.js';
import { classify, msatToSats, type ClassifiedEvent } from './EventClassifier.js';
import { sortNewestFirst } from './Timestamp.js';

// ─── Events ──────────────────────────────────────────────────────────────────

export interface PaymentEvent {
    readonly type: 'payment';
    readonly walletTag: string;
    readonly walletName: string;
    readonly payment: ClassifiedEvent;
}

/** First observation of a wallet: no previous balance to compare against. */
export interface BalanceInitialized {
    readonly type: 'balance_initialized';
    readonly walletTag: string;
    readonly walletName: string;
    readonly balance: number;
}

export interface BalanceChanged {
    readonly type: 'balance_changed';
    readonly walletTag: string;
    readonly walletName: string;
    readonly previous: number;
    readonly current: number;
    /** `current - previous`, whole sats */
    readonly delta: number;
}

export type WalletEvent = PaymentEvent | BalanceInitialized | BalanceChanged;

export type PollerState = 'idle' | 'fetching' | 'diffing' | 'done';

export type PollOutcome =
    | { readonly status: 'ok'; readonly events: WalletEvent[]; readonly pending: PaymentRecord[]; readonly balance: number }
    | { readonly status: 'failed'; readonly error: string }
    | { readonly status: 'busy' };

export interface WalletPollerOptions {
    readonly wallet: WalletDescriptor;
    readonly api: WalletApi;
    readonly identifiers: IdentifierLedger;
    readonly snapshots: BalanceSnapshotStore;
    readonly donations: DonationLedger;
    readonly forbiddenWords: () => readonly string[];
    readonly donationLinkId: string | null;
    readonly threshold: number;
    readonly fetchCount: number;
    readonly deltaMode: BalanceDeltaMode;
    readonly now?: () => Date;
}

/**
 * Per-wallet poll cycle: Idle → Fetching → Diffing → Done → Idle.
 *
 * A failed fetch abandons the tick for this wallet before anything is
 * committed; the next tick retries.
 */
export class WalletPoller {
    private state: PollerState = 'idle';
    private readonly opts: WalletPollerOptions;
    private readonly now: () => Date;
    private readonly log: string;

    public constructor(opts: WalletPollerOptions) {
        this.opts = opts;
        this.now = opts.now ?? (() => new Date());
        this.log = `[Poller:${opts.wallet.tag}]`;
    }

    public get wallet(): WalletDescriptor {
        return this.opts.wallet;
    }

    public getState(): PollerState {
        return this.state;
    }

    public async poll(): Promise<PollOutcome> {
        if (this.state !== 'idle') {
            console.warn(`${this.log} Previous tick still running (${this.state}), skipping`);
            return { status: 'busy' };
        }

        this.state = 'fetching';
        let balanceMsat: number;
        let payments: PaymentRecord[];
        try {
            [balanceMsat, payments] = await Promise.all([
                this.opts.api.getBalanceMsat(),
                this.opts.api.getRecentPayments(this.opts.fetchCount),
            ]);
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            console.warn(`${this.log} Fetch failed, abandoning tick: ${message}`);
            this.state = 'idle';
            return { status: 'failed', error: message };
        }

        try {
            this.state = 'diffing';
            const balance = msatToSats(balanceMsat);
            const events: WalletEvent[] = [];
            const balanceEvent = await this.diffBalance(balance);
            if (balanceEvent) events.push(balanceEvent);
            const { paymentEvents, pending } = await this.diffPayments(payments);
            events.push(...paymentEvents);

            this.state = 'done';
            return { status: 'ok', events, pending, balance };
        } finally {
            this.state = 'idle';
        }
    }

    private async diffBalance(current: number): Promise<WalletEvent | null> {
        const { wallet, snapshots, threshold, deltaMode } = this.opts;
        const previous = await snapshots.load(wallet.tag);

        if (previous === null) {
            await snapshots.save(wallet.tag, current);
            console.log(`${this.log} Initial balance set to ${current} sats`);
            return { type: 'balance_initialized', walletTag: wallet.tag, walletName: wallet.name, balance: current };
        }

        const delta = current - previous;
        if (Math.abs(delta) < threshold) {
            if (delta !== 0) {
                console.log(`${this.log} Balance change (${Math.abs(delta)} sats) below threshold (${threshold} sats)`);
            }
            if (deltaMode === 'tick' && delta !== 0) await snapshots.save(wallet.tag, current);
            return null;
        }

        await snapshots.save(wallet.tag, current);
        console.log(`${this.log} Balance changed from ${previous} to ${current} sats`);
        return {
            type: 'balance_changed',
            walletTag: wallet.tag,
            walletName: wallet.name,
            previous,
            current,
            delta,
        };
    }

    private async diffPayments(
        payments: PaymentRecord[],
    ): Promise<{ paymentEvents: PaymentEvent[]; pending: PaymentRecord[] }> {
        const { wallet, identifiers, donations, donationLinkId, fetchCount } = this.opts;
        const now = this.now();

        const latest = sortNewestFirst(payments, (p) => p.createdAt, now)
            .slice(0, fetchCount)
            .map(({ item }) => item);

        const paymentEvents: PaymentEvent[] = [];
        const pending: PaymentRecord[] = [];
        const forbidden = this.opts.forbiddenWords();

        for (const record of latest) {
            if (record.id !== null && identifiers.has(IdentifierLedger.key(wallet.tag, record.id))) continue;

            const result = classify(record, { walletTag: wallet.tag, donationLinkId, forbiddenWords: forbidden, now });
            if (result.kind === 'skip') {
                if (result.reason === 'pending') {
                    pending.push(record);
                } else if (record.id !== null) {
                    // Non-economic records are final; don't re-examine them every tick.
                    await identifiers.record(IdentifierLedger.key(wallet.tag, record.id));
                }
                continue;
            }

            const event = result.event;
            if (event.donation) {
                await donations.append({
                    date: event.timestamp.at.toISOString(),
                    memo: event.donation.memo,
                    amount: event.donation.amount,
                    paymentId: event.id,
                });
            }
            paymentEvents.push({ type: 'payment', walletTag: wallet.tag, walletName: wallet.name, payment: event });
            await identifiers.record(event.id);
        }

        if (paymentEvents.length > 0) {
            console.log(`${this.log} ${paymentEvents.length} new payment(s)`);
        }
        return { paymentEvents, pending };
    }
}
