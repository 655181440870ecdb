import type { WalletPoller } from './WalletPoller.js';
import type { WalletEventSink } from './Notifier.js';

export type PollTarget = Pick<WalletPoller, 'wallet' | 'poll'>;

export interface WalletStatus {
    readonly tag: string;
    readonly name: string;
    /** Balance seen on the last successful fetch, whole sats. */
    readonly balance: number | null;
    readonly pendingCount: number;
    readonly lastSuccessAt: Date | null;
    readonly lastError: string | null;
}

export interface TickSummary {
    readonly startedAt: Date;
    readonly succeeded: number;
    readonly failed: number;
    readonly events: number;
}

/**
 * Drives every wallet poller once per tick, in order. One wallet failing
 * (upstream error, or a throw anywhere in its diff) never stops the rest.
 */
export class MonitorScheduler {
    private readonly statuses = new Map<string, WalletStatus>();
    private lastTick: Date | null = null;
    private readonly now: () => Date;

    public constructor(
        private readonly pollers: readonly PollTarget[],
        private readonly sink: WalletEventSink,
        now?: () => Date,
    ) {
        this.now = now ?? (() => new Date());
        for (const p of pollers) {
            this.statuses.set(p.wallet.tag, {
                tag: p.wallet.tag,
                name: p.wallet.name,
                balance: null,
                pendingCount: 0,
                lastSuccessAt: null,
                lastError: null,
            });
        }
    }

    public get lastTickAt(): Date | null {
        return this.lastTick;
    }

    public getStatuses(): WalletStatus[] {
        return [...this.statuses.values()];
    }

    public async runTick(): Promise<TickSummary> {
        const startedAt = this.now();
        let succeeded = 0;
        let failed = 0;
        let events = 0;

        for (const poller of this.pollers) {
            const { wallet } = poller;
            try {
                const outcome = await poller.poll();
                if (outcome.status === 'busy') continue;
                if (outcome.status === 'failed') {
                    failed++;
                    this.update(wallet.tag, { lastError: outcome.error });
                    continue;
                }

                succeeded++;
                events += outcome.events.length;
                this.update(wallet.tag, {
                    balance: outcome.balance,
                    pendingCount: outcome.pending.length,
                    lastSuccessAt: this.now(),
                    lastError: null,
                });
                if (outcome.events.length > 0) {
                    await this.sink.publish(wallet, outcome.events);
                }
            } catch (err: unknown) {
                failed++;
                const message = err instanceof Error ? err.message : String(err);
                console.error(`[Scheduler] Wallet ${wallet.tag} failed:`, err);
                this.update(wallet.tag, { lastError: message });
            }
        }

        this.lastTick = startedAt;
        if (failed > 0) {
            console.warn(`[Scheduler] Tick finished: ${succeeded} ok, ${failed} failed, ${events} event(s)`);
        }
        return { startedAt, succeeded, failed, events };
    }

    private update(tag: string, patch: Partial<WalletStatus>): void {
        const current = this.statuses.get(tag);
        if (current) this.statuses.set(tag, { ...current, ...patch });
    }
}
