import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtempSync, rmSync } from 'node:fs';
import type { WalletDescriptor } from '../config.js';
import type { PaymentRecord, WalletApi } from '../api/LnbitsClient.js';
import { DonationLedger } from '../db/DonationLedger.js';
import { MonitorScheduler, type PollTarget } from '../tracker/MonitorScheduler.js';
import { DigestReporter, formatDigest, summarizeFlows } from '../tracker/DigestReporter.js';
import { IntervalJob } from '../tracker/IntervalJob.js';
import type { NotificationChannel, WalletEventSink } from '../tracker/Notifier.js';
import type { PollOutcome, WalletEvent } from '../tracker/WalletPoller.js';

const NOW = new Date('2024-06-01T00:00:00Z');

function wallet(tag: string): WalletDescriptor {
    return { tag, name: `Wallet ${tag}`, apiKey: 'test-key' };
}

function target(tag: string, poll: () => Promise<PollOutcome>): PollTarget {
    return { wallet: wallet(tag), poll };
}

class RecordingSink implements WalletEventSink {
    public readonly published: { tag: string; events: readonly WalletEvent[] }[] = [];

    public async publish(w: WalletDescriptor, events: readonly WalletEvent[]): Promise<void> {
        this.published.push({ tag: w.tag, events });
    }
}

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('MonitorScheduler', () => {
    it('keeps polling other wallets when one fails', async () => {
        const event: WalletEvent = { type: 'balance_initialized', walletTag: 'a', walletName: 'Wallet a', balance: 5 };
        const sink = new RecordingSink();
        const scheduler = new MonitorScheduler(
            [
                target('a', async () => ({ status: 'ok', events: [event], pending: [], balance: 5 })),
                target('b', async () => {
                    throw new Error('boom');
                }),
                target('c', async () => ({ status: 'failed', error: 'timeout' })),
                target('d', async () => ({ status: 'ok', events: [], pending: [], balance: 9 })),
            ],
            sink,
            () => NOW,
        );

        const summary = await scheduler.runTick();

        expect(summary).toEqual({ startedAt: NOW, succeeded: 2, failed: 2, events: 1 });
        expect(sink.published).toEqual([{ tag: 'a', events: [event] }]);
        expect(scheduler.lastTickAt).toEqual(NOW);

        const byTag = new Map(scheduler.getStatuses().map((s) => [s.tag, s]));
        expect(byTag.get('a')).toMatchObject({ balance: 5, lastError: null, lastSuccessAt: NOW });
        expect(byTag.get('b')).toMatchObject({ balance: null, lastError: 'boom' });
        expect(byTag.get('c')).toMatchObject({ lastError: 'timeout' });
        expect(byTag.get('d')).toMatchObject({ balance: 9, pendingCount: 0 });
    });

    it('has no last tick before the first run', () => {
        const scheduler = new MonitorScheduler([], new RecordingSink());
        expect(scheduler.lastTickAt).toBeNull();
        expect(scheduler.getStatuses()).toEqual([]);
    });
});

describe('IntervalJob', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('runs immediately, then on each interval until stopped', async () => {
        vi.useFakeTimers();
        const task = vi.fn().mockResolvedValue(undefined);
        const job = new IntervalJob('Test', 1000, task);

        await job.start();
        expect(task).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(1000);
        expect(task).toHaveBeenCalledTimes(2);

        job.stop();
        await vi.advanceTimersByTimeAsync(5000);
        expect(task).toHaveBeenCalledTimes(2);
        expect(job.isRunning).toBe(false);
    });

    it('keeps running after a failing run', async () => {
        vi.useFakeTimers();
        const task = vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValue(undefined);
        const job = new IntervalJob('Test', 1000, task);

        await job.start();
        await vi.advanceTimersByTimeAsync(1000);
        expect(task).toHaveBeenCalledTimes(2);
        job.stop();
    });

    it('waits a full interval first when asked to', async () => {
        vi.useFakeTimers();
        const task = vi.fn().mockResolvedValue(undefined);
        const job = new IntervalJob('Test', 1000, task, false);

        await job.start();
        expect(task).not.toHaveBeenCalled();
        await vi.advanceTimersByTimeAsync(1000);
        expect(task).toHaveBeenCalledTimes(1);
        job.stop();
    });

    it('does nothing with a zero interval', async () => {
        const task = vi.fn().mockResolvedValue(undefined);
        const job = new IntervalJob('Test', 0, task);
        await job.start();
        expect(task).not.toHaveBeenCalled();
        expect(job.isRunning).toBe(false);
    });
});

describe('DigestReporter', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = mkdtempSync(join(tmpdir(), 'lnbits-digest-'));
    });

    afterEach(() => {
        rmSync(tmpDir, { recursive: true, force: true });
    });

    function rec(amountMsat: number, status: PaymentRecord['status'] = 'completed'): PaymentRecord {
        return { id: `h${amountMsat}`, amountMsat, memo: null, status, createdAt: null, donationMetadata: null };
    }

    const payments = [rec(10_000), rec(20_500), rec(-5_999), rec(7_000, 'pending'), rec(-1_000, 'failed'), rec(0)];

    it('sums completed payments by direction', () => {
        expect(summarizeFlows(payments)).toEqual({ incoming: 30, incomingCount: 2, outgoing: 5, outgoingCount: 1 });
    });

    it('formats the digest', () => {
        const text = formatDigest('Main', 1234, summarizeFlows(payments), 21, NOW);
        expect(text).toBe(
            [
                '📊 *Main \\- Daily Wallet Balance*',
                '',
                'Balance: `1,234 sats`',
                '🟢 Incoming: `30 sats` \\(2 payments\\)',
                '🔴 Outgoing: `5 sats` \\(1 payments\\)',
                '💝 Donations: `21 sats`',
                '',
                '🕒 _2024\\-06\\-01 00:00:00 UTC_',
            ].join('\n'),
        );
    });

    it('reports every reachable wallet and skips the rest', async () => {
        const donations = await DonationLedger.open(join(tmpDir, 'donations.json'));
        await donations.append({ date: NOW.toISOString(), memo: 'gm', amount: 21, paymentId: 'main_x' });

        const ok: WalletApi = {
            getBalanceMsat: async () => 1_234_000,
            getRecentPayments: async () => payments,
        };
        const down: WalletApi = {
            getBalanceMsat: async () => {
                throw new Error('down');
            },
            getRecentPayments: async () => [],
        };
        const sent: string[] = [];
        const channel: NotificationChannel = {
            send: async (text: string) => {
                sent.push(text);
                return true;
            },
        };

        const reporter = new DigestReporter({
            wallets: [
                { wallet: wallet('main'), api: ok },
                { wallet: wallet('tips'), api: down },
            ],
            channel,
            donations,
            donationLinkId: 'link1',
            fetchCount: 21,
            now: () => NOW,
        });

        expect(await reporter.run()).toBe(1);
        expect(sent).toEqual([formatDigest('Wallet main', 1234, summarizeFlows(payments), 21, NOW)]);
    });
});
