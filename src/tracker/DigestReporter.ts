import type { InlineKeyboard } from 'grammy';
import { MAIN_WALLET_TAG } from '../config.js';
import type { PaymentRecord, WalletHandle } from '../api/LnbitsClient.js';
import type { DonationLedger } from '../db/DonationLedger.js';
import { msatToSats } from './EventClassifier.js';
import type { NotificationChannel } from './Notifier.js';
import { escapeMarkdown, formatSats, timestampLine } from './format.js';

export interface FlowTotals {
    readonly incoming: number;
    readonly incomingCount: number;
    readonly outgoing: number;
    readonly outgoingCount: number;
}

/** Sums completed payments by direction, whole sats. */
export function summarizeFlows(payments: readonly PaymentRecord[]): FlowTotals {
    let incoming = 0;
    let incomingCount = 0;
    let outgoing = 0;
    let outgoingCount = 0;
    for (const p of payments) {
        if (p.status !== 'completed' || p.amountMsat === 0) continue;
        if (p.amountMsat > 0) {
            incoming += msatToSats(p.amountMsat);
            incomingCount++;
        } else {
            outgoing += msatToSats(p.amountMsat);
            outgoingCount++;
        }
    }
    return { incoming, incomingCount, outgoing, outgoingCount };
}

export function formatDigest(
    walletName: string,
    balance: number,
    flows: FlowTotals,
    donationTotal: number | null,
    now: Date,
): string {
    const lines = [
        `📊 *${escapeMarkdown(walletName)} \\- Daily Wallet Balance*`,
        '',
        `Balance: \`${escapeMarkdown(formatSats(balance))}\``,
        `🟢 Incoming: \`${escapeMarkdown(formatSats(flows.incoming))}\` \\(${flows.incomingCount} payments\\)`,
        `🔴 Outgoing: \`${escapeMarkdown(formatSats(flows.outgoing))}\` \\(${flows.outgoingCount} payments\\)`,
    ];
    if (donationTotal !== null) {
        lines.push(`💝 Donations: \`${escapeMarkdown(formatSats(donationTotal))}\``);
    }
    lines.push('', timestampLine(now));
    return lines.join('\n');
}

export interface DigestReporterOptions {
    readonly wallets: readonly WalletHandle[];
    readonly channel: NotificationChannel;
    readonly donations: DonationLedger;
    /** Donation total is shown on the main wallet's digest only when set. */
    readonly donationLinkId: string | null;
    readonly fetchCount: number;
    readonly keyboard?: () => InlineKeyboard;
    readonly now?: () => Date;
}

/**
 * Periodic per-wallet summary. Reads upstream directly and never touches
 * the identifier ledger or balance snapshots.
 */
export class DigestReporter {
    private readonly now: () => Date;

    public constructor(private readonly opts: DigestReporterOptions) {
        this.now = opts.now ?? (() => new Date());
    }

    /** Returns the number of wallets reported. */
    public async run(): Promise<number> {
        const { wallets, channel, donations, donationLinkId, fetchCount, keyboard } = this.opts;
        let sent = 0;

        for (const { wallet, api } of wallets) {
            let balanceMsat: number;
            let payments: PaymentRecord[];
            try {
                [balanceMsat, payments] = await Promise.all([
                    api.getBalanceMsat(),
                    api.getRecentPayments(fetchCount),
                ]);
            } catch (err: unknown) {
                console.warn(
                    `[Digest] Skipping ${wallet.tag}: ${err instanceof Error ? err.message : String(err)}`,
                );
                continue;
            }

            const donationTotal = donationLinkId !== null && wallet.tag === MAIN_WALLET_TAG ? donations.total : null;
            const text = formatDigest(wallet.name, msatToSats(balanceMsat), summarizeFlows(payments), donationTotal, this.now());
            if (await channel.send(text, keyboard?.())) sent++;
        }

        console.log(`[Digest] Sent ${sent}/${wallets.length} wallet summaries`);
        return sent;
    }
}
