import type { Context } from 'grammy';
import type { PaymentRecord } from '../../api/LnbitsClient.js';
import type { BotDeps } from '../Bot.js';
import { msatToSats } from '../../tracker/EventClassifier.js';
import { sanitize } from '../../tracker/MemoSanitizer.js';
import { sortNewestFirst } from '../../tracker/Timestamp.js';
import { escapeMarkdown, formatSats, utcStamp } from '../../tracker/format.js';

function statusIcon(p: PaymentRecord): string {
    if (p.status === 'pending') return '⏳';
    if (p.status === 'failed') return '❌';
    return p.amountMsat >= 0 ? '🟢' : '🔴';
}

export function buildTransactionsMessage(
    walletName: string,
    payments: readonly PaymentRecord[],
    forbidden: readonly string[],
    now: Date,
): string {
    const header = `📜 *${escapeMarkdown(walletName)} \\- Latest Transactions*`;
    if (payments.length === 0) return `${header}\n\n_No transactions yet\\._`;

    const lines = [header, ''];
    for (const { item: p, ts } of sortNewestFirst(payments, (r) => r.createdAt, now)) {
        const sign = p.amountMsat >= 0 ? '+' : '-';
        const amount = escapeMarkdown(`${sign}${formatSats(msatToSats(p.amountMsat))}`);
        const when = ts.kind === 'parsed' ? utcStamp(ts.at) : 'unknown time';
        lines.push(`${statusIcon(p)} *${amount}* \\- ${escapeMarkdown(sanitize(p.memo, forbidden))}`);
        lines.push(`    _${escapeMarkdown(when)}_`);
    }
    return lines.join('\n');
}

/** Shared by /transactions and the "View Transactions" button. */
export async function transactionsCommand(ctx: Context, deps: BotDeps): Promise<void> {
    const main = deps.wallets[0];
    if (!main) return;

    try {
        const payments = await main.api.getRecentPayments(deps.config.latestTransactionsCount);
        await ctx.reply(
            buildTransactionsMessage(main.wallet.name, payments, deps.forbiddenWords.list(), new Date()),
            { parse_mode: 'MarkdownV2', link_preview_options: { is_disabled: true } },
        );
    } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error('[Transactions] Error:', msg);
        await ctx.reply(`❌ Error fetching transactions:\n${escapeMarkdown(msg)}`, { parse_mode: 'MarkdownV2' });
    }
}
