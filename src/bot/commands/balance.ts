import type { Context } from 'grammy';
import type { WalletHandle } from '../../api/LnbitsClient.js';
import type { BotDeps } from '../Bot.js';
import { msatToSats } from '../../tracker/EventClassifier.js';
import { escapeMarkdown, formatSats, timestampLine } from '../../tracker/format.js';

export interface WalletBalanceRow {
    readonly name: string;
    /** `null` when the fetch failed. */
    readonly balance: number | null;
}

export async function fetchBalances(wallets: readonly WalletHandle[]): Promise<WalletBalanceRow[]> {
    const results = await Promise.allSettled(wallets.map(({ api }) => api.getBalanceMsat()));
    return results.map((r, i) => {
        const name = wallets[i]?.wallet.name ?? `Wallet ${i + 1}`;
        if (r.status === 'fulfilled') return { name, balance: msatToSats(r.value) };
        console.warn(`[Balance] Fetch failed for ${name}:`, r.reason instanceof Error ? r.reason.message : r.reason);
        return { name, balance: null };
    });
}

export function buildBalanceMessage(rows: readonly WalletBalanceRow[], now: Date): string {
    const lines = ['💰 *Wallet Balances*', ''];
    for (const { name, balance } of rows) {
        const value = balance === null ? '_unavailable_' : `\`${escapeMarkdown(formatSats(balance))}\``;
        lines.push(`*${escapeMarkdown(name)}:* ${value}`);
    }

    const known = rows.filter((r): r is WalletBalanceRow & { balance: number } => r.balance !== null);
    if (rows.length > 1 && known.length > 0) {
        const total = known.reduce((sum, r) => sum + r.balance, 0);
        lines.push('', `*Total:* \`${escapeMarkdown(formatSats(total))}\``);
    }

    lines.push('', timestampLine(now));
    return lines.join('\n');
}

export async function balanceCommand(ctx: Context, deps: BotDeps): Promise<void> {
    const thinking = await ctx.reply('⏳ Fetching balances…');
    const chatId = thinking.chat.id;
    try {
        const rows = await fetchBalances(deps.wallets);
        await ctx.api.editMessageText(chatId, thinking.message_id, buildBalanceMessage(rows, new Date()), {
            parse_mode: 'MarkdownV2',
        });
    } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error('[Balance] Error:', msg);
        await ctx.api.editMessageText(chatId, thinking.message_id, `❌ Error fetching balance:\n${escapeMarkdown(msg)}`, {
            parse_mode: 'MarkdownV2',
        });
    }
}
