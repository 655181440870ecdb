import type { Context } from 'grammy';
import type { DonationLinkInfo } from '../../api/DonationLinkResolver.js';
import type { DonationSnapshot } from '../../db/DonationLedger.js';
import type { BotDeps } from '../Bot.js';
import { escapeMarkdown, formatSats } from '../../tracker/format.js';

export function buildDonationsMessage(snapshot: DonationSnapshot, link: DonationLinkInfo | null): string {
    const { donations, totalDonations } = snapshot;
    const lines = [
        '💝 *Donations*',
        '',
        `Total: \`${escapeMarkdown(formatSats(totalDonations))}\``,
        `Count: \`${donations.length}\``,
    ];

    const latest = donations[donations.length - 1];
    if (latest) {
        lines.push(
            '',
            '*Latest:*',
            `${escapeMarkdown(formatSats(latest.amount))} \\- ${escapeMarkdown(latest.memo)}`,
            `👍 ${latest.likes}  👎 ${latest.dislikes}`,
        );
    }

    if (link) {
        lines.push('', `⚡ Donate: \`${escapeMarkdown(link.lightningAddress)}\``);
    }
    return lines.join('\n');
}

export async function donationsCommand(ctx: Context, deps: BotDeps): Promise<void> {
    const link = deps.linkResolver ? await deps.linkResolver.resolve() : null;
    await ctx.reply(buildDonationsMessage(deps.donations.snapshot(), link), { parse_mode: 'MarkdownV2' });
}
