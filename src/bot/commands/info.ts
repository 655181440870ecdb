import type { Context } from 'grammy';
import type { Config } from '../../config.js';
import type { BotDeps } from '../Bot.js';
import { escapeMarkdown, formatSats, utcStamp } from '../../tracker/format.js';

function formatInterval(ms: number): string {
    if (ms === 0) return 'disabled';
    const seconds = ms / 1000;
    if (seconds % 3600 === 0) return `${seconds / 3600}h`;
    if (seconds % 60 === 0) return `${seconds / 60}m`;
    return `${seconds}s`;
}

export function buildInfoMessage(config: Config, lastTickAt: Date | null): string {
    const lines = [
        `ℹ️ *${escapeMarkdown(config.instanceName)}*`,
        '',
        `Balance change threshold: \`${escapeMarkdown(formatSats(config.balanceChangeThreshold))}\``,
        `Balance delta mode: \`${config.balanceDeltaMode}\``,
        `Payment poll interval: \`${formatInterval(config.paymentsFetchIntervalMs)}\``,
        `Balance digest interval: \`${formatInterval(config.digestIntervalMs)}\``,
        `Transactions per fetch: \`${config.latestTransactionsCount}\``,
        `Donation link: ${config.donationLinkId ? `\`${escapeMarkdown(config.donationLinkId)}\`` : '_not configured_'}`,
        '',
        `*Wallets \\(${config.wallets.length}\\):*`,
        ...config.wallets.map((w) => `• ${escapeMarkdown(w.name)} \\(\`${escapeMarkdown(w.tag)}\`\\)`),
        '',
        `Last poll: ${lastTickAt ? escapeMarkdown(utcStamp(lastTickAt)) : '_not yet_'}`,
    ];
    if (config.informationUrl) {
        lines.push('', `[More information](${escapeMarkdown(config.informationUrl)})`);
    }
    return lines.join('\n');
}

export async function infoCommand(ctx: Context, deps: BotDeps): Promise<void> {
    await ctx.reply(buildInfoMessage(deps.config, deps.lastTickAt()), {
        parse_mode: 'MarkdownV2',
        link_preview_options: { is_disabled: true },
    });
}
