import type { CommandContext, Context } from 'grammy';
import type { BotDeps } from '../Bot.js';
import { mainKeyboard } from '../keyboards.js';
import { escapeMarkdown } from '../../tracker/format.js';

export function buildWelcome(instanceName: string, walletCount: number): string {
    return (
        `⚡ *${escapeMarkdown(instanceName)}*\n\n` +
        `Watching ${walletCount} wallet${walletCount === 1 ? '' : 's'} for payments and balance changes\\.\n\n` +
        '`/balance` — Current balance of every wallet\n' +
        '`/transactions` — Latest payments\n' +
        '`/donations` — Donation summary\n' +
        '`/help` — All commands'
    );
}

export async function startCommand(ctx: CommandContext<Context>, deps: BotDeps): Promise<void> {
    await ctx.reply(buildWelcome(deps.config.instanceName, deps.wallets.length), {
        parse_mode: 'MarkdownV2',
        reply_markup: mainKeyboard,
    });
}
