import { Bot, type Context } from 'grammy';
import type { Config } from '../config.js';
import type { WalletHandle } from '../api/LnbitsClient.js';
import type { DonationLinkResolver } from '../api/DonationLinkResolver.js';
import type { DonationLedger } from '../db/DonationLedger.js';
import type { ForbiddenWordStore } from '../db/ForbiddenWordStore.js';
import { escapeMarkdown } from '../tracker/format.js';
import { mainKeyboard, VIEW_TRANSACTIONS } from './keyboards.js';
import { startCommand } from './commands/start.js';
import { helpCommand } from './commands/help.js';
import { balanceCommand } from './commands/balance.js';
import { transactionsCommand } from './commands/transactions.js';
import { infoCommand } from './commands/info.js';
import { donationsCommand } from './commands/donations.js';
import { banCommand, bannedCommand } from './commands/ban.js';

export interface BotDeps {
    readonly config: Config;
    /** Main wallet first. */
    readonly wallets: readonly WalletHandle[];
    readonly donations: DonationLedger;
    readonly forbiddenWords: ForbiddenWordStore;
    readonly linkResolver: DonationLinkResolver | null;
    /** Start time of the last completed poll tick. */
    readonly lastTickAt: () => Date | null;
}

const RATE_LIMITS: Readonly<Record<string, number>> = { balance: 10_000, transactions: 10_000 };

/** Lower-cased command name of `/cmd@bot args`, or `null` for plain text. */
export function commandName(text: string | undefined): string | null {
    if (!text?.startsWith('/')) return null;
    return ((text.split(/\s+/)[0] ?? '').slice(1).split('@')[0] ?? '').toLowerCase();
}

/**
 * Build and configure the Grammy Telegram bot. Only the configured chat
 * may use it.
 */
export function createBot(deps: BotDeps): Bot {
    const bot = new Bot<Context>(deps.config.telegramToken);

    // --- Auth gate: configured chat only ---
    bot.use(async (ctx, next) => {
        const chatId = ctx.chat?.id ?? ctx.callbackQuery?.from.id;
        if (chatId === deps.config.chatId) return next();

        if (ctx.callbackQuery) {
            await ctx.answerCallbackQuery('Not authorized');
            return;
        }
        if (ctx.message) {
            console.warn(`[Bot] Ignoring message from unauthorized chat ${chatId ?? 'unknown'}`);
            await ctx.reply('🔒 *Not authorized\\.*', { parse_mode: 'MarkdownV2' });
        }
    });

    // --- Rate limiting ---
    const rateLimitMap = new Map<string, number>();

    bot.use(async (ctx, next) => {
        const chatId = ctx.chat?.id;
        const command = commandName(ctx.message?.text);
        if (!chatId || !command) return next();

        const limit = RATE_LIMITS[command];
        if (!limit) return next();

        const key = `${chatId}:${command}`;
        const last = rateLimitMap.get(key) ?? 0;
        const now = Date.now();
        if (now - last < limit) {
            const remaining = Math.ceil((limit - (now - last)) / 1000);
            await ctx.reply(
                `⏳ Please wait ${remaining}s before using /${escapeMarkdown(command)} again\\.`,
                { parse_mode: 'MarkdownV2' },
            );
            return;
        }
        rateLimitMap.set(key, now);
        return next();
    });

    // --- Slash commands ---
    bot.command('start', (ctx) => startCommand(ctx, deps));
    bot.command('help', (ctx) => helpCommand(ctx));
    bot.command('balance', (ctx) => balanceCommand(ctx, deps));
    bot.command('transactions', (ctx) => transactionsCommand(ctx, deps));
    bot.command('info', (ctx) => infoCommand(ctx, deps));
    bot.command('donations', (ctx) => donationsCommand(ctx, deps));
    bot.command('ban', (ctx) => banCommand(ctx, deps));
    bot.command('banned', (ctx) => bannedCommand(ctx, deps));

    // --- Reply keyboard buttons ---
    bot.hears('💰 Balance', (ctx) => balanceCommand(ctx, deps));
    bot.hears('📜 Transactions', (ctx) => transactionsCommand(ctx, deps));
    bot.hears('💝 Donations', (ctx) => donationsCommand(ctx, deps));
    bot.hears('ℹ️ Info', (ctx) => infoCommand(ctx, deps));

    // --- Inline button on notifications ---
    bot.callbackQuery(VIEW_TRANSACTIONS, async (ctx) => {
        await ctx.answerCallbackQuery();
        await transactionsCommand(ctx, deps);
    });

    // --- Unknown slash commands ---
    bot.on('message:text', async (ctx) => {
        if (ctx.message.text.startsWith('/')) {
            await ctx.reply(
                '❓ Unknown command\\. Use /help to see available commands\\.',
                { parse_mode: 'MarkdownV2', reply_markup: mainKeyboard },
            );
        }
    });

    bot.catch((err) => {
        console.error('[Bot] Unhandled error:', err.message, err.ctx.update);
    });

    return bot;
}
