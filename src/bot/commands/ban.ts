import type { CommandContext, Context } from 'grammy';
import type { DonationLedger } from '../../db/DonationLedger.js';
import type { ForbiddenWordStore } from '../../db/ForbiddenWordStore.js';
import type { BotDeps } from '../Bot.js';
import { escapeMarkdown } from '../../tracker/format.js';

/**
 * Add `input` to the forbidden words and re-sanitize every stored donation
 * memo. Returns the MarkdownV2 reply.
 */
export async function banWord(
    input: string,
    words: ForbiddenWordStore,
    donations: DonationLedger,
): Promise<string> {
    const raw = input.trim();
    if (!raw) return 'Usage: `/ban <word>`';

    const word = await words.add(raw);
    if (word === null) {
        return `⚠️ \`${escapeMarkdown(raw.toLowerCase())}\` is already banned or is not a single word\\.`;
    }

    const changed = await donations.resanitizeAll(words.list());
    console.log(`[Ban] Banned "${word}", ${changed} donation memo(s) updated`);
    return `🚫 Banned \`${escapeMarkdown(word)}\`\\. Updated ${changed} stored donation memo${changed === 1 ? '' : 's'}\\.`;
}

export function buildBannedMessage(words: readonly string[]): string {
    if (words.length === 0) return '_No banned words\\._';
    return ['🚫 *Banned words*', '', ...words.map((w) => `• \`${escapeMarkdown(w)}\``)].join('\n');
}

export async function banCommand(ctx: CommandContext<Context>, deps: BotDeps): Promise<void> {
    const reply = await banWord(ctx.match, deps.forbiddenWords, deps.donations);
    await ctx.reply(reply, { parse_mode: 'MarkdownV2' });
}

export async function bannedCommand(ctx: CommandContext<Context>, deps: BotDeps): Promise<void> {
    await ctx.reply(buildBannedMessage(deps.forbiddenWords.list()), { parse_mode: 'MarkdownV2' });
}
