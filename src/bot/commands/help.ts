import type { Context } from 'grammy';

export async function helpCommand(ctx: Context): Promise<void> {
    await ctx.reply(
        '📖 *LNbits Wallet Watch — Help*\n\n' +
            '*Wallets*\n' +
            '`/balance` — Live balance of every monitored wallet\n' +
            '`/transactions` — Latest payments of the main wallet, pending included\n' +
            '`/info` — Threshold, intervals and monitored wallets\n\n' +
            '*Donations*\n' +
            '`/donations` — Total, count and latest donation\n\n' +
            '*Moderation*\n' +
            '`/ban <word>` — Mask a word in memos from now on and in stored donations\n' +
            '`/banned` — List masked words\n\n' +
            '*Notes:*\n' +
            '• Payments are checked once per poll interval\n' +
            '• Balance updates are sent when the change reaches the threshold',
        { parse_mode: 'MarkdownV2' },
    );
}
