import { InlineKeyboard, Keyboard } from 'grammy';

export interface NotificationLinks {
    readonly overwatchUrl: string | null;
    readonly donationsUrl: string | null;
}

/** Callback data of the "View Transactions" button; Bot.ts maps it to /transactions. */
export const VIEW_TRANSACTIONS = 'view_transactions';

/**
 * Inline keyboard attached to every notification: external links where
 * configured, plus a button that lists the latest transactions.
 */
export function notificationKeyboard(links: NotificationLinks): InlineKeyboard {
    const kb = new InlineKeyboard();
    if (links.overwatchUrl) kb.url('🔍 View Details', links.overwatchUrl);
    if (links.donationsUrl) kb.url('💝 View Donations', links.donationsUrl);
    if (links.overwatchUrl || links.donationsUrl) kb.row();
    return kb.text('📜 View Transactions', VIEW_TRANSACTIONS);
}

/**
 * Persistent reply keyboard shown at the bottom of the chat.
 * Buttons send plain text which Bot.ts maps to command handlers.
 */
export const mainKeyboard = new Keyboard()
    .text('💰 Balance').text('📜 Transactions')
    .row()
    .text('💝 Donations').text('ℹ️ Info')
    .resized()
    .persistent();
