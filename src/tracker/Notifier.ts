import type { Api, InlineKeyboard } from 'grammy';
import type { WalletDescriptor } from '../config.js';
import { notificationKeyboard, type NotificationLinks } from '../bot/keyboards.js';
import type { BalanceChanged, BalanceInitialized, PaymentEvent, WalletEvent } from './WalletPoller.js';
import { escapeMarkdown, formatSats, formatSignedSats, timestampLine } from './format.js';

// ─── Channel ─────────────────────────────────────────────────────────────────

/** Where notifications go. Implementations log failures; nothing is retried. */
export interface NotificationChannel {
    send(text: string, keyboard?: InlineKeyboard): Promise<boolean>;
}

export class TelegramChannel implements NotificationChannel {
    public constructor(
        private readonly api: Api,
        private readonly chatId: number,
    ) {}

    public async send(text: string, keyboard?: InlineKeyboard): Promise<boolean> {
        try {
            await this.api.sendMessage(this.chatId, text, {
                parse_mode: 'MarkdownV2',
                link_preview_options: { is_disabled: true },
                reply_markup: keyboard,
            });
            return true;
        } catch (err: unknown) {
            console.warn(`[Notifier] Failed to send to ${this.chatId}:`, err instanceof Error ? err.message : err);
            return false;
        }
    }
}

// ─── Formatters ──────────────────────────────────────────────────────────────

/** Telegram's limit on the length of one message. */
export const MESSAGE_LIMIT = 4096;
const MAX_MEMO_CHARS = 300;

function paymentLine(ev: PaymentEvent): string {
    const { payment } = ev;
    const marker = payment.donation ? ' 💝' : '';
    const memo = payment.memo.length > MAX_MEMO_CHARS ? `${payment.memo.slice(0, MAX_MEMO_CHARS)}…` : payment.memo;
    return `• *${escapeMarkdown(formatSats(payment.amount))}*${marker} \\- ${escapeMarkdown(memo)}`;
}

/**
 * One "Latest Transactions" message per wallet, split into several when the
 * list would pass `limit`. A continued section repeats its heading.
 */
export function formatTransactions(
    walletName: string,
    payments: readonly PaymentEvent[],
    now: Date,
    limit: number = MESSAGE_LIMIT,
): string[] {
    const header = `⚡ *${escapeMarkdown(walletName)} \\- Latest Transactions*`;
    const footer = timestampLine(now);
    const render = (body: readonly string[]): string => [header, ...body, '', footer].join('\n');

    const sections = [
        { title: '🟢 *Incoming:*', items: payments.filter((p) => p.payment.direction === 'incoming').map(paymentLine) },
        { title: '🔴 *Outgoing:*', items: payments.filter((p) => p.payment.direction === 'outgoing').map(paymentLine) },
    ];

    const messages: string[] = [];
    let body: string[] = [];
    let openTitle: string | null = null;
    for (const { title, items } of sections) {
        for (const item of items) {
            const next = openTitle === title ? [...body, item] : [...body, '', title, item];
            if (body.length > 0 && render(next).length > limit) {
                messages.push(render(body));
                body = ['', title, item];
            } else {
                body = next;
            }
            openTitle = title;
        }
    }
    if (body.length > 0) messages.push(render(body));
    return messages;
}

export function formatBalanceChange(ev: BalanceChanged, now: Date): string {
    const icon = ev.delta >= 0 ? '📈' : '📉';
    return [
        `${icon} *${escapeMarkdown(ev.walletName)} \\- Balance Update*`,
        '',
        `Previous: \`${escapeMarkdown(formatSats(ev.previous))}\``,
        `Change: \`${escapeMarkdown(formatSignedSats(ev.delta))}\``,
        `New: \`${escapeMarkdown(formatSats(ev.current))}\``,
        '',
        timestampLine(now),
    ].join('\n');
}

export function formatBalanceInitialized(ev: BalanceInitialized, now: Date): string {
    return [
        `👁 *${escapeMarkdown(ev.walletName)} \\- Balance Tracking Started*`,
        '',
        `Current balance: \`${escapeMarkdown(formatSats(ev.balance))}\``,
        '',
        timestampLine(now),
    ].join('\n');
}

// ─── Notifier ────────────────────────────────────────────────────────────────

/** Receives one wallet's events at the end of each tick. */
export interface WalletEventSink {
    publish(wallet: WalletDescriptor, events: readonly WalletEvent[]): Promise<void>;
}

export class Notifier implements WalletEventSink {
    private readonly now: () => Date;

    public constructor(
        private readonly channel: NotificationChannel,
        private readonly links: NotificationLinks,
        now?: () => Date,
    ) {
        this.now = now ?? (() => new Date());
    }

    /**
     * Balance events are sent one message each; payments are batched into a
     * "Latest Transactions" message per wallet, split at the length limit.
     */
    public async publish(wallet: WalletDescriptor, events: readonly WalletEvent[]): Promise<void> {
        const now = this.now();
        const keyboard = notificationKeyboard(this.links);
        const payments: PaymentEvent[] = [];

        for (const ev of events) {
            switch (ev.type) {
                case 'balance_initialized':
                    await this.channel.send(formatBalanceInitialized(ev, now), keyboard);
                    break;
                case 'balance_changed':
                    await this.channel.send(formatBalanceChange(ev, now), keyboard);
                    break;
                case 'payment':
                    payments.push(ev);
                    break;
            }
        }

        for (const text of formatTransactions(wallet.name, payments, now)) {
            await this.channel.send(text, keyboard);
        }
    }
}
