// Telegram MarkdownV2 helpers shared by the notifier, digest and bot commands.

export function escapeMarkdown(text: string): string {
    return text.replace(/[_*[\]()~`>#+\-=|{}.!\\]/g, (c) => `\\${c}`);
}

export function formatSats(sats: number): string {
    return `${sats.toLocaleString('en-US')} sats`;
}

/** `+1,234 sats` / `-56 sats` */
export function formatSignedSats(sats: number): string {
    return `${sats >= 0 ? '+' : '-'}${formatSats(Math.abs(sats))}`;
}

/** `2024-05-01 12:30:00 UTC` */
export function utcStamp(date: Date): string {
    return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function timestampLine(date: Date): string {
    return `🕒 _${escapeMarkdown(utcStamp(date))}_`;
}
