export type ParsedTimestamp =
    | { readonly kind: 'parsed'; readonly at: Date }
    | { readonly kind: 'fallback'; readonly at: Date };

// Numeric timestamps below this are epoch seconds, above it milliseconds.
const SECONDS_CUTOFF = 1e11;

/**
 * Normalize an upstream creation time (ISO string, numeric string, epoch
 * seconds or milliseconds). Anything unusable yields `fallback` carrying
 * `now`, so callers can tell a known time from a guess.
 */
export function parseTimestamp(raw: unknown, now: Date = new Date()): ParsedTimestamp {
    let ms: number | null = null;

    if (typeof raw === 'number' && Number.isFinite(raw) && raw > 0) {
        ms = raw < SECONDS_CUTOFF ? raw * 1000 : raw;
    } else if (typeof raw === 'string' && raw.trim() !== '') {
        const text = raw.trim();
        if (/^\d+(\.\d+)?$/.test(text)) {
            const n = Number(text);
            ms = n < SECONDS_CUTOFF ? n * 1000 : n;
        } else {
            // Naive "YYYY-MM-DD HH:MM:SS" from the upstream database is UTC.
            const iso = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(text)
                ? `${text.replace(' ', 'T')}Z`
                : text;
            const parsed = Date.parse(iso);
            if (!Number.isNaN(parsed)) ms = parsed;
        }
    }

    if (ms === null || ms <= 0) return { kind: 'fallback', at: now };
    return { kind: 'parsed', at: new Date(ms) };
}

/** Sort key for newest-first ordering; fallback times sort as oldest. */
export function sortKey(ts: ParsedTimestamp): number {
    return ts.kind === 'parsed' ? ts.at.getTime() : 0;
}

/** Newest first, each item paired with its parsed creation time. */
export function sortNewestFirst<T>(
    items: readonly T[],
    createdAt: (item: T) => unknown,
    now: Date,
): { item: T; ts: ParsedTimestamp }[] {
    return items
        .map((item) => ({ item, ts: parseTimestamp(createdAt(item), now) }))
        .sort((a, b) => sortKey(b.ts) - sortKey(a.ts));
}
