export const EMPTY_MEMO = 'No memo';

const MASK_CHAR = '*';

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Lower-case and trim a candidate word; `null` when it cannot be matched. */
export function normalizeWord(word: string): string | null {
    const w = word.trim().toLowerCase();
    if (!w || /\s/.test(w)) return null;
    // A mask-only word would match already-masked text.
    if ([...w].every((c) => c === MASK_CHAR)) return null;
    return w;
}

/**
 * Mask every whole-word, case-insensitive occurrence of a forbidden word
 * with asterisks of the same length. Empty input becomes {@link EMPTY_MEMO}.
 */
export function sanitize(text: string | null | undefined, forbidden: Iterable<string>): string {
    if (text === null || text === undefined || text.trim() === '') return EMPTY_MEMO;

    const words = [...forbidden]
        .map(normalizeWord)
        .filter((w): w is string => w !== null)
        // Longest first: "spam-bot" must win over "spam" at the same position.
        .sort((a, b) => b.length - a.length);
    if (words.length === 0) return text;

    const pattern = new RegExp(
        `(?<![\\p{L}\\p{N}_])(?:${words.map(escapeRegExp).join('|')})(?![\\p{L}\\p{N}_])`,
        'giu',
    );
    return text.replace(pattern, (match) => MASK_CHAR.repeat([...match].length));
}
