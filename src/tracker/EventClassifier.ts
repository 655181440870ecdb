import type { PaymentRecord } from '../api/LnbitsClient.js';
import { IdentifierLedger } from '../db/IdentifierLedger.js';
import { sanitize } from './MemoSanitizer.js';
import { parseTimestamp, type ParsedTimestamp } from './Timestamp.js';

export type Direction = 'incoming' | 'outgoing';

export interface DonationDetails {
    /** Whole sats. */
    readonly amount: number;
    readonly memo: string;
}

/**
 * Normalized view of one committed upstream payment. Transient: only its
 * side effects (ledger entries, donations, notifications) are persisted.
 */
export interface ClassifiedEvent {
    /** `{walletTag}_{paymentHash}` */
    readonly id: string;
    readonly paymentHash: string;
    readonly walletTag: string;
    readonly direction: Direction;
    /** Whole sats, truncated toward zero from the absolute msat amount. */
    readonly amount: number;
    readonly memo: string;
    readonly timestamp: ParsedTimestamp;
    readonly donation: DonationDetails | null;
}

export type SkipReason = 'missing_id' | 'pending' | 'failed' | 'zero_amount';

export type ClassifyResult =
    | { readonly kind: 'event'; readonly event: ClassifiedEvent }
    | { readonly kind: 'skip'; readonly reason: SkipReason };

export interface ClassifyOptions {
    readonly walletTag: string;
    /** Configured LNURL-pay link id; `null` disables donation attribution. */
    readonly donationLinkId: string | null;
    readonly forbiddenWords: Iterable<string>;
    readonly now?: Date;
}

/** Whole sats from msats, discarding the sub-sat remainder. */
export function msatToSats(msat: number): number {
    return Math.trunc(Math.abs(msat) / 1000);
}

export function classify(record: PaymentRecord, opts: ClassifyOptions): ClassifyResult {
    if (record.id === null) {
        console.warn(`[Classifier:${opts.walletTag}] Skipping payment record without identifier`);
        return { kind: 'skip', reason: 'missing_id' };
    }
    if (record.status === 'pending') return { kind: 'skip', reason: 'pending' };
    if (record.status === 'failed') return { kind: 'skip', reason: 'failed' };
    if (record.amountMsat === 0) return { kind: 'skip', reason: 'zero_amount' };

    const forbidden = [...opts.forbiddenWords];
    const direction: Direction = record.amountMsat > 0 ? 'incoming' : 'outgoing';
    const amount = msatToSats(record.amountMsat);
    const memo = sanitize(record.memo, forbidden);

    let donation: DonationDetails | null = null;
    const meta = record.donationMetadata;
    if (opts.donationLinkId !== null && meta !== null && meta.linkId === opts.donationLinkId) {
        donation = {
            amount: meta.amountMsat !== null ? msatToSats(meta.amountMsat) : amount,
            memo: meta.comment !== null ? sanitize(meta.comment, forbidden) : memo,
        };
    }

    return {
        kind: 'event',
        event: {
            id: IdentifierLedger.key(opts.walletTag, record.id),
            paymentHash: record.id,
            walletTag: opts.walletTag,
            direction,
            amount,
            memo,
            timestamp: parseTimestamp(record.createdAt, opts.now),
            donation,
        },
    };
}
