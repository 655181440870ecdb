import { z } from 'zod';
import type { WalletDescriptor } from '../config.js';

// ─── Decoded types ───────────────────────────────────────────────────────────

export type PaymentStatus = 'completed' | 'pending' | 'failed';

/** Present when the payment came in through an LNURL-pay link. */
export interface DonationMetadata {
    readonly linkId: string;
    readonly comment: string | null;
    /** Amount field the pay-link extension attaches, in msats. */
    readonly amountMsat: number | null;
}

export interface PaymentRecord {
    /** Payment hash, or `null` when upstream sent none. */
    readonly id: string | null;
    /** Signed msats: positive is incoming, negative outgoing. */
    readonly amountMsat: number;
    readonly memo: string | null;
    readonly status: PaymentStatus;
    readonly createdAt: string | number | null;
    readonly donationMetadata: DonationMetadata | null;
}

export interface PayLink {
    readonly id: string;
    readonly description: string | null;
    readonly username: string | null;
    readonly lnurl: string | null;
}

/** Read-only view of one wallet, as the poller and digest need it. */
export interface WalletApi {
    getBalanceMsat(): Promise<number>;
    getRecentPayments(limit: number): Promise<PaymentRecord[]>;
}

export interface WalletHandle {
    readonly wallet: WalletDescriptor;
    readonly api: WalletApi;
}

export class LnbitsError extends Error {
    public constructor(
        message: string,
        public readonly path: string,
        public readonly status: number | null = null,
    ) {
        super(message);
        this.name = 'LnbitsError';
    }
}

// ─── Wire schemas ────────────────────────────────────────────────────────────

const WalletSchema = z.object({
    name: z.string().nullish(),
    balance: z.number().finite(),
});

const TimeSchema = z.union([z.string(), z.number()]).nullish();

const RawPaymentSchema = z.object({
    payment_hash: z.string().nullish(),
    checking_id: z.string().nullish(),
    amount: z.number().finite(),
    memo: z.string().nullish(),
    status: z.string().nullish(),
    pending: z.boolean().nullish(),
    created_at: TimeSchema,
    time: TimeSchema,
    extra: z.record(z.unknown()).nullish(),
});

type RawPayment = z.infer<typeof RawPaymentSchema>;

const PayLinkSchema = z.object({
    id: z.union([z.string(), z.number()]),
    description: z.string().nullish(),
    username: z.string().nullish(),
    lnurl: z.string().nullish(),
});

// ─── Decoding ────────────────────────────────────────────────────────────────

function numeric(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) return Number(value.trim());
    return null;
}

function decodeStatus(raw: RawPayment): PaymentStatus {
    const status = raw.status?.toLowerCase();
    if (status === 'pending') return 'pending';
    if (status === 'failed') return 'failed';
    if (status === undefined && raw.pending === true) return 'pending';
    return 'completed';
}

function decodeDonationMetadata(extra: Record<string, unknown> | null | undefined): DonationMetadata | null {
    if (!extra) return null;
    const link = extra['link'];
    if (typeof link !== 'string' && typeof link !== 'number') return null;

    const comment = extra['comment'];
    return {
        linkId: String(link),
        comment: typeof comment === 'string' && comment.trim() !== '' ? comment : null,
        amountMsat: numeric(extra['extra']),
    };
}

export function decodePayment(raw: RawPayment): PaymentRecord {
    return {
        id: raw.payment_hash || raw.checking_id || null,
        amountMsat: raw.amount,
        memo: raw.memo ?? null,
        status: decodeStatus(raw),
        createdAt: raw.created_at ?? raw.time ?? null,
        donationMetadata: decodeDonationMetadata(raw.extra),
    };
}

// ─── Client ──────────────────────────────────────────────────────────────────

export interface LnbitsClientOptions {
    readonly baseUrl: string;
    readonly apiKey: string;
    readonly timeoutMs: number;
    /** Used in log lines only. */
    readonly label?: string;
}

/**
 * Read-only LNbits client for one wallet key. Every call carries a bounded
 * timeout; any failure surfaces as {@link LnbitsError}.
 */
export class LnbitsClient implements WalletApi {
    private readonly baseUrl: string;
    private readonly apiKey: string;
    private readonly timeoutMs: number;
    private readonly label: string;

    public constructor(opts: LnbitsClientOptions) {
        this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
        this.apiKey = opts.apiKey;
        this.timeoutMs = opts.timeoutMs;
        this.label = opts.label ?? 'LNbits';
    }

    private async get(path: string): Promise<unknown> {
        let res: Response;
        try {
            res = await fetch(`${this.baseUrl}${path}`, {
                headers: { 'X-Api-Key': this.apiKey },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (err: unknown) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new LnbitsError(`GET ${path} failed: ${reason}`, path);
        }

        if (!res.ok) {
            throw new LnbitsError(`LNbits ${res.status} ${res.statusText}: GET ${path}`, path, res.status);
        }

        try {
            return await res.json();
        } catch {
            throw new LnbitsError(`Malformed JSON body: GET ${path}`, path, res.status);
        }
    }

    public async getBalanceMsat(): Promise<number> {
        const path = '/api/v1/wallet';
        const parsed = WalletSchema.safeParse(await this.get(path));
        if (!parsed.success) {
            throw new LnbitsError(`Unexpected wallet payload: ${parsed.error.message}`, path);
        }
        return parsed.data.balance;
    }

    /**
     * Most recent payments. Records that fail to decode are dropped with a
     * warning; the rest of the batch is returned.
     */
    public async getRecentPayments(limit: number): Promise<PaymentRecord[]> {
        const path = `/api/v1/payments?limit=${limit}`;
        const body = await this.get(path);
        if (!Array.isArray(body)) {
            throw new LnbitsError('Unexpected payments payload: expected an array', path);
        }

        const records: PaymentRecord[] = [];
        for (const item of body) {
            const parsed = RawPaymentSchema.safeParse(item);
            if (!parsed.success) {
                console.warn(`[${this.label}] Skipping malformed payment record: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
                continue;
            }
            records.push(decodePayment(parsed.data));
        }
        return records;
    }

    public async getPayLinks(): Promise<PayLink[]> {
        const path = '/lnurlp/api/v1/links';
        const parsed = z.array(PayLinkSchema).safeParse(await this.get(path));
        if (!parsed.success) {
            throw new LnbitsError(`Unexpected pay-link payload: ${parsed.error.message}`, path);
        }
        return parsed.data.map((l) => ({
            id: String(l.id),
            description: l.description ?? null,
            username: l.username ?? null,
            lnurl: l.lnurl ?? null,
        }));
    }
}
