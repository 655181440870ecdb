import { describe, it, expect, vi, afterEach } from 'vitest';
import { LnbitsClient, LnbitsError } from '../api/LnbitsClient.js';
import { DonationLinkResolver, type PayLinkSource } from '../api/DonationLinkResolver.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function makeClient(): LnbitsClient {
    return new LnbitsClient({ baseUrl: 'https://lnbits.test/', apiKey: 'test-key', timeoutMs: 1000, label: 'test' });
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('LnbitsClient', () => {
    it('fetches the balance with the wallet key', async () => {
        const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ name: 'Main', balance: 1_234_567 }));
        vi.stubGlobal('fetch', fetchMock);

        expect(await makeClient().getBalanceMsat()).toBe(1_234_567);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0] ?? [];
        expect(url).toBe('https://lnbits.test/api/v1/wallet');
        expect(init).toMatchObject({ headers: { 'X-Api-Key': 'test-key' } });
    });

    it('raises LnbitsError with the status for a non-2xx response', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn().mockResolvedValue(new Response('oops', { status: 500, statusText: 'Internal Server Error' })),
        );

        const err = await makeClient().getBalanceMsat().catch((e: unknown) => e);
        if (!(err instanceof LnbitsError)) throw new Error('expected LnbitsError');
        expect(err.message).toBe('LNbits 500 Internal Server Error: GET /api/v1/wallet');
        expect(err.status).toBe(500);
        expect(err.path).toBe('/api/v1/wallet');
    });

    it('raises LnbitsError when the request itself fails', async () => {
        vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
        await expect(makeClient().getBalanceMsat()).rejects.toThrow('GET /api/v1/wallet failed: fetch failed');
    });

    it('raises LnbitsError for a malformed body', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('not json', { status: 200 })));
        await expect(makeClient().getBalanceMsat()).rejects.toThrow('Malformed JSON body: GET /api/v1/wallet');
    });

    it('decodes payments and drops malformed records', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const fetchMock = vi.fn().mockResolvedValue(
            jsonResponse([
                {
                    payment_hash: 'h1',
                    amount: 21_000,
                    memo: 'hi',
                    status: 'success',
                    time: 1_700_000_000,
                    extra: { link: 'abc', comment: 'gm', extra: '21000' },
                },
                { checking_id: 'c2', amount: -5000, pending: true, created_at: '2024-05-01 12:00:00' },
                { payment_hash: 'h3', amount: 'lots' },
                { payment_hash: '', checking_id: '', amount: 1000, status: 'failed' },
            ]),
        );
        vi.stubGlobal('fetch', fetchMock);

        const payments = await makeClient().getRecentPayments(21);

        expect(fetchMock.mock.calls[0]?.[0]).toBe('https://lnbits.test/api/v1/payments?limit=21');
        expect(warn).toHaveBeenCalledTimes(1);
        expect(payments).toEqual([
            {
                id: 'h1',
                amountMsat: 21_000,
                memo: 'hi',
                status: 'completed',
                createdAt: 1_700_000_000,
                donationMetadata: { linkId: 'abc', comment: 'gm', amountMsat: 21_000 },
            },
            {
                id: 'c2',
                amountMsat: -5000,
                memo: null,
                status: 'pending',
                createdAt: '2024-05-01 12:00:00',
                donationMetadata: null,
            },
            {
                id: null,
                amountMsat: 1000,
                memo: null,
                status: 'failed',
                createdAt: null,
                donationMetadata: null,
            },
        ]);
    });

    it('rejects a payments body that is not a list', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ detail: 'nope' })));
        await expect(makeClient().getRecentPayments(5)).rejects.toThrow(LnbitsError);
    });

    it('lists pay links with string ids', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn().mockResolvedValue(jsonResponse([{ id: 7, description: 'Tips', username: 'satoshi', lnurl: 'LNURL1TEST' }])),
        );
        expect(await makeClient().getPayLinks()).toEqual([
            { id: '7', description: 'Tips', username: 'satoshi', lnurl: 'LNURL1TEST' },
        ]);
    });
});

describe('DonationLinkResolver', () => {
    function source(impl: PayLinkSource['getPayLinks']) {
        return { getPayLinks: vi.fn(impl) };
    }

    it('resolves the configured link and caches it for a minute', async () => {
        let now = 0;
        const src = source(async () => [
            { id: 'other', description: 'x', username: 'x', lnurl: 'x' },
            { id: 'link1', description: 'Tips', username: 'satoshi', lnurl: 'LNURL1TEST' },
        ]);
        const resolver = new DonationLinkResolver(src, 'link1', 'lnbits.test', () => now);

        const expected = { description: 'Tips', lightningAddress: 'satoshi@lnbits.test', lnurl: 'LNURL1TEST' };
        expect(await resolver.resolve()).toEqual(expected);
        now = 59_999;
        expect(await resolver.resolve()).toEqual(expected);
        expect(src.getPayLinks).toHaveBeenCalledTimes(1);
        now = 60_000;
        await resolver.resolve();
        expect(src.getPayLinks).toHaveBeenCalledTimes(2);
    });

    it('fills in defaults for missing link fields', async () => {
        const src = source(async () => [{ id: 'link1', description: null, username: null, lnurl: null }]);
        const resolver = new DonationLinkResolver(src, 'link1', 'lnbits.test');
        expect(await resolver.resolve()).toEqual({
            description: 'Unknown Wallet',
            lightningAddress: 'Unknown@lnbits.test',
            lnurl: 'Unavailable',
        });
    });

    it('returns null for an unknown link or a failed fetch', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const missing = new DonationLinkResolver(source(async () => []), 'link1', 'lnbits.test');
        expect(await missing.resolve()).toBeNull();

        const failing = new DonationLinkResolver(
            source(async () => {
                throw new Error('down');
            }),
            'link1',
            'lnbits.test',
        );
        expect(await failing.resolve()).toBeNull();
    });
});
