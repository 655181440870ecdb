import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { DonationLedger } from '../db/DonationLedger.js';

let tmpDir: string;
let path: string;
const fixedNow = (): Date => new Date('2024-06-01T12:00:00Z');

beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'lnbits-donations-'));
    path = join(tmpDir, 'donations.json');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
});

function donation(amount: number, paymentId: string | null, memo = 'thanks') {
    return { date: '2024-06-01T10:00:00.000Z', memo, amount, paymentId };
}

describe('DonationLedger', () => {
    it('starts empty when no file exists', async () => {
        const ledger = await DonationLedger.open(path, fixedNow);
        expect(ledger.total).toBe(0);
        expect(ledger.snapshot().donations).toEqual([]);
    });

    it('keeps total equal to the sum of amounts and persists both together', async () => {
        const ledger = await DonationLedger.open(path, fixedNow);
        await ledger.append(donation(21, 'main_a'));
        await ledger.append(donation(100, 'main_b'));

        expect(ledger.total).toBe(121);
        const stored: unknown = JSON.parse(readFileSync(path, 'utf-8'));
        expect(stored).toMatchObject({ totalDonations: 121 });
        expect(stored).toHaveProperty('donations.length', 2);
    });

    it('ignores a second donation for the same payment', async () => {
        const ledger = await DonationLedger.open(path, fixedNow);
        const first = await ledger.append(donation(21, 'main_a'));
        const second = await ledger.append(donation(21, 'main_a'));

        expect(first).not.toBeNull();
        expect(second).toBeNull();
        expect(ledger.total).toBe(21);
    });

    it('keeps the invariant under concurrent appends', async () => {
        const ledger = await DonationLedger.open(path, fixedNow);
        await Promise.all(Array.from({ length: 10 }, (_, i) => ledger.append(donation(i + 1, `main_${i}`))));

        expect(ledger.total).toBe(55);
        const reopened = await DonationLedger.open(path, fixedNow);
        expect(reopened.total).toBe(55);
        expect(reopened.snapshot().donations).toHaveLength(10);
    });

    it('counts likes and dislikes', async () => {
        const ledger = await DonationLedger.open(path, fixedNow);
        const d = await ledger.append(donation(5, 'main_a'));
        if (!d) throw new Error('expected donation');

        expect(await ledger.vote(d.id, 'like')).toEqual({ likes: 1, dislikes: 0 });
        expect(await ledger.vote(d.id, 'like')).toEqual({ likes: 2, dislikes: 0 });
        expect(await ledger.vote(d.id, 'dislike')).toEqual({ likes: 2, dislikes: 1 });
        expect(await ledger.vote('missing', 'like')).toBeNull();

        const reopened = await DonationLedger.open(path, fixedNow);
        expect(reopened.find(d.id)).toMatchObject({ likes: 2, dislikes: 1 });
    });

    it('upgrades a legacy document and recomputes a wrong total', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        writeFileSync(
            path,
            JSON.stringify({
                total_donations: 999,
                donations: [
                    { date: '2023-01-01T00:00:00Z', memo: 'old', amount: 10 },
                    { date: '2023-01-02T00:00:00Z', memo: null, amount: 5 },
                ],
            }),
        );

        const ledger = await DonationLedger.open(path, fixedNow);
        expect(ledger.total).toBe(15);
        expect(warn).toHaveBeenCalledTimes(1);

        const [first, second] = ledger.snapshot().donations;
        expect(first).toMatchObject({ memo: 'old', amount: 10, likes: 0, dislikes: 0, paymentId: null });
        expect(first?.id).toEqual(expect.any(String));
        expect(second?.memo).toBe('No memo');
    });

    it('keeps upgraded ids stable across restarts', async () => {
        writeFileSync(
            path,
            JSON.stringify({ total_donations: 10, donations: [{ date: '2023-01-01T00:00:00Z', memo: 'old', amount: 10 }] }),
        );

        const served = (await DonationLedger.open(path, fixedNow)).snapshot().donations[0]?.id;
        if (served === undefined) throw new Error('expected donation');

        const restarted = await DonationLedger.open(path, fixedNow);
        expect(restarted.snapshot().donations[0]?.id).toBe(served);
        expect(await restarted.vote(served, 'like')).toEqual({ likes: 1, dislikes: 0 });

        const stored: unknown = JSON.parse(readFileSync(path, 'utf-8'));
        expect(stored).toMatchObject({ totalDonations: 10 });
        expect(stored).not.toHaveProperty('total_donations');
    });

    it('refuses to load a document that is not valid JSON', async () => {
        writeFileSync(path, '{ not json');
        await expect(DonationLedger.open(path, fixedNow)).rejects.toThrow(`Donation ledger ${path} is not valid JSON`);
    });

    it('re-sanitizes stored memos on request only', async () => {
        const ledger = await DonationLedger.open(path, fixedNow);
        await ledger.append(donation(5, 'main_a', 'great scam'));
        await ledger.append(donation(5, 'main_b', 'great work'));

        expect(await ledger.resanitizeAll(['scam'])).toBe(1);
        expect(ledger.snapshot().donations.map((d) => d.memo)).toEqual(['great ****', 'great work']);
        expect(await ledger.resanitizeAll(['scam'])).toBe(0);
    });

    it('advances lastUpdate on every mutation', async () => {
        let tick = 0;
        const clock = (): Date => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
        const ledger = await DonationLedger.open(path, clock);
        const before = ledger.lastUpdate.getTime();
        await ledger.append(donation(1, 'main_a'));
        expect(ledger.lastUpdate.getTime()).toBeGreaterThan(before);
    });
});
