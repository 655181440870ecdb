import { Hono } from 'hono';
import { z } from 'zod';
import type { DonationLinkResolver } from '../api/DonationLinkResolver.js';
import type { Donation, DonationLedger } from '../db/DonationLedger.js';

const VoteSchema = z.object({
    donation_id: z.string().min(1),
    vote_type: z.enum(['like', 'dislike']),
});

export interface DonationRoutesOpts {
    donations: DonationLedger;
    linkResolver: DonationLinkResolver | null;
}

// Public view: no payment identifier (wallet tag and hash).
function publicDonation({ paymentId: _paymentId, ...rest }: Donation): Omit<Donation, 'paymentId'> {
    return rest;
}

export function createDonationRoutes(opts: DonationRoutesOpts): Hono {
    const app = new Hono();
    const { donations, linkResolver } = opts;

    // GET /api/donations: ledger plus where to send more
    app.get('/api/donations', async (c) => {
        const snapshot = donations.snapshot();
        const link = linkResolver ? await linkResolver.resolve() : null;
        return c.json({
            total: snapshot.totalDonations,
            donations: snapshot.donations.map(publicDonation),
            lightning_address: link?.lightningAddress ?? null,
            lnurl: link?.lnurl ?? null,
            last_update: snapshot.lastUpdate.toISOString(),
        });
    });

    // POST /api/vote
    app.post('/api/vote', async (c) => {
        let body: unknown;
        try {
            body = await c.req.json();
        } catch {
            return c.json({ error: 'Invalid JSON body' }, 400);
        }
        const parsed = VoteSchema.safeParse(body);
        if (!parsed.success) {
            return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
        }

        const counts = await donations.vote(parsed.data.donation_id, parsed.data.vote_type);
        if (counts === null) {
            return c.json({ error: 'Donation not found' }, 404);
        }
        return c.json(counts);
    });

    // GET /donations_updates: clients poll this and refetch when it moves
    app.get('/donations_updates', (c) => {
        return c.json({ last_update: donations.lastUpdate.toISOString() });
    });

    return app;
}
