import { Hono } from 'hono';
import type { DonationLinkResolver } from '../api/DonationLinkResolver.js';
import type { DonationLedger } from '../db/DonationLedger.js';
import type { MonitorScheduler } from '../tracker/MonitorScheduler.js';
import { createDonationRoutes } from './donationRoutes.js';

export interface ServerOpts {
    instanceName: string;
    donations: DonationLedger;
    linkResolver: DonationLinkResolver | null;
    scheduler: MonitorScheduler;
}

export function createServer(opts: ServerOpts): Hono {
    const app = new Hono();
    const { instanceName, donations, linkResolver, scheduler } = opts;

    app.get('/', (c) => c.text(`${instanceName}: wallet watch is running`));

    app.get('/status', (c) => {
        const lastTick = scheduler.lastTickAt;
        return c.json({
            status: 'ok',
            last_tick: lastTick ? lastTick.toISOString() : null,
            wallets: scheduler.getStatuses().map((s) => ({
                tag: s.tag,
                name: s.name,
                balance: s.balance,
                pending: s.pendingCount,
                last_success: s.lastSuccessAt ? s.lastSuccessAt.toISOString() : null,
                last_error: s.lastError,
            })),
            donations: {
                total: donations.total,
                count: donations.snapshot().donations.length,
            },
        });
    });

    app.route('/', createDonationRoutes({ donations, linkResolver }));

    app.onError((err, c) => {
        console.error('[Web] Unhandled error:', err);
        return c.json({ error: 'Internal error' }, 500);
    });

    return app;
}
