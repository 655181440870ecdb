import 'dotenv/config';
import { join } from 'node:path';
import { serve } from '@hono/node-server';
import { loadConfig, type Config } from './config.js';
import { LnbitsClient, type WalletHandle } from './api/LnbitsClient.js';
import { DonationLinkResolver } from './api/DonationLinkResolver.js';
import { IdentifierLedger } from './db/IdentifierLedger.js';
import { BalanceSnapshotStore } from './db/BalanceSnapshotStore.js';
import { DonationLedger } from './db/DonationLedger.js';
import { ForbiddenWordStore } from './db/ForbiddenWordStore.js';
import { createBot } from './bot/Bot.js';
import { notificationKeyboard } from './bot/keyboards.js';
import { Notifier, TelegramChannel } from './tracker/Notifier.js';
import { WalletPoller } from './tracker/WalletPoller.js';
import { MonitorScheduler } from './tracker/MonitorScheduler.js';
import { DigestReporter } from './tracker/DigestReporter.js';
import { IntervalJob } from './tracker/IntervalJob.js';
import { createServer } from './web/server.js';

function readConfig(): Config {
    try {
        return loadConfig();
    } catch (err: unknown) {
        console.error('[Main] Configuration error:', err instanceof Error ? err.message : err);
        process.exit(1);
    }
}

async function main(): Promise<void> {
    const config = readConfig();
    console.log(`[Main] Starting wallet watch for ${config.instanceName} (${config.wallets.length} wallet(s))...`);

    // Durable stores
    const identifiers = await IdentifierLedger.open(join(config.dataDir, 'processed_payments.txt'));
    const snapshots = new BalanceSnapshotStore(config.dataDir);
    const donations = await DonationLedger.open(join(config.dataDir, 'donations.json'));
    const forbiddenWords = await ForbiddenWordStore.open(
        join(config.dataDir, 'forbidden_words.txt'),
        config.forbiddenWords,
    );

    // Upstream
    const clients = config.wallets.map((wallet) => ({
        wallet,
        client: new LnbitsClient({
            baseUrl: config.lnbitsUrl,
            apiKey: wallet.apiKey,
            timeoutMs: config.requestTimeoutMs,
            label: `LNbits:${wallet.tag}`,
        }),
    }));
    const wallets: WalletHandle[] = clients.map(({ wallet, client }) => ({ wallet, api: client }));
    const mainClient = clients[0]?.client;

    let linkResolver: DonationLinkResolver | null = null;
    if (config.donationLinkId !== null && mainClient) {
        linkResolver = new DonationLinkResolver(mainClient, config.donationLinkId, new URL(config.lnbitsUrl).host);
        const link = await linkResolver.resolve();
        if (link === null) {
            console.warn(
                `[Main] Donation link ${config.donationLinkId} could not be resolved; donations will not be attributed until it exists`,
            );
        } else {
            console.log(`[Main] Donation link: ${link.description} (${link.lightningAddress})`);
        }
    }

    // Telegram
    const links = { overwatchUrl: config.overwatchUrl, donationsUrl: config.donationsUrl };
    const pollers = wallets.map(
        ({ wallet, api }) =>
            new WalletPoller({
                wallet,
                api,
                identifiers,
                snapshots,
                donations,
                forbiddenWords: () => forbiddenWords.list(),
                donationLinkId: config.donationLinkId,
                threshold: config.balanceChangeThreshold,
                fetchCount: config.latestTransactionsCount,
                deltaMode: config.balanceDeltaMode,
            }),
    );

    const bot = createBot({
        config,
        wallets,
        donations,
        forbiddenWords,
        linkResolver,
        lastTickAt: () => scheduler.lastTickAt,
    });
    const channel = new TelegramChannel(bot.api, config.chatId);
    const scheduler = new MonitorScheduler(pollers, new Notifier(channel, links));

    const digest = new DigestReporter({
        wallets,
        channel,
        donations,
        donationLinkId: config.donationLinkId,
        fetchCount: config.latestTransactionsCount,
        keyboard: () => notificationKeyboard(links),
    });

    const pollJob = new IntervalJob('Scheduler', config.paymentsFetchIntervalMs, async () => {
        await scheduler.runTick();
    });
    const digestJob = new IntervalJob(
        'Digest',
        config.digestIntervalMs,
        async () => {
            await digest.run();
        },
        false,
    );

    // HTTP surface
    const server =
        config.appPort > 0
            ? serve({
                  fetch: createServer({ instanceName: config.instanceName, donations, linkResolver, scheduler }).fetch,
                  port: config.appPort,
                  hostname: config.appHost,
              })
            : null;
    if (server) console.log(`[Main] HTTP listening on ${config.appHost}:${config.appPort}`);

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
        console.log('\n[Main] Shutting down...');
        pollJob.stop();
        digestJob.stop();
        server?.close();
        await bot.stop();
        process.exit(0);
    };

    process.once('SIGINT', () => void shutdown());
    process.once('SIGTERM', () => void shutdown());

    // Jobs run in the background; their runs catch and log their own errors.
    void pollJob.start();
    void digestJob.start();

    console.log('[Main] Bot is running. Press Ctrl+C to stop.');
    await bot.start({
        onStart: (info) => {
            console.log(`[Main] Logged in as @${info.username}`);
        },
    });
}

main().catch((err: unknown) => {
    console.error('[Main] Fatal error:', err);
    process.exit(1);
});
