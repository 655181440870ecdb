import type { PayLink } from './LnbitsClient.js';

const LINK_TTL_MS = 60_000;

export interface DonationLinkInfo {
    readonly description: string;
    readonly lightningAddress: string;
    readonly lnurl: string;
}

export interface PayLinkSource {
    getPayLinks(): Promise<PayLink[]>;
}

/**
 * Resolves the configured donation link to its display details, with a
 * 60-second in-memory cache. Used for enrichment only: classification
 * matches the raw link id and never calls this.
 */
export class DonationLinkResolver {
    private cached: DonationLinkInfo | null = null;
    private cacheTime = 0;

    public constructor(
        private readonly source: PayLinkSource,
        private readonly linkId: string,
        /** Host part of the LNbits URL, used to build the lightning address. */
        private readonly domain: string,
        private readonly now: () => number = Date.now,
    ) {}

    /** Returns `null` when the link cannot be fetched or does not exist. */
    public async resolve(): Promise<DonationLinkInfo | null> {
        if (this.cached !== null && this.now() - this.cacheTime < LINK_TTL_MS) return this.cached;

        let links: PayLink[];
        try {
            links = await this.source.getPayLinks();
        } catch (err: unknown) {
            console.warn('[DonationLink] Could not fetch pay links:', err instanceof Error ? err.message : err);
            return this.cached;
        }

        const link = links.find((l) => l.id === this.linkId);
        if (!link) {
            console.warn(`[DonationLink] No pay link found with id ${this.linkId}`);
            return null;
        }

        this.cached = {
            description: link.description ?? 'Unknown Wallet',
            lightningAddress: `${link.username ?? 'Unknown'}@${this.domain}`,
            lnurl: link.lnurl ?? 'Unavailable',
        };
        this.cacheTime = this.now();
        return this.cached;
    }
}
