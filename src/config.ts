export type BalanceDeltaMode = 'tick' | 'cumulative';

/** One monitored LNbits wallet, fixed for the process lifetime. */
export interface WalletDescriptor {
    /** Namespace for processed identifiers and balance snapshots. */
    readonly tag: string;
    readonly name: string;
    readonly apiKey: string;
}

export interface Config {
    readonly telegramToken: string;
    readonly chatId: number;
    readonly lnbitsUrl: string;
    readonly instanceName: string;
    readonly wallets: readonly WalletDescriptor[];
    readonly donationLinkId: string | null;
    readonly balanceChangeThreshold: number;
    readonly balanceDeltaMode: BalanceDeltaMode;
    readonly latestTransactionsCount: number;
    readonly paymentsFetchIntervalMs: number;
    readonly digestIntervalMs: number;
    readonly requestTimeoutMs: number;
    readonly forbiddenWords: readonly string[];
    readonly dataDir: string;
    readonly appHost: string;
    readonly appPort: number;
    readonly overwatchUrl: string | null;
    readonly donationsUrl: string | null;
    readonly informationUrl: string | null;
}

export const MAIN_WALLET_TAG = 'main';

type Env = Readonly<Record<string, string | undefined>>;

function requireEnv(env: Env, key: string): string {
    const val = env[key]?.trim();
    if (!val) throw new Error(`Missing required environment variable: ${key}`);
    return val;
}

function optionalEnv(env: Env, key: string): string | null {
    const val = env[key]?.trim();
    return val ? val : null;
}

function parseIntEnv(env: Env, key: string, fallback: number): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw)) {
        throw new Error(`Invalid value for ${key}: expected a non-negative integer, got "${raw}"`);
    }
    return parseInt(raw, 10);
}

// Node clamps longer setTimeout delays to 1 ms.
const MAX_TIMER_MS = 2_147_483_647;

function parseDurationEnv(env: Env, key: string, fallback: number, unitMs: number): number {
    const ms = parseIntEnv(env, key, fallback) * unitMs;
    if (ms > MAX_TIMER_MS) {
        throw new Error(`Invalid value for ${key}: must be at most ${Math.floor(MAX_TIMER_MS / unitMs)}`);
    }
    return ms;
}

function parseChatId(raw: string): number {
    if (!/^-?\d+$/.test(raw)) {
        throw new Error(`Invalid value for CHAT_ID: expected an integer, got "${raw}"`);
    }
    return parseInt(raw, 10);
}

function parseUrl(key: string, raw: string): string {
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new Error(`Invalid value for ${key}: "${raw}" is not a URL`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new Error(`Invalid value for ${key}: only http and https are supported`);
    }
    return raw.replace(/\/+$/, '');
}

function parseDeltaMode(raw: string | null): BalanceDeltaMode {
    if (raw === null || raw === 'tick') return 'tick';
    if (raw === 'cumulative') return 'cumulative';
    throw new Error(`Invalid value for BALANCE_DELTA_MODE: expected "tick" or "cumulative", got "${raw}"`);
}

export function walletTagFor(name: string): string {
    return name
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

/**
 * Parse ADDITIONAL_WALLETS: comma-separated `name:apiKey` or bare `apiKey`
 * entries. Unnamed wallets are called "Wallet 2", "Wallet 3", ...
 */
export function parseAdditionalWallets(raw: string | null): WalletDescriptor[] {
    if (!raw) return [];
    const entries = raw.split(',').map((e) => e.trim()).filter((e) => e.length > 0);

    return entries.map((entry, i) => {
        const sep = entry.lastIndexOf(':');
        const name = sep > 0 ? entry.slice(0, sep).trim() : `Wallet ${i + 2}`;
        const apiKey = sep > 0 ? entry.slice(sep + 1).trim() : entry;
        if (!apiKey) {
            throw new Error(`Invalid value for ADDITIONAL_WALLETS: entry "${entry}" has no API key`);
        }
        const tag = walletTagFor(name);
        if (!tag) {
            throw new Error(`Invalid value for ADDITIONAL_WALLETS: wallet name "${name}" yields an empty tag`);
        }
        return { tag, name, apiKey };
    });
}

function parseWordList(raw: string | null): string[] {
    if (!raw) return [];
    return raw.split(',').map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0);
}

/**
 * Read and validate configuration. Throws on the first configuration
 * error; callers treat that as fatal before any polling begins.
 */
export function loadConfig(env: Env = process.env): Config {
    const instanceName = optionalEnv(env, 'INSTANCE_NAME') ?? 'LNbits Instance';
    const main: WalletDescriptor = {
        tag: MAIN_WALLET_TAG,
        name: instanceName,
        apiKey: requireEnv(env, 'LNBITS_READONLY_API_KEY'),
    };
    const wallets = [main, ...parseAdditionalWallets(optionalEnv(env, 'ADDITIONAL_WALLETS'))];

    const seen = new Set<string>();
    for (const w of wallets) {
        if (seen.has(w.tag)) {
            throw new Error(`Invalid value for ADDITIONAL_WALLETS: duplicate wallet tag "${w.tag}"`);
        }
        seen.add(w.tag);
    }

    return {
        telegramToken: requireEnv(env, 'TELEGRAM_BOT_TOKEN'),
        chatId: parseChatId(requireEnv(env, 'CHAT_ID')),
        lnbitsUrl: parseUrl('LNBITS_URL', requireEnv(env, 'LNBITS_URL')),
        instanceName,
        wallets,
        donationLinkId: optionalEnv(env, 'LNURLP_ID'),
        balanceChangeThreshold: parseIntEnv(env, 'BALANCE_CHANGE_THRESHOLD', 10),
        balanceDeltaMode: parseDeltaMode(optionalEnv(env, 'BALANCE_DELTA_MODE')),
        latestTransactionsCount: parseIntEnv(env, 'LATEST_TRANSACTIONS_COUNT', 21),
        paymentsFetchIntervalMs: parseDurationEnv(env, 'PAYMENTS_FETCH_INTERVAL', 60, 1000),
        digestIntervalMs: parseDurationEnv(env, 'WALLET_BALANCE_NOTIFICATION_INTERVAL', 86_400, 1000),
        requestTimeoutMs: parseDurationEnv(env, 'REQUEST_TIMEOUT_MS', 10_000, 1),
        forbiddenWords: parseWordList(optionalEnv(env, 'FORBIDDEN_WORDS')),
        dataDir: optionalEnv(env, 'DATA_DIR') ?? './data',
        appHost: optionalEnv(env, 'APP_HOST') ?? '127.0.0.1',
        appPort: parseIntEnv(env, 'APP_PORT', 5009),
        overwatchUrl: optionalEnv(env, 'OVERWATCH_URL'),
        donationsUrl: optionalEnv(env, 'DONATIONS_URL'),
        informationUrl: optionalEnv(env, 'INFORMATION_URL'),
    };
}
