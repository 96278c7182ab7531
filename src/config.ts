import { DEFAULT_POOL_ASSET_B, DEFAULT_SWAP_FEE_BPS, DEFAULT_TRANSFER_FEE_BPS, FEE_ROUTINGS, type FeeRouting } from './protocol/params/ledger.js';
import { parseThreshold } from './protocol/utils/logger.js';

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}

function boolFromEnv(env: Env, name: string, fallback: boolean): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    return !['false', '0', 'no', 'off'].includes(raw);
}

function routingFromEnv(env: Env): FeeRouting {
    const raw = env.LEDGER_FEE_ROUTING?.trim().toLowerCase();
    if (!raw) return 'pool';
    const routing = FEE_ROUTINGS.find((r) => r === raw);
    if (!routing) {
        throw new Error(`LEDGER_FEE_ROUTING must be one of ${FEE_ROUTINGS.join(', ')}, got "${raw}"`);
    }
    return routing;
}

export function loadConfig(env: Env = process.env) {
    return {
        ledger: {
            admin: env.LEDGER_ADMIN || 'admin',
            swapFeeBps: intFromEnv(env, 'LEDGER_FEE_BPS', DEFAULT_SWAP_FEE_BPS),
            transferFeeBps: intFromEnv(env, 'LEDGER_TRANSFER_FEE_BPS', DEFAULT_TRANSFER_FEE_BPS),
            feeRouting: routingFromEnv(env),
            poolAssetB: env.LEDGER_POOL_ASSET_B || DEFAULT_POOL_ASSET_B,
        },
        storage: {
            dataDir: env.LEDGER_DATA_DIR || './data',
            stateFile: env.LEDGER_STATE_FILE || 'ledger.json',
        },
        api: {
            port: intFromEnv(env, 'API_PORT', 3001),
            requireSignatures: boolFromEnv(env, 'API_REQUIRE_SIGNATURES', true),
            nonceWindowMs: intFromEnv(env, 'API_NONCE_WINDOW_MS', 300000),
            rateLimit: {
                windowMs: 60000,
                maxRequests: intFromEnv(env, 'API_RATE_LIMIT_MAX', 100),
            },
            cors: {
                origin: env.API_CORS_ORIGIN || '*',
            },
        },
        logLevel: parseThreshold(env.LOG_LEVEL),
    };
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
