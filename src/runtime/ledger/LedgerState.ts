/**
 * Ledger State Aggregate
 *
 * The whole mutable state of one ledger + one pool, as plain data.
 * The dispatcher owns the only committed copy and mutates deep clones of it;
 * every other component receives the draft it should work on.
 *
 * Maps are keyed by user identity; balances and LP positions are never
 * deleted, a zero value stands for "removed".
 */

import { LedgerError } from '../../protocol/errors/LedgerError.js';
import { SCHEMA_VERSION, DEFAULT_POOL_ASSET_B } from '../../protocol/params/ledger.js';
import { assetKey, customAsset, NATIVE_XLM, type AssetKey } from './Asset.js';

export interface LpPosition {
    lpTokens: bigint;
    depositedA: bigint;
    depositedB: bigint;
}

export interface PoolState {
    assetA: AssetKey;
    assetB: AssetKey;
    reserveA: bigint;
    reserveB: bigint;
    lpTotalSupply: bigint;
    lpBurned: bigint;
    lpFeesAccumulated: bigint;
    lastSwapAt: number;
}

export interface MetricsState {
    tradeCount: number;
    failedOrderCount: number;
    balancesUpdated: number;
    version: number;
    lastTimestamp: number;
}

export interface TradeRecord {
    timestamp: number;
    fromAsset: AssetKey;
    toAsset: AssetKey;
    fromAmount: bigint;
    toAmount: bigint;
    /** toAmount / fromAmount scaled by RATE_SCALE */
    rate: bigint;
}

export interface LedgerState {
    admin: string;
    paused: boolean;
    haltReason: string | null;
    balances: Map<string, Map<AssetKey, bigint>>;
    userIndex: string[];
    assetIndex: AssetKey[];
    pool: PoolState;
    lpPositions: Map<string, LpPosition>;
    lpIndex: string[];
    feeAccumulator: bigint;
    totalMinted: bigint;
    tradingVolume: bigint;
    metrics: MetricsState;
    history: Map<string, TradeRecord[]>;
    migratedAt: number | null;
}

export interface GenesisOptions {
    admin: string;
    poolAssetB?: string;
}

export function createGenesisState(options: GenesisOptions): LedgerState {
    const assetB = customAsset(options.poolAssetB ?? DEFAULT_POOL_ASSET_B);
    if (assetB.kind === 'native') {
        throw new LedgerError('InvalidAsset', 'Pool asset B must differ from the native asset');
    }

    return {
        admin: options.admin,
        paused: false,
        haltReason: null,
        balances: new Map(),
        userIndex: [],
        assetIndex: [],
        pool: {
            assetA: assetKey(NATIVE_XLM),
            assetB: assetKey(assetB),
            reserveA: 0n,
            reserveB: 0n,
            lpTotalSupply: 0n,
            lpBurned: 0n,
            lpFeesAccumulated: 0n,
            lastSwapAt: 0,
        },
        lpPositions: new Map(),
        lpIndex: [],
        feeAccumulator: 0n,
        totalMinted: 0n,
        tradingVolume: 0n,
        metrics: {
            tradeCount: 0,
            failedOrderCount: 0,
            balancesUpdated: 0,
            version: SCHEMA_VERSION,
            lastTimestamp: 0,
        },
        history: new Map(),
        migratedAt: null,
    };
}

/** Deep copy; Maps and bigints survive structuredClone. */
export function cloneState(state: LedgerState): LedgerState {
    return structuredClone(state);
}
