/**
 * State Codec
 *
 * LedgerState <-> JSON-safe blob. Bigints travel as decimal strings
 * (BigInt as string for JSON), Maps as records. Decoding validates every
 * field and throws CorruptState on anything malformed.
 */

import { LedgerError } from '../errors/LedgerError.js';
import type { LedgerState, LpPosition, TradeRecord } from '../../runtime/ledger/LedgerState.js';

export interface PersistedTradeRecord {
    timestamp: number;
    fromAsset: string;
    toAsset: string;
    fromAmount: string;
    toAmount: string;
    rate: string;
}

export interface PersistedLpPosition {
    lpTokens: string;
    depositedA: string;
    depositedB: string;
}

export interface PersistedLedgerState {
    admin: string;
    paused: boolean;
    haltReason: string | null;
    balances: Record<string, Record<string, string>>;
    userIndex: string[];
    assetIndex: string[];
    pool: {
        assetA: string;
        assetB: string;
        reserveA: string;
        reserveB: string;
        lpTotalSupply: string;
        lpBurned: string;
        lpFeesAccumulated: string;
        lastSwapAt: number;
    };
    lpPositions: Record<string, PersistedLpPosition>;
    lpIndex: string[];
    feeAccumulator: string;
    totalMinted: string;
    tradingVolume: string;
    metrics: {
        tradeCount: number;
        failedOrderCount: number;
        balancesUpdated: number;
        version: number;
        lastTimestamp: number;
    };
    history: Record<string, PersistedTradeRecord[]>;
    migratedAt: number | null;
}

// ========== ENCODE ==========

export function serializeState(state: LedgerState): PersistedLedgerState {
    // Object.fromEntries defines own properties, so a user named "__proto__" survives
    const balances: Record<string, Record<string, string>> = Object.fromEntries(
        Array.from(state.balances, ([user, row]) => [
            user,
            Object.fromEntries(Array.from(row, ([asset, amount]) => [asset, amount.toString()])),
        ]),
    );

    const lpPositions: Record<string, PersistedLpPosition> = Object.fromEntries(
        Array.from(state.lpPositions, ([provider, position]) => [
            provider,
            {
                lpTokens: position.lpTokens.toString(),
                depositedA: position.depositedA.toString(),
                depositedB: position.depositedB.toString(),
            },
        ]),
    );

    const history: Record<string, PersistedTradeRecord[]> = Object.fromEntries(
        Array.from(state.history, ([user, records]) => [
            user,
            records.map((r) => ({
                timestamp: r.timestamp,
                fromAsset: r.fromAsset,
                toAsset: r.toAsset,
                fromAmount: r.fromAmount.toString(),
                toAmount: r.toAmount.toString(),
                rate: r.rate.toString(),
            })),
        ]),
    );

    return {
        admin: state.admin,
        paused: state.paused,
        haltReason: state.haltReason,
        balances,
        userIndex: [...state.userIndex],
        assetIndex: [...state.assetIndex],
        pool: {
            assetA: state.pool.assetA,
            assetB: state.pool.assetB,
            reserveA: state.pool.reserveA.toString(),
            reserveB: state.pool.reserveB.toString(),
            lpTotalSupply: state.pool.lpTotalSupply.toString(),
            lpBurned: state.pool.lpBurned.toString(),
            lpFeesAccumulated: state.pool.lpFeesAccumulated.toString(),
            lastSwapAt: state.pool.lastSwapAt,
        },
        lpPositions,
        lpIndex: [...state.lpIndex],
        feeAccumulator: state.feeAccumulator.toString(),
        totalMinted: state.totalMinted.toString(),
        tradingVolume: state.tradingVolume.toString(),
        metrics: { ...state.metrics },
        history,
        migratedAt: state.migratedAt,
    };
}

// ========== DECODE ==========

function corrupt(field: string): LedgerError {
    return new LedgerError('CorruptState', `Persisted state is malformed at ${field}`, { field });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, field: string): Record<string, unknown> {
    if (!isRecord(value)) throw corrupt(field);
    return value;
}

function str(value: unknown, field: string): string {
    if (typeof value !== 'string') throw corrupt(field);
    return value;
}

function num(value: unknown, field: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) throw corrupt(field);
    return value;
}

function big(value: unknown, field: string): bigint {
    if (typeof value !== 'string' || !/^-?\d+$/.test(value)) throw corrupt(field);
    return BigInt(value);
}

function strings(value: unknown, field: string): string[] {
    if (!Array.isArray(value)) throw corrupt(field);
    return value.map((v, i) => str(v, `${field}[${i}]`));
}

function decodePosition(value: unknown, field: string): LpPosition {
    const p = record(value, field);
    return {
        lpTokens: big(p.lpTokens, `${field}.lpTokens`),
        depositedA: big(p.depositedA, `${field}.depositedA`),
        depositedB: big(p.depositedB, `${field}.depositedB`),
    };
}

function decodeTrade(value: unknown, field: string): TradeRecord {
    const r = record(value, field);
    return {
        timestamp: num(r.timestamp, `${field}.timestamp`),
        fromAsset: str(r.fromAsset, `${field}.fromAsset`),
        toAsset: str(r.toAsset, `${field}.toAsset`),
        fromAmount: big(r.fromAmount, `${field}.fromAmount`),
        toAmount: big(r.toAmount, `${field}.toAmount`),
        rate: big(r.rate, `${field}.rate`),
    };
}

export function deserializeState(data: unknown): LedgerState {
    const root = record(data, 'root');

    const balances = new Map<string, Map<string, bigint>>();
    for (const [user, row] of Object.entries(record(root.balances, 'balances'))) {
        const entries = Object.entries(record(row, `balances.${user}`))
            .map(([k, v]): [string, bigint] => [k, big(v, `balances.${user}.${k}`)]);
        balances.set(user, new Map(entries));
    }

    const lpPositions = new Map<string, LpPosition>();
    for (const [provider, position] of Object.entries(record(root.lpPositions, 'lpPositions'))) {
        lpPositions.set(provider, decodePosition(position, `lpPositions.${provider}`));
    }

    const history = new Map<string, TradeRecord[]>();
    for (const [user, records] of Object.entries(record(root.history, 'history'))) {
        if (!Array.isArray(records)) throw corrupt(`history.${user}`);
        history.set(user, records.map((r, i) => decodeTrade(r, `history.${user}[${i}]`)));
    }

    const pool = record(root.pool, 'pool');
    const metrics = record(root.metrics, 'metrics');

    if (typeof root.paused !== 'boolean') throw corrupt('paused');
    const haltReason = root.haltReason === null ? null : str(root.haltReason, 'haltReason');
    const migratedAt = root.migratedAt === null ? null : num(root.migratedAt, 'migratedAt');

    return {
        admin: str(root.admin, 'admin'),
        paused: root.paused,
        haltReason,
        balances,
        userIndex: strings(root.userIndex, 'userIndex'),
        assetIndex: strings(root.assetIndex, 'assetIndex'),
        pool: {
            assetA: str(pool.assetA, 'pool.assetA'),
            assetB: str(pool.assetB, 'pool.assetB'),
            reserveA: big(pool.reserveA, 'pool.reserveA'),
            reserveB: big(pool.reserveB, 'pool.reserveB'),
            lpTotalSupply: big(pool.lpTotalSupply, 'pool.lpTotalSupply'),
            lpBurned: big(pool.lpBurned, 'pool.lpBurned'),
            lpFeesAccumulated: big(pool.lpFeesAccumulated, 'pool.lpFeesAccumulated'),
            lastSwapAt: num(pool.lastSwapAt, 'pool.lastSwapAt'),
        },
        lpPositions,
        lpIndex: strings(root.lpIndex, 'lpIndex'),
        feeAccumulator: big(root.feeAccumulator, 'feeAccumulator'),
        totalMinted: big(root.totalMinted, 'totalMinted'),
        tradingVolume: big(root.tradingVolume, 'tradingVolume'),
        metrics: {
            tradeCount: num(metrics.tradeCount, 'metrics.tradeCount'),
            failedOrderCount: num(metrics.failedOrderCount, 'metrics.failedOrderCount'),
            balancesUpdated: num(metrics.balancesUpdated, 'metrics.balancesUpdated'),
            version: num(metrics.version, 'metrics.version'),
            lastTimestamp: num(metrics.lastTimestamp, 'metrics.lastTimestamp'),
        },
        history,
        migratedAt,
    };
}
