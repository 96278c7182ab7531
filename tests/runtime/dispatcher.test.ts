import { describe, it, expect, beforeEach } from 'vitest';
import { OperationDispatcher, type DispatcherOptions } from '../../src/runtime/dispatcher/OperationDispatcher.js';
import type { BatchOperation, CallContext } from '../../src/runtime/dispatcher/operations.js';
import { InvariantChecker, type InvariantResult } from '../../src/runtime/invariants/InvariantChecker.js';
import { NATIVE_XLM, customAsset } from '../../src/runtime/ledger/Asset.js';
import { createGenesisState, type LedgerState } from '../../src/runtime/ledger/LedgerState.js';
import { LedgerError } from '../../src/protocol/errors/LedgerError.js';
import { MemoryStateStore } from '../../src/protocol/storage/StateStore.js';

const XLM = NATIVE_XLM;
const USDC = customAsset('USDCSIM');

let now = 0;
function as(caller: string): CallContext {
    now += 1;
    return { caller, timestamp: now };
}

function failure(fn: () => unknown): LedgerError {
    try {
        fn();
    } catch (error) {
        if (error instanceof LedgerError) return error;
        throw error;
    }
    throw new Error('expected a LedgerError');
}

/** 1M/1M pool owned by lp, alice holds 10 000 XLM. */
function seeded(options: DispatcherOptions = {}): OperationDispatcher {
    const dispatcher = new OperationDispatcher({ admin: 'admin', ...options });
    dispatcher.mint(as('admin'), { asset: XLM, to: 'lp', amount: 1_000_000n });
    dispatcher.mint(as('admin'), { asset: USDC, to: 'lp', amount: 1_000_000n });
    dispatcher.addLiquidity(as('lp'), { user: 'lp', amountA: 1_000_000n, amountB: 1_000_000n });
    dispatcher.mint(as('admin'), { asset: XLM, to: 'alice', amount: 10_000n });
    return dispatcher;
}

/** Forces a conservation failure once armed. */
class ArmedChecker extends InvariantChecker {
    armed = false;

    checkConservation(state: LedgerState): InvariantResult {
        if (this.armed) return { invariant: 'conservation', holds: false, detail: 'forced' };
        return super.checkConservation(state);
    }
}

describe('OperationDispatcher', () => {
    beforeEach(() => {
        now = 0;
    });

    describe('swap', () => {
        it('swaps 1000 XLM for 997 USDCSIM on a 1M/1M pool', () => {
            const dispatcher = seeded();
            const result = dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n });

            expect(result).toEqual({ amountIn: 1000n, amountOut: 997n, fee: 3n, priceImpactBps: 30 });
            expect(dispatcher.balanceOf('alice', XLM)).toBe(9000n);
            expect(dispatcher.balanceOf('alice', USDC)).toBe(997n);

            const pool = dispatcher.getPool();
            expect(pool.reserveA).toBe(1_001_000n);
            expect(pool.reserveB).toBe(999_003n);
            expect(pool.lpFeesAccumulated).toBe(3n);

            expect(dispatcher.getTotals()).toEqual({
                totalMinted: 2_010_000n,
                feeAccumulator: 0n,
                tradingVolume: 1000n,
                totalUsers: 2,
            });
            expect(dispatcher.getMetrics().tradeCount).toBe(1);
            expect(dispatcher.audit().every((r) => r.holds)).toBe(true);
        });

        it('routes the fee to the accumulator when configured', () => {
            const dispatcher = seeded({ feeRouting: 'accumulator' });
            dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n });
            expect(dispatcher.getTotals().feeAccumulator).toBe(3n);
            expect(dispatcher.getPool().reserveA).toBe(1_000_997n);
            expect(dispatcher.audit().every((r) => r.holds)).toBe(true);
        });

        it('rejects a debit above the balance and counts the failed order', () => {
            const dispatcher = seeded();
            dispatcher.mint(as('admin'), { asset: XLM, to: 'bob', amount: 300n });

            const error = failure(() => dispatcher.swap(as('bob'), { from: XLM, to: USDC, amount: 500n }));
            expect(error.kind).toBe('InsufficientBalance');
            expect(error.details).toEqual({ asset: 'XLM', available: '300', requested: '500' });
            expect(dispatcher.balanceOf('bob', XLM)).toBe(300n);
            expect(dispatcher.getPool().reserveA).toBe(1_000_000n);
            expect(dispatcher.getPool().reserveB).toBe(1_000_000n);
            expect(dispatcher.getMetrics().failedOrderCount).toBe(1);
        });

        it('rejects same-asset swaps, foreign pairs and zero amounts', () => {
            const dispatcher = seeded();
            expect(failure(() => dispatcher.swap(as('alice'), { from: XLM, to: XLM, amount: 10n })).kind).toBe('SameAssetSwap');
            expect(failure(() => dispatcher.swap(as('alice'), { from: XLM, to: customAsset('EURT'), amount: 10n })).kind).toBe('InvalidSwapPair');
            expect(failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 0n })).kind).toBe('InvalidAmount');
            expect(dispatcher.getMetrics().failedOrderCount).toBe(3);
        });

        it('refuses swaps on an empty pool', () => {
            const dispatcher = new OperationDispatcher({ admin: 'admin' });
            dispatcher.mint(as('admin'), { asset: XLM, to: 'alice', amount: 100n });
            expect(failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 10n })).kind).toBe('InsufficientLiquidity');
        });

        it('refuses a swap that would empty the output reserve', () => {
            const dispatcher = new OperationDispatcher({ admin: 'admin' });
            dispatcher.mint(as('admin'), { asset: XLM, to: 'lp', amount: 1_000_000_000n });
            dispatcher.mint(as('admin'), { asset: USDC, to: 'lp', amount: 1n });
            dispatcher.addLiquidity(as('lp'), { user: 'lp', amountA: 1_000_000_000n, amountB: 1n });
            dispatcher.mint(as('admin'), { asset: XLM, to: 'alice', amount: 1n });

            const error = failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1n }));
            expect(error.kind).toBe('InsufficientLiquidity');
            expect(dispatcher.getPool().reserveA).toBe(1_000_000_000n);
            expect(dispatcher.getPool().reserveB).toBe(1n);
            expect(dispatcher.balanceOf('alice', XLM)).toBe(1n);
            expect(dispatcher.balanceOf('alice', USDC)).toBe(0n);
            expect(dispatcher.getMetrics().failedOrderCount).toBe(1);
            expect(dispatcher.audit().every((r) => r.holds)).toBe(true);
        });

        it('enforces minAmountOut', () => {
            const dispatcher = seeded();
            const error = failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n, minAmountOut: 998n }));
            expect(error.kind).toBe('SlippageExceeded');
            expect(error.phase).toBe('Computing');
            expect(dispatcher.balanceOf('alice', XLM)).toBe(10_000n);

            expect(dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n, minAmountOut: 997n }).amountOut).toBe(997n);
        });

        it('only lets the caller trade for itself', () => {
            const dispatcher = seeded();
            const error = failure(() => dispatcher.swap(as('mallory'), { from: XLM, to: USDC, amount: 10n, user: 'alice' }));
            expect(error.kind).toBe('Unauthorized');
            expect(error.message).toBe('Unauthorized');
            expect(dispatcher.balanceOf('alice', XLM)).toBe(10_000n);
        });

        it('records history newest first, capped at 50 per user', () => {
            const dispatcher = seeded();
            for (let i = 0; i < 51; i++) {
                dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 10n });
            }
            const history = dispatcher.getUserTransactions('alice', 100);
            expect(history).toHaveLength(50);
            expect(history[0].timestamp).toBeGreaterThan(history[49].timestamp);
            expect(dispatcher.getUserTransactions('alice', 3)).toHaveLength(3);
            expect(dispatcher.getUserTransactions('nobody')).toEqual([]);
        });

        it('rejects a history limit that is not a non-negative integer', () => {
            const dispatcher = seeded();
            dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 10n });
            for (const limit of [1.5, Number.NaN, -1]) {
                const error = failure(() => dispatcher.getUserTransactions('alice', limit));
                expect(error.kind).toBe('InvalidAmount');
                expect(error.details).toEqual({ field: 'limit' });
            }
            expect(dispatcher.getUserTransactions('alice', 0)).toEqual([]);
        });

        it('stores the execution rate with 7 decimals', () => {
            const dispatcher = seeded();
            dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n });
            const [trade] = dispatcher.getUserTransactions('alice');
            expect(trade.fromAsset).toEqual(XLM);
            expect(trade.toAsset).toEqual(USDC);
            expect(trade.rate).toBe(9_970_000n);
        });
    });

    describe('trySwap', () => {
        it('returns 0 and counts the failure instead of throwing', () => {
            const dispatcher = seeded();
            expect(dispatcher.trySwap(as('alice'), { from: XLM, to: USDC, amount: 50_000n })).toBe(0n);
            expect(dispatcher.getMetrics().failedOrderCount).toBe(1);
            expect(dispatcher.trySwap(as('alice'), { from: XLM, to: USDC, amount: 1000n })).toBe(997n);
        });

        it('still throws fatal errors', () => {
            const dispatcher = seeded();
            const stale: CallContext = { caller: 'alice', timestamp: 0 };
            expect(failure(() => dispatcher.trySwap(stale, { from: XLM, to: USDC, amount: 10n })).kind).toBe('ClockRegression');
            expect(dispatcher.getMetrics().failedOrderCount).toBe(0);
        });
    });

    describe('transfer', () => {
        it('converts within an account and sends the fee to the accumulator', () => {
            const dispatcher = seeded({ transferFeeBps: 100 });
            const result = dispatcher.transfer(as('alice'), { fromAsset: XLM, toAsset: USDC, user: 'alice', amount: 1000n });
            expect(result).toEqual({ debited: 1000n, credited: 990n, fee: 10n });
            expect(dispatcher.balanceOf('alice', XLM)).toBe(9000n);
            expect(dispatcher.balanceOf('alice', USDC)).toBe(990n);
            expect(dispatcher.getTotals().feeAccumulator).toBe(10n);
            expect(dispatcher.audit().every((r) => r.holds)).toBe(true);
        });

        it('rejects a transfer above the balance without counting a failed order', () => {
            const dispatcher = seeded();
            dispatcher.mint(as('admin'), { asset: XLM, to: 'bob', amount: 300n });
            const error = failure(() => dispatcher.transfer(as('bob'), { fromAsset: XLM, toAsset: USDC, user: 'bob', amount: 500n }));
            expect(error.kind).toBe('InsufficientBalance');
            expect(error.phase).toBe('Validating');
            expect(dispatcher.balanceOf('bob', XLM)).toBe(300n);
            expect(dispatcher.getMetrics().failedOrderCount).toBe(0);
        });
    });

    describe('mint and admin', () => {
        it('lets only the admin mint', () => {
            const dispatcher = new OperationDispatcher({ admin: 'admin' });
            expect(failure(() => dispatcher.mint(as('alice'), { asset: XLM, to: 'alice', amount: 5n })).kind).toBe('Unauthorized');
            expect(dispatcher.mint(as('admin'), { asset: XLM, to: 'alice', amount: 5n })).toBe(5n);
            expect(dispatcher.getTotals().totalMinted).toBe(5n);
        });

        it('rejects non-positive mints', () => {
            const dispatcher = new OperationDispatcher({ admin: 'admin' });
            expect(failure(() => dispatcher.mint(as('admin'), { asset: XLM, to: 'alice', amount: 0n })).kind).toBe('InvalidAmount');
        });

        it('rejects setAdmin from a non-admin and keeps the admin', () => {
            const dispatcher = new OperationDispatcher({ admin: 'admin' });
            expect(failure(() => dispatcher.setAdmin(as('mallory'), 'mallory')).kind).toBe('Unauthorized');
            expect(dispatcher.getAdmin()).toBe('admin');

            dispatcher.setAdmin(as('admin'), 'carol');
            expect(dispatcher.getAdmin()).toBe('carol');
            expect(failure(() => dispatcher.mint(as('admin'), { asset: XLM, to: 'x', amount: 1n })).kind).toBe('Unauthorized');
        });

        it('pauses and resumes trading', () => {
            const dispatcher = seeded();
            dispatcher.pauseTrading(as('admin'));
            expect(dispatcher.isPaused()).toBe(true);
            expect(failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 10n })).kind).toBe('TradingPaused');
            expect(failure(() => dispatcher.transfer(as('alice'), { fromAsset: XLM, toAsset: USDC, user: 'alice', amount: 10n })).kind).toBe('TradingPaused');
            expect(failure(() => dispatcher.removeLiquidity(as('lp'), { user: 'lp', lpAmount: 10n })).kind).toBe('TradingPaused');
            expect(dispatcher.mint(as('admin'), { asset: XLM, to: 'alice', amount: 1n })).toBe(10_001n);

            dispatcher.resumeTrading(as('admin'));
            expect(dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n }).amountOut).toBe(997n);
        });

        it('migrates forward only and records the migration time', () => {
            const dispatcher = new OperationDispatcher({ admin: 'admin' });
            expect(dispatcher.migrate({ caller: 'admin', timestamp: 42 }, 2)).toBe(2);
            expect(dispatcher.getMigratedAt()).toBe(42);
            expect(dispatcher.getMetrics().version).toBe(2);

            const error = failure(() => dispatcher.migrate({ caller: 'admin', timestamp: 43 }, 1));
            expect(error.kind).toBe('InvalidMigration');
            expect(error.fatal).toBe(true);
            expect(dispatcher.getMetrics().version).toBe(2);
            expect(dispatcher.isPaused()).toBe(false);
        });
    });

    describe('liquidity', () => {
        it('mints LP, locks the minimum and returns reserves on removal', () => {
            const dispatcher = seeded();
            expect(dispatcher.getLpPosition('lp').lpTokens).toBe(999_000n);
            expect(dispatcher.getPool().lpBurned).toBe(1000n);

            const result = dispatcher.removeLiquidity(as('lp'), { user: 'lp', lpAmount: 499_000n });
            expect(result).toEqual({ lpBurned: 499_000n, amountA: 499_000n, amountB: 499_000n });
            expect(dispatcher.balanceOf('lp', XLM)).toBe(499_000n);
            expect(dispatcher.balanceOf('lp', USDC)).toBe(499_000n);
            expect(dispatcher.getLpPosition('lp').lpTokens).toBe(500_000n);
            expect(dispatcher.audit().every((r) => r.holds)).toBe(true);
        });

        it('rejects deposits above the balance', () => {
            const dispatcher = seeded();
            const error = failure(() => dispatcher.addLiquidity(as('alice'), { user: 'alice', amountA: 5000n, amountB: 5000n }));
            expect(error.kind).toBe('InsufficientBalance');
            expect(error.details?.asset).toBe('USDCSIM');
        });
    });

    describe('clock', () => {
        it('rejects a timestamp older than the last one without touching state', () => {
            const dispatcher = seeded();
            dispatcher.mint({ caller: 'admin', timestamp: 100 }, { asset: XLM, to: 'alice', amount: 1n });
            const error = failure(() => dispatcher.mint({ caller: 'admin', timestamp: 99 }, { asset: XLM, to: 'alice', amount: 1n }));
            expect(error.kind).toBe('ClockRegression');
            expect(error.fatal).toBe(true);
            expect(dispatcher.balanceOf('alice', XLM)).toBe(10_001n);
            expect(dispatcher.getMetrics().lastTimestamp).toBe(100);
        });

        it('accepts repeated timestamps', () => {
            const dispatcher = new OperationDispatcher({ admin: 'admin' });
            dispatcher.mint({ caller: 'admin', timestamp: 7 }, { asset: XLM, to: 'a', amount: 1n });
            dispatcher.mint({ caller: 'admin', timestamp: 7 }, { asset: XLM, to: 'a', amount: 1n });
            expect(dispatcher.balanceOf('a', XLM)).toBe(2n);
        });
    });

    describe('batches', () => {
        const operations: BatchOperation[] = [
            { type: 'transfer', request: { fromAsset: XLM, toAsset: USDC, user: 'alice', amount: 100n } },
            { type: 'swap', request: { from: XLM, to: USDC, amount: 1_000_000n, user: 'alice' } },
            { type: 'swap', request: { from: USDC, to: XLM, amount: 50n, user: 'alice' } },
        ];

        it('rolls back an atomic batch on the first failure', () => {
            const dispatcher = seeded();
            const result = dispatcher.executeBatch(as('alice'), operations, 'atomic');

            expect(result.committed).toBe(false);
            expect(result.succeeded).toBe(1);
            expect(result.failed).toBe(1);
            expect(result.results).toHaveLength(2);
            expect(result.results[1]).toMatchObject({ type: 'swap', ok: false, kind: 'InsufficientBalance' });
            expect(dispatcher.balanceOf('alice', XLM)).toBe(10_000n);
            expect(dispatcher.balanceOf('alice', USDC)).toBe(0n);
            expect(dispatcher.getMetrics().failedOrderCount).toBe(1);
        });

        it('commits each operation of a best-effort batch on its own', () => {
            const dispatcher = seeded();
            const result = dispatcher.executeBatch(as('alice'), operations, 'best-effort');

            expect(result.committed).toBe(true);
            expect(result.succeeded).toBe(2);
            expect(result.failed).toBe(1);
            expect(result.results[2]).toEqual({ type: 'swap', ok: true, value: { amountIn: 50n, amountOut: 50n, fee: 0n, priceImpactBps: 0 } });
            expect(dispatcher.balanceOf('alice', XLM)).toBe(9950n);
            expect(dispatcher.balanceOf('alice', USDC)).toBe(50n);
            expect(dispatcher.audit().every((r) => r.holds)).toBe(true);
        });

        it('rejects more than 10 operations', () => {
            const dispatcher = seeded();
            const many: BatchOperation[] = Array.from({ length: 11 }, () => operations[0]);
            expect(failure(() => dispatcher.executeBatch(as('alice'), many)).kind).toBe('BatchTooLarge');
            expect(dispatcher.balanceOf('alice', XLM)).toBe(10_000n);
        });
    });

    describe('invariant violations', () => {
        it('discards the draft, halts trading and throws', () => {
            const checker = new ArmedChecker();
            const dispatcher = seeded({ checker });
            checker.armed = true;

            const error = failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n }));
            expect(error.kind).toBe('InvariantViolation');
            expect(error.phase).toBe('Checking');
            expect(error.details?.invariant).toBe('conservation');
            expect(dispatcher.balanceOf('alice', XLM)).toBe(10_000n);
            expect(dispatcher.isPaused()).toBe(true);
            expect(dispatcher.getHaltReason()).toBe('Invariant conservation violated: forced');
            expect(dispatcher.getMetrics().failedOrderCount).toBe(0);

            checker.armed = false;
            expect(failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n })).kind).toBe('TradingPaused');

            dispatcher.resumeTrading(as('admin'));
            expect(dispatcher.getHaltReason()).toBeNull();
            expect(dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 1000n }).amountOut).toBe(997n);
        });

        it('rolls back a whole batch on a violation', () => {
            const checker = new ArmedChecker();
            const dispatcher = seeded({ checker });
            checker.armed = true;
            const ops: BatchOperation[] = [{ type: 'mint', request: { asset: XLM, to: 'bob', amount: 5n } }];

            expect(failure(() => dispatcher.executeBatch(as('admin'), ops, 'best-effort')).kind).toBe('InvariantViolation');
            expect(dispatcher.balanceOf('bob', XLM)).toBe(0n);
            expect(dispatcher.isPaused()).toBe(true);
        });
    });

    describe('reads and persistence', () => {
        it('hands out copies of the committed state', () => {
            const dispatcher = seeded();
            const snapshot = dispatcher.snapshot();
            snapshot.balances.get('alice')?.set('native', 1n);
            expect(dispatcher.balanceOf('alice', XLM)).toBe(10_000n);
        });

        it('saves after commits and counted failures, and reloads', () => {
            const store = new MemoryStateStore();
            const dispatcher = new OperationDispatcher({ admin: 'admin', store });
            expect(store.saves).toBe(1);

            dispatcher.mint(as('admin'), { asset: XLM, to: 'alice', amount: 50n });
            expect(store.saves).toBe(2);

            failure(() => dispatcher.setAdmin(as('alice'), 'alice'));
            expect(store.saves).toBe(2);

            failure(() => dispatcher.swap(as('alice'), { from: XLM, to: USDC, amount: 10n }));
            expect(store.saves).toBe(3);

            const reloaded = new OperationDispatcher({ store });
            expect(reloaded.balanceOf('alice', XLM)).toBe(50n);
            expect(reloaded.getMetrics().failedOrderCount).toBe(1);
            expect(reloaded.getAdmin()).toBe('admin');
        });

        it('refuses to load a state that fails its audit', () => {
            const state = createGenesisState({ admin: 'admin' });
            state.totalMinted = 5n;
            const error = failure(() => new OperationDispatcher({ initialState: state }));
            expect(error.kind).toBe('CorruptState');
            expect(error.message).toBe('Loaded state fails conservation: Tracked value does not match total minted');
        });
    });
});
