/**
 * Operation Dispatcher
 *
 * The only writer of ledger state. Every external call runs as one
 * run-to-completion transaction:
 *
 *   Validating -> Computing -> Mutating -> Checking -> Committed | Aborted
 *
 * Each call works on a deep clone of the last committed state. The clone
 * replaces the committed state only after every invariant the operation
 * touches has been re-checked, so an abort at any phase leaves no trace.
 * Reads always see the last committed state.
 */

import { LedgerError, isLedgerError, type OperationPhase } from '../../protocol/errors/LedgerError.js';
import { CheckedMath } from '../../protocol/math/checked.js';
import {
    DEFAULT_SWAP_FEE_BPS,
    DEFAULT_TRANSFER_FEE_BPS,
    MAX_BATCH_SIZE,
    MAX_HISTORY_PER_USER,
    RATE_SCALE,
    SCHEMA_VERSION,
    type FeeRouting,
} from '../../protocol/params/ledger.js';
import type { StateStore } from '../../protocol/storage/StateStore.js';
import { logger } from '../../protocol/utils/logger.js';
import { AuthorizationGate, AuthorizationTrace, assertIdentity, type IdentityVerifier } from '../auth/AuthorizationGate.js';
import { FeeEngine } from '../fees/FeeEngine.js';
import { InvariantChecker, firstViolation, type InvariantName, type InvariantResult } from '../invariants/InvariantChecker.js';
import { assetFromKey, assetKey, assetLabel, sameAsset, type Asset } from '../ledger/Asset.js';
import { BalanceLedger } from '../ledger/BalanceLedger.js';
import { cloneState, createGenesisState, type LedgerState, type LpPosition, type MetricsState, type TradeRecord } from '../ledger/LedgerState.js';
import { MetricsTracker } from '../metrics/MetricsTracker.js';
import { LiquidityPool, type CurveReserves, type SwapQuote } from '../pool/LiquidityPool.js';
import type {
    AddLiquidityRequest,
    AddLiquidityResult,
    BatchMode,
    BatchOperation,
    BatchResult,
    CallContext,
    MintRequest,
    OperationOutcome,
    RemoveLiquidityRequest,
    RemoveLiquidityResult,
    SwapRequest,
    SwapResult,
    TransferRequest,
    TransferResult,
} from './operations.js';

const log = logger.child('Dispatcher');

export interface DispatcherOptions {
    /** Genesis admin, used only when no state is loaded. */
    admin?: string;
    /** Genesis pool asset B symbol. */
    poolAssetB?: string;
    swapFeeBps?: number;
    transferFeeBps?: number;
    feeRouting?: FeeRouting;
    verifier?: IdentityVerifier;
    store?: StateStore;
    checker?: InvariantChecker;
    initialState?: LedgerState;
}

export interface PoolView {
    assetA: Asset;
    assetB: Asset;
    reserveA: bigint;
    reserveB: bigint;
    k: bigint;
    lpTotalSupply: bigint;
    lpBurned: bigint;
    lpFeesAccumulated: bigint;
    lastSwapAt: number;
}

export interface LedgerTotals {
    totalMinted: bigint;
    feeAccumulator: bigint;
    tradingVolume: bigint;
    totalUsers: number;
}

export interface TradeView {
    timestamp: number;
    fromAsset: Asset;
    toAsset: Asset;
    fromAmount: bigint;
    toAmount: bigint;
    rate: bigint;
}

// ========== TRANSACTION ==========

/** One in-flight operation: the committed snapshot and the draft it mutates. */
class Transaction {
    phase: OperationPhase = 'Validating';
    readonly draft: LedgerState;
    readonly ledger: BalanceLedger;
    readonly pool: LiquidityPool;
    readonly metrics: MetricsTracker;
    readonly trace = new AuthorizationTrace();
    fee?: { amount: bigint; fee: bigint };
    curve?: { before: CurveReserves; after: CurveReserves };

    constructor(readonly name: string, readonly before: LedgerState, readonly ctx: CallContext) {
        this.draft = cloneState(before);
        this.ledger = new BalanceLedger(this.draft);
        this.pool = new LiquidityPool(this.draft);
        this.metrics = new MetricsTracker(this.draft.metrics);
    }

    enter(phase: OperationPhase): void {
        this.phase = phase;
        log.debug(`${this.name} -> ${phase}`);
    }
}

interface OperationPlan<T> {
    name: BatchOperation['type'] | 'setAdmin' | 'pauseTrading' | 'resumeTrading' | 'migrate';
    checks: readonly InvariantName[];
    /** Failed attempts bump failedOrderCount. */
    countsFailure: boolean;
    run(tx: Transaction): T;
}

const BALANCE_CHECKS: readonly InvariantName[] = ['conservation', 'non-negative-balances', 'authorization', 'monotonicity'];
const ADMIN_CHECKS: readonly InvariantName[] = ['authorization', 'monotonicity'];

function requirePositive(amount: bigint, field: string = 'amount'): void {
    if (amount <= 0n) {
        throw new LedgerError('InvalidAmount', `${field} must be positive`, { field });
    }
}

function shortId(identity: string): string {
    return identity.length > 16 ? `${identity.slice(0, 12)}...` : identity;
}

// ========== DISPATCHER ==========

export class OperationDispatcher {
    private state: LedgerState;
    private readonly swapFees: FeeEngine;
    private readonly transferFees: FeeEngine;
    private readonly routing: FeeRouting;
    private readonly gate: AuthorizationGate;
    private readonly checker: InvariantChecker;
    private readonly store?: StateStore;

    constructor(options: DispatcherOptions = {}) {
        this.swapFees = new FeeEngine(options.swapFeeBps ?? DEFAULT_SWAP_FEE_BPS);
        this.transferFees = new FeeEngine(options.transferFeeBps ?? DEFAULT_TRANSFER_FEE_BPS);
        this.routing = options.feeRouting ?? 'pool';
        this.gate = new AuthorizationGate(options.verifier);
        this.checker = options.checker ?? new InvariantChecker();
        this.store = options.store;

        const loaded = options.initialState ? cloneState(options.initialState) : options.store?.load() ?? null;
        if (loaded) {
            const violation = firstViolation(this.checker.audit(loaded));
            if (violation) {
                throw new LedgerError('CorruptState', `Loaded state fails ${violation.invariant}: ${violation.detail ?? ''}`);
            }
            this.state = loaded;
            log.info(`📂 Ledger loaded: ${loaded.userIndex.length} users, version ${loaded.metrics.version}`);
        } else {
            this.state = createGenesisState({ admin: assertIdentity(options.admin ?? 'admin', 'admin'), poolAssetB: options.poolAssetB });
            this.persist();
            log.info(`🌱 Genesis ledger created, admin ${shortId(this.state.admin)}`);
        }
    }

    // ========== STATE-MODIFYING OPERATIONS ==========

    /** Admin credits `to` with freshly minted units. Returns the new balance. */
    mint(ctx: CallContext, request: MintRequest): bigint {
        return this.commit(ctx, this.mintPlan(request));
    }

    /** In-account conversion of `amount` from one asset to another. */
    transfer(ctx: CallContext, request: TransferRequest): TransferResult {
        return this.commit(ctx, this.transferPlan(request));
    }

    swap(ctx: CallContext, request: SwapRequest): SwapResult {
        return this.commit(ctx, this.swapPlan(request));
    }

    /** Swap that returns 0 instead of throwing on recoverable failures. */
    trySwap(ctx: CallContext, request: SwapRequest): bigint {
        try {
            return this.swap(ctx, request).amountOut;
        } catch (error) {
            if (isLedgerError(error) && !error.fatal) return 0n;
            throw error;
        }
    }

    addLiquidity(ctx: CallContext, request: AddLiquidityRequest): AddLiquidityResult {
        return this.commit(ctx, this.addLiquidityPlan(request));
    }

    removeLiquidity(ctx: CallContext, request: RemoveLiquidityRequest): RemoveLiquidityResult {
        return this.commit(ctx, this.removeLiquidityPlan(request));
    }

    setAdmin(ctx: CallContext, newAdmin: string): void {
        this.commit(ctx, {
            name: 'setAdmin',
            checks: ADMIN_CHECKS,
            countsFailure: false,
            run: (tx) => {
                this.gate.requireAdmin(tx.ctx.caller, tx.draft.admin);
                const next = assertIdentity(newAdmin, 'newAdmin');
                tx.enter('Mutating');
                tx.draft.admin = next;
            },
        });
    }

    pauseTrading(ctx: CallContext): void {
        this.commit(ctx, {
            name: 'pauseTrading',
            checks: ADMIN_CHECKS,
            countsFailure: false,
            run: (tx) => {
                this.gate.requireAdmin(tx.ctx.caller, tx.draft.admin);
                tx.enter('Mutating');
                tx.draft.paused = true;
            },
        });
    }

    /** Also clears a halt left by an invariant violation. */
    resumeTrading(ctx: CallContext): void {
        this.commit(ctx, {
            name: 'resumeTrading',
            checks: ADMIN_CHECKS,
            countsFailure: false,
            run: (tx) => {
                this.gate.requireAdmin(tx.ctx.caller, tx.draft.admin);
                tx.enter('Mutating');
                tx.draft.paused = false;
                tx.draft.haltReason = null;
            },
        });
    }

    /** Bump the schema version. Moving backwards is InvalidMigration. */
    migrate(ctx: CallContext, targetVersion: number): number {
        return this.commit(ctx, {
            name: 'migrate',
            checks: ADMIN_CHECKS,
            countsFailure: false,
            run: (tx) => {
                this.gate.requireAdmin(tx.ctx.caller, tx.draft.admin);
                const previous = tx.draft.metrics.version;
                tx.enter('Mutating');
                tx.metrics.observeVersion(targetVersion);
                if (previous <= SCHEMA_VERSION && targetVersion > SCHEMA_VERSION && tx.draft.migratedAt === null) {
                    tx.draft.migratedAt = tx.ctx.timestamp;
                }
                return tx.draft.metrics.version;
            },
        });
    }

    executeBatch(ctx: CallContext, operations: readonly BatchOperation[], mode: BatchMode = 'atomic'): BatchResult {
        if (operations.length > MAX_BATCH_SIZE) {
            throw new LedgerError('BatchTooLarge', `Batch exceeds ${MAX_BATCH_SIZE} operations`, { size: String(operations.length) });
        }

        let current = this.state;
        let countedFailures = 0;
        const results: OperationOutcome[] = [];

        for (const operation of operations) {
            const plan = this.planFor(operation);
            try {
                const { state, value } = this.apply(current, ctx, plan);
                current = state;
                results.push({ type: operation.type, ok: true, value });
            } catch (error) {
                if (!isLedgerError(error) || error.fatal) {
                    return this.abort(plan, error);
                }
                results.push({ type: operation.type, ok: false, kind: error.kind, error: error.message });
                if (plan.countsFailure) countedFailures++;
                if (mode === 'atomic') break;
            }
        }

        const failed = results.filter((r) => !r.ok).length;
        const committed = !(mode === 'atomic' && failed > 0);
        const base = committed ? current : this.state;

        if (countedFailures > 0) {
            this.state = this.withFailuresRecorded(base, countedFailures);
        } else {
            this.state = base;
        }
        this.persist();

        if (committed) {
            log.info(`📦 Batch (${mode}) committed: ${results.length - failed} ok, ${failed} failed`);
        } else {
            log.warn(`📦 Atomic batch rolled back after ${failed} failure(s)`);
        }

        return { mode, succeeded: results.length - failed, failed, committed, results };
    }

    // ========== READ-ONLY QUERIES ==========

    balanceOf(user: string, asset: Asset): bigint {
        return new BalanceLedger(this.state).read(user, asset);
    }

    balancesOf(user: string): Array<{ asset: Asset; amount: bigint }> {
        return new BalanceLedger(this.state).balancesOf(user).map((b) => ({ asset: assetFromKey(b.asset), amount: b.amount }));
    }

    getPool(): PoolView {
        const pool = this.state.pool;
        return {
            assetA: assetFromKey(pool.assetA),
            assetB: assetFromKey(pool.assetB),
            reserveA: pool.reserveA,
            reserveB: pool.reserveB,
            k: pool.reserveA * pool.reserveB,
            lpTotalSupply: pool.lpTotalSupply,
            lpBurned: pool.lpBurned,
            lpFeesAccumulated: pool.lpFeesAccumulated,
            lastSwapAt: pool.lastSwapAt,
        };
    }

    getLpPosition(user: string): LpPosition {
        return new LiquidityPool(this.state).getPosition(user);
    }

    quoteSwap(from: Asset, amount: bigint): SwapQuote {
        return new LiquidityPool(this.state).quoteSwap(from, amount, this.swapFees);
    }

    getMetrics(): MetricsState {
        return { ...this.state.metrics };
    }

    getTotals(): LedgerTotals {
        return {
            totalMinted: this.state.totalMinted,
            feeAccumulator: this.state.feeAccumulator,
            tradingVolume: this.state.tradingVolume,
            totalUsers: this.state.userIndex.length,
        };
    }

    getAdmin(): string {
        return this.state.admin;
    }

    isPaused(): boolean {
        return this.state.paused;
    }

    getHaltReason(): string | null {
        return this.state.haltReason;
    }

    getMigratedAt(): number | null {
        return this.state.migratedAt;
    }

    getFeeConfig(): { swapFeeBps: number; transferFeeBps: number; routing: FeeRouting } {
        return { swapFeeBps: this.swapFees.feeBps, transferFeeBps: this.transferFees.feeBps, routing: this.routing };
    }

    /** Newest first. */
    getUserTransactions(user: string, limit: number = 10): TradeView[] {
        if (!Number.isInteger(limit) || limit < 0) {
            throw new LedgerError('InvalidAmount', 'limit must be a non-negative integer', { field: 'limit' });
        }
        const records = this.state.history.get(user) ?? [];
        return records
            .slice()
            .reverse()
            .slice(0, limit)
            .map((r) => ({
                timestamp: r.timestamp,
                fromAsset: assetFromKey(r.fromAsset),
                toAsset: assetFromKey(r.toAsset),
                fromAmount: r.fromAmount,
                toAmount: r.toAmount,
                rate: r.rate,
            }));
    }

    /** Snapshot-only invariants over the committed state. */
    audit(): InvariantResult[] {
        return this.checker.audit(this.state);
    }

    snapshot(): LedgerState {
        return cloneState(this.state);
    }

    // ========== PLANS ==========

    private planFor(operation: BatchOperation): OperationPlan<TransferResult | SwapResult | AddLiquidityResult | RemoveLiquidityResult | bigint> {
        switch (operation.type) {
            case 'mint':
                return this.mintPlan(operation.request);
            case 'transfer':
                return this.transferPlan(operation.request);
            case 'swap':
                return this.swapPlan(operation.request);
            case 'addLiquidity':
                return this.addLiquidityPlan(operation.request);
            case 'removeLiquidity':
                return this.removeLiquidityPlan(operation.request);
        }
    }

    private mintPlan(request: MintRequest): OperationPlan<bigint> {
        return {
            name: 'mint',
            checks: BALANCE_CHECKS,
            countsFailure: false,
            run: (tx) => {
                this.gate.requireAdmin(tx.ctx.caller, tx.draft.admin);
                const to = assertIdentity(request.to, 'to');
                requirePositive(request.amount);
                tx.trace.permit(to);

                tx.enter('Computing');
                const totalMinted = CheckedMath.add(tx.draft.totalMinted, request.amount);

                tx.enter('Mutating');
                tx.ledger.credit(to, request.asset, request.amount);
                tx.draft.totalMinted = totalMinted;
                return tx.ledger.read(to, request.asset);
            },
        };
    }

    private transferPlan(request: TransferRequest): OperationPlan<TransferResult> {
        return {
            name: 'transfer',
            checks: [...BALANCE_CHECKS, 'fee-bounds'],
            countsFailure: false,
            run: (tx) => {
                const user = assertIdentity(request.user, 'user');
                this.gate.require(tx.ctx.caller, user, tx.trace);
                this.requireTrading(tx.draft);
                requirePositive(request.amount);
                this.requireBalance(tx.ledger, user, request.fromAsset, request.amount);

                tx.enter('Computing');
                const fee = this.transferFees.compute(request.amount);
                const credited = request.amount - fee;
                tx.fee = { amount: request.amount, fee };

                tx.enter('Mutating');
                tx.ledger.debit(user, request.fromAsset, request.amount);
                tx.ledger.credit(user, request.toAsset, credited);
                tx.draft.feeAccumulator = CheckedMath.add(tx.draft.feeAccumulator, fee);

                return { debited: request.amount, credited, fee };
            },
        };
    }

    private swapPlan(request: SwapRequest): OperationPlan<SwapResult> {
        return {
            name: 'swap',
            checks: [...BALANCE_CHECKS, 'constant-product', 'fee-bounds'],
            countsFailure: true,
            run: (tx) => {
                const user = assertIdentity(request.user ?? tx.ctx.caller, 'user');
                this.gate.require(tx.ctx.caller, user, tx.trace);
                this.requireTrading(tx.draft);
                requirePositive(request.amount);
                if (sameAsset(request.from, request.to)) {
                    throw new LedgerError('SameAssetSwap', 'Cannot swap an asset for itself');
                }
                const fromSide = tx.pool.sideOf(request.from);
                const toSide = tx.pool.sideOf(request.to);
                if (!fromSide || !toSide) {
                    throw new LedgerError('InvalidSwapPair', `${assetLabel(request.from)}/${assetLabel(request.to)} is not the pool pair`);
                }
                this.requireBalance(tx.ledger, user, request.from, request.amount);
                if (!tx.pool.hasLiquidity()) {
                    throw new LedgerError('InsufficientLiquidity', 'Pool has no liquidity');
                }

                tx.enter('Computing');
                const quote = tx.pool.quoteSwap(request.from, request.amount, this.swapFees);
                const minOut = request.minAmountOut ?? 0n;
                if (quote.amountOut < minOut) {
                    throw new LedgerError('SlippageExceeded', `Slippage exceeded. Min: ${minOut}, got: ${quote.amountOut}`, {
                        minAmountOut: minOut.toString(),
                        amountOut: quote.amountOut.toString(),
                    });
                }

                tx.enter('Mutating');
                tx.ledger.debit(user, request.from, request.amount);
                tx.ledger.credit(user, request.to, quote.amountOut);
                const outcome = tx.pool.applySwap(quote, this.routing, tx.ctx.timestamp);
                tx.draft.feeAccumulator = CheckedMath.add(tx.draft.feeAccumulator, outcome.feeToAccumulator);
                tx.draft.tradingVolume = CheckedMath.add(tx.draft.tradingVolume, request.amount);
                tx.metrics.recordTrade();
                this.appendHistory(tx.draft, user, {
                    timestamp: tx.ctx.timestamp,
                    fromAsset: assetKey(request.from),
                    toAsset: assetKey(request.to),
                    fromAmount: request.amount,
                    toAmount: quote.amountOut,
                    rate: (quote.amountOut * RATE_SCALE) / request.amount,
                });

                tx.fee = { amount: request.amount, fee: quote.fee };
                tx.curve = { before: outcome.curveBefore, after: outcome.curveAfter };

                return {
                    amountIn: request.amount,
                    amountOut: quote.amountOut,
                    fee: quote.fee,
                    priceImpactBps: quote.priceImpactBps,
                };
            },
        };
    }

    private addLiquidityPlan(request: AddLiquidityRequest): OperationPlan<AddLiquidityResult> {
        return {
            name: 'addLiquidity',
            checks: [...BALANCE_CHECKS, 'lp-conservation'],
            countsFailure: false,
            run: (tx) => {
                const user = assertIdentity(request.user, 'user');
                this.gate.require(tx.ctx.caller, user, tx.trace);
                this.requireTrading(tx.draft);
                requirePositive(request.amountA, 'amountA');
                requirePositive(request.amountB, 'amountB');
                this.requireBalance(tx.ledger, user, tx.pool.assetA, request.amountA);
                this.requireBalance(tx.ledger, user, tx.pool.assetB, request.amountB);

                tx.enter('Mutating');
                tx.ledger.debit(user, tx.pool.assetA, request.amountA);
                tx.ledger.debit(user, tx.pool.assetB, request.amountB);
                return tx.pool.deposit(user, request.amountA, request.amountB);
            },
        };
    }

    private removeLiquidityPlan(request: RemoveLiquidityRequest): OperationPlan<RemoveLiquidityResult> {
        return {
            name: 'removeLiquidity',
            checks: [...BALANCE_CHECKS, 'lp-conservation'],
            countsFailure: false,
            run: (tx) => {
                const user = assertIdentity(request.user, 'user');
                this.gate.require(tx.ctx.caller, user, tx.trace);
                this.requireTrading(tx.draft);
                requirePositive(request.lpAmount, 'lpAmount');

                tx.enter('Mutating');
                const result = tx.pool.withdraw(user, request.lpAmount);
                tx.ledger.credit(user, tx.pool.assetA, result.amountA);
                tx.ledger.credit(user, tx.pool.assetB, result.amountB);
                return result;
            },
        };
    }

    // ========== TRANSACTION MACHINERY ==========

    /** Run a plan against `base` without touching it. */
    private apply<T>(base: LedgerState, ctx: CallContext, plan: OperationPlan<T>): { state: LedgerState; value: T } {
        const tx = new Transaction(plan.name, base, ctx);
        try {
            tx.metrics.observeTimestamp(ctx.timestamp);
            const value = plan.run(tx);

            tx.enter('Checking');
            const violation = firstViolation(plan.checks.map((name) => this.evaluate(name, tx)));
            if (violation) {
                throw new LedgerError('InvariantViolation', `Invariant ${violation.invariant} violated: ${violation.detail ?? 'no detail'}`, {
                    invariant: violation.invariant,
                    expected: violation.expected ?? '',
                    actual: violation.actual ?? '',
                });
            }

            tx.enter('Committed');
            return { state: tx.draft, value };
        } catch (error) {
            if (isLedgerError(error) && !error.phase) error.phase = tx.phase;
            log.debug(`${plan.name} -> Aborted`);
            throw error;
        }
    }

    private commit<T>(ctx: CallContext, plan: OperationPlan<T>): T {
        let result: { state: LedgerState; value: T };
        try {
            result = this.apply(this.state, ctx, plan);
        } catch (error) {
            return this.abort(plan, error);
        }
        this.state = result.state;
        this.persist();
        log.info(`✅ ${plan.name} committed (caller ${shortId(ctx.caller)})`);
        return result.value;
    }

    private abort<T>(plan: OperationPlan<T>, error: unknown): never {
        if (!isLedgerError(error)) {
            log.error(`${plan.name} aborted by unexpected error`, error);
            throw error;
        }

        if (error.kind === 'InvariantViolation') {
            this.halt(error);
        } else if (error.fatal) {
            log.error(`${plan.name} aborted [${error.kind}] at ${error.phase ?? 'Validating'}: ${error.message}`);
        } else {
            if (plan.countsFailure) {
                this.state = this.withFailuresRecorded(this.state, 1);
                this.persist();
            }
            log.warn(`${plan.name} aborted [${error.kind}]: ${error.message}`);
        }
        throw error;
    }

    /** Stop-the-world: pause every trading path until the admin resumes. */
    private halt(error: LedgerError): void {
        const next = cloneState(this.state);
        next.paused = true;
        next.haltReason = error.message;
        this.state = next;
        this.persist();
        log.error(`🛑 ${error.message} (phase ${error.phase ?? 'Checking'}). Trading halted.`);
    }

    private withFailuresRecorded(base: LedgerState, count: number): LedgerState {
        const next = cloneState(base);
        const metrics = new MetricsTracker(next.metrics);
        for (let i = 0; i < count; i++) metrics.recordFailure();
        return next;
    }

    private evaluate(name: InvariantName, tx: Transaction): InvariantResult {
        switch (name) {
            case 'conservation':
                return this.checker.checkConservation(tx.draft);
            case 'non-negative-balances':
                return this.checker.checkNonNegativeBalances(tx.draft);
            case 'authorization':
                return this.checker.checkAuthorization(tx.before, tx.draft, tx.trace);
            case 'monotonicity':
                return this.checker.checkMonotonicity(tx.before, tx.draft);
            case 'lp-conservation':
                return this.checker.checkLpConservation(tx.draft);
            case 'fee-bounds':
                return tx.fee
                    ? this.checker.checkFeeBounds(tx.fee.amount, tx.fee.fee)
                    : { invariant: name, holds: false, detail: 'No fee recorded' };
            case 'constant-product':
                return tx.curve
                    ? this.checker.checkConstantProduct(tx.curve.before, tx.curve.after)
                    : { invariant: name, holds: false, detail: 'No curve recorded' };
        }
    }

    private requireTrading(state: LedgerState): void {
        if (state.paused) {
            const reason = state.haltReason ? ` (halted: ${state.haltReason})` : '';
            throw new LedgerError('TradingPaused', `Trading is paused${reason}`);
        }
    }

    private requireBalance(ledger: BalanceLedger, user: string, asset: Asset, amount: bigint): void {
        const available = ledger.read(user, asset);
        if (available < amount) {
            throw new LedgerError('InsufficientBalance', `Insufficient ${assetLabel(asset)} balance`, {
                asset: assetLabel(asset),
                available: available.toString(),
                requested: amount.toString(),
            });
        }
    }

    private appendHistory(state: LedgerState, user: string, record: TradeRecord): void {
        const records = state.history.get(user) ?? [];
        records.push(record);
        if (records.length > MAX_HISTORY_PER_USER) {
            records.splice(0, records.length - MAX_HISTORY_PER_USER);
        }
        state.history.set(user, records);
    }

    private persist(): void {
        this.store?.save(this.state);
    }
}
