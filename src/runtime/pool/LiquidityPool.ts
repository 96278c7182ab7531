/**
 * Liquidity Pool - Constant Product AMM
 *
 * Formula: x * y = k
 *
 * Swap pricing (integer math only):
 *   fee     = FeeEngine.compute(amountIn)
 *   effIn   = amountIn - fee                 (fee withheld from the priced curve)
 *   x1      = x0 + effIn
 *   out     = y0 - floor(x0 * y0 / x1)       (pre-fee k0 stays the numerator)
 *
 * The floor division means (x0 + effIn) * (y0 - out) <= k0 for every input.
 * A quote whose out reaches y0 is rejected: no swap empties the output reserve.
 * Where the withheld fee goes is decided by FeeRouting.
 *
 * LP tokens: first deposit mints isqrt(a * b) and locks MINIMUM_LIQUIDITY
 * forever; later deposits mint the smaller proportional share.
 */

import { LedgerError } from '../../protocol/errors/LedgerError.js';
import { CheckedMath, isqrt, minBigInt } from '../../protocol/math/checked.js';
import { BPS_DENOMINATOR, MINIMUM_LIQUIDITY, type FeeRouting } from '../../protocol/params/ledger.js';
import { logger } from '../../protocol/utils/logger.js';
import { assetFromKey, assetKey, assetLabel, type Asset } from '../ledger/Asset.js';
import type { LedgerState, LpPosition } from '../ledger/LedgerState.js';
import type { FeeEngine } from '../fees/FeeEngine.js';

const log = logger.child('Pool');

export type PoolSide = 'A' | 'B';

export interface CurveReserves {
    a: bigint;
    b: bigint;
}

export interface SwapQuote {
    side: PoolSide;
    amountIn: bigint;
    fee: bigint;
    effectiveIn: bigint;
    amountOut: bigint;
    priceImpactBps: number;
}

export interface SwapOutcome {
    quote: SwapQuote;
    /** Fee moved out of the pool into the global accumulator (accumulator routing). */
    feeToAccumulator: bigint;
    /** Reserves as priced by the curve, i.e. without the retained fee. */
    curveBefore: CurveReserves;
    curveAfter: CurveReserves;
}

export interface DepositResult {
    lpMinted: bigint;
    lpLocked: bigint;
}

export interface WithdrawResult {
    lpBurned: bigint;
    amountA: bigint;
    amountB: bigint;
}

export class LiquidityPool {
    constructor(private readonly state: LedgerState) {}

    get assetA(): Asset {
        return assetFromKey(this.state.pool.assetA);
    }

    get assetB(): Asset {
        return assetFromKey(this.state.pool.assetB);
    }

    /** Which side of the pair an asset is, or null when it is not in the pool. */
    sideOf(asset: Asset): PoolSide | null {
        const key = assetKey(asset);
        if (key === this.state.pool.assetA) return 'A';
        if (key === this.state.pool.assetB) return 'B';
        return null;
    }

    hasLiquidity(): boolean {
        return this.state.pool.reserveA > 0n && this.state.pool.reserveB > 0n;
    }

    curve(): CurveReserves {
        return { a: this.state.pool.reserveA, b: this.state.pool.reserveB };
    }

    // ========== SWAP ==========

    /**
     * Read-only quote. Zero output is a valid quote: the engine does not
     * reject swaps that are too small to buy anything.
     */
    quoteSwap(input: Asset, amountIn: bigint, fees: FeeEngine): SwapQuote {
        const side = this.sideOf(input);
        if (!side) {
            throw new LedgerError('InvalidSwapPair', `${assetLabel(input)} is not in the pool`, { asset: assetLabel(input) });
        }
        if (amountIn <= 0n) {
            throw new LedgerError('InvalidAmount', 'Amount must be positive');
        }

        const [x0, y0] = this.orientedReserves(side);
        if (x0 <= 0n || y0 <= 0n) {
            throw new LedgerError('InsufficientLiquidity', 'Pool has no liquidity');
        }

        const fee = fees.compute(amountIn);
        const effectiveIn = amountIn - fee;
        const k0 = CheckedMath.mul(x0, y0);
        const x1 = CheckedMath.add(x0, effectiveIn);
        const amountOut = y0 - CheckedMath.div(k0, x1);
        if (amountOut >= y0) {
            throw new LedgerError('InsufficientLiquidity', 'Swap would drain the output reserve', {
                reserve: y0.toString(),
                amountOut: amountOut.toString(),
            });
        }

        return {
            side,
            amountIn,
            fee,
            effectiveIn,
            amountOut,
            priceImpactBps: priceImpactBps(x0, y0, amountIn, amountOut),
        };
    }

    applySwap(quote: SwapQuote, routing: FeeRouting, timestamp: number): SwapOutcome {
        const pool = this.state.pool;
        const curveBefore = this.curve();
        const [x0, y0] = this.orientedReserves(quote.side);

        const retained = routing === 'pool' ? quote.fee : 0n;
        const newIn = CheckedMath.add(x0, quote.effectiveIn + retained);
        const newOut = y0 - quote.amountOut;
        if (newOut <= 0n) {
            throw new LedgerError('InsufficientLiquidity', 'Swap would drain the output reserve');
        }

        if (quote.side === 'A') {
            pool.reserveA = newIn;
            pool.reserveB = newOut;
        } else {
            pool.reserveB = newIn;
            pool.reserveA = newOut;
        }
        pool.lpFeesAccumulated = CheckedMath.add(pool.lpFeesAccumulated, retained);
        pool.lastSwapAt = timestamp;

        const curveIn = x0 + quote.effectiveIn;
        const curveAfter: CurveReserves = quote.side === 'A'
            ? { a: curveIn, b: newOut }
            : { a: newOut, b: curveIn };

        log.debug(`💱 Swap ${quote.side}: ${quote.amountIn} in (fee ${quote.fee}) -> ${quote.amountOut} out`);

        return {
            quote,
            feeToAccumulator: routing === 'accumulator' ? quote.fee : 0n,
            curveBefore,
            curveAfter,
        };
    }

    // ========== LIQUIDITY ==========

    deposit(provider: string, amountA: bigint, amountB: bigint): DepositResult {
        if (amountA <= 0n || amountB <= 0n) {
            throw new LedgerError('InvalidAmount', 'Amounts must be positive');
        }

        const pool = this.state.pool;
        let lpMinted: bigint;
        let lpLocked = 0n;

        if (pool.lpTotalSupply === 0n) {
            const initial = isqrt(CheckedMath.mul(amountA, amountB));
            if (initial <= MINIMUM_LIQUIDITY) {
                throw new LedgerError('InsufficientLiquidity', `Initial liquidity too low. Minimum: ${MINIMUM_LIQUIDITY + 1n} LP`);
            }
            lpLocked = MINIMUM_LIQUIDITY;
            lpMinted = initial - MINIMUM_LIQUIDITY;
        } else {
            if (pool.reserveA <= 0n || pool.reserveB <= 0n) {
                throw new LedgerError('InsufficientLiquidity', 'Pool reserves are empty');
            }
            const shareA = CheckedMath.div(CheckedMath.mul(amountA, pool.lpTotalSupply), pool.reserveA);
            const shareB = CheckedMath.div(CheckedMath.mul(amountB, pool.lpTotalSupply), pool.reserveB);
            lpMinted = minBigInt(shareA, shareB);
            if (lpMinted <= 0n) {
                throw new LedgerError('InsufficientLiquidity', 'Deposit too small to mint LP tokens');
            }
        }

        pool.reserveA = CheckedMath.add(pool.reserveA, amountA);
        pool.reserveB = CheckedMath.add(pool.reserveB, amountB);
        pool.lpTotalSupply = CheckedMath.add(pool.lpTotalSupply, lpMinted + lpLocked);
        pool.lpBurned = CheckedMath.add(pool.lpBurned, lpLocked);

        const position = this.positionFor(provider);
        position.lpTokens = CheckedMath.add(position.lpTokens, lpMinted);
        position.depositedA = CheckedMath.add(position.depositedA, amountA);
        position.depositedB = CheckedMath.add(position.depositedB, amountB);

        log.debug(`➕ Liquidity added: ${amountA} + ${amountB} = ${lpMinted} LP`);
        return { lpMinted, lpLocked };
    }

    withdraw(provider: string, lpAmount: bigint): WithdrawResult {
        if (lpAmount <= 0n) {
            throw new LedgerError('InvalidAmount', 'LP amount must be positive');
        }

        const pool = this.state.pool;
        const position = this.state.lpPositions.get(provider);
        const held = position?.lpTokens ?? 0n;
        if (!position || lpAmount > held) {
            throw new LedgerError('InsufficientBalance', 'Insufficient LP balance', {
                available: held.toString(),
                requested: lpAmount.toString(),
            });
        }

        const amountA = CheckedMath.div(CheckedMath.mul(lpAmount, pool.reserveA), pool.lpTotalSupply);
        const amountB = CheckedMath.div(CheckedMath.mul(lpAmount, pool.reserveB), pool.lpTotalSupply);
        if (amountA <= 0n || amountB <= 0n) {
            throw new LedgerError('InsufficientLiquidity', 'Withdrawal too small to return both assets');
        }

        pool.reserveA = CheckedMath.sub(pool.reserveA, amountA);
        pool.reserveB = CheckedMath.sub(pool.reserveB, amountB);
        pool.lpTotalSupply = CheckedMath.sub(pool.lpTotalSupply, lpAmount);

        position.lpTokens -= lpAmount;
        position.depositedA = position.depositedA > amountA ? position.depositedA - amountA : 0n;
        position.depositedB = position.depositedB > amountB ? position.depositedB - amountB : 0n;

        log.debug(`➖ Liquidity removed: ${lpAmount} LP -> ${amountA} + ${amountB}`);
        return { lpBurned: lpAmount, amountA, amountB };
    }

    getPosition(provider: string): LpPosition {
        const position = this.state.lpPositions.get(provider);
        return position ? { ...position } : { lpTokens: 0n, depositedA: 0n, depositedB: 0n };
    }

    /** Σ of every LP position, walking the provider index. */
    totalPositions(): bigint {
        let sum = 0n;
        for (const provider of this.state.lpIndex) {
            sum += this.state.lpPositions.get(provider)?.lpTokens ?? 0n;
        }
        return sum;
    }

    private positionFor(provider: string): LpPosition {
        let position = this.state.lpPositions.get(provider);
        if (!position) {
            position = { lpTokens: 0n, depositedA: 0n, depositedB: 0n };
            this.state.lpPositions.set(provider, position);
        }
        if (!this.state.lpIndex.includes(provider)) {
            this.state.lpIndex.push(provider);
        }
        return position;
    }

    /** [reserve of input side, reserve of output side] */
    private orientedReserves(side: PoolSide): [bigint, bigint] {
        const { reserveA, reserveB } = this.state.pool;
        return side === 'A' ? [reserveA, reserveB] : [reserveB, reserveA];
    }
}

/**
 * Price impact in bps: 1 - (out / in) / (y0 / x0), floored at zero.
 */
export function priceImpactBps(x0: bigint, y0: bigint, amountIn: bigint, amountOut: bigint): number {
    if (amountIn <= 0n || y0 <= 0n) return 0;
    const executedBps = (amountOut * x0 * BPS_DENOMINATOR) / (amountIn * y0);
    const impact = BPS_DENOMINATOR - executedBps;
    return impact > 0n ? Number(impact) : 0;
}
