/**
 * Invariant Checker
 *
 * Read-only predicates over ledger snapshots. Each returns an
 * InvariantResult; none of them mutates what it is given.
 *
 *   conservation           Σ balances + reserves + fee accumulator == total minted
 *   authorization          only permitted identities' accounts changed
 *   monotonicity           version, clock, counters and totals never decrease
 *   fee-bounds             0 <= fee <= 1% of amount
 *   constant-product       curve product after <= before, reserves >= 0
 *   non-negative-balances  every balance >= 0
 *   lp-conservation        Σ LP positions + burned LP == LP supply
 */

import { FeeEngine } from '../fees/FeeEngine.js';
import type { AuthorizationTrace } from '../auth/AuthorizationGate.js';
import type { LedgerState } from '../ledger/LedgerState.js';
import type { CurveReserves } from '../pool/LiquidityPool.js';

export type InvariantName =
    | 'conservation'
    | 'authorization'
    | 'monotonicity'
    | 'fee-bounds'
    | 'constant-product'
    | 'non-negative-balances'
    | 'lp-conservation';

export interface InvariantResult {
    invariant: InvariantName;
    holds: boolean;
    detail?: string;
    expected?: string;
    actual?: string;
}

function pass(invariant: InvariantName): InvariantResult {
    return { invariant, holds: true };
}

function fail(invariant: InvariantName, detail: string, expected?: bigint | number, actual?: bigint | number): InvariantResult {
    return {
        invariant,
        holds: false,
        detail,
        expected: expected === undefined ? undefined : expected.toString(),
        actual: actual === undefined ? undefined : actual.toString(),
    };
}

function sumBalances(state: LedgerState): bigint {
    let sum = 0n;
    for (const user of state.userIndex) {
        const row = state.balances.get(user);
        for (const key of state.assetIndex) {
            sum += row?.get(key) ?? 0n;
        }
    }
    return sum;
}

function sumLpPositions(state: LedgerState): bigint {
    let sum = 0n;
    for (const provider of state.lpIndex) {
        sum += state.lpPositions.get(provider)?.lpTokens ?? 0n;
    }
    return sum;
}

/** Fingerprint of everything an identity owns, for change detection. */
function accountFingerprint(state: LedgerState, user: string): string {
    const row = state.balances.get(user);
    const parts = state.assetIndex.map((key) => `${key}=${row?.get(key) ?? 0n}`);
    const lp = state.lpPositions.get(user);
    parts.push(`lp=${lp?.lpTokens ?? 0n}/${lp?.depositedA ?? 0n}/${lp?.depositedB ?? 0n}`);
    return parts.join(';');
}

export class InvariantChecker {
    checkConservation(state: LedgerState): InvariantResult {
        const total = sumBalances(state) + state.pool.reserveA + state.pool.reserveB + state.feeAccumulator;
        if (total !== state.totalMinted) {
            return fail('conservation', 'Tracked value does not match total minted', state.totalMinted, total);
        }
        return pass('conservation');
    }

    checkAuthorization(before: LedgerState, after: LedgerState, trace: AuthorizationTrace): InvariantResult {
        for (const user of after.userIndex.concat(after.lpIndex)) {
            if (trace.allows(user)) continue;
            if (accountFingerprint(before, user) !== accountFingerprint(after, user)) {
                return fail('authorization', `Account ${user} changed without authorization`);
            }
        }
        return pass('authorization');
    }

    checkMonotonicity(before: LedgerState, after: LedgerState): InvariantResult {
        const numeric: Array<[string, number, number]> = [
            ['version', before.metrics.version, after.metrics.version],
            ['lastTimestamp', before.metrics.lastTimestamp, after.metrics.lastTimestamp],
            ['tradeCount', before.metrics.tradeCount, after.metrics.tradeCount],
            ['failedOrderCount', before.metrics.failedOrderCount, after.metrics.failedOrderCount],
            ['balancesUpdated', before.metrics.balancesUpdated, after.metrics.balancesUpdated],
            ['userIndex', before.userIndex.length, after.userIndex.length],
            ['assetIndex', before.assetIndex.length, after.assetIndex.length],
            ['lpIndex', before.lpIndex.length, after.lpIndex.length],
        ];
        for (const [name, prev, next] of numeric) {
            if (next < prev) return fail('monotonicity', `${name} decreased`, prev, next);
        }

        const amounts: Array<[string, bigint, bigint]> = [
            ['totalMinted', before.totalMinted, after.totalMinted],
            ['feeAccumulator', before.feeAccumulator, after.feeAccumulator],
            ['lpBurned', before.pool.lpBurned, after.pool.lpBurned],
            ['tradingVolume', before.tradingVolume, after.tradingVolume],
        ];
        for (const [name, prev, next] of amounts) {
            if (next < prev) return fail('monotonicity', `${name} decreased`, prev, next);
        }
        return pass('monotonicity');
    }

    checkFeeBounds(amount: bigint, fee: bigint): InvariantResult {
        if (fee < 0n) return fail('fee-bounds', 'Negative fee', 0n, fee);
        const ceiling = FeeEngine.ceiling(amount);
        if (fee > ceiling) return fail('fee-bounds', 'Fee above the 1% ceiling', ceiling, fee);
        return pass('fee-bounds');
    }

    checkConstantProduct(before: CurveReserves, after: CurveReserves): InvariantResult {
        if (after.a < 0n || after.b < 0n) {
            return fail('constant-product', 'Negative reserve');
        }
        const kBefore = before.a * before.b;
        const kAfter = after.a * after.b;
        if (kAfter > kBefore) {
            return fail('constant-product', 'Curve product increased', kBefore, kAfter);
        }
        return pass('constant-product');
    }

    checkNonNegativeBalances(state: LedgerState): InvariantResult {
        for (const user of state.userIndex) {
            const row = state.balances.get(user);
            for (const key of state.assetIndex) {
                const amount = row?.get(key) ?? 0n;
                if (amount < 0n) return fail('non-negative-balances', `Negative ${key} balance for ${user}`, 0n, amount);
            }
        }
        for (const provider of state.lpIndex) {
            const lp = state.lpPositions.get(provider)?.lpTokens ?? 0n;
            if (lp < 0n) return fail('non-negative-balances', `Negative LP position for ${provider}`, 0n, lp);
        }
        if (state.pool.reserveA < 0n || state.pool.reserveB < 0n) {
            return fail('non-negative-balances', 'Negative pool reserve');
        }
        return pass('non-negative-balances');
    }

    checkLpConservation(state: LedgerState): InvariantResult {
        const live = sumLpPositions(state);
        const supply = state.pool.lpTotalSupply;
        if (live > supply) {
            return fail('lp-conservation', 'LP positions exceed total supply', supply, live);
        }
        if (live + state.pool.lpBurned !== supply) {
            return fail('lp-conservation', 'LP supply does not match positions plus burned', supply, live + state.pool.lpBurned);
        }
        return pass('lp-conservation');
    }

    /** Every predicate that needs only the current snapshot. */
    audit(state: LedgerState): InvariantResult[] {
        return [
            this.checkConservation(state),
            this.checkNonNegativeBalances(state),
            this.checkLpConservation(state),
        ];
    }
}

export function firstViolation(results: InvariantResult[]): InvariantResult | undefined {
    return results.find((r) => !r.holds);
}
