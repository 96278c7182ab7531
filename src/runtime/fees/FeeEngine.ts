/**
 * Fee Engine
 *
 * fee = floor(amount * feeBps / 10000)
 *
 * The configured rate can never exceed MAX_FEE_BPS, so for every amount
 * 0 <= fee <= floor(amount * MAX_FEE_BPS / 10000). Monotonic in amount.
 */

import { LedgerError } from '../../protocol/errors/LedgerError.js';
import { BPS_DENOMINATOR, DEFAULT_SWAP_FEE_BPS, MAX_FEE_BPS } from '../../protocol/params/ledger.js';

export class FeeEngine {
    readonly feeBps: number;
    private readonly rate: bigint;

    constructor(feeBps: number = DEFAULT_SWAP_FEE_BPS) {
        if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_FEE_BPS) {
            throw new LedgerError('FeeConfigurationInvalid', `Fee must be an integer in [0, ${MAX_FEE_BPS}] bps, got ${feeBps}`, {
                feeBps: String(feeBps),
            });
        }
        this.feeBps = feeBps;
        this.rate = BigInt(feeBps);
    }

    compute(amount: bigint): bigint {
        if (amount < 0n) {
            throw new LedgerError('InvalidAmount', 'Fee amount must be non-negative');
        }
        return (amount * this.rate) / BPS_DENOMINATOR;
    }

    /** Largest fee any configuration may charge on `amount`. */
    static ceiling(amount: bigint): bigint {
        if (amount <= 0n) return 0n;
        return (amount * BigInt(MAX_FEE_BPS)) / BPS_DENOMINATOR;
    }
}
