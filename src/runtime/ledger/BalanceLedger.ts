/**
 * Balance Ledger
 *
 * (user, asset) -> non-negative amount, over the balance book of a state draft.
 * Absence means zero. Debits never go below zero: they fail instead.
 *
 * The backing store is treated as unenumerable: totals are computed by walking
 * the append-only user and asset indexes, never the map itself.
 */

import { LedgerError } from '../../protocol/errors/LedgerError.js';
import { CheckedMath, saturatingIncrement } from '../../protocol/math/checked.js';
import { assetKey, assetLabel, type Asset, type AssetKey } from './Asset.js';
import type { LedgerState } from './LedgerState.js';

export class BalanceLedger {
    constructor(private readonly state: LedgerState) {}

    read(user: string, asset: Asset): bigint {
        return this.readKey(user, assetKey(asset));
    }

    readKey(user: string, key: AssetKey): bigint {
        return this.state.balances.get(user)?.get(key) ?? 0n;
    }

    credit(user: string, asset: Asset, amount: bigint): void {
        if (amount < 0n) {
            throw new LedgerError('InvalidAmount', 'Credit amount must be non-negative');
        }
        if (amount === 0n) return;

        const key = assetKey(asset);
        const next = CheckedMath.add(this.readKey(user, key), amount);
        this.write(user, key, next);
    }

    debit(user: string, asset: Asset, amount: bigint): void {
        if (amount < 0n) {
            throw new LedgerError('InvalidAmount', 'Debit amount must be non-negative');
        }
        if (amount === 0n) return;

        const key = assetKey(asset);
        const current = this.readKey(user, key);
        if (amount > current) {
            throw new LedgerError('InsufficientBalance', `Insufficient ${assetLabel(asset)} balance`, {
                asset: assetLabel(asset),
                available: current.toString(),
                requested: amount.toString(),
            });
        }
        this.write(user, key, current - amount);
    }

    /** Σ of every balance, walking userIndex × assetIndex. */
    total(): bigint {
        let sum = 0n;
        for (const user of this.state.userIndex) {
            for (const key of this.state.assetIndex) {
                sum = CheckedMath.add(sum, this.readKey(user, key));
            }
        }
        return sum;
    }

    /** Every balance of one user, in assetIndex order, zeros skipped. */
    balancesOf(user: string): Array<{ asset: AssetKey; amount: bigint }> {
        const result: Array<{ asset: AssetKey; amount: bigint }> = [];
        for (const key of this.state.assetIndex) {
            const amount = this.readKey(user, key);
            if (amount !== 0n) result.push({ asset: key, amount });
        }
        return result;
    }

    private write(user: string, key: AssetKey, amount: bigint): void {
        let row = this.state.balances.get(user);
        if (!row) {
            row = new Map();
            this.state.balances.set(user, row);
        }
        if (!this.state.userIndex.includes(user)) {
            this.state.userIndex.push(user);
        }
        if (!this.state.assetIndex.includes(key)) {
            this.state.assetIndex.push(key);
        }
        row.set(key, amount);
        this.state.metrics.balancesUpdated = saturatingIncrement(this.state.metrics.balancesUpdated).value;
    }
}
