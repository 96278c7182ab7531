import { describe, it, expect, beforeEach } from 'vitest';
import { BalanceLedger } from '../../src/runtime/ledger/BalanceLedger.js';
import { createGenesisState, type LedgerState } from '../../src/runtime/ledger/LedgerState.js';
import { NATIVE_XLM, customAsset } from '../../src/runtime/ledger/Asset.js';
import { LedgerError } from '../../src/protocol/errors/LedgerError.js';
import { MAX_AMOUNT } from '../../src/protocol/params/ledger.js';

const USDC = customAsset('USDCSIM');

describe('BalanceLedger', () => {
    let state: LedgerState;
    let ledger: BalanceLedger;

    beforeEach(() => {
        state = createGenesisState({ admin: 'admin' });
        ledger = new BalanceLedger(state);
    });

    it('reads zero for unknown accounts', () => {
        expect(ledger.read('nobody', NATIVE_XLM)).toBe(0n);
    });

    it('credits and debits', () => {
        ledger.credit('alice', NATIVE_XLM, 300n);
        ledger.debit('alice', NATIVE_XLM, 120n);
        expect(ledger.read('alice', NATIVE_XLM)).toBe(180n);
    });

    it('rejects a debit above the balance and leaves it unchanged', () => {
        ledger.credit('alice', NATIVE_XLM, 300n);
        let caught: unknown;
        try {
            ledger.debit('alice', NATIVE_XLM, 500n);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(LedgerError);
        if (caught instanceof LedgerError) {
            expect(caught.kind).toBe('InsufficientBalance');
            expect(caught.details).toEqual({ asset: 'XLM', available: '300', requested: '500' });
        }
        expect(ledger.read('alice', NATIVE_XLM)).toBe(300n);
    });

    it('rejects negative amounts', () => {
        expect(() => ledger.credit('alice', NATIVE_XLM, -1n)).toThrow('non-negative');
        expect(() => ledger.debit('alice', NATIVE_XLM, -1n)).toThrow('non-negative');
    });

    it('throws AmountOverflow instead of wrapping', () => {
        ledger.credit('alice', USDC, MAX_AMOUNT);
        expect(() => ledger.credit('alice', USDC, 1n)).toThrow('Overflow');
        expect(ledger.read('alice', USDC)).toBe(MAX_AMOUNT);
    });

    it('keeps append-only indexes and counts writes', () => {
        ledger.credit('alice', NATIVE_XLM, 10n);
        ledger.credit('bob', USDC, 5n);
        ledger.debit('alice', NATIVE_XLM, 10n);
        ledger.credit('alice', NATIVE_XLM, 0n);

        expect(state.userIndex).toEqual(['alice', 'bob']);
        expect(state.assetIndex).toEqual(['native', 'custom:USDCSIM']);
        expect(state.metrics.balancesUpdated).toBe(3);
    });

    it('totals every balance through the indexes', () => {
        ledger.credit('alice', NATIVE_XLM, 10n);
        ledger.credit('alice', USDC, 20n);
        ledger.credit('bob', USDC, 5n);
        expect(ledger.total()).toBe(35n);
        expect(ledger.balancesOf('alice')).toEqual([
            { asset: 'native', amount: 10n },
            { asset: 'custom:USDCSIM', amount: 20n },
        ]);
        expect(ledger.balancesOf('bob')).toEqual([{ asset: 'custom:USDCSIM', amount: 5n }]);
    });
});
