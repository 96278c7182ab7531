import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { deserializeState, serializeState } from '../../src/protocol/storage/codec.js';
import { FileStateStore, MemoryStateStore } from '../../src/protocol/storage/StateStore.js';
import { LedgerError } from '../../src/protocol/errors/LedgerError.js';
import { OperationDispatcher } from '../../src/runtime/dispatcher/OperationDispatcher.js';
import { NATIVE_XLM, customAsset } from '../../src/runtime/ledger/Asset.js';
import { createGenesisState, type LedgerState } from '../../src/runtime/ledger/LedgerState.js';

const USDC = customAsset('USDCSIM');

function populatedState(): LedgerState {
    const dispatcher = new OperationDispatcher({ admin: 'admin' });
    dispatcher.mint({ caller: 'admin', timestamp: 1 }, { asset: NATIVE_XLM, to: 'lp', amount: 50_000n });
    dispatcher.mint({ caller: 'admin', timestamp: 2 }, { asset: USDC, to: 'lp', amount: 50_000n });
    dispatcher.addLiquidity({ caller: 'lp', timestamp: 3 }, { user: 'lp', amountA: 40_000n, amountB: 40_000n });
    dispatcher.swap({ caller: 'lp', timestamp: 4 }, { from: NATIVE_XLM, to: USDC, amount: 1000n });
    dispatcher.migrate({ caller: 'admin', timestamp: 5 }, 2);
    return dispatcher.snapshot();
}

function corruptField(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        if (error instanceof LedgerError && error.kind === 'CorruptState') return error.details?.field ?? error.message;
        throw error;
    }
    return undefined;
}

describe('state codec', () => {
    it('survives a trip through JSON text', () => {
        const state = populatedState();
        const text = JSON.stringify(serializeState(state));
        expect(deserializeState(JSON.parse(text))).toEqual(state);
    });

    it('keeps users whose names collide with object prototype keys', () => {
        const store = new MemoryStateStore();
        const dispatcher = new OperationDispatcher({ admin: 'admin', store });
        dispatcher.mint({ caller: 'admin', timestamp: 1 }, { asset: NATIVE_XLM, to: '__proto__', amount: 500n });
        dispatcher.mint({ caller: 'admin', timestamp: 2 }, { asset: NATIVE_XLM, to: 'constructor', amount: 200n });

        expect(Object.keys(store.peek()?.balances ?? {})).toEqual(['__proto__', 'constructor']);
        const text = JSON.stringify(store.peek());
        expect(deserializeState(JSON.parse(text))).toEqual(dispatcher.snapshot());

        const reloaded = new OperationDispatcher({ admin: 'admin', store });
        expect(reloaded.balanceOf('__proto__', NATIVE_XLM)).toBe(500n);
        expect(reloaded.balanceOf('constructor', NATIVE_XLM)).toBe(200n);
    });

    it('writes bigints as decimal strings', () => {
        const blob = serializeState(populatedState());
        expect(blob.totalMinted).toBe('100000');
        expect(blob.balances.lp.native).toBe('9000');
        expect(blob.pool.lpBurned).toBe('1000');
        expect(blob.migratedAt).toBe(5);
    });

    it('names the malformed field', () => {
        const blob = serializeState(createGenesisState({ admin: 'admin' }));
        expect(corruptField(() => deserializeState(null))).toBe('root');
        expect(corruptField(() => deserializeState({ ...blob, totalMinted: '1.5' }))).toBe('totalMinted');
        expect(corruptField(() => deserializeState({ ...blob, paused: 'no' }))).toBe('paused');
        expect(corruptField(() => deserializeState({ ...blob, balances: { alice: { native: 12 } } }))).toBe('balances.alice.native');
        expect(corruptField(() => deserializeState({ ...blob, userIndex: ['a', 3] }))).toBe('userIndex[1]');
        expect(corruptField(() => deserializeState({ ...blob, metrics: { ...blob.metrics, version: Number.POSITIVE_INFINITY } }))).toBe('metrics.version');
    });
});

describe('FileStateStore', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'swap-ledger-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('returns null before the first save', () => {
        expect(new FileStateStore(dir).load()).toBeNull();
    });

    it('saves and loads the state blob', () => {
        const store = new FileStateStore(dir, 'state.json');
        const state = populatedState();
        store.save(state);
        expect(store.location).toBe(path.join(dir, 'state.json'));
        expect(fs.existsSync(`${store.location}.tmp`)).toBe(false);
        expect(new FileStateStore(dir, 'state.json').load()).toEqual(state);
    });

    it('creates the data directory', () => {
        const nested = path.join(dir, 'a', 'b');
        new FileStateStore(nested);
        expect(fs.existsSync(nested)).toBe(true);
    });

    it('rejects a file that is not JSON', () => {
        fs.writeFileSync(path.join(dir, 'ledger.json'), '{ not json');
        const error = corruptField(() => new FileStateStore(dir).load());
        expect(error).toBe(`Unreadable state file ${path.join(dir, 'ledger.json')}`);
    });
});

describe('MemoryStateStore', () => {
    it('counts saves and decodes a fresh copy on every load', () => {
        const store = new MemoryStateStore();
        expect(store.load()).toBeNull();

        const state = populatedState();
        store.save(state);
        expect(store.saves).toBe(1);
        expect(store.peek()?.admin).toBe('admin');

        const first = store.load();
        first?.balances.clear();
        expect(store.load()).toEqual(state);
    });
});
