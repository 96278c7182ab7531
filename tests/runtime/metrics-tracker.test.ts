import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsTracker } from '../../src/runtime/metrics/MetricsTracker.js';
import type { MetricsState } from '../../src/runtime/ledger/LedgerState.js';
import { U32_MAX } from '../../src/protocol/params/ledger.js';

describe('MetricsTracker', () => {
    let metrics: MetricsState;
    let tracker: MetricsTracker;

    beforeEach(() => {
        metrics = { tradeCount: 0, failedOrderCount: 0, balancesUpdated: 0, version: 1, lastTimestamp: 100 };
        tracker = new MetricsTracker(metrics);
    });

    it('counts trades and failures', () => {
        tracker.recordTrade();
        tracker.recordTrade();
        expect(tracker.recordFailure()).toEqual({ value: 1, saturated: false });
        expect(tracker.snapshot()).toEqual({ tradeCount: 2, failedOrderCount: 1, balancesUpdated: 0, version: 1, lastTimestamp: 100 });
    });

    it('saturates instead of wrapping', () => {
        metrics.tradeCount = U32_MAX;
        expect(tracker.recordTrade()).toEqual({ value: U32_MAX, saturated: true });
        expect(metrics.tradeCount).toBe(U32_MAX);
    });

    it('accepts equal or later timestamps', () => {
        tracker.observeTimestamp(100);
        tracker.observeTimestamp(250);
        expect(metrics.lastTimestamp).toBe(250);
    });

    it('rejects a clock that moves backwards', () => {
        expect(() => tracker.observeTimestamp(99)).toThrow('Clock moved backwards: 99 < 100');
        expect(() => tracker.observeTimestamp(Number.NaN)).toThrow('Invalid clock value');
        expect(metrics.lastTimestamp).toBe(100);
    });

    it('only moves the version forward', () => {
        tracker.observeVersion(1);
        tracker.observeVersion(3);
        expect(metrics.version).toBe(3);
        expect(() => tracker.observeVersion(2)).toThrow('Version 2 is behind current version 3');
        expect(() => tracker.observeVersion(3.5)).toThrow('behind current version');
    });
});
