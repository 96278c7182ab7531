/**
 * Metrics Tracker
 *
 * Monotonic counters plus the version and clock watermarks.
 * Counters saturate at U32_MAX; they never wrap.
 */

import { LedgerError } from '../../protocol/errors/LedgerError.js';
import { saturatingIncrement } from '../../protocol/math/checked.js';
import { logger } from '../../protocol/utils/logger.js';
import type { MetricsState } from '../ledger/LedgerState.js';

const log = logger.child('Metrics');

export interface CounterUpdate {
    value: number;
    saturated: boolean;
}

export class MetricsTracker {
    constructor(private readonly metrics: MetricsState) {}

    recordTrade(): CounterUpdate {
        const update = saturatingIncrement(this.metrics.tradeCount);
        this.metrics.tradeCount = update.value;
        if (update.saturated) log.warn(`tradeCount stuck at ${update.value}`);
        return update;
    }

    recordFailure(): CounterUpdate {
        const update = saturatingIncrement(this.metrics.failedOrderCount);
        this.metrics.failedOrderCount = update.value;
        if (update.saturated) log.warn(`failedOrderCount stuck at ${update.value}`);
        return update;
    }

    observeVersion(newVersion: number): void {
        if (!Number.isInteger(newVersion) || newVersion < this.metrics.version) {
            throw new LedgerError('InvalidMigration', `Version ${newVersion} is behind current version ${this.metrics.version}`, {
                current: String(this.metrics.version),
                requested: String(newVersion),
            });
        }
        this.metrics.version = newVersion;
    }

    observeTimestamp(newTimestamp: number): void {
        if (!Number.isFinite(newTimestamp) || newTimestamp < 0) {
            throw new LedgerError('ClockRegression', `Invalid clock value: ${newTimestamp}`);
        }
        if (newTimestamp < this.metrics.lastTimestamp) {
            throw new LedgerError('ClockRegression', `Clock moved backwards: ${newTimestamp} < ${this.metrics.lastTimestamp}`, {
                current: String(this.metrics.lastTimestamp),
                observed: String(newTimestamp),
            });
        }
        this.metrics.lastTimestamp = newTimestamp;
    }

    snapshot(): MetricsState {
        return { ...this.metrics };
    }
}
