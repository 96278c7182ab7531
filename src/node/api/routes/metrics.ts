import { Router } from 'express';
import type { OperationDispatcher } from '../../../runtime/dispatcher/OperationDispatcher.js';
import { handle } from './handler.js';

export function createMetricsRoutes(dispatcher: OperationDispatcher): Router {
    const router = Router();

    router.get('/metrics', handle(() => ({
        ...dispatcher.getMetrics(),
        ...dispatcher.getTotals(),
    })));

    // Snapshot-only invariants for external verifiers
    router.get('/invariants', handle(() => {
        const results = dispatcher.audit();
        return {
            healthy: results.every((r) => r.holds),
            paused: dispatcher.isPaused(),
            haltReason: dispatcher.getHaltReason(),
            results,
        };
    }));

    return router;
}
