/**
 * Admin API Routes
 *
 * All writes are admin-only inside the core; the route only attests the caller.
 */

import { Router, type RequestHandler } from 'express';
import type { OperationDispatcher } from '../../../runtime/dispatcher/OperationDispatcher.js';
import { integerField, stringField } from '../request.js';
import { contextOf, handle, type Clock } from './handler.js';

export function createAdminRoutes(dispatcher: OperationDispatcher, attest: RequestHandler, clock: Clock): Router {
    const router = Router();

    router.get('/', handle(() => ({
        admin: dispatcher.getAdmin(),
        paused: dispatcher.isPaused(),
        haltReason: dispatcher.getHaltReason(),
        version: dispatcher.getMetrics().version,
        migratedAt: dispatcher.getMigratedAt(),
    })));

    router.post('/set-admin', attest, handle((req, res) => {
        const newAdmin = stringField(req.body, 'newAdmin');
        dispatcher.setAdmin(contextOf(res, clock), newAdmin);
        return { admin: newAdmin };
    }));

    router.post('/pause', attest, handle((_req, res) => {
        dispatcher.pauseTrading(contextOf(res, clock));
        return { paused: true };
    }));

    router.post('/resume', attest, handle((_req, res) => {
        dispatcher.resumeTrading(contextOf(res, clock));
        return { paused: false };
    }));

    router.post('/migrate', attest, handle((req, res) => {
        const version = dispatcher.migrate(contextOf(res, clock), integerField(req.body, 'version'));
        return { version, migratedAt: dispatcher.getMigratedAt() };
    }));

    return router;
}
