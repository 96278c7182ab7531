import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CallContext } from '../../../runtime/dispatcher/operations.js';
import { callerOf } from '../request.js';

/** Host clock handed to the core as CallContext.timestamp. */
export type Clock = () => number;

/** Wraps a synchronous handler in the { success, data } envelope; errors go to the error middleware. */
export function handle(fn: (req: Request, res: Response) => unknown): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        try {
            res.json({ success: true, data: fn(req, res) });
        } catch (error) {
            next(error);
        }
    };
}

export function contextOf(res: Response, clock: Clock): CallContext {
    return { caller: callerOf(res), timestamp: clock() };
}
