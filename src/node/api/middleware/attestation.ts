import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../../../protocol/utils/logger.js';
import { assertIdentity } from '../../../runtime/auth/AuthorizationGate.js';
import { requestMessage, verifyMessage } from '../../identity/index.js';
import { NonceRegistry } from './nonces.js';

const log = logger.child('Attestation');

export interface AttestationOptions {
    /** When false, X-Caller is trusted as-is (local development). */
    requireSignatures: boolean;
    /** How far X-Nonce may drift from the host clock. */
    nonceWindowMs: number;
}

function reject(res: Response, error: string): void {
    res.status(401).json({ success: false, error, kind: 'Unauthorized' });
}

/**
 * Signature attestation for mutating endpoints.
 *
 * X-Caller:    hex ed25519 public key
 * X-Nonce:     signer's millisecond clock, increasing per caller
 * X-Signature: hex signature over "<METHOD> <path>\n<nonce>\n<JSON body>"
 *
 * On success the attested identity is stored in res.locals.caller.
 */
export function attestCaller(options: AttestationOptions): RequestHandler {
    const nonces = new NonceRegistry(options.nonceWindowMs);

    return (req: Request, res: Response, next: NextFunction): void => {
        const caller = req.header('x-caller');
        if (!caller) {
            reject(res, 'X-Caller header required');
            return;
        }
        try {
            assertIdentity(caller, 'X-Caller');
        } catch (error) {
            next(error);
            return;
        }

        if (!options.requireSignatures) {
            res.locals.caller = caller;
            next();
            return;
        }

        const signature = req.header('x-signature');
        if (!signature) {
            reject(res, 'X-Signature header required');
            return;
        }
        const nonceHeader = req.header('x-nonce');
        if (!nonceHeader || !/^\d+$/.test(nonceHeader)) {
            reject(res, 'X-Nonce header required');
            return;
        }
        const nonce = Number(nonceHeader);

        const message = requestMessage(req.method, req.originalUrl, nonce, req.body);
        verifyMessage(message, signature, caller)
            .then((valid) => {
                if (!valid) {
                    log.warn(`🔒 Invalid signature from ${req.ip}`);
                    reject(res, 'Invalid signature');
                    return;
                }
                // Consumed only after the signature holds
                const check = nonces.consume(caller, nonce, Date.now());
                if (!check.valid) {
                    reject(res, check.error);
                    return;
                }
                res.locals.caller = caller;
                next();
            })
            .catch(next);
    };
}
