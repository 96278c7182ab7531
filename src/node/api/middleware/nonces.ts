/**
 * Nonce Registry
 * Per-caller replay protection for signed requests.
 *
 * A nonce is the signer's millisecond clock. It must lie within `windowMs`
 * of the host clock and be strictly greater than the last nonce accepted
 * for that caller. Anything older than the window is rejected without a
 * record.
 */

import { logger } from '../../../protocol/utils/logger.js';

export type NonceCheck =
    | { valid: true }
    | { valid: false; error: string };

// Forget callers whose last nonce fell out of the window once this many are tracked
const PRUNE_THRESHOLD = 1000;

export class NonceRegistry {
    private lastNonces: Map<string, number> = new Map();
    private log = logger.child('Nonces');

    constructor(private readonly windowMs: number) {}

    /** Check a nonce and, when valid, record it as the caller's latest. */
    consume(caller: string, nonce: number, now: number): NonceCheck {
        if (!Number.isSafeInteger(nonce) || nonce < 0) {
            return { valid: false, error: 'Nonce must be a non-negative integer' };
        }
        if (Math.abs(now - nonce) > this.windowMs) {
            return { valid: false, error: 'Nonce outside the accepted window' };
        }

        const last = this.lastNonces.get(caller);
        if (last !== undefined && nonce <= last) {
            this.log.warn(`Replay rejected for ${caller.slice(0, 12)}...: ${nonce} <= ${last}`);
            return { valid: false, error: 'Nonce already used' };
        }

        this.lastNonces.set(caller, nonce);
        if (this.lastNonces.size > PRUNE_THRESHOLD) this.prune(now);
        return { valid: true };
    }

    lastNonce(caller: string): number | undefined {
        return this.lastNonces.get(caller);
    }

    get size(): number {
        return this.lastNonces.size;
    }

    prune(now: number): void {
        for (const [caller, nonce] of this.lastNonces) {
            if (now - nonce > this.windowMs) this.lastNonces.delete(caller);
        }
    }
}
