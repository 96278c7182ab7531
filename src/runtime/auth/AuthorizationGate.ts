/**
 * Authorization Gate
 *
 * Pure identity-equality / role check. Never looks at amounts or balances.
 * Signature checking belongs to the host: the gate only asks the supplied
 * verifier whether the host attested the caller identity.
 */

import { LedgerError, unauthorized } from '../../protocol/errors/LedgerError.js';
import { logger } from '../../protocol/utils/logger.js';

const log = logger.child('Auth');

const MAX_IDENTITY_LENGTH = 128;

/** Host attestation capability: true when the identity was verified for this call. */
export type IdentityVerifier = (identity: string) => boolean;

/** The host already verified every identity it hands to the core. */
export const hostAttested: IdentityVerifier = () => true;

/**
 * Identities a single operation was authorized to act for.
 * Checked afterwards against the set of accounts that actually changed.
 */
export class AuthorizationTrace {
    private readonly permitted = new Set<string>();

    permit(identity: string): void {
        this.permitted.add(identity);
    }

    allows(identity: string): boolean {
        return this.permitted.has(identity);
    }

    get identities(): string[] {
        return Array.from(this.permitted);
    }
}

export function assertIdentity(identity: unknown, field: string = 'identity'): string {
    if (typeof identity !== 'string' || identity.length === 0 || identity.length > MAX_IDENTITY_LENGTH) {
        throw new LedgerError('InvalidIdentity', `${field} must be a non-empty string of at most ${MAX_IDENTITY_LENGTH} characters`, { field });
    }
    if (/[\x00-\x1f\x7f\s]/.test(identity)) {
        throw new LedgerError('InvalidIdentity', `${field} contains invalid characters`, { field });
    }
    return identity;
}

export class AuthorizationGate {
    constructor(private readonly verifier: IdentityVerifier = hostAttested) {}

    /** Caller must be attested and equal to the identity the operation acts for. */
    require(caller: string, required: string, trace?: AuthorizationTrace): void {
        if (!this.verifier(caller) || caller !== required) {
            log.debug('Rejected caller');
            throw unauthorized();
        }
        trace?.permit(required);
    }

    /** Caller must be attested and be the current admin. */
    requireAdmin(caller: string, admin: string): void {
        if (!this.verifier(caller) || caller !== admin) {
            log.debug('Rejected admin call');
            throw unauthorized();
        }
    }
}
