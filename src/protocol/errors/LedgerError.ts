/**
 * Ledger Errors
 *
 * Every failure the core can surface is a LedgerError with a `kind`.
 * Recoverable kinds abort the current operation with no state change.
 * Fatal kinds signal a broken host assumption or an internal bug.
 */

export type LedgerErrorKind =
    | 'InvalidAmount'
    | 'InsufficientBalance'
    | 'InsufficientLiquidity'
    | 'Unauthorized'
    | 'SameAssetSwap'
    | 'InvalidSwapPair'
    | 'InvalidAsset'
    | 'InvalidIdentity'
    | 'TradingPaused'
    | 'SlippageExceeded'
    | 'AmountOverflow'
    | 'BatchTooLarge'
    | 'FeeConfigurationInvalid'
    | 'InvariantViolation'
    | 'ClockRegression'
    | 'InvalidMigration'
    | 'CorruptState';

export type OperationPhase = 'Validating' | 'Computing' | 'Mutating' | 'Checking' | 'Committed' | 'Aborted';

const FATAL_KINDS: ReadonlySet<LedgerErrorKind> = new Set<LedgerErrorKind>([
    'InvariantViolation',
    'ClockRegression',
    'InvalidMigration',
    'CorruptState',
]);

export function isFatalKind(kind: LedgerErrorKind): boolean {
    return FATAL_KINDS.has(kind);
}

export class LedgerError extends Error {
    readonly kind: LedgerErrorKind;
    readonly fatal: boolean;
    readonly details?: Record<string, string>;
    phase?: OperationPhase;

    constructor(kind: LedgerErrorKind, message: string, details?: Record<string, string>) {
        super(message);
        this.name = 'LedgerError';
        this.kind = kind;
        this.fatal = isFatalKind(kind);
        this.details = details;
    }
}

export function isLedgerError(error: unknown): error is LedgerError {
    return error instanceof LedgerError;
}

/**
 * The one Unauthorized error. Same message, no details, whatever the cause,
 * so a rejected caller learns nothing about other accounts.
 */
export function unauthorized(): LedgerError {
    return new LedgerError('Unauthorized', 'Unauthorized');
}
