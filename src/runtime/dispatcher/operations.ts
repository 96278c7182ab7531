import type { LedgerErrorKind } from '../../protocol/errors/LedgerError.js';
import type { Asset } from '../ledger/Asset.js';

/** What the host hands in with every call. */
export interface CallContext {
    /** Identity the host attested for this call. */
    caller: string;
    /** Host clock; must never go backwards. */
    timestamp: number;
}

export interface MintRequest {
    asset: Asset;
    to: string;
    amount: bigint;
}

export interface TransferRequest {
    fromAsset: Asset;
    toAsset: Asset;
    user: string;
    amount: bigint;
}

export interface SwapRequest {
    from: Asset;
    to: Asset;
    amount: bigint;
    /** Defaults to the caller. */
    user?: string;
    minAmountOut?: bigint;
}

export interface AddLiquidityRequest {
    user: string;
    amountA: bigint;
    amountB: bigint;
}

export interface RemoveLiquidityRequest {
    user: string;
    lpAmount: bigint;
}

export interface TransferResult {
    debited: bigint;
    credited: bigint;
    fee: bigint;
}

export interface SwapResult {
    amountIn: bigint;
    amountOut: bigint;
    fee: bigint;
    priceImpactBps: number;
}

export interface AddLiquidityResult {
    lpMinted: bigint;
    lpLocked: bigint;
}

export interface RemoveLiquidityResult {
    lpBurned: bigint;
    amountA: bigint;
    amountB: bigint;
}

export type BatchOperation =
    | { type: 'mint'; request: MintRequest }
    | { type: 'transfer'; request: TransferRequest }
    | { type: 'swap'; request: SwapRequest }
    | { type: 'addLiquidity'; request: AddLiquidityRequest }
    | { type: 'removeLiquidity'; request: RemoveLiquidityRequest };

export type BatchMode = 'atomic' | 'best-effort';

export type OperationOutcome =
    | { type: BatchOperation['type']; ok: true; value: TransferResult | SwapResult | AddLiquidityResult | RemoveLiquidityResult | bigint }
    | { type: BatchOperation['type']; ok: false; kind: LedgerErrorKind | 'Unknown'; error: string };

export interface BatchResult {
    mode: BatchMode;
    succeeded: number;
    failed: number;
    /** Atomic batches that fail are fully rolled back. */
    committed: boolean;
    results: OperationOutcome[];
}
