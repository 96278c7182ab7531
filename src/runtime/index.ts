/**
 * Runtime Module Exports
 *
 * The deterministic core: ledger, pool, fees, authorization, metrics,
 * invariants and the dispatcher that ties them together.
 */

export { OperationDispatcher } from './dispatcher/OperationDispatcher.js';
export type { DispatcherOptions, LedgerTotals, PoolView, TradeView } from './dispatcher/OperationDispatcher.js';
export type * from './dispatcher/operations.js';

export { NATIVE_XLM, customAsset, parseAsset, assetKey, assetFromKey, assetLabel, sameAsset } from './ledger/Asset.js';
export type { Asset, AssetKey } from './ledger/Asset.js';
export { BalanceLedger } from './ledger/BalanceLedger.js';
export { createGenesisState, cloneState } from './ledger/LedgerState.js';
export type { LedgerState, LpPosition, MetricsState, PoolState, TradeRecord } from './ledger/LedgerState.js';

export { FeeEngine } from './fees/FeeEngine.js';
export { LiquidityPool, priceImpactBps } from './pool/LiquidityPool.js';
export type { CurveReserves, SwapQuote, SwapOutcome } from './pool/LiquidityPool.js';
export { AuthorizationGate, AuthorizationTrace, assertIdentity, hostAttested } from './auth/AuthorizationGate.js';
export type { IdentityVerifier } from './auth/AuthorizationGate.js';
export { MetricsTracker } from './metrics/MetricsTracker.js';
export { InvariantChecker, firstViolation } from './invariants/InvariantChecker.js';
export type { InvariantName, InvariantResult } from './invariants/InvariantChecker.js';

export { LedgerError, isLedgerError, isFatalKind } from '../protocol/errors/LedgerError.js';
export type { LedgerErrorKind, OperationPhase } from '../protocol/errors/LedgerError.js';
export { FileStateStore, MemoryStateStore } from '../protocol/storage/StateStore.js';
export type { StateStore } from '../protocol/storage/StateStore.js';
export { serializeState, deserializeState } from '../protocol/storage/codec.js';
