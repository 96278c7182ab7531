/**
 * Ledger Parameters (Protocol Level)
 *
 * Deterministic constants shared by every runtime module.
 * These do NOT depend on node-local configuration (ports, paths, log level).
 *
 * All amounts are integers in the base denomination of their asset.
 */

// Fees are expressed in basis points: 1 bps = 0.01%
export const BPS_DENOMINATOR = 10_000n;
export const DEFAULT_SWAP_FEE_BPS = 30;       // 0.3% LP fee
export const DEFAULT_TRANSFER_FEE_BPS = 0;    // in-account conversions are free by default
export const MAX_FEE_BPS = 100;               // 1% hard ceiling

// Representable range of an amount (signed 128-bit, like the host's i128)
export const MAX_AMOUNT = (1n << 127n) - 1n;

// Counters are unsigned 32-bit and saturate instead of wrapping
export const U32_MAX = 0xffff_ffff;

// LP tokens locked forever on the first deposit
export const MINIMUM_LIQUIDITY = 1000n;

// Default pool pair: native XLM against a simulated USDC
export const DEFAULT_POOL_ASSET_B = 'USDCSIM';

// State blob schema version
export const SCHEMA_VERSION = 1;

export const MAX_BATCH_SIZE = 10;
export const MAX_HISTORY_PER_USER = 50;

// Trade history stores execution rates with 7 decimal digits
export const RATE_DECIMALS = 7;
export const RATE_SCALE = 10n ** BigInt(RATE_DECIMALS);

/**
 * Where the swap fee ends up:
 * - pool:        stays in the input reserve as LP revenue
 * - accumulator: moved to the global fee accumulator
 */
export type FeeRouting = 'pool' | 'accumulator';
export const FEE_ROUTINGS: readonly FeeRouting[] = ['pool', 'accumulator'];
