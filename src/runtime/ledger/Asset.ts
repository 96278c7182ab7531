import { LedgerError } from '../../protocol/errors/LedgerError.js';

export type Asset =
    | { readonly kind: 'native' }
    | { readonly kind: 'custom'; readonly symbol: string };

/** Stable string form used as a map key and in the persisted blob. */
export type AssetKey = string;

const NATIVE_SYMBOL = 'XLM';
const NATIVE_KEY = 'native';
const CUSTOM_PREFIX = 'custom:';
const SYMBOL_REGEX = /^[A-Z0-9]{1,12}$/;

export const NATIVE_XLM: Asset = Object.freeze({ kind: 'native' });

export function customAsset(symbol: string): Asset {
    if (!SYMBOL_REGEX.test(symbol)) {
        throw new LedgerError('InvalidAsset', `Invalid asset symbol: ${symbol}`, { symbol });
    }
    if (symbol === NATIVE_SYMBOL) {
        return NATIVE_XLM;
    }
    return Object.freeze({ kind: 'custom', symbol });
}

/** "XLM" (any case) is the native asset, anything else a custom symbol. */
export function parseAsset(text: string): Asset {
    const symbol = text.trim().toUpperCase();
    return symbol === NATIVE_SYMBOL ? NATIVE_XLM : customAsset(symbol);
}

export function assetKey(asset: Asset): AssetKey {
    return asset.kind === 'native' ? NATIVE_KEY : `${CUSTOM_PREFIX}${asset.symbol}`;
}

export function assetFromKey(key: AssetKey): Asset {
    if (key === NATIVE_KEY) return NATIVE_XLM;
    if (key.startsWith(CUSTOM_PREFIX)) {
        return customAsset(key.slice(CUSTOM_PREFIX.length));
    }
    throw new LedgerError('InvalidAsset', `Invalid asset key: ${key}`, { key });
}

export function assetLabel(asset: Asset): string {
    return asset.kind === 'native' ? NATIVE_SYMBOL : asset.symbol;
}

export function sameAsset(a: Asset, b: Asset): boolean {
    return assetKey(a) === assetKey(b);
}
