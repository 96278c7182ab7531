/**
 * Ledger Identity
 *
 * Callers are identified by hex ed25519 public keys. Keys are derived from
 * a 24-word BIP39 mnemonic along a BIP-44 path, so an operator can restore
 * an identity from the words alone.
 *
 * The host signs and verifies request messages; the core only ever sees
 * the attested public key.
 */

import * as fs from 'fs';
import * as bip39 from 'bip39';
import HDKey from 'hdkey';
import * as ed from '@noble/ed25519';
import { LedgerError } from '../../protocol/errors/LedgerError.js';
import { logger } from '../../protocol/utils/logger.js';

const log = logger.child('Identity');

// 148' is the registered coin type for the native asset
const BIP44_PATH = "m/44'/148'/0'/0/0";

export const IDENTITY_FILE_VERSION = 1;

export interface IdentityKeys {
    /** Hex ed25519 public key, the identity the ledger sees. */
    publicKey: string;
    privateKey: string;
}

export interface IdentityFile extends IdentityKeys {
    version: number;
    mnemonic?: string;
    createdAt: number;
}

export function hexToBytes(hex: string): Uint8Array {
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new LedgerError('InvalidIdentity', 'Expected an even-length hex string');
    }
    const bytes = new Uint8Array(hex.length / 2);
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
    }
    return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
    return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

export function generateMnemonic(): string {
    return bip39.generateMnemonic(256);
}

export async function keysFromPrivateKey(privateKey: string): Promise<IdentityKeys> {
    const privateKeyBytes = hexToBytes(privateKey);
    if (privateKeyBytes.length !== 32) {
        throw new LedgerError('InvalidIdentity', 'Private key must be 32 bytes');
    }
    const publicKeyBytes = await ed.getPublicKeyAsync(privateKeyBytes);
    return { publicKey: bytesToHex(publicKeyBytes), privateKey: privateKey.toLowerCase() };
}

export async function deriveKeysFromMnemonic(mnemonic: string): Promise<IdentityKeys> {
    if (!bip39.validateMnemonic(mnemonic)) {
        throw new LedgerError('InvalidIdentity', 'Invalid mnemonic');
    }
    const seed = bip39.mnemonicToSeedSync(mnemonic);
    const child = HDKey.fromMasterSeed(seed).derive(BIP44_PATH);
    if (!child.privateKey) {
        throw new LedgerError('InvalidIdentity', 'Failed to derive private key from mnemonic');
    }
    // First 32 bytes of the derived key become the ed25519 seed
    return keysFromPrivateKey(child.privateKey.toString('hex').slice(0, 64));
}

export async function createIdentity(): Promise<IdentityFile> {
    const mnemonic = generateMnemonic();
    const keys = await deriveKeysFromMnemonic(mnemonic);
    return { version: IDENTITY_FILE_VERSION, mnemonic, ...keys, createdAt: Date.now() };
}

// ==================== SIGNING ====================

/**
 * The exact bytes a request signature covers. `nonce` is the signer's
 * millisecond clock and must increase with every request of a caller.
 */
export function requestMessage(method: string, path: string, nonce: number, body: unknown): string {
    return `${method.toUpperCase()} ${path}\n${nonce}\n${JSON.stringify(body ?? {})}`;
}

export async function signMessage(message: string, privateKey: string): Promise<string> {
    const messageBytes = new TextEncoder().encode(message);
    const signature = await ed.signAsync(messageBytes, hexToBytes(privateKey));
    return bytesToHex(signature);
}

export async function verifyMessage(message: string, signature: string, publicKey: string): Promise<boolean> {
    try {
        const messageBytes = new TextEncoder().encode(message);
        return await ed.verifyAsync(hexToBytes(signature), messageBytes, hexToBytes(publicKey));
    } catch (error) {
        log.debug('Signature check failed:', error);
        return false;
    }
}

// ==================== FILES ====================

export function saveIdentity(filePath: string, identity: IdentityFile): void {
    fs.writeFileSync(filePath, JSON.stringify(identity, null, 2), { mode: 0o600 });
    log.info(`🔑 Identity saved to ${filePath}`);
}

export function loadIdentity(filePath: string): IdentityKeys {
    if (!fs.existsSync(filePath)) {
        throw new LedgerError('InvalidIdentity', `Identity file not found: ${filePath}`);
    }
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof data !== 'object' || data === null || !('publicKey' in data) || !('privateKey' in data)) {
        throw new LedgerError('InvalidIdentity', `Malformed identity file: ${filePath}`);
    }
    const { publicKey, privateKey } = data;
    if (typeof publicKey !== 'string' || typeof privateKey !== 'string') {
        throw new LedgerError('InvalidIdentity', `Malformed identity file: ${filePath}`);
    }
    return { publicKey, privateKey };
}
