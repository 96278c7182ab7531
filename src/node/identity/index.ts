/**
 * Identity Module Exports
 */

export {
    IDENTITY_FILE_VERSION,
    bytesToHex,
    createIdentity,
    deriveKeysFromMnemonic,
    generateMnemonic,
    hexToBytes,
    keysFromPrivateKey,
    loadIdentity,
    requestMessage,
    saveIdentity,
    signMessage,
    verifyMessage,
} from './LedgerIdentity.js';
export type { IdentityFile, IdentityKeys } from './LedgerIdentity.js';
