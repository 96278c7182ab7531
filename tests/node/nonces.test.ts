import { describe, it, expect } from 'vitest';
import { NonceRegistry } from '../../src/node/api/middleware/nonces.js';

const WINDOW = 1000;
const NOW = 50_000;

describe('NonceRegistry', () => {
    it('accepts strictly increasing nonces', () => {
        const nonces = new NonceRegistry(WINDOW);
        expect(nonces.consume('alice', NOW, NOW)).toEqual({ valid: true });
        expect(nonces.consume('alice', NOW + 1, NOW)).toEqual({ valid: true });
        expect(nonces.lastNonce('alice')).toBe(NOW + 1);
    });

    it('rejects a repeated or lower nonce', () => {
        const nonces = new NonceRegistry(WINDOW);
        nonces.consume('alice', NOW, NOW);
        expect(nonces.consume('alice', NOW, NOW)).toEqual({ valid: false, error: 'Nonce already used' });
        expect(nonces.consume('alice', NOW - 5, NOW)).toEqual({ valid: false, error: 'Nonce already used' });
        expect(nonces.lastNonce('alice')).toBe(NOW);
    });

    it('rejects nonces outside the window on either side', () => {
        const nonces = new NonceRegistry(WINDOW);
        expect(nonces.consume('alice', NOW - WINDOW - 1, NOW)).toEqual({ valid: false, error: 'Nonce outside the accepted window' });
        expect(nonces.consume('alice', NOW + WINDOW + 1, NOW)).toEqual({ valid: false, error: 'Nonce outside the accepted window' });
        expect(nonces.consume('alice', NOW - WINDOW, NOW)).toEqual({ valid: true });
    });

    it('rejects fractional and negative nonces', () => {
        const nonces = new NonceRegistry(WINDOW);
        expect(nonces.consume('alice', 1.5, 1)).toEqual({ valid: false, error: 'Nonce must be a non-negative integer' });
        expect(nonces.consume('alice', -1, 0)).toEqual({ valid: false, error: 'Nonce must be a non-negative integer' });
        expect(nonces.size).toBe(0);
    });

    it('tracks callers independently', () => {
        const nonces = new NonceRegistry(WINDOW);
        nonces.consume('alice', NOW + 10, NOW);
        expect(nonces.consume('bob', NOW, NOW)).toEqual({ valid: true });
        expect(nonces.size).toBe(2);
    });

    it('prunes callers whose last nonce left the window', () => {
        const nonces = new NonceRegistry(WINDOW);
        nonces.consume('alice', NOW, NOW);
        nonces.consume('bob', NOW + 500, NOW + 500);
        nonces.prune(NOW + WINDOW + 1);
        expect(nonces.lastNonce('alice')).toBeUndefined();
        expect(nonces.lastNonce('bob')).toBe(NOW + 500);
    });
});
