import { describe, it, expect, vi } from 'vitest';
import { RandomProposalIdStrategy } from './proposal-id';
import { MAX_PROPOSAL_UUID } from './param';

describe('RandomProposalIdStrategy', () => {
    it('draws 17 bytes from the random source', () => {
        const random = vi.fn((length: number) => new Uint8Array(length));
        new RandomProposalIdStrategy(random).next();
        expect(random).toHaveBeenCalledWith(17);
    });

    it('masks the draw to 130 bits', () => {
        const strategy = new RandomProposalIdStrategy((length) => new Uint8Array(length).fill(0xff));
        expect(strategy.next()).toBe((1n << 130n) - 1n);
    });

    it('reads the draw big-endian', () => {
        const strategy = new RandomProposalIdStrategy((length) => {
            const bytes = new Uint8Array(length);
            bytes[length - 1] = 0x2a;
            bytes[length - 2] = 0x01;
            return bytes;
        });
        expect(strategy.next()).toBe(0x012an);
    });

    it('returns a deterministic sequence for a deterministic source', () => {
        let counter = 0;
        const strategy = new RandomProposalIdStrategy((length) => {
            const bytes = new Uint8Array(length);
            bytes[length - 1] = ++counter;
            return bytes;
        });
        expect([strategy.next(), strategy.next(), strategy.next()]).toEqual([1n, 2n, 3n]);
    });

    it('stays below 2^130 with the default source', () => {
        const strategy = new RandomProposalIdStrategy();
        for (let i = 0; i < 32; i++) {
            const uuid = strategy.next();
            expect(uuid >= 0n && uuid < MAX_PROPOSAL_UUID).toBe(true);
        }
    });

    it('fails when the source returns too few bytes', () => {
        const strategy = new RandomProposalIdStrategy(() => new Uint8Array(4));
        expect(() => strategy.next()).toThrow('expected 17 random bytes, got 4');
    });

    it('propagates source failures', () => {
        const strategy = new RandomProposalIdStrategy(() => {
            throw new Error('entropy source unavailable');
        });
        expect(() => strategy.next()).toThrow('entropy source unavailable');
    });
});
