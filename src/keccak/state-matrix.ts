import { keccakP } from '@noble/hashes/sha3';
import { ethers } from 'ethers';
import { KECCAK_BLOCK_SIZE, KECCAK_STATE_LANES, KECCAK_STATE_SIZE } from '../param';

/**
 * A sponge that absorbs fixed-size blocks in order and can be asked for a
 * commitment to its intermediate state at any point.
 */
export interface SpongeState {
    absorbBlock(block: Uint8Array, isLast: boolean): void;
    stateCommitment(): string;
}

/**
 * keccak-f[1600] state matrix. It applies no padding: callers pass blocks
 * already padded to the rate, the final one included. `isLast` only stops
 * further absorption.
 */
export class KeccakStateMatrix implements SpongeState {
    readonly #state = new Uint8Array(KECCAK_STATE_SIZE);
    // lanes are little-endian u64 pairs, which is what keccakP expects
    readonly #state32 = new Uint32Array(this.#state.buffer);
    #finalized = false;

    absorbBlock(block: Uint8Array, isLast: boolean): void {
        if (block.length !== KECCAK_BLOCK_SIZE) {
            throw new Error(`KeccakStateMatrix: block must be ${KECCAK_BLOCK_SIZE} bytes, got ${block.length}`);
        }
        if (this.#finalized) {
            throw new Error('KeccakStateMatrix: cannot absorb after the final block');
        }

        for (let i = 0; i < KECCAK_BLOCK_SIZE; i++) {
            this.#state[i] ^= block[i];
        }
        keccakP(this.#state32);
        this.#finalized = isLast;
    }

    /**
     * keccak256 of the 25 lanes, each packed as a 32-byte big-endian word.
     */
    stateCommitment(): string {
        return ethers.keccak256(this.packState());
    }

    packState(): Uint8Array {
        const packed = new Uint8Array(KECCAK_STATE_LANES * 32);
        for (let lane = 0; lane < KECCAK_STATE_LANES; lane++) {
            const word = lane * 32 + 24;
            for (let b = 0; b < 8; b++) {
                packed[word + b] = this.#state[lane * 8 + 7 - b];
            }
        }
        return packed;
    }
}
