import { ethers } from "ethers";
import { MAX_PROPOSAL_UUID, PROPOSAL_UUID_BITS, ProposalIdStrategy, RandomSource } from "./param";

const UUID_BYTES = Math.ceil(PROPOSAL_UUID_BITS / 8);

/**
 * Draws proposal uuids uniformly from [0, 2^130). Uuids are not derived from the
 * data, so an upload interrupted midway cannot be picked up again.
 */
export class RandomProposalIdStrategy implements ProposalIdStrategy {
    readonly #random: RandomSource;

    constructor(random: RandomSource = ethers.randomBytes) {
        this.#random = random;
    }

    next(): bigint {
        const bytes = this.#random(UUID_BYTES);
        if (bytes.length !== UUID_BYTES) {
            throw new Error(`expected ${UUID_BYTES} random bytes, got ${bytes.length}`);
        }
        return ethers.toBigInt(bytes) & (MAX_PROPOSAL_UUID - 1n);
    }
}
