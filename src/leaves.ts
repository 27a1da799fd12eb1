import { KeccakStateMatrix, type SpongeState } from "./keccak/state-matrix";
import type { Leaf } from "./param";
import { PreimageOracleData } from "./preimage-data";

export type SpongeFactory = () => SpongeState;

const defaultSponge: SpongeFactory = () => new KeccakStateMatrix();

/**
 * Runs the preimage through a fresh sponge and snapshots the state after each block.
 * Each commitment covers every block before it, so the order of the result matters.
 */
export function buildLeaves(data: PreimageOracleData, createSponge: SpongeFactory = defaultSponge): Leaf[] {
    const sponge = createSponge();
    const leafCount = data.leafCount();
    const leaves: Leaf[] = [];
    for (let i = 0; i < leafCount; i++) {
        const input = data.getKeccakLeaf(i);
        sponge.absorbBlock(input, i === leafCount - 1);
        leaves.push(Object.freeze({
            input,
            index: BigInt(i),
            stateCommitment: sponge.stateCommitment(),
        }));
    }
    return leaves;
}
