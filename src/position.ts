import { assertArgument } from "ethers";

/**
 * A node in the claim tree, addressed by its generalized index
 * (root = 1, children of n = 2n and 2n + 1).
 */
export class Position {
    readonly gIndex: bigint;

    private constructor(gIndex: bigint) {
        this.gIndex = gIndex;
    }

    static fromGIndex(gIndex: bigint): Position {
        assertArgument(gIndex >= 0n, "generalized index must be non-negative", "gIndex", gIndex);
        return new Position(gIndex);
    }

    // 0 is accepted as an alias of the root
    isRootPosition(): boolean {
        return this.gIndex === 0n || this.gIndex === 1n;
    }

    toString(): string {
        return this.gIndex.toString();
    }
}
