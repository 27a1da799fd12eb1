import { ethers } from "ethers";
import { KECCAK_BLOCK_SIZE } from "./param";
import { copy } from "./utils/util";

/**
 * A preimage as the oracle sees it: the key it is stored under, the raw bytes,
 * and the offset of the part being loaded.
 */
export class PreimageOracleData {
    readonly oracleKey: Uint8Array;
    readonly oracleData: Uint8Array;
    readonly oracleOffset: number;
    readonly isLocal: boolean;

    constructor(oracleKey: Uint8Array, oracleData: Uint8Array, oracleOffset: number) {
        this.oracleKey = oracleKey;
        this.oracleData = oracleData;
        this.oracleOffset = oracleOffset >>> 0;
        // An empty key or a zero type byte marks local data
        this.isLocal = oracleKey.length === 0 || oracleKey[0] === 0;
    }

    /**
     * Number of keccak blocks the data splits into. The last one may be partial.
     */
    leafCount(): number {
        return Math.ceil(this.oracleData.length / KECCAK_BLOCK_SIZE);
    }

    /**
     * Returns block `leafIndex` of the data, zero-padded to KECCAK_BLOCK_SIZE.
     * Out of range indices give an all-zero block; this is not a bounds check.
     */
    getKeccakLeaf(leafIndex: number): Uint8Array {
        const leaf = new Uint8Array(KECCAK_BLOCK_SIZE);
        const start = leafIndex * KECCAK_BLOCK_SIZE;
        if (Number.isInteger(leafIndex) && start >= 0 && start < this.oracleData.length) {
            copy(leaf, 0, this.oracleData, start);
        }
        return leaf;
    }

    keyHex(): string {
        return ethers.hexlify(this.oracleKey);
    }
}
