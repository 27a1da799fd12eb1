import { ethers } from "ethers";
import { DEFAULT_LARGE_PREIMAGE_THRESHOLD, PreimageUploader } from "./param";
import { PreimageOracleData } from "./preimage-data";

/**
 * Picks the upload path by size: anything over the threshold is streamed
 * as a large preimage, the rest goes in a single call.
 */
export class SplitPreimageUploader implements PreimageUploader {
    readonly #direct: PreimageUploader;
    readonly #large: PreimageUploader;
    readonly #threshold: number;

    constructor(direct: PreimageUploader, large: PreimageUploader, threshold: number = DEFAULT_LARGE_PREIMAGE_THRESHOLD) {
        ethers.assertArgument(Number.isInteger(threshold) && threshold >= 0, "invalid threshold", "threshold", threshold);
        this.#direct = direct;
        this.#large = large;
        this.#threshold = threshold;
    }

    async uploadPreimage(parentClaimIndex: bigint, data: PreimageOracleData | null | undefined, signal?: AbortSignal): Promise<void> {
        ethers.assertArgument(data != null, "missing preimage data", "data", data);
        if (data.oracleData.length > this.#threshold) {
            return this.#large.uploadPreimage(parentClaimIndex, data, signal);
        }
        return this.#direct.uploadPreimage(parentClaimIndex, data, signal);
    }
}
