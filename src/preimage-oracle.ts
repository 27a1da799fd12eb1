import { ethers } from "ethers";
import {
    BlockTag, ContractGateway, LargePreimageMetaData, Leaf, TxCandidate,
    PreimageOracleAbi, KECCAK_BLOCK_SIZE, MAX_LEAVES_PER_TX, PROPOSAL_READ_CONCURRENCY
} from "./param";
import { PreimageOracleData } from "./preimage-data";
import { assertProposalUuid, assertUint32 } from "./utils/util";
import { RetryOptions } from "./utils/retry";
import { getProposals } from "./utils/web3";

export interface PreimageOracleOptions {
    maxLeavesPerTx?: number;
    readConcurrency?: number;
    retry?: RetryOptions;
}

/**
 * Builds transaction candidates for, and reads proposals from, a PreimageOracle contract.
 * Nothing here sends a transaction.
 */
export class PreimageOracleContract implements ContractGateway {
    readonly #address: string;
    readonly #contract: ethers.Contract;
    readonly #maxLeavesPerTx: number;
    readonly #readConcurrency: number;
    readonly #retry?: RetryOptions;

    constructor(address: string, runner: ethers.ContractRunner | null, options: PreimageOracleOptions = {}) {
        const { maxLeavesPerTx = MAX_LEAVES_PER_TX, readConcurrency = PROPOSAL_READ_CONCURRENCY } = options;
        ethers.assertArgument(ethers.isAddress(address), "invalid oracle address", "address", address);
        ethers.assertArgument(Number.isInteger(maxLeavesPerTx) && maxLeavesPerTx > 0,
            "must be a positive integer", "maxLeavesPerTx", maxLeavesPerTx);

        this.#address = ethers.getAddress(address);
        this.#contract = new ethers.Contract(this.#address, PreimageOracleAbi, runner);
        this.#maxLeavesPerTx = maxLeavesPerTx;
        this.#readConcurrency = readConcurrency;
        this.#retry = options.retry;
    }

    get address(): string {
        return this.#address;
    }

    async initLargePreimage(uuid: bigint, partOffset: number, claimedSize: number): Promise<TxCandidate> {
        assertProposalUuid(uuid);
        assertUint32(partOffset, "partOffset");
        assertUint32(claimedSize, "claimedSize");
        const tx = await this.#contract["initLPP"].populateTransaction(uuid, partOffset, claimedSize);
        return this.#toCandidate(tx);
    }

    /**
     * One addLeavesLPP call per batch of at most `maxLeavesPerTx` leaves.
     * `finalize` is only passed on the last batch.
     */
    async addLeaves(uuid: bigint, leaves: readonly Leaf[], finalize: boolean): Promise<TxCandidate[]> {
        assertProposalUuid(uuid);
        const candidates: TxCandidate[] = [];
        for (let start = 0; start < leaves.length; start += this.#maxLeavesPerTx) {
            const batch = leaves.slice(start, start + this.#maxLeavesPerTx);
            const isLastBatch = start + batch.length >= leaves.length;
            this.#checkBatch(batch);

            const input = ethers.concat(batch.map(leaf => leaf.input));
            const commitments = batch.map(leaf => leaf.stateCommitment);
            const tx = await this.#contract["addLeavesLPP"].populateTransaction(
                uuid, batch[0].index, input, commitments, finalize && isLastBatch
            );
            candidates.push(this.#toCandidate(tx));
        }
        return candidates;
    }

    async addGlobalDataTx(data: PreimageOracleData): Promise<TxCandidate> {
        const tx = await this.#contract["loadKeccak256PreimagePart"].populateTransaction(
            BigInt(data.oracleOffset), data.oracleData
        );
        return this.#toCandidate(tx);
    }

    async getActivePreimages(blockTag: BlockTag): Promise<LargePreimageMetaData[]> {
        try {
            return await getProposals(this.#contract, blockTag, this.#readConcurrency, this.#retry);
        } catch (e) {
            throw new Error(`PreimageOracle: Failed to load proposals at block ${String(blockTag)}`, { cause: e });
        }
    }

    // leaves within a call must be contiguous and full-width
    #checkBatch(batch: readonly Leaf[]) {
        batch.forEach((leaf, i) => {
            ethers.assertArgument(leaf.input.length === KECCAK_BLOCK_SIZE,
                "leaf input must be a full block", "leaves", leaf.index);
            ethers.assertArgument(leaf.index === batch[0].index + BigInt(i),
                "leaves must be contiguous", "leaves", leaf.index);
        });
    }

    #toCandidate(tx: ethers.ContractTransaction): TxCandidate {
        return { to: tx.to, data: tx.data, value: tx.value };
    }
}
