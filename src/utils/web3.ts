import { Contract, ethers } from "ethers";
import pLimit from "p-limit";
import { BlockTag, LargePreimageMetaData, PROPOSAL_READ_CONCURRENCY } from "../param";
import { RetryOptions, stableRetry } from "./retry";

export async function getProposalCount(contract: Contract, blockTag: BlockTag, retryOptions?: RetryOptions): Promise<number> {
    const count = await stableRetry(() => contract["proposalCount"]({ blockTag }), retryOptions);
    return Number(ethers.getBigInt(count));
}

export async function getProposal(
    contract: Contract,
    index: number,
    blockTag: BlockTag,
    retryOptions?: RetryOptions
): Promise<LargePreimageMetaData> {
    const [claimant, uuid] = await stableRetry(() => contract["proposals"](index, { blockTag }), retryOptions);
    return {
        claimant: ethers.getAddress(claimant),
        uuid: ethers.getBigInt(uuid),
    };
}

/**
 * Reads every proposal at `blockTag`, a few at a time, in index order.
 */
export async function getProposals(
    contract: Contract,
    blockTag: BlockTag,
    concurrency: number = PROPOSAL_READ_CONCURRENCY,
    retryOptions?: RetryOptions
): Promise<LargePreimageMetaData[]> {
    const count = await getProposalCount(contract, blockTag, retryOptions);
    const limit = pLimit(concurrency);
    return Promise.all(
        Array.from({ length: count }, (_, i) => limit(() => getProposal(contract, i, blockTag, retryOptions)))
    );
}
