import { ethers } from "ethers";
import type { PreimageOracleData } from "../preimage-data";


// Type
export type BlockTag = ethers.BlockTag;
export type RandomSource = (length: number) => Uint8Array;

// 'warn' logs a mined-but-reverted tx and carries on, 'fail' aborts the upload
export type RevertPolicy = 'warn' | 'fail';

export type UploadPhase = 'init' | 'leaves' | 'direct';

export type TxStatus = 'success' | 'failed';


// Interface
export interface UploaderConfig {
    rpc: string;
    privateKey: string;
    oracleAddress: string;
    maxLeavesPerTx?: number;
    largePreimageThreshold?: number;
    confirmNonce?: boolean;
    revertPolicy?: RevertPolicy;
    logging?: boolean;
}

export interface Leaf {
    readonly input: Uint8Array;
    readonly index: bigint;
    readonly stateCommitment: string;
}

export interface UploadProposal {
    uuid: bigint;
    partOffset: number;
    claimedSize: number;
}

export interface LargePreimageMetaData {
    claimant: string;
    uuid: bigint;
}

export interface TxCandidate {
    to: string;
    data: string;
    value?: bigint;
    gasLimit?: bigint;
}

export interface TxResult {
    status: TxStatus;
    transactionHash: string;
}

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}


// Collaborators
export interface ContractGateway {
    initLargePreimage(uuid: bigint, partOffset: number, claimedSize: number): Promise<TxCandidate>;
    addLeaves(uuid: bigint, leaves: readonly Leaf[], finalize: boolean): Promise<TxCandidate[]>;
    addGlobalDataTx(data: PreimageOracleData): Promise<TxCandidate>;
    getActivePreimages(blockTag: BlockTag): Promise<LargePreimageMetaData[]>;
}

export interface TransactionSubmitter {
    /**
     * Broadcasts the candidate and resolves once it is mined.
     * Rejects on broadcast failure or when the signal aborts.
     */
    send(candidate: TxCandidate, signal?: AbortSignal): Promise<TxResult>;
}

export interface PreimageUploader {
    uploadPreimage(parentClaimIndex: bigint, data: PreimageOracleData, signal?: AbortSignal): Promise<void>;
}

export interface ProposalIdStrategy {
    next(data: PreimageOracleData): bigint;
}
