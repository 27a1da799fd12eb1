import { concatMap, from, lastValueFrom } from "rxjs";
import {
    CancelledError, ConfigurationError, InitializationError, SubmissionError, UnsupportedOperationError,
    ContractGateway, Leaf, Logger, PreimageUploader, ProposalIdStrategy, RevertPolicy,
    TransactionSubmitter, TxCandidate, UploadPhase, UploadProposal
} from "./param";
import { PreimageOracleData } from "./preimage-data";
import { buildLeaves, SpongeFactory } from "./leaves";
import { RandomProposalIdStrategy } from "./proposal-id";
import { applyRevertPolicy } from "./revert-policy";
import { ConsoleLogger } from "./utils/logger";
import { abortable, errorMessage } from "./utils/util";

export interface LargePreimageUploaderOptions {
    idStrategy?: ProposalIdStrategy;
    revertPolicy?: RevertPolicy;
    logger?: Logger;
    createSponge?: SpongeFactory;
}

/**
 * Streams a merkleized preimage to the PreimageOracle as a large preimage proposal:
 * one initLPP transaction, then the leaves packed across as many addLeavesLPP
 * transactions as the gateway needs. Every transaction is confirmed before the next
 * one is sent.
 *
 * The proposal is never finalized; a fully streamed upload still rejects with
 * FINALIZATION_PENDING.
 */
export class LargePreimageUploader implements PreimageUploader {
    readonly #gateway: ContractGateway;
    readonly #submitter: TransactionSubmitter;
    readonly #idStrategy: ProposalIdStrategy;
    readonly #revertPolicy: RevertPolicy;
    readonly #logger: Logger;
    readonly #createSponge?: SpongeFactory;

    constructor(gateway: ContractGateway, submitter: TransactionSubmitter, options: LargePreimageUploaderOptions = {}) {
        this.#gateway = gateway;
        this.#submitter = submitter;
        this.#idStrategy = options.idStrategy ?? new RandomProposalIdStrategy();
        this.#revertPolicy = options.revertPolicy ?? 'warn';
        this.#logger = options.logger ?? new ConsoleLogger("LargePreimageUploader");
        this.#createSponge = options.createSponge;
    }

    async uploadPreimage(parentClaimIndex: bigint, data: PreimageOracleData, signal?: AbortSignal): Promise<never> {
        this.#checkCancelled(signal);

        const leaves = buildLeaves(data, this.#createSponge);
        const proposal: UploadProposal = {
            uuid: this.#newUuid(data),
            partOffset: data.oracleOffset,
            claimedSize: data.oracleData.length,
        };
        this.#logger.info(`Uploading large preimage (uuid: ${proposal.uuid}, key: ${data.keyHex()}, ` +
            `parent: ${parentClaimIndex}, leaves: ${leaves.length})`);

        await this.#initLargePreimage(proposal, signal);
        await this.#addLargePreimageLeaves(proposal.uuid, leaves, false, signal);

        // TODO: track the challenge period once all leaves are posted, then squeezeLPP
        throw new UnsupportedOperationError('FINALIZATION_PENDING',
            `LargePreimageUploader: Finalization not supported yet (uuid: ${proposal.uuid})`, proposal.uuid);
    }

    #newUuid(data: PreimageOracleData): bigint {
        try {
            return this.#idStrategy.next(data);
        } catch (e) {
            throw new ConfigurationError(`LargePreimageUploader: Failed to generate UUID: ${errorMessage(e)}`, e);
        }
    }

    // Must be confirmed before any leaf is sent
    async #initLargePreimage(proposal: UploadProposal, signal?: AbortSignal): Promise<void> {
        const { uuid, partOffset, claimedSize } = proposal;
        try {
            const candidate = await this.#gateway.initLargePreimage(uuid, partOffset, claimedSize);
            await this.#sendTxAndWait(candidate, 'init', signal);
        } catch (e) {
            throw this.#wrapError(e, uuid, signal, () => new InitializationError(
                `LargePreimageUploader: Failed to initialize large preimage with uuid ${uuid}: ${errorMessage(e)}`, uuid, e));
        }
    }

    async #addLargePreimageLeaves(uuid: bigint, leaves: Leaf[], finalize: boolean, signal?: AbortSignal): Promise<void> {
        let candidates: TxCandidate[];
        try {
            candidates = await this.#gateway.addLeaves(uuid, leaves, finalize);
        } catch (e) {
            throw this.#wrapError(e, uuid, signal, () => new SubmissionError(
                `LargePreimageUploader: Failed to create leaf txs for large preimage with uuid ${uuid}: ${errorMessage(e)}`,
                uuid, 0, e));
        }

        let confirmed = 0;
        try {
            await lastValueFrom(
                from(candidates).pipe(
                    // one tx in flight at a time, in leaf order
                    concatMap(async (candidate) => {
                        await this.#sendTxAndWait(candidate, 'leaves', signal);
                        confirmed++;
                        this.#logger.debug(`Leaf batch ${confirmed}/${candidates.length} confirmed (uuid: ${uuid})`);
                    })
                ),
                { defaultValue: undefined }
            );
        } catch (e) {
            throw this.#wrapError(e, uuid, signal, () => new SubmissionError(
                `LargePreimageUploader: Failed to add leaves to large preimage with uuid ${uuid} ` +
                `(${confirmed}/${candidates.length} batches confirmed): ${errorMessage(e)}`,
                uuid, confirmed, e));
        }
    }

    async #sendTxAndWait(candidate: TxCandidate, phase: UploadPhase, signal?: AbortSignal): Promise<void> {
        this.#checkCancelled(signal);
        const result = await abortable(this.#submitter.send(candidate, signal), signal);
        applyRevertPolicy(result, phase, this.#revertPolicy, this.#logger);
    }

    #checkCancelled(signal?: AbortSignal) {
        if (signal?.aborted) {
            throw new CancelledError(`LargePreimageUploader: Upload cancelled`, undefined, signal.reason);
        }
    }

    #wrapError(e: unknown, uuid: bigint, signal: AbortSignal | undefined, wrap: () => Error): Error {
        if (e instanceof CancelledError) {
            return new CancelledError(`LargePreimageUploader: Upload cancelled (uuid: ${uuid})`, uuid, e.cause);
        }
        if (signal?.aborted) {
            return new CancelledError(`LargePreimageUploader: Upload cancelled (uuid: ${uuid})`, uuid, e);
        }
        return wrap();
    }
}
