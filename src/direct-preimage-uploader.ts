import {
    CancelledError, SubmissionError, UnsupportedOperationError,
    ContractGateway, Logger, PreimageUploader, RevertPolicy, TransactionSubmitter
} from "./param";
import { PreimageOracleData } from "./preimage-data";
import { applyRevertPolicy } from "./revert-policy";
import { ConsoleLogger } from "./utils/logger";
import { abortable, errorMessage } from "./utils/util";

export interface DirectPreimageUploaderOptions {
    revertPolicy?: RevertPolicy;
    logger?: Logger;
}

/**
 * Loads a global preimage that fits in a single call with loadKeccak256PreimagePart.
 */
export class DirectPreimageUploader implements PreimageUploader {
    readonly #gateway: ContractGateway;
    readonly #submitter: TransactionSubmitter;
    readonly #revertPolicy: RevertPolicy;
    readonly #logger: Logger;

    constructor(gateway: ContractGateway, submitter: TransactionSubmitter, options: DirectPreimageUploaderOptions = {}) {
        this.#gateway = gateway;
        this.#submitter = submitter;
        this.#revertPolicy = options.revertPolicy ?? 'warn';
        this.#logger = options.logger ?? new ConsoleLogger("DirectPreimageUploader");
    }

    async uploadPreimage(parentClaimIndex: bigint, data: PreimageOracleData, signal?: AbortSignal): Promise<void> {
        // local data is loaded through the dispute game, not the oracle
        if (data.isLocal) {
            throw new UnsupportedOperationError('LOCAL_DATA_UNSUPPORTED',
                `DirectPreimageUploader: Local data cannot be loaded directly (key: ${data.keyHex()})`);
        }
        if (signal?.aborted) {
            throw new CancelledError(`DirectPreimageUploader: Upload cancelled`, undefined, signal.reason);
        }

        this.#logger.info(`Loading preimage part (key: ${data.keyHex()}, parent: ${parentClaimIndex}, ` +
            `offset: ${data.oracleOffset}, size: ${data.oracleData.length})`);
        try {
            const candidate = await this.#gateway.addGlobalDataTx(data);
            const result = await abortable(this.#submitter.send(candidate, signal), signal);
            applyRevertPolicy(result, 'direct', this.#revertPolicy, this.#logger);
        } catch (e) {
            if (signal?.aborted) {
                throw new CancelledError(`DirectPreimageUploader: Upload cancelled`, undefined, e);
            }
            throw new SubmissionError(
                `DirectPreimageUploader: Failed to load preimage part (key: ${data.keyHex()}): ${errorMessage(e)}`,
                undefined, 0, e);
        }
    }
}
