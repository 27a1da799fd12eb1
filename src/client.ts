import { ethers } from "ethers";
import { BlockTag, LargePreimageMetaData, UploaderConfig } from "./param";
import { PreimageOracleData } from "./preimage-data";
import { PreimageOracleContract } from "./preimage-oracle";
import { LargePreimageUploader } from "./large-preimage-uploader";
import { DirectPreimageUploader } from "./direct-preimage-uploader";
import { SplitPreimageUploader } from "./split-preimage-uploader";
import { TxSender } from "./utils/tx-sender";
import { ConsoleLogger } from "./utils/logger";

export class PreimageUploaderClient {
    // ======================= Private fields =======================
    #oracle!: PreimageOracleContract;
    #uploader!: SplitPreimageUploader;
    readonly #loggers: ConsoleLogger[] = [];

    static create(config: UploaderConfig): PreimageUploaderClient {
        const client = new PreimageUploaderClient();
        client.#init(config);
        return client;
    }

    private constructor() {}

    // ======================= Public methods =======================
    get oracleAddress(): string {
        return this.#oracle.address;
    }

    /**
     * Enable or disable logging for every component of the client
     */
    setLogEnabled(value: boolean) {
        this.#loggers.forEach(logger => logger.setEnabled(value));
    }

    /**
     * Upload a preimage, streaming it as a large preimage proposal when it is too big for one call.
     * A streamed upload currently always rejects with FINALIZATION_PENDING once every leaf is confirmed.
     */
    async uploadPreimage(parentClaimIndex: bigint, data: PreimageOracleData, signal?: AbortSignal): Promise<void> {
        return this.#uploader.uploadPreimage(parentClaimIndex, data, signal);
    }

    async getActivePreimages(blockTag: BlockTag = "latest"): Promise<LargePreimageMetaData[]> {
        return this.#oracle.getActivePreimages(blockTag);
    }

    // ======================= Private methods =======================
    #init(config: UploaderConfig) {
        const { rpc, privateKey, oracleAddress, logging = true } = config;
        if (!rpc) {
            throw new Error("PreimageUploaderClient: 'rpc' is required.");
        }
        if (!privateKey) {
            throw new Error("PreimageUploaderClient: 'privateKey' is required.");
        }
        if (!oracleAddress) {
            throw new Error("PreimageUploaderClient: 'oracleAddress' is required.");
        }

        const provider = new ethers.JsonRpcProvider(rpc);
        const wallet = new ethers.Wallet(privateKey, provider);
        this.#oracle = new PreimageOracleContract(oracleAddress, provider, {
            maxLeavesPerTx: config.maxLeavesPerTx,
        });
        const sender = new TxSender(wallet, provider, { confirmNonce: config.confirmNonce });

        const largeLogger = this.#logger("LargePreimageUploader", logging);
        const directLogger = this.#logger("DirectPreimageUploader", logging);
        const large = new LargePreimageUploader(this.#oracle, sender, {
            revertPolicy: config.revertPolicy,
            logger: largeLogger,
        });
        const direct = new DirectPreimageUploader(this.#oracle, sender, {
            revertPolicy: config.revertPolicy,
            logger: directLogger,
        });
        this.#uploader = new SplitPreimageUploader(direct, large, config.largePreimageThreshold);
    }

    #logger(component: string, enabled: boolean): ConsoleLogger {
        const logger = new ConsoleLogger(component, enabled);
        this.#loggers.push(logger);
        return logger;
    }
}
