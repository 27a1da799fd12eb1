import type { ethers } from "ethers";
import { Mutex } from "async-mutex";
import { MAX_RETRIES, TransactionSubmitter, TxCandidate, TxResult } from "../param";
import { abortable, retry } from "./util";

// The slices of ethers.Wallet / ethers.Provider the sender relies on
export interface SendingWallet {
    readonly address: string;
    sendTransaction(tx: ethers.TransactionRequest): Promise<{ hash: string }>;
}

export interface ReceiptSource {
    getTransactionCount(address: string, blockTag: "latest"): Promise<number>;
    waitForTransaction(hash: string, confirms?: number): Promise<{ status: number | null } | null>;
}

export interface TxSenderOptions {
    // Re-read the account nonce before every broadcast
    confirmNonce?: boolean;
    confirmations?: number;
}

/**
 * Broadcasts transaction candidates one at a time and waits for their receipts.
 */
export class TxSender implements TransactionSubmitter {
    readonly #wallet: SendingWallet;
    readonly #provider: ReceiptSource;
    // Serializes nonce lookup and submission
    readonly #mutex = new Mutex();
    readonly #confirmNonce: boolean;
    readonly #confirmations: number;

    constructor(wallet: SendingWallet, provider: ReceiptSource, options: TxSenderOptions = {}) {
        this.#wallet = wallet;
        this.#provider = provider;
        this.#confirmNonce = options.confirmNonce ?? false;
        this.#confirmations = options.confirmations ?? 1;
    }

    async send(candidate: TxCandidate, signal?: AbortSignal): Promise<TxResult> {
        signal?.throwIfAborted();
        const hash = await abortable(this.#sendLocked(candidate, signal), signal);
        const receipt = await abortable(this.#waitForReceipt(hash), signal);
        return {
            status: receipt.status === 1 ? 'success' : 'failed',
            transactionHash: hash,
        };
    }

    // Nothing is broadcast once the signal has aborted, whether it fired in the queue or between attempts
    async #sendLocked(candidate: TxCandidate, signal?: AbortSignal): Promise<string> {
        const release = await this.#mutex.acquire();
        try {
            signal?.throwIfAborted();
            const tx: ethers.TransactionRequest = { ...candidate };
            const response = await retry(async () => {
                signal?.throwIfAborted();
                if (this.#confirmNonce) {
                    tx.nonce = await this.#provider.getTransactionCount(this.#wallet.address, "latest");
                }
                return this.#wallet.sendTransaction(tx);
            }, MAX_RETRIES);
            return response.hash;
        } finally {
            release();
        }
    }

    async #waitForReceipt(hash: string): Promise<{ status: number | null }> {
        const receipt = await retry(() => this.#provider.waitForTransaction(hash, this.#confirmations), MAX_RETRIES);
        if (!receipt) {
            throw new Error(`TxSender: No receipt for transaction ${hash}`);
        }
        return receipt;
    }
}
