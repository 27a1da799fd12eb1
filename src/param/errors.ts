import type { UploadPhase } from "./type";

export type UploadErrorCode =
    | 'ALLOCATION_FAILED'
    | 'INITIALIZATION_FAILED'
    | 'SUBMISSION_FAILED'
    | 'FINALIZATION_PENDING'
    | 'LOCAL_DATA_UNSUPPORTED'
    | 'TX_REVERTED'
    | 'CANCELLED';

interface UploadErrorOptions {
    uuid?: bigint;
    cause?: unknown;
}

export class PreimageUploadError extends Error {
    readonly code: UploadErrorCode;
    readonly uuid?: bigint;

    constructor(code: UploadErrorCode, message: string, options: UploadErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.code = code;
        this.uuid = options.uuid;
    }
}

// Entropy source failure while allocating a proposal uuid
export class ConfigurationError extends PreimageUploadError {
    constructor(message: string, cause?: unknown) {
        super('ALLOCATION_FAILED', message, { cause });
    }
}

export class InitializationError extends PreimageUploadError {
    constructor(message: string, uuid: bigint, cause?: unknown) {
        super('INITIALIZATION_FAILED', message, { uuid, cause });
    }
}

export class SubmissionError extends PreimageUploadError {
    /** Leaf batches confirmed on-chain before the failure. */
    readonly confirmedBatches: number;

    constructor(message: string, uuid: bigint | undefined, confirmedBatches: number, cause?: unknown) {
        super('SUBMISSION_FAILED', message, { uuid, cause });
        this.confirmedBatches = confirmedBatches;
    }
}

export class UnsupportedOperationError extends PreimageUploadError {
    constructor(code: 'FINALIZATION_PENDING' | 'LOCAL_DATA_UNSUPPORTED', message: string, uuid?: bigint) {
        super(code, message, { uuid });
    }
}

export class RevertedTransactionError extends PreimageUploadError {
    readonly transactionHash: string;
    readonly phase: UploadPhase;

    constructor(message: string, transactionHash: string, phase: UploadPhase) {
        super('TX_REVERTED', message);
        this.transactionHash = transactionHash;
        this.phase = phase;
    }
}

export class CancelledError extends PreimageUploadError {
    constructor(message: string, uuid?: bigint, cause?: unknown) {
        super('CANCELLED', message, { uuid, cause });
    }
}

export function isPreimageUploadError(error: unknown, code?: UploadErrorCode): error is PreimageUploadError {
    if (!(error instanceof PreimageUploadError)) return false;
    return code === undefined || error.code === code;
}
