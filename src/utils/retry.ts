// Flattened view of an RPC failure; nested cause/response fields fill the gaps
interface JsonRpcError {
    code?: number | string;
    message?: string;
    statusCode?: number;
}

type ErrorType = 'SOCKET' | 'NETWORK' | 'TIMEOUT' | 'RATE_LIMIT' | 'SERVER' | 'RPC_SERVER' | 'CLIENT' | 'UNKNOWN';

export interface RetryOptions {
    totalRetries?: number;
    baseDelay?: number; // ms
    maxDelay?: number;  // ms
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
    totalRetries: 5,
    baseDelay: 100,
    maxDelay: 5000,
};

// Per-category limits; the total above applies on top
const RETRIES_BY_TYPE: Record<ErrorType, number> = {
    SOCKET: 5,
    NETWORK: 3,
    TIMEOUT: 3,
    RATE_LIMIT: 5,
    SERVER: 2,
    RPC_SERVER: 2,
    CLIENT: 0,
    UNKNOWN: 1
};

function isNested(value: unknown, parent: object): value is object {
    return typeof value === 'object' && value !== null && value !== parent;
}

function toRpcError(error: unknown): JsonRpcError {
    if (typeof error !== 'object' || error === null) {
        return { message: String(error) };
    }
    const code = 'code' in error && (typeof error.code === 'number' || typeof error.code === 'string')
        ? error.code : undefined;
    const message = 'message' in error && typeof error.message === 'string' ? error.message : undefined;
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
    const cause: JsonRpcError = 'cause' in error && isNested(error.cause, error) ? toRpcError(error.cause) : {};
    const response: JsonRpcError = 'response' in error && isNested(error.response, error) ? toRpcError(error.response) : {};
    return {
        code: code ?? cause.code,
        message: message || cause.message,
        statusCode: statusCode ?? response.statusCode,
    };
}

function classifyError(error: JsonRpcError): ErrorType {
    const code = error.code ?? '';
    const message = (error.message || '').toLowerCase();
    const statusCode = error.statusCode;

    if (['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ECONNABORTED'].includes(String(code))) return 'SOCKET';
    if (['ETIMEDOUT', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH'].includes(String(code))) return 'NETWORK';
    if (message.includes('timeout') || message.includes('timed out')) return 'TIMEOUT';
    if (statusCode === 429 || code === 429 || message.includes('rate limit')) return 'RATE_LIMIT';
    if ([-32000, -32603, -32601, -32600].includes(Number(code))) return 'RPC_SERVER';
    if (typeof statusCode === 'number') {
        if (statusCode >= 500) return 'SERVER';
        if (statusCode >= 400) return 'CLIENT';
    }
    return 'UNKNOWN';
}

// Exponential backoff with ±20% jitter
function computeDelay(attempt: number, options: Required<RetryOptions>): number {
    const delay = Math.min(options.baseDelay * Math.pow(2, Math.max(attempt, 0)), options.maxDelay);
    const jitter = delay * 0.2 * (Math.random() * 2 - 1);
    return Math.floor(Math.max(delay + jitter, 0));
}

/**
 * Retries read calls against the RPC, with a budget per error category.
 * Client errors (4xx) are thrown straight away.
 */
export async function stableRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
    const errorTypeCount: Record<ErrorType, number> = {
        SOCKET: 0, NETWORK: 0, TIMEOUT: 0, RATE_LIMIT: 0,
        SERVER: 0, RPC_SERVER: 0, CLIENT: 0, UNKNOWN: 0
    };

    let lastError: unknown;
    let totalAttempts = 0;
    while (true) {
        try {
            return await fn();
        } catch (err) {
            lastError = err;
            totalAttempts++;

            const type = classifyError(toRpcError(err));
            if (type === 'CLIENT') {
                throw new Error(`Non-retryable error: ${toRpcError(err).message} (type: ${type})`, { cause: err });
            }

            errorTypeCount[type] += 1;
            if (errorTypeCount[type] > RETRIES_BY_TYPE[type] || totalAttempts > opts.totalRetries) {
                break;
            }

            const delay = computeDelay(errorTypeCount[type] - 1, opts);
            await new Promise(r => setTimeout(r, delay));
        }
    }

    const last = toRpcError(lastError);
    throw new Error(
        `Retry failed after ${totalAttempts} attempts (last error type: ${classifyError(last)}): ${last.message || 'Unknown error'}`,
        { cause: lastError }
    );
}
