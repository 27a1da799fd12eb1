import { ethers } from "ethers";
import { MAX_PROPOSAL_UUID, MAX_UINT32 } from "../param";

export async function retry<T>(fn: () => Promise<T>, retries: number): Promise<T> {
    for (let i = 0; i < retries; i++) {
        try {
            return await fn();
        } catch (error) {
            if (i === retries - 1) {
                throw error;
            }
        }
    }
    throw new Error('Function failed after maximum retries');
}

export function copy(des: Uint8Array, desOff: number, src: Uint8Array, srcOff: number): number {
    const srcLength = src.length - srcOff;
    const desLength = des.length - desOff;
    const length = Math.min(srcLength, desLength);
    des.set(src.subarray(srcOff, srcOff + length), desOff);
    return length;
}

export function assertUint32(value: number, name: string): void {
    ethers.assertArgument(Number.isInteger(value) && value >= 0 && value <= MAX_UINT32,
        "value must be a uint32", name, value);
}

export function assertProposalUuid(uuid: bigint): void {
    ethers.assertArgument(uuid >= 0n && uuid < MAX_PROPOSAL_UUID, "uuid out of range", "uuid", uuid);
}

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as it aborts.
 * The underlying work is not stopped.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return promise;

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
