import type {
    BlockTag, ContractGateway, LargePreimageMetaData, Leaf, Logger,
    TransactionSubmitter, TxCandidate, TxResult
} from '../param';
import type { PreimageOracleData } from '../preimage-data';
import type { LogLevel } from '../utils/logger';

export const ORACLE_ADDRESS = '0x00000000000000000000000000000000000000aa';

export interface FakeGatewayOptions {
    // leaves per addLeaves candidate; everything in one candidate when unset
    batchSize?: number;
    failInit?: Error;
    failAddLeaves?: Error;
    failGlobalData?: Error;
}

/**
 * Gateway stand-in that records every call into a shared event log.
 * Candidates carry a readable tag in `data` instead of calldata.
 */
export class FakeGateway implements ContractGateway {
    readonly initCalls: { uuid: bigint; partOffset: number; claimedSize: number }[] = [];
    readonly addLeavesCalls: { uuid: bigint; leaves: readonly Leaf[]; finalize: boolean }[] = [];
    readonly globalDataCalls: PreimageOracleData[] = [];

    constructor(private readonly events: string[], private readonly options: FakeGatewayOptions = {}) {}

    async initLargePreimage(uuid: bigint, partOffset: number, claimedSize: number): Promise<TxCandidate> {
        this.events.push(`init:${uuid}`);
        this.initCalls.push({ uuid, partOffset, claimedSize });
        if (this.options.failInit) throw this.options.failInit;
        return { to: ORACLE_ADDRESS, data: 'init' };
    }

    async addLeaves(uuid: bigint, leaves: readonly Leaf[], finalize: boolean): Promise<TxCandidate[]> {
        this.events.push(`addLeaves:${uuid}:${leaves.length}:${finalize}`);
        this.addLeavesCalls.push({ uuid, leaves, finalize });
        if (this.options.failAddLeaves) throw this.options.failAddLeaves;

        const size = this.options.batchSize ?? Math.max(leaves.length, 1);
        const batches = Math.ceil(leaves.length / size);
        return Array.from({ length: batches }, (_, i) => ({ to: ORACLE_ADDRESS, data: `leaves-${i}` }));
    }

    async addGlobalDataTx(data: PreimageOracleData): Promise<TxCandidate> {
        this.events.push('addGlobalData');
        this.globalDataCalls.push(data);
        if (this.options.failGlobalData) throw this.options.failGlobalData;
        return { to: ORACLE_ADDRESS, data: 'global' };
    }

    async getActivePreimages(_blockTag: BlockTag): Promise<LargePreimageMetaData[]> {
        return [];
    }
}

/**
 * Submitter stand-in. Every candidate succeeds unless a response is registered for its tag.
 */
export class FakeSubmitter implements TransactionSubmitter {
    readonly sent: TxCandidate[] = [];
    readonly responses = new Map<string, TxResult | Error>();
    onSend?: (candidate: TxCandidate) => void;

    constructor(private readonly events: string[]) {}

    async send(candidate: TxCandidate, _signal?: AbortSignal): Promise<TxResult> {
        this.events.push(`send:${candidate.data}`);
        this.sent.push(candidate);
        this.onSend?.(candidate);

        const response = this.responses.get(candidate.data);
        if (response instanceof Error) throw response;
        return response ?? { status: 'success', transactionHash: `0x${this.sent.length.toString(16).padStart(64, '0')}` };
    }
}

export class RecordingLogger implements Logger {
    readonly lines: { level: LogLevel; message: string }[] = [];

    debug(message: string): void {
        this.lines.push({ level: 'debug', message });
    }

    info(message: string): void {
        this.lines.push({ level: 'info', message });
    }

    warn(message: string): void {
        this.lines.push({ level: 'warn', message });
    }

    error(message: string): void {
        this.lines.push({ level: 'error', message });
    }

    messages(level: LogLevel): string[] {
        return this.lines.filter(line => line.level === level).map(line => line.message);
    }
}

export function patternBytes(length: number, seed: number = 0): Uint8Array {
    return Uint8Array.from({ length }, (_, i) => (i + seed) % 256);
}
