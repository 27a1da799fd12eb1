import { describe, it, expect } from 'vitest';
import { ethers } from 'ethers';
import { PreimageOracleContract } from './preimage-oracle';
import { PreimageOracleData } from './preimage-data';
import { buildLeaves } from './leaves';
import { PreimageOracleAbi, type Leaf } from './param';
import { ORACLE_ADDRESS, patternBytes } from './__mocks__/oracle';

const iface = new ethers.Interface(PreimageOracleAbi);
const CHECKSUMMED = ethers.getAddress(ORACLE_ADDRESS);

function leavesOf(blocks: number): Leaf[] {
    return buildLeaves(new PreimageOracleData(Uint8Array.of(2), patternBytes(136 * blocks), 0));
}

/**
 * In-process stand-in for an RPC node answering eth_call against the oracle ABI.
 */
class FakeOracleRunner implements ethers.ContractRunner {
    readonly provider = null;
    readonly blockTags: unknown[] = [];
    failuresBeforeSuccess = 0;

    constructor(private readonly proposals: { claimant: string; uuid: bigint }[]) {}

    async call(tx: ethers.TransactionRequest): Promise<string> {
        this.blockTags.push(tx.blockTag);
        if (this.failuresBeforeSuccess > 0) {
            this.failuresBeforeSuccess--;
            throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
        }

        const parsed = iface.parseTransaction({ data: String(tx.data) });
        if (!parsed) throw new Error('unknown selector');
        switch (parsed.name) {
            case 'proposalCount':
                return iface.encodeFunctionResult('proposalCount', [this.proposals.length]);
            case 'proposals': {
                const proposal = this.proposals[Number(parsed.args[0])];
                return iface.encodeFunctionResult('proposals', [proposal.claimant, proposal.uuid]);
            }
            default:
                throw new Error(`unexpected call ${parsed.name}`);
        }
    }
}

describe('PreimageOracleContract', () => {
    describe('initLargePreimage()', () => {
        it('encodes an initLPP call to the oracle', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            const candidate = await oracle.initLargePreimage(1234n, 16, 272);

            expect(candidate.to).toBe(CHECKSUMMED);
            const [uuid, partOffset, claimedSize] = iface.decodeFunctionData('initLPP', candidate.data);
            expect(uuid).toBe(1234n);
            expect(partOffset).toBe(16n);
            expect(claimedSize).toBe(272n);
        });

        it('accepts the largest uuid', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            const candidate = await oracle.initLargePreimage((1n << 130n) - 1n, 0, 0);
            expect(iface.decodeFunctionData('initLPP', candidate.data)[0]).toBe((1n << 130n) - 1n);
        });

        it('rejects a uuid outside [0, 2^130)', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            await expect(oracle.initLargePreimage(1n << 130n, 0, 0)).rejects.toThrow(/uuid out of range/);
            await expect(oracle.initLargePreimage(-1n, 0, 0)).rejects.toThrow(/uuid out of range/);
        });

        it('rejects sizes that do not fit in a uint32', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            await expect(oracle.initLargePreimage(1n, 0, 2 ** 32)).rejects.toThrow(/value must be a uint32/);
        });
    });

    describe('addLeaves()', () => {
        it('packs all leaves into one call when they fit', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            const leaves = leavesOf(2);

            const candidates = await oracle.addLeaves(7n, leaves, false);

            expect(candidates).toHaveLength(1);
            const [uuid, start, input, commitments, finalize] = iface.decodeFunctionData('addLeavesLPP', candidates[0].data);
            expect(uuid).toBe(7n);
            expect(start).toBe(0n);
            expect(input).toBe(ethers.hexlify(ethers.concat([leaves[0].input, leaves[1].input])));
            expect([...commitments]).toEqual([leaves[0].stateCommitment, leaves[1].stateCommitment]);
            expect(finalize).toBe(false);
        });

        it('splits leaves into batches of maxLeavesPerTx', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null, { maxLeavesPerTx: 2 });
            const leaves = leavesOf(5);

            const candidates = await oracle.addLeaves(7n, leaves, false);
            const decoded = candidates.map(c => iface.decodeFunctionData('addLeavesLPP', c.data));

            expect(decoded.map(args => args[1])).toEqual([0n, 2n, 4n]);
            expect(decoded.map(args => ethers.dataLength(args[2]))).toEqual([272, 272, 136]);
            expect(decoded.map(args => args[3].length)).toEqual([2, 2, 1]);
            expect(decoded[2][3][0]).toBe(leaves[4].stateCommitment);
            expect(candidates.every(c => c.to === CHECKSUMMED)).toBe(true);
        });

        it('only sets finalize on the last batch', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null, { maxLeavesPerTx: 2 });

            const candidates = await oracle.addLeaves(7n, leavesOf(3), true);
            const finalizeFlags = candidates.map(c => iface.decodeFunctionData('addLeavesLPP', c.data)[4]);

            expect(finalizeFlags).toEqual([false, true]);
        });

        it('returns no candidates for no leaves', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            expect(await oracle.addLeaves(7n, [], false)).toEqual([]);
        });

        it('rejects leaves out of order', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            const leaves = leavesOf(2);
            await expect(oracle.addLeaves(7n, [leaves[1], leaves[0]], false)).rejects.toThrow(/leaves must be contiguous/);
        });
    });

    describe('addGlobalDataTx()', () => {
        it('encodes a loadKeccak256PreimagePart call', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, null);
            const data = new PreimageOracleData(Uint8Array.of(2, 0xcc), patternBytes(20), 545);

            const candidate = await oracle.addGlobalDataTx(data);

            const [partOffset, preimage] = iface.decodeFunctionData('loadKeccak256PreimagePart', candidate.data);
            expect(candidate.to).toBe(CHECKSUMMED);
            expect(partOffset).toBe(545n);
            expect(preimage).toBe(ethers.hexlify(patternBytes(20)));
        });
    });

    describe('getActivePreimages()', () => {
        const proposals = [
            { claimant: ethers.getAddress('0x' + 'aa'.repeat(20)), uuid: 1111n },
            { claimant: ethers.getAddress('0x' + 'bb'.repeat(20)), uuid: 2222n },
            { claimant: ethers.getAddress('0x' + 'cc'.repeat(20)), uuid: 3333n },
        ];

        it('reads every proposal in index order at the given block', async () => {
            const runner = new FakeOracleRunner(proposals);
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, runner, { readConcurrency: 2 });

            const active = await oracle.getActivePreimages(1234);

            expect(active).toEqual(proposals);
            expect(runner.blockTags).toEqual([1234, 1234, 1234, 1234]);
        });

        it('returns nothing when there are no proposals', async () => {
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, new FakeOracleRunner([]));
            expect(await oracle.getActivePreimages('latest')).toEqual([]);
        });

        it('retries transient read failures', async () => {
            const runner = new FakeOracleRunner(proposals.slice(0, 1));
            runner.failuresBeforeSuccess = 2;
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, runner, { retry: { baseDelay: 1, maxDelay: 1 } });

            expect(await oracle.getActivePreimages('latest')).toEqual(proposals.slice(0, 1));
        });

        it('wraps read failures with the block', async () => {
            const runner = new FakeOracleRunner(proposals);
            runner.failuresBeforeSuccess = 100;
            const oracle = new PreimageOracleContract(ORACLE_ADDRESS, runner, { retry: { baseDelay: 1, maxDelay: 1 } });

            await expect(oracle.getActivePreimages(99)).rejects.toThrow('PreimageOracle: Failed to load proposals at block 99');
        });
    });

    it('rejects an invalid address', () => {
        expect(() => new PreimageOracleContract('0x1234', null)).toThrow(/invalid oracle address/);
    });
});
