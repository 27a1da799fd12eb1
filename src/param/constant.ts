// Keccak256 absorption rate, in bytes
export const KECCAK_BLOCK_SIZE: number = 136;

// Lanes in the keccak-f[1600] state
export const KECCAK_STATE_LANES: number = 25;
export const KECCAK_STATE_SIZE: number = KECCAK_STATE_LANES * 8;

export const PROPOSAL_UUID_BITS: number = 130;
export const MAX_PROPOSAL_UUID: bigint = 1n << BigInt(PROPOSAL_UUID_BITS);

export const MAX_UINT32: number = 0xffffffff;


/**
 * Calldata for a single addLeavesLPP call is kept under ~300KB,
 * which leaves room below the block gas limit for the commitments array.
 */
export const MAX_CHUNK_SIZE: number = 300_000;
export const MAX_LEAVES_PER_TX: number = Math.floor(MAX_CHUNK_SIZE / KECCAK_BLOCK_SIZE);

// Anything larger goes through the streaming (LPP) path
export const DEFAULT_LARGE_PREIMAGE_THRESHOLD: number = 117_000;


export const MAX_RETRIES: number = 3;

// Concurrent proposals(i) reads when scanning active preimages
export const PROPOSAL_READ_CONCURRENCY: number = 8;
