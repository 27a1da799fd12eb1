export * from './param';
export { PreimageOracleData } from './preimage-data';
export { Position } from './position';
export { KeccakStateMatrix } from './keccak/state-matrix';
export type { SpongeState } from './keccak/state-matrix';
export { buildLeaves } from './leaves';
export type { SpongeFactory } from './leaves';
export { RandomProposalIdStrategy } from './proposal-id';
export { applyRevertPolicy } from './revert-policy';
export { PreimageOracleContract } from './preimage-oracle';
export type { PreimageOracleOptions } from './preimage-oracle';
export { LargePreimageUploader } from './large-preimage-uploader';
export type { LargePreimageUploaderOptions } from './large-preimage-uploader';
export { DirectPreimageUploader } from './direct-preimage-uploader';
export type { DirectPreimageUploaderOptions } from './direct-preimage-uploader';
export { SplitPreimageUploader } from './split-preimage-uploader';
export { PreimageUploaderClient } from './client';
export * as utils from './utils';
