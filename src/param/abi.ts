export const PreimageOracleAbi: readonly string[] = [
  'function initLPP(uint256 _uuid, uint32 _partOffset, uint32 _claimedSize) external payable',
  'function addLeavesLPP(uint256 _uuid, uint256 _inputStartBlock, bytes calldata _input, bytes32[] calldata _stateCommitments, bool _finalize) external',
  'function loadKeccak256PreimagePart(uint256 _partOffset, bytes calldata _preimage) external',

  'function proposalCount() external view returns (uint256)',
  'function proposals(uint256) external view returns (address claimant, uint256 uuid)'
];
