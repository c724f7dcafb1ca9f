// Human-readable ABI fragments for the contracts the bot reads or calls.

export const ERC20_ABI = [
  'function balanceOf(address owner) view returns (uint256)',
  'function decimals() view returns (uint8)',
  'function transfer(address to, uint256 amount) returns (bool)',
];

export const STAKING_TOKEN_ABI = [
  'function mapServiceInfo(uint256 serviceId) view returns (address multisig, address owner, uint256 tsStart, uint256 reward, uint256 inactivity)',
  'function getServiceInfo(uint256 serviceId) view returns (tuple(address multisig, address owner, uint256[] nonces, uint256 tsStart, uint256 reward, uint256 inactivity))',
  'function getServiceIds() view returns (uint256[])',
  'function livenessPeriod() view returns (uint256)',
  'function tsCheckpoint() view returns (uint256)',
  'function metadataHash() view returns (bytes32)',
  'function activityChecker() view returns (address)',
  'function claim(uint256 serviceId) returns (uint256)',
];

export const ACTIVITY_CHECKER_ABI = [
  'function livenessRatio() view returns (uint256)',
];

// Current generation: the checker counts requests on a mech marketplace.
export const REQUESTER_ACTIVITY_CHECKER_ABI = [
  ...ACTIVITY_CHECKER_ABI,
  'function mechMarketplace() view returns (address)',
];

// Previous generation: the checker is bound to a single agent mech.
export const MECH_ACTIVITY_CHECKER_ABI = [
  ...ACTIVITY_CHECKER_ABI,
  'function agentMech() view returns (address)',
];

export const MECH_ABI = [
  'function mapRequestsCounts(address requester) view returns (uint256)',
  'function mapRequestCounts(address requester) view returns (uint256)',
];

export const SAFE_ABI = [
  'function getOwners() view returns (address[])',
  'function getThreshold() view returns (uint256)',
  'function nonce() view returns (uint256)',
  'function getTransactionHash(address to, uint256 value, bytes data, uint8 operation, uint256 safeTxGas, uint256 baseGas, uint256 gasPrice, address gasToken, address refundReceiver, uint256 _nonce) view returns (bytes32)',
  'function execTransaction(address to, uint256 value, bytes data, uint8 operation, uint256 safeTxGas, uint256 baseGas, uint256 gasPrice, address gasToken, address payable refundReceiver, bytes signatures) payable returns (bool)',
];
