export interface ChainData {
  instances: string[];
  /** On-chain service id; -1 while unminted. */
  token: number;
  multisig?: string;
  stakingProgramId?: string;
}

export interface ChainConfig {
  chain: string;
  chainData: ChainData;
}

export interface OperateService {
  serviceConfigId: string;
  name: string;
  homeChain: string;
  agentAddresses: string[];
  chainConfigs: Record<string, ChainConfig>;
}

export interface MasterWallet {
  address: string;
  /** chain name → master Safe address */
  safes: Record<string, string>;
}

export interface TokenTransfer {
  token: string;
  to: string;
  amount: bigint;
}

/**
 * What the bot needs from the operate layer for one operator profile:
 * staking program resolution, reward claims and Safe transfers.
 */
export interface ServiceOperations {
  readonly masterWallet: MasterWallet;
  resolveStakingContract(service: OperateService): Promise<string>;
  getActivityChecker(stakingContractAddress: string): Promise<string>;
  /** Claims pending staking rewards; resolves to the claimed amount in wei. */
  claimRewards(service: OperateService): Promise<bigint>;
  transferFromMasterSafe(chain: string, transfer: TokenTransfer): Promise<string>;
  transferFromServiceSafe(service: OperateService, transfer: TokenTransfer): Promise<string>;
}
