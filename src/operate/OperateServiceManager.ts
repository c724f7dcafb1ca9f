/**
 * Service operations for one operator profile: staking program resolution,
 * reward claims and token transfers out of the master and service Safes.
 */

import { Interface, isAddress, type Provider } from 'ethers';
import { STAKING_TOKEN_ABI } from '../chain/abis.js';
import type { ChainReader } from '../chain/ChainClient.js';
import { encodeTransfer } from '../chain/erc20.js';
import { expectAddress, expectBigInt, expectList } from '../chain/values.js';
import { operateLogger } from '../logging/index.js';
import { OperateError, ServiceValidationError } from '../shared/errors.js';
import type { OperateProfile } from './OperateProfile.js';
import { executeSafeTransaction } from './SafeExecutor.js';
import type { ChainData, MasterWallet, OperateService, ServiceOperations, TokenTransfer } from './types.js';

const stakingInterface = new Interface(STAKING_TOKEN_ABI);

export interface OperateServiceManagerOptions {
  profile: OperateProfile;
  masterWallet: MasterWallet;
  reader: ChainReader;
  provider: Provider;
  password?: string;
  /** chain → staking program id → staking contract */
  stakingPrograms: Record<string, Record<string, string>>;
}

export function homeChainData(service: OperateService): ChainData {
  const chainConfig = service.chainConfigs[service.homeChain];
  if (!chainConfig) {
    throw new ServiceValidationError(`Service ${service.name} has no chain config for ${service.homeChain}`);
  }
  return chainConfig.chainData;
}

export class OperateServiceManager implements ServiceOperations {
  readonly masterWallet: MasterWallet;
  private readonly profile: OperateProfile;
  private readonly reader: ChainReader;
  private readonly provider: Provider;
  private readonly password?: string;
  private readonly stakingPrograms: Record<string, Record<string, string>>;

  constructor(options: OperateServiceManagerOptions) {
    this.profile = options.profile;
    this.masterWallet = options.masterWallet;
    this.reader = options.reader;
    this.provider = options.provider;
    this.password = options.password;
    this.stakingPrograms = options.stakingPrograms;
  }

  async resolveStakingContract(service: OperateService): Promise<string> {
    const programId = homeChainData(service).stakingProgramId;
    if (!programId) {
      throw new ServiceValidationError(`Service ${service.name} has no staking program`);
    }
    if (isAddress(programId)) {
      return programId;
    }

    const address = this.stakingPrograms[service.homeChain]?.[programId];
    if (!address) {
      throw new ServiceValidationError(
        `Unknown staking program "${programId}" on ${service.homeChain}; add it under staking_programs in config.yaml`,
      );
    }
    return address;
  }

  async getActivityChecker(stakingContractAddress: string): Promise<string> {
    return expectAddress(
      await this.reader.call(stakingContractAddress, STAKING_TOKEN_ABI, 'activityChecker'),
      'activityChecker()',
    );
  }

  async claimRewards(service: OperateService): Promise<bigint> {
    const serviceId = homeChainData(service).token;
    const stakingContract = await this.resolveStakingContract(service);

    const info = expectList(
      await this.reader.call(stakingContract, STAKING_TOKEN_ABI, 'mapServiceInfo', [serviceId]),
      'mapServiceInfo()',
    );
    const pending = expectBigInt(info[3], 'mapServiceInfo().reward');
    if (pending === 0n) {
      operateLogger.info({ service: service.name, serviceId }, 'No rewards to claim');
      return 0n;
    }

    const signer = await this.profile.loadMasterSigner(this.password);
    const txHash = await executeSafeTransaction(this.provider, signer, this.masterSafe(service.homeChain), {
      to: stakingContract,
      data: stakingInterface.encodeFunctionData('claim', [serviceId]),
    });
    operateLogger.info({ service: service.name, serviceId, txHash, amount: pending.toString() }, 'Rewards claimed');
    return pending;
  }

  async transferFromMasterSafe(chain: string, transfer: TokenTransfer): Promise<string> {
    const signer = await this.profile.loadMasterSigner(this.password);
    return executeSafeTransaction(this.provider, signer, this.masterSafe(chain), {
      to: transfer.token,
      data: encodeTransfer(transfer.to, transfer.amount),
    });
  }

  async transferFromServiceSafe(service: OperateService, transfer: TokenTransfer): Promise<string> {
    const chainData = homeChainData(service);
    const agentAddress = chainData.instances[0];
    if (!agentAddress || !chainData.multisig) {
      throw new ServiceValidationError(`Service ${service.name} has no agent instance or service Safe`);
    }

    const signer = await this.profile.loadAgentSigner(agentAddress, this.password);
    return executeSafeTransaction(this.provider, signer, chainData.multisig, {
      to: transfer.token,
      data: encodeTransfer(transfer.to, transfer.amount),
    });
  }

  private masterSafe(chain: string): string {
    const safe = this.masterWallet.safes[chain];
    if (!safe) {
      throw new OperateError(`Master wallet has no Safe on ${chain}`);
    }
    return safe;
  }
}
