/**
 * One configured staked service, named `<operator>-<service>`.
 *
 * Best-effort operations (claim, withdraw) never throw: failures are logged
 * here and surfaced as values. Reads (status, balances) throw so the caller
 * can report them per service.
 */

import type pino from 'pino';
import type { ChainReader } from '../chain/ChainClient.js';
import { ZERO_ADDRESS, type ChainProfile } from '../chain/constants.js';
import { createServiceLogger, serializeError } from '../logging/index.js';
import { homeChainData } from '../operate/OperateServiceManager.js';
import type { OperateService, ServiceOperations } from '../operate/types.js';
import { ServiceValidationError, fail, ok, type Result } from '../shared/errors.js';
import { resolveMechAddress, type MechResolutionStrategy } from '../staking/mechResolver.js';
import { StakingStatusCalculator, type StakingStatus, type StakingStatusOptions } from '../staking/stakingStatus.js';
import { BalanceAggregator, resolveServiceAddresses, type BalanceSnapshot, type ServiceAddresses } from './BalanceAggregator.js';
import { RewardsWithdrawer, type Withdrawal } from './RewardsWithdrawer.js';

export interface StakedServiceOptions {
  name: string;
  service: OperateService;
  operations: ServiceOperations;
  reader: ChainReader;
  chain: ChainProfile;
  status: StakingStatusOptions;
  withdrawalAddress?: string;
  mechStrategies?: readonly MechResolutionStrategy[];
}

export class StakedService {
  readonly name: string;
  readonly service: OperateService;
  readonly chain: ChainProfile;
  readonly withdrawalAddress?: string;
  private readonly operations: ServiceOperations;
  private readonly reader: ChainReader;
  private readonly calculator: StakingStatusCalculator;
  private readonly balances: BalanceAggregator;
  private readonly withdrawer: RewardsWithdrawer;
  private readonly mechStrategies?: readonly MechResolutionStrategy[];
  private readonly log: pino.Logger;

  constructor(options: StakedServiceOptions) {
    this.name = options.name;
    this.service = options.service;
    this.chain = options.chain;
    this.withdrawalAddress = options.withdrawalAddress;
    this.operations = options.operations;
    this.reader = options.reader;
    this.mechStrategies = options.mechStrategies;
    this.calculator = new StakingStatusCalculator(options.reader, options.status);
    this.balances = new BalanceAggregator(options.reader, options.chain);
    this.withdrawer = new RewardsWithdrawer(options.reader, options.operations);
    this.log = createServiceLogger(options.name);
  }

  get serviceId(): number {
    return homeChainData(this.service).token;
  }

  get agentAddress(): string {
    const agent = homeChainData(this.service).instances[0];
    if (!agent) {
      throw new ServiceValidationError(`No agent instances found for service ${this.name}`);
    }
    return agent;
  }

  get serviceSafe(): string {
    const multisig = homeChainData(this.service).multisig;
    if (!multisig) {
      throw new ServiceValidationError(`No service Safe found for service ${this.name}`);
    }
    return multisig;
  }

  get masterEoa(): string {
    return this.operations.masterWallet.address;
  }

  get masterSafe(): string {
    const safe = this.operations.masterWallet.safes[this.service.homeChain];
    if (!safe) {
      throw new ServiceValidationError(`Master wallet has no Safe on ${this.service.homeChain}`);
    }
    return safe;
  }

  async getStakingContractAddress(): Promise<string> {
    return this.operations.resolveStakingContract(this.service);
  }

  async getStakingStatus(): Promise<StakingStatus> {
    const stakingContractAddress = await this.getStakingContractAddress();
    const activityCheckerAddress = await this.operations.getActivityChecker(stakingContractAddress);

    const mech = await resolveMechAddress(this.reader, activityCheckerAddress, this.mechStrategies);
    for (const failure of mech.failures) {
      this.log.debug({ strategy: failure.strategy, error: failure.error.message }, 'Mech strategy failed');
    }
    this.log.info({ mech: mech.address, source: mech.source }, 'Mech address resolved');
    if (mech.address.toLowerCase() === ZERO_ADDRESS) {
      this.log.warn({ activityChecker: activityCheckerAddress, source: mech.source }, 'Activity checker points at the zero address');
    }

    return this.calculator.getStatus({
      stakingContractAddress,
      mechAddress: mech.address,
      activityCheckerAddress,
      serviceId: this.serviceId,
      safeAddress: this.serviceSafe,
    });
  }

  addresses(): ServiceAddresses {
    return resolveServiceAddresses(this.service, this.operations.masterWallet);
  }

  async checkBalance(): Promise<BalanceSnapshot> {
    const snapshot = await this.balances.getBalances(this.addresses());
    const { nativeSymbol, wrappedNativeSymbol } = this.chain;
    this.log.info(
      `Agent EOA balance = ${snapshot.agentEoaNative.toFixed(2)} ${nativeSymbol}` +
      ` | Service Safe balance: ${snapshot.serviceSafeNative.toFixed(2)} ${nativeSymbol}` +
      `  ${snapshot.serviceSafeWrappedNative.toFixed(2)} ${wrappedNativeSymbol}` +
      `  ${snapshot.serviceSafeOlas.toFixed(2)} OLAS` +
      ` | Master EOA balance: ${snapshot.masterEoaNative.toFixed(2)} ${nativeSymbol}` +
      ` | Master Safe balance: ${snapshot.masterSafeNative.toFixed(2)} ${nativeSymbol}`,
    );
    return snapshot;
  }

  /**
   * Claimed amount in wei; 0 when nothing was pending.
   */
  async claimRewards(): Promise<Result<bigint>> {
    this.log.info('Claiming rewards');
    try {
      return ok(await this.operations.claimRewards(this.service));
    } catch (error) {
      this.log.error({ err: serializeError(error) }, 'Failed to claim rewards');
      return fail(error);
    }
  }

  async withdrawRewards(): Promise<Withdrawal[]> {
    if (!this.withdrawalAddress) {
      return [];
    }

    let addresses: ServiceAddresses;
    try {
      addresses = this.addresses();
    } catch (error) {
      this.log.error({ err: serializeError(error) }, 'Cannot withdraw rewards');
      return [];
    }

    const report = await this.withdrawer.withdraw({
      service: this.service,
      addresses,
      olasToken: this.chain.olasToken,
      withdrawalAddress: this.withdrawalAddress,
    });

    for (const failure of report.failures) {
      this.log.error(
        { source: failure.source, stage: failure.stage, err: serializeError(failure.error) },
        failure.stage === 'balance' ? 'Failed to get OLAS balance' : 'Failed to withdraw OLAS',
      );
    }
    for (const withdrawal of report.withdrawals) {
      this.log.info({ ...withdrawal }, 'Rewards withdrawn');
    }
    return report.withdrawals;
  }
}
