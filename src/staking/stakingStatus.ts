/**
 * Staking status for one service on one staking contract: accrued rewards,
 * requests made this epoch against the activity checker's daily quota, the
 * epoch end and the staking program metadata.
 */

import type { DateTime } from 'luxon';
import { ACTIVITY_CHECKER_ABI, MECH_ABI, STAKING_TOKEN_ABI } from '../chain/abis.js';
import type { ChainReader } from '../chain/ChainClient.js';
import { OLAS_DECIMALS } from '../chain/constants.js';
import { expectBigInt, expectHex, expectList, toDecimal } from '../chain/values.js';
import { fetchStakingMetadata, type StakingMetadata } from '../ipfs/metadata.js';
import { chainLogger } from '../logging/index.js';
import { StakingStatusError, errorMessage } from '../shared/errors.js';
import { fromUnixSeconds } from '../shared/time.js';
import { computeEpochRequests, computeRequiredDailyRequests } from './target.js';

const REQUEST_COUNT_GETTERS = ['mapRequestsCounts', 'mapRequestCounts'] as const;

export interface StakingStatus {
  accruedRewards: number;
  accruedRewardsWei: bigint;
  mechRequestsThisEpoch: number;
  requiredMechRequests: number;
  epochEnd: DateTime;
  metadata: StakingMetadata;
  /** Set when the checkpoint baseline exceeds the lifetime request count. */
  checkpointInconsistent: boolean;
}

export interface StakingStatusInput {
  stakingContractAddress: string;
  mechAddress: string;
  activityCheckerAddress: string;
  serviceId: number;
  safeAddress: string;
}

export interface StakingStatusOptions {
  timezone: string;
  ipfsGatewayUrl: string;
  metadataTimeoutMs: number;
}

/**
 * Lifetime requests `requester` made to `mech`. Older mechs expose
 * `mapRequestsCounts`, newer ones `mapRequestCounts`.
 */
export async function getMechRequestCount(
  reader: ChainReader,
  mechAddress: string,
  requesterAddress: string,
): Promise<bigint> {
  const errors: string[] = [];
  for (const getter of REQUEST_COUNT_GETTERS) {
    try {
      const value = await reader.call(mechAddress, MECH_ABI, getter, [requesterAddress]);
      return expectBigInt(value, `${getter}()`);
    } catch (error) {
      errors.push(`${getter}: ${errorMessage(error)}`);
    }
  }
  throw new Error(`Failed to read request count from mech ${mechAddress} (${errors.join('; ')})`);
}

export class StakingStatusCalculator {
  constructor(
    private readonly reader: ChainReader,
    private readonly options: StakingStatusOptions,
  ) {}

  async getStatus(input: StakingStatusInput): Promise<StakingStatus> {
    const derived = await this.readDerived(input).catch((error: unknown) => {
      throw new StakingStatusError(
        `Failed to get staking status for service ${input.serviceId}: ${errorMessage(error)}`,
        { cause: error },
      );
    });

    const metadata = await fetchStakingMetadata(derived.metadataHash, {
      gatewayUrl: this.options.ipfsGatewayUrl,
      timeoutMs: this.options.metadataTimeoutMs,
    });

    return { ...derived.status, metadata };
  }

  // Steps up to metadata: everything that fails here is a StakingStatusError.
  private async readDerived(
    input: StakingStatusInput,
  ): Promise<{ status: Omit<StakingStatus, 'metadata'>; metadataHash: string }> {
    const onChain = await this.readOnChain(input);

    const mechRequestsThisEpoch = computeEpochRequests(onChain.lifetimeRequests, onChain.checkpointRequests);
    const checkpointInconsistent = mechRequestsThisEpoch < 0;
    if (checkpointInconsistent) {
      chainLogger.warn({
        serviceId: input.serviceId,
        stakingContract: input.stakingContractAddress,
        lifetimeRequests: onChain.lifetimeRequests.toString(),
        checkpointRequests: onChain.checkpointRequests.toString(),
      }, 'Checkpoint request count is ahead of the lifetime count');
    }

    const epochEnd = fromUnixSeconds(Number(onChain.tsCheckpoint + onChain.livenessPeriod), this.options.timezone);
    if (!epochEnd.isValid) {
      throw new Error(`Invalid epoch end (${epochEnd.invalidReason})`);
    }

    return {
      status: {
        accruedRewards: toDecimal(onChain.rewardWei, OLAS_DECIMALS),
        accruedRewardsWei: onChain.rewardWei,
        mechRequestsThisEpoch,
        requiredMechRequests: computeRequiredDailyRequests(onChain.livenessRatio),
        epochEnd,
        checkpointInconsistent,
      },
      metadataHash: onChain.metadataHash,
    };
  }

  private async readOnChain(input: StakingStatusInput) {
    const { reader } = this;
    const staking = input.stakingContractAddress;

    const mapServiceInfo = expectList(
      await reader.call(staking, STAKING_TOKEN_ABI, 'mapServiceInfo', [input.serviceId]),
      'mapServiceInfo()',
    );
    const rewardWei = expectBigInt(mapServiceInfo[3], 'mapServiceInfo().reward');

    const lifetimeRequests = await getMechRequestCount(reader, input.mechAddress, input.safeAddress);

    const serviceInfo = expectList(
      await reader.call(staking, STAKING_TOKEN_ABI, 'getServiceInfo', [input.serviceId]),
      'getServiceInfo()',
    );
    const nonces = expectList(serviceInfo[2], 'getServiceInfo().nonces');
    const checkpointRequests = nonces.length > 1 ? expectBigInt(nonces[1], 'getServiceInfo().nonces[1]') : 0n;

    const livenessRatio = expectBigInt(
      await reader.call(input.activityCheckerAddress, ACTIVITY_CHECKER_ABI, 'livenessRatio'),
      'livenessRatio()',
    );
    const livenessPeriod = expectBigInt(await reader.call(staking, STAKING_TOKEN_ABI, 'livenessPeriod'), 'livenessPeriod()');
    const tsCheckpoint = expectBigInt(await reader.call(staking, STAKING_TOKEN_ABI, 'tsCheckpoint'), 'tsCheckpoint()');
    const metadataHash = expectHex(await reader.call(staking, STAKING_TOKEN_ABI, 'metadataHash'), 'metadataHash()');

    return {
      rewardWei,
      lifetimeRequests,
      checkpointRequests,
      livenessRatio,
      livenessPeriod,
      tsCheckpoint,
      metadataHash,
    };
  }
}
