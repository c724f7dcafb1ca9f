/**
 * Per-service loops shared by commands and scheduled jobs. A failure for one
 * service is logged and turned into a line for that service; the loop goes on.
 */

import { OLAS_DECIMALS } from '../chain/constants.js';
import { toDecimal } from '../chain/values.js';
import { botLogger, serializeError } from '../logging/index.js';
import type { StakedService } from '../service/StakedService.js';
import { errorMessage } from '../shared/errors.js';
import {
  escapeMarkdown,
  formatBalanceAlerts,
  formatBalances,
  formatClaim,
  formatNoWithdrawal,
  formatStakingStatus,
  formatTotalRewards,
  formatWithdrawal,
  type BalanceThresholdsView,
} from './format.js';

async function eachService<T>(
  services: readonly StakedService[],
  action: string,
  run: (service: StakedService) => Promise<T>,
  onError: (service: StakedService, error: unknown) => T,
): Promise<T[]> {
  const results: T[] = [];
  for (const service of services) {
    try {
      results.push(await run(service));
    } catch (error) {
      botLogger.error({ service: service.name, action, err: serializeError(error) }, `Failed to ${action}`);
      results.push(onError(service, error));
    }
  }
  return results;
}

export async function collectStakingStatus(
  services: readonly StakedService[],
  getOlasPrice: () => Promise<number | null>,
): Promise<string[]> {
  const totals = { accrued: 0, agentSafes: 0, masterSafes: 0 };
  const countedMasterSafes = new Set<string>();

  const messages = await eachService(
    services,
    'get staking status',
    async (service) => {
      const status = await service.getStakingStatus();
      const balances = await service.checkBalance();

      totals.accrued += status.accruedRewards;
      totals.agentSafes += balances.serviceSafeOlas;
      const masterSafe = service.masterSafe.toLowerCase();
      if (!countedMasterSafes.has(masterSafe)) {
        countedMasterSafes.add(masterSafe);
        totals.masterSafes += balances.masterSafeOlas;
      }
      return formatStakingStatus(service.name, status);
    },
    (service, error) => `[${service.name}] Failed to get staking status: ${errorMessage(error)}`,
  );

  messages.push(formatTotalRewards(totals, await getOlasPrice()));
  return messages;
}

export async function collectBalances(services: readonly StakedService[]): Promise<string[]> {
  return eachService(
    services,
    'check balances',
    async (service) => formatBalances(service.name, service.chain, service.addresses(), await service.checkBalance()),
    (service, error) => `\\[${escapeMarkdown(service.name)}] Failed to check balances: ${escapeMarkdown(errorMessage(error))}`,
  );
}

export async function collectBalanceAlerts(
  services: readonly StakedService[],
  thresholds: BalanceThresholdsView,
): Promise<string[]> {
  const perService = await eachService(
    services,
    'check balances',
    async (service) =>
      formatBalanceAlerts(service.name, service.chain, service.addresses(), await service.checkBalance(), thresholds),
    () => [],
  );
  return perService.flat();
}

/**
 * Claims for every service. Failed claims count as nothing claimed.
 */
export async function claimAll(services: readonly StakedService[]): Promise<string[]> {
  const messages: string[] = [];
  for (const service of services) {
    const result = await service.claimRewards();
    const claimedWei = result.ok ? result.value : 0n;
    if (claimedWei > 0n) {
      messages.push(formatClaim(service.name, toDecimal(claimedWei, OLAS_DECIMALS)));
    }
  }
  return messages;
}

export async function withdrawAll(services: readonly StakedService[], prefix = ''): Promise<string[]> {
  const perService = await eachService(
    services,
    'withdraw rewards',
    async (service) => {
      const withdrawals = await service.withdrawRewards();
      const { withdrawalAddress } = service;
      if (withdrawals.length === 0 || !withdrawalAddress) {
        return [formatNoWithdrawal(service.name, prefix)];
      }
      return withdrawals.map((withdrawal) =>
        formatWithdrawal(service.name, service.chain, withdrawalAddress, withdrawal, prefix),
      );
    },
    (service) => [formatNoWithdrawal(service.name, prefix)],
  );
  return perService.flat();
}
