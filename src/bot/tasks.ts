/**
 * Scheduled jobs posting to the configured chat.
 */

import type { BalanceThresholds, ClaimSettings } from '../config/index.js';
import { schedulerLogger } from '../logging/index.js';
import type { JobQueue } from '../scheduler/JobQueue.js';
import type { StakedService } from '../service/StakedService.js';
import { claimAll, collectBalanceAlerts, withdrawAll } from './actions.js';
import { MARKDOWN_REPLY } from './commands/index.js';
import type { Notifier } from './TritonBot.js';

export const START_DELAY_MS = 3_000;
export const BALANCE_CHECK_INTERVAL_MS = 60 * 60 * 1000;
export const BALANCE_CHECK_FIRST_DELAY_MS = 5_000;
export const AUTOCLAIM_PREFIX = '(Autoclaim) ';

export interface TaskDependencies {
  queue: JobQueue;
  notifier: Notifier;
  services: readonly StakedService[];
  thresholds: BalanceThresholds;
  claim: ClaimSettings;
}

export function autoclaimCron(claim: Pick<ClaimSettings, 'autoclaimDay' | 'autoclaimHourUtc'>): string {
  return `0 ${claim.autoclaimHourUtc} ${claim.autoclaimDay} * *`;
}

export async function runBalanceCheck(deps: Pick<TaskDependencies, 'notifier' | 'services' | 'thresholds'>): Promise<void> {
  schedulerLogger.info('Running balance check task');
  const alerts = await collectBalanceAlerts(deps.services, deps.thresholds);
  for (const alert of alerts) {
    await deps.notifier.notify(alert, MARKDOWN_REPLY);
  }
}

export async function runAutoclaim(deps: Pick<TaskDependencies, 'notifier' | 'services' | 'claim'>): Promise<void> {
  schedulerLogger.info('Running autoclaim task');
  if (!deps.claim.autoclaim) {
    schedulerLogger.info('Autoclaim task is disabled');
    return;
  }

  await claimAll(deps.services);
  const messages = await withdrawAll(deps.services, AUTOCLAIM_PREFIX);
  if (messages.length === 0) {
    schedulerLogger.info('No rewards to withdraw');
    return;
  }
  await deps.notifier.notify(messages.join('\n\n'), MARKDOWN_REPLY);
}

export function scheduleTasks(deps: TaskDependencies): void {
  const { queue } = deps;

  queue.runOnce('start', () => deps.notifier.notify('Triton has started'), START_DELAY_MS);
  queue.runRepeating('balance_check', () => runBalanceCheck(deps), BALANCE_CHECK_INTERVAL_MS, BALANCE_CHECK_FIRST_DELAY_MS);
  queue.runCron('autoclaim', () => runAutoclaim(deps), autoclaimCron(deps.claim), 'UTC');
}
