/**
 * Chat message builders. Balance, withdrawal and alert messages use
 * Telegram's legacy Markdown; the rest are plain text.
 */

import type { ChainProfile } from '../chain/constants.js';
import { explorerAddressUrl, explorerTxUrl } from '../chain/constants.js';
import type { BalanceSnapshot, ServiceAddresses } from '../service/BalanceAggregator.js';
import type { Withdrawal } from '../service/RewardsWithdrawer.js';
import type { SlotAvailability } from '../staking/slots.js';
import type { StakingStatus } from '../staking/stakingStatus.js';
import { formatDateTime } from '../shared/time.js';

const SIGNIFICANT_DIGITS = 6;

/**
 * Compact number rendering: six significant digits, trailing zeros dropped,
 * exponent notation below 1e-4 and from 1e6.
 */
export function formatG(value: number): string {
  if (value === 0) return '0';
  if (!Number.isFinite(value)) return String(value);

  const [mantissa, exponentText] = value.toExponential(SIGNIFICANT_DIGITS - 1).split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= SIGNIFICANT_DIGITS) {
    const sign = exponent < 0 ? '-' : '+';
    return `${stripZeros(mantissa)}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  return stripZeros(value.toFixed(SIGNIFICANT_DIGITS - 1 - exponent));
}

function stripZeros(text: string): string {
  return text.includes('.') ? text.replace(/\.?0+$/, '') : text;
}

/**
 * Escape the characters legacy Markdown treats as entity delimiters.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, '\\$&');
}

function link(label: string, url: string): string {
  return `[${label}](${url})`;
}

// ---------------------------------------------------------------------------
// /staking_status
// ---------------------------------------------------------------------------

export function formatStakingStatus(name: string, status: StakingStatus): string {
  const program = typeof status.metadata.name === 'string' ? status.metadata.name : 'unknown';
  return (
    `[${name}] ${formatG(status.accruedRewards)} OLAS ` +
    `[${status.mechRequestsThisEpoch}/${status.requiredMechRequests}]\n` +
    `Staking program: ${program}\n` +
    `Next epoch: ${formatDateTime(status.epochEnd)}`
  );
}

export interface RewardsTotals {
  accrued: number;
  agentSafes: number;
  masterSafes: number;
}

export function formatTotalRewards(totals: RewardsTotals, olasPriceUsd: number | null): string {
  const combined = totals.accrued + totals.agentSafes + totals.masterSafes;
  let message = `Total rewards = ${formatG(combined)} OLAS`;

  const parts: string[] = [];
  if (totals.accrued) parts.push(`${formatG(totals.accrued)} accrued`);
  if (totals.agentSafes) parts.push(`${formatG(totals.agentSafes)} in agent safes`);
  if (totals.masterSafes) parts.push(`${formatG(totals.masterSafes)} in master safes`);
  if (parts.length > 0) {
    message += ` (${parts.join(' + ')})`;
  }

  const value = olasPriceUsd ? combined * olasPriceUsd : 0;
  if (value) {
    message += ` [$${formatG(value)}]`;
  }
  return message;
}

// ---------------------------------------------------------------------------
// /balance and balance alerts
// ---------------------------------------------------------------------------

export function formatBalances(
  name: string,
  chain: ChainProfile,
  addresses: ServiceAddresses,
  balances: BalanceSnapshot,
): string {
  const native = chain.nativeSymbol;
  return [
    `\\[${escapeMarkdown(name)}]`,
    `${link('Agent EOA', explorerAddressUrl(chain, addresses.agentEoa))} = ${formatG(balances.agentEoaNative)} ${native}`,
    `${link('Service Safe', explorerAddressUrl(chain, addresses.serviceSafe))} = ${formatG(balances.serviceSafeNative)} ${native}` +
      `  ${formatG(balances.serviceSafeWrappedNative)} ${chain.wrappedNativeSymbol}  ${formatG(balances.serviceSafeOlas)} OLAS`,
    `${link('Master EOA', explorerAddressUrl(chain, addresses.masterEoa))} = ${formatG(balances.masterEoaNative)} ${native}`,
    `${link('Master Safe', explorerAddressUrl(chain, addresses.masterSafe))} = ${formatG(balances.masterSafeNative)} ${native}` +
      `  ${formatG(balances.masterSafeOlas)} OLAS`,
  ].join('\n');
}

export interface BalanceThresholdsView {
  agentEoa: number;
  serviceSafe: number;
  masterSafe: number;
}

/**
 * Alert lines for every balance below its threshold, in address order.
 */
export function formatBalanceAlerts(
  name: string,
  chain: ChainProfile,
  addresses: ServiceAddresses,
  balances: BalanceSnapshot,
  thresholds: BalanceThresholdsView,
): string[] {
  const native = chain.nativeSymbol;
  const label = `\\[${escapeMarkdown(name)}]`;
  const alerts: string[] = [];

  if (balances.agentEoaNative < thresholds.agentEoa) {
    alerts.push(
      `${label} ${link('Agent EOA', explorerAddressUrl(chain, addresses.agentEoa))} ` +
      `balance is ${formatG(balances.agentEoaNative)} ${native}`,
    );
  }
  if (balances.serviceSafeNative + balances.serviceSafeWrappedNative < thresholds.serviceSafe) {
    alerts.push(
      `${label} ${link('Service Safe', explorerAddressUrl(chain, addresses.serviceSafe))} ` +
      `balance is ${formatG(balances.serviceSafeNative)} ${native}  ` +
      `${formatG(balances.serviceSafeWrappedNative)} ${chain.wrappedNativeSymbol}`,
    );
  }
  if (balances.masterSafeNative < thresholds.masterSafe) {
    alerts.push(
      `${label} ${link('Master Safe', explorerAddressUrl(chain, addresses.masterSafe))} ` +
      `balance is ${formatG(balances.masterSafeNative)} ${native}`,
    );
  }
  return alerts;
}

// ---------------------------------------------------------------------------
// /claim, /withdraw and autoclaim
// ---------------------------------------------------------------------------

export function formatClaim(name: string, claimedOlas: number): string {
  return `[${name}] Claimed ${formatG(claimedOlas)} OLAS rewards into the Master safe.`;
}

export function formatWithdrawal(
  name: string,
  chain: ChainProfile,
  withdrawalAddress: string,
  withdrawal: Withdrawal,
  prefix = '',
): string {
  return (
    `\\[${escapeMarkdown(name)}] ${prefix}Sent the ${link('withdrawal transaction', explorerTxUrl(chain, withdrawal.txHash))}. ` +
    `${formatG(withdrawal.amount)} OLAS sent from the ${withdrawal.source} to ` +
    `${link(withdrawalAddress, explorerAddressUrl(chain, withdrawalAddress))} #withdraw`
  );
}

export function formatNoWithdrawal(name: string, prefix = ''): string {
  return `\\[${escapeMarkdown(name)}] ${prefix}Cannot withdraw rewards`;
}

// ---------------------------------------------------------------------------
// /slots, /jobs
// ---------------------------------------------------------------------------

export function formatSlots(slots: readonly SlotAvailability[]): string {
  return slots.map((slot) => `[${slot.name}] ${slot.available} available slots`).join('\n');
}

export interface JobView {
  name: string;
  nextRun: string;
}

export function formatJobs(jobs: readonly JobView[]): string {
  if (jobs.length === 0) {
    return 'No scheduled jobs';
  }
  return jobs.map((job) => `• ${job.name}: ${job.nextRun}`).join('\n');
}
