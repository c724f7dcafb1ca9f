/**
 * Wires configuration, chain access, the service registry, the bot and the
 * job queue, then runs until SIGINT or SIGTERM.
 */

import { resolve } from 'node:path';
import { ChainClient } from './chain/ChainClient.js';
import {
  getBalanceThresholds,
  getClaimSettings,
  getConfig,
  getConfigPath,
  getIpfsGatewayUrl,
  getLocalTimezone,
  getMetadataFetchTimeoutMs,
  getOptionalCoingeckoApiKey,
  getOptionalOperatePassword,
  getOptionalWithdrawalAddress,
  getRequiredChatId,
  getRequiredRpcUrl,
  getRequiredTelegramToken,
  getRpcTimeoutMs,
  loadFileConfig,
} from './config/index.js';
import {
  BalanceCommand,
  ClaimCommand,
  IpCommand,
  JobsCommand,
  SlotsCommand,
  StakingStatusCommand,
  WithdrawCommand,
} from './bot/commands/index.js';
import { scheduleTasks } from './bot/tasks.js';
import { TritonBot } from './bot/TritonBot.js';
import { getOlasPrice } from './http/price.js';
import { getPublicIp } from './http/publicIp.js';
import { configLogger, flushLogger, logger, serializeError } from './logging/index.js';
import { JobQueue } from './scheduler/JobQueue.js';
import { loadStakedServices } from './service/registry.js';

export async function runTriton(): Promise<void> {
  getConfig();
  const configPath = resolve(getConfigPath());
  const fileConfig = loadFileConfig(configPath);
  configLogger.info({ configPath, operators: Object.keys(fileConfig.operators) }, 'Configuration loaded');

  const chain = new ChainClient({ rpcUrl: getRequiredRpcUrl(), timeoutMs: getRpcTimeoutMs() });
  const timezone = getLocalTimezone();
  const claim = getClaimSettings();

  const services = await loadStakedServices({
    fileConfig,
    reader: chain,
    provider: chain.provider,
    password: getOptionalOperatePassword(),
    withdrawalAddress: getOptionalWithdrawalAddress(),
    status: {
      timezone,
      ipfsGatewayUrl: getIpfsGatewayUrl(),
      metadataTimeoutMs: getMetadataFetchTimeoutMs(),
    },
  });
  logger.info({ services: services.map((service) => service.name) }, 'Services loaded');

  const queue = new JobQueue();
  const coingeckoApiKey = getOptionalCoingeckoApiKey();
  const bot = new TritonBot(getRequiredTelegramToken(), getRequiredChatId(), [
    new StakingStatusCommand(services, () => getOlasPrice(coingeckoApiKey)),
    new BalanceCommand(services),
    new ClaimCommand(services, claim.manualClaim),
    new WithdrawCommand(services),
    new SlotsCommand(chain, fileConfig.stakingContracts),
    new JobsCommand(() => queue.list(), timezone),
    new IpCommand(() => getPublicIp()),
  ]);

  await bot.configure();
  scheduleTasks({ queue, notifier: bot, services, thresholds: getBalanceThresholds(), claim });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    queue.stop();
    bot.stop(signal);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await bot.launch();
  } finally {
    queue.stop();
    chain.destroy();
    await flushLogger();
  }
}

export async function main(): Promise<void> {
  try {
    await runTriton();
  } catch (error) {
    logger.fatal({ err: serializeError(error) }, 'Triton stopped with an error');
    await flushLogger();
    process.exitCode = 1;
  }
}
