/**
 * Operate Profile Reader
 *
 * Reads an operate home directory (`<operator path>/.operate`):
 *   services/sc-* /config.json   service configurations
 *   wallets/ethereum.json        master EOA and master Safes per chain
 *   wallets/ethereum.txt         master EOA keystore (V3)
 *   keys/<agent address>         agent keys, raw hex or V3 keystore
 */

import { promises as fs, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { Wallet, type BaseWallet } from 'ethers';
import { z } from 'zod';
import { operateLogger } from '../logging/index.js';
import { OperateError, errorMessage } from '../shared/errors.js';
import type { ChainConfig, MasterWallet, OperateService } from './types.js';

export const OPERATE_DIR_NAME = '.operate';

const serviceConfigSchema = z.object({
  service_config_id: z.string().optional(),
  name: z.string().optional(),
  home_chain: z.string(),
  agent_addresses: z.array(z.string()).default([]),
  chain_configs: z.record(z.object({
    ledger_config: z.object({
      chain: z.string().optional(),
    }).passthrough().optional(),
    chain_data: z.object({
      instances: z.array(z.string()).default([]),
      token: z.number().int().default(-1),
      multisig: z.string().optional(),
      user_params: z.object({
        staking_program_id: z.string().optional(),
      }).passthrough().optional(),
    }).passthrough(),
  }).passthrough()),
}).passthrough();

const walletSchema = z.object({
  address: z.string(),
  safes: z.record(z.string()).default({}),
}).passthrough();

const keyFileSchema = z.object({
  private_key: z.string(),
}).passthrough();

const RAW_PRIVATE_KEY = /^0x[a-fA-F0-9]{64}$/;

async function readJson(path: string): Promise<unknown> {
  const raw = await fs.readFile(path, 'utf-8');
  return JSON.parse(raw);
}

export function parseServiceConfig(document: unknown, directoryName: string): OperateService {
  const config = serviceConfigSchema.parse(document);

  const chainConfigs: Record<string, ChainConfig> = {};
  for (const [chain, chainConfig] of Object.entries(config.chain_configs)) {
    const data = chainConfig.chain_data;
    chainConfigs[chain] = {
      chain: chainConfig.ledger_config?.chain ?? chain,
      chainData: {
        instances: data.instances,
        token: data.token,
        multisig: data.multisig,
        stakingProgramId: data.user_params?.staking_program_id,
      },
    };
  }

  return {
    serviceConfigId: config.service_config_id ?? directoryName,
    name: config.name ?? directoryName,
    homeChain: config.home_chain,
    agentAddresses: config.agent_addresses,
    chainConfigs,
  };
}

export class OperateProfile {
  constructor(readonly operateDir: string) {}

  static fromOperatorPath(operatorPath: string): OperateProfile {
    return new OperateProfile(join(operatorPath, OPERATE_DIR_NAME));
  }

  /**
   * All service configurations, ordered by config id. Directories with a
   * missing or malformed config.json are skipped.
   */
  async listServices(): Promise<OperateService[]> {
    const servicesDir = join(this.operateDir, 'services');
    let entries: Dirent[];
    try {
      entries = await fs.readdir(servicesDir, { withFileTypes: true });
    } catch (error) {
      throw new OperateError(`Cannot read services directory ${servicesDir}: ${errorMessage(error)}`, { cause: error });
    }

    const serviceDirs = entries
      .filter((entry) => entry.isDirectory() && entry.name.startsWith('sc-'))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));

    const services: OperateService[] = [];
    for (const dir of serviceDirs) {
      const configPath = join(servicesDir, dir, 'config.json');
      try {
        services.push(parseServiceConfig(await readJson(configPath), dir));
      } catch (error) {
        operateLogger.warn({ configPath, error: errorMessage(error) }, 'Skipping unreadable service config');
      }
    }
    return services;
  }

  async loadMasterWallet(): Promise<MasterWallet> {
    const walletPath = join(this.operateDir, 'wallets', 'ethereum.json');
    try {
      const wallet = walletSchema.parse(await readJson(walletPath));
      return { address: wallet.address, safes: wallet.safes };
    } catch (error) {
      throw new OperateError(`Cannot load master wallet from ${walletPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Master EOA signer, decrypted from wallets/ethereum.txt.
   */
  async loadMasterSigner(password: string | undefined): Promise<BaseWallet> {
    const keystorePath = join(this.operateDir, 'wallets', 'ethereum.txt');
    let keystore: string;
    try {
      keystore = (await fs.readFile(keystorePath, 'utf-8')).trim();
    } catch (error) {
      throw new OperateError(`Master wallet keystore not found at ${keystorePath}`, { cause: error });
    }
    return decryptKey(keystore, password, 'master wallet');
  }

  /**
   * Signer for an agent instance, read from keys/<address>.
   */
  async loadAgentSigner(agentAddress: string, password: string | undefined): Promise<BaseWallet> {
    const keyPath = join(this.operateDir, 'keys', agentAddress);
    let privateKey: string;
    try {
      privateKey = keyFileSchema.parse(await readJson(keyPath)).private_key;
    } catch (error) {
      throw new OperateError(`Cannot read agent key ${keyPath}: ${errorMessage(error)}`, { cause: error });
    }
    return decryptKey(privateKey, password, `agent ${agentAddress}`);
  }
}

function decryptKey(material: string, password: string | undefined, label: string): BaseWallet {
  if (RAW_PRIVATE_KEY.test(material)) {
    return new Wallet(material);
  }

  if (!material.startsWith('{')) {
    throw new OperateError(`Unrecognized key format for ${label}`);
  }

  if (!password) {
    throw new OperateError(`Encrypted keystore for ${label} but OPERATE_USER_PASSWORD is not set`);
  }

  try {
    return Wallet.fromEncryptedJsonSync(material, password);
  } catch (error) {
    throw new OperateError(`Failed to decrypt keystore for ${label}: ${errorMessage(error)}`, { cause: error });
  }
}
