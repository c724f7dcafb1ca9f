import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Wallet } from 'ethers';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { OperateProfile, parseServiceConfig } from '../../../src/operate/OperateProfile.js';
import { OperateError } from '../../../src/shared/errors.js';

const AGENT_KEY = `0x${'11'.repeat(32)}`;
const MASTER_KEY = `0x${'22'.repeat(32)}`;
const AGENT = new Wallet(AGENT_KEY).address;

function serviceConfig(name: string, token: number) {
  return {
    name,
    service_config_id: `sc-${name}`,
    home_chain: 'gnosis',
    agent_addresses: [AGENT],
    chain_configs: {
      gnosis: {
        ledger_config: { rpc: 'http://localhost:8545', chain: 'gnosis' },
        chain_data: {
          instances: [AGENT],
          token,
          multisig: '0xb000000000000000000000000000000000000002',
          user_params: { staking_program_id: 'pearl_beta', nft: 'ignored' },
        },
      },
    },
    hash: 'bafy-test',
  };
}

describe('OperateProfile', () => {
  let root: string;
  let operateDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'triton-operate-'));
    operateDir = join(root, '.operate');
    mkdirSync(join(operateDir, 'services', 'sc-bbb'), { recursive: true });
    mkdirSync(join(operateDir, 'services', 'sc-aaa'), { recursive: true });
    mkdirSync(join(operateDir, 'services', 'sc-broken'), { recursive: true });
    mkdirSync(join(operateDir, 'wallets'), { recursive: true });
    mkdirSync(join(operateDir, 'keys'), { recursive: true });

    writeFileSync(join(operateDir, 'services', 'sc-aaa', 'config.json'), JSON.stringify(serviceConfig('trader', 42)));
    writeFileSync(join(operateDir, 'services', 'sc-bbb', 'config.json'), JSON.stringify(serviceConfig('mech', 7)));
    writeFileSync(join(operateDir, 'services', 'sc-broken', 'config.json'), '{"name": ');
    writeFileSync(join(operateDir, 'wallets', 'ethereum.json'), JSON.stringify({
      address: '0xc000000000000000000000000000000000000003',
      safes: { gnosis: '0xd000000000000000000000000000000000000004' },
      ledger_type: 0,
    }));
    writeFileSync(join(operateDir, 'wallets', 'ethereum.txt'), `${MASTER_KEY}\n`);
    writeFileSync(join(operateDir, 'keys', AGENT), JSON.stringify({ ledger: 0, address: AGENT, private_key: AGENT_KEY }));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists services in config id order and skips unreadable ones', async () => {
    const services = await OperateProfile.fromOperatorPath(root).listServices();

    expect(services.map((service) => service.name)).toEqual(['trader', 'mech']);
    expect(services[0]).toEqual({
      serviceConfigId: 'sc-trader',
      name: 'trader',
      homeChain: 'gnosis',
      agentAddresses: [AGENT],
      chainConfigs: {
        gnosis: {
          chain: 'gnosis',
          chainData: {
            instances: [AGENT],
            token: 42,
            multisig: '0xb000000000000000000000000000000000000002',
            stakingProgramId: 'pearl_beta',
          },
        },
      },
    });
  });

  it('loads the master wallet', async () => {
    await expect(new OperateProfile(operateDir).loadMasterWallet()).resolves.toEqual({
      address: '0xc000000000000000000000000000000000000003',
      safes: { gnosis: '0xd000000000000000000000000000000000000004' },
    });
  });

  it('loads raw master and agent keys', async () => {
    const profile = new OperateProfile(operateDir);

    expect((await profile.loadMasterSigner(undefined)).address).toBe(new Wallet(MASTER_KEY).address);
    expect((await profile.loadAgentSigner(AGENT, undefined)).address).toBe(AGENT);
  });

  it('requires a password for an encrypted keystore', async () => {
    writeFileSync(join(operateDir, 'wallets', 'ethereum.txt'), '{"version":3,"crypto":{}}');

    await expect(new OperateProfile(operateDir).loadMasterSigner(undefined)).rejects.toThrow(
      'Encrypted keystore for master wallet but OPERATE_USER_PASSWORD is not set',
    );
  });

  it('fails clearly when the services directory is missing', async () => {
    await expect(new OperateProfile(join(root, 'missing')).listServices()).rejects.toBeInstanceOf(OperateError);
  });
});

describe('parseServiceConfig', () => {
  it('falls back to the directory name and an unminted token', () => {
    const service = parseServiceConfig({
      home_chain: 'gnosis',
      chain_configs: { gnosis: { chain_data: {} } },
    }, 'sc-fallback');

    expect(service.name).toBe('sc-fallback');
    expect(service.serviceConfigId).toBe('sc-fallback');
    expect(service.chainConfigs.gnosis?.chainData).toEqual({
      instances: [],
      token: -1,
      multisig: undefined,
      stakingProgramId: undefined,
    });
  });
});
