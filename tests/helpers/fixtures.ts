import { vi } from 'vitest';
import { getChainProfile } from '../../src/chain/constants.js';
import type { MasterWallet, OperateService, ServiceOperations } from '../../src/operate/types.js';

export const GNOSIS = getChainProfile('gnosis');

export const AGENT = '0xa000000000000000000000000000000000000001';
export const SERVICE_SAFE = '0xb000000000000000000000000000000000000002';
export const MASTER_EOA = '0xc000000000000000000000000000000000000003';
export const MASTER_SAFE = '0xd000000000000000000000000000000000000004';
export const STAKING_CONTRACT = '0xe000000000000000000000000000000000000005';
export const WITHDRAWAL = '0xf000000000000000000000000000000000000006';

export function makeService(overrides: { instances?: string[]; multisig?: string; token?: number } = {}): OperateService {
  return {
    serviceConfigId: 'sc-test',
    name: 'trader',
    homeChain: 'gnosis',
    agentAddresses: [AGENT],
    chainConfigs: {
      gnosis: {
        chain: 'gnosis',
        chainData: {
          instances: overrides.instances ?? [AGENT],
          token: overrides.token ?? 42,
          multisig: 'multisig' in overrides ? overrides.multisig : SERVICE_SAFE,
          stakingProgramId: STAKING_CONTRACT,
        },
      },
    },
  };
}

export function makeMasterWallet(safes: Record<string, string> = { gnosis: MASTER_SAFE }): MasterWallet {
  return { address: MASTER_EOA, safes };
}

export function makeOperations(masterWallet: MasterWallet = makeMasterWallet()) {
  return {
    masterWallet,
    resolveStakingContract: vi.fn<ServiceOperations['resolveStakingContract']>().mockResolvedValue(STAKING_CONTRACT),
    getActivityChecker: vi.fn<ServiceOperations['getActivityChecker']>(),
    claimRewards: vi.fn<ServiceOperations['claimRewards']>(),
    transferFromMasterSafe: vi.fn<ServiceOperations['transferFromMasterSafe']>(),
    transferFromServiceSafe: vi.fn<ServiceOperations['transferFromServiceSafe']>(),
  } satisfies ServiceOperations;
}
