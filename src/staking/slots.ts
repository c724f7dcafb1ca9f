import { STAKING_TOKEN_ABI } from '../chain/abis.js';
import type { ChainReader } from '../chain/ChainClient.js';
import { expectList } from '../chain/values.js';
import type { StakingContractEntry } from '../config/index.js';

export const DEFAULT_STAKING_CONTRACTS: readonly StakingContractEntry[] = [
  { name: 'Hobbyist (100 OLAS)', address: '0x389b46c259631acd6a69bde8b6cee218230bae8c', slots: 100 },
  { name: 'Hobbyist 2 (500 OLAS)', address: '0x238eb6993b90a978ec6aad7530d6429c949c08da', slots: 50 },
  { name: 'Expert (1k OLAS)', address: '0x5344b7dd311e5d3dddd46a4f71481bd7b05aaa3e', slots: 20 },
  { name: 'Expert 2 (1k OLAS)', address: '0xb964e44c126410df341ae04b13ab10a985fe3513', slots: 40 },
  { name: 'Expert 3 (2k OLAS)', address: '0x80fad33cadb5f53f9d29f02db97d682e8b101618', slots: 20 },
  { name: 'Expert 4 (10k OLAS)', address: '0xad9d891134443b443d7f30013c7e14fe27f2e029', slots: 26 },
  { name: 'Expert 5 (10k OLAS)', address: '0xe56df1e563de1b10715cb313d514af350d207212', slots: 26 },
  { name: 'Expert 6 (1k OLAS)', address: '0x2546214aee7eea4bee7689c81231017ca231dc93', slots: 40 },
  { name: 'Expert 7 (10k OLAS)', address: '0xd7a3c8b975f71030135f1a66e9e23164d54ff455', slots: 26 },
];

export interface SlotAvailability {
  name: string;
  available: number;
}

/**
 * Free slots per staking contract: configured capacity minus staked services.
 */
export async function getAvailableSlots(
  reader: ChainReader,
  contracts: readonly StakingContractEntry[] = DEFAULT_STAKING_CONTRACTS,
): Promise<SlotAvailability[]> {
  const slots: SlotAvailability[] = [];
  for (const contract of contracts) {
    const ids = expectList(
      await reader.call(contract.address, STAKING_TOKEN_ABI, 'getServiceIds'),
      'getServiceIds()',
    );
    slots.push({ name: contract.name, available: contract.slots - ids.length });
  }
  return slots;
}
