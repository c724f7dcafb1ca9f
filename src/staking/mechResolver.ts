/**
 * Mech Resolver
 *
 * Finds the mech whose request counter a staking contract's activity checker
 * watches. Two activity checker generations exist on-chain: the requester
 * checker (`mechMarketplace()`) and the older mech checker (`agentMech()`).
 * Strategies are tried in order; when both reads fail a fixed mech is used.
 * Resolution never throws.
 */

import { MECH_ACTIVITY_CHECKER_ABI, REQUESTER_ACTIVITY_CHECKER_ABI } from '../chain/abis.js';
import type { ChainReader } from '../chain/ChainClient.js';
import { FALLBACK_MECH_ADDRESS } from '../chain/constants.js';
import { fail, ok, type Result } from '../shared/errors.js';

export type MechSource = 'mechMarketplace' | 'agentMech' | 'fallback';

export interface MechResolutionStrategy {
  name: MechSource;
  resolve(reader: ChainReader, activityCheckerAddress: string): Promise<Result<string>>;
}

export interface StrategyFailure {
  strategy: MechSource;
  error: Error;
}

export interface MechResolution {
  address: string;
  source: MechSource;
  /** Strategies that failed before the winning one, in order. */
  failures: StrategyFailure[];
}

function expectMech(value: unknown, method: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new TypeError(`${method}() returned no address`);
  }
  return value;
}

function contractGetterStrategy(
  name: MechSource,
  abi: readonly string[],
  method: string,
): MechResolutionStrategy {
  return {
    name,
    async resolve(reader, activityCheckerAddress) {
      try {
        const value = await reader.call(activityCheckerAddress, abi, method);
        return ok(expectMech(value, method));
      } catch (error) {
        return fail(error);
      }
    },
  };
}

export const mechMarketplaceStrategy = contractGetterStrategy(
  'mechMarketplace',
  REQUESTER_ACTIVITY_CHECKER_ABI,
  'mechMarketplace',
);

export const agentMechStrategy = contractGetterStrategy(
  'agentMech',
  MECH_ACTIVITY_CHECKER_ABI,
  'agentMech',
);

export const fallbackStrategy: MechResolutionStrategy = {
  name: 'fallback',
  async resolve() {
    return ok(FALLBACK_MECH_ADDRESS);
  },
};

export const DEFAULT_MECH_STRATEGIES: readonly MechResolutionStrategy[] = [
  mechMarketplaceStrategy,
  agentMechStrategy,
  fallbackStrategy,
];

export async function resolveMechAddress(
  reader: ChainReader,
  activityCheckerAddress: string,
  strategies: readonly MechResolutionStrategy[] = DEFAULT_MECH_STRATEGIES,
): Promise<MechResolution> {
  const failures: StrategyFailure[] = [];

  for (const strategy of strategies) {
    const result = await strategy.resolve(reader, activityCheckerAddress);
    if (result.ok) {
      return { address: result.value, source: strategy.name, failures };
    }
    failures.push({ strategy: strategy.name, error: result.error });
  }

  // Only reachable with a custom list that lacks a terminal strategy.
  return { address: FALLBACK_MECH_ADDRESS, source: 'fallback', failures };
}
