import type { ChainReader } from '../chain/ChainClient.js';
import type { ChainProfile } from '../chain/constants.js';
import { getTokenBalance, getTokenDecimals } from '../chain/erc20.js';
import { toDecimal } from '../chain/values.js';
import type { MasterWallet, OperateService } from '../operate/types.js';
import { ServiceValidationError } from '../shared/errors.js';

const NATIVE_DECIMALS = 18;

export interface BalanceSnapshot {
  agentEoaNative: number;
  serviceSafeNative: number;
  serviceSafeWrappedNative: number;
  serviceSafeOlas: number;
  masterEoaNative: number;
  masterSafeNative: number;
  masterSafeOlas: number;
}

export interface ServiceAddresses {
  agentEoa: string;
  serviceSafe: string;
  masterEoa: string;
  masterSafe: string;
}

/**
 * Addresses whose balances make up a snapshot. Throws before anything is
 * read when the service has no agent instance, no service Safe or the master
 * wallet has no Safe on the home chain.
 */
export function resolveServiceAddresses(service: OperateService, masterWallet: MasterWallet): ServiceAddresses {
  const chainData = service.chainConfigs[service.homeChain]?.chainData;
  const agentEoa = chainData?.instances[0];
  if (!agentEoa) {
    throw new ServiceValidationError(`No agent instances found for service ${service.name} on ${service.homeChain}`);
  }
  if (!chainData.multisig) {
    throw new ServiceValidationError(`No service Safe found for service ${service.name} on ${service.homeChain}`);
  }
  const masterSafe = masterWallet.safes[service.homeChain];
  if (!masterSafe) {
    throw new ServiceValidationError(`Master wallet has no Safe on ${service.homeChain}`);
  }
  return {
    agentEoa,
    serviceSafe: chainData.multisig,
    masterEoa: masterWallet.address,
    masterSafe,
  };
}

export class BalanceAggregator {
  constructor(
    private readonly reader: ChainReader,
    private readonly chain: ChainProfile,
  ) {}

  async getBalances(addresses: ServiceAddresses): Promise<BalanceSnapshot> {
    const { reader, chain } = this;
    const native = async (address: string) => toDecimal(await reader.getNativeBalance(address), NATIVE_DECIMALS);

    const olasDecimals = await getTokenDecimals(reader, chain.olasToken);
    const wrappedDecimals = await getTokenDecimals(reader, chain.wrappedNativeToken);
    const token = async (tokenAddress: string, decimals: number, owner: string) =>
      toDecimal(await getTokenBalance(reader, tokenAddress, owner), decimals);

    return {
      agentEoaNative: await native(addresses.agentEoa),
      serviceSafeNative: await native(addresses.serviceSafe),
      serviceSafeWrappedNative: await token(chain.wrappedNativeToken, wrappedDecimals, addresses.serviceSafe),
      serviceSafeOlas: await token(chain.olasToken, olasDecimals, addresses.serviceSafe),
      masterEoaNative: await native(addresses.masterEoa),
      masterSafeNative: await native(addresses.masterSafe),
      masterSafeOlas: await token(chain.olasToken, olasDecimals, addresses.masterSafe),
    };
  }
}
