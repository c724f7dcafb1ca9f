export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

/**
 * Mech assumed when neither activity checker generation exposes one.
 */
export const FALLBACK_MECH_ADDRESS = '0x77af31De935740567Cf4fF1986D04B2c964A786a';

export const OLAS_DECIMALS = 18;
export const SECONDS_PER_DAY = 86_400;

/**
 * Prefix turning a bytes32 sha2-256 digest into a CIDv1 (base16, dag-pb).
 */
export const IPFS_CID_V1_HEX_PREFIX = 'f01701220';

export interface ChainProfile {
  name: string;
  olasToken: string;
  wrappedNativeToken: string;
  nativeSymbol: string;
  wrappedNativeSymbol: string;
  explorerUrl: string;
}

export const CHAIN_PROFILES: Record<string, ChainProfile> = {
  gnosis: {
    name: 'gnosis',
    olasToken: '0xcE11e14225575945b8E6Dc0D4F2dD4C570f79d9f',
    wrappedNativeToken: '0xe91D153E0b41518A2Ce8Dd3D7944Fa863463a97d',
    nativeSymbol: 'xDAI',
    wrappedNativeSymbol: 'wxDAI',
    explorerUrl: 'https://gnosisscan.io',
  },
  base: {
    name: 'base',
    olasToken: '0x54330d28ca3357F294334BDC454a032e7f353416',
    wrappedNativeToken: '0x4200000000000000000000000000000000000006',
    nativeSymbol: 'ETH',
    wrappedNativeSymbol: 'WETH',
    explorerUrl: 'https://basescan.org',
  },
};

export function getChainProfile(chain: string): ChainProfile {
  const profile = CHAIN_PROFILES[chain.toLowerCase()];
  if (!profile) {
    throw new Error(`Unsupported chain: ${chain}`);
  }
  return profile;
}

export function explorerAddressUrl(profile: ChainProfile, address: string): string {
  return `${profile.explorerUrl}/address/${address}`;
}

export function explorerTxUrl(profile: ChainProfile, txHash: string): string {
  return `${profile.explorerUrl}/tx/${txHash}`;
}
