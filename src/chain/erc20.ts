import { Interface } from 'ethers';
import { ERC20_ABI } from './abis.js';
import type { ChainReader } from './ChainClient.js';
import { expectBigInt } from './values.js';

const erc20Interface = new Interface(ERC20_ABI);

export async function getTokenBalance(reader: ChainReader, token: string, owner: string): Promise<bigint> {
  return expectBigInt(await reader.call(token, ERC20_ABI, 'balanceOf', [owner]), 'balanceOf()');
}

export async function getTokenDecimals(reader: ChainReader, token: string): Promise<number> {
  return Number(expectBigInt(await reader.call(token, ERC20_ABI, 'decimals'), 'decimals()'));
}

export function encodeTransfer(to: string, amount: bigint): string {
  return erc20Interface.encodeFunctionData('transfer', [to, amount]);
}
