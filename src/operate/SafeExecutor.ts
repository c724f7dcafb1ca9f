import { Contract, ZeroAddress, concat, getAddress, getBytes, type BaseWallet, type Provider } from 'ethers';
import { SAFE_ABI } from '../chain/abis.js';
import { expectBigInt, expectHex, expectList } from '../chain/values.js';
import { operateLogger } from '../logging/index.js';
import { OperateError } from '../shared/errors.js';

export interface SafeCall {
  to: string;
  data: string;
  value?: bigint;
}

// eth_sign signatures are marked for the Safe by adding 4 to v.
const ETH_SIGN_V_OFFSET = 4;

/**
 * Execute a call through a 1-of-N Safe owned by `signer` and wait for one
 * confirmation. Resolves to the transaction hash.
 */
export async function executeSafeTransaction(
  provider: Provider,
  signer: BaseWallet,
  safeAddress: string,
  call: SafeCall,
): Promise<string> {
  const safe = new Contract(getAddress(safeAddress), SAFE_ABI, provider);
  const to = getAddress(call.to);
  const value = call.value ?? 0n;

  const [owners, threshold, nonce] = await Promise.all([
    safe.getFunction('getOwners').staticCall(),
    safe.getFunction('getThreshold').staticCall(),
    safe.getFunction('nonce').staticCall(),
  ]);

  const isOwner = expectList(owners, 'getOwners()')
    .some((owner) => typeof owner === 'string' && owner.toLowerCase() === signer.address.toLowerCase());
  if (!isOwner) {
    throw new OperateError(`Signer ${signer.address} is not an owner of Safe ${safeAddress}`);
  }
  if (expectBigInt(threshold, 'getThreshold()') > 1n) {
    throw new OperateError(`Safe ${safeAddress} has threshold ${threshold}; only 1-of-N Safes are supported`);
  }

  const safeTxHash = expectHex(
    await safe.getFunction('getTransactionHash').staticCall(
      to, value, call.data, 0, 0, 0, 0, ZeroAddress, ZeroAddress, expectBigInt(nonce, 'nonce()'),
    ),
    'getTransactionHash()',
  );

  const signature = getBytes(await signer.signMessage(getBytes(safeTxHash)));
  const adjustedSignature = concat([
    signature.slice(0, 32),
    signature.slice(32, 64),
    new Uint8Array([signature[64] + ETH_SIGN_V_OFFSET]),
  ]);

  const connected = new Contract(getAddress(safeAddress), SAFE_ABI, signer.connect(provider));
  const tx = await connected.getFunction('execTransaction')(
    to, value, call.data, 0, 0, 0, 0, ZeroAddress, ZeroAddress, adjustedSignature,
  );
  operateLogger.info({ safe: safeAddress, to, txHash: tx.hash }, 'Safe transaction sent');

  const receipt = await tx.wait(1);
  if (receipt?.status !== 1) {
    throw new OperateError(`Safe transaction ${tx.hash} reverted`);
  }
  return tx.hash;
}
