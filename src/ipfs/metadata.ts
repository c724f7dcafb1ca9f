/**
 * Staking program metadata, stored on IPFS and referenced on-chain by a
 * bytes32 sha2-256 digest.
 */

import { chainLogger } from '../logging/index.js';
import { IPFS_CID_V1_HEX_PREFIX } from '../chain/constants.js';
import { MetadataFetchError, errorMessage } from '../shared/errors.js';

export type StakingMetadata = Record<string, unknown>;

export interface MetadataFetchOptions {
  gatewayUrl: string;
  timeoutMs: number;
}

export function buildMetadataUrl(gatewayUrl: string, metadataHash: string): string {
  const hash = metadataHash.replace(/^0x/, '').toLowerCase();
  const base = gatewayUrl.endsWith('/') ? gatewayUrl : `${gatewayUrl}/`;
  return `${base}${IPFS_CID_V1_HEX_PREFIX}${hash}`;
}

/**
 * Fetch the JSON document for `metadataHash`. Any non-2xx status, timeout or
 * non-object body is a MetadataFetchError.
 */
export async function fetchStakingMetadata(
  metadataHash: string,
  options: MetadataFetchOptions,
): Promise<StakingMetadata> {
  const url = buildMetadataUrl(options.gatewayUrl, metadataHash);
  chainLogger.debug({ url, timeoutMs: options.timeoutMs }, 'Fetching staking metadata');

  let response: Response;
  try {
    response = await fetch(url, { method: 'GET', signal: AbortSignal.timeout(options.timeoutMs) });
  } catch (error) {
    throw new MetadataFetchError(url, errorMessage(error), { cause: error });
  }

  if (!response.ok) {
    throw new MetadataFetchError(url, response.status);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new MetadataFetchError(url, `invalid JSON (${errorMessage(error)})`, { cause: error });
  }

  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new MetadataFetchError(url, 'expected a JSON object');
  }

  return Object.fromEntries(Object.entries(body));
}
