import { z } from 'zod';
import { botLogger, serializeError } from '../logging/index.js';

const COINGECKO_PRICE_URL = 'https://api.coingecko.com/api/v3/simple/price';
const PRICE_TIMEOUT_MS = 30_000;

const priceResponseSchema = z.object({
  autonolas: z.object({ usd: z.number() }),
});

/**
 * OLAS price in USD from CoinGecko, or null when it cannot be fetched.
 */
export async function getOlasPrice(apiKey?: string): Promise<number | null> {
  const params = new URLSearchParams({ ids: 'autonolas', vs_currencies: 'usd' });
  if (apiKey) {
    params.set('x_cg_demo_api_key', apiKey);
  }

  try {
    const response = await fetch(`${COINGECKO_PRICE_URL}?${params.toString()}`, {
      headers: { accept: 'application/json' },
      signal: AbortSignal.timeout(PRICE_TIMEOUT_MS),
    });
    if (response.status !== 200) {
      botLogger.error({ status: response.status, statusText: response.statusText }, 'OLAS price request failed');
      return null;
    }

    const parsed = priceResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      botLogger.error({ issues: parsed.error.issues }, 'Unexpected OLAS price response');
      return null;
    }
    return parsed.data.autonolas.usd;
  } catch (error) {
    botLogger.error({ err: serializeError(error) }, 'OLAS price request failed');
    return null;
  }
}
