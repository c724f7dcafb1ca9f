import { botLogger } from '../logging/index.js';
import { errorMessage } from '../shared/errors.js';

const IPIFY_URL = 'https://api.ipify.org';

export async function getPublicIp(timeoutMs = 10_000): Promise<string> {
  try {
    const response = await fetch(IPIFY_URL, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    return (await response.text()).trim();
  } catch (error) {
    botLogger.error({ error: errorMessage(error) }, 'Failed to get public IP');
    return 'Unavailable';
  }
}
