import * as dotenv from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Load `.env` from the working directory (or `TRITON_ENV_PATH`) into
 * `process.env`. Values in the file override the inherited environment.
 * Idempotent; test runs skip it so tests control the environment.
 */
export function loadEnvOnce(): void {
  if (process.env.__TRITON_ENV_LOADED === '1') {
    return;
  }
  process.env.__TRITON_ENV_LOADED = '1';

  if (process.env.VITEST === 'true') {
    return;
  }

  const envPath = resolve(process.env.TRITON_ENV_PATH || '.env');
  if (!existsSync(envPath)) {
    return;
  }

  dotenv.config({ path: envPath, override: true });
}
