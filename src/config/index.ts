/**
 * Configuration for the Triton bot.
 *
 * Environment variables are validated once with zod and exposed through typed
 * getters. The operator list and staking program table live in `config.yaml`.
 *
 * Calling code loads `.env` (see env/index.ts) before the first getter call.
 */

import { readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { DateTime } from 'luxon';
import { z } from 'zod';

const addressSchema = z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 0x-prefixed 20-byte address');

/**
 * "true"/"1"/"yes"/"on" → true, everything else → false.
 */
export function parseBoolean(value: string | boolean | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return fallback;
  return ['true', '1', 'yes', 'y', 'on'].includes(normalized);
}

const booleanSchema = (fallback: boolean) =>
  z.union([z.string(), z.boolean()]).optional().transform((value) => parseBoolean(value, fallback));

const optionalString = z.string().optional().transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

// ============================================================================
// Environment schema
// ============================================================================

const telegramSchema = z.object({
  // TELEGRAM_TOKEN: Bot API token from @BotFather
  TELEGRAM_TOKEN: z.string().min(1, 'TELEGRAM_TOKEN is required'),

  // CHAT_ID: chat that receives scheduled reports and alerts
  CHAT_ID: z.string().min(1, 'CHAT_ID is required'),
});

const chainSchema = z.object({
  // RPC_URL: HTTP(S) RPC endpoint of the home chain (legacy alias: GNOSIS_RPC)
  RPC_URL: z.string().url('RPC_URL must be a valid HTTP/HTTPS URL'),

  // RPC_TIMEOUT_MS: per-request RPC timeout
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

const operateSchema = z.object({
  // OPERATE_USER_PASSWORD: decrypts the operate keystores (legacy alias: OPERATE_PASSWORD)
  OPERATE_USER_PASSWORD: optionalString,

  // WITHDRAWAL_ADDRESS: destination for reward withdrawals; unset disables withdrawal
  WITHDRAWAL_ADDRESS: optionalString.pipe(addressSchema.optional()),
});

const alertsSchema = z.object({
  AGENT_BALANCE_THRESHOLD: z.coerce.number().nonnegative().default(0.1),
  SAFE_BALANCE_THRESHOLD: z.coerce.number().nonnegative().default(1),
  MASTER_SAFE_BALANCE_THRESHOLD: z.coerce.number().nonnegative().default(5),
});

const claimSchema = z.object({
  AUTOCLAIM: booleanSchema(false),
  MANUAL_CLAIM: booleanSchema(true),
  AUTOCLAIM_DAY: z.coerce.number().int().min(1).max(31).default(1),
  AUTOCLAIM_HOUR_UTC: z.coerce.number().int().min(0).max(23).default(9),
});

const presentationSchema = z.object({
  // LOCAL_TIMEZONE: IANA zone used to render epoch ends and job times
  LOCAL_TIMEZONE: z.string().default('UTC').refine(
    (zone) => DateTime.now().setZone(zone).isValid,
    'LOCAL_TIMEZONE must be a valid IANA timezone',
  ),
});

const externalSchema = z.object({
  COINGECKO_API_KEY: optionalString,
  IPFS_GATEWAY_URL: z.string().url().default('https://gateway.autonolas.tech/ipfs/'),
  METADATA_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TRITON_CONFIG_PATH: z.string().default('config.yaml'),
});

const envSchema = z.object({
  ...telegramSchema.shape,
  ...chainSchema.shape,
  ...operateSchema.shape,
  ...alertsSchema.shape,
  ...claimSchema.shape,
  ...presentationSchema.shape,
  ...externalSchema.shape,
});

export type EnvConfig = z.infer<typeof envSchema>;

// ============================================================================
// config.yaml schema
// ============================================================================

const stakingContractSchema = z.object({
  name: z.string().min(1),
  address: addressSchema,
  slots: z.number().int().nonnegative(),
});

const fileSchema = z.object({
  // operator name → directory that contains the .operate folder
  operators: z.record(z.string().min(1)).refine((operators) => Object.keys(operators).length > 0, 'at least one operator is required'),

  // chain → staking program id → staking contract address
  staking_programs: z.record(z.record(addressSchema)).default({}),

  // staking contracts listed by /slots (defaults to the known Gnosis contracts)
  staking_contracts: z.array(stakingContractSchema).optional(),
});

export type StakingContractEntry = z.infer<typeof stakingContractSchema>;

export interface FileConfig {
  operators: Record<string, string>;
  stakingPrograms: Record<string, Record<string, string>>;
  stakingContracts?: StakingContractEntry[];
}

// ============================================================================
// Loading
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate an environment. Legacy aliases are mapped onto canonical names.
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const withAliases = {
    ...env,
    RPC_URL: env.RPC_URL || env.GNOSIS_RPC,
    OPERATE_USER_PASSWORD: env.OPERATE_USER_PASSWORD || env.OPERATE_PASSWORD,
  };

  const result = envSchema.safeParse(withAliases);
  if (!result.success) {
    throw new Error(
      `Configuration validation failed:\n${formatIssues(result.error)}\n\n` +
      'See .env.template for the supported environment variables.',
    );
  }
  return result.data;
}

export function parseFileConfig(raw: string, source = 'config.yaml'): FileConfig {
  let document: unknown;
  try {
    document = load(raw);
  } catch (error) {
    throw new Error(`Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = fileSchema.safeParse(document);
  if (!result.success) {
    throw new Error(`Invalid ${source}:\n${formatIssues(result.error)}`);
  }

  return {
    operators: result.data.operators,
    stakingPrograms: result.data.staking_programs,
    stakingContracts: result.data.staking_contracts,
  };
}

export function loadFileConfig(path: string): FileConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseFileConfig(raw, path);
}

let _config: EnvConfig | null = null;

/**
 * Validated environment configuration (loaded and cached on first call).
 */
export function getConfig(): EnvConfig {
  if (!_config) {
    _config = parseEnvConfig(process.env);
  }
  return _config;
}

/**
 * @internal
 */
export function resetConfigForTests(): void {
  _config = null;
}

// ============================================================================
// Public API: typed getters
// ============================================================================

export function getRequiredTelegramToken(): string {
  return getConfig().TELEGRAM_TOKEN;
}

export function getRequiredChatId(): string {
  return getConfig().CHAT_ID;
}

export function getRequiredRpcUrl(): string {
  return getConfig().RPC_URL;
}

export function getRpcTimeoutMs(): number {
  return getConfig().RPC_TIMEOUT_MS;
}

export function getOptionalOperatePassword(): string | undefined {
  return getConfig().OPERATE_USER_PASSWORD;
}

export function getOptionalWithdrawalAddress(): string | undefined {
  return getConfig().WITHDRAWAL_ADDRESS;
}

export interface BalanceThresholds {
  agentEoa: number;
  serviceSafe: number;
  masterSafe: number;
}

export function getBalanceThresholds(): BalanceThresholds {
  const config = getConfig();
  return {
    agentEoa: config.AGENT_BALANCE_THRESHOLD,
    serviceSafe: config.SAFE_BALANCE_THRESHOLD,
    masterSafe: config.MASTER_SAFE_BALANCE_THRESHOLD,
  };
}

export interface ClaimSettings {
  autoclaim: boolean;
  manualClaim: boolean;
  autoclaimDay: number;
  autoclaimHourUtc: number;
}

export function getClaimSettings(): ClaimSettings {
  const config = getConfig();
  return {
    autoclaim: config.AUTOCLAIM,
    manualClaim: config.MANUAL_CLAIM,
    autoclaimDay: config.AUTOCLAIM_DAY,
    autoclaimHourUtc: config.AUTOCLAIM_HOUR_UTC,
  };
}

export function getLocalTimezone(): string {
  return getConfig().LOCAL_TIMEZONE;
}

export function getOptionalCoingeckoApiKey(): string | undefined {
  return getConfig().COINGECKO_API_KEY;
}

export function getIpfsGatewayUrl(): string {
  return getConfig().IPFS_GATEWAY_URL;
}

export function getMetadataFetchTimeoutMs(): number {
  return getConfig().METADATA_FETCH_TIMEOUT_MS;
}

export function getConfigPath(): string {
  return getConfig().TRITON_CONFIG_PATH;
}
