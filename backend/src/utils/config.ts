/**
 * Ledger configuration
 * Reads process.env (populated by dotenv at server start) and validates it with Zod
 */

import { z } from 'zod';
import { principalPattern } from './sanitize';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  FRONTEND_URL: z.string().default('http://localhost:5173'),
  API_KEY: z.string().min(1).optional(),

  LEDGER_OWNER: z.string().regex(principalPattern, 'Invalid owner principal').default('ledger-owner'),
  LEDGER_ESCROW_ACCOUNT: z.string().regex(principalPattern, 'Invalid escrow account').default('ledger-escrow'),
  EMERGENCY_WITHDRAW_RULE: z.enum(['all', 'any']).default('all'),
  ENFORCE_GROUP_CAPSULE_LIMIT: booleanFlag.default('false'),

  BLOCK_INTERVAL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  GENESIS_TIMESTAMP_MS: z.coerce.number().int().nonnegative().default(0),

  PERSISTENCE_ENABLED: booleanFlag.default('false'),
  MYSQL_HOST: z.string().default('localhost'),
  MYSQL_PORT: z.coerce.number().int().positive().default(3306),
  MYSQL_USER: z.string().default('root'),
  MYSQL_PASSWORD: z.string().default(''),
  MYSQL_DATABASE: z.string().default('capsule_ledger'),

  UNLOCK_WATCH_CRON_SCHEDULE: z.string().default('*/10 * * * *'),
});

export interface LedgerConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  frontendUrl: string;
  apiKey?: string;
  owner: string;
  escrowAccount: string;
  emergencyWithdrawRule: 'all' | 'any';
  enforceGroupCapsuleLimit: boolean;
  clock: {
    blockIntervalMs: number;
    genesisTimestampMs: number;
  };
  persistence: {
    enabled: boolean;
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
  unlockWatchSchedule: string;
}

/**
 * Parse configuration from an environment map
 * @throws ZodError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    frontendUrl: parsed.FRONTEND_URL,
    apiKey: parsed.API_KEY,
    owner: parsed.LEDGER_OWNER,
    escrowAccount: parsed.LEDGER_ESCROW_ACCOUNT,
    emergencyWithdrawRule: parsed.EMERGENCY_WITHDRAW_RULE,
    enforceGroupCapsuleLimit: parsed.ENFORCE_GROUP_CAPSULE_LIMIT,
    clock: {
      blockIntervalMs: parsed.BLOCK_INTERVAL_MS,
      genesisTimestampMs: parsed.GENESIS_TIMESTAMP_MS,
    },
    persistence: {
      enabled: parsed.PERSISTENCE_ENABLED,
      host: parsed.MYSQL_HOST,
      port: parsed.MYSQL_PORT,
      user: parsed.MYSQL_USER,
      password: parsed.MYSQL_PASSWORD,
      database: parsed.MYSQL_DATABASE,
    },
    unlockWatchSchedule: parsed.UNLOCK_WATCH_CRON_SCHEDULE,
  };
}
