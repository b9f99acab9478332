// packages/tx-builder/src/config.ts
import { z } from 'zod';
import { ADDRESS_VERSION, DEFAULT_SCRYPT_PARAMS } from '@n3tx/crypto';
import { ConfigurationError, defaultLogLevel, LOG_LEVELS } from '@n3tx/utils';

import { MAX_TRANSACTION_SIZE, MAX_VALID_UNTIL_BLOCK_INCREMENT } from './constants.js';

const u32 = z.number().int().min(0).max(0xffff_ffff);

export const scryptParamsSchema = z.object({
  N: z.number().int().min(2),
  r: z.number().int().positive(),
  p: z.number().int().positive(),
});

export const txConfigSchema = z.object({
  /** Fetched from the provider when absent. */
  networkMagic: u32.optional(),
  maxValidUntilBlockIncrement: z.number().int().positive().default(MAX_VALID_UNTIL_BLOCK_INCREMENT),
  addressVersion: z.number().int().min(0).max(0xff).default(ADDRESS_VERSION),
  maxTransactionSize: z.number().int().positive().max(MAX_TRANSACTION_SIZE).default(MAX_TRANSACTION_SIZE),
  scrypt: scryptParamsSchema.default({ ...DEFAULT_SCRYPT_PARAMS }),
  logLevel: z.enum(LOG_LEVELS).default('silent'),
});

export type TxConfig = z.infer<typeof txConfigSchema>;
export type TxConfigInput = z.input<typeof txConfigSchema>;

function formatIssues(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** Merge explicit values over the defaults; invalid values raise ConfigurationError. */
export function resolveTxConfig(partial: TxConfigInput = {}): TxConfig {
  const res = txConfigSchema.safeParse(partial);
  if (!res.success) throw new ConfigurationError(`invalid transaction config: ${formatIssues(res.error)}`, { cause: res.error });
  return res.data;
}

const intString = z
  .string()
  .trim()
  .regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'expected a decimal or 0x-prefixed integer')
  .transform((v) => Number(v));

export const txConfigEnvSchema = z.object({
  N3TX_NETWORK_MAGIC: intString.optional(),
  N3TX_MAX_VALID_UNTIL_BLOCK_INCREMENT: intString.optional(),
  N3TX_ADDRESS_VERSION: intString.optional(),
  N3TX_SCRYPT_N: intString.optional(),
  N3TX_SCRYPT_R: intString.optional(),
  N3TX_SCRYPT_P: intString.optional(),
  N3TX_LOG_LEVEL: z.string().optional(),
});

/** Config from N3TX_* environment variables, defaults for the rest. */
export function loadTxConfig(env: NodeJS.ProcessEnv = process.env): TxConfig {
  const res = txConfigEnvSchema.safeParse(env);
  if (!res.success) throw new ConfigurationError(`invalid environment: ${formatIssues(res.error)}`, { cause: res.error });
  const e = res.data;

  return resolveTxConfig({
    networkMagic: e.N3TX_NETWORK_MAGIC,
    maxValidUntilBlockIncrement: e.N3TX_MAX_VALID_UNTIL_BLOCK_INCREMENT,
    addressVersion: e.N3TX_ADDRESS_VERSION,
    scrypt: {
      N: e.N3TX_SCRYPT_N ?? DEFAULT_SCRYPT_PARAMS.N,
      r: e.N3TX_SCRYPT_R ?? DEFAULT_SCRYPT_PARAMS.r,
      p: e.N3TX_SCRYPT_P ?? DEFAULT_SCRYPT_PARAMS.p,
    },
    logLevel: defaultLogLevel(env),
  });
}
