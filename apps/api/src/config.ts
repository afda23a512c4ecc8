import { z } from 'zod';
import { AddressSchema, type Address } from '@mona/types';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type ApiConfig = {
  port: number;
  logLevel: LogLevel;
  deployer: Address;
  ledgerAddress: Address | undefined;
  corsOrigins: string[];
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LEDGER_DEPLOYER: AddressSchema,
  LEDGER_ADDRESS: AddressSchema.optional(),
  // Comma-separated list of browser origins allowed to call the API
  CORS_ORIGINS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read API configuration from the environment
 *
 * @throws {ConfigError} Naming every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  return {
    port: result.data.PORT,
    logLevel: result.data.LOG_LEVEL,
    deployer: result.data.LEDGER_DEPLOYER,
    ledgerAddress: result.data.LEDGER_ADDRESS,
    corsOrigins: result.data.CORS_ORIGINS,
  };
}
