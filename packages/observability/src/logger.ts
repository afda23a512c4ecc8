import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers
 * - Deployer private keys and RPC credentials
 * - Passwords and other secrets
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'privateKey',
  'PRIVATE_KEY',
  'deployerPrivateKey',
  'rpcUrl',
  'password',
  'secret',
  'apiKey',
];

// 32-byte hex strings are private keys (addresses are 20 bytes and stay visible)
const PRIVATE_KEY_PATTERN = /\b(0x)?[0-9a-fA-F]{64}\b/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Mask private keys inside strings and turn bigints into decimal strings,
 * since JSON cannot carry bigints and ledger amounts are bigints
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(PRIVATE_KEY_PATTERN, '[REDACTED_KEY]');
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value)) {
      result[key] = redactSecrets(value[key]);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of sensitive data (keys, secrets)
 * - bigint-safe structured JSON output
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    // Format timestamps as ISO 8601
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        for (let index = 0; index < args.length; index += 1) {
          args[index] = redactSecrets(args[index]);
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
