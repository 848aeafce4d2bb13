import { z } from 'zod';
import { StorageError } from '../utils/errors.js';

export class ConfigError extends StorageError {
  readonly fields: Array<{ path: string; message: string }>;

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message);
    this.name = 'ConfigError';
    this.fields = fields;
  }
}

const booleanFlag = z.union([
  z.boolean(),
  z
    .string()
    .toLowerCase()
    .refine((value) => ['true', 'false', '1', '0'].includes(value), {
      message: 'Expected true, false, 1 or 0',
    })
    .transform((value) => value === 'true' || value === '1'),
]);

export const StorageConfigSchema = z.object({
  connectionString: z
    .string()
    .min(1)
    .transform((value) => value.replace(/^sqlite:\/\//, '').replace(/^file:\/\//, '')),
  journalMode: z.enum(['wal', 'delete', 'memory']),
  foreignKeys: booleanFlag,
  busyTimeoutMs: z.coerce.number().int().nonnegative(),
  logQueries: booleanFlag,
});

export type StorageConfig = z.output<typeof StorageConfigSchema>;
export type StorageConfigInput = z.input<typeof StorageConfigSchema>;

export const DEFAULT_CONFIG: Readonly<StorageConfig> = Object.freeze({
  connectionString: ':memory:',
  journalMode: 'wal',
  foreignKeys: true,
  busyTimeoutMs: 5000,
  logQueries: false,
});

const ENV_KEYS: Record<keyof StorageConfig, string> = {
  connectionString: 'DATABASE_URL',
  journalMode: 'DB_JOURNAL_MODE',
  foreignKeys: 'DB_FOREIGN_KEYS',
  busyTimeoutMs: 'DB_BUSY_TIMEOUT_MS',
  logQueries: 'DB_LOG_QUERIES',
};

export interface LoadConfigOptions {
  overrides?: Partial<StorageConfigInput>;
  env?: Record<string, string | undefined>;
}

function fromEnv(env: Record<string, string | undefined>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      values[key] = key === 'journalMode' ? value.toLowerCase() : value;
    }
  }
  return values;
}

/**
 * Resolves storage configuration: defaults, then environment variables, then explicit
 * overrides. Throws ConfigError listing every invalid field.
 */
export function loadConfig(options: LoadConfigOptions = {}): StorageConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...fromEnv(options.env ?? process.env),
    ...options.overrides,
  };

  const result = StorageConfigSchema.safeParse(merged);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n');
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields);
  }

  return Object.freeze(result.data);
}
