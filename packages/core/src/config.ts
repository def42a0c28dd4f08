import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;

  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` placeholders in every string of a parsed JSON value.
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v: unknown) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export const logFormatSchema = z.enum(['text', 'json']);

const memoryStoreConfig = z
  .object({
    driver: z.literal('memory'),
  })
  .strict();

const sqliteStoreConfig = z
  .object({
    driver: z.literal('sqlite'),
    /** Database file, or ':memory:' */
    path: z.string().min(1),
    /** How long a connection waits on a locked database file */
    busyTimeoutMs: z.number().int().min(0).max(600_000).default(5000),
  })
  .strict();

export const storeConfigSchema = z.discriminatedUnion('driver', [
  memoryStoreConfig,
  sqliteStoreConfig,
]);

export const loggingConfigSchema = z
  .object({
    level: logLevelSchema.default('info'),
    format: logFormatSchema.default('text'),
  })
  .strict();

export const databaseConfigSchema = z
  .object({
    store: storeConfigSchema.default({ driver: 'memory' }),
    logging: loggingConfigSchema.default({}),
  })
  .strict();

export type StoreConfig = z.infer<typeof storeConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type DatabaseConfig = z.infer<typeof databaseConfigSchema>;
export type DatabaseConfigInput = z.input<typeof databaseConfigSchema>;

export function formatZodError(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate a raw configuration value and apply defaults.
 * @throws ConfigError listing every invalid field
 */
export function parseDatabaseConfig(raw: unknown): DatabaseConfig {
  const result = databaseConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatZodError('Invalid database config', result.error));
  }
  return result.data;
}

/**
 * Load a JSON config file, expanding environment placeholders.
 */
export async function loadConfigFile(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<DatabaseConfig> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseDatabaseConfig(expandEnvVars(parsed, options));
}

/**
 * Build a config from STAGEKEEP_* environment variables.
 *
 * STAGEKEEP_STORE            memory | sqlite (default: sqlite when STAGEKEEP_DB_PATH is set)
 * STAGEKEEP_DB_PATH          SQLite database file
 * STAGEKEEP_BUSY_TIMEOUT_MS  SQLite busy timeout
 * STAGEKEEP_LOG_LEVEL        debug | info | warn | error | silent
 * STAGEKEEP_LOG_FORMAT       text | json
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const driver = env.STAGEKEEP_STORE ?? (env.STAGEKEEP_DB_PATH ? 'sqlite' : 'memory');

  const store: Record<string, unknown> = { driver };
  if (driver === 'sqlite') {
    store.path = env.STAGEKEEP_DB_PATH;
    if (env.STAGEKEEP_BUSY_TIMEOUT_MS !== undefined) {
      store.busyTimeoutMs = Number(env.STAGEKEEP_BUSY_TIMEOUT_MS);
    }
  }

  const logging: Record<string, unknown> = {};
  if (env.STAGEKEEP_LOG_LEVEL) logging.level = env.STAGEKEEP_LOG_LEVEL;
  if (env.STAGEKEEP_LOG_FORMAT) logging.format = env.STAGEKEEP_LOG_FORMAT;

  return parseDatabaseConfig({ store, logging });
}
