import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigError,
  configFromEnv,
  expandEnvVars,
  loadConfigFile,
  parseDatabaseConfig,
} from '../src/index.js';

describe('expandEnvVars', () => {
  const env = { DB_DIR: '/var/lib/stagekeep', EMPTY: '' };

  it('expands placeholders in nested strings', () => {
    expect(
      expandEnvVars({ store: { path: '${DB_DIR}/diff.db' }, list: ['${DB_DIR}'] }, { env })
    ).toEqual({ store: { path: '/var/lib/stagekeep/diff.db' }, list: ['/var/lib/stagekeep'] });
  });

  it('uses defaults for missing or empty variables', () => {
    expect(expandEnvVars('${MISSING:-fallback}', { env })).toBe('fallback');
    expect(expandEnvVars('${EMPTY:-fallback}', { env })).toBe('fallback');
  });

  it('fails on missing variables unless allowed', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(
      'Missing required environment variable: MISSING'
    );
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });

  it('leaves non-string values alone', () => {
    expect(expandEnvVars({ n: 5, ok: true, none: null }, { env })).toEqual({
      n: 5,
      ok: true,
      none: null,
    });
  });
});

describe('parseDatabaseConfig', () => {
  it('applies defaults', () => {
    expect(parseDatabaseConfig({})).toEqual({
      store: { driver: 'memory' },
      logging: { level: 'info', format: 'text' },
    });
  });

  it('defaults the SQLite busy timeout', () => {
    expect(parseDatabaseConfig({ store: { driver: 'sqlite', path: 'diff.db' } }).store).toEqual({
      driver: 'sqlite',
      path: 'diff.db',
      busyTimeoutMs: 5000,
    });
  });

  it('reports every invalid field', () => {
    try {
      parseDatabaseConfig({ store: { driver: 'sqlite', path: '' }, logging: { level: 'loud' } });
      expect.unreachable('parse should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof Error) {
        expect(err.message).toContain('Invalid database config:');
        expect(err.message).toContain('- store.path:');
        expect(err.message).toContain('- logging.level:');
      }
    }
  });

  it('rejects unknown keys', () => {
    expect(() => parseDatabaseConfig({ store: { driver: 'memory', path: 'x' } })).toThrow(ConfigError);
  });
});

describe('loadConfigFile', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeConfig(content: string): string {
    dir = mkdtempSync(join(tmpdir(), 'stagekeep-config-'));
    const file = join(dir, 'stagekeep.json');
    writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('reads JSON with a BOM and expands placeholders', async () => {
    const file = writeConfig(
      '\uFEFF' +
        JSON.stringify({
          store: { driver: 'sqlite', path: '${DATA_DIR:-/tmp}/diff.db' },
          logging: { level: '${LOG_LEVEL}' },
        })
    );

    const config = await loadConfigFile(file, { env: { LOG_LEVEL: 'debug' } });
    expect(config).toEqual({
      store: { driver: 'sqlite', path: '/tmp/diff.db', busyTimeoutMs: 5000 },
      logging: { level: 'debug', format: 'text' },
    });
  });

  it('raises ConfigError for invalid JSON', async () => {
    const file = writeConfig('{ not json');
    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigError);
  });

  it('raises ConfigError for a missing file', async () => {
    dir = mkdtempSync(join(tmpdir(), 'stagekeep-config-'));
    await expect(loadConfigFile(join(dir, 'absent.json'))).rejects.toThrow('Cannot read config file');
  });
});

describe('configFromEnv', () => {
  it('defaults to the memory store', () => {
    expect(configFromEnv({})).toEqual({
      store: { driver: 'memory' },
      logging: { level: 'info', format: 'text' },
    });
  });

  it('selects SQLite when a database path is set', () => {
    expect(
      configFromEnv({
        STAGEKEEP_DB_PATH: '/data/diff.db',
        STAGEKEEP_BUSY_TIMEOUT_MS: '250',
        STAGEKEEP_LOG_LEVEL: 'warn',
        STAGEKEEP_LOG_FORMAT: 'json',
      })
    ).toEqual({
      store: { driver: 'sqlite', path: '/data/diff.db', busyTimeoutMs: 250 },
      logging: { level: 'warn', format: 'json' },
    });
  });

  it('rejects a SQLite store without a path', () => {
    expect(() => configFromEnv({ STAGEKEEP_STORE: 'sqlite' })).toThrow(ConfigError);
  });
});
