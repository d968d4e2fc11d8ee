import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEnv, parseDnsConfig, parseLogLevel, parseRouterConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('parseRouterConfig', () => {
  it('fills in defaults around the password', () => {
    expect(parseRouterConfig({ RTR_PWD: 'test-secret' })).toEqual({
      url: 'http://192.168.1.1',
      password: 'test-secret',
      timeoutSeconds: 30,
      settleDelayMs: 10_000,
      tabDelayMs: 5_000,
      browser: 'chromium',
      headless: true,
      executablePath: undefined,
    });
  });

  it('reads every router setting', () => {
    const config = parseRouterConfig({
      RTR_PWD: 'test-secret',
      RTR_URL: 'http://10.0.0.1',
      RTR_TIMEOUT: '15',
      RTR_SETTLE_DELAY: '2000',
      RTR_TAB_DELAY: '500',
      RTR_BROWSER: 'firefox',
      RTR_BROWSER_PATH: '/usr/bin/firefox',
      RTR_HEADLESS: 'false',
    });

    expect(config).toEqual({
      url: 'http://10.0.0.1',
      password: 'test-secret',
      timeoutSeconds: 15,
      settleDelayMs: 2000,
      tabDelayMs: 500,
      browser: 'firefox',
      headless: false,
      executablePath: '/usr/bin/firefox',
    });
  });

  it('treats blank values as unset', () => {
    const config = parseRouterConfig({ RTR_PWD: 'test-secret', RTR_URL: '  ', RTR_TIMEOUT: '' });

    expect(config.url).toBe('http://192.168.1.1');
    expect(config.timeoutSeconds).toBe(30);
  });

  it('keeps whitespace inside the password', () => {
    expect(parseRouterConfig({ RTR_PWD: ' pass word ' }).password).toBe(' pass word ');
  });

  it('requires the router password', () => {
    const err = configError(() => parseRouterConfig({}));

    expect(err.issues).toEqual(['RTR_PWD: Required']);
  });

  it('rejects a non-integer timeout', () => {
    const err = configError(() =>
      parseRouterConfig({ RTR_PWD: 'test-secret', RTR_TIMEOUT: '2.5' })
    );

    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^RTR_TIMEOUT: /);
  });

  it('rejects an unknown browser', () => {
    const err = configError(() =>
      parseRouterConfig({ RTR_PWD: 'test-secret', RTR_BROWSER: 'safari' })
    );

    expect(err.issues[0]).toMatch(/^RTR_BROWSER: /);
  });
});

describe('parseDnsConfig', () => {
  const record = {
    DNS_ZONE_ID: 'z1',
    DNS_ZONE_REC_ID: 'r1',
    DNS_ZONE_REC_NAME: 'home.example.com',
  };

  it('accepts email + key credentials', () => {
    expect(
      parseDnsConfig({ ...record, DNS_API_EMAIL: 'ops@example.com', DNS_API_KEY: 'test-key' })
    ).toEqual({
      zoneId: 'z1',
      recordId: 'r1',
      recordName: 'home.example.com',
      apiEmail: 'ops@example.com',
      apiKey: 'test-key',
      apiToken: undefined,
    });
  });

  it('accepts an API token instead', () => {
    expect(parseDnsConfig({ ...record, DNS_API_TOKEN: 'test-token' }).apiToken).toBe(
      'test-token'
    );
  });

  it('requires credentials', () => {
    const err = configError(() => parseDnsConfig({ ...record, DNS_API_EMAIL: 'ops@example.com' }));

    expect(err.issues).toEqual([
      'DNS_API_KEY: set DNS_API_TOKEN, or both DNS_API_EMAIL and DNS_API_KEY',
    ]);
  });

  it('requires the record coordinates', () => {
    const err = configError(() => parseDnsConfig({ DNS_API_TOKEN: 'test-token' }));

    expect(err.issues).toEqual([
      'DNS_ZONE_ID: Required',
      'DNS_ZONE_REC_ID: Required',
      'DNS_ZONE_REC_NAME: Required',
    ]);
    expect(err.message).toBe(
      'Invalid configuration:\n  DNS_ZONE_ID: Required\n  DNS_ZONE_REC_ID: Required\n  DNS_ZONE_REC_NAME: Required'
    );
  });
});

describe('parseLogLevel', () => {
  it('defaults to info', () => {
    expect(parseLogLevel({})).toBe('info');
    expect(parseLogLevel({ LOG_LEVEL: 'debug' })).toBe('debug');
  });
});

describe('loadEnv', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'router-dyndns-'));
    writeFileSync(
      join(dir, 'settings.env'),
      'RTR_PWD=from-file\nRTR_TIMEOUT=12\n# comment\nDNS_ZONE_ID="z-file"\n'
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a .env file, with the environment taking precedence', () => {
    const env = loadEnv({ envFile: join(dir, 'settings.env'), env: { RTR_TIMEOUT: '40' } });

    expect(env).toEqual({ RTR_PWD: 'from-file', RTR_TIMEOUT: '40', DNS_ZONE_ID: 'z-file' });
  });

  it('lets the file fill in variables that are blank in the environment', () => {
    const env = loadEnv({
      envFile: join(dir, 'settings.env'),
      env: { RTR_PWD: '', RTR_TIMEOUT: '   ' },
    });

    expect(parseRouterConfig(env).password).toBe('from-file');
    expect(parseRouterConfig(env).timeoutSeconds).toBe(12);
  });

  it('looks for .env in the given directory', () => {
    const envDir = mkdtempSync(join(tmpdir(), 'router-dyndns-cwd-'));
    try {
      writeFileSync(join(envDir, '.env'), 'RTR_PWD=from-cwd\n');

      expect(loadEnv({ cwd: envDir, env: {} })).toEqual({ RTR_PWD: 'from-cwd' });
    } finally {
      rmSync(envDir, { recursive: true, force: true });
    }
  });

  it('fails when an explicit file is missing', () => {
    const err = configError(() => loadEnv({ envFile: join(dir, 'missing.env'), env: {} }));

    expect(err.issues).toEqual([`env file not found: ${join(dir, 'missing.env')}`]);
  });
});
