import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_ROUTER_URL,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_TAB_DELAY_MS,
  DEFAULT_TIMEOUT_SECONDS,
} from './constants.js';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import type { DnsConfig, RouterConfig } from './types.js';

export type Env = Record<string, string | undefined>;

export interface LoadEnvOptions {
  /** Explicit .env path; must exist if given */
  envFile?: string;
  /** Defaults to `process.env` */
  env?: Env;
  /** Directory the default .env is looked up in, default `process.cwd()` */
  cwd?: string;
}

const DEFAULT_ENV_FILE = '.env';

const millis = z.coerce.number().int().nonnegative();

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const RouterEnvSchema = z.object({
  RTR_PWD: z.string().min(1),
  RTR_URL: z.string().url().default(DEFAULT_ROUTER_URL),
  RTR_TIMEOUT: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUT_SECONDS),
  RTR_SETTLE_DELAY: millis.default(DEFAULT_SETTLE_DELAY_MS),
  RTR_TAB_DELAY: millis.default(DEFAULT_TAB_DELAY_MS),
  RTR_BROWSER: z.enum(['chromium', 'firefox']).default('chromium'),
  RTR_BROWSER_PATH: z.string().min(1).optional(),
  RTR_HEADLESS: flag.default('true'),
});

const DnsEnvSchema = z
  .object({
    DNS_ZONE_ID: z.string().min(1),
    DNS_ZONE_REC_ID: z.string().min(1),
    DNS_ZONE_REC_NAME: z.string().min(1),
    DNS_API_EMAIL: z.string().email().optional(),
    DNS_API_KEY: z.string().min(1).optional(),
    DNS_API_TOKEN: z.string().min(1).optional(),
  })
  .superRefine((v, ctx) => {
    if (!v.DNS_API_TOKEN && !(v.DNS_API_EMAIL && v.DNS_API_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'set DNS_API_TOKEN, or both DNS_API_EMAIL and DNS_API_KEY',
        path: ['DNS_API_KEY'],
      });
    }
  });

const LogEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/** Blank values mean "unset", as they do in a hand-edited .env file */
function withoutBlanks(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  return cleaned;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: Env): T {
  const result = schema.safeParse(withoutBlanks(env));
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }
  return result.data;
}

/**
 * Read settings from a .env file and the process environment.
 *
 * Non-blank values already present in the environment win over the file,
 * as with `dotenv.config()`. `process.env` itself is never modified.
 */
export function loadEnv(options: LoadEnvOptions = {}): Env {
  const env = withoutBlanks(options.env ?? process.env);
  const path = options.envFile ?? resolve(options.cwd ?? process.cwd(), DEFAULT_ENV_FILE);

  if (!existsSync(path)) {
    if (options.envFile) {
      throw new ConfigError([`env file not found: ${options.envFile}`]);
    }
    return env;
  }

  const fromFile = parse(readFileSync(path));
  return { ...fromFile, ...env };
}

export function parseRouterConfig(env: Env): RouterConfig {
  const v = parseWith(RouterEnvSchema, env);
  return {
    url: v.RTR_URL,
    password: v.RTR_PWD,
    timeoutSeconds: v.RTR_TIMEOUT,
    settleDelayMs: v.RTR_SETTLE_DELAY,
    tabDelayMs: v.RTR_TAB_DELAY,
    browser: v.RTR_BROWSER,
    headless: v.RTR_HEADLESS,
    executablePath: v.RTR_BROWSER_PATH,
  };
}

export function parseDnsConfig(env: Env): DnsConfig {
  const v = parseWith(DnsEnvSchema, env);
  return {
    zoneId: v.DNS_ZONE_ID,
    recordId: v.DNS_ZONE_REC_ID,
    recordName: v.DNS_ZONE_REC_NAME,
    apiEmail: v.DNS_API_EMAIL,
    apiKey: v.DNS_API_KEY,
    apiToken: v.DNS_API_TOKEN,
  };
}

export function parseLogLevel(env: Env): LogLevel {
  return parseWith(LogEnvSchema, env).LOG_LEVEL;
}
