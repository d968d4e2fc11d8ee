import { parseArgs } from 'node:util';
import { loadEnv, parseDnsConfig, parseLogLevel, parseRouterConfig, type Env } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import { runDynDns } from './run.js';
import type { DnsConfig } from './types.js';

export const USAGE = `Usage: router-dyndns [options]

Reads the ISP-assigned IP from the router's web console and points the
configured Cloudflare A record at it.

Options:
  --env-file <path>  Read settings from this file (default: ./.env if present)
  --print-only       Print the router's IP and exit; DNS is not touched
  --headed           Show the browser window
  -h, --help         Show this help message

Settings: RTR_PWD, RTR_URL, RTR_TIMEOUT, DNS_API_EMAIL, DNS_API_KEY,
DNS_API_TOKEN, DNS_ZONE_ID, DNS_ZONE_REC_ID, DNS_ZONE_REC_NAME`;

export interface CliDeps {
  env?: Env;
  /** Where the default .env is looked up */
  cwd?: string;
  run?: typeof runDynDns;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'env-file': { type: 'string' },
      'print-only': { type: 'boolean' },
      headed: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: false,
  }).values;
}

function loadSettings(
  envFile: string | undefined,
  printOnly: boolean,
  deps: CliDeps
) {
  const merged = loadEnv({ envFile, env: deps.env, cwd: deps.cwd });
  const router = parseRouterConfig(merged);
  const dns: DnsConfig | undefined = printOnly ? undefined : parseDnsConfig(merged);
  return { router, dns, level: parseLogLevel(merged) };
}

/** Parse arguments, load settings and run one pass. Resolves to the exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let values: ReturnType<typeof parseCliArgs>;
  try {
    values = parseCliArgs(argv);
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    console.error(USAGE);
    return 2;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const printOnly = values['print-only'] ?? false;
  let settings: ReturnType<typeof loadSettings>;
  try {
    settings = loadSettings(values['env-file'], printOnly, deps);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 2;
    }
    throw err;
  }

  const router = values.headed ? { ...settings.router, headless: false } : settings.router;
  // stdout carries only the IP in print-only mode
  const logger = createLogger('dyndns', settings.level, { stderrOnly: printOnly });
  const run = deps.run ?? runDynDns;

  const result = await run({ router, dns: settings.dns, logger });
  if (printOnly && result.ip !== undefined) {
    console.log(result.ip);
  }
  return result.exitCode;
}
