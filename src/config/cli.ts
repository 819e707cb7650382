import { ConfigurationError } from '@/core/errors';

type FlagKind = 'string' | 'boolean';

interface FlagSpec {
  kind: FlagKind;
  path: [string, string];
  env?: string;
  description: string;
  // Extra value written whenever the flag is present
  implies?: { path: [string, string]; value: boolean };
}

export const CLI_FLAGS: Record<string, FlagSpec> = {
  'api-base-url': {
    kind: 'string',
    path: ['mastodon', 'apiBaseUrl'],
    env: 'WELCOME_BOT_API_BASE_URL',
    description: 'Base URL of the instance, e.g. https://mastodon.example'
  },
  username: {
    kind: 'string',
    path: ['mastodon', 'username'],
    env: 'WELCOME_BOT_USERNAME',
    description: 'Bot account login (email)'
  },
  password: {
    kind: 'string',
    path: ['mastodon', 'password'],
    env: 'WELCOME_BOT_PASSWORD',
    description: 'Bot account password'
  },
  'client-id': {
    kind: 'string',
    path: ['mastodon', 'clientId'],
    env: 'WELCOME_BOT_CLIENT_ID',
    description: 'OAuth2 application client id'
  },
  'client-secret': {
    kind: 'string',
    path: ['mastodon', 'clientSecret'],
    env: 'WELCOME_BOT_CLIENT_SECRET',
    description: 'OAuth2 application client secret'
  },
  hashtag: {
    kind: 'string',
    path: ['bot', 'hashtag'],
    env: 'WELCOME_BOT_HASHTAG',
    description: 'Hashtag to watch, with or without the leading #'
  },
  'dry-run': {
    kind: 'boolean',
    path: ['bot', 'dryRun'],
    env: 'WELCOME_BOT_DRY_RUN',
    description: 'Log the welcome replies instead of posting them'
  },
  'batch-size': {
    kind: 'string',
    path: ['bot', 'batchSize'],
    env: 'WELCOME_BOT_BATCH_SIZE',
    description: 'Posts requested per timeline page (1-40, default 20)'
  },
  'poll-interval': {
    kind: 'string',
    path: ['bot', 'pollIntervalSeconds'],
    description: 'Seconds between passes (default 5)'
  },
  'since-id': {
    kind: 'string',
    path: ['bot', 'sinceId'],
    description: 'Only consider posts newer than this id (default: the most recent post)'
  },
  'welcome-template': {
    kind: 'string',
    path: ['bot', 'welcomeTemplate'],
    description: 'Reply text; {handle} is replaced with the author\'s @handle'
  },
  once: {
    kind: 'boolean',
    path: ['bot', 'once'],
    description: 'Run a single pass and exit'
  },
  'log-level': {
    kind: 'string',
    path: ['logging', 'level'],
    env: 'LOG_LEVEL',
    description: 'error, warn, info, http, verbose, debug or silly'
  },
  'http-port': {
    kind: 'string',
    path: ['server', 'port'],
    description: 'Serve /api/health and /metrics on this port',
    implies: { path: ['server', 'enabled'], value: true }
  }
};

export type ConfigOverrides = Record<string, Record<string, string | boolean>>;

export interface CliArguments {
  overrides: ConfigOverrides;
  help: boolean;
}

function setOverride(overrides: ConfigOverrides, [section, key]: [string, string], value: string | boolean): void {
  overrides[section] = { ...overrides[section], [key]: value };
}

function isBooleanLiteral(value: string | undefined): value is string {
  return value !== undefined && /^(true|false|1|0|yes|no|on|off)$/i.test(value);
}

/**
 * Parse `--flag value`, `--flag=value` and bare boolean flags into a partial
 * config object that is merged over the file and environment layers.
 */
export function parseCliArgs(argv: string[]): CliArguments {
  const overrides: ConfigOverrides = {};
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument "${arg}"`);
    }

    const eqIndex = arg.indexOf('=');
    const name = eqIndex === -1 ? arg.slice(2) : arg.slice(2, eqIndex);
    const inlineValue = eqIndex === -1 ? undefined : arg.slice(eqIndex + 1);
    const spec = CLI_FLAGS[name];

    if (!spec) {
      throw new ConfigurationError(`Unknown option --${name}`);
    }

    let value: string | boolean;
    if (inlineValue !== undefined) {
      value = inlineValue;
    } else if (spec.kind === 'boolean') {
      // Accept "--dry-run true" as well as a bare "--dry-run"
      const next = argv[i + 1];
      if (isBooleanLiteral(next)) {
        value = next;
        i += 1;
      } else {
        value = true;
      }
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`Option --${name} requires a value`);
      }
      value = next;
      i += 1;
    }

    setOverride(overrides, spec.path, value);
    if (spec.implies) {
      setOverride(overrides, spec.implies.path, spec.implies.value);
    }
  }

  return { overrides, help };
}

/**
 * Describe a config path in terms the operator can act on, e.g.
 * "mastodon.username (--username / WELCOME_BOT_USERNAME)".
 */
export function describeConfigPath(path: string): string {
  for (const [name, spec] of Object.entries(CLI_FLAGS)) {
    if (spec.path.join('.') === path) {
      return spec.env ? `${path} (--${name} / ${spec.env})` : `${path} (--${name})`;
    }
  }
  return path;
}

export function formatUsage(): string {
  const lines = ['Usage: hashtag-welcome-bot [options]', '', 'Options:'];
  for (const [name, spec] of Object.entries(CLI_FLAGS)) {
    const flag = spec.kind === 'boolean' ? `--${name}` : `--${name} <value>`;
    lines.push(`  ${flag.padEnd(28)}${spec.description}`);
  }
  lines.push(`  ${'--help'.padEnd(28)}Show this message`);
  return lines.join('\n');
}
