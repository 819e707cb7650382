import * as fs from 'fs';
import * as path from 'path';
import { ConfigSchema, type Config } from '@/types/config';
import { ConfigurationError } from '@/core/errors';
import { describeConfigPath, parseCliArgs } from '@/config/cli';

export interface LoadConfigOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  configDir?: string;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace `${VAR}` placeholders with environment values. A value that is
 * only a placeholder for an unset (or empty) variable becomes undefined, so
 * schema defaults and required-field checks apply to it.
 */
function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    const whole = /^\$\{([^}]+)\}$/.exec(value);
    if (whole) {
      const resolved = env[whole[1]];
      return resolved === undefined || resolved === '' ? undefined : resolved;
    }
    return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (isRecord(value)) {
    const resolved: ConfigRecord = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvVars(item, env);
    }
    return resolved;
  }
  return value;
}

function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isRecord(value)) {
      result[key] = deepMerge(isRecord(existing) ? existing : {}, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function readJsonFile(filePath: string): ConfigRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read config file ${filePath}`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function loadConfigFiles(configDir: string, nodeEnv: string): ConfigRecord {
  const defaultConfig = readJsonFile(path.join(configDir, 'default.json'));

  // Environment-specific file is optional and overrides the defaults
  const envConfigPath = path.join(configDir, `${nodeEnv}.json`);
  if (!fs.existsSync(envConfigPath)) {
    return defaultConfig;
  }
  return deepMerge(defaultConfig, readJsonFile(envConfigPath));
}

/**
 * Build the validated configuration from, lowest precedence first:
 * config/default.json, config/{NODE_ENV}.json, environment placeholders
 * inside them, then CLI flags.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? path.resolve(process.cwd(), 'config');
  const { overrides } = parseCliArgs(options.argv ?? []);

  const fileConfig = loadConfigFiles(configDir, env.NODE_ENV || 'development');
  const resolved = resolveEnvVars(fileConfig, env);
  const merged = deepMerge(isRecord(resolved) ? resolved : {}, overrides);

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  • ${describeConfigPath(issue.path.join('.'))}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Configuration validation failed:\n${details}`);
  }

  return result.data;
}

export default loadConfig;
