import { config as dotenvConfig } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { configSchema, type AppConfig } from './schema.js';
import { ConfigError } from '../core/errors.js';

type Env = Record<string, string | undefined>;

// Resolve ${VAR_NAME} placeholders in config values
export function resolveEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return env[varName] || '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Load YAML config file
function loadYamlConfig(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    return {};
  }
  const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
  return isRecord(parsed) ? parsed : {};
}

// Environment variables take precedence over the YAML file
function envOverrides(env: Env): Record<string, unknown> {
  const trigger = env['BOT_TRIGGER_WORD'];

  return {
    app: {
      environment: env['NODE_ENV'],
      logLevel: env['LOG_LEVEL'],
    },
    bot: {
      triggerWords: trigger ? [trigger] : undefined,
    },
    discord: {
      botToken: env['DISCORD_BOT_TOKEN'],
    },
    marketplace: {
      apiKey: env['OPENSEA_API_KEY'],
    },
    health: {
      port: env['PORT'],
    },
  };
}

// Deep merge; empty values in source never overwrite target
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null || value === '') {
      continue;
    }
    if (Array.isArray(value) && value.length === 0) {
      continue;
    }
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else if (isRecord(value)) {
      result[key] = deepMerge({}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: Env;
  loadDotenv?: boolean;
}

// Load and validate configuration. Throws ConfigError on missing credentials or bad values.
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const { configPath = './config/config.yaml', loadDotenv = true } = options;

  if (loadDotenv) {
    dotenvConfig();
  }
  const env = options.env ?? process.env;

  const resolved = resolveEnvVars(loadYamlConfig(configPath), env);
  const merged = deepMerge(isRecord(resolved) ? resolved : {}, envOverrides(env));

  const result = configSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((error) => `${error.path.join('.')}: ${error.message}`)
    );
  }

  return result.data;
}

// Re-export types
export type { AppConfig };
