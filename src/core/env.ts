/**
 * Environment variable handling
 * The broker token is never logged or exposed
 */

export interface EnvConfig {
  tradierToken: string | null;
  tradierBaseUrl: string | null;
  tradierSandbox: boolean | null;
  settingsPath: string | null;
  dbPath: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: ReadonlyArray<EnvConfig['logLevel']> = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: ReadonlyArray<EnvConfig['nodeEnv']> = ['development', 'production', 'test'];

function readString(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean | null {
  const value = readString(env, name);
  if (value === null) return null;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function pick<T extends string>(allowed: ReadonlyArray<T>, value: string | null, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    tradierToken: readString(env, 'TRADIER_TOKEN') ?? readString(env, 'TRADIER_API_TOKEN'),
    tradierBaseUrl: readString(env, 'TRADIER_BASE_URL') ?? readString(env, 'TRADIER_BASE'),
    tradierSandbox: readBoolean(env, 'TRADIER_SANDBOX'),
    settingsPath: readString(env, 'SETTINGS_PATH'),
    dbPath: readString(env, 'DB_PATH'),
    logLevel: pick(LOG_LEVELS, readString(env, 'LOG_LEVEL'), 'info'),
    nodeEnv: pick(NODE_ENVS, readString(env, 'NODE_ENV'), 'development'),
  };
}
