/**
 * Environment variable handling
 */

export interface EnvConfig {
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
  enginePreset: string | null;
}

const LOG_LEVELS: ReadonlyArray<EnvConfig['logLevel']> = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: ReadonlyArray<EnvConfig['nodeEnv']> = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : undefined;
}

function pickOne<T extends string>(raw: string | undefined, allowed: ReadonlyArray<T>, fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  return {
    logLevel: pickOne(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pickOne(getEnvVar('NODE_ENV'), NODE_ENVS, 'development'),
    enginePreset: getEnvVar('ENGINE_PRESET') ?? null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
