import { z } from 'zod';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import path from 'path';
import { Result, ok, err } from './result.js';
import { PathwiseError, configurationError } from './errors.js';

/**
 * Configuration Schema with Zod
 *
 * ARCHITECTURE PRINCIPLE: "Parse, don't validate"
 * - Every field has a .default(), so parse() always yields a complete config
 * - Single source of truth for validation AND defaults
 */
export const ConfigurationSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  logFormat: z.enum(['json', 'console']).default('console'),
  // Explicit-stack traversal by default: deep chains cannot exhaust the call stack
  traversal: z.enum(['recursive', 'iterative']).default('iterative'),
  // Batch runs end at the first cycle unless disabled
  stopOnCycle: z.boolean().default(true),
});

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type ConfigurationKey = keyof Configuration;

/**
 * Config file location: PATHWISE_CONFIG_PATH, else ~/.pathwise/config.json
 */
export const configFilePath = (env: NodeJS.ProcessEnv = process.env): string =>
  env.PATHWISE_CONFIG_PATH || path.join(homedir(), '.pathwise', 'config.json');

const ENV_KEYS: Record<ConfigurationKey, string> = {
  logLevel: 'PATHWISE_LOG_LEVEL',
  logFormat: 'PATHWISE_LOG_FORMAT',
  traversal: 'PATHWISE_TRAVERSAL',
  stopOnCycle: 'PATHWISE_STOP_ON_CYCLE',
};

export const isConfigurationKey = (key: string): key is ConfigurationKey =>
  Object.prototype.hasOwnProperty.call(ConfigurationSchema.shape, key);

// Only "true"/"false" become booleans; anything else is left for the schema to reject
function coerceValue(key: ConfigurationKey, raw: unknown): unknown {
  if (key === 'stopOnCycle' && typeof raw === 'string') {
    const lowered = raw.toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
  }
  return raw;
}

/**
 * Read the config file as a partial config
 * Missing file, bad JSON or values outside the schema all yield {}
 */
export function readConfigFile(filePath: string = configFilePath()): Partial<Configuration> {
  if (!existsSync(filePath)) {
    return {};
  }

  try {
    const parsed = ConfigurationSchema.partial().safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

/**
 * Resolve configuration: env > config file > defaults
 */
export function loadConfiguration(
  env: NodeJS.ProcessEnv = process.env,
  filePath: string = configFilePath()
): Configuration {
  const merged: Record<string, unknown> = { ...readConfigFile(filePath) };

  // Each env value is checked on its own so one bad variable does not discard the rest
  for (const key of Object.keys(ENV_KEYS)) {
    if (!isConfigurationKey(key)) continue;
    const raw = env[ENV_KEYS[key]];
    if (raw === undefined || raw === '') continue;

    const value = coerceValue(key, raw);
    if (ConfigurationSchema.shape[key].safeParse(value).success) {
      merged[key] = value;
    }
  }

  const parseResult = ConfigurationSchema.safeParse(merged);
  if (parseResult.success) {
    return parseResult.data;
  }
  return ConfigurationSchema.parse({});
}

function writeConfigFile(filePath: string, values: Record<string, unknown>): Result<void, PathwiseError> {
  try {
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, `${JSON.stringify(values, null, 2)}\n`, 'utf-8');
    return ok(undefined);
  } catch (error) {
    return err(configurationError(`Failed to write config file: ${filePath}`, {
      filePath,
      reason: error instanceof Error ? error.message : String(error),
    }));
  }
}

/**
 * Validate and persist a single value to the config file
 */
export function saveConfigValue(
  key: string,
  value: unknown,
  filePath: string = configFilePath()
): Result<void, PathwiseError> {
  if (!isConfigurationKey(key)) {
    return err(configurationError(`Unknown config key: ${key}`, {
      key,
      validKeys: Object.keys(ConfigurationSchema.shape),
    }));
  }

  const parsed = ConfigurationSchema.shape[key].safeParse(coerceValue(key, value));
  if (!parsed.success) {
    return err(configurationError(`Invalid value for ${key}: ${String(value)}`, {
      key,
      issues: parsed.error.issues.map((issue) => issue.message),
    }));
  }

  const next: Record<string, unknown> = { ...readConfigFile(filePath) };
  next[key] = parsed.data;
  return writeConfigFile(filePath, next);
}

/**
 * Remove a key from the config file so it falls back to its default
 */
export function resetConfigValue(
  key: string,
  filePath: string = configFilePath()
): Result<void, PathwiseError> {
  if (!isConfigurationKey(key)) {
    return err(configurationError(`Unknown config key: ${key}`, { key }));
  }

  const next: Record<string, unknown> = { ...readConfigFile(filePath) };
  delete next[key];
  return writeConfigFile(filePath, next);
}
