import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { LogLevel, ValidatorConfig } from '../types';
import { Logger, defaultLogger, isLogLevel } from '../core/logger';

/**
 * Default configuration, matching the public Ensembl REST service
 */
const DEFAULT_CONFIG: ValidatorConfig = {
  baseUrl: 'https://rest.ensembl.org',
  timeoutMs: 30_000,
  cacheTtlMs: 30_000,
  retries: 3,
  backoffMs: 200,
  port: 8000,
  logLevel: 'info',
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.ensembl-validator/config.yml',
  '.ensembl-validator/config.yaml',
  'ensembl-validator.yml',
  'ensembl-validator.yaml',
];

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Shape of a configuration file; every key is optional
 */
export const ConfigFileSchema = {
  type: 'object',
  properties: {
    baseUrl: { type: 'string', format: 'uri' },
    timeoutMs: { type: 'number', exclusiveMinimum: 0 },
    cacheTtlMs: { type: 'number', minimum: 0 },
    retries: { type: 'integer', minimum: 1 },
    backoffMs: { type: 'number', minimum: 0 },
    port: { type: 'integer', minimum: 0, maximum: 65535 },
    logLevel: { type: 'string', enum: LOG_LEVELS },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);
const validateConfigFile = ajv.compile<Partial<ValidatorConfig>>(ConfigFileSchema);

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string, fallback: number, scale = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value * scale : fallback;
}

function envInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) ? value : fallback;
}

/**
 * Apply environment overrides. Unparsable values keep the current setting.
 */
export function applyEnv(config: ValidatorConfig, env: Env): ValidatorConfig {
  const level = (env.LOG_LEVEL || '').toLowerCase();
  return {
    baseUrl: env.ENSEMBL_BASE_URL || config.baseUrl,
    timeoutMs: envNumber(env, 'ENSEMBL_TIMEOUT_SECONDS', config.timeoutMs, 1000),
    cacheTtlMs: envNumber(env, 'ENSEMBL_CACHE_TTL_SECONDS', config.cacheTtlMs, 1000),
    retries: envInteger(env, 'ENSEMBL_RETRIES', config.retries),
    backoffMs: envNumber(env, 'ENSEMBL_BACKOFF_MS', config.backoffMs),
    port: envInteger(env, 'PORT', config.port),
    logLevel: isLogLevel(level) ? level : config.logLevel,
  };
}

function readConfigFile(configPath: string, logger: Logger): Partial<ValidatorConfig> | null {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = yaml.parse(content) ?? {};
    if (validateConfigFile(parsed)) {
      return parsed;
    }
    const reasons = (validateConfigFile.errors || [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    logger.warn(`Ignoring invalid config at ${configPath}: ${reasons}`);
  } catch (error) {
    logger.warn(`Failed to parse config at ${configPath}: ${error}`);
  }
  return null;
}

/**
 * Load configuration: defaults, then the first config file found, then
 * environment variables
 */
export function loadConfig(
  basePath?: string,
  env: Env = process.env,
  logger: Logger = defaultLogger
): ValidatorConfig {
  let config = getDefaultConfig();

  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));
  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      const fromFile = readConfigFile(configPath, logger);
      if (fromFile) {
        config = { ...config, ...fromFile };
      }
      break;
    }
  }

  return applyEnv(config, env);
}

/**
 * Get the default configuration (copy)
 */
export function getDefaultConfig(): ValidatorConfig {
  return { ...DEFAULT_CONFIG };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ValidatorConfig): string[] {
  const errors: string[] = [];

  let url: URL | null = null;
  try {
    url = new URL(config.baseUrl);
  } catch {
    errors.push(`Invalid base URL: ${config.baseUrl}`);
  }
  if (url && url.protocol !== 'http:' && url.protocol !== 'https:') {
    errors.push(`Base URL must use http or https: ${config.baseUrl}`);
  }

  if (!(config.timeoutMs > 0)) {
    errors.push(`Invalid timeout: ${config.timeoutMs}. Must be greater than 0.`);
  }
  if (!(config.cacheTtlMs >= 0)) {
    errors.push(`Invalid cache TTL: ${config.cacheTtlMs}. Must be 0 or more.`);
  }
  if (!Number.isInteger(config.retries) || config.retries < 1) {
    errors.push(`Invalid retries: ${config.retries}. Must be an integer of at least 1.`);
  }
  if (!(config.backoffMs >= 0)) {
    errors.push(`Invalid backoff: ${config.backoffMs}. Must be 0 or more.`);
  }
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`Invalid port: ${config.port}. Must be between 0 and 65535.`);
  }

  return errors;
}
