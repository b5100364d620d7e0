/**
 * Configuration loader.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { BarcodeMode, RowErrorPolicy } from '../types/assay.js';
import type { AppConfig, IngestionConfig, NormalizationConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.ASSAY_CONFIG_PATH or './assay.config.yaml') */
  configPath?: string;
  /** Whether to validate config (default: true) */
  validate?: boolean;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isBarcodeMode(value: unknown): value is BarcodeMode {
  return value === 'strict' || value === 'prefix';
}

function isRowErrorPolicy(value: unknown): value is RowErrorPolicy {
  return value === 'skip' || value === 'throw';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Environment substitution yields strings; accept "7" where a number is expected.
 */
function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number.parseInt(value, 10);
  return undefined;
}

function validateIngestionConfig(config: unknown, path = 'ingestion'): Partial<IngestionConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  const result: Partial<IngestionConfig> = {};

  if (config.headerRows !== undefined) {
    const headerRows = toInteger(config.headerRows);
    if (headerRows === undefined || !Number.isInteger(headerRows) || headerRows < 0) {
      throw new ConfigValidationError('headerRows must be a non-negative integer', `${path}.headerRows`, config.headerRows);
    }
    result.headerRows = headerRows;
  }

  const { extensions } = config;
  if (extensions !== undefined) {
    if (!Array.isArray(extensions) || extensions.length === 0) {
      throw new ConfigValidationError('extensions must be a non-empty array', `${path}.extensions`, extensions);
    }
    result.extensions = extensions.map((ext: unknown, index) => {
      if (typeof ext !== 'string' || !ext.startsWith('.')) {
        throw new ConfigValidationError('extension must be a string starting with "."', `${path}.extensions[${index}]`, ext);
      }
      return ext.toLowerCase();
    });
  }

  const { sheet } = config;
  if (sheet !== undefined) {
    if (typeof sheet !== 'string' || sheet.length === 0) {
      throw new ConfigValidationError('sheet must be a non-empty string', `${path}.sheet`, sheet);
    }
    result.sheet = sheet;
  }

  return result;
}

function validateNormalizationConfig(config: unknown, path = 'normalization'): Partial<NormalizationConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  const result: Partial<NormalizationConfig> = {};

  const { barcodeMode, onRowError } = config;
  if (barcodeMode !== undefined) {
    if (!isBarcodeMode(barcodeMode)) {
      throw new ConfigValidationError('barcodeMode must be one of: strict, prefix', `${path}.barcodeMode`, barcodeMode);
    }
    result.barcodeMode = barcodeMode;
  }

  if (onRowError !== undefined) {
    if (!isRowErrorPolicy(onRowError)) {
      throw new ConfigValidationError('onRowError must be one of: skip, throw', `${path}.onRowError`, onRowError);
    }
    result.onRowError = onRowError;
  }

  return result;
}

/**
 * Validate a parsed config document and return its recognised sections.
 */
export function validateConfig(config: unknown): { ingestion?: Partial<IngestionConfig>; normalization?: Partial<NormalizationConfig> } {
  if (config === null || config === undefined) {
    return {};
  }
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  return {
    ...(config.ingestion !== undefined ? { ingestion: validateIngestionConfig(config.ingestion) } : {}),
    ...(config.normalization !== undefined ? { normalization: validateNormalizationConfig(config.normalization) } : {}),
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration merged over the defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.ASSAY_CONFIG_PATH
    ?? './assay.config.yaml';

  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const substituted = substituteEnvVarsRecursive(parsed);

  // Without validation invalid sections are dropped rather than trusted.
  const sections = options.validate === false ? lenientSections(substituted) : validateConfig(substituted);

  return {
    ingestion: structuredClone({ ...DEFAULT_CONFIG.ingestion, ...sections.ingestion }),
    normalization: { ...DEFAULT_CONFIG.normalization, ...sections.normalization },
  };
}

function lenientSection<T>(config: Record<string, unknown>, key: string, validate: (value: unknown) => T): T | undefined {
  if (config[key] === undefined) return undefined;
  try {
    return validate(config[key]);
  } catch (err) {
    if (!(err instanceof ConfigValidationError)) throw err;
    console.warn(`Ignoring invalid config section '${key}': ${err.message}`);
    return undefined;
  }
}

function lenientSections(config: unknown): ReturnType<typeof validateConfig> {
  if (!isRecord(config)) {
    if (config !== null && config !== undefined) {
      console.warn('Ignoring invalid config: document must be an object');
    }
    return {};
  }
  const ingestion = lenientSection(config, 'ingestion', validateIngestionConfig);
  const normalization = lenientSection(config, 'normalization', validateNormalizationConfig);
  return {
    ...(ingestion ? { ingestion } : {}),
    ...(normalization ? { normalization } : {}),
  };
}
