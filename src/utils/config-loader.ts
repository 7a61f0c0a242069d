/**
 * Configuration File Loader
 *
 * Loads configuration from .apischemarc or .apischemarc.json files.
 * Configuration precedence: Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory (~/.apischemarc)
 *
 * @example
 * // .apischemarc in project root
 * {
 *   "log": { "level": "debug" },
 *   "fetcher": { "timeoutMs": 60000 },
 *   "parser": { "fieldIdentity": "tuple" }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  logConfigSchema,
  fetcherConfigSchema,
  parserConfigSchema,
  parseConfigSection,
  type LogConfig,
  type FetcherConfig,
  type ParserConfig,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    prettyPrint: z.boolean().optional(),
  }).optional(),

  fetcher: z.object({
    url: z.string().optional(),
    timeoutMs: z.number().int().optional(),
    maxAttempts: z.number().int().optional(),
  }).optional(),

  parser: z.object({
    flushTrailingDeclaration: z.boolean().optional(),
    fieldIdentity: z.enum(['name', 'tuple']).optional(),
  }).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface AppConfig {
  log: LogConfig;
  fetcher: FetcherConfig;
  parser: ParserConfig;
}

// ============================================
// FILE SEARCH
// ============================================

export const CONFIG_FILE_NAMES = [
  '.apischemarc',
  '.apischemarc.json',
  'apischemarc.json',
];

function getSearchPaths(): string[] {
  const paths: string[] = [process.cwd()];

  const home = homedir();
  if (home && !paths.includes(home)) {
    paths.push(home);
  }

  return paths;
}

function findConfigFile(): string | null {
  const searchPaths = getSearchPaths();

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

function loadConfigFile(filePath: string): ConfigFile {
  try {
    const content = readFileSync(filePath, 'utf-8');

    // .apischemarc may carry // and /* */ comments on lines of their own
    const stripped = content
      .replace(/^[ \t]*\/\*[\s\S]*?\*\/[ \t]*$/gm, '')
      .replace(/^\s*\/\/.*$/gm, '');

    const parsed: unknown = JSON.parse(stripped);
    const result = configFileSchema.safeParse(parsed);

    if (!result.success) {
      log.warn('Config file validation failed', {
        path: filePath,
        errors: result.error.issues.map(i => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      });
      return {};
    }

    log.info('Loaded config file', {
      path: filePath,
      sections: Object.keys(result.data),
    });

    return result.data;
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', { path: filePath, error: error.message });
    } else {
      log.warn('Failed to read config file', { path: filePath, error: String(error) });
    }
    return {};
  }
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;

/**
 * Get the loaded config file (cached after first load).
 */
export function getConfigFile(): ConfigFile {
  if (cachedConfigFile === null) {
    const filePath = findConfigFile();
    cachedConfigFile = filePath ? loadConfigFile(filePath) : {};
  }
  return cachedConfigFile;
}

/**
 * Clear the config file cache, so the next read searches again.
 */
export function clearConfigFileCache(): void {
  cachedConfigFile = null;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function numToEnvString(value: number | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

export function getMergedLogConfig(): LogConfig {
  const file = getConfigFile().log ?? {};

  return parseConfigSection('log', logConfigSchema, {
    level: process.env.LOG_LEVEL ?? file.level,
    prettyPrint: process.env.LOG_PRETTY ?? boolToEnvString(file.prettyPrint),
  });
}

export function getMergedFetcherConfig(): FetcherConfig {
  const file = getConfigFile().fetcher ?? {};

  return parseConfigSection('fetcher', fetcherConfigSchema, {
    url: process.env.API_DOC_URL ?? file.url,
    timeoutMs: process.env.FETCH_TIMEOUT_MS ?? numToEnvString(file.timeoutMs),
    maxAttempts: process.env.FETCH_MAX_ATTEMPTS ?? numToEnvString(file.maxAttempts),
  });
}

export function getMergedParserConfig(): ParserConfig {
  const file = getConfigFile().parser ?? {};

  return parseConfigSection('parser', parserConfigSchema, {
    flushTrailingDeclaration:
      process.env.SCHEMA_FLUSH_TRAILING ?? boolToEnvString(file.flushTrailingDeclaration),
    fieldIdentity: process.env.SCHEMA_FIELD_IDENTITY ?? file.fieldIdentity,
  });
}

/**
 * Load every configuration section.
 * @throws ConfigValidationError when a merged value is invalid
 */
export function loadConfig(): AppConfig {
  return {
    log: getMergedLogConfig(),
    fetcher: getMergedFetcherConfig(),
    parser: getMergedParserConfig(),
  };
}
