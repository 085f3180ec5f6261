/**
 * Loads the optional JSON configuration file.
 */
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileExists } from './archive-io.js';
import { assertInjectionConfig } from './injection.js';
import { DEFAULT_ENTRY_PATH, DEFAULT_INJECTION_CONFIG } from './constants/injection-defaults.js';
import { ConfigError, InjectionError } from './types/errors.js';
import type { InjectionConfig } from './types/injection.js';

/** Looked up in the working directory when no `--config` is given. */
export const DEFAULT_CONFIG_FILE = 'asar-inject.config.json';

export interface AppConfig {
  /** Script entry to patch inside the archive. */
  readonly entryPath: string;
  /** Script injected alongside the CSS; empty for none. */
  readonly customJs: string;
  readonly makeBackup: boolean;
  readonly backupPath?: string;
  readonly injection: InjectionConfig;
}

export const DEFAULT_CONFIG: AppConfig = {
  entryPath: DEFAULT_ENTRY_PATH,
  customJs: '',
  makeBackup: true,
  injection: DEFAULT_INJECTION_CONFIG,
};

type ConfigObject = { readonly [key: string]: unknown };

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: ConfigObject, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}: "${key}" must be a string`);
  }
  return value;
}

function parseInjection(value: unknown, where: string): InjectionConfig {
  if (value === undefined) {
    return DEFAULT_INJECTION_CONFIG;
  }
  if (!isConfigObject(value)) {
    throw new ConfigError(`${where}: "injection" must be an object`);
  }
  const injection: InjectionConfig = {
    anchor: optionalString(value, 'anchor', where) ?? DEFAULT_INJECTION_CONFIG.anchor,
    guardToken: optionalString(value, 'guardToken', where) ?? DEFAULT_INJECTION_CONFIG.guardToken,
    hostExpression: optionalString(value, 'hostExpression', where) ?? DEFAULT_INJECTION_CONFIG.hostExpression,
    beginSentinel: optionalString(value, 'beginSentinel', where) ?? DEFAULT_INJECTION_CONFIG.beginSentinel,
    endSentinel: optionalString(value, 'endSentinel', where) ?? DEFAULT_INJECTION_CONFIG.endSentinel,
  };
  try {
    assertInjectionConfig(injection);
  } catch (error) {
    if (error instanceof InjectionError) {
      throw new ConfigError(`${where}: ${error.message}`, error);
    }
    throw error;
  }
  return injection;
}

/**
 * Validates parsed config JSON. `customJsFile` is resolved against `baseDir`
 * and read by {@link loadConfig}; here it is only returned.
 *
 * @throws {ConfigError} If a field has the wrong type
 */
export function parseConfig(json: unknown, baseDir: string, where = 'config'): AppConfig & { readonly customJsFile?: string } {
  if (!isConfigObject(json)) {
    throw new ConfigError(`${where}: top level must be an object`);
  }
  let makeBackup = DEFAULT_CONFIG.makeBackup;
  if ('makeBackup' in json) {
    const value = json.makeBackup;
    if (typeof value !== 'boolean') {
      throw new ConfigError(`${where}: "makeBackup" must be a boolean`);
    }
    makeBackup = value;
  }
  const customJs = optionalString(json, 'customJs', where);
  const customJsFile = optionalString(json, 'customJsFile', where);
  if (customJs !== undefined && customJsFile !== undefined) {
    throw new ConfigError(`${where}: set either "customJs" or "customJsFile", not both`);
  }
  const backupPath = optionalString(json, 'backupPath', where);
  return {
    entryPath: optionalString(json, 'entryPath', where) ?? DEFAULT_CONFIG.entryPath,
    customJs: customJs ?? DEFAULT_CONFIG.customJs,
    makeBackup,
    ...(backupPath !== undefined ? { backupPath: resolve(baseDir, backupPath) } : {}),
    ...(customJsFile !== undefined ? { customJsFile: resolve(baseDir, customJsFile) } : {}),
    injection: parseInjection(json.injection, where),
  };
}

/**
 * Loads configuration from `configPath`, or from {@link DEFAULT_CONFIG_FILE} in
 * the working directory. A missing default file yields {@link DEFAULT_CONFIG};
 * a missing explicit file is an error.
 *
 * @throws {ConfigError} If the file cannot be read or parsed
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const filePath = resolve(configPath ?? DEFAULT_CONFIG_FILE);
  if (!(await fileExists(filePath))) {
    if (configPath !== undefined) {
      throw new ConfigError(`Config file "${filePath}" does not exist`);
    }
    return DEFAULT_CONFIG;
  }

  let json: unknown;
  try {
    json = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read config "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  const { customJsFile, ...config } = parseConfig(json, dirname(filePath), filePath);
  if (customJsFile === undefined) {
    return config;
  }
  try {
    return { ...config, customJs: await readFile(customJsFile, 'utf8') };
  } catch (error) {
    throw new ConfigError(
      `Failed to read customJsFile "${customJsFile}": ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}
