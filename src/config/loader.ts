import { readFile } from 'node:fs/promises';
import { dirname, extname, isAbsolute, resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { parse as parseToml } from 'toml';
import { ConfigError, describeError } from '../common/errors';
import type { SanitizerConfig } from '../sanitizer/types';
import { DEFAULT_SETTINGS, LogSanitizerConfig, SanitizerSettings } from './types';

const PATH_KEYS = ['source', 'output', 'rules', 'ignore'] as const;
const STRING_KEYS = [...PATH_KEYS, 'placeholder'] as const;
const BOOLEAN_KEYS = ['maintainLength', 'dryRun'] as const;
const KNOWN_KEYS = new Set<string>([...STRING_KEYS, ...BOOLEAN_KEYS, 'concurrency']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseContents(contents: string, ext: string, path: string): unknown {
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return loadYaml(contents);
      case '.toml':
        return parseToml(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        throw new ConfigError(`Unsupported config format for ${path}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Failed to parse ${path}: ${describeError(error)}`, { cause: error });
  }
}

export function parseSettings(value: unknown, where: string): SanitizerSettings {
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be a mapping`);
  }

  const unknownKeys = Object.keys(value).filter((key) => !KNOWN_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigError(`${where} has unknown keys: ${unknownKeys.join(', ')}`);
  }

  const settings: SanitizerSettings = {};
  for (const key of STRING_KEYS) {
    const entry = value[key];
    if (entry === undefined || entry === null) {
      continue;
    }
    if (typeof entry !== 'string') {
      throw new ConfigError(`${where}.${key} must be a string`);
    }
    settings[key] = entry;
  }
  for (const key of BOOLEAN_KEYS) {
    const entry = value[key];
    if (entry === undefined || entry === null) {
      continue;
    }
    if (typeof entry !== 'boolean') {
      throw new ConfigError(`${where}.${key} must be a boolean`);
    }
    settings[key] = entry;
  }
  const concurrency = value.concurrency;
  if (concurrency !== undefined && concurrency !== null) {
    if (typeof concurrency !== 'number') {
      throw new ConfigError(`${where}.concurrency must be a number`);
    }
    settings.concurrency = concurrency;
  }
  return settings;
}

export function parseConfig(value: unknown, path: string): LogSanitizerConfig {
  if (!isRecord(value) || value.sanitizer === undefined) {
    throw new ConfigError(`Config ${path} must define "sanitizer" section`);
  }

  const config: LogSanitizerConfig = { sanitizer: parseSettings(value.sanitizer, 'sanitizer') };
  if (value.profiles !== undefined) {
    if (!isRecord(value.profiles)) {
      throw new ConfigError('profiles must be a mapping');
    }
    const profiles: NonNullable<LogSanitizerConfig['profiles']> = {};
    for (const [name, profile] of Object.entries(value.profiles)) {
      if (!isRecord(profile)) {
        throw new ConfigError(`profiles.${name} must be a mapping`);
      }
      profiles[name] =
        profile.sanitizer === undefined ? {} : { sanitizer: parseSettings(profile.sanitizer, `profiles.${name}.sanitizer`) };
    }
    config.profiles = profiles;
  }
  return config;
}

/**
 * Load a YAML, TOML or JSON config file and return its settings with the
 * profile, if any, merged over the base section. Relative paths resolve
 * against the config file's directory.
 */
export async function loadConfig(path: string, profile?: string): Promise<SanitizerSettings> {
  const absolute = resolve(path);
  const baseDir = dirname(absolute);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigError(`Config file not readable: ${absolute} (${describeError(error)})`, { cause: error });
  }
  const parsed = parseConfig(parseContents(contents, extname(absolute).toLowerCase(), absolute), absolute);

  let settings = parsed.sanitizer;
  if (profile) {
    const profileConfig = parsed.profiles?.[profile];
    if (!profileConfig) {
      throw new ConfigError(`Profile ${profile} not found in config`);
    }
    settings = mergeSettings(settings, profileConfig.sanitizer ?? {});
  }

  return normalizeSettingsPaths(settings, baseDir);
}

/** Later layers win; undefined values never override. */
export function mergeSettings(...layers: SanitizerSettings[]): SanitizerSettings {
  const merged: SanitizerSettings = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

function normalizeSettingsPaths(settings: SanitizerSettings, baseDir: string): SanitizerSettings {
  const normalized: SanitizerSettings = { ...settings };
  for (const key of PATH_KEYS) {
    const value = settings[key];
    if (value !== undefined && !isAbsolute(value)) {
      normalized[key] = resolve(baseDir, value);
    }
  }
  return normalized;
}

/** Fill defaults, validate, and freeze the configuration for one run. */
export function resolveSanitizerConfig(...layers: SanitizerSettings[]): SanitizerConfig {
  const settings = { ...DEFAULT_SETTINGS, ...mergeSettings(...layers) };

  if (settings.placeholder.length === 0) {
    throw new ConfigError('placeholder must be a non-empty string');
  }
  if (!Number.isInteger(settings.concurrency) || settings.concurrency < 1) {
    throw new ConfigError(`concurrency must be a positive integer, got ${settings.concurrency}`);
  }

  return Object.freeze({
    sourceDir: resolve(settings.source),
    outputDir: resolve(settings.output),
    rulesFile: resolve(settings.rules),
    ignoreFile: settings.ignore === '' ? undefined : resolve(settings.ignore),
    placeholder: settings.placeholder,
    maintainLength: settings.maintainLength,
    concurrency: settings.concurrency,
    dryRun: settings.dryRun,
  });
}
