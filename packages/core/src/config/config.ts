/**
 * User configuration, read from a TOML file with Zod validation.
 *
 *   [defaults]
 *   thaw_days = 7
 *
 *   [storage]
 *   data_file = "~/kelvin/tasks.json"
 *
 * A missing or empty file means "all defaults". Unknown keys are ignored.
 */

import { z } from 'zod';
import { parse as parseToml } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, describeIssues } from '../errors.js';

export const DEFAULT_THAW_DAYS = 7;

const ConfigFileSchema = z.object({
  defaults: z.object({
    /** Days until thaw when freeze is given no date */
    thaw_days: z.number().int().nonnegative().default(DEFAULT_THAW_DAYS),
  }).default({}),
  storage: z.object({
    /** Overrides the default task file */
    data_file: z.string().min(1).optional(),
  }).default({}),
});

export const KelvinConfigSchema = ConfigFileSchema.transform(file => ({
  defaults: { thawDays: file.defaults.thaw_days },
  storage: { dataFile: file.storage.data_file },
}));

export type KelvinConfig = z.infer<typeof KelvinConfigSchema>;

export function defaultConfig(): KelvinConfig {
  return KelvinConfigSchema.parse({});
}

/** Holds config.toml and, unless configured otherwise, tasks.json */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return join(process.env['APPDATA'] || join(homedir(), 'AppData', 'Roaming'), 'kelvin');
  }
  return join(process.env['XDG_CONFIG_HOME'] || join(homedir(), '.config'), 'kelvin');
}

/** $KELVIN_CONFIG, else config.toml in the config directory */
export function getDefaultConfigPath(): string {
  const fromEnv = process.env['KELVIN_CONFIG'];
  if (fromEnv) return expandHome(fromEnv);
  return join(getConfigDir(), 'config.toml');
}

export function getDefaultDataFile(): string {
  return join(getConfigDir(), 'tasks.json');
}

/** Parse config file contents. `path` is only used in error messages. */
export function parseConfig(content: string, path: string): KelvinConfig {
  if (!content.trim()) return defaultConfig();

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (err: unknown) {
    throw new ConfigError(path, 'Config is not valid TOML', err);
  }

  const result = KelvinConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(path, 'Invalid config', describeIssues(result.error));
  }
  return result.data;
}

export function loadConfig(path: string = getDefaultConfigPath()): KelvinConfig {
  if (!existsSync(path)) return defaultConfig();

  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (err: unknown) {
    throw new ConfigError(path, 'Failed to read config', err);
  }
  return parseConfig(content, path);
}

/** Task file path: configured override (with ~ expanded) or the default */
export function resolveDataFile(config: KelvinConfig): string {
  const configured = config.storage.dataFile;
  return configured ? expandHome(configured) : getDefaultDataFile();
}

export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return p;
}
