import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import { getWtuiDir, getWtuiConfigPath } from '../utils/paths.js';
import { ConfigError } from '../utils/errors.js';
import { CONFIG_KEYS } from '../types/index.js';
import type { ConfigKey, WtuiConfig } from '../types/index.js';

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key);
}

/**
 * Validate parsed JSON as a config object. Unknown keys are dropped.
 */
export function parseConfig(raw: unknown): WtuiConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('config.json must contain a JSON object');
  }

  const config: WtuiConfig = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(raw, key);
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new ConfigError(`"${key}" must be a string`);
    }
    config[key] = value;
  }
  return config;
}

/**
 * Read wtui config. A missing or malformed file reads as empty.
 */
export async function readConfig(): Promise<WtuiConfig> {
  try {
    const raw = await fs.readFile(getWtuiConfigPath(), 'utf-8');
    return parseConfig(JSON.parse(raw));
  } catch {
    return {};
  }
}

/**
 * Read wtui config for an update. Only a missing file reads as empty; a
 * malformed one raises ConfigError so the write does not replace it.
 */
async function readConfigForUpdate(): Promise<WtuiConfig> {
  const filePath = getWtuiConfigPath();
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${filePath} is not valid JSON (${detail})`);
  }
  return parseConfig(parsed);
}

/**
 * Write wtui config atomically.
 */
export async function writeConfig(config: WtuiConfig): Promise<void> {
  await fs.mkdir(getWtuiDir(), { recursive: true });
  await atomicWrite(getWtuiConfigPath(), JSON.stringify(config, null, 2));
}

export async function setConfigValue(key: string, value: string): Promise<WtuiConfig> {
  if (!isConfigKey(key)) {
    throw new ConfigError(`unknown key "${key}" (expected one of: ${CONFIG_KEYS.join(', ')})`);
  }
  const config = await readConfigForUpdate();
  config[key] = value;
  await writeConfig(config);
  return config;
}

export async function unsetConfigValue(key: string): Promise<WtuiConfig> {
  if (!isConfigKey(key)) {
    throw new ConfigError(`unknown key "${key}" (expected one of: ${CONFIG_KEYS.join(', ')})`);
  }
  const config = await readConfigForUpdate();
  delete config[key];
  await writeConfig(config);
  return config;
}

/**
 * Config file values overlaid with WTUI_RENDERER / WTUI_TERM.
 */
export async function resolveConfig(env: NodeJS.ProcessEnv = process.env): Promise<WtuiConfig> {
  const config = await readConfig();
  const renderer = env['WTUI_RENDERER'];
  const term = env['WTUI_TERM'];
  return {
    ...config,
    ...(renderer ? { renderer_path: renderer } : {}),
    ...(term ? { term } : {}),
  };
}

/**
 * Atomic file write: write to temp file, then rename.
 */
async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpFile = path.join(dir, `.tmp_${crypto.randomBytes(4).toString('hex')}`);

  await fs.writeFile(tmpFile, content, 'utf-8');
  try {
    await fs.rename(tmpFile, filePath);
  } catch {
    // On Windows, rename may fail if target exists; remove target first
    try {
      await fs.unlink(filePath);
    } catch {
      // Target may not exist
    }
    await fs.rename(tmpFile, filePath);
  }
}
