import { readFileSync, writeFileSync, existsSync } from 'fs';
import { dirname } from 'path';
import { CONFIG_FILE, ensureHarkDir } from './paths.js';
import { getPackageVersion } from './version.js';
import { DEFAULT_OLLAMA_HOST } from '../services/ollamaClient.js';
import { AssistantError, AssistantErrorCode, describeError } from '../services/errors.js';
import { isRecord } from '../utils/dataFiles.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_OLLAMA_MODEL = 'llama3.2';

export interface OllamaSettings {
  host: string;
  model: string;
}

export interface HarkConfig {
  version?: string;
  theme?: string;
  ollama?: Partial<OllamaSettings>;
  /** Persisted RuntimeConfig overrides, validated when applied. */
  runtime?: Record<string, unknown>;
}

function defaultConfig(): HarkConfig {
  return { version: getPackageVersion() };
}

function parseConfig(raw: unknown): HarkConfig {
  if (!isRecord(raw)) {
    throw new Error('config root must be an object');
  }

  const config: HarkConfig = {};
  if (typeof raw.version === 'string') {
    config.version = raw.version;
  }
  if (typeof raw.theme === 'string') {
    config.theme = raw.theme;
  }
  if (isRecord(raw.ollama)) {
    config.ollama = {};
    if (typeof raw.ollama.host === 'string') config.ollama.host = raw.ollama.host;
    if (typeof raw.ollama.model === 'string') config.ollama.model = raw.ollama.model;
  }
  if (isRecord(raw.runtime)) {
    config.runtime = { ...raw.runtime };
  }
  return config;
}

export function loadConfig(file: string = CONFIG_FILE): HarkConfig {
  ensureHarkDir(dirname(file));

  if (!existsSync(file)) {
    const initial = defaultConfig();
    saveConfig(initial, file);
    return initial;
  }

  try {
    return parseConfig(JSON.parse(readFileSync(file, 'utf-8')));
  } catch (error) {
    logger.error(`Error reading config file ${file}, using defaults`, error);
    return defaultConfig();
  }
}

export function saveConfig(config: HarkConfig, file: string = CONFIG_FILE): void {
  ensureHarkDir(dirname(file));

  try {
    writeFileSync(file, JSON.stringify(config, null, 2), 'utf-8');
  } catch (error) {
    throw new AssistantError({
      code: AssistantErrorCode.CONFIG_ERROR,
      message: `Error saving config file ${file}: ${describeError(error)}`,
      cause: error
    });
  }
}

export function updateConfig(updates: Partial<HarkConfig>, file: string = CONFIG_FILE): HarkConfig {
  const current = loadConfig(file);
  const next: HarkConfig = {
    ...current,
    ...updates,
    ollama: { ...current.ollama, ...updates.ollama },
    runtime: { ...current.runtime, ...updates.runtime }
  };
  saveConfig(next, file);
  return next;
}

export function setRuntimeOverride(key: string, value: unknown, file: string = CONFIG_FILE): HarkConfig {
  return updateConfig({ runtime: { [key]: value } }, file);
}

export function resolveOllamaSettings(config: HarkConfig, overrides: Partial<OllamaSettings> = {}): OllamaSettings {
  return {
    host: overrides.host ?? config.ollama?.host ?? DEFAULT_OLLAMA_HOST,
    model: overrides.model ?? config.ollama?.model ?? DEFAULT_OLLAMA_MODEL
  };
}
