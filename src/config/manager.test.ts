import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_OLLAMA_MODEL,
  loadConfig,
  resolveOllamaSettings,
  setRuntimeOverride,
  updateConfig
} from './manager.js';
import { getPackageVersion } from './version.js';
import { DEFAULT_OLLAMA_HOST } from '../services/ollamaClient.js';
import { logger } from '../utils/logger.js';

let dir: string;
let file: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'hark-config-'));
  file = join(dir, 'nested', 'config.json');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function readSaved(): unknown {
  return JSON.parse(readFileSync(file, 'utf-8'));
}

describe('loadConfig', () => {
  it('writes defaults when the file is missing', () => {
    const config = loadConfig(file);
    expect(config).toEqual({ version: getPackageVersion() });
    expect(readSaved()).toEqual({ version: getPackageVersion() });
  });

  it('keeps only well-typed fields', () => {
    loadConfig(file);
    writeFileSync(
      file,
      JSON.stringify({ theme: 'ember', ollama: { host: 'http://gpu-box:11434', model: 7 }, runtime: { maxRetries: 1 }, extra: true })
    );

    expect(loadConfig(file)).toEqual({
      theme: 'ember',
      ollama: { host: 'http://gpu-box:11434' },
      runtime: { maxRetries: 1 }
    });
  });

  it('falls back to defaults on unreadable JSON', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
    loadConfig(file);
    writeFileSync(file, '{ not json');

    expect(loadConfig(file)).toEqual({ version: getPackageVersion() });
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe('updateConfig', () => {
  it('merges nested sections', () => {
    updateConfig({ ollama: { model: 'mistral' } }, file);
    const next = updateConfig({ ollama: { host: 'http://gpu-box:11434' } }, file);

    expect(next.ollama).toEqual({ model: 'mistral', host: 'http://gpu-box:11434' });
    expect(readSaved()).toMatchObject({ ollama: { model: 'mistral', host: 'http://gpu-box:11434' } });
  });

  it('persists runtime overrides one key at a time', () => {
    setRuntimeOverride('maxRetries', 5, file);
    const next = setRuntimeOverride('enableFallback', false, file);

    expect(next.runtime).toEqual({ maxRetries: 5, enableFallback: false });
  });
});

describe('resolveOllamaSettings', () => {
  it('prefers overrides, then the file, then defaults', () => {
    expect(resolveOllamaSettings({})).toEqual({ host: DEFAULT_OLLAMA_HOST, model: DEFAULT_OLLAMA_MODEL });
    expect(resolveOllamaSettings({ ollama: { model: 'mistral' } })).toEqual({
      host: DEFAULT_OLLAMA_HOST,
      model: 'mistral'
    });
    expect(resolveOllamaSettings({ ollama: { model: 'mistral' } }, { model: 'phi3' }).model).toBe('phi3');
  });
});
