import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DATA_DIR = join(__dirname, '../../data');

export function readDataFile(fileName: string): unknown {
  const raw = readFileSync(join(DATA_DIR, fileName), 'utf-8');
  return JSON.parse(raw);
}

export function readDataText(fileName: string): string {
  return readFileSync(join(DATA_DIR, fileName), 'utf-8');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
