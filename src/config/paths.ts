import { homedir } from 'os';
import { join } from 'path';
import { existsSync, mkdirSync } from 'fs';

export const HARK_DIR = process.env.HARK_HOME || join(homedir(), '.hark');
export const CONFIG_FILE = join(HARK_DIR, 'config.json');

export function ensureHarkDir(dir: string = HARK_DIR): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}
