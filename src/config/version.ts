import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { logger } from '../utils/logger.js';
import { isRecord } from '../utils/dataFiles.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const UNKNOWN_VERSION = '0.0.0';

export function getPackageVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : UNKNOWN_VERSION;
  } catch (error) {
    logger.error('Error reading package.json version', error);
    return UNKNOWN_VERSION;
  }
}
