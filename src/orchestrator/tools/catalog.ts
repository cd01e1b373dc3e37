import { Tool, ToolMetadataInit, isToolCategory } from '../types.js';
import { ToolRegistry } from './registry.js';
import { allSystemTools } from './systemTools.js';
import { allDesktopTools } from './desktopTools.js';
import { allWebTools } from './webTools.js';
import { createCodeTools, DEFAULT_SANDBOX_DIR } from './codeTools.js';
import { createUtilityTools, loadFunContent } from './utilityTools.js';
import { createMathTools } from './mathTools.js';
import { isRecord, isStringArray, readDataFile } from '../../utils/dataFiles.js';
import { Logger, logger as defaultLogger } from '../../utils/logger.js';

export interface CatalogEntry {
  name: string;
  metadata: ToolMetadataInit;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function optionalStrings(value: unknown): string[] | undefined {
  return isStringArray(value) ? value : undefined;
}

function parseEntry(raw: unknown, index: number): CatalogEntry {
  if (!isRecord(raw) || typeof raw.name !== 'string') {
    throw new Error(`Catalog entry ${index} has no name`);
  }
  const { name } = raw;

  if (!isToolCategory(raw.category)) {
    throw new Error(`Catalog entry ${name} has unknown category ${String(raw.category)}`);
  }
  if (typeof raw.description !== 'string' || !isStringArray(raw.keywords) || typeof raw.priority !== 'number') {
    throw new Error(`Catalog entry ${name} needs a description, keywords and a priority`);
  }

  return {
    name,
    metadata: {
      category: raw.category,
      description: raw.description,
      keywords: raw.keywords,
      priority: raw.priority,
      prerequisites: optionalStrings(raw.prerequisites),
      conflicts: optionalStrings(raw.conflicts),
      minConfidence: optionalNumber(raw.minConfidence),
      estimatedCost: optionalNumber(raw.estimatedCost),
      asyncCapable: typeof raw.asyncCapable === 'boolean' ? raw.asyncCapable : undefined
    }
  };
}

export function loadCatalog(fileName: string = 'tools.json'): CatalogEntry[] {
  const data = readDataFile(fileName);
  if (!Array.isArray(data)) {
    throw new Error(`${fileName} must contain an array of tool entries`);
  }
  return data.map(parseEntry);
}

export interface DefaultRegistryOptions {
  catalog?: CatalogEntry[];
  tools?: Tool[];
  sandboxDir?: string;
  logger?: Logger;
}

export function builtinTools(sandboxDir: string = DEFAULT_SANDBOX_DIR): Tool[] {
  return [
    ...createUtilityTools(loadFunContent()),
    ...createMathTools(),
    ...allSystemTools,
    ...allDesktopTools,
    ...allWebTools,
    ...createCodeTools(sandboxDir)
  ];
}

/**
 * Registers every catalog entry that has an implementation. Entries without
 * one are skipped.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ToolRegistry {
  const logger = options.logger ?? defaultLogger;
  const catalog = options.catalog ?? loadCatalog();
  const implementations = new Map(
    (options.tools ?? builtinTools(options.sandboxDir)).map(tool => [tool.name, tool])
  );

  const registry = new ToolRegistry();

  for (const entry of catalog) {
    const tool = implementations.get(entry.name);
    if (!tool) {
      logger.debug(`[Catalog] No implementation for ${entry.name}, skipping`);
      continue;
    }
    registry.register(entry.name, entry.metadata, tool);
  }

  logger.debug(`[Catalog] Registered ${registry.size()} tools`);
  return registry;
}
