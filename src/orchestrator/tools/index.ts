export { ToolRegistry, normalizeMetadata } from './registry.js';
export type { RegisteredTool } from './registry.js';
export { createPathValidator, PathSecurityError } from './pathValidator.js';
export type { PathValidator } from './pathValidator.js';
export { createDefaultRegistry, loadCatalog, builtinTools } from './catalog.js';
export type { CatalogEntry, DefaultRegistryOptions } from './catalog.js';
export { allSystemTools } from './systemTools.js';
export { allDesktopTools } from './desktopTools.js';
export { allWebTools } from './webTools.js';
export { createCodeTools } from './codeTools.js';
export { createUtilityTools } from './utilityTools.js';
