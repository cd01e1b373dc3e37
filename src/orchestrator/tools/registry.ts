import { Tool, ToolCategory, ToolMetadata, ToolMetadataInit, isToolCategory } from '../types.js';
import { AssistantError, AssistantErrorCode } from '../../services/errors.js';

export interface RegisteredTool {
  metadata: ToolMetadata;
  tool: Tool;
}

const DEFAULT_MIN_CONFIDENCE = 0.7;
const DEFAULT_ESTIMATED_COST = 1.0;

function invalidMetadata(name: string, reason: string): AssistantError {
  return new AssistantError({
    code: AssistantErrorCode.INVALID_TOOL_METADATA,
    message: `Invalid metadata for tool ${name}: ${reason}`
  });
}

function uniqueLowercase(values: readonly string[]): string[] {
  return Array.from(new Set(values.map(value => value.trim().toLowerCase()).filter(Boolean)));
}

export function normalizeMetadata(name: string, init: ToolMetadataInit): ToolMetadata {
  if (!name.trim()) {
    throw invalidMetadata(name, 'name must not be empty');
  }
  if (!isToolCategory(init.category)) {
    throw invalidMetadata(name, `unknown category "${String(init.category)}"`);
  }
  if (!Number.isInteger(init.priority) || init.priority < 1 || init.priority > 10) {
    throw invalidMetadata(name, `priority must be an integer between 1 and 10, got ${init.priority}`);
  }

  const minConfidence = init.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  if (!(minConfidence >= 0 && minConfidence <= 1)) {
    throw invalidMetadata(name, `minConfidence must be within [0, 1], got ${minConfidence}`);
  }

  const estimatedCost = init.estimatedCost ?? DEFAULT_ESTIMATED_COST;
  if (!(estimatedCost >= 0)) {
    throw invalidMetadata(name, `estimatedCost must be non-negative, got ${estimatedCost}`);
  }

  return {
    name,
    category: init.category,
    description: init.description,
    keywords: uniqueLowercase(init.keywords),
    priority: init.priority,
    prerequisites: Array.from(new Set(init.prerequisites ?? [])).filter(prereq => prereq !== name),
    conflicts: Array.from(new Set(init.conflicts ?? [])).filter(conflict => conflict !== name),
    minConfidence,
    estimatedCost,
    asyncCapable: init.asyncCapable ?? true
  };
}

/**
 * Name-keyed map of tool metadata and implementations. Every method runs to
 * completion synchronously, so a registration never interleaves with a read.
 */
export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  register(name: string, metadata: ToolMetadataInit, tool: Tool): ToolMetadata {
    const normalized = normalizeMetadata(name, metadata);
    this.tools.set(name, { metadata: normalized, tool });
    return normalized;
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): ToolMetadata | undefined {
    return this.tools.get(name)?.metadata;
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name)?.tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  all(): ToolMetadata[] {
    return Array.from(this.tools.values(), entry => entry.metadata);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  size(): number {
    return this.tools.size;
  }

  findByCategory(category: ToolCategory): ToolMetadata[] {
    return this.all().filter(metadata => metadata.category === category);
  }

  /** Tools with at least one keyword containing `text`, case-insensitively. */
  findByKeywordSubstring(text: string): ToolMetadata[] {
    const needle = text.trim().toLowerCase();
    if (!needle) return [];
    return this.all().filter(metadata => metadata.keywords.some(keyword => keyword.includes(needle)));
  }
}
