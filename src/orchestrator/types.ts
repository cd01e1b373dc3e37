import type { PathValidator } from './tools/pathValidator.js';

export const TOOL_CATEGORIES = [
  'system-info',
  'file-management',
  'code-development',
  'web-search',
  'automation',
  'writing',
  'multimedia',
  'learning',
  'entertainment',
  'productivity',
  'communication',
  'utilities'
] as const;

export type ToolCategory = typeof TOOL_CATEGORIES[number];

export const UTILITY_CATEGORY: ToolCategory = 'utilities';

export function isToolCategory(value: unknown): value is ToolCategory {
  return typeof value === 'string' && TOOL_CATEGORIES.some(category => category === value);
}

export interface ToolMetadata {
  name: string;
  category: ToolCategory;
  description: string;
  keywords: readonly string[];
  /** 1 (lowest) to 10 (highest). */
  priority: number;
  prerequisites: readonly string[];
  conflicts: readonly string[];
  minConfidence: number;
  /** Seconds. */
  estimatedCost: number;
  asyncCapable: boolean;
}

export type ToolMetadataInit =
  Pick<ToolMetadata, 'category' | 'description' | 'keywords' | 'priority'> &
  Partial<Omit<ToolMetadata, 'name' | 'category' | 'description' | 'keywords' | 'priority'>>;

export interface ToolContext {
  workingDirectory: string;
  pathValidator: PathValidator;
  signal?: AbortSignal;
}

export interface Tool {
  name: string;
  invoke: (query: string, context: ToolContext) => Promise<string>;
}

export type IntentScores = Record<string, number>;

export interface ScoredTool {
  name: string;
  metadata: ToolMetadata;
  score: number;
}

export interface QueryAnalysis {
  query: string;
  intents: IntentScores;
  matchingTools: ScoredTool[];
  primaryIntent: string;
  confidence: number;
}

export interface PlannedTool {
  name: string;
  metadata: ToolMetadata;
}

export interface ExecutionPlan {
  tools: PlannedTool[];
  executionOrder: string[];
  estimatedCost: number;
  requiresPrerequisites: boolean;
  unmetPrerequisites: string[];
  hasConflicts: boolean;
}

export interface ExecutionResult {
  success: boolean;
  toolResults: Map<string, string>;
  errors: string[];
  /** Seconds. */
  executionTime: number;
}

export type OrchestrationStatus = 'completed' | 'partial' | 'no_match';

export interface OrchestrationOutcome {
  status: OrchestrationStatus;
  response: string;
  analysis: QueryAnalysis;
  plan?: ExecutionPlan;
  execution?: ExecutionResult;
}

export type AssistantState =
  | 'idle'
  | 'listening'
  | 'thinking'
  | 'speaking'
  | 'writing'
  | 'error'
  | 'sleeping';

export interface ActivitySink {
  log: (message: string) => void;
  setState: (state: AssistantState, message?: string) => void;
}
