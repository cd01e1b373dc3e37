export { Orchestrator, NO_MATCH_RESPONSE } from './Orchestrator.js';
export type { OrchestratorOptions } from './Orchestrator.js';
export { LexicalIntentClassifier, loadIntentTable, rankIntents } from './planning/IntentClassifier.js';
export type { Classifier, IntentTable, IntentCategory } from './planning/IntentClassifier.js';
export { TaskPlanner, toolsConflict, MAX_SELECTED_TOOLS } from './planning/TaskPlanner.js';
export { ToolRegistry, createDefaultRegistry } from './tools/index.js';
export { TOOL_CATEGORIES, UTILITY_CATEGORY, isToolCategory } from './types.js';

export type {
  ToolCategory,
  ToolMetadata,
  ToolMetadataInit,
  Tool,
  ToolContext,
  IntentScores,
  ScoredTool,
  QueryAnalysis,
  PlannedTool,
  ExecutionPlan,
  ExecutionResult,
  OrchestrationStatus,
  OrchestrationOutcome,
  AssistantState,
  ActivitySink
} from './types.js';
