import {
  ActivitySink,
  ExecutionPlan,
  ExecutionResult,
  OrchestrationOutcome,
  PlannedTool,
  QueryAnalysis,
  ScoredTool,
  ToolContext,
  ToolMetadata
} from './types.js';
import { ToolRegistry } from './tools/registry.js';
import { createPathValidator } from './tools/pathValidator.js';
import { Classifier, LexicalIntentClassifier, rankIntents } from './planning/IntentClassifier.js';
import { TaskPlanner } from './planning/TaskPlanner.js';
import { AssistantError, AssistantErrorCode, describeError } from '../services/errors.js';
import { NOOP_ACTIVITY, safeActivity } from '../services/activity.js';
import { Logger, logger as defaultLogger } from '../utils/logger.js';

export const KEYWORD_WEIGHT = 0.3;
export const INTENT_WEIGHT = 0.7;
export const MAX_MATCHING_TOOLS = 5;
export const GENERAL_INTENT = 'general';
export const GENERAL_CONFIDENCE = 0.5;

export const NO_MATCH_RESPONSE = "I'm not sure how to help with that. Could you be more specific?";
export const NO_SELECTION_RESPONSE = "I couldn't find appropriate tools for your request.";
export const EMPTY_SUCCESS_RESPONSE = 'Task completed successfully!';

export interface OrchestratorOptions {
  registry: ToolRegistry;
  classifier?: Classifier;
  activity?: ActivitySink;
  logger?: Logger;
  workingDirectory?: string;
}

export class Orchestrator {
  private registry: ToolRegistry;
  private classifier: Classifier;
  private planner: TaskPlanner;
  private activity: ActivitySink;
  private logger: Logger;
  private toolContext: ToolContext;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.classifier = options.classifier ?? new LexicalIntentClassifier();
    this.planner = new TaskPlanner(this.registry);
    this.logger = options.logger ?? defaultLogger;
    this.activity = safeActivity(options.activity ?? NOOP_ACTIVITY, this.logger);

    const workingDirectory = options.workingDirectory ?? process.cwd();
    this.toolContext = {
      workingDirectory,
      pathValidator: createPathValidator(workingDirectory)
    };
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  getToolContext(): ToolContext {
    return this.toolContext;
  }

  scoreTool(metadata: ToolMetadata, normalizedQuery: string, intents: Record<string, number>): number {
    const hits = metadata.keywords.filter(keyword => normalizedQuery.includes(keyword)).length;
    const hitRatio = metadata.keywords.length > 0 ? hits / metadata.keywords.length : 0;

    let intentScore = 0;
    for (const intent of this.classifier.intentsFor(metadata.category)) {
      intentScore = Math.max(intentScore, intents[intent] ?? 0);
    }

    const raw = (KEYWORD_WEIGHT * hitRatio + INTENT_WEIGHT * intentScore) * (metadata.priority / 10);
    return Math.min(Math.max(raw, 0), 1);
  }

  analyze(query: string): QueryAnalysis {
    this.activity.setState('thinking', 'Analyzing your request...');

    const intents = this.classifier.classify(query);
    const normalized = this.classifier.normalize(query);
    const matching: ScoredTool[] = [];

    for (const metadata of this.registry.all()) {
      const score = this.scoreTool(metadata, normalized, intents);
      if (score > 0 && score >= metadata.minConfidence) {
        matching.push({ name: metadata.name, metadata, score });
      }
    }

    matching.sort((a, b) => b.score - a.score);

    const ranked = rankIntents(intents);
    const [primaryIntent, confidence] = ranked.length > 0 ? ranked[0] : [GENERAL_INTENT, GENERAL_CONFIDENCE];

    this.activity.log(`Found ${matching.length} matching tools for: ${query.slice(0, 50)}`);
    this.logger.debug(
      `[Orchestrator] intent=${primaryIntent} (${confidence.toFixed(2)}), candidates=${matching.map(t => `${t.name}:${t.score.toFixed(3)}`).join(', ') || 'none'}`
    );

    return {
      query,
      intents,
      matchingTools: matching.slice(0, MAX_MATCHING_TOOLS),
      primaryIntent,
      confidence
    };
  }

  select(analysis: QueryAnalysis): PlannedTool[] {
    return this.planner.selectTools(analysis);
  }

  plan(selection: PlannedTool[], query: string): ExecutionPlan {
    const plan = this.planner.createPlan(selection, query);
    if (plan.unmetPrerequisites.length > 0) {
      this.logger.warn(`[Orchestrator] Unregistered prerequisites skipped: ${plan.unmetPrerequisites.join(', ')}`);
    }
    return plan;
  }

  async execute(plan: ExecutionPlan, query: string, signal?: AbortSignal): Promise<ExecutionResult> {
    this.activity.setState('thinking', `Executing ${plan.tools.length} tools...`);

    const toolResults = new Map<string, string>();
    const errors: string[] = [];
    let success = true;
    const startTime = performance.now();

    for (const { name } of plan.tools) {
      if (signal?.aborted) {
        throw AssistantError.cancelled();
      }

      try {
        const tool = this.registry.getTool(name);
        if (!tool) {
          throw new Error('tool is not registered');
        }

        this.activity.log(`Executing: ${name}`);
        this.activity.setState('thinking', `Running ${name}...`);

        const output = await tool.invoke(query, { ...this.toolContext, signal });
        toolResults.set(name, output);
      } catch (error) {
        const failure = AssistantError.toolFailed(name, error);
        errors.push(failure.message);
        success = false;
        this.logger.error(`[Orchestrator] ${failure.message}`);
        this.activity.log(`${name} failed: ${describeError(error).slice(0, 50)}`);
      }
    }

    const executionTime = (performance.now() - startTime) / 1000;

    if (success) {
      this.activity.setState('idle', 'Task completed successfully');
      this.activity.log(`Completed in ${executionTime.toFixed(1)}s`);
    } else {
      this.activity.setState('error', 'Some tools failed to execute');
    }

    return { success, toolResults, errors, executionTime };
  }

  /**
   * analyze, select, plan and execute, reporting how far the request got.
   * Throws a retryable error when every planned tool failed.
   */
  async run(query: string, signal?: AbortSignal): Promise<OrchestrationOutcome> {
    const analysis = this.analyze(query);

    if (analysis.matchingTools.length === 0) {
      this.activity.setState('idle');
      return { status: 'no_match', response: NO_MATCH_RESPONSE, analysis };
    }

    const selection = this.select(analysis);
    if (selection.length === 0) {
      this.activity.setState('idle');
      return { status: 'no_match', response: NO_SELECTION_RESPONSE, analysis };
    }

    const plan = this.plan(selection, query);
    const execution = await this.execute(plan, query, signal);

    const outputs = Array.from(execution.toolResults.values())
      .map(output => output.trim())
      .filter(output => output.length > 0);

    if (!execution.success && outputs.length === 0) {
      throw new AssistantError({
        code: AssistantErrorCode.TOOL_EXECUTION_ERROR,
        message: `All ${plan.tools.length} planned tools failed: ${execution.errors.join('; ')}`,
        retryable: true
      });
    }

    return {
      status: execution.success ? 'completed' : 'partial',
      response: outputs.length > 0 ? outputs.join('\n\n') : EMPTY_SUCCESS_RESPONSE,
      analysis,
      plan,
      execution
    };
  }

  async process(query: string, signal?: AbortSignal): Promise<string> {
    const outcome = await this.run(query, signal);
    return outcome.response;
  }
}
