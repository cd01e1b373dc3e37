import type { ReasoningDispatcher } from './dispatcher.js';
import type { PerformanceMetrics } from './metrics.js';
import { isRuntimeConfigKey, parseConfigValue } from '../config/validator.js';

export interface CommandResult {
  output: string;
  exit?: boolean;
}

export interface CommandHooks {
  /** Called with each runtime setting that was applied, so it can be persisted. */
  persist?: (key: string, value: unknown) => void;
}

export const COMMAND_HELP = [
  '/metrics              show performance counters',
  '/reset                reset performance counters',
  '/config               show runtime settings',
  '/config <key> <value> change a runtime setting',
  '/tools [term]         list tools, optionally filtered by keyword',
  '/exit                 quit'
].join('\n');

export function formatMetrics(metrics: Readonly<PerformanceMetrics>): string {
  return [
    `Total queries:      ${metrics.totalQueries}`,
    `Successful:         ${metrics.successfulQueries}`,
    `Via orchestrator:   ${metrics.orchestratorQueries}`,
    `Via fallback:       ${metrics.fallbackQueries}`,
    `Errors:             ${metrics.errorCount}`,
    `Success rate:       ${metrics.successRate.toFixed(1)}%`,
    `Avg response time:  ${metrics.averageResponseTime.toFixed(2)}s`,
    `Last error:         ${metrics.lastError ?? 'none'}`
  ].join('\n');
}

function configCommand(dispatcher: ReasoningDispatcher, args: string[], hooks: CommandHooks): string {
  if (args.length === 0) {
    return Object.entries(dispatcher.getConfig())
      .map(([key, value]) => `${key} = ${JSON.stringify(value)}`)
      .join('\n');
  }

  const [key, ...rest] = args;
  if (rest.length === 0) {
    return 'Usage: /config <key> <value>';
  }
  if (!isRuntimeConfigKey(key)) {
    return `Unknown setting: ${key}`;
  }

  const value = parseConfigValue(rest.join(' '));
  const applied = dispatcher.updateConfig({ [key]: value });
  if (applied.length === 0) {
    return `Rejected ${key} = ${JSON.stringify(value)}`;
  }

  hooks.persist?.(key, value);
  return `${key} = ${JSON.stringify(value)}`;
}

function toolsCommand(dispatcher: ReasoningDispatcher, term: string): string {
  const registry = dispatcher.getRegistry();
  const tools = term ? registry.findByKeywordSubstring(term) : registry.all();

  if (tools.length === 0) {
    return term ? `No tools match "${term}"` : 'No tools registered';
  }

  return tools.map(tool => `${tool.name} [${tool.category}] ${tool.description}`).join('\n');
}

/**
 * Runs a slash command. Returns null when `input` is not one.
 */
export function runCommand(
  input: string,
  dispatcher: ReasoningDispatcher,
  hooks: CommandHooks = {}
): CommandResult | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const [command, ...args] = trimmed.slice(1).split(/\s+/);

  switch (command.toLowerCase()) {
    case 'metrics':
      return { output: formatMetrics(dispatcher.getMetrics()) };
    case 'reset':
      dispatcher.resetMetrics();
      return { output: 'Metrics reset' };
    case 'config':
      return { output: configCommand(dispatcher, args, hooks) };
    case 'tools':
      return { output: toolsCommand(dispatcher, args.join(' ')) };
    case 'exit':
    case 'quit':
      return { output: 'Goodbye!', exit: true };
    case 'help':
      return { output: COMMAND_HELP };
    default:
      return { output: `Unknown command: /${command}\n${COMMAND_HELP}` };
  }
}
