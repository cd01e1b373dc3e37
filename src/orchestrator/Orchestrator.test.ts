import { describe, it, expect, vi } from 'vitest';
import { Orchestrator, NO_MATCH_RESPONSE, EMPTY_SUCCESS_RESPONSE, MAX_MATCHING_TOOLS } from './Orchestrator.js';
import { IntentTable, LexicalIntentClassifier } from './planning/IntentClassifier.js';
import { ToolRegistry } from './tools/registry.js';
import { ActivitySink, Tool, ToolMetadataInit } from './types.js';
import { AssistantError, AssistantErrorCode } from '../services/errors.js';
import { Logger } from '../utils/logger.js';

const table: IntentTable = {
  substitutions: {},
  categories: [
    { name: 'system-info', keyword: 'system', patterns: ['system|cpu|memory|ram'] },
    { name: 'code-development', keyword: 'code', patterns: ['code|script|vscode'] },
    { name: 'entertainment', keyword: 'joke', patterns: ['joke'] }
  ],
  categoryIntents: {}
};

function quietLogger(): Logger {
  const logger = new Logger('debug');
  logger.setSilent(true);
  return logger;
}

function setup(activity?: ActivitySink) {
  const registry = new ToolRegistry();
  const orchestrator = new Orchestrator({
    registry,
    classifier: new LexicalIntentClassifier(table),
    activity,
    logger: quietLogger()
  });

  const add = (name: string, init: Partial<ToolMetadataInit>, invoke: Tool['invoke'] = async () => `${name} output`) => {
    registry.register(
      name,
      { category: 'system-info', description: name, keywords: [], priority: 10, minConfidence: 0.1, ...init },
      { name, invoke }
    );
  };

  return { registry, orchestrator, add };
}

describe('Orchestrator.analyze', () => {
  it('scores a fully matching system tool at 1.0', () => {
    const { orchestrator, add } = setup();
    add('get_system_info', { keywords: ['system'], priority: 10, minConfidence: 0.7 });

    const analysis = orchestrator.analyze('system info, cpu, memory, ram');

    expect(analysis.matchingTools).toHaveLength(1);
    expect(analysis.matchingTools[0].name).toBe('get_system_info');
    expect(analysis.matchingTools[0].score).toBeCloseTo(1.0, 10);
    expect(analysis.primaryIntent).toBe('system-info');
    expect(analysis.confidence).toBe(1);
  });

  it('weights keyword hits and intent, scaled by priority', () => {
    const { orchestrator, add } = setup();
    add('half', { keywords: ['cpu', 'gpu'], priority: 5 });

    // intent: one match (0.3); keywords: 1 of 2
    const analysis = orchestrator.analyze('cpu');
    expect(analysis.matchingTools[0].score).toBeCloseTo((0.3 * 0.5 + 0.7 * 0.3) * 0.5);
  });

  it('drops tools below their confidence threshold', () => {
    const { orchestrator, add } = setup();
    add('picky', { keywords: ['cpu'], minConfidence: 0.95 });
    add('relaxed', { keywords: ['cpu'], minConfidence: 0.2 });

    const names = orchestrator.analyze('cpu usage').matchingTools.map(tool => tool.name);
    expect(names).toEqual(['relaxed']);
  });

  it('never shortlists a zero score, even with a zero threshold', () => {
    const { orchestrator, add } = setup();
    add('zero', { category: 'entertainment', keywords: ['joke'], minConfidence: 0 });

    expect(orchestrator.analyze('cpu').matchingTools).toEqual([]);
  });

  it('sorts by score and keeps the top five, ties in registration order', () => {
    const { orchestrator, add } = setup();
    add('p3', { priority: 3, minConfidence: 0 });
    add('p9', { priority: 9, minConfidence: 0 });
    add('p6a', { priority: 6, minConfidence: 0 });
    add('p6b', { priority: 6, minConfidence: 0 });
    add('p8', { priority: 8, minConfidence: 0 });
    add('p2', { priority: 2, minConfidence: 0 });
    add('p10', { priority: 10, minConfidence: 0 });

    const analysis = orchestrator.analyze('cpu');
    expect(analysis.matchingTools).toHaveLength(MAX_MATCHING_TOOLS);
    expect(analysis.matchingTools.map(tool => tool.name)).toEqual(['p10', 'p9', 'p8', 'p6a', 'p6b']);
  });

  it('defaults to the general intent when nothing matches', () => {
    const { orchestrator } = setup();
    const analysis = orchestrator.analyze('hello there');
    expect(analysis.primaryIntent).toBe('general');
    expect(analysis.confidence).toBe(0.5);
    expect(analysis.matchingTools).toEqual([]);
  });
});

describe('Orchestrator.execute', () => {
  it('records a failing tool and keeps going', async () => {
    const { orchestrator, add } = setup();
    add('first', {});
    add('broken', { category: 'code-development' }, async () => {
      throw new Error('boom');
    });
    add('last', { category: 'entertainment' });

    const plan = orchestrator.plan(
      ['first', 'broken', 'last'].map(name => {
        const metadata = orchestrator.getRegistry().get(name);
        if (!metadata) throw new Error(name);
        return { name, metadata };
      }),
      'q'
    );
    const result = await orchestrator.execute(plan, 'q');

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['Error executing broken: boom']);
    expect(Array.from(result.toolResults.keys())).toEqual(['first', 'last']);
    expect(result.executionTime).toBeGreaterThanOrEqual(0);
  });
});

describe('Orchestrator.run', () => {
  it('runs the sandbox before write_code', async () => {
    const { orchestrator, add } = setup();
    const calls: string[] = [];
    const recording = (name: string): Tool['invoke'] => async () => {
      calls.push(name);
      return `${name} done`;
    };

    add('open_vscode_sandbox', { category: 'code-development', keywords: ['vscode'], priority: 9, minConfidence: 0.9 }, recording('open_vscode_sandbox'));
    add(
      'write_code',
      { category: 'code-development', keywords: ['write', 'code'], priority: 8, minConfidence: 0.3, prerequisites: ['open_vscode_sandbox'] },
      recording('write_code')
    );

    const outcome = await orchestrator.run('write code for a script');

    expect(outcome.analysis.matchingTools.map(tool => tool.name)).toEqual(['write_code']);
    expect(outcome.plan?.executionOrder).toEqual(['open_vscode_sandbox', 'write_code']);
    expect(calls).toEqual(['open_vscode_sandbox', 'write_code']);
    expect(outcome.status).toBe('completed');
    expect(outcome.response).toBe('open_vscode_sandbox done\n\nwrite_code done');
  });

  it('reports no_match without executing anything', async () => {
    const { orchestrator, add } = setup();
    const invoke = vi.fn(async () => 'never');
    add('cpu_tool', { keywords: ['cpu'] }, invoke);

    const outcome = await orchestrator.run('tell me something nice');

    expect(outcome.status).toBe('no_match');
    expect(outcome.response).toBe(NO_MATCH_RESPONSE);
    expect(invoke).not.toHaveBeenCalled();
    expect(await orchestrator.process('tell me something nice')).toBe(NO_MATCH_RESPONSE);
  });

  it('returns the surviving output when some tools fail', async () => {
    const { orchestrator, add } = setup();
    add('good', {}, async () => '  CPU at 12%  ');
    add('bad', { category: 'code-development', keywords: ['cpu'] }, async () => {
      throw new Error('nope');
    });

    const outcome = await orchestrator.run('cpu script');

    expect(outcome.status).toBe('partial');
    expect(outcome.response).toBe('CPU at 12%');
    expect(outcome.execution?.errors).toEqual(['Error executing bad: nope']);
  });

  it('answers with a stock message when tools succeed silently', async () => {
    const { orchestrator, add } = setup();
    add('quiet', {}, async () => '   ');

    const outcome = await orchestrator.run('cpu');
    expect(outcome.status).toBe('completed');
    expect(outcome.response).toBe(EMPTY_SUCCESS_RESPONSE);
  });

  it('throws a retryable error when every tool fails', async () => {
    const { orchestrator, add } = setup();
    add('bad', {}, async () => {
      throw new Error('offline');
    });

    const attempt = orchestrator.run('cpu');
    await expect(attempt).rejects.toBeInstanceOf(AssistantError);
    await expect(attempt).rejects.toMatchObject({
      code: AssistantErrorCode.TOOL_EXECUTION_ERROR,
      retryable: true
    });
  });

  it('stops before the next tool once cancelled', async () => {
    const { orchestrator, add } = setup();
    const controller = new AbortController();
    const second = vi.fn(async () => 'late');
    add('first', { keywords: ['cpu'] }, async () => {
      controller.abort();
      return 'first';
    });
    add('second', { category: 'utilities', keywords: ['cpu'] }, second);

    await expect(orchestrator.run('cpu', controller.signal)).rejects.toMatchObject({
      code: AssistantErrorCode.CANCELLED
    });
    expect(second).not.toHaveBeenCalled();
  });

  it('reports progress and survives a sink that throws', async () => {
    const states: string[] = [];
    const sink: ActivitySink = {
      log: () => {
        throw new Error('display gone');
      },
      setState: state => {
        states.push(state);
      }
    };
    const { orchestrator, add } = setup(sink);
    add('tool', {});

    const outcome = await orchestrator.run('cpu');

    expect(outcome.status).toBe('completed');
    expect(states[0]).toBe('thinking');
    expect(states[states.length - 1]).toBe('idle');
  });
});
