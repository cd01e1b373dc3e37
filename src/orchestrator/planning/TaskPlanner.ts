import { ExecutionPlan, PlannedTool, QueryAnalysis, ToolMetadata, UTILITY_CATEGORY } from '../types.js';
import { ToolRegistry } from '../tools/registry.js';

export const MAX_SELECTED_TOOLS = 3;

export function toolsConflict(a: ToolMetadata, b: ToolMetadata): boolean {
  return a.conflicts.includes(b.name) || b.conflicts.includes(a.name);
}

export class TaskPlanner {
  private registry: ToolRegistry;

  constructor(registry: ToolRegistry) {
    this.registry = registry;
  }

  /**
   * Picks up to three tools from the shortlist in score order: no two that
   * conflict, and at most one per category except utilities.
   */
  selectTools(analysis: QueryAnalysis): PlannedTool[] {
    const selected: PlannedTool[] = [];
    const usedCategories = new Set<string>();

    for (const { name, metadata } of analysis.matchingTools) {
      if (selected.some(existing => toolsConflict(existing.metadata, metadata))) {
        continue;
      }

      if (metadata.category !== UTILITY_CATEGORY) {
        if (usedCategories.has(metadata.category)) {
          continue;
        }
        usedCategories.add(metadata.category);
      }

      selected.push({ name, metadata });

      if (selected.length >= MAX_SELECTED_TOOLS) {
        break;
      }
    }

    return selected;
  }

  /**
   * Injects missing prerequisites transitively, then orders injected and
   * selected tools together so every prerequisite runs before its dependent.
   */
  createPlan(selection: PlannedTool[], _query: string): ExecutionPlan {
    const planned = new Map(selection.map(tool => [tool.name, tool]));
    const injected: PlannedTool[] = [];
    const unmet = new Set<string>();

    const inject = (name: string): void => {
      if (planned.has(name) || unmet.has(name)) return;

      const metadata = this.registry.get(name);
      if (!metadata) {
        unmet.add(name);
        return;
      }

      const tool = { name, metadata };
      planned.set(name, tool);
      injected.push(tool);
      for (const prereq of metadata.prerequisites) {
        inject(prereq);
      }
    };

    for (const tool of selection) {
      for (const prereq of tool.metadata.prerequisites) {
        inject(prereq);
      }
    }

    const tools = orderByPrerequisites(selection, planned);

    let hasConflicts = false;
    for (let i = 0; i < tools.length && !hasConflicts; i++) {
      for (let j = i + 1; j < tools.length; j++) {
        if (toolsConflict(tools[i].metadata, tools[j].metadata)) {
          hasConflicts = true;
          break;
        }
      }
    }

    return {
      tools,
      executionOrder: tools.map(tool => tool.name),
      estimatedCost: tools.reduce((total, tool) => total + tool.metadata.estimatedCost, 0),
      requiresPrerequisites: injected.length > 0,
      unmetPrerequisites: Array.from(unmet),
      hasConflicts
    };
  }
}

/**
 * Depth-first ordering from the selection, in selection order, over every
 * planned tool. Cycles keep the order in which they are reached.
 */
function orderByPrerequisites(selection: PlannedTool[], planned: Map<string, PlannedTool>): PlannedTool[] {
  const ordered: PlannedTool[] = [];
  const placed = new Set<string>();
  const visiting = new Set<string>();

  const visit = (tool: PlannedTool): void => {
    if (placed.has(tool.name) || visiting.has(tool.name)) return;
    visiting.add(tool.name);
    for (const prereq of tool.metadata.prerequisites) {
      const dependency = planned.get(prereq);
      if (dependency) visit(dependency);
    }
    visiting.delete(tool.name);
    placed.add(tool.name);
    ordered.push(tool);
  };

  for (const tool of selection) {
    visit(tool);
  }

  return ordered;
}
