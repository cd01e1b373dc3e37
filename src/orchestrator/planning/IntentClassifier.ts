import { IntentScores, ToolCategory, isToolCategory } from '../types.js';
import { readDataFile, isRecord, isStringArray } from '../../utils/dataFiles.js';

const MATCH_WEIGHT = 0.3;
const LITERAL_BONUS = 0.2;

export interface IntentCategory {
  name: string;
  keyword: string;
  patterns: string[];
}

export interface IntentTable {
  substitutions: Record<string, string>;
  categories: IntentCategory[];
  /** Tool categories fed by intents other than their own name. */
  categoryIntents: Partial<Record<ToolCategory, string[]>>;
}

/**
 * Anything that can turn a query into per-intent confidence scores.
 */
export interface Classifier {
  normalize(query: string): string;
  classify(query: string): IntentScores;
  intentsFor(category: ToolCategory): readonly string[];
}

interface CompiledCategory {
  name: string;
  keyword: string;
  patterns: RegExp[];
}

export class LexicalIntentClassifier implements Classifier {
  private substitutions: [string, string][];
  private categories: CompiledCategory[];
  private categoryIntents: Partial<Record<ToolCategory, string[]>>;

  constructor(table: IntentTable = loadIntentTable()) {
    this.substitutions = Object.entries(table.substitutions);
    this.categories = table.categories.map(category => ({
      name: category.name,
      keyword: category.keyword.toLowerCase(),
      patterns: category.patterns.map(pattern => new RegExp(pattern, 'g'))
    }));
    this.categoryIntents = table.categoryIntents;
  }

  normalize(query: string): string {
    let text = query.toLowerCase();
    for (const [source, canonical] of this.substitutions) {
      text = text.split(source).join(canonical);
    }
    return text;
  }

  classify(query: string): IntentScores {
    const text = this.normalize(query);
    const scored: [string, number][] = [];

    for (const category of this.categories) {
      let score = 0;

      for (const pattern of category.patterns) {
        const occurrences = text.match(pattern)?.length ?? 0;
        score = Math.max(score, Math.min(occurrences * MATCH_WEIGHT, 1.0));
      }

      if (score === 0) continue;

      if (text.includes(category.name) || text.includes(category.keyword)) {
        score = Math.min(score + LITERAL_BONUS, 1.0);
      }

      scored.push([category.name, score]);
    }

    scored.sort((a, b) => b[1] - a[1]);
    return Object.fromEntries(scored);
  }

  intentsFor(category: ToolCategory): readonly string[] {
    return this.categoryIntents[category] ?? [category];
  }
}

export function loadIntentTable(fileName: string = 'intents.json'): IntentTable {
  const data = readDataFile(fileName);

  if (!isRecord(data) || !isRecord(data.substitutions) || !Array.isArray(data.categories)) {
    throw new Error(`Malformed intent table: ${fileName}`);
  }

  const substitutions: Record<string, string> = {};
  for (const [source, canonical] of Object.entries(data.substitutions)) {
    if (typeof canonical === 'string') {
      substitutions[source] = canonical;
    }
  }

  const categories: IntentCategory[] = [];
  for (const entry of data.categories) {
    if (!isRecord(entry) || typeof entry.name !== 'string' || !isStringArray(entry.patterns)) {
      throw new Error(`Malformed intent category in ${fileName}`);
    }
    categories.push({
      name: entry.name,
      keyword: typeof entry.keyword === 'string' ? entry.keyword : entry.name,
      patterns: entry.patterns
    });
  }

  const categoryIntents: Partial<Record<ToolCategory, string[]>> = {};
  if (isRecord(data.categoryIntents)) {
    for (const [category, intents] of Object.entries(data.categoryIntents)) {
      if (isToolCategory(category) && isStringArray(intents)) {
        categoryIntents[category] = intents;
      }
    }
  }

  return { substitutions, categories, categoryIntents };
}

/** Sorted (name, score) pairs, highest first. */
export function rankIntents(intents: IntentScores): [string, number][] {
  return Object.entries(intents).sort((a, b) => b[1] - a[1]);
}
