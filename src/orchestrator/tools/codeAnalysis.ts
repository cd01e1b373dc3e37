import * as vm from 'vm';

export const MAX_LINE_LENGTH = 100;
export const COMPLEXITY_LIMIT = 10;
export const LONG_FILE_LINES = 200;

const INDENT_UNITS: Record<string, number> = { python: 4, javascript: 2, typescript: 2 };
const COMMENT_MARKERS: Record<string, string> = { python: '#', javascript: '//', typescript: '//' };
const BRANCH_PATTERN = /\b(?:if|elif|for|while|case|catch|except)\b|&&|\|\|/g;
const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

export interface CodeAnalysis {
  language: string;
  lineCount: number;
  syntaxErrors: string[];
  styleIssues: string[];
  complexity: number;
  suggestions: string[];
}

/**
 * First bracket that does not pair up, ignoring brackets inside one-line
 * string literals and after the line comment marker.
 */
export function findUnbalancedBracket(code: string, commentMarker: string): string | null {
  const stack: { char: string; line: number }[] = [];
  const lines = code.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    let quote: string | null = null;

    for (let j = 0; j < line.length; j++) {
      const char = line[j];
      if (quote) {
        if (char === '\\') j++;
        else if (char === quote) quote = null;
        continue;
      }
      if (line.startsWith(commentMarker, j)) break;

      if (char === '"' || char === "'" || char === '`') {
        quote = char;
      } else if (char === '(' || char === '[' || char === '{') {
        stack.push({ char, line: i + 1 });
      } else if (char in CLOSERS) {
        const open = stack.pop();
        if (!open || open.char !== CLOSERS[char]) {
          return `Line ${i + 1}: unexpected '${char}'`;
        }
      }
    }
  }

  const unclosed = stack.pop();
  return unclosed ? `Line ${unclosed.line}: '${unclosed.char}' is never closed` : null;
}

function isModuleSource(code: string): boolean {
  return /^\s*(?:import|export)\b/m.test(code);
}

function syntaxErrors(code: string, language: string): string[] {
  if (language === 'javascript' && !isModuleSource(code)) {
    try {
      new vm.Script(code);
      return [];
    } catch (error) {
      if (error instanceof Error && error.name === 'SyntaxError') {
        return [error.message];
      }
      throw error;
    }
  }

  const unbalanced = findUnbalancedBracket(code, COMMENT_MARKERS[language] ?? '//');
  return unbalanced ? [unbalanced] : [];
}

function styleIssues(lines: string[], language: string): string[] {
  const unit = INDENT_UNITS[language] ?? 2;
  const issues: string[] = [];

  lines.forEach((line, index) => {
    if (!line.trim()) return;
    const number = index + 1;
    const indent = /^[ \t]*/.exec(line)?.[0] ?? '';

    if (indent.includes(' ') && indent.includes('\t')) {
      issues.push(`Line ${number}: mixes tabs and spaces`);
    } else if (!indent.includes('\t') && indent.length % unit !== 0) {
      issues.push(`Line ${number}: indentation of ${indent.length} spaces is not a multiple of ${unit}`);
    }
    if (line.length > MAX_LINE_LENGTH) {
      issues.push(`Line ${number}: ${line.length} characters long (limit ${MAX_LINE_LENGTH})`);
    }
    if (/\s$/.test(line)) {
      issues.push(`Line ${number}: trailing whitespace`);
    }
  });

  return issues;
}

export function analyzeCode(code: string, language: string): CodeAnalysis {
  const lines = code.replace(/\n$/, '').split('\n');
  const complexity = code.match(BRANCH_PATTERN)?.length ?? 0;

  const analysis: CodeAnalysis = {
    language,
    lineCount: lines.length,
    syntaxErrors: syntaxErrors(code, language),
    styleIssues: styleIssues(lines, language),
    complexity,
    suggestions: []
  };

  if (complexity > COMPLEXITY_LIMIT) {
    analysis.suggestions.push(`Complexity ${complexity} is high; split the code into smaller functions`);
  }
  if (lines.length > LONG_FILE_LINES) {
    analysis.suggestions.push('Long file; consider splitting it into modules');
  }
  if (analysis.syntaxErrors.length === 0 && analysis.styleIssues.length === 0 && analysis.suggestions.length === 0) {
    analysis.suggestions.push('No issues found');
  }

  return analysis;
}

function section(title: string, items: string[], empty: string): string[] {
  return items.length === 0 ? [empty] : [`${title}:`, ...items.map(item => `  - ${item}`)];
}

export function formatAnalysis(analysis: CodeAnalysis, source: string): string {
  return [
    `Code analysis of ${source} (${analysis.language}, ${analysis.lineCount} line${analysis.lineCount === 1 ? '' : 's'})`,
    ...section('Syntax errors', analysis.syntaxErrors, 'Syntax: valid'),
    ...section('Style issues', analysis.styleIssues, 'Style: no issues'),
    `Complexity: ${analysis.complexity}`,
    ...section('Suggestions', analysis.suggestions, 'Suggestions: none')
  ].join('\n');
}
