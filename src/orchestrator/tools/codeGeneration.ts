import { readDataText } from '../../utils/dataFiles.js';

export type GeneratedLanguage = 'python' | 'javascript' | 'typescript';

export function isGeneratedLanguage(language: string): language is GeneratedLanguage {
  return language === 'python' || language === 'javascript' || language === 'typescript';
}

export const GENERATED_EXTENSIONS: Record<GeneratedLanguage, string> = {
  python: 'py',
  javascript: 'js',
  typescript: 'ts'
};

export type WebFramework = 'flask' | 'fastapi' | 'express';

const WEB_FRAMEWORKS: readonly WebFramework[] = ['flask', 'fastapi', 'express'];

const NAME_PATTERN = /\b(?:named|called)\s+["']?([A-Za-z_][\w-]*)/i;
const DESCRIPTION_PATTERN = /\b(?:that|which)\s+(.+?)[.?!]*$/i;
const FILLER_WORDS = new Set([
  'a', 'an', 'the', 'new', 'simple', 'small', 'basic', 'my', 'some',
  'generate', 'create', 'make', 'write', 'build',
  'python', 'javascript', 'typescript', 'js', 'ts', 'web',
  ...WEB_FRAMEWORKS
]);

export function renderTemplate(template: string, values: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(values)) {
    result = result.split(`{{${key}}}`).join(value);
  }
  return result;
}

/** Letters, digits and underscores only, never starting with a digit. */
export function toIdentifier(raw: string): string {
  const cleaned = raw.trim().replace(/\W+/g, '_').replace(/^_+|_+$/g, '');
  return /^\d/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/**
 * Name given with "named"/"called", or the word right before `noun`
 * ("a calculator function", "the User class").
 */
export function extractSubjectName(query: string, noun: string): string | null {
  const named = NAME_PATTERN.exec(query)?.[1];
  if (named) return toIdentifier(named);

  const before = new RegExp(`\\b([A-Za-z_][\\w-]*)\\s+${noun}\\b`, 'i').exec(query)?.[1];
  if (before && !FILLER_WORDS.has(before.toLowerCase())) {
    return toIdentifier(before);
  }
  return null;
}

/** Comma or "and" separated identifiers after one of `nouns`, e.g. "with methods save, load and delete". */
export function extractList(query: string, nouns: string): string[] {
  const pattern = new RegExp(
    `\\b(?:${nouns})\\s+([\\w\\s,]+?)(?=\\s+(?:that|which|to|in|for|using|called|named)\\b|[.?!]|$)`,
    'i'
  );
  const match = pattern.exec(query);
  if (!match) return [];

  return match[1]
    .split(/\s*,\s*|\s+and\s+/)
    .map(toIdentifier)
    .filter(item => item.length > 0);
}

export function extractDescription(query: string): string | null {
  const description = DESCRIPTION_PATTERN.exec(query.trim())?.[1];
  if (!description) return null;
  return description.charAt(0).toUpperCase() + description.slice(1) + '.';
}

export function detectFramework(query: string): WebFramework {
  const lower = query.toLowerCase();
  return WEB_FRAMEWORKS.find(framework => lower.includes(framework)) ?? 'flask';
}

function safeComment(text: string): string {
  return text.replace(/\*\//g, '* /').replace(/"""/g, "'''");
}

export interface FunctionOutline {
  name: string;
  language: GeneratedLanguage;
  description: string;
  parameters: string[];
}

export function generateFunction({ name, language, description, parameters }: FunctionOutline): string {
  const doc = safeComment(description);

  switch (language) {
    case 'python':
      return [
        `def ${name}(${parameters.join(', ')}):`,
        `    """${doc}"""`,
        `    raise NotImplementedError("${name}")`,
        ''
      ].join('\n');
    case 'javascript':
      return [
        '/**',
        ` * ${doc}`,
        ...parameters.map(parameter => ` * @param {*} ${parameter}`),
        ' */',
        `function ${name}(${parameters.join(', ')}) {`,
        `  throw new Error('${name} is not implemented');`,
        '}',
        '',
        `module.exports = { ${name} };`,
        ''
      ].join('\n');
    case 'typescript':
      return [
        '/**',
        ` * ${doc}`,
        ' */',
        `export function ${name}(${parameters.map(parameter => `${parameter}: unknown`).join(', ')}): unknown {`,
        `  throw new Error('${name} is not implemented');`,
        '}',
        ''
      ].join('\n');
  }
}

export interface ClassOutline {
  name: string;
  language: GeneratedLanguage;
  description: string;
  methods: string[];
}

export function generateClass({ name, language, description, methods }: ClassOutline): string {
  const doc = safeComment(description);

  switch (language) {
    case 'python':
      return [
        `class ${name}:`,
        `    """${doc}"""`,
        '',
        '    def __init__(self):',
        '        pass',
        ...methods.flatMap(method => ['', `    def ${method}(self):`, `        raise NotImplementedError("${method}")`]),
        ''
      ].join('\n');
    case 'javascript':
    case 'typescript': {
      const returnType = language === 'typescript' ? ': void' : '';
      return [
        '/**',
        ` * ${doc}`,
        ' */',
        `${language === 'typescript' ? 'export ' : ''}class ${name} {`,
        '  constructor() {}',
        ...methods.flatMap(method => [
          '',
          `  ${method}()${returnType} {`,
          `    throw new Error('${method} is not implemented');`,
          '  }'
        ]),
        '}',
        ...(language === 'javascript' ? ['', `module.exports = { ${name} };`] : []),
        ''
      ].join('\n');
    }
  }
}

export interface WebAppOutline {
  appName: string;
  framework: WebFramework;
  endpoints: string[];
}

export interface GeneratedFile {
  fileName: string;
  content: string;
}

export function generateWebApp({ appName, framework, endpoints }: WebAppOutline): GeneratedFile {
  const app = readDataText(`templates/${framework}_app.tpl`);
  const route = readDataText(`templates/${framework}_route.tpl`);
  const separator = framework === 'express' ? '\n\n' : '\n\n\n';

  const routes = endpoints.map(endpoint => renderTemplate(route, { endpoint }).trimEnd()).join(separator);
  const extension = framework === 'express' ? 'js' : 'py';

  return {
    fileName: `${appName.toLowerCase()}_app.${extension}`,
    content: renderTemplate(app, { app_name: appName, routes })
  };
}
