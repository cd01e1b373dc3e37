import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import { Tool, ToolContext } from '../types.js';
import { analyzeCode, formatAnalysis } from './codeAnalysis.js';
import {
  GENERATED_EXTENSIONS,
  GeneratedLanguage,
  detectFramework,
  extractDescription,
  extractList,
  extractSubjectName,
  generateClass,
  generateFunction,
  generateWebApp,
  isGeneratedLanguage
} from './codeGeneration.js';

export const DEFAULT_SANDBOX_DIR = path.join(homedir(), 'HarkSandbox');
const SANDBOX_SUBDIRS = ['projects', 'temp', 'scripts'];

interface LanguageProfile {
  extension: string;
  template: (title: string) => string;
}

const LANGUAGES: Record<string, LanguageProfile> = {
  python: {
    extension: 'py',
    template: title => `# ${title}\n\n\ndef main():\n    pass\n\n\nif __name__ == "__main__":\n    main()\n`
  },
  javascript: {
    extension: 'js',
    template: title => `// ${title}\n\nfunction main() {\n}\n\nmain();\n`
  },
  typescript: {
    extension: 'ts',
    template: title => `// ${title}\n\nfunction main(): void {\n}\n\nmain();\n`
  },
  html: {
    extension: 'html',
    template: title => `<!DOCTYPE html>\n<html>\n<head>\n  <title>${title}</title>\n</head>\n<body>\n</body>\n</html>\n`
  }
};

const EXTENSION_LANGUAGES: Record<string, string> = {
  py: 'python',
  js: 'javascript',
  ts: 'typescript',
  html: 'html'
};

export function detectLanguage(query: string): string {
  const lower = query.toLowerCase();
  for (const language of Object.keys(LANGUAGES)) {
    if (lower.includes(language)) return language;
  }
  return 'python';
}

export function extractFileName(query: string): string | null {
  const match = /\b([\w-]+\.(?:py|js|ts|html))\b/i.exec(query);
  return match ? match[1] : null;
}

const FENCED_CODE_PATTERN = /```(\w+)?\n([\s\S]*?)```/;
const CODE_FILE_PATTERN = /(?:^|\s)["']?([\w./-]+\.(py|js|ts))\b/i;
const INLINE_CODE_PATTERN = /:\s*([\s\S]+)$/;

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

async function writeNewFile(target: string, content: string, label: string): Promise<void> {
  await fs.writeFile(target, content, { flag: 'wx' }).catch((error: unknown) => {
    if (errorCode(error) === 'EEXIST') {
      throw new Error(`${label} already exists in the sandbox`);
    }
    throw error;
  });
}

function generatedLanguage(query: string): GeneratedLanguage {
  const language = detectLanguage(query);
  if (!isGeneratedLanguage(language)) {
    throw new Error(`Cannot generate ${language} code; use python, javascript or typescript`);
  }
  return language;
}

interface CodeSource {
  code: string;
  language: string;
  source: string;
}

/**
 * Code to analyze: a fenced block, a file in the working directory or the
 * sandbox, or whatever follows the first colon.
 */
async function readCodeForAnalysis(query: string, context: ToolContext, sandboxDir: string): Promise<CodeSource> {
  const fenced = FENCED_CODE_PATTERN.exec(query);
  if (fenced) {
    const tag = fenced[1]?.toLowerCase();
    const language = tag && (tag in LANGUAGES) ? tag : EXTENSION_LANGUAGES[tag ?? ''] ?? detectLanguage(query);
    return { code: fenced[2], language, source: 'inline code' };
  }

  const file = CODE_FILE_PATTERN.exec(query);
  if (file) {
    const [, name, extension] = file;
    const candidates = [context.pathValidator.validate(name)];
    if (path.basename(name) === name) {
      candidates.push(path.join(sandboxDir, 'projects', name), path.join(sandboxDir, 'scripts', name));
    }

    for (const candidate of candidates) {
      try {
        const code = await fs.readFile(candidate, 'utf-8');
        return { code, language: EXTENSION_LANGUAGES[extension.toLowerCase()], source: name };
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') throw error;
      }
    }
    throw new Error(`Could not find ${name} in the working directory or the sandbox`);
  }

  const inline = INLINE_CODE_PATTERN.exec(query);
  if (inline && inline[1].trim()) {
    return { code: inline[1], language: detectLanguage(query.slice(0, inline.index)), source: 'inline code' };
  }

  throw new Error('No code to analyze: name a file or put the code after a colon');
}

async function ensureSandbox(sandboxDir: string): Promise<void> {
  for (const dir of SANDBOX_SUBDIRS) {
    await fs.mkdir(path.join(sandboxDir, dir), { recursive: true });
  }
}

function openEditor(target: string): Promise<boolean> {
  return new Promise(resolve => {
    const child = spawn('code', [target], {
      detached: true,
      stdio: 'ignore',
      shell: process.platform === 'win32'
    });
    child.once('error', () => resolve(false));
    child.once('spawn', () => {
      child.unref();
      resolve(true);
    });
  });
}

/**
 * Tools that scaffold, generate and review code inside a sandbox directory
 * and open the results in VS Code.
 */
export function createCodeTools(sandboxDir: string = DEFAULT_SANDBOX_DIR, launchEditor = openEditor): Tool[] {
  const openSandbox: Tool = {
    name: 'open_vscode_sandbox',
    invoke: async () => {
      await ensureSandbox(sandboxDir);
      const opened = await launchEditor(sandboxDir);
      return opened
        ? `Opened VS Code sandbox at ${sandboxDir}`
        : `Sandbox ready at ${sandboxDir} (VS Code could not be launched; is "code" on your PATH?)`;
    }
  };

  const createCodeFile: Tool = {
    name: 'create_code_file',
    invoke: async query => {
      await ensureSandbox(sandboxDir);

      const explicit = extractFileName(query);
      const language = explicit
        ? EXTENSION_LANGUAGES[explicit.split('.').pop()?.toLowerCase() ?? ''] ?? 'python'
        : detectLanguage(query);
      const profile = LANGUAGES[language];
      const fileName = explicit ?? `main.${profile.extension}`;
      const target = path.join(sandboxDir, 'projects', fileName);

      await fs.writeFile(target, profile.template(fileName), { flag: 'wx' }).catch((error: unknown) => {
        if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
          return;
        }
        throw error;
      });

      return `Created ${language} file ${path.join('projects', fileName)} in the sandbox`;
    }
  };

  const writeCode: Tool = {
    name: 'write_code',
    invoke: async query => {
      await ensureSandbox(sandboxDir);

      const language = detectLanguage(query);
      const profile = LANGUAGES[language];
      const fileName = `snippet-${Date.now()}.${profile.extension}`;
      const target = path.join(sandboxDir, 'scripts', fileName);

      await fs.writeFile(target, profile.template(query.trim()));
      await launchEditor(target);

      return `Wrote a ${language} starter to ${path.join('scripts', fileName)}`;
    }
  };

  const writeScript = async (fileName: string, content: string): Promise<string> => {
    await ensureSandbox(sandboxDir);
    const relative = path.join('scripts', fileName);
    const target = path.join(sandboxDir, relative);
    await writeNewFile(target, content, relative);
    await launchEditor(target);
    return relative;
  };

  const generateFunctionTool: Tool = {
    name: 'generate_function',
    invoke: async query => {
      const language = generatedLanguage(query);
      const name = extractSubjectName(query, 'function') ?? (language === 'python' ? 'new_function' : 'newFunction');
      const code = generateFunction({
        name,
        language,
        description: extractDescription(query) ?? `Describe what ${name} does.`,
        parameters: extractList(query, 'parameters?|params|arguments|args|taking')
      });

      const relative = await writeScript(`${name}.${GENERATED_EXTENSIONS[language]}`, code);
      return `Generated ${language} function ${name} in ${relative}\n\n${code}`;
    }
  };

  const generateClassTool: Tool = {
    name: 'generate_class',
    invoke: async query => {
      const language = generatedLanguage(query);
      const subject = extractSubjectName(query, 'class') ?? 'NewClass';
      const name = subject.charAt(0).toUpperCase() + subject.slice(1);
      const methods = extractList(query, 'methods?');
      const code = generateClass({
        name,
        language,
        description: extractDescription(query) ?? `Describe what ${name} represents.`,
        methods: methods.length > 0 ? methods : ['process']
      });

      const relative = await writeScript(`${name}.${GENERATED_EXTENSIONS[language]}`, code);
      return `Generated ${language} class ${name} in ${relative}\n\n${code}`;
    }
  };

  const createWebApp: Tool = {
    name: 'create_web_app',
    invoke: async query => {
      await ensureSandbox(sandboxDir);

      const framework = detectFramework(query);
      const appName = extractSubjectName(query, '(?:web\\s+)?(?:app|application|server|api)') ?? 'my_app';
      const listed = extractList(query, 'endpoints?|routes?|resources?');
      const endpoints = listed.length > 0 ? listed : ['items'];
      const { fileName, content } = generateWebApp({ appName, framework, endpoints });

      const relative = path.join('projects', fileName);
      const target = path.join(sandboxDir, relative);
      await writeNewFile(target, content, relative);
      await launchEditor(target);

      const routes = endpoints.map(endpoint => `/api/${endpoint}`).join(', ');
      return `Created ${framework} web app ${appName} in ${relative} with endpoints ${routes}`;
    }
  };

  const analyzeCodeTool: Tool = {
    name: 'analyze_code',
    invoke: async (query, context) => {
      const { code, language, source } = await readCodeForAnalysis(query, context, sandboxDir);
      return formatAnalysis(analyzeCode(code, language), source);
    }
  };

  return [openSandbox, createCodeFile, writeCode, generateFunctionTool, generateClassTool, createWebApp, analyzeCodeTool];
}
