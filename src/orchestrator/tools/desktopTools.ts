import { execFile, spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import { Tool } from '../types.js';

const execFileAsync = promisify(execFile);

const LAUNCH_VERBS = ['open', 'launch', 'start', 'kholo', 'chalao'];
const CLOSE_VERBS = ['close', 'quit', 'exit', 'kill'];
const TRAILING_CLOSE_VERB = 'band';
const APP_FILLER = ['the', 'app', 'application', 'please', 'window', 'now', 'karo', 'kar', 'do', 'ko', 'ki'];

/**
 * The words after the first launch verb, e.g. "please open spotify now" gives
 * "spotify now". Returns null when no verb is present.
 */
export function extractAppName(query: string): string | null {
  const words = query.trim().split(/\s+/);
  const index = words.findIndex(word => LAUNCH_VERBS.includes(word.toLowerCase()));
  if (index === -1) return null;

  const rest = words
    .slice(index + 1)
    .filter(word => !['the', 'app', 'application', 'please'].includes(word.toLowerCase()));
  return rest.length > 0 ? rest.join(' ') : null;
}

function launch(command: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      shell: process.platform === 'win32'
    });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

function launchCommand(appName: string): [string, string[]] {
  switch (process.platform) {
    case 'darwin':
      return ['open', ['-a', appName]];
    case 'win32':
      return ['start', ['""', `"${appName}"`]];
    default:
      return [appName.toLowerCase().replace(/\s+/g, '-'), []];
  }
}

export const openAppTool: Tool = {
  name: 'open_app',
  invoke: async query => {
    const appName = extractAppName(query);
    if (!appName) {
      throw new Error('No application name found in the request');
    }

    const [command, args] = launchCommand(appName);
    await launch(command, args);
    return `Opened ${appName}`;
  }
};

/**
 * The application to close: the words after "close", "quit", "exit" or
 * "kill", or the words before "band" ("notepad band karo").
 */
export function extractCloseTarget(query: string): string | null {
  const words = query.trim().split(/\s+/);
  const lower = words.map(word => word.toLowerCase());

  let candidates: string[] = [];
  const verb = lower.findIndex(word => CLOSE_VERBS.includes(word));
  if (verb !== -1) {
    candidates = words.slice(verb + 1);
  } else {
    const trailing = lower.indexOf(TRAILING_CLOSE_VERB);
    if (trailing === -1) return null;
    candidates = words.slice(0, trailing);
  }

  const name = candidates.filter(word => !APP_FILLER.includes(word.toLowerCase()));
  return name.length > 0 ? name.join(' ') : null;
}

export function closeCommand(appName: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  switch (platform) {
    case 'darwin':
      return ['osascript', ['-e', `quit app "${appName.replace(/["\\]/g, '')}"`]];
    case 'win32': {
      const image = appName.replace(/\s+/g, '');
      return ['taskkill', ['/IM', image.toLowerCase().endsWith('.exe') ? image : `${image}.exe`]];
    }
    default:
      return ['pkill', ['-x', appName.toLowerCase().replace(/\s+/g, '-')]];
  }
}

export type CommandRunner = (command: string, args: string[]) => Promise<unknown>;

const runCommand: CommandRunner = (command, args) => execFileAsync(command, args);

export function createCloseAppTool(run: CommandRunner = runCommand): Tool {
  return {
    name: 'close_app',
    invoke: async query => {
      const appName = extractCloseTarget(query);
      if (!appName) {
        throw new Error('No application name found in the request');
      }

      const [command, args] = closeCommand(appName);
      try {
        await run(command, args);
      } catch (error) {
        throw new Error(`Could not close ${appName}; is it running?`, { cause: error });
      }
      return `Closed ${appName}`;
    }
  };
}

export type FolderAction = 'create-folder' | 'create-file' | 'delete';

export interface FolderRequest {
  action: FolderAction;
  target: string;
}

const NAMED_PATTERN = /\b(?:named|called)\s+["']?([\w.\-/]+)/i;
const NOUN_PATTERN = /\b(?:folder|directory|file)\s+["']?([\w.\-/]+)/i;

export function parseFolderRequest(query: string): FolderRequest | null {
  const target = NAMED_PATTERN.exec(query)?.[1] ?? NOUN_PATTERN.exec(query)?.[1];
  if (!target || /^[./]+$/.test(target)) return null;

  const lower = query.toLowerCase();
  if (lower.includes('delete') || lower.includes('remove')) {
    return { action: 'delete', target };
  }
  if (/\bfile\b/.test(lower) && !/\b(folder|directory)\b/.test(lower)) {
    return { action: 'create-file', target };
  }
  return { action: 'create-folder', target };
}

export const folderFileTool: Tool = {
  name: 'folder_file',
  invoke: async (query, context) => {
    const request = parseFolderRequest(query);
    if (!request) {
      throw new Error('Could not tell which folder or file to work on');
    }

    const resolved = context.pathValidator.validate(request.target);
    const relative = path.relative(context.workingDirectory, resolved);
    if (!relative) {
      throw new Error('Refusing to work on the working directory itself');
    }

    switch (request.action) {
      case 'create-folder':
        await fs.mkdir(resolved, { recursive: true });
        return `Created folder ${relative}`;
      case 'create-file':
        await fs.mkdir(path.dirname(resolved), { recursive: true });
        await fs.writeFile(resolved, '', { flag: 'a' });
        return `Created file ${relative}`;
      case 'delete':
        await fs.rm(resolved, { recursive: true });
        return `Deleted ${relative}`;
    }
  }
};

export const allDesktopTools = [openAppTool, createCloseAppTool(), folderFileTool];
