import { randomInt } from 'crypto';
import { Tool } from '../types.js';
import { isStringArray, isRecord, readDataFile } from '../../utils/dataFiles.js';

export interface FunContent {
  jokes: string[];
  facts: string[];
}

export function loadFunContent(fileName: string = 'fun.json'): FunContent {
  const data = readDataFile(fileName);
  if (!isRecord(data) || !isStringArray(data.jokes) || !isStringArray(data.facts)) {
    throw new Error(`${fileName} must contain "jokes" and "facts" string arrays`);
  }
  if (data.jokes.length === 0 || data.facts.length === 0) {
    throw new Error(`${fileName} must contain at least one joke and one fact`);
  }
  return { jokes: data.jokes, facts: data.facts };
}

export const getCurrentDatetimeTool: Tool = {
  name: 'get_current_datetime',
  invoke: async () => {
    const now = new Date();
    const date = now.toLocaleDateString('en-US', {
      weekday: 'long',
      year: 'numeric',
      month: 'long',
      day: 'numeric'
    });
    const time = now.toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit' });
    return `It is ${time} on ${date}`;
  }
};

export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 64;
export const DEFAULT_PASSWORD_LENGTH = 16;

const LETTERS = 'abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ';
const DIGITS = '23456789';
const SYMBOLS = '!@#$%^&*-_=+?';

/** Length named in the request, clamped to the allowed range. */
export function passwordLength(query: string): number {
  const match = /\b(\d{1,3})\b/.exec(query);
  if (!match) return DEFAULT_PASSWORD_LENGTH;
  return Math.min(Math.max(Number(match[1]), MIN_PASSWORD_LENGTH), MAX_PASSWORD_LENGTH);
}

export function generatePassword(length: number, includeSymbols: boolean): string {
  const alphabet = LETTERS + DIGITS + (includeSymbols ? SYMBOLS : '');
  let password = '';
  for (let i = 0; i < length; i++) {
    password += alphabet[randomInt(alphabet.length)];
  }
  return password;
}

export function createUtilityTools(fun: FunContent = loadFunContent()): Tool[] {
  const pick = (items: string[]) => items[randomInt(items.length)];

  return [
    getCurrentDatetimeTool,
    {
      name: 'tell_joke',
      invoke: async () => pick(fun.jokes)
    },
    {
      name: 'random_fact',
      invoke: async () => `Did you know? ${pick(fun.facts)}`
    },
    {
      name: 'generate_password',
      invoke: async query => {
        const lower = query.toLowerCase();
        const includeSymbols = !/\b(no|without)\s+symbols?\b/.test(lower);
        const length = passwordLength(query);
        return `Generated password (${length} characters): ${generatePassword(length, includeSymbols)}`;
      }
    }
  ];
}
