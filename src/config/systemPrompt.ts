import { homedir, platform, arch } from 'os';
import type { ToolMetadata } from '../orchestrator/types.js';

const DEFAULT_SYSTEM_PROMPT = `
You are Hark, a personal assistant running on the user's computer.
Users speak casually and often mix English with Hindi (Hinglish).

LANGUAGE RULES:
- Reply in the language the user wrote in.
- Keep answers short enough to be read aloud: a few sentences, no tables.

TOOLS:
- You can call the functions listed below. Call one only when it is needed to answer.
- Each function takes a single "query" argument: a plain-language description of what you need.
- After a function returns, answer the user using its output. Never show raw function syntax.

CONTEXT:
- Platform: {{PLATFORM}} ({{ARCH}})
- User: {{USER}}
- Home: {{HOME}}
- Date: {{DATE}}
- Time: {{TIME}}
`;

interface PlaceholderValues {
  DATE: string;
  TIME: string;
  PLATFORM: string;
  ARCH: string;
  USER: string;
  HOME: string;
}

function getPlaceholderValues(now: Date): PlaceholderValues {
  return {
    DATE: now.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric' }),
    TIME: now.toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit' }),
    PLATFORM: platform(),
    ARCH: arch(),
    USER: process.env.USERNAME || process.env.USER || 'Unknown',
    HOME: homedir()
  };
}

function replacePlaceholders(content: string, now: Date): string {
  let result = content;

  for (const [key, value] of Object.entries(getPlaceholderValues(now))) {
    result = result.split(`{{${key}}}`).join(value);
  }

  return result;
}

export function buildFallbackSystemPrompt(tools: ToolMetadata[], now: Date = new Date()): string {
  let prompt = replacePlaceholders(DEFAULT_SYSTEM_PROMPT, now).trim();

  if (tools.length > 0) {
    prompt += '\n\n## Available Functions\n';
    for (const tool of tools) {
      prompt += `- ${tool.name}: ${tool.description}\n`;
    }
  }

  return prompt;
}
