import { Tool } from '../types.js';
import { isRecord } from '../../utils/dataFiles.js';

const REQUEST_TIMEOUT_MS = 15000;
const USER_AGENT = 'Hark/1.0 (personal assistant)';

const SEARCH_PREFIX = /^(?:please\s+)?(?:search(?:\s+the\s+web)?(?:\s+for)?|google|look\s+up|find(?:\s+out)?|research)\s+/i;

export function extractSearchTerms(query: string): string {
  return query.trim().replace(SEARCH_PREFIX, '').replace(/[?!.]+$/, '').trim();
}

const LOCATION_PATTERN = /\b(?:in|at|for)\s+([a-z][a-z\s.-]*?)(?:\s+(?:today|tomorrow|now|please))?[?!.]*$/i;

/** City named after "in", "at" or "for"; empty when none, letting the service locate the caller. */
export function extractLocation(query: string): string {
  return LOCATION_PATTERN.exec(query.trim())?.[1].trim() ?? '';
}

/** The caller's signal, bounded by the request timeout. */
export function requestSignal(signal?: AbortSignal, timeoutMs: number = REQUEST_TIMEOUT_MS): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

async function fetchText(url: string, signal?: AbortSignal): Promise<string> {
  const response = await fetch(url, {
    headers: { 'User-Agent': USER_AGENT },
    signal: requestSignal(signal)
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${response.statusText}`);
  }

  return response.text();
}

function firstRelatedTopic(body: Record<string, unknown>): string | null {
  const topics = body.RelatedTopics;
  if (!Array.isArray(topics)) return null;

  for (const topic of topics) {
    if (isRecord(topic) && typeof topic.Text === 'string' && topic.Text) {
      return topic.Text;
    }
  }
  return null;
}

export function summarizeInstantAnswer(terms: string, payload: unknown): string {
  const searchUrl = `https://duckduckgo.com/?q=${encodeURIComponent(terms)}`;

  if (isRecord(payload)) {
    const abstract = typeof payload.AbstractText === 'string' ? payload.AbstractText : '';
    const answer = typeof payload.Answer === 'string' ? payload.Answer : '';
    const heading = typeof payload.Heading === 'string' && payload.Heading ? payload.Heading : terms;

    if (answer) return `${heading}: ${answer}`;
    if (abstract) return `${heading}: ${abstract}`;

    const related = firstRelatedTopic(payload);
    if (related) return related;
  }

  return `No instant answer for "${terms}". Full results: ${searchUrl}`;
}

export const googleSearchTool: Tool = {
  name: 'google_search',
  invoke: async (query, context) => {
    const terms = extractSearchTerms(query);
    if (!terms) {
      throw new Error('Nothing to search for');
    }

    const url = `https://api.duckduckgo.com/?q=${encodeURIComponent(terms)}&format=json&no_html=1&skip_disambig=1`;
    const body = await fetchText(url, context.signal);
    const payload: unknown = JSON.parse(body);
    return summarizeInstantAnswer(terms, payload);
  }
};

export const getWeatherTool: Tool = {
  name: 'get_weather',
  invoke: async (query, context) => {
    const location = extractLocation(query);
    const url = `https://wttr.in/${encodeURIComponent(location)}?format=3`;
    const report = (await fetchText(url, context.signal)).trim();

    if (!report) {
      throw new Error(`No weather report for ${location || 'your location'}`);
    }
    return report;
  }
};

export const allWebTools = [googleSearchTool, getWeatherTool];
