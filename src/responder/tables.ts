import fs from 'fs';
import { describeError } from '../observability/logger.js';

export class ResponseTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseTableError';
  }
}

export interface PatternRule {
  regex: RegExp;
  intent: string;
  response: string;
}

export interface ResponseTables {
  /** Keys are lowercased. */
  exact: Map<string, string>;
  patterns: PatternRule[];
  faq: Map<string, string>;
  /** Keywords are lowercased. Order is declaration order. */
  intents: Array<{ intent: string; keywords: string[] }>;
  quickIntents: Set<string>;
  welcome: string;
  apology: string;
}

export const DEFAULT_RESPONSES_URL = new URL('../../config/responses.json', import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringMap(raw: Record<string, unknown>, field: string): Map<string, string> {
  const value = raw[field];
  if (!isRecord(value)) {
    throw new ResponseTableError(`"${field}" must be an object of strings`);
  }

  const map = new Map<string, string>();
  for (const [key, text] of Object.entries(value)) {
    if (typeof text !== 'string') {
      throw new ResponseTableError(`"${field}.${key}" must be a string`);
    }
    map.set(key, text);
  }
  return map;
}

function readString(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ResponseTableError(`"${field}" must be a non-empty string`);
  }
  return value;
}

function readStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ResponseTableError(`"${field}" must be an array of strings`);
  }
  return value;
}

function readPatterns(raw: Record<string, unknown>): PatternRule[] {
  const value = raw.patterns;
  if (!Array.isArray(value)) {
    throw new ResponseTableError('"patterns" must be an array');
  }

  return value.map((item, index) => {
    if (!isRecord(item)) {
      throw new ResponseTableError(`"patterns[${index}]" must be an object`);
    }
    const pattern = readString(item, 'pattern');
    let regex: RegExp;
    try {
      regex = new RegExp(pattern, 'i');
    } catch (error) {
      throw new ResponseTableError(
        `"patterns[${index}]" is not a valid regular expression: ${describeError(error)}`
      );
    }
    return { regex, intent: readString(item, 'intent'), response: readString(item, 'response') };
  });
}

export function parseResponseTables(input: unknown): ResponseTables {
  if (!isRecord(input)) {
    throw new ResponseTableError('Response tables must be a JSON object');
  }

  const exact = new Map<string, string>();
  for (const [key, text] of readStringMap(input, 'exact')) {
    exact.set(key.toLowerCase(), text);
  }

  const rawIntents = input.intents;
  if (!isRecord(rawIntents)) {
    throw new ResponseTableError('"intents" must be an object of keyword arrays');
  }
  const intents = Object.entries(rawIntents).map(([intent, keywords]) => ({
    intent,
    keywords: readStringArray(keywords, `intents.${intent}`).map(keyword => keyword.toLowerCase()),
  }));

  return {
    exact,
    patterns: readPatterns(input),
    faq: readStringMap(input, 'faq'),
    intents,
    quickIntents: new Set(readStringArray(input.quickIntents, 'quickIntents')),
    welcome: readString(input, 'welcome'),
    apology: readString(input, 'apology'),
  };
}

export function loadResponseTables(path: string | URL = DEFAULT_RESPONSES_URL): ResponseTables {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf8');
  } catch (error) {
    throw new ResponseTableError(`Cannot read response tables at ${String(path)}: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ResponseTableError(`Response tables at ${String(path)} are not valid JSON: ${describeError(error)}`);
  }

  return parseResponseTables(parsed);
}
