import type { FieldDictionary } from './suggestions.js';
import { FORM_FIELD_KEYS } from './xml_tags.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

const CODE_FENCE = '```';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function parseJsonObject(text: string): ParseResult<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
  return isPlainObject(parsed) ? { ok: true, value: parsed } : { ok: false, reason: 'not a JSON object' };
}

/** Body of the first fenced block that looks like an object, else the input. */
export function stripCodeFences(text: string): string {
  if (!text.includes(CODE_FENCE)) {
    return text;
  }

  const blocks = text
    .split(CODE_FENCE)
    .map((part) => part.trim().replace(/^json\b/i, '').trim())
    .filter((part) => part.length > 0);
  return blocks.find((part) => part.startsWith('{') && part.endsWith('}')) ?? text;
}

export function sliceOuterBraces(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

/**
 * JSON object embedded in model output: plain JSON, a fenced ```json block,
 * or an object wrapped in prose.
 */
export function extractJsonObject(text: string): ParseResult<Record<string, unknown>> {
  const trimmed = text.trim();
  if (!trimmed) {
    return { ok: false, reason: 'empty response' };
  }

  const candidate = stripCodeFences(trimmed);
  const direct = parseJsonObject(candidate);
  if (direct.ok) {
    return direct;
  }

  const sliced = sliceOuterBraces(candidate);
  if (sliced === null || sliced === candidate) {
    return direct;
  }
  return parseJsonObject(sliced);
}

function fieldText(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
}

/** Scalar entries of `record` as field text; other keys are dropped. */
export function toFieldDictionary(record: Record<string, unknown>): FieldDictionary {
  const fields: FieldDictionary = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string' || typeof value === 'number') {
      fields[key] = fieldText(value);
    }
  }
  return fields;
}

/**
 * Field dictionary from a field guesser's reply. Every vocabulary key is
 * present; unknown keys are dropped and missing or non-scalar values become "".
 */
export function parseFieldGuess(text: string): ParseResult<FieldDictionary> {
  const extracted = extractJsonObject(text);
  if (!extracted.ok) {
    return extracted;
  }

  const fields: FieldDictionary = {};
  for (const key of FORM_FIELD_KEYS) {
    fields[key] = fieldText(extracted.value[key]);
  }
  return { ok: true, value: fields };
}
