/**
 * Structured output helpers
 *
 * Models wrap JSON in prose, code fences, trailing commas and worse. The
 * extractor tries progressively looser candidates: the whole text, fenced
 * blocks, balanced brace spans (longest first), then the outermost braces.
 * Every candidate past the first may be repaired with jsonrepair.
 */

import { jsonrepair } from 'jsonrepair';
import type { z } from 'zod';

export class JsonExtractionError extends Error {
  readonly code = 'JSON_EXTRACTION_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'JsonExtractionError';
  }
}

export type StructuredResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** Extract the first parseable JSON value from model output. */
export function extractJson(raw: string): unknown {
  const direct = parseCandidate(raw, false);
  if (direct.found) {
    return direct.value;
  }

  for (const candidate of looseCandidates(raw)) {
    const parsed = parseCandidate(candidate, true);
    if (parsed.found) {
      return parsed.value;
    }
  }

  throw new JsonExtractionError('No JSON object found in model output');
}

/** Extract JSON and validate it against a zod schema. */
export function parseStructured<T>(raw: string, schema: z.ZodType<T>): StructuredResult<T> {
  let value: unknown;
  try {
    value = extractJson(raw);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, error: `Response did not match the expected shape (${issues.join('; ')})` };
  }
  return { ok: true, value: result.data };
}

function* looseCandidates(raw: string): Generator<string> {
  for (const match of raw.matchAll(/```(?:json)?\s*([\s\S]*?)```/g)) {
    yield match[1] ?? '';
  }

  yield* balancedSpans(raw).sort((a, b) => b.length - a.length);

  const first = raw.indexOf('{');
  const last = raw.lastIndexOf('}');
  if (first !== -1 && last > first) {
    yield raw.slice(first, last + 1);
  }
}

function parseCandidate(input: string, allowRepair: boolean): { found: true; value: unknown } | { found: false } {
  const trimmed = input.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '').trim();
  if (!trimmed) {
    return { found: false };
  }

  const attempts = [trimmed, trimmed.replace(/^\uFEFF/, '').replace(/,\s*([}\]])/g, '$1')];
  for (const text of attempts) {
    try {
      return { found: true, value: JSON.parse(text) };
    } catch {
      // next normalization
    }
  }

  if (allowRepair) {
    try {
      return { found: true, value: JSON.parse(jsonrepair(trimmed)) };
    } catch {
      return { found: false };
    }
  }
  return { found: false };
}

/** Top-level `{...}` / `[...]` spans with matched brackets, strings respected. */
function balancedSpans(raw: string): string[] {
  const spans: string[] = [];
  const stack: string[] = [];
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];

    if (start === -1) {
      if (ch === '{' || ch === '[') {
        start = i;
        stack.length = 0;
        stack.push(ch);
        inString = false;
        escaped = false;
      }
      continue;
    }

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if (ch === '}' || ch === ']') {
      const open = stack.pop();
      if ((open === '{' && ch !== '}') || (open === '[' && ch !== ']')) {
        start = -1;
        continue;
      }
      if (stack.length === 0) {
        spans.push(raw.slice(start, i + 1));
        start = -1;
      }
    }
  }

  return spans;
}
