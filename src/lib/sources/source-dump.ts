import { readFile } from 'node:fs/promises';

import { causeOf } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError, JsonValue } from '@/lib/errors/error';
import type { SourceName } from '@/lib/ingest/raw-record';

const EXCERPT_LIMIT = 2000;

export type SourceDumpParseResult =
  | { ok: true; payload: unknown; parseMode: 'strict' | 'recovered' }
  | { ok: false; error: AppError };

function stripUtf8Bom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function parseError(source: SourceName, message: string, context: Record<string, JsonValue>): AppError {
  return {
    code: ErrorCode.SOURCE_PARSE_FAILED,
    category: 'parse',
    message,
    retryable: false,
    redacted_context: { source, ...context },
  } satisfies AppError;
}

// Exporters sometimes print a banner before the document; take the outermost array or object.
function recoverJson(text: string): unknown {
  for (const [open, close] of [
    ['[', ']'],
    ['{', '}'],
  ] as const) {
    const first = text.indexOf(open);
    const last = text.lastIndexOf(close);
    if (first < 0 || last <= first) continue;
    try {
      return JSON.parse(text.slice(first, last + 1));
    } catch {
      continue;
    }
  }
  return undefined;
}

/** Parses a native source export: a JSON array, or an object wrapping the list (`value`, `hosts`, `items`). */
export function parseSourceDump(source: SourceName, text: string): SourceDumpParseResult {
  const normalized = stripUtf8Bom(text).trim();
  if (!normalized) return { ok: false, error: parseError(source, 'source dump is empty', { length: 0 }) };

  let parsed: unknown;
  let parseMode: 'strict' | 'recovered' = 'strict';
  try {
    parsed = JSON.parse(normalized);
  } catch {
    parsed = recoverJson(normalized);
    parseMode = 'recovered';
  }

  if (parsed === undefined) {
    return {
      ok: false,
      error: parseError(source, 'failed to parse source dump as json', {
        length: text.length,
        dump_excerpt: text.slice(0, EXCERPT_LIMIT),
      }),
    };
  }

  if (!parsed || typeof parsed !== 'object') {
    return {
      ok: false,
      error: parseError(source, 'source dump must be an array or object', { parse_mode: parseMode }),
    };
  }

  return { ok: true, payload: parsed, parseMode };
}

export async function readSourceDump(source: SourceName, filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw {
      code: ErrorCode.SOURCE_ACQUISITION_FAILED,
      category: 'network',
      message: 'failed to read source dump',
      retryable: true,
      redacted_context: { source, path: filePath, cause: causeOf(err) },
    } satisfies AppError;
  }

  const result = parseSourceDump(source, text);
  if (!result.ok) throw result.error;
  return result.payload;
}
