import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError } from '@/lib/errors/error';
import type { ManagedDevicePage } from './types';

const DEFAULT_MAX_PAGES = 1000;

/**
 * Follows `@odata.nextLink` from the first page (`null`) until a page carries no link.
 * Transport errors from `fetchPage` propagate unchanged; a link that repeats, or too many pages, is a parse error.
 */
export async function drainMdmPages(
  fetchPage: (nextLink: string | null) => Promise<ManagedDevicePage>,
  opts: { maxPages?: number } = {},
): Promise<unknown[]> {
  const maxPages = opts.maxPages ?? DEFAULT_MAX_PAGES;
  const seen = new Set<string>();
  const devices: unknown[] = [];

  let link: string | null = null;
  for (let page = 0; page < maxPages; page += 1) {
    const body = await fetchPage(link);
    devices.push(...(Array.isArray(body.value) ? body.value : []));

    const next = typeof body['@odata.nextLink'] === 'string' ? body['@odata.nextLink'].trim() : '';
    if (!next) return devices;
    if (seen.has(next)) throw pagingError('nextLink repeated', page + 1);
    seen.add(next);
    link = next;
  }

  throw pagingError('page limit reached', maxPages);
}

function pagingError(cause: string, pages: number): AppError {
  return {
    code: ErrorCode.SOURCE_PARSE_FAILED,
    category: 'parse',
    message: 'mdm paging did not terminate',
    retryable: false,
    redacted_context: { source: 'mdm', cause, pages },
  } satisfies AppError;
}
