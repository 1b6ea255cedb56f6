/**
 * Byte ranges and their HTTP header forms
 */

/**
 * Half-open interval `[start, end)` of an object; `end` absent means open-ended
 */
export interface ByteRange {
  readonly start: number;
  readonly end?: number;
}

/**
 * Parsed `Content-Range` header
 */
export type ContentRange =
  | { readonly kind: 'satisfied'; readonly first: number; readonly last: number; readonly total?: number }
  | { readonly kind: 'unsatisfied'; readonly total: number };

/**
 * Formats a range as a `Range` header value.
 *
 * @example
 * ```typescript
 * formatRangeHeader({ start: 500 }); // 'bytes=500-'
 * formatRangeHeader({ start: 0, end: 100 }); // 'bytes=0-99'
 * ```
 */
export function formatRangeHeader(range: ByteRange): string {
  return range.end === undefined ? `bytes=${range.start}-` : `bytes=${range.start}-${range.end - 1}`;
}

const SATISFIED_PATTERN = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i;
const UNSATISFIED_PATTERN = /^bytes\s+\*\/(\d+)$/i;

function toSafeInteger(value: string): number | undefined {
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Parses `bytes first-last/total`, `bytes first-last/*` and `bytes *\/total`.
 *
 * @returns `undefined` for anything else
 */
export function parseContentRange(value: string | undefined): ContentRange | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();

  const satisfied = SATISFIED_PATTERN.exec(trimmed);
  if (satisfied) {
    const [, firstText = '', lastText = '', totalText = ''] = satisfied;
    const first = toSafeInteger(firstText);
    const last = toSafeInteger(lastText);
    const total = totalText === '*' ? undefined : toSafeInteger(totalText);
    if (first === undefined || last === undefined || last < first) {
      return undefined;
    }
    if (totalText !== '*' && (total === undefined || last >= total)) {
      return undefined;
    }
    return { kind: 'satisfied', first, last, total };
  }

  const unsatisfied = UNSATISFIED_PATTERN.exec(trimmed);
  if (unsatisfied) {
    const total = toSafeInteger(unsatisfied[1] ?? '');
    return total === undefined ? undefined : { kind: 'unsatisfied', total };
  }

  return undefined;
}
