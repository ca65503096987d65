/**
 * JSON Region Locator
 *
 * Finds the last top-level `{…}` region in free text. The forward scan
 * tracks string literals inside objects so braces in values do not count;
 * quotes in the surrounding prose are ignored. A region still open at the
 * end of the text is returned as truncated.
 *
 * When the last region is not JSON (a brace in prose after the plan), the
 * parser falls back to the other candidates: fenced regions first, then
 * the remaining complete regions, newest first.
 *
 * @module @worldgrade/engine/parser/json-region
 */

export interface JsonRegion {
  /** Offset of the opening brace */
  start: number;
  /** Offset just past the closing brace, or text length when truncated */
  end: number;
  truncated: boolean;
  /** Region bounds widened to an enclosing markdown fence */
  outerStart: number;
  outerEnd: number;
}

interface ScanResult {
  complete: Array<{ start: number; end: number }>;
  openStart: number | null;
}

function scan(text: string, stringAware: boolean): ScanResult {
  const complete: Array<{ start: number; end: number }> = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

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

    if (ch === '"' && stringAware && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) complete.push({ start, end: i + 1 });
    }
  }

  return { complete, openStart: depth > 0 ? start : null };
}

const FENCE_OPEN = /```[A-Za-z]*[ \t]*\r?\n?[ \t]*$/;
const FENCE_CLOSE = /^[ \t]*\r?\n?[ \t]*```/;

function withFence(text: string, start: number, end: number, truncated: boolean): JsonRegion {
  const opener = FENCE_OPEN.exec(text.slice(0, start));
  const outerStart = opener ? opener.index : start;
  const closer = opener && !truncated ? FENCE_CLOSE.exec(text.slice(end)) : null;
  const outerEnd = closer ? end + closer[0].length : end;
  return { start, end, truncated, outerStart, outerEnd };
}

/**
 * Locate the last JSON-like object region, or null when the text has none
 */
export function locateJsonRegion(text: string): JsonRegion | null {
  const aware = scan(text, true);
  const last = aware.complete[aware.complete.length - 1];

  if (last) {
    if (aware.openStart !== null && aware.openStart > last.start) {
      return withFence(text, aware.openStart, text.length, true);
    }
    return withFence(text, last.start, last.end, false);
  }

  // A stray quote can swallow every closing brace of the string-aware pass
  const naive = scan(text, false);
  const naiveLast = naive.complete[naive.complete.length - 1];
  if (naiveLast) {
    return withFence(text, naiveLast.start, naiveLast.end, false);
  }
  if (aware.openStart !== null) {
    return withFence(text, aware.openStart, text.length, true);
  }
  return null;
}

/**
 * Every region worth trying, most preferred first. The first entry is
 * `locateJsonRegion(text)`.
 */
export function locateJsonCandidates(text: string): JsonRegion[] {
  const primary = locateJsonRegion(text);
  if (!primary) return [];

  const seen = new Set<number>([primary.start]);
  const fenced: JsonRegion[] = [];
  const bare: JsonRegion[] = [];
  const spans = [...scan(text, true).complete, ...scan(text, false).complete].sort((a, b) => b.start - a.start);

  for (const span of spans) {
    if (seen.has(span.start)) continue;
    seen.add(span.start);
    const region = withFence(text, span.start, span.end, false);
    (region.outerStart < region.start ? fenced : bare).push(region);
  }
  return [primary, ...fenced, ...bare];
}
