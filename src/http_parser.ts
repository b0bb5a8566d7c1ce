/* ==================== REQUEST PARSING ==================== */

export type RequestLine = { method: string; path: string };

export type HTTPReq = RequestLine & { headers: Map<string, string> };

/**
 * Takes the first two whitespace-separated tokens of a request line as method
 * and path. Anything after them (usually the protocol version) is ignored.
 * Returns null when the line has fewer than two tokens.
 */
export function parseRequestLine(line: string): RequestLine | null {
  const parts = line.split(/\s+/).filter(p => p.length > 0);
  if (parts.length < 2) return null;
  return { method: parts[0], path: parts[1] };
}

const kHeaderSep = ": ";

// Splits on the first ": ". Lines without it yield null and are dropped.
export function parseHeaderLine(line: string): [string, string] | null {
  const idx = line.indexOf(kHeaderSep);
  if (idx < 0) return null;
  return [line.slice(0, idx), line.slice(idx + kHeaderSep.length)];
}

/**
 * Builds the header map from raw lines, stopping at the first blank one.
 * Names keep the case they were sent with; a repeated name keeps its last
 * value.
 */
export function parseHeaders(lines: Iterable<string>): Map<string, string> {
  const headers = new Map<string, string>();
  for (const raw of lines) {
    const line = raw.trim();
    if (line === "") break;
    const kv = parseHeaderLine(line);
    if (kv) headers.set(kv[0], kv[1]);
  }
  return headers;
}

// Non-negative decimal integer, otherwise 0.
export function parseContentLength(value: string | undefined): number {
  if (value === undefined) return 0;
  const str = value.trim();
  if (!/^\d+$/.test(str)) return 0;
  const n = parseInt(str, 10);
  return Number.isSafeInteger(n) ? n : 0;
}
