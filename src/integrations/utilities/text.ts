/**
 * Text helpers shared by context building, tool dispatch and audit logging.
 */

const SECRET_KEY = /(token|secret|password|passwd|api[_-]?key|authorization|credential)/i;

/** Rough token count: one token per four characters */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Keep the head and tail of `text` when it exceeds `maxChars`.
 * The result is at most `maxChars` plus the length of the marker.
 */
export function clipText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const half = Math.floor(maxChars / 2);
  return `${text.slice(0, half)}\n...\n${text.slice(text.length - (maxChars - half))}`;
}

/**
 * Cut a tool result to `maxChars` and say how long it was.
 */
export function truncateToolResult(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n... (truncated from ${text.length} chars)`;
}

/** Single-line preview for logs */
export function truncateForLog(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}...`;
}

/**
 * Copy of tool arguments safe to write to logs: secret-looking keys are
 * masked, long strings clipped, nesting below `depth` collapsed.
 */
export function sanitizeArgs(args: Record<string, unknown>, maxStringChars = 500, depth = 3): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    out[key] = SECRET_KEY.test(key) ? '***' : sanitizeValue(value, maxStringChars, depth - 1);
  }
  return out;
}

function sanitizeValue(value: unknown, maxStringChars: number, depth: number): unknown {
  if (typeof value === 'string') return truncateForLog(value, maxStringChars);
  if (Array.isArray(value)) {
    if (depth <= 0) return `[${value.length} items]`;
    return value.map((v) => sanitizeValue(v, maxStringChars, depth - 1));
  }
  if (typeof value === 'object' && value !== null) {
    if (depth <= 0) return '{...}';
    return sanitizeArgs(Object.fromEntries(Object.entries(value)), maxStringChars, depth);
  }
  return value;
}

/** Mask bearer tokens and key=value secrets inside free text */
export function sanitizeText(text: string): string {
  return text
    .replace(/Bearer\s+[A-Za-z0-9._~+/=-]+/g, 'Bearer ***')
    .replace(/\b(api[_-]?key|token|secret|password)(\s*[=:]\s*)("?)[^\s"',]+\3/gi, '$1$2$3***$3');
}
