export const LOG_TEXT_LIMIT = 100;
export const TRUNCATION_MARKER = '... (truncated)';

export function truncate(text: string, limit: number = LOG_TEXT_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}${TRUNCATION_MARKER}` : text;
}

function summarize(value: unknown): unknown {
  if (typeof value === 'string') {
    return truncate(value);
  }
  if (Array.isArray(value)) {
    return `[array(${value.length})]`;
  }
  if (value !== null && typeof value === 'object') {
    return { keys: Object.keys(value).slice(0, 20).map((key) => truncate(key, 40)) };
  }
  return value;
}

// Log-safe copy of a scan payload: top-level strings are capped, nested values
// are reduced to their shape. Payloads can be megabytes.
export function redactScanPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload).slice(0, 50)) {
    redacted[truncate(key, 40)] = summarize(value);
  }
  return redacted;
}
