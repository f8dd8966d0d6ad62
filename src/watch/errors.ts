/**
 * errors.ts
 *
 * Centralizes error detection
 * - error classes for transport, template and config failures
 * - extracting Moodle exception entries from service.php replies
 * - detecting the completion marker in a progress reply
 * - detecting session expiry
 */

// literal the platform puts in `completion` once a video counts as watched
export const COMPLETION_MARKER = '已完成';

export class TransportError extends Error {
  constructor(message: string, readonly status: number | null = null, readonly raw: string | null = null) {
    super(message);
    this.name = 'TransportError';
  }
}

export class MalformedTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedTemplateError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export type ServiceException = {
  errorcode: string;
  message: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// service.php answers a list of { error, data | exception } entries.
// returns the first entry that carries error=true, or null.
export function extractServiceException(json: unknown): ServiceException | null {
  const entries = Array.isArray(json) ? json : [json];
  for (const entry of entries) {
    if (!isRecord(entry) || entry.error !== true) continue;
    const ex = isRecord(entry.exception) ? entry.exception : {};
    return {
      errorcode: typeof ex.errorcode === 'string' ? ex.errorcode : 'unknown',
      message: typeof ex.message === 'string' ? ex.message : 'service call failed',
    };
  }
  // a bare exception object (no batching) looks like { exception, errorcode, message }
  if (isRecord(json) && typeof json.exception === 'string' && typeof json.errorcode === 'string') {
    return { errorcode: json.errorcode, message: typeof json.message === 'string' ? json.message : json.exception };
  }
  return null;
}

// Unwrap the first entry's `data` the way the player script reads it.
// returns null when the reply is not shaped like a progress echo (MalformedResponse).
export function progressView(json: unknown): Record<string, unknown> | null {
  let view: unknown = json;
  if (Array.isArray(json)) {
    const first: unknown = json[0];
    view = isRecord(first) && 'data' in first ? first.data : first;
  }
  return isRecord(view) ? view : null;
}

export function isCompletionReply(view: Record<string, unknown>): boolean {
  return view.completion === COMPLETION_MARKER;
}

// detects session expiry / bad sesskey
// when true, refreshing the cookie is the only fix
export function isNotLoggedIn(ex: ServiceException): boolean {
  return /^(servicerequireslogin|invalidsesskey|requireloginerror)$/i.test(ex.errorcode);
}

export function snippet(text: string, max = 160): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
