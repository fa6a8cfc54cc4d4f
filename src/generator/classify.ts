import type { SenderOutcome } from '../faults/types.js';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_CLOSED',
]);

export function classifyStatus(status: number): SenderOutcome {
  switch (status) {
    case 200:
      return 'success';
    case 500:
      return 'server_error';
    default:
      return 'other_error';
  }
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return undefined;
  }
  return typeof value.code === 'string' ? value.code : undefined;
}

/**
 * Classifies a failed request. `timedOut` is true when the request's own
 * timeout fired, which takes precedence over whatever error fetch surfaced.
 */
export function classifyError(error: unknown, timedOut: boolean): SenderOutcome {
  if (timedOut) return 'timeout';

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return 'timeout';
    }

    const code = errorCode(error) ?? errorCode(error.cause);
    if (code && CONNECTION_ERROR_CODES.has(code)) {
      return 'connection_error';
    }

    // fetch reports transport failures as a bare TypeError
    if (error instanceof TypeError && error.message === 'fetch failed') {
      return 'connection_error';
    }
  }

  return 'other_error';
}
