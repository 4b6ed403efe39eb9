/**
 * Error taxonomy for a merge pass
 */

/** Bad rule, unknown destination field, missing options. Aborts only the affected rule unless raised at pass start. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Timeout, rate limit or dropped connection; safe to retry */
export class TransientIOError extends Error {
  constructor(
    message: string,
    readonly original?: unknown
  ) {
    super(message);
    this.name = 'TransientIOError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  // graphql-request ClientError keeps the status on response
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientIOError) return true;

  const status = statusOf(error);
  if (status === 429 || status === 502 || status === 503 || status === 504) {
    return true;
  }

  const text = errorMessage(error).toLowerCase();
  if (status === 403 && text.includes('rate limit')) {
    return true;
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return true;
  }

  return (
    text.includes('timeout') ||
    text.includes('timed out') ||
    text.includes('econnreset') ||
    text.includes('connection reset') ||
    text.includes('socket hang up') ||
    text.includes('secondary rate limit')
  );
}
