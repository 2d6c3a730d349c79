/**
 * Protocol-level failure reported by the search engine (or no response at all, status 0).
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly response: unknown;
  readonly errorType?: string;
  readonly reason?: string;

  constructor(message: string, statusCode: number, response?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.response = response;

    const details = extractErrorDetails(response);
    this.errorType = details.type;
    this.reason = details.reason;

    Object.setPrototypeOf(this, ApiError.prototype);
  }

  /**
   * "type: reason" for structured error bodies, the raw error string otherwise
   */
  describe(): string {
    if (this.errorType !== undefined && this.reason !== undefined) {
      return `${this.errorType}: ${this.reason}`;
    }
    return this.reason ?? this.message;
  }
}

function extractErrorDetails(response: unknown): { type?: string; reason?: string } {
  if (typeof response !== 'object' || response === null || !('error' in response)) {
    return {};
  }

  const { error } = response;
  if (typeof error === 'string') {
    return { reason: error };
  }
  if (typeof error === 'object' && error !== null) {
    const type = 'type' in error && typeof error.type === 'string' ? error.type : undefined;
    const reason = 'reason' in error && typeof error.reason === 'string' ? error.reason : undefined;
    return { type, reason };
  }

  return {};
}
