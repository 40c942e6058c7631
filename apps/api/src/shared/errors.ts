export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Host CPU or memory counters could not be read. */
export class SystemStatsUnavailableError extends HttpError {
  constructor(message = 'System statistics unavailable', details?: unknown) {
    super(message, 500, details);
    this.name = 'SystemStatsUnavailableError';
  }
}
