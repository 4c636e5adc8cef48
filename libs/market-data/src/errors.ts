export class ScreenerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class RateLimitTimeoutError extends ScreenerError {
  constructor(readonly waitedMs: number) {
    super(`rate limit gate did not grant within ${waitedMs}ms`);
  }
}

export class GateClosedError extends ScreenerError {
  constructor(reason = 'request gate is closed') {
    super(reason);
  }
}

export class TransportFailureError extends ScreenerError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class MalformedPayloadError extends ScreenerError {
  constructor(
    message: string,
    readonly symbol?: string,
  ) {
    super(message);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
