/** Failure of the outbound generation call. Only these cross the service boundary. */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

/** Provider unreachable, timed out, or the connection dropped before a response. */
export class TransportError extends GenerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** Provider answered with a non-2xx status. */
export class ProviderError extends GenerationError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ProviderError';
    this.status = status;
  }
}
