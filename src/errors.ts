export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class FetchError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.status = options.status;
  }
}

/**
 * The API answered successfully but listed no collections, so there is
 * nothing to build a calendar from.
 */
export class EmptyResultError extends FetchError {
  constructor(message: string) {
    super(message);
    this.name = "EmptyResultError";
  }
}
