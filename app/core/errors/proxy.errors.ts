export class ProxyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Anything the caller got wrong. Surfaced as a 4xx with a generic message;
 * the detail in `message` is only ever logged.
 */
export class ClientInputError extends ProxyError {
  readonly statusCode: number = 400;
}

export class MethodNotAllowedError extends ClientInputError {
  readonly statusCode: number = 405;

  constructor(
    public readonly method: string,
    public readonly allowed: string
  ) {
    super(`method ${method} not allowed, expected ${allowed}`);
  }
}

export class InvalidRequestBodyError extends ClientInputError {}

export class UnsupportedFormatError extends ClientInputError {
  constructor(public readonly format: string) {
    super(`unsupported encoding format: ${format}`);
  }
}

export class UnsupportedInputTypeError extends ClientInputError {
  constructor(
    public readonly inputType: string,
    public readonly position?: number
  ) {
    super(
      position === undefined
        ? `unsupported input type: ${inputType}`
        : `unsupported input type at index ${position}: ${inputType}`
    );
  }
}

export class UpstreamError extends ProxyError {
  constructor(
    public readonly operation: string,
    cause?: unknown
  ) {
    super(`failed to ${operation}${cause instanceof Error ? `: ${cause.message}` : ''}`, { cause });
  }
}

export class StartupError extends ProxyError {}
