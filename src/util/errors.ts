export class ExtendableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }

  get status(): number {
    return 500;
  }

  // external errors carry a message that is safe to send to the client
  get isExternal(): boolean {
    return false;
  }
}

export class MalformedMediaTypeError extends ExtendableError {
  constructor(readonly value: string, reason: string) {
    super(`malformed media type "${value}": ${reason}`);
  }

  get status(): number {
    return 400;
  }

  get isExternal(): boolean {
    return true;
  }
}

export class ContentTypeNotFoundError extends ExtendableError {
  constructor(readonly contentType: string) {
    super(`no transcoder registered for ${contentType}`);
  }

  get status(): number {
    return 415;
  }

  get isExternal(): boolean {
    return true;
  }
}

export class NoAcceptableTypeError extends ExtendableError {
  constructor(readonly accept: string) {
    super(`no registered content type satisfies "${accept}"`);
  }

  get status(): number {
    return 415;
  }

  get isExternal(): boolean {
    return true;
  }
}

export class DecodeError extends ExtendableError {
  get status(): number {
    return 400;
  }
}

/**
 * Raised while encoding when the value holds something no rule converts.
 * A fault of the producing code, never of the client.
 */
export class UnsupportedValueError extends TypeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }

  get status(): number {
    return 500;
  }

  get isExternal(): boolean {
    return false;
  }
}

export class HttpError extends ExtendableError {
  constructor(private readonly statusCode: number, message: string, readonly code: string, options?: ErrorOptions) {
    super(message, options);
  }

  get status(): number {
    return this.statusCode;
  }

  get isExternal(): boolean {
    return true;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export function toDecodeError(error: unknown, contentType: string): DecodeError {
  if (error instanceof DecodeError) return error;
  return new DecodeError(`failed to decode ${contentType} body: ${describeError(error)}`, { cause: error });
}
