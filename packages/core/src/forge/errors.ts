/**
 * Forge error types
 */

export interface ForgeErrorOptions {
  statusCode?: number;
  url?: string;
  cause?: unknown;
}

/**
 * API failure or workflow error reported by the forge.
 */
export class ForgeError extends Error {
  override readonly name = 'ForgeError';
  readonly statusCode: number | undefined;
  readonly url: string | undefined;

  constructor(message: string, options: ForgeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.statusCode = options.statusCode;
    this.url = options.url;
    Object.setPrototypeOf(this, ForgeError.prototype);
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }

  get isAuthFailure(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}

/**
 * Missing or invalid forge credentials. Never retried.
 */
export class ForgeAuthError extends Error {
  override readonly name = 'ForgeAuthError';

  constructor(
    message: string,
    public readonly hint?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, ForgeAuthError.prototype);
  }
}

/**
 * A wait exceeded its deadline.
 */
export class TimeoutError extends Error {
  override readonly name = 'TimeoutError';

  constructor(
    message: string,
    public readonly subject: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}
