/**
 * Direct transport errors. Anything raised here is recoverable by falling
 * back to the mediated transport.
 */

export class TunnelError extends Error {
  override readonly name: string = 'TunnelError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, TunnelError.prototype);
  }
}

export class TunnelNotAvailableError extends TunnelError {
  override readonly name: string = 'TunnelNotAvailableError';

  constructor(message = "No bridge configured. Run 'bridgeline tunnel add <name> <url>' first.") {
    super(message);
    Object.setPrototypeOf(this, TunnelNotAvailableError.prototype);
  }
}

export class BridgeNotFoundError extends TunnelError {
  override readonly name: string = 'BridgeNotFoundError';

  constructor(readonly bridgeName: string) {
    super(`Bridge '${bridgeName}' not found`);
    Object.setPrototypeOf(this, BridgeNotFoundError.prototype);
  }
}
