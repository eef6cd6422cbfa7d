/**
 * Error taxonomy for the relay engine
 */

export type RelayErrorCode =
  | 'CONFIG_INVALID'
  | 'UNKNOWN_LINK'
  | 'NO_PATH'
  | 'BUFFER_FULL';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed topology or parameters; raised before a run starts
 */
export class ConfigError extends RelayError {
  readonly code = 'CONFIG_INVALID';

  constructor(
    readonly field: string,
    message: string
  ) {
    super(`${field}: ${message}`);
  }
}

export class UnknownLinkError extends RelayError {
  readonly code = 'UNKNOWN_LINK';

  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super(`No link between ${from} and ${to}`);
  }
}

export class NoPathError extends RelayError {
  readonly code = 'NO_PATH';

  constructor(
    readonly source: string,
    readonly destination: string
  ) {
    super(`No route from ${source} to ${destination}`);
  }
}

export class BufferFullError extends RelayError {
  readonly code = 'BUFFER_FULL';

  constructor(
    readonly nodeId: string,
    readonly capacity: number
  ) {
    super(`Buffer at ${nodeId} is full (${capacity} bundles)`);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
