// =============================================================================
// AGENT TEST PLATFORM — Database Errors
//
// Every error carries a stable `code` that the HTTP error handler returns
// alongside the message. None of these are retried inside the db layer.
// =============================================================================

export type DatabaseErrorCode =
  | 'CONFIG_PARSE_ERROR'
  | 'UNSUPPORTED_SCHEME'
  | 'CONNECTION_UNAVAILABLE'
  | 'ACQUISITION_CANCELLED';

export abstract class DatabaseError extends Error {
  abstract readonly code: DatabaseErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The descriptor does not match `<scheme>://<user>:<password>@<host>:<port>/<database>`. */
export class ConfigParseError extends DatabaseError {
  readonly code = 'CONFIG_PARSE_ERROR';
}

export class UnsupportedSchemeError extends DatabaseError {
  readonly code = 'UNSUPPORTED_SCHEME';

  constructor(readonly scheme: string, message: string) {
    super(message);
  }
}

/** Endpoint unreachable, authentication rejected, or the pool is closed. */
export class ConnectionUnavailableError extends DatabaseError {
  readonly code = 'CONNECTION_UNAVAILABLE';
}

export class AcquisitionCancelledError extends DatabaseError {
  readonly code = 'ACQUISITION_CANCELLED';
}
