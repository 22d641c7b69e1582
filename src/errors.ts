export interface ErrorOptions {
  cause?: unknown;
}

export class StopResolutionError extends Error {
  readonly service: string;

  constructor(service: string, message: string, options: ErrorOptions = {}) {
    super(message);
    this.name = 'StopResolutionError';
    this.service = service;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Credential configuration is missing or the token endpoint refused us. */
export class AuthError extends StopResolutionError {
  constructor(message: string, options: ErrorOptions = {}) {
    super('token', message, options);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends StopResolutionError {
  constructor(service: string, message: string, options: ErrorOptions = {}) {
    super(service, message, options);
    this.name = 'NotFoundError';
  }
}

export class MissingCodeError extends StopResolutionError {
  readonly stationId: string;

  constructor(stationId: string) {
    super('amenitiesInfo', `Station ${stationId} has no real-time location code`);
    this.name = 'MissingCodeError';
    this.stationId = stationId;
  }
}

/** Non-success status or a payload we cannot read. */
export class UpstreamError extends StopResolutionError {
  readonly status?: number;

  constructor(service: string, message: string, options: ErrorOptions & { status?: number } = {}) {
    super(service, message, options);
    this.name = 'UpstreamError';
    if (options.status !== undefined) {
      this.status = options.status;
    }
  }
}

/** Transport failure or timeout. */
export class NetworkError extends StopResolutionError {
  constructor(service: string, message: string, options: ErrorOptions = {}) {
    super(service, message, options);
    this.name = 'NetworkError';
  }
}

export class InvalidInputError extends StopResolutionError {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super('engine', message);
    this.name = 'InvalidInputError';
    if (details !== undefined) {
      this.details = details;
    }
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
