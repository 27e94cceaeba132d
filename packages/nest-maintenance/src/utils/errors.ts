const PREFIX = '[nest-maintenance]';

/** Base class for every error raised by the maintenance package. */
export class MaintenanceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`${PREFIX} ${message}`, options);
    this.name = new.target.name;
  }
}

/** Invalid module configuration. Thrown while resolving options, never per request. */
export class MaintenanceConfigError extends MaintenanceError {}

/** Allow-list entry that is not a valid `address/prefix` range. */
export class MalformedRangeError extends MaintenanceError {
  constructor(
    readonly range: string,
    reason: string,
  ) {
    super(`invalid CIDR range '${range}': ${reason}`);
  }
}

/** Deny-uri entry that does not compile as a regular expression. */
export class MalformedPatternError extends MaintenanceError {
  constructor(
    readonly pattern: string,
    cause: unknown,
  ) {
    super(`invalid deny-uri pattern '${pattern}': ${describeError(cause)}`, { cause });
  }
}

/** Maintenance content could not be read. */
export class ContentReadError extends MaintenanceError {
  constructor(
    readonly filename: string,
    cause: unknown,
  ) {
    super(`could not read maintenance content ${filename}: ${describeError(cause)}`, { cause });
  }
}

/** Maintenance response could not be written. */
export class ResponseWriteError extends MaintenanceError {
  constructor(
    readonly filename: string,
    cause: unknown,
  ) {
    super(`could not serve maintenance content ${filename}: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
