/** Raised when a projection definition cannot be parsed by the projection library. */
export class InvalidProjectionError extends Error {
  readonly definition: string;

  constructor(definition: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : "";
    super(`Invalid projection definition "${definition}"${detail ? `: ${detail}` : ""}`);
    this.name = "InvalidProjectionError";
    this.definition = definition;
  }
}

/** Raised for axis options that can never produce a valid grid. */
export class GeoAxisConfigError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`${option}: ${message}`);
    this.name = "GeoAxisConfigError";
    this.option = option;
  }
}
