export type StegoErrorCode =
  | "CONFIGURATION"
  | "CAPACITY_EXCEEDED"
  | "FRAME"
  | "CORRUPT_HEADER"
  | "SESSION_STATE";

export class StegoError extends Error {
  readonly code: StegoErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: StegoErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

/** Invalid margins, band set, step table or transform geometry. */
export class ConfigurationError extends StegoError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONFIGURATION", message, details);
  }
}

/** Framed payload does not fit; raised before any coefficient is written. */
export class CapacityExceededError extends StegoError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number) {
    super(
      "CAPACITY_EXCEEDED",
      `Payload too large: ${requested} bits requested, ${available} bits available`,
      { requested, available }
    );
    this.requested = requested;
    this.available = available;
  }
}

export class FrameError extends StegoError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("FRAME", message, details);
  }
}

export class CorruptHeaderError extends StegoError {
  readonly length: number;
  readonly limit: number;

  constructor(length: number, limit: number) {
    super("CORRUPT_HEADER", `Implausible payload length in header: ${length} (limit ${limit})`, {
      length,
      limit,
    });
    this.length = length;
    this.limit = limit;
  }
}

export class SessionStateError extends StegoError {
  constructor(message: string) {
    super("SESSION_STATE", message);
  }
}

export function isStegoError(value: unknown): value is StegoError {
  return value instanceof StegoError;
}
