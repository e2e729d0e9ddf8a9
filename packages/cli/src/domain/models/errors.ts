export type LinkshelfErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "CAPACITY_EXCEEDED"
  | "ALREADY_TAGGED"
  | "DECODE"
  | "IO"
  | "OPEN_FAILED";

/**
 * Base class for every failure a command can surface. The top-level CLI
 * handler is the only place that turns one of these into an exit status.
 */
export class LinkshelfError extends Error {
  readonly code: LinkshelfErrorCode;
  readonly exitCode: number;

  constructor(
    code: LinkshelfErrorCode,
    message: string,
    exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ValidationError extends LinkshelfError {
  constructor(message: string) {
    super("VALIDATION", message, 2);
  }
}

export class NotFoundError extends LinkshelfError {
  constructor(message: string) {
    super("NOT_FOUND", message, 1);
  }
}

export class CapacityExceededError extends LinkshelfError {
  constructor(message: string) {
    super("CAPACITY_EXCEEDED", message, 1);
  }
}

export class AlreadyTaggedError extends LinkshelfError {
  constructor(message: string) {
    super("ALREADY_TAGGED", message, 1);
  }
}

export class DecodeError extends LinkshelfError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DECODE", message, 1, options);
  }
}

export class IOError extends LinkshelfError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IO", message, 1, options);
  }
}

export class OpenFailedError extends LinkshelfError {
  constructor(message: string) {
    super("OPEN_FAILED", message, 1);
  }
}

export function isLinkshelfError(error: unknown): error is LinkshelfError {
  return error instanceof LinkshelfError;
}
