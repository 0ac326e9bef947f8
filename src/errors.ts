export type LocalErrorKind =
  | "NotFound"
  | "DuplicatePending"
  | "LineageUnresolved"
  | "InvalidState"
  | "Conflict"
  | "IOFailure"
  | "InvalidInput";

export type RemoteErrorKind = "RemoteUnavailable" | "AuthRejected" | "RemoteConflict";

export type ErrorKind = LocalErrorKind | RemoteErrorKind;

const REMOTE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  "RemoteUnavailable",
  "AuthRejected",
  "RemoteConflict",
]);

export class CurationError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.details = details;
    this.name = "CurationError";
  }

  get remote() {
    return REMOTE_KINDS.has(this.kind);
  }
}

export function isCurationError(error: unknown, kind?: ErrorKind): error is CurationError {
  if (!(error instanceof CurationError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Wraps a raw storage failure so callers only ever see the taxonomy. */
export function toIOFailure(error: unknown, message: string, details?: Record<string, unknown>) {
  if (error instanceof CurationError) {
    return error;
  }
  return new CurationError("IOFailure", `${message}: ${errorMessage(error)}`, details, { cause: error });
}
