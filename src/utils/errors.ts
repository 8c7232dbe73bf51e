export const ERROR_CODES = {
  INPUT_VALIDATION: "INPUT_VALIDATION",
  PLATFORM_MECHANISM: "PLATFORM_MECHANISM",
  INITIALIZATION: "INITIALIZATION",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class DnspeedError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DnspeedError";
    this.code = code;
  }
}

export class InputValidationError extends DnspeedError {
  constructor(message: string) {
    super(ERROR_CODES.INPUT_VALIDATION, message);
    this.name = "InputValidationError";
  }
}

export type PlatformFailureKind =
  | "mechanism-unavailable"
  | "permission-denied"
  | "invocation-failed"
  | "no-candidate";

export class PlatformMechanismError extends DnspeedError {
  readonly kind: PlatformFailureKind;

  constructor(kind: PlatformFailureKind, message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.PLATFORM_MECHANISM, message, options);
    this.name = "PlatformMechanismError";
    this.kind = kind;
  }
}

export class InitializationError extends DnspeedError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.INITIALIZATION, message, options);
    this.name = "InitializationError";
  }
}

/** Message text of anything thrown, without the stack. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}

/** True for spawn failures where the executable itself is missing. */
export function isMissingExecutable(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
