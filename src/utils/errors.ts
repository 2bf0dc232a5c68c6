// Common error helpers with a compact, consistent user-facing format.

import type { Logger } from "./logger";

export const CODES = {
  bad_request: "bad_request",
  unauthenticated: "unauthenticated",
  unauthorized: "unauthorized",
  precondition_failed: "precondition_failed",
  dependency_failed: "dependency_failed",
  timeout: "timeout",
  internal: "internal",
} as const;

export type ErrorCode = (typeof CODES)[keyof typeof CODES];

export type ErrorOptions = {
  required?: string[] | string;
  next?: string;
  details?: unknown;
  traceId?: string;
};

export type AppError = Error & {
  code: ErrorCode;
  required?: string[];
  next?: string;
  details?: unknown;
  traceId?: string;
};

function toArray(val: string[] | string | undefined): string[] {
  if (!val) return [];
  return Array.isArray(val) ? val : [val];
}

export function messageOf(cause: unknown): string {
  if (typeof cause === "string") return cause;
  if (cause instanceof Error) return cause.message;
  if (cause && typeof cause === "object" && "message" in cause && typeof cause.message === "string") {
    return cause.message;
  }
  return String(cause);
}

// Reads an own property (code, name, cause…) from an arbitrary thrown value.
export function errorField(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object") return undefined;
  return Object.prototype.hasOwnProperty.call(value, key) ? Reflect.get(value, key) : undefined;
}

export function createError(code: ErrorCode = CODES.internal, cause?: unknown, opts: ErrorOptions = {}): AppError {
  const err: AppError = Object.assign(new Error(messageOf(cause)), { code });
  if (opts.required !== undefined) err.required = toArray(opts.required);
  if (opts.next !== undefined) err.next = opts.next;
  if (opts.details !== undefined) err.details = opts.details;
  if (opts.traceId !== undefined) err.traceId = opts.traceId;
  return err;
}

// Shortcuts
export const badRequest = (cause?: unknown, opts?: ErrorOptions) => createError(CODES.bad_request, cause, opts);
export const unauthenticated = (cause?: unknown, opts?: ErrorOptions) => createError(CODES.unauthenticated, cause, opts);
export const unauthorized = (cause?: unknown, opts?: ErrorOptions) => createError(CODES.unauthorized, cause, opts);
export const preconditionFailed = (cause?: unknown, opts?: ErrorOptions) => createError(CODES.precondition_failed, cause, opts);
export const dependencyFailed = (cause?: unknown, opts?: ErrorOptions) => createError(CODES.dependency_failed, cause, opts);
export const timeout = (cause?: unknown, opts?: ErrorOptions) => createError(CODES.timeout, cause, opts);
export const internal = (cause?: unknown, opts?: ErrorOptions) => createError(CODES.internal, cause, opts);

export function isAppError(err: unknown): err is AppError {
  return err instanceof Error && "code" in err && typeof err.code === "string" && err.code in CODES;
}

export function formatForUser(err: unknown): string {
  const cause = messageOf(err);
  const required = isAppError(err) && err.required && err.required.length ? err.required.join(", ") : "-";
  const next = isAppError(err) && err.next ? err.next : "Provide missing inputs or fix the cause, then retry.";
  return `Cause: ${cause}\nRequired Input: ${required}\nNext Action: ${next}`;
}

export function logWithDetails(logger: Logger, err: unknown) {
  if (!isAppError(err)) {
    logger.error(`Error details message=${messageOf(err)}`);
    return;
  }
  const base = {
    code: err.code,
    message: err.message,
    required: err.required,
    next: err.next,
    traceId: err.traceId,
  };
  logger.error(`Error details ${JSON.stringify(base)}`);
  if (err.details !== undefined) {
    logger.error(`Error extra details ${messageOf(err.details)}`);
  }
}
