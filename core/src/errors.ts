/**
 * Structured errors shared by the client, the agent and the in-process registry.
 *
 * ManagementError is what callers of the public API see. RegistryError is raised
 * by a registry (local or remote) and is translated by the layer above it.
 */

export type ManagementErrorCode =
  | "INVALID_ARGUMENT"
  | "CONNECT_FAILED"
  | "OPERATION_FAILED";

export type RegistryErrorCode =
  | "INSTANCE_NOT_FOUND"
  | "INSTANCE_ALREADY_EXISTS"
  | "OPERATION_NOT_FOUND"
  | "INVOCATION_FAILED"
  | "INVALID_REQUEST"
  | "INVALID_RESPONSE"
  | "INTERNAL_ERROR";

const REGISTRY_ERROR_CODES: ReadonlySet<string> = new Set<RegistryErrorCode>([
  "INSTANCE_NOT_FOUND",
  "INSTANCE_ALREADY_EXISTS",
  "OPERATION_NOT_FOUND",
  "INVOCATION_FAILED",
  "INVALID_REQUEST",
  "INVALID_RESPONSE",
  "INTERNAL_ERROR",
]);

export function isRegistryErrorCode(code: string): code is RegistryErrorCode {
  return REGISTRY_ERROR_CODES.has(code);
}

/**
 * Error surfaced by every public operation.
 *
 * - INVALID_ARGUMENT: the caller-supplied shape is wrong; retrying will not help.
 * - CONNECT_FAILED: the endpoint was unreachable or rejected the credentials.
 * - OPERATION_FAILED: a registry operation failed; `cause` holds the underlying error.
 */
export class ManagementError extends Error {
  public readonly code: ManagementErrorCode;
  public readonly retryable: boolean;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: ManagementErrorCode;
    message: string;
    retryable?: boolean;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "ManagementError";
    this.code = args.code;
    this.retryable = args.retryable ?? false;
    this.details = args.details;
    this.cause = args.cause;
  }
}

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly details?: unknown;

  constructor(args: { code: RegistryErrorCode; message: string; details?: unknown }) {
    super(args.message);
    this.name = "RegistryError";
    this.code = args.code;
    this.details = args.details;
  }
}

export function isManagementError(err: unknown, code?: ManagementErrorCode): err is ManagementError {
  return err instanceof ManagementError && (code === undefined || err.code === code);
}

export function isRegistryError(err: unknown, code?: RegistryErrorCode): err is RegistryError {
  return err instanceof RegistryError && (code === undefined || err.code === code);
}

/** Message of an unknown thrown value, for log context and wrapped messages. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
