export enum ProvisionErrorCode {
  PRECONDITION_FAILED = "PRECONDITION_FAILED",
  NETWORK_ERROR = "NETWORK_ERROR",
  PACKAGE_NOT_FOUND = "PACKAGE_NOT_FOUND",
  PACKAGE_CONFLICT = "PACKAGE_CONFLICT",
  RESOURCE_LOCKED = "RESOURCE_LOCKED",
  TIMEOUT = "TIMEOUT",
  CONFIG_WRITE_FAILED = "CONFIG_WRITE_FAILED",
  COMMAND_FAILED = "COMMAND_FAILED",
  CATALOG_INVALID = "CATALOG_INVALID",
}

/** Error categories used for classification and remediation hints. */
export type ErrorCategory =
  | "precondition"
  | "privilege"
  | "not_found"
  | "dependency"
  | "resource"
  | "lock"
  | "network"
  | "timeout"
  | "config"
  | "state";

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly category: ErrorCategory;
  readonly context?: Record<string, unknown>;

  constructor(code: ProvisionErrorCode, category: ErrorCategory, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
    this.category = category;
    this.context = context;
  }
}

/** Unsupported distro/release or missing privilege. Aborts before any step runs. */
export class PreconditionError extends ProvisionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ProvisionErrorCode.PRECONDITION_FAILED, "precondition", message, context);
    this.name = "PreconditionError";
  }
}

/** Index refresh, key download or repository fetch failed. */
export class TransientNetworkError extends ProvisionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ProvisionErrorCode.NETWORK_ERROR, "network", message, context);
    this.name = "TransientNetworkError";
  }
}

export class PackageNotFoundError extends ProvisionError {
  readonly packages: string[];

  constructor(packages: string[], message: string, context?: Record<string, unknown>) {
    super(ProvisionErrorCode.PACKAGE_NOT_FOUND, "not_found", message, { ...context, packages });
    this.name = "PackageNotFoundError";
    this.packages = packages;
  }
}

/** Install would violate a held/pinned constraint, or the package manager lock is taken. */
export class PackageConflictError extends ProvisionError {
  readonly packages: string[];

  constructor(packages: string[], message: string, options?: { locked?: boolean; context?: Record<string, unknown> }) {
    super(
      options?.locked ? ProvisionErrorCode.RESOURCE_LOCKED : ProvisionErrorCode.PACKAGE_CONFLICT,
      options?.locked ? "lock" : "dependency",
      message,
      { ...options?.context, packages },
    );
    this.name = "PackageConflictError";
    this.packages = packages;
  }
}

/** Bounded wait exceeded. Never retried within the same run. */
export class TimeoutError extends ProvisionError {
  readonly timeoutMs: number;

  /** `cause`: how the interrupted work ended, when it failed on the way out. */
  constructor(operation: string, timeoutMs: number, cause?: unknown) {
    super(
      ProvisionErrorCode.TIMEOUT,
      "timeout",
      `${operation} timed out after ${timeoutMs}ms`,
      cause === undefined ? { operation, timeoutMs } : { operation, timeoutMs, cause: describeError(cause) },
    );
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** A repository, pin or other configuration file could not be written. */
export class ConfigWriteError extends ProvisionError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(ProvisionErrorCode.CONFIG_WRITE_FAILED, "config", `Cannot write ${path}: ${describeError(cause)}`, { path });
    this.name = "ConfigWriteError";
    this.path = path;
  }
}

/** Any other non-zero exit from an external command. */
export class CommandError extends ProvisionError {
  readonly exitCode: number;

  constructor(command: string, exitCode: number, stderr: string, category: ErrorCategory = "state") {
    super(ProvisionErrorCode.COMMAND_FAILED, category, `Command exited with ${exitCode}: ${command}`, { stderr: stderr.trim() });
    this.name = "CommandError";
    this.exitCode = exitCode;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
