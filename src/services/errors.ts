/**
 * Service error definitions with serialization support for host transport.
 */

/**
 * Error codes for binary provisioning operations.
 */
export const PROVISIONING_ERROR_CODES = [
  "UNSUPPORTED_PLATFORM",
  "RELEASE_QUERY_FAILED",
  "NO_MATCHING_ASSET",
  "DOWNLOAD_FAILED",
  "BINARY_UNAVAILABLE",
] as const;

export type ProvisioningErrorCode = (typeof PROVISIONING_ERROR_CODES)[number];

/**
 * Error codes for filesystem operations.
 * UNKNOWN covers everything else (see FileSystemError.originalCode).
 */
export const FILE_SYSTEM_ERROR_CODES = [
  "ENOENT", // File/directory not found
  "EACCES", // Permission denied
  "EEXIST", // File/directory already exists
  "ENOTDIR", // Not a directory
  "EISDIR", // Is a directory (when file expected)
  "ENOTEMPTY", // Directory not empty
  "UNKNOWN",
] as const;

export type FileSystemErrorCode = (typeof FILE_SYSTEM_ERROR_CODES)[number];

export function isProvisioningErrorCode(value: unknown): value is ProvisioningErrorCode {
  return PROVISIONING_ERROR_CODES.some((code) => code === value);
}

export function isFileSystemErrorCode(value: unknown): value is FileSystemErrorCode {
  return FILE_SYSTEM_ERROR_CODES.some((code) => code === value);
}

/**
 * Serialized error format for handing errors across a process boundary.
 */
export interface SerializedError {
  readonly type: "provisioning" | "filesystem" | "config";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
  readonly status?: number;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error for transport.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }

  /**
   * Recreate the matching ServiceError subclass from its serialized form.
   *
   * @example
   * ```typescript
   * const error = ServiceError.fromJSON(payload);
   * if (error instanceof ProvisioningError && error.errorCode === "DOWNLOAD_FAILED") {
   *   scheduleRetry();
   * }
   * ```
   */
  static fromJSON(json: SerializedError): ServiceError {
    switch (json.type) {
      case "provisioning":
        return new ProvisioningError(
          json.message,
          isProvisioningErrorCode(json.code) ? json.code : "BINARY_UNAVAILABLE",
          json.status !== undefined ? { status: json.status } : {}
        );
      case "filesystem":
        return new FileSystemError(
          isFileSystemErrorCode(json.code) ? json.code : "UNKNOWN",
          json.path ?? "",
          json.message
        );
      case "config":
        return new ConfigError(json.message, json.code);
    }
  }
}

/**
 * Options for ProvisioningError.
 */
export interface ProvisioningErrorOptions {
  /** HTTP status of a failed download or release query */
  readonly status?: number;
  /** Underlying error */
  readonly cause?: unknown;
}

/**
 * Error from binary provisioning (platform, release lookup, download).
 */
export class ProvisioningError extends ServiceError {
  readonly type = "provisioning" as const;
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly errorCode: ProvisioningErrorCode,
    options: ProvisioningErrorOptions = {}
  ) {
    super(message, errorCode, options.cause);
    this.name = "ProvisioningError";
    this.status = options.status;
  }

  override toJSON(): SerializedError {
    const base = super.toJSON();
    return this.status !== undefined ? { ...base, status: this.status } : base;
  }
}

/**
 * Error from invalid configuration.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode, cause);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Type guard for a ProvisioningError, optionally of a specific code.
 */
export function isProvisioningError(
  error: unknown,
  code?: ProvisioningErrorCode
): error is ProvisioningError {
  return error instanceof ProvisioningError && (code === undefined || error.errorCode === code);
}

export { getErrorMessage } from "../shared/error-utils";
