import type { JsonObject } from "./json.js";

export type ProvisionStage = "config" | "fingerprint" | "lookup" | "restore" | "build" | "pack";

export type ProvisionErrorCode =
  | "INVALID_CONFIG"
  | "SPEC_UNAVAILABLE"
  | "CACHE_READ_ERROR"
  | "CACHE_MISS"
  | "DOWNLOAD_FAILED"
  | "DEPENDENCY_RESOLUTION_FAILED"
  | "INSTALL_FAILED"
  | "UNPACK_FAILED"
  | "RELOCATION_FAILED"
  | "CACHE_COMMIT_FAILED";

/**
 * Base of every failure the provisioner reports. `stage` names where the pass stopped,
 * `retryable` says whether resubmitting the job instance unchanged could succeed.
 */
export abstract class ProvisionError extends Error {
  abstract readonly code: ProvisionErrorCode;
  abstract readonly stage: ProvisionStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return false;
  }
}

export class ConfigError extends ProvisionError {
  readonly code = "INVALID_CONFIG" as const;
  readonly stage = "config" as const;
}

export class SpecUnavailableError extends ProvisionError {
  readonly code = "SPEC_UNAVAILABLE" as const;
  readonly stage = "fingerprint" as const;
}

export class CacheReadError extends ProvisionError {
  readonly code = "CACHE_READ_ERROR" as const;
  readonly stage: "lookup" | "restore";
  readonly transient: boolean;

  constructor(message: string, options: { transient: boolean; stage?: "lookup" | "restore"; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.transient = options.transient;
    this.stage = options.stage ?? "restore";
  }

  override get retryable(): boolean {
    return this.transient;
  }
}

/** Not a failure on its own: the provisioner treats it as the build branch. */
export class CacheMissError extends ProvisionError {
  readonly code = "CACHE_MISS" as const;
  readonly stage = "restore" as const;
}

export class DownloadFailedError extends ProvisionError {
  readonly code = "DOWNLOAD_FAILED" as const;
  readonly stage = "build" as const;

  override get retryable(): boolean {
    return true;
  }
}

export class DependencyResolutionFailedError extends ProvisionError {
  readonly code = "DEPENDENCY_RESOLUTION_FAILED" as const;
  readonly stage = "build" as const;
}

export class InstallFailedError extends ProvisionError {
  readonly code = "INSTALL_FAILED" as const;
  readonly stage = "build" as const;
}

export class UnpackFailedError extends ProvisionError {
  readonly code = "UNPACK_FAILED" as const;
  readonly stage = "restore" as const;
}

export class RelocationFailedError extends ProvisionError {
  readonly code = "RELOCATION_FAILED" as const;
  readonly stage = "restore" as const;
}

export class CacheCommitFailedError extends ProvisionError {
  readonly code = "CACHE_COMMIT_FAILED" as const;
  readonly stage = "pack" as const;
}

const TRANSIENT_IO_CODES = new Set(["EIO", "EAGAIN", "EBUSY", "ETIMEDOUT", "ESTALE", "EINTR", "ENETDOWN", "ENETUNREACH"]);

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}

export function isTransientIoError(err: unknown): boolean {
  const code = errnoCode(err);
  return code !== undefined && TRANSIENT_IO_CODES.has(code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Any failure escaping a stage, as the typed error that stage reports. */
export function toProvisionError(stage: ProvisionStage, err: unknown): ProvisionError {
  if (err instanceof ProvisionError) return err;
  const message = errorMessage(err);
  switch (stage) {
    case "config":
      return new ConfigError(message, { cause: err });
    case "fingerprint":
      return new SpecUnavailableError(message, { cause: err });
    case "lookup":
      return new CacheReadError(message, { transient: isTransientIoError(err), stage: "lookup", cause: err });
    case "restore":
      return new UnpackFailedError(message, { cause: err });
    case "build":
      return new InstallFailedError(message, { cause: err });
    case "pack":
      return new CacheCommitFailedError(message, { cause: err });
  }
}

export function describeError(err: unknown): JsonObject {
  if (err instanceof ProvisionError) {
    const out: JsonObject = {
      code: err.code,
      stage: err.stage,
      message: err.message,
      retryable: err.retryable
    };
    if (err instanceof CacheReadError) out.transient = err.transient;
    if (err.cause !== undefined) out.cause = describeError(err.cause);
    return out;
  }
  if (err instanceof Error) {
    const out: JsonObject = { name: err.name, message: err.message };
    const code = errnoCode(err);
    if (code) out.errno = code;
    if (err.cause !== undefined) out.cause = describeError(err.cause);
    return out;
  }
  return { message: String(err) };
}
