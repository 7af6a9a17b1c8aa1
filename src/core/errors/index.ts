import type { ZodError } from "zod";

export type ErrorType = "config" | "template" | "model_load" | "generation" | "cache_io";

/**
 * Base class for every error this project raises or logs.
 * `recoverable` errors are handled inside the pipeline; the rest abort the run.
 */
export abstract class CodescribeError extends Error {
  abstract readonly errorType: ErrorType;
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or unsupported configuration. Fatal for the invocation. */
export class ConfigError extends CodescribeError {
  readonly errorType: ErrorType = "config";
  readonly recoverable = false;

  static fromZod(what: string, error: ZodError): ConfigError {
    const issues = error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return new ConfigError(`Invalid ${what}: ${issues}`, { cause: error });
  }
}

/** Missing template for an entity kind, or a malformed template string. */
export class TemplateError extends ConfigError {
  override readonly errorType: ErrorType = "template";
}

/** Model artifact missing or inference runtime unavailable. Logged, never thrown. */
export class ModelLoadError extends CodescribeError {
  readonly errorType = "model_load" as const;
  readonly recoverable = true;

  constructor(
    readonly backend: string,
    details: string,
    options?: { cause?: unknown },
  ) {
    super(`${backend}: ${details}`, options);
  }
}

/** Backend failure during inference, context overflow included. */
export class GenerationError extends CodescribeError {
  readonly errorType = "generation" as const;
  readonly recoverable = true;
}

/** Read or write failure against the persisted response cache. Logged, never thrown. */
export class CacheIOError extends CodescribeError {
  readonly errorType = "cache_io" as const;
  readonly recoverable = true;

  constructor(
    readonly operation: "read" | "write",
    readonly file: string,
    options?: { cause?: unknown },
  ) {
    super(`Cache ${operation} failed for ${file}`, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
