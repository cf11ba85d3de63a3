/**
 * Error taxonomy.
 *
 * Model output that cannot be parsed is not an error here: it is returned as
 * a value by the response parser and becomes an informational issue.
 */

export class CodecriticError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid settings, detected before any request is made.
 */
export class ConfigurationError extends CodecriticError {}

/**
 * The remote model call failed. Never retried.
 */
export class TransportError extends CodecriticError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/**
 * A path handed to the analyzer could not be read as a file.
 */
export class ReviewFileError extends CodecriticError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/**
 * Read the numeric `status` that HTTP client errors (OpenAI, Octokit) carry.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}
