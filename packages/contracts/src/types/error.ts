/**
 * What went wrong, for callers that branch on it. Cell access never
 * raises any of these: out-of-bounds reads are absent values and
 * out-of-bounds writes do nothing.
 */
export type CaveErrorCode =
  /** A configuration value or command line flag is unusable */
  | "CONFIG_INVALID"
  /** A grid was asked for with a non-positive or fractional size */
  | "DIMENSION_INVALID"
  /** A seed is not a 64-bit unsigned integer */
  | "SEED_INVALID"
  /** Interactive mode started without a terminal on stdin and stdout */
  | "TERMINAL_UNAVAILABLE";

type Details = Record<string, unknown>;

interface CaveErrorJSON {
  name: string;
  code: CaveErrorCode;
  message: string;
  details?: Details;
}

/**
 * @example
 * ```typescript
 * try {
 *   new Grid(0, 12);
 * } catch (error) {
 *   if (CaveError.isCaveError(error) && error.code === "DIMENSION_INVALID") {
 *     console.error(error.details); // { width: 0, height: 12 }
 *   }
 * }
 * ```
 */
export class CaveError extends Error {
  override readonly name = "CaveError";

  constructor(
    public readonly code: CaveErrorCode,
    message: string,
    public readonly details?: Details,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CaveError);
    }
  }

  static configInvalid(message: string, details?: Details): CaveError {
    return new CaveError("CONFIG_INVALID", message, details);
  }

  static dimensionInvalid(width: number, height: number): CaveError {
    return new CaveError(
      "DIMENSION_INVALID",
      `Invalid grid dimensions: ${width}x${height}`,
      { width, height },
    );
  }

  static seedInvalid(message: string, details?: Details): CaveError {
    return new CaveError("SEED_INVALID", message, details);
  }

  static terminalUnavailable(message: string): CaveError {
    return new CaveError("TERMINAL_UNAVAILABLE", message);
  }

  static isCaveError(error: unknown): error is CaveError {
    return error instanceof CaveError;
  }

  /** Plain object form; `details` only when present */
  toJSON(): CaveErrorJSON {
    const json: CaveErrorJSON = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.details !== undefined) json.details = this.details;
    return json;
  }
}
