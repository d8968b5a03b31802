/**
 * Standardized reporter error codes.
 * Every failure recorded in a run result carries one of these codes.
 */
export const ErrorCode = {
  CONFIG_INVALID: "CONFIG_INVALID",
  EXPORT_UNREADABLE: "EXPORT_UNREADABLE",
  WORKOUT_SOURCE_UNAVAILABLE: "WORKOUT_SOURCE_UNAVAILABLE",
  ARTIFACT_INVALID: "ARTIFACT_INVALID",
  ARTIFACT_WRITE_FAILED: "ARTIFACT_WRITE_FAILED",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class ReportError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: object;

  constructor(code: ErrorCodeType, message: string, details?: object) {
    super(message);
    this.name = "ReportError";
    this.code = code;
    if (details) this.details = details;
  }
}

/**
 * Standard failure shape:
 *   { error: string, code: string, details?: object }
 */
export type ErrorBody = { error: string; code: ErrorCodeType; details?: object };

export function toErrorBody(err: unknown, fallback: ErrorCodeType): ErrorBody {
  if (err instanceof ReportError) {
    const body: ErrorBody = { error: err.message, code: err.code };
    if (err.details) body.details = err.details;
    return body;
  }
  return { error: err instanceof Error ? err.message : String(err), code: fallback };
}
