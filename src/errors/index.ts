/**
 * Structured error types for the telemetry layer.
 * Setup and teardown operations return typed responses instead of throwing,
 * so callers can branch on an error code.
 *
 * Follows the discriminated union pattern: `success` is the discriminant,
 * `error` carries a closed code and `cause` keeps the underlying failure.
 */

// -----------------------------------------------------------------------------
// Error Codes
// -----------------------------------------------------------------------------

/**
 * Error codes for telemetry operations.
 */
export type TelemetryErrorCode =
  | 'INVALID_CONFIG' // Configuration rejected by validation
  | 'INITIALIZATION_FAILED' // A backend could not be constructed
  | 'SHUTDOWN_FAILED' // At least one shutdown callback failed
  | 'NOT_INITIALIZED' // Provider missing or already shut down
  | 'STREAM_ABANDONED' // Stream consumer stopped before the end
  | 'UNKNOWN'; // Unexpected errors

// -----------------------------------------------------------------------------
// Response Types
// -----------------------------------------------------------------------------

/**
 * Success response from a telemetry operation.
 */
export interface TelemetrySuccessResponse<T = void> {
  success: true;
  result: T;
  message: string;
}

/**
 * Error response from a telemetry operation.
 */
export interface TelemetryErrorResponse {
  success: false;
  error: TelemetryErrorCode;
  message: string;
  /** Underlying failure, when there is one */
  cause?: unknown;
}

/**
 * Discriminated union for telemetry responses.
 */
export type TelemetryResponse<T = void> = TelemetrySuccessResponse<T> | TelemetryErrorResponse;

// -----------------------------------------------------------------------------
// Helper Functions
// -----------------------------------------------------------------------------

/**
 * Create a success response.
 *
 * @param result - The result data
 * @param message - Human-readable success message
 */
export function successResponse<T>(result: T, message: string): TelemetrySuccessResponse<T> {
  return { success: true, result, message };
}

/**
 * Create an error response.
 *
 * @param error - Error code from TelemetryErrorCode
 * @param message - Human-readable error message
 * @param cause - Optional underlying failure
 */
export function errorResponse(
  error: TelemetryErrorCode,
  message: string,
  cause?: unknown
): TelemetryErrorResponse {
  const response: TelemetryErrorResponse = { success: false, error, message };
  if (cause !== undefined) {
    response.cause = cause;
  }
  return response;
}

// -----------------------------------------------------------------------------
// Type Guards
// -----------------------------------------------------------------------------

/**
 * Type guard for success responses.
 */
export function isTelemetrySuccess<T>(
  response: TelemetryResponse<T>
): response is TelemetrySuccessResponse<T> {
  return response.success;
}

/**
 * Type guard for error responses.
 */
export function isTelemetryError(
  response: TelemetryResponse<unknown>
): response is TelemetryErrorResponse {
  return !response.success;
}

// -----------------------------------------------------------------------------
// Thrown Errors
// -----------------------------------------------------------------------------

/**
 * Error carrying a telemetry error code.
 * Used where an operation has no response channel, such as the
 * initialize-or-throw helper and errors recorded on spans.
 */
export class TelemetryError extends Error {
  readonly code: TelemetryErrorCode;

  constructor(code: TelemetryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TelemetryError';
    this.code = code;
  }

  /**
   * Build a TelemetryError from an error response.
   */
  static fromResponse(response: TelemetryErrorResponse): TelemetryError {
    return new TelemetryError(response.error, response.message, { cause: response.cause });
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Classify an unknown thrown value for the `error.type` attribute.
 * Errors report their name, anything else its typeof.
 */
export function getErrorType(error: unknown): string {
  if (error instanceof Error) return error.name;
  return typeof error;
}
