/**
 * Camera error codes
 */
export enum CameraErrorCode {
  // State machine misuse
  ALREADY_ACTIVE = "ALREADY_ACTIVE",
  NOT_ACTIVE = "NOT_ACTIVE",
  CONVERTING = "CONVERTING",
  STILL_RECORDING = "STILL_RECORDING",

  // Validation
  INVALID_CONFIG = "INVALID_CONFIG",
  NOT_FOUND = "NOT_FOUND",

  // Resource contention
  DEVICE_BUSY = "DEVICE_BUSY",
  UNAVAILABLE = "UNAVAILABLE",

  // Device and pipeline failures
  DEVICE_ERROR = "DEVICE_ERROR",
  FRAME_CAPTURE_ERROR = "FRAME_CAPTURE_ERROR",
  TRANSCODE_FAILED = "TRANSCODE_FAILED",

  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

export type CameraErrorKindT = "caller" | "system";

const ERROR_HTTP_STATUS: Record<CameraErrorCode, number> = {
  [CameraErrorCode.ALREADY_ACTIVE]: 409,
  [CameraErrorCode.NOT_ACTIVE]: 409,
  [CameraErrorCode.CONVERTING]: 409,
  [CameraErrorCode.STILL_RECORDING]: 409,
  [CameraErrorCode.INVALID_CONFIG]: 400,
  [CameraErrorCode.NOT_FOUND]: 404,
  [CameraErrorCode.DEVICE_BUSY]: 409,
  [CameraErrorCode.UNAVAILABLE]: 503,
  [CameraErrorCode.DEVICE_ERROR]: 500,
  [CameraErrorCode.FRAME_CAPTURE_ERROR]: 500,
  [CameraErrorCode.TRANSCODE_FAILED]: 500,
  [CameraErrorCode.UNKNOWN_ERROR]: 500,
};

/**
 * Camera error class with structured error information
 */
export class CameraError extends Error {
  public readonly code: CameraErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: CameraErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CameraError";
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * HTTP status the routing layer answers with
   */
  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code];
  }

  /**
   * Caller errors are rejected requests; system errors are internal faults.
   */
  get kind(): CameraErrorKindT {
    return this.httpStatus < 500 ? "caller" : "system";
  }

  /**
   * Convert to JSON-serializable object
   */
  toJSON(): {
    code: CameraErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export function isCameraError(
  error: unknown,
  code?: CameraErrorCode
): error is CameraError {
  if (!(error instanceof CameraError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Wrap any thrown value into a CameraError, keeping CameraErrors as-is.
 */
export function toCameraError(
  error: unknown,
  fallbackCode: CameraErrorCode = CameraErrorCode.UNKNOWN_ERROR
): CameraError {
  if (error instanceof CameraError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CameraError(fallbackCode, message || "Unknown error");
}

export function createAlreadyActiveError(): CameraError {
  return new CameraError(
    CameraErrorCode.ALREADY_ACTIVE,
    "Recording is already in progress. Stop the current recording first."
  );
}

export function createNotActiveError(): CameraError {
  return new CameraError(
    CameraErrorCode.NOT_ACTIVE,
    "No recording is in progress."
  );
}

/**
 * Device held by another mode
 */
export function createDeviceBusyError(
  heldBy: string,
  detail?: string
): CameraError {
  return new CameraError(
    CameraErrorCode.DEVICE_BUSY,
    detail
      ? `Camera is busy: ${detail}`
      : `Camera is busy: currently held by ${heldBy}.`,
    { heldBy }
  );
}

export function createUnavailableError(reason: string): CameraError {
  return new CameraError(
    CameraErrorCode.UNAVAILABLE,
    `Camera stream unavailable: ${reason}`,
    { reason }
  );
}

export function createInvalidConfigError(
  message: string,
  details?: Record<string, unknown>
): CameraError {
  return new CameraError(CameraErrorCode.INVALID_CONFIG, message, details);
}

export function createDeviceError(
  operation: string,
  originalError?: unknown
): CameraError {
  const reason =
    originalError instanceof Error
      ? originalError.message
      : originalError !== undefined
        ? String(originalError)
        : undefined;
  return new CameraError(
    CameraErrorCode.DEVICE_ERROR,
    reason
      ? `Camera ${operation} failed: ${reason}`
      : `Camera ${operation} failed`,
    { operation, ...(reason ? { originalError: reason } : {}) }
  );
}

export function createFrameCaptureError(originalError: unknown): CameraError {
  const reason =
    originalError instanceof Error ? originalError.message : String(originalError);
  return new CameraError(
    CameraErrorCode.FRAME_CAPTURE_ERROR,
    `Frame capture failed: ${reason}`
  );
}

export function createTranscodeFailedError(
  exitCode: number | null,
  detail: string
): CameraError {
  return new CameraError(
    CameraErrorCode.TRANSCODE_FAILED,
    `Transcoder exited with code ${exitCode ?? "unknown"}`,
    { exitCode, detail }
  );
}

export function createConvertingError(): CameraError {
  return new CameraError(
    CameraErrorCode.CONVERTING,
    "Video is converting, please wait."
  );
}

export function createStillRecordingError(): CameraError {
  return new CameraError(
    CameraErrorCode.STILL_RECORDING,
    "Recording is still in progress."
  );
}

export function createNotFoundError(what: string): CameraError {
  return new CameraError(CameraErrorCode.NOT_FOUND, `No ${what} available.`, {
    what,
  });
}
