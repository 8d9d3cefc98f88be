export class DetectionServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Missing, unreadable or invalid configuration. Fatal at startup. */
export class ConfigError extends DetectionServiceError {}

/** The frame source could not deliver a frame for a camera. */
export class CaptureError extends DetectionServiceError {}

/** Model loading or inference failed. */
export class DetectorError extends DetectionServiceError {}

/** A frame could not be written to the output folder. */
export class PersistenceError extends DetectionServiceError {}

/** The broker connection or a publish failed. */
export class PublishError extends DetectionServiceError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error
      ? `${error.message}: ${error.cause.message}`
      : error.message
  }
  return String(error)
}
