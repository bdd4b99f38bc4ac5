export const EVENT_STUDY_ERROR_CODE = [
  "CONFIG_INVALID",
  "DATASET_FETCH_FAILED",
  "DATASET_REVISION_NOT_FOUND",
  "DATASET_SCHEMA_MISMATCH",
  "PRICE_FETCH_FAILED",
  "PRICE_SERIES_INVALID",
  "CACHE_CORRUPT",
  "CACHE_WRITE_FAILED",
  "ARTIFACT_WRITE_FAILED",
  "INVALID_DATE",
  "INVALID_WINDOW",
  "DATA_QUALITY",
  "UNEXPECTED",
] as const

export type EventStudyErrorCode = (typeof EVENT_STUDY_ERROR_CODE)[number]

export class EventStudyError extends Error {
  constructor(
    message: string,
    public readonly code: EventStudyErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = "EventStudyError"
  }

  static wrap(error: unknown, fallbackCode: EventStudyErrorCode = "UNEXPECTED"): EventStudyError {
    if (error instanceof EventStudyError) return error
    if (error instanceof Error) {
      return new EventStudyError(error.message, fallbackCode, {
        cause: error.name,
      })
    }
    return new EventStudyError(String(error), fallbackCode)
  }
}

export class ConfigError extends EventStudyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_INVALID", details)
    this.name = "ConfigError"
  }
}

export class DataSourceError extends EventStudyError {
  constructor(
    message: string,
    code: Extract<EventStudyErrorCode, "DATASET_FETCH_FAILED" | "DATASET_REVISION_NOT_FOUND" | "DATASET_SCHEMA_MISMATCH">,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details)
    this.name = "DataSourceError"
  }
}

export class PriceFetchError extends EventStudyError {
  constructor(
    message: string,
    public readonly ticker: string,
    public readonly benchmark = false,
    details?: Record<string, unknown>,
  ) {
    super(message, "PRICE_FETCH_FAILED", { ticker, benchmark, ...details })
    this.name = "PriceFetchError"
  }

  asBenchmark(): PriceFetchError {
    if (this.benchmark) return this
    return new PriceFetchError(
      `Benchmark ${this.ticker} is unavailable, abnormal returns cannot be computed: ${this.message}`,
      this.ticker,
      true,
      this.details,
    )
  }
}

export class PriceSeriesError extends EventStudyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "PRICE_SERIES_INVALID", details)
    this.name = "PriceSeriesError"
  }
}

export class CacheCorruptError extends EventStudyError {
  constructor(
    message: string,
    public readonly path: string,
    details?: Record<string, unknown>,
  ) {
    super(message, "CACHE_CORRUPT", { path, ...details })
    this.name = "CacheCorruptError"
  }
}

export class CacheWriteError extends EventStudyError {
  constructor(
    message: string,
    public readonly path: string,
    details?: Record<string, unknown>,
  ) {
    super(message, "CACHE_WRITE_FAILED", { path, ...details })
    this.name = "CacheWriteError"
  }
}

export class ArtifactWriteError extends EventStudyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "ARTIFACT_WRITE_FAILED", details)
    this.name = "ArtifactWriteError"
  }
}

export class InvalidDateError extends EventStudyError {
  constructor(field: string, value: unknown, details?: Record<string, unknown>) {
    super(`Invalid date in field ${field}: ${String(value)}`, "INVALID_DATE", details)
    this.name = "InvalidDateError"
  }
}

export class InvalidWindowError extends EventStudyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_WINDOW", details)
    this.name = "InvalidWindowError"
  }
}

/** Recorded rather than thrown; the run keeps going and reports counts. */
export class DataQualityWarning extends EventStudyError {
  constructor(
    message: string,
    public readonly category: string,
    details?: Record<string, unknown>,
  ) {
    super(message, "DATA_QUALITY", { category, ...details })
    this.name = "DataQualityWarning"
  }
}

export function errorMessage(error: unknown) {
  if (error instanceof Error) return error.message
  return String(error)
}
