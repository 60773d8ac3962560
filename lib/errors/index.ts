/**
 * Custom error classes for the pipeline
 */

/**
 * Error thrown when a remote listing or file cannot be fetched
 */
export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number
  ) {
    super(message)
    this.name = 'DownloadError'
  }
}

export class NoRegistryFoundError extends Error {
  constructor(public readonly directoryUrl: string) {
    super(`No registry file found in ${directoryUrl}`)
    this.name = 'NoRegistryFoundError'
  }
}

export class RegistryFormatError extends Error {
  constructor(message: string, public readonly headers: string[]) {
    super(message)
    this.name = 'RegistryFormatError'
  }
}

export class ArchiveError extends Error {
  constructor(message: string, public readonly archiveUrl: string, public readonly cause?: Error) {
    super(message)
    this.name = 'ArchiveError'
  }
}

export class ValidationError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class CSVParsingError extends Error {
  constructor(message: string, public readonly filename?: string) {
    super(message)
    this.name = 'CSVParsingError'
  }
}

/**
 * Fatal condition: the run cannot produce a consistent output
 */
export class PipelineError extends Error {
  constructor(message: string, public readonly stage: 'retrieval' | 'transformation' | 'output') {
    super(message)
    this.name = 'PipelineError'
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Log error with context
 */
export function logError(error: Error, context?: Record<string, unknown>): void {
  console.error({
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    context,
    timestamp: new Date().toISOString(),
  })
}

/**
 * Format error message for user display
 */
export function formatUserError(error: Error): string {
  if (error instanceof ValidationError) {
    return `Validation failed: ${error.message}`
  }
  if (error instanceof DownloadError) {
    return `Download failed: ${error.message}${error.statusCode ? ` (HTTP ${error.statusCode})` : ''}`
  }
  if (error instanceof PipelineError) {
    return `Pipeline aborted during ${error.stage}: ${error.message}`
  }
  if (error instanceof CSVParsingError) {
    return `CSV parsing error: ${error.message}${error.filename ? ` in ${error.filename}` : ''}`
  }
  return `An error occurred: ${error.message}`
}
