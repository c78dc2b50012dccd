/**
 * Error thrown when a document fails validation before it is saved.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Configuration validation failed: ${message}`)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Error thrown when a document cannot be read for a reason other than
 * being absent or corrupted.
 */
export class ConfigReadError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(`Failed to read configuration: ${message}`)
    this.name = 'ConfigReadError'
    this.cause = cause
  }
}

/**
 * Error thrown when a document cannot be written.
 */
export class ConfigWriteError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(`Failed to write configuration: ${message}`)
    this.name = 'ConfigWriteError'
    this.cause = cause
  }
}

/**
 * Error thrown when a command needs the API but no key is configured.
 */
export class MissingApiKeyError extends Error {
  constructor() {
    super("API key not configured. Please run 'xa --set openai' first.")
    this.name = 'MissingApiKeyError'
  }
}

// Errors from Node's own modules may belong to another realm; match on shape.
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return 'Unknown error'
}

export function isNotFoundError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}
