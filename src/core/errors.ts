/**
 * Error definitions for etude-daily
 * Provides structured error hierarchy for aggregation, resolution and theming
 */

/** Base error class for all etude-daily errors */
export class EtudeError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'EtudeError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EtudeError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a fetch task or section registration is invalid */
export class TaskConfigError extends EtudeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TASK_CONFIG_ERROR', context)
    this.name = 'TaskConfigError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends EtudeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when the registered theme set is unusable */
export class ThemeConfigError extends EtudeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'THEME_CONFIG_ERROR', context)
    this.name = 'ThemeConfigError'
  }
}

/** Error thrown when a snapshot document does not have the expected shape */
export class SnapshotFormatError extends EtudeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SNAPSHOT_FORMAT_ERROR', context)
    this.name = 'SnapshotFormatError'
  }
}
