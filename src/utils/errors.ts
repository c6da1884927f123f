export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly missing: string[],
  ) {
    super(message, 'CONFIG_ERROR', { missing });
    this.name = 'ConfigError';
  }
}

export class ProjectRootError extends AppError {
  constructor(message: string, startDir: string, options?: ErrorOptions) {
    super(message, 'PROJECT_ROOT_ERROR', { startDir }, options);
    this.name = 'ProjectRootError';
  }
}

export class LayoutError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LAYOUT_ERROR', details);
    this.name = 'LayoutError';
  }
}

/**
 * Raised when a scanned directory or one of its files cannot be read.
 * There is no per-file recovery: the whole run stops.
 */
export class ScanError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, 'IO_ERROR', { path }, options);
    this.name = 'ScanError';
  }
}

export class ArgumentError extends AppError {
  constructor(message: string) {
    super(message, 'ARGUMENT_ERROR');
    this.name = 'ArgumentError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
