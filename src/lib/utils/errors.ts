/**
 * Custom error types for ghostpad
 */

export class GhostpadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends GhostpadError {
  constructor(message: string = 'Configuration error') {
    super(message);
  }
}

export type CompletionFailureReason = 'timeout' | 'network' | 'auth' | 'http' | 'malformed';

export class CompletionError extends GhostpadError {
  constructor(
    public reason: CompletionFailureReason,
    message: string = 'Completion request failed'
  ) {
    super(message);
  }
}

export class FileError extends GhostpadError {
  constructor(
    public filePath: string,
    message: string = 'File operation failed'
  ) {
    super(message);
  }
}

export class CommandError extends GhostpadError {
  constructor(message: string = 'Unknown command') {
    super(message);
  }
}
