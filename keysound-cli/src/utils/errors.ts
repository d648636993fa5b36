/**
 * Base soundboard error.
 */
export class SoundboardError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Unrecoverable configuration problem, such as an unusable key set.
 */
export class ConfigError extends SoundboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, details);
  }
}

export class ValidationError extends SoundboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
  }
}

/**
 * Raised by a player adapter when a handle cannot perform the requested call.
 */
export class PlaybackError extends SoundboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PLAYBACK_ERROR', message, details);
  }
}

export interface CLIError {
  success: false;
  error: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

/**
 * Exit code mapping:
 *   0 = Success
 *   1 = General / validation error
 *   3 = Configuration error
 */
export function toCLIError(err: unknown): { cliError: CLIError; exitCode: number } {
  if (err instanceof ConfigError) {
    return {
      cliError: createError('config_error', err.message, err.details, 'Check the key set and command key configuration'),
      exitCode: 3,
    };
  }
  if (err instanceof ValidationError) {
    return {
      cliError: createError('invalid_request', err.message, err.details, 'Check command arguments and try again'),
      exitCode: 1,
    };
  }
  if (err instanceof SoundboardError) {
    return { cliError: createError(err.code.toLowerCase(), err.message, err.details), exitCode: 1 };
  }
  if (err instanceof Error) {
    return {
      cliError: createError('unknown_error', err.message || 'An unexpected error occurred', { originalError: err.toString() }),
      exitCode: 1,
    };
  }
  return {
    cliError: createError('unknown_error', 'An unexpected error occurred', { originalError: String(err) }),
    exitCode: 1,
  };
}

export function createError(
  code: string,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): CLIError {
  return {
    success: false,
    error: code,
    message,
    details,
    suggestion
  };
}

export function handleError(err: unknown, json: boolean): never {
  const { cliError, exitCode } = toCLIError(err);

  if (json) {
    console.log(JSON.stringify(cliError, null, 2));
  } else {
    console.error(`\nError: ${cliError.message}`);
    if (cliError.details) {
      console.error(`   Details: ${JSON.stringify(cliError.details, null, 2)}`);
    }
    if (cliError.suggestion) {
      console.error(`   ${cliError.suggestion}`);
    }
    console.error('');
  }

  process.exit(exitCode);
}
