/**
 * Base class for failures that abort a run. The job runner reports any of
 * these as a terminal error with `status: "error"`.
 */
export class JobError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobError';
  }
}

/**
 * Input file unreadable, empty, or missing a usable `close` column
 */
export class InputError extends JobError {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * Configuration missing or failing validation
 */
export class ConfigError extends JobError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
