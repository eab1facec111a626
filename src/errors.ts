export class PatchwatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PatchwatchError';
  }
}

export class ConfigurationError extends PatchwatchError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class GitHubAPIError extends PatchwatchError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'GitHubAPIError';
  }
}

/**
 * Raised when a model call or its output is unusable. Always non-fatal:
 * callers fall back to the pattern-only review.
 */
export class AIError extends PatchwatchError {
  constructor(message: string) {
    super(message);
    this.name = 'AIError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Octokit request errors carry the HTTP status on `status`.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
