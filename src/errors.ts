/**
 * Errors thrown for invalid configuration.
 *
 * Everything that can go wrong while a crawl is running (fetch failures,
 * unparsable documents, field transform failures) is reported as data on
 * the result objects instead.
 */
import type { ZodError } from 'zod';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): ConfigError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new ConfigError(message, issues);
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Raised inside the crawl loop when work remains queued but no worker can
 * be started and none is running. The run stops with status `stalled`.
 */
export class CoordinatorError extends Error {
  readonly kind = 'queue_exhausted_without_progress';
  readonly pending: number;

  constructor(pending: number) {
    super(`Work queue still holds ${pending} target(s) but no progress is possible`);
    this.name = 'CoordinatorError';
    this.pending = pending;
  }
}
