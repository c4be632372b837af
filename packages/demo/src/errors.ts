/**
 * @fileoverview Demo Errors
 *
 * @packageDocumentation
 * @module @scopelab/demo
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

/**
 * Error thrown when an object is used before it is ready.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A single invalid configuration field.
 */
export interface ConfigIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Error thrown when configuration fails validation.
 *
 * @remarks
 * The message lists every invalid field as `FIELD: reason`, separated by `; `.
 */
export class ConfigError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    const details = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`Configuration validation failed: ${details}`);
    this.name = 'ConfigError';
    this.issues = issues;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}
