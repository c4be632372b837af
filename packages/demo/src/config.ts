/**
 * @fileoverview Demo Configuration
 *
 * @packageDocumentation
 * @module @scopelab/demo
 * @license Apache-2.0
 *
 * Configuration comes from environment variables only:
 *
 * | Variable | Values | Default |
 * |---|---|---|
 * | `SCOPELAB_LOG_LEVEL` | `fatal` `error` `warn` `info` `debug` `trace` `silent` | `info` |
 * | `SCOPELAB_VALIDATE_SCOPES` | `true` `false` `1` `0` | `true` |
 * | `SCOPELAB_EAGER_SINGLETONS` | `true` `false` `1` `0` | `false` |
 *
 * @version 1.0.0
 */

import { z } from 'zod';
import type { LevelWithSilent } from '@scopelab/core';

import { ConfigError } from './errors';

/** Parses a boolean flag, falling back when the variable is unset */
const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'], {
      errorMap: () => ({ message: 'Expected one of true, false, 1, 0' }),
    })
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

export const EnvSchema = z.object({
  SCOPELAB_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  SCOPELAB_VALIDATE_SCOPES: booleanFlag(true),
  SCOPELAB_EAGER_SINGLETONS: booleanFlag(false),
});

export interface DemoConfig {
  readonly logLevel: LevelWithSilent;
  readonly validateScopes: boolean;
  readonly eagerSingletons: boolean;
}

export const defaultConfig: DemoConfig = {
  logLevel: 'info',
  validateScopes: true,
  eagerSingletons: false,
};

/**
 * Load and validate configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        field: issue.path.join('.') || 'root',
        message: issue.message,
      })),
    );
  }

  return {
    logLevel: result.data.SCOPELAB_LOG_LEVEL,
    validateScopes: result.data.SCOPELAB_VALIDATE_SCOPES,
    eagerSingletons: result.data.SCOPELAB_EAGER_SINGLETONS,
  };
}
