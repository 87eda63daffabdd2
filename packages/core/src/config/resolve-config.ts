/**
 * Configuration resolution backed by zod schemas.
 *
 * Every configurable component declares a `DEFAULT_*_CONFIG` object and a zod
 * schema. Partial overrides are spread over the defaults and the result is
 * validated before use.
 */

import type { z } from 'zod';
import { ConfigError } from '../errors/shard-stats-error.js';

/**
 * Validate a configuration value, throwing ConfigError with every zod issue.
 */
export function resolveConfig<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  input: unknown,
  name: string
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid ${name} configuration: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { config: name, issues }
    );
  }
  return result.data;
}

/**
 * Merge partial overrides onto defaults and validate the result.
 */
export function mergeConfig<Output extends object>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  defaults: Output,
  overrides: Partial<Output> | undefined,
  name: string
): Output {
  return resolveConfig(schema, { ...defaults, ...overrides }, name);
}
