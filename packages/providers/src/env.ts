/**
 * Environment Helpers
 * zod building blocks for reading provider settings out of process.env
 */

import { z } from 'zod';

export type Env = Readonly<Record<string, string | undefined>>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

/**
 * A variable that must be present and non-blank
 */
export function requiredEnv(message: string) {
  return z.preprocess(
    blankToUndefined,
    z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message)
  );
}

/**
 * A variable with a default used when it is unset or blank
 */
export function optionalEnv(fallback: string) {
  return z.preprocess(blankToUndefined, z.string().trim().default(fallback));
}

/**
 * Strip trailing slashes so paths can be appended with a single '/'
 */
export function baseUrl(value: string): string {
  return value.replace(/\/+$/, '');
}
