/**
 * HTTP Error Rendering
 * Short, single-line details for failed backend calls
 */

import axios from 'axios';
import { z } from 'zod';
import { ErrorFactory } from '@switchboard/sdk';

// The error body shapes the supported backends use
const ErrorBodySchema = z.union([
  z.object({ error: z.object({ message: z.string() }) }).transform((body) => body.error.message),
  z.object({ error: z.string() }).transform((body) => body.error),
  z
    .object({ errors: z.array(z.object({ message: z.string() })).min(1) })
    .transform((body) => body.errors[0].message),
  z.object({ errorMessage: z.string() }).transform((body) => body.errorMessage),
  z.object({ message: z.string() }).transform((body) => body.message)
]);

export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const body = ErrorBodySchema.safeParse(error.response?.data);
    const detail = body.success ? body.data : error.message;
    return status ? `HTTP ${status}: ${detail}` : detail;
  }
  return ErrorFactory.messageOf(error);
}
