import type { output, ZodType } from 'zod';
import { LobbyValidationError } from '@utils/errors/lobbyValidationError.js';

/**
 * Parses `data` with `schema` or throws a {@link LobbyValidationError}
 * carrying the zod issues.
 */
export function validateMessage<S extends ZodType>(schema: S, data: unknown, operation: string): output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new LobbyValidationError(`Invalid ${operation} data`, {
      issues: parsed.error.issues.map((issue) => ({
        code: issue.code,
        message: issue.message,
        path: issue.path,
      })),
    });
  }
  return parsed.data;
}
