import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { output, ZodType } from 'zod';
import type { LobbyErrorCode } from '@types';
import { LobbyValidationError } from '@utils/errors/lobbyValidationError.js';
import { validateMessage } from '@utils/wsValidators.js';

const STATUS_BY_CODE: Record<LobbyErrorCode, number> = {
  NOT_FOUND: 404,
  ALREADY_MEMBER: 409,
  NOT_HOST: 403,
};

export function sendLobbyFailure(res: Response, failure: { code: LobbyErrorCode; message: string }) {
  return res.status(STATUS_BY_CODE[failure.code]).json({
    success: false,
    code: failure.code,
    error: failure.message,
  });
}

export function sendInvalidInput(res: Response, error: LobbyValidationError) {
  const details = error.fieldErrors();
  return res.status(400).json({
    success: false,
    code: 'INVALID_INPUT',
    error: details?.[0] ? `${details[0].field}: ${details[0].message}` : error.message,
    details,
  });
}

/** Parses request input; on failure answers 400 and returns `undefined`. */
export function parseInput<S extends ZodType>(
  res: Response,
  schema: S,
  data: unknown,
  operation: string,
): output<S> | undefined {
  try {
    return validateMessage(schema, data, operation);
  } catch (err) {
    if (err instanceof LobbyValidationError) {
      sendInvalidInput(res, err);
      return undefined;
    }
    throw err;
  }
}

/** Express 4 does not catch rejected handler promises; forward them to the error middleware. */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
