// middleware/errorHandler.ts
import type { ClientConnection } from '@types';
import logger from '@logger';
import { LobbyValidationError } from '../utils/errors/lobbyValidationError.js';

export class ErrorHandler {
  /** Logs a failed realtime operation and tells the originating client what happened. */
  static reportWsError(
    error: unknown,
    context: {
      client: ClientConnection;
      operation: string;
      lobbyId?: string;
    },
  ) {
    const { client, operation, lobbyId } = context;
    const playerId = client.playerId;

    if (error instanceof LobbyValidationError) {
      logger.warn(`[VALIDATION_ERROR] ${operation}`, {
        lobbyId,
        playerId,
        message: error.message,
        details: error.details,
      });

      client.send({
        type: 'validation_error',
        message: error.message,
        operation,
        details: error.fieldErrors(),
      });
      return;
    }

    if (error instanceof Error) {
      logger.error(`[LOBBY_ERROR] ${operation}`, {
        lobbyId,
        playerId,
        error: error.message,
        stack: error.stack,
      });
    } else {
      logger.error(`[UNKNOWN_ERROR] ${operation}`, { lobbyId, playerId, error });
    }

    client.send({
      type: 'server_error',
      message: 'An unexpected error occurred',
      operation,
    });
  }
}
