// utils/errors/lobbyValidationError.ts
export interface ValidationIssue {
  code: string;
  message: string;
  path: PropertyKey[];
}

export class LobbyValidationError extends Error {
  constructor(
    message: string,
    public readonly details?: {
      issues?: ValidationIssue[];
      context?: Record<string, unknown>;
    },
  ) {
    super(message);
    this.name = 'LobbyValidationError';
  }

  /** `field: message` pairs for client-facing error payloads. */
  fieldErrors(): Array<{ field: string; message: string }> | null {
    return (
      this.details?.issues?.map((issue) => ({
        field: issue.path.map(String).join('.'),
        message: issue.message,
      })) ?? null
    );
  }
}
