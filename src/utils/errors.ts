export class BotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BotError';
  }
}

/** Malformed user input (chat id, interval, command arguments). Recovered locally. */
export class ValidationError extends BotError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A non-admin attempted a mutating action on a group. */
export class AuthorizationError extends BotError {
  readonly chatId: string;
  readonly userId: number;

  constructor(chatId: string, userId: number) {
    super(`user ${userId} is not an admin of chat ${chatId}`);
    this.name = 'AuthorizationError';
    this.chatId = chatId;
    this.userId = userId;
  }
}

/** Failure of a chat-platform call. Always non-fatal. */
export class TransportError extends BotError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? '' : String(cause);
    super(detail ? `${operation} failed: ${detail}` : `${operation} failed`, { cause });
    this.name = 'TransportError';
    this.operation = operation;
  }
}

/** The configuration snapshot could not be read or flushed. Fatal. */
export class PersistenceError extends BotError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`persistence failure on ${filePath}: ${detail}`, { cause });
    this.name = 'PersistenceError';
    this.filePath = filePath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
