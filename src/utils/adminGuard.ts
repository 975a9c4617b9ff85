import type { ChatTransport } from '../services/Transport';
import { isChatAdmin } from '../services/Transport';
import type { TenantId } from '../types/config';
import { toTenantId } from './chatId';
import { AuthorizationError, ValidationError } from './errors';

/**
 * Guard for every mutating command: resolves the target group and checks that
 * the caller is admin there right now, wherever the command was issued.
 * Throws ValidationError for a malformed chat id, AuthorizationError otherwise.
 */
export async function requireAdmin(transport: ChatTransport, rawChatId: string, userId: number): Promise<TenantId> {
  const chatId = toTenantId(rawChatId);
  if (chatId === null) {
    throw new ValidationError(`Invalid chat ID: ${rawChatId}`);
  }
  if (!(await isChatAdmin(transport, chatId, userId))) {
    throw new AuthorizationError(chatId, userId);
  }
  return chatId;
}
