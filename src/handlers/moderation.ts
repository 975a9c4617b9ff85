import type { Bot, Context } from 'grammy';
import { toTenantId } from '../utils/chatId';
import type { BotServices } from './index';

type IncomingMessage = Pick<NonNullable<Context['message']>, 'text' | 'caption' | 'entities'>;

/**
 * Text the filters look at, or null for a bot command. Only a `bot_command`
 * entity at offset 0 marks a command; a leading "/" alone does not, and
 * captions are always checked.
 */
export function moderationBody(message: IncomingMessage): string | null {
  if (message.text !== undefined) {
    const first = message.entities?.[0];
    if (first?.type === 'bot_command' && first.offset === 0) {
      return null;
    }
    return message.text;
  }
  return message.caption ?? null;
}

export function registerModerationHandlers(bot: Bot, services: BotServices): void {
  const groupChats = bot.chatType(['group', 'supergroup']);

  groupChats.on(['message:text', 'message:caption'], async (ctx) => {
    const body = moderationBody(ctx.message);
    if (!ctx.from || body === null) {
      return;
    }
    const chatId = toTenantId(ctx.chat.id);
    if (chatId === null) {
      return;
    }

    await services.moderation.handleGroupMessage({
      chatId,
      messageId: ctx.message.message_id,
      senderId: ctx.from.id,
      body,
    });
  });
}
