import type { Api } from 'grammy';
import type { BroadcastContent } from '../types/config';
import { buildUrlKeyboard } from '../utils/buttons';
import { TransportError } from '../utils/errors';
import { withTimeout } from '../utils/timeout';

export type ChatRef = string | number;

export type MemberRole = 'admin' | 'member';

export interface SendTextOptions {
  replyToMessageId?: number;
  /** Defaults to true; set false for the plain-text retry. */
  markdown?: boolean;
}

/**
 * Everything the core needs from the chat platform. Every method rejects with
 * a TransportError; callers decide whether the failure matters.
 */
export interface ChatTransport {
  sendText(chatId: ChatRef, text: string, options?: SendTextOptions): Promise<number>;
  /** Text-only or media+caption with URL buttons; one platform call. Resolves to the new message id. */
  sendBroadcast(chatId: ChatRef, content: BroadcastContent): Promise<number>;
  deleteMessage(chatId: ChatRef, messageId: number): Promise<void>;
  pinMessage(chatId: ChatRef, messageId: number): Promise<void>;
  getMemberRole(chatId: ChatRef, userId: number): Promise<MemberRole>;
}

/**
 * True when the user is admin of the chat. A failed lookup counts as "not admin".
 */
export async function isChatAdmin(transport: ChatTransport, chatId: ChatRef, userId: number): Promise<boolean> {
  try {
    return (await transport.getMemberRole(chatId, userId)) === 'admin';
  } catch (error) {
    console.warn(`[Transport] Admin lookup failed for user ${userId} in chat ${chatId}:`, error instanceof Error ? error.message : error);
    return false;
  }
}

/**
 * ChatTransport over the grammy Bot API client. Each call is bounded by
 * `timeoutMs` so a hanging request cannot stall a scheduler tick.
 */
export class GrammyTransport implements ChatTransport {
  constructor(
    private readonly api: Api,
    private readonly timeoutMs: number
  ) {}

  async sendText(chatId: ChatRef, text: string, options: SendTextOptions = {}): Promise<number> {
    const message = await this.call('sendMessage', () =>
      this.api.sendMessage(chatId, text, {
        ...(options.markdown === false ? {} : { parse_mode: 'Markdown' as const }),
        ...(options.replyToMessageId !== undefined && {
          reply_parameters: { message_id: options.replyToMessageId },
        }),
      })
    );
    return message.message_id;
  }

  async sendBroadcast(chatId: ChatRef, content: BroadcastContent): Promise<number> {
    const reply_markup = buildUrlKeyboard(content.buttons);
    const media = content.media;

    if (media && content.mediaType) {
      const other = { caption: content.text, parse_mode: 'Markdown' as const, reply_markup };
      switch (content.mediaType) {
        case 'photo':
          return (await this.call('sendPhoto', () => this.api.sendPhoto(chatId, media, other))).message_id;
        case 'video':
          return (await this.call('sendVideo', () => this.api.sendVideo(chatId, media, other))).message_id;
        case 'animation':
          return (await this.call('sendAnimation', () => this.api.sendAnimation(chatId, media, other))).message_id;
      }
    }

    const text = content.text;
    if (!text) {
      throw new TransportError('sendMessage', 'broadcast has neither text nor media');
    }
    const message = await this.call('sendMessage', () =>
      this.api.sendMessage(chatId, text, { parse_mode: 'Markdown', reply_markup })
    );
    return message.message_id;
  }

  async deleteMessage(chatId: ChatRef, messageId: number): Promise<void> {
    await this.call('deleteMessage', () => this.api.deleteMessage(chatId, messageId));
  }

  async pinMessage(chatId: ChatRef, messageId: number): Promise<void> {
    await this.call('pinChatMessage', () =>
      this.api.pinChatMessage(chatId, messageId, { disable_notification: false })
    );
  }

  async getMemberRole(chatId: ChatRef, userId: number): Promise<MemberRole> {
    const member = await this.call('getChatMember', () => this.api.getChatMember(chatId, userId));
    return member.status === 'creator' || member.status === 'administrator' ? 'admin' : 'member';
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.timeoutMs, operation);
    } catch (error) {
      throw new TransportError(operation, error);
    }
  }
}
