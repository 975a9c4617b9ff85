import type { ConfigStore } from '../db/configStore';
import { requireAdmin } from '../utils/adminGuard';
import { AuthorizationError, ValidationError } from '../utils/errors';
import type { ChatTransport } from './Transport';

/** Tokens accepted as "enable" by /setlinks and /setmentions */
export const TRUTHY_TOKENS = ['on', 'true', '1', 'yes', 'enable'];

const REPLY_PREVIEW_LENGTH = 50;

export const USAGE = {
  addword: '❌ Usage: `/addword <chat_id> <word>`\n\nExample: `/addword -1001234567890 scam`',
  delword: '❌ Usage: `/delword <chat_id> <word>`',
  listwords: '❌ Usage: `/listwords <chat_id>`',
  addreply: '❌ Usage: `/addreply <chat_id> <trigger> | <reply>`\n\nExample: `/addreply -1001234567890 hello | Welcome to our group!`',
  delreply: '❌ Usage: `/delreply <chat_id> <trigger>`',
  listreplies: '❌ Usage: `/listreplies <chat_id>`',
  setlinks: '❌ Usage: `/setlinks <chat_id> <on|off>`',
  setmentions: '❌ Usage: `/setmentions <chat_id> <on|off>`',
} as const;

export const NOT_ADMIN_TEXT = '⚠️ You must be admin in that group!';

export function isTruthyToken(token: string): boolean {
  return TRUTHY_TOKENS.includes(token.trim().toLowerCase());
}

function splitArgs(args: string): string[] {
  return args.trim().split(/\s+/).filter(Boolean);
}

function statusLabel(enabled: boolean): string {
  return enabled ? '🟢 ENABLED' : '🔴 DISABLED';
}

/**
 * Private-chat configuration commands. Each command re-verifies admin rights in
 * the target group through `requireAdmin` before reading or changing anything,
 * and resolves to the reply text (Markdown).
 */
export class AdminCommands {
  constructor(
    private readonly store: ConfigStore,
    private readonly transport: ChatTransport
  ) {}

  addWord(userId: number, args: string): Promise<string> {
    return this.run(USAGE.addword, async () => {
      const [rawChatId, ...rest] = splitArgs(args);
      const word = rest.join(' ');
      if (!rawChatId || !word) throw new ValidationError('missing arguments');
      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      const added = this.store.addBannedWord(chatId, word);
      return added
        ? `✅ Added banned word \`${word.toLowerCase()}\` to group \`${chatId}\``
        : `ℹ️ \`${word.toLowerCase()}\` is already banned in group \`${chatId}\``;
    });
  }

  delWord(userId: number, args: string): Promise<string> {
    return this.run(USAGE.delword, async () => {
      const [rawChatId, ...rest] = splitArgs(args);
      const word = rest.join(' ');
      if (!rawChatId || !word) throw new ValidationError('missing arguments');
      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      this.store.removeBannedWord(chatId, word);
      return `✅ Removed banned word \`${word.toLowerCase()}\` from group \`${chatId}\``;
    });
  }

  listWords(userId: number, args: string): Promise<string> {
    return this.run(USAGE.listwords, async () => {
      const [rawChatId] = splitArgs(args);
      if (!rawChatId) throw new ValidationError('missing arguments');
      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      const words = this.store.getBannedWords(chatId);
      if (words.length === 0) {
        return `No banned words for group \`${chatId}\``;
      }
      const lines = words.map((word, i) => `${i + 1}. \`${word}\``);
      return `🚫 *Banned words for* \`${chatId}\`:\n\n${lines.join('\n')}\n\n*Total: ${words.length} words*`;
    });
  }

  addReply(userId: number, args: string): Promise<string> {
    return this.run(USAGE.addreply, async () => {
      const trimmed = args.trim();
      const space = trimmed.search(/\s/);
      if (space === -1) throw new ValidationError('missing arguments');
      const rawChatId = trimmed.slice(0, space);
      const rest = trimmed.slice(space + 1);
      const separator = rest.indexOf('|');
      if (separator === -1) throw new ValidationError('missing | separator');
      const trigger = rest.slice(0, separator).trim();
      const reply = rest.slice(separator + 1).trim();
      if (!trigger || !reply) throw new ValidationError('empty trigger or reply');

      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      this.store.addAutoReply(chatId, trigger, reply);
      return `✅ Auto reply added to group \`${chatId}\`\n\n*Trigger:* \`${trigger.toLowerCase()}\`\n*Reply:* ${reply}`;
    });
  }

  delReply(userId: number, args: string): Promise<string> {
    return this.run(USAGE.delreply, async () => {
      const [rawChatId, ...rest] = splitArgs(args);
      const trigger = rest.join(' ');
      if (!rawChatId || !trigger) throw new ValidationError('missing arguments');
      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      const removed = this.store.removeAutoReply(chatId, trigger);
      return removed
        ? `✅ Auto reply \`${trigger.toLowerCase()}\` removed from group \`${chatId}\``
        : `ℹ️ No auto reply \`${trigger.toLowerCase()}\` in group \`${chatId}\``;
    });
  }

  listReplies(userId: number, args: string): Promise<string> {
    return this.run(USAGE.listreplies, async () => {
      const [rawChatId] = splitArgs(args);
      if (!rawChatId) throw new ValidationError('missing arguments');
      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      const replies = this.store.getAutoReplies(chatId);
      if (replies.size === 0) {
        return `No auto replies for group \`${chatId}\``;
      }
      const lines = [...replies].map(([trigger, reply], i) => {
        const preview = reply.length > REPLY_PREVIEW_LENGTH ? `${reply.slice(0, REPLY_PREVIEW_LENGTH)}...` : reply;
        return `${i + 1}. \`${trigger}\` → ${preview}`;
      });
      return `🤖 *Auto replies for* \`${chatId}\`:\n\n${lines.join('\n\n')}\n\n*Total: ${replies.size} replies*`;
    });
  }

  setLinks(userId: number, args: string): Promise<string> {
    return this.run(USAGE.setlinks, async () => {
      const [rawChatId, token] = splitArgs(args);
      if (!rawChatId || !token) throw new ValidationError('missing arguments');
      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      const enabled = isTruthyToken(token);
      this.store.setBlockLinks(chatId, enabled);
      return `🔗 Link blocking for \`${chatId}\`: ${statusLabel(enabled)}`;
    });
  }

  setMentions(userId: number, args: string): Promise<string> {
    return this.run(USAGE.setmentions, async () => {
      const [rawChatId, token] = splitArgs(args);
      if (!rawChatId || !token) throw new ValidationError('missing arguments');
      const chatId = await requireAdmin(this.transport, rawChatId, userId);
      const enabled = isTruthyToken(token);
      this.store.setBlockMentions(chatId, enabled);
      return `📢 Mention blocking for \`${chatId}\`: ${statusLabel(enabled)}`;
    });
  }

  private async run(usage: string, fn: () => Promise<string>): Promise<string> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AuthorizationError) {
        console.warn(`[Commands] ${error.message}`);
        return NOT_ADMIN_TEXT;
      }
      if (error instanceof ValidationError) {
        return usage;
      }
      throw error;
    }
  }
}
