import type { ConfigStore } from '../db/configStore';
import type { TenantId, TenantPolicy } from '../types/config';
import { DelayedTasks } from '../utils/delayedTasks';
import { errorMessage } from '../utils/errors';
import { isChatAdmin, type ChatTransport } from './Transport';

export type ViolationReason = 'links' | 'mentions' | 'banned_word';

export interface ModerationDecision {
  /** Reply for the first matching trigger; applies to every sender. */
  autoReply: string | null;
  /** Deletion reason; always null for admins. */
  violation: ViolationReason | null;
}

export interface GroupMessage {
  chatId: TenantId;
  messageId: number;
  senderId: number;
  /** text or caption */
  body: string;
}

/** How long the "message deleted" notice stays in the chat */
export const WARNING_TTL_MS = 3000;

const URL_PATTERN = /https?:\/\/\S+/i;
const TELEGRAM_LINK_PATTERN = /t\.me\/|telegram\.me\/|telegram\.dog\//i;
const MENTION_PATTERN = /@[\p{L}\p{N}_]+/u;

const REASON_LABELS: Record<ViolationReason, string> = {
  links: '🔗 links',
  mentions: '📢 mentions',
  banned_word: '🚫 banned word',
};

export function containsLink(text: string): boolean {
  return URL_PATTERN.test(text) || TELEGRAM_LINK_PATTERN.test(text);
}

export function containsMention(text: string): boolean {
  return MENTION_PATTERN.test(text);
}

export function warningText(reason: ViolationReason): string {
  return `⚠️ Message deleted (${REASON_LABELS[reason]})`;
}

/**
 * Classify a message against a group's filters. Pure.
 *
 * Auto-reply: first trigger (insertion order) contained in the lower-cased body.
 * Violation (non-admins only), first hit wins: links, then mentions, then banned words.
 */
export function classifyMessage(body: string, policy: TenantPolicy, senderIsAdmin: boolean): ModerationDecision {
  const lower = body.toLowerCase();

  let autoReply: string | null = null;
  for (const [trigger, reply] of policy.autoReplies) {
    if (lower.includes(trigger)) {
      autoReply = reply;
      break;
    }
  }

  if (senderIsAdmin) {
    return { autoReply, violation: null };
  }

  let violation: ViolationReason | null = null;
  if (policy.blockLinks && containsLink(body)) {
    violation = 'links';
  } else if (policy.blockMentions && containsMention(body)) {
    violation = 'mentions';
  } else if (policy.bannedWords.some((word) => lower.includes(word))) {
    violation = 'banned_word';
  }

  return { autoReply, violation };
}

/**
 * Applies classification results to a group: sends auto-replies, deletes
 * offending messages and posts a warning that removes itself after WARNING_TTL_MS.
 * Platform failures are logged here and never reach the caller.
 */
export class ModerationService {
  constructor(
    private readonly store: ConfigStore,
    private readonly transport: ChatTransport,
    private readonly tasks: DelayedTasks = new DelayedTasks(),
    private readonly warningTtlMs: number = WARNING_TTL_MS
  ) {}

  async handleGroupMessage(message: GroupMessage): Promise<ModerationDecision> {
    const policy = this.store.getPolicy(message.chatId);
    let decision = classifyMessage(message.body, policy, false);

    // Role lookup costs an API call, so only pay for it when a filter matched.
    if (decision.violation && (await isChatAdmin(this.transport, message.chatId, message.senderId))) {
      decision = { ...decision, violation: null };
    }

    if (decision.autoReply !== null) {
      await this.sendAutoReply(message, decision.autoReply);
    }
    if (decision.violation) {
      await this.enforce(message, decision.violation);
    }
    return decision;
  }

  /** Cancel pending warning removals (shutdown). */
  stop(): void {
    this.tasks.cancelAll();
  }

  private async sendAutoReply(message: GroupMessage, reply: string): Promise<void> {
    try {
      await this.transport.sendText(message.chatId, reply, { replyToMessageId: message.messageId });
    } catch (error) {
      // Broken Markdown in the stored reply; retry as plain text.
      console.warn(`[Moderation] Auto-reply with Markdown failed in ${message.chatId}, retrying as plain text:`, errorMessage(error));
      try {
        await this.transport.sendText(message.chatId, reply, { replyToMessageId: message.messageId, markdown: false });
      } catch (retryError) {
        console.error(`[Moderation] Auto-reply failed in ${message.chatId}:`, errorMessage(retryError));
      }
    }
  }

  private async enforce(message: GroupMessage, reason: ViolationReason): Promise<void> {
    try {
      await this.transport.deleteMessage(message.chatId, message.messageId);
    } catch (error) {
      const payload = {
        level: 'error',
        source: 'ModerationService',
        type: 'delete_failed',
        chatId: message.chatId,
        messageId: message.messageId,
        reason,
        errorMessage: errorMessage(error),
        timestamp: new Date().toISOString(),
      };
      console.error('[Moderation] Could not delete message:', JSON.stringify(payload));
      return;
    }

    console.log(`[Moderation] Deleted message ${message.messageId} from user ${message.senderId} in ${message.chatId} (${reason})`);

    let warningId: number;
    try {
      warningId = await this.transport.sendText(message.chatId, warningText(reason), { markdown: false });
    } catch (error) {
      console.error(`[Moderation] Could not post warning in ${message.chatId}:`, errorMessage(error));
      return;
    }

    this.tasks.schedule(
      this.warningTtlMs,
      async () => {
        try {
          await this.transport.deleteMessage(message.chatId, warningId);
        } catch (error) {
          console.warn(`[Moderation] Could not remove warning ${warningId} in ${message.chatId}:`, errorMessage(error));
        }
      },
      `remove-warning:${message.chatId}:${warningId}`
    );
  }
}
