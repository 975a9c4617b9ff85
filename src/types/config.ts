/**
 * Per-group configuration types shared by the store, moderation, wizard and scheduler.
 */

export type MediaType = 'photo' | 'video' | 'animation';

export const MEDIA_TYPES: readonly MediaType[] = ['photo', 'video', 'animation'];

export interface UrlButton {
  label: string;
  url: string;
}

/** Content of a broadcast as it is rendered in a chat (live or as preview). */
export interface BroadcastContent {
  text?: string;
  media?: string;
  mediaType?: MediaType;
  buttons: UrlButton[];
}

export interface RecurringItem extends BroadcastContent {
  intervalMinutes: number;
  deletePrevious: boolean;
  pinMessage: boolean;
  /** Epoch seconds, 0 = never sent */
  lastSentAt: number;
  lastMessageId?: number;
}

/** Tenant id = canonical string form of a group chat id ("-1001234567890"). */
export type TenantId = string;

/**
 * On-disk snapshot. Every section is keyed by tenant id; new sections must be
 * optional so older files still load.
 */
export interface BotDataSnapshot {
  recurringMessages: Record<TenantId, RecurringItem[]>;
  bannedWords: Record<TenantId, string[]>;
  blockLinks: Record<TenantId, boolean>;
  blockMentions: Record<TenantId, boolean>;
  autoReplies: Record<TenantId, Record<string, string>>;
  /** Trigger order per tenant; JSON objects put integer-like keys first. */
  autoReplyOrder?: Record<TenantId, string[]>;
}

/** Read-only view of one tenant, as consumed by the moderation pipeline. */
export interface TenantPolicy {
  bannedWords: readonly string[];
  blockLinks: boolean;
  blockMentions: boolean;
  autoReplies: ReadonlyMap<string, string>;
}
