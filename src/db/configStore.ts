import fs from 'fs';
import path from 'path';
import {
  MEDIA_TYPES,
  type BotDataSnapshot,
  type MediaType,
  type RecurringItem,
  type TenantId,
  type TenantPolicy,
  type UrlButton,
} from '../types/config';
import { PersistenceError, errorMessage } from '../utils/errors';

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMediaType(value: unknown): value is MediaType {
  return MEDIA_TYPES.some((type) => type === value);
}

function normalizeButtons(value: unknown): UrlButton[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const buttons: UrlButton[] = [];
  for (const entry of value) {
    if (isRecord(entry) && typeof entry.label === 'string' && typeof entry.url === 'string') {
      buttons.push({ label: entry.label, url: entry.url });
    }
  }
  return buttons;
}

/**
 * Turn one stored item into a RecurringItem, filling defaults for missing fields.
 * Returns null for entries that cannot be broadcast at all.
 */
function normalizeItem(raw: unknown): RecurringItem | null {
  if (!isRecord(raw)) {
    return null;
  }
  const text = typeof raw.text === 'string' && raw.text.length > 0 ? raw.text : undefined;
  const hasMedia = typeof raw.media === 'string' && raw.media.length > 0 && isMediaType(raw.mediaType);
  if (!text && !hasMedia) {
    return null;
  }
  const interval = typeof raw.intervalMinutes === 'number' ? Math.floor(raw.intervalMinutes) : NaN;
  if (!Number.isFinite(interval)) {
    return null;
  }

  const item: RecurringItem = {
    buttons: normalizeButtons(raw.buttons),
    intervalMinutes: Math.max(1, interval),
    deletePrevious: raw.deletePrevious === true,
    pinMessage: raw.pinMessage === true,
    lastSentAt: typeof raw.lastSentAt === 'number' && raw.lastSentAt > 0 ? raw.lastSentAt : 0,
  };
  if (text) item.text = text;
  if (hasMedia && typeof raw.media === 'string' && isMediaType(raw.mediaType)) {
    item.media = raw.media;
    item.mediaType = raw.mediaType;
  }
  if (typeof raw.lastMessageId === 'number' && Number.isInteger(raw.lastMessageId)) {
    item.lastMessageId = raw.lastMessageId;
  }
  return item;
}

function sectionOf(document: UnknownRecord, key: keyof BotDataSnapshot): UnknownRecord {
  const section = document[key];
  return isRecord(section) ? section : {};
}

/**
 * Durable per-group configuration, persisted as one JSON document.
 *
 * Every mutator is a synchronous read-modify-flush section, so on the single
 * event loop no two mutations can interleave. Mutators that change nothing do
 * not flush.
 */
export class ConfigStore {
  private recurringMessages = new Map<TenantId, RecurringItem[]>();
  private bannedWords = new Map<TenantId, string[]>();
  private blockLinks = new Map<TenantId, boolean>();
  private blockMentions = new Map<TenantId, boolean>();
  private autoReplies = new Map<TenantId, Map<string, string>>();

  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Read the snapshot. A missing file starts an empty configuration; an
   * unreadable or malformed one is a PersistenceError.
   */
  load(): void {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        console.log(`[Store] No snapshot at ${this.filePath}, starting with empty configuration`);
        this.reset();
        return;
      }
      throw new PersistenceError(this.filePath, error);
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(this.filePath, error);
    }
    if (!isRecord(document)) {
      throw new PersistenceError(this.filePath, 'snapshot root is not an object');
    }

    this.reset();
    let dropped = 0;

    for (const [tenant, items] of Object.entries(sectionOf(document, 'recurringMessages'))) {
      if (!Array.isArray(items)) continue;
      const normalized: RecurringItem[] = [];
      for (const entry of items) {
        const item = normalizeItem(entry);
        if (item) {
          normalized.push(item);
        } else {
          dropped++;
        }
      }
      this.recurringMessages.set(tenant, normalized);
    }

    for (const [tenant, words] of Object.entries(sectionOf(document, 'bannedWords'))) {
      if (!Array.isArray(words)) continue;
      const unique: string[] = [];
      for (const word of words) {
        if (typeof word !== 'string') continue;
        const lower = word.toLowerCase();
        if (lower && !unique.includes(lower)) unique.push(lower);
      }
      this.bannedWords.set(tenant, unique);
    }

    for (const [tenant, enabled] of Object.entries(sectionOf(document, 'blockLinks'))) {
      this.blockLinks.set(tenant, enabled === true);
    }
    for (const [tenant, enabled] of Object.entries(sectionOf(document, 'blockMentions'))) {
      this.blockMentions.set(tenant, enabled === true);
    }

    const replyOrder = sectionOf(document, 'autoReplyOrder');
    for (const [tenant, replies] of Object.entries(sectionOf(document, 'autoReplies'))) {
      if (!isRecord(replies)) continue;
      const order = replyOrder[tenant];
      const triggers = Array.isArray(order) ? order.filter((t): t is string => typeof t === 'string') : [];
      for (const trigger of Object.keys(replies)) {
        if (!triggers.includes(trigger)) triggers.push(trigger);
      }

      const map = new Map<string, string>();
      for (const trigger of triggers) {
        const reply = replies[trigger];
        if (typeof reply === 'string' && trigger) {
          map.set(trigger.toLowerCase(), reply);
        }
      }
      this.autoReplies.set(tenant, map);
    }

    if (dropped > 0) {
      console.warn(`[Store] Dropped ${dropped} recurring message(s) without text/media or interval`);
    }
    console.log(`[Store] Loaded configuration for ${this.listTenants().length} group(s) from ${this.filePath}`);
  }

  /**
   * Overwrite the snapshot. Written to a sibling temp file and renamed so a
   * crash mid-write leaves the previous document intact.
   */
  save(): void {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(this.toSnapshot(), null, 2), 'utf8');
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      const payload = {
        level: 'fatal',
        source: 'ConfigStore',
        type: 'snapshot_flush_failed',
        filePath: this.filePath,
        errorMessage: errorMessage(error),
        timestamp: new Date().toISOString(),
      };
      console.error('[Store] Failed to flush configuration:', JSON.stringify(payload));
      throw new PersistenceError(this.filePath, error);
    }
  }

  toSnapshot(): BotDataSnapshot {
    const autoReplies: BotDataSnapshot['autoReplies'] = {};
    const autoReplyOrder: Record<TenantId, string[]> = {};
    for (const [tenant, map] of this.autoReplies) {
      autoReplies[tenant] = Object.fromEntries(map);
      autoReplyOrder[tenant] = [...map.keys()];
    }
    return {
      recurringMessages: Object.fromEntries(this.recurringMessages),
      bannedWords: Object.fromEntries(this.bannedWords),
      blockLinks: Object.fromEntries(this.blockLinks),
      blockMentions: Object.fromEntries(this.blockMentions),
      autoReplies,
      autoReplyOrder,
    };
  }

  /** Every tenant that appears in any section, in first-seen order. */
  listTenants(): TenantId[] {
    const tenants = new Set<TenantId>();
    for (const map of [this.recurringMessages, this.bannedWords, this.blockLinks, this.blockMentions, this.autoReplies]) {
      for (const tenant of map.keys()) tenants.add(tenant);
    }
    return [...tenants];
  }

  // Recurring messages

  listRecurringTenants(): TenantId[] {
    return [...this.recurringMessages.entries()]
      .filter(([, items]) => items.length > 0)
      .map(([tenant]) => tenant);
  }

  getRecurringItems(tenant: TenantId): readonly Readonly<RecurringItem>[] {
    return this.recurringMessages.get(tenant) ?? [];
  }

  addRecurringItem(tenant: TenantId, item: RecurringItem): void {
    const items = this.recurringMessages.get(tenant) ?? [];
    items.push(item);
    this.recurringMessages.set(tenant, items);
    this.save();
  }

  /** Out-of-range index is a no-op. */
  removeRecurringItem(tenant: TenantId, index: number): boolean {
    const items = this.recurringMessages.get(tenant);
    if (!items || !Number.isInteger(index) || index < 0 || index >= items.length) {
      return false;
    }
    items.splice(index, 1);
    this.save();
    return true;
  }

  /**
   * Scheduler bookkeeping after a successful send. The item is matched by
   * identity; if it was removed while the send was in flight nothing is written.
   */
  recordDelivery(tenant: TenantId, item: Readonly<RecurringItem>, sentAt: number, messageId?: number): boolean {
    const items = this.recurringMessages.get(tenant);
    const target = items?.find((candidate) => candidate === item);
    if (!target) {
      return false;
    }
    target.lastSentAt = sentAt;
    if (messageId !== undefined) {
      target.lastMessageId = messageId;
    }
    this.save();
    return true;
  }

  // Banned words

  getBannedWords(tenant: TenantId): readonly string[] {
    return this.bannedWords.get(tenant) ?? [];
  }

  /** Stored lower-cased; adding an existing word is a no-op. */
  addBannedWord(tenant: TenantId, word: string): boolean {
    const lower = word.trim().toLowerCase();
    if (!lower) {
      return false;
    }
    const words = this.bannedWords.get(tenant) ?? [];
    if (words.includes(lower)) {
      return false;
    }
    words.push(lower);
    this.bannedWords.set(tenant, words);
    this.save();
    return true;
  }

  removeBannedWord(tenant: TenantId, word: string): boolean {
    const words = this.bannedWords.get(tenant);
    if (!words) {
      return false;
    }
    const lower = word.trim().toLowerCase();
    const remaining = words.filter((w) => w !== lower);
    if (remaining.length === words.length) {
      return false;
    }
    this.bannedWords.set(tenant, remaining);
    this.save();
    return true;
  }

  // Link / mention blocking

  getBlockLinks(tenant: TenantId): boolean {
    return this.blockLinks.get(tenant) ?? false;
  }

  setBlockLinks(tenant: TenantId, enabled: boolean): void {
    this.blockLinks.set(tenant, enabled);
    this.save();
  }

  getBlockMentions(tenant: TenantId): boolean {
    return this.blockMentions.get(tenant) ?? false;
  }

  setBlockMentions(tenant: TenantId, enabled: boolean): void {
    this.blockMentions.set(tenant, enabled);
    this.save();
  }

  // Auto replies

  getAutoReplies(tenant: TenantId): ReadonlyMap<string, string> {
    return this.autoReplies.get(tenant) ?? new Map<string, string>();
  }

  /** Re-adding a trigger replaces its reply and keeps its position. */
  addAutoReply(tenant: TenantId, trigger: string, reply: string): boolean {
    const key = trigger.trim().toLowerCase();
    if (!key) {
      return false;
    }
    const replies = this.autoReplies.get(tenant) ?? new Map<string, string>();
    replies.set(key, reply);
    this.autoReplies.set(tenant, replies);
    this.save();
    return true;
  }

  removeAutoReply(tenant: TenantId, trigger: string): boolean {
    const replies = this.autoReplies.get(tenant);
    if (!replies || !replies.delete(trigger.trim().toLowerCase())) {
      return false;
    }
    this.save();
    return true;
  }

  /** Snapshot of one group's filters for the moderation pipeline. */
  getPolicy(tenant: TenantId): TenantPolicy {
    return {
      bannedWords: this.getBannedWords(tenant),
      blockLinks: this.getBlockLinks(tenant),
      blockMentions: this.getBlockMentions(tenant),
      autoReplies: this.getAutoReplies(tenant),
    };
  }

  private reset(): void {
    this.recurringMessages.clear();
    this.bannedWords.clear();
    this.blockLinks.clear();
    this.blockMentions.clear();
    this.autoReplies.clear();
  }
}
