import type { ConfigStore } from '../db/configStore';
import type { BroadcastContent, MediaType, RecurringItem, TenantId, UrlButton } from '../types/config';
import { parseButtonLines } from '../utils/buttons';
import { toTenantId } from '../utils/chatId';
import { AuthorizationError, ValidationError } from '../utils/errors';
import { isChatAdmin, type ChatTransport } from './Transport';

export type WizardStep =
  | 'awaiting_chat_id'
  | 'awaiting_text'
  | 'awaiting_media'
  | 'awaiting_buttons'
  | 'awaiting_delete_option'
  | 'awaiting_pin_option'
  | 'awaiting_interval'
  | 'preview';

export type WizardOption = 'delete_previous' | 'pin_message';

export interface WizardSession {
  step: WizardStep;
  chatId?: TenantId;
  text?: string;
  media?: string;
  mediaType?: MediaType;
  buttons: UrlButton[];
  intervalMinutes?: number;
  deletePrevious?: boolean;
  pinMessage?: boolean;
  startedAt: number;
  updatedAt: number;
}

export interface MediaInput {
  fileId: string;
  type: MediaType;
}

export type WizardOutcome =
  /** Moved to `step`; the handler shows that step's prompt. */
  | { status: 'advanced'; step: WizardStep }
  /** Step unchanged; `error` says why. */
  | { status: 'rejected'; step: WizardStep; error: ValidationError | AuthorizationError }
  /** Interval accepted; render `content` exactly as it would go live, then save/cancel. */
  | { status: 'preview'; step: 'preview'; content: BroadcastContent; session: Readonly<WizardSession> }
  | { status: 'saved'; chatId: TenantId; item: RecurringItem }
  /** No open session for this user (never started, cancelled, saved or expired). */
  | { status: 'no_session' };

const SKIP = 'skip';

function isSkip(input: string): boolean {
  return input.trim().toLowerCase() === SKIP;
}

/**
 * Per-user conversation that builds one recurring message field by field.
 *
 * Sessions live in memory only. Starting again overwrites an open session;
 * cancel is accepted from any step. Sessions idle longer than the TTL behave
 * as if they never existed.
 */
export class WizardService {
  private sessions = new Map<number, WizardSession>();

  constructor(
    private readonly store: ConfigStore,
    private readonly transport: ChatTransport,
    private readonly sessionTtlMs: number = 30 * 60 * 1000,
    private readonly now: () => number = Date.now
  ) {}

  start(userId: number): { step: WizardStep; replaced: boolean } {
    const replaced = this.getSession(userId) !== undefined;
    const timestamp = this.now();
    this.sessions.set(userId, {
      step: 'awaiting_chat_id',
      buttons: [],
      startedAt: timestamp,
      updatedAt: timestamp,
    });
    if (replaced) {
      console.log(`[Wizard] User ${userId} restarted the wizard, previous draft discarded`);
    }
    return { step: 'awaiting_chat_id', replaced };
  }

  /** Returns true when a session was open. */
  cancel(userId: number): boolean {
    const existed = this.getSession(userId) !== undefined;
    this.sessions.delete(userId);
    return existed;
  }

  getSession(userId: number): Readonly<WizardSession> | undefined {
    return this.active(userId);
  }

  /** Drop every idle session; returns how many were removed. */
  pruneExpired(): number {
    let removed = 0;
    for (const userId of [...this.sessions.keys()]) {
      if (this.getSession(userId) === undefined) removed++;
    }
    return removed;
  }

  async handleText(userId: number, input: string): Promise<WizardOutcome> {
    const session = this.active(userId);
    if (!session) {
      return { status: 'no_session' };
    }

    switch (session.step) {
      case 'awaiting_chat_id':
        return this.acceptChatId(userId, session, input);

      case 'awaiting_text':
        if (!isSkip(input)) {
          session.text = input;
        }
        return this.advance(session, 'awaiting_media');

      case 'awaiting_media':
        if (isSkip(input) && session.text) {
          return this.advance(session, 'awaiting_buttons');
        }
        return this.reject(
          session,
          new ValidationError(
            session.text
              ? 'Unsupported input. Send a photo, video or GIF, or "skip".'
              : 'Unsupported input. Send a photo, video or GIF (the message has no text, so media is required).'
          )
        );

      case 'awaiting_buttons':
        session.buttons = isSkip(input) ? [] : parseButtonLines(input);
        return this.advance(session, 'awaiting_delete_option');

      case 'awaiting_delete_option':
      case 'awaiting_pin_option':
        return this.reject(session, new ValidationError('Please choose one of the buttons above.'));

      case 'awaiting_interval':
        return this.acceptInterval(session, input);

      case 'preview':
        return this.reject(session, new ValidationError('Use the Save or Cancel button below the preview.'));
    }
  }

  handleMedia(userId: number, media: MediaInput): WizardOutcome {
    const session = this.active(userId);
    if (!session) {
      return { status: 'no_session' };
    }
    if (session.step !== 'awaiting_media') {
      return this.reject(session, new ValidationError('Media is not expected at this step.'));
    }
    session.media = media.fileId;
    session.mediaType = media.type;
    return this.advance(session, 'awaiting_buttons');
  }

  handleOption(userId: number, option: WizardOption, value: boolean): WizardOutcome {
    const draft = this.active(userId);
    if (!draft) {
      return { status: 'no_session' };
    }
    if (option === 'delete_previous' && draft.step === 'awaiting_delete_option') {
      draft.deletePrevious = value;
      return this.advance(draft, 'awaiting_pin_option');
    }
    if (option === 'pin_message' && draft.step === 'awaiting_pin_option') {
      draft.pinMessage = value;
      return this.advance(draft, 'awaiting_interval');
    }
    return this.reject(draft, new ValidationError('This option is not expected at this step.'));
  }

  /** Preview → persisted RecurringItem. Destroys the session on success. */
  save(userId: number): WizardOutcome {
    const session = this.active(userId);
    if (!session) {
      return { status: 'no_session' };
    }
    if (session.step !== 'preview' || !session.chatId || session.intervalMinutes === undefined) {
      return this.reject(session, new ValidationError('The message is not complete yet.'));
    }

    const item = toRecurringItem(session, session.intervalMinutes);
    if (!item.text && !item.media) {
      return this.reject(session, new ValidationError('A recurring message needs text or media.'));
    }

    this.store.addRecurringItem(session.chatId, item);
    this.sessions.delete(userId);
    console.log(`[Wizard] User ${userId} saved a recurring message for ${session.chatId} (every ${item.intervalMinutes} min)`);
    return { status: 'saved', chatId: session.chatId, item };
  }

  private async acceptChatId(userId: number, session: WizardSession, input: string): Promise<WizardOutcome> {
    const chatId = toTenantId(input);
    if (chatId === null) {
      return this.reject(session, new ValidationError('Invalid chat ID. Send a group chat ID like -1001234567890.'));
    }
    if (!(await isChatAdmin(this.transport, chatId, userId))) {
      return this.reject(session, new AuthorizationError(chatId, userId));
    }
    // The session may have been cancelled or replaced while the lookup was in flight.
    if (this.sessions.get(userId) !== session) {
      return { status: 'no_session' };
    }
    session.chatId = chatId;
    return this.advance(session, 'awaiting_text');
  }

  private acceptInterval(session: WizardSession, input: string): WizardOutcome {
    const trimmed = input.trim();
    const interval = /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : NaN;
    if (!Number.isSafeInteger(interval)) {
      return this.reject(session, new ValidationError('Please send a valid number of minutes.'));
    }
    if (interval < 1) {
      return this.reject(session, new ValidationError('Interval must be at least 1 minute.'));
    }
    session.intervalMinutes = interval;
    session.step = 'preview';
    session.updatedAt = this.now();
    return { status: 'preview', step: 'preview', content: toContent(session), session };
  }

  private advance(session: WizardSession, step: WizardStep): WizardOutcome {
    session.step = step;
    session.updatedAt = this.now();
    return { status: 'advanced', step };
  }

  private reject(session: WizardSession, error: ValidationError | AuthorizationError): WizardOutcome {
    session.updatedAt = this.now();
    return { status: 'rejected', step: session.step, error };
  }

  private active(userId: number): WizardSession | undefined {
    const session = this.sessions.get(userId);
    if (session && this.now() - session.updatedAt > this.sessionTtlMs) {
      this.sessions.delete(userId);
      console.log(`[Wizard] Session of user ${userId} expired at step ${session.step}`);
      return undefined;
    }
    return session;
  }
}

function toContent(session: Readonly<WizardSession>): BroadcastContent {
  const content: BroadcastContent = { buttons: session.buttons.map((button) => ({ ...button })) };
  if (session.text !== undefined) content.text = session.text;
  if (session.media !== undefined && session.mediaType !== undefined) {
    content.media = session.media;
    content.mediaType = session.mediaType;
  }
  return content;
}

function toRecurringItem(session: Readonly<WizardSession>, intervalMinutes: number): RecurringItem {
  return {
    ...toContent(session),
    intervalMinutes,
    deletePrevious: session.deletePrevious ?? false,
    pinMessage: session.pinMessage ?? false,
    lastSentAt: 0,
  };
}
