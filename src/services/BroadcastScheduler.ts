import * as cron from 'node-cron';
import type { ConfigStore } from '../db/configStore';
import type { RecurringItem, TenantId } from '../types/config';
import { PersistenceError, errorMessage } from '../utils/errors';
import type { ChatTransport } from './Transport';

/** Tick cadence, independent of any item's interval */
const TICK_CRON = '*/30 * * * * *';
/** First tick shortly after start so a restart catches up without waiting a full cadence */
const INITIAL_DELAY_MS = 10 * 1000;

export interface TickSummary {
  due: number;
  sent: number;
  failed: number;
}

export interface BroadcastSchedulerOptions {
  /** Epoch seconds */
  now?: () => number;
  /** Called when the snapshot cannot be flushed during a scheduled tick. Defaults to exiting the process. */
  onFatalError?: (error: PersistenceError) => void;
}

export function isDue(item: Readonly<RecurringItem>, now: number): boolean {
  return now - item.lastSentAt >= item.intervalMinutes * 60;
}

/**
 * Log a broadcast send failure with structured data for monitoring.
 * Does NOT advance lastSentAt: the item stays due and is retried on the next tick.
 */
function logSendError(chatId: TenantId, index: number, error: unknown): void {
  const errMsg = errorMessage(error);
  const payload = {
    level: 'error',
    source: 'BroadcastScheduler',
    type: 'broadcast_send_failed',
    chatId,
    itemIndex: index,
    errorMessage: errMsg,
    timestamp: new Date().toISOString(),
  };
  console.error('[Scheduler] Broadcast send failed:', JSON.stringify(payload));
}

export class BroadcastScheduler {
  private cronTasks: cron.ScheduledTask[] = [];
  private initialTimer: NodeJS.Timeout | null = null;
  private isRunning = false;
  private readonly now: () => number;
  private readonly onFatalError: (error: PersistenceError) => void;

  constructor(
    private readonly store: ConfigStore,
    private readonly transport: ChatTransport,
    options: BroadcastSchedulerOptions = {}
  ) {
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
    this.onFatalError =
      options.onFatalError ??
      ((error) => {
        console.error('[Scheduler] Fatal persistence failure, exiting:', error.message);
        process.exit(1);
      });
  }

  /**
   * One due-check over every group and item. Eligibility is computed from
   * absolute elapsed time, so ticks missed during downtime are absorbed here.
   * Rejects only with PersistenceError; every transport failure is contained per item.
   */
  async runTick(): Promise<TickSummary> {
    const summary: TickSummary = { due: 0, sent: 0, failed: 0 };

    if (this.isRunning) {
      console.warn('[Scheduler] Previous tick still running, skipping...');
      return summary;
    }
    this.isRunning = true;

    try {
      for (const chatId of this.store.listRecurringTenants()) {
        // Copy: items may be added or removed while a send is awaited.
        const items = [...this.store.getRecurringItems(chatId)];
        for (const [index, item] of items.entries()) {
          const now = this.now();
          if (!isDue(item, now)) continue;

          summary.due++;
          try {
            const sent = await this.deliver(chatId, index, item, now);
            if (sent) {
              summary.sent++;
            } else {
              summary.failed++;
            }
          } catch (error) {
            if (error instanceof PersistenceError) {
              throw error;
            }
            summary.failed++;
            console.error(`[Scheduler] Unexpected error for item #${index + 1} in ${chatId}:`, error);
          }
        }
      }
    } finally {
      this.isRunning = false;
    }

    if (summary.due > 0) {
      console.log(`[Scheduler] Tick finished: due=${summary.due} sent=${summary.sent} failed=${summary.failed}`);
    }
    return summary;
  }

  start(): void {
    console.log('Starting BroadcastScheduler...');

    const tickTask = cron.schedule(TICK_CRON, () => this.runTickSafely(), { timezone: 'UTC', noOverlap: true });
    this.cronTasks.push(tickTask);

    this.initialTimer = setTimeout(() => {
      this.initialTimer = null;
      console.log('[Scheduler] Running initial broadcast check (on startup)...');
      void this.runTickSafely();
    }, INITIAL_DELAY_MS);

    console.log(`BroadcastScheduler started (check every 30s and once after ${INITIAL_DELAY_MS / 1000}s)`);
  }

  /**
   * Stop all cron tasks. An in-flight send is not aborted; it runs to completion or failure.
   */
  async stop(): Promise<void> {
    console.log('[Scheduler] Stopping all cron tasks...');
    if (this.initialTimer) {
      clearTimeout(this.initialTimer);
      this.initialTimer = null;
    }
    for (const task of this.cronTasks) {
      await task.stop();
    }
    this.cronTasks = [];
    console.log('[Scheduler] All cron tasks stopped');
  }

  private async runTickSafely(): Promise<void> {
    try {
      await this.runTick();
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.onFatalError(error);
        return;
      }
      console.error('[Scheduler] Error in broadcast tick:', error);
    }
  }

  /** Returns true when the send succeeded. */
  private async deliver(chatId: TenantId, index: number, item: Readonly<RecurringItem>, now: number): Promise<boolean> {
    if (item.deletePrevious && item.lastMessageId !== undefined) {
      try {
        await this.transport.deleteMessage(chatId, item.lastMessageId);
      } catch (error) {
        console.warn(`[Scheduler] Could not delete previous message ${item.lastMessageId} in ${chatId}:`, errorMessage(error));
      }
    }

    let messageId: number;
    try {
      messageId = await this.transport.sendBroadcast(chatId, item);
    } catch (error) {
      logSendError(chatId, index, error);
      return false;
    }

    if (item.pinMessage) {
      try {
        await this.transport.pinMessage(chatId, messageId);
      } catch (error) {
        console.warn(`[Scheduler] Could not pin message ${messageId} in ${chatId}:`, errorMessage(error));
      }
    }

    if (!this.store.recordDelivery(chatId, item, now, messageId)) {
      console.warn(`[Scheduler] Item #${index + 1} in ${chatId} was removed while sending; delivery not recorded`);
    }
    return true;
  }
}
