/**
 * Unit tests for BroadcastScheduler due-checks, delivery bookkeeping and the tick mutex
 * Run with: npm test
 */
import fs from 'fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigStore } from '../src/db/configStore';
import { BroadcastScheduler, isDue } from '../src/services/BroadcastScheduler';
import type { RecurringItem } from '../src/types/config';
import { PersistenceError, TransportError } from '../src/utils/errors';
import { createFakeTransport, createTempStore, type FakeTransport } from './helpers/fakeTransport';

const GROUP = '-100321';
const START = 1_700_000_000;

function item(overrides: Partial<RecurringItem> = {}): RecurringItem {
  return {
    text: 'Reminder',
    buttons: [],
    intervalMinutes: 10,
    deletePrevious: false,
    pinMessage: false,
    lastSentAt: 0,
    ...overrides,
  };
}

describe('isDue', () => {
  it('compares elapsed seconds with the interval', () => {
    expect(isDue(item({ lastSentAt: START }), START + 599)).toBe(false);
    expect(isDue(item({ lastSentAt: START }), START + 600)).toBe(true);
    expect(isDue(item(), START)).toBe(true);
  });
});

describe('BroadcastScheduler', () => {
  let store: ConfigStore;
  let filePath: string;
  let dir: string;
  let transport: FakeTransport;
  let now: number;
  let scheduler: BroadcastScheduler;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    ({ store, filePath, dir } = createTempStore());
    transport = createFakeTransport();
    now = START;
    scheduler = new BroadcastScheduler(store, transport, { now: () => now });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('sends a never-sent item on the first tick and records the delivery', async () => {
    store.addRecurringItem(GROUP, item());

    expect(await scheduler.runTick()).toEqual({ due: 1, sent: 1, failed: 0 });
    expect(transport.sendBroadcast).toHaveBeenCalledWith(GROUP, expect.objectContaining({ text: 'Reminder' }));
    expect(store.getRecurringItems(GROUP)[0]).toMatchObject({ lastSentAt: START, lastMessageId: 100 });
  });

  it('sends an overdue item loaded from disk and writes the delivery back', async () => {
    fs.writeFileSync(filePath, JSON.stringify({ recurringMessages: { [GROUP]: [item({ lastSentAt: START - 3600 })] } }));
    const restarted = new ConfigStore(filePath);
    restarted.load();

    const afterRestart = new BroadcastScheduler(restarted, transport, { now: () => now });
    expect(await afterRestart.runTick()).toEqual({ due: 1, sent: 1, failed: 0 });

    const onDisk: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    expect(onDisk).toMatchObject({ recurringMessages: { [GROUP]: [{ text: 'Reminder', lastSentAt: START, lastMessageId: 100 }] } });
  });

  it('waits a full interval before sending again', async () => {
    store.addRecurringItem(GROUP, item());
    await scheduler.runTick();

    now = START + 599;
    expect(await scheduler.runTick()).toEqual({ due: 0, sent: 0, failed: 0 });
    now = START + 600;
    expect(await scheduler.runTick()).toEqual({ due: 1, sent: 1, failed: 0 });
    expect(transport.sendBroadcast).toHaveBeenCalledTimes(2);
  });

  it('sends a long-overdue item once instead of catching up every missed interval', async () => {
    store.addRecurringItem(GROUP, item({ lastSentAt: START - 3 * 24 * 3600 }));

    await scheduler.runTick();
    await scheduler.runTick();
    expect(transport.sendBroadcast).toHaveBeenCalledTimes(1);
  });

  it('keeps a failed item due for the next tick', async () => {
    store.addRecurringItem(GROUP, item());
    transport.sendBroadcast.mockRejectedValueOnce(new TransportError('sendMessage', 'chat not found'));

    expect(await scheduler.runTick()).toEqual({ due: 1, sent: 0, failed: 1 });
    expect(store.getRecurringItems(GROUP)[0]?.lastSentAt).toBe(0);

    expect(await scheduler.runTick()).toEqual({ due: 1, sent: 1, failed: 0 });
  });

  it('deletes the previous copy and pins the new one', async () => {
    store.addRecurringItem(GROUP, item({ deletePrevious: true, pinMessage: true }));

    await scheduler.runTick();
    expect(transport.deleteMessage).not.toHaveBeenCalled();
    expect(transport.pinMessage).toHaveBeenCalledWith(GROUP, 100);

    now = START + 600;
    await scheduler.runTick();
    expect(transport.deleteMessage).toHaveBeenCalledWith(GROUP, 100);
    expect(transport.pinMessage).toHaveBeenLastCalledWith(GROUP, 101);
    expect(store.getRecurringItems(GROUP)[0]?.lastMessageId).toBe(101);
  });

  it('records the delivery even when pinning or deleting fails', async () => {
    store.addRecurringItem(GROUP, item({ deletePrevious: true, pinMessage: true, lastMessageId: 50 }));
    transport.deleteMessage.mockRejectedValueOnce(new TransportError('deleteMessage', 'message to delete not found'));
    transport.pinMessage.mockRejectedValueOnce(new TransportError('pinChatMessage', 'not enough rights'));

    expect(await scheduler.runTick()).toEqual({ due: 1, sent: 1, failed: 0 });
    expect(store.getRecurringItems(GROUP)[0]).toMatchObject({ lastSentAt: START, lastMessageId: 100 });
  });

  it('keeps sending other groups when one fails', async () => {
    store.addRecurringItem(GROUP, item());
    store.addRecurringItem('-100999', item({ text: 'Other' }));
    transport.sendBroadcast.mockRejectedValueOnce(new TransportError('sendMessage', 'bot was kicked'));

    expect(await scheduler.runTick()).toEqual({ due: 2, sent: 1, failed: 1 });
    expect(store.getRecurringItems('-100999')[0]?.lastSentAt).toBe(START);
  });

  it('skips a tick while the previous one is still running', async () => {
    store.addRecurringItem(GROUP, item());
    let release: (messageId: number) => void = () => undefined;
    transport.sendBroadcast.mockImplementationOnce(
      () => new Promise<number>((resolve) => {
        release = resolve;
      })
    );

    const first = scheduler.runTick();
    expect(await scheduler.runTick()).toEqual({ due: 0, sent: 0, failed: 0 });
    expect(console.warn).toHaveBeenCalledWith('[Scheduler] Previous tick still running, skipping...');

    release(7);
    expect(await first).toEqual({ due: 1, sent: 1, failed: 0 });
  });

  it('propagates a snapshot flush failure', async () => {
    store.addRecurringItem(GROUP, item());
    vi.spyOn(store, 'recordDelivery').mockImplementationOnce(() => {
      throw new PersistenceError('bot_data.json', 'disk full');
    });

    await expect(scheduler.runTick()).rejects.toBeInstanceOf(PersistenceError);
    // The mutex is released, so the next tick runs and retries the unrecorded item.
    expect(await scheduler.runTick()).toEqual({ due: 1, sent: 1, failed: 0 });
  });
});
