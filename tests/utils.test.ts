/**
 * Unit tests for small helpers: chat ids, button parsing, timeouts, delayed tasks
 * Run with: npm test
 */
import { afterEach, describe, expect, it, vi } from 'vitest';
import { updateSequenceKeys } from '../src/handlers/sequence';
import { buildUrlKeyboard, parseButtonLines } from '../src/utils/buttons';
import { toTenantId } from '../src/utils/chatId';
import { DelayedTasks } from '../src/utils/delayedTasks';
import { TransportError } from '../src/utils/errors';
import { withTimeout } from '../src/utils/timeout';

describe('toTenantId', () => {
  it.each([
    ['-100123', '-100123'],
    [' -100123 ', '-100123'],
    ['+5', '5'],
    ['007', '7'],
  ])('normalizes %j to %j', (input, expected) => {
    expect(toTenantId(input)).toBe(expected);
  });

  it.each(['', 'abc', '12a', '1.5', '99999999999999999999'])('rejects %j', (input) => {
    expect(toTenantId(input)).toBeNull();
  });

  it('accepts platform numbers', () => {
    expect(toTenantId(-1001234567890)).toBe('-1001234567890');
    expect(toTenantId(1.5)).toBeNull();
  });
});

describe('updateSequenceKeys', () => {
  it('orders updates by chat and by sender', () => {
    expect(updateSequenceKeys({ chat: { id: -100555 }, from: { id: 7 } })).toEqual(['-100555', '7']);
    expect(updateSequenceKeys({ from: { id: 7 } })).toEqual(['7']);
    expect(updateSequenceKeys({})).toEqual([]);
  });
});

describe('parseButtonLines', () => {
  it('keeps lines with a separator and drops the rest', () => {
    expect(parseButtonLines('A|https://a.com\nBad line\nB|https://b.com')).toEqual([
      { label: 'A', url: 'https://a.com' },
      { label: 'B', url: 'https://b.com' },
    ]);
  });

  it('splits on the first separator and trims both sides', () => {
    expect(parseButtonLines('  Docs | https://x.example/?q=a|b  ')).toEqual([
      { label: 'Docs', url: 'https://x.example/?q=a|b' },
    ]);
  });

  it('renders one url button per row', () => {
    expect(buildUrlKeyboard([])).toBeUndefined();
    const keyboard = buildUrlKeyboard([
      { label: 'A', url: 'https://a.com' },
      { label: 'B', url: 'https://b.com' },
    ]);
    expect(keyboard?.inline_keyboard.filter((row) => row.length > 0)).toEqual([
      [{ text: 'A', url: 'https://a.com' }],
      [{ text: 'B', url: 'https://b.com' }],
    ]);
  });
});

describe('withTimeout', () => {
  it('resolves with the wrapped value', async () => {
    await expect(withTimeout(Promise.resolve(3), 1000, 'op')).resolves.toBe(3);
  });

  it('rejects when the promise hangs', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10, 'getChatMember')).rejects.toThrow(
      'getChatMember timed out after 10ms'
    );
  });
});

describe('TransportError', () => {
  it('names the failed operation', () => {
    const error = new TransportError('sendPhoto', new Error('Bad Request: wrong file identifier'));
    expect(error.message).toBe('sendPhoto failed: Bad Request: wrong file identifier');
    expect(error.operation).toBe('sendPhoto');
  });
});

describe('DelayedTasks', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs a task after its delay', async () => {
    vi.useFakeTimers();
    const tasks = new DelayedTasks();
    const task = vi.fn(async () => undefined);

    tasks.schedule(3000, task, 'test');
    expect(tasks.pending).toBe(1);
    await vi.advanceTimersByTimeAsync(3000);
    expect(task).toHaveBeenCalledTimes(1);
    expect(tasks.pending).toBe(0);
  });

  it('drops pending tasks on cancelAll', async () => {
    vi.useFakeTimers();
    const tasks = new DelayedTasks();
    const task = vi.fn(async () => undefined);

    tasks.schedule(3000, task, 'test');
    tasks.cancelAll();
    await vi.advanceTimersByTimeAsync(5000);
    expect(task).not.toHaveBeenCalled();
  });
});
