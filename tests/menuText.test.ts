/**
 * Unit tests for menu rendering
 * Run with: npm test
 */
import { describe, expect, it } from 'vitest';
import type { RecurringItem } from '../src/types/config';
import {
  DELETE_RECURRING_PATTERN,
  TOGGLE_PATTERN,
  formatLastSent,
  previewHeader,
  renderRecurringList,
  renderToggleMenu,
} from '../src/utils/menuText';

function item(overrides: Partial<RecurringItem> = {}): RecurringItem {
  return {
    text: 'Hello *world* and more text beyond the preview',
    buttons: [],
    intervalMinutes: 10,
    deletePrevious: false,
    pinMessage: false,
    lastSentAt: 0,
    ...overrides,
  };
}

describe('formatLastSent', () => {
  it('shows never for unsent items', () => {
    expect(formatLastSent(0, 'UTC')).toBe('never');
  });

  it('renders the time in the display timezone', () => {
    expect(formatLastSent(1_700_000_000, 'UTC')).toBe('14.11 22:13');
    expect(formatLastSent(1_700_000_000, 'Europe/Berlin')).toBe('14.11 23:13');
  });
});

describe('renderRecurringList', () => {
  it('explains how to start when there is nothing to show', () => {
    const screen = renderRecurringList([{ chatId: '-100123', items: [] }], 'UTC');
    expect(screen.text).toBe(
      "*Your Recurring Messages*\n\nNo recurring messages configured yet.\n\nClick 'Add New Message' to create one!"
    );
  });

  it('lists items with markers and a delete button each', () => {
    const screen = renderRecurringList(
      [{ chatId: '-100123', items: [item(), item({ media: 'file-1', mediaType: 'photo', pinMessage: true })] }],
      'UTC'
    );
    expect(screen.text).toContain('1. 📝 Every 10min (last: never): Hello world and more text be...\n');
    expect(screen.text).toContain('2. 📸📌 Every 10min (last: never): Hello world and more text be...\n');

    const buttons = screen.keyboard.inline_keyboard.flat();
    expect(buttons[0]).toEqual({ text: 'Delete #1 from -100123', callback_data: 'delrec:-100123:0' });
    expect(buttons[1]).toEqual({ text: 'Delete #2 from -100123', callback_data: 'delrec:-100123:1' });
  });
});

describe('renderToggleMenu', () => {
  it('shows one toggle per group', () => {
    const screen = renderToggleMenu('links', [{ chatId: '-100123', enabled: true }]);
    expect(screen.text).toBe('🔗 *Link Blocking*\n\nTap a group to toggle.\n\nOr use `/setlinks <chat_id> on|off`.');
    expect(screen.keyboard.inline_keyboard.flat()[0]).toEqual({ text: '🟢 ON -100123', callback_data: 'toggle_links:-100123' });
  });
});

describe('callback patterns', () => {
  it('round-trip the callback data the menus emit', () => {
    expect('delrec:-100123:4'.match(DELETE_RECURRING_PATTERN)?.slice(1)).toEqual(['-100123', '4']);
    expect('toggle_mentions:-100123'.match(TOGGLE_PATTERN)?.slice(1)).toEqual(['mentions', '-100123']);
    expect('toggle_links:abc'.match(TOGGLE_PATTERN)).toBeNull();
  });
});

describe('previewHeader', () => {
  it('summarizes the settings', () => {
    expect(
      previewHeader({ media: undefined, buttons: [{ label: 'A', url: 'https://a.com' }], deletePrevious: true, pinMessage: false, intervalMinutes: 5 })
    ).toBe('*PREVIEW MODE*\n\n⏱ Interval: every 5 minutes\n📝 Text only\n🔘 Buttons: 1\n🗑 Deletes previous message\n\n━━━━━━━━━━━━━━━━');
  });
});
