/**
 * Unit tests for the private-chat configuration commands
 * Run with: npm test
 */
import fs from 'fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ConfigStore } from '../src/db/configStore';
import { AdminCommands, NOT_ADMIN_TEXT, USAGE, isTruthyToken } from '../src/services/AdminCommands';
import { createFakeTransport, createTempStore } from './helpers/fakeTransport';

const GROUP = '-100123';
const ADMIN = 11;
const STRANGER = 12;

describe('AdminCommands', () => {
  let store: ConfigStore;
  let dir: string;
  let commands: AdminCommands;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    ({ store, dir } = createTempStore());
    commands = new AdminCommands(store, createFakeTransport([`${GROUP}:${ADMIN}`]));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('banned words', () => {
    it('adds a word once', async () => {
      expect(await commands.addWord(ADMIN, `${GROUP} Scam`)).toBe('✅ Added banned word `scam` to group `-100123`');
      expect(await commands.addWord(ADMIN, `${GROUP} scam`)).toBe('ℹ️ `scam` is already banned in group `-100123`');
      expect(store.getBannedWords(GROUP)).toEqual(['scam']);
    });

    it('lists and removes words', async () => {
      expect(await commands.listWords(ADMIN, GROUP)).toBe('No banned words for group `-100123`');

      await commands.addWord(ADMIN, `${GROUP} scam`);
      await commands.addWord(ADMIN, `${GROUP} spam`);
      expect(await commands.listWords(ADMIN, GROUP)).toBe(
        '🚫 *Banned words for* `-100123`:\n\n1. `scam`\n2. `spam`\n\n*Total: 2 words*'
      );

      expect(await commands.delWord(ADMIN, `${GROUP} SPAM`)).toBe('✅ Removed banned word `spam` from group `-100123`');
      expect(store.getBannedWords(GROUP)).toEqual(['scam']);
    });

    it('answers with usage for missing or malformed arguments', async () => {
      expect(await commands.addWord(ADMIN, '')).toBe(USAGE.addword);
      expect(await commands.addWord(ADMIN, GROUP)).toBe(USAGE.addword);
      expect(await commands.addWord(ADMIN, 'mygroup scam')).toBe(USAGE.addword);
      expect(await commands.listWords(ADMIN, '  ')).toBe(USAGE.listwords);
    });

    it('refuses users who are not admin of the group', async () => {
      expect(await commands.addWord(STRANGER, `${GROUP} scam`)).toBe(NOT_ADMIN_TEXT);
      expect(await commands.listWords(STRANGER, GROUP)).toBe(NOT_ADMIN_TEXT);
      expect(store.getBannedWords(GROUP)).toEqual([]);
    });
  });

  describe('auto replies', () => {
    it('adds a reply with a multi-word trigger', async () => {
      expect(await commands.addReply(ADMIN, `${GROUP} Hello there | Welcome to the *group*`)).toBe(
        '✅ Auto reply added to group `-100123`\n\n*Trigger:* `hello there`\n*Reply:* Welcome to the *group*'
      );
      expect(store.getAutoReplies(GROUP).get('hello there')).toBe('Welcome to the *group*');
    });

    it('requires the trigger separator', async () => {
      expect(await commands.addReply(ADMIN, `${GROUP} hello welcome`)).toBe(USAGE.addreply);
      expect(await commands.addReply(ADMIN, `${GROUP} | welcome`)).toBe(USAGE.addreply);
    });

    it('lists replies with long ones shortened', async () => {
      await commands.addReply(ADMIN, `${GROUP} rules | Be nice`);
      await commands.addReply(ADMIN, `${GROUP} faq | ${'x'.repeat(60)}`);

      expect(await commands.listReplies(ADMIN, GROUP)).toBe(
        `🤖 *Auto replies for* \`-100123\`:\n\n1. \`rules\` → Be nice\n\n2. \`faq\` → ${'x'.repeat(50)}...\n\n*Total: 2 replies*`
      );
    });

    it('removes a reply by trigger', async () => {
      await commands.addReply(ADMIN, `${GROUP} rules | Be nice`);
      expect(await commands.delReply(ADMIN, `${GROUP} Rules`)).toBe('✅ Auto reply `rules` removed from group `-100123`');
      expect(await commands.delReply(ADMIN, `${GROUP} rules`)).toBe('ℹ️ No auto reply `rules` in group `-100123`');
    });
  });

  describe('link and mention blocking', () => {
    it('turns link blocking on and off', async () => {
      expect(await commands.setLinks(ADMIN, `${GROUP} ON`)).toBe('🔗 Link blocking for `-100123`: 🟢 ENABLED');
      expect(store.getBlockLinks(GROUP)).toBe(true);
      expect(await commands.setLinks(ADMIN, `${GROUP} off`)).toBe('🔗 Link blocking for `-100123`: 🔴 DISABLED');
      expect(store.getBlockLinks(GROUP)).toBe(false);
    });

    it('turns mention blocking on', async () => {
      expect(await commands.setMentions(ADMIN, `${GROUP} yes`)).toBe('📢 Mention blocking for `-100123`: 🟢 ENABLED');
      expect(store.getBlockMentions(GROUP)).toBe(true);
    });

    it('requires a state argument', async () => {
      expect(await commands.setMentions(ADMIN, GROUP)).toBe(USAGE.setmentions);
    });
  });
});

describe('isTruthyToken', () => {
  it.each(['on', 'TRUE', '1', 'Yes', 'enable'])('treats %s as enabled', (token) => {
    expect(isTruthyToken(token)).toBe(true);
  });

  it.each(['off', 'no', '0', 'disable', 'maybe'])('treats %s as disabled', (token) => {
    expect(isTruthyToken(token)).toBe(false);
  });
});
