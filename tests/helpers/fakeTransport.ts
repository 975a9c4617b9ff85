import fs from 'fs';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import { ConfigStore } from '../../src/db/configStore';
import type { ChatRef, ChatTransport, MemberRole, SendTextOptions } from '../../src/services/Transport';
import type { BroadcastContent } from '../../src/types/config';

/**
 * In-process ChatTransport. Message ids count up from 100; `admins` lists
 * "<chatId>:<userId>" pairs that resolve to the admin role.
 */
export function createFakeTransport(admins: string[] = []) {
  let nextMessageId = 100;
  const roles = new Set(admins);

  const transport = {
    sendText: vi.fn(async (_chatId: ChatRef, _text: string, _options?: SendTextOptions) => nextMessageId++),
    sendBroadcast: vi.fn(async (_chatId: ChatRef, _content: BroadcastContent) => nextMessageId++),
    deleteMessage: vi.fn(async (_chatId: ChatRef, _messageId: number) => undefined),
    pinMessage: vi.fn(async (_chatId: ChatRef, _messageId: number) => undefined),
    getMemberRole: vi.fn(async (chatId: ChatRef, userId: number): Promise<MemberRole> =>
      roles.has(`${chatId}:${userId}`) ? 'admin' : 'member'
    ),
  } satisfies ChatTransport;

  return transport;
}

export type FakeTransport = ReturnType<typeof createFakeTransport>;

/** Fresh store backed by a file in its own temp directory. */
export function createTempStore(): { store: ConfigStore; filePath: string; dir: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'group-bot-'));
  const filePath = path.join(dir, 'bot_data.json');
  return { store: new ConfigStore(filePath), filePath, dir };
}
