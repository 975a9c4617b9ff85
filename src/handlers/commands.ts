import type { Bot } from 'grammy';
import { buildMainMenuKeyboard, WELCOME_TEXT, HELP_TEXT, buildBackKeyboard } from '../utils/menuText';
import type { AdminCommands } from '../services/AdminCommands';
import type { BotServices } from './index';
import { replyMarkdown } from './reply';

const GENERAL_COMMANDS = ['start', 'help', 'cancel', 'chatid'];

type AdminCommandName =
  | 'addword'
  | 'delword'
  | 'listwords'
  | 'addreply'
  | 'delreply'
  | 'listreplies'
  | 'setlinks'
  | 'setmentions';

const ADMIN_COMMANDS: Record<AdminCommandName, (commands: AdminCommands, userId: number, args: string) => Promise<string>> = {
  addword: (c, userId, args) => c.addWord(userId, args),
  delword: (c, userId, args) => c.delWord(userId, args),
  listwords: (c, userId, args) => c.listWords(userId, args),
  addreply: (c, userId, args) => c.addReply(userId, args),
  delreply: (c, userId, args) => c.delReply(userId, args),
  listreplies: (c, userId, args) => c.listReplies(userId, args),
  setlinks: (c, userId, args) => c.setLinks(userId, args),
  setmentions: (c, userId, args) => c.setMentions(userId, args),
};

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s|$)/;

/** True for "/name" or "/name@bot" where name is a command this bot handles. */
export function isRegisteredCommand(text: string): boolean {
  const match = COMMAND_PATTERN.exec(text);
  const name = match?.[1]?.toLowerCase();
  return name !== undefined && (GENERAL_COMMANDS.includes(name) || name in ADMIN_COMMANDS);
}

const PRIVATE_ONLY_TEXT = '⚠️ Please use this command in private chat with me!';

export function registerCommandHandlers(bot: Bot, services: BotServices): void {
  const privateChats = bot.chatType('private');
  const groupChats = bot.chatType(['group', 'supergroup']);

  // Usable anywhere
  bot.command('chatid', async (ctx) => {
    const label = ctx.chat.type === 'private' ? 'Your Chat ID' : "This group's Chat ID";
    await ctx.reply(`🆔 ${label}: \`${ctx.chat.id}\``, { parse_mode: 'Markdown' });
  });

  privateChats.command('start', async (ctx) => {
    await ctx.reply(WELCOME_TEXT, { parse_mode: 'Markdown', reply_markup: buildMainMenuKeyboard() });
  });

  privateChats.command('help', async (ctx) => {
    await ctx.reply(HELP_TEXT, { parse_mode: 'Markdown', reply_markup: buildBackKeyboard() });
  });

  privateChats.command('cancel', async (ctx) => {
    if (!ctx.from) return;
    const cancelled = services.wizard.cancel(ctx.from.id);
    await ctx.reply(cancelled ? 'Cancelled. Use /start to go back to menu.' : 'Nothing to cancel.');
  });

  for (const [name, run] of Object.entries(ADMIN_COMMANDS)) {
    privateChats.command(name, async (ctx) => {
      if (!ctx.from) return;
      const reply = await run(services.commands, ctx.from.id, ctx.match);
      await replyMarkdown(ctx, reply);
    });
  }

  groupChats.command(['start', 'help', 'cancel', ...Object.keys(ADMIN_COMMANDS)], async (ctx) => {
    await ctx.reply(PRIVATE_ONLY_TEXT);
  });
}
