import type { Bot, Context } from 'grammy';
import { isChatAdmin } from '../services/Transport';
import type { TenantId } from '../types/config';
import { requireAdmin } from '../utils/adminGuard';
import { AuthorizationError, ValidationError } from '../utils/errors';
import {
  AUTO_REPLIES_TEXT,
  BANNED_WORDS_TEXT,
  CALLBACK,
  DELETE_RECURRING_PATTERN,
  HELP_TEXT,
  RECURRING_MENU_TEXT,
  TOGGLE_PATTERN,
  buildBackKeyboard,
  buildMainMenuKeyboard,
  buildRecurringMenuKeyboard,
  renderRecurringList,
  renderToggleMenu,
} from '../utils/menuText';
import type { BotServices } from './index';
import { showScreen } from './reply';

/** Groups (among `candidates`) where the user is currently admin. */
async function manageableGroups(services: BotServices, userId: number, candidates: TenantId[]): Promise<TenantId[]> {
  const admin = await Promise.all(candidates.map((chatId) => isChatAdmin(services.transport, chatId, userId)));
  return candidates.filter((_, index) => admin[index]);
}

async function showRecurringList(ctx: Context, services: BotServices, userId: number): Promise<void> {
  const chats = await manageableGroups(services, userId, services.store.listRecurringTenants());
  const groups = chats.map((chatId) => ({ chatId, items: services.store.getRecurringItems(chatId) }));
  const screen = renderRecurringList(groups, services.displayTimezone);
  await showScreen(ctx, screen.text, screen.keyboard);
}

async function showToggleMenu(ctx: Context, services: BotServices, userId: number, kind: 'links' | 'mentions'): Promise<void> {
  const chats = await manageableGroups(services, userId, services.store.listTenants());
  const groups = chats.map((chatId) => ({
    chatId,
    enabled: kind === 'links' ? services.store.getBlockLinks(chatId) : services.store.getBlockMentions(chatId),
  }));
  const screen = renderToggleMenu(kind, groups);
  await showScreen(ctx, screen.text, screen.keyboard);
}

/** Answer text for a guard failure on a button. */
function guardFailureText(error: unknown): string | null {
  if (error instanceof AuthorizationError) return '⚠️ You must be admin in that group!';
  if (error instanceof ValidationError) return '❌ Invalid group';
  return null;
}

export function registerMenuHandlers(bot: Bot, services: BotServices): void {
  bot.callbackQuery(CALLBACK.mainMenu, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showScreen(ctx, '*Main Menu*\n\nSelect an option to configure your bot:', buildMainMenuKeyboard());
  });

  bot.callbackQuery(CALLBACK.recurringMenu, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showScreen(ctx, RECURRING_MENU_TEXT, buildRecurringMenuKeyboard());
  });

  bot.callbackQuery(CALLBACK.bannedWordsMenu, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showScreen(ctx, BANNED_WORDS_TEXT, buildBackKeyboard());
  });

  bot.callbackQuery(CALLBACK.autoRepliesMenu, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showScreen(ctx, AUTO_REPLIES_TEXT, buildBackKeyboard());
  });

  bot.callbackQuery(CALLBACK.help, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showScreen(ctx, HELP_TEXT, buildBackKeyboard());
  });

  bot.callbackQuery(CALLBACK.recurringList, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showRecurringList(ctx, services, ctx.from.id);
  });

  bot.callbackQuery(CALLBACK.linksMenu, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showToggleMenu(ctx, services, ctx.from.id, 'links');
  });

  bot.callbackQuery(CALLBACK.mentionsMenu, async (ctx) => {
    await ctx.answerCallbackQuery();
    await showToggleMenu(ctx, services, ctx.from.id, 'mentions');
  });

  bot.callbackQuery(DELETE_RECURRING_PATTERN, async (ctx) => {
    const match = ctx.callbackQuery.data.match(DELETE_RECURRING_PATTERN);
    if (!match) return;
    const [, rawChatId = '', rawIndex = ''] = match;
    let chatId: TenantId;
    try {
      chatId = await requireAdmin(services.transport, rawChatId, ctx.from.id);
    } catch (error) {
      const text = guardFailureText(error);
      if (text === null) throw error;
      await ctx.answerCallbackQuery({ text, show_alert: true });
      return;
    }
    const removed = services.store.removeRecurringItem(chatId, Number(rawIndex));
    await ctx.answerCallbackQuery({ text: removed ? 'Message deleted!' : 'Message not found' });
    await showRecurringList(ctx, services, ctx.from.id);
  });

  bot.callbackQuery(TOGGLE_PATTERN, async (ctx) => {
    const match = ctx.callbackQuery.data.match(TOGGLE_PATTERN);
    if (!match) return;
    const [, kindMatch = '', rawChatId = ''] = match;
    const kind = kindMatch === 'links' ? 'links' : 'mentions';
    let chatId: TenantId;
    try {
      chatId = await requireAdmin(services.transport, rawChatId, ctx.from.id);
    } catch (error) {
      const text = guardFailureText(error);
      if (text === null) throw error;
      await ctx.answerCallbackQuery({ text, show_alert: true });
      return;
    }

    let enabled: boolean;
    if (kind === 'links') {
      enabled = !services.store.getBlockLinks(chatId);
      services.store.setBlockLinks(chatId, enabled);
    } else {
      enabled = !services.store.getBlockMentions(chatId);
      services.store.setBlockMentions(chatId, enabled);
    }
    const label = kind === 'links' ? 'Link' : 'Mention';
    await ctx.answerCallbackQuery({ text: `✅ ${label} blocking ${enabled ? 'enabled' : 'disabled'}!` });
    await showToggleMenu(ctx, services, ctx.from.id, kind);
  });
}
