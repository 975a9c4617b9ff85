import type { Context, InlineKeyboard } from 'grammy';
import { errorMessage } from '../utils/errors';

/**
 * Reply with Markdown; user-supplied values can make the markup invalid, in
 * which case the same text goes out unformatted.
 */
export async function replyMarkdown(ctx: Context, text: string, keyboard?: InlineKeyboard): Promise<void> {
  try {
    await ctx.reply(text, { parse_mode: 'Markdown', reply_markup: keyboard });
  } catch (error) {
    console.warn('[Bot] Markdown reply rejected, sending as plain text:', errorMessage(error));
    await ctx.reply(text, { reply_markup: keyboard });
  }
}

/**
 * Replace the menu message the button belongs to; falls back to a new message
 * when it cannot be edited (too old, or unchanged).
 */
export async function showScreen(ctx: Context, text: string, keyboard?: InlineKeyboard): Promise<void> {
  try {
    await ctx.editMessageText(text, { parse_mode: 'Markdown', reply_markup: keyboard });
  } catch (error) {
    if (errorMessage(error).includes('message is not modified')) {
      return;
    }
    await replyMarkdown(ctx, text, keyboard);
  }
}
