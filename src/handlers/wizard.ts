import type { Bot, Context } from 'grammy';
import type { MediaInput, WizardOutcome, WizardService } from '../services/WizardService';
import { AuthorizationError, errorMessage } from '../utils/errors';
import { CALLBACK, buildRecurringMenuKeyboard, RECURRING_MENU_TEXT, previewHeader, promptForStep, savedText } from '../utils/menuText';
import { isRegisteredCommand } from './commands';
import type { BotServices } from './index';
import { replyMarkdown } from './reply';

const NOT_ADMIN_TEXT = "⚠️ You must be an admin in that group!\n\nPlease check the chat ID or make sure you're an admin.";
const NO_SESSION_TEXT = 'No message being created!';

/** Turn a wizard outcome into chat output. */
async function respond(ctx: Context, services: BotServices, outcome: WizardOutcome): Promise<void> {
  switch (outcome.status) {
    case 'advanced': {
      const prompt = promptForStep(outcome.step);
      await replyMarkdown(ctx, prompt.text, prompt.keyboard);
      return;
    }

    case 'rejected':
      if (outcome.error instanceof AuthorizationError) {
        await ctx.reply(NOT_ADMIN_TEXT);
      } else {
        await ctx.reply(`❌ ${outcome.error.message}`);
      }
      return;

    case 'preview': {
      const { session, content } = outcome;
      await replyMarkdown(
        ctx,
        previewHeader({
          media: content.media,
          buttons: content.buttons,
          deletePrevious: session.deletePrevious ?? false,
          pinMessage: session.pinMessage ?? false,
          intervalMinutes: session.intervalMinutes ?? 1,
        })
      );
      const chatId = ctx.chat?.id;
      if (chatId !== undefined) {
        try {
          // Same call the scheduler makes, so the preview is what the group will see.
          await services.transport.sendBroadcast(chatId, content);
        } catch (error) {
          console.warn('[Wizard] Preview rendering failed:', errorMessage(error));
          await ctx.reply(
            `⚠️ The preview could not be sent (${errorMessage(error)}).\nThe group would get the same error; check the Markdown in your text.`
          );
        }
      }
      const prompt = promptForStep('preview');
      await ctx.reply(prompt.text, { reply_markup: prompt.keyboard });
      return;
    }

    case 'saved':
      await replyMarkdown(ctx, savedText(outcome.chatId, outcome.item));
      await replyMarkdown(ctx, RECURRING_MENU_TEXT, buildRecurringMenuKeyboard());
      return;

    case 'no_session':
      await ctx.reply(`${NO_SESSION_TEXT} Use /start to open the menu.`);
      return;
  }
}

function extractMedia(ctx: Context): MediaInput | null {
  const message = ctx.message;
  if (!message) return null;
  if (message.photo && message.photo.length > 0) {
    // Sizes are ordered small to large.
    const largest = message.photo[message.photo.length - 1];
    return largest ? { fileId: largest.file_id, type: 'photo' } : null;
  }
  if (message.animation) return { fileId: message.animation.file_id, type: 'animation' };
  if (message.video) return { fileId: message.video.file_id, type: 'video' };
  return null;
}

export function registerWizardHandlers(bot: Bot, services: BotServices): void {
  const wizard: WizardService = services.wizard;
  const privateChats = bot.chatType('private');

  bot.callbackQuery(CALLBACK.recurringAdd, async (ctx) => {
    const { replaced } = wizard.start(ctx.from.id);
    await ctx.answerCallbackQuery(replaced ? { text: 'Previous draft discarded' } : undefined);
    const prompt = promptForStep('awaiting_chat_id');
    await replyMarkdown(ctx, prompt.text, prompt.keyboard);
  });

  const options = [
    [CALLBACK.deleteYes, 'delete_previous', true],
    [CALLBACK.deleteNo, 'delete_previous', false],
    [CALLBACK.pinYes, 'pin_message', true],
    [CALLBACK.pinNo, 'pin_message', false],
  ] as const;
  for (const [data, option, value] of options) {
    bot.callbackQuery(data, async (ctx) => {
      const outcome = wizard.handleOption(ctx.from.id, option, value);
      await ctx.answerCallbackQuery(outcome.status === 'no_session' ? { text: NO_SESSION_TEXT } : undefined);
      if (outcome.status !== 'no_session') {
        await respond(ctx, services, outcome);
      }
    });
  }

  bot.callbackQuery(CALLBACK.save, async (ctx) => {
    const outcome = wizard.save(ctx.from.id);
    if (outcome.status === 'no_session') {
      await ctx.answerCallbackQuery({ text: 'No message to save!' });
      return;
    }
    await ctx.answerCallbackQuery(outcome.status === 'saved' ? { text: 'Message saved!' } : undefined);
    await respond(ctx, services, outcome);
  });

  bot.callbackQuery(CALLBACK.cancel, async (ctx) => {
    const cancelled = wizard.cancel(ctx.from.id);
    await ctx.answerCallbackQuery(cancelled ? { text: 'Cancelled' } : undefined);
    await replyMarkdown(ctx, RECURRING_MENU_TEXT, buildRecurringMenuKeyboard());
  });

  privateChats.on('message:text', async (ctx, next) => {
    if (!ctx.from || isRegisteredCommand(ctx.message.text) || !wizard.getSession(ctx.from.id)) {
      return next();
    }
    const outcome = await wizard.handleText(ctx.from.id, ctx.message.text);
    await respond(ctx, services, outcome);
  });

  privateChats.on(['message:photo', 'message:video', 'message:animation'], async (ctx, next) => {
    const media = extractMedia(ctx);
    if (!ctx.from || !media || !wizard.getSession(ctx.from.id)) {
      return next();
    }
    const outcome = wizard.handleMedia(ctx.from.id, media);
    await respond(ctx, services, outcome);
  });
}
