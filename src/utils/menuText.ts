import { InlineKeyboard } from 'grammy';
import { format, fromUnixTime } from 'date-fns';
import { toZonedTime } from 'date-fns-tz';
import type { WizardStep } from '../services/WizardService';
import type { RecurringItem, TenantId } from '../types/config';

export const CALLBACK = {
  mainMenu: 'menu_main',
  recurringMenu: 'menu_recurring',
  bannedWordsMenu: 'menu_banned_words',
  autoRepliesMenu: 'menu_auto_replies',
  linksMenu: 'menu_links',
  mentionsMenu: 'menu_mentions',
  help: 'menu_help',
  recurringAdd: 'recurring_add',
  recurringList: 'recurring_list',
  deleteYes: 'wiz_delete_yes',
  deleteNo: 'wiz_delete_no',
  pinYes: 'wiz_pin_yes',
  pinNo: 'wiz_pin_no',
  save: 'wiz_save',
  cancel: 'wiz_cancel',
} as const;

/** delrec:<chatId>:<index> */
export const DELETE_RECURRING_PATTERN = /^delrec:(-?\d+):(\d+)$/;
/** toggle_links:<chatId> / toggle_mentions:<chatId> */
export const TOGGLE_PATTERN = /^toggle_(links|mentions):(-?\d+)$/;

export function buildMainMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('Recurring Messages', CALLBACK.recurringMenu).row()
    .text('Banned Words', CALLBACK.bannedWordsMenu).row()
    .text('Auto Replies', CALLBACK.autoRepliesMenu).row()
    .text('Link Blocking', CALLBACK.linksMenu).row()
    .text('Mention Blocking', CALLBACK.mentionsMenu).row()
    .text('Help', CALLBACK.help);
}

export const WELCOME_TEXT = `*Group Moderation Bot*

Welcome to your bot control panel!

Features:
• Rich recurring messages (text, media, buttons)
• Banned words filter
• Auto replies (FAQ system)
• Link blocking
• Mention blocking

All settings are per-group and can be managed by any group admin.`;

export const RECURRING_MENU_TEXT = `*Recurring Messages Manager*

Create automated messages with custom text (Markdown), a photo/video/GIF, URL buttons, a live preview, and optional auto-delete of the previous copy and auto-pin.

Choose an action:`;

export const BANNED_WORDS_TEXT = `*Banned Words Filter*

Messages containing a banned word are deleted automatically.

*Commands:*
• \`/addword <chat_id> <word>\`
• \`/delword <chat_id> <word>\`
• \`/listwords <chat_id>\``;

export const AUTO_REPLIES_TEXT = `🤖 *Auto Replies (FAQ System)*

The bot replies when a message contains a trigger phrase. Works for admins too.

*Commands:*
• \`/addreply <chat_id> <trigger> | <reply>\`
• \`/delreply <chat_id> <trigger>\`
• \`/listreplies <chat_id>\``;

export const HELP_TEXT = `*Help*

1. Add the bot to your group as admin (delete + pin permissions).
2. Send \`/chatid\` in the group to get its ID.
3. Configure everything here in private chat.

*Commands:*
• \`/chatid\` • \`/addword\` • \`/delword\` • \`/listwords\`
• \`/addreply\` • \`/delreply\` • \`/listreplies\`
• \`/setlinks <chat_id> on|off\` • \`/setmentions <chat_id> on|off\`
• \`/cancel\` aborts the message wizard`;

export function buildBackKeyboard(target: string = CALLBACK.mainMenu): InlineKeyboard {
  return new InlineKeyboard().text('Back', target);
}

export function buildRecurringMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('Add New Message', CALLBACK.recurringAdd).row()
    .text('View All Messages', CALLBACK.recurringList).row()
    .text('Back', CALLBACK.mainMenu);
}

export interface StepPrompt {
  text: string;
  keyboard: InlineKeyboard;
}

const cancelKeyboard = (): InlineKeyboard => new InlineKeyboard().text('Cancel', CALLBACK.cancel);

/** Prompt shown when the wizard enters a step. */
export function promptForStep(step: WizardStep): StepPrompt {
  switch (step) {
    case 'awaiting_chat_id':
      return {
        text: '*Step 1/7: Choose Group*\n\nSend me the Chat ID of the group for this recurring message.\n\nUse `/chatid` in your group to get it. Format: `-1001234567890`\n\nType /cancel to abort.',
        keyboard: cancelKeyboard(),
      };
    case 'awaiting_text':
      return {
        text: 'Group verified!\n\n*Step 2/7: Message Text*\n\nSend the text for your message. Markdown is supported (`*bold*`, `_italic_`, `[link](url)`).\n\nOr send `skip` if you only want media.',
        keyboard: cancelKeyboard(),
      };
    case 'awaiting_media':
      return {
        text: '*Step 3/7: Media*\n\nSend a photo, video or GIF.\n\nOr send `skip` to continue without media.',
        keyboard: cancelKeyboard(),
      };
    case 'awaiting_buttons':
      return {
        text: '*Step 4/7: Buttons (Optional)*\n\nOne button per line:\n`Button Text|https://url.com`\n\nOr send `skip` to continue without buttons.',
        keyboard: cancelKeyboard(),
      };
    case 'awaiting_delete_option':
      return {
        text: '*Step 5/7: Delete Previous Message?*\n\n*Yes:* only the latest copy stays in the group\n*No:* every copy stays',
        keyboard: new InlineKeyboard()
          .text('Yes, Delete Previous', CALLBACK.deleteYes).row()
          .text('No, Keep All', CALLBACK.deleteNo).row()
          .text('Cancel', CALLBACK.cancel),
      };
    case 'awaiting_pin_option':
      return {
        text: "*Step 6/7: Auto-Pin Message?*\n\nShould every copy be pinned?\n\n*Note:* the bot needs the 'Pin Messages' permission.",
        keyboard: new InlineKeyboard()
          .text('Yes, Pin Message', CALLBACK.pinYes).row()
          .text("No, Don't Pin", CALLBACK.pinNo).row()
          .text('Cancel', CALLBACK.cancel),
      };
    case 'awaiting_interval':
      return {
        text: '*Step 7/7: Interval*\n\nHow often should I send this message? Send the interval in minutes (minimum 1).\n\n*Example:* `10`',
        keyboard: cancelKeyboard(),
      };
    case 'preview':
      return {
        text: '━━━━━━━━━━━━━━━━\n\nLooks good? Save it, or cancel to start over.',
        keyboard: new InlineKeyboard().text('Save Message', CALLBACK.save).row().text('Cancel', CALLBACK.cancel),
      };
  }
}

type ItemFlags = Pick<RecurringItem, 'media' | 'buttons' | 'deletePrevious' | 'pinMessage' | 'intervalMinutes'>;

function settingsLines(item: ItemFlags): string[] {
  const lines = [`⏱ Interval: every ${item.intervalMinutes} minutes`, item.media ? '📸 Media: yes' : '📝 Text only'];
  if (item.buttons.length > 0) lines.push(`🔘 Buttons: ${item.buttons.length}`);
  if (item.deletePrevious) lines.push('🗑 Deletes previous message');
  if (item.pinMessage) lines.push('📌 Auto-pins message');
  return lines;
}

export function previewHeader(item: ItemFlags): string {
  return `*PREVIEW MODE*\n\n${settingsLines(item).join('\n')}\n\n━━━━━━━━━━━━━━━━`;
}

export function savedText(chatId: TenantId, item: ItemFlags): string {
  return `*Recurring Message Saved!*\n\n📢 Group: \`${chatId}\`\n${settingsLines(item).join('\n')}\n\nThe bot will start sending this message automatically.`;
}

export function formatLastSent(lastSentAt: number, timezone: string): string {
  if (lastSentAt === 0) {
    return 'never';
  }
  return format(toZonedTime(fromUnixTime(lastSentAt), timezone), 'dd.MM HH:mm');
}

export interface RecurringGroup {
  chatId: TenantId;
  items: readonly Readonly<RecurringItem>[];
}

const PREVIEW_LENGTH = 30;

/** Overview of every item the user can manage, plus one delete button per item. */
export function renderRecurringList(groups: readonly RecurringGroup[], timezone: string): StepPrompt {
  const keyboard = new InlineKeyboard();
  const populated = groups.filter((group) => group.items.length > 0);

  if (populated.length === 0) {
    keyboard.text('Back', CALLBACK.recurringMenu);
    return {
      text: "*Your Recurring Messages*\n\nNo recurring messages configured yet.\n\nClick 'Add New Message' to create one!",
      keyboard,
    };
  }

  let text = '*Your Recurring Messages*\n\n';
  for (const { chatId, items } of populated) {
    text += `*Group:* \`${chatId}\`\n`;
    items.forEach((item, i) => {
      const preview = (item.text ?? 'Media message').slice(0, PREVIEW_LENGTH).replace(/[*_`[]/g, '');
      const markers = `${item.media ? '📸' : '📝'}${item.buttons.length > 0 ? '🔘' : ''}${item.deletePrevious ? '🗑' : ''}${item.pinMessage ? '📌' : ''}`;
      text += `${i + 1}. ${markers} Every ${item.intervalMinutes}min (last: ${formatLastSent(item.lastSentAt, timezone)}): ${preview}...\n`;
      keyboard.text(`Delete #${i + 1} from ${chatId}`, `delrec:${chatId}:${i}`).row();
    });
    text += '\n';
  }
  text += '*Legend:*\n📸 = Has media | 🔘 = Has buttons\n🗑 = Deletes previous | 📌 = Auto-pins';
  keyboard.text('Back', CALLBACK.recurringMenu);
  return { text, keyboard };
}

/** Toggle menu for link or mention blocking across the user's groups. */
export function renderToggleMenu(
  kind: 'links' | 'mentions',
  groups: readonly { chatId: TenantId; enabled: boolean }[]
): StepPrompt {
  const keyboard = new InlineKeyboard();
  for (const { chatId, enabled } of groups) {
    keyboard.text(`${enabled ? '🟢 ON' : '🔴 OFF'} ${chatId}`, `toggle_${kind}:${chatId}`).row();
  }
  keyboard.text('Back', CALLBACK.mainMenu);

  const title = kind === 'links' ? '🔗 *Link Blocking*' : '📢 *Mention Blocking*';
  const command = kind === 'links' ? '/setlinks' : '/setmentions';
  const body =
    groups.length > 0
      ? 'Tap a group to toggle.'
      : 'No configured groups yet.';
  return {
    text: `${title}\n\n${body}\n\nOr use \`${command} <chat_id> on|off\`.`,
    keyboard,
  };
}
