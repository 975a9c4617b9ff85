import { InlineKeyboard } from 'grammy';
import type { UrlButton } from '../types/config';

/**
 * Parse the wizard's button input: one `label|url` pair per line, split on the
 * first `|`. Lines without a separator are dropped without complaint.
 */
export function parseButtonLines(input: string): UrlButton[] {
  const buttons: UrlButton[] = [];
  for (const line of input.trim().split('\n')) {
    const separator = line.indexOf('|');
    if (separator === -1) continue;
    buttons.push({
      label: line.slice(0, separator).trim(),
      url: line.slice(separator + 1).trim(),
    });
  }
  return buttons;
}

/** One URL button per row; undefined when there is nothing to render. */
export function buildUrlKeyboard(buttons: readonly UrlButton[]): InlineKeyboard | undefined {
  if (buttons.length === 0) {
    return undefined;
  }
  const keyboard = new InlineKeyboard();
  for (const button of buttons) {
    keyboard.url(button.label, button.url).row();
  }
  return keyboard;
}
