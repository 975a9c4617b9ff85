import type { Bot } from 'grammy';
import type { ConfigStore } from '../db/configStore';
import type { AdminCommands } from '../services/AdminCommands';
import type { ModerationService } from '../services/ModerationService';
import type { ChatTransport } from '../services/Transport';
import type { WizardService } from '../services/WizardService';
import { registerCommandHandlers } from './commands';
import { registerMenuHandlers } from './menu';
import { registerModerationHandlers } from './moderation';
import { registerWizardHandlers } from './wizard';

export interface BotServices {
  store: ConfigStore;
  transport: ChatTransport;
  wizard: WizardService;
  moderation: ModerationService;
  commands: AdminCommands;
  displayTimezone: string;
}

/**
 * Register every update handler. Order matters: commands first, then button
 * callbacks, then free-form private input for the wizard, then group moderation.
 */
export function registerHandlers(bot: Bot, services: BotServices): void {
  registerCommandHandlers(bot, services);
  registerMenuHandlers(bot, services);
  registerWizardHandlers(bot, services);
  registerModerationHandlers(bot, services);
}
