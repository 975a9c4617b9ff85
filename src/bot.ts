import { run, sequentialize, type RunnerHandle } from '@grammyjs/runner';
import { Bot, GrammyError, HttpError, type Context } from 'grammy';
import * as cron from 'node-cron';
import { loadEnv, maskToken, type EnvConfig } from './config/env';
import { ConfigStore } from './db/configStore';
import { registerHandlers } from './handlers';
import { updateSequenceKeys } from './handlers/sequence';
import { AdminCommands } from './services/AdminCommands';
import { BroadcastScheduler } from './services/BroadcastScheduler';
import { ModerationService } from './services/ModerationService';
import { GrammyTransport } from './services/Transport';
import { WizardService } from './services/WizardService';
import { PersistenceError, errorMessage } from './utils/errors';

let env: EnvConfig;
try {
  env = loadEnv();
} catch (error) {
  console.error('[Bot] Configuration error:', errorMessage(error));
  process.exit(1);
}

console.log(`[Bot] Using token ${maskToken(env.BOT_TOKEN)}, data file ${env.DATA_FILE}`);

const store = new ConfigStore(env.DATA_FILE);
try {
  store.load();
} catch (error) {
  console.error('[Bot] Cannot load configuration snapshot:', errorMessage(error));
  process.exit(1);
}

// Create a bot instance
const bot = new Bot(env.BOT_TOKEN);
const transport = new GrammyTransport(bot.api, env.TRANSPORT_TIMEOUT_MS);

// Initialize services
const wizard = new WizardService(store, transport, env.WIZARD_SESSION_TTL_MINUTES * 60 * 1000);
const moderation = new ModerationService(store, transport);
const commands = new AdminCommands(store, transport);
const scheduler = new BroadcastScheduler(store, transport);

// Set up persistent menu commands (non-fatal on rate limit)
bot.api.setMyCommands([
  { command: 'start', description: 'Open the control panel' },
  { command: 'chatid', description: 'Show the chat ID' },
  { command: 'help', description: 'Help' },
  { command: 'cancel', description: 'Cancel the message wizard' },
]).catch((err) => {
  console.warn('[Bot] setMyCommands failed (e.g. rate limit):', errorMessage(err));
});

// Updates from the same chat or user are handled in order
bot.use(sequentialize((ctx: Context) => updateSequenceKeys(ctx)));

if (env.LOG_LEVEL === 'debug') {
  // Debug middleware: log all incoming updates
  bot.use(async (ctx, next) => {
    console.log('[Bot] Received update:', JSON.stringify(ctx.update));
    await next();
  });
}

registerHandlers(bot, {
  store,
  transport,
  wizard,
  moderation,
  commands,
  displayTimezone: env.DISPLAY_TIMEZONE,
});

// Error handler
bot.catch((err) => {
  const cause = err.error;
  if (cause instanceof PersistenceError) {
    console.error('[Bot] Fatal persistence failure, exiting:', cause.message);
    process.exit(1);
  }
  if (cause instanceof GrammyError) {
    console.error(`[Bot] Telegram API error while handling update ${err.ctx.update.update_id}:`, cause.description);
  } else if (cause instanceof HttpError) {
    console.error(`[Bot] Network error while handling update ${err.ctx.update.update_id}:`, cause.message);
  } else {
    console.error(`[Bot] Error while handling update ${err.ctx.update.update_id}:`, cause);
  }
  if (err.ctx.chat) {
    err.ctx.reply('❌ Something went wrong. Please try again later.').catch((replyError: unknown) => {
      console.warn('[Bot] Could not report the error to the user:', errorMessage(replyError));
    });
  }
});

// Abandoned wizard drafts
const pruneTask = cron.schedule('*/10 * * * *', () => {
  const removed = wizard.pruneExpired();
  if (removed > 0) {
    console.log(`[Bot] Pruned ${removed} expired wizard session(s)`);
  }
}, { timezone: 'UTC' });

// Start the scheduler service (before starting bot)
scheduler.start();

let runner: RunnerHandle | undefined;

async function shutdown(signal: string): Promise<void> {
  console.log(`[Bot] ${signal} received, shutting down...`);
  await pruneTask.stop();
  await scheduler.stop();
  moderation.stop();
  if (runner?.isRunning()) {
    await runner.stop();
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error('[Bot] Shutdown failed:', errorMessage(error));
      process.exit(1);
    });
  });
}

// Start the bot (must be at the very end)
bot
  .init()
  .then(() => {
    runner = run(bot);
    console.log(`✅ Bot @${bot.botInfo.username} started, ${store.listTenants().length} group(s) configured`);
    return runner.task();
  })
  .catch((error: unknown) => {
    console.error('[Bot] Polling stopped with an error:', errorMessage(error));
    process.exit(1);
  });
