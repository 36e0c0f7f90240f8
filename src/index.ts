// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';

import { loadSettings, SettingsError, type Settings } from '@/config/settings';
import { logger } from '@/services/logger';
import { createPipeline } from '@/services/pipeline-deps';
import { createSearchProvider } from '@/services/search/create-search-provider';
import { createMessageHandler } from '@/services/message-handler';
import { TelegramClient } from '@/services/telegram/telegram-client';
import { ChatQueue } from '@/memory/chatQueue';
import { createTelegramRouter } from '@/routes/telegram';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import {
  registerCleanup,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';

function loadSettingsOrExit(): Settings {
  try {
    return loadSettings();
  } catch (err) {
    if (err instanceof SettingsError) {
      logger.fatal('config:invalid', { issues: err.issues });
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const settings = loadSettingsOrExit();

  const pipeline = createPipeline(settings, createSearchProvider(settings));
  const transport = new TelegramClient(settings.telegram.botToken, { timeoutMs: settings.fetch.timeoutMs });
  const handle = createMessageHandler(pipeline.deps, transport);
  const queue = new ChatQueue();

  const app = express();
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));
  app.use(morgan('tiny', { stream: { write: (line: string) => logger.debug(line.trim()) } }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', search: pipeline.search.name, memory: settings.memory.backend });
  });
  app.use(
    '/telegram',
    createTelegramRouter(
      { secret: settings.telegram.webhookSecret, botUsername: settings.telegram.botUsername },
      queue,
      handle,
    ),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  setupUnhandledRejectionHandler();
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  registerCleanup('follow-up-cache', async () => pipeline.followUps.destroy());
  registerCleanup('search', async () => {
    await pipeline.search.close?.();
  });
  registerCleanup('memory', async () => {
    await pipeline.memory.close?.();
  });

  const server = app.listen(settings.port, '0.0.0.0', () => {
    logger.info('server:listening', {
      port: settings.port,
      webhook: '/telegram/webhook',
      search: pipeline.search.name,
      memory: settings.memory.backend,
      debug: settings.debug.enabled,
    });
  });
  setServerInstance(server);
}

main();
