// src/services/message-handler.ts — runs an inbound message and delivers the reply
import type { Inbound } from './telegram/updates';
import type { ChatTransport } from './telegram/telegram-client';
import { runTurn, type OrchestratorDeps } from './orchestrator';
import { PersistenceError } from './errors';
import { logger, errorMessage } from './logger';
import { lexicon } from '@/data/lexicon';

export type MessageHandler = (inbound: Inbound) => Promise<void>;

export function createMessageHandler(deps: OrchestratorDeps, transport: ChatTransport): MessageHandler {
  return async (inbound) => {
    const { chatId, messageId } = inbound;

    if (inbound.kind === 'reset') {
      const removed = await deps.state.reset(chatId);
      logger.info('chat:reset', { chatId, removed });
      await transport.sendMessage(chatId, lexicon.replies.resetDone, messageId);
      return;
    }

    let reply: string;
    try {
      const result = await runTurn({ chatId, text: inbound.text }, deps);
      reply = result.reply;
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      logger.error('turn:persistence_failed', { chatId, operation: err.operation, error: errorMessage(err.cause ?? err) });
      reply = lexicon.replies.persistenceFailure;
    }
    await transport.sendMessage(chatId, reply, messageId);
  };
}
