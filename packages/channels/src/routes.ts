import {
  InferenceError,
  elapsedSeconds,
  errorMessage,
  preview,
  type Completer,
  type Logger,
} from '@chatrelay/core';
import type { Route } from './dispatcher.ts';

export const APOLOGY_MESSAGE = 'Sorry, something went wrong. Please try again later.';
export const WELCOME_COMMANDS: readonly string[] = ['start', 'help'];

export interface CommandRouteOptions {
  welcomeMessage: string;
  commands?: readonly string[];
  logger: Logger;
}

/** Answers the welcome commands with the configured text. */
export function createCommandRoute(options: CommandRouteOptions): Route {
  const commands = new Set(options.commands ?? WELCOME_COMMANDS);
  return {
    name: 'command',
    matches: (msg) => msg.command !== undefined && commands.has(msg.command),
    handle: async (msg, transport) => {
      options.logger.info(`User ${msg.senderId} sent /${msg.command}. Chat ID: ${msg.chatId}`);
      await transport.sendText(msg.chatId, options.welcomeMessage, msg.messageId);
    },
  };
}

export interface QueryRouteOptions {
  client: Completer;
  logger: Logger;
}

function isRecognizedFailure(err: unknown): boolean {
  return err instanceof InferenceError || (err instanceof Error && err.name === 'AbortError');
}

/**
 * Relays free text to the inference client. Sends exactly one reply per
 * message: the generated text, or {@link APOLOGY_MESSAGE} on any failure.
 */
export function createQueryRoute(options: QueryRouteOptions): Route {
  const { client, logger } = options;
  return {
    name: 'query',
    // Catch-all: register after every other route.
    matches: () => true,
    handle: async (msg, transport) => {
      const query = msg.text.trim();
      logger.info(
        `Received message from user ${msg.senderId} in chat ${msg.chatId}. Message ID: ${msg.messageId}. Content: ${preview(query, 50)}`,
      );

      try {
        await transport.sendTyping(msg.chatId, msg.messageId);
      } catch (err) {
        logger.warn(`Typing indicator failed for chat ${msg.chatId}: ${errorMessage(err)}`);
      }

      const startedAt = performance.now();
      let reply: string;
      try {
        reply = await client.complete(query, { senderId: msg.senderId, chatId: msg.chatId });
        logger.info(
          `Successfully processed message from user ${msg.senderId}. Processing time: ${elapsedSeconds(startedAt)}s. Response: ${preview(reply, 100)}`,
        );
      } catch (err) {
        const label = isRecognizedFailure(err) ? 'Error' : 'Unexpected error';
        logger.error(
          `${label} processing message from user ${msg.senderId} after ${elapsedSeconds(startedAt)}s: ${errorMessage(err)}`,
        );
        reply = APOLOGY_MESSAGE;
      }

      await transport.sendText(msg.chatId, reply, msg.messageId);
    },
  };
}
