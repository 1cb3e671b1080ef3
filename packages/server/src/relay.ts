import { InferenceClient } from '@chatrelay/core';
import {
  MessageDispatcher,
  TelegramChannel,
  createCommandRoute,
  createQueryRoute,
} from '@chatrelay/channels';
import type { Relay, RelayOptions } from './types.ts';

export function createRelay(options: RelayOptions): Relay {
  const { config, logger } = options;

  const client = new InferenceClient({
    endpoint: config.endpoint,
    apiToken: config.apiToken,
    model: config.model,
    collectionId: config.collectionId,
    systemPrompt: config.systemPrompt,
    fetch: options.fetch,
    logger: logger.child('inference'),
  });

  // Order matters: commands are matched before the catch-all query route.
  const dispatcher = new MessageDispatcher(logger.child('dispatch'))
    .register(createCommandRoute({ welcomeMessage: config.welcomeMessage, logger: logger.child('commands') }))
    .register(createQueryRoute({ client, logger: logger.child('query') }));

  const channel = new TelegramChannel({
    token: config.botToken,
    bot: options.bot,
    dispatcher,
    logger: logger.child('telegram'),
  });

  return {
    channel,
    client,
    dispatcher,
    start: () => channel.start(),
    stop: () => channel.stop(),
  };
}
