import type { FetchLike, InferenceClient, Logger, RelayConfig } from '@chatrelay/core';
import type { MessageDispatcher, TelegramChannel, TelegramChannelConfig } from '@chatrelay/channels';

export interface RelayOptions {
  config: RelayConfig;
  logger: Logger;
  /** Replaces the global fetch for inference calls. */
  fetch?: FetchLike;
  bot?: TelegramChannelConfig['bot'];
}

export interface Relay {
  channel: TelegramChannel;
  client: InferenceClient;
  dispatcher: MessageDispatcher;
  /** Long-polls until {@link stop} is called; rejects if polling fails. */
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

export type RelayFactory = (options: RelayOptions) => Pick<Relay, 'start' | 'stop'>;
