// @chatrelay/channels — barrel export
export type { InboundMessage, ChatTransport } from './messages.ts';
export { MessageDispatcher, type Route } from './dispatcher.ts';
export {
  createCommandRoute,
  createQueryRoute,
  APOLOGY_MESSAGE,
  WELCOME_COMMANDS,
  type CommandRouteOptions,
  type QueryRouteOptions,
} from './routes.ts';

// Channel abstractions
export { BaseChannel, type ChannelConfig } from './base-channel.ts';

// Built-in channels
export {
  TelegramChannel,
  toInboundMessage,
  parseCommand,
  TYPING_REFRESH_MS,
  type TelegramChannelConfig,
  type TelegramTextMessage,
} from './telegram/index.ts';
