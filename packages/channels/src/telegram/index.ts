export {
  TelegramChannel,
  toInboundMessage,
  TYPING_REFRESH_MS,
  type TelegramChannelConfig,
  type TelegramTextMessage,
} from './channel.ts';
export { parseCommand } from './command.ts';
