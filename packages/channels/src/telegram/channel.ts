import { Bot } from 'grammy';
import { errorMessage } from '@chatrelay/core';
import { BaseChannel, type ChannelConfig } from '../base-channel.ts';
import type { InboundMessage } from '../messages.ts';
import { parseCommand } from './command.ts';

/** Telegram's chat action expires after about five seconds. */
export const TYPING_REFRESH_MS = 4000;

export interface TelegramChannelConfig extends ChannelConfig {
  token: string;
  typingIntervalMs?: number;
  /** Prebuilt bot, used instead of creating one from `token`. */
  bot?: Bot;
}

/** The fields of a Telegram text message the relay reads. */
export interface TelegramTextMessage {
  message_id: number;
  text: string;
  chat: { id: number };
  from?: { id: number };
}

export function toInboundMessage(message: TelegramTextMessage, botUsername?: string): InboundMessage {
  return {
    // Channel posts carry no sender; attribute them to the chat.
    senderId: message.from?.id ?? message.chat.id,
    chatId: message.chat.id,
    messageId: message.message_id,
    text: message.text,
    command: parseCommand(message.text, botUsername),
  };
}

function typingKey(chatId: number, forMessage?: number): string {
  return `${chatId}:${forMessage ?? ''}`;
}

export class TelegramChannel extends BaseChannel {
  readonly name = 'telegram';
  private bot: Bot;
  /** Keyed by chat and message id. */
  private typingIntervals = new Map<string, ReturnType<typeof setInterval>>();

  constructor(protected override config: TelegramChannelConfig) {
    super(config);
    this.bot = config.bot ?? new Bot(config.token);

    this.bot.on('message:text', (ctx) => {
      this.handleMessage(toInboundMessage(ctx.message, ctx.me.username));
    });
    this.bot.catch((err) => {
      this.config.logger.error(`Update ${err.ctx.update.update_id} failed: ${errorMessage(err.error)}`);
    });
  }

  async start(): Promise<void> {
    this.running = true;
    try {
      await this.bot.start({
        allowed_updates: ['message'],
        onStart: (me) => this.config.logger.info(`Long polling started as @${me.username}`),
      });
    } finally {
      this.running = false;
    }
  }

  async stop(): Promise<void> {
    if (this.bot.isRunning()) {
      await this.bot.stop();
    }
    await this.settled();
    for (const interval of this.typingIntervals.values()) {
      clearInterval(interval);
    }
    this.typingIntervals.clear();
    this.running = false;
  }

  async sendText(chatId: number, text: string, replyTo?: number): Promise<void> {
    this.stopTyping(chatId, replyTo);
    await this.bot.api.sendMessage(
      chatId,
      text,
      replyTo === undefined
        ? {}
        : { reply_parameters: { message_id: replyTo, allow_sending_without_reply: true } },
    );
  }

  /** Shows "typing..." until {@link sendText} replies to `forMessage` in the same chat. */
  async sendTyping(chatId: number, forMessage?: number): Promise<void> {
    this.stopTyping(chatId, forMessage);
    await this.bot.api.sendChatAction(chatId, 'typing');
    const refresh = setInterval(() => {
      this.bot.api.sendChatAction(chatId, 'typing').catch((err: unknown) => {
        this.config.logger.debug(`Typing refresh failed for chat ${chatId}: ${errorMessage(err)}`);
      });
    }, this.config.typingIntervalMs ?? TYPING_REFRESH_MS);
    this.typingIntervals.set(typingKey(chatId, forMessage), refresh);
  }

  protected override afterDispatch(msg: InboundMessage): void {
    this.stopTyping(msg.chatId, msg.messageId);
  }

  private stopTyping(chatId: number, forMessage?: number): void {
    const key = typingKey(chatId, forMessage);
    const interval = this.typingIntervals.get(key);
    if (interval) {
      clearInterval(interval);
      this.typingIntervals.delete(key);
    }
  }
}
