import { errorMessage, type Logger } from '@chatrelay/core';
import type { MessageDispatcher } from './dispatcher.ts';
import type { ChatTransport, InboundMessage } from './messages.ts';

export interface ChannelConfig {
  dispatcher: MessageDispatcher;
  logger: Logger;
}

export abstract class BaseChannel implements ChatTransport {
  abstract readonly name: string;
  protected running = false;
  private inflight = new Set<Promise<void>>();

  constructor(protected config: ChannelConfig) {}

  /** Resolves once the channel has stopped receiving; rejects on a receive-loop fault. */
  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
  abstract sendText(chatId: number, text: string, replyTo?: number): Promise<void>;
  abstract sendTyping(chatId: number, forMessage?: number): Promise<void>;

  get isRunning(): boolean {
    return this.running;
  }

  get pendingCount(): number {
    return this.inflight.size;
  }

  /** Waits for every message handed to {@link handleMessage} so far. */
  async settled(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  /** Dispatches in the background; the receive loop does not wait for the reply. */
  protected handleMessage(msg: InboundMessage): void {
    const task: Promise<void> = this.config.dispatcher
      .dispatch(msg, this)
      .then(
        () => undefined,
        (err: unknown) => {
          this.config.logger.error(
            `Failed to handle message ${msg.messageId} in chat ${msg.chatId}: ${errorMessage(err)}`,
          );
        },
      )
      .finally(() => {
        this.afterDispatch(msg);
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  /** Called once per message after its route has finished, successfully or not. */
  protected afterDispatch(_msg: InboundMessage): void {}
}
