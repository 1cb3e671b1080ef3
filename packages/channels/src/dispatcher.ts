import type { Logger } from '@chatrelay/core';
import type { ChatTransport, InboundMessage } from './messages.ts';

export interface Route {
  readonly name: string;
  matches(msg: InboundMessage): boolean;
  handle(msg: InboundMessage, transport: ChatTransport): Promise<void>;
}

/** Ordered dispatch table: routes are tried in registration order and the first match wins. */
export class MessageDispatcher {
  private routes: Route[] = [];

  constructor(private logger: Logger) {}

  register(route: Route): this {
    this.routes.push(route);
    return this;
  }

  resolve(msg: InboundMessage): Route | undefined {
    return this.routes.find((route) => route.matches(msg));
  }

  get routeNames(): string[] {
    return this.routes.map((route) => route.name);
  }

  /** Returns false when no route accepted the message. */
  async dispatch(msg: InboundMessage, transport: ChatTransport): Promise<boolean> {
    const route = this.resolve(msg);
    if (!route) {
      this.logger.debug(`No route for message ${msg.messageId} in chat ${msg.chatId}`);
      return false;
    }
    await route.handle(msg, transport);
    return true;
  }
}
