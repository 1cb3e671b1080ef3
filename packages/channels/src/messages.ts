/** A text message received from the chat platform, consumed once and discarded. */
export interface InboundMessage {
  senderId: number;
  chatId: number;
  messageId: number;
  text: string;
  /** Lower-cased command name when the text starts with a bot command addressed to us. */
  command?: string;
}

/** Outbound calls a route may make back to the platform. */
export interface ChatTransport {
  sendText(chatId: number, text: string, replyTo?: number): Promise<void>;
  /** `forMessage` scopes the indicator to one in-flight message, cleared by its reply. */
  sendTyping(chatId: number, forMessage?: number): Promise<void>;
}
