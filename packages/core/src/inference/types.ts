import { z } from 'zod';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

/** Reference to a pre-indexed document set the endpoint may retrieve from. */
export interface CollectionRef {
  type: 'collection';
  id: string;
}

export interface InferenceRequest {
  model: string;
  stream: false;
  messages: ChatTurn[];
  files?: CollectionRef[];
}

/** Sender and chat ids are only used to correlate log lines. */
export interface QueryContext {
  senderId?: number;
  chatId?: number;
}

export interface Completer {
  complete(query: string, context?: QueryContext): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
        // Legacy completions shape
        text: z.string().nullish(),
      }),
    )
    .min(1),
});
