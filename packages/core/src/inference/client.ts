import { InferenceError, errorMessage } from '../errors.ts';
import { elapsedSeconds, preview } from '../format.ts';
import { createLogger, type Logger } from '../logger.ts';
import {
  completionResponseSchema,
  type ChatTurn,
  type Completer,
  type FetchLike,
  type InferenceRequest,
  type QueryContext,
} from './types.ts';

export const REQUEST_TIMEOUT_MS = 30_000;

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

export interface InferenceClientOptions {
  endpoint: string;
  apiToken: string;
  model: string;
  collectionId?: string;
  systemPrompt?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export function buildInferenceRequest(
  query: string,
  options: Pick<InferenceClientOptions, 'model' | 'systemPrompt' | 'collectionId'>,
): InferenceRequest {
  const messages: ChatTurn[] = [];
  if (options.systemPrompt) {
    messages.push({ role: 'system', content: options.systemPrompt });
  }
  messages.push({ role: 'user', content: query });

  const request: InferenceRequest = { model: options.model, stream: false, messages };
  if (options.collectionId) {
    request.files = [{ type: 'collection', id: options.collectionId }];
  }
  return request;
}

/** Reply text of the first choice, or undefined when the body has another shape. */
export function extractReply(body: unknown): string | undefined {
  const parsed = completionResponseSchema.safeParse(body);
  if (!parsed.success) return undefined;
  const [first] = parsed.data.choices;
  const reply = first.message?.content ?? first.text;
  return reply && reply.trim() ? reply : undefined;
}

function codeOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function isTimeout(err: unknown): boolean {
  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  if (typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError') return true;
  return err instanceof Error && TIMEOUT_CODES.has(codeOf(err.cause) ?? '');
}

function toInferenceError(err: unknown, endpoint: string): InferenceError {
  if (err instanceof InferenceError) return err;
  if (isTimeout(err)) {
    return new InferenceError('timeout', 'Inference service took too long to respond', { cause: err });
  }
  const code = err instanceof Error ? (codeOf(err) ?? codeOf(err.cause)) : undefined;
  if (code && CONNECTION_CODES.has(code)) {
    return new InferenceError('connection', `Unable to connect to ${endpoint} (${code})`, { cause: err });
  }
  return new InferenceError('request', `Request to inference service failed: ${errorMessage(err)}`, { cause: err });
}

/** Single-shot, non-streaming chat completion over HTTP. */
export class InferenceClient implements Completer {
  private fetchFn: FetchLike;
  private logger: Logger;
  private timeoutMs: number;

  constructor(private options: InferenceClientOptions) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger('inference');
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async complete(query: string, context: QueryContext = {}): Promise<string> {
    const { endpoint } = this.options;
    const user = context.senderId ?? 'unknown';
    const startedAt = performance.now();

    this.logger.debug(`Processing query for user ${user} in chat ${context.chatId ?? 'unknown'}: ${preview(query, 50)}`);

    try {
      const response = await this.fetchFn(endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(buildInferenceRequest(query, this.options)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      this.logger.debug(`Received response in ${elapsedSeconds(startedAt)}s for user ${user}. Status code: ${response.status}`);

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new InferenceError(
          'http',
          `Inference service returned ${response.status}${detail ? `: ${preview(detail, 200)}` : ''}`,
          { status: response.status },
        );
      }

      const raw = await response.text();
      let body: unknown;
      try {
        body = JSON.parse(raw);
      } catch (err) {
        throw new InferenceError('malformed', 'Inference service returned invalid JSON', { cause: err });
      }

      const reply = extractReply(body);
      if (reply === undefined) {
        throw new InferenceError('malformed', 'Unexpected response format from inference service');
      }

      this.logger.debug(`Extracted reply for user ${user}: ${preview(reply, 100)}`);
      return reply;
    } catch (err) {
      const error = toInferenceError(err, endpoint);
      this.logger.error(`Inference ${error.kind} error for user ${user} after ${elapsedSeconds(startedAt)}s: ${error.message}`);
      throw error;
    }
  }
}
