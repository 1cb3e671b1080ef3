import { describe, it, expect, vi } from 'vitest';
import { Bot } from 'grammy';
import { createLogger, loadConfig, type FetchLike, type RelayConfig } from '@chatrelay/core';
import type { ChatTransport } from '@chatrelay/channels';
import { createRelay } from '../src/relay.ts';

const baseEnv = {
  TELEGRAM_BOT_TOKEN: 'test-bot-token',
  INFERENCE_ENDPOINT: 'http://test.example.com/api/chat/completions',
  INFERENCE_TOKEN: 'test-secret',
  INFERENCE_MODEL: 'test-model',
  WELCOME_MESSAGE: 'Welcome!',
};

function build(config: RelayConfig, fetchMock: FetchLike) {
  const logger = createLogger('test', { sinks: [{ write: () => {} }] });
  return createRelay({ config, logger, fetch: fetchMock, bot: new Bot(config.botToken) });
}

function recordingTransport() {
  const replies: string[] = [];
  const transport: ChatTransport = {
    sendText: async (_chatId, text) => {
      replies.push(text);
    },
    sendTyping: async () => {},
  };
  return { replies, transport };
}

const okFetch = () =>
  vi.fn<FetchLike>(async () => new Response(JSON.stringify({ choices: [{ message: { content: 'Hi there!' } }] })));

describe('createRelay', () => {
  it('should register the command route ahead of the query route', () => {
    const relay = build(loadConfig(baseEnv), okFetch());
    expect(relay.dispatcher.routeNames).toEqual(['command', 'query']);
    expect(relay.channel.name).toBe('telegram');
  });

  it('should answer /start with the configured welcome text', async () => {
    const fetchMock = okFetch();
    const relay = build(loadConfig(baseEnv), fetchMock);
    const { replies, transport } = recordingTransport();

    await relay.dispatcher.dispatch({ senderId: 1, chatId: 2, messageId: 3, text: '/start', command: 'start' }, transport);

    expect(replies).toEqual(['Welcome!']);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should relay free text to the configured endpoint', async () => {
    const fetchMock = okFetch();
    const relay = build(loadConfig({ ...baseEnv, SYSTEM_PROMPT: 'Be brief.' }), fetchMock);
    const { replies, transport } = recordingTransport();

    await relay.dispatcher.dispatch({ senderId: 1, chatId: 2, messageId: 3, text: 'Hello' }, transport);

    expect(replies).toEqual(['Hi there!']);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://test.example.com/api/chat/completions');
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'test-model',
      stream: false,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hello' },
      ],
    });
  });

  it('should stop cleanly before polling starts', async () => {
    const relay = build(loadConfig(baseEnv), okFetch());
    await expect(relay.stop()).resolves.toBeUndefined();
  });
});
