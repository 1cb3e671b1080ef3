import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  loadConfig,
  loadEnvFile,
  resolveLogOptions,
  withLegacySettings,
  DEFAULT_WELCOME_MESSAGE,
} from '../src/config.ts';
import { ConfigError } from '../src/errors.ts';

const validEnv = {
  TELEGRAM_BOT_TOKEN: 'test-bot-token',
  INFERENCE_ENDPOINT: 'http://test.example.com/api/chat/completions',
  INFERENCE_TOKEN: 'test-secret',
  INFERENCE_MODEL: 'test-model',
};

function configErrorOf(env: Record<string, string | undefined>): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('Config', () => {
  describe('loadConfig', () => {
    it('should map environment variables onto the config', () => {
      const config = loadConfig({
        ...validEnv,
        INFERENCE_COLLECTION_ID: 'docs-collection',
        WELCOME_MESSAGE: 'Welcome!',
        SYSTEM_PROMPT: 'Be brief.',
      });

      expect(config).toEqual({
        botToken: 'test-bot-token',
        endpoint: 'http://test.example.com/api/chat/completions',
        apiToken: 'test-secret',
        model: 'test-model',
        collectionId: 'docs-collection',
        welcomeMessage: 'Welcome!',
        systemPrompt: 'Be brief.',
      });
    });

    it('should freeze the returned config', () => {
      expect(Object.isFrozen(loadConfig(validEnv))).toBe(true);
    });

    it('should apply defaults for optional settings', () => {
      const config = loadConfig(validEnv);
      expect(config.welcomeMessage).toBe(DEFAULT_WELCOME_MESSAGE);
      expect(config.systemPrompt).toBeUndefined();
      expect(config.collectionId).toBeUndefined();
    });

    it('should treat blank optional settings as unset', () => {
      const config = loadConfig({ ...validEnv, SYSTEM_PROMPT: '   ', INFERENCE_COLLECTION_ID: '' });
      expect(config.systemPrompt).toBeUndefined();
      expect(config.collectionId).toBeUndefined();
    });

    it('should trim surrounding whitespace', () => {
      const config = loadConfig({ ...validEnv, INFERENCE_MODEL: '  test-model \n' });
      expect(config.model).toBe('test-model');
    });

    it('should list every missing required setting', () => {
      const error = configErrorOf({});
      expect(error.missing).toEqual([
        'TELEGRAM_BOT_TOKEN',
        'INFERENCE_ENDPOINT',
        'INFERENCE_TOKEN',
        'INFERENCE_MODEL',
      ]);
      expect(error.invalid).toEqual([]);
      expect(error.message).toBe(
        'Missing required environment variables: TELEGRAM_BOT_TOKEN, INFERENCE_ENDPOINT, INFERENCE_TOKEN, INFERENCE_MODEL',
      );
    });

    it('should treat an empty value as missing', () => {
      const error = configErrorOf({ ...validEnv, TELEGRAM_BOT_TOKEN: '  ' });
      expect(error.missing).toEqual(['TELEGRAM_BOT_TOKEN']);
    });

    it('should reject an endpoint that is not a URL', () => {
      const error = configErrorOf({ ...validEnv, INFERENCE_ENDPOINT: 'not a url' });
      expect(error.missing).toEqual([]);
      expect(error.invalid).toEqual(['INFERENCE_ENDPOINT']);
      expect(error.message).toBe('Invalid environment variables: INFERENCE_ENDPOINT');
    });

    it('should reject a non-http endpoint', () => {
      const error = configErrorOf({ ...validEnv, INFERENCE_ENDPOINT: 'ftp://test.example.com/chat' });
      expect(error.invalid).toEqual(['INFERENCE_ENDPOINT']);
    });

    it('should accept the earlier OPWEBUI_* names', () => {
      const config = loadConfig({
        TELEGRAM_BOT_TOKEN: 'test-bot-token',
        OPWEBUI_CHAT_ENDPOINT: 'http://legacy.example.com/api/chat/completions',
        OPWEBUI_JWT_TOKEN: 'legacy-secret',
        OPWEBUI_MODEL: 'legacy-model',
        OPWEBUI_COLLECTION_ID: 'legacy-docs',
      });

      expect(config.endpoint).toBe('http://legacy.example.com/api/chat/completions');
      expect(config.apiToken).toBe('legacy-secret');
      expect(config.model).toBe('legacy-model');
      expect(config.collectionId).toBe('legacy-docs');
    });

    it('should prefer the current names over the earlier ones', () => {
      const config = loadConfig({ ...validEnv, OPWEBUI_MODEL: 'legacy-model' });
      expect(config.model).toBe('test-model');
    });

    it('should report missing settings under their current names', () => {
      const error = configErrorOf({ TELEGRAM_BOT_TOKEN: 'test-bot-token', OPWEBUI_MODEL: 'legacy-model' });
      expect(error.missing).toEqual(['INFERENCE_ENDPOINT', 'INFERENCE_TOKEN']);
    });
  });

  describe('withLegacySettings', () => {
    it('should leave the given env untouched', () => {
      const env = { OPWEBUI_MODEL: 'legacy-model' };
      expect(withLegacySettings(env)).toEqual({ OPWEBUI_MODEL: 'legacy-model', INFERENCE_MODEL: 'legacy-model' });
      expect(env).toEqual({ OPWEBUI_MODEL: 'legacy-model' });
    });

    it('should fill a blank current name', () => {
      expect(withLegacySettings({ INFERENCE_TOKEN: ' ', OPWEBUI_JWT_TOKEN: 'legacy-secret' })['INFERENCE_TOKEN']).toBe(
        'legacy-secret',
      );
    });
  });

  describe('loadEnvFile', () => {
    it('should fill unset variables from the file', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'chatrelay-env-'));
      const path = join(dir, '.env');
      await writeFile(path, 'TELEGRAM_BOT_TOKEN=file-token\nINFERENCE_MODEL=file-model\n', 'utf-8');

      const env: Record<string, string | undefined> = { INFERENCE_MODEL: 'env-model' };
      expect(loadEnvFile(path, env)).toBe(true);
      expect(env['TELEGRAM_BOT_TOKEN']).toBe('file-token');
      expect(env['INFERENCE_MODEL']).toBe('env-model');
    });

    it('should return false when the file does not exist', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'chatrelay-env-'));
      const env: Record<string, string | undefined> = {};
      expect(loadEnvFile(join(dir, 'missing.env'), env)).toBe(false);
      expect(env).toEqual({});
    });
  });

  describe('resolveLogOptions', () => {
    it('should default to info level in the logs directory', () => {
      expect(resolveLogOptions({})).toEqual({ level: 'info', dir: 'logs' });
    });

    it('should accept a level in any case', () => {
      expect(resolveLogOptions({ LOG_LEVEL: 'DEBUG', LOG_DIR: '/var/log/relay' })).toEqual({
        level: 'debug',
        dir: '/var/log/relay',
      });
    });

    it('should fall back to info for an unknown level', () => {
      expect(resolveLogOptions({ LOG_LEVEL: 'verbose' }).level).toBe('info');
    });
  });
});
