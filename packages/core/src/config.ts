import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { config as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.ts';
import { isLogLevel, type LogLevel } from './logger.ts';

export const DEFAULT_ENV_FILE = join('config', '.env');
export const DEFAULT_LOG_DIR = 'logs';
export const DEFAULT_WELCOME_MESSAGE = 'Hello! Send me any question and I will answer it.';

export const REQUIRED_SETTINGS = [
  'TELEGRAM_BOT_TOKEN',
  'INFERENCE_ENDPOINT',
  'INFERENCE_TOKEN',
  'INFERENCE_MODEL',
] as const;

export const OPTIONAL_SETTINGS = [
  'INFERENCE_COLLECTION_ID',
  'WELCOME_MESSAGE',
  'SYSTEM_PROMPT',
  'LOG_LEVEL',
  'LOG_DIR',
] as const;

/** Earlier names still read when the current one is unset or blank. */
export const LEGACY_SETTINGS = {
  INFERENCE_ENDPOINT: 'OPWEBUI_CHAT_ENDPOINT',
  INFERENCE_TOKEN: 'OPWEBUI_JWT_TOKEN',
  INFERENCE_MODEL: 'OPWEBUI_MODEL',
  INFERENCE_COLLECTION_ID: 'OPWEBUI_COLLECTION_ID',
} as const;

/** Immutable after startup; passed explicitly to everything that needs it. */
export interface RelayConfig {
  readonly botToken: string;
  readonly endpoint: string;
  readonly apiToken: string;
  readonly model: string;
  readonly collectionId?: string;
  readonly welcomeMessage: string;
  /** When set, sent as a system turn ahead of every user message. */
  readonly systemPrompt?: string;
}

export interface LogOptions {
  level: LogLevel;
  dir: string;
}

const required = z.string().trim().min(1);
const optional = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: required,
  INFERENCE_ENDPOINT: required.pipe(
    z
      .string()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL'),
  ),
  INFERENCE_TOKEN: required,
  INFERENCE_MODEL: required,
  INFERENCE_COLLECTION_ID: optional,
  WELCOME_MESSAGE: optional,
  SYSTEM_PROMPT: optional,
});

type Env = Record<string, string | undefined>;

/** Copy of `env` with each unset current name filled from its {@link LEGACY_SETTINGS} name. */
export function withLegacySettings(env: Env): Env {
  const resolved: Env = { ...env };
  for (const [name, legacy] of Object.entries(LEGACY_SETTINGS)) {
    if (!resolved[name]?.trim() && resolved[legacy] !== undefined) {
      resolved[name] = resolved[legacy];
    }
  }
  return resolved;
}

export function loadConfig(env: Env = process.env): RelayConfig {
  const result = envSchema.safeParse(withLegacySettings(env));
  if (!result.success) {
    const missing = new Set<string>();
    const invalid = new Set<string>();
    for (const issue of result.error.issues) {
      const key = String(issue.path[0]);
      // An unset variable fails the type check; a blank one fails min(1).
      if (issue.code === 'invalid_type' || issue.code === 'too_small') {
        missing.add(key);
      } else {
        invalid.add(key);
      }
    }
    throw new ConfigError([...missing], [...invalid]);
  }

  const parsed = result.data;
  return Object.freeze({
    botToken: parsed.TELEGRAM_BOT_TOKEN,
    endpoint: parsed.INFERENCE_ENDPOINT,
    apiToken: parsed.INFERENCE_TOKEN,
    model: parsed.INFERENCE_MODEL,
    collectionId: parsed.INFERENCE_COLLECTION_ID,
    welcomeMessage: parsed.WELCOME_MESSAGE ?? DEFAULT_WELCOME_MESSAGE,
    systemPrompt: parsed.SYSTEM_PROMPT,
  });
}

/**
 * Pre-populate `env` from a dotenv file. Variables that are already set win.
 * Returns false when the file does not exist.
 */
export function loadEnvFile(path: string, env: Env = process.env): boolean {
  if (!existsSync(path)) return false;
  const target: Record<string, string> = {};
  const result = parseDotenv({ path, processEnv: target });
  if (result.error) {
    throw new Error(`Cannot read settings file ${path}: ${result.error.message}`);
  }
  for (const [key, value] of Object.entries(target)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return true;
}

/** Never throws; an unknown level falls back to `info`. */
export function resolveLogOptions(env: Env = process.env): LogOptions {
  const level = env['LOG_LEVEL']?.trim().toLowerCase() ?? '';
  const dir = env['LOG_DIR']?.trim();
  return {
    level: isLogLevel(level) ? level : 'info',
    dir: dir ? dir : DEFAULT_LOG_DIR,
  };
}
