import { join } from 'node:path';
import {
  consoleSink,
  createLogger,
  errorMessage,
  FileSink,
  loadConfig,
  loadEnvFile,
  resolveLogOptions,
  DEFAULT_ENV_FILE,
  type Logger,
  type LogOptions,
  type RelayConfig,
} from '@chatrelay/core';
import { createRelay } from './relay.ts';
import type { RelayFactory } from './types.ts';

export const LOG_FILE = 'chatrelay.log';

type Env = Record<string, string | undefined>;

export interface RunOptions {
  env?: Env;
  /** Settings file; defaults to `$ENV_FILE` or `config/.env`. */
  envFile?: string;
  logger?: Logger;
  /** Source of SIGINT/SIGTERM. */
  signals?: NodeJS.EventEmitter;
  createRelay?: RelayFactory;
}

function openLogger(options: LogOptions): { logger: Logger; close: () => Promise<void> } {
  const file = new FileSink(join(options.dir, LOG_FILE));
  const logger = createLogger('chatrelay', { level: options.level, sinks: [consoleSink, file] });
  return { logger, close: () => file.close() };
}

/**
 * Runs the relay until it is stopped and returns the process exit code:
 * 0 after a signal, 1 on a configuration or polling failure.
 */
export async function runRelay(options: RunOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const envFile = options.envFile ?? env['ENV_FILE'] ?? DEFAULT_ENV_FILE;

  let envFileError: unknown;
  try {
    loadEnvFile(envFile, env);
  } catch (err) {
    envFileError = err;
  }

  const { logger, close } = options.logger
    ? { logger: options.logger, close: async () => {} }
    : openLogger(resolveLogOptions(env));

  try {
    if (envFileError !== undefined) {
      logger.error(errorMessage(envFileError));
      return 1;
    }

    let config: RelayConfig;
    try {
      config = loadConfig(env);
    } catch (err) {
      logger.error(errorMessage(err));
      return 1;
    }

    logger.info(`Starting chatrelay with model ${config.model}`);
    const relay = (options.createRelay ?? createRelay)({ config, logger });

    const signals = options.signals ?? process;
    const shutdown: { stopping?: Promise<void> } = {};
    const onSignal = (signal: NodeJS.Signals) => {
      if (shutdown.stopping) return;
      logger.info(`Received ${signal}, stopping`);
      shutdown.stopping = relay.stop().catch((err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
      });
    };
    signals.on('SIGINT', onSignal);
    signals.on('SIGTERM', onSignal);

    try {
      await relay.start();
    } catch (err) {
      logger.error(`Bot polling failed with error: ${errorMessage(err)}`);
      return 1;
    } finally {
      signals.off('SIGINT', onSignal);
      signals.off('SIGTERM', onSignal);
    }

    if (shutdown.stopping) {
      await shutdown.stopping;
      logger.info('Bot stopped by user');
    } else {
      logger.info('Polling stopped');
    }
    return 0;
  } finally {
    await close();
  }
}
