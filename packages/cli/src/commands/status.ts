import {
  ConfigError,
  DEFAULT_ENV_FILE,
  OPTIONAL_SETTINGS,
  REQUIRED_SETTINGS,
  loadConfig,
  loadEnvFile,
  preview,
  withLegacySettings,
} from '@chatrelay/core';
import { bold, green, red, dim, banner } from '../utils/print.ts';

type Env = Record<string, string | undefined>;

const SECRET_SETTINGS: ReadonlySet<string> = new Set(['TELEGRAM_BOT_TOKEN', 'INFERENCE_TOKEN']);

export interface SettingStatus {
  name: string;
  required: boolean;
  /** Display value; secrets are masked. Undefined when unset. */
  value?: string;
}

export interface StatusResult {
  envFile: string;
  envFileFound: boolean;
  settings: SettingStatus[];
  /** Problems that would stop `chatrelay start`. */
  problems: string[];
}

export interface StatusOptions {
  env?: Env;
  envFile?: string;
}

export function maskSecret(value: string): string {
  return value.length <= 8 ? '****' : `${value.slice(0, 4)}****`;
}

function display(name: string, raw: string | undefined): string | undefined {
  const value = raw?.trim();
  if (!value) return undefined;
  return SECRET_SETTINGS.has(name) ? maskSecret(value) : preview(value, 60);
}

export function getStatus(options: StatusOptions = {}): StatusResult {
  // Work on a copy so the status check never leaks settings into the process.
  const env: Env = { ...(options.env ?? process.env) };
  const envFile = options.envFile ?? env['ENV_FILE'] ?? DEFAULT_ENV_FILE;
  const problems: string[] = [];

  let envFileFound = false;
  try {
    envFileFound = loadEnvFile(envFile, env);
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    envFileFound = true;
    problems.push(err.message);
  }

  const resolved = withLegacySettings(env);
  const settings: SettingStatus[] = [
    ...REQUIRED_SETTINGS.map((name) => ({ name, required: true, value: display(name, resolved[name]) })),
    ...OPTIONAL_SETTINGS.map((name) => ({ name, required: false, value: display(name, resolved[name]) })),
  ];

  try {
    loadConfig(env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    problems.push(err.message);
  }

  return { envFile, envFileFound, settings, problems };
}

export async function runStatus(options: StatusOptions = {}): Promise<number> {
  banner('chatrelay status');

  const status = getStatus(options);
  const fileMark = status.envFileFound ? green('✓') : dim('not found, using environment only');
  console.log(`Settings file: ${status.envFile} ${fileMark}`);
  console.log('');

  for (const setting of status.settings) {
    const mark = setting.value !== undefined
      ? `${green('✓')} ${setting.value}`
      : setting.required
        ? red('✗ missing')
        : dim('- not set');
    console.log(`  ${setting.name.padEnd(24)} ${mark}`);
  }

  if (status.problems.length > 0) {
    console.log('');
    for (const problem of status.problems) {
      console.log(red(problem));
    }
    console.log(`\nSet the missing values in ${bold(status.envFile)} or the environment.`);
    return 1;
  }

  console.log(`\nReady. Run ${bold('chatrelay start')} to begin relaying.`);
  return 0;
}
