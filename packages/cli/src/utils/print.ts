import { VERSION } from '@chatrelay/core';

const ESC = '\x1b[';

export const bold = (s: string) => `${ESC}1m${s}${ESC}0m`;
export const dim = (s: string) => `${ESC}2m${s}${ESC}0m`;
export const green = (s: string) => `${ESC}32m${s}${ESC}0m`;
export const red = (s: string) => `${ESC}31m${s}${ESC}0m`;

export function banner(title: string): void {
  const line = '─'.repeat(title.length + 4);
  console.log(bold(title));
  console.log(dim(line));
}

export function printUsage(): void {
  console.log(`
${bold('chatrelay')} v${VERSION}

${bold('Usage:')} chatrelay [command]

${bold('Commands:')}
  start       Relay Telegram messages to the inference endpoint (default)
  status      Show which settings are configured

${bold('Environment:')}
  ENV_FILE    Settings file to read (default: config/.env)
`);
}
