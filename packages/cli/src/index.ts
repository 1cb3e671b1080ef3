#!/usr/bin/env -S node --import tsx
import { printUsage } from './utils/print.ts';

const [command = 'start'] = process.argv.slice(2);

switch (command) {
  case 'start': {
    const { runStart } = await import('./commands/start.ts');
    process.exitCode = await runStart();
    break;
  }
  case 'status': {
    const { runStatus } = await import('./commands/status.ts');
    process.exitCode = await runStatus();
    break;
  }
  default:
    printUsage();
    process.exitCode = command === 'help' || command === '--help' ? 0 : 1;
    break;
}
