// @chatrelay/server — barrel export
export const VERSION = '0.1.0';

export { createRelay } from './relay.ts';
export { runRelay, LOG_FILE, type RunOptions } from './main.ts';
export type { Relay, RelayOptions, RelayFactory } from './types.ts';
