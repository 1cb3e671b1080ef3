import { runRelay } from '@chatrelay/server';

export async function runStart(): Promise<number> {
  return runRelay();
}
