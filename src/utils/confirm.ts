import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Confirmation that simply waits, leaving the operator time to hit Ctrl-C.
 */
export function delayConfirm(ms: number): () => Promise<boolean> {
  return async () => {
    await sleep(ms);
    return true;
  };
}
