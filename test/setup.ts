/**
 * @fileoverview Global test setup
 *
 * - Clears environment variables that change interpreter selection or logging
 * - Runs cleanups registered by tests (sessions, temp dirs) even when a test fails
 */

import { afterEach } from 'vitest';

delete process.env.EPHEMERAL_DEPLOY_NODE;
delete process.env.EPHEMERAL_DEPLOY_DEBUG;

const cleanups: Array<() => Promise<void> | void> = [];

/** Run `fn` after the current test, whatever its outcome */
export function registerCleanup(fn: () => Promise<void> | void): void {
  cleanups.push(fn);
}

afterEach(async () => {
  const pending = cleanups.splice(0).reverse();
  for (const fn of pending) {
    try {
      await fn();
    } catch (err) {
      console.warn('[Test Setup] cleanup failed:', err);
    }
  }
});
