// packages/core/src/utils/sleep.ts — Shared async delay utility

/**
 * Promise-based delay. A zero or negative delay resolves on the next tick
 * rather than scheduling a timer.
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
