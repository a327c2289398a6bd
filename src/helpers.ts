/**
 * Utility functions.
 */

/**
 * Resolve on a later turn of the event loop, after pending I/O callbacks.
 */
export function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

