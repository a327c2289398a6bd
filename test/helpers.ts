/**
 * Test utilities: timing helpers and scripted stream doubles.
 */

import { StreamClosedError } from '../src/errors.ts';
import type { DuplexStream } from '../src/streams/DuplexStream.ts';
import type { Framer } from '../src/framing.ts';

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 5000)
 * @param pollInterval - How often to check condition in milliseconds (default: 5)
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 5000,
  pollInterval = 5
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function text(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

/**
 * Stream double whose reads block until `close()` and whose writes run a
 * configurable implementation.
 */
export class FakeStream implements DuplexStream {
  writes: Uint8Array[] = [];
  closeCalls = 0;

  private _closed = false;
  private _pendingReads: Array<(err: Error) => void> = [];
  private _write: (data: Uint8Array) => Promise<void>;

  constructor(write?: (data: Uint8Array) => Promise<void>) {
    this._write =
      write ??
      (async () => {
        if (this._closed) throw new StreamClosedError();
      });
  }

  get closed(): boolean {
    return this._closed;
  }

  read(): Promise<Uint8Array> {
    if (this._closed) return Promise.reject(new StreamClosedError());
    return new Promise((_resolve, reject) => {
      this._pendingReads.push(reject);
    });
  }

  write(data: Uint8Array): Promise<void> {
    this.writes.push(data);
    return this._write(data);
  }

  close(): void {
    this.closeCalls++;
    if (this._closed) return;
    this._closed = true;
    const pending = this._pendingReads;
    this._pendingReads = [];
    for (const reject of pending) reject(new StreamClosedError());
  }
}

/**
 * Framer that plays back `steps` (messages to return, errors to throw),
 * then blocks on the stream until it closes.
 */
export function scriptedFramer(steps: Array<Uint8Array | Error>): Framer {
  const queue = [...steps];
  return async (stream) => {
    const step = queue.shift();
    if (step === undefined) return stream.read(1);
    if (step instanceof Error) throw step;
    return step;
  };
}
