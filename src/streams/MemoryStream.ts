/**
 * In-process connected stream pair.
 *
 * Bytes written on one end become readable on the other. Closing an end makes
 * its own operations fail with `StreamClosedError`; the peer drains what is
 * buffered and then sees `EndOfStreamError` on read and `StreamClosedError`
 * on write.
 */

import createDebug from 'debug';
import { EndOfStreamError, StreamClosedError } from '../errors.ts';
import type { DuplexStream } from './DuplexStream.ts';

const debug = createDebug('evconn:pipe');

interface PendingRead {
  size: number;
  resolve: (data: Uint8Array) => void;
  reject: (err: Error) => void;
}

export class MemoryStream implements DuplexStream {
  private _peer: MemoryStream | null = null;
  private _buffer: Uint8Array[] = [];
  private _closed = false;
  private _peerClosed = false;
  private _waiting: PendingRead | null = null;

  get closed(): boolean {
    return this._closed;
  }

  read(size: number): Promise<Uint8Array> {
    if (this._waiting) {
      return Promise.reject(new Error('A read is already pending on this stream'));
    }
    return new Promise((resolve, reject) => {
      this._waiting = { size, resolve, reject };
      this._settle();
    });
  }

  async write(data: Uint8Array): Promise<void> {
    const peer = this._peer;
    if (this._closed || this._peerClosed || !peer) {
      throw new StreamClosedError();
    }
    if (data.length === 0) return;
    // The reader gets its own copy.
    peer._push(new Uint8Array(data));
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    debug('pipe end closed');
    this._settle();
    this._peer?._onPeerClosed();
  }

  private _push(data: Uint8Array): void {
    this._buffer.push(data);
    this._settle();
  }

  private _onPeerClosed(): void {
    this._peerClosed = true;
    this._settle();
  }

  private _settle(): void {
    const waiting = this._waiting;
    if (!waiting) return;

    const head = this._buffer[0];
    if (this._closed) {
      this._waiting = null;
      waiting.reject(new StreamClosedError());
    } else if (head) {
      this._waiting = null;
      if (head.length <= waiting.size) {
        this._buffer.shift();
        waiting.resolve(head);
      } else {
        this._buffer[0] = head.subarray(waiting.size);
        waiting.resolve(head.subarray(0, waiting.size));
      }
    } else if (this._peerClosed) {
      this._waiting = null;
      waiting.reject(new EndOfStreamError());
    }
  }

  /** @internal */
  static link(a: MemoryStream, b: MemoryStream): void {
    a._peer = b;
    b._peer = a;
  }
}

/**
 * Create two connected in-memory streams.
 */
export function createPipe(): [MemoryStream, MemoryStream] {
  const a = new MemoryStream();
  const b = new MemoryStream();
  MemoryStream.link(a, b);
  return [a, b];
}
