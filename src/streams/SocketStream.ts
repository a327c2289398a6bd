/**
 * DuplexStream adapter over a Node.js `Duplex` such as `net.Socket`.
 *
 * Incoming chunks are buffered as they arrive and handed out by `read()`.
 * Node error codes are mapped to the library's error classes here, once.
 */

import type { Duplex } from 'node:stream';
import createDebug from 'debug';
import { EndOfStreamError, StreamClosedError, TransientError, getErrorCode } from '../errors.ts';
import type { DuplexStream } from './DuplexStream.ts';

const debug = createDebug('evconn:socket-stream');

const TRANSIENT_CODES = new Set(['EAGAIN', 'EWOULDBLOCK', 'EINTR']);
const CLOSED_CODES = new Set([
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
  'ERR_STREAM_PREMATURE_CLOSE',
]);

/**
 * Translate a Node.js stream or socket error into a library error.
 * Errors without a known code are returned unchanged.
 */
export function mapSocketError(err: Error): Error {
  const code = getErrorCode(err);
  if (code === undefined) return err;
  if (TRANSIENT_CODES.has(code)) return new TransientError(err.message, { cause: err });
  if (CLOSED_CODES.has(code)) return new StreamClosedError(err.message, { cause: err });
  return err;
}

interface PendingRead {
  size: number;
  resolve: (data: Uint8Array) => void;
  reject: (err: Error) => void;
}

export class SocketStream implements DuplexStream {
  private _socket: Duplex;
  private _chunks: Buffer[] = [];
  private _ended = false;
  private _closed = false;
  private _error: Error | null = null;
  // Errors already returned to a writer; the stream emits them again as 'error'.
  private _writeErrors = new WeakSet<Error>();
  private _waiting: PendingRead | null = null;

  constructor(socket: Duplex) {
    this._socket = socket;
    this._ended = socket.destroyed || socket.readableEnded;

    socket.on('data', (chunk: Buffer | string) => {
      this._chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      this._settle();
    });

    socket.on('end', () => {
      debug('peer ended stream');
      this._ended = true;
      this._settle();
    });

    socket.on('error', (err: Error) => {
      debug('socket error: %o', err);
      // A failed write is reported by send(); the read side only sees the stream go away.
      this._error = this._writeErrors.has(err)
        ? new StreamClosedError(err.message, { cause: err })
        : mapSocketError(err);
      this._settle();
    });

    socket.on('close', () => {
      this._ended = true;
      this._settle();
    });
  }

  /**
   * The wrapped Node.js stream.
   */
  get socket(): Duplex {
    return this._socket;
  }

  get closed(): boolean {
    return this._closed || this._socket.destroyed;
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

  write(data: Uint8Array): Promise<void> {
    if (this._closed || this._socket.destroyed || !this._socket.writable) {
      return Promise.reject(new StreamClosedError());
    }
    return new Promise((resolve, reject) => {
      this._socket.write(data, (err) => {
        if (err) {
          this._writeErrors.add(err);
          reject(mapSocketError(err));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    debug('closing socket');
    this._socket.destroy();
    this._settle();
  }

  private _settle(): void {
    const waiting = this._waiting;
    if (!waiting) return;

    const head = this._chunks[0];
    if (this._closed) {
      this._waiting = null;
      waiting.reject(new StreamClosedError());
    } else if (head) {
      this._waiting = null;
      waiting.resolve(this._take(head, waiting.size));
    } else if (this._error) {
      const err = this._error;
      // Transient conditions are reported once; anything else sticks.
      if (err instanceof TransientError) this._error = null;
      this._waiting = null;
      waiting.reject(err);
    } else if (this._ended) {
      this._waiting = null;
      waiting.reject(new EndOfStreamError());
    }
  }

  private _take(head: Buffer, size: number): Uint8Array {
    if (head.length <= size) {
      this._chunks.shift();
      return head;
    }
    this._chunks[0] = head.subarray(size);
    return head.subarray(0, size);
  }
}

/**
 * Adapt a Node.js duplex stream (for example a `net.Socket`).
 */
export function fromSocket(socket: Duplex): SocketStream {
  return new SocketStream(socket);
}
