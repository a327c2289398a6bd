/**
 * Connection - event-driven wrapper around a duplex byte stream.
 *
 * A background read task decodes messages with the supplied framer and hands
 * them to the data handler. Sends go straight to the stream. `close()` waits
 * for the read task and every `sendAsync` issued before it.
 */

import createDebug from 'debug';
import { ErrorKind, HandlerError, classifyError, toError } from './errors.ts';
import type { Framer } from './framing.ts';
import { nextTurn } from './helpers.ts';
import { TaskGroup } from './TaskGroup.ts';
import type { ConnectionOptions, ClosedHandler, DataHandler, ErrorHandler } from './types.ts';
import type { DuplexStream } from './streams/DuplexStream.ts';

const debug = createDebug('evconn:connection');

const onDataNop = (): void => {};
const onErrNop = (): void => {};
const onClosedNop = (): void => {};

let connectionCounter = 0;

export class Connection<S extends DuplexStream = DuplexStream> {
  private _stream: S;
  private _framer: Framer;
  private _label: string;
  private _tasks = new TaskGroup();
  private _readStopped = false;

  // Handler slots never hold an absent value.
  private _onData: DataHandler<S> = onDataNop;
  private _onErr: ErrorHandler<S> = onErrNop;
  private _onClosed: ClosedHandler<S> = onClosedNop;

  constructor(stream: S, framer: Framer, options: ConnectionOptions = {}) {
    this._stream = stream;
    this._framer = framer;
    this._label = options.label ?? `conn-${++connectionCounter}`;

    this._tasks.spawn(() => this._runRead());
  }

  /**
   * Label used in log output.
   */
  get label(): string {
    return this._label;
  }

  /**
   * Whether the read task has stopped.
   */
  get closed(): boolean {
    return this._readStopped;
  }

  /**
   * The wrapped stream.
   */
  raw(): S {
    return this._stream;
  }

  /**
   * Register the handler called for every decoded message.
   * Passing nothing restores the no-op handler.
   */
  onData(handler?: DataHandler<S> | null): void {
    this._onData = handler ?? onDataNop;
  }

  /**
   * Register the handler called for genuine read or `sendAsync` errors.
   */
  onErr(handler?: ErrorHandler<S> | null): void {
    this._onErr = handler ?? onErrNop;
  }

  /**
   * Register the handler called once the connection has shut down.
   */
  onClosed(handler?: ClosedHandler<S> | null): void {
    this._onClosed = handler ?? onClosedNop;
  }

  /**
   * Write `data` to the peer.
   *
   * Transient write errors are ignored. Any other error closes the stream
   * and is rethrown; the error handler is not involved.
   */
  async send(data: Uint8Array): Promise<void> {
    try {
      await this._stream.write(data);
    } catch (err) {
      if (classifyError(err) === ErrorKind.Transient) {
        debug('[%s] transient write error ignored: %o', this._label, err);
        return;
      }
      debug('[%s] write failed, closing stream: %o', this._label, err);
      this._stream.close();
      throw toError(err);
    }
  }

  /**
   * Same as `send`, run as a background task. Failures go to the error handler.
   *
   * The write is handed to the stream before this returns, so a following
   * `close()` does not drop it.
   */
  sendAsync(data: Uint8Array): void {
    this._tasks.spawn(async () => {
      try {
        await this.send(data);
      } catch (err) {
        this._notifyErr(toError(err));
      }
    });
  }

  /**
   * Close the stream and wait for the read task and pending async sends.
   */
  async close(): Promise<void> {
    debug('[%s] close requested (pending tasks=%d)', this._label, this._tasks.size);
    this._stream.close();
    await this._tasks.wait();
  }

  private async _runRead(): Promise<void> {
    debug('[%s] read loop started', this._label);
    try {
      await this._readLoop();
    } finally {
      this._readStopped = true;
      this._stream.close();
      // Dispatched from its own task but still counted as read-task work,
      // so close() resolves only after the closed handler ran.
      await nextTurn();
      this._notifyClosed();
    }
  }

  private async _readLoop(): Promise<void> {
    for (;;) {
      let data: Uint8Array;
      try {
        data = await this._framer(this._stream);
      } catch (err) {
        const kind = classifyError(err);
        if (kind === ErrorKind.Transient) {
          continue;
        }
        if (kind === ErrorKind.Closed) {
          debug('[%s] read loop stopped: stream closed', this._label);
          return;
        }
        debug('[%s] read loop stopped on error: %o', this._label, err);
        this._notifyErr(toError(err));
        return;
      }

      if (data.length > 0) {
        this._notifyData(data);
      }
    }
  }

  private _notifyData(data: Uint8Array): void {
    const handler = this._onData;
    try {
      handler(this, data);
    } catch (err) {
      this._notifyErr(new HandlerError(err));
    }
  }

  private _notifyErr(err: Error): void {
    const handler = this._onErr;
    try {
      handler(this, err);
    } catch (handlerErr) {
      debug('[%s] error handler threw: %o', this._label, handlerErr);
    }
  }

  private _notifyClosed(): void {
    const handler = this._onClosed;
    try {
      handler(this);
    } catch (handlerErr) {
      debug('[%s] closed handler threw: %o', this._label, handlerErr);
    }
  }
}

/**
 * Wrap an established stream. The read task starts right away.
 */
export function wrap<S extends DuplexStream>(
  stream: S,
  framer: Framer,
  options?: ConnectionOptions
): Connection<S> {
  return new Connection(stream, framer, options);
}
