/**
 * Core type definitions.
 */

import type { Connection } from './Connection.ts';
import type { DuplexStream } from './streams/DuplexStream.ts';

/**
 * Called with every decoded message, in decode order.
 */
export type DataHandler<S extends DuplexStream = DuplexStream> = (
  conn: Connection<S>,
  data: Uint8Array
) => void;

/**
 * Called with genuine errors from the read task or `sendAsync`.
 */
export type ErrorHandler<S extends DuplexStream = DuplexStream> = (
  conn: Connection<S>,
  err: Error
) => void;

/**
 * Called exactly once, after the read task stopped and the stream closed.
 */
export type ClosedHandler<S extends DuplexStream = DuplexStream> = (conn: Connection<S>) => void;

/**
 * Connection configuration options.
 */
export interface ConnectionOptions {
  /** Name shown in debug output. Default: `conn-<n>` */
  label?: string;
}
