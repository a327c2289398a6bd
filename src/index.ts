/**
 * evconn: event-driven wrapper for duplex byte streams.
 *
 * ## Public API
 * - `wrap` / `Connection`: read task, handler registration, sends, shutdown
 * - `readLine`, `createDelimiterReader`: framing functions
 * - `fromSocket`, `fromWebSocket`, `createPipe`: stream adapters
 *
 * ## Example
 * ```ts
 * import net from 'node:net';
 * import { wrap, fromSocket, readLine } from 'evconn';
 *
 * const socket = net.createConnection({ host: '127.0.0.1', port: 4000 }, () => {
 *   const conn = wrap(fromSocket(socket), readLine);
 *
 *   conn.onData((c, data) => {
 *     console.log('received', Buffer.from(data).toString());
 *     c.sendAsync(Buffer.from('ack\n'));
 *   });
 *   conn.onErr((_c, err) => console.error('connection error', err));
 *   conn.onClosed(() => console.log('closed'));
 *
 *   conn.sendAsync(Buffer.from('hello\n'));
 * });
 * ```
 *
 * @packageDocumentation
 */

export { Connection, wrap } from './Connection.ts';
export { TaskGroup } from './TaskGroup.ts';
export { readLine, createDelimiterReader } from './framing.ts';
export { SocketStream, fromSocket, mapSocketError } from './streams/SocketStream.ts';
export { fromWebSocket } from './streams/WebSocketStream.ts';
export { MemoryStream, createPipe } from './streams/MemoryStream.ts';
export {
  ErrorCode,
  ErrorKind,
  TransientError,
  EndOfStreamError,
  StreamClosedError,
  MessageTooLongError,
  HandlerError,
  ValidationError,
  classifyError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';
export { DelimiterReaderOptionsSchema } from './validation.ts';

export type { Framer } from './framing.ts';
export type { DuplexStream } from './streams/DuplexStream.ts';
export type { DataHandler, ErrorHandler, ClosedHandler, ConnectionOptions } from './types.ts';
export type { ErrorCodeType, ErrorKindType } from './errors.ts';
export type { DelimiterReaderOptions } from './validation.ts';
