/**
 * DuplexStream adapter over a `ws` WebSocket.
 *
 * WebSocket message boundaries are not preserved: payloads are treated as one
 * continuous byte stream and framed again by the connection's framer.
 */

import { createWebSocketStream } from 'ws';
import type { WebSocket } from 'ws';
import createDebug from 'debug';
import { SocketStream } from './SocketStream.ts';

const debug = createDebug('evconn:ws-stream');

/**
 * Adapt an open (or opening) WebSocket. Closing the returned stream
 * terminates the WebSocket.
 */
export function fromWebSocket(ws: WebSocket): SocketStream {
  debug('wrapping websocket (readyState=%d)', ws.readyState);
  return new SocketStream(createWebSocketStream(ws));
}
