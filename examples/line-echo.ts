/**
 * Line Echo Example
 *
 * A TCP server echoes every line back in upper case; a client sends a few
 * lines, prints the replies and closes.
 *
 * Run with: DEBUG=evconn:* node --import tsx examples/line-echo.ts
 */

import net from 'node:net';
import { wrap, fromSocket, readLine } from '../src/index.ts';

const decoder = new TextDecoder();
const encoder = new TextEncoder();

async function main() {
  // 1. Start a server that wraps every accepted socket
  const server = net.createServer((socket) => {
    const conn = wrap(fromSocket(socket), readLine, { label: 'server' });
    conn.onData((c, data) => {
      c.sendAsync(encoder.encode(decoder.decode(data).toUpperCase()));
    });
    conn.onErr((_c, err) => console.error('[Server] error:', err.message));
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }

  // 2. Connect and wrap the client side
  const socket = net.createConnection({ host: '127.0.0.1', port: address.port });
  await new Promise<void>((resolve) => socket.once('connect', () => resolve()));
  const client = wrap(fromSocket(socket), readLine, { label: 'client' });

  const lines = ['hello\n', 'event driven\n', 'bye\n'];
  let replies = 0;
  const done = new Promise<void>((resolve) => {
    client.onData((_c, data) => {
      console.log(`[Client] received: ${decoder.decode(data).trimEnd()}`);
      if (++replies === lines.length) resolve();
    });
  });
  client.onClosed(() => console.log('[Client] closed'));

  // 3. Send, wait for every reply, then shut down
  for (const line of lines) {
    await client.send(encoder.encode(line));
  }
  await done;

  await client.close();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
