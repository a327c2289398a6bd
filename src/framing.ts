/**
 * Framing functions: turn a byte stream into discrete messages.
 */

import { MessageTooLongError } from './errors.ts';
import type { DuplexStream } from './streams/DuplexStream.ts';
import { validateDelimiterReaderOptions } from './validation.ts';
import type { DelimiterReaderOptions } from './validation.ts';

/**
 * Decode one complete message from `stream`.
 *
 * Called repeatedly by the connection's read task. Resolves with the message
 * bytes, or rejects with the error that stopped decoding (read errors are
 * propagated as-is so the connection can classify them).
 */
export type Framer = (stream: DuplexStream) => Promise<Uint8Array>;

const LINE_FEED = 0x0a;

/**
 * Build a framer that reads byte by byte until `delimiter` and resolves with
 * the accumulated bytes, delimiter included.
 *
 * @throws ValidationError if the options are invalid
 */
export function createDelimiterReader(options: DelimiterReaderOptions = {}): Framer {
  const { delimiter = LINE_FEED, maxLength } = validateDelimiterReaderOptions(options);

  return async (stream: DuplexStream): Promise<Uint8Array> => {
    const bytes: number[] = [];
    for (;;) {
      const chunk = await stream.read(1);
      const byte = chunk[0];
      if (byte === undefined) continue;

      bytes.push(byte);
      if (byte === delimiter) {
        return Uint8Array.from(bytes);
      }
      if (maxLength !== undefined && bytes.length >= maxLength) {
        throw new MessageTooLongError(maxLength);
      }
    }
  };
}

/**
 * Reads one line, terminating `\n` included.
 */
export const readLine: Framer = createDelimiterReader();
