/**
 * Pull-based byte stream consumed by Connection and by framers.
 *
 * Implementations translate their transport's errors into the classes from
 * `errors.ts` so the connection can classify them:
 * - end of input rejects `read` with `EndOfStreamError`
 * - use after `close()` rejects with `StreamClosedError`
 * - temporary conditions reject with `TransientError`
 */

export interface DuplexStream {
  /**
   * Whether the stream was closed locally or by the transport.
   */
  readonly closed: boolean;

  /**
   * Read between 1 and `size` bytes, waiting until some are available.
   */
  read(size: number): Promise<Uint8Array>;

  /**
   * Write `data` (possibly empty) to the peer.
   */
  write(data: Uint8Array): Promise<void>;

  /**
   * Close the stream. Idempotent; rejects a pending `read`.
   */
  close(): void;
}
