/**
 * Error classification tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  EndOfStreamError,
  ErrorKind,
  HandlerError,
  StreamClosedError,
  TransientError,
  classifyError,
  getErrorCode,
} from '../src/errors.ts';
import { mapSocketError } from '../src/streams/SocketStream.ts';

function nodeError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('Errors', () => {
  describe('classifyError', () => {
    it('should classify TransientError as transient', () => {
      assert.strictEqual(classifyError(new TransientError()), ErrorKind.Transient);
    });

    it('should classify errors reporting temporary as transient', () => {
      const err = Object.assign(new Error('try again'), { temporary: true });
      assert.strictEqual(classifyError(err), ErrorKind.Transient);
    });

    it('should classify end of stream and closed stream as closed', () => {
      assert.strictEqual(classifyError(new EndOfStreamError()), ErrorKind.Closed);
      assert.strictEqual(classifyError(new StreamClosedError()), ErrorKind.Closed);
    });

    it('should classify everything else as other', () => {
      assert.strictEqual(classifyError(new Error('READ')), ErrorKind.Other);
      assert.strictEqual(classifyError(Object.assign(new Error('x'), { temporary: false })), ErrorKind.Other);
      assert.strictEqual(classifyError('not an error'), ErrorKind.Other);
      assert.strictEqual(classifyError(undefined), ErrorKind.Other);
    });
  });

  describe('error classes', () => {
    it('should expose codes and serialize them', () => {
      const err = new StreamClosedError();

      assert.strictEqual(getErrorCode(err), 'STREAM_CLOSED');
      assert.strictEqual(err.name, 'StreamClosedError');
      assert.strictEqual(err.toJSON().code, 'STREAM_CLOSED');
      assert.strictEqual(err.toJSON().message, 'Use of closed stream');
    });

    it('should keep the thrown value as the cause of a HandlerError', () => {
      const cause = new Error('boom');
      const err = new HandlerError(cause);

      assert.strictEqual(err.cause, cause);
      assert.strictEqual(err.message, 'Data handler failed: boom');
      assert.strictEqual(new HandlerError('text').message, 'Data handler failed: text');
    });
  });

  describe('mapSocketError', () => {
    it('should map retriable codes to TransientError', () => {
      const original = nodeError('resource busy', 'EAGAIN');
      const mapped = mapSocketError(original);

      assert.ok(mapped instanceof TransientError);
      assert.strictEqual(mapped.message, 'resource busy');
      assert.strictEqual(mapped.cause, original);
    });

    it('should map destroyed-stream codes to StreamClosedError', () => {
      const mapped = mapSocketError(nodeError('write after end', 'ERR_STREAM_WRITE_AFTER_END'));

      assert.ok(mapped instanceof StreamClosedError);
      assert.strictEqual(classifyError(mapped), ErrorKind.Closed);
    });

    it('should pass other errors through unchanged', () => {
      const reset = nodeError('read ECONNRESET', 'ECONNRESET');
      const plain = new Error('plain');

      assert.strictEqual(mapSocketError(reset), reset);
      assert.strictEqual(mapSocketError(plain), plain);
    });
  });
});
