/**
 * In-memory pipe tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createPipe } from '../src/streams/MemoryStream.ts';
import { EndOfStreamError, StreamClosedError } from '../src/errors.ts';
import { bytes, text } from './helpers.ts';

describe('MemoryStream', () => {
  it('should hand out at most the requested number of bytes', async () => {
    const [a, b] = createPipe();
    await a.write(bytes('hello'));

    assert.strictEqual(text(await b.read(2)), 'he');
    assert.strictEqual(text(await b.read(10)), 'llo');
  });

  it('should copy written data', async () => {
    const [a, b] = createPipe();
    const data = bytes('abc');
    await a.write(data);
    data[0] = 0x7a;

    assert.strictEqual(text(await b.read(3)), 'abc');
  });

  it('should reject a pending read when closed locally', async () => {
    const [, b] = createPipe();
    const pending = b.read(1);
    b.close();

    await assert.rejects(pending, StreamClosedError);
    assert.strictEqual(b.closed, true);
  });

  it('should drain buffered bytes before reporting end of stream', async () => {
    const [a, b] = createPipe();
    await a.write(bytes('x'));
    a.close();

    assert.strictEqual(text(await b.read(4)), 'x');
    await assert.rejects(b.read(1), EndOfStreamError);
  });

  it('should reject writes on a closed end and towards a closed peer', async () => {
    const [a, b] = createPipe();
    a.close();

    await assert.rejects(a.write(bytes('x')), StreamClosedError);
    await assert.rejects(b.write(bytes('y')), StreamClosedError);
  });

  it('should reject a second concurrent read', async () => {
    const [a, b] = createPipe();
    const first = b.read(1);

    await assert.rejects(b.read(1), /already pending/);

    await a.write(bytes('q'));
    assert.strictEqual(text(await first), 'q');
  });

  it('should tolerate repeated close', () => {
    const [a] = createPipe();
    a.close();
    a.close();
    assert.strictEqual(a.closed, true);
  });
});
