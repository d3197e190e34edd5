import { describe, it } from 'node:test';
import assert from 'node:assert';

import { createMemoryBroker } from '../src/broker/memory.js';
import { FlushError, PublishError } from '../src/core/errors.js';
import { publishOnce } from '../src/core/publish.js';
import { decode, fakeConnection, logLine, testLogger } from './helpers.js';

const INPUT = { subject: 'greetings', payload: 'Hello NATS World!', flushTimeoutMs: 1000 };

describe('publishOnce', () => {
  it('publishes exactly once, flushes, and reports the byte count', async () => {
    const published: Array<[string, string]> = [];
    let flushes = 0;
    const conn = fakeConnection({
      publish: (subject, data) => {
        published.push([subject, decode(data)]);
      },
      flush: async () => {
        flushes++;
      },
    });
    const { logger, out } = testLogger('pub');

    const receipt = await publishOnce(conn, INPUT, logger);

    assert.deepStrictEqual(receipt, { subject: 'greetings', bytes: 17 });
    assert.deepStrictEqual(published, [['greetings', 'Hello NATS World!']]);
    assert.strictEqual(flushes, 1);
    assert.deepStrictEqual(out.lines(), [
      logLine('pub', 'ℹ️ ', 'Publishing to subject "greetings" …'),
      logLine('pub', '✅', 'Message published, subject: "greetings", payload: "Hello NATS World!"'),
    ]);
  });

  it('counts UTF-8 bytes, not characters', async () => {
    const { logger } = testLogger('pub');
    const receipt = await publishOnce(fakeConnection(), { ...INPUT, payload: 'héllo' }, logger);
    assert.strictEqual(receipt.bytes, 6);
  });

  it('reaches a subscriber on the same broker once flushed', async () => {
    const broker = createMemoryBroker();
    const sub = await broker.connect({ url: 'memory://local', name: 'sub' });
    const pub = await broker.connect({ url: 'memory://local', name: 'pub' });
    const received: string[] = [];
    sub.subscribe('greetings', (m) => received.push(decode(m.data)), (err) => assert.fail(err));

    await publishOnce(pub, INPUT, testLogger('pub').logger);
    await sub.drain();

    assert.deepStrictEqual(received, ['Hello NATS World!']);
  });

  it('wraps a publish failure', async () => {
    const cause = new Error('connection closed');
    const conn = fakeConnection({
      publish: () => {
        throw cause;
      },
    });

    await assert.rejects(publishOnce(conn, INPUT, testLogger('pub').logger), (err: unknown) => {
      assert.ok(err instanceof PublishError);
      assert.strictEqual(err.message, 'Failed to publish: connection closed');
      assert.strictEqual(err.cause, cause);
      return true;
    });
  });

  it('wraps a flush failure', async () => {
    const conn = fakeConnection({
      flush: async () => {
        throw new Error('stale connection');
      },
    });

    await assert.rejects(publishOnce(conn, INPUT, testLogger('pub').logger), (err: unknown) => {
      assert.ok(err instanceof FlushError);
      assert.strictEqual(err.message, 'Failed to flush: stale connection');
      return true;
    });
  });

  it('gives up on a flush that is never acknowledged', async () => {
    const conn = fakeConnection({ flush: () => new Promise<void>(() => undefined) });
    const { logger, out } = testLogger('pub');

    await assert.rejects(publishOnce(conn, { ...INPUT, flushTimeoutMs: 20 }, logger), {
      name: 'FlushError',
      message: 'Failed to flush: no acknowledgement within 20ms',
    });
    assert.strictEqual(out.lines().length, 1);
  });
});
