import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { ConnectionOptions } from 'nats';

import { createNatsBroker, toConnectionOptions, wrapConnection } from '../src/broker/nats.js';
import type { NatsHandle } from '../src/broker/nats.js';
import type { BrokerMessage } from '../src/broker/index.js';
import { encode } from './helpers.js';

type Callback = Parameters<NatsHandle['subscribe']>[1]['callback'];

interface FakeHandle extends NatsHandle {
  readonly calls: string[];
  deliver: Callback;
}

function fakeHandle(): FakeHandle {
  const calls: string[] = [];
  let closed = false;
  const handle: FakeHandle = {
    calls,
    deliver: () => assert.fail('no subscription'),
    getServer: () => '127.0.0.1:4222',
    publish(subject, payload) {
      calls.push(`publish ${subject} ${String(payload.length)}`);
    },
    async flush() {
      calls.push('flush');
    },
    subscribe(subject, opts) {
      calls.push(`subscribe ${subject}`);
      handle.deliver = opts.callback;
      return {
        getReceived: () => 7,
        unsubscribe: () => {
          calls.push('unsubscribe');
        },
      };
    },
    async drain() {
      calls.push('drain');
      closed = true;
    },
    async close() {
      calls.push('close');
      closed = true;
    },
    isClosed: () => closed,
  };
  return handle;
}

describe('toConnectionOptions', () => {
  it('maps credentials onto the client option names', () => {
    assert.deepStrictEqual(
      toConnectionOptions({
        url: 'nats://broker.test:4222',
        name: 'cli',
        user: 'alice',
        password: 'test-secret',
      }),
      { servers: 'nats://broker.test:4222', name: 'cli', user: 'alice', pass: 'test-secret' },
    );
  });

  it('leaves credentials out when none are given', () => {
    const options = toConnectionOptions({ url: 'nats://broker.test:4222', name: 'cli' });

    assert.deepStrictEqual(options, { servers: 'nats://broker.test:4222', name: 'cli' });
    assert.ok(!('user' in options));
    assert.ok(!('pass' in options));
  });
});

describe('wrapConnection', () => {
  it('routes subscription errors to the error handler only', () => {
    const handle = fakeHandle();
    const messages: BrokerMessage[] = [];
    const errors: Error[] = [];

    const sub = wrapConnection(handle).subscribe(
      'orders.*',
      (message) => messages.push(message),
      (err) => errors.push(err),
    );
    const failure = new Error('Permissions Violation');
    handle.deliver(failure, { subject: '', data: new Uint8Array() });

    assert.deepStrictEqual(errors, [failure]);
    assert.deepStrictEqual(messages, []);
    assert.strictEqual(sub.subject, 'orders.*');
  });

  it('hands delivered messages to the message handler', () => {
    const handle = fakeHandle();
    const messages: BrokerMessage[] = [];

    wrapConnection(handle).subscribe(
      'orders.*',
      (message) => messages.push(message),
      (err) => assert.fail(err),
    );
    const data = encode('hello');
    handle.deliver(null, { subject: 'orders.new', data });

    assert.deepStrictEqual(messages, [{ subject: 'orders.new', data }]);
  });

  it('delegates every operation to the client connection', async () => {
    const handle = fakeHandle();
    const conn = wrapConnection(handle);

    assert.strictEqual(conn.server, '127.0.0.1:4222');
    conn.publish('orders.new', encode('abc'));
    await conn.flush();
    const sub = conn.subscribe('orders.*', () => undefined, () => undefined);
    assert.strictEqual(sub.getReceived(), 7);
    sub.unsubscribe();
    assert.strictEqual(conn.isClosed(), false);
    await conn.drain();
    await conn.close();

    assert.strictEqual(conn.isClosed(), true);
    assert.deepStrictEqual(handle.calls, [
      'publish orders.new 3',
      'flush',
      'subscribe orders.*',
      'unsubscribe',
      'drain',
      'close',
    ]);
  });
});

describe('createNatsBroker', () => {
  it('connects with the translated options', async () => {
    const seen: ConnectionOptions[] = [];
    const broker = createNatsBroker(async (options) => {
      seen.push(options);
      return fakeHandle();
    });

    const conn = await broker.connect({ url: 'nats://broker.test:4222', name: 'cli' });

    assert.strictEqual(broker.provider, 'nats');
    assert.strictEqual(conn.server, '127.0.0.1:4222');
    assert.deepStrictEqual(seen, [{ servers: 'nats://broker.test:4222', name: 'cli' }]);
  });

  it('passes connection failures through', async () => {
    const broker = createNatsBroker(async () => {
      throw new Error('Authorization Violation');
    });

    await assert.rejects(broker.connect({ url: 'nats://broker.test:4222', name: 'cli' }), {
      message: 'Authorization Violation',
    });
  });
});
