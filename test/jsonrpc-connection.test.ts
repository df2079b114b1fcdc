// This test suite verifies the bidirectional connection over in-memory pipes, including batches and shutdown.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { Connection } from '../src/jsonrpc/connection.js';
import { ConnectionClosedError, ErrorCode, RequestTimeoutError, RpcError } from '../src/jsonrpc/errors.js';
import { HandlerRegistry, typedHandler } from '../src/jsonrpc/handlers.js';
import { numberId } from '../src/jsonrpc/id.js';
import { createPipe } from '../src/transport/pipe.js';
import type { Session } from '../src/transport/transport.js';
import { AppError } from '../src/utils/errors.js';

// A raw peer that speaks JSON text directly, for wire-level assertions.
function rawPeer(session: Session) {
  const iterator = session.receive()[Symbol.asyncIterator]();

  return {
    send: (message: unknown): Promise<void> =>
      session.send(typeof message === 'string' ? message : JSON.stringify(message)),
    next: async (): Promise<unknown> => {
      const result = await iterator.next();
      if (result.done) {
        throw new Error('peer session ended');
      }

      const parsed: unknown = JSON.parse(result.value);
      return parsed;
    },
    close: () => session.close()
  };
}

const openConnections: Connection[] = [];

function track(connection: Connection): Connection {
  openConnections.push(connection);
  return connection;
}

afterEach(async () => {
  await Promise.all(openConnections.splice(0).map((connection) => connection.close()));
});

describe('connection calls', () => {
  it('round-trips a request between two connections', async () => {
    const [left, right] = createPipe();
    const server = track(
      new Connection(right, {
        handlers: {
          add: typedHandler(z.object({ a: z.number(), b: z.number() }), (params) => params.a + params.b)
        }
      })
    );
    const client = track(new Connection(left));
    server.open();
    client.open();

    await expect(client.request('add', { a: 2, b: 3 })).resolves.toBe(5);
    expect(client.pendingCount).toBe(0);
  });

  it('validates results against a schema when one is given', async () => {
    const [left, right] = createPipe();
    const server = track(new Connection(right, { handlers: { whoami: () => ({ name: 'server-1' }) } }));
    const client = track(new Connection(left));
    server.open();
    client.open();

    const result = await client.request('whoami', undefined, { schema: z.object({ name: z.string() }) });
    expect(result.name).toBe('server-1');
  });

  it('maps handler failures into wire errors the caller can branch on', async () => {
    const [left, right] = createPipe();
    const server = track(
      new Connection(right, {
        handlers: {
          lookup: () => {
            throw new AppError(404, 'not_found', 'Record 7 does not exist.');
          },
          strict: typedHandler(z.object({ id: z.number() }), () => 'unreachable')
        }
      })
    );
    const client = track(new Connection(left));
    server.open();
    client.open();

    await expect(client.request('lookup')).rejects.toMatchObject({ code: -32004, message: 'Record 7 does not exist.' });
    await expect(client.request('strict', { id: 'seven' })).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it('lets handlers call back into the peer while the outer call is pending', async () => {
    const [left, right] = createPipe();
    const server = track(
      new Connection(right, {
        handlers: {
          greet: async (_params, context) => {
            const name = await context.peer.request('whoami');
            return `hello ${String(name)}`;
          }
        }
      })
    );
    const client = track(new Connection(left, { handlers: { whoami: () => 'client-1' } }));
    server.open();
    client.open();

    await expect(client.request('greet')).resolves.toBe('hello client-1');
  });

  it('delivers notifications without registering anything', async () => {
    const [left, right] = createPipe();
    const received: unknown[] = [];
    const server = track(
      new Connection(right, {
        handlers: {
          log: (params) => {
            received.push(params);
          }
        }
      })
    );
    const client = track(new Connection(left));
    server.open();
    client.open();

    await client.notify('log', { level: 'info' });
    expect(client.pendingCount).toBe(0);
    await vi.waitFor(() => {
      expect(received).toEqual([{ level: 'info' }]);
    });
  });

  it('matches responses that arrive out of order', async () => {
    const [left, right] = createPipe();
    const client = track(new Connection(left));
    const peer = rawPeer(right);
    client.open();

    const first = client.call(numberId(1), 'slow');
    const second = client.call(numberId(2), 'fast');
    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 1, method: 'slow' });
    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 2, method: 'fast' });

    await peer.send({ jsonrpc: '2.0', id: 2, result: 'second' });
    await peer.send({ jsonrpc: '2.0', id: 1, result: 'first' });

    await expect(first).resolves.toBe('first');
    await expect(second).resolves.toBe('second');
  });

  it('surfaces error responses as RpcError values', async () => {
    const [left, right] = createPipe();
    const client = track(new Connection(left));
    const peer = rawPeer(right);
    client.open();

    const pending = client.call(numberId(5), 'fail');
    await peer.next();
    await peer.send({ jsonrpc: '2.0', id: 5, error: { code: 4001, message: 'custom failure', data: { retry: false } } });

    await expect(pending).rejects.toBeInstanceOf(RpcError);
    await expect(pending).rejects.toMatchObject({ code: 4001, message: 'custom failure', data: { retry: false } });
  });

  it('removes the table entry when the caller cancels', async () => {
    const [left, right] = createPipe();
    const client = track(new Connection(left, { handlers: { ping: () => 'pong' } }));
    const peer = rawPeer(right);
    client.open();

    const controller = new AbortController();
    const pending = client.call(numberId(9), 'slow', undefined, { signal: controller.signal });
    await peer.next();
    controller.abort(new Error('caller gave up'));

    await expect(pending).rejects.toThrow('caller gave up');
    expect(client.isPending(numberId(9))).toBe(false);

    // The late answer is an orphan and the loop keeps serving.
    await peer.send({ jsonrpc: '2.0', id: 9, result: 'late' });
    await peer.send({ jsonrpc: '2.0', id: 'p', method: 'ping' });
    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 'p', result: 'pong' });
  });

  it('fails with a timeout error and forgets the call', async () => {
    const [left, right] = createPipe();
    const client = track(new Connection(left));
    const peer = rawPeer(right);
    client.open();

    const pending = client.request('slow', undefined, { timeoutMs: 20 });
    await peer.next();

    await expect(pending).rejects.toBeInstanceOf(RequestTimeoutError);
    await expect(pending).rejects.toThrow('Request slow timed out after 20ms.');
    expect(client.pendingCount).toBe(0);
  });

  it('rejects a call that was aborted before it started', async () => {
    const [left] = createPipe();
    const client = track(new Connection(left));
    const controller = new AbortController();
    controller.abort(new Error('already cancelled'));

    await expect(client.call(numberId(1), 'm', undefined, { signal: controller.signal })).rejects.toThrow(
      'already cancelled'
    );
    expect(client.pendingCount).toBe(0);
  });
});

describe('connection inbound dispatch', () => {
  it('answers unknown methods with the request id preserved', async () => {
    const [left, right] = createPipe();
    const connection = track(new Connection(left));
    const peer = rawPeer(right);
    connection.open();

    await peer.send({ jsonrpc: '2.0', id: 'req-7', method: 'missing' });
    await expect(peer.next()).resolves.toEqual({
      jsonrpc: '2.0',
      id: 'req-7',
      error: { code: -32601, message: 'Method not found', data: { method: 'missing' } }
    });
  });

  it('keeps serving after malformed input', async () => {
    const [left, right] = createPipe();
    const connection = track(new Connection(left, { handlers: { ping: () => 'pong' } }));
    const peer = rawPeer(right);
    connection.open();

    await peer.send('this is not json');
    await expect(peer.next()).resolves.toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700 } });

    await peer.send({ jsonrpc: '1.0', id: 4, method: 'ping' });
    await expect(peer.next()).resolves.toEqual({
      jsonrpc: '2.0',
      id: 4,
      error: { code: -32700, message: 'Invalid JSON-RPC version', data: { jsonrpc: '1.0' } }
    });

    await peer.send({ jsonrpc: '2.0', id: 5, method: 'ping' });
    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 5, result: 'pong' });
    expect(connection.state).toBe('serving');
  });

  it('runs a request with a null id like a notification and sends no reply', async () => {
    const [left, right] = createPipe();
    const seen: unknown[] = [];
    const connection = track(
      new Connection(left, {
        handlers: {
          ping: (params, context) => {
            seen.push({ params, id: context.id });
            return 'pong';
          }
        }
      })
    );
    const peer = rawPeer(right);
    connection.open();

    await peer.send({ jsonrpc: '2.0', id: null, method: 'ping', params: { n: 1 } });
    await peer.send({ jsonrpc: '2.0', id: 2, method: 'ping' });

    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 2, result: 'pong' });
    expect(seen[0]).toEqual({ params: { n: 1 }, id: null });
  });

  it('keeps serving when an invalid request reply cannot be delivered', async () => {
    const [left, right] = createPipe();
    const flaky: Session = {
      send: async (message) => {
        if (message.includes('-32600')) {
          throw new Error('transient');
        }

        await left.send(message);
      },
      receive: () => left.receive(),
      close: () => left.close()
    };
    const connection = track(new Connection(flaky, { handlers: { ping: () => 'pong' } }));
    const peer = rawPeer(right);
    connection.open();

    await peer.send({ jsonrpc: '2.0', foo: 1 });
    await peer.send('[1,2]');
    await peer.send({ jsonrpc: '2.0', id: 3, method: 'ping' });

    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 3, result: 'pong' });
    expect(connection.state).toBe('serving');
  });

  it('answers an empty batch with a single invalid request error', async () => {
    const [left, right] = createPipe();
    const connection = track(new Connection(left));
    const peer = rawPeer(right);
    connection.open();

    await peer.send('[]');
    await expect(peer.next()).resolves.toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, message: 'Invalid Request' }
    });
  });

  it('answers a batch with one element per request and none for notifications', async () => {
    const [left, right] = createPipe();
    const notified: unknown[] = [];
    const connection = track(
      new Connection(left, {
        handlers: {
          m: () => 'done',
          note: (params) => {
            notified.push(params);
          }
        }
      })
    );
    const peer = rawPeer(right);
    connection.open();

    await peer.send([
      { jsonrpc: '2.0', id: 1, method: 'm' },
      { jsonrpc: '2.0', method: 'note', params: ['x'] }
    ]);

    await expect(peer.next()).resolves.toEqual([{ jsonrpc: '2.0', id: 1, result: 'done' }]);
    expect(notified).toEqual([['x']]);
  });

  it('keeps batch replies in send order with invalid elements answered in place', async () => {
    const [left, right] = createPipe();
    const connection = track(
      new Connection(left, {
        handlers: {
          slow: async () => {
            await new Promise((resolve) => setTimeout(resolve, 15));
            return 'slow';
          },
          fast: () => 'fast'
        }
      })
    );
    const peer = rawPeer(right);
    connection.open();

    await peer.send([{ jsonrpc: '2.0', id: 1, method: 'slow' }, 42, { jsonrpc: '2.0', id: 2, method: 'fast' }]);

    await expect(peer.next()).resolves.toEqual([
      { jsonrpc: '2.0', id: 1, result: 'slow' },
      { jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request', data: { reason: 'message must be an object' } } },
      { jsonrpc: '2.0', id: 2, result: 'fast' }
    ]);
  });

  it('sends nothing for a batch of notifications', async () => {
    const [left, right] = createPipe();
    const connection = track(new Connection(left, { handlers: { ping: () => 'pong', note: () => undefined } }));
    const peer = rawPeer(right);
    connection.open();

    await peer.send([
      { jsonrpc: '2.0', method: 'note' },
      { jsonrpc: '2.0', method: 'note' }
    ]);
    await peer.send({ jsonrpc: '2.0', id: 2, method: 'ping' });

    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 2, result: 'pong' });
  });

  it('delivers responses carried inside a batch', async () => {
    const [left, right] = createPipe();
    const connection = track(new Connection(left));
    const peer = rawPeer(right);
    connection.open();

    const pending = connection.call(numberId(11), 'remote');
    await peer.next();
    await peer.send([{ jsonrpc: '2.0', id: 11, result: 'batched' }]);

    await expect(pending).resolves.toBe('batched');
  });

  it('runs handlers one at a time in sequential mode', async () => {
    const [left, right] = createPipe();
    const events: string[] = [];
    const connection = track(
      new Connection(left, {
        dispatch: 'sequential',
        handlers: {
          first: async () => {
            events.push('first:start');
            await new Promise((resolve) => setTimeout(resolve, 10));
            events.push('first:end');
            return 1;
          },
          second: () => {
            events.push('second');
            return 2;
          }
        }
      })
    );
    const peer = rawPeer(right);
    connection.open();

    await peer.send({ jsonrpc: '2.0', id: 1, method: 'first' });
    await peer.send({ jsonrpc: '2.0', id: 2, method: 'second' });
    await peer.next();
    await peer.next();

    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });
});

describe('connection shutdown', () => {
  it('fails in-flight calls with a closed-connection error', async () => {
    const [left, right] = createPipe();
    const client = track(new Connection(left));
    const peer = rawPeer(right);
    client.open();

    const pending = client.request('never');
    await peer.next();
    await client.close();

    await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(client.state).toBe('closed');
    expect(client.pendingCount).toBe(0);
  });

  it('closes idempotently and refuses new work afterwards', async () => {
    const [left] = createPipe();
    const client = new Connection(left);

    await client.close();
    await expect(client.close()).resolves.toBeUndefined();
    await expect(client.request('m')).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(client.notify('n')).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(client.serve()).rejects.toBeInstanceOf(ConnectionClosedError);
  });

  it('stops serving and closes when the peer goes away', async () => {
    const [left, right] = createPipe();
    const connection = new Connection(left);
    const serving = connection.serve();

    await right.close();

    await expect(serving).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(connection.state).toBe('closed');
  });

  it('stops serving with the abort reason when the signal fires', async () => {
    const [left] = createPipe();
    const connection = new Connection(left);
    const controller = new AbortController();
    const serving = connection.serve({ signal: controller.signal });

    expect(connection.state).toBe('serving');
    controller.abort(new Error('shutting down'));

    await expect(serving).rejects.toThrow('shutting down');
    expect(connection.state).toBe('closed');
  });

  it('refuses to serve twice at once', async () => {
    const [left] = createPipe();
    const connection = track(new Connection(left));
    connection.open();

    await expect(connection.serve()).rejects.toThrow('Connection is already serving.');
  });
});

describe('handler registry', () => {
  it('lets later registrations replace earlier ones and lists methods sorted', () => {
    const first = (): string => 'first';
    const second = (): string => 'second';
    const registry = new HandlerRegistry({ zeta: first, alpha: first }).register('zeta', second);

    expect(registry.get('zeta')).toBe(second);
    expect(registry.methods()).toEqual(['alpha', 'zeta']);
    expect(registry.unregister('alpha')).toBe(true);
    expect(registry.has('alpha')).toBe(false);
  });

  it('serves methods registered after the connection was built', async () => {
    const [left, right] = createPipe();
    const connection = track(new Connection(left));
    const peer = rawPeer(right);
    connection.register('late', () => 'registered');
    connection.open();

    await peer.send({ jsonrpc: '2.0', id: 1, method: 'late' });
    await expect(peer.next()).resolves.toEqual({ jsonrpc: '2.0', id: 1, result: 'registered' });
  });
});
