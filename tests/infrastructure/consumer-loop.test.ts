import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryBroker } from '../../src/infrastructure/broker/index.js';
import type { BrokerChannel, BrokerConnection, DeliveryHandler } from '../../src/infrastructure/broker/index.js';
import { Publisher } from '../../src/infrastructure/queue/index.js';
import { ConsumerLoop } from '../../src/infrastructure/worker/index.js';
import type { ConsumerLoopOptions } from '../../src/infrastructure/worker/index.js';
import { HandlerRegistry } from '../../src/application/index.js';
import type { HandlerContext, MessageHandler } from '../../src/application/index.js';
import { ProcessingError } from '../../src/domain/index.js';
import type { Message } from '../../src/domain/index.js';
import { bodiesAsJson, fakeLogger, sampleMessage } from '../helpers.js';

const QUEUE = 'orders';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

let running: ConsumerLoop[] = [];

afterEach(async () => {
  await Promise.all(running.map((loop) => loop.stop(0)));
  running = [];
});

async function setup(
  handler: MessageHandler,
  options: Partial<ConsumerLoopOptions> = {},
  wrap: (connection: BrokerConnection) => BrokerConnection = (c) => c,
) {
  const log = fakeLogger();
  const broker = new MemoryBroker(log);
  const connection = broker.connect();
  const registry = new HandlerRegistry().register('test_event', handler);

  const loop = new ConsumerLoop({
    connection: wrap(connection),
    queueName: QUEUE,
    registry,
    log,
    maxRetries: 3,
    ...options,
  });
  await loop.start();
  running.push(loop);

  const publisher = new Publisher(await connection.openChannel(), log);
  const publish = (message: Message) => publisher.publish(message, QUEUE);

  return { broker, loop, log, publish };
}

describe('ConsumerLoop', () => {
  it('acks a message its handler processes', async () => {
    const handler = vi.fn<MessageHandler>().mockResolvedValue(undefined);
    const { broker, loop, publish } = await setup(handler);

    await publish(sampleMessage({ id: 'ok-1' }));
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));
    await loop.stop(1000);

    expect(handler.mock.calls[0]?.[0]).toEqual(sampleMessage({ id: 'ok-1' }));
    expect(broker.depth(QUEUE)).toBe(0);
    expect(broker.depth(`${QUEUE}_retry`)).toBe(0);
    expect(broker.depth(`${QUEUE}_dead`)).toBe(0);
  });

  it('acks a login event on its first delivery', async () => {
    const login = vi.fn<MessageHandler>().mockResolvedValue(undefined);
    const registry = new HandlerRegistry().register('login', login);
    const { broker, loop, publish } = await setup(vi.fn<MessageHandler>(), { registry });

    await publish(sampleMessage({ id: 'login-1', type: 'login', payload: { ip: '10.0.0.1' } }));
    await vi.waitFor(() => expect(login).toHaveBeenCalledTimes(1));
    await loop.stop(1000);

    expect(login.mock.calls[0]?.[0]).toMatchObject({ type: 'login', payload: { ip: '10.0.0.1' }, retryCount: 0 });
    expect(broker.depth(QUEUE)).toBe(0);
    expect(broker.depth(`${QUEUE}_dead`)).toBe(0);
  });

  it('dead-letters a message that always fails after three attempts', async () => {
    const handler = vi.fn<MessageHandler>().mockRejectedValue(new ProcessingError('downstream unavailable'));
    const { broker, log, publish } = await setup(handler);

    await publish(sampleMessage({ id: 'poison' }));
    await vi.waitFor(() => expect(broker.depth(`${QUEUE}_dead`)).toBe(1));

    expect(handler.mock.calls.map(([m]) => m.retryCount)).toEqual([0, 1, 2]);
    expect(handler.mock.calls.map(([m]) => m.id)).toEqual(['poison', 'poison', 'poison']);
    expect(bodiesAsJson(broker.messages(`${QUEUE}_dead`))).toEqual([
      { id: 'poison', type: 'test_event', payload: { n: 1 }, created_at: '2026-01-02T03:04:05.000Z', retry_count: 3 },
    ]);
    expect(broker.depth(QUEUE)).toBe(0);
    expect(broker.depth(`${QUEUE}_retry`)).toBe(0);
    expect(vi.mocked(log.warn)).toHaveBeenCalledWith(
      expect.objectContaining({ retry_count: 3, queue: `${QUEUE}_dead` }),
      'Message dead-lettered after exhausting retries',
    );
  });

  it('processes the retry copy when a message fails once', async () => {
    const handler = vi
      .fn<MessageHandler>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue(undefined);
    const { broker, loop, publish } = await setup(handler);

    await publish(sampleMessage({ id: 'flaky-1' }));
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(2));
    await loop.stop(1000);

    expect(handler.mock.calls[1]?.[0]).toEqual(sampleMessage({ id: 'flaky-1', retryCount: 1 }));
    expect(broker.depth(QUEUE)).toBe(0);
    expect(broker.depth(`${QUEUE}_retry`)).toBe(0);
    expect(broker.depth(`${QUEUE}_dead`)).toBe(0);
  });

  it('acks on the third attempt when the first two fail', async () => {
    const handler = vi
      .fn<MessageHandler>()
      .mockRejectedValueOnce(new ProcessingError('attempt 1'))
      .mockRejectedValueOnce(new ProcessingError('attempt 2'))
      .mockResolvedValue(undefined);
    const { broker, loop, publish } = await setup(handler);

    await publish(sampleMessage({ id: 'third-time' }));
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(3));
    await loop.stop(1000);

    expect(handler.mock.calls.map(([m]) => m.retryCount)).toEqual([0, 1, 2]);
    expect(handler).toHaveBeenCalledTimes(3);
    expect(broker.depth(QUEUE)).toBe(0);
    expect(broker.depth(`${QUEUE}_retry`)).toBe(0);
    expect(broker.depth(`${QUEUE}_dead`)).toBe(0);
  });

  it('requeues a malformed body once and then dead-letters it raw', async () => {
    const handler = vi.fn<MessageHandler>().mockResolvedValue(undefined);
    const { broker } = await setup(handler);
    const channel = await broker.connect().openChannel();

    await channel.send(QUEUE, Buffer.from('not json at all'));
    await vi.waitFor(() => expect(broker.depth(`${QUEUE}_dead`)).toBe(1));

    expect(broker.messages(`${QUEUE}_dead`).map(String)).toEqual(['not json at all']);
    expect(broker.depth(QUEUE)).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('acks unknown message types through the default handler', async () => {
    const handler = vi.fn<MessageHandler>().mockResolvedValue(undefined);
    const { broker, loop, log, publish } = await setup(handler);

    await publish(sampleMessage({ id: 'mystery', type: 'unheard_of' }));
    await vi.waitFor(() =>
      expect(vi.mocked(log.warn)).toHaveBeenCalledWith(
        { message_id: 'mystery', type: 'unheard_of' },
        'No handler registered for message type, acknowledging without processing',
      ),
    );
    await loop.stop(1000);

    expect(handler).not.toHaveBeenCalled();
    expect(broker.depth(QUEUE)).toBe(0);
    expect(broker.depth(`${QUEUE}_retry`)).toBe(0);
  });

  it('fails a handler that exceeds the processing timeout and aborts its signal', async () => {
    const signals: AbortSignal[] = [];
    const handler = vi.fn<MessageHandler>((_message, ctx: HandlerContext) => {
      signals.push(ctx.signal);
      return new Promise<void>(() => undefined);
    });
    const { broker, publish } = await setup(handler, { handlerTimeoutMs: 20, maxRetries: 1 });

    await publish(sampleMessage({ id: 'slow' }));
    await vi.waitFor(() => expect(broker.depth(`${QUEUE}_dead`)).toBe(1));

    expect(bodiesAsJson(broker.messages(`${QUEUE}_dead`))).toEqual([
      expect.objectContaining({ id: 'slow', retry_count: 1 }),
    ]);
    expect(signals[0]?.aborted).toBe(true);
    expect(signals[0]?.reason).toBeInstanceOf(ProcessingError);
  });

  it('requeues the original when the retry publish fails', async () => {
    const handler = vi
      .fn<MessageHandler>()
      .mockRejectedValueOnce(new Error('first attempt fails'))
      .mockResolvedValue(undefined);

    // Writes to the retry queue fail; everything else reaches the broker.
    const failRetryWrites = (connection: BrokerConnection): BrokerConnection => ({
      kind: connection.kind,
      onLost: (listener) => connection.onLost(listener),
      close: () => connection.close(),
      openChannel: async (): Promise<BrokerChannel> => {
        const real = await connection.openChannel();
        return {
          declare: (queue, options) => real.declare(queue, options),
          send: async (queue, body) => {
            if (queue === `${QUEUE}_retry`) throw new Error('disk full');
            await real.send(queue, body);
          },
          subscribe: (queues, onDelivery, options) => real.subscribe(queues, onDelivery, options),
          get: (queue) => real.get(queue),
          depth: (queue) => real.depth(queue),
          close: () => real.close(),
        };
      },
    });

    const { broker, loop, log, publish } = await setup(handler, {}, failRetryWrites);

    await publish(sampleMessage({ id: 'kept' }));
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(2));
    await loop.stop(1000);

    // The second attempt is the original message, not a retry copy
    expect(handler.mock.calls[1]?.[0]).toEqual(sampleMessage({ id: 'kept', retryCount: 0 }));
    expect(broker.depth(QUEUE)).toBe(0);
    expect(vi.mocked(log.error)).toHaveBeenCalledWith(
      expect.objectContaining({ queue: `${QUEUE}_retry` }),
      'Failed to resubmit message, requeueing original',
    );
  });

  it('waits for the in-flight message during the grace period', async () => {
    const release = deferred();
    const handler = vi.fn<MessageHandler>(() => release.promise);
    const { broker, loop, publish } = await setup(handler);

    await publish(sampleMessage({ id: 'in-flight' }));
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));

    const stopped = loop.stop(1000);
    release.resolve();
    await stopped;

    expect(broker.depth(QUEUE)).toBe(0);
    expect(loop.running).toBe(false);
  });

  it('abandons the in-flight message when the grace period elapses', async () => {
    const release = deferred();
    const signals: AbortSignal[] = [];
    const handler = vi.fn<MessageHandler>((_message, ctx) => {
      signals.push(ctx.signal);
      return release.promise;
    });
    const { broker, loop, log, publish } = await setup(handler);

    await publish(sampleMessage({ id: 'abandoned' }));
    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(1));

    await loop.stop(10);

    // Unacked message went back to its queue for another worker
    expect(broker.depth(QUEUE)).toBe(1);
    expect(signals[0]?.aborted).toBe(true);

    // Finishing late neither acks nor publishes
    release.resolve();
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(broker.depth(QUEUE)).toBe(1);
    expect(broker.depth(`${QUEUE}_retry`)).toBe(0);
    expect(vi.mocked(log.error)).not.toHaveBeenCalled();
  });

  it('takes no new deliveries after stop', async () => {
    const handler = vi.fn<MessageHandler>().mockResolvedValue(undefined);
    const { broker, loop, publish } = await setup(handler);

    await loop.stop(100);
    await publish(sampleMessage({ id: 'late' }));
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(handler).not.toHaveBeenCalled();
    expect(broker.depth(QUEUE)).toBe(1);
  });

  it('stops when the shared signal is aborted', async () => {
    const controller = new AbortController();
    const handler = vi.fn<MessageHandler>().mockResolvedValue(undefined);
    const { loop } = await setup(handler, { signal: controller.signal });

    controller.abort();

    await vi.waitFor(() => expect(loop.running).toBe(false));
  });

  it('closes its channel when the queues cannot be declared', async () => {
    const log = fakeLogger();
    const broker = new MemoryBroker(log);
    const connection = broker.connect();
    const channel = await connection.openChannel();
    await channel.declare(`${QUEUE}_dead`, { durable: false });

    const loop = new ConsumerLoop({ connection, queueName: QUEUE, registry: new HandlerRegistry(), log });

    await expect(loop.start()).rejects.toThrow(`Failed to declare queue ${QUEUE}_dead`);
    expect(loop.running).toBe(false);
  });

  it('tears down a loop stopped while it is still starting', async () => {
    const log = fakeLogger();
    const broker = new MemoryBroker(log);
    const connection = broker.connect();
    const handler = vi.fn<MessageHandler>().mockResolvedValue(undefined);
    const loop = new ConsumerLoop({
      connection,
      queueName: QUEUE,
      registry: new HandlerRegistry().register('test_event', handler),
      log,
    });

    const started = loop.start();
    await Promise.resolve();
    await Promise.resolve();
    await loop.stop(10);
    await started;

    expect(loop.running).toBe(false);

    const publisher = new Publisher(await connection.openChannel(), log);
    await publisher.publish(sampleMessage({ id: 'after-stop' }), QUEUE);
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(handler).not.toHaveBeenCalled();
    expect(broker.depth(QUEUE)).toBe(1);
    expect(vi.mocked(log.info)).not.toHaveBeenCalledWith(expect.anything(), 'Consumer started');
  });

  it('leaves a malformed delivery unsettled once stopped', async () => {
    let onDelivery: DeliveryHandler | undefined;
    const captureHandler = (connection: BrokerConnection): BrokerConnection => ({
      kind: connection.kind,
      onLost: (listener) => connection.onLost(listener),
      close: () => connection.close(),
      openChannel: async (): Promise<BrokerChannel> => {
        const real = await connection.openChannel();
        return {
          declare: (queue, options) => real.declare(queue, options),
          send: (queue, body) => real.send(queue, body),
          subscribe: (queues, handler, options) => {
            onDelivery = handler;
            return real.subscribe(queues, handler, options);
          },
          get: (queue) => real.get(queue),
          depth: (queue) => real.depth(queue),
          close: () => real.close(),
        };
      },
    });
    const { loop } = await setup(vi.fn<MessageHandler>(), {}, captureHandler);
    await loop.stop(10);

    const ack = vi.fn(async () => undefined);
    const nack = vi.fn(async (_requeue: boolean) => undefined);
    await onDelivery?.({ queue: QUEUE, body: Buffer.from('{broken'), redelivered: false, ack, nack });

    expect(onDelivery).toBeDefined();
    expect(ack).not.toHaveBeenCalled();
    expect(nack).not.toHaveBeenCalled();
  });
});
