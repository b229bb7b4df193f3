import { describe, it, expect, vi } from 'vitest';

import { FakeExecutor, FakeStream, pod, podList, status } from '../__tests__/support/fakeExecutor.js';
import type { Logger } from '../util/logger.js';
import { unstructuredCodec } from './codec.js';
import { resolveWatchConfig } from './config.js';
import { DecodeError, TransportError, UnauthorizedError } from './errors.js';
import { resourceIdentity } from './identity.js';
import { ResourceClient } from './resourceClient.js';
import type { WatchEvent } from './types.js';
import type { UnstructuredObject } from './unstructured.js';
import { backoffDelay, type WatchState } from './watch.js';

const silent: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: () => silent,
};

const pods = resourceIdentity({ group: '', version: 'v1', resource: 'pods', namespaced: true });

const fastConfig = resolveWatchConfig({ backoffBaseMs: 0, backoffMaxMs: 0, idleTimeoutMs: 0 });

function podClient(executor: FakeExecutor): ResourceClient<UnstructuredObject> {
  return new ResourceClient(executor, pods, unstructuredCodec, { logger: silent, watchConfig: fastConfig });
}

function frame(type: string, object: unknown): string {
  return JSON.stringify({ type, object });
}

function summarize(event: WatchEvent<UnstructuredObject>): string {
  return event.type === 'Bookmark' ? `Bookmark ${event.resourceVersion}` : `${event.type} ${event.object.getName()}`;
}

describe('ListWatch', () => {
  it('should list every page, watch from the final version and relist on an expired-history frame', async () => {
    const executor = new FakeExecutor()
      .respond(200, podList([pod('a', '90'), pod('b', '95')], '100', 'page-2'))
      .respond(200, podList([pod('c', '98')], '100'))
      .stream(new FakeStream(200, [frame('MODIFIED', pod('a', '101')), frame('ERROR', { code: 410 })]))
      .respond(200, podList([pod('a', '101'), pod('c', '98')], '120', 'relist-2'))
      .respond(200, podList([pod('d', '110')], '120'));

    const states: WatchState['phase'][] = [];
    const watch = podClient(executor).watch('default', { limit: 2 }, { onStateChange: (state) => states.push(state.phase) });

    const seen: string[] = [];
    const versions: string[] = [];
    for await (const event of watch) {
      seen.push(summarize(event));
      versions.push(watch.resourceVersion);
      if (seen.length === 7) break;
    }

    expect(seen).toEqual(['Added a', 'Added b', 'Added c', 'Modified a', 'Added a', 'Added c', 'Added d']);
    expect(versions).toEqual(['', '', '100', '101', '', '', '120']);
    expect(executor.requests.map((request) => request.query)).toEqual([
      { limit: '2' },
      { limit: '2', continue: 'page-2' },
      { limit: '2' },
      { limit: '2', continue: 'relist-2' },
    ]);
    expect(executor.streamRequests).toHaveLength(1);
    expect(executor.streamRequests[0].path).toBe('/api/v1/namespaces/default/pods');
    expect(executor.streamRequests[0].query).toEqual({ resourceVersion: '100', watch: 'true', allowWatchBookmarks: 'true' });
    expect(executor.openedStreams[0].closeCount).toBe(1);
    expect(states).toEqual(['Listing', 'Watching', 'Relisting', 'Terminated']);
    expect(watch.state).toEqual({ phase: 'Terminated', reason: 'cancelled' });
  });

  it('should reopen at the last observed version after the stream ends', async () => {
    const executor = new FakeExecutor()
      .respond(200, podList([pod('a', '5')], '5'))
      .stream(new FakeStream(200, [frame('ADDED', pod('b', '6')), frame('MODIFIED', pod('a', '7'))]).end());

    const watch = podClient(executor).watch('default');
    const iterator = watch[Symbol.asyncIterator]();

    const events: string[] = [];
    for (let i = 0; i < 3; i++) {
      const next = await iterator.next();
      if (!next.done) events.push(summarize(next.value));
    }
    expect(events).toEqual(['Added a', 'Added b', 'Modified a']);

    const pending = iterator.next();
    await vi.waitFor(() => expect(executor.streamRequests).toHaveLength(2));

    expect(executor.streamRequests[1].query.resourceVersion).toBe('7');
    expect(executor.requests).toHaveLength(1);

    await watch.stop();
    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(executor.openedStreams.map((stream) => stream.closeCount)).toEqual([1, 1]);
    expect(watch.state).toEqual({ phase: 'Terminated', reason: 'cancelled' });
  });

  it('should relist without a pinned version when the watch is opened with 410', async () => {
    const expired = status(410, 'Expired', 'too old resource version: 10 (20)');
    const executor = new FakeExecutor()
      .respond(200, podList([pod('a', '3')], '10'))
      .stream(new FakeStream(410, [JSON.stringify(expired)]).end())
      .respond(200, podList([pod('a', '3'), pod('b', '21')], '25'));

    const watch = podClient(executor).watch('default', { resourceVersion: '0' });
    const iterator = watch[Symbol.asyncIterator]();

    const events: string[] = [];
    for (let i = 0; i < 3; i++) {
      const next = await iterator.next();
      if (!next.done) events.push(summarize(next.value));
    }
    expect(events).toEqual(['Added a', 'Added a', 'Added b']);

    const pending = iterator.next();
    await vi.waitFor(() => expect(executor.streamRequests).toHaveLength(2));

    expect(executor.requests.map((request) => request.query)).toEqual([{ resourceVersion: '0' }, {}]);
    expect(executor.streamRequests[1].query.resourceVersion).toBe('25');

    await watch.stop();
    await pending;
  });

  it('should relist after a non-expiry error frame', async () => {
    const executor = new FakeExecutor()
      .respond(200, podList([pod('a', '1')], '1'))
      .stream(new FakeStream(200, [frame('ERROR', status(500, 'InternalError', 'etcd leader changed'))]))
      .respond(200, podList([pod('a', '1')], '2'));

    const states: WatchState[] = [];
    const watch = podClient(executor).watch('default', {}, { onStateChange: (state) => states.push(state) });

    const events: string[] = [];
    for await (const event of watch) {
      events.push(summarize(event));
      if (events.length === 2) break;
    }

    expect(events).toEqual(['Added a', 'Added a']);
    expect(executor.requests[1].query).toEqual({});
    expect(states).toContainEqual({ phase: 'Relisting', reason: 'InternalError: etcd leader changed' });
  });

  it('should stop delivering events and close the stream exactly once on stop()', async () => {
    const stream = new FakeStream();
    const executor = new FakeExecutor().respond(200, podList([pod('a', '1')], '1')).stream(stream);

    const watch = podClient(executor).watch('default');
    const iterator = watch[Symbol.asyncIterator]();
    await iterator.next();

    const pending = iterator.next();
    await vi.waitFor(() => expect(executor.streamRequests).toHaveLength(1));

    await watch.stop();
    stream.push(`${frame('ADDED', pod('late', '2'))}\n`);

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    expect(stream.closeCount).toBe(1);
    expect(watch.state).toEqual({ phase: 'Terminated', reason: 'cancelled' });
  });

  it('should close the stream when the consumer breaks out of the loop', async () => {
    const stream = new FakeStream(200, [frame('ADDED', pod('x', '2'))]);
    const executor = new FakeExecutor().respond(200, podList([], '1')).stream(stream);

    const watch = podClient(executor).watch('default');
    for await (const event of watch) {
      expect(summarize(event)).toBe('Added x');
      break;
    }

    expect(stream.closeCount).toBe(1);
    expect(watch.state).toEqual({ phase: 'Terminated', reason: 'cancelled' });
  });

  it('should end iteration when the caller signal aborts', async () => {
    const controller = new AbortController();
    const executor = new FakeExecutor().respond(200, podList([pod('a', '1')], '1'));

    const watch = podClient(executor).watch('default', {}, { signal: controller.signal });
    const events: string[] = [];
    for await (const event of watch) {
      events.push(summarize(event));
      controller.abort();
    }

    expect(events).toEqual(['Added a']);
    expect(executor.streamRequests).toHaveLength(0);
    expect(watch.state).toEqual({ phase: 'Terminated', reason: 'cancelled' });
  });

  it('should terminate with the auth error once the retry budget is spent', async () => {
    const unauthorized = JSON.stringify(status(401, 'Unauthorized', 'Unauthorized'));
    const executor = new FakeExecutor()
      .respond(200, podList([pod('a', '1')], '1'))
      .stream(new FakeStream(401, [unauthorized]).end())
      .stream(new FakeStream(401, [unauthorized]).end())
      .stream(new FakeStream(401, [unauthorized]).end());

    const watch = podClient(executor).watch('default', {}, { config: { authRetryLimit: 2 } });
    const events: string[] = [];
    const consume = async (): Promise<void> => {
      for await (const event of watch) {
        events.push(summarize(event));
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(UnauthorizedError);
    expect(events).toEqual(['Added a']);
    expect(executor.streamRequests).toHaveLength(3);
    expect(executor.openedStreams.map((stream) => stream.closeCount)).toEqual([1, 1, 1]);
    expect(watch.state).toMatchObject({ phase: 'Terminated', reason: 'error' });
  });

  it('should terminate immediately on an undecodable frame', async () => {
    const executor = new FakeExecutor()
      .respond(200, podList([], '1'))
      .stream(new FakeStream(200, ['{"type":"ADDED","object":{"metadata":']));

    const watch = podClient(executor).watch('default');
    const consume = async (): Promise<void> => {
      for await (const event of watch) {
        expect(event).toBeUndefined();
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(DecodeError);
    expect(executor.streamRequests).toHaveLength(1);
    expect(watch.state).toMatchObject({ phase: 'Terminated', reason: 'error' });
  });

  it('should forward bookmarks and advance the resume point', async () => {
    const bookmark = { kind: 'Pod', apiVersion: 'v1', metadata: { resourceVersion: '42' } };
    const executor = new FakeExecutor()
      .respond(200, podList([], '1'))
      .stream(new FakeStream(200, [frame('BOOKMARK', bookmark), frame('ADDED', pod('b', '43'))]));

    const watch = podClient(executor).watch('default');
    const seen: string[] = [];
    for await (const event of watch) {
      seen.push(`${summarize(event)} @${watch.resourceVersion}`);
      if (seen.length === 2) break;
    }

    expect(seen).toEqual(['Bookmark 42 @42', 'Added b @43']);
  });

  it('should retry a failed stream open at the same version', async () => {
    const executor = new FakeExecutor()
      .respond(200, podList([pod('a', '7')], '7'))
      .stream(new Error('socket hang up'));

    const watch = podClient(executor).watch('default');
    const iterator = watch[Symbol.asyncIterator]();
    await iterator.next();

    const pending = iterator.next();
    await vi.waitFor(() => expect(executor.streamRequests).toHaveLength(2));

    expect(executor.streamRequests.map((request) => request.query.resourceVersion)).toEqual(['7', '7']);
    expect(executor.requests).toHaveLength(1);

    await watch.stop();
    await pending;
  });

  it('should resume at the last observed version when the connection drops mid-stream', async () => {
    const dropped = new FakeStream(200, [frame('MODIFIED', pod('a', '6'))]).fail(new Error('read ECONNRESET'));
    const executor = new FakeExecutor().respond(200, podList([pod('a', '4')], '5')).stream(dropped);

    const states: WatchState['phase'][] = [];
    const watch = podClient(executor).watch('default', {}, { onStateChange: (state) => states.push(state.phase) });
    const iterator = watch[Symbol.asyncIterator]();

    const events: string[] = [];
    for (let i = 0; i < 2; i++) {
      const next = await iterator.next();
      if (!next.done) events.push(summarize(next.value));
    }
    expect(events).toEqual(['Added a', 'Modified a']);

    const pending = iterator.next();
    await vi.waitFor(() => expect(executor.streamRequests).toHaveLength(2));

    expect(executor.streamRequests.map((request) => request.query.resourceVersion)).toEqual(['5', '6']);
    expect(executor.requests).toHaveLength(1);
    expect(dropped.closeCount).toBe(1);
    expect(states).not.toContain('Relisting');

    await watch.stop();
    await pending;
  });

  it('should give up after maxTransportRetries consecutive failures', async () => {
    const executor = new FakeExecutor()
      .respond(200, podList([], '7'))
      .stream(new Error('connection reset'))
      .stream(new Error('connection reset'));

    const watch = podClient(executor).watch('default', {}, { config: { maxTransportRetries: 1 } });
    const consume = async (): Promise<void> => {
      for await (const event of watch) {
        expect(event).toBeUndefined();
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(TransportError);
    expect(executor.streamRequests).toHaveLength(2);
  });

  it('should reconnect without relisting when the stream goes idle', async () => {
    const executor = new FakeExecutor().respond(200, podList([], '3'));

    const watch = podClient(executor).watch('default', {}, { config: { idleTimeoutMs: 50 } });
    const iterator = watch[Symbol.asyncIterator]();
    const pending = iterator.next();

    await vi.waitFor(() => expect(executor.streamRequests.length).toBeGreaterThanOrEqual(2), { interval: 5 });

    expect(executor.streamRequests[1].query.resourceVersion).toBe('3');
    expect(executor.openedStreams[0].closeCount).toBe(1);
    expect(executor.requests).toHaveLength(1);

    await watch.stop();
    await expect(pending).resolves.toEqual({ done: true, value: undefined });
  });

  it('should time out a stream that trickles bytes without completing a frame', async () => {
    const trickle = new FakeStream();
    const executor = new FakeExecutor().respond(200, podList([], '8')).stream(trickle);
    const ticker = setInterval(() => trickle.push('{"type"'), 10);

    const watch = podClient(executor).watch('default', {}, { config: { idleTimeoutMs: 60 } });
    const pending = watch[Symbol.asyncIterator]().next();

    try {
      await vi.waitFor(() => expect(executor.streamRequests.length).toBeGreaterThanOrEqual(2), { interval: 5 });
    } finally {
      clearInterval(ticker);
    }

    expect(trickle.closeCount).toBe(1);
    expect(executor.streamRequests[1].query.resourceVersion).toBe('8');
    expect(executor.requests).toHaveLength(1);

    await watch.stop();
    await expect(pending).resolves.toEqual({ done: true, value: undefined });
  });

  it('should watch from the first page when only a bounded snapshot is requested', async () => {
    const executor = new FakeExecutor().respond(200, podList([pod('a', '40')], '50', 'more'));

    const watch = podClient(executor).watch('default', { limit: 1 }, { snapshot: 'firstPage' });
    const iterator = watch[Symbol.asyncIterator]();
    await iterator.next();

    const pending = iterator.next();
    await vi.waitFor(() => expect(executor.streamRequests).toHaveLength(1));

    expect(executor.requests).toHaveLength(1);
    expect(executor.streamRequests[0].query).toEqual({ resourceVersion: '50', watch: 'true', allowWatchBookmarks: 'true' });

    await watch.stop();
    await pending;
  });
});

describe('backoffDelay', () => {
  const config = { backoffBaseMs: 500, backoffMaxMs: 30_000, backoffJitter: 0.2 };

  it('should double per attempt up to the cap', () => {
    const noJitter = () => 0.5;
    expect(backoffDelay(config, 1, noJitter)).toBe(500);
    expect(backoffDelay(config, 3, noJitter)).toBe(2000);
    expect(backoffDelay(config, 10, noJitter)).toBe(30_000);
  });

  it('should stay within the jitter band', () => {
    expect(backoffDelay(config, 1, () => 0)).toBe(400);
    expect(backoffDelay(config, 1, () => 1)).toBe(600);
  });
});
