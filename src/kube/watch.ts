import { setTimeout as sleep } from 'node:timers/promises';
import { TextDecoder } from 'node:util';

import { logger as rootLogger, type Logger } from '../util/logger.js';
import { resolveWatchConfig, type WatchConfig, type WatchConfigInput } from './config.js';
import {
  CancelledError,
  describeStatus,
  errorFromResponse,
  errorFromStatus,
  isAuthError,
  isGone,
  isRetryable,
  toClientError,
  type KubeClientError,
} from './errors.js';
import { isSuccess } from './executor.js';
import { decodeWatchFrame, LineSplitter } from './frames.js';
import type { ResourceClient } from './resourceClient.js';
import type { ListOptions, WatchEvent } from './types.js';

export type WatchState =
  | { phase: 'Listing' }
  | { phase: 'Watching'; resourceVersion: string }
  | { phase: 'Relisting'; reason: string }
  | { phase: 'Terminated'; reason: 'cancelled' }
  | { phase: 'Terminated'; reason: 'error'; error: KubeClientError };

export interface WatchOptions {
  /** Overrides for this watch only; unset fields keep the client's defaults. */
  config?: WatchConfigInput;
  /**
   * `full` drains every page of the initial list before watching.
   * `firstPage` emits only the first page (bounded by `limit`) and watches
   * from its resourceVersion. Relists always drain.
   */
  snapshot?: 'full' | 'firstPage';
  signal?: AbortSignal;
  logger?: Logger;
  onStateChange?: (state: WatchState) => void;
}

type Step = { next: 'list' } | { next: 'relist'; reason: string; backoff: boolean } | { next: 'watch' };

type ChunkResult = IteratorResult<Uint8Array | string> | 'idle' | 'cancelled';

/**
 * Exponential backoff with symmetric jitter: `base * 2^(attempt-1)`, capped
 * at `backoffMaxMs`, then scaled by a random factor in `1 ± backoffJitter`.
 */
export function backoffDelay(
  config: Pick<WatchConfig, 'backoffBaseMs' | 'backoffMaxMs' | 'backoffJitter'>,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(config.backoffMaxMs, config.backoffBaseMs * 2 ** Math.max(attempt - 1, 0));
  const jitter = exponential * config.backoffJitter * (random() * 2 - 1);
  return Math.max(0, Math.round(exponential + jitter));
}

/**
 * A list followed by an open-ended watch, exposed as one async sequence of
 * events.
 *
 * Every object present when the list runs arrives as `Added`; afterwards the
 * server's changes follow in order. Disconnects resume at the last seen
 * resourceVersion. Expired history triggers a relist, after which the whole
 * collection is announced as `Added` again and callers should treat objects
 * that did not reappear as deleted.
 *
 * The sequence ends normally on `stop()`, on `break`, or when `signal`
 * aborts. It throws only when the watch cannot continue.
 */
export class ListWatch<T> implements AsyncIterable<WatchEvent<T>> {
  private readonly config: WatchConfig;
  private readonly log: Logger;
  private readonly controller = new AbortController();
  private generator: AsyncGenerator<WatchEvent<T>, void, undefined> | undefined;
  private currentState: WatchState = { phase: 'Listing' };
  private lastResourceVersion = '';
  private authFailures = 0;
  private failures = 0;

  constructor(
    private readonly client: ResourceClient<T>,
    private readonly namespace: string | undefined,
    private readonly listOptions: ListOptions,
    private readonly options: WatchOptions = {},
    defaults?: WatchConfig,
  ) {
    this.config = resolveWatchConfig({ ...defaults, ...options.config });
    this.log = options.logger ?? rootLogger.child('watch');
    if (options.signal?.aborted) {
      this.controller.abort();
    }
  }

  get state(): WatchState {
    return this.currentState;
  }

  /** The resume point: the last version listed, bookmarked or observed. */
  get resourceVersion(): string {
    return this.lastResourceVersion;
  }

  [Symbol.asyncIterator](): AsyncGenerator<WatchEvent<T>, void, undefined> {
    this.generator ??= this.run();
    return this.generator;
  }

  /** Cancels the watch and waits until its connection has been released. */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.generator) {
      await this.generator.return(undefined);
    }
    if (this.currentState.phase !== 'Terminated') {
      this.setState({ phase: 'Terminated', reason: 'cancelled' });
    }
  }

  private setState(state: WatchState): void {
    this.currentState = state;
    this.log.debug(`state ${state.phase}`, 'reason' in state ? { reason: state.reason } : undefined);
    this.options.onStateChange?.(state);
  }

  private async *run(): AsyncGenerator<WatchEvent<T>, void, undefined> {
    const signal = this.controller.signal;
    const forwardAbort = (): void => this.controller.abort();
    this.options.signal?.addEventListener('abort', forwardAbort, { once: true });

    let step: Step = { next: 'list' };
    try {
      while (!signal.aborted) {
        try {
          if (step.next === 'watch') {
            this.setState({ phase: 'Watching', resourceVersion: this.lastResourceVersion });
            step = yield* this.watchOnce(signal);
          } else if (step.next === 'relist') {
            if (step.backoff) {
              await this.pause(this.failures, signal);
              if (signal.aborted) break;
            }
            this.lastResourceVersion = '';
            this.setState({ phase: 'Relisting', reason: step.reason });
            yield* this.listPhase(this.relistOptions(), true, signal);
            step = { next: 'watch' };
          } else {
            this.setState({ phase: 'Listing' });
            yield* this.listPhase(this.listOptions, this.options.snapshot !== 'firstPage', signal);
            step = { next: 'watch' };
          }
        } catch (error) {
          step = await this.recover(toClientError(error), step, signal);
        }
      }
    } finally {
      this.options.signal?.removeEventListener('abort', forwardAbort);
      this.controller.abort();
      if (this.currentState.phase !== 'Terminated') {
        this.setState({ phase: 'Terminated', reason: 'cancelled' });
      }
    }
  }

  private relistOptions(): ListOptions {
    return {
      labelSelector: this.listOptions.labelSelector,
      fieldSelector: this.listOptions.fieldSelector,
      limit: this.listOptions.limit,
      timeoutSeconds: this.listOptions.timeoutSeconds,
    };
  }

  private async *listPhase(first: ListOptions, drain: boolean, signal: AbortSignal): AsyncGenerator<WatchEvent<T>, void, undefined> {
    let opts = first;
    let pages = 0;
    let items = 0;
    for (;;) {
      const page = await this.client.list(this.namespace, opts, { signal });
      pages += 1;
      const continueToken = drain ? page.metadata.continueToken : undefined;
      if (!continueToken) {
        this.lastResourceVersion = page.metadata.resourceVersion;
      }

      for (const object of page.items) {
        if (signal.aborted) return;
        items += 1;
        yield { type: 'Added', object };
      }

      if (!continueToken) {
        break;
      }
      // A continue token already pins the snapshot.
      opts = { ...opts, continueToken, resourceVersion: undefined };
    }

    this.authFailures = 0;
    this.failures = 0;
    this.log.debug('list complete', { pages, items, resourceVersion: this.lastResourceVersion });
  }

  private async *watchOnce(signal: AbortSignal): AsyncGenerator<WatchEvent<T>, Step, undefined> {
    const stream = await this.client.openWatchStream(
      this.namespace,
      {
        labelSelector: this.listOptions.labelSelector,
        fieldSelector: this.listOptions.fieldSelector,
        timeoutSeconds: this.listOptions.timeoutSeconds,
        resourceVersion: this.lastResourceVersion || undefined,
      },
      this.config.allowBookmarks,
      { signal },
    );

    try {
      const iterator = stream.body[Symbol.asyncIterator]();
      if (!isSuccess(stream.status)) {
        const body = await this.readBody(iterator, signal);
        if (signal.aborted) return { next: 'watch' };
        throw errorFromResponse(stream.status, body);
      }

      const splitter = new LineSplitter();
      // Only complete frames count as activity; partial bytes do not move the deadline.
      const idleTimeoutMs = this.config.idleTimeoutMs;
      let idleDeadline = Date.now() + idleTimeoutMs;
      for (;;) {
        const remaining = idleTimeoutMs > 0 ? Math.max(1, idleDeadline - Date.now()) : 0;
        const chunk = await this.nextChunk(iterator, signal, remaining);
        if (chunk === 'cancelled') {
          return { next: 'watch' };
        }
        if (chunk === 'idle') {
          this.log.info('no events within idle timeout, reconnecting', {
            idleTimeoutMs: this.config.idleTimeoutMs,
            resourceVersion: this.lastResourceVersion,
          });
          return { next: 'watch' };
        }

        const lines = chunk.done ? splitter.flush() : splitter.push(chunk.value);
        if (lines.length > 0) {
          idleDeadline = Date.now() + idleTimeoutMs;
        }
        for (const line of lines) {
          const frame = decodeWatchFrame(this.client.codec, line);
          if (frame.type === 'Error') {
            const error = errorFromStatus(frame.status.code ?? 500, frame.status);
            if (isGone(error)) {
              this.log.info('watch history expired, relisting', { resourceVersion: this.lastResourceVersion });
              return { next: 'relist', reason: describeStatus(frame.status), backoff: false };
            }
            if (isAuthError(error)) {
              throw error;
            }
            this.failures += 1;
            this.log.warn('watch reported an error, relisting', { status: describeStatus(frame.status) });
            return { next: 'relist', reason: describeStatus(frame.status), backoff: true };
          }

          if (signal.aborted) {
            return { next: 'watch' };
          }
          this.authFailures = 0;
          this.failures = 0;
          if (frame.type === 'Bookmark') {
            this.lastResourceVersion = frame.resourceVersion;
          } else {
            this.lastResourceVersion = this.client.codec.metadata(frame.object).resourceVersion ?? this.lastResourceVersion;
          }
          yield frame;
        }

        if (chunk.done) {
          this.log.debug('watch stream ended, reconnecting', { resourceVersion: this.lastResourceVersion });
          return { next: 'watch' };
        }
      }
    } finally {
      stream.close();
    }
  }

  /**
   * Waits for the next chunk, `idleMs` (0 waits forever) or cancellation,
   * whichever comes first. The pending read keeps its handlers so a later rejection
   * (from `close()`) is never unhandled.
   */
  private nextChunk(
    iterator: AsyncIterator<Uint8Array | string>,
    signal: AbortSignal,
    idleMs: number = this.config.idleTimeoutMs,
  ): Promise<ChunkResult> {
    if (signal.aborted) {
      return Promise.resolve('cancelled');
    }

    return new Promise<ChunkResult>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const onAbort = (): void => settle(() => resolve('cancelled'));
      const settle = (action: () => void): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        action();
      };

      if (idleMs > 0) {
        timer = setTimeout(() => settle(() => resolve('idle')), idleMs);
      }
      signal.addEventListener('abort', onAbort, { once: true });
      iterator.next().then(
        (result) => settle(() => resolve(result)),
        (error: unknown) => settle(() => reject(error)),
      );
    });
  }

  private async readBody(iterator: AsyncIterator<Uint8Array | string>, signal: AbortSignal): Promise<string> {
    const decoder = new TextDecoder();
    let text = '';
    for (;;) {
      const chunk = await this.nextChunk(iterator, signal);
      if (chunk === 'cancelled' || chunk === 'idle') {
        return text;
      }
      if (chunk.done) {
        return text + decoder.decode();
      }
      text += typeof chunk.value === 'string' ? chunk.value : decoder.decode(chunk.value, { stream: true });
    }
  }

  /** Picks the step after a failure, or throws when the watch must end. */
  private async recover(error: KubeClientError, step: Step, signal: AbortSignal): Promise<Step> {
    if (error instanceof CancelledError || signal.aborted) {
      return step;
    }

    if (isGone(error)) {
      this.log.info('resourceVersion expired, relisting', { resourceVersion: this.lastResourceVersion });
      return { next: 'relist', reason: error.message, backoff: false };
    }

    if (isAuthError(error)) {
      this.authFailures += 1;
      if (this.authFailures > this.config.authRetryLimit) {
        throw this.terminate(error);
      }
      this.log.warn('authorization rejected, retrying', { attempt: this.authFailures, code: error.code });
      await this.pause(this.authFailures, signal);
      return step;
    }

    if (isRetryable(error)) {
      this.failures += 1;
      const limit = this.config.maxTransportRetries;
      if (limit !== undefined && this.failures > limit) {
        throw this.terminate(error);
      }
      this.log.warn(`${error.message}, retrying`, { attempt: this.failures, resourceVersion: this.lastResourceVersion });
      await this.pause(this.failures, signal);
      return step;
    }

    throw this.terminate(error);
  }

  private terminate(error: KubeClientError): KubeClientError {
    this.log.error('watch terminated', error, { kind: error.kind });
    this.setState({ phase: 'Terminated', reason: 'error', error });
    return error;
  }

  private async pause(attempt: number, signal: AbortSignal): Promise<void> {
    const delay = backoffDelay(this.config, attempt);
    if (delay <= 0) {
      return;
    }
    try {
      await sleep(delay, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  }
}
