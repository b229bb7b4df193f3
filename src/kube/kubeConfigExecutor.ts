import type { KubeConfig } from '@kubernetes/client-node';
import fetch, { Headers, type RequestInit, type Response } from 'node-fetch';

import { logger as rootLogger, type Logger } from '../util/logger.js';
import { UsageError } from './errors.js';
import type { ApiRequest, ApiResponse, ApiStream, RequestExecutor } from './executor.js';

/** The part of a loaded kubeconfig the executor needs. */
export type ClusterConfig = Pick<KubeConfig, 'getCurrentCluster' | 'applyToFetchOptions'>;

interface PreparedRequest {
  url: string;
  init: RequestInit;
  controller: AbortController;
  /** Detaches the call from the caller's signal. */
  release: () => void;
}

/**
 * Sends requests to the current kubeconfig context's cluster. TLS material
 * and credentials come from `applyToFetchOptions`, so every auth flavour the
 * kubeconfig supports (tokens, client certificates, exec plugins) applies.
 */
export class KubeConfigExecutor implements RequestExecutor {
  private readonly log: Logger;

  constructor(
    private readonly kubeConfig: ClusterConfig,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child('http');
  }

  async execute(request: ApiRequest): Promise<ApiResponse> {
    const { url, init, release } = await this.prepare(request);
    try {
      const response = await fetch(url, init);
      const body = await response.text();
      this.log.debug(`${request.method} ${request.path} -> ${response.status}`);
      return { status: response.status, body };
    } finally {
      release();
    }
  }

  async openStream(request: ApiRequest): Promise<ApiStream> {
    const { url, init, controller, release } = await this.prepare(request);
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      release();
      throw error;
    }
    this.log.debug(`${request.method} ${request.path} (stream) -> ${response.status}`);
    return {
      status: response.status,
      body: response.body,
      close: () => {
        release();
        controller.abort();
      },
    };
  }

  private async prepare(request: ApiRequest): Promise<PreparedRequest> {
    const cluster = this.kubeConfig.getCurrentCluster();
    if (!cluster) {
      throw new UsageError('The kubeconfig has no current cluster');
    }

    const url = new URL(cluster.server);
    url.pathname = url.pathname.replace(/\/+$/, '') + request.path;
    for (const [key, value] of Object.entries(request.query)) {
      url.searchParams.set(key, value);
    }

    const init = await this.kubeConfig.applyToFetchOptions({});
    const headers = new Headers(init.headers);
    headers.set('Accept', 'application/json');
    if (request.contentType) {
      headers.set('Content-Type', request.contentType);
    }

    // One controller per call; close() on a stream must not touch any other request.
    const controller = new AbortController();
    const { signal } = request;
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    return {
      url: url.toString(),
      init: { ...init, method: request.method, headers, body: request.body, signal: controller.signal },
      controller,
      release: () => signal?.removeEventListener('abort', onAbort),
    };
  }
}
