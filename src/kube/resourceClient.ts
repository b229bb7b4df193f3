import { logger as rootLogger, type Logger } from '../util/logger.js';
import { decodeObject, type ObjectCodec } from './codec.js';
import { resolveWatchConfig, type WatchConfig } from './config.js';
import { DecodeError, errorFromResponse, toClientError, UsageError } from './errors.js';
import { isSuccess, type ApiRequest, type ApiResponse, type ApiStream, type HttpMethod, type RequestExecutor } from './executor.js';
import { formatIdentity, resourcePath, type ResourceIdentity } from './identity.js';
import type {
  DeleteOptions,
  GetOptions,
  ListOptions,
  ObjectList,
  Patch,
  PatchOptions,
  WriteOptions,
} from './types.js';
import { ListWatch, type WatchOptions } from './watch.js';
import { isUnstructuredMap, parseWire } from './wire.js';

const DEFAULT_FIELD_MANAGER = 'kube-resource-client';
const APPLICATION_JSON = 'application/json';

const PATCH_CONTENT_TYPES: Record<Patch['type'], string> = {
  json: 'application/json-patch+json',
  merge: 'application/merge-patch+json',
  'strategic-merge': 'application/strategic-merge-patch+json',
  apply: 'application/apply-patch+yaml',
};

export interface CallContext {
  signal?: AbortSignal;
}

export interface ResourceClientOptions {
  /** Defaults for every watch opened through this client. */
  watchConfig?: WatchConfig;
  logger?: Logger;
}

export function listQuery(opts: ListOptions): Record<string, string> {
  const query: Record<string, string> = {};
  if (opts.limit !== undefined) {
    if (!Number.isInteger(opts.limit) || opts.limit <= 0) {
      throw new UsageError(`limit must be a positive integer, got ${opts.limit}`);
    }
    query.limit = String(opts.limit);
  }
  if (opts.continueToken) query.continue = opts.continueToken;
  if (opts.resourceVersion !== undefined) query.resourceVersion = opts.resourceVersion;
  if (opts.labelSelector) query.labelSelector = opts.labelSelector;
  if (opts.fieldSelector) query.fieldSelector = opts.fieldSelector;
  if (opts.timeoutSeconds !== undefined) query.timeoutSeconds = String(opts.timeoutSeconds);
  return query;
}

function writeQuery(opts: WriteOptions): Record<string, string> {
  const query: Record<string, string> = {};
  if (opts.dryRun) query.dryRun = 'All';
  if (opts.fieldManager) query.fieldManager = opts.fieldManager;
  return query;
}

function deleteBody(opts: DeleteOptions): string | undefined {
  if (opts.gracePeriodSeconds === undefined && !opts.propagationPolicy && !opts.preconditions) {
    return undefined;
  }
  return JSON.stringify({
    kind: 'DeleteOptions',
    apiVersion: 'v1',
    gracePeriodSeconds: opts.gracePeriodSeconds,
    propagationPolicy: opts.propagationPolicy,
    preconditions: opts.preconditions,
  });
}

/**
 * CRUD, list and watch for one collection. `T` is whatever the codec
 * produces: a typed object or an `UnstructuredObject`.
 *
 * Single-shot calls never retry; every failure is thrown as a
 * `KubeClientError` subclass.
 */
export class ResourceClient<T> {
  private readonly log: Logger;
  private readonly watchConfig: WatchConfig;

  constructor(
    private readonly executor: RequestExecutor,
    readonly identity: ResourceIdentity,
    readonly codec: ObjectCodec<T>,
    options: ResourceClientOptions = {},
  ) {
    this.log = (options.logger ?? rootLogger).child(identity.resource);
    this.watchConfig = options.watchConfig ?? resolveWatchConfig();
  }

  async get(namespace: string | undefined, name: string, opts: GetOptions = {}, context: CallContext = {}): Promise<T> {
    const query: Record<string, string> = {};
    if (opts.resourceVersion !== undefined) query.resourceVersion = opts.resourceVersion;

    const response = await this.send('GET', this.objectPath(namespace, name), query, context);
    return decodeObject(this.codec, response.body, `${this.identity.resource} "${name}"`);
  }

  async create(namespace: string | undefined, object: T, opts: WriteOptions = {}, context: CallContext = {}): Promise<T> {
    const meta = this.codec.metadata(object);
    const ns = this.identity.namespaced ? (namespace ?? meta.namespace) : namespace;
    if (this.identity.namespaced && !ns) {
      throw new UsageError(`Creating ${formatIdentity(this.identity)} requires a namespace`);
    }

    const response = await this.send('POST', resourcePath(this.identity, ns), writeQuery(opts), context, {
      body: this.codec.encode(object),
      contentType: APPLICATION_JSON,
    });
    return decodeObject(this.codec, response.body, `created ${this.identity.resource}`);
  }

  /**
   * Replaces an object. The object must carry the resourceVersion the caller
   * last observed; a stale one surfaces as `ConflictError`.
   */
  async update(namespace: string | undefined, object: T, opts: WriteOptions = {}, context: CallContext = {}): Promise<T> {
    return this.replace(namespace, object, undefined, opts, context);
  }

  async updateStatus(namespace: string | undefined, object: T, opts: WriteOptions = {}, context: CallContext = {}): Promise<T> {
    return this.replace(namespace, object, 'status', opts, context);
  }

  async patch(
    namespace: string | undefined,
    name: string,
    patch: Patch,
    opts: PatchOptions = {},
    context: CallContext = {},
  ): Promise<T> {
    const query = writeQuery(opts);
    if (patch.type === 'apply') {
      query.fieldManager = opts.fieldManager ?? DEFAULT_FIELD_MANAGER;
      if (opts.force) query.force = 'true';
    } else if (opts.force) {
      throw new UsageError('force is only valid for server-side apply patches');
    }

    const body = patch.type === 'json' ? JSON.stringify(patch.operations) : JSON.stringify(patch.patch);
    const response = await this.send('PATCH', this.objectPath(namespace, name), query, context, {
      body,
      contentType: PATCH_CONTENT_TYPES[patch.type],
    });
    return decodeObject(this.codec, response.body, `patched ${this.identity.resource} "${name}"`);
  }

  /** Deleting an absent object surfaces `NotFoundError`, also on a repeat. */
  async delete(namespace: string | undefined, name: string, opts: DeleteOptions = {}, context: CallContext = {}): Promise<void> {
    const body = deleteBody(opts);
    await this.send(
      'DELETE',
      this.objectPath(namespace, name),
      opts.dryRun ? { dryRun: 'All' } : {},
      context,
      body === undefined ? {} : { body, contentType: APPLICATION_JSON },
    );
  }

  /** Fetches one page. Follow `metadata.continueToken` for the next. */
  async list(namespace: string | undefined, opts: ListOptions = {}, context: CallContext = {}): Promise<ObjectList<T>> {
    const response = await this.send('GET', resourcePath(this.identity, namespace), listQuery(opts), context);
    return this.decodeList(response.body);
  }

  /**
   * Yields every item of the collection in server order, fetching pages
   * until the server stops returning a continue token.
   */
  async *iterate(namespace: string | undefined, opts: ListOptions = {}, context: CallContext = {}): AsyncGenerator<T, void, undefined> {
    let continueToken = opts.continueToken;
    do {
      const page = await this.list(namespace, { ...opts, continueToken }, context);
      yield* page.items;
      continueToken = page.metadata.continueToken;
    } while (continueToken);
  }

  /**
   * Lists, then watches from the listed resourceVersion, recovering from
   * disconnects and expired history on its own.
   */
  watch(namespace: string | undefined, opts: ListOptions = {}, watchOptions: WatchOptions = {}): ListWatch<T> {
    return new ListWatch(
      this,
      namespace,
      opts,
      { ...watchOptions, logger: watchOptions.logger ?? this.log.child('watch') },
      this.watchConfig,
    );
  }

  /**
   * Opens the raw `watch=true` stream. Non-2xx statuses are returned to the
   * caller with the stream still open.
   */
  async openWatchStream(
    namespace: string | undefined,
    opts: ListOptions,
    allowBookmarks: boolean,
    context: CallContext = {},
  ): Promise<ApiStream> {
    const query = listQuery({ ...opts, limit: undefined, continueToken: undefined });
    query.watch = 'true';
    if (allowBookmarks) query.allowWatchBookmarks = 'true';

    const request: ApiRequest = {
      method: 'GET',
      path: resourcePath(this.identity, namespace),
      query,
      signal: context.signal,
    };
    this.log.debug(`WATCH ${request.path}`, { resourceVersion: opts.resourceVersion });
    try {
      return await this.executor.openStream(request);
    } catch (error) {
      throw toClientError(error);
    }
  }

  private async replace(
    namespace: string | undefined,
    object: T,
    subresource: string | undefined,
    opts: WriteOptions,
    context: CallContext,
  ): Promise<T> {
    const meta = this.codec.metadata(object);
    if (!meta.name) {
      throw new UsageError('metadata.name is required to update an object');
    }
    if (!meta.resourceVersion) {
      throw new UsageError(`metadata.resourceVersion is required to update "${meta.name}"`);
    }
    if (namespace && meta.namespace && namespace !== meta.namespace) {
      throw new UsageError(`Namespace "${namespace}" does not match metadata.namespace "${meta.namespace}"`);
    }

    const ns = this.identity.namespaced ? (namespace ?? meta.namespace) : namespace;
    const path = this.objectPath(ns, meta.name, subresource);
    const response = await this.send('PUT', path, writeQuery(opts), context, {
      body: this.codec.encode(object),
      contentType: APPLICATION_JSON,
    });
    return decodeObject(this.codec, response.body, `updated ${this.identity.resource} "${meta.name}"`);
  }

  private objectPath(namespace: string | undefined, name: string, subresource?: string): string {
    if (!name) {
      throw new UsageError('An object name is required');
    }
    if (this.identity.namespaced && !namespace) {
      throw new UsageError(`${formatIdentity(this.identity)} is namespaced; a namespace is required for "${name}"`);
    }
    return resourcePath(this.identity, namespace, name, subresource);
  }

  private decodeList(body: string): ObjectList<T> {
    const what = `${this.identity.resource} list`;
    const tree = parseWire(body, what);
    if (!isUnstructuredMap(tree)) {
      throw new DecodeError(what, 'expected an object', body);
    }

    const metadata = tree.get('metadata');
    const resourceVersion = isUnstructuredMap(metadata) ? metadata.get('resourceVersion') : undefined;
    const continueToken = isUnstructuredMap(metadata) ? metadata.get('continue') : undefined;
    const remaining = isUnstructuredMap(metadata) ? metadata.get('remainingItemCount') : undefined;

    const items = tree.get('items') ?? null;
    if (items !== null && !Array.isArray(items)) {
      throw new DecodeError(what, 'items is not an array', body);
    }

    return {
      items: (items ?? []).map((item, index) => this.codec.decode(item, `${what} item ${index}`)),
      metadata: {
        resourceVersion: typeof resourceVersion === 'string' ? resourceVersion : '',
        continueToken: typeof continueToken === 'string' && continueToken !== '' ? continueToken : undefined,
        remainingItemCount: typeof remaining === 'number' ? remaining : undefined,
      },
    };
  }

  private async send(
    method: HttpMethod,
    path: string,
    query: Record<string, string>,
    context: CallContext,
    payload: { body?: string; contentType?: string } = {},
  ): Promise<ApiResponse> {
    this.log.debug(`${method} ${path}`, Object.keys(query).length > 0 ? query : undefined);

    let response: ApiResponse;
    try {
      response = await this.executor.execute({ method, path, query, ...payload, signal: context.signal });
    } catch (error) {
      throw toClientError(error);
    }

    if (!isSuccess(response.status)) {
      const error = errorFromResponse(response.status, response.body);
      this.log.debug(`${method} ${path} failed`, { status: response.status, reason: error.status?.reason });
      throw error;
    }
    return response;
  }
}
