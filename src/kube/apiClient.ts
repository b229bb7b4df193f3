import { unstructuredCodec, type ObjectCodec, type TypedObject } from './codec.js';
import { SchemaCatalogue } from './catalogue.js';
import { discoverResources, type DiscoveredResource } from './discovery.js';
import type { RequestExecutor } from './executor.js';
import { parseGroupVersion, type GroupVersion, type ResourceIdentity } from './identity.js';
import { ResourceClient, type ResourceClientOptions } from './resourceClient.js';
import type { UnstructuredObject } from './unstructured.js';

export type ResolvedClient =
  | { variant: 'typed'; client: ResourceClient<TypedObject> }
  | { variant: 'unstructured'; client: ResourceClient<UnstructuredObject> };

/**
 * Entry point tying one executor to resource clients. Clients created here
 * share the executor and nothing else.
 */
export class ApiClient {
  constructor(
    readonly executor: RequestExecutor,
    readonly catalogue: SchemaCatalogue = new SchemaCatalogue(),
    private readonly options: ResourceClientOptions = {},
  ) {}

  typed<T>(identity: ResourceIdentity, codec: ObjectCodec<T>): ResourceClient<T> {
    return new ResourceClient(this.executor, identity, codec, this.options);
  }

  dynamic(identity: ResourceIdentity): ResourceClient<UnstructuredObject> {
    return new ResourceClient(this.executor, identity, unstructuredCodec, this.options);
  }

  /** Typed when the catalogue knows the collection, unstructured otherwise. */
  resolve(identity: ResourceIdentity): ResolvedClient {
    const codec = this.catalogue.lookup(identity);
    if (codec) {
      return { variant: 'typed', client: this.typed(identity, codec) };
    }
    return { variant: 'unstructured', client: this.dynamic(identity) };
  }

  discover(groupVersion: GroupVersion | string): Promise<DiscoveredResource[]> {
    const gv = typeof groupVersion === 'string' ? parseGroupVersion(groupVersion) : groupVersion;
    return discoverResources(this.executor, gv);
  }
}
