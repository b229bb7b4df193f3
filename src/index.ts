export { ApiClient, type ResolvedClient } from './kube/apiClient.js';
export { SchemaCatalogue } from './kube/catalogue.js';
export { createApiClient, getDefaultApiClient, loadKubeConfig, probeClusterConnectivity, resetDefaultApiClient } from './kube/client.js';
export { decodeObject, typedCodec, unstructuredCodec, type ObjectCodec, type TypedObject } from './kube/codec.js';
export { loadWatchConfig, resolveWatchConfig, WatchConfigSchema, type WatchConfig, type WatchConfigInput } from './kube/config.js';
export { discoverResources, findResourceByKind, type DiscoveredResource } from './kube/discovery.js';
export * from './kube/errors.js';
export type { ApiRequest, ApiResponse, ApiStream, HttpMethod, RequestExecutor } from './kube/executor.js';
export { LineSplitter, decodeWatchFrame } from './kube/frames.js';
export {
  formatGroupVersion,
  formatIdentity,
  groupVersionPath,
  parseGroupVersion,
  resourceIdentity,
  resourcePath,
  sameResource,
  type GroupVersion,
  type ResourceIdentity,
} from './kube/identity.js';
export { KubeConfigExecutor, type ClusterConfig } from './kube/kubeConfigExecutor.js';
export { ResourceClient, type CallContext, type ResourceClientOptions } from './kube/resourceClient.js';
export {
  objectMetaSchema,
  statusSchema,
  typedObjectSchema,
  type ObjectMeta,
  type OwnerReference,
  type Status,
} from './kube/schemas.js';
export type * from './kube/types.js';
export { UnstructuredObject, type FieldPath } from './kube/unstructured.js';
export { backoffDelay, ListWatch, type WatchOptions, type WatchState } from './kube/watch.js';
export type { JsonObject, JsonValue, UnstructuredMap, UnstructuredValue } from './kube/wire.js';
export { parseManifests } from './util/manifest.js';
export { logger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './util/logger.js';
