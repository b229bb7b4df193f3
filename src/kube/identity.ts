import { UsageError } from './errors.js';

/**
 * Names one collection on the API server. Frozen on construction and
 * compared by value.
 */
export interface ResourceIdentity {
  readonly group: string;
  readonly version: string;
  /** Plural resource name, e.g. `deployments`. */
  readonly resource: string;
  readonly namespaced: boolean;
}

export interface GroupVersion {
  group: string;
  version: string;
}

export function resourceIdentity(spec: ResourceIdentity): ResourceIdentity {
  if (!spec.version) throw new UsageError('Resource version is required');
  if (!spec.resource) throw new UsageError('Resource plural name is required');

  return Object.freeze({
    group: spec.group,
    version: spec.version,
    resource: spec.resource,
    namespaced: spec.namespaced,
  });
}

export function sameResource(a: ResourceIdentity, b: ResourceIdentity): boolean {
  return a.group === b.group && a.version === b.version && a.resource === b.resource && a.namespaced === b.namespaced;
}

/**
 * Splits an `apiVersion` string. `v1` is the core group; `apps/v1` names a
 * group. More than one `/` is rejected.
 */
export function parseGroupVersion(apiVersion: string): GroupVersion {
  const slash = apiVersion.indexOf('/');
  if (slash === -1) {
    return { group: '', version: apiVersion };
  }

  const group = apiVersion.slice(0, slash);
  const version = apiVersion.slice(slash + 1);
  if (version.includes('/')) {
    throw new UsageError(`Invalid apiVersion: ${apiVersion}`);
  }

  return { group, version };
}

export function formatGroupVersion(gv: GroupVersion): string {
  return gv.group === '' ? gv.version : `${gv.group}/${gv.version}`;
}

export function formatIdentity(identity: ResourceIdentity): string {
  return `${formatGroupVersion(identity)}, Resource=${identity.resource}`;
}

export function groupVersionPath(gv: GroupVersion): string {
  return gv.group === '' ? `/api/${encodeURIComponent(gv.version)}` : `/apis/${encodeURIComponent(gv.group)}/${encodeURIComponent(gv.version)}`;
}

/**
 * Path of a collection, or of one object (and optionally one of its
 * subresources) when `name` is given.
 *
 * A namespaced identity without a namespace (or with an empty one)
 * addresses every namespace.
 */
export function resourcePath(
  identity: ResourceIdentity,
  namespace?: string,
  name?: string,
  subresource?: string,
): string {
  namespace = namespace || undefined;
  if (!identity.namespaced && namespace !== undefined) {
    throw new UsageError(`${formatIdentity(identity)} is cluster-scoped; namespace "${namespace}" not allowed`);
  }
  if (subresource !== undefined && name === undefined) {
    throw new UsageError('A subresource requires an object name');
  }

  const segments = [groupVersionPath(identity)];
  if (namespace !== undefined) {
    segments.push('namespaces', encodeURIComponent(namespace));
  }
  segments.push(encodeURIComponent(identity.resource));
  if (name !== undefined) {
    segments.push(encodeURIComponent(name));
  }
  if (subresource !== undefined) {
    segments.push(encodeURIComponent(subresource));
  }

  return segments.join('/');
}
