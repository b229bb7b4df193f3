import { DecodeError, errorFromResponse, toClientError } from './errors.js';
import { isSuccess, type ApiResponse, type RequestExecutor } from './executor.js';
import { groupVersionPath, parseGroupVersion, resourceIdentity, type GroupVersion, type ResourceIdentity } from './identity.js';
import { apiResourceListSchema } from './schemas.js';
import { isUnstructuredMap, parseWire, toPlain } from './wire.js';

export interface DiscoveredResource {
  identity: ResourceIdentity;
  kind: string;
  singularName?: string;
  verbs: string[];
  shortNames: string[];
}

/**
 * Lists the top-level resources served under one group/version. Subresources
 * (`pods/log`, `deployments/scale`, ...) are left out.
 */
export async function discoverResources(executor: RequestExecutor, groupVersion: GroupVersion): Promise<DiscoveredResource[]> {
  const path = groupVersionPath(groupVersion);
  let response: ApiResponse;
  try {
    response = await executor.execute({ method: 'GET', path, query: {} });
  } catch (error) {
    throw toClientError(error);
  }
  if (!isSuccess(response.status)) {
    throw errorFromResponse(response.status, response.body);
  }

  const what = `resource list for ${path}`;
  const tree = parseWire(response.body, what);
  if (!isUnstructuredMap(tree)) {
    throw new DecodeError(what, 'expected an object', response.body);
  }
  const parsed = apiResourceListSchema.safeParse(toPlain(tree));
  if (!parsed.success) {
    throw new DecodeError(what, parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  return parsed.data.resources
    .filter((resource) => !resource.name.includes('/'))
    .map((resource) => ({
      identity: resourceIdentity({
        group: resource.group ?? groupVersion.group,
        version: resource.version ?? groupVersion.version,
        resource: resource.name,
        namespaced: resource.namespaced,
      }),
      kind: resource.kind,
      singularName: resource.singularName || undefined,
      verbs: resource.verbs,
      shortNames: resource.shortNames ?? [],
    }));
}

export async function findResourceByKind(
  executor: RequestExecutor,
  apiVersion: string,
  kind: string,
): Promise<ResourceIdentity | undefined> {
  const resources = await discoverResources(executor, parseGroupVersion(apiVersion));
  return resources.find((resource) => resource.kind === kind)?.identity;
}
