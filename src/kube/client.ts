import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

import { KubeConfig } from '@kubernetes/client-node';

import { logger } from '../util/logger.js';
import { ApiClient } from './apiClient.js';
import { SchemaCatalogue } from './catalogue.js';
import { loadWatchConfig } from './config.js';
import { TransportError } from './errors.js';
import { resourceIdentity } from './identity.js';
import { KubeConfigExecutor } from './kubeConfigExecutor.js';

let cachedClient: ApiClient | null = null;

/**
 * Loads `KUBECONFIG` (or `~/.kube/config`) when present, otherwise the
 * in-cluster service account.
 */
export function loadKubeConfig(): KubeConfig {
  const kubeConfig = new KubeConfig();
  const kubeconfigEnv = process.env.KUBECONFIG?.split(path.delimiter).filter(Boolean) ?? [];
  const defaultKubeconfigPath = path.join(homedir(), '.kube', 'config');

  try {
    if (kubeconfigEnv.length > 0 || fs.existsSync(defaultKubeconfigPath)) {
      kubeConfig.loadFromDefault();
    } else {
      kubeConfig.loadFromCluster();
    }
  } catch (error) {
    throw new TransportError(`Failed to load kubeconfig: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  return kubeConfig;
}

export function createApiClient(kubeConfig: KubeConfig = loadKubeConfig(), catalogue?: SchemaCatalogue): ApiClient {
  return new ApiClient(new KubeConfigExecutor(kubeConfig), catalogue, { watchConfig: loadWatchConfig() });
}

/** Process-wide client built from the default kubeconfig on first use. */
export function getDefaultApiClient(): ApiClient {
  if (!cachedClient) {
    cachedClient = createApiClient();
  }

  return cachedClient;
}

export function resetDefaultApiClient(): void {
  cachedClient = null;
}

const namespaces = resourceIdentity({ group: '', version: 'v1', resource: 'namespaces', namespaced: false });

/**
 * Probes the cluster with a one-item namespace list, which checks both
 * reachability and credentials.
 */
export async function probeClusterConnectivity(client: ApiClient = getDefaultApiClient()): Promise<void> {
  await client.dynamic(namespaces).list(undefined, { limit: 1 });
  logger.debug('cluster reachable');
}
