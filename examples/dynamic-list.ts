#!/usr/bin/env tsx

/**
 * List every object of a kind, resolving the collection through discovery.
 *
 * Usage: tsx examples/dynamic-list.ts <apiVersion> <kind> [namespace]
 */

import { createApiClient, findResourceByKind, logger } from '../src/index.js';

async function main() {
  const [apiVersion, kind, namespace] = process.argv.slice(2);
  if (!apiVersion || !kind) {
    console.error('Usage: tsx examples/dynamic-list.ts <apiVersion> <kind> [namespace]');
    process.exit(2);
  }

  const client = createApiClient();
  const identity = await findResourceByKind(client.executor, apiVersion, kind);
  if (!identity) {
    console.error(`${kind} is not served by ${apiVersion}`);
    process.exit(1);
  }

  let count = 0;
  for await (const object of client.dynamic(identity).iterate(identity.namespaced ? namespace : undefined, { limit: 250 })) {
    const ns = object.getNamespace();
    console.log(ns ? `${ns}/${object.getName()}` : object.getName());
    count += 1;
  }
  console.log(`\n${count} ${identity.resource}`);
}

main().catch((error: unknown) => {
  logger.error('Listing failed', error);
  process.exit(1);
});
