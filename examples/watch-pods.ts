#!/usr/bin/env tsx

/**
 * Watch pods in one namespace until Ctrl-C.
 *
 * Usage: tsx examples/watch-pods.ts [namespace] [labelSelector]
 */

import { z } from 'zod';

import { createApiClient, logger, resourceIdentity, typedCodec, typedObjectSchema } from '../src/index.js';

const pods = resourceIdentity({ group: '', version: 'v1', resource: 'pods', namespaced: true });

const podCodec = typedCodec(
  typedObjectSchema({
    status: z.object({ phase: z.string().optional() }).optional(),
  }),
);

async function main() {
  const [namespace = 'default', labelSelector] = process.argv.slice(2);
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const watch = createApiClient()
    .typed(pods, podCodec)
    .watch(namespace, { labelSelector, limit: 100 }, {
      signal: controller.signal,
      onStateChange: (state) => logger.info(`watch ${state.phase}`),
    });

  for await (const event of watch) {
    if (event.type === 'Bookmark') {
      continue;
    }
    const { metadata, status } = event.object;
    console.log(`${event.type.padEnd(8)} ${metadata?.name} ${status?.phase ?? 'Unknown'} @${watch.resourceVersion}`);
  }
}

main().catch((error: unknown) => {
  logger.error('Watch failed', error);
  process.exit(1);
});
