import type { z } from 'zod';

import { typedCodec, type ObjectCodec, type TypedObject } from './codec.js';
import { UsageError } from './errors.js';
import { formatIdentity, type ResourceIdentity } from './identity.js';

function keyOf(identity: ResourceIdentity): string {
  return `${identity.group}/${identity.version}/${identity.resource}`;
}

/**
 * Registry of typed schemas by collection. Collections without an entry are
 * served through the unstructured codec.
 */
export class SchemaCatalogue {
  private readonly entries = new Map<string, { identity: ResourceIdentity; codec: ObjectCodec<TypedObject> }>();

  register(identity: ResourceIdentity, schema: z.ZodType<TypedObject, z.ZodTypeDef, unknown>): this {
    const key = keyOf(identity);
    const existing = this.entries.get(key);
    if (existing && existing.identity.namespaced !== identity.namespaced) {
      throw new UsageError(`${formatIdentity(identity)} is already registered with a different scope`);
    }
    this.entries.set(key, { identity, codec: typedCodec(schema) });
    return this;
  }

  lookup(identity: ResourceIdentity): ObjectCodec<TypedObject> | undefined {
    return this.entries.get(keyOf(identity))?.codec;
  }

  has(identity: ResourceIdentity): boolean {
    return this.entries.has(keyOf(identity));
  }

  get size(): number {
    return this.entries.size;
  }
}
