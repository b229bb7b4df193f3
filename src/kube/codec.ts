import type { z } from 'zod';

import { DecodeError } from './errors.js';
import type { ObjectMeta } from './schemas.js';
import { UnstructuredObject } from './unstructured.js';
import { isUnstructuredMap, parseWire, stringifyWire, toPlain, type UnstructuredValue } from './wire.js';

/** The envelope every typed object shares. */
export interface TypedObject {
  apiVersion?: string;
  kind?: string;
  metadata?: ObjectMeta;
}

/**
 * What the client and the watch engine need from an object representation.
 * Typed and unstructured objects each get one implementation; nothing else
 * about them is shared.
 */
export interface ObjectCodec<T> {
  readonly variant: 'typed' | 'unstructured';
  /** Decodes one object from the wire tree; `what` names it in errors. */
  decode(value: UnstructuredValue, what: string): T;
  encode(object: T): string;
  metadata(object: T): ObjectMeta;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/**
 * Codec for objects with a compiled schema. Undeclared wire fields are
 * dropped on decode.
 */
export function typedCodec<T extends TypedObject>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): ObjectCodec<T> {
  return {
    variant: 'typed',
    decode(value, what) {
      if (!isUnstructuredMap(value)) {
        throw new DecodeError(what, 'expected an object');
      }
      const parsed = schema.safeParse(toPlain(value));
      if (!parsed.success) {
        throw new DecodeError(what, describeIssues(parsed.error), undefined, undefined, { cause: parsed.error });
      }
      return parsed.data;
    },
    encode(object) {
      return JSON.stringify(object);
    },
    metadata(object) {
      return object.metadata ?? {};
    },
  };
}

export const unstructuredCodec: ObjectCodec<UnstructuredObject> = {
  variant: 'unstructured',
  decode(value, what) {
    if (!isUnstructuredMap(value)) {
      throw new DecodeError(what, 'expected an object');
    }
    return new UnstructuredObject(value);
  },
  encode(object) {
    return stringifyWire(object.content);
  },
  metadata(object) {
    return object.getMetadata();
  },
};

export function decodeObject<T>(codec: ObjectCodec<T>, text: string, what: string): T {
  return codec.decode(parseWire(text, what), what);
}
