import { UsageError } from './errors.js';
import type { ObjectMeta } from './schemas.js';
import {
  cloneTree,
  fromPlain,
  isUnstructuredMap,
  stringifyWire,
  toPlain,
  type JsonObject,
  type JsonValue,
  type UnstructuredMap,
  type UnstructuredValue,
} from './wire.js';

export type FieldPath = string | readonly string[];

function segments(path: FieldPath): readonly string[] {
  const parts = typeof path === 'string' ? path.split('.') : path;
  if (parts.length === 0 || parts.some((part) => part === '')) {
    throw new UsageError(`Invalid field path: ${typeof path === 'string' ? path : path.join('.')}`);
  }
  return parts;
}

function stringRecord(value: UnstructuredValue | undefined): Record<string, string> | undefined {
  if (!isUnstructuredMap(value)) {
    return undefined;
  }
  const record: Record<string, string> = {};
  for (const [key, entry] of value) {
    if (typeof entry === 'string') {
      record[key] = entry;
    }
  }
  return record;
}

/**
 * A schema-less API object. Field order and unknown fields survive a
 * decode/encode round trip.
 */
export class UnstructuredObject {
  private readonly root: UnstructuredMap;

  constructor(root: UnstructuredMap = new Map()) {
    this.root = root;
  }

  static from(plain: JsonObject): UnstructuredObject {
    const tree = fromPlain(plain);
    return new UnstructuredObject(isUnstructuredMap(tree) ? tree : new Map());
  }

  /** The underlying tree; mutations are visible to this object. */
  get content(): UnstructuredMap {
    return this.root;
  }

  get(path: FieldPath): UnstructuredValue | undefined {
    let current: UnstructuredValue | undefined = this.root;
    for (const part of segments(path)) {
      if (!isUnstructuredMap(current)) {
        return undefined;
      }
      current = current.get(part);
    }
    return current;
  }

  getString(path: FieldPath): string | undefined {
    const value = this.get(path);
    return typeof value === 'string' ? value : undefined;
  }

  /**
   * Sets a field, creating intermediate mappings. Fails when an intermediate
   * field exists and is not a mapping.
   */
  set(path: FieldPath, value: UnstructuredValue): void {
    const parts = segments(path);
    let current = this.root;
    for (const part of parts.slice(0, -1)) {
      const next = current.get(part);
      if (next === undefined || next === null) {
        const created: UnstructuredMap = new Map();
        current.set(part, created);
        current = created;
      } else if (isUnstructuredMap(next)) {
        current = next;
      } else {
        throw new UsageError(`Cannot set ${parts.join('.')}: ${part} is not a mapping`);
      }
    }
    current.set(parts[parts.length - 1], value);
  }

  remove(path: FieldPath): boolean {
    const parts = segments(path);
    const parent = parts.length === 1 ? this.root : this.get(parts.slice(0, -1));
    return isUnstructuredMap(parent) ? parent.delete(parts[parts.length - 1]) : false;
  }

  getApiVersion(): string | undefined {
    return this.getString('apiVersion');
  }

  getKind(): string | undefined {
    return this.getString('kind');
  }

  getName(): string | undefined {
    return this.getString(['metadata', 'name']);
  }

  setName(name: string): void {
    this.set(['metadata', 'name'], name);
  }

  getNamespace(): string | undefined {
    return this.getString(['metadata', 'namespace']);
  }

  setNamespace(namespace: string): void {
    this.set(['metadata', 'namespace'], namespace);
  }

  getUid(): string | undefined {
    return this.getString(['metadata', 'uid']);
  }

  getResourceVersion(): string | undefined {
    return this.getString(['metadata', 'resourceVersion']);
  }

  setResourceVersion(resourceVersion: string): void {
    this.set(['metadata', 'resourceVersion'], resourceVersion);
  }

  getLabels(): Record<string, string> {
    return stringRecord(this.get(['metadata', 'labels'])) ?? {};
  }

  setLabels(labels: Record<string, string>): void {
    this.set(['metadata', 'labels'], new Map<string, UnstructuredValue>(Object.entries(labels)));
  }

  getAnnotations(): Record<string, string> {
    return stringRecord(this.get(['metadata', 'annotations'])) ?? {};
  }

  setAnnotations(annotations: Record<string, string>): void {
    this.set(['metadata', 'annotations'], new Map<string, UnstructuredValue>(Object.entries(annotations)));
  }

  /** Snapshot of the metadata fields the client relies on. */
  getMetadata(): ObjectMeta {
    return {
      name: this.getName(),
      namespace: this.getNamespace(),
      uid: this.getUid(),
      resourceVersion: this.getResourceVersion(),
      labels: stringRecord(this.get(['metadata', 'labels'])),
      annotations: stringRecord(this.get(['metadata', 'annotations'])),
    };
  }

  clone(): UnstructuredObject {
    const copy = cloneTree(this.root);
    return new UnstructuredObject(isUnstructuredMap(copy) ? copy : new Map());
  }

  toJSON(): JsonValue {
    return toPlain(this.root);
  }

  toString(): string {
    return stringifyWire(this.root);
  }
}
