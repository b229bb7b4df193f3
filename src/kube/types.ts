import type { JsonValue } from './wire.js';
import type { Status } from './schemas.js';

export interface ListOptions {
  labelSelector?: string;
  fieldSelector?: string;
  /** Page size; must be a positive integer. */
  limit?: number;
  continueToken?: string;
  /** Pins the read to a point in history. Opaque; forwarded verbatim. */
  resourceVersion?: string;
  /** Server-side timeout for list and watch calls. */
  timeoutSeconds?: number;
}

export interface GetOptions {
  resourceVersion?: string;
}

export interface WriteOptions {
  dryRun?: boolean;
  fieldManager?: string;
}

export interface PatchOptions extends WriteOptions {
  /** Only meaningful for server-side apply. */
  force?: boolean;
}

export interface DeleteOptions {
  dryRun?: boolean;
  gracePeriodSeconds?: number;
  propagationPolicy?: 'Foreground' | 'Background' | 'Orphan';
  preconditions?: {
    uid?: string;
    resourceVersion?: string;
  };
}

export interface JsonPatchOperation {
  op: 'add' | 'remove' | 'replace' | 'move' | 'copy' | 'test';
  path: string;
  value?: JsonValue;
  from?: string;
}

export type Patch =
  | { type: 'json'; operations: JsonPatchOperation[] }
  | { type: 'merge'; patch: JsonValue }
  | { type: 'strategic-merge'; patch: JsonValue }
  | { type: 'apply'; patch: JsonValue };

export interface ListMetadata {
  resourceVersion: string;
  continueToken?: string;
  remainingItemCount?: number;
}

export interface ObjectList<T> {
  items: T[];
  metadata: ListMetadata;
}

export type WatchEvent<T> =
  | { type: 'Added' | 'Modified' | 'Deleted'; object: T }
  | { type: 'Bookmark'; resourceVersion: string };

/** One decoded line of a watch stream. */
export type WatchFrame<T> = WatchEvent<T> | { type: 'Error'; status: Status };
