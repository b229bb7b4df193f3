import { TextDecoder } from 'node:util';

import { DecodeError } from './errors.js';
import type { ObjectCodec } from './codec.js';
import { statusSchema } from './schemas.js';
import type { WatchFrame } from './types.js';
import { isUnstructuredMap, parseWire, toPlain } from './wire.js';

/**
 * Reassembles newline-delimited frames from arbitrarily split chunks.
 * Each instance belongs to exactly one stream.
 */
export class LineSplitter {
  private buffer = '';
  private readonly decoder = new TextDecoder();

  push(chunk: Uint8Array | string): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });

    const lines: string[] = [];
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      if (line.trim()) {
        lines.push(line);
      }
      newline = this.buffer.indexOf('\n');
    }
    return lines;
  }

  /** Returns the unterminated tail once the stream has ended. */
  flush(): string[] {
    this.buffer += this.decoder.decode();
    const rest = this.buffer.replace(/\r$/, '');
    this.buffer = '';
    return rest.trim() ? [rest] : [];
  }
}

const OBJECT_EVENTS = {
  ADDED: 'Added',
  MODIFIED: 'Modified',
  DELETED: 'Deleted',
} as const;

function isObjectEventType(type: string): type is keyof typeof OBJECT_EVENTS {
  return Object.prototype.hasOwnProperty.call(OBJECT_EVENTS, type);
}

export function decodeWatchFrame<T>(codec: ObjectCodec<T>, line: string): WatchFrame<T> {
  const frame = parseWire(line, 'watch event');
  if (!isUnstructuredMap(frame)) {
    throw new DecodeError('watch event', 'expected an object', line);
  }

  const type = frame.get('type');
  const object = frame.get('object');
  if (typeof type !== 'string') {
    throw new DecodeError('watch event', 'missing event type', line);
  }
  if (!isUnstructuredMap(object)) {
    throw new DecodeError('watch event', `${type} event without an object`, line);
  }

  if (isObjectEventType(type)) {
    return { type: OBJECT_EVENTS[type], object: codec.decode(object, `${type} event object`) };
  }

  if (type === 'BOOKMARK') {
    const metadata = object.get('metadata');
    const resourceVersion = isUnstructuredMap(metadata) ? metadata.get('resourceVersion') : undefined;
    if (typeof resourceVersion !== 'string') {
      throw new DecodeError('watch event', 'BOOKMARK without metadata.resourceVersion', line);
    }
    return { type: 'Bookmark', resourceVersion };
  }

  if (type === 'ERROR') {
    const status = statusSchema.safeParse(toPlain(object));
    if (!status.success) {
      throw new DecodeError('watch event', 'ERROR event with a malformed Status', line);
    }
    return { type: 'Error', status: status.data };
  }

  throw new DecodeError('watch event', `unknown event type ${type}`, line);
}
