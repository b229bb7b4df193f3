/**
 * Order-preserving JSON wire format.
 *
 * `JSON.parse` hoists integer-like keys to the front of an object, so wire
 * payloads are read through the `yaml` parser (JSON is a subset of YAML 1.2)
 * into a tree whose mappings are `Map`s. Both codecs decode from this tree.
 *
 * Numbers are held as JavaScript numbers, with the literal they were read
 * from kept beside their container. `stringifyWire` writes that literal back
 * while the value is unchanged, so `1.0`, `1e3` and integers beyond 2^53
 * survive a round trip.
 */

import { isMap, isScalar, isSeq, parseDocument, type Document } from 'yaml';

import { DecodeError } from './errors.js';

export type UnstructuredValue = null | boolean | number | string | UnstructuredValue[] | UnstructuredMap;

export type UnstructuredMap = Map<string, UnstructuredValue>;

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

type Container = UnstructuredMap | UnstructuredValue[];

const numberLiterals = new WeakMap<Container, Map<string | number, string>>();

function recordLiteral(container: Container, key: string | number, literal: string): void {
  let literals = numberLiterals.get(container);
  if (!literals) {
    literals = new Map();
    numberLiterals.set(container, literals);
  }
  literals.set(key, literal);
}

function numberLiteral(container: Container, key: string | number, value: number): string | undefined {
  const literal = numberLiterals.get(container)?.get(key);
  return literal !== undefined && Number(literal) === value ? literal : undefined;
}

function copyLiterals(from: Container, to: Container): void {
  const literals = numberLiterals.get(from);
  if (literals) {
    numberLiterals.set(to, new Map(literals));
  }
}

/** The source text of a JSON number scalar, when it differs from `String(value)`. */
function scalarLiteral(node: unknown): string | undefined {
  if (!isScalar(node) || typeof node.value !== 'number') {
    return undefined;
  }
  const { source } = node;
  return typeof source === 'string' && source !== String(node.value) && Number(source) === node.value ? source : undefined;
}

export function isUnstructuredMap(value: UnstructuredValue | undefined): value is UnstructuredMap {
  return value instanceof Map;
}

/**
 * Parses one JSON document. `what` names the payload in error messages.
 */
export function parseWire(text: string, what: string): UnstructuredValue {
  if (!text.trim()) {
    throw new DecodeError(what, 'empty body', text);
  }

  // Duplicate keys are legal JSON; the last value wins, as with JSON.parse.
  const doc = parseDocument(text, { schema: 'json', prettyErrors: false, uniqueKeys: false });
  const [first] = doc.errors;
  if (first) {
    throw new DecodeError(what, first.message, text, first.pos[0], { cause: first });
  }

  return documentToTree(doc, what, text);
}

export function documentToTree(doc: Document, what: string, text?: string): UnstructuredValue {
  return nodeToTree(doc.contents, what, text);
}

function nodeToTree(node: unknown, what: string, text: string | undefined): UnstructuredValue {
  if (node === null || node === undefined) {
    return null;
  }

  if (isMap(node)) {
    const map: UnstructuredMap = new Map();
    for (const pair of node.items) {
      const key = isScalar(pair.key) ? pair.key.value : pair.key;
      if (typeof key !== 'string') {
        throw new DecodeError(what, `non-string mapping key ${String(key)}`, text, isScalar(pair.key) ? pair.key.range?.[0] : undefined);
      }
      map.set(key, nodeToTree(pair.value, what, text));
      const literal = scalarLiteral(pair.value);
      if (literal !== undefined) {
        recordLiteral(map, key, literal);
      } else {
        numberLiterals.get(map)?.delete(key);
      }
    }
    return map;
  }

  if (isSeq(node)) {
    const items = node.items.map((item) => nodeToTree(item, what, text));
    node.items.forEach((item, index) => {
      const literal = scalarLiteral(item);
      if (literal !== undefined) {
        recordLiteral(items, index, literal);
      }
    });
    return items;
  }

  if (isScalar(node)) {
    const { value } = node;
    if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
      return value;
    }
    throw new DecodeError(what, `unsupported scalar ${String(value)}`, text, node.range?.[0]);
  }

  throw new DecodeError(what, 'unsupported node (aliases and tags are not part of the wire format)', text);
}

/**
 * Serializes a tree as compact JSON, keys in insertion order.
 */
export function stringifyWire(value: UnstructuredValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item, index) => stringifyEntry(value, index, item)).join(',')}]`;
  }

  const entries: string[] = [];
  for (const [key, entry] of value) {
    entries.push(`${JSON.stringify(key)}:${stringifyEntry(value, key, entry)}`);
  }
  return `{${entries.join(',')}}`;
}

function stringifyEntry(container: Container, key: string | number, value: UnstructuredValue): string {
  if (typeof value === 'number') {
    return numberLiteral(container, key, value) ?? JSON.stringify(value);
  }
  return stringifyWire(value);
}

/**
 * Converts to plain JavaScript values. Integer-like keys lose their position
 * here, which is fine for typed decoding.
 */
export function toPlain(value: UnstructuredValue): JsonValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }

  const result: JsonObject = {};
  for (const [key, entry] of value) {
    result[key] = toPlain(entry);
  }
  return result;
}

export function fromPlain(value: JsonValue): UnstructuredValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(fromPlain);
  }

  const map: UnstructuredMap = new Map();
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      map.set(key, fromPlain(entry));
    }
  }
  return map;
}

export function cloneTree(value: UnstructuredValue): UnstructuredValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    const items = value.map(cloneTree);
    copyLiterals(value, items);
    return items;
  }

  const map: UnstructuredMap = new Map();
  for (const [key, entry] of value) {
    map.set(key, cloneTree(entry));
  }
  copyLiterals(value, map);
  return map;
}
