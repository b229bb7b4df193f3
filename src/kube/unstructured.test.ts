import { describe, it, expect } from 'vitest';

import { decodeObject, unstructuredCodec } from './codec.js';
import { DecodeError, UsageError } from './errors.js';
import { UnstructuredObject } from './unstructured.js';
import { isUnstructuredMap, parseWire, stringifyWire, toPlain } from './wire.js';

function decode(text: string): UnstructuredObject {
  const tree = parseWire(text, 'object');
  if (!isUnstructuredMap(tree)) {
    throw new Error('expected a mapping');
  }
  return new UnstructuredObject(tree);
}

describe('wire round trip', () => {
  it('should keep field order, integer-like keys included', () => {
    const text = '{"kind":"Thing","metadata":{"name":"x"},"data":{"b":1,"2":true,"a":null,"1":[1,"s"]}}';

    expect(stringifyWire(parseWire(text, 'thing'))).toBe(text);
  });

  it('should keep fields nothing declares', () => {
    const text = '{"apiVersion":"example.dev/v1","kind":"Widget","metadata":{"name":"w"},"x-vendor":{"nested":[{"deep":true}]}}';

    expect(decode(text).toString()).toBe(text);
  });

  it('should write numbers back exactly as they were read', () => {
    const text = '{"big":12345678901234567890,"ratio":1.0,"exp":1e3,"plain":42,"list":[2.50,7]}';

    expect(unstructuredCodec.encode(decodeObject(unstructuredCodec, text, 'numbers'))).toBe(text);
    expect(decode(text).clone().toString()).toBe(text);
  });

  it('should serialize a changed number from its new value', () => {
    const object = decode('{"ratio":1.0,"other":1.0}');

    object.set('ratio', 2);

    expect(object.toString()).toBe('{"ratio":2,"other":1.0}');
  });

  it('should keep empty mappings and arrays', () => {
    const text = '{"a":{},"b":[],"c":{"d":[{}]}}';

    expect(decode(text).toString()).toBe(text);
  });

  it('should let the last duplicate key win', () => {
    expect(stringifyWire(parseWire('{"a":1,"b":2,"a":3}', 'object'))).toBe('{"a":3,"b":2}');
  });

  it('should reject an empty body', () => {
    expect(() => parseWire('  ', 'pod')).toThrow(DecodeError);
    expect(() => parseWire('', 'pod')).toThrow('unable to parse pod: empty body');
  });

  it('should reject malformed input', () => {
    expect(() => parseWire('{"kind": "Pod",', 'pod')).toThrow(DecodeError);
  });

  it('should convert to plain values', () => {
    expect(toPlain(parseWire('{"a":[1,{"b":"c"}],"d":null}', 'x'))).toEqual({ a: [1, { b: 'c' }], d: null });
  });
});

describe('UnstructuredObject', () => {
  const text = '{"apiVersion":"v1","kind":"ConfigMap","metadata":{"name":"settings","namespace":"default","resourceVersion":"12","labels":{"app":"web"}},"data":{"mode":"fast"}}';

  it('should read metadata through typed accessors', () => {
    const object = decode(text);

    expect(object.getApiVersion()).toBe('v1');
    expect(object.getKind()).toBe('ConfigMap');
    expect(object.getName()).toBe('settings');
    expect(object.getNamespace()).toBe('default');
    expect(object.getResourceVersion()).toBe('12');
    expect(object.getLabels()).toEqual({ app: 'web' });
    expect(object.getAnnotations()).toEqual({});
    expect(object.getMetadata()).toEqual({
      name: 'settings',
      namespace: 'default',
      uid: undefined,
      resourceVersion: '12',
      labels: { app: 'web' },
      annotations: undefined,
    });
  });

  it('should read and write nested fields by path', () => {
    const object = decode(text);

    expect(object.getString('data.mode')).toBe('fast');
    expect(object.get(['data', 'missing'])).toBeUndefined();

    object.set('data.mode', 'slow');
    object.set('spec.template.replicas', 2);

    expect(object.toString()).toBe(
      '{"apiVersion":"v1","kind":"ConfigMap","metadata":{"name":"settings","namespace":"default","resourceVersion":"12","labels":{"app":"web"}},"data":{"mode":"slow"},"spec":{"template":{"replicas":2}}}',
    );
  });

  it('should refuse to descend through a non-mapping field', () => {
    const object = decode(text);

    expect(() => object.set('kind.sub', 'x')).toThrow(UsageError);
    expect(() => object.get('data..mode')).toThrow('Invalid field path: data..mode');
  });

  it('should remove fields', () => {
    const object = decode(text);

    expect(object.remove('data.mode')).toBe(true);
    expect(object.remove('data.mode')).toBe(false);
    expect(object.getString('data.mode')).toBeUndefined();
  });

  it('should clone independently', () => {
    const original = decode(text);
    const copy = original.clone();
    copy.setName('other');
    copy.setLabels({ tier: 'db' });

    expect(original.getName()).toBe('settings');
    expect(original.getLabels()).toEqual({ app: 'web' });
    expect(copy.getLabels()).toEqual({ tier: 'db' });
  });

  it('should build from plain objects', () => {
    const object = UnstructuredObject.from({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'tools' } });
    object.setResourceVersion('3');

    expect(object.toString()).toBe('{"apiVersion":"v1","kind":"Namespace","metadata":{"name":"tools","resourceVersion":"3"}}');
    expect(object.toJSON()).toEqual({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'tools', resourceVersion: '3' } });
  });
});
