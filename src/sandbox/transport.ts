/**
 * Binding Transport
 *
 * Host values enter a sandbox context as a JSON document that the context's
 * prelude revives with its own constructors, so student code never holds a
 * host object. Values without a faithful copy are refused, not shared.
 */

import { types } from 'node:util';
import { complexParts } from '../core/values.js';

/** How one binding crosses into a context */
export type PreparedBinding =
  | { kind: 'primitive'; value: unknown }
  | { kind: 'json'; json: string }
  | { kind: 'uncopyable'; reason: string };

const TYPED_ARRAY_KINDS: Array<[string, (value: unknown) => boolean]> = [
  ['Int8Array', types.isInt8Array],
  ['Uint8Array', types.isUint8Array],
  ['Uint8ClampedArray', types.isUint8ClampedArray],
  ['Int16Array', types.isInt16Array],
  ['Uint16Array', types.isUint16Array],
  ['Int32Array', types.isInt32Array],
  ['Uint32Array', types.isUint32Array],
  ['Float32Array', types.isFloat32Array],
  ['Float64Array', types.isFloat64Array],
  ['BigInt64Array', types.isBigInt64Array],
  ['BigUint64Array', types.isBigUint64Array],
];

class UncopyableValue extends Error {}

function isMap(value: object): value is Map<unknown, unknown> {
  return types.isMap(value);
}

function isSet(value: object): value is Set<unknown> {
  return types.isSet(value);
}

function encodeObject(value: object, path: string, seen: Set<object>): unknown {
  const complex = complexParts(value);
  if (complex) {
    return { __complex__: [encode(complex.re, path, seen), encode(complex.im, path, seen)] };
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, i: number) => encode(item, `${path}[${i}]`, seen));
  }

  if (isMap(value)) {
    const entries: unknown[] = [];
    Map.prototype.forEach.call(value, (item: unknown, key: unknown) => {
      entries.push([encode(key, `${path} key`, seen), encode(item, `${path} entry`, seen)]);
    });
    return { __map__: entries };
  }

  if (isSet(value)) {
    const items: unknown[] = [];
    Set.prototype.forEach.call(value, (item: unknown) => {
      items.push(encode(item, `${path} item`, seen));
    });
    return { __set__: items };
  }

  if (types.isDate(value)) {
    return { __date__: encode(Date.prototype.getTime.call(value), path, seen) };
  }

  if (types.isTypedArray(value)) {
    const kind = TYPED_ARRAY_KINDS.find(([, is]) => is(value));
    if (!kind) throw new UncopyableValue(`${path} is an unsupported typed array`);
    const items: unknown[] = [];
    for (let i = 0; i < value.length; i++) items.push(encode(value[i], path, seen));
    return { __typed__: [kind[0], items] };
  }

  const proto: object | null = Object.getPrototypeOf(value);
  const plain =
    (proto === null || Object.getPrototypeOf(proto) === null) &&
    Object.prototype.toString.call(value) === '[object Object]';
  if (!plain) throw new UncopyableValue(`${path} is not plain data`);

  const entries: Array<[string, unknown]> = [];
  for (const key of Object.keys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (!descriptor || !('value' in descriptor)) {
      throw new UncopyableValue(`${path}.${key} is an accessor`);
    }
    entries.push([key, encode(descriptor.value, `${path}.${key}`, seen)]);
  }
  return Object.fromEntries(entries);
}

function encode(value: unknown, path: string, seen: Set<object>): unknown {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : { __number__: String(value) };
  if (typeof value === 'bigint') return { __bigint__: value.toString() };
  if (value === undefined) return { __undefined__: true };
  if (typeof value === 'function') throw new UncopyableValue(`${path} is a function`);
  if (typeof value !== 'object' || value === null) throw new UncopyableValue(`${path} is a ${typeof value}`);

  if (seen.has(value)) throw new UncopyableValue(`${path} refers back to itself`);
  seen.add(value);
  try {
    return encodeObject(value, path, seen);
  } finally {
    seen.delete(value);
  }
}

/**
 * Decide how a host binding enters a context. Primitives go in as they are;
 * everything else is encoded for the prelude's revive().
 */
export function prepareBinding(name: string, value: unknown): PreparedBinding {
  if (typeof value !== 'object' && typeof value !== 'function') {
    return { kind: 'primitive', value };
  }
  if (value === null) return { kind: 'primitive', value };

  try {
    return { kind: 'json', json: JSON.stringify(encode(value, name, new Set())) };
  } catch (error) {
    if (error instanceof UncopyableValue) {
      return { kind: 'uncopyable', reason: `Binding "${name}" cannot be copied into the sandbox: ${error.message}` };
    }
    throw error;
  }
}
