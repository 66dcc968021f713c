import * as crypto from 'crypto';
import { UnsupportedValueError } from '../util/errors.js';

const UUID_HEX = /^[0-9a-f]{32}$/;

/** A unique identifier held in its canonical lowercase, hyphenated form. */
export class Uuid {
  private constructor(private readonly value: string) {}

  static parse(text: string): Uuid {
    const hex = text.trim().toLowerCase().replace(/^urn:uuid:/, '').replace(/^\{(.*)\}$/, '$1').replace(/-/g, '');
    if (!UUID_HEX.test(hex)) throw new TypeError(`invalid UUID "${text}"`);
    return new Uuid(`${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`);
  }

  static random(): Uuid {
    return new Uuid(crypto.randomUUID());
  }

  equals(other: Uuid): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/** A MessagePack extension value with an application-defined type code. */
export class MsgPackExtension {
  constructor(readonly type: number, readonly data: Buffer) {
    if (!Number.isInteger(type) || type < -128 || type > 127) {
      throw new RangeError(`extension type must be an integer in [-128, 127], got ${type}`);
    }
  }
}

/**
 * Converts values the codecs do not know into ones they do. Adapters are
 * tried in order before the built-in kinds; the first match wins and its
 * result is classified again by the built-in rules.
 */
export interface ValueAdapter {
  readonly name: string;
  matches(value: unknown): boolean;
  adapt(value: unknown): unknown;
}

export function defineAdapter<T>(
  name: string,
  guard: (value: unknown) => value is T,
  adapt: (value: T) => unknown
): ValueAdapter {
  return {
    name,
    matches: guard,
    adapt(value: unknown): unknown {
      if (!guard(value)) throw new UnsupportedValueError(`adapter ${name} applied to a value it does not match`);
      return adapt(value);
    }
  };
}

export type ValueNode =
  | { kind: 'nil' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'binary'; value: Uint8Array }
  | { kind: 'sequence'; items: readonly unknown[]; source: object }
  | { kind: 'mapping'; entries: ReadonlyArray<readonly [unknown, unknown]>; source: object }
  | { kind: 'extension'; value: MsgPackExtension };

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto === 'object' && proto !== null && 'constructor' in proto && typeof proto.constructor === 'function') {
    return proto.constructor.name || 'object';
  }
  return 'object';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function asUint8Array(value: ArrayBuffer | ArrayBufferView): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (ArrayBuffer.isView(value)) return new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
  return new Uint8Array(value);
}

function classifyObject(value: object): ValueNode {
  if (value instanceof Uuid) return { kind: 'string', value: value.toString() };
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new UnsupportedValueError('cannot encode an invalid Date');
    return { kind: 'string', value: value.toISOString() };
  }
  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) return { kind: 'binary', value: asUint8Array(value) };
  if (value instanceof MsgPackExtension) return { kind: 'extension', value };
  if (Array.isArray(value)) return { kind: 'sequence', items: value, source: value };
  if (value instanceof Set) return { kind: 'sequence', items: [...value], source: value };
  if (value instanceof Map) return { kind: 'mapping', entries: [...value], source: value };
  if (isPlainObject(value)) {
    const entries = Object.entries(value).filter(([, v]) => v !== undefined);
    return { kind: 'mapping', entries, source: value };
  }
  throw new UnsupportedValueError(`cannot encode value of type ${describeType(value)}`);
}

function classifyBuiltin(value: unknown): ValueNode {
  switch (typeof value) {
    case 'boolean':
      return { kind: 'boolean', value };
    case 'number':
      return Number.isInteger(value) && !Object.is(value, -0)
        ? { kind: 'integer', value }
        : { kind: 'float', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'string':
      return { kind: 'string', value };
    case 'object':
      return value === null ? { kind: 'nil' } : classifyObject(value);
    default:
      throw new UnsupportedValueError(`cannot encode value of type ${describeType(value)}`);
  }
}

/**
 * Classify a value into one of the kinds both codecs understand. Unique
 * identifiers and dates become strings; the three byte-buffer origins
 * become one binary view.
 */
export function classifyValue(value: unknown, adapters: readonly ValueAdapter[] = []): ValueNode {
  for (const adapter of adapters) {
    if (adapter.matches(value)) return classifyBuiltin(adapter.adapt(value));
  }
  return classifyBuiltin(value);
}

/**
 * Tracks the containers on the current encoding path so that a value which
 * contains itself is reported instead of recursing forever.
 */
export class EncodingPath {
  private readonly ancestors = new Set<object>();

  constructor(private readonly maxDepth: number) {}

  enter(container: object): void {
    if (this.ancestors.has(container)) {
      throw new UnsupportedValueError('cannot encode a circular structure');
    }
    if (this.ancestors.size >= this.maxDepth) {
      throw new UnsupportedValueError(`value nests deeper than ${this.maxDepth} levels`);
    }
    this.ancestors.add(container);
  }

  leave(container: object): void {
    this.ancestors.delete(container);
  }
}
