import { UnsupportedValueError } from '../util/errors.js';
import { TextTranscoder } from './text.js';
import { EncodingPath, classifyValue, type ValueAdapter } from './values.js';

export const JSON_CONTENT_TYPE = 'application/json';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface JsonOptions {
  adapters?: readonly ValueAdapter[];
  maxDepth?: number;
}

function jsonKey(key: unknown, adapters: readonly ValueAdapter[]): string {
  const node = classifyValue(key, adapters);
  switch (node.kind) {
    case 'string':
      return node.value;
    case 'integer':
    case 'float':
    case 'boolean':
      return String(node.value);
    default:
      throw new UnsupportedValueError(`cannot use a ${node.kind} value as a JSON object key`);
  }
}

/**
 * Convert a structured value into plain JSON data: unique identifiers and
 * dates become strings, byte buffers become base64, sets become arrays and
 * maps become objects.
 */
export function toJsonValue(value: unknown, options: JsonOptions = {}): JsonValue {
  const adapters = options.adapters ?? [];
  const path = new EncodingPath(options.maxDepth ?? 512);

  const convert = (current: unknown): JsonValue => {
    const node = classifyValue(current, adapters);
    switch (node.kind) {
      case 'nil':
        return null;
      case 'boolean':
      case 'string':
        return node.value;
      case 'integer':
        if (typeof node.value === 'number') return node.value;
        if (node.value < BigInt(Number.MIN_SAFE_INTEGER) || node.value > BigInt(Number.MAX_SAFE_INTEGER)) {
          throw new UnsupportedValueError(`integer ${node.value} cannot be represented exactly as a JSON number`);
        }
        return Number(node.value);
      case 'float':
        if (!Number.isFinite(node.value)) throw new UnsupportedValueError(`cannot encode ${node.value} as JSON`);
        return node.value;
      case 'binary':
        return Buffer.from(node.value.buffer, node.value.byteOffset, node.value.byteLength).toString('base64');
      case 'extension':
        throw new UnsupportedValueError('MessagePack extension values have no JSON representation');
      case 'sequence': {
        path.enter(node.source);
        const items = node.items.map(convert);
        path.leave(node.source);
        return items;
      }
      case 'mapping': {
        path.enter(node.source);
        const entries = node.entries.map(([key, item]) => [jsonKey(key, adapters), convert(item)] as const);
        path.leave(node.source);
        return Object.fromEntries(entries);
      }
    }
  };

  return convert(value);
}

export function jsonDumps(value: unknown, options?: JsonOptions): string {
  return JSON.stringify(toJsonValue(value, options));
}

export function jsonLoads(text: string): unknown {
  return JSON.parse(text);
}

export interface JsonTranscoderOptions extends JsonOptions {
  contentType?: string;
  defaultEncoding?: string;
}

export class JsonTranscoder extends TextTranscoder {
  constructor(options: JsonTranscoderOptions = {}) {
    const { contentType = JSON_CONTENT_TYPE, defaultEncoding = 'utf-8', adapters, maxDepth } = options;
    super(contentType, value => jsonDumps(value, { adapters, maxDepth }), jsonLoads, defaultEncoding);
  }
}
