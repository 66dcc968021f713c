import { MalformedMediaTypeError } from '../util/errors.js';

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export function isToken(value: string): boolean {
  return TOKEN.test(value);
}

/**
 * Split `text` on `separator`, ignoring separators inside quoted strings.
 * Backslash escapes are honoured inside quotes.
 */
export function splitOutsideQuotes(text: string, separator: string, original = text): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes && ch === '\\' && i + 1 < text.length) {
      current += ch + text[++i];
      continue;
    }
    if (ch === '"') inQuotes = !inQuotes;
    if (ch === separator && !inQuotes) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  if (inQuotes) throw new MalformedMediaTypeError(original, 'unbalanced quotes');
  parts.push(current);
  return parts;
}

function parseParameterValue(raw: string, original: string): string {
  if (!raw.startsWith('"')) {
    if (!raw) throw new MalformedMediaTypeError(original, 'parameter without value');
    if (raw.includes('"')) throw new MalformedMediaTypeError(original, 'unbalanced quotes');
    return raw;
  }
  let value = '';
  for (let i = 1; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === '\\' && i + 1 < raw.length) {
      value += raw[++i];
    } else if (ch === '"') {
      if (raw.slice(i + 1).trim()) {
        throw new MalformedMediaTypeError(original, 'unexpected text after quoted value');
      }
      return value;
    } else {
      value += ch;
    }
  }
  throw new MalformedMediaTypeError(original, 'unbalanced quotes');
}

function quoteIfNeeded(value: string): string {
  if (isToken(value)) return value;
  return `"${value.replace(/(["\\])/g, '\\$1')}"`;
}

function normalizeParameter(key: string, value: string): [string, string] {
  const name = key.toLowerCase();
  return [name, name === 'charset' ? value.toLowerCase() : value];
}

/**
 * A parsed MIME type: `type/subtype[+suffix][; name=value ...]`.
 *
 * Type, subtype, suffix and parameter names are case-insensitive and held in
 * lower case, as is the `charset` value. Other parameter values keep their
 * case. `toString()` is the normalized form used as a registry key.
 */
export class MediaType {
  readonly type: string;
  readonly subtype: string;
  readonly suffix: string | undefined;
  readonly parameters: ReadonlyMap<string, string>;

  constructor(type: string, subtype: string, suffix?: string, parameters: Iterable<readonly [string, string]> = []) {
    this.type = type.toLowerCase();
    this.subtype = subtype.toLowerCase();
    this.suffix = suffix ? suffix.toLowerCase() : undefined;
    const params = new Map<string, string>();
    for (const [key, value] of parameters) {
      const [name, normalized] = normalizeParameter(key, value);
      params.set(name, normalized);
    }
    this.parameters = params;
  }

  static parse(raw: string): MediaType {
    const [essence, ...segments] = splitOutsideQuotes(raw, ';', raw);
    const slash = essence.indexOf('/');
    if (slash < 0) throw new MalformedMediaTypeError(raw, 'missing "/" separator');

    const type = essence.slice(0, slash).trim();
    let subtype = essence.slice(slash + 1).trim();
    if (!isToken(type) || !isToken(subtype)) {
      throw new MalformedMediaTypeError(raw, 'invalid type or subtype');
    }

    let suffix: string | undefined;
    const plus = subtype.lastIndexOf('+');
    if (plus > 0 && plus < subtype.length - 1) {
      suffix = subtype.slice(plus + 1);
      subtype = subtype.slice(0, plus);
    }

    const parameters: Array<[string, string]> = [];
    for (const segment of segments) {
      const part = segment.trim();
      if (!part) continue;
      const eq = part.indexOf('=');
      if (eq <= 0) throw new MalformedMediaTypeError(raw, `parameter "${part}" has no value`);
      const key = part.slice(0, eq).trim();
      if (!isToken(key)) throw new MalformedMediaTypeError(raw, `invalid parameter name "${key}"`);
      parameters.push([key, parseParameterValue(part.slice(eq + 1).trim(), raw)]);
    }

    return new MediaType(type, subtype, suffix, parameters);
  }

  /** `type/subtype+suffix` without parameters. */
  get essence(): string {
    return `${this.type}/${this.subtype}${this.suffix ? `+${this.suffix}` : ''}`;
  }

  get charset(): string | undefined {
    return this.parameters.get('charset');
  }

  withoutParameters(...names: string[]): MediaType {
    if (names.length === 0) return new MediaType(this.type, this.subtype, this.suffix);
    const drop = new Set(names.map(n => n.toLowerCase()));
    const kept = [...this.parameters].filter(([key]) => !drop.has(key));
    return new MediaType(this.type, this.subtype, this.suffix, kept);
  }

  withParameter(name: string, value: string): MediaType {
    return new MediaType(this.type, this.subtype, this.suffix, [...this.parameters, [name, value]]);
  }

  equals(other: MediaType): boolean {
    if (this.essence !== other.essence) return false;
    if (this.parameters.size !== other.parameters.size) return false;
    for (const [key, value] of this.parameters) {
      if (other.parameters.get(key) !== value) return false;
    }
    return true;
  }

  toString(): string {
    const params = [...this.parameters.keys()]
      .sort()
      .map(key => `; ${key}=${quoteIfNeeded(this.parameters.get(key) ?? '')}`);
    return this.essence + params.join('');
  }
}

/** Parse and re-render a media type string in normalized form. */
export function normalizeMediaType(raw: string): string {
  return MediaType.parse(raw).toString();
}
