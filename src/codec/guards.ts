export interface DecodedGuardrails {
  maxDecodedSize: number;
  maxDepth: number;
}

export type GuardrailCheck =
  | { valid: true }
  | { valid: false; reason: 'decoded_size_exceeded' | 'depth_exceeded'; limit: number; actual: number };

function envInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getGuardrailsFromEnv(): DecodedGuardrails {
  return {
    maxDecodedSize: envInt('MEDIAKIT_CODEC_MAX_DECODED_SIZE', 10 * 1024 * 1024),
    maxDepth: envInt('MEDIAKIT_CODEC_MAX_DEPTH', 32)
  };
}

// both walks keep an explicit stack; nesting is not limited by the call stack
export function measureDecodedSize(value: unknown): number {
  const visited = new Set<object>();
  const pending: unknown[] = [value];
  let total = 0;

  while (pending.length > 0) {
    const current = pending.pop();
    switch (typeof current) {
      case 'string':
        total += Buffer.byteLength(current, 'utf8');
        break;
      case 'number':
        total += 8;
        break;
      case 'boolean':
        total += 1;
        break;
      case 'bigint':
        total += Buffer.byteLength(current.toString(), 'utf8');
        break;
      case 'object': {
        if (current === null || visited.has(current)) break;
        visited.add(current);
        if (ArrayBuffer.isView(current)) {
          total += current.byteLength;
        } else if (current instanceof Date) {
          total += 8;
        } else if (Array.isArray(current)) {
          for (const item of current) pending.push(item);
        } else {
          for (const [key, item] of Object.entries(current)) {
            total += Buffer.byteLength(key, 'utf8');
            pending.push(item);
          }
        }
        break;
      }
      default:
        break;
    }
  }

  return total;
}

function isContainer(value: unknown): value is object {
  return value !== null && typeof value === 'object' && !ArrayBuffer.isView(value) && !(value instanceof Date);
}

/**
 * Each level of container nesting that holds a value counts once; empty
 * containers, scalars and byte buffers add nothing.
 * With `limit`, the walk stops at the first container deeper than it.
 */
export function measureDepth(value: unknown, limit = Infinity): number {
  const visited = new Set<object>();
  const pending: Array<[unknown, number]> = [[value, 0]];
  let deepest = 0;

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [current, depth] = next;
    if (!isContainer(current) || visited.has(current)) continue;
    visited.add(current);
    const children: unknown[] = Array.isArray(current) ? current : Object.values(current);
    for (const child of children) {
      deepest = Math.max(deepest, depth + 1);
      if (deepest > limit) return deepest;
      if (isContainer(child)) pending.push([child, depth + 1]);
    }
  }

  return deepest;
}

export function checkDecodedPayload(value: unknown, guardrails: DecodedGuardrails): GuardrailCheck {
  const size = measureDecodedSize(value);
  if (size > guardrails.maxDecodedSize) {
    return { valid: false, reason: 'decoded_size_exceeded', limit: guardrails.maxDecodedSize, actual: size };
  }

  const depth = measureDepth(value, guardrails.maxDepth);
  if (depth > guardrails.maxDepth) {
    return { valid: false, reason: 'depth_exceeded', limit: guardrails.maxDepth, actual: depth };
  }

  return { valid: true };
}
