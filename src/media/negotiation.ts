import { MalformedMediaTypeError, NoAcceptableTypeError } from '../util/errors.js';
import { MediaType, splitOutsideQuotes } from './media-type.js';

export interface AcceptRange {
  range: MediaType;
  quality: number;
}

export interface NegotiationResult {
  selected: MediaType;
  range: AcceptRange;
}

interface RangeMatch {
  accept: AcceptRange;
  level: number;
  parameters: number;
}

// exact type/subtype > type/*+suffix > type/* > */*
const EXACT = 4;
const SUFFIX_WILDCARD = 3;
const SUBTYPE_WILDCARD = 2;
const FULL_WILDCARD = 1;

function parseQuality(value: string, element: string): number {
  const q = value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(q) || q < 0 || q > 1) {
    throw new MalformedMediaTypeError(element.trim(), `invalid quality "${value}"`);
  }
  return q;
}

/**
 * Parse an `Accept` header into weighted media ranges, in header order.
 * Parameters following `q` are accept extensions and are dropped.
 */
export function parseAccept(header: string): AcceptRange[] {
  const ranges: AcceptRange[] = [];
  for (const element of splitOutsideQuotes(header, ',', header)) {
    if (!element.trim()) continue;
    const parsed = MediaType.parse(element.trim());
    if (parsed.type === '*' && parsed.subtype !== '*') {
      throw new MalformedMediaTypeError(element.trim(), 'wildcard type with a specific subtype');
    }

    let quality = 1;
    let extensions = false;
    const params: Array<[string, string]> = [];
    for (const [key, value] of parsed.parameters) {
      if (extensions) continue;
      if (key === 'q') {
        quality = parseQuality(value, element);
        extensions = true;
        continue;
      }
      params.push([key, value]);
    }
    ranges.push({ range: new MediaType(parsed.type, parsed.subtype, parsed.suffix, params), quality });
  }
  return ranges;
}

function matchLevel(range: MediaType, candidate: MediaType): number | undefined {
  if (range.suffix && range.suffix !== candidate.suffix) return undefined;
  if (range.type === '*') return FULL_WILDCARD;
  if (range.type !== candidate.type) return undefined;
  if (range.subtype === '*') return range.suffix ? SUFFIX_WILDCARD : SUBTYPE_WILDCARD;
  if (range.subtype !== candidate.subtype || range.suffix !== candidate.suffix) return undefined;
  return EXACT;
}

function matchRange(accept: AcceptRange, candidate: MediaType): RangeMatch | undefined {
  const level = matchLevel(accept.range, candidate);
  if (level === undefined) return undefined;
  let parameters = 0;
  for (const [key, value] of accept.range.parameters) {
    // charset is computed by text transcoders per response
    if (key === 'charset') continue;
    if (candidate.parameters.get(key) !== value) return undefined;
    parameters++;
  }
  return { accept, level, parameters };
}

function compareSpecificity(a: RangeMatch, b: RangeMatch): number {
  return a.level - b.level || a.parameters - b.parameters;
}

/**
 * Pick the best available type for the given ranges (RFC 7231 §5.3.2).
 *
 * The most specific range that applies to a type decides its quality; a
 * deciding range with q=0 makes the type unacceptable. Across types the
 * higher quality wins, then the more specific match, then the earlier
 * registration.
 */
export function selectContentType(ranges: readonly AcceptRange[], available: readonly MediaType[]): NegotiationResult | undefined {
  let best: { candidate: MediaType; match: RangeMatch } | undefined;

  for (const candidate of available) {
    let decisive: RangeMatch | undefined;
    for (const accept of ranges) {
      const match = matchRange(accept, candidate);
      if (!match) continue;
      const order = decisive ? compareSpecificity(match, decisive) : 1;
      if (!decisive || order > 0 || (order === 0 && match.accept.quality > decisive.accept.quality)) {
        decisive = match;
      }
    }
    if (!decisive || decisive.accept.quality <= 0) continue;

    if (!best) {
      best = { candidate, match: decisive };
      continue;
    }
    const q = decisive.accept.quality - best.match.accept.quality;
    if (q > 0 || (q === 0 && compareSpecificity(decisive, best.match) > 0)) {
      best = { candidate, match: decisive };
    }
  }

  return best ? { selected: best.candidate, range: best.match.accept } : undefined;
}

/**
 * Resolve the response content type for an `Accept` header value.
 *
 * A missing or blank header stands for the default content type when there
 * is one and for `*\/*` otherwise. When nothing matches, the default is
 * returned; without a default this throws `NoAcceptableTypeError`.
 */
export function negotiateContentType(
  accept: string | undefined,
  available: readonly MediaType[],
  defaultContentType?: string
): string {
  const header = accept && accept.trim() ? accept : (defaultContentType ?? '*/*');
  const result = selectContentType(parseAccept(header), available);
  if (result) return result.selected.toString();
  if (defaultContentType) return defaultContentType;
  throw new NoAcceptableTypeError(header);
}
