import { MediaType } from '../media/media-type.js';
import { negotiateContentType } from '../media/negotiation.js';
import { ContentTypeNotFoundError, UnsupportedValueError } from '../util/errors.js';
import { BinaryTranscoder } from './binary.js';
import { JSON_CONTENT_TYPE, JsonTranscoder } from './json.js';
import { MsgPackTranscoder } from './msgpack.js';
import { TextTranscoder, resolveCharset } from './text.js';
import type {
  ContentLogger,
  DumpStringFunction,
  LoadStringFunction,
  PackFunction,
  Transcoder,
  UnpackFunction
} from './types.js';

export interface ContentRegistryOptions {
  defaultContentType?: string;
  defaultEncoding?: string;
  logger?: ContentLogger;
}

/**
 * Maps normalized content types to transcoders. Entries are only ever added;
 * the order of first registration is kept for negotiation tie-breaks.
 */
export class ContentRegistry {
  private readonly handlers = new Map<string, Transcoder>();
  private readonly available: MediaType[] = [];
  private readonly logger: ContentLogger;
  private defaultType?: string;
  private defaultCharset?: string;

  constructor(options: ContentRegistryOptions = {}) {
    this.logger = options.logger ?? console;
    if (options.defaultContentType || options.defaultEncoding) {
      this.setDefault(options.defaultContentType, options.defaultEncoding);
    }
  }

  get defaultContentType(): string | undefined {
    return this.defaultType;
  }

  get defaultEncoding(): string | undefined {
    return this.defaultCharset;
  }

  get availableContentTypes(): readonly MediaType[] {
    return this.available;
  }

  /** Returns false (and warns) when the content type already has a handler. */
  register(contentType: string, transcoder: Transcoder): boolean {
    const mediaType = MediaType.parse(contentType);
    const key = mediaType.toString();
    if (this.handlers.has(key)) {
      this.logger.warn(`[Content] handler for ${key} already set`);
      return false;
    }
    this.handlers.set(key, transcoder);
    this.available.push(mediaType);
    return true;
  }

  lookup(contentType: string): Transcoder {
    const transcoder = this.get(contentType);
    if (!transcoder) throw new ContentTypeNotFoundError(contentType);
    return transcoder;
  }

  get(contentType: string): Transcoder | undefined {
    return this.handlers.get(MediaType.parse(contentType).toString());
  }

  has(contentType: string): boolean {
    return this.get(contentType) !== undefined;
  }

  list(): Array<[string, Transcoder]> {
    return Array.from(this.handlers.entries());
  }

  setDefault(contentType?: string, encoding?: string): void {
    if (contentType !== undefined) this.defaultType = MediaType.parse(contentType).toString();
    if (encoding !== undefined) {
      if (!resolveCharset(encoding)) throw new UnsupportedValueError(`unsupported character encoding "${encoding}"`);
      this.defaultCharset = encoding.trim().toLowerCase();
    }
  }

  negotiate(accept: string | undefined): string {
    return negotiateContentType(accept, this.available, this.defaultType);
  }
}

export function addTranscoder(registry: ContentRegistry, transcoder: Transcoder, contentType = transcoder.contentType): boolean {
  return registry.register(contentType, transcoder);
}

export function addBinaryContentType(
  registry: ContentRegistry,
  contentType: string,
  pack: PackFunction,
  unpack: UnpackFunction
): boolean {
  return registry.register(contentType, new BinaryTranscoder(contentType, pack, unpack));
}

export function addTextContentType(
  registry: ContentRegistry,
  contentType: string,
  defaultEncoding: string,
  dumps: DumpStringFunction,
  loads: LoadStringFunction
): boolean {
  const transcoder = new TextTranscoder(contentType, dumps, loads, defaultEncoding);
  return registry.register(transcoder.contentType, transcoder);
}

export function setDefaultContentType(registry: ContentRegistry, contentType: string, encoding?: string): void {
  registry.setDefault(contentType, encoding);
}

export function createDefaultRegistry(
  options: Pick<ContentRegistryOptions, 'logger' | 'defaultEncoding'> = {}
): ContentRegistry {
  const { defaultEncoding = 'utf-8', logger } = options;
  const registry = new ContentRegistry({ defaultContentType: JSON_CONTENT_TYPE, defaultEncoding, logger });
  addTranscoder(registry, new MsgPackTranscoder());
  addTranscoder(registry, new JsonTranscoder({ defaultEncoding }));
  return registry;
}
