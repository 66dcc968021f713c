import { TextDecoder } from 'util';
import { MediaType } from '../media/media-type.js';
import { DecodeError, UnsupportedValueError, toDecodeError } from '../util/errors.js';
import type { DumpStringFunction, EncodedBody, LoadStringFunction, Transcoder } from './types.js';

const CHARSETS = new Map<string, BufferEncoding>([
  ['utf-8', 'utf8'],
  ['utf8', 'utf8'],
  ['us-ascii', 'ascii'],
  ['ascii', 'ascii'],
  ['iso-8859-1', 'latin1'],
  ['latin1', 'latin1'],
  ['utf-16le', 'utf16le'],
  ['utf16le', 'utf16le']
]);

export function resolveCharset(encoding: string): BufferEncoding | undefined {
  return CHARSETS.get(encoding.trim().toLowerCase());
}

// single-byte charsets: code units above these cannot be represented
const OUT_OF_RANGE: Partial<Record<BufferEncoding, RegExp>> = {
  ascii: /[^\x00-\x7f]/,
  latin1: /[^\x00-\xff]/
};

function encodeText(text: string, charset: BufferEncoding, encoding: string): Buffer {
  const match = OUT_OF_RANGE[charset]?.exec(text);
  if (match) {
    const codePoint = match[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
    throw new UnsupportedValueError(`U+${codePoint} at index ${match.index} cannot be encoded as ${encoding}`);
  }
  return Buffer.from(text, charset);
}

function decodeText(data: Uint8Array, charset: BufferEncoding): string {
  if (charset === 'utf8') {
    // strict: malformed sequences fail instead of becoming U+FFFD
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  }
  if (charset === 'ascii') {
    const offset = data.findIndex(byte => byte > 0x7f);
    if (offset !== -1) throw new DecodeError(`byte 0x${data[offset].toString(16)} at offset ${offset} is not us-ascii`);
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString(charset);
}

/**
 * Adapts a string codec (dumps/loads) to the transcoder protocol.
 *
 * Any `charset` parameter in the content type is dropped; the charset is
 * appended per call from the encoding actually used.
 */
export class TextTranscoder implements Transcoder {
  readonly contentType: string;

  constructor(
    contentType: string,
    readonly dumps: DumpStringFunction,
    readonly loads: LoadStringFunction,
    readonly defaultEncoding = 'utf-8'
  ) {
    this.contentType = MediaType.parse(contentType).withoutParameters('charset').toString();
    if (!resolveCharset(defaultEncoding)) {
      throw new UnsupportedValueError(`unsupported character encoding "${defaultEncoding}"`);
    }
  }

  toBytes(value: unknown, encoding: string = this.defaultEncoding): EncodedBody {
    const charset = resolveCharset(encoding);
    if (!charset) throw new UnsupportedValueError(`unsupported character encoding "${encoding}"`);
    const name = encoding.trim().toLowerCase();
    return {
      contentType: `${this.contentType}; charset=${name}`,
      data: encodeText(this.dumps(value), charset, name)
    };
  }

  fromBytes(data: Uint8Array, encoding: string = this.defaultEncoding): unknown {
    const charset = resolveCharset(encoding);
    if (!charset) throw new DecodeError(`unsupported character encoding "${encoding}"`);
    try {
      return this.loads(decodeText(data, charset));
    } catch (error) {
      throw toDecodeError(error, this.contentType);
    }
  }
}
