import { toDecodeError } from '../util/errors.js';
import type { EncodedBody, PackFunction, Transcoder, UnpackFunction } from './types.js';

/**
 * Adapts a pack/unpack pair to the transcoder protocol. Character encodings
 * do not apply; the registered content type is returned unchanged.
 */
export class BinaryTranscoder implements Transcoder {
  constructor(
    readonly contentType: string,
    readonly pack: PackFunction,
    readonly unpack: UnpackFunction
  ) {}

  toBytes(value: unknown): EncodedBody {
    const packed = this.pack(value);
    return {
      contentType: this.contentType,
      data: Buffer.from(packed.buffer, packed.byteOffset, packed.byteLength)
    };
  }

  fromBytes(data: Uint8Array): unknown {
    try {
      return this.unpack(data);
    } catch (error) {
      throw toDecodeError(error, this.contentType);
    }
  }
}
