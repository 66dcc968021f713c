import type { Uuid, MsgPackExtension } from './values.js';

export type ByteSource = Uint8Array | ArrayBuffer | ArrayBufferView;

/**
 * What transcoders accept for encoding. Value adapters widen this to any
 * type they recognise, so encoders take `unknown` and classify at runtime.
 */
export type StructuredValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | ByteSource
  | Date
  | Uuid
  | MsgPackExtension
  | readonly StructuredValue[]
  | ReadonlySet<StructuredValue>
  | ReadonlyMap<string, StructuredValue>
  | { readonly [key: string]: StructuredValue | undefined };

/** What the binary codec produces when decoding. */
export type DecodedValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Buffer
  | Date
  | MsgPackExtension
  | DecodedValue[]
  | { [key: string]: DecodedValue };

export interface EncodedBody {
  contentType: string; // exact value for the outbound Content-Type header
  data: Buffer;
}

export interface Transcoder {
  readonly contentType: string;
  toBytes(value: unknown, encoding?: string): EncodedBody;
  fromBytes(data: Uint8Array, encoding?: string): unknown;
}

export type DumpStringFunction = (value: unknown) => string;
export type LoadStringFunction = (text: string) => unknown;
export type PackFunction = (value: unknown) => Uint8Array;
export type UnpackFunction = (data: Uint8Array) => unknown;

export type ContentLogger = Pick<Console, 'log' | 'warn' | 'error'>;
