import { TextDecoder } from 'util';
import { DecodeError, UnsupportedValueError } from '../util/errors.js';
import { BinaryTranscoder } from './binary.js';
import type { DecodedValue } from './types.js';
import { EncodingPath, MsgPackExtension, classifyValue, type ValueAdapter } from './values.js';

export const MSGPACK_CONTENT_TYPE = 'application/msgpack';

/** MessagePack first-byte markers. */
export const Format = {
  NIL: 0xc0,
  NEVER_USED: 0xc1,
  FALSE: 0xc2,
  TRUE: 0xc3,
  BIN8: 0xc4,
  BIN16: 0xc5,
  BIN32: 0xc6,
  EXT8: 0xc7,
  EXT16: 0xc8,
  EXT32: 0xc9,
  FLOAT32: 0xca,
  FLOAT64: 0xcb,
  UINT8: 0xcc,
  UINT16: 0xcd,
  UINT32: 0xce,
  UINT64: 0xcf,
  INT8: 0xd0,
  INT16: 0xd1,
  INT32: 0xd2,
  INT64: 0xd3,
  FIXEXT1: 0xd4,
  FIXEXT2: 0xd5,
  FIXEXT4: 0xd6,
  FIXEXT8: 0xd7,
  FIXEXT16: 0xd8,
  STR8: 0xd9,
  STR16: 0xda,
  STR32: 0xdb,
  ARRAY16: 0xdc,
  ARRAY32: 0xdd,
  MAP16: 0xde,
  MAP32: 0xdf,
  FIXMAP: 0x80,
  FIXARRAY: 0x90,
  FIXSTR: 0xa0,
  NEGATIVE_FIXINT: 0xe0
} as const;

const TIMESTAMP_TYPE = -1;
const DEFAULT_MAX_DEPTH = 512;
const UINT32_MAX = 0xffffffff;
const UINT64_MAX = 0xffffffffffffffffn;
const INT64_MIN = -0x8000000000000000n;
const FIXEXT_BY_LENGTH = new Map<number, number>([
  [1, Format.FIXEXT1],
  [2, Format.FIXEXT2],
  [4, Format.FIXEXT4],
  [8, Format.FIXEXT8],
  [16, Format.FIXEXT16]
]);

export interface MsgPackOptions {
  adapters?: readonly ValueAdapter[];
  maxDepth?: number;
}

class ByteWriter {
  private buffer = Buffer.allocUnsafe(256);
  private position = 0;

  private ensure(size: number): void {
    if (this.position + size <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < this.position + size) capacity *= 2;
    const next = Buffer.allocUnsafe(capacity);
    this.buffer.copy(next, 0, 0, this.position);
    this.buffer = next;
  }

  u8(value: number): void {
    this.ensure(1);
    this.position = this.buffer.writeUInt8(value, this.position);
  }

  u16(value: number): void {
    this.ensure(2);
    this.position = this.buffer.writeUInt16BE(value, this.position);
  }

  u32(value: number): void {
    this.ensure(4);
    this.position = this.buffer.writeUInt32BE(value, this.position);
  }

  u64(value: bigint): void {
    this.ensure(8);
    this.position = this.buffer.writeBigUInt64BE(value, this.position);
  }

  i8(value: number): void {
    this.ensure(1);
    this.position = this.buffer.writeInt8(value, this.position);
  }

  i16(value: number): void {
    this.ensure(2);
    this.position = this.buffer.writeInt16BE(value, this.position);
  }

  i32(value: number): void {
    this.ensure(4);
    this.position = this.buffer.writeInt32BE(value, this.position);
  }

  i64(value: bigint): void {
    this.ensure(8);
    this.position = this.buffer.writeBigInt64BE(value, this.position);
  }

  f64(value: number): void {
    this.ensure(8);
    this.position = this.buffer.writeDoubleBE(value, this.position);
  }

  utf8(value: string, byteLength: number): void {
    this.ensure(byteLength);
    this.position += this.buffer.write(value, this.position, byteLength, 'utf8');
  }

  bytes(value: Uint8Array): void {
    this.ensure(value.byteLength);
    this.buffer.set(value, this.position);
    this.position += value.byteLength;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.position));
  }
}

/**
 * Deterministic MessagePack encoder: every value takes the narrowest format
 * that represents it, so equal values always produce equal bytes.
 */
export class MsgPackEncoder {
  private readonly adapters: readonly ValueAdapter[];
  private readonly maxDepth: number;

  constructor(options: MsgPackOptions = {}) {
    this.adapters = options.adapters ?? [];
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  encode(value: unknown): Buffer {
    const writer = new ByteWriter();
    this.write(writer, value, new EncodingPath(this.maxDepth));
    return writer.toBuffer();
  }

  private write(writer: ByteWriter, value: unknown, path: EncodingPath): void {
    const node = classifyValue(value, this.adapters);
    switch (node.kind) {
      case 'nil':
        writer.u8(Format.NIL);
        return;
      case 'boolean':
        writer.u8(node.value ? Format.TRUE : Format.FALSE);
        return;
      case 'integer':
        writeInteger(writer, node.value);
        return;
      case 'float':
        writer.u8(Format.FLOAT64);
        writer.f64(node.value);
        return;
      case 'string':
        writeString(writer, node.value);
        return;
      case 'binary':
        writeBinary(writer, node.value);
        return;
      case 'extension':
        writeExtension(writer, node.value);
        return;
      case 'sequence':
        path.enter(node.source);
        writeContainerHeader(writer, node.items.length, Format.FIXARRAY, Format.ARRAY16, Format.ARRAY32);
        for (const item of node.items) this.write(writer, item, path);
        path.leave(node.source);
        return;
      case 'mapping':
        path.enter(node.source);
        writeContainerHeader(writer, node.entries.length, Format.FIXMAP, Format.MAP16, Format.MAP32);
        for (const [key, item] of node.entries) {
          this.write(writer, key, path);
          this.write(writer, item, path);
        }
        path.leave(node.source);
        return;
    }
  }
}

function writeInteger(writer: ByteWriter, value: number | bigint): void {
  if (typeof value === 'bigint') {
    if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      writeInteger(writer, Number(value));
    } else if (value > 0n && value <= UINT64_MAX) {
      writer.u8(Format.UINT64);
      writer.u64(value);
    } else if (value < 0n && value >= INT64_MIN) {
      writer.u8(Format.INT64);
      writer.i64(value);
    } else {
      throw new UnsupportedValueError(`integer ${value} does not fit in 64 bits`);
    }
    return;
  }

  if (!Number.isSafeInteger(value)) {
    writeInteger(writer, BigInt(value));
    return;
  }

  if (value >= 0) {
    if (value <= 0x7f) {
      writer.u8(value);
    } else if (value <= 0xff) {
      writer.u8(Format.UINT8);
      writer.u8(value);
    } else if (value <= 0xffff) {
      writer.u8(Format.UINT16);
      writer.u16(value);
    } else if (value <= UINT32_MAX) {
      writer.u8(Format.UINT32);
      writer.u32(value);
    } else {
      writer.u8(Format.UINT64);
      writer.u64(BigInt(value));
    }
  } else if (value >= -0x20) {
    writer.u8(value & 0xff);
  } else if (value >= -0x80) {
    writer.u8(Format.INT8);
    writer.i8(value);
  } else if (value >= -0x8000) {
    writer.u8(Format.INT16);
    writer.i16(value);
  } else if (value >= -0x80000000) {
    writer.u8(Format.INT32);
    writer.i32(value);
  } else {
    writer.u8(Format.INT64);
    writer.i64(BigInt(value));
  }
}

function writeString(writer: ByteWriter, value: string): void {
  const length = Buffer.byteLength(value, 'utf8');
  if (length < 32) {
    writer.u8(Format.FIXSTR | length);
  } else if (length <= 0xff) {
    writer.u8(Format.STR8);
    writer.u8(length);
  } else if (length <= 0xffff) {
    writer.u8(Format.STR16);
    writer.u16(length);
  } else if (length <= UINT32_MAX) {
    writer.u8(Format.STR32);
    writer.u32(length);
  } else {
    throw new UnsupportedValueError(`string of ${length} bytes is too long to encode`);
  }
  writer.utf8(value, length);
}

function writeBinary(writer: ByteWriter, value: Uint8Array): void {
  const length = value.byteLength;
  if (length <= 0xff) {
    writer.u8(Format.BIN8);
    writer.u8(length);
  } else if (length <= 0xffff) {
    writer.u8(Format.BIN16);
    writer.u16(length);
  } else if (length <= UINT32_MAX) {
    writer.u8(Format.BIN32);
    writer.u32(length);
  } else {
    throw new UnsupportedValueError(`byte buffer of ${length} bytes is too long to encode`);
  }
  writer.bytes(value);
}

function writeExtension(writer: ByteWriter, value: MsgPackExtension): void {
  const length = value.data.byteLength;
  const fixed = FIXEXT_BY_LENGTH.get(length);
  if (fixed !== undefined) {
    writer.u8(fixed);
  } else if (length <= 0xff) {
    writer.u8(Format.EXT8);
    writer.u8(length);
  } else if (length <= 0xffff) {
    writer.u8(Format.EXT16);
    writer.u16(length);
  } else if (length <= UINT32_MAX) {
    writer.u8(Format.EXT32);
    writer.u32(length);
  } else {
    throw new UnsupportedValueError(`extension payload of ${length} bytes is too long to encode`);
  }
  writer.i8(value.type);
  writer.bytes(value.data);
}

function writeContainerHeader(writer: ByteWriter, count: number, fixed: number, format16: number, format32: number): void {
  if (count <= 0x0f) {
    writer.u8(fixed | count);
  } else if (count <= 0xffff) {
    writer.u8(format16);
    writer.u16(count);
  } else {
    writer.u8(format32);
    writer.u32(count);
  }
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function toSafeNumber(value: bigint): number | bigint {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
}

class ByteReader {
  private position = 0;

  constructor(private readonly buffer: Buffer, private readonly maxDepth: number) {}

  get remaining(): number {
    return this.buffer.length - this.position;
  }

  get offset(): number {
    return this.position;
  }

  private take(size: number): Buffer {
    if (size > this.remaining) {
      throw new DecodeError(`truncated input: needed ${size} byte(s) at offset ${this.position}, ${this.remaining} available`);
    }
    const slice = this.buffer.subarray(this.position, this.position + size);
    this.position += size;
    return slice;
  }

  private u8(): number {
    return this.take(1).readUInt8(0);
  }

  private u16(): number {
    return this.take(2).readUInt16BE(0);
  }

  private u32(): number {
    return this.take(4).readUInt32BE(0);
  }

  read(depth: number): DecodedValue {
    const at = this.position;
    const tag = this.u8();
    if (tag <= 0x7f) return tag;
    if (tag >= Format.NEGATIVE_FIXINT) return tag - 0x100;
    if (tag >= Format.FIXSTR && tag <= 0xbf) return this.str(tag & 0x1f);
    if (tag >= Format.FIXARRAY && tag <= 0x9f) return this.array(tag & 0x0f, depth);
    if (tag >= Format.FIXMAP && tag <= 0x8f) return this.map(tag & 0x0f, depth);

    switch (tag) {
      case Format.NIL: return null;
      case Format.FALSE: return false;
      case Format.TRUE: return true;
      case Format.BIN8: return this.bin(this.u8());
      case Format.BIN16: return this.bin(this.u16());
      case Format.BIN32: return this.bin(this.u32());
      case Format.EXT8: return this.ext(this.u8());
      case Format.EXT16: return this.ext(this.u16());
      case Format.EXT32: return this.ext(this.u32());
      case Format.FLOAT32: return this.take(4).readFloatBE(0);
      case Format.FLOAT64: return this.take(8).readDoubleBE(0);
      case Format.UINT8: return this.u8();
      case Format.UINT16: return this.u16();
      case Format.UINT32: return this.u32();
      case Format.UINT64: return toSafeNumber(this.take(8).readBigUInt64BE(0));
      case Format.INT8: return this.take(1).readInt8(0);
      case Format.INT16: return this.take(2).readInt16BE(0);
      case Format.INT32: return this.take(4).readInt32BE(0);
      case Format.INT64: return toSafeNumber(this.take(8).readBigInt64BE(0));
      case Format.FIXEXT1: return this.ext(1);
      case Format.FIXEXT2: return this.ext(2);
      case Format.FIXEXT4: return this.ext(4);
      case Format.FIXEXT8: return this.ext(8);
      case Format.FIXEXT16: return this.ext(16);
      case Format.STR8: return this.str(this.u8());
      case Format.STR16: return this.str(this.u16());
      case Format.STR32: return this.str(this.u32());
      case Format.ARRAY16: return this.array(this.u16(), depth);
      case Format.ARRAY32: return this.array(this.u32(), depth);
      case Format.MAP16: return this.map(this.u16(), depth);
      case Format.MAP32: return this.map(this.u32(), depth);
      default:
        throw new DecodeError(`unrecognized tag byte 0x${tag.toString(16)} at offset ${at}`);
    }
  }

  private str(length: number): string {
    const at = this.position;
    const bytes = this.take(length);
    try {
      return utf8Decoder.decode(bytes);
    } catch (error) {
      throw new DecodeError(`invalid UTF-8 in string at offset ${at}`, { cause: error });
    }
  }

  private bin(length: number): Buffer {
    return Buffer.from(this.take(length));
  }

  private ext(length: number): DecodedValue {
    const type = this.take(1).readInt8(0);
    const data = Buffer.from(this.take(length));
    if (type === TIMESTAMP_TYPE) return readTimestamp(data);
    return new MsgPackExtension(type, data);
  }

  private enter(count: number, minimumBytes: number, depth: number): void {
    if (depth >= this.maxDepth) {
      throw new DecodeError(`input nests deeper than ${this.maxDepth} levels`);
    }
    // every element needs at least one byte; reject counts the input cannot hold
    if (count * minimumBytes > this.remaining) {
      throw new DecodeError(`truncated input: ${count} element(s) declared at offset ${this.position}, ${this.remaining} byte(s) available`);
    }
  }

  private array(count: number, depth: number): DecodedValue[] {
    this.enter(count, 1, depth);
    const items: DecodedValue[] = [];
    for (let i = 0; i < count; i++) items.push(this.read(depth + 1));
    return items;
  }

  private map(count: number, depth: number): { [key: string]: DecodedValue } {
    this.enter(count, 2, depth);
    const result: { [key: string]: DecodedValue } = {};
    for (let i = 0; i < count; i++) {
      const at = this.position;
      const key = mapKey(this.read(depth + 1), at);
      Object.defineProperty(result, key, {
        value: this.read(depth + 1),
        enumerable: true,
        writable: true,
        configurable: true
      });
    }
    return result;
  }
}

function mapKey(key: DecodedValue, offset: number): string {
  switch (typeof key) {
    case 'string':
      return key;
    case 'number':
    case 'bigint':
    case 'boolean':
      return String(key);
    default:
      if (key === null) return 'null';
      throw new DecodeError(`unsupported map key at offset ${offset}`);
  }
}

function readTimestamp(data: Buffer): Date {
  let seconds: number;
  let nanoseconds: number;
  switch (data.length) {
    case 4:
      seconds = data.readUInt32BE(0);
      nanoseconds = 0;
      break;
    case 8: {
      const high = data.readUInt32BE(0);
      nanoseconds = high >>> 2;
      seconds = (high & 0x3) * 0x100000000 + data.readUInt32BE(4);
      break;
    }
    case 12:
      nanoseconds = data.readUInt32BE(0);
      seconds = Number(data.readBigInt64BE(4));
      break;
    default:
      throw new DecodeError(`invalid timestamp extension of ${data.length} bytes`);
  }
  if (nanoseconds > 999_999_999) throw new DecodeError('timestamp nanoseconds out of range');
  return new Date(seconds * 1000 + Math.floor(nanoseconds / 1_000_000));
}

export class MsgPackDecoder {
  private readonly maxDepth: number;

  constructor(options: MsgPackOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /** Decode exactly one value; trailing bytes are an error. */
  decode(data: Uint8Array): DecodedValue {
    const reader = new ByteReader(Buffer.from(data.buffer, data.byteOffset, data.byteLength), this.maxDepth);
    const value = reader.read(0);
    if (reader.remaining > 0) {
      throw new DecodeError(`unexpected ${reader.remaining} trailing byte(s) at offset ${reader.offset}`);
    }
    return value;
  }
}

export function packb(value: unknown, options?: MsgPackOptions): Buffer {
  return new MsgPackEncoder(options).encode(value);
}

export function unpackb(data: Uint8Array, options?: MsgPackOptions): DecodedValue {
  return new MsgPackDecoder(options).decode(data);
}

export interface MsgPackTranscoderOptions extends MsgPackOptions {
  contentType?: string;
}

export class MsgPackTranscoder extends BinaryTranscoder {
  private readonly encoder: MsgPackEncoder;
  private readonly decoder: MsgPackDecoder;

  constructor(options: MsgPackTranscoderOptions = {}) {
    const encoder = new MsgPackEncoder(options);
    const decoder = new MsgPackDecoder(options);
    super(options.contentType ?? MSGPACK_CONTENT_TYPE, value => encoder.encode(value), data => decoder.decode(data));
    this.encoder = encoder;
    this.decoder = decoder;
  }

  packb(value: unknown): Buffer {
    return this.encoder.encode(value);
  }

  unpackb(data: Uint8Array): DecodedValue {
    return this.decoder.decode(data);
  }
}
