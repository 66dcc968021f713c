import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { BinaryTranscoder } from '../src/codec/binary.js';
import { TextTranscoder, resolveCharset } from '../src/codec/text.js';
import type { Transcoder } from '../src/codec/types.js';
import { DecodeError, UnsupportedValueError } from '../src/util/errors.js';

describe('TextTranscoder', () => {
  const plain = new TextTranscoder('Text/Plain; Charset=UTF-8', value => String(value), text => text);

  it('registers without charset', () => {
    assert.equal(plain.contentType, 'text/plain');
    assert.equal(plain.defaultEncoding, 'utf-8');
  });

  it('encodes in each supported charset', () => {
    const latin = plain.toBytes('héllo', 'ISO-8859-1');
    assert.equal(latin.contentType, 'text/plain; charset=iso-8859-1');
    assert.deepEqual(latin.data, Buffer.from([0x68, 0xe9, 0x6c, 0x6c, 0x6f]));

    const wide = plain.toBytes('hi', 'utf-16le');
    assert.equal(wide.contentType, 'text/plain; charset=utf-16le');
    assert.deepEqual(wide.data, Buffer.from([0x68, 0x00, 0x69, 0x00]));

    assert.deepEqual(plain.toBytes('ok', 'us-ascii').data, Buffer.from('ok'));
  });

  it('decodes with the given charset', () => {
    assert.equal(plain.fromBytes(Buffer.from([0x68, 0xe9]), 'latin1'), 'hé');
    assert.equal(plain.fromBytes(Buffer.from([0x68, 0x00, 0x69, 0x00]), 'UTF-16LE'), 'hi');
  });

  it('uses its own default encoding', () => {
    const latin = new TextTranscoder('text/csv', value => String(value), text => text.split(','), 'latin1');
    assert.equal(latin.toBytes('é').contentType, 'text/csv; charset=latin1');
    assert.deepEqual(latin.fromBytes(Buffer.from([0x61, 0x2c, 0xe9])), ['a', 'é']);
  });

  it('refuses text the charset cannot represent', () => {
    assert.throws(
      () => plain.toBytes('é', 'us-ascii'),
      (error: unknown) => error instanceof UnsupportedValueError && error.message === 'U+00E9 at index 0 cannot be encoded as us-ascii'
    );
    assert.throws(
      () => plain.toBytes('a€', 'latin1'),
      (error: unknown) => error instanceof UnsupportedValueError && error.message === 'U+20AC at index 1 cannot be encoded as latin1'
    );
  });

  it('rejects bytes outside us-ascii', () => {
    assert.throws(
      () => plain.fromBytes(Buffer.from([0x6f, 0x6b, 0xe9]), 'us-ascii'),
      (error: unknown) => error instanceof DecodeError && error.message === 'byte 0xe9 at offset 2 is not us-ascii'
    );
    assert.equal(plain.fromBytes(Buffer.from('ok'), 'ascii'), 'ok');
  });

  it('rejects an unsupported default encoding', () => {
    assert.throws(() => new TextTranscoder('text/plain', String, text => text, 'koi8-r'), UnsupportedValueError);
  });

  it('wraps load failures in DecodeError', () => {
    const failing = new TextTranscoder('text/plain', String, () => {
      throw new RangeError('nope');
    });
    assert.throws(
      () => failing.fromBytes(Buffer.from('x')),
      (error: unknown) => error instanceof DecodeError && error.message === 'failed to decode text/plain body: RangeError: nope'
    );
  });

  it('resolves charset aliases case-insensitively', () => {
    assert.equal(resolveCharset(' UTF8 '), 'utf8');
    assert.equal(resolveCharset('ASCII'), 'ascii');
    assert.equal(resolveCharset('windows-1252'), undefined);
  });
});

describe('BinaryTranscoder', () => {
  const packed: unknown[] = [];
  const binary: Transcoder = new BinaryTranscoder(
    'application/octet-stream',
    value => {
      packed.push(value);
      return new Uint8Array([1, 2, 3]);
    },
    data => Array.from(data)
  );

  it('ignores the encoding and keeps its content type', () => {
    const body = binary.toBytes('anything', 'latin1');
    assert.equal(body.contentType, 'application/octet-stream');
    assert.ok(Buffer.isBuffer(body.data));
    assert.deepEqual(body.data, Buffer.from([1, 2, 3]));
    assert.deepEqual(packed, ['anything']);
    assert.deepEqual(binary.fromBytes(Buffer.from([4, 5]), 'utf-8'), [4, 5]);
  });

  it('wraps unpack failures and passes DecodeErrors through', () => {
    const original = new DecodeError('already decoded badly');
    const failing = new BinaryTranscoder('application/x-test', () => new Uint8Array(), () => {
      throw original;
    });
    assert.throws(() => failing.fromBytes(Buffer.from([0])), (error: unknown) => error === original);

    const broken = new BinaryTranscoder('application/x-test', () => new Uint8Array(), () => {
      throw new Error('boom');
    });
    assert.throws(
      () => broken.fromBytes(Buffer.from([0])),
      (error: unknown) => error instanceof DecodeError && error.status === 400 && error.isExternal === false
    );
  });
});
