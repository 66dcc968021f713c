import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { JsonTranscoder } from '../src/codec/json.js';
import { MsgPackTranscoder } from '../src/codec/msgpack.js';
import {
  ContentRegistry,
  addBinaryContentType,
  addTextContentType,
  addTranscoder,
  createDefaultRegistry,
  setDefaultContentType
} from '../src/codec/registry.js';
import { ContentTypeNotFoundError, MalformedMediaTypeError, UnsupportedValueError } from '../src/util/errors.js';
import { recordingLogger } from './harness.js';

describe('ContentRegistry', () => {
  it('looks transcoders up by normalized type', () => {
    const registry = new ContentRegistry({ logger: recordingLogger() });
    const json = new JsonTranscoder();
    assert.equal(registry.register('Application/JSON; Charset=UTF-8', json), true);
    assert.equal(registry.lookup('application/json;charset=utf-8'), json);
    assert.equal(registry.get('application/json'), undefined);
    assert.equal(registry.has('APPLICATION/JSON; charset=utf-8'), true);
  });

  it('throws a 415 for unknown types', () => {
    const registry = new ContentRegistry();
    assert.throws(
      () => registry.lookup('text/csv'),
      (error: unknown) => error instanceof ContentTypeNotFoundError && error.status === 415 && error.contentType === 'text/csv'
    );
  });

  it('ignores a second registration and warns', () => {
    const logger = recordingLogger();
    const registry = new ContentRegistry({ logger });
    const first = new JsonTranscoder();
    registry.register('application/json', first);
    assert.equal(registry.register('application/JSON', new JsonTranscoder()), false);
    assert.equal(registry.lookup('application/json'), first);
    assert.deepEqual(logger.warnings, ['[Content] handler for application/json already set']);
    assert.equal(registry.availableContentTypes.length, 1);
  });

  it('keeps registration order', () => {
    const registry = new ContentRegistry();
    addTranscoder(registry, new MsgPackTranscoder());
    addTranscoder(registry, new JsonTranscoder({ contentType: 'application/vnd.example+json' }));
    addTranscoder(registry, new JsonTranscoder());
    assert.deepEqual(
      registry.availableContentTypes.map(t => t.toString()),
      ['application/msgpack', 'application/vnd.example+json', 'application/json']
    );
    assert.deepEqual(registry.list().map(([key]) => key), ['application/msgpack', 'application/vnd.example+json', 'application/json']);
  });

  it('registers text types without charset', () => {
    const registry = new ContentRegistry();
    addTextContentType(registry, 'text/csv; charset=latin1', 'latin1', value => String(value), text => text.split(','));
    assert.equal(registry.has('text/csv'), true);
    assert.equal(registry.has('text/csv; charset=latin1'), false);
    assert.equal(registry.lookup('text/csv').toBytes('x').contentType, 'text/csv; charset=latin1');
  });

  it('registers binary types as given', () => {
    const registry = new ContentRegistry();
    addBinaryContentType(registry, 'application/octet-stream', () => new Uint8Array([7]), data => data.length);
    const body = registry.lookup('application/octet-stream').toBytes(null);
    assert.equal(body.contentType, 'application/octet-stream');
    assert.deepEqual(body.data, Buffer.from([7]));
  });

  it('normalizes and validates the default', () => {
    const registry = new ContentRegistry();
    setDefaultContentType(registry, 'Application/JSON', 'UTF-8');
    assert.equal(registry.defaultContentType, 'application/json');
    assert.equal(registry.defaultEncoding, 'utf-8');
    assert.throws(() => registry.setDefault('json'), MalformedMediaTypeError);
    assert.throws(() => registry.setDefault(undefined, 'ebcdic'), UnsupportedValueError);
    assert.equal(registry.defaultContentType, 'application/json');
  });

  it('negotiates against its registered types', () => {
    const registry = createDefaultRegistry();
    assert.equal(registry.negotiate('application/msgpack, */*;q=0.5'), 'application/msgpack');
    assert.equal(registry.negotiate(undefined), 'application/json');
    assert.equal(registry.negotiate('text/html'), 'application/json');
  });
});

describe('createDefaultRegistry', () => {
  it('registers MessagePack then JSON with a JSON default', () => {
    const registry = createDefaultRegistry();
    assert.deepEqual(registry.availableContentTypes.map(t => t.toString()), ['application/msgpack', 'application/json']);
    assert.equal(registry.defaultContentType, 'application/json');
    assert.equal(registry.defaultEncoding, 'utf-8');
    assert.ok(registry.lookup('application/msgpack') instanceof MsgPackTranscoder);
    assert.ok(registry.lookup('application/json') instanceof JsonTranscoder);
  });

  it('encodes JSON in the given default encoding', () => {
    const registry = createDefaultRegistry({ defaultEncoding: 'latin1' });
    assert.equal(registry.defaultEncoding, 'latin1');
    assert.deepEqual(registry.lookup('application/json').toBytes('é').data, Buffer.from([0x22, 0xe9, 0x22]));
  });
});
