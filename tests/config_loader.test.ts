import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { fileURLToPath } from 'url';
import { ContentConfigLoader, buildRegistry, loadContentConfig, registryFromEnv } from '../src/config/loader.js';
import { recordingLogger } from './harness.js';

const fixture = fileURLToPath(new URL('./fixtures/content-vendor.yaml', import.meta.url));
const shipped = fileURLToPath(new URL('../config/content.yaml', import.meta.url));

describe('ContentConfigLoader', () => {
  it('loads the shipped configuration', () => {
    const config = loadContentConfig(shipped);
    assert.equal(config.version, 'mediakit/v1');
    assert.deepEqual(config.default, { contentType: 'application/json', encoding: 'utf-8' });
    assert.deepEqual(config.types, [
      { contentType: 'application/msgpack', codec: 'msgpack', encoding: undefined },
      { contentType: 'application/json', codec: 'json', encoding: 'utf-8' }
    ]);
  });

  const loader = new ContentConfigLoader();
  for (const [label, yaml, message] of [
    ['a non-mapping document', '- one\n- two\n', /must be a mapping/],
    ['a missing version', 'types: []\n', /missing required field: version/],
    ['an unknown version', 'version: mediakit/v0\ntypes: []\n', /Unsupported content config version: mediakit\/v0/],
    ['types that are not a list', 'version: mediakit/v1\ntypes: json\n', /types \(must be array\)/],
    ['an entry without contentType', 'version: mediakit/v1\ntypes:\n  - codec: json\n', /Type entry 0 missing required field: contentType/],
    ['an unknown codec', 'version: mediakit/v1\ntypes:\n  - contentType: text/xml\n    codec: xml\n', /Type text\/xml: invalid codec xml/],
    ['an encoding on a binary codec', 'version: mediakit/v1\ntypes:\n  - contentType: application/msgpack\n    codec: msgpack\n    encoding: utf-8\n', /encoding does not apply/]
  ] as const) {
    it(`rejects ${label}`, () => {
      assert.throws(() => loader.parse(yaml), message);
    });
  }
});

describe('buildRegistry', () => {
  it('registers types in file order with the configured default', () => {
    const registry = buildRegistry(loadContentConfig(fixture), { env: {}, logger: recordingLogger() });
    assert.deepEqual(registry.availableContentTypes.map(t => t.toString()), [
      'application/vnd.example+json; version=2',
      'application/x-msgpack',
      'application/json'
    ]);
    assert.equal(registry.defaultContentType, 'application/vnd.example+json; version=2');
    assert.equal(registry.defaultEncoding, undefined);
    assert.equal(registry.lookup('application/json').toBytes('é').contentType, 'application/json; charset=latin1');
    assert.deepEqual(registry.lookup('application/x-msgpack').toBytes(1).data, Buffer.from([1]));
  });

  it('gives text types without an encoding the default encoding', () => {
    const config = new ContentConfigLoader().parse(
      'version: mediakit/v1\ndefault:\n  encoding: latin1\ntypes:\n  - contentType: application/json\n    codec: json\n'
    );
    const registry = buildRegistry(config, { env: {} });
    assert.equal(registry.lookup('application/json').toBytes('é').contentType, 'application/json; charset=latin1');

    const overridden = buildRegistry(config, { env: { MEDIAKIT_DEFAULT_ENCODING: 'us-ascii' } });
    assert.equal(overridden.lookup('application/json').toBytes('ok').contentType, 'application/json; charset=us-ascii');
  });

  it('lets the environment override the default', () => {
    const registry = buildRegistry(loadContentConfig(fixture), {
      env: { MEDIAKIT_DEFAULT_CONTENT_TYPE: 'application/x-msgpack', MEDIAKIT_DEFAULT_ENCODING: 'UTF-8' }
    });
    assert.equal(registry.defaultContentType, 'application/x-msgpack');
    assert.equal(registry.defaultEncoding, 'utf-8');
  });
});

describe('registryFromEnv', () => {
  it('uses the default registry without a configuration file', () => {
    const registry = registryFromEnv({});
    assert.deepEqual(registry.availableContentTypes.map(t => t.toString()), ['application/msgpack', 'application/json']);
    assert.equal(registry.defaultContentType, 'application/json');
  });

  it('loads the configured file', () => {
    const logger = recordingLogger();
    const registry = registryFromEnv({ MEDIAKIT_CONTENT_CONFIG: fixture }, logger);
    assert.equal(registry.has('application/x-msgpack'), true);
    assert.deepEqual(logger.logs, [`[Content] Loading content config from ${fixture}`]);
  });
});
