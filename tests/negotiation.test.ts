import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { MediaType } from '../src/media/media-type.js';
import { negotiateContentType, parseAccept, selectContentType } from '../src/media/negotiation.js';
import { MalformedMediaTypeError, NoAcceptableTypeError } from '../src/util/errors.js';

const types = (...raw: string[]) => raw.map(r => MediaType.parse(r));

describe('parseAccept', () => {
  it('reads ranges in header order and drops accept extensions', () => {
    const ranges = parseAccept('text/html;level=1;q=0.5;ext=1, */*');
    assert.deepEqual(
      ranges.map(r => [r.range.toString(), r.quality]),
      [['text/html; level=1', 0.5], ['*/*', 1]]
    );
  });

  it('skips empty elements', () => {
    assert.deepEqual(parseAccept(' , ,application/json').map(r => r.range.toString()), ['application/json']);
  });

  it('keeps commas inside quoted parameters', () => {
    const [range] = parseAccept('application/json; profile="a,b"; q=0.3');
    assert.equal(range.range.parameters.get('profile'), 'a,b');
    assert.equal(range.quality, 0.3);
  });

  for (const header of ['*/json', 'a/b;q=2', 'a/b;q=x', 'a/b;q=-0.1', 'nonsense']) {
    it(`rejects ${JSON.stringify(header)}`, () => {
      assert.throws(() => parseAccept(header), MalformedMediaTypeError);
    });
  }
});

describe('negotiateContentType', () => {
  const available = types('application/msgpack', 'application/json');

  it('uses the default for an absent or blank header', () => {
    assert.equal(negotiateContentType(undefined, available, 'application/json'), 'application/json');
    assert.equal(negotiateContentType('   ', available, 'application/json'), 'application/json');
  });

  it('treats a missing header as */* without a default', () => {
    assert.equal(negotiateContentType(undefined, available), 'application/msgpack');
  });

  it('picks an exact match', () => {
    assert.equal(negotiateContentType('application/json', available), 'application/json');
  });

  it('prefers the higher quality', () => {
    assert.equal(negotiateContentType('application/json;q=0.5, application/msgpack', available), 'application/msgpack');
    assert.equal(negotiateContentType('*/*;q=0.1, application/json;q=0.5', available), 'application/json');
  });

  it('lets the most specific range decide a type quality', () => {
    assert.equal(negotiateContentType('application/*;q=1, application/json;q=0.2', available), 'application/msgpack');
  });

  it('treats q=0 on the deciding range as a veto', () => {
    assert.equal(negotiateContentType('application/msgpack;q=0, */*', available), 'application/json');
    assert.throws(() => negotiateContentType('application/msgpack;q=0, application/json;q=0', available), NoAcceptableTypeError);
  });

  it('breaks quality ties by specificity, then registration order', () => {
    assert.equal(negotiateContentType('*/*, application/json', available), 'application/json');
    assert.equal(negotiateContentType('application/*', available), 'application/msgpack');
  });

  it('matches structured-syntax suffix wildcards', () => {
    const vendor = types('application/json', 'application/vnd.example+json');
    assert.equal(negotiateContentType('application/*+json', vendor), 'application/vnd.example+json');
  });

  it('matches parameters and returns the registered form', () => {
    const versions = types('application/vnd.api+json; version=1', 'application/vnd.api+json; version=2');
    assert.equal(negotiateContentType('application/vnd.api+json; version=2', versions), 'application/vnd.api+json; version=2');
    assert.equal(negotiateContentType('application/vnd.api+json', versions), 'application/vnd.api+json; version=1');
  });

  it('ignores charset in ranges', () => {
    assert.equal(negotiateContentType('application/json; charset=latin1', available), 'application/json');
  });

  it('falls back to the default when nothing matches', () => {
    assert.equal(negotiateContentType('text/html', available, 'application/json'), 'application/json');
  });

  it('fails with 415 when nothing matches and there is no default', () => {
    assert.throws(
      () => negotiateContentType('text/html', available),
      (error: unknown) => error instanceof NoAcceptableTypeError && error.status === 415 && error.accept === 'text/html'
    );
  });
});

describe('selectContentType', () => {
  it('reports the deciding range', () => {
    const result = selectContentType(parseAccept('application/*;q=0.4, text/plain'), types('text/csv', 'application/json'));
    assert.ok(result);
    assert.equal(result.selected.toString(), 'application/json');
    assert.equal(result.range.range.toString(), 'application/*');
    assert.equal(result.range.quality, 0.4);
  });

  it('returns undefined when no range applies', () => {
    assert.equal(selectContentType(parseAccept('text/plain'), types('application/json')), undefined);
  });
});
