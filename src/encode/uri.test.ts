import * as assert from 'node:assert';
import { describe, it } from 'node:test';

import { parseHttpResource } from '../decode/resource.js';
import { parseHttpUri } from '../decode/uri.js';
import { encodeHttpResource } from './resource.js';
import { encodeHttpScheme } from './scheme.js';
import { encodeHttpUri } from './uri.js';

describe('encodeHttpScheme', () => {
  it('should encode both schemes', () => {
    assert.strictEqual(encodeHttpScheme('http'), 'http');
    assert.strictEqual(encodeHttpScheme('https'), 'https');
  });
});

describe('encodeHttpResource', () => {
  it('should encode path only', () => {
    assert.strictEqual(encodeHttpResource({ path: '/a/b', query: null, fragment: null }), '/a/b');
  });

  it('should encode query and fragment', () => {
    assert.strictEqual(
      encodeHttpResource({ path: '/a', query: 'k=v', fragment: 'top' }),
      '/a?k=v#top',
    );
    assert.strictEqual(encodeHttpResource({ path: '/a', query: 'k=v', fragment: null }), '/a?k=v');
    assert.strictEqual(encodeHttpResource({ path: '/a', query: null, fragment: 'x?y' }), '/a#x?y');
  });

  it('should encode normalized resources', () => {
    assert.strictEqual(encodeHttpResource(parseHttpResource('')), '/');
    assert.strictEqual(encodeHttpResource(parseHttpResource('?#')), '/');
    assert.strictEqual(encodeHttpResource(parseHttpResource('?key=val#')), '/?key=val');
  });
});

describe('encodeHttpUri', () => {
  it('should encode all components', () => {
    assert.strictEqual(
      encodeHttpUri({
        scheme: 'https',
        authority: 'example.com:443',
        resource: { path: '/r/rarepuppers', query: 'k=v&v=k', fragment: 'top' },
      }),
      'https://example.com:443/r/rarepuppers?k=v&v=k#top',
    );
  });

  it('should add the root path to a bare authority', () => {
    const uri = parseHttpUri('http://example.com');
    assert.ok(uri);
    assert.strictEqual(encodeHttpUri(uri), 'http://example.com/');
  });

  it('should round trip normalized uris', () => {
    const inputs = [
      'http://example.com/',
      'https://example.com:443/r/rarepuppers?k=v&v=k#top',
      'http://test.com/nazghul?test=3',
      'http://127.0.0.1:61761/chunks',
      'https://example.com/a/b/c#frag?param&key=val',
      'http://example.com/%E4%B8%AD?q=%20',
    ];
    for (const input of inputs) {
      const uri = parseHttpUri(input);
      assert.ok(uri, input);
      const encoded = encodeHttpUri(uri);
      assert.strictEqual(encoded, input);
      assert.deepStrictEqual(parseHttpUri(encoded), uri);
    }
  });
});
