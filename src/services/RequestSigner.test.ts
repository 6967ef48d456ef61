import { describe, it, expect } from 'vitest';
import { RequestSigner } from './RequestSigner.js';

describe('RequestSigner', () => {
  describe('sign', () => {
    it('concatenates sorted keys and values, appends the secret and hashes with MD5', () => {
      // md5('a1b2secret')
      expect(RequestSigner.sign({ a: '1', b: '2' }, 'secret')).toBe(
        '670699129dd49818b5abd9e7c2fd6569'
      );
    });

    it('does not depend on insertion order', () => {
      expect(RequestSigner.sign({ b: '2', a: '1' }, 'secret')).toBe(
        RequestSigner.sign({ a: '1', b: '2' }, 'secret')
      );
    });

    it('ignores format and api_sig', () => {
      expect(RequestSigner.sign({ a: '1', b: '2', format: 'json', api_sig: 'x' }, 'secret')).toBe(
        '670699129dd49818b5abd9e7c2fd6569'
      );
    });
  });

  describe('canonicalize', () => {
    it('sorts by byte order, so uppercase keys come first', () => {
      expect(RequestSigner.canonicalize({ b: '1', a: '2', Z: '3' }).map(([key]) => key)).toEqual([
        'Z',
        'a',
        'b',
      ]);
    });
  });

  describe('buildUri', () => {
    it('lists parameters in ascending key order followed by format=json', () => {
      const uri = RequestSigner.buildUri('https://ws.audioscrobbler.com/2.0', {
        method: 'juice',
        api_key: 'apple',
        fortnite: 'battlePass',
      });

      expect(uri).toBe(
        'https://ws.audioscrobbler.com/2.0/?api_key=apple&fortnite=battlePass&method=juice&format=json'
      );
    });

    it('percent-encodes values and appends the signature last', () => {
      const uri = RequestSigner.buildUri(
        'https://example.test/2.0',
        { artist: 'Tame Impala', track: 'Let It Happen' },
        'abc123'
      );

      expect(uri).toBe(
        'https://example.test/2.0/?artist=Tame%20Impala&track=Let%20It%20Happen&format=json&api_sig=abc123'
      );
    });
  });

  describe('signRequest', () => {
    it('produces the same body for equal parameter sets', () => {
      const first = RequestSigner.signRequest({ track: 'x', artist: 'y' }, 'test-secret');
      const second = RequestSigner.signRequest({ artist: 'y', track: 'x' }, 'test-secret');

      expect(first.body).toBe(second.body);
      expect(first.params).toEqual([
        ['artist', 'y'],
        ['track', 'x'],
      ]);
      expect(first.body).toBe(`artist=y&track=x&format=json&api_sig=${first.signature}`);
    });
  });
});
