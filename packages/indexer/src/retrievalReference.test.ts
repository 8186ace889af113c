import { describe, it, expect } from 'vitest';
import { InvalidRequestError } from '@relayarr/core';
import {
  decodeReference,
  encodeReference,
  referenceFromNzb,
  referenceFromUrl,
} from './retrievalReference.js';
import { renderNzb } from './newznab.js';

const reference = {
  id: 'rly_0123456789abcdef0123456789abcdef',
  title: 'Le Film (2021) WEBDL-1080p',
  links: ['https://host.test/a', 'https://host.test/b'],
  size: 5368709120,
  source: 'host',
};

describe('retrieval references', () => {
  it('decodes what it encodes', () => {
    const encoded = encodeReference(reference);

    expect(encoded).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(decodeReference(encoded)).toEqual(reference);
  });

  it('rejects payloads that are not JSON', () => {
    expect(() => decodeReference('not-base64!!')).toThrow(InvalidRequestError);
  });

  it('rejects references without links', () => {
    const encoded = Buffer.from(JSON.stringify({ id: 'x', title: 'T', links: [] })).toString('base64url');

    expect(() => decodeReference(encoded)).toThrow(InvalidRequestError);
  });

  it('rejects ids this relay never derives', () => {
    const encoded = encodeReference({ ...reference, id: 'nzb_12345' });

    expect(() => decodeReference(encoded)).toThrow('Invalid request (reference): id: not a release id');
  });
});

describe('referenceFromUrl', () => {
  it('reads the id parameter of a grab link', () => {
    expect(referenceFromUrl('http://relay.test:9117/api?t=get&id=abc&apikey=test-key')).toBe('abc');
  });

  it('passes bare references through', () => {
    expect(referenceFromUrl('  abc  ')).toBe('abc');
  });

  it('rejects links without an id', () => {
    expect(() => referenceFromUrl('http://relay.test/api?t=get')).toThrow(InvalidRequestError);
  });
});

describe('referenceFromNzb', () => {
  it('reads the reference from an issued NZB', () => {
    expect(referenceFromNzb(renderNzb('abc', 'Title'))).toBe('abc');
  });

  it('rejects foreign NZB documents', () => {
    expect(() => referenceFromNzb('<nzb></nzb>')).toThrow(InvalidRequestError);
  });
});
