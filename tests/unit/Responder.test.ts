// tests/unit/Responder.test.ts

import { describe, it, expect } from 'vitest';
import { CachedResponse } from '../../src/core/response/CachedResponse';
import { RedirectResponse, isAbsoluteURI } from '../../src/core/response/RedirectResponse';
import { renderResponder, type Responder } from '../../src/core/response/Responder';
import {
  RedirectURIMalformedError,
  RedirectURIMissingError,
  RedirectURINotAbsoluteError,
  ResponderError,
} from '../../src/utils/errors';
import { ResponseRecorder } from '../helpers';

describe('CachedResponse', () => {
  it('should write status, headers and body', () => {
    const responder: Responder = new CachedResponse({
      status: 500,
      headers: { 'X-Hello-World': ['silly hello'] },
      body: 'hello world',
    });
    const w = new ResponseRecorder();

    renderResponder(w, responder);

    expect(w.statusCode).toBe(500);
    expect(w.getHeader('X-Hello-World')).toBe('silly hello');
    expect(w.body).toBe('hello world');
    expect(w.ended).toBe(true);
  });

  it('should apply headers before the status is written', () => {
    const w = new ResponseRecorder();

    new CachedResponse({ status: 200, headers: { 'Content-Type': ['text/html'] } }).respondTo(w);

    expect(w.headersAtWriteHead).toEqual({ 'content-type': ['text/html'] });
  });

  it('should append every value of a multi-value header in order', () => {
    const w = new ResponseRecorder();

    new CachedResponse({
      status: 200,
      headers: { 'Set-Cookie': ['a=1', 'b=2'] },
    }).respondTo(w);

    expect(w.getHeaderValues('Set-Cookie')).toEqual(['a=1', 'b=2']);
  });

  it('should end without a body when none is set', () => {
    const w = new ResponseRecorder();

    new CachedResponse({ status: 204 }).respondTo(w);

    expect(w.statusCode).toBe(204);
    expect(w.body).toBe('');
    expect(w.ended).toBe(true);
  });

  it('should write Buffer bodies', () => {
    const w = new ResponseRecorder();

    new CachedResponse({ status: 200, body: Buffer.from('bytes') }).respondTo(w);

    expect(w.body).toBe('bytes');
  });

  it('should build a response from a status code', () => {
    const response = CachedResponse.fromStatus(404);

    expect(response.status).toBe(404);
    expect(response.body).toBe('Not Found');
  });
});

describe('RedirectResponse', () => {
  it('should merge the query into the redirect URI with sorted keys', () => {
    const w = new ResponseRecorder();
    const responder = new RedirectResponse({
      headers: { 'X-Hello-World': ['silly hello'] },
      redirectUri: 'https://foobar.com/path/oauth2?hello=world&foo=bar',
      query: {
        'x-something': ['good'],
        'y-something': ['bad'],
        'z-something': ['ugly'],
      },
    });

    responder.respondTo(w);

    expect(w.statusCode).toBe(307);
    expect(w.getHeader('Location')).toBe(
      'https://foobar.com/path/oauth2?foo=bar&hello=world&x-something=good&y-something=bad&z-something=ugly'
    );
    expect(w.getHeader('X-Hello-World')).toBe('silly hello');
    expect(w.body).toBe('');
  });

  it('should order keys alphabetically whatever the insertion order', () => {
    const location = new RedirectResponse({
      redirectUri: 'https://client.example.com/cb?b=2',
      query: { a: ['1'] },
    }).location();

    expect(location).toBe('https://client.example.com/cb?a=1&b=2');
  });

  it('should append values for a key the base URI already has', () => {
    const location = new RedirectResponse({
      redirectUri: 'https://client.example.com/cb?scope=a',
      query: { scope: ['b', 'c'] },
    }).location();

    expect(location).toBe('https://client.example.com/cb?scope=a&scope=b&scope=c');
  });

  it('should form-encode query values', () => {
    const location = new RedirectResponse({
      redirectUri: 'https://client.example.com/cb',
      query: { error_description: ['not allowed & rejected'] },
    }).location();

    expect(location).toBe('https://client.example.com/cb?error_description=not+allowed+%26+rejected');
  });

  it('should encode the fragment parameters', () => {
    const location = new RedirectResponse({
      redirectUri: 'https://client.example.com/cb',
      fragment: { state: ['xyz'], access_token: ['abc'], token_type: ['Bearer'] },
    }).location();

    expect(location).toBe('https://client.example.com/cb#access_token=abc&state=xyz&token_type=Bearer');
  });

  it('should drop a fragment from the base URI when there are no fragment parameters', () => {
    const location = new RedirectResponse({
      redirectUri: 'https://client.example.com/cb#old',
      query: { code: ['c1'] },
    }).location();

    expect(location).toBe('https://client.example.com/cb?code=c1');
  });

  it('should keep the base URI as is when nothing is merged', () => {
    const location = new RedirectResponse({ redirectUri: 'https://client.example.com/cb' }).location();

    expect(location).toBe('https://client.example.com/cb');
  });

  describe('errors', () => {
    it('should reject a relative redirect URI without writing a Location or status', () => {
      const w = new ResponseRecorder();
      const responder = new RedirectResponse({
        headers: { 'X-Hello-World': ['silly hello'] },
        redirectUri: '/path/oauth2?hello=world&foo=bar',
        query: { 'x-something': ['good'] },
      });

      expect(() => responder.respondTo(w)).toThrow(
        'redirect_uri is misformed. expected a full URI but got "/path/oauth2?hello=world&foo=bar"'
      );
      expect(w.hasHeader('Location')).toBe(false);
      expect(w.statusCode).toBeUndefined();
    });

    it('should reject "/relative/path" as not absolute', () => {
      const w = new ResponseRecorder();

      try {
        new RedirectResponse({ redirectUri: '/relative/path' }).respondTo(w);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(RedirectURINotAbsoluteError);
        expect(error).toBeInstanceOf(ResponderError);
        if (error instanceof RedirectURINotAbsoluteError) {
          expect(error.message).toBe(
            'redirect_uri is misformed. expected a full URI but got "/relative/path"'
          );
          expect(error.status).toBe(400);
        }
      }
      expect(w.hasHeader('Location')).toBe(false);
      expect(w.statusCode).toBeUndefined();
    });

    it('should reject URIs without a host', () => {
      expect(() => new RedirectResponse({ redirectUri: 'mailto:someone@example.com' }).location()).toThrow(
        RedirectURINotAbsoluteError
      );
    });

    it('should reject an empty redirect URI', () => {
      const w = new ResponseRecorder();

      expect(() => new RedirectResponse({ redirectUri: '' }).respondTo(w)).toThrow(RedirectURIMissingError);
      expect(() => new RedirectResponse({ redirectUri: '' }).respondTo(w)).toThrow('redirect_uri not set');
      expect(w.statusCode).toBeUndefined();
    });

    it.each([
      ['a tab inside the host', 'https://client.exa\tmple.com/cb'],
      ['a newline inside the path', 'https://client.example.com/c\nb'],
      ['a carriage return', 'https://client.example.com/cb\r'],
      ['a NUL byte', 'https://client.example.com/\u0000cb'],
      ['DEL', 'https://client.example.com/cb\u007f'],
    ])('should reject a redirect URI with %s', (_desc, redirectUri) => {
      const w = new ResponseRecorder();
      const responder = new RedirectResponse({ redirectUri, query: { code: ['c1'] } });

      expect(() => responder.respondTo(w)).toThrow(RedirectURIMalformedError);
      expect(() => responder.location()).toThrow(
        'redirect_uri is misformed. control characters are not allowed'
      );
      expect(w.hasHeader('Location')).toBe(false);
      expect(w.statusCode).toBeUndefined();
    });

    it('should reject an unparseable redirect URI', () => {
      const w = new ResponseRecorder();

      expect(() => new RedirectResponse({ redirectUri: 'https://[client' }).respondTo(w)).toThrow(
        RedirectURIMalformedError
      );
      expect(() => new RedirectResponse({ redirectUri: 'https://[client' }).respondTo(w)).toThrow(
        /^redirect_uri is misformed\. /
      );
      expect(w.hasHeader('Location')).toBe(false);
      expect(w.statusCode).toBeUndefined();
    });
  });

  describe('isAbsoluteURI', () => {
    it('should require a scheme and a host', () => {
      expect(isAbsoluteURI('https://client.example.com')).toBe(true);
      expect(isAbsoluteURI('com.example.app://callback')).toBe(true);
      expect(isAbsoluteURI('//client.example.com/cb')).toBe(false);
      expect(isAbsoluteURI('https:///cb')).toBe(false);
      expect(isAbsoluteURI('')).toBe(false);
    });
  });
});
