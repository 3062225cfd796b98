/**
 * Error Classes Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AuthorizeError,
  AuthorizeDecodeError,
  MissingResponseTypeError,
  ResponseTypeNotAllowedError,
  ResponderError,
  RedirectURIMissingError,
  RedirectURIMalformedError,
  RedirectURINotAbsoluteError,
  AuthorizeConfigError,
  AuthorizeRequestParseError,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('AuthorizeError', () => {
    it('should create error with message and code', () => {
      const error = new AuthorizeError('Test error', 'TEST_CODE');

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toBeUndefined();
      expect(error.name).toBe('AuthorizeError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should create error with details', () => {
      const details = { requestId: 'r1' };
      const error = new AuthorizeError('Test error', 'TEST_CODE', details);

      expect(error.details).toEqual(details);
    });
  });

  describe('Decode errors', () => {
    it('should describe a missing response_type', () => {
      const error = new MissingResponseTypeError();

      expect(error).toBeInstanceOf(AuthorizeDecodeError);
      expect(error.message).toBe('response_type is required but not set');
      expect(error.code).toBe('MISSING_RESPONSE_TYPE');
      expect(error.oauthError).toBe('invalid_request');
      expect(error.name).toBe('MissingResponseTypeError');
    });

    it('should quote the rejected response_type', () => {
      const error = new ResponseTypeNotAllowedError('id_token', { clientId: 'c1' });

      expect(error.message).toBe('response_type "id_token" is not allowed');
      expect(error.code).toBe('RESPONSE_TYPE_NOT_ALLOWED');
      expect(error.oauthError).toBe('unsupported_response_type');
      expect(error.responseType).toBe('id_token');
      expect(error.details).toEqual({ clientId: 'c1', responseType: 'id_token' });
    });
  });

  describe('Responder errors', () => {
    it('should default the user message to the message', () => {
      const error = new ResponderError('failed', 'TEST_CODE', 502);

      expect(error.status).toBe(502);
      expect(error.userMessage).toBe('failed');
      expect(error.details).toEqual({ status: 502 });
    });

    it('should keep a separate user message', () => {
      const error = new ResponderError('upstream timeout', 'TEST_CODE', 503, 'Try again later');

      expect(error.message).toBe('upstream timeout');
      expect(error.userMessage).toBe('Try again later');
    });

    it('should describe redirect URI failures with status 400', () => {
      const missing = new RedirectURIMissingError();
      const malformed = new RedirectURIMalformedError('Invalid URL');
      const relative = new RedirectURINotAbsoluteError('/cb');

      expect(missing.message).toBe('redirect_uri not set');
      expect(missing.code).toBe('REDIRECT_URI_MISSING');
      expect(malformed.message).toBe('redirect_uri is misformed. Invalid URL');
      expect(malformed.code).toBe('REDIRECT_URI_MALFORMED');
      expect(relative.message).toBe('redirect_uri is misformed. expected a full URI but got "/cb"');
      expect(relative.details).toEqual({ redirectUri: '/cb', status: 400 });
      for (const error of [missing, malformed, relative]) {
        expect(error).toBeInstanceOf(ResponderError);
        expect(error.status).toBe(400);
      }
    });
  });

  describe('Setup errors', () => {
    it('should create config errors', () => {
      const error = new AuthorizeConfigError('sealed');

      expect(error.code).toBe('AUTHORIZE_CONFIG_ERROR');
    });

    it('should keep parse issues', () => {
      const error = new AuthorizeRequestParseError('Invalid serialized authorize request', ['stage: Expected number']);

      expect(error.code).toBe('AUTHORIZE_REQUEST_PARSE_ERROR');
      expect(error.issues).toEqual(['stage: Expected number']);
      expect(error.details).toEqual({ issues: ['stage: Expected number'] });
    });
  });
});
