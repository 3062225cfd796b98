// src/utils/errors.ts

import type { OAuthErrorCode } from '../core/response/types';

export class AuthorizeError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Decode errors. Handed to handlers as data, never thrown by the decoder.
export class AuthorizeDecodeError extends AuthorizeError {
  constructor(
    message: string,
    public oauthError: OAuthErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message, 'AUTHORIZE_DECODE_ERROR', details);
  }
}

export class MissingResponseTypeError extends AuthorizeDecodeError {
  constructor(details?: Record<string, unknown>) {
    super('response_type is required but not set', 'invalid_request', details);
    this.code = 'MISSING_RESPONSE_TYPE';
  }
}

export class ResponseTypeNotAllowedError extends AuthorizeDecodeError {
  constructor(
    public responseType: string,
    details?: Record<string, unknown>
  ) {
    super(`response_type "${responseType}" is not allowed`, 'unsupported_response_type', {
      ...details,
      responseType,
    });
    this.code = 'RESPONSE_TYPE_NOT_ALLOWED';
  }
}

/**
 * Thrown by a Responder that wrote nothing to the response and leaves the
 * user-facing output to the encoder.
 */
export class ResponderError extends AuthorizeError {
  constructor(
    message: string,
    code: string,
    public status: number,
    public userMessage: string = message,
    details?: Record<string, unknown>
  ) {
    super(message, code, { ...details, status });
  }
}

export class RedirectURIMissingError extends ResponderError {
  constructor(details?: Record<string, unknown>) {
    super('redirect_uri not set', 'REDIRECT_URI_MISSING', 400, undefined, details);
  }
}

export class RedirectURIMalformedError extends ResponderError {
  constructor(parserMessage: string, details?: Record<string, unknown>) {
    super(`redirect_uri is misformed. ${parserMessage}`, 'REDIRECT_URI_MALFORMED', 400, undefined, details);
  }
}

export class RedirectURINotAbsoluteError extends ResponderError {
  constructor(
    public redirectUri: string,
    details?: Record<string, unknown>
  ) {
    super(
      `redirect_uri is misformed. expected a full URI but got "${redirectUri}"`,
      'REDIRECT_URI_NOT_ABSOLUTE',
      400,
      undefined,
      { ...details, redirectUri }
    );
  }
}

// Configuration / setup errors
export class AuthorizeConfigError extends AuthorizeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHORIZE_CONFIG_ERROR', details);
  }
}

export class AuthorizeRequestParseError extends AuthorizeError {
  constructor(
    message: string,
    public issues: string[],
    details?: Record<string, unknown>
  ) {
    super(message, 'AUTHORIZE_REQUEST_PARSE_ERROR', { ...details, issues });
  }
}
