// src/core/authorize/AuthorizeDecoder.ts

import type { IncomingMessage } from 'http';
import { createAuthorizeRequest, type AuthorizeRequest } from './types';
import {
  MissingResponseTypeError,
  ResponseTypeNotAllowedError,
  type AuthorizeDecodeError,
} from '../../utils/errors';

// CR, LF, TAB and space only; other whitespace is kept.
const CUTSET = new Set(['\r', '\n', '\t', ' ']);

export function trimParam(value: string | null): string {
  const str = value ?? '';
  let start = 0;
  let end = str.length;
  while (start < end && CUTSET.has(str[start])) start++;
  while (end > start && CUTSET.has(str[end - 1])) end--;
  return str.slice(start, end);
}

// Request targets are origin-form ("/path?query"), so split rather than parse.
function queryOf(target: string): URLSearchParams {
  const index = target.indexOf('?');
  return new URLSearchParams(index === -1 ? '' : target.slice(index + 1));
}

/**
 * The decoded request is always present; `error` reports why it is invalid.
 */
export interface DecodeResult {
  request: AuthorizeRequest;
  error?: AuthorizeDecodeError;
}

export interface AuthorizeDecoder {
  decodeAuthorize(req: IncomingMessage): DecodeResult;
}

/**
 * Decodes the query string of an authorization request and checks
 * response_type against a fixed allow-set.
 */
export class DefaultAuthorizeDecoder implements AuthorizeDecoder {
  private readonly allowedResponseTypes: ReadonlySet<string>;

  constructor(allowedResponseTypes: Iterable<string>) {
    this.allowedResponseTypes = new Set(allowedResponseTypes);
  }

  decodeAuthorize(req: IncomingMessage): DecodeResult {
    const result = this.decodeQuery(queryOf(req.url ?? ''));
    result.request.httpRequest = req;
    return result;
  }

  decodeQuery(params: URLSearchParams): DecodeResult {
    const request = createAuthorizeRequest({
      responseType: trimParam(params.get('response_type')),
      clientId: trimParam(params.get('client_id')),
      redirectUri: trimParam(params.get('redirect_uri')),
      scope: trimParam(params.get('scope')),
      state: trimParam(params.get('state')),
    });

    if (request.responseType === '') {
      return { request, error: new MissingResponseTypeError() };
    }
    if (!this.allowedResponseTypes.has(request.responseType)) {
      return { request, error: new ResponseTypeNotAllowedError(request.responseType) };
    }
    return { request };
  }
}

/**
 * @param allowedResponseTypes - response_type values to accept; none means reject all
 */
export function createAuthorizeDecoder(...allowedResponseTypes: string[]): DefaultAuthorizeDecoder {
  return new DefaultAuthorizeDecoder(allowedResponseTypes);
}
