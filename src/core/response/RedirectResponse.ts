// src/core/response/RedirectResponse.ts

import type { HeaderMap, ResponseWriter, ValuesMap } from './types';
import { copyHeaders, encodeValues } from './headers';
import {
  RedirectURIMalformedError,
  RedirectURIMissingError,
  RedirectURINotAbsoluteError,
} from '../../utils/errors';

// Resolves relative references so they parse; they are rejected right after.
const RELATIVE_BASE = 'http://relative.invalid';

// scheme "://" non-empty authority, RFC 3986 section 3
const ABSOLUTE_URI = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]/i;

// WHATWG URL parsing strips TAB, CR and LF anywhere, so the parsed host
// could differ from the string a handler checked.
const CONTROL_CHARACTER = /[\x00-\x1f\x7f]/;

export function isAbsoluteURI(uri: string): boolean {
  return ABSOLUTE_URI.test(uri);
}

export interface RedirectResponseInit {
  redirectUri: string;
  headers?: HeaderMap;
  query?: ValuesMap;
  fragment?: ValuesMap;
}

/**
 * The final answer to an Authorization Request: an Authorization Response
 * (code grant), a Token Response (implicit grant) or an Error Response.
 * Each one is a redirect back to the client.
 */
export class RedirectResponse {
  readonly kind = 'redirect' as const;
  readonly headers: HeaderMap;

  /** Base redirection URI, from the request or the client's registration. */
  readonly redirectUri: string;

  /** Appended to the redirect URI's own query parameters. */
  readonly query: ValuesMap;

  /**
   * Encoded as application/x-www-form-urlencoded into the fragment
   * ("#..." at the end of the URI).
   */
  readonly fragment: ValuesMap;

  constructor(init: RedirectResponseInit) {
    this.redirectUri = init.redirectUri;
    this.headers = init.headers ?? {};
    this.query = init.query ?? {};
    this.fragment = init.fragment ?? {};
  }

  /**
   * Resolve the final Location. Throws a ResponderError when the base URI is
   * missing, unparseable or not absolute.
   */
  location(): string {
    if (this.redirectUri === '') {
      throw new RedirectURIMissingError();
    }

    if (CONTROL_CHARACTER.test(this.redirectUri)) {
      throw new RedirectURIMalformedError('control characters are not allowed', {
        redirectUri: this.redirectUri,
      });
    }

    let url: URL;
    try {
      url = new URL(this.redirectUri, RELATIVE_BASE);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RedirectURIMalformedError(message, { redirectUri: this.redirectUri });
    }
    if (!isAbsoluteURI(this.redirectUri)) {
      throw new RedirectURINotAbsoluteError(this.redirectUri);
    }

    url.search = encodeValues(this.query, url.searchParams);
    url.hash = encodeValues(this.fragment);
    return url.toString();
  }

  respondTo(writer: ResponseWriter): void {
    copyHeaders(writer, this.headers);

    const location = this.location();
    writer.setHeader('Location', location);
    writer.writeHead(307);
    writer.end();
  }
}
