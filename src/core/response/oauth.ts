/**
 * OAuth 2.0 Authorization Responses (RFC 6749)
 *
 * Builders for the final redirects of the authorization endpoint and for the
 * error page shown when a redirect is not possible.
 */

import type { AuthorizeRequest } from '../authorize/types';
import type { AuthorizeDecodeError } from '../../utils/errors';
import type { OAuthErrorCode } from './types';
import type { Responder } from './Responder';
import { CachedResponse } from './CachedResponse';
import { RedirectResponse, isAbsoluteURI } from './RedirectResponse';
import { valuesOf } from './headers';

export interface AccessTokenGrant {
  accessToken: string;
  tokenType: string;
  expiresIn?: number;
  scope?: string;
}

const NO_STORE = { 'Cache-Control': ['no-store'], Pragma: ['no-cache'] };

/**
 * Authorization Response of the code grant, section 4.1.2.
 */
export function authorizationResponse(ar: AuthorizeRequest, code: string): RedirectResponse {
  return new RedirectResponse({
    redirectUri: ar.redirectUri,
    query: valuesOf({ code, state: ar.state }),
  });
}

/**
 * Access Token Response of the implicit grant, section 4.2.2. Parameters go
 * in the fragment so they never reach the client's server.
 */
export function tokenResponse(ar: AuthorizeRequest, grant: AccessTokenGrant): RedirectResponse {
  return new RedirectResponse({
    redirectUri: ar.redirectUri,
    headers: NO_STORE,
    fragment: valuesOf({
      access_token: grant.accessToken,
      token_type: grant.tokenType,
      expires_in: grant.expiresIn === undefined ? undefined : String(grant.expiresIn),
      scope: grant.scope,
      state: ar.state,
    }),
  });
}

/**
 * Error Response, sections 4.1.2.1 and 4.2.2.1: fragment for the implicit
 * grant, query otherwise.
 */
export function errorResponse(
  ar: AuthorizeRequest,
  error: OAuthErrorCode,
  description?: string
): RedirectResponse {
  const params = valuesOf({ error, error_description: description, state: ar.state });
  return new RedirectResponse(
    ar.responseType === 'token'
      ? { redirectUri: ar.redirectUri, fragment: params }
      : { redirectUri: ar.redirectUri, query: params }
  );
}

/**
 * HTML error page for errors that can't be redirected (missing or invalid
 * redirect_uri, unknown client).
 */
export function errorPage(status: number, error: OAuthErrorCode, description: string): CachedResponse {
  const html = `<!DOCTYPE html>
<html>
<head>
  <title>Authorization Error</title>
</head>
<body>
  <h1>Authorization Error</h1>
  <p><strong>Error:</strong> <code>${escapeHtml(error)}</code></p>
  <p><strong>Description:</strong> ${escapeHtml(description)}</p>
</body>
</html>`;

  return new CachedResponse({
    status,
    headers: { 'Content-Type': ['text/html; charset=utf-8'] },
    body: html,
  });
}

/**
 * Answer a request that failed decoding: redirect the error when the request
 * names an absolute redirect_uri, otherwise show the error page.
 */
export function decodeErrorResponse(ar: AuthorizeRequest, decodeError: AuthorizeDecodeError): Responder {
  if (isAbsoluteURI(ar.redirectUri)) {
    return errorResponse(ar, decodeError.oauthError, decodeError.message);
  }
  return errorPage(400, decodeError.oauthError, decodeError.message);
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
