// src/core/context.ts

import type { IncomingMessage } from 'http';
import type { AuthorizeRequest } from './authorize/types';
import type { LoggerLike } from '../observability/Logger';

/**
 * Produces token strings for a request. Formats and signing are up to the
 * integrator.
 */
export interface TokenFactory {
  createAuthorizationCode(ar: AuthorizeRequest): Promise<string>;
  createAccessToken(ar: AuthorizeRequest): Promise<string>;
}

/**
 * Persists issued authorization codes (code grant) and access tokens
 * (implicit grant) so the token endpoint can look them up later.
 */
export interface TokenStorage {
  saveAuthorizationCode(code: string, ar: AuthorizeRequest): Promise<void>;
  saveAccessToken(token: string, ar: AuthorizeRequest): Promise<void>;
}

/** Capabilities the integrator hands to every handler. */
export interface AuthorizeServices {
  tokenFactory: TokenFactory;
  tokenStorage: TokenStorage;
}

/**
 * Everything a handler gets besides the request itself. Built once per
 * request by the endpoint and passed explicitly.
 */
export interface AuthorizeContext {
  services: AuthorizeServices;
  logger: LoggerLike;
  requestId: string;
  httpRequest?: IncomingMessage;
}
