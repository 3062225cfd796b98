// src/index.ts

export { AuthorizationServer } from './server';
export { createAuthorizeEndpoint } from './endpoint';
export type { AuthorizeEndpoint, AuthorizeEndpointOptions } from './endpoint';

export {
  AuthorizeStage,
  CUSTOM_STAGE_MIN,
  customStage,
  createAuthorizeRequest,
  serializeAuthorizeRequest,
  deserializeAuthorizeRequest,
} from './core/authorize/types';
export type {
  AuthorizeRequest,
  BuiltinAuthorizeStage,
  SerializedAuthorizeRequest,
} from './core/authorize/types';

export { DefaultAuthorizeDecoder, createAuthorizeDecoder, trimParam } from './core/authorize/AuthorizeDecoder';
export type { AuthorizeDecoder, DecodeResult } from './core/authorize/AuthorizeDecoder';

export { AuthorizeHandlerMux } from './core/authorize/AuthorizeHandlerMux';
export type {
  AuthorizeHandler,
  AuthorizeHandlerFunc,
  AuthorizeHandlerMuxOptions,
  HandlerResult,
} from './core/authorize/AuthorizeHandlerMux';

export type {
  AuthorizeContext,
  AuthorizeServices,
  TokenFactory,
  TokenStorage,
} from './core/context';

export { CachedResponse } from './core/response/CachedResponse';
export type { CachedResponseInit } from './core/response/CachedResponse';
export { RedirectResponse, isAbsoluteURI } from './core/response/RedirectResponse';
export type { RedirectResponseInit } from './core/response/RedirectResponse';
export { renderResponder } from './core/response/Responder';
export type { Responder, ResponderKind } from './core/response/Responder';
export { DefaultResponseEncoder, fallbackResponse } from './core/response/ResponseEncoder';
export type { ResponseEncoder } from './core/response/ResponseEncoder';
export {
  authorizationResponse,
  tokenResponse,
  errorResponse,
  errorPage,
  decodeErrorResponse,
  escapeHtml,
} from './core/response/oauth';
export type { AccessTokenGrant } from './core/response/oauth';
export type { HeaderMap, ValuesMap, ResponseWriter, OAuthErrorCode } from './core/response/types';

export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { AuthorizeServerConfig } from './config/ConfigValidator';
export { Logger } from './observability/Logger';
export type { LoggerConfig, LoggerLike } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export type { MetricsConfig } from './observability/MetricsCollector';

// Export error classes for error handling
export {
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
} from './utils/errors';
