// src/core/response/types.ts

/**
 * The part of Node's ServerResponse a Responder writes through.
 * `http.ServerResponse` satisfies it as is.
 */
export interface ResponseWriter {
  appendHeader(name: string, value: string | readonly string[]): unknown;
  setHeader(name: string, value: string | number | readonly string[]): unknown;
  writeHead(statusCode: number): unknown;
  end(chunk?: string | Buffer): unknown;
}

/** Multi-valued key/value map, used for headers, query and fragment parameters. */
export type ValuesMap = Record<string, string[]>;

export type HeaderMap = ValuesMap;

// RFC 6749 sections 4.1.2.1 and 4.2.2.1
export type OAuthErrorCode =
  | 'invalid_request'
  | 'unauthorized_client'
  | 'access_denied'
  | 'unsupported_response_type'
  | 'invalid_scope'
  | 'server_error'
  | 'temporarily_unavailable';
