// src/core/authorize/types.ts

import type { IncomingMessage } from 'http';
import { z } from 'zod';
import { AuthorizeConfigError, AuthorizeRequestParseError } from '../../utils/errors';

/**
 * Built-in stages of an authorization flow.
 *
 * Values 0-99 are reserved for the library; integrator stages start at
 * {@link CUSTOM_STAGE_MIN}. Stages are dispatch keys only, the order a
 * request moves through them is up to the handlers.
 */
export const AuthorizeStage = {
  /** The request just arrived; the user is about to log in. */
  Initialize: 0,
  /** The request carries login information (e.g. a submitted login form). */
  ToAuthenticate: 1,
  /** Logged in, scope not yet authorized (MFA, client prompts, ...). */
  Intermediate: 2,
  /** The request carries the user's scope confirmation. */
  ToAuthorize: 3,
  /** Boundary marker for custom stages. */
  Custom: 4,
} as const;

export type BuiltinAuthorizeStage = (typeof AuthorizeStage)[keyof typeof AuthorizeStage];

// Integrator stages are plain numbers, so the type is kept open.
export type AuthorizeStage = number;

export const CUSTOM_STAGE_MIN = 100;

export function customStage(value: number): AuthorizeStage {
  if (!Number.isInteger(value) || value < CUSTOM_STAGE_MIN) {
    throw new AuthorizeConfigError(
      `Custom stages must be integers >= ${CUSTOM_STAGE_MIN}, got ${value}`,
      { stage: value }
    );
  }
  return value;
}

/**
 * An Authorization Request for the Authorization Code Grant (RFC 6749
 * section 4.1.1) or the Implicit Grant (section 4.2.1).
 */
export interface AuthorizeRequest {
  /** REQUIRED. "code" or "token". */
  responseType: string;

  /** REQUIRED by RFC 6749 section 2.2; checking it is left to handlers. */
  clientId: string;

  /** OPTIONAL. Absolute URI, RFC 6749 section 3.1.2. */
  redirectUri: string;

  /** OPTIONAL. RFC 6749 section 3.3. */
  scope: string;

  /**
   * RECOMMENDED. Opaque value echoed back to the client, used against
   * cross-site request forgery (RFC 6749 section 10.12).
   */
  state: string;

  stage: AuthorizeStage;

  /** Set by handlers once the user is authenticated. */
  userId: string;

  /** The raw request this one was decoded from, if any. Never serialized. */
  httpRequest?: IncomingMessage;
}

export function createAuthorizeRequest(init: Partial<AuthorizeRequest> = {}): AuthorizeRequest {
  return {
    responseType: '',
    clientId: '',
    redirectUri: '',
    scope: '',
    state: '',
    stage: AuthorizeStage.Initialize,
    userId: '',
    ...init,
  };
}

export interface SerializedAuthorizeRequest {
  response_type: string;
  client_id: string;
  redirect_uri?: string;
  scope?: string;
  state?: string;
  stage?: number;
  user_id?: string;
}

/**
 * Map a request to its wire representation. Empty optional fields and the
 * initial stage are left out; response_type and client_id are always there.
 */
export function serializeAuthorizeRequest(ar: AuthorizeRequest): SerializedAuthorizeRequest {
  const out: SerializedAuthorizeRequest = {
    response_type: ar.responseType,
    client_id: ar.clientId,
  };
  if (ar.redirectUri) out.redirect_uri = ar.redirectUri;
  if (ar.scope) out.scope = ar.scope;
  if (ar.state) out.state = ar.state;
  if (ar.stage !== AuthorizeStage.Initialize) out.stage = ar.stage;
  if (ar.userId) out.user_id = ar.userId;
  return out;
}

const SerializedAuthorizeRequestSchema = z.object({
  response_type: z.string(),
  client_id: z.string(),
  redirect_uri: z.string().optional(),
  scope: z.string().optional(),
  state: z.string().optional(),
  stage: z.number().int().nonnegative().optional(),
  user_id: z.string().optional(),
});

/**
 * Rebuild a request from its serialized form, e.g. when carrying it between
 * stages in a session.
 *
 * @throws {AuthorizeRequestParseError} If the input does not match the wire shape
 */
export function deserializeAuthorizeRequest(input: unknown): AuthorizeRequest {
  const result = SerializedAuthorizeRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new AuthorizeRequestParseError('Invalid serialized authorize request', issues);
  }

  const data = result.data;
  return createAuthorizeRequest({
    responseType: data.response_type,
    clientId: data.client_id,
    redirectUri: data.redirect_uri ?? '',
    scope: data.scope ?? '',
    state: data.state ?? '',
    stage: data.stage ?? AuthorizeStage.Initialize,
    userId: data.user_id ?? '',
  });
}
