// src/core/authorize/AuthorizeHandlerMux.ts

import type { AuthorizeRequest, AuthorizeStage } from './types';
import type { AuthorizeContext } from '../context';
import type { Responder } from '../response/Responder';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { AuthorizeDecodeError } from '../../utils/errors';
import { AuthorizeConfigError } from '../../utils/errors';
import { CachedResponse } from '../response/CachedResponse';

export type HandlerResult = Responder | undefined;

/**
 * Handles an Authorization Request in one stage.
 *
 * Per RFC 6749 the final answer is always a redirect (RedirectResponse).
 * Before that, a server usually shows intermediate pages (login, MFA, scope
 * review, a prompt for a missing client id) as a CachedResponse.
 * `undefined` means no response was produced.
 */
export interface AuthorizeHandler {
  handleAuthorizeRequest(
    ctx: AuthorizeContext,
    ar: AuthorizeRequest,
    decodeError: AuthorizeDecodeError | undefined
  ): HandlerResult | Promise<HandlerResult>;
}

export type AuthorizeHandlerFunc = AuthorizeHandler['handleAuthorizeRequest'];

export interface AuthorizeHandlerMuxOptions {
  metrics?: MetricsCollector;
}

/**
 * Routes each stage of an AuthorizeRequest to its own handler.
 *
 * Register everything, then `seal()` before serving; the endpoint seals the
 * mux it is given.
 */
export class AuthorizeHandlerMux implements AuthorizeHandler {
  private handlers: Map<AuthorizeStage, AuthorizeHandler> = new Map();
  private sealed = false;

  constructor(private options: AuthorizeHandlerMuxOptions = {}) {}

  /**
   * Register a handler for a stage. A later registration for the same stage
   * replaces the earlier one.
   *
   * @throws {AuthorizeConfigError} If the mux is sealed
   */
  add(stage: AuthorizeStage, handler: AuthorizeHandler): this {
    if (this.sealed) {
      throw new AuthorizeConfigError(`Cannot register stage ${stage}: handler mux is sealed`, {
        stage,
      });
    }
    this.handlers.set(stage, handler);
    return this;
  }

  addFunc(stage: AuthorizeStage, fn: AuthorizeHandlerFunc): this {
    return this.add(stage, { handleAuthorizeRequest: fn });
  }

  has(stage: AuthorizeStage): boolean {
    return this.handlers.has(stage);
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Run the handler registered for `ar.stage` and return its Responder as is.
   * An unregistered stage yields a plain 500 response, not an error.
   */
  async dispatch(
    ctx: AuthorizeContext,
    ar: AuthorizeRequest,
    decodeError: AuthorizeDecodeError | undefined
  ): Promise<HandlerResult> {
    const handler = this.handlers.get(ar.stage);
    if (handler) {
      this.options.metrics?.incrementCounter('authorize_requests', { stage: ar.stage });
      return handler.handleAuthorizeRequest(ctx, ar, decodeError);
    }

    ctx.logger.warn('No handler registered for stage', {
      stage: ar.stage,
      requestId: ctx.requestId,
    });
    this.options.metrics?.incrementCounter('authorize_stage_unregistered', { stage: ar.stage });
    return CachedResponse.fromStatus(500);
  }

  handleAuthorizeRequest(
    ctx: AuthorizeContext,
    ar: AuthorizeRequest,
    decodeError: AuthorizeDecodeError | undefined
  ): Promise<HandlerResult> {
    return this.dispatch(ctx, ar, decodeError);
  }
}
