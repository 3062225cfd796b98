// src/server.ts

import type { AuthorizeStage } from './core/authorize/types';
import type { AuthorizeServices } from './core/context';
import { DefaultAuthorizeDecoder, type AuthorizeDecoder } from './core/authorize/AuthorizeDecoder';
import {
  AuthorizeHandlerMux,
  type AuthorizeHandler,
  type AuthorizeHandlerFunc,
} from './core/authorize/AuthorizeHandlerMux';
import { DefaultResponseEncoder } from './core/response/ResponseEncoder';
import { createAuthorizeEndpoint, type AuthorizeEndpoint } from './endpoint';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig, type AuthorizeServerConfig } from './config/ConfigValidator';
import { AuthorizeConfigError } from './utils/errors';

export class AuthorizationServer {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  /** Checks response_type against `allowedResponseTypes`. */
  readonly defaultDecoder: DefaultAuthorizeDecoder;
  readonly mux: AuthorizeHandlerMux;
  private decoder: AuthorizeDecoder;
  private encoder: DefaultResponseEncoder;
  private listener?: AuthorizeEndpoint;

  private constructor(
    config: AuthorizeServerConfig,
    private services: AuthorizeServices
  ) {
    this.logger = new Logger(config.logging);
    this.metrics = new MetricsCollector(config.metrics, this.logger);
    this.defaultDecoder = new DefaultAuthorizeDecoder(config.allowedResponseTypes);
    this.decoder = this.defaultDecoder;
    this.mux = new AuthorizeHandlerMux({ metrics: this.metrics });
    this.encoder = new DefaultResponseEncoder(this.logger, this.metrics);
  }

  /**
   * Build an authorization server from validated configuration.
   *
   * @param config - allowed response types, logging and metrics settings
   * @param services - token collaborators handed to every handler
   * @throws {z.ZodError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const server = AuthorizationServer.init(
   *   { allowedResponseTypes: ['code'], logging: { level: 'debug' } },
   *   { tokenFactory, tokenStorage }
   * );
   * server.handle(AuthorizeStage.Initialize, (ctx, ar, decodeError) => showLogin(ar, decodeError));
   * http.createServer((req, res) => void server.endpoint()(req, res)).listen(8080);
   * ```
   */
  static init(config: unknown, services: AuthorizeServices): AuthorizationServer {
    const validated = validateConfig(config);
    const server = new AuthorizationServer(validated, services);

    server.logger.info('Authorization server initialized', {
      allowedResponseTypes: validated.allowedResponseTypes,
    });
    return server;
  }

  /**
   * Register the handler of a stage. Must happen before `endpoint()`.
   */
  handle(stage: AuthorizeStage, handler: AuthorizeHandler | AuthorizeHandlerFunc): this {
    if (typeof handler === 'function') {
      this.mux.addFunc(stage, handler);
    } else {
      this.mux.add(stage, handler);
    }
    return this;
  }

  /**
   * Replace the decoder, typically with one that restores the stage of a
   * request resumed from a session. Must happen before `endpoint()`.
   */
  useDecoder(decoder: AuthorizeDecoder): this {
    if (this.listener) {
      throw new AuthorizeConfigError('Cannot replace the decoder: endpoint already created');
    }
    this.decoder = decoder;
    return this;
  }

  /**
   * The request listener for the authorization endpoint. The first call
   * seals the handler registry.
   */
  endpoint(): AuthorizeEndpoint {
    if (!this.listener) {
      this.listener = createAuthorizeEndpoint({
        services: this.services,
        decoder: this.decoder,
        handler: this.mux,
        encoder: this.encoder,
        logger: this.logger,
        metrics: this.metrics,
      });
    }
    return this.listener;
  }

  async close(): Promise<void> {
    await this.metrics.close();
  }
}
