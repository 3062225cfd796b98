// src/endpoint.ts

import type { IncomingMessage } from 'http';
import type { AuthorizeDecoder, DecodeResult } from './core/authorize/AuthorizeDecoder';
import type { AuthorizeHandler, HandlerResult } from './core/authorize/AuthorizeHandlerMux';
import { AuthorizeHandlerMux } from './core/authorize/AuthorizeHandlerMux';
import { serializeAuthorizeRequest } from './core/authorize/types';
import type { AuthorizeContext, AuthorizeServices } from './core/context';
import type { ResponseEncoder } from './core/response/ResponseEncoder';
import type { ResponseWriter } from './core/response/types';
import type { LoggerLike } from './observability/Logger';
import type { MetricsCollector } from './observability/MetricsCollector';
import { generateCorrelationId, setSpanAttribute, withAuthorizeSpan } from './observability/tracing';

export interface AuthorizeEndpointOptions {
  services: AuthorizeServices;
  decoder: AuthorizeDecoder;
  handler: AuthorizeHandler;
  encoder: ResponseEncoder;
  logger: LoggerLike;
  metrics?: MetricsCollector;
}

export type AuthorizeEndpoint = (req: IncomingMessage, res: ResponseWriter) => Promise<void>;

/**
 * Compose decoder, handler and encoder into one request listener.
 *
 * Decode errors do not stop the request: they go to the handler along with
 * the decoded request. The returned promise never rejects.
 *
 * @example
 * ```typescript
 * const endpoint = createAuthorizeEndpoint({ services, decoder, handler: mux, encoder, logger });
 * app.get('/oauth2/authorize', (req, res) => void endpoint(req, res));
 * ```
 */
export function createAuthorizeEndpoint(options: AuthorizeEndpointOptions): AuthorizeEndpoint {
  const { services, decoder, handler, encoder, logger, metrics } = options;

  // Registration is over once the endpoint exists.
  if (handler instanceof AuthorizeHandlerMux) {
    handler.seal();
  }

  const writeResponse = (requestId: string, res: ResponseWriter, responder: HandlerResult): void => {
    try {
      encoder.encodeResponse(res, responder);
    } catch (encodeError) {
      logger.error('Failed to write authorize response', {
        requestId,
        error: encodeError instanceof Error ? encodeError.message : String(encodeError),
      });
    }
  };

  return async (req, res) => {
    const requestId = generateCorrelationId();
    const startTime = Date.now();

    await withAuthorizeSpan(requestId, async () => {
      const ctx: AuthorizeContext = { services, logger, requestId, httpRequest: req };
      let decoded: DecodeResult;
      try {
        decoded = decoder.decodeAuthorize(req);
      } catch (decodeError) {
        logger.error('Authorize decoder failed', {
          requestId,
          error: decodeError instanceof Error ? decodeError.message : String(decodeError),
        });
        writeResponse(requestId, res, undefined);
        return;
      }
      const { request, error } = decoded;
      setSpanAttribute('oauth.stage', request.stage);

      if (error) {
        metrics?.incrementCounter('authorize_decode_errors', { code: error.code });
        logger.debug('Authorize request failed validation', {
          requestId,
          errorCode: error.code,
          error: error.message,
          request: serializeAuthorizeRequest(request),
        });
      }

      let responder: HandlerResult;
      try {
        responder = await handler.handleAuthorizeRequest(ctx, request, error);
      } catch (handlerError) {
        logger.error('Authorize handler failed', {
          requestId,
          stage: request.stage,
          error: handlerError instanceof Error ? handlerError.message : String(handlerError),
        });
        responder = undefined;
      }

      writeResponse(requestId, res, responder);

      metrics?.recordLatency('authorize_request_duration', Date.now() - startTime, {
        stage: request.stage,
      });
    });
  };
}
