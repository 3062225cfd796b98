// src/core/response/ResponseEncoder.ts

import { STATUS_CODES } from 'http';
import type { Responder } from './Responder';
import type { ResponseWriter } from './types';
import { renderResponder } from './Responder';
import { CachedResponse } from './CachedResponse';
import type { LoggerLike } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { AuthorizeError, ResponderError } from '../../utils/errors';

/**
 * Writes a handler's Responder, or a fallback, to the client.
 */
export interface ResponseEncoder {
  encodeResponse(writer: ResponseWriter, responder: Responder | undefined): void;
}

export function fallbackResponse(status: number, message: string = STATUS_CODES[status] ?? ''): CachedResponse {
  return new CachedResponse({
    status,
    headers: { 'Content-Type': ['text/plain; charset=utf-8'] },
    body: message,
  });
}

export class DefaultResponseEncoder implements ResponseEncoder {
  constructor(
    private logger: LoggerLike,
    private metrics?: MetricsCollector
  ) {}

  encodeResponse(writer: ResponseWriter, responder: Responder | undefined): void {
    if (!responder) {
      this.logger.warn('Handler produced no response');
      this.write(writer, fallbackResponse(500));
      return;
    }

    try {
      renderResponder(writer, responder);
      this.recordResponse(responder);
    } catch (error) {
      const code = error instanceof AuthorizeError ? error.code : 'UNKNOWN';
      this.metrics?.incrementCounter('authorize_render_failures', { code });

      if (error instanceof ResponderError) {
        this.logger.warn('Responder rejected, writing fallback', {
          errorCode: error.code,
          error: error.message,
        });
        this.write(writer, fallbackResponse(error.status, error.userMessage));
        return;
      }

      this.logger.error('Responder failed', {
        errorCode: code,
        error: error instanceof Error ? error.message : String(error),
      });
      this.write(writer, fallbackResponse(500));
    }
  }

  private write(writer: ResponseWriter, response: CachedResponse): void {
    response.respondTo(writer);
    this.recordResponse(response);
  }

  private recordResponse(responder: Responder): void {
    const status = responder.kind === 'cached' ? responder.status : 307;
    this.metrics?.incrementCounter('authorize_responses', { kind: responder.kind, status });
  }
}
