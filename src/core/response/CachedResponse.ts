// src/core/response/CachedResponse.ts

import { STATUS_CODES } from 'http';
import type { HeaderMap, ResponseWriter } from './types';
import { copyHeaders } from './headers';

export interface CachedResponseInit {
  status: number;
  headers?: HeaderMap;
  body?: string | Buffer;
}

/**
 * A fully buffered response: login or consent prompts, error pages, anything
 * that is not the final redirect back to the client.
 */
export class CachedResponse {
  readonly kind = 'cached' as const;
  readonly status: number;
  readonly headers: HeaderMap;
  readonly body?: string | Buffer;

  constructor(init: CachedResponseInit) {
    this.status = init.status;
    this.headers = init.headers ?? {};
    this.body = init.body;
  }

  /**
   * Plain response whose body is the standard reason phrase of `status`.
   */
  static fromStatus(status: number): CachedResponse {
    return new CachedResponse({ status, body: STATUS_CODES[status] ?? '' });
  }

  respondTo(writer: ResponseWriter): void {
    // headers must land before writeHead commits them
    copyHeaders(writer, this.headers);
    writer.writeHead(this.status);
    if (this.body !== undefined) {
      writer.end(this.body);
    } else {
      writer.end();
    }
  }
}
