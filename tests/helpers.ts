// tests/helpers.ts

import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { vi } from 'vitest';
import type { ResponseWriter } from '../src/core/response/types';
import type { AuthorizeContext, AuthorizeServices } from '../src/core/context';
import type { LoggerLike } from '../src/observability/Logger';

/**
 * In-memory ResponseWriter. Header names are stored lower-cased, like
 * Node's ServerResponse does.
 */
export class ResponseRecorder implements ResponseWriter {
  statusCode?: number;
  body = '';
  ended = false;
  headersAtWriteHead?: Record<string, string[]>;
  private headers: Map<string, string[]> = new Map();

  appendHeader(name: string, value: string | readonly string[]): this {
    const key = name.toLowerCase();
    const values = typeof value === 'string' ? [value] : [...value];
    this.headers.set(key, [...(this.headers.get(key) ?? []), ...values]);
    return this;
  }

  setHeader(name: string, value: string | number | readonly string[]): this {
    const values = typeof value === 'string' || typeof value === 'number' ? [String(value)] : [...value];
    this.headers.set(name.toLowerCase(), values);
    return this;
  }

  writeHead(statusCode: number): this {
    if (this.statusCode !== undefined) {
      throw new Error('writeHead called twice');
    }
    this.statusCode = statusCode;
    this.headersAtWriteHead = this.allHeaders();
    return this;
  }

  end(chunk?: string | Buffer): this {
    if (chunk !== undefined) {
      this.body += chunk.toString();
    }
    this.ended = true;
    return this;
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name.toLowerCase())?.[0];
  }

  getHeaderValues(name: string): string[] {
    return this.headers.get(name.toLowerCase()) ?? [];
  }

  hasHeader(name: string): boolean {
    return this.headers.has(name.toLowerCase());
  }

  private allHeaders(): Record<string, string[]> {
    return Object.fromEntries(this.headers);
  }
}

/**
 * IncomingMessage over an unconnected socket, with only the URL set.
 */
export function mockRequest(url: string): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.method = 'GET';
  req.url = url;
  return req;
}

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LoggerLike;
}

export function mockServices(): AuthorizeServices {
  return {
    tokenFactory: {
      createAuthorizationCode: vi.fn(async () => 'test-code'),
      createAccessToken: vi.fn(async () => 'test-access-token'),
    },
    tokenStorage: {
      saveAuthorizationCode: vi.fn(async () => undefined),
      saveAccessToken: vi.fn(async () => undefined),
    },
  };
}

export function mockContext(overrides: Partial<AuthorizeContext> = {}): AuthorizeContext {
  return {
    services: mockServices(),
    logger: mockLogger(),
    requestId: 'test-request-id',
    ...overrides,
  };
}
