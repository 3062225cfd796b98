// src/core/response/Responder.ts

import type { CachedResponse } from './CachedResponse';
import type { RedirectResponse } from './RedirectResponse';
import type { ResponseWriter } from './types';

/**
 * A response produced by a handler and written once by the encoder.
 *
 * On failure a Responder either writes nothing and throws a ResponderError,
 * or handles the output itself before throwing anything else.
 */
export type Responder = CachedResponse | RedirectResponse;

export type ResponderKind = Responder['kind'];

export function renderResponder(writer: ResponseWriter, responder: Responder): void {
  switch (responder.kind) {
    case 'cached':
      responder.respondTo(writer);
      return;
    case 'redirect':
      responder.respondTo(writer);
      return;
    default: {
      const unreachable: never = responder;
      throw new Error(`Unknown responder: ${JSON.stringify(unreachable)}`);
    }
  }
}
