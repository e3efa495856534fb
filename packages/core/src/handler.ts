// Request handler binding.

import type { HttpRequest, HttpResponse } from "@strand/http-wire";

/**
 * Callback a handler uses to hand back its response.
 *
 * Call it exactly once, either before the handler returns or later from any
 * callback (a timer, another promise chain). Later calls are ignored.
 */
export type ResponseSink = (response: HttpResponse) => void;

/**
 * Application logic bound to every session of a listener.
 *
 * The handler owns `request` once called. Domain failures should be turned
 * into an error response; a throw or rejection closes the connection without one.
 */
export type RequestHandler = (request: HttpRequest, respond: ResponseSink) => void | Promise<void>;

/** A handler that returns its response instead of calling a sink. */
export type SyncRequestHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * Adapt a returning handler to the sink-based contract.
 *
 * @example
 * ```typescript
 * await serveHttp(fromSync(() => createResponse(204)), { port: 8080 });
 * ```
 */
export function fromSync(handler: SyncRequestHandler): RequestHandler {
  return async (request, respond) => {
    respond(await handler(request));
  };
}
