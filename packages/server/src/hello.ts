// The hello application: greets the path of GET and HEAD requests.

import { Status, keepAlive, type HttpRequest, type HttpResponse } from "@strand/http-wire";
import { createLogger, fromSync, type RequestHandler } from "@strand/core";
import { makeStringResponse } from "./responses.ts";

const log = createLogger("strand:request");

/** Methods the hello application answers. */
export const ALLOWED_METHODS = "GET, HEAD";

function dumpRequest(request: HttpRequest): void {
  if (!log.enabled()) return;
  log.debug(`${request.method} ${request.target}`);
  for (const { name, value } of request.fields) {
    log.debug(`  ${name}: ${value}`);
  }
}

/**
 * `GET /abc` answers `Hello, abc`; `HEAD` answers the same headers with no
 * body; anything else gets 405 with `Allow: GET, HEAD`.
 */
export function greet(request: HttpRequest): HttpResponse {
  dumpRequest(request);
  const name = request.target.startsWith("/") ? request.target.slice(1) : request.target;
  // The target holds the raw request bytes as latin1; echo them unchanged.
  const greeting = Buffer.from(`Hello, ${name}`, "latin1");
  const persist = keepAlive(request);

  switch (request.method) {
    case "GET":
      return makeStringResponse(Status.OK, greeting, request.version, persist);
    case "HEAD": {
      // Content-Length still describes the GET body.
      const response = makeStringResponse(Status.OK, greeting, request.version, persist);
      return { ...response, body: Buffer.alloc(0) };
    }
    default: {
      const response = makeStringResponse(Status.METHOD_NOT_ALLOWED, "Invalid method.", request.version, persist);
      response.fields.append("Allow", ALLOWED_METHODS);
      return response;
    }
  }
}

/** {@link greet} bound as a request handler. */
export const hello: RequestHandler = fromSync(greet);
