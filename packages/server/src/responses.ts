// Response builders for the bundled application.

import { createResponse, setKeepAlive, type HttpResponse, type HttpVersion } from "@strand/http-wire";

/** Content-Type values used by the application. */
export const ContentType = {
  TEXT_HTML: "text/html",
} as const;

/**
 * A response with a string body: `Content-Type`, `Content-Length` and the
 * `Connection` header that `keepAlive` implies for `version`.
 *
 * A string body is sent as UTF-8; a Buffer is sent as is.
 */
export function makeStringResponse(
  status: number,
  body: string | Buffer,
  version: HttpVersion,
  keepAlive: boolean,
  contentType: string = ContentType.TEXT_HTML,
): HttpResponse {
  const bytes = typeof body === "string" ? Buffer.from(body) : body;
  const response = createResponse(status, {
    version,
    fields: [
      ["Content-Type", contentType],
      ["Content-Length", String(bytes.length)],
    ],
    body: bytes,
  });
  setKeepAlive(response, keepAlive);
  return response;
}
