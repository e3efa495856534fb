// HTTP/1.x response serialization.

import { HttpError } from "./http_error.ts";
import { isChunked } from "./keep_alive.ts";
import { versionString, type HttpResponse } from "./types.ts";

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const CRLF = "\r\n";

/**
 * Serialize a response: status line, fields in their stored order, blank line
 * and body.
 *
 * Fields are written as they are; `Content-Length` is never synthesized.
 * With `Transfer-Encoding: chunked` the body is sent as one chunk plus the
 * terminating zero-size chunk.
 *
 * @throws HttpError (500) when a field name or value would break framing
 */
export function encodeResponse(response: HttpResponse): Buffer {
  if (/[\r\n]/.test(response.reason)) {
    throw new HttpError(500, "invalid reason phrase");
  }

  let head = `${versionString(response.version)} ${response.status} ${response.reason}${CRLF}`;
  for (const { name, value } of response.fields) {
    if (!TOKEN.test(name)) throw new HttpError(500, `invalid header name: ${JSON.stringify(name)}`);
    if (/[\r\n\0]/.test(value)) throw new HttpError(500, `invalid value for header ${name}`);
    head += `${name}: ${value}${CRLF}`;
  }
  head += CRLF;

  const headBytes = Buffer.from(head, "latin1");
  if (!isChunked(response.fields)) {
    return Buffer.concat([headBytes, response.body]);
  }
  return Buffer.concat([headBytes, encodeChunkedBody(response.body)]);
}

/** Encode `body` as a chunked payload (single chunk + last-chunk). */
export function encodeChunkedBody(body: Buffer): Buffer {
  const parts: Buffer[] = [];
  if (body.length > 0) {
    parts.push(Buffer.from(`${body.length.toString(16)}${CRLF}`, "latin1"), body, Buffer.from(CRLF, "latin1"));
  }
  parts.push(Buffer.from(`0${CRLF}${CRLF}`, "latin1"));
  return Buffer.concat(parts);
}
