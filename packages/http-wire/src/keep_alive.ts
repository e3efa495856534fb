// Connection persistence rules for HTTP/1.0 and HTTP/1.1.

import type { Fields } from "./fields.ts";
import { statusAllowsBody } from "./status.ts";
import { HTTP_1_1, versionAtLeast, type HttpResponse, type HttpVersion } from "./types.ts";

interface Message {
  version: HttpVersion;
  fields: Fields;
}

/**
 * Whether the message asks for the connection to stay open.
 *
 * HTTP/1.1 is persistent unless `Connection: close`; HTTP/1.0 only with
 * `Connection: keep-alive`.
 */
export function keepAlive(message: Message): boolean {
  const tokens = message.fields.tokens("Connection");
  if (versionAtLeast(message.version, HTTP_1_1)) {
    return !tokens.includes("close");
  }
  return tokens.includes("keep-alive");
}

/**
 * Adjust the `Connection` header so that {@link keepAlive} returns `flag`.
 *
 * Other connection tokens (e.g. `upgrade`) are left in place.
 */
export function setKeepAlive(message: Message, flag: boolean): void {
  const others = message.fields.tokens("Connection").filter((t) => t !== "close" && t !== "keep-alive");
  const modern = versionAtLeast(message.version, HTTP_1_1);
  if (!modern && flag) others.push("keep-alive");
  if (modern && !flag) others.push("close");

  if (others.length === 0) {
    message.fields.delete("Connection");
  } else {
    message.fields.set("Connection", others.join(", "));
  }
}

/** Whether the response body is delimited by `Transfer-Encoding: chunked`. */
export function isChunked(fields: Fields): boolean {
  const codings = fields.tokens("Transfer-Encoding");
  return codings.length > 0 && codings[codings.length - 1] === "chunked";
}

/**
 * Whether the server must close the connection after writing `response`.
 *
 * True when the response is not keep-alive, or when the peer could only find
 * the end of the body by end-of-stream.
 */
export function needEof(response: HttpResponse): boolean {
  if (!keepAlive(response)) return true;
  if (!statusAllowsBody(response.status)) return false;
  return !response.fields.has("Content-Length") && !isChunked(response.fields);
}
