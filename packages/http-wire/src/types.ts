// HTTP/1.x message types.

import { Fields } from "./fields.ts";
import { reasonPhrase } from "./status.ts";

/** Protocol version from the start line. */
export interface HttpVersion {
  major: number;
  minor: number;
}

export const HTTP_1_0: HttpVersion = Object.freeze({ major: 1, minor: 0 });
export const HTTP_1_1: HttpVersion = Object.freeze({ major: 1, minor: 1 });

/** `HTTP/1.1` style rendering. */
export function versionString(version: HttpVersion): string {
  return `HTTP/${version.major}.${version.minor}`;
}

/** Version comparison, `true` when `a` is at least `b`. */
export function versionAtLeast(a: HttpVersion, b: HttpVersion): boolean {
  return a.major > b.major || (a.major === b.major && a.minor >= b.minor);
}

/**
 * A fully read request: start line, header fields and decoded body.
 *
 * The body is always complete; chunked bodies are already reassembled.
 */
export interface HttpRequest {
  /** Method token as received, e.g. `GET`. */
  method: string;
  /** Request target as received, e.g. `/abc?x=1`. */
  target: string;
  version: HttpVersion;
  fields: Fields;
  body: Buffer;
}

/** A response ready to be serialized. */
export interface HttpResponse {
  status: number;
  reason: string;
  version: HttpVersion;
  fields: Fields;
  body: Buffer;
}

/** Options for {@link createResponse}. */
export interface ResponseInit {
  version?: HttpVersion;
  reason?: string;
  fields?: Iterable<readonly [string, string]>;
  body?: string | Buffer;
}

/**
 * Build a response value. Nothing is added implicitly: callers set
 * `Content-Length` (or use the builders in the application layer).
 */
export function createResponse(status: number, init: ResponseInit = {}): HttpResponse {
  const body = init.body === undefined ? Buffer.alloc(0) : Buffer.from(init.body);
  return {
    status,
    reason: init.reason ?? reasonPhrase(status),
    version: init.version ?? HTTP_1_1,
    fields: new Fields(init.fields),
    body,
  };
}
