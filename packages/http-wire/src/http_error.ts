// Framing errors raised while parsing an HTTP request.

import { reasonPhrase } from "./status.ts";

/**
 * A request could not be framed or parsed.
 *
 * `status` is the code a server would answer with if it chose to respond;
 * the session closes the connection instead, since the stream position is unknown.
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }

  static badRequest(message: string): HttpError {
    return new HttpError(400, message);
  }

  static tooLarge(message: string): HttpError {
    return new HttpError(413, message);
  }

  static notImplemented(message: string): HttpError {
    return new HttpError(501, message);
  }

  /** Standard reason phrase for `status`. */
  get reason(): string {
    return reasonPhrase(this.status);
  }
}
