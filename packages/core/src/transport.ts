/**
 * HTTP transport abstraction.
 *
 * This module defines the HttpTransport interface that a Session drives.
 * The transport owns the socket and the read buffer; it frames bytes into
 * requests and serializes responses.
 *
 * Implementations:
 * - TcpStream (@strand/tcp) over a `node:net` socket
 * - in-memory fakes in tests
 */

import type { HttpRequest, HttpResponse } from "@strand/http-wire";

/**
 * Interface for a connected stream that exchanges HTTP messages.
 *
 * At most one `readRequest` and one `writeResponse` may be outstanding at a time.
 */
export interface HttpTransport {
  /**
   * Read exactly one request, waiting for more bytes as needed.
   *
   * Resolves `null` when the peer closed the stream cleanly between requests.
   * Rejects with a ConnectionError of kind:
   * - `timeout` when the idle timer fires first
   * - `protocol` when the bytes cannot be framed as a request
   * - `io` for socket errors and end-of-stream inside a request
   */
  readRequest(): Promise<HttpRequest | null>;

  /**
   * Serialize and send a response. Resolves once the bytes are flushed.
   */
  writeResponse(response: HttpResponse): Promise<void>;

  /**
   * Rearm the idle timer for the next read.
   */
  resetTimeout(timeoutMs: number): void;

  /**
   * Half-close: stop sending. Never throws.
   */
  shutdown(): void;

  /**
   * Human-readable peer identity for diagnostics.
   */
  readonly peer: string;
}
