// HTTP framing over a TCP socket.

import net from "node:net";
import {
  HttpError,
  defaultParseLimits,
  encodeResponse,
  parseRequest,
  type HttpRequest,
  type HttpResponse,
  type ParseLimits,
  type ParsedRequest,
} from "@strand/http-wire";
import { ConnectionError, describeError, type HttpTransport } from "@strand/core";

/** Options for {@link TcpStream}. */
export interface TcpStreamOptions {
  limits: ParseLimits;
  /** How long a half-closed socket may wait for the peer's FIN before it is destroyed. */
  shutdownGraceMs: number;
}

export function defaultTcpStreamOptions(): TcpStreamOptions {
  return {
    limits: defaultParseLimits(),
    shutdownGraceMs: 5_000,
  };
}

/**
 * A connected socket exchanging HTTP/1.x messages.
 *
 * Incoming bytes collect in a read buffer that survives across requests:
 * whatever follows one request stays buffered for the next `readRequest`.
 * The socket is only resumed while a read is in progress, so a client
 * sending ahead is held back by TCP flow control.
 *
 * Implements the HttpTransport interface for use with Session.
 */
export class TcpStream implements HttpTransport {
  readonly peer: string;

  private socket: net.Socket;
  private options: TcpStreamOptions;
  private buf: Buffer = Buffer.alloc(0);
  private waitingResolve: (() => void) | null = null;
  private ended = false;
  private error: Error | null = null;
  private reading = false;
  private writing = false;
  private closing = false;
  private timeoutMs = 0;
  private deadline = 0;
  private graceTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(socket: net.Socket, options?: Partial<TcpStreamOptions>) {
    this.socket = socket;
    this.options = { ...defaultTcpStreamOptions(), ...options };
    this.peer = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;

    socket.on("data", (chunk: Buffer) => {
      if (this.closing) return;
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.wake();
    });

    socket.on("end", () => {
      this.ended = true;
      this.wake();
    });

    socket.on("error", (err: Error) => {
      this.error = err;
      this.wake();
    });

    socket.on("close", () => {
      this.ended = true;
      if (this.graceTimer !== null) {
        clearTimeout(this.graceTimer);
        this.graceTimer = null;
      }
      this.wake();
    });
  }

  /** Get the underlying socket. */
  getSocket(): net.Socket {
    return this.socket;
  }

  /** Bytes received but not yet consumed by a request. */
  get buffered(): number {
    return this.buf.length;
  }

  resetTimeout(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
    this.deadline = timeoutMs > 0 ? Date.now() + timeoutMs : 0;
  }

  async readRequest(): Promise<HttpRequest | null> {
    if (this.reading) {
      throw new Error("concurrent reads are not allowed");
    }
    this.reading = true;

    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | null = null;
    if (this.deadline > 0) {
      timer = setTimeout(
        () => {
          timedOut = true;
          this.wake();
        },
        Math.max(0, this.deadline - Date.now()),
      );
    }

    try {
      while (true) {
        const request = this.cutRequest();
        if (request) {
          this.socket.pause();
          return request;
        }
        if (this.error) {
          throw ConnectionError.io(this.error.message, this.error);
        }
        if (this.ended || this.closing) {
          if (this.buf.length === 0) return null;
          throw ConnectionError.io("unexpected end of stream");
        }
        if (timedOut) {
          throw ConnectionError.timeout(`no request within ${this.timeoutMs}ms`);
        }

        const wait = new Promise<void>((resolve) => {
          this.waitingResolve = resolve;
        });
        this.socket.resume();
        await wait;
      }
    } finally {
      if (timer !== null) clearTimeout(timer);
      this.reading = false;
    }
  }

  // Parse one request off the front of the read buffer.
  private cutRequest(): HttpRequest | null {
    let parsed: ParsedRequest | null;
    try {
      parsed = parseRequest(this.buf, this.options.limits);
    } catch (e) {
      if (e instanceof HttpError) {
        throw ConnectionError.protocol(`${e.status} ${e.message}`, e);
      }
      throw e;
    }
    if (!parsed) return null;
    this.buf = this.buf.subarray(parsed.consumed);
    return parsed.request;
  }

  writeResponse(response: HttpResponse): Promise<void> {
    if (this.writing) {
      return Promise.reject(new Error("concurrent writes are not allowed"));
    }

    let bytes: Buffer;
    try {
      bytes = encodeResponse(response);
    } catch (e) {
      return Promise.reject(ConnectionError.protocol(describeError(e), e));
    }

    const error = this.error;
    if (error) {
      return Promise.reject(ConnectionError.io(error.message, error));
    }
    if (this.socket.destroyed || this.closing) {
      return Promise.reject(ConnectionError.closed());
    }

    this.writing = true;
    return new Promise<void>((resolve, reject) => {
      this.socket.write(bytes, (err) => {
        this.writing = false;
        if (err) reject(ConnectionError.io(err.message, err));
        else resolve();
      });
    });
  }

  shutdown(): void {
    if (this.closing) return;
    this.closing = true;
    this.buf = Buffer.alloc(0);
    this.wake();

    if (this.socket.destroyed) return;
    // Once both directions have ended and the last write has flushed, the
    // socket closes itself.
    this.socket.end();
    if (this.ended && !this.writing) return;
    // Keep draining so the peer's FIN is seen.
    if (!this.ended) this.socket.resume();
    this.graceTimer = setTimeout(() => {
      this.graceTimer = null;
      this.socket.destroy();
    }, this.options.shutdownGraceMs);
    this.graceTimer.unref();
  }

  private wake(): void {
    const resolve = this.waitingResolve;
    if (resolve) {
      this.waitingResolve = null;
      resolve();
    }
  }
}
