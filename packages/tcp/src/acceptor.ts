// Promise-based accept over a listening `net.Server`.

import net from "node:net";
import { ConnectionError, type HttpTransport } from "@strand/core";
import { TcpStream, type TcpStreamOptions } from "./stream.ts";

/**
 * Source of accepted connections for a Listener.
 *
 * `accept` is called with at most one call outstanding. After `close`, pending
 * and later calls reject with a ConnectionError of kind `closed`.
 */
export interface Acceptor<T extends HttpTransport = HttpTransport> {
  accept(): Promise<T>;
  close(): Promise<void>;
}

/** Where and how to listen. */
export interface ListenOptions {
  host: string;
  port: number;
  /** Pending-connection queue length; Node's maximum when unset. */
  backlog?: number;
}

/**
 * Accepts TCP connections and wraps each in a TcpStream.
 *
 * Connections that arrive while nobody is accepting are queued, as are errors
 * the server emits after it started listening.
 */
export class TcpAcceptor implements Acceptor<TcpStream> {
  private server: net.Server;
  private streamOptions: Partial<TcpStreamOptions>;
  private streams: TcpStream[] = [];
  private errors: Error[] = [];
  private accepter: { resolve: (stream: TcpStream) => void; reject: (reason: Error) => void } | null = null;
  private closed = false;

  private constructor(server: net.Server, streamOptions: Partial<TcpStreamOptions>) {
    this.server = server;
    this.streamOptions = streamOptions;

    server.on("connection", (socket: net.Socket) => {
      const stream = new TcpStream(socket, this.streamOptions);
      const accepter = this.accepter;
      if (accepter) {
        this.accepter = null;
        accepter.resolve(stream);
      } else {
        this.streams.push(stream);
      }
    });

    server.on("error", (err: Error) => {
      const accepter = this.accepter;
      if (accepter) {
        this.accepter = null;
        accepter.reject(ConnectionError.io(err.message, err));
      } else {
        this.errors.push(err);
      }
    });
  }

  /**
   * Bind and start listening.
   *
   * Sockets start paused; a TcpStream resumes them while reading. Half-open
   * connections stay writable so a response can follow a client's FIN.
   */
  static listen(options: ListenOptions, streamOptions: Partial<TcpStreamOptions> = {}): Promise<TcpAcceptor> {
    const server = net.createServer({ pauseOnConnect: true, allowHalfOpen: true });
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      server.once("error", onError);
      server.listen({ host: options.host, port: options.port, backlog: options.backlog }, () => {
        server.off("error", onError);
        resolve(new TcpAcceptor(server, streamOptions));
      });
    });
  }

  /** The bound address, including the port chosen when listening on port 0. */
  address(): net.AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not listening on a TCP address");
    }
    return address;
  }

  accept(): Promise<TcpStream> {
    if (this.accepter) {
      return Promise.reject(new Error("concurrent accepts are not allowed"));
    }
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(ConnectionError.closed());
        return;
      }
      const err = this.errors.shift();
      if (err) {
        reject(ConnectionError.io(err.message, err));
        return;
      }
      const stream = this.streams.shift();
      if (stream) {
        resolve(stream);
        return;
      }
      this.accepter = { resolve, reject };
    });
  }

  /**
   * Stop listening. Connections already accepted are left alone; queued ones
   * are dropped.
   */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;

    for (const stream of this.streams) stream.getSocket().destroy();
    this.streams = [];
    const accepter = this.accepter;
    if (accepter) {
      this.accepter = null;
      accepter.reject(ConnectionError.closed());
    }

    // The listening handle closes now; `net.Server` reports "close" only after
    // every accepted socket is gone, which is the Listener's business.
    this.server.close();
    return Promise.resolve();
  }
}
