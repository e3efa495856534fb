// Bind, listen and serve a handler over TCP.

import type net from "node:net";
import { consoleDiagnostics, createLogger, type DiagnosticsSink, type RequestHandler } from "@strand/core";
import { TcpAcceptor } from "./acceptor.ts";
import { Listener } from "./listener.ts";
import type { TcpStream } from "./stream.ts";

const log = createLogger("strand:listener");

/** Server configuration. */
export interface ServerConfig {
  host: string;
  port: number;
  /** Pending-connection queue length; Node's default when unset. */
  backlog?: number;
  /** Time allowed for a complete request to arrive. */
  idleTimeoutMs: number;
  /** Time allowed for a handler to respond; unbounded when unset. */
  dispatchTimeoutMs?: number;
  maxHeaderSize: number;
  maxBodySize: number;
  /** How long a closing connection waits for the client's FIN. */
  shutdownGraceMs: number;
}

/** Default server configuration. */
export function defaultServerConfig(): ServerConfig {
  return {
    host: "0.0.0.0",
    port: 8080,
    idleTimeoutMs: 30_000,
    maxHeaderSize: 8 * 1024,
    maxBodySize: 1024 * 1024,
    shutdownGraceMs: 5_000,
  };
}

/** A running server. */
export interface RunningServer {
  listener: Listener<TcpStream>;
  acceptor: TcpAcceptor;
  address: net.AddressInfo;
  /** Settles when the accept loop stops. */
  done: Promise<void>;
}

/**
 * Listen on the configured address and serve `handler` on every connection.
 *
 * Fails when the address cannot be bound. Once listening, errors on individual
 * accepts and connections go to `diagnostics`.
 */
export async function serveHttp(
  handler: RequestHandler,
  config: Partial<ServerConfig> = {},
  diagnostics: DiagnosticsSink = consoleDiagnostics,
): Promise<RunningServer> {
  const cfg = { ...defaultServerConfig(), ...config };

  const acceptor = await TcpAcceptor.listen(
    { host: cfg.host, port: cfg.port, backlog: cfg.backlog },
    {
      limits: { maxHeaderSize: cfg.maxHeaderSize, maxBodySize: cfg.maxBodySize },
      shutdownGraceMs: cfg.shutdownGraceMs,
    },
  );
  const listener = new Listener(acceptor, handler, {
    idleTimeoutMs: cfg.idleTimeoutMs,
    dispatchTimeoutMs: cfg.dispatchTimeoutMs,
    diagnostics,
  });
  const address = acceptor.address();
  log.debug("listening", { address: address.address, port: address.port });

  const done = listener.run();
  return { listener, acceptor, address, done };
}
