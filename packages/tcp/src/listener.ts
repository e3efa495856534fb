// Accept loop: one Session per accepted connection.

import {
  ConnectionError,
  Session,
  createLogger,
  defaultSessionOptions,
  type HttpTransport,
  type RequestHandler,
  type SessionOptions,
} from "@strand/core";
import type { Acceptor } from "./acceptor.ts";

const log = createLogger("strand:listener");

/**
 * Accepts connections and starts a Session on each.
 *
 * A failed accept is reported as `accept` and the loop carries on; only
 * closing the acceptor ends it. Sessions run independently of the loop and of
 * each other.
 */
export class Listener<T extends HttpTransport = HttpTransport> {
  private readonly options: SessionOptions;
  private readonly sessions = new Set<Session<T>>();
  private closing = false;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly acceptor: Acceptor<T>,
    private readonly handler: RequestHandler,
    options?: Partial<SessionOptions>,
  ) {
    this.options = { ...defaultSessionOptions(), ...options };
  }

  /** Start accepting. Settles when the accept loop has stopped. */
  run(): Promise<void> {
    if (this.loop === null) {
      this.loop = this.acceptLoop();
    }
    return this.loop;
  }

  /** Number of sessions not yet released. */
  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Stop accepting new connections. Running sessions are left alone. */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    log.debug("closing", { sessions: this.sessions.size });
    await this.acceptor.close();
    if (this.loop !== null) await this.loop;
  }

  /** Settles once every session has been released. */
  async drain(): Promise<void> {
    while (this.sessions.size > 0) {
      await Promise.all([...this.sessions].map((s) => s.closed));
    }
  }

  /** Close every running session. */
  abortAll(): void {
    for (const session of this.sessions) session.abort();
  }

  private async acceptLoop(): Promise<void> {
    log.debug("accepting");
    while (!this.closing) {
      let transport: T;
      try {
        transport = await this.acceptor.accept();
      } catch (e) {
        if (this.closing || (e instanceof ConnectionError && e.kind === "closed")) break;
        this.options.diagnostics.reportError("accept", e);
        continue;
      }
      if (this.closing) {
        transport.shutdown();
        break;
      }
      this.onAccept(transport);
    }
    log.debug("stopped accepting");
  }

  private onAccept(transport: T): void {
    const session = new Session(transport, this.handler, this.options);
    this.sessions.add(session);
    log.debug("accepted", { session: session.id, peer: transport.peer, sessions: this.sessions.size });
    void session.closed.then(() => {
      this.sessions.delete(session);
    });
    session.run();
  }
}
