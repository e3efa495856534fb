// Per-connection session state machine.
//
// One Session drives one transport through
//   Idle → Reading → Dispatching → Writing → (Reading | Closed)
// Every transition happens in the completion callback of the operation issued
// by the previous state, so the read, dispatch and write of one connection never
// overlap, while sessions of different connections interleave on the event loop.

import { needEof, type HttpRequest, type HttpResponse } from "@strand/http-wire";
import { consoleDiagnostics, type DiagnosticsSink } from "./diagnostics.ts";
import { ConnectionError } from "./errors.ts";
import type { RequestHandler, ResponseSink } from "./handler.ts";
import { createLogger } from "./logging.ts";
import type { HttpTransport } from "./transport.ts";

const log = createLogger("strand:session");

export const SessionState = {
  Idle: "idle",
  Reading: "reading",
  Dispatching: "dispatching",
  Writing: "writing",
  Closed: "closed",
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

/** Allowed successor states. */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: [SessionState.Reading, SessionState.Closed],
  reading: [SessionState.Dispatching, SessionState.Closed],
  dispatching: [SessionState.Writing, SessionState.Closed],
  writing: [SessionState.Reading, SessionState.Closed],
  closed: [],
};

/** Session tuning. */
export interface SessionOptions {
  /** Time allowed for a complete request to arrive, rearmed every read cycle. */
  idleTimeoutMs: number;
  /**
   * Time allowed between dispatch and the handler's response.
   * Unset: the session waits for the handler indefinitely.
   */
  dispatchTimeoutMs?: number;
  diagnostics: DiagnosticsSink;
}

export function defaultSessionOptions(): SessionOptions {
  return {
    idleTimeoutMs: 30_000,
    diagnostics: consoleDiagnostics,
  };
}

let nextSessionId = 1;

/**
 * State machine for one accepted connection.
 *
 * Pending operations hold the session through their callbacks; `closed`
 * settles once the session is Closed and none of them remain.
 */
export class Session<T extends HttpTransport = HttpTransport> {
  readonly id: number = nextSessionId++;

  private _state: SessionState = SessionState.Idle;
  private request: HttpRequest | null = null;
  private outstanding = 0;
  private dispatchTimer: ReturnType<typeof setTimeout> | null = null;
  private released = false;
  private resolveClosed: () => void = () => {};
  private readonly options: SessionOptions;

  /** Settles when the session is closed and no operation is outstanding. */
  readonly closed: Promise<void>;

  constructor(
    private readonly transport: T,
    private readonly handler: RequestHandler,
    options?: Partial<SessionOptions>,
  ) {
    this.options = { ...defaultSessionOptions(), ...options };
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  /** Current state. */
  state(): SessionState {
    return this._state;
  }

  /** Get the underlying transport. */
  getTransport(): T {
    return this.transport;
  }

  /** Start the read loop. */
  run(): void {
    log.debug("run", { session: this.id, peer: this.transport.peer });
    this.read();
  }

  /** Close the connection from outside, e.g. on server shutdown. */
  abort(): void {
    this.close();
  }

  private read(): void {
    this.transition(SessionState.Reading);
    this.request = null;
    this.transport.resetTimeout(this.options.idleTimeoutMs);
    this.issue(
      "read",
      this.transport.readRequest(),
      (request) => this.onRead(request),
      (error) => this.onReadError(error),
    );
  }

  private onRead(request: HttpRequest | null): void {
    if (this._state === SessionState.Closed) return;
    if (request === null) {
      log.debug("end of stream", { session: this.id });
      this.close();
      return;
    }
    this.transition(SessionState.Dispatching);
    this.request = request;
    this.handleRequest();
  }

  private onReadError(error: unknown): void {
    if (this._state === SessionState.Closed) return;
    if (!(error instanceof ConnectionError && error.kind === "closed")) {
      this.options.diagnostics.reportError("read", error);
    }
    this.close();
  }

  /**
   * Hand the current request to the handler together with a sink that
   * schedules the write on this session.
   */
  private handleRequest(): void {
    const request = this.request;
    if (request === null) {
      throw new Error("handleRequest without a request");
    }
    // Ownership moves to the handler.
    this.request = null;

    let responded = false;
    const respond: ResponseSink = (response) => {
      if (responded) {
        this.options.diagnostics.reportError("respond", ConnectionError.handler("response already sent"));
        return;
      }
      responded = true;
      queueMicrotask(() => this.write(response));
    };

    this.armDispatchTimer();

    let result: void | Promise<void>;
    try {
      result = this.handler(request, respond);
    } catch (e) {
      this.onHandlerError(e, responded);
      return;
    }
    if (result instanceof Promise) {
      void result.then(undefined, (e: unknown) => this.onHandlerError(e, responded));
    }
  }

  private onHandlerError(error: unknown, responded: boolean): void {
    this.options.diagnostics.reportError("handle", error);
    // A response already handed over still gets written.
    if (!responded) this.close();
  }

  private write(response: HttpResponse): void {
    if (this._state === SessionState.Closed) {
      log.debug("response after close dropped", { session: this.id, status: response.status });
      return;
    }
    this.clearDispatchTimer();
    this.transition(SessionState.Writing);

    const close = needEof(response);
    this.issue(
      "write",
      this.transport.writeResponse(response),
      () => this.onWrite(close),
      (error) => {
        if (this._state === SessionState.Closed) return;
        this.options.diagnostics.reportError("write", error);
        this.close();
      },
    );
  }

  private onWrite(close: boolean): void {
    if (this._state === SessionState.Closed) return;
    if (close) {
      this.close();
    } else {
      this.read();
    }
  }

  private close(): void {
    if (this._state === SessionState.Closed) return;
    this.transition(SessionState.Closed);
    this.clearDispatchTimer();
    this.request = null;
    this.transport.shutdown();
    this.maybeRelease();
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`illegal session transition: ${this._state} -> ${next}`);
    }
    log.debug("state", { session: this.id, from: this._state, to: next });
    this._state = next;
  }

  /**
   * Issue an asynchronous operation on behalf of the session, counting it as
   * outstanding until its callback has run.
   */
  private issue<R>(
    what: string,
    op: Promise<R>,
    onDone: (value: R) => void,
    onError: (error: unknown) => void,
  ): void {
    this.outstanding++;
    void op.then(
      (value) => {
        this.outstanding--;
        onDone(value);
      },
      (error: unknown) => {
        this.outstanding--;
        onError(error);
      },
    )
      .catch((error: unknown) => {
        this.options.diagnostics.reportError(what, error);
        this.close();
      })
      .finally(() => this.maybeRelease());
  }

  private armDispatchTimer(): void {
    const timeoutMs = this.options.dispatchTimeoutMs;
    if (timeoutMs === undefined) return;
    this.dispatchTimer = setTimeout(() => {
      this.dispatchTimer = null;
      if (this._state !== SessionState.Dispatching) return;
      this.options.diagnostics.reportError(
        "dispatch",
        ConnectionError.timeout(`no response within ${timeoutMs}ms`),
      );
      this.close();
    }, timeoutMs);
  }

  private clearDispatchTimer(): void {
    if (this.dispatchTimer !== null) {
      clearTimeout(this.dispatchTimer);
      this.dispatchTimer = null;
    }
  }

  private maybeRelease(): void {
    if (this.released || this._state !== SessionState.Closed || this.outstanding > 0) return;
    this.released = true;
    log.debug("released", { session: this.id });
    this.resolveClosed();
  }
}
