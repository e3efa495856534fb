// @strand/core - transport-independent HTTP session machinery
//
// The Session state machine, the transport interface it drives, the handler
// binding, connection errors and the diagnostics/logging used across packages.

export { type HttpTransport } from "./transport.ts";
export { ConnectionError } from "./errors.ts";
export { consoleDiagnostics, describeError, type DiagnosticsSink } from "./diagnostics.ts";
export { createLogger, isEnabled, type Logger } from "./logging.ts";
export {
  fromSync,
  type RequestHandler,
  type ResponseSink,
  type SyncRequestHandler,
} from "./handler.ts";
export {
  Session,
  SessionState,
  defaultSessionOptions,
  type SessionOptions,
} from "./session.ts";
