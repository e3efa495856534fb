// Error reporting for transport-level failures.
//
// Failures never propagate out of a session or the accept loop; they are
// handed to a sink as an (operation, error) pair and the component carries on.

/** Receives failures the server recovers from locally. */
export interface DiagnosticsSink {
  /**
   * Report a failure of `what` (e.g. "read", "write", "accept").
   * Fire-and-forget: implementations must not throw.
   */
  reportError(what: string, error: unknown): void;
}

/** Message text for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Writes `what: message` lines to stderr. */
export const consoleDiagnostics: DiagnosticsSink = {
  reportError(what, error) {
    console.error(`${what}: ${describeError(error)}`);
  },
};
