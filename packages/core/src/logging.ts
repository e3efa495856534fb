// Namespaced debug logging.
//
// Enabled through the DEBUG environment variable, with the pattern syntax of
// npm's debug package: `DEBUG=strand:*`, `DEBUG=*,-strand:request`.

export interface Logger {
  readonly namespace: string;

  /** Whether DEBUG currently enables this namespace. */
  enabled(): boolean;

  /**
   * Log a line with an optional structured payload.
   * Does nothing unless the namespace is enabled.
   */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Check if a namespace is enabled by a DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\?]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for `namespace`, e.g. `strand:session`.
 *
 * Lines go to stderr so they never mix with output a harness reads from stdout.
 *
 * @example
 * ```typescript
 * const log = createLogger("strand:session");
 * log.debug("state", { from: "reading", to: "dispatching" });
 * // DEBUG=strand:* prints: strand:session state { from: 'reading', to: 'dispatching' }
 * ```
 */
export function createLogger(namespace: string): Logger {
  return {
    namespace,
    enabled: () => isEnabled(namespace),
    debug(message, data) {
      if (!isEnabled(namespace)) return;
      if (data === undefined) {
        console.error(`${namespace} ${message}`);
      } else {
        console.error(`${namespace} ${message}`, data);
      }
    },
  };
}
