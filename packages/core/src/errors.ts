// Connection-level errors.

/** Error during connection handling. */
export class ConnectionError extends Error {
  constructor(
    public kind: "io" | "timeout" | "protocol" | "closed" | "handler",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static timeout(message: string): ConnectionError {
    return new ConnectionError("timeout", message);
  }

  static protocol(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("protocol", message, { cause });
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }

  static handler(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("handler", message, { cause });
  }
}
