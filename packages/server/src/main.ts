// Process entry point: serve the hello application until SIGINT or SIGTERM.

import { pathToFileURL } from "node:url";
import { consoleDiagnostics, createLogger, describeError, type DiagnosticsSink } from "@strand/core";
import { serveHttp, type RunningServer } from "@strand/tcp";
import { loadConfig } from "./config.ts";
import { hello } from "./hello.ts";

const log = createLogger("strand:listener");

/** A started server and the way to stop it. */
export interface App {
  server: RunningServer;
  /**
   * Stop accepting, give running sessions the shutdown grace period to
   * finish, then close whatever is left.
   */
  stop(): Promise<void>;
}

export async function main(
  env: Record<string, string | undefined> = process.env,
  diagnostics: DiagnosticsSink = consoleDiagnostics,
): Promise<App> {
  const config = loadConfig(env);
  const server = await serveHttp(hello, config, diagnostics);
  console.log("Server has started...");

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      await server.listener.close();
      log.debug("draining", { sessions: server.listener.sessionCount });
      let grace: ReturnType<typeof setTimeout> | undefined;
      await Promise.race([
        server.listener.drain(),
        new Promise<void>((resolve) => {
          grace = setTimeout(resolve, config.shutdownGraceMs);
        }),
      ]);
      clearTimeout(grace);
      server.listener.abortAll();
      await server.listener.drain();
    })();
    return stopping;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    log.debug("signal", { signal });
    stop().catch((e: unknown) => {
      diagnostics.reportError("shutdown", e);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return { server, stop };
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((e: unknown) => {
    console.error(`startup: ${describeError(e)}`);
    process.exitCode = 1;
  });
}
