// End-to-end tests: the hello application served over loopback TCP.

import net from "node:net";
import { once } from "node:events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { DiagnosticsSink } from "@strand/core";
import { main, type App } from "./main.ts";

const env = { HTTP_HOST: "127.0.0.1", HTTP_PORT: "0", HTTP_SHUTDOWN_GRACE_MS: "20" };

let app: App | null = null;
let reports: Array<{ what: string; error: unknown }> = [];
let logged: string[] = [];
const sink: DiagnosticsSink = {
  reportError: (what, error) => {
    reports.push({ what, error });
  },
};

beforeEach(async () => {
  reports = [];
  logged = [];
  vi.spyOn(console, "log").mockImplementation((line: string) => {
    logged.push(line);
  });
  app = await main(env, sink);
});

afterEach(async () => {
  await app?.stop();
  app = null;
  vi.restoreAllMocks();
});

async function dial(): Promise<net.Socket> {
  if (!app) throw new Error("not started");
  const client = net.connect(app.server.address.port, "127.0.0.1");
  await once(client, "connect");
  return client;
}

function collect(client: net.Socket): Promise<string> {
  const chunks: Buffer[] = [];
  client.on("data", (chunk: Buffer) => chunks.push(chunk));
  return once(client, "end").then(() => Buffer.concat(chunks).toString("latin1"));
}

describe("main", () => {
  it("announces that it is listening", () => {
    expect(logged).toEqual(["Server has started..."]);
    expect(app?.server.address.address).toBe("127.0.0.1");
  });

  it("serves GET, HEAD and rejected methods on one connection", async () => {
    const client = await dial();
    const received = collect(client);

    client.write(
      "GET /abc HTTP/1.1\r\nHost: localhost\r\n\r\n" +
        "HEAD /abc HTTP/1.1\r\nHost: localhost\r\n\r\n" +
        "PUT /abc HTTP/1.1\r\nHost: localhost\r\nContent-Length: 2\r\nConnection: close\r\n\r\nhi",
    );

    expect(await received).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/html\r\nContent-Length: 10\r\n\r\nHello, abc" +
        "HTTP/1.1 200 OK\r\nContent-Type: text/html\r\nContent-Length: 10\r\n\r\n" +
        "HTTP/1.1 405 Method Not Allowed\r\nContent-Type: text/html\r\nContent-Length: 15\r\n" +
        "Connection: close\r\nAllow: GET, HEAD\r\n\r\nInvalid method.",
    );
    expect(reports).toEqual([]);
  });

  it("greets a UTF-8 path byte for byte", async () => {
    const client = await dial();
    const received = collect(client);

    client.write(Buffer.from("GET /é HTTP/1.1\r\nConnection: close\r\n\r\n", "utf8"));

    const body = Buffer.from("Hello, é", "utf8").toString("latin1");
    expect(await received).toBe(
      `HTTP/1.1 200 OK\r\nContent-Type: text/html\r\nContent-Length: 9\r\nConnection: close\r\n\r\n${body}`,
    );
  });

  it("decodes a chunked request body before dispatch", async () => {
    const client = await dial();
    const received = collect(client);

    client.write(
      "POST /upload HTTP/1.1\r\nTransfer-Encoding: chunked\r\nConnection: close\r\n\r\n" +
        "3\r\nabc\r\n0\r\n\r\n",
    );

    expect(await received).toBe(
      "HTTP/1.1 405 Method Not Allowed\r\nContent-Type: text/html\r\nContent-Length: 15\r\n" +
        "Connection: close\r\nAllow: GET, HEAD\r\n\r\nInvalid method.",
    );
  });

  it("closes without a response when the header is too large", async () => {
    const client = await dial();
    const received = collect(client);

    client.write(`GET /abc HTTP/1.1\r\nX-Filler: ${"a".repeat(9 * 1024)}\r\n\r\n`);

    expect(await received).toBe("");
    expect(reports).toHaveLength(1);
    expect(reports[0].what).toBe("read");
    expect(reports[0].error).toMatchObject({ kind: "protocol", message: "413 header too large" });
  });

  it("closes idle keep-alive connections on stop", async () => {
    const client = await dial();
    const received = collect(client);
    client.write("GET /abc HTTP/1.1\r\n\r\n");
    await new Promise<void>((resolve) => {
      let text = "";
      const onData = (chunk: Buffer) => {
        text += chunk.toString("latin1");
        if (text.endsWith("Hello, abc")) {
          client.off("data", onData);
          resolve();
        }
      };
      client.on("data", onData);
    });

    await app?.stop();

    expect(app?.server.listener.sessionCount).toBe(0);
    expect(await received).toBe("HTTP/1.1 200 OK\r\nContent-Type: text/html\r\nContent-Length: 10\r\n\r\nHello, abc");
  });
});
