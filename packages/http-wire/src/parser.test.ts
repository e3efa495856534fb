import { describe, expect, it } from "vitest";
import { HttpError } from "./http_error.ts";
import { parseRequest, type ParseLimits } from "./parser.ts";

function raw(text: string): Buffer {
  return Buffer.from(text, "latin1");
}

function expectHttpError(fn: () => unknown, status: number, message: string): void {
  try {
    fn();
  } catch (e) {
    expect(e).toBeInstanceOf(HttpError);
    if (e instanceof HttpError) {
      expect(e.status).toBe(status);
      expect(e.message).toBe(message);
    }
    return;
  }
  throw new Error("expected HttpError");
}

describe("parseRequest", () => {
  it("parses a request without a body", () => {
    const input = raw("GET /abc HTTP/1.1\r\nHost: localhost\r\nAccept: */*\r\n\r\n");
    const parsed = parseRequest(input);

    expect(parsed).not.toBeNull();
    expect(parsed?.consumed).toBe(input.length);
    expect(parsed?.request.method).toBe("GET");
    expect(parsed?.request.target).toBe("/abc");
    expect(parsed?.request.version).toEqual({ major: 1, minor: 1 });
    expect([...(parsed?.request.fields ?? [])]).toEqual([
      { name: "Host", value: "localhost" },
      { name: "Accept", value: "*/*" },
    ]);
    expect(parsed?.request.body.length).toBe(0);
  });

  it("returns null while the header section is incomplete", () => {
    expect(parseRequest(raw("GET / HTTP/1.1\r\nHost: a\r\n"))).toBeNull();
    expect(parseRequest(raw(""))).toBeNull();
  });

  it("reads a Content-Length body and leaves the next request untouched", () => {
    const first = "POST /echo HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello";
    const second = "GET /next HTTP/1.1\r\n\r\n";
    const parsed = parseRequest(raw(first + second));

    expect(parsed?.request.body.toString()).toBe("hello");
    expect(parsed?.consumed).toBe(first.length);
  });

  it("waits for the rest of a Content-Length body", () => {
    expect(parseRequest(raw("POST / HTTP/1.1\r\nContent-Length: 5\r\n\r\nhel"))).toBeNull();
  });

  it("decodes a chunked body and skips trailers", () => {
    const input = raw(
      "POST /up HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n" +
        "5;ext=1\r\nhello\r\n" +
        "6\r\n world\r\n" +
        "0\r\nX-Checksum: abc\r\n\r\n",
    );
    const parsed = parseRequest(input);

    expect(parsed?.request.body.toString()).toBe("hello world");
    expect(parsed?.consumed).toBe(input.length);
  });

  it("returns null for a partial chunked body", () => {
    expect(parseRequest(raw("POST / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n5\r\nhel"))).toBeNull();
    expect(parseRequest(raw("POST / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n0\r\n"))).toBeNull();
  });

  it("skips empty lines before the request line", () => {
    const input = raw("\r\n\r\nGET / HTTP/1.0\r\n\r\n");
    const parsed = parseRequest(input);
    expect(parsed?.request.version).toEqual({ major: 1, minor: 0 });
    expect(parsed?.consumed).toBe(input.length);
  });

  it("trims optional whitespace around field values", () => {
    const parsed = parseRequest(raw("GET / HTTP/1.1\r\nX-Pad: \t value \t\r\n\r\n"));
    expect(parsed?.request.fields.get("x-pad")).toBe("value");
  });

  it("rejects a malformed request line", () => {
    expectHttpError(() => parseRequest(raw("GET /\r\n\r\n")), 400, "bad request line");
    expectHttpError(() => parseRequest(raw("G(T / HTTP/1.1\r\n\r\n")), 400, "bad method");
    expectHttpError(() => parseRequest(raw("GET / HTTX/1.1\r\n\r\n")), 400, "bad version");
    expectHttpError(() => parseRequest(raw("GET / HTTP/2.0\r\n\r\n")), 505, "unsupported version");
  });

  it("rejects malformed header lines", () => {
    expectHttpError(() => parseRequest(raw("GET / HTTP/1.1\r\nNoColon\r\n\r\n")), 400, "bad header field");
    expectHttpError(() => parseRequest(raw("GET / HTTP/1.1\r\nBad Name: x\r\n\r\n")), 400, "bad header name");
    expectHttpError(
      () => parseRequest(raw("GET / HTTP/1.1\r\nA: 1\r\n folded\r\n\r\n")),
      400,
      "obsolete line folding",
    );
  });

  it("rejects conflicting or invalid lengths", () => {
    expectHttpError(
      () => parseRequest(raw("POST / HTTP/1.1\r\nContent-Length: 3\r\nTransfer-Encoding: chunked\r\n\r\n")),
      400,
      "both Content-Length and Transfer-Encoding",
    );
    expectHttpError(
      () => parseRequest(raw("POST / HTTP/1.1\r\nContent-Length: 3\r\nContent-Length: 4\r\n\r\n")),
      400,
      "bad Content-Length",
    );
    expectHttpError(() => parseRequest(raw("POST / HTTP/1.1\r\nContent-Length: -1\r\n\r\n")), 400, "bad Content-Length");
    expectHttpError(
      () => parseRequest(raw("POST / HTTP/1.1\r\nTransfer-Encoding: gzip\r\n\r\n")),
      400,
      "request body not chunked",
    );
  });

  it("accepts repeated identical Content-Length values", () => {
    const parsed = parseRequest(raw("POST / HTTP/1.1\r\nContent-Length: 2, 2\r\n\r\nok"));
    expect(parsed?.request.body.toString()).toBe("ok");
  });

  it("rejects bad chunk framing", () => {
    expectHttpError(
      () => parseRequest(raw("POST / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\nzz\r\n")),
      400,
      "bad chunk size",
    );
    expectHttpError(
      () => parseRequest(raw("POST / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n2\r\nabXY")),
      400,
      "missing CRLF after chunk data",
    );
  });

  describe("limits", () => {
    const limits: ParseLimits = { maxHeaderSize: 64, maxBodySize: 4 };

    it("rejects an oversized header section even before it is complete", () => {
      const input = raw(`GET / HTTP/1.1\r\nX-Long: ${"a".repeat(80)}`);
      expectHttpError(() => parseRequest(input, limits), 413, "header too large");
    });

    it("counts leading empty lines toward the header limit", () => {
      expectHttpError(() => parseRequest(raw("\r\n".repeat(40)), limits), 413, "header too large");
      expectHttpError(
        () => parseRequest(raw(`${"\r\n".repeat(20)}GET / HTTP/1.1\r\nHost: x\r\n\r\n`), limits),
        413,
        "header too large",
      );
    });

    it("rejects an oversized declared body", () => {
      expectHttpError(
        () => parseRequest(raw("POST / HTTP/1.1\r\nContent-Length: 5\r\n\r\n"), limits),
        413,
        "body too large",
      );
    });

    it("rejects an oversized chunked body", () => {
      expectHttpError(
        () => parseRequest(raw("POST / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n3\r\nabc\r\n2\r\n"), limits),
        413,
        "body too large",
      );
    });

    it("bounds the wire size of a chunked body padded with extensions", () => {
      const head = "POST / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n";
      const chunk = `1;e=${"x".repeat(40)}\r\na\r\n`;
      expectHttpError(() => parseRequest(raw(head + chunk.repeat(3)), limits), 413, "chunked body too large");
      expectHttpError(
        () => parseRequest(raw(`${head}1;e=${"x".repeat(80)}`), limits),
        413,
        "chunked body too large",
      );
    });
  });
});
