// Incremental HTTP/1.x request parser.
//
// The parser is sans-IO: it looks at whatever bytes the transport has buffered
// and either returns one complete request together with the number of bytes it
// used, or `null` when more input is needed. Bytes past `consumed` belong to the
// next request and stay in the caller's buffer.

import { Fields } from "./fields.ts";
import { HttpError } from "./http_error.ts";
import type { HttpRequest, HttpVersion } from "./types.ts";

/** Size limits applied while parsing. */
export interface ParseLimits {
  /** Max bytes of request line plus header section, including the blank line. */
  maxHeaderSize: number;
  /** Max decoded body size. */
  maxBodySize: number;
}

export function defaultParseLimits(): ParseLimits {
  return {
    maxHeaderSize: 8 * 1024,
    maxBodySize: 1024 * 1024,
  };
}

/** A parsed request and how many input bytes it occupied. */
export interface ParsedRequest {
  request: HttpRequest;
  consumed: number;
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const VERSION = /^HTTP\/(\d)\.(\d)$/;
const DIGITS = /^\d+$/;
const HEX = /^[0-9A-Fa-f]+$/;
const CR = 0x0d;
const LF = 0x0a;

// A chunk-size line longer than this is treated as garbage.
const MAX_CHUNK_LINE = 1024;

type BodyFraming = { kind: "length"; length: number } | { kind: "chunked" };

/**
 * Try to parse one request from the start of `data`.
 *
 * @returns the request and consumed byte count, or `null` if `data` does not yet
 *   hold a complete request
 * @throws HttpError when the bytes cannot be a valid request
 */
export function parseRequest(data: Buffer, limits: ParseLimits = defaultParseLimits()): ParsedRequest | null {
  // Tolerate empty lines before the request line (RFC 9112 §2.2).
  let start = 0;
  while (data.length - start >= 2 && data[start] === CR && data[start + 1] === LF) {
    start += 2;
  }

  // The skipped empty lines count toward the header limit.
  const end = data.indexOf("\r\n\r\n", start, "latin1");
  if (end < 0) {
    if (data.length > limits.maxHeaderSize) {
      throw HttpError.tooLarge("header too large");
    }
    return null;
  }
  if (end + 4 > limits.maxHeaderSize) {
    throw HttpError.tooLarge("header too large");
  }

  const head = parseHead(data.subarray(start, end));
  const bodyStart = end + 4;
  const framing = bodyFraming(head.fields, limits);

  if (framing.kind === "length") {
    if (data.length - bodyStart < framing.length) return null;
    const body = Buffer.from(data.subarray(bodyStart, bodyStart + framing.length));
    return { request: { ...head, body }, consumed: bodyStart + framing.length };
  }

  const chunked = decodeChunked(data, bodyStart, limits);
  if (!chunked) return null;
  return { request: { ...head, body: chunked.body }, consumed: chunked.next };
}

interface RequestHead {
  method: string;
  target: string;
  version: HttpVersion;
  fields: Fields;
}

function parseHead(head: Buffer): RequestHead {
  const lines = head.toString("latin1").split("\r\n");
  const [method, target, version] = parseRequestLine(lines[0]);
  const fields = new Fields();
  for (const line of lines.slice(1)) {
    parseFieldLine(line, fields);
  }
  return { method, target, version, fields };
}

function parseRequestLine(line: string): [string, string, HttpVersion] {
  const parts = line.split(" ");
  if (parts.length !== 3) throw HttpError.badRequest("bad request line");
  const [method, target, protocol] = parts;
  if (!TOKEN.test(method)) throw HttpError.badRequest("bad method");
  if (target.length === 0 || /[\s\x00-\x1f\x7f]/.test(target)) {
    throw HttpError.badRequest("bad request target");
  }
  const m = VERSION.exec(protocol);
  if (!m) throw HttpError.badRequest("bad version");
  const version = { major: Number(m[1]), minor: Number(m[2]) };
  if (version.major !== 1) throw new HttpError(505, "unsupported version");
  return [method, target, version];
}

function parseFieldLine(line: string, fields: Fields): void {
  if (line.startsWith(" ") || line.startsWith("\t")) {
    throw HttpError.badRequest("obsolete line folding");
  }
  const colon = line.indexOf(":");
  if (colon <= 0) throw HttpError.badRequest("bad header field");
  const name = line.slice(0, colon);
  if (!TOKEN.test(name)) throw HttpError.badRequest("bad header name");
  const value = line.slice(colon + 1).replace(/^[ \t]+|[ \t]+$/g, "");
  if (/[\x00-\x08\x0a-\x1f\x7f]/.test(value)) throw HttpError.badRequest("bad header value");
  fields.append(name, value);
}

function bodyFraming(fields: Fields, limits: ParseLimits): BodyFraming {
  const codings = fields.tokens("Transfer-Encoding");
  if (codings.length > 0) {
    if (fields.has("Content-Length")) {
      throw HttpError.badRequest("both Content-Length and Transfer-Encoding");
    }
    if (codings[codings.length - 1] !== "chunked") {
      throw HttpError.badRequest("request body not chunked");
    }
    if (codings.some((c) => c !== "chunked")) {
      throw HttpError.notImplemented(`unsupported transfer coding: ${codings.join(", ")}`);
    }
    return { kind: "chunked" };
  }

  const values = fields
    .getAll("Content-Length")
    .flatMap((v) => v.split(","))
    .map((v) => v.trim());
  if (values.length === 0) return { kind: "length", length: 0 };
  if (!values.every((v) => DIGITS.test(v) && v === values[0])) {
    throw HttpError.badRequest("bad Content-Length");
  }
  const length = Number(values[0]);
  if (length > limits.maxBodySize) throw HttpError.tooLarge("body too large");
  return { kind: "length", length };
}

function decodeChunked(
  data: Buffer,
  pos: number,
  limits: ParseLimits,
): { body: Buffer; next: number } | null {
  const chunks: Buffer[] = [];
  let total = 0;
  // Chunk framing and extensions may add at most a header's worth of bytes.
  const start = pos;
  const maxWire = limits.maxBodySize + limits.maxHeaderSize;

  while (true) {
    const lineEnd = data.indexOf("\r\n", pos, "latin1");
    if (lineEnd < 0) {
      if (data.length - pos > MAX_CHUNK_LINE) throw HttpError.badRequest("chunk header too long");
      if (data.length - start > maxWire) throw HttpError.tooLarge("chunked body too large");
      return null;
    }
    if (lineEnd - pos > MAX_CHUNK_LINE) throw HttpError.badRequest("chunk header too long");

    // chunk extensions after ';' are ignored
    const sizeText = data.toString("latin1", pos, lineEnd).split(";")[0].trim();
    if (!HEX.test(sizeText)) throw HttpError.badRequest("bad chunk size");
    const size = parseInt(sizeText, 16);
    total += size;
    if (total > limits.maxBodySize) throw HttpError.tooLarge("body too large");
    pos = lineEnd + 2;
    if (pos - start > maxWire) throw HttpError.tooLarge("chunked body too large");

    if (size === 0) {
      const next = skipTrailers(data, pos, limits);
      if (next === null) return null;
      return { body: Buffer.concat(chunks), next };
    }

    if (data.length < pos + size + 2) return null;
    if (data[pos + size] !== CR || data[pos + size + 1] !== LF) {
      throw HttpError.badRequest("missing CRLF after chunk data");
    }
    chunks.push(Buffer.from(data.subarray(pos, pos + size)));
    pos += size + 2;
  }
}

// Trailer fields are validated and dropped.
function skipTrailers(data: Buffer, pos: number, limits: ParseLimits): number | null {
  const start = pos;
  while (true) {
    const lineEnd = data.indexOf("\r\n", pos, "latin1");
    if (lineEnd < 0) {
      if (data.length - start > limits.maxHeaderSize) throw HttpError.tooLarge("trailers too large");
      return null;
    }
    if (lineEnd === pos) return pos + 2;
    parseFieldLine(data.toString("latin1", pos, lineEnd), new Fields());
    pos = lineEnd + 2;
    if (pos - start > limits.maxHeaderSize) throw HttpError.tooLarge("trailers too large");
  }
}
