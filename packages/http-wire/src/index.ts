// HTTP/1.x wire format
//
// Message model, ordered header fields, the incremental request parser,
// response serialization and the keep-alive rules the session relies on.

export { Fields, type Field } from "./fields.ts";
export { HttpError } from "./http_error.ts";
export { Status, reasonPhrase, statusAllowsBody } from "./status.ts";
export {
  HTTP_1_0,
  HTTP_1_1,
  createResponse,
  versionAtLeast,
  versionString,
  type HttpRequest,
  type HttpResponse,
  type HttpVersion,
  type ResponseInit,
} from "./types.ts";
export { keepAlive, setKeepAlive, needEof, isChunked } from "./keep_alive.ts";
export { parseRequest, defaultParseLimits, type ParseLimits, type ParsedRequest } from "./parser.ts";
export { encodeResponse, encodeChunkedBody } from "./codec.ts";
