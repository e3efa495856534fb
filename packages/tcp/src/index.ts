// @strand/tcp - HTTP over TCP (Node.js only)
//
// Socket-level I/O: the HTTP stream over a socket, the acceptor, the accept
// loop and the serveHttp entry point.

export { TcpStream, defaultTcpStreamOptions, type TcpStreamOptions } from "./stream.ts";
export { TcpAcceptor, type Acceptor, type ListenOptions } from "./acceptor.ts";
export { Listener } from "./listener.ts";
export { serveHttp, defaultServerConfig, type ServerConfig, type RunningServer } from "./server.ts";
