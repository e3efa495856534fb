// @strand/server - the hello application and its process entry point

export { ConfigError, loadConfig } from "./config.ts";
export { ContentType, makeStringResponse } from "./responses.ts";
export { ALLOWED_METHODS, greet, hello } from "./hello.ts";
export { main, type App } from "./main.ts";
