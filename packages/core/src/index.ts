export {
  type Result,
  Ok,
  Err,
  map,
  andThen,
  unwrap,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  errorResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
} from "./server.js";
