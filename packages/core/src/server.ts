/**
 * MCP server bootstrap utilities.
 * Every graph-compare server is created and run through here.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Name and version a server announces to its client.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Options for bootstrapping an MCP server.
 */
export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory for the services the tools operate on */
  createServices: () => S | Promise<S>;

  /** Registers every tool against the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Runs after registration, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs on SIGTERM/SIGINT before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create the services, register tools, install signal handlers and
 * connect the server to stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "graph-compare:graph", version: "0.1.0" },
 *   createServices: () => ({ canonicalizer: defaultCanonicalizer }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  await server.connect(transport);
}

/**
 * Run bootstrapServer and exit with status 1 on a fatal error.
 * This is the entry point servers call from their bin script.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}
