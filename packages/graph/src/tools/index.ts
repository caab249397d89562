/**
 * MCP tool registration for the graph package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Canonicalizer } from "../Canonicalizer.js";
import type { PropertyValue } from "../model.js";

import { registerCanonicalize } from "./canonicalize.js";
import { registerEqual } from "./equal.js";

export interface Services {
  canonicalizer: Canonicalizer<PropertyValue>;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { canonicalizer } = services;

  registerCanonicalize(server, canonicalizer);
  registerEqual(server, canonicalizer);
}
