#!/usr/bin/env node
/**
 * MCP server for structural graph comparison.
 */

import { runServer } from "@graph-compare/core";
import { defaultCanonicalizer } from "./equality.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "graph-compare:graph",
    version: "0.1.0",
  },
  createServices: () => ({
    canonicalizer: defaultCanonicalizer,
  }),
  registerTools: registerAllTools,
  onStartup: () => {
    console.error("[graph] Ready: graph_canonicalize, graph_equal");
  },
  onShutdown: () => {
    console.error("[graph] Shutting down");
  },
});
