/**
 * graph_canonicalize - Render a graph document in canonical form.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, resultToStructuredResponse, type ToolResponse } from "@graph-compare/core";
import type { Canonicalizer } from "../Canonicalizer.js";
import { GraphDocumentSchema, graphFromDocument, type GraphDocument } from "../document.js";
import type { PropertyValue } from "../model.js";

const InputSchema = {
  graph: GraphDocumentSchema.describe("Graph document: nodes and relationships"),
};

export function canonicalizeDocument(
  canonicalizer: Canonicalizer<PropertyValue>,
  document: GraphDocument
): ToolResponse<Record<string, unknown>> {
  const graph = graphFromDocument(document);
  if (!graph.ok) {
    return errorResponse(graph.error);
  }

  const stats = graph.value.stats();
  return resultToStructuredResponse(canonicalizer.canonicalize(graph.value), (canonical) => ({
    text: canonical === "" ? "(empty graph)" : canonical,
    data: { canonical, nodes: stats.nodes, relationships: stats.relationships },
  }));
}

export function registerCanonicalize(
  server: McpServer,
  canonicalizer: Canonicalizer<PropertyValue>
): void {
  server.registerTool(
    "graph_canonicalize",
    {
      title: "Canonicalize graph",
      description:
        "Render a graph as its canonical form: one line per node, independent of node ids and of ordering. Diff two outputs to see how graphs differ.",
      inputSchema: InputSchema,
    },
    async ({ graph }) => canonicalizeDocument(canonicalizer, graph)
  );
}
