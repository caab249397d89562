/**
 * graph_equal - Compare two graph documents structurally.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, resultToStructuredResponse, type ToolResponse } from "@graph-compare/core";
import type { Canonicalizer } from "../Canonicalizer.js";
import { GraphDocumentSchema, graphFromDocument, type GraphDocument } from "../document.js";
import type { GraphDiff, PropertyValue } from "../model.js";

const InputSchema = {
  left: GraphDocumentSchema.describe("First graph document"),
  right: GraphDocumentSchema.describe("Second graph document"),
};

export function formatDiff(diff: GraphDiff): string {
  if (diff.equal) {
    return "Graphs are equal";
  }

  const lines = [
    "## Graphs differ",
    "",
    ...diff.onlyLeft.map((record) => `- ${record}`),
    ...diff.onlyRight.map((record) => `+ ${record}`),
  ];
  return lines.join("\n");
}

export function compareDocuments(
  canonicalizer: Canonicalizer<PropertyValue>,
  left: GraphDocument,
  right: GraphDocument
): ToolResponse<Record<string, unknown>> {
  const leftGraph = graphFromDocument(left);
  if (!leftGraph.ok) {
    return errorResponse(`left: ${leftGraph.error}`);
  }
  const rightGraph = graphFromDocument(right);
  if (!rightGraph.ok) {
    return errorResponse(`right: ${rightGraph.error}`);
  }

  return resultToStructuredResponse(canonicalizer.diff(leftGraph.value, rightGraph.value), (diff) => ({
    text: formatDiff(diff),
    data: { equal: diff.equal, onlyLeft: diff.onlyLeft, onlyRight: diff.onlyRight },
  }));
}

export function registerEqual(server: McpServer, canonicalizer: Canonicalizer<PropertyValue>): void {
  server.registerTool(
    "graph_equal",
    {
      title: "Compare graphs",
      description:
        "Check whether two graphs have the same content regardless of node ids and ordering. Lists the canonical node records that differ.",
      inputSchema: InputSchema,
    },
    async ({ left, right }) => compareDocuments(canonicalizer, left, right)
  );
}
