/**
 * JSON graph documents: the wire shape the MCP tools accept.
 */

import * as z from "zod/v4";
import { Ok, Err, andThen, type Result } from "@graph-compare/core";
import { MemoryGraph } from "./MemoryGraph.js";
import type { PropertyValue } from "./model.js";

export const PropertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(PropertyValueSchema)])
);

// Records are rebuilt by assignment, which would drop an own "__proto__" key
export const PropertiesSchema = z.preprocess((value, ctx) => {
  if (typeof value === "object" && value !== null && Object.hasOwn(value, "__proto__")) {
    ctx.addIssue({
      code: "custom",
      message: 'Property key "__proto__" is not supported',
      input: value,
    });
  }
  return value;
}, z.record(z.string(), PropertyValueSchema));

export const NodeSpecSchema = z.object({
  id: z.string().min(1).describe("Node id, only used to wire relationships"),
  labels: z.array(z.string()).optional(),
  properties: PropertiesSchema.optional(),
});

export const RelationshipSpecSchema = z.object({
  source: z.string().describe("Id of the source node"),
  target: z.string().describe("Id of the target node"),
  type: z.string().optional(),
  properties: PropertiesSchema.optional(),
});

export const GraphDocumentSchema = z.object({
  nodes: z.array(NodeSpecSchema),
  relationships: z.array(RelationshipSpecSchema).optional(),
});

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;

/**
 * Validate an untrusted value as a graph document.
 */
export function parseGraphDocument(input: unknown): Result<GraphDocument, string> {
  const parsed = GraphDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return Err(messages.join("; "));
  }
  return Ok(parsed.data);
}

export function graphFromDocument(document: GraphDocument): Result<MemoryGraph, string> {
  const graph = new MemoryGraph();
  const added = graph.add(document.nodes, document.relationships);
  if (!added.ok) return added;
  return Ok(graph);
}

/**
 * parseGraphDocument then graphFromDocument.
 */
export function loadGraph(input: unknown): Result<MemoryGraph, string> {
  return andThen(parseGraphDocument(input), graphFromDocument);
}
