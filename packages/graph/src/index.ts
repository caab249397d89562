/**
 * @graph-compare/graph
 * Structural equality for property graphs, independent of node ids and ordering.
 */

// Model
export type {
  Graph,
  GraphDiff,
  GraphStats,
  Property,
  PropertyValue,
  RelationshipEntry,
  ValueFormatter,
} from "./model.js";
export { NodeNotFoundError } from "./errors.js";

// Canonical form
export { formatPropertyValue, formatProperties, formatLabels, nodeSignature } from "./format.js";
export { Canonicalizer } from "./Canonicalizer.js";
export { defaultCanonicalizer, canonicalize, graphsEqual, diffGraphs } from "./equality.js";

// Fixtures
export { MemoryGraph, type NodeSpec, type RelationshipSpec } from "./MemoryGraph.js";
export {
  GraphDocumentSchema,
  NodeSpecSchema,
  RelationshipSpecSchema,
  PropertyValueSchema,
  parseGraphDocument,
  graphFromDocument,
  loadGraph,
  type GraphDocument,
} from "./document.js";
