/**
 * Entry points on the default value rendering.
 */

import type { Result } from "@graph-compare/core";
import { Canonicalizer } from "./Canonicalizer.js";
import type { NodeNotFoundError } from "./errors.js";
import { formatPropertyValue } from "./format.js";
import type { Graph, GraphDiff, PropertyValue } from "./model.js";

export const defaultCanonicalizer = new Canonicalizer<PropertyValue>(formatPropertyValue);

export function canonicalize<Id>(graph: Graph<Id>): Result<string, NodeNotFoundError> {
  return defaultCanonicalizer.canonicalize(graph);
}

export function graphsEqual<L, R>(left: Graph<L>, right: Graph<R>): Result<boolean, NodeNotFoundError> {
  return defaultCanonicalizer.equal(left, right);
}

/**
 * Record-level difference, for test failure messages.
 */
export function diffGraphs<L, R>(left: Graph<L>, right: Graph<R>): Result<GraphDiff, NodeNotFoundError> {
  return defaultCanonicalizer.diff(left, right);
}
