/**
 * Canonical string form of a property graph.
 *
 * Each node gets a signature from its own labels and properties. Adjacency
 * is then described by the signatures of the neighbours, never by their ids,
 * and every list is sorted, so the result depends only on graph content:
 *
 *   (:A { a: 13 }) => out: ()-[:REL ]->(:B ) in: ()<-[:REL { c: 12 }]-(:B )
 *
 * This is not canonical labeling. Nodes with equal signatures are told apart
 * only through the signatures of their neighbours.
 */

import { Ok, Err, map, andThen, type Result } from "@graph-compare/core";
import { NodeNotFoundError } from "./errors.js";
import { formatProperties, incomingEntry, nodeSignature, outgoingEntry } from "./format.js";
import type { Graph, GraphDiff, ValueFormatter } from "./model.js";

function push<K>(buckets: Map<K, string[]>, key: K, entry: string): void {
  const bucket = buckets.get(key);
  if (bucket) {
    bucket.push(entry);
  } else {
    buckets.set(key, [entry]);
  }
}

function joinSorted(entries: string[] | undefined): string {
  return entries ? entries.sort().join(", ") : "";
}

function countRecords(records: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record, (counts.get(record) ?? 0) + 1);
  }
  return counts;
}

/**
 * Records of `from` that `other` does not match one for one.
 */
function subtractRecords(from: string[], other: string[]): string[] {
  const remaining = countRecords(other);
  const extra: string[] = [];
  for (const record of from) {
    const count = remaining.get(record) ?? 0;
    if (count > 0) {
      remaining.set(record, count - 1);
    } else {
      extra.push(record);
    }
  }
  return extra;
}

export class Canonicalizer<V> {
  constructor(private readonly formatValue: ValueFormatter<V>) {}

  /**
   * Sorted canonical node records, one per node.
   */
  records<Id>(graph: Graph<Id, V>): Result<string[], NodeNotFoundError> {
    try {
      return this.buildRecords(graph);
    } catch (error) {
      // Implementations report unknown ids by throwing
      if (error instanceof NodeNotFoundError) return Err(error);
      throw error;
    }
  }

  /**
   * The whole-graph canonical form: sorted records joined by newlines.
   */
  canonicalize<Id>(graph: Graph<Id, V>): Result<string, NodeNotFoundError> {
    return map(this.records(graph), (records) => records.join("\n"));
  }

  /**
   * Whether both graphs have the same canonical form.
   * The graphs may be different implementations.
   */
  equal<L, R>(left: Graph<L, V>, right: Graph<R, V>): Result<boolean, NodeNotFoundError> {
    return andThen(this.canonicalize(left), (l) =>
      map(this.canonicalize(right), (r) => l === r)
    );
  }

  diff<L, R>(left: Graph<L, V>, right: Graph<R, V>): Result<GraphDiff, NodeNotFoundError> {
    return andThen(this.records(left), (l) =>
      map(this.records(right), (r) => {
        const leftForm = l.join("\n");
        const rightForm = r.join("\n");
        return {
          equal: leftForm === rightForm,
          left: leftForm,
          right: rightForm,
          onlyLeft: subtractRecords(l, r),
          onlyRight: subtractRecords(r, l),
        };
      })
    );
  }

  private buildRecords<Id>(graph: Graph<Id, V>): Result<string[], NodeNotFoundError> {
    const signatures = new Map<Id, string>();
    for (const id of graph.nodes()) {
      signatures.set(
        id,
        nodeSignature(graph.nodeLabels(id), graph.nodeProperties(id), this.formatValue)
      );
    }

    const outgoing = new Map<Id, string[]>();
    const incoming = new Map<Id, string[]>();

    for (const [source, sourceSignature] of signatures) {
      for (const relationship of graph.outgoingRelationships(source)) {
        const target = relationship.node;
        const targetSignature = signatures.get(target);
        if (targetSignature === undefined) {
          return Err(new NodeNotFoundError(target));
        }

        const properties = formatProperties(relationship.properties, this.formatValue);
        // A self-loop lands in both buckets of the same node
        push(outgoing, source, outgoingEntry(relationship.type, properties, targetSignature));
        push(incoming, target, incomingEntry(relationship.type, properties, sourceSignature));
      }
    }

    // Outgoing walks never reach a relationship whose source is missing
    for (const target of signatures.keys()) {
      for (const relationship of graph.incomingRelationships(target)) {
        if (!signatures.has(relationship.node)) {
          return Err(new NodeNotFoundError(relationship.node));
        }
      }
    }

    const records: string[] = [];
    for (const [id, signature] of signatures) {
      records.push(
        `${signature} => out: ${joinSorted(outgoing.get(id))} in: ${joinSorted(incoming.get(id))}`
      );
    }

    records.sort();
    return Ok(records);
  }
}
