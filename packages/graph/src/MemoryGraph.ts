/**
 * In-memory property graph for building test fixtures.
 * Enumeration follows insertion order.
 */

import { Ok, Err, type Result } from "@graph-compare/core";
import { NodeNotFoundError } from "./errors.js";
import type { Graph, GraphStats, Property, PropertyValue, RelationshipEntry } from "./model.js";

export interface NodeSpec {
  id: string;
  labels?: string[];
  properties?: Record<string, PropertyValue>;
}

export interface RelationshipSpec {
  source: string;
  target: string;
  type?: string;
  properties?: Record<string, PropertyValue>;
}

interface StoredNode {
  labels: string[];
  properties: Record<string, PropertyValue>;
}

function toEntries(properties: Record<string, PropertyValue>): Property[] {
  return Object.entries(properties);
}

export class MemoryGraph implements Graph<string, PropertyValue> {
  private nodeTable = new Map<string, StoredNode>();
  private outgoing = new Map<string, RelationshipSpec[]>(); // source -> relationships
  private incoming = new Map<string, RelationshipSpec[]>(); // target -> relationships
  private relationshipCount = 0;

  /**
   * Add a node. Ids are unique.
   */
  addNode(node: NodeSpec): Result<void, string> {
    if (this.nodeTable.has(node.id)) {
      return Err(`Node already exists: ${node.id}`);
    }
    this.nodeTable.set(node.id, {
      labels: [...(node.labels ?? [])],
      properties: { ...node.properties },
    });
    return Ok(undefined);
  }

  /**
   * Add a relationship. Endpoints are not checked here: a relationship to a
   * missing node surfaces as NodeNotFoundError from nodes().
   */
  addRelationship(relationship: RelationshipSpec): void {
    const stored: RelationshipSpec = {
      ...relationship,
      properties: { ...relationship.properties },
    };

    const fromSource = this.outgoing.get(stored.source);
    if (fromSource) {
      fromSource.push(stored);
    } else {
      this.outgoing.set(stored.source, [stored]);
    }

    const intoTarget = this.incoming.get(stored.target);
    if (intoTarget) {
      intoTarget.push(stored);
    } else {
      this.incoming.set(stored.target, [stored]);
    }

    this.relationshipCount++;
  }

  /**
   * Add nodes, then relationships. Stops at the first rejected node.
   */
  add(nodes: NodeSpec[], relationships: RelationshipSpec[] = []): Result<void, string> {
    for (const node of nodes) {
      const added = this.addNode(node);
      if (!added.ok) return added;
    }
    for (const relationship of relationships) {
      this.addRelationship(relationship);
    }
    return Ok(undefined);
  }

  hasNode(id: string): boolean {
    return this.nodeTable.has(id);
  }

  stats(): GraphStats {
    return { nodes: this.nodeTable.size, relationships: this.relationshipCount };
  }

  isEmpty(): boolean {
    return this.nodeTable.size === 0;
  }

  /**
   * Throws NodeNotFoundError while any relationship has an endpoint that is
   * not a node, including relationships between two unknown ids.
   */
  nodes(): Iterable<string> {
    for (const endpoints of [this.outgoing.keys(), this.incoming.keys()]) {
      for (const id of endpoints) {
        if (!this.nodeTable.has(id)) throw new NodeNotFoundError(id);
      }
    }
    return Array.from(this.nodeTable.keys());
  }

  nodeLabels(id: string): Iterable<string> {
    return [...this.getNode(id).labels];
  }

  nodeProperties(id: string): Iterable<Property> {
    return toEntries(this.getNode(id).properties);
  }

  outgoingRelationships(id: string): Iterable<RelationshipEntry<string>> {
    this.getNode(id);
    return (this.outgoing.get(id) ?? []).map((rel) => ({
      node: rel.target,
      type: rel.type,
      properties: toEntries(rel.properties ?? {}),
    }));
  }

  incomingRelationships(id: string): Iterable<RelationshipEntry<string>> {
    this.getNode(id);
    return (this.incoming.get(id) ?? []).map((rel) => ({
      node: rel.source,
      type: rel.type,
      properties: toEntries(rel.properties ?? {}),
    }));
  }

  private getNode(id: string): StoredNode {
    const node = this.nodeTable.get(id);
    if (!node) throw new NodeNotFoundError(id);
    return node;
  }
}
