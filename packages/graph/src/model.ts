/**
 * Read-only view of a property graph.
 * Anything that implements Graph can be canonicalized and compared.
 */

/**
 * Default property value domain: what a JSON graph document can hold.
 */
export type PropertyValue = string | number | boolean | null | PropertyValue[];

export type Property<V = PropertyValue> = readonly [key: string, value: V];

/**
 * One relationship as seen from one of its endpoints.
 * `node` is the other endpoint: the target for outgoing entries,
 * the source for incoming ones.
 */
export interface RelationshipEntry<Id, V = PropertyValue> {
  node: Id;
  /** Relationship type; undefined renders as the empty string */
  type: string | undefined;
  properties: Iterable<Property<V>>;
}

/**
 * Capability interface over a concrete graph representation.
 *
 * Every method returns a fresh sequence on each call. Node ids are used as
 * Map keys, so they compare with SameValueZero. Looking up an id that is not
 * among `nodes()` throws NodeNotFoundError.
 */
export interface Graph<Id = string, V = PropertyValue> {
  /** Every node id, each exactly once */
  nodes(): Iterable<Id>;

  /** Labels of a node, in any order */
  nodeLabels(id: Id): Iterable<string>;

  /** Properties of a node; keys are unique */
  nodeProperties(id: Id): Iterable<Property<V>>;

  /** Every relationship whose source is `id` */
  outgoingRelationships(id: Id): Iterable<RelationshipEntry<Id, V>>;

  /** Every relationship whose target is `id` */
  incomingRelationships(id: Id): Iterable<RelationshipEntry<Id, V>>;
}

/**
 * Renders a property value; must be total and deterministic.
 */
export type ValueFormatter<V> = (value: V) => string;

/**
 * Multiset difference of two canonical forms, record by record.
 */
export interface GraphDiff {
  equal: boolean;
  left: string;
  right: string;
  /** Records present in left more often than in right */
  onlyLeft: string[];
  /** Records present in right more often than in left */
  onlyRight: string[];
}

export interface GraphStats {
  nodes: number;
  relationships: number;
}
