/**
 * Raised when a relationship or lookup names a node the graph does not have.
 * It signals a malformed backing graph, never a property of the comparison.
 */
export class NodeNotFoundError extends Error {
  readonly nodeId: unknown;

  constructor(nodeId: unknown) {
    super(`Node not found: ${String(nodeId)}`);
    this.name = "NodeNotFoundError";
    this.nodeId = nodeId;
  }
}
