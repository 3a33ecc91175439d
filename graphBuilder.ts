import type {JsonValue, ProcessGraphDocument, ProcessNodeDocument} from "./types.js";

/**
 * A `from_node` reference to another node's output.
 */
export function fromNode(nodeId: string): { from_node: string } {
  return {from_node: nodeId};
}

/**
 * A `from_argument` reference to a parameter of the enclosing process.
 */
export function fromArgument(name: string): { from_argument: string } {
  return {from_argument: name};
}

/**
 * Builder class for constructing process graph documents with a fluent API.
 */
export class ProcessGraphBuilder {
  /**
   * The nodes added so far, in insertion order
   */
  readonly #nodes = new Map<string, ProcessNodeDocument>();

  /**
   * Adds a node to the graph.
   * @throws Error when a node with this id already exists
   */
  node(
    id: string,
    processId: string,
    args: Record<string, JsonValue> = {},
    description?: string
  ): ProcessGraphBuilder {
    if (this.#nodes.has(id)) {
      throw new Error(`Node with id '${id}' already exists`);
    }
    this.#nodes.set(id, {
      process_id: processId,
      arguments: args,
      ...(description !== undefined ? {description} : {}),
    });
    return this;
  }

  /**
   * Marks the result node; any previous mark is cleared.
   * @throws Error when the node does not exist
   */
  result(id: string): ProcessGraphBuilder {
    if (!this.#nodes.has(id)) {
      throw new Error(`Result node '${id}' does not exist`);
    }
    for (const [nodeId, node] of this.#nodes) {
      const {result: _previous, ...rest} = node;
      this.#nodes.set(nodeId, nodeId === id ? {...rest, result: true} : rest);
    }
    return this;
  }

  /**
   * Builds the document. Validation is left to the parser.
   */
  build(): ProcessGraphDocument {
    return Object.fromEntries(this.#nodes);
  }
}
