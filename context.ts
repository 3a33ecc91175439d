/**
 * @file context.ts
 * @description Per-evaluation store of node outputs, node states and bound parameters.
 */

import type {NodeState, ParameterDefinition, ProcessGraph} from "./types.js";

/**
 * Transient state of one graph evaluation. Node outputs are write-once and
 * each node writes only its own slot.
 */
export class EvaluationContext {
    readonly graph: ProcessGraph;

    readonly #outputs = new Map<string, unknown>();
    readonly #states = new Map<string, NodeState>();
    readonly #parameters: ReadonlyMap<string, unknown>;
    readonly #declarations: ReadonlyMap<string, ParameterDefinition>;

    /**
     * @param graph - The graph being evaluated
     * @param parameters - Values bound to the graph's parameters
     * @param declarations - Declared parameters, consulted for defaults
     */
    constructor(
        graph: ProcessGraph,
        parameters: Record<string, unknown> = {},
        declarations: readonly ParameterDefinition[] = [],
    ) {
        this.graph = graph;
        this.#parameters = new Map(Object.entries(parameters));
        this.#declarations = new Map(declarations.map((declaration) => [declaration.name, declaration]));
        for (const id of graph.nodes.keys()) {
            this.#states.set(id, "pending");
        }
    }

    /**
     * Records a node's output.
     * @throws Error when the node already has an output
     */
    record(nodeId: string, value: unknown): void {
        if (this.#outputs.has(nodeId)) {
            throw new Error(`Output of node '${nodeId}' has already been recorded`);
        }
        this.#outputs.set(nodeId, value);
        this.#states.set(nodeId, "done");
    }

    hasOutput(nodeId: string): boolean {
        return this.#outputs.has(nodeId);
    }

    output(nodeId: string): unknown {
        return this.#outputs.get(nodeId);
    }

    state(nodeId: string): NodeState | undefined {
        return this.#states.get(nodeId);
    }

    setState(nodeId: string, state: NodeState): void {
        if (!this.#states.has(nodeId)) {
            throw new Error(`Node '${nodeId}' is not part of the graph`);
        }
        this.#states.set(nodeId, state);
    }

    /**
     * Snapshot of every node's state.
     */
    states(): Record<string, NodeState> {
        return Object.fromEntries(this.#states);
    }

    /**
     * Looks up a bound parameter, falling back to its declared default.
     * @returns The value, or undefined when the parameter is neither bound nor defaulted
     */
    parameter(name: string): { value: unknown } | undefined {
        if (this.#parameters.has(name)) {
            return {value: this.#parameters.get(name)};
        }
        const fallback = this.#declarations.get(name)?.default;
        if (fallback !== undefined) {
            return {value: structuredClone(fallback)};
        }
        return undefined;
    }
}
