/**
 * @file resolver.ts
 * @description Dependency resolution for process graphs: dangling reference
 *              detection, cycle detection and topological ordering.
 */

import type {ValidationIssue} from "./errors.js";
import type {ArgumentValue, ProcessNode} from "./types.js";

/**
 * Outcome of resolving the node-to-node references of a graph.
 */
export type DependencyResolution = {
    /**
     * Evaluation order. Complete only when `issues` is empty.
     */
    order: string[];
    issues: ValidationIssue[];
};

/**
 * Forward and reverse dependency lists for every node.
 */
export type DependencyIndex = {
    dependencies: ReadonlyMap<string, readonly string[]>;
    dependents: ReadonlyMap<string, readonly string[]>;
};

function collectReferences(value: ArgumentValue, into: string[]): void {
    switch (value.kind) {
        case "node":
            into.push(value.nodeId);
            break;
        case "array":
            for (const item of value.items) collectReferences(item, into);
            break;
        case "object":
            for (const entry of Object.values(value.entries)) collectReferences(entry, into);
            break;
        case "literal":
        case "parameter":
            break;
    }
}

/**
 * Lists the nodes a node references directly, in argument order, without duplicates.
 */
export function dependenciesOf(node: ProcessNode): string[] {
    const references: string[] = [];
    for (const argument of Object.values(node.arguments)) {
        collectReferences(argument, references);
    }
    return [...new Set(references)];
}

/**
 * Builds forward and reverse dependency lists for the given nodes.
 * References to nodes outside the map are left out.
 */
export function buildDependencyIndex(nodes: ReadonlyMap<string, ProcessNode>): DependencyIndex {
    const dependencies = new Map<string, string[]>();
    const dependents = new Map<string, string[]>();

    for (const id of nodes.keys()) {
        dependents.set(id, []);
    }
    for (const [id, node] of nodes) {
        const direct = dependenciesOf(node).filter((target) => nodes.has(target));
        dependencies.set(id, direct);
        for (const target of direct) {
            dependents.get(target)?.push(id);
        }
    }

    return {dependencies, dependents};
}

type Colour = "in-progress" | "done";

type Frame = {
    id: string;
    dependencies: string[];
    next: number;
};

/**
 * Resolves the references between nodes.
 *
 * Dangling references are reported per referencing node and target. Cycles are
 * found by a depth-first walk with three colours; each reported cycle lists its
 * members in the order the walk entered them, starting at the node that was
 * re-entered. The order is deterministic: roots are visited in insertion order
 * and references in argument order.
 *
 * @param nodes - Nodes of the graph
 * @param knownIds - Ids that exist in the document, including nodes that
 *                   failed to parse; references to these are not dangling
 */
export function resolveDependencies(
    nodes: ReadonlyMap<string, ProcessNode>,
    knownIds: ReadonlySet<string> = new Set(nodes.keys()),
): DependencyResolution {
    const issues: ValidationIssue[] = [];
    const edges = new Map<string, string[]>();

    for (const [id, node] of nodes) {
        const targets = dependenciesOf(node);
        for (const target of targets) {
            if (!knownIds.has(target)) {
                issues.push({
                    kind: "DanglingReference",
                    message: `Node '${id}' references node '${target}', which does not exist`,
                    nodeId: id,
                    nodeIds: [target],
                });
            }
        }
        edges.set(id, targets.filter((target) => nodes.has(target)));
    }

    const colours = new Map<string, Colour>();
    const order: string[] = [];

    // Explicit stack so that deep chains cannot exhaust the call stack
    for (const root of nodes.keys()) {
        if (colours.has(root)) continue;

        const stack: Frame[] = [{id: root, dependencies: edges.get(root) ?? [], next: 0}];
        colours.set(root, "in-progress");

        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            if (frame.next < frame.dependencies.length) {
                const target = frame.dependencies[frame.next++];
                const colour = colours.get(target);
                if (colour === undefined) {
                    colours.set(target, "in-progress");
                    stack.push({id: target, dependencies: edges.get(target) ?? [], next: 0});
                } else if (colour === "in-progress") {
                    const start = stack.findIndex((entry) => entry.id === target);
                    const cycle = stack.slice(start).map((entry) => entry.id);
                    issues.push({
                        kind: "CyclicDependency",
                        message: `Cyclic dependency between nodes: ${[...cycle, target].join(" -> ")}`,
                        nodeId: target,
                        nodeIds: cycle,
                    });
                }
                continue;
            }

            stack.pop();
            colours.set(frame.id, "done");
            order.push(frame.id);
        }
    }

    return {order, issues};
}
