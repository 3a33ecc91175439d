/**
 * @file arguments.ts
 * @description Resolves a node's classified arguments into concrete values.
 */

import type {EvaluationContext} from "./context.js";
import {UnboundParameterError} from "./errors.js";
import type {ArgumentValue, ProcessNode} from "./types.js";

function resolveValue(value: ArgumentValue, node: ProcessNode, context: EvaluationContext): unknown {
    switch (value.kind) {
        case "literal":
            return value.value;

        case "array":
            return value.items.map((item) => resolveValue(item, node, context));

        case "object": {
            const resolved: Record<string, unknown> = {};
            for (const [key, entry] of Object.entries(value.entries)) {
                resolved[key] = resolveValue(entry, node, context);
            }
            return resolved;
        }

        case "node":
            // Evaluation order guarantees the output exists
            if (!context.hasOutput(value.nodeId)) {
                throw new Error(
                    `Node '${node.id}' was dispatched before its dependency '${value.nodeId}' produced an output`,
                );
            }
            return context.output(value.nodeId);

        case "parameter": {
            const bound = context.parameter(value.name);
            if (!bound) {
                throw new UnboundParameterError(value.name, node.id);
            }
            return bound.value;
        }
    }
}

/**
 * Produces the argument mapping passed to a node's process.
 * @param node - The node about to run
 * @param context - Outputs of completed nodes and bound parameters
 * @throws UnboundParameterError when a parameter reference has neither a binding nor a default
 */
export function resolveArguments(node: ProcessNode, context: EvaluationContext): Record<string, unknown> {
    const resolved: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(node.arguments)) {
        resolved[name] = resolveValue(value, node, context);
    }
    return resolved;
}
