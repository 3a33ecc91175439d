/**
 * @file parser.ts
 * @description Turns a raw process graph document into a validated, immutable
 *              {@link ProcessGraph}, accumulating every structural issue.
 */

import {z} from "zod";
import type {ValidationIssue} from "./errors.js";
import {resolveDependencies} from "./resolver.js";
import {
    compileSchema,
    describeSchema,
    jsonValueSchema,
    validateSchemaCompatibility,
} from "./schema-validator.js";
import type {
    ArgumentValue,
    JsonValue,
    ParameterDefinition,
    ProcessCatalog,
    ProcessGraph,
    ProcessNode,
} from "./types.js";

/**
 * Options for parsing
 */
export type ParseOptions = {
    /**
     * When given, process ids, argument names and literal argument values are
     * checked against the declared processes.
     */
    catalog?: ProcessCatalog;
    /**
     * Parameters declared by the enclosing process. When given, every
     * `from_argument` reference must name one of them.
     */
    parameters?: readonly ParameterDefinition[];
};

/**
 * Outcome of parsing
 */
export type ParseResult = {
    /**
     * The validated graph, present only when there are no issues.
     */
    graph?: ProcessGraph;
    issues: ValidationIssue[];
    /**
     * Findings that do not make the graph invalid.
     */
    warnings: string[];
};

const nodeDocumentSchema = z.object({
    process_id: z.string().min(1, "process_id must be a non-empty string"),
    arguments: z.record(jsonValueSchema),
    result: z.boolean().optional(),
    description: z.string().nullable().optional(),
});

type NodeDocument = z.infer<typeof nodeDocumentSchema>;

const PARAMETER_KEYS = ["from_argument", "from_parameter"] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts a JSON string, a bare node map or a `{process_graph: ...}` envelope.
 */
function unwrapDocument(document: unknown, issues: ValidationIssue[]): Record<string, unknown> | undefined {
    let value = document;
    if (typeof value === "string") {
        try {
            value = JSON.parse(value);
        } catch (error) {
            issues.push({
                kind: "MalformedGraph",
                message: `Process graph is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            });
            return undefined;
        }
    }

    if (!isPlainObject(value)) {
        issues.push({kind: "MalformedGraph", message: "Process graph must be an object mapping node ids to nodes"});
        return undefined;
    }

    const envelope = value.process_graph;
    if (isPlainObject(envelope) && !("process_id" in envelope)) {
        value = envelope;
    }

    if (!isPlainObject(value) || Object.keys(value).length === 0) {
        issues.push({kind: "MalformedGraph", message: "Process graph must contain at least one node"});
        return undefined;
    }
    return value;
}

const RESERVED_KEYS = new Set(["__proto__"]);

/**
 * Collects the paths of keys that cannot be carried into a plain object.
 */
function findReservedKeys(value: unknown, path: (string | number)[], found: (string | number)[][]): void {
    if (Array.isArray(value)) {
        value.forEach((item, index) => findReservedKeys(item, [...path, index], found));
        return;
    }
    if (!isPlainObject(value)) return;
    for (const key of Object.keys(value)) {
        if (RESERVED_KEYS.has(key)) {
            found.push([...path, key]);
            continue;
        }
        findReservedKeys(value[key], [...path, key], found);
    }
}

function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Classifies a raw argument value into an {@link ArgumentValue}.
 * @param value - Raw value from the document
 * @param nodeId - Node the value belongs to
 * @param path - Location of the value inside the node body
 * @param issues - Collects malformed references
 */
export function classifyArgument(
    value: JsonValue,
    nodeId: string,
    path: (string | number)[],
    issues: ValidationIssue[] = [],
): ArgumentValue {
    if (Array.isArray(value)) {
        return {
            kind: "array",
            items: value.map((item, index) => classifyArgument(item, nodeId, [...path, index], issues)),
        };
    }

    if (!isPlainObject(value)) {
        return {kind: "literal", value};
    }

    if ("from_node" in value) {
        const target = value.from_node;
        if (typeof target === "string") {
            return {kind: "node", nodeId: target};
        }
        issues.push({
            kind: "MalformedGraph",
            message: `Node '${nodeId}' has a from_node reference at '${path.join(".")}' that is not a string`,
            nodeId,
            path,
        });
        return {kind: "literal", value};
    }

    for (const key of PARAMETER_KEYS) {
        if (key in value) {
            const name = value[key];
            if (typeof name === "string") {
                return {kind: "parameter", name};
            }
            issues.push({
                kind: "MalformedGraph",
                message: `Node '${nodeId}' has a ${key} reference at '${path.join(".")}' that is not a string`,
                nodeId,
                path,
            });
            return {kind: "literal", value};
        }
    }

    // Child process graphs (callbacks) are carried through untouched
    if ("process_graph" in value) {
        return {kind: "literal", value};
    }

    const entries: Record<string, ArgumentValue> = {};
    for (const [key, entry] of Object.entries(value)) {
        entries[key] = classifyArgument(entry, nodeId, [...path, key], issues);
    }
    return {kind: "object", entries};
}

/**
 * Returns the literal value of an argument if it holds no references.
 */
export function literalValue(argument: ArgumentValue): { value: JsonValue } | undefined {
    switch (argument.kind) {
        case "literal":
            return {value: argument.value};
        case "array": {
            const items: JsonValue[] = [];
            for (const item of argument.items) {
                const resolved = literalValue(item);
                if (!resolved) return undefined;
                items.push(resolved.value);
            }
            return {value: items};
        }
        case "object": {
            const entries: Record<string, JsonValue> = {};
            for (const [key, entry] of Object.entries(argument.entries)) {
                const resolved = literalValue(entry);
                if (!resolved) return undefined;
                entries[key] = resolved.value;
            }
            return {value: entries};
        }
        case "node":
        case "parameter":
            return undefined;
    }
}

function collectParameterReferences(argument: ArgumentValue, into: Set<string>): void {
    switch (argument.kind) {
        case "parameter":
            into.add(argument.name);
            break;
        case "array":
            argument.items.forEach((item) => collectParameterReferences(item, into));
            break;
        case "object":
            Object.values(argument.entries).forEach((entry) => collectParameterReferences(entry, into));
            break;
        case "literal":
        case "node":
            break;
    }
}

/**
 * Checks a node's process id and arguments against the catalog.
 */
function checkAgainstCatalog(
    node: ProcessNode,
    nodes: ReadonlyMap<string, ProcessNode>,
    catalog: ProcessCatalog,
    issues: ValidationIssue[],
    warnings: string[],
): void {
    const definition = catalog.lookup(node.processId);
    if (!definition) {
        issues.push({
            kind: "UnknownProcess",
            message: `Node '${node.id}' invokes unknown process '${node.processId}'`,
            nodeId: node.id,
            processId: node.processId,
        });
        return;
    }

    if (definition.deprecated) {
        warnings.push(`Node '${node.id}' invokes deprecated process '${definition.id}'`);
    }

    const declared = new Map(definition.parameters.map((parameter) => [parameter.name, parameter]));

    for (const name of Object.keys(node.arguments)) {
        if (!declared.has(name)) {
            issues.push({
                kind: "SchemaViolation",
                message: `Node '${node.id}' passes argument '${name}', which process '${definition.id}' does not declare`,
                nodeId: node.id,
                processId: definition.id,
                parameter: name,
            });
        }
    }

    for (const parameter of definition.parameters) {
        const argument = node.arguments[parameter.name];
        if (argument === undefined) {
            if (!parameter.optional) {
                issues.push({
                    kind: "SchemaViolation",
                    message: `Node '${node.id}' is missing required argument '${parameter.name}' of process '${definition.id}'`,
                    nodeId: node.id,
                    processId: definition.id,
                    parameter: parameter.name,
                });
            }
            continue;
        }

        const literal = literalValue(argument);
        if (literal) {
            if (literal.value === null && parameter.optional) continue;
            const check = compileSchema(parameter.schema).safeParse(literal.value);
            if (!check.success) {
                for (const problem of check.error.issues) {
                    const location = [parameter.name, ...problem.path].join(".");
                    issues.push({
                        kind: "SchemaViolation",
                        message: `Node '${node.id}' argument '${location}': ${problem.message}`,
                        nodeId: node.id,
                        processId: definition.id,
                        parameter: parameter.name,
                    });
                }
            }
            continue;
        }

        if (argument.kind === "node") {
            const source = nodes.get(argument.nodeId);
            const producer = source ? catalog.lookup(source.processId) : undefined;
            if (producer) {
                const compatibility = validateSchemaCompatibility(producer.returns.schema, parameter.schema);
                if (!compatibility.compatible) {
                    warnings.push(
                        `Connection from '${argument.nodeId}' to '${node.id}.${parameter.name}': ` +
                        `'${producer.id}' returns ${describeSchema(producer.returns.schema)} but ` +
                        `'${definition.id}' expects ${describeSchema(parameter.schema)}`,
                    );
                }
            }
        }
    }
}

/**
 * Parses and validates a process graph document.
 *
 * Validation never stops at the first problem: every malformed node, the
 * result node count, dangling references, cycles and (with a catalog) unknown
 * processes and argument mismatches are all reported together.
 *
 * @param document - JSON text, a node map, or a `{process_graph}` envelope
 * @param options - Catalog and enclosing parameter declarations
 */
export function parseProcessGraph(document: unknown, options: ParseOptions = {}): ParseResult {
    const issues: ValidationIssue[] = [];
    const warnings: string[] = [];

    const raw = unwrapDocument(document, issues);
    if (!raw) {
        return {issues, warnings};
    }

    const nodes = new Map<string, ProcessNode>();
    const resultNodes: string[] = [];

    for (const [id, body] of Object.entries(raw)) {
        if (!isPlainObject(body)) {
            issues.push({kind: "MalformedGraph", message: `Node '${id}' must be an object`, nodeId: id});
            continue;
        }

        // result flags count even on otherwise malformed nodes
        if (body.result === true) {
            resultNodes.push(id);
        }

        const reserved: (string | number)[][] = [];
        findReservedKeys(body.arguments, ["arguments"], reserved);
        if (reserved.length > 0) {
            for (const path of reserved) {
                issues.push({
                    kind: "MalformedGraph",
                    message: `Node '${id}' uses the reserved key '${path[path.length - 1]}' at '${path.join(".")}'`,
                    nodeId: id,
                    path,
                });
            }
            continue;
        }

        const parsed = nodeDocumentSchema.safeParse(body);
        if (!parsed.success) {
            for (const problem of parsed.error.issues) {
                const field = problem.path.join(".");
                issues.push({
                    kind: "MalformedGraph",
                    message: `Node '${id}' is malformed at '${field}': ${problem.message}`,
                    nodeId: id,
                    path: problem.path,
                });
            }
            continue;
        }

        nodes.set(id, buildNode(id, parsed.data, issues));
    }

    if (resultNodes.length === 0) {
        issues.push({
            kind: "AmbiguousOrMissingResult",
            message: "Process graph has no result node",
            nodeIds: [],
        });
    } else if (resultNodes.length > 1) {
        issues.push({
            kind: "AmbiguousOrMissingResult",
            message: `Process graph has ${resultNodes.length} result nodes: ${resultNodes.join(", ")}`,
            nodeIds: resultNodes,
        });
    }

    const resolution = resolveDependencies(nodes, new Set(Object.keys(raw)));
    issues.push(...resolution.issues);

    if (options.parameters) {
        const declared = new Set(options.parameters.map((parameter) => parameter.name));
        for (const node of nodes.values()) {
            const referenced = new Set<string>();
            Object.values(node.arguments).forEach((argument) => collectParameterReferences(argument, referenced));
            for (const name of referenced) {
                if (!declared.has(name)) {
                    issues.push({
                        kind: "DanglingReference",
                        message: `Node '${node.id}' references parameter '${name}', which is not declared`,
                        nodeId: node.id,
                        parameter: name,
                    });
                }
            }
        }
    }

    if (options.catalog) {
        for (const node of nodes.values()) {
            checkAgainstCatalog(node, nodes, options.catalog, issues, warnings);
        }
    }

    if (issues.length > 0) {
        return {issues, warnings};
    }

    const graph: ProcessGraph = Object.freeze({
        nodes,
        resultNodeId: resultNodes[0],
        order: Object.freeze(resolution.order),
    });
    return {graph, issues, warnings};
}

function buildNode(id: string, body: NodeDocument, issues: ValidationIssue[]): ProcessNode {
    const args: Record<string, ArgumentValue> = {};
    for (const [name, value] of Object.entries(body.arguments)) {
        args[name] = classifyArgument(value, id, ["arguments", name], issues);
    }

    return deepFreeze({
        id,
        processId: body.process_id,
        arguments: args,
        result: body.result === true,
        ...(typeof body.description === "string" ? {description: body.description} : {}),
    });
}
