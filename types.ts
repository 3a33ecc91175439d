/**
 * @file types.ts
 * @description Core data model for process graphs, process definitions and evaluation state.
 */

/**
 * A JSON value as it appears in a process graph document.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Value kinds understood by {@link ProcessSchema}.
 */
export type SchemaType = "string" | "number" | "integer" | "boolean" | "null" | "array" | "object";

/**
 * Subset of JSON Schema used to declare process parameters and return values.
 * An empty schema accepts any value.
 */
export type ProcessSchema = {
    type?: SchemaType | SchemaType[];
    /**
     * Informational data type hint such as "raster-cube" or "bounding-box".
     */
    subtype?: string;
    description?: string;
    enum?: JsonValue[];
    minimum?: number;
    maximum?: number;
    minItems?: number;
    maxItems?: number;
    items?: ProcessSchema;
    properties?: Record<string, ProcessSchema>;
    required?: string[];
    /**
     * The value must match at least one of the alternatives.
     */
    anyOf?: ProcessSchema[];
};

/**
 * Declaration of one process parameter.
 */
export type ParameterDefinition = {
    name: string;
    description?: string;
    schema: ProcessSchema;
    optional: boolean;
    default?: JsonValue;
};

/**
 * Declaration of what a process returns.
 */
export type ReturnDefinition = {
    description?: string;
    schema: ProcessSchema;
};

type ProcessMetadata = {
    id: string;
    summary?: string;
    description?: string;
    categories: string[];
    parameters: ParameterDefinition[];
    returns: ReturnDefinition;
    deprecated: boolean;
    experimental: boolean;
};

/**
 * A process implemented natively and invoked through a {@link ProcessInvoker}.
 */
export type BuiltinProcessDefinition = ProcessMetadata & {
    kind: "builtin";
};

/**
 * A process whose body is itself a process graph.
 */
export type UserDefinedProcessDefinition = ProcessMetadata & {
    kind: "user-defined";
    /**
     * Opaque key of the identity that owns this definition.
     */
    owner: string;
    processGraph: ProcessGraphDocument;
};

export type ProcessDefinition = BuiltinProcessDefinition | UserDefinedProcessDefinition;

/**
 * Wire shape of a single node body.
 */
export type ProcessNodeDocument = {
    process_id: string;
    arguments: Record<string, JsonValue>;
    result?: boolean;
    description?: string;
};

/**
 * Wire shape of a process graph: node id to node body.
 */
export type ProcessGraphDocument = Record<string, ProcessNodeDocument>;

/**
 * An argument after classification. References may appear at any depth
 * inside arrays and objects; literals hold scalars and opaque values such as
 * child process graphs.
 */
export type ArgumentValue =
    | { kind: "literal"; value: JsonValue }
    | { kind: "array"; items: ArgumentValue[] }
    | { kind: "object"; entries: Record<string, ArgumentValue> }
    | { kind: "node"; nodeId: string }
    | { kind: "parameter"; name: string };

/**
 * A validated node.
 */
export type ProcessNode = {
    readonly id: string;
    readonly processId: string;
    readonly arguments: Readonly<Record<string, ArgumentValue>>;
    readonly result: boolean;
    readonly description?: string;
};

/**
 * A validated, immutable process graph.
 */
export type ProcessGraph = {
    readonly nodes: ReadonlyMap<string, ProcessNode>;
    readonly resultNodeId: string;
    /**
     * Topological order: every node appears after the nodes it references.
     */
    readonly order: readonly string[];
};

/**
 * Lifecycle of a node during one evaluation.
 */
export type NodeState = "pending" | "ready" | "running" | "done" | "failed" | "skipped";

/**
 * Read-only view of the processes available to one evaluation.
 */
export interface ProcessCatalog {
    lookup(processId: string): ProcessDefinition | undefined;
    has(processId: string): boolean;
    list(): ProcessDefinition[];
}

/**
 * Options passed along with every built-in invocation.
 */
export type InvocationOptions = {
    /**
     * Aborted once the evaluation has failed and the result will be discarded.
     */
    signal: AbortSignal;
    nodeId: string;
};

/**
 * Capability that runs built-in processes. Implementations are expected to be
 * pure; timeouts are theirs to impose and report as a rejection.
 */
export interface ProcessInvoker {
    invoke(processId: string, args: Record<string, unknown>, options: InvocationOptions): Promise<unknown>;
}
