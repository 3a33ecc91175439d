/**
 * @file registry.ts
 * @description Registry of built-in and user-defined process definitions.
 */

import {z} from "zod";
import {GraphValidationError, ProcessDefinitionError} from "./errors.js";
import {parseProcessGraph} from "./parser.js";
import {jsonValueSchema, processSchemaSchema} from "./schema-validator.js";
import type {
    BuiltinProcessDefinition,
    ProcessCatalog,
    ProcessDefinition,
    ProcessGraphDocument,
    UserDefinedProcessDefinition,
} from "./types.js";

const parameterSchema = z.object({
    name: z.string().regex(/^\w+$/, "Parameter names may only contain letters, digits and underscores"),
    description: z.string().optional(),
    schema: processSchemaSchema,
    optional: z.boolean().default(false),
    default: jsonValueSchema.optional(),
});

const processMetadataSchema = z.object({
    id: z.string().regex(/^\w+$/, "Process ids may only contain letters, digits and underscores"),
    summary: z.string().optional(),
    description: z.string().optional(),
    categories: z.array(z.string()).default([]),
    parameters: z.array(parameterSchema).default([]),
    returns: z.object({
        description: z.string().optional(),
        schema: processSchemaSchema,
    }).default({schema: {}}),
    deprecated: z.boolean().default(false),
    experimental: z.boolean().default(false),
});

const nodeDocumentShape = z.object({
    process_id: z.string(),
    arguments: z.record(jsonValueSchema),
    result: z.boolean().optional(),
    description: z.string().optional(),
});

const userDefinedProcessSchema = processMetadataSchema.extend({
    process_graph: z.record(nodeDocumentShape),
});

/**
 * Built-in definition as accepted by {@link ProcessRegistry.registerBuiltin}.
 */
export type BuiltinProcessInput = z.input<typeof processMetadataSchema>;

/**
 * User-defined definition as accepted by {@link ProcessRegistry.register}.
 */
export type UserDefinedProcessInput = z.input<typeof userDefinedProcessSchema>;

function parseDefinition<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        const id = typeof input === "object" && input !== null && "id" in input ? String(input.id) : "<unknown>";
        throw new ProcessDefinitionError(
            id,
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "definition"}: ${issue.message}`),
        );
    }
    return parsed.data;
}

function checkParameterNames(definition: ProcessDefinition): void {
    const seen = new Set<string>();
    const duplicates = definition.parameters
        .map((parameter) => parameter.name)
        .filter((name) => seen.has(name) || !seen.add(name));
    if (duplicates.length > 0) {
        throw new ProcessDefinitionError(definition.id, duplicates.map((name) => `parameter '${name}' is declared twice`));
    }
}

function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        Object.values(value).forEach(deepFreeze);
    }
    return value;
}

/**
 * Immutable view of the registry taken at one point in time.
 */
class CatalogSnapshot implements ProcessCatalog {
    readonly #definitions: ReadonlyMap<string, ProcessDefinition>;

    constructor(definitions: Map<string, ProcessDefinition>) {
        this.#definitions = definitions;
    }

    lookup(processId: string): ProcessDefinition | undefined {
        return this.#definitions.get(processId);
    }

    has(processId: string): boolean {
        return this.#definitions.has(processId);
    }

    list(): ProcessDefinition[] {
        return [...this.#definitions.values()];
    }
}

/**
 * Registry of available processes.
 *
 * Built-ins are registered at startup and frozen by {@link seal}. User-defined
 * processes are scoped to an owner key and may change between evaluations;
 * evaluations work on a {@link snapshot} so changes never reach a running graph.
 * Lookups for an owner prefer that owner's own definitions over built-ins.
 */
export class ProcessRegistry implements ProcessCatalog {
    readonly #builtins = new Map<string, BuiltinProcessDefinition>();
    readonly #userDefined = new Map<string, Map<string, UserDefinedProcessDefinition>>();
    #sealed = false;

    /**
     * Creates a registry with the given built-ins already registered.
     */
    static withBuiltins(definitions: readonly BuiltinProcessInput[]): ProcessRegistry {
        const registry = new ProcessRegistry();
        for (const definition of definitions) {
            registry.registerBuiltin(definition);
        }
        return registry;
    }

    get sealed(): boolean {
        return this.#sealed;
    }

    /**
     * Registers a built-in process.
     * @throws Error after {@link seal}, or when the id is taken
     * @throws ProcessDefinitionError when the definition is malformed
     */
    registerBuiltin(input: BuiltinProcessInput): BuiltinProcessDefinition {
        if (this.#sealed) {
            throw new Error(`Cannot register built-in process '${input.id}': built-ins are sealed`);
        }
        const definition: BuiltinProcessDefinition = {
            kind: "builtin",
            ...parseDefinition(processMetadataSchema, input),
        };
        checkParameterNames(definition);
        if (this.#builtins.has(definition.id)) {
            throw new Error(`Built-in process '${definition.id}' is already registered`);
        }
        this.#builtins.set(definition.id, deepFreeze(definition));
        return definition;
    }

    /**
     * Freezes the set of built-ins.
     */
    seal(): this {
        this.#sealed = true;
        return this;
    }

    /**
     * Registers a user-defined process for an owner.
     * @throws Error when the owner already has a process with this id
     * @throws ProcessDefinitionError when the definition is malformed
     * @throws GraphValidationError when its process graph is invalid
     */
    register(owner: string, input: UserDefinedProcessInput): UserDefinedProcessDefinition {
        const definition = this.#prepare(owner, input);
        const owned = this.#userDefined.get(owner) ?? new Map<string, UserDefinedProcessDefinition>();
        if (owned.has(definition.id)) {
            throw new Error(`Process '${definition.id}' is already defined by '${owner}'`);
        }
        owned.set(definition.id, definition);
        this.#userDefined.set(owner, owned);
        return definition;
    }

    /**
     * Replaces a user-defined process of an owner.
     * @throws Error when the owner has no process with this id
     */
    update(owner: string, processId: string, input: UserDefinedProcessInput): UserDefinedProcessDefinition {
        const owned = this.#userDefined.get(owner);
        if (!owned?.has(processId)) {
            throw new Error(`Process '${processId}' is not defined by '${owner}'`);
        }
        if (input.id !== processId) {
            throw new Error(`Cannot change the id of process '${processId}' to '${input.id}'`);
        }
        const definition = this.#prepare(owner, input);
        owned.set(processId, definition);
        return definition;
    }

    /**
     * Removes a user-defined process of an owner.
     * @returns Whether a process was removed
     */
    remove(owner: string, processId: string): boolean {
        const owned = this.#userDefined.get(owner);
        if (!owned) {
            return false;
        }
        const removed = owned.delete(processId);
        if (owned.size === 0) {
            this.#userDefined.delete(owner);
        }
        return removed;
    }

    /**
     * Looks up a process, preferring the owner's definitions over built-ins.
     */
    lookup(processId: string, owner?: string): ProcessDefinition | undefined {
        const owned = owner === undefined ? undefined : this.#userDefined.get(owner)?.get(processId);
        return owned ?? this.#builtins.get(processId);
    }

    has(processId: string, owner?: string): boolean {
        return this.lookup(processId, owner) !== undefined;
    }

    /**
     * Lists built-ins plus, when an owner is given, that owner's processes.
     */
    list(owner?: string): ProcessDefinition[] {
        return [...this.#catalogFor(owner).values()];
    }

    /**
     * Takes an immutable view of what the owner can see right now.
     */
    snapshot(owner?: string): ProcessCatalog {
        return new CatalogSnapshot(this.#catalogFor(owner));
    }

    #catalogFor(owner: string | undefined): Map<string, ProcessDefinition> {
        const catalog = new Map<string, ProcessDefinition>(this.#builtins);
        if (owner !== undefined) {
            for (const [id, definition] of this.#userDefined.get(owner) ?? []) {
                catalog.set(id, definition);
            }
        }
        return catalog;
    }

    #prepare(owner: string, input: UserDefinedProcessInput): UserDefinedProcessDefinition {
        const {process_graph: processGraph, ...metadata} = parseDefinition(userDefinedProcessSchema, input);
        const definition: UserDefinedProcessDefinition = {
            kind: "user-defined",
            owner,
            ...metadata,
            processGraph: processGraph satisfies ProcessGraphDocument,
        };
        checkParameterNames(definition);

        // The process may call itself, so it is visible while its own graph is checked
        const catalog = this.#catalogFor(owner);
        catalog.set(definition.id, definition);
        const {issues} = parseProcessGraph(processGraph, {
            catalog: new CatalogSnapshot(catalog),
            parameters: definition.parameters,
        });
        if (issues.length > 0) {
            throw new GraphValidationError(issues);
        }

        return deepFreeze(definition);
    }
}
