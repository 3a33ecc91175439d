/**
 * @file binder.ts
 * @description Binds supplied values to declared process parameters and
 *              checks argument and return values against declared schemas.
 */

import type {z} from "zod";
import {
    SchemaViolationError,
    UnboundParameterError,
    type SchemaViolation,
} from "./errors.js";
import {compileSchema} from "./schema-validator.js";
import type {ParameterDefinition, ProcessDefinition, ProcessSchema} from "./types.js";

/**
 * Outcome of binding values to parameter declarations
 */
export type BindingResult = {
    /**
     * Supplied values plus defaults for absent optional parameters.
     */
    values: Record<string, unknown>;
    violations: SchemaViolation[];
    /**
     * Non-optional parameters without a value or default.
     */
    missing: string[];
};

// Declarations are immutable once registered, so compiled schemas can be shared
const compiledSchemas = new WeakMap<ProcessSchema, z.ZodTypeAny>();

function compiled(schema: ProcessSchema): z.ZodTypeAny {
    let zodSchema = compiledSchemas.get(schema);
    if (!zodSchema) {
        zodSchema = compileSchema(schema);
        compiledSchemas.set(schema, zodSchema);
    }
    return zodSchema;
}

/**
 * Checks one value against a schema.
 * @param label - Parameter name, or "return"
 */
export function checkValue(schema: ProcessSchema, value: unknown, label: string): SchemaViolation[] {
    const result = compiled(schema).safeParse(value);
    if (result.success) {
        return [];
    }
    return result.error.issues.map((issue) => ({
        parameter: label,
        path: issue.path,
        message: issue.message,
    }));
}

/**
 * Binds supplied values to parameter declarations, reporting every problem.
 *
 * Values for undeclared names are violations. Absent optional parameters take
 * their declared default; `null` is accepted for any optional parameter.
 */
export function bindParameters(
    declarations: readonly ParameterDefinition[],
    supplied: Record<string, unknown>,
): BindingResult {
    const values: Record<string, unknown> = {};
    const violations: SchemaViolation[] = [];
    const missing: string[] = [];
    const declared = new Set(declarations.map((declaration) => declaration.name));

    for (const name of Object.keys(supplied)) {
        if (!declared.has(name)) {
            violations.push({parameter: name, path: [], message: "Parameter is not declared"});
        }
    }

    for (const declaration of declarations) {
        const value = supplied[declaration.name];
        if (value === undefined) {
            if (declaration.default !== undefined) {
                values[declaration.name] = structuredClone(declaration.default);
            } else if (!declaration.optional) {
                missing.push(declaration.name);
            }
            continue;
        }

        if (!(value === null && declaration.optional)) {
            violations.push(...checkValue(declaration.schema, value, declaration.name));
        }
        values[declaration.name] = value;
    }

    return {values, violations, missing};
}

/**
 * Binds a node's resolved arguments to the parameters of the process it invokes.
 * @throws SchemaViolationError listing every violation, missing parameters included
 */
export function bindArguments(
    definition: ProcessDefinition,
    args: Record<string, unknown>,
    nodeId?: string,
): Record<string, unknown> {
    const {values, violations, missing} = bindParameters(definition.parameters, args);
    const all = [
        ...missing.map((name) => ({parameter: name, path: [], message: "Required parameter is missing"})),
        ...violations,
    ];
    if (all.length > 0) {
        throw new SchemaViolationError("argument", definition.id, all, nodeId);
    }
    return values;
}

/**
 * Binds the external parameters of a graph invocation.
 * @throws SchemaViolationError when a supplied value is invalid or undeclared
 * @throws UnboundParameterError when required parameters are missing
 */
export function bindExternalParameters(
    processId: string,
    declarations: readonly ParameterDefinition[],
    supplied: Record<string, unknown>,
): Record<string, unknown> {
    const {values, violations, missing} = bindParameters(declarations, supplied);
    if (violations.length > 0) {
        throw new SchemaViolationError("argument", processId, violations);
    }
    if (missing.length > 0) {
        throw new UnboundParameterError(missing);
    }
    return values;
}

/**
 * Checks a value produced by a process against its declared return schema.
 * @throws SchemaViolationError on mismatch
 */
export function checkReturn(definition: ProcessDefinition, value: unknown, nodeId?: string): void {
    const violations = checkValue(definition.returns.schema, value, "return");
    if (violations.length > 0) {
        throw new SchemaViolationError("return", definition.id, violations, nodeId);
    }
}
