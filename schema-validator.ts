/**
 * @file schema-validator.ts
 * @description Compiles declared process schemas into Zod schemas and checks
 *              compatibility between a producing and a consuming schema.
 */

import {isDeepStrictEqual} from "node:util";
import {z} from "zod";
import type {JsonValue, ProcessSchema, SchemaType} from "./types.js";

/**
 * Result of a compatibility check
 */
export type ValidationResult = {
  /**
   * Whether the schemas are compatible
   */
  compatible: boolean;
  /**
   * Array of warning messages
   */
  warnings: string[];
  /**
   * Array of error messages
   */
  errors: string[];
};

const SCHEMA_TYPES = ["string", "number", "integer", "boolean", "null", "array", "object"] as const;

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

/**
 * Shape check for a declared {@link ProcessSchema}.
 */
export const processSchemaSchema: z.ZodType<ProcessSchema> = z.lazy(() =>
  z.object({
    type: z.union([z.enum(SCHEMA_TYPES), z.array(z.enum(SCHEMA_TYPES)).min(1)]).optional(),
    subtype: z.string().optional(),
    description: z.string().optional(),
    enum: z.array(jsonValueSchema).min(1).optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    minItems: z.number().int().nonnegative().optional(),
    maxItems: z.number().int().nonnegative().optional(),
    items: processSchemaSchema.optional(),
    properties: z.record(processSchemaSchema).optional(),
    required: z.array(z.string()).optional(),
    anyOf: z.array(processSchemaSchema).min(1).optional(),
  }),
);

/**
 * Declared types of a schema, or undefined when it accepts any type.
 */
function declaredTypes(schema: ProcessSchema): SchemaType[] | undefined {
  if (schema.type === undefined) return undefined;
  return Array.isArray(schema.type) ? schema.type : [schema.type];
}

function compileType(type: SchemaType, schema: ProcessSchema): z.ZodTypeAny {
  switch (type) {
    case "string":
      return z.string();

    case "number":
    case "integer": {
      let numeric = type === "integer" ? z.number().int() : z.number();
      if (schema.minimum !== undefined) numeric = numeric.gte(schema.minimum);
      if (schema.maximum !== undefined) numeric = numeric.lte(schema.maximum);
      // NaN is a legitimate result of arithmetic on valid input
      return schema.minimum === undefined && schema.maximum === undefined
        ? z.union([numeric, z.nan()])
        : numeric;
    }

    case "boolean":
      return z.boolean();

    case "null":
      return z.null();

    case "array": {
      let array = z.array(schema.items ? compileSchema(schema.items) : z.unknown());
      if (schema.minItems !== undefined) array = array.min(schema.minItems);
      if (schema.maxItems !== undefined) array = array.max(schema.maxItems);
      return array;
    }

    case "object": {
      if (!schema.properties) {
        return z.record(z.unknown());
      }
      const required = new Set(schema.required ?? []);
      const shape: Record<string, z.ZodTypeAny> = {};
      for (const [key, property] of Object.entries(schema.properties)) {
        const compiled = compileSchema(property);
        shape[key] = required.has(key) ? compiled : compiled.optional();
      }
      return z.object(shape).passthrough();
    }
  }
}

function unionOf(schemas: z.ZodTypeAny[]): z.ZodTypeAny {
  const [first, second, ...rest] = schemas;
  if (first === undefined) return z.never();
  if (second === undefined) return first;
  return z.union([first, second, ...rest]);
}

/**
 * Compiles a declared process schema into a Zod schema that checks values.
 * @param schema - The declared schema
 * @returns A Zod schema accepting exactly the values the declaration allows
 */
export function compileSchema(schema: ProcessSchema): z.ZodTypeAny {
  if (schema.anyOf) {
    const {anyOf, ...base} = schema;
    return unionOf(anyOf.map((alternative) => compileSchema({...base, ...alternative})));
  }

  const types = declaredTypes(schema);
  let compiled = types ? unionOf(types.map((type) => compileType(type, schema))) : z.unknown();

  const allowed = schema.enum;
  if (allowed) {
    compiled = compiled.refine(
      (value) => allowed.some((candidate) => isDeepStrictEqual(candidate, value)),
      {message: `Value must be one of ${allowed.map((value) => JSON.stringify(value)).join(", ")}`},
    );
  }

  return compiled;
}

/**
 * Flattens `anyOf` alternatives into the list of schemas a value may match.
 */
function alternativesOf(schema: ProcessSchema): ProcessSchema[] {
  if (!schema.anyOf) return [schema];
  const {anyOf, ...base} = schema;
  return anyOf.flatMap((alternative) => alternativesOf({...base, ...alternative}));
}

/**
 * Checks if two basic types are compatible
 * @param outputType - The produced type
 * @param inputType - The accepted type
 */
function areBasicTypesCompatible(outputType: SchemaType, inputType: SchemaType): boolean {
  if (outputType === inputType) {
    return true;
  }
  // Every integer is a number; numbers may still happen to be integral
  return (outputType === "integer" && inputType === "number") ||
    (outputType === "number" && inputType === "integer");
}

function validateAlternativeCompatibility(
  output: ProcessSchema,
  input: ProcessSchema
): ValidationResult {
  const result: ValidationResult = {compatible: true, warnings: [], errors: []};

  if (output.subtype && input.subtype && output.subtype !== input.subtype) {
    result.errors.push(`Subtype '${output.subtype}' is not compatible with '${input.subtype}'`);
    result.compatible = false;
    return result;
  }

  const outputTypes = declaredTypes(output);
  const inputTypes = declaredTypes(input);

  if (outputTypes && inputTypes) {
    const matching = outputTypes.filter((outputType) =>
      inputTypes.some((inputType) => areBasicTypesCompatible(outputType, inputType)),
    );
    if (matching.length === 0) {
      result.errors.push(
        `Incompatible types: output type '${outputTypes.join("|")}' is not compatible with input type '${inputTypes.join("|")}'`,
      );
      result.compatible = false;
      return result;
    }
    if (matching.length < outputTypes.length) {
      result.warnings.push(
        `Output may be of type '${outputTypes.filter((type) => !matching.includes(type)).join("|")}', which the input does not accept`,
      );
    }

    if (matching.includes("array") && output.items && input.items) {
      const items = validateSchemaCompatibility(output.items, input.items);
      if (!items.compatible) {
        result.errors.push(`Array element type incompatibility: ${items.errors.join(", ")}`);
        result.compatible = false;
      }
      result.warnings.push(...items.warnings);
    }
  }

  if (output.enum && input.enum) {
    const inputEnum = input.enum;
    const common = output.enum.filter((value) => inputEnum.some((candidate) => isDeepStrictEqual(candidate, value)));
    if (common.length === 0) {
      result.errors.push("Output and input enums have no common values");
      result.compatible = false;
    } else if (common.length < output.enum.length) {
      result.warnings.push("Output and input enums contain different sets of values");
    }
  }

  return result;
}

/**
 * Checks whether values described by `output` can be passed where `input` is
 * declared. Compatibility is optimistic: the check fails only when no value
 * could satisfy both schemas, and partial overlaps are reported as warnings.
 * @param output - Schema of the producing process's return value
 * @param input - Schema of the consuming parameter
 */
export function validateSchemaCompatibility(
  output: ProcessSchema,
  input: ProcessSchema
): ValidationResult {
  const result: ValidationResult = {compatible: true, warnings: [], errors: []};
  const outputAlternatives = alternativesOf(output);
  const inputAlternatives = alternativesOf(input);

  const compatibleOutputs = outputAlternatives.filter((outputAlternative) =>
    inputAlternatives.some((inputAlternative) => {
      const check = validateAlternativeCompatibility(outputAlternative, inputAlternative);
      if (check.compatible) {
        result.warnings.push(...check.warnings);
      }
      return check.compatible;
    }),
  );

  if (compatibleOutputs.length === 0) {
    result.compatible = false;
    for (const outputAlternative of outputAlternatives) {
      for (const inputAlternative of inputAlternatives) {
        result.errors.push(...validateAlternativeCompatibility(outputAlternative, inputAlternative).errors);
      }
    }
  }

  result.warnings = [...new Set(result.warnings)];
  result.errors = [...new Set(result.errors)];
  return result;
}

/**
 * Short human-readable description of a schema.
 */
export function describeSchema(schema: ProcessSchema): string {
  if (schema.anyOf) {
    return alternativesOf(schema).map(describeSchema).join(" | ");
  }
  if (schema.enum) {
    return schema.enum.map((value) => JSON.stringify(value)).join(" | ");
  }
  const types = declaredTypes(schema);
  if (!types) {
    return schema.subtype ?? "any";
  }
  return types
    .map((type) => {
      if (type === "array" && schema.items) return `array of ${describeSchema(schema.items)}`;
      if (schema.subtype) return `${type} (${schema.subtype})`;
      return type;
    })
    .join(" | ");
}
