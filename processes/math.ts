/**
 * @file processes/math.ts
 * @description Arithmetic built-in processes. `null` stands for no-data and
 *              propagates through every operation.
 */

import type {ProcessFunction} from "../invoker.js";
import type {BuiltinProcessInput} from "../registry.js";
import type {ParameterDefinition, ProcessSchema} from "../types.js";

const numberOrNull: ProcessSchema = {type: ["number", "null"]};

const numberArray: ProcessSchema = {type: "array", items: numberOrNull};

const returnsNumber = {description: "The computed value, or null for no-data.", schema: numberOrNull};

function operand(name: string, description: string): ParameterDefinition {
    return {name, description, schema: numberOrNull, optional: false};
}

const ignoreNodata: ParameterDefinition = {
    name: "ignore_nodata",
    description: "Whether null values are left out of the computation. If false, any null yields null.",
    schema: {type: "boolean"},
    optional: true,
    default: true,
};

function reducer(id: string, summary: string): BuiltinProcessInput {
    return {
        id,
        summary,
        categories: ["math", "reducer"],
        parameters: [
            {name: "data", description: "An array of numbers.", schema: numberArray, optional: false},
            ignoreNodata,
        ],
        returns: returnsNumber,
    };
}

function binary(id: string, summary: string): BuiltinProcessInput {
    return {
        id,
        summary,
        categories: ["math"],
        parameters: [operand("x", "The first operand."), operand("y", "The second operand.")],
        returns: returnsNumber,
    };
}

/**
 * Definitions of the arithmetic built-ins.
 */
export const mathProcesses: readonly BuiltinProcessInput[] = [
    {
        id: "absolute",
        summary: "Absolute value",
        categories: ["math"],
        parameters: [operand("x", "A number.")],
        returns: returnsNumber,
    },
    binary("add", "Addition of two numbers"),
    binary("subtract", "Subtraction of two numbers"),
    binary("multiply", "Multiplication of two numbers"),
    binary("divide", "Division of two numbers"),
    reducer("sum", "Compute the sum by adding up numbers"),
    reducer("product", "Compute the product by multiplying numbers"),
    reducer("min", "Minimum value"),
    reducer("max", "Maximum value"),
    reducer("mean", "Arithmetic mean (average)"),
    {
        id: "clip",
        summary: "Clip a value between a minimum and a maximum",
        categories: ["math"],
        parameters: [
            operand("x", "A number."),
            {name: "min", description: "Minimum value.", schema: {type: "number"}, optional: false},
            {name: "max", description: "Maximum value.", schema: {type: "number"}, optional: false},
        ],
        returns: returnsNumber,
    },
    {
        id: "linear_scale_range",
        summary: "Linear transformation between two ranges",
        categories: ["math"],
        parameters: [
            operand("x", "A number to transform."),
            {name: "inputMin", schema: {type: "number"}, optional: false},
            {name: "inputMax", schema: {type: "number"}, optional: false},
            {name: "outputMin", schema: {type: "number"}, optional: true, default: 0},
            {name: "outputMax", schema: {type: "number"}, optional: true, default: 1},
        ],
        returns: returnsNumber,
    },
];

function numeric(args: Record<string, unknown>, name: string): number | null {
    const value = args[name];
    if (value === null || typeof value === "number") {
        return value;
    }
    throw new TypeError(`Argument '${name}' must be a number or null`);
}

function numbers(args: Record<string, unknown>): number[] | null {
    const data = args.data;
    if (!Array.isArray(data)) {
        throw new TypeError("Argument 'data' must be an array");
    }
    const ignore = args.ignore_nodata !== false;
    const values: number[] = [];
    for (const item of data) {
        if (typeof item === "number") {
            values.push(item);
        } else if (item === null) {
            if (!ignore) return null;
        } else {
            throw new TypeError("Argument 'data' must only contain numbers or null");
        }
    }
    return values;
}

function unary(fn: (x: number) => number): ProcessFunction {
    return (args) => {
        const x = numeric(args, "x");
        return x === null ? null : fn(x);
    };
}

function binaryOperator(fn: (x: number, y: number) => number): ProcessFunction {
    return (args) => {
        const x = numeric(args, "x");
        const y = numeric(args, "y");
        return x === null || y === null ? null : fn(x, y);
    };
}

function reduce(fn: (values: number[]) => number): ProcessFunction {
    return (args) => {
        const values = numbers(args);
        return values === null || values.length === 0 ? null : fn(values);
    };
}

/**
 * Implementations of the arithmetic built-ins, keyed by process id.
 */
export const mathImplementations: Readonly<Record<string, ProcessFunction>> = {
    absolute: unary(Math.abs),
    add: binaryOperator((x, y) => x + y),
    subtract: binaryOperator((x, y) => x - y),
    multiply: binaryOperator((x, y) => x * y),
    divide: binaryOperator((x, y) => x / y),
    sum: reduce((values) => values.reduce((total, value) => total + value, 0)),
    product: reduce((values) => values.reduce((total, value) => total * value, 1)),
    min: reduce((values) => values.reduce((lowest, value) => Math.min(lowest, value), Infinity)),
    max: reduce((values) => values.reduce((highest, value) => Math.max(highest, value), -Infinity)),
    mean: reduce((values) => values.reduce((total, value) => total + value, 0) / values.length),
    clip: (args) => {
        const x = numeric(args, "x");
        const min = numeric(args, "min");
        const max = numeric(args, "max");
        if (x === null || min === null || max === null) return null;
        return Math.min(max, Math.max(min, x));
    },
    linear_scale_range: (args) => {
        const x = numeric(args, "x");
        const inputMin = numeric(args, "inputMin");
        const inputMax = numeric(args, "inputMax");
        const outputMin = numeric(args, "outputMin") ?? 0;
        const outputMax = numeric(args, "outputMax") ?? 1;
        if (x === null || inputMin === null || inputMax === null) return null;
        return ((x - inputMin) / (inputMax - inputMin)) * (outputMax - outputMin) + outputMin;
    },
};
