/**
 * @file config.ts
 * @description Evaluation options and their defaults.
 */

import {z} from "zod";

export const evaluationOptionsSchema = z.object({
    /**
     * Whether independent nodes may run at the same time
     */
    parallel: z.boolean().default(true),
    /**
     * Maximum number of nodes running at once when `parallel` is set
     */
    maxConcurrency: z.number().int().positive().default(10),
    /**
     * Maximum nesting of user-defined process invocations
     */
    maxRecursionDepth: z.number().int().positive().default(16),
    /**
     * Whether process return values are checked against their declared schema
     */
    validateReturns: z.boolean().default(true),
});

export type EvaluationOptions = z.output<typeof evaluationOptionsSchema>;

/**
 * Options as accepted from callers; every field is optional.
 */
export type EvaluationOptionsInput = z.input<typeof evaluationOptionsSchema>;

/**
 * Applies defaults and checks the given options.
 * @throws Error describing every invalid option
 */
export function resolveEvaluationOptions(options: EvaluationOptionsInput = {}): EvaluationOptions {
    const parsed = evaluationOptionsSchema.safeParse(options);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Invalid evaluation options: ${problems.join("; ")}`);
    }
    return parsed.data;
}
