/**
 * @file invoker.ts
 * @description In-process {@link ProcessInvoker} backed by plain functions.
 */

import type {InvocationOptions, ProcessInvoker} from "./types.js";

/**
 * Implementation of a built-in process.
 */
export type ProcessFunction = (
    args: Record<string, unknown>,
    options: InvocationOptions,
) => unknown | Promise<unknown>;

/**
 * Creates an invoker that dispatches to the given functions by process id.
 * Unknown ids and thrown errors surface as rejections.
 */
export function createFunctionInvoker(implementations: Readonly<Record<string, ProcessFunction>>): ProcessInvoker {
    const table = new Map(Object.entries(implementations));
    return {
        async invoke(processId, args, options) {
            const implementation = table.get(processId);
            if (!implementation) {
                throw new Error(`No implementation registered for process '${processId}'`);
            }
            options.signal.throwIfAborted();
            return await implementation(args, options);
        },
    };
}
