/**
 * @file runnable.ts
 * @description Defines the base Runnable class.
 */

/**
 * Configuration options for a Runnable instance.
 */
export type RunnableOptions = {
    /**
     * An optional name for this runnable instance, used in events and identification.
     */
    name?: string;
    /**
     * An optional description of what this runnable does.
     */
    description?: string;
    /**
     * An optional AbortController to allow external cancellation.
     */
    abortController?: AbortController;
};

/**
 * Represents an operation that can be executed, yielding intermediate events
 * and ultimately returning a final output.
 *
 * @template InputType - The type of the input data for the `invoke` method.
 * @template OutputType - The type of the final result returned by the `invoke` generator.
 * @template YieldType - The type of events yielded by the `invoke` generator during execution.
 */
export abstract class Runnable<InputType, OutputType, YieldType> {
    /**
     * Optional name for this runnable instance.
     */
    name?: string;

    /**
     * Optional description of what this runnable does.
     */
    description?: string;

    /**
     * AbortController for managing cancellation of the runnable's operation.
     * Implementations listen to `this.abortSignal`; external systems call `this.abortController.abort()`.
     */
    abortController: AbortController;

    /**
     * Creates an instance of a Runnable.
     * @param options - Configuration options for the Runnable.
     */
    protected constructor(options: RunnableOptions = {}) {
        this.name = options.name;
        this.description = options.description;
        this.abortController = options.abortController ?? new AbortController();
    }

    /**
     * Gets the AbortSignal associated with this Runnable's AbortController.
     */
    get abortSignal(): AbortSignal {
        return this.abortController.signal;
    }

    /**
     * Executes the runnable's logic, yielding events during execution and
     * returning the output.
     *
     * @param input - The input data for the runnable.
     * @returns An async generator.
     *          - `YieldType`: values `yield`ed during execution.
     *          - `OutputType`: the value `return`ed by the generator upon completion.
     */
    abstract invoke(input: InputType): AsyncGenerator<YieldType, OutputType, void>;

    /**
     * Convenience helper that executes {@link invoke} and returns only the final
     * result. Any yielded events are consumed and discarded.
     *
     * @param input - The input data for the runnable.
     * @returns The final output value
     */
    async run(input: InputType): Promise<OutputType> {
        const iterator = this.invoke(input)[Symbol.asyncIterator]();
        let result = await iterator.next();
        while (!result.done) {
            result = await iterator.next();
        }
        return result.value;
    }
}
