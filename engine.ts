/**
 * @file engine.ts
 * @description Public entrypoints: validate a process graph, or evaluate it.
 */

import {bindExternalParameters} from "./binder.js";
import {resolveEvaluationOptions, type EvaluationOptions, type EvaluationOptionsInput} from "./config.js";
import {GraphValidationError, ProcessGraphError, type ValidationIssue} from "./errors.js";
import {ErrorEvent, LogEvent, type EvaluationEvent} from "./events.js";
import {ProcessGraphRunnable} from "./graph.js";
import {measure} from "./helpers.js";
import {createFunctionInvoker} from "./invoker.js";
import {parseProcessGraph} from "./parser.js";
import {mathImplementations, mathProcesses} from "./processes/math.js";
import {ProcessRegistry} from "./registry.js";
import type {ParameterDefinition, ProcessInvoker} from "./types.js";

/**
 * Outcome of {@link ProcessGraphEngine.validate}
 */
export type ValidationReport = {
    valid: boolean;
    /**
     * Every structural issue found; empty when the graph is valid.
     */
    errors: ValidationIssue[];
    warnings: string[];
};

/**
 * Outcome of {@link ProcessGraphEngine.evaluate}
 */
export type EvaluationOutcome =
    | { ok: true; value: unknown; events: EvaluationEvent[] }
    | { ok: false; error: ProcessGraphError; events: EvaluationEvent[] };

/**
 * Configuration options for a ProcessGraphEngine
 */
export type EngineOptions = {
    /**
     * Available processes. Defaults to a sealed registry of the arithmetic built-ins.
     */
    registry?: ProcessRegistry;
    /**
     * Runs built-in processes. Defaults to the arithmetic implementations.
     */
    invoker?: ProcessInvoker;
    evaluation?: EvaluationOptionsInput;
};

/**
 * Who is evaluating and under which parameter declarations.
 */
export type InvocationScope = {
    /**
     * Owner key whose user-defined processes are visible.
     */
    owner?: string;
    /**
     * Parameters the graph declares. When given, supplied parameters are bound
     * and checked against them and parameter references are checked at validation.
     */
    declarations?: readonly ParameterDefinition[];
    /**
     * Cancels the evaluation; running nodes see it through their invocation signal.
     */
    signal?: AbortSignal;
};

/**
 * Validates and evaluates process graphs against a registry and an invoker.
 */
export class ProcessGraphEngine {
    readonly registry: ProcessRegistry;
    readonly invoker: ProcessInvoker;
    readonly options: EvaluationOptions;

    constructor(options: EngineOptions = {}) {
        this.registry = options.registry ?? ProcessRegistry.withBuiltins(mathProcesses).seal();
        this.invoker = options.invoker ?? createFunctionInvoker(mathImplementations);
        this.options = resolveEvaluationOptions(options.evaluation);
    }

    /**
     * Validates a document without evaluating it.
     * @param document - JSON text, a node map, or a `{process_graph}` envelope
     */
    validate(document: unknown, scope: InvocationScope = {}): ValidationReport {
        const {issues, warnings} = parseProcessGraph(document, {
            catalog: this.registry.snapshot(scope.owner),
            parameters: scope.declarations,
        });
        return {valid: issues.length === 0, errors: issues, warnings};
    }

    /**
     * Validates and evaluates a document, yielding events as nodes complete.
     *
     * While running, the stream listens for `abort` on `scope.signal`. A
     * consumer that stops before the stream is done must call `return()` on
     * it to detach that listener.
     *
     * @param document - JSON text, a node map, or a `{process_graph}` envelope
     * @param parameters - External parameter values
     * @returns The output of the result node
     * @throws GraphValidationError when the document is structurally invalid
     */
    async *stream(
        document: unknown,
        parameters: Record<string, unknown> = {},
        scope: InvocationScope = {},
    ): AsyncGenerator<EvaluationEvent, unknown, void> {
        // Registry changes made from here on do not reach this evaluation
        const catalog = this.registry.snapshot(scope.owner);

        const {result: parsed, event} = measure(
            "validate",
            () => parseProcessGraph(document, {catalog, parameters: scope.declarations}),
            {runnableName: "process_graph"},
        );
        yield event;
        for (const warning of parsed.warnings) {
            yield new LogEvent("warn", warning, {runnableName: "process_graph"});
        }

        const {graph} = parsed;
        if (!graph) {
            const error = new GraphValidationError(parsed.issues);
            yield new ErrorEvent(error, {runnableName: "process_graph"});
            throw error;
        }

        let bound = parameters;
        if (scope.declarations) {
            try {
                bound = bindExternalParameters("process_graph", scope.declarations, parameters);
            } catch (error) {
                if (error instanceof Error) {
                    yield new ErrorEvent(error, {runnableName: "process_graph"});
                }
                throw error;
            }
        }

        const controller = new AbortController();
        const {signal} = scope;
        const forwardAbort = () => controller.abort(signal?.reason);
        if (signal?.aborted) {
            forwardAbort();
        }
        signal?.addEventListener("abort", forwardAbort, {once: true});

        const runnable = new ProcessGraphRunnable({
            catalog,
            invoker: this.invoker,
            evaluation: this.options,
            abortController: controller,
        });
        try {
            return yield* runnable.invoke({graph, parameters: bound, declarations: scope.declarations});
        } finally {
            signal?.removeEventListener("abort", forwardAbort);
        }
    }

    /**
     * Validates and evaluates a document.
     *
     * Graph errors, structural or at run time, resolve to `{ok: false}`;
     * anything else rejects.
     */
    async evaluate(
        document: unknown,
        parameters: Record<string, unknown> = {},
        scope: InvocationScope = {},
    ): Promise<EvaluationOutcome> {
        const events: EvaluationEvent[] = [];
        const iterator = this.stream(document, parameters, scope);
        try {
            let step = await iterator.next();
            while (!step.done) {
                events.push(step.value);
                step = await iterator.next();
            }
            return {ok: true, value: step.value, events};
        } catch (error) {
            if (error instanceof ProcessGraphError) {
                return {ok: false, error, events};
            }
            throw error;
        }
    }
}

let defaultEngine: ProcessGraphEngine | undefined;

function engineFor(engine: ProcessGraphEngine | undefined): ProcessGraphEngine {
    if (engine) return engine;
    defaultEngine ??= new ProcessGraphEngine();
    return defaultEngine;
}

/**
 * Validates a document against the given engine, or the arithmetic built-ins.
 * @returns Every issue found; empty when the graph is valid
 */
export function validate(
    document: unknown,
    scope: InvocationScope & { engine?: ProcessGraphEngine } = {},
): ValidationReport {
    return engineFor(scope.engine).validate(document, scope);
}

/**
 * Evaluates a document on the given engine, or the arithmetic built-ins.
 */
export function evaluate(
    document: unknown,
    parameters: Record<string, unknown> = {},
    scope: InvocationScope & { engine?: ProcessGraphEngine } = {},
): Promise<EvaluationOutcome> {
    return engineFor(scope.engine).evaluate(document, parameters, scope);
}
