/**
 * @file graph.ts
 * @description Evaluates a validated process graph, dispatching nodes in
 *              dependency order with bounded concurrency.
 */

import {resolveArguments} from "./arguments.js";
import {bindArguments, checkReturn} from "./binder.js";
import {resolveEvaluationOptions, type EvaluationOptions, type EvaluationOptionsInput} from "./config.js";
import {EvaluationContext} from "./context.js";
import {
    GraphValidationError,
    ProcessExecutionFailureError,
    ProcessGraphError,
    RecursionLimitExceededError,
    UnknownProcessError,
    type ValidationIssue,
} from "./errors.js";
import {ChunkEvent, ErrorEvent, LogEvent, type EvaluationEvent} from "./events.js";
import {measureAsync} from "./helpers.js";
import {parseProcessGraph} from "./parser.js";
import {buildDependencyIndex, resolveDependencies, type DependencyIndex} from "./resolver.js";
import {Runnable, type RunnableOptions} from "./runnable.js";
import type {
    BuiltinProcessDefinition,
    ParameterDefinition,
    ProcessCatalog,
    ProcessGraph,
    ProcessInvoker,
    ProcessNode,
    UserDefinedProcessDefinition,
} from "./types.js";

/**
 * One active user-defined process invocation. Frames form the call chain of a
 * sub-evaluation; the index of a frame is its nesting depth.
 */
export type EvaluationFrame = {
    depth: number;
    processId: string;
    /**
     * Node that invoked the process, in the caller's graph.
     */
    nodeId: string;
};

/**
 * Input of one graph evaluation
 */
export type GraphInvocation = {
    graph: ProcessGraph;
    /**
     * Values bound to the graph's parameters
     */
    parameters?: Record<string, unknown>;
    /**
     * Declared parameters of the graph, consulted for defaults
     */
    declarations?: readonly ParameterDefinition[];
};

/**
 * Configuration options for a ProcessGraphRunnable
 */
export type ProcessGraphRunnableOptions = RunnableOptions & {
    catalog: ProcessCatalog;
    invoker: ProcessInvoker;
    evaluation?: EvaluationOptionsInput;
    /**
     * Call chain of enclosing user-defined processes, outermost first
     */
    frames?: readonly EvaluationFrame[];
};

type NodeOutcome =
    | { nodeId: string; ok: true; value: unknown }
    | { nodeId: string; ok: false; error: Error };

function cancellation(): Error {
    return new Error("Process graph evaluation aborted");
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * A runnable that evaluates one process graph.
 *
 * Nodes move from `pending` to `ready` once every node they reference is
 * `done`, and ready nodes are dispatched in topological order while fewer than
 * `maxConcurrency` are running. After the first failure nothing new is
 * dispatched: dependents of the failed node are `skipped`, running siblings
 * are left to finish and their results discarded, and the failure is thrown.
 */
export class ProcessGraphRunnable extends Runnable<GraphInvocation, unknown, EvaluationEvent> {
    readonly #catalog: ProcessCatalog;
    readonly #invoker: ProcessInvoker;
    readonly #options: EvaluationOptions;
    readonly #frames: readonly EvaluationFrame[];

    constructor(options: ProcessGraphRunnableOptions) {
        super({...options, name: options.name ?? "process_graph"});
        this.#catalog = options.catalog;
        this.#invoker = options.invoker;
        this.#options = resolveEvaluationOptions(options.evaluation);
        this.#frames = options.frames ?? [];
    }

    /**
     * Nesting depth of this evaluation; 0 for a top-level graph.
     */
    get depth(): number {
        return this.#frames.length;
    }

    /**
     * Evaluates the graph.
     * @param input - The graph and its parameter bindings
     * @returns The output of the result node
     */
    async *invoke(input: GraphInvocation): AsyncGenerator<EvaluationEvent, unknown, void> {
        const {graph} = input;
        const metadata = {runnableName: this.name};

        try {
            this.#checkStructure(graph);
        } catch (error) {
            yield new ErrorEvent(toError(error), metadata);
            throw error;
        }

        const context = new EvaluationContext(graph, input.parameters, input.declarations);
        const index = buildDependencyIndex(graph.nodes);
        const limit = this.#options.parallel ? this.#options.maxConcurrency : 1;
        const running = new Map<string, Promise<NodeOutcome>>();
        const events: EvaluationEvent[] = [];
        const emit = (event: EvaluationEvent) => {
            events.push(event);
        };
        let failure: Error | undefined;

        yield new LogEvent("info", `Starting graph evaluation: ${this.name}`, {
            ...metadata,
            details: {
                nodes: graph.nodes.size,
                depth: this.depth,
                ...(this.description === undefined ? {} : {description: this.description}),
            },
        });

        for (;;) {
            if (!failure && this.abortSignal.aborted) {
                failure = cancellation();
            }

            if (!failure) {
                this.#markReady(graph, context, index);
                for (const nodeId of graph.order) {
                    if (running.size >= limit) break;
                    if (context.state(nodeId) !== "ready") continue;
                    const node = graph.nodes.get(nodeId);
                    if (!node) continue;
                    context.setState(nodeId, "running");
                    running.set(nodeId, this.#runNode(node, context, emit));
                }
            }

            if (running.size === 0) break;

            const outcome = await Promise.race(running.values());
            running.delete(outcome.nodeId);

            if (outcome.ok) {
                context.record(outcome.nodeId, outcome.value);
            } else {
                context.setState(outcome.nodeId, "failed");
                this.#skipDependents(outcome.nodeId, context, index);
                if (!failure) {
                    // The run aborts its own signal only after recording a failure
                    failure = this.abortSignal.aborted ? cancellation() : outcome.error;
                    this.abortController.abort(failure);
                }
            }

            yield* events.splice(0);
        }

        yield* events.splice(0);

        if (failure) {
            for (const nodeId of graph.order) {
                const state = context.state(nodeId);
                if (state === "pending" || state === "ready") {
                    context.setState(nodeId, "skipped");
                }
            }
            yield new LogEvent("error", `Graph evaluation failed: ${failure.message}`, {
                ...metadata,
                details: {states: context.states()},
            });
            yield new ErrorEvent(failure, {
                ...metadata,
                nodeId: failure instanceof ProcessGraphError ? failure.nodeId : undefined,
            });
            throw failure;
        }

        if (!context.hasOutput(graph.resultNodeId)) {
            throw new Error(`Result node '${graph.resultNodeId}' did not produce an output`);
        }

        yield new LogEvent("info", `Graph evaluation completed: ${this.name}`, {
            ...metadata,
            details: {states: context.states()},
        });

        return context.output(graph.resultNodeId);
    }

    /**
     * Re-checks the invariants validation established before anything runs.
     */
    #checkStructure(graph: ProcessGraph): void {
        const issues: ValidationIssue[] = [];
        const resultNodes = [...graph.nodes.values()].filter((node) => node.result).map((node) => node.id);
        if (resultNodes.length !== 1 || resultNodes[0] !== graph.resultNodeId) {
            issues.push({
                kind: "AmbiguousOrMissingResult",
                message: `Expected '${graph.resultNodeId}' to be the only result node, found: ${resultNodes.join(", ") || "none"}`,
                nodeIds: resultNodes,
            });
        }

        const resolution = resolveDependencies(graph.nodes);
        issues.push(...resolution.issues);

        const position = new Map(graph.order.map((id, at) => [id, at]));
        if (issues.length === 0 && (position.size !== graph.nodes.size || resolution.order.some((id) => !position.has(id)))) {
            issues.push({kind: "MalformedGraph", message: "Evaluation order does not cover every node exactly once"});
        }
        if (issues.length === 0) {
            for (const [id, dependencies] of buildDependencyIndex(graph.nodes).dependencies) {
                const at = position.get(id) ?? -1;
                const late = dependencies.find((dependency) => (position.get(dependency) ?? Infinity) > at);
                if (late !== undefined) {
                    issues.push({
                        kind: "MalformedGraph",
                        message: `Evaluation order places node '${id}' before its dependency '${late}'`,
                        nodeId: id,
                    });
                }
            }
        }

        if (issues.length > 0) {
            throw new GraphValidationError(issues);
        }
    }

    #markReady(graph: ProcessGraph, context: EvaluationContext, index: DependencyIndex): void {
        for (const nodeId of graph.order) {
            if (context.state(nodeId) !== "pending") continue;
            const dependencies = index.dependencies.get(nodeId) ?? [];
            if (dependencies.every((dependency) => context.state(dependency) === "done")) {
                context.setState(nodeId, "ready");
            }
        }
    }

    #skipDependents(nodeId: string, context: EvaluationContext, index: DependencyIndex): void {
        const stack = [...(index.dependents.get(nodeId) ?? [])];
        while (stack.length > 0) {
            const dependent = stack.pop();
            if (dependent === undefined) break;
            const state = context.state(dependent);
            if (state === "pending" || state === "ready") {
                context.setState(dependent, "skipped");
                stack.push(...(index.dependents.get(dependent) ?? []));
            }
        }
    }

    /**
     * Runs one node; never rejects.
     */
    async #runNode(
        node: ProcessNode,
        context: EvaluationContext,
        emit: (event: EvaluationEvent) => void,
    ): Promise<NodeOutcome> {
        const metadata = {runnableName: this.name, nodeId: node.id};
        emit(new LogEvent("debug", `Starting node '${node.id}' (${node.processId})`, metadata));
        try {
            const {result, event} = await measureAsync(
                `node ${node.id}`,
                () => this.#executeNode(node, context, emit),
                metadata,
            );
            emit(event);
            emit(new ChunkEvent(result, metadata));
            emit(new LogEvent("debug", `Completed node '${node.id}'`, metadata));
            return {nodeId: node.id, ok: true, value: result};
        } catch (error) {
            const failure = toError(error);
            emit(new LogEvent("error", `Node '${node.id}' failed: ${failure.message}`, metadata));
            return {nodeId: node.id, ok: false, error: failure};
        }
    }

    async #executeNode(
        node: ProcessNode,
        context: EvaluationContext,
        emit: (event: EvaluationEvent) => void,
    ): Promise<unknown> {
        const definition = this.#catalog.lookup(node.processId);
        if (!definition) {
            throw new UnknownProcessError(node.processId, node.id);
        }

        const args = bindArguments(definition, resolveArguments(node, context), node.id);
        const value = definition.kind === "builtin"
            ? await this.#invokeBuiltin(definition, args, node.id)
            : await this.#invokeUserDefined(definition, args, node.id, emit);

        if (this.#options.validateReturns) {
            checkReturn(definition, value, node.id);
        }
        return value;
    }

    async #invokeBuiltin(
        definition: BuiltinProcessDefinition,
        args: Record<string, unknown>,
        nodeId: string,
    ): Promise<unknown> {
        try {
            return await this.#invoker.invoke(definition.id, args, {signal: this.abortSignal, nodeId});
        } catch (error) {
            throw new ProcessExecutionFailureError(definition.id, nodeId, error);
        }
    }

    /**
     * Evaluates the process's own graph with the node's arguments as its
     * parameters, one frame deeper than this evaluation.
     */
    async #invokeUserDefined(
        definition: UserDefinedProcessDefinition,
        args: Record<string, unknown>,
        nodeId: string,
        emit: (event: EvaluationEvent) => void,
    ): Promise<unknown> {
        const depth = this.#frames.length;
        if (depth >= this.#options.maxRecursionDepth) {
            throw new RecursionLimitExceededError(
                this.#options.maxRecursionDepth,
                [...this.#frames.map((frame) => frame.processId), definition.id],
                nodeId,
            );
        }

        const {graph, issues} = parseProcessGraph(definition.processGraph, {
            catalog: this.#catalog,
            parameters: definition.parameters,
        });
        if (!graph) {
            throw new GraphValidationError(issues).withCaller(nodeId);
        }

        const child = new ProcessGraphRunnable({
            name: definition.id,
            description: definition.description,
            catalog: this.#catalog,
            invoker: this.#invoker,
            evaluation: this.#options,
            frames: [...this.#frames, {depth, processId: definition.id, nodeId}],
        });
        const forwardAbort = () => child.abortController.abort(this.abortSignal.reason);
        this.abortSignal.addEventListener("abort", forwardAbort, {once: true});

        try {
            const iterator = child.invoke({graph, parameters: args, declarations: definition.parameters});
            let step = await iterator.next();
            while (!step.done) {
                emit(step.value.withCaller(nodeId));
                step = await iterator.next();
            }
            return step.value;
        } catch (error) {
            if (error instanceof ProcessGraphError) {
                throw error.withCaller(nodeId);
            }
            throw error;
        } finally {
            this.abortSignal.removeEventListener("abort", forwardAbort);
        }
    }
}
