/**
 * @file errors.ts
 * @description Error taxonomy for process graph validation and evaluation.
 */

export type ErrorKind =
    | "MalformedGraph"
    | "AmbiguousOrMissingResult"
    | "DanglingReference"
    | "CyclicDependency"
    | "UnknownProcess"
    | "SchemaViolation"
    | "UnboundParameter"
    | "RecursionLimitExceeded"
    | "ProcessExecutionFailure";

/**
 * Which side of a process call a schema check applied to.
 */
export type SchemaSide = "argument" | "return";

/**
 * A single schema mismatch.
 */
export type SchemaViolation = {
    /**
     * Parameter name, or "return" for return values.
     */
    parameter: string;
    /**
     * Path inside the value, empty for the value itself.
     */
    path: (string | number)[];
    message: string;
};

/**
 * Error kinds that validation can detect before anything runs.
 */
export type IssueKind = Extract<
    ErrorKind,
    "MalformedGraph" | "AmbiguousOrMissingResult" | "DanglingReference" | "CyclicDependency" | "UnknownProcess" | "SchemaViolation"
>;

/**
 * A structural finding reported by validation.
 */
export type ValidationIssue = {
    kind: IssueKind;
    message: string;
    nodeId?: string;
    /**
     * Every node involved, e.g. the members of a cycle or all result nodes.
     */
    nodeIds?: string[];
    parameter?: string;
    processId?: string;
    /**
     * Location inside the node body for malformed input.
     */
    path?: (string | number)[];
};

/**
 * Serialised form handed to surrounding API layers.
 */
export type SerializedProcessGraphError = {
    kind: ErrorKind | "InvalidGraph";
    name: string;
    message: string;
    nodeId?: string;
    [key: string]: unknown;
};

/**
 * Base class for every error raised by the engine.
 */
export abstract class ProcessGraphError extends Error {
    abstract readonly kind: ErrorKind | "InvalidGraph";
    readonly nodeId?: string;
    /**
     * Ids of the calling nodes when the error surfaced inside a user-defined
     * process, outermost first.
     */
    readonly callPath: string[] = [];

    protected constructor(message: string, nodeId?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.nodeId = nodeId;
    }

    /**
     * Records that the error passed through the given calling node.
     */
    withCaller(nodeId: string): this {
        this.callPath.unshift(nodeId);
        return this;
    }

    /**
     * Extra fields included in {@link toJSON}.
     */
    protected details(): Record<string, unknown> {
        return {};
    }

    toJSON(): SerializedProcessGraphError {
        return {
            kind: this.kind,
            name: this.name,
            message: this.message,
            ...(this.nodeId !== undefined ? {nodeId: this.nodeId} : {}),
            ...(this.callPath.length > 0 ? {callPath: [...this.callPath]} : {}),
            ...this.details(),
        };
    }
}

export class MalformedGraphError extends ProcessGraphError {
    readonly kind = "MalformedGraph";

    constructor(message: string, nodeId?: string) {
        super(message, nodeId);
    }
}

export class AmbiguousResultError extends ProcessGraphError {
    readonly kind = "AmbiguousOrMissingResult";

    constructor(message: string, readonly resultNodeIds: string[]) {
        super(message);
    }

    protected details(): Record<string, unknown> {
        return {resultNodeIds: this.resultNodeIds};
    }
}

export class DanglingReferenceError extends ProcessGraphError {
    readonly kind = "DanglingReference";

    constructor(message: string, nodeId: string | undefined, readonly target: string) {
        super(message, nodeId);
    }

    protected details(): Record<string, unknown> {
        return {target: this.target};
    }
}

export class CyclicDependencyError extends ProcessGraphError {
    readonly kind = "CyclicDependency";

    constructor(readonly cycle: string[], message = `Cyclic dependency between nodes: ${[...cycle, cycle[0]].join(" -> ")}`) {
        super(message, cycle[0]);
    }

    protected details(): Record<string, unknown> {
        return {cycle: this.cycle};
    }
}

export class UnknownProcessError extends ProcessGraphError {
    readonly kind = "UnknownProcess";

    constructor(readonly processId: string, nodeId?: string) {
        super(
            nodeId === undefined
                ? `Process '${processId}' is not available`
                : `Node '${nodeId}' invokes unknown process '${processId}'`,
            nodeId,
        );
    }

    protected details(): Record<string, unknown> {
        return {processId: this.processId};
    }
}

export class SchemaViolationError extends ProcessGraphError {
    readonly kind = "SchemaViolation";

    constructor(
        readonly side: SchemaSide,
        readonly processId: string,
        readonly violations: SchemaViolation[],
        nodeId?: string,
    ) {
        super(
            `${side === "argument" ? "Arguments" : "Return value"} of process '${processId}'` +
            `${nodeId === undefined ? "" : ` in node '${nodeId}'`} violate the declared schema: ` +
            violations.map(formatViolation).join("; "),
            nodeId,
        );
    }

    protected details(): Record<string, unknown> {
        return {side: this.side, processId: this.processId, violations: this.violations};
    }
}

export class UnboundParameterError extends ProcessGraphError {
    readonly kind = "UnboundParameter";
    /**
     * Every unbound parameter; `parameter` is the first of them.
     */
    readonly parameters: string[];

    constructor(parameter: string | string[], nodeId?: string) {
        const names = typeof parameter === "string" ? [parameter] : parameter;
        super(
            nodeId === undefined
                ? `Required parameter${names.length === 1 ? "" : "s"} ${names.map((name) => `'${name}'`).join(", ")} not supplied`
                : `Node '${nodeId}' references parameter '${names[0]}', which is not bound and has no default`,
            nodeId,
        );
        this.parameters = names;
    }

    get parameter(): string {
        return this.parameters[0];
    }

    protected details(): Record<string, unknown> {
        return {parameter: this.parameter, parameters: this.parameters};
    }
}

export class RecursionLimitExceededError extends ProcessGraphError {
    readonly kind = "RecursionLimitExceeded";

    constructor(readonly limit: number, readonly chain: string[], nodeId?: string) {
        super(`Nested process invocation exceeds the depth limit of ${limit}: ${chain.join(" -> ")}`, nodeId);
    }

    protected details(): Record<string, unknown> {
        return {limit: this.limit, chain: this.chain};
    }
}

export class ProcessExecutionFailureError extends ProcessGraphError {
    readonly kind = "ProcessExecutionFailure";

    constructor(readonly processId: string, nodeId: string, cause: unknown) {
        super(
            `Process '${processId}' failed in node '${nodeId}': ${cause instanceof Error ? cause.message : String(cause)}`,
            nodeId,
            {cause},
        );
    }

    protected details(): Record<string, unknown> {
        const cause = this.cause;
        return {
            processId: this.processId,
            cause: cause instanceof Error ? {name: cause.name, message: cause.message} : String(cause),
        };
    }
}

/**
 * Raised when structural validation found issues; carries all of them.
 */
export class GraphValidationError extends ProcessGraphError {
    readonly kind = "InvalidGraph";

    /**
     * The issues as typed errors, in the same order.
     */
    readonly errors: ProcessGraphError[];

    constructor(readonly issues: ValidationIssue[]) {
        super(
            `Process graph is invalid (${issues.length} issue${issues.length === 1 ? "" : "s"}): ` +
            issues.map((issue) => issue.message).join("; "),
        );
        this.errors = issues.map(errorFromIssue);
    }

    protected details(): Record<string, unknown> {
        return {issues: this.issues};
    }
}

/**
 * Raised when a process definition does not have the expected shape.
 */
export class ProcessDefinitionError extends Error {
    constructor(readonly processId: string, readonly problems: string[]) {
        super(`Invalid definition for process '${processId}': ${problems.join("; ")}`);
        this.name = "ProcessDefinitionError";
    }
}

/**
 * Renders a violation as `parameter.path: message`.
 */
export function formatViolation(violation: SchemaViolation): string {
    const location = [violation.parameter, ...violation.path.map(String)].join(".");
    return `${location}: ${violation.message}`;
}

/**
 * Converts a validation issue into the matching error class.
 */
export function errorFromIssue(issue: ValidationIssue): ProcessGraphError {
    switch (issue.kind) {
        case "MalformedGraph":
            return new MalformedGraphError(issue.message, issue.nodeId);
        case "AmbiguousOrMissingResult":
            return new AmbiguousResultError(issue.message, issue.nodeIds ?? []);
        case "DanglingReference":
            return new DanglingReferenceError(issue.message, issue.nodeId, issue.nodeIds?.[0] ?? issue.parameter ?? "");
        case "CyclicDependency":
            return new CyclicDependencyError(issue.nodeIds ?? [], issue.message);
        case "UnknownProcess":
            return new UnknownProcessError(issue.processId ?? "", issue.nodeId);
        case "SchemaViolation":
            return new SchemaViolationError(
                "argument",
                issue.processId ?? "",
                [{parameter: issue.parameter ?? "", path: [], message: issue.message}],
                issue.nodeId,
            );
    }
}
