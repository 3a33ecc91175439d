/**
 * @file events.ts
 * @description Event types yielded while a process graph is evaluated.
 *              Callers decide where these go; nothing is written to a global logger.
 */

/**
 * Base properties for all events yielded by a Runnable.
 */
export type BaseRunnableEvent = {
    /**
     * The specific type of the event (e.g., 'log', 'chunk').
     */
    type: string;
    /**
     * The name of the Runnable instance that yielded this event.
     */
    runnableName?: string;
    /**
     * Unix timestamp (milliseconds) of when the event occurred.
     */
    timestamp: number;
    /**
     * Node the event concerns, if any.
     */
    nodeId?: string;
    /**
     * Calling nodes when the event comes from inside a user-defined process, outermost first.
     */
    callPath?: string[];
};

export type EventMetadata = Partial<Omit<BaseRunnableEvent, "type" | "timestamp">>;

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * A union type representing any event yielded during evaluation.
 */
export type EvaluationEvent = LogEvent | ChunkEvent | ErrorEvent | PerformanceEvent;

// Base class providing timestamp handling and metadata
abstract class BaseEvent {
    /** The specific type of the event */
    abstract readonly type: string;
    /** Unix timestamp (milliseconds) of when the event occurred */
    readonly timestamp: number;
    runnableName?: string;
    nodeId?: string;
    callPath?: string[];

    protected constructor(metadata: EventMetadata = {}) {
        this.timestamp = Date.now();
        this.runnableName = metadata.runnableName;
        this.nodeId = metadata.nodeId;
        this.callPath = metadata.callPath;
    }

    /**
     * Marks the event as coming from inside the given calling node.
     */
    withCaller(nodeId: string): this {
        this.callPath = [nodeId, ...(this.callPath ?? [])];
        return this;
    }
}

/**
 * LogEvent class representing a log message.
 */
export class LogEvent extends BaseEvent {
    readonly type = "log";
    /** The severity level of the log */
    level: LogLevel;
    /** The log message */
    message: string;
    /** Structured details */
    details?: Record<string, unknown>;

    /**
     * @param level The severity level of the log
     * @param message The log message
     * @param metadata Additional metadata including optional details
     */
    constructor(
        level: LogLevel,
        message: string,
        metadata: EventMetadata & { details?: Record<string, unknown> } = {}
    ) {
        super(metadata);
        this.level = level;
        this.message = message;
        this.details = metadata.details;
    }
}

/**
 * ChunkEvent carrying the output of a node as soon as it is known.
 */
export class ChunkEvent extends BaseEvent {
    readonly type = "chunk";
    /** The node's output */
    data: unknown;

    constructor(data: unknown, metadata: EventMetadata = {}) {
        super(metadata);
        this.data = data;
    }
}

/**
 * ErrorEvent represents the failure that ended an evaluation.
 */
export class ErrorEvent extends BaseEvent {
    readonly type = "error_event";
    /** Details of the error */
    error: {
        name: string;
        message: string;
        kind?: string;
        stack?: string;
    };

    /**
     * @param err The error object or message
     * @param metadata Additional metadata for the event
     */
    constructor(err: Error | string, metadata: EventMetadata = {}) {
        super(metadata);
        if (err instanceof Error) {
            const kind = "kind" in err && typeof err.kind === "string" ? err.kind : undefined;
            this.error = {name: err.name, message: err.message, kind, stack: err.stack};
        } else {
            this.error = {name: "Error", message: err};
        }
    }
}

/**
 * PerformanceEvent reports how long an operation took.
 */
export class PerformanceEvent extends BaseEvent {
    readonly type = "performance";
    operation: string;
    /** Duration in milliseconds */
    duration: number;

    constructor(operation: string, duration: number, metadata: EventMetadata = {}) {
        super(metadata);
        this.operation = operation;
        this.duration = duration;
    }

    get message(): string {
        return `Performance: ${this.operation} took ${this.duration}ms`;
    }
}
