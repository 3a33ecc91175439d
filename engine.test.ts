import {describe, expect, it, vi} from "vitest";
import {evaluate, ProcessGraphEngine, validate, type EvaluationOutcome} from "./engine.js";
import {GraphValidationError, ProcessGraphError, UnboundParameterError} from "./errors.js";
import {ChunkEvent, ErrorEvent, LogEvent, PerformanceEvent} from "./events.js";
import {computeEvi, eviGraph, eviParameters} from "./examples/evi.js";
import {createFunctionInvoker} from "./invoker.js";
import {mathImplementations, mathProcesses} from "./processes/math.js";
import {ProcessRegistry} from "./registry.js";

function failureOf<T extends ProcessGraphError>(outcome: EvaluationOutcome, type: new (...args: never[]) => T): T {
  if (outcome.ok) {
    throw new Error(`Expected the evaluation to fail, got ${JSON.stringify(outcome.value)}`);
  }
  expect(outcome.error).toBeInstanceOf(type);
  if (!(outcome.error instanceof type)) {
    throw outcome.error;
  }
  return outcome.error;
}

function outputs(outcome: EvaluationOutcome): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const event of outcome.events) {
    if (event instanceof ChunkEvent && event.nodeId !== undefined && event.callPath === undefined) {
      values[event.nodeId] = event.data;
    }
  }
  return values;
}

describe("evaluate", () => {
  describe("Enhanced Vegetation Index", () => {
    it("computes every intermediate node", async () => {
      const outcome = await evaluate(eviGraph, {nir: 0.5, red: 0.2, blue: 0.1}, {declarations: eviParameters});
      expect(outcome.ok).toBe(true);

      const values = outputs(outcome);
      expect(values.sub).toBeCloseTo(0.3, 10);
      expect(values.p1).toBeCloseTo(1.2, 10);
      expect(values.p2).toBeCloseTo(-0.75, 10);
      expect(values.sum).toBeCloseTo(1.95, 10);
      expect(values.div).toBeCloseTo(0.3 / 1.95, 10);
      expect(values.p3).toBeCloseTo((2.5 * 0.3) / 1.95, 10);
      if (outcome.ok) {
        expect(outcome.value).toBeCloseTo((2.5 * 0.3) / 1.95, 10);
      }
    });

    it("is available as a helper", async () => {
      await expect(computeEvi(0.5, 0.2, 0.1)).resolves.toBeCloseTo((2.5 * 0.3) / 1.95, 10);
    });

    it("names a missing declared parameter before anything runs", async () => {
      const outcome = await evaluate(eviGraph, {nir: 0.5, blue: 0.1}, {declarations: eviParameters});
      const error = failureOf(outcome, UnboundParameterError);
      expect(error.kind).toBe("UnboundParameter");
      expect(error.parameter).toBe("red");
      expect(outcome.events.some((event) => event instanceof ChunkEvent)).toBe(false);
    });

    it("names a missing parameter when it is first referenced", async () => {
      const outcome = await evaluate(eviGraph, {nir: 0.5, blue: 0.1});
      const error = failureOf(outcome, UnboundParameterError);
      expect(error.parameter).toBe("red");
      expect(["sub", "p1"]).toContain(error.nodeId);
    });
  });

  it("reports structural problems without running anything", async () => {
    const outcome = await evaluate({
      a: {process_id: "absolute", arguments: {x: 1}, result: true},
      b: {process_id: "absolute", arguments: {x: 2}, result: true},
    });
    const error = failureOf(outcome, GraphValidationError);
    expect(error.kind).toBe("InvalidGraph");
    expect(error.issues.map((issue) => issue.kind)).toEqual(["AmbiguousOrMissingResult"]);
    expect(outcome.events.filter((event) => event instanceof ErrorEvent)).toHaveLength(1);
    expect(outcome.events.some((event) => event instanceof ChunkEvent)).toBe(false);
  });

  it("accepts JSON text", async () => {
    const outcome = await evaluate('{"n": {"process_id": "absolute", "arguments": {"x": -7}, "result": true}}');
    expect(outcome).toMatchObject({ok: true, value: 7});
  });

  it("reports how long validation took", async () => {
    const outcome = await evaluate({n: {process_id: "absolute", arguments: {x: 1}, result: true}});
    const [first] = outcome.events;
    expect(first).toBeInstanceOf(PerformanceEvent);
    if (first instanceof PerformanceEvent) {
      expect(first.operation).toBe("validate");
    }
  });

  it("passes validation warnings on as log events", async () => {
    const engine = new ProcessGraphEngine({
      registry: ProcessRegistry.withBuiltins([
        ...mathProcesses,
        {id: "old_abs", deprecated: true, parameters: [{name: "x", schema: {}}]},
      ]),
      invoker: createFunctionInvoker({...mathImplementations, old_abs: mathImplementations.absolute}),
    });
    const outcome = await engine.evaluate({n: {process_id: "old_abs", arguments: {x: 1}, result: true}});
    expect(outcome).toMatchObject({ok: true, value: 1});
    const warnings = outcome.events.filter((event) => event instanceof LogEvent && event.level === "warn");
    expect(warnings.map((event) => (event instanceof LogEvent ? event.message : ""))).toEqual([
      "Node 'n' invokes deprecated process 'old_abs'",
    ]);
  });

  it("rejects when cancelled from outside", async () => {
    await expect(
      evaluate({n: {process_id: "absolute", arguments: {x: 1}, result: true}}, {}, {signal: AbortSignal.abort()}),
    ).rejects.toThrow("Process graph evaluation aborted");
  });

  it("rejects when cancelled while a node is running", async () => {
    let started = () => {};
    const running = new Promise<void>((resolve) => {
      started = () => resolve();
    });
    const engine = new ProcessGraphEngine({
      registry: ProcessRegistry.withBuiltins([...mathProcesses, {id: "hold"}]).seal(),
      invoker: createFunctionInvoker({
        ...mathImplementations,
        hold: (_args, {signal}) =>
          new Promise((_resolve, reject) => {
            signal.addEventListener("abort", () => reject(new Error("hold interrupted")), {once: true});
            started();
          }),
      }),
    });
    const controller = new AbortController();
    const evaluation = engine.evaluate(
      {n: {process_id: "hold", arguments: {}, result: true}},
      {},
      {signal: controller.signal},
    );

    await running;
    controller.abort();
    await expect(evaluation).rejects.toThrow("Process graph evaluation aborted");
  });
});

describe("validate", () => {
  it("accepts a well-formed graph", () => {
    expect(validate(eviGraph, {declarations: eviParameters})).toEqual({valid: true, errors: [], warnings: []});
  });

  it("checks parameter references against the declarations", () => {
    const report = validate(eviGraph, {declarations: eviParameters.filter((parameter) => parameter.name !== "blue")});
    expect(report.valid).toBe(false);
    expect(report.errors.map((issue) => [issue.kind, issue.nodeId, issue.parameter])).toEqual([
      ["DanglingReference", "p2", "blue"],
    ]);
  });

  it("reports every problem at once", () => {
    const report = validate({
      a: {process_id: "absolute", arguments: {x: {from_node: "b"}}},
      b: {process_id: "absolute", arguments: {x: {from_node: "a"}}},
      c: {process_id: "ndvi", arguments: {}},
    });
    expect(report.valid).toBe(false);
    expect(report.errors.map((issue) => issue.kind)).toEqual([
      "AmbiguousOrMissingResult",
      "CyclicDependency",
      "UnknownProcess",
    ]);
  });
});

describe("ProcessGraphEngine", () => {
  it("evaluates against the registry as it was when evaluation started", async () => {
    const registry = ProcessRegistry.withBuiltins(mathProcesses).seal();
    registry.register("alice", {
      id: "inc",
      parameters: [{name: "x", schema: {type: "number"}}],
      process_graph: {
        a: {process_id: "add", arguments: {x: {from_argument: "x"}, y: 1}, result: true},
      },
    });
    const engine = new ProcessGraphEngine({registry});

    const stream = engine.stream({n: {process_id: "inc", arguments: {x: 1}, result: true}}, {}, {owner: "alice"});
    const first = await stream.next();
    expect(first.done).toBe(false);

    registry.remove("alice", "inc");

    let step = await stream.next();
    while (!step.done) {
      step = await stream.next();
    }
    expect(step.value).toBe(2);
    expect(registry.has("inc", "alice")).toBe(false);
  });

  it("detaches from the caller's signal when the consumer returns early", async () => {
    const controller = new AbortController();
    const detach = vi.spyOn(controller.signal, "removeEventListener");
    const stream = new ProcessGraphEngine().stream(
      {n: {process_id: "absolute", arguments: {x: 1}, result: true}},
      {},
      {signal: controller.signal},
    );

    const validated = await stream.next();
    expect(validated.value).toBeInstanceOf(PerformanceEvent);
    const started = await stream.next();
    expect(started.value).toBeInstanceOf(LogEvent);
    expect(detach).not.toHaveBeenCalled();

    await stream.return(undefined);
    expect(detach).toHaveBeenCalledWith("abort", expect.any(Function));
  });

  it("rejects invalid evaluation options", () => {
    expect(() => new ProcessGraphEngine({evaluation: {maxConcurrency: 0}})).toThrow(
      "Invalid evaluation options: maxConcurrency",
    );
  });
});
