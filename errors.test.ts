import {describe, expect, it} from "vitest";
import {
  AmbiguousResultError,
  CyclicDependencyError,
  DanglingReferenceError,
  errorFromIssue,
  GraphValidationError,
  ProcessExecutionFailureError,
  UnboundParameterError,
} from "./errors.js";

describe("ProcessGraphError", () => {
  it("serialises the kind, location and cause", () => {
    const error = new ProcessExecutionFailureError("explode", "a", new Error("boom"));
    expect(error.name).toBe("ProcessExecutionFailureError");
    expect(error.toJSON()).toEqual({
      kind: "ProcessExecutionFailure",
      name: "ProcessExecutionFailureError",
      message: "Process 'explode' failed in node 'a': boom",
      nodeId: "a",
      processId: "explode",
      cause: {name: "Error", message: "boom"},
    });
  });

  it("records the calling nodes outermost first", () => {
    const error = new UnboundParameterError("x", "inner").withCaller("middle").withCaller("outer");
    expect(error.callPath).toEqual(["outer", "middle"]);
    expect(error.toJSON().callPath).toEqual(["outer", "middle"]);
  });

  it("describes unbound parameters with and without a node", () => {
    expect(new UnboundParameterError("red").message).toBe("Required parameter 'red' not supplied");
    expect(new UnboundParameterError("red", "sub").message).toBe(
      "Node 'sub' references parameter 'red', which is not bound and has no default",
    );
  });
});

describe("GraphValidationError", () => {
  it("carries every issue and its typed error", () => {
    const error = new GraphValidationError([
      {kind: "AmbiguousOrMissingResult", message: "Process graph has no result node", nodeIds: []},
      {kind: "CyclicDependency", message: "Cyclic dependency between nodes: a -> b -> a", nodeId: "a", nodeIds: ["a", "b"]},
    ]);
    expect(error.message).toBe(
      "Process graph is invalid (2 issues): Process graph has no result node; Cyclic dependency between nodes: a -> b -> a",
    );
    expect(error.errors[0]).toBeInstanceOf(AmbiguousResultError);
    expect(error.errors[1]).toBeInstanceOf(CyclicDependencyError);
  });
});

describe("errorFromIssue", () => {
  it("keeps the cycle members", () => {
    const error = errorFromIssue({
      kind: "CyclicDependency",
      message: "Cyclic dependency between nodes: a -> a",
      nodeId: "a",
      nodeIds: ["a"],
    });
    expect(error).toBeInstanceOf(CyclicDependencyError);
    if (error instanceof CyclicDependencyError) {
      expect(error.cycle).toEqual(["a"]);
      expect(error.nodeId).toBe("a");
    }
  });

  it("keeps the missing target of a dangling reference", () => {
    const error = errorFromIssue({
      kind: "DanglingReference",
      message: "Node 'a' references node 'ghost', which does not exist",
      nodeId: "a",
      nodeIds: ["ghost"],
    });
    expect(error).toBeInstanceOf(DanglingReferenceError);
    if (error instanceof DanglingReferenceError) {
      expect(error.target).toBe("ghost");
      expect(error.nodeId).toBe("a");
    }
  });
});
