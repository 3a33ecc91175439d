import {describe, expect, it} from "vitest";
import {eviGraph} from "./examples/evi.js";
import {classifyArgument, parseProcessGraph} from "./parser.js";
import {mathProcesses} from "./processes/math.js";
import {ProcessRegistry} from "./registry.js";

const catalog = ProcessRegistry.withBuiltins(mathProcesses).seal().snapshot();

describe("parseProcessGraph", () => {
  it("orders nodes after their dependencies", () => {
    const {graph, issues} = parseProcessGraph(eviGraph);
    expect(issues).toEqual([]);
    expect(graph?.resultNodeId).toBe("p3");
    expect(graph?.order).toEqual(["sub", "p1", "p2", "sum", "div", "p3"]);
  });

  it("orders nodes declared before their dependencies", () => {
    const {graph} = parseProcessGraph({
      c: {process_id: "absolute", arguments: {x: {from_node: "b"}}, result: true},
      b: {process_id: "absolute", arguments: {x: {from_node: "a"}}},
      a: {process_id: "absolute", arguments: {x: -1}},
    });
    expect(graph?.order).toEqual(["a", "b", "c"]);
  });

  it("freezes the parsed graph", () => {
    const {graph} = parseProcessGraph(eviGraph);
    const node = graph?.nodes.get("sub");
    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node?.arguments)).toBe(true);
  });

  it("accepts JSON text and the process_graph envelope", () => {
    const text = JSON.stringify({process_graph: {n: {process_id: "absolute", arguments: {x: -3}, result: true}}});
    const {graph, issues} = parseProcessGraph(text);
    expect(issues).toEqual([]);
    expect(graph?.resultNodeId).toBe("n");
  });

  it("rejects text that is not JSON", () => {
    const {graph, issues} = parseProcessGraph("{not json");
    expect(graph).toBeUndefined();
    expect(issues).toHaveLength(1);
    expect(issues[0].kind).toBe("MalformedGraph");
    expect(issues[0].message.startsWith("Process graph is not valid JSON: ")).toBe(true);
  });

  it("rejects documents that are not node maps", () => {
    expect(parseProcessGraph([1, 2]).issues).toEqual([
      {kind: "MalformedGraph", message: "Process graph must be an object mapping node ids to nodes"},
    ]);
    expect(parseProcessGraph({}).issues).toEqual([
      {kind: "MalformedGraph", message: "Process graph must contain at least one node"},
    ]);
  });

  it("reports every malformed node along with the result count", () => {
    const {graph, issues} = parseProcessGraph({
      a: {process_id: "absolute", result: true},
      b: {arguments: {}},
      c: {process_id: "absolute", arguments: {x: 1}, result: true},
      d: 5,
    });
    expect(graph).toBeUndefined();
    expect(issues).toEqual([
      {
        kind: "MalformedGraph",
        message: "Node 'a' is malformed at 'arguments': Required",
        nodeId: "a",
        path: ["arguments"],
      },
      {
        kind: "MalformedGraph",
        message: "Node 'b' is malformed at 'process_id': Required",
        nodeId: "b",
        path: ["process_id"],
      },
      {kind: "MalformedGraph", message: "Node 'd' must be an object", nodeId: "d"},
      {
        kind: "AmbiguousOrMissingResult",
        message: "Process graph has 2 result nodes: a, c",
        nodeIds: ["a", "c"],
      },
    ]);
  });

  it("reports a missing result node", () => {
    const {issues} = parseProcessGraph({a: {process_id: "absolute", arguments: {x: 1}}});
    expect(issues).toEqual([
      {kind: "AmbiguousOrMissingResult", message: "Process graph has no result node", nodeIds: []},
    ]);
  });

  it("reports a node that references itself as a cycle", () => {
    const {issues} = parseProcessGraph({
      a: {process_id: "absolute", arguments: {x: {from_node: "a"}}, result: true},
    });
    expect(issues).toEqual([
      {
        kind: "CyclicDependency",
        message: "Cyclic dependency between nodes: a -> a",
        nodeId: "a",
        nodeIds: ["a"],
      },
    ]);
  });

  it("reports a cycle once with its members in walk order", () => {
    const {issues} = parseProcessGraph({
      a: {process_id: "absolute", arguments: {x: {from_node: "b"}}},
      b: {process_id: "absolute", arguments: {x: {from_node: "c"}}},
      c: {process_id: "absolute", arguments: {x: {from_node: "a"}}},
      d: {process_id: "absolute", arguments: {x: {from_node: "a"}}, result: true},
    });
    expect(issues).toEqual([
      {
        kind: "CyclicDependency",
        message: "Cyclic dependency between nodes: a -> b -> c -> a",
        nodeId: "a",
        nodeIds: ["a", "b", "c"],
      },
    ]);
  });

  it("reports references to missing nodes as dangling, not as cycles", () => {
    const {issues} = parseProcessGraph({
      a: {process_id: "absolute", arguments: {x: {from_node: "ghost"}}, result: true},
    });
    expect(issues).toEqual([
      {
        kind: "DanglingReference",
        message: "Node 'a' references node 'ghost', which does not exist",
        nodeId: "a",
        nodeIds: ["ghost"],
      },
    ]);
  });

  it("does not report references to malformed nodes as dangling", () => {
    const {issues} = parseProcessGraph({
      a: {arguments: {}},
      b: {process_id: "absolute", arguments: {x: {from_node: "a"}}, result: true},
    });
    expect(issues.map((issue) => issue.kind)).toEqual(["MalformedGraph"]);
  });

  it("rejects reserved keys in arguments instead of dropping them", () => {
    const text =
      '{"a": {"process_id": "absolute", "arguments": {"x": 1}},' +
      ' "n": {"process_id": "add", "arguments": {"x": {"from_node": "a"}, "__proto__": {"from_node": "zzz"}}, "result": true}}';
    const {graph, issues} = parseProcessGraph(text);
    expect(graph).toBeUndefined();
    expect(issues).toEqual([
      {
        kind: "MalformedGraph",
        message: "Node 'n' uses the reserved key '__proto__' at 'arguments.__proto__'",
        nodeId: "n",
        path: ["arguments", "__proto__"],
      },
    ]);
  });

  it("finds reserved keys nested inside argument values", () => {
    const text = '{"n": {"process_id": "sum", "arguments": {"data": [1, {"__proto__": 2}]}, "result": true}}';
    expect(parseProcessGraph(text).issues.map((issue) => issue.message)).toEqual([
      "Node 'n' uses the reserved key '__proto__' at 'arguments.data.1.__proto__'",
    ]);
  });

  it("rejects references whose target is not a string", () => {
    const {issues} = parseProcessGraph({
      a: {process_id: "absolute", arguments: {x: {from_node: 5}}, result: true},
    });
    expect(issues).toEqual([
      {
        kind: "MalformedGraph",
        message: "Node 'a' has a from_node reference at 'arguments.x' that is not a string",
        nodeId: "a",
        path: ["arguments", "x"],
      },
    ]);
  });

  it("checks parameter references against the declared parameters", () => {
    const {issues} = parseProcessGraph(
      {n: {process_id: "absolute", arguments: {x: {from_parameter: "nir"}}, result: true}},
      {parameters: []},
    );
    expect(issues).toEqual([
      {
        kind: "DanglingReference",
        message: "Node 'n' references parameter 'nir', which is not declared",
        nodeId: "n",
        parameter: "nir",
      },
    ]);
  });

  describe("with a catalog", () => {
    it("reports unknown processes", () => {
      const {issues} = parseProcessGraph({n: {process_id: "ndvi", arguments: {}, result: true}}, {catalog});
      expect(issues).toEqual([
        {
          kind: "UnknownProcess",
          message: "Node 'n' invokes unknown process 'ndvi'",
          nodeId: "n",
          processId: "ndvi",
        },
      ]);
    });

    it("reports undeclared and missing arguments", () => {
      const {issues} = parseProcessGraph(
        {n: {process_id: "subtract", arguments: {x: 1, z: 2}, result: true}},
        {catalog},
      );
      expect(issues.map((issue) => issue.message)).toEqual([
        "Node 'n' passes argument 'z', which process 'subtract' does not declare",
        "Node 'n' is missing required argument 'y' of process 'subtract'",
      ]);
      expect(issues.map((issue) => issue.parameter)).toEqual(["z", "y"]);
    });

    it("checks literal argument values", () => {
      const {issues} = parseProcessGraph(
        {n: {process_id: "subtract", arguments: {x: "a", y: 1}, result: true}},
        {catalog},
      );
      expect(issues).toEqual([
        {
          kind: "SchemaViolation",
          message: "Node 'n' argument 'x': Invalid input",
          nodeId: "n",
          processId: "subtract",
          parameter: "x",
        },
      ]);
    });

    it("accepts null for optional arguments", () => {
      const {issues} = parseProcessGraph(
        {n: {process_id: "sum", arguments: {data: [1, null], ignore_nodata: null}, result: true}},
        {catalog},
      );
      expect(issues).toEqual([]);
    });

    it("warns about deprecated processes", () => {
      const legacy = ProcessRegistry.withBuiltins([{id: "legacy", deprecated: true}]).snapshot();
      const {graph, warnings} = parseProcessGraph(
        {n: {process_id: "legacy", arguments: {}, result: true}},
        {catalog: legacy},
      );
      expect(graph).toBeDefined();
      expect(warnings).toEqual(["Node 'n' invokes deprecated process 'legacy'"]);
    });

    it("warns about connections between incompatible schemas", () => {
      const withText = ProcessRegistry.withBuiltins([
        ...mathProcesses,
        {id: "text", returns: {schema: {type: "string"}}},
      ]).snapshot();
      const {graph, warnings} = parseProcessGraph(
        {
          t: {process_id: "text", arguments: {}},
          n: {process_id: "absolute", arguments: {x: {from_node: "t"}}, result: true},
        },
        {catalog: withText},
      );
      expect(graph).toBeDefined();
      expect(warnings).toEqual([
        "Connection from 't' to 'n.x': 'text' returns string but 'absolute' expects number | null",
      ]);
    });
  });
});

describe("classifyArgument", () => {
  it("finds references nested in arrays and objects", () => {
    expect(classifyArgument({bands: [{from_node: "a"}, 3], scale: {from_argument: "s"}}, "n", [])).toEqual({
      kind: "object",
      entries: {
        bands: {kind: "array", items: [{kind: "node", nodeId: "a"}, {kind: "literal", value: 3}]},
        scale: {kind: "parameter", name: "s"},
      },
    });
  });

  it("treats from_parameter as a parameter reference", () => {
    expect(classifyArgument({from_parameter: "x"}, "n", [])).toEqual({kind: "parameter", name: "x"});
  });

  it("keeps child process graphs as opaque literals", () => {
    const callback = {process_graph: {m: {process_id: "max", arguments: {data: {from_parameter: "data"}}, result: true}}};
    expect(classifyArgument(callback, "n", [])).toEqual({kind: "literal", value: callback});
  });
});
