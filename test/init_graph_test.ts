import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { createGraph } from "../src/initGraph.js";
import { MalformedGraphError } from "../src/Nas/Errors.js";
import { buildGraph, fn, input, layer, nodeOf, output } from "./graph_test_utils.js";

describe("createGraph", () => {
    it("applies the description defaults", () => {
        const graph = createGraph({ nodes: [{ id: "x", kind: "input", shape: [1, 3] }] });
        const x = nodeOf(graph, "x");
        expect(graph.name).toBe("network");
        expect(graph.modules).toEqual({});
        expect(x.target).toBe("x");
        expect(x.inputIds).toEqual([]);
        expect(x.args).toEqual([]);
        expect(x.kwargs).toEqual({});
        expect(x.shape).toEqual([1, 3]);
    });

    it("keeps module specs", () => {
        const graph = createGraph({
            name: "tiny",
            modules: { conv: { type: "Conv2d", config: { out_channels: 8 } } },
            nodes: [input("x", [1, 3, 4, 4]), layer("conv", ["x"], [1, 8, 4, 4])],
        });
        expect(graph.name).toBe("tiny");
        expect(graph.modules.conv).toEqual({ type: "Conv2d", config: { out_channels: 8 } });
    });

    it("accepts nodes listed in any order", () => {
        const graph = buildGraph([
            output("out", ["relu"]),
            fn("relu", "relu", ["x"]),
            input("x", [1, 3]),
        ]);
        expect(graph.predecessors(nodeOf(graph, "out")).map(n => n.id)).toEqual(["relu"]);
        expect(graph.successors(nodeOf(graph, "x")).map(n => n.id)).toEqual(["relu"]);
    });

    it("rejects duplicate ids", () => {
        expect(() => buildGraph([input("x", [1, 3]), input("x", [1, 3])])).toThrow(MalformedGraphError);
    });

    it("rejects unknown inputs", () => {
        expect(() => buildGraph([input("x", [1, 3]), fn("relu", "relu", ["y"])]))
            .toThrow("Node relu reads unknown input 'y'");
    });

    it("rejects cycles", () => {
        expect(() =>
            buildGraph([
                input("x", [1, 3]),
                fn("a", "add", ["x", "b"]),
                fn("b", "relu", ["a"]),
            ]),
        ).toThrow("Graph has a cycle through a, b");
    });

    it("rejects invalid descriptions", () => {
        expect(() => createGraph({ nodes: [] })).toThrow(ZodError);
        expect(() => createGraph({ nodes: [{ id: "x", kind: "placeholder" }] })).toThrow(ZodError);
        expect(() => createGraph({ nodes: [{ id: "x", kind: "input", shape: [1, 0] }] })).toThrow(ZodError);
    });
});

describe("NasGraph", () => {
    const graph = () =>
        buildGraph([
            input("a", [1, 4]),
            input("b", [1, 4]),
            fn("sub", "sub", ["b", "a"]),
            fn("mul", "mul", ["sub", "sub"]),
            output("out", ["mul"]),
        ]);

    it("lists predecessors in argument order", () => {
        const g = graph();
        expect(g.predecessors(nodeOf(g, "sub")).map(n => n.id)).toEqual(["b", "a"]);
    });

    it("adds one edge per distinct input", () => {
        const g = graph();
        const mul = nodeOf(g, "mul");
        expect(g.predecessors(mul).map(n => n.id)).toEqual(["sub"]);
        expect(mul.getIncomers.toArray()).toHaveLength(1);
        expect(g.getEdge("sub", "mul")?.inputIndices).toEqual([0, 1]);
        expect(g.getEdge("a", "sub")?.inputIndices).toEqual([1]);
        expect(g.getEdge("a", "mul")).toBeUndefined();
    });

    it("lists the producer of every input slot, repeats included", () => {
        const g = graph();
        expect(g.inputsOf(nodeOf(g, "mul")).map(n => n.id)).toEqual(["sub", "sub"]);
        expect(g.inputsOf(nodeOf(g, "sub")).map(n => n.id)).toEqual(["b", "a"]);
        expect(g.inputsOf(nodeOf(g, "a"))).toEqual([]);
    });

    it("finds inputs and outputs", () => {
        const g = graph();
        expect(g.inputNodes().map(n => n.id).sort()).toEqual(["a", "b"]);
        expect(g.outputNodes().map(n => n.id)).toEqual(["out"]);
    });

    it("reads an argument by position, then by name", () => {
        const g = buildGraph([
            input("x", [1, 3]),
            { id: "f", kind: "call_function", target: "flatten", inputs: ["x"], args: [1], kwargs: { end_dim: -1 } },
        ]);
        const f = nodeOf(g, "f");
        expect(f.tryGetArg(0, "start_dim")).toBe(1);
        expect(f.tryGetArg(1, "end_dim")).toBe(-1);
        expect(f.tryGetArg(2, "other")).toBeUndefined();
    });
});
