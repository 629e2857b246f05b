import { describe, it, expect } from "vitest";
import {
    annotate,
    buildGraph,
    concatNetwork,
    featuresOf,
    fn,
    input,
    layer,
    method,
    nodeOf,
    output,
    setByIds,
} from "./graph_test_utils.js";
import AnnotateNodes from "../src/Nas/transformation/features-annotation/AnnotateNodes.js";
import PropagateFeatures from "../src/Nas/transformation/features-annotation/PropagateFeatures.js";
import AssociateInputFeatures from "../src/Nas/transformation/features-annotation/AssociateInputFeatures.js";
import { createGraph } from "../src/initGraph.js";
import { inputFeaturesCalculator, inputFeaturesProducers } from "../src/Nas/features/inputFeatures.js";
import { ConstFeaturesCalculator } from "../src/Nas/features/FeaturesCalculator.js";
import { defaultAllowList, extendAllowList } from "../src/Nas/inspection/AllowList.js";
import type { ClassifierRule } from "../src/Nas/inspection/Inspection.js";
import type { FeaturesRule } from "../src/Nas/features/FeaturesRule.js";
import { resolveAnnotationOptions } from "../src/AnnotationOptions.js";
import {
    InvalidReshapeError,
    MalformedGraphError,
    MissingShapeError,
    UnsupportedNodeError,
} from "../src/Nas/Errors.js";

describe("FeaturesAnnotator", () => {
    describe("channel concatenation", () => {
        it("sums the concatenated branches", () => {
            const graph = annotate(concatNetwork());
            expect(featuresOf(graph, "x")).toBe(3);
            expect(featuresOf(graph, "conv1")).toBe(16);
            expect(featuresOf(graph, "conv2")).toBe(24);
            expect(featuresOf(graph, "cat")).toBe(40);
            expect(featuresOf(graph, "conv3")).toBe(8);
            expect(featuresOf(graph, "out")).toBe(8);
        });

        it("gives the layer after the concatenation both branches as input producers", () => {
            const graph = annotate(concatNetwork());
            const conv3 = nodeOf(graph, "conv3");

            expect(inputFeaturesCalculator(graph, conv3)?.features).toBe(40);
            expect(setByIds(graph, "conv3")).toBe("cat");
            expect(setByIds(graph, "cat")).toEqual(["conv1", "conv2"]);
            expect(inputFeaturesProducers(conv3).map(n => n.id)).toEqual(["conv1", "conv2"]);
        });

        it("links each node to its features-defining producer", () => {
            const graph = annotate(concatNetwork());
            expect(setByIds(graph, "x")).toBe("x");
            expect(setByIds(graph, "conv1")).toBe("x");
            expect(setByIds(graph, "conv2")).toBe("x");
            expect(setByIds(graph, "out")).toBe("conv3");
        });

        it("does not treat a concatenation along another dim as channel concatenation", () => {
            const graph = buildGraph(
                [
                    input("x", [1, 3, 8, 8]),
                    layer("a", ["x"], [1, 4, 8, 8]),
                    layer("b", ["x"], [1, 4, 8, 8]),
                    fn("cat", "cat", ["a", "b"], [2], [1, 4, 16, 8]),
                    output("out", ["cat"]),
                ],
                { a: "Conv2d", b: "Conv2d" },
            );
            expect(() => annotate(graph)).toThrow(UnsupportedNodeError);
        });

        it("counts a repeated input once per occurrence", () => {
            const graph = annotate(
                buildGraph(
                    [
                        input("x", [1, 3, 8, 8]),
                        layer("a", ["x"], [1, 4, 8, 8]),
                        fn("cat", "cat", ["a", "a"], [1], [1, 8, 8, 8]),
                        layer("b", ["cat"], [1, 2, 8, 8]),
                        output("out", ["b"]),
                    ],
                    { a: "Conv2d", b: "Conv2d" },
                ),
            );
            expect(featuresOf(graph, "cat")).toBe(8);
            expect(nodeOf(graph, "cat").featuresCalculator?.describe()).toBe("Concat(Const(4), Const(4))");
            expect(setByIds(graph, "cat")).toEqual(["a", "a"]);
            expect(inputFeaturesProducers(nodeOf(graph, "b")).map(n => n.id)).toEqual(["a", "a"]);
        });

        it("accepts a negative channel dim", () => {
            const graph = buildGraph(
                [
                    input("x", [1, 3, 8, 8]),
                    layer("a", ["x"], [1, 4, 8, 8]),
                    layer("b", ["x"], [1, 6, 8, 8]),
                    fn("cat", "cat", ["a", "b"], [-3], [1, 10, 8, 8]),
                    output("out", ["cat"]),
                ],
                { a: "Conv2d", b: "Conv2d" },
            );
            annotate(graph);
            expect(featuresOf(graph, "cat")).toBe(10);
        });
    });

    describe("queue order", () => {
        // cat is dequeued before relu has been handled
        const unevenBranches = () =>
            buildGraph(
                [
                    input("x", [1, 3, 8, 8]),
                    layer("conv1", ["x"], [1, 16, 8, 8]),
                    layer("conv2", ["x"], [1, 24, 8, 8]),
                    fn("relu", "relu", ["conv2"], [], [1, 24, 8, 8]),
                    fn("cat", "cat", ["conv1", "relu"], [1], [1, 40, 8, 8]),
                    output("out", ["cat"]),
                ],
                { conv1: "Conv2d", conv2: "Conv2d" },
            );

        it("builds a node once all its predecessors are built", () => {
            const graph = annotate(unevenBranches());
            expect(featuresOf(graph, "relu")).toBe(24);
            expect(featuresOf(graph, "cat")).toBe(40);
            expect(featuresOf(graph, "out")).toBe(40);
        });

        it("resolves a concatenation once all its inputs are resolved", () => {
            const graph = annotate(unevenBranches());
            expect(setByIds(graph, "relu")).toBe("conv2");
            expect(setByIds(graph, "cat")).toEqual(["conv1", "relu"]);
            expect(setByIds(graph, "out")).toBe("cat");
        });
    });

    describe("reshapes", () => {
        const flattenNetwork = (startDim: number, flatShape: number[]) =>
            buildGraph(
                [
                    input("x", [1, 3, 5, 3]),
                    layer("conv", ["x"], [1, 32, 5, 3]),
                    fn("flat", "flatten", ["conv"], [startDim], flatShape),
                    layer("fc", ["flat"], [1, 10]),
                    output("out", ["fc"]),
                ],
                { conv: "Conv2d", fc: "Linear" },
            );

        it("flattening from dim 1 multiplies the channels", () => {
            const graph = annotate(flattenNetwork(1, [1, 480]));
            expect(featuresOf(graph, "flat")).toBe(480);
            expect(nodeOf(graph, "flat").featuresCalculator?.describe()).toBe("Flatten(Const(32) * 15)");
            expect(setByIds(graph, "fc")).toBe("flat");
        });

        it("flattening spatial dims keeps the channels", () => {
            const graph = annotate(flattenNetwork(2, [1, 32, 15]));
            expect(featuresOf(graph, "flat")).toBe(32);
            expect(setByIds(graph, "flat")).toBe("conv");
            expect(setByIds(graph, "fc")).toBe("conv");
        });

        it("rejects flattening the batch dimension", () => {
            expect(() => annotate(flattenNetwork(0, [480]))).toThrow(InvalidReshapeError);
        });

        it("squeezing dim 1 or dim 2 keeps 64 channels on a (1, 64, 1, 10) input", () => {
            for (const dim of [1, 2]) {
                const graph = annotate(
                    buildGraph(
                        [
                            input("x", [1, 3, 1, 10]),
                            layer("conv", ["x"], [1, 64, 1, 10]),
                            method("sq", "squeeze", ["conv"], [dim]),
                            output("out", ["sq"]),
                        ],
                        { conv: "Conv2d" },
                    ),
                );
                expect(featuresOf(graph, "sq")).toBe(64);
            }
        });
    });

    describe("shared input features", () => {
        const residual = () =>
            buildGraph(
                [
                    input("x", [1, 3, 8, 8]),
                    layer("conv1", ["x"], [1, 16, 8, 8]),
                    layer("conv2", ["x"], [1, 16, 8, 8]),
                    fn("add", "add", ["conv1", "conv2"], [], [1, 16, 8, 8]),
                    method("relu", "relu", ["add"], [], [1, 16, 8, 8]),
                    output("out", ["relu"]),
                ],
                { conv1: "Conv2d", conv2: "Conv2d" },
            );

        it("reuses the first input's calculator", () => {
            const graph = annotate(residual());
            expect(nodeOf(graph, "add").featuresCalculator).toBe(nodeOf(graph, "conv1").featuresCalculator);
            expect(featuresOf(graph, "relu")).toBe(16);
        });

        it("successors look through the shared node", () => {
            const graph = annotate(residual());
            expect(setByIds(graph, "add")).toBe("conv1");
            expect(setByIds(graph, "relu")).toBe("conv1");
            expect(setByIds(graph, "out")).toBe("conv1");
        });
    });

    it("gives the same results when run twice", () => {
        const graph = annotate(concatNetwork());
        const before = nodeOf(graph, "cat").featuresCalculator;

        annotate(graph);

        const after = nodeOf(graph, "cat").featuresCalculator;
        expect(after).not.toBe(before);
        expect(after?.features).toBe(40);
        expect(setByIds(graph, "cat")).toEqual(["conv1", "conv2"]);
        expect(setByIds(graph, "conv3")).toBe("cat");
    });

    describe("errors", () => {
        it("rejects an operation outside the allow-list", () => {
            const graph = buildGraph([
                input("x", [1, 3, 8, 8]),
                fn("odd", "mystery_op", ["x"], [], [1, 3, 8, 8]),
                output("out", ["odd"]),
            ]);
            let error: unknown;
            try {
                annotate(graph);
            } catch (e) {
                error = e;
            }
            expect(error).toBeInstanceOf(UnsupportedNodeError);
            expect(error).toMatchObject({ nodeId: "odd", kind: "call_function", target: "mystery_op" });
        });

        it("rejects a module of an unknown type", () => {
            const graph = buildGraph(
                [input("x", [1, 3, 8, 8]), layer("attn", ["x"], [1, 3, 8, 8]), output("out", ["attn"])],
                { attn: "MultiheadAttention" },
            );
            expect(() => annotate(graph)).toThrow(UnsupportedNodeError);
        });

        it("rejects a source node that is not a graph input", () => {
            const graph = buildGraph([
                input("x", [1, 3, 8, 8]),
                fn("ones", "ones", [], [], [1, 3, 8, 8]),
                fn("add", "add", ["x", "ones"], [], [1, 3, 8, 8]),
                output("out", ["add"]),
            ]);
            expect(() => annotate(graph)).toThrow(MalformedGraphError);
        });

        it("requires the shape of features-defining nodes", () => {
            const graph = buildGraph(
                [input("x", [1, 3, 8, 8]), layer("conv", ["x"]), output("out", ["conv"])],
                { conv: "Conv2d" },
            );
            expect(() => annotate(graph)).toThrow(MissingShapeError);
        });

        it("requires the nodes to be annotated before propagating", () => {
            const options = resolveAnnotationOptions({});
            expect(() => concatNetwork().apply(new PropagateFeatures(options))).toThrow(/has not been annotated/);
        });
    });

    describe("extensions", () => {
        it("an allow-list extension makes a module supported", () => {
            const graph = buildGraph(
                [input("x", [1, 3, 8, 8]), layer("act", ["x"], [1, 3, 8, 8]), output("out", ["act"])],
                { act: "GELU" },
            );
            const allowList = extendAllowList(defaultAllowList, { featuresPropagating: { modules: ["GELU"] } });
            annotate(graph, { allowList });
            expect(nodeOf(graph, "act").category).toBe("featuresPropagating");
            expect(featuresOf(graph, "act")).toBe(3);
        });

        it("a classifier rule overrides the allow-list", () => {
            const asPropagating: ClassifierRule = (node) =>
                node.target === "mystery_op" ? "featuresPropagating" : undefined;
            const graph = buildGraph([
                input("x", [1, 3, 8, 8]),
                fn("odd", "mystery_op", ["x"], [], [1, 3, 8, 8]),
                output("out", ["odd"]),
            ]);
            annotate(graph, { classifierRules: [asPropagating] });
            expect(featuresOf(graph, "odd")).toBe(3);
            expect(setByIds(graph, "out")).toBe("x");
        });

        it("a features rule alone does not make an unlisted operation supported", () => {
            const fixed: FeaturesRule = {
                name: "fixed-mystery",
                build: (node) => (node.target === "mystery_op" ? new ConstFeaturesCalculator(5) : undefined),
            };
            const graph = buildGraph([
                input("x", [1, 3, 8, 8]),
                fn("odd", "mystery_op", ["x"], [], [1, 5, 8, 8]),
                output("out", ["odd"]),
            ]);
            expect(() => annotate(graph, { featuresRules: [fixed] })).toThrow(
                "Unsupported node odd (op: call_function, target: mystery_op)",
            );
        });

        it("a features rule can read the module configuration", () => {
            const fromConfig: FeaturesRule = {
                name: "out-channels-from-config",
                build: (node, ctx) => {
                    const outChannels = ctx.modules[node.target]?.config.out_channels;
                    return typeof outChannels === "number" ? new ConstFeaturesCalculator(outChannels) : undefined;
                },
            };
            const graph = createGraph({
                modules: {
                    conv1: { type: "Conv2d", config: { out_channels: 12 } },
                    conv2: { type: "Conv2d" },
                },
                nodes: [
                    input("x", [1, 3, 8, 8]),
                    layer("conv1", ["x"], [1, 16, 8, 8]),
                    layer("conv2", ["conv1"], [1, 24, 8, 8]),
                    output("out", ["conv2"]),
                ],
            });
            annotate(graph, { featuresRules: [fromConfig] });
            expect(featuresOf(graph, "conv1")).toBe(12);
            expect(featuresOf(graph, "conv2")).toBe(24);
        });

        it("a features rule is consulted before the built-in ones", () => {
            const fixed: FeaturesRule = {
                name: "fixed-conv3",
                build: (node) => (node.id === "conv3" ? new ConstFeaturesCalculator(7) : undefined),
            };
            const graph = annotate(concatNetwork(), { featuresRules: [fixed] });
            expect(featuresOf(graph, "conv3")).toBe(7);
            expect(featuresOf(graph, "out")).toBe(7);
            expect(featuresOf(graph, "cat")).toBe(40);
        });
    });

    it("the passes can be applied one at a time", () => {
        const options = resolveAnnotationOptions({});
        const graph = concatNetwork()
            .apply(new AnnotateNodes(options))
            .apply(new PropagateFeatures(options))
            .apply(new AssociateInputFeatures(options));
        expect(nodeOf(graph, "conv1").flags).toMatchObject({ featuresDefining: true, zeroOrOneInput: true });
        expect(featuresOf(graph, "cat")).toBe(40);
    });
});
