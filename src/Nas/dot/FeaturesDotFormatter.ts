import DefaultDotFormatter from "@specs-feup/flow/graph/dot/DefaultDotFormatter";
import BaseEdge from "@specs-feup/flow/graph/BaseEdge";
import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Dot, { DotEdge, DotNode } from "@specs-feup/flow/graph/dot/dot";
import Edge from "@specs-feup/flow/graph/Edge";
import Node from "@specs-feup/flow/graph/Node";
import OperationNode from "../OperationNode.js";
import NasEdge from "../NasEdge.js";
import NasGraph from "../NasGraph.js";
import type { FeaturesCategory } from "../NasTypes.js";

const CATEGORY_COLORS: Record<FeaturesCategory, string> = {
    featuresDefining: "#0000FF",
    featuresPropagating: "#808080",
    sharedInputFeatures: "#FF8C00",
    flatten: "#A52A2A",
    squeeze: "#A52A2A",
    featuresConcatenate: "#FF00FF",
};

/**
 * Labels each operation with its number of output features and each edge
 * with the features it carries.
 */
export default class FeaturesDotFormatter<
    G extends NasGraph.Class = NasGraph.Class,
> extends DefaultDotFormatter<G> {

    static defaultGetNodeAttrs(node: BaseNode.Class): Record<string, string> {
        const result: Record<string, string> = { label: node.id, shape: "box" };
        node.switch(
            Node.Case(OperationNode, (n) => {
                const features = n.featuresCalculator?.features;
                result.label = features === undefined ? n.target : `${n.target}\nC=${features}`;
                if (n.kind === "input" || n.kind === "output") {
                    result.shape = "ellipse";
                    result.color = n.kind === "input" ? "#00FF00" : "#FF0000";
                    return;
                }
                const category = n.category;
                if (category !== undefined) {
                    result.color = CATEGORY_COLORS[category];
                }
            }),
        );
        return result;
    }

    static defaultGetEdgeAttrs(edge: BaseEdge.Class): Record<string, string> {
        const result: Record<string, string> = {};
        edge.switch(
            Edge.Case(NasEdge, (e) => {
                const features = e.source.tryAs(OperationNode)?.featuresCalculator?.features;
                if (features !== undefined) result.label = `${features}`;
            }),
        );
        return result;
    }

    static defaultGetGraphAttrs(): Record<string, string> {
        return {
            rankdir: "TB",
            ...DefaultDotFormatter.defaultGetGraphAttrs(),
        };
    }

    constructor() {
        super(
            FeaturesDotFormatter.defaultGetNodeAttrs,
            FeaturesDotFormatter.defaultGetEdgeAttrs,
            DefaultDotFormatter.defaultGetContainer,
            FeaturesDotFormatter.defaultGetGraphAttrs,
        );
    }

    override nodeToDot(node: BaseNode.Class): DotNode {
        return Dot.node(node.id, FeaturesDotFormatter.defaultGetNodeAttrs(node));
    }

    override edgeToDot(edge: BaseEdge.Class): DotEdge {
        return Dot.edge(edge.source.id, edge.target.id, FeaturesDotFormatter.defaultGetEdgeAttrs(edge));
    }
}
