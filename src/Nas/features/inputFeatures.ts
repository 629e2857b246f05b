import type NasGraph from "../NasGraph.js";
import type OperationNode from "../OperationNode.js";
import type FeaturesCalculator from "./FeaturesCalculator.js";

/**
 * Calculator of the features entering `node`: the one of its first
 * predecessor, or its own for a network input.
 */
export function inputFeaturesCalculator(
    graph: NasGraph.Class,
    node: OperationNode.Class,
): FeaturesCalculator | undefined {
    const [first] = graph.predecessors(node);
    return first !== undefined ? first.featuresCalculator : node.featuresCalculator;
}

/**
 * Nodes whose outputs make up the input features of `node`, with a
 * concatenation back-reference expanded into its ordered inputs.
 */
export function inputFeaturesProducers(node: OperationNode.Class): OperationNode.Class[] {
    const setBy = node.inputFeaturesSetBy;
    if (setBy === undefined) return [];
    if (Array.isArray(setBy)) return [...setBy];
    if (setBy !== node && setBy.flags?.featuresConcatenate) {
        const inner = setBy.inputFeaturesSetBy;
        if (Array.isArray(inner)) return [...inner];
    }
    return [setBy];
}
