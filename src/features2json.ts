import NasGraph from "./Nas/NasGraph.js";
import type OperationNode from "./Nas/OperationNode.js";
import { inputFeaturesCalculator } from "./Nas/features/inputFeatures.js";
import type { FeaturesCategory, NodeFlags, OperationKind } from "./Nas/NasTypes.js";

export interface NodeFeaturesSummary {
  id: string;
  kind: OperationKind;
  target: string;
  category?: FeaturesCategory;
  flags?: NodeFlags;
  outputFeatures?: number;
  inputFeatures?: number;
  inputFeaturesSetBy?: string | string[];
  calculator?: string;
}

export interface GraphFeaturesSummary {
  name: string;
  nodes: NodeFeaturesSummary[];
}

function setByIds(node: OperationNode.Class): string | string[] | undefined {
  const setBy = node.inputFeaturesSetBy;
  if (setBy === undefined) return undefined;
  return Array.isArray(setBy) ? setBy.map(n => n.id) : setBy.id;
}

// a concatenation takes in the channels of all its inputs
function inputFeatures(graph: NasGraph.Class, node: OperationNode.Class): number | undefined {
  if (!node.flags?.featuresConcatenate) {
    return inputFeaturesCalculator(graph, node)?.features;
  }
  let total = 0;
  for (const producer of graph.inputsOf(node)) {
    const features = producer.featuresCalculator?.features;
    if (features === undefined) return undefined;
    total += features;
  }
  return total;
}

export function nodeFeaturesSummary(graph: NasGraph.Class, node: OperationNode.Class): NodeFeaturesSummary {
  const calculator = node.featuresCalculator;
  return {
    id: node.id,
    kind: node.kind,
    target: node.target,
    category: node.category,
    flags: node.flags,
    outputFeatures: calculator?.features,
    inputFeatures: inputFeatures(graph, node),
    inputFeaturesSetBy: setByIds(node),
    calculator: calculator?.describe(),
  };
}

// Nodes in insertion order, which the loader keeps topological
export function featuresSummary(graph: NasGraph.Class): GraphFeaturesSummary {
  return {
    name: graph.name,
    nodes: graph.getOperationNodes().toArray().map(node => nodeFeaturesSummary(graph, node)),
  };
}
