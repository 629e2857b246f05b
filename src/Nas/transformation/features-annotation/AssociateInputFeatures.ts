import Graph from "@specs-feup/flow/graph/Graph";
import NasGraph from "../../NasGraph.js";
import type OperationNode from "../../OperationNode.js";
import { flattenEffect, squeezeEffect } from "../../features/reshape.js";
import { UnsupportedNodeError } from "../../Errors.js";
import { inputShapeOf, requireFlags } from "./PropagateFeatures.js";
import { defaultAnnotationOptions, type AnnotationOptions } from "../../../AnnotationOptions.js";

/**
 * Links every node to the node(s) whose output sets its number of input
 * features, looking through channel-preserving operations.
 *
 * Unlike PropagateFeatures, a node that cannot be resolved yet is simply
 * dropped from the queue; it comes back when another of its predecessors is
 * resolved.
 */
export default class AssociateInputFeatures
  implements Graph.Transformation<NasGraph.Class, NasGraph.Class>
{
  constructor(private options: AnnotationOptions = defaultAnnotationOptions) {}

  apply(graph: NasGraph.Class): NasGraph.Class {
    graph.getOperationNodes().forEach(node => {
      node.inputFeaturesSetBy = undefined;
    });

    const queue: OperationNode.Class[] = graph.inputNodes();
    let resolved = 0;

    let node: OperationNode.Class | undefined;
    while ((node = queue.shift()) !== undefined) {
      if (node.inputFeaturesSetBy !== undefined) continue;

      const setBy = this.resolve(graph, node);
      if (setBy === undefined) continue;

      node.inputFeaturesSetBy = setBy;
      resolved++;

      if (this.options.verbosity > 1) {
        const ids = Array.isArray(setBy) ? setBy.map(n => n.id).join(", ") : setBy.id;
        console.log(`[AssociateInputFeatures] ${node.id} <- ${ids}`);
      }

      queue.push(...graph.successors(node));
    }

    if (this.options.verbosity > 0) {
      console.log(`[AssociateInputFeatures] resolved ${resolved} nodes`);
    }
    return graph;
  }

  private resolve(
    graph: NasGraph.Class,
    node: OperationNode.Class,
  ): OperationNode.InputFeaturesSetBy | undefined {
    const predecessors = graph.predecessors(node);
    if (predecessors.length === 0) return node;

    if (requireFlags(node).featuresConcatenate) {
      if (predecessors.some(p => p.inputFeaturesSetBy === undefined)) return undefined;
      return graph.inputsOf(node);
    }

    const prev = predecessors[0];
    const forwarded = prev.inputFeaturesSetBy;
    if (forwarded === undefined) return undefined;

    const flags = requireFlags(prev);
    if (flags.flatten || flags.squeeze) {
      const [producer] = graph.predecessors(prev);
      const inputShape = inputShapeOf(prev, producer);
      const effect = flags.flatten ? flattenEffect(prev, inputShape) : squeezeEffect(prev, inputShape);
      return effect.altersChannels ? prev : forwarded;
    }
    if (flags.featuresConcatenate || flags.featuresDefining) {
      return prev;
    }
    if (flags.featuresPropagating || flags.sharedInputFeatures) {
      return forwarded;
    }
    throw new UnsupportedNodeError(prev.id, prev.kind, prev.target);
  }
}
