import Graph from "@specs-feup/flow/graph/Graph";
import NasGraph from "../../NasGraph.js";
import type OperationNode from "../../OperationNode.js";
import { categoryOf, createInspectionContext, inspectNode } from "../../inspection/Inspection.js";
import { defaultAnnotationOptions, type AnnotationOptions } from "../../../AnnotationOptions.js";

/**
 * Writes the classification flags of every node reachable from the inputs.
 * Throws UnsupportedNodeError for a node no category accepts.
 */
export default class AnnotateNodes
  implements Graph.Transformation<NasGraph.Class, NasGraph.Class>
{
  constructor(private options: AnnotationOptions = defaultAnnotationOptions) {}

  apply(graph: NasGraph.Class): NasGraph.Class {
    const ctx = createInspectionContext(graph.modules, this.options.allowList, this.options.classifierRules);
    const visited = new Set<string>();
    const queue: OperationNode.Class[] = graph.inputNodes();

    let node: OperationNode.Class | undefined;
    while ((node = queue.shift()) !== undefined) {
      if (visited.has(node.id)) continue;
      visited.add(node.id);

      const flags = inspectNode(node, ctx);
      const category = categoryOf(node, flags);
      node.flags = flags;

      if (this.options.verbosity > 1) {
        console.log(`[AnnotateNodes] ${node.id} (${node.kind} ${node.target}): ${category}`);
      }

      queue.push(...graph.successors(node));
    }

    if (this.options.verbosity > 0) {
      console.log(`[AnnotateNodes] annotated ${visited.size} nodes`);
    }
    return graph;
  }
}
