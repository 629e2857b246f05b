import Graph from "@specs-feup/flow/graph/Graph";
import NasGraph from "./Nas/NasGraph.js";
import OperationNode from "./Nas/OperationNode.js";
import { MalformedGraphError } from "./Nas/Errors.js";
import {
  GraphDescriptionSchema,
  type GraphDescription,
  type GraphNodeDescription,
} from "./Nas/GraphDescription.js";

function nodeBuilder(node: GraphNodeDescription): OperationNode.Builder {
  return new OperationNode.Builder(
    node.kind,
    node.target ?? node.id,
    node.inputs,
    node.args,
    node.kwargs,
    node.shape,
  );
}

// Nodes may be listed in any order; each is added once all its inputs are
function addNodes(description: GraphDescription, graph: NasGraph.Class) {
  const ids = new Set<string>();
  for (const node of description.nodes) {
    if (ids.has(node.id)) {
      throw new MalformedGraphError(`Duplicate node id '${node.id}'`);
    }
    ids.add(node.id);
  }
  for (const node of description.nodes) {
    const unknown = node.inputs.find(input => !ids.has(input));
    if (unknown !== undefined) {
      throw new MalformedGraphError(`Node ${node.id} reads unknown input '${unknown}'`);
    }
  }

  let pending = [...description.nodes];
  while (pending.length > 0) {
    const ready = pending.filter(node => node.inputs.every(input => graph.hasNode(input)));
    if (ready.length === 0) {
      throw new MalformedGraphError(
        `Graph has a cycle through ${pending.map(node => node.id).join(", ")}`,
      );
    }
    ready.forEach(node => graph.addOperation(node.id, nodeBuilder(node)));
    pending = pending.filter(node => !graph.hasNode(node.id));
  }
}

/**
 * Builds the graph from its JSON description. Shapes must already be
 * inferred; this only checks the structure.
 */
export function createGraph(data: unknown): NasGraph.Class {
  const description = GraphDescriptionSchema.parse(data);
  const graph = Graph.create()
    .init(new NasGraph.Builder(description.name, description.modules))
    .as(NasGraph);

  addNodes(description, graph);

  return graph;
}
