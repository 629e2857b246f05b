import Graph from "@specs-feup/flow/graph/Graph";
import NasGraph from "../../NasGraph.js";
import AnnotateNodes from "./AnnotateNodes.js";
import PropagateFeatures from "./PropagateFeatures.js";
import AssociateInputFeatures from "./AssociateInputFeatures.js";
import { resolveAnnotationOptions, type AnnotationOptions } from "../../../AnnotationOptions.js";

/**
 * Runs the three passes in the only order they are valid in:
 * classification, calculators, back-references.
 */
export default class FeaturesAnnotator
  implements Graph.Transformation<NasGraph.Class, NasGraph.Class>
{
  private options: AnnotationOptions;

  constructor(options: Partial<AnnotationOptions> = {}) {
    this.options = resolveAnnotationOptions(options);
  }

  apply(graph: NasGraph.Class): NasGraph.Class {
    return graph
      .apply(new AnnotateNodes(this.options))
      .apply(new PropagateFeatures(this.options))
      .apply(new AssociateInputFeatures(this.options));
  }
}

export { AnnotateNodes, PropagateFeatures, AssociateInputFeatures };
