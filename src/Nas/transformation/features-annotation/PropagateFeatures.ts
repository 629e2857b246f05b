import Graph from "@specs-feup/flow/graph/Graph";
import NasGraph from "../../NasGraph.js";
import type OperationNode from "../../OperationNode.js";
import FeaturesCalculator, {
  ConcatFeaturesCalculator,
  ConstFeaturesCalculator,
  FlattenFeaturesCalculator,
  PassthroughFeaturesCalculator,
} from "../../features/FeaturesCalculator.js";
import type { FeaturesRuleContext } from "../../features/FeaturesRule.js";
import { flattenEffect, squeezeEffect, type ReshapeEffect } from "../../features/reshape.js";
import { createInspectionContext } from "../../inspection/Inspection.js";
import { MissingShapeError, UnsupportedNodeError } from "../../Errors.js";
import { CHANNEL_DIM, type NodeFlags, type Shape } from "../../NasTypes.js";
import { formatShape } from "../../Utils.js";
import { defaultAnnotationOptions, type AnnotationOptions } from "../../../AnnotationOptions.js";

export function requireFlags(node: OperationNode.Class): NodeFlags {
  const flags = node.flags;
  if (flags === undefined) {
    throw new Error(`Node ${node.id} has not been annotated; run AnnotateNodes first`);
  }
  return flags;
}

export function requireCalculator(node: OperationNode.Class): FeaturesCalculator {
  const calculator = node.featuresCalculator;
  if (calculator === undefined) {
    throw new Error(`Node ${node.id} has no features calculator; run PropagateFeatures first`);
  }
  return calculator;
}

export function inputShapeOf(node: OperationNode.Class, producer: OperationNode.Class): Shape {
  const shape = producer.shape;
  if (shape === undefined) {
    throw new MissingShapeError(producer.id, `needed to reshape it in ${node.id}`);
  }
  return shape;
}

function reshaped(upstream: FeaturesCalculator, effect: ReshapeEffect): FeaturesCalculator {
  return effect.altersChannels
    ? new FlattenFeaturesCalculator(upstream, effect.multiplier)
    : new PassthroughFeaturesCalculator(upstream);
}

/**
 * Attaches a FeaturesCalculator to every node. A node is built only once all
 * its predecessors have one; until then it goes back to the end of the queue.
 * This terminates on acyclic graphs only.
 */
export default class PropagateFeatures
  implements Graph.Transformation<NasGraph.Class, NasGraph.Class>
{
  constructor(private options: AnnotationOptions = defaultAnnotationOptions) {}

  apply(graph: NasGraph.Class): NasGraph.Class {
    const inspection = createInspectionContext(graph.modules, this.options.allowList, this.options.classifierRules);
    graph.getOperationNodes().forEach(node => {
      node.featuresCalculator = undefined;
    });

    const queue: OperationNode.Class[] = graph.inputNodes();
    let built = 0;
    let deferred = 0;

    let node: OperationNode.Class | undefined;
    while ((node = queue.shift()) !== undefined) {
      if (node.featuresCalculator !== undefined) continue;

      const predecessors = graph.predecessors(node);
      if (predecessors.some(p => p.featuresCalculator === undefined)) {
        queue.push(node);
        deferred++;
        continue;
      }

      const calculator = this.buildCalculator(node, { ...inspection, graph, predecessors });
      node.featuresCalculator = calculator;
      built++;

      if (this.options.verbosity > 1) {
        console.log(`[PropagateFeatures] ${node.id}: ${calculator.describe()} = ${calculator.features}`);
      }

      queue.push(...graph.successors(node));
    }

    if (this.options.verbosity > 0) {
      console.log(`[PropagateFeatures] built ${built} calculators (${deferred} deferrals)`);
    }
    return graph;
  }

  private buildCalculator(node: OperationNode.Class, ctx: FeaturesRuleContext): FeaturesCalculator {
    for (const rule of this.options.featuresRules) {
      const calculator = rule.build(node, ctx);
      if (calculator !== undefined) {
        if (this.options.verbosity > 1) {
          console.log(`[PropagateFeatures] ${node.id} handled by rule '${rule.name}'`);
        }
        return calculator;
      }
    }

    const flags = requireFlags(node);
    const first: OperationNode.Class | undefined = ctx.predecessors[0];

    if (node.isInput || (first === undefined && flags.featuresDefining)) {
      return this.constCalculator(node);
    }
    if (first === undefined) {
      throw new UnsupportedNodeError(node.id, node.kind, node.target, "no predecessors");
    }
    const upstream = requireCalculator(first);

    if (flags.flatten) {
      return reshaped(upstream, flattenEffect(node, inputShapeOf(node, first)));
    }
    if (flags.squeeze) {
      return reshaped(upstream, squeezeEffect(node, inputShapeOf(node, first)));
    }
    if (flags.featuresConcatenate) {
      return new ConcatFeaturesCalculator(ctx.graph.inputsOf(node).map(requireCalculator));
    }
    if (flags.sharedInputFeatures) {
      // equal counts on all inputs is the search method's job
      return upstream;
    }
    if (flags.featuresDefining) {
      return this.constCalculator(node);
    }
    if (flags.featuresPropagating) {
      return new PassthroughFeaturesCalculator(upstream);
    }
    throw new UnsupportedNodeError(node.id, node.kind, node.target);
  }

  private constCalculator(node: OperationNode.Class): ConstFeaturesCalculator {
    const shape = node.shape;
    if (shape === undefined) {
      throw new MissingShapeError(node.id, "features-defining nodes need their output shape");
    }
    const channels = shape[CHANNEL_DIM];
    if (channels === undefined) {
      throw new MissingShapeError(node.id, `shape ${formatShape(shape)} has no channel dimension`);
    }
    return new ConstFeaturesCalculator(channels);
  }
}
