import fs from 'fs';
import { createGraph } from './initGraph.js';
import NasGraph from './Nas/NasGraph.js';
import FeaturesAnnotator from './Nas/transformation/features-annotation/index.js';
import {
  defaultAllowList,
  extendAllowList,
  parseAllowListExtension,
  type AllowList,
} from './Nas/inspection/AllowList.js';
import { resolveAnnotationOptions, type AnnotationOptions } from './AnnotationOptions.js';

export { createGraph } from './initGraph.js';
export { featuresSummary, nodeFeaturesSummary } from './features2json.js';
export type { GraphFeaturesSummary, NodeFeaturesSummary } from './features2json.js';
export { defaultAnnotationOptions, resolveAnnotationOptions } from './AnnotationOptions.js';
export type { AnnotationOptions } from './AnnotationOptions.js';
export { default as NasGraph } from './Nas/NasGraph.js';
export { default as OperationNode } from './Nas/OperationNode.js';
export { default as NasEdge } from './Nas/NasEdge.js';
export * from './Nas/NasTypes.js';
export * from './Nas/Errors.js';
export {
  default as FeaturesCalculator,
  ConcatFeaturesCalculator,
  ConstFeaturesCalculator,
  FlattenFeaturesCalculator,
  PassthroughFeaturesCalculator,
} from './Nas/features/FeaturesCalculator.js';
export type { FeaturesRule, FeaturesRuleContext } from './Nas/features/FeaturesRule.js';
export { inputFeaturesCalculator, inputFeaturesProducers } from './Nas/features/inputFeatures.js';
export { flattenEffect, squeezeEffect } from './Nas/features/reshape.js';
export type { ReshapeEffect } from './Nas/features/reshape.js';
export * from './Nas/inspection/AllowList.js';
export * from './Nas/inspection/Inspection.js';
export {
  default as FeaturesAnnotator,
  AnnotateNodes,
  PropagateFeatures,
  AssociateInputFeatures,
} from './Nas/transformation/features-annotation/index.js';
export { default as FeaturesDotFormatter } from './Nas/dot/FeaturesDotFormatter.js';
export { generateGraphvizOnlineLink, renderDotToSVG } from './Nas/dot/graphviz.js';
export { GraphDescriptionSchema } from './Nas/GraphDescription.js';
export type { GraphDescription, GraphDescriptionInput } from './Nas/GraphDescription.js';

export function loadAllowList(allowListPath?: string): AllowList {
  if (!allowListPath) return defaultAllowList;
  const raw: unknown = JSON.parse(fs.readFileSync(allowListPath, 'utf8'));
  return extendAllowList(defaultAllowList, parseAllowListExtension(raw));
}

/**
 * Loads a JSON graph description and runs the three annotation passes on it.
 */
export function annotateGraphFile(
  inputFilePath: string,
  options: Partial<AnnotationOptions> = {},
): NasGraph.Class {
  const description: unknown = JSON.parse(fs.readFileSync(inputFilePath, 'utf8'));
  return createGraph(description).apply(new FeaturesAnnotator(resolveAnnotationOptions(options)));
}
