// operation kinds and per-node records of a traced network graph

export const OPERATION_KINDS = [
  "input",
  "output",
  "call_module",
  "call_function",
  "call_method",
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

// dim 0 is the batch, dim 1 the channels
export type Shape = number[];

export type ArgValue = number | string | boolean | null | number[];

export interface ModuleSpec {
  /** Concrete layer type, e.g. "Conv2d" */
  type: string;
  // layer hyper-parameters, for classifier and features rules; the built-in passes read shapes instead
  config: Record<string, ArgValue>;
}

// call_module target -> layer
export type ModuleRegistry = Record<string, ModuleSpec>;

export const FEATURES_CATEGORIES = [
  "featuresPropagating",
  "featuresDefining",
  "sharedInputFeatures",
  "flatten",
  "squeeze",
  "featuresConcatenate",
] as const;

export type FeaturesCategory = (typeof FEATURES_CATEGORIES)[number];

export interface NodeFlags {
  featuresPropagating: boolean;
  featuresDefining: boolean;
  sharedInputFeatures: boolean;
  flatten: boolean;
  squeeze: boolean;
  featuresConcatenate: boolean;
  untouchable: boolean;
  zeroOrOneInput: boolean;
}

export const CHANNEL_DIM = 1;
