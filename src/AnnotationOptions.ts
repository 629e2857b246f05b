import { defaultAllowList, type AllowList } from "./Nas/inspection/AllowList.js";
import type { ClassifierRule } from "./Nas/inspection/Inspection.js";
import type { FeaturesRule } from "./Nas/features/FeaturesRule.js";

export interface AnnotationOptions {
  /** Operation kinds accepted by the node classifier */
  allowList: AllowList;

  /** Consulted before the allow-list, first opinion wins */
  classifierRules: ClassifierRule[];

  /** Tried in order before the built-in calculator rules */
  featuresRules: FeaturesRule[];

  /** 0 = silent, 1 = summary, 2 = one line per node */
  verbosity: number;
}

export const defaultAnnotationOptions: AnnotationOptions = {
  allowList: defaultAllowList,
  classifierRules: [],
  featuresRules: [],
  verbosity: 0,
};

export function resolveAnnotationOptions(options: Partial<AnnotationOptions> = {}): AnnotationOptions {
  return { ...defaultAnnotationOptions, ...options };
}
