import { z } from "zod";
import { FEATURES_CATEGORIES } from "../NasTypes.js";

export const ALLOW_LIST_CATEGORIES = [...FEATURES_CATEGORIES, "untouchable"] as const;

export type AllowListCategory = (typeof ALLOW_LIST_CATEGORIES)[number];

export interface AllowListEntry {
  /** Layer types of call_module nodes */
  modules: string[];
  /** Targets of call_function nodes */
  functions: string[];
  /** Targets of call_method nodes */
  methods: string[];
}

export type AllowList = Record<AllowListCategory, AllowListEntry>;

export type AllowListExtension = Partial<Record<AllowListCategory, Partial<AllowListEntry>>>;

function entry(modules: string[] = [], functions: string[] = [], methods: string[] = []): AllowListEntry {
  return { modules, functions, methods };
}

export const defaultAllowList: AllowList = {
  featuresDefining: entry(["Conv1d", "Conv2d", "Conv3d", "Linear"]),
  featuresPropagating: entry(
    [
      "BatchNorm1d",
      "BatchNorm2d",
      "AvgPool1d",
      "AvgPool2d",
      "MaxPool1d",
      "MaxPool2d",
      "AdaptiveAvgPool1d",
      "AdaptiveAvgPool2d",
      "Dropout",
      "ReLU",
      "ReLU6",
      "ConstantPad1d",
      "ConstantPad2d",
      "Identity",
    ],
    ["relu", "relu6", "log_softmax", "softmax", "dropout"],
    ["relu", "contiguous"],
  ),
  sharedInputFeatures: entry(
    [],
    ["add", "sub", "torch.add", "torch.sub", "operator.add", "operator.sub"],
    ["add", "sub"],
  ),
  flatten: entry([], ["flatten", "torch.flatten"], ["flatten"]),
  squeeze: entry([], ["squeeze", "torch.squeeze"], ["squeeze"]),
  featuresConcatenate: entry([], ["cat", "torch.cat", "concat"]),
  untouchable: entry([], ["conv1d", "conv2d", "conv3d", "linear"]),
};

/* adds the extension's entries to `base`; neither argument is modified */
export function extendAllowList(base: AllowList, extension: AllowListExtension): AllowList {
  const merge = (a: string[], b: string[] = []) => [...new Set([...a, ...b])];
  const result = { ...base };
  for (const category of ALLOW_LIST_CATEGORIES) {
    const extra = extension[category];
    if (!extra) continue;
    result[category] = {
      modules: merge(base[category].modules, extra.modules),
      functions: merge(base[category].functions, extra.functions),
      methods: merge(base[category].methods, extra.methods),
    };
  }
  return result;
}

const AllowListEntrySchema = z
  .object({
    modules: z.array(z.string().min(1)),
    functions: z.array(z.string().min(1)),
    methods: z.array(z.string().min(1)),
  })
  .partial()
  .strict();

export const AllowListExtensionSchema = z
  .object({
    featuresPropagating: AllowListEntrySchema,
    featuresDefining: AllowListEntrySchema,
    sharedInputFeatures: AllowListEntrySchema,
    flatten: AllowListEntrySchema,
    squeeze: AllowListEntrySchema,
    featuresConcatenate: AllowListEntrySchema,
    untouchable: AllowListEntrySchema,
  })
  .partial()
  .strict();

export function parseAllowListExtension(raw: unknown): AllowListExtension {
  return AllowListExtensionSchema.parse(raw);
}
