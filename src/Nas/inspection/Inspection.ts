import type OperationNode from "../OperationNode.js";
import { CHANNEL_DIM, FEATURES_CATEGORIES, type FeaturesCategory, type ModuleRegistry, type NodeFlags } from "../NasTypes.js";
import { UnsupportedNodeError } from "../Errors.js";
import { isInteger, normalizeDim } from "../Utils.js";
import type { AllowList, AllowListEntry } from "./AllowList.js";

/**
 * Gives the category of nodes the allow-list cannot express (e.g. a layer
 * whose role depends on its configuration), or `undefined` for no opinion.
 */
export type ClassifierRule = (node: OperationNode.Class, ctx: InspectionContext) => FeaturesCategory | undefined;

export interface InspectionContext {
    modules: ModuleRegistry;
    allowList: AllowList;
    classifierRules: readonly ClassifierRule[];
}

function ruledCategory(node: OperationNode.Class, ctx: InspectionContext): FeaturesCategory | undefined {
    for (const rule of ctx.classifierRules) {
        const category = rule(node, ctx);
        if (category !== undefined) return category;
    }
    return undefined;
}

export function moduleType(node: OperationNode.Class, ctx: InspectionContext): string | undefined {
    if (node.kind !== "call_module") return undefined;
    return ctx.modules[node.target]?.type;
}

function matchesEntry(node: OperationNode.Class, entry: AllowListEntry, ctx: InspectionContext): boolean {
    switch (node.kind) {
        case "call_module": {
            const type = moduleType(node, ctx);
            return type !== undefined && entry.modules.includes(type);
        }
        case "call_function":
            return entry.functions.includes(node.target);
        case "call_method":
            return entry.methods.includes(node.target);
        default:
            return false;
    }
}

function isCategory(
    node: OperationNode.Class,
    ctx: InspectionContext,
    category: FeaturesCategory,
    fallback: () => boolean,
): boolean {
    const ruled = ruledCategory(node, ctx);
    return ruled !== undefined ? ruled === category : fallback();
}

export function isZeroOrOneInput(node: OperationNode.Class): boolean {
    return new Set(node.inputIds).size <= 1;
}

// out_features != in_features in general (convolutions, fully-connected layers)
export function isFeaturesDefining(node: OperationNode.Class, ctx: InspectionContext): boolean {
    if (node.isInput) return true;
    return isCategory(node, ctx, "featuresDefining",
        () => matchesEntry(node, ctx.allowList.featuresDefining, ctx));
}

// out_features == in_features (normalization, pooling, activations, padding)
export function isFeaturesPropagating(node: OperationNode.Class, ctx: InspectionContext): boolean {
    if (node.isInput) return false;
    if (node.kind === "output") return true;
    return isCategory(node, ctx, "featuresPropagating",
        () => matchesEntry(node, ctx.allowList.featuresPropagating, ctx));
}

// all inputs must carry the same number of features (element-wise add, sub)
export function isSharedInputFeatures(node: OperationNode.Class, ctx: InspectionContext): boolean {
    if (node.isInput || isZeroOrOneInput(node)) return false;
    return isCategory(node, ctx, "sharedInputFeatures",
        () => matchesEntry(node, ctx.allowList.sharedInputFeatures, ctx));
}

export function isFlatten(node: OperationNode.Class, ctx: InspectionContext): boolean {
    if (node.isInput) return false;
    return isCategory(node, ctx, "flatten",
        () => matchesEntry(node, ctx.allowList.flatten, ctx));
}

export function isSqueeze(node: OperationNode.Class, ctx: InspectionContext): boolean {
    if (node.isInput) return false;
    return isCategory(node, ctx, "squeeze",
        () => matchesEntry(node, ctx.allowList.squeeze, ctx));
}

// concatenation along the channel axis only
export function isFeaturesConcatenate(node: OperationNode.Class, ctx: InspectionContext): boolean {
    if (node.isInput) return false;
    return isCategory(node, ctx, "featuresConcatenate", () => {
        if (!matchesEntry(node, ctx.allowList.featuresConcatenate, ctx)) return false;
        const dim = node.tryGetArg(0, "dim") ?? 0;
        if (!isInteger(dim)) return false;
        if (dim >= 0) return dim === CHANNEL_DIM;
        const rank = node.shape?.length;
        return rank !== undefined && normalizeDim(dim, rank) === CHANNEL_DIM;
    });
}

// functional layers carry no module the search could replace
export function isUntouchable(node: OperationNode.Class, ctx: InspectionContext): boolean {
    return node.kind === "call_function" && ctx.allowList.untouchable.functions.includes(node.target);
}

export function inspectNode(node: OperationNode.Class, ctx: InspectionContext): NodeFlags {
    return {
        featuresPropagating: isFeaturesPropagating(node, ctx),
        featuresDefining: isFeaturesDefining(node, ctx),
        sharedInputFeatures: isSharedInputFeatures(node, ctx),
        flatten: isFlatten(node, ctx),
        squeeze: isSqueeze(node, ctx),
        featuresConcatenate: isFeaturesConcatenate(node, ctx),
        untouchable: isUntouchable(node, ctx),
        zeroOrOneInput: isZeroOrOneInput(node),
    };
}

/**
 * The single semantic category of `flags`. Input nodes are always
 * features-defining.
 */
export function categoryOf(node: OperationNode.Class, flags: NodeFlags): FeaturesCategory {
    if (node.isInput) return "featuresDefining";

    const matched = FEATURES_CATEGORIES.filter((category) => flags[category]);

    if (matched.length === 0) {
        throw new UnsupportedNodeError(node.id, node.kind, node.target);
    }
    if (matched.length > 1) {
        throw new UnsupportedNodeError(node.id, node.kind, node.target,
            `matches several categories (${matched.join(", ")})`);
    }
    return matched[0];
}

export function createInspectionContext(
    modules: ModuleRegistry,
    allowList: AllowList,
    classifierRules: readonly ClassifierRule[] = [],
): InspectionContext {
    return { modules, allowList, classifierRules };
}
