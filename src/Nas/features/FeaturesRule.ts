import type NasGraph from "../NasGraph.js";
import type OperationNode from "../OperationNode.js";
import type { InspectionContext } from "../inspection/Inspection.js";
import type FeaturesCalculator from "./FeaturesCalculator.js";

export interface FeaturesRuleContext extends InspectionContext {
    graph: NasGraph.Class;
    // already carry their calculators
    predecessors: OperationNode.Class[];
}

/**
 * Search-method specific calculator construction, tried before the built-in
 * rules. Returning `undefined` leaves the node to the next rule.
 */
export interface FeaturesRule {
    readonly name: string;
    build(node: OperationNode.Class, ctx: FeaturesRuleContext): FeaturesCalculator | undefined;
}
