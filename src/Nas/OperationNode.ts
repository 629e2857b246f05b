import BaseNode from "@specs-feup/flow/graph/BaseNode";
import Node from "@specs-feup/flow/graph/Node";
import { EdgeCollection } from "@specs-feup/flow/graph/EdgeCollection";
import NasEdge from "./NasEdge.js";
import type FeaturesCalculator from "./features/FeaturesCalculator.js";
import {
  FEATURES_CATEGORIES,
  type ArgValue,
  type FeaturesCategory,
  type NodeFlags,
  type OperationKind,
  type Shape,
} from "./NasTypes.js";

/**
 * One operation of a traced forward graph.
 *
 * Everything the loader knows (kind, target, arguments, static shape) and the
 * classification flags live in `data`. The features calculator and the
 * back-reference point at other objects, so they are kept in `scratchData`.
 */
namespace OperationNode {

  export const TAG = "__features-flow__operation_node";
  export const VERSION = "1";

  export type InputFeaturesSetBy = Class | Class[];

  export class Class<
    D extends Data = Data,
    S extends ScratchData = ScratchData,
  > extends BaseNode.Class<D, S> {

    get kind(): OperationKind {
      return this.data[TAG].kind;
    }

    get target(): string {
      return this.data[TAG].target;
    }

    get isInput(): boolean {
      return this.kind === "input";
    }

    // ids of the producers, in argument order (may repeat)
    get inputIds(): string[] {
      return this.data[TAG].inputs;
    }

    get args(): ArgValue[] {
      return this.data[TAG].args;
    }

    get kwargs(): Record<string, ArgValue> {
      return this.data[TAG].kwargs;
    }

    get shape(): Shape | undefined {
      return this.data[TAG].shape;
    }

    set shape(shape: Shape | undefined) {
      this.data[TAG].shape = shape;
    }

    get flags(): NodeFlags | undefined {
      return this.data[TAG].flags;
    }

    set flags(flags: NodeFlags | undefined) {
      this.data[TAG].flags = flags;
    }

    // first semantic category set in the flags
    get category(): FeaturesCategory | undefined {
      const flags = this.flags;
      if (flags === undefined) return undefined;
      return FEATURES_CATEGORIES.find((category) => flags[category]);
    }

    get featuresCalculator(): FeaturesCalculator | undefined {
      return this.scratchData[TAG].featuresCalculator;
    }

    set featuresCalculator(calculator: FeaturesCalculator | undefined) {
      this.scratchData[TAG].featuresCalculator = calculator;
    }

    get inputFeaturesSetBy(): InputFeaturesSetBy | undefined {
      return this.scratchData[TAG].inputFeaturesSetBy;
    }

    set inputFeaturesSetBy(setBy: InputFeaturesSetBy | undefined) {
      this.scratchData[TAG].inputFeaturesSetBy = setBy;
    }

    get getIncomers(): EdgeCollection<NasEdge.Class> {
      return this.incomers.filterIs(NasEdge);
    }

    get getOutgoers(): EdgeCollection<NasEdge.Class> {
      return this.outgoers.filterIs(NasEdge);
    }

    /**
     * Looks an argument up first among the positional arguments, then among
     * the keyword ones. `null` counts as absent.
     */
    tryGetArg(position: number, name: string): ArgValue | undefined {
      if (this.args.length > position) {
        return this.args[position] ?? undefined;
      }
      return this.kwargs[name] ?? undefined;
    }
  }

  export class Builder implements Node.Builder<Data, ScratchData> {
    private kind: OperationKind;
    private target: string;
    private inputs: string[];
    private args: ArgValue[];
    private kwargs: Record<string, ArgValue>;
    private shape?: Shape;

    constructor(
      kind: OperationKind,
      target: string,
      inputs: string[] = [],
      args: ArgValue[] = [],
      kwargs: Record<string, ArgValue> = {},
      shape?: Shape,
    ) {
      this.kind = kind;
      this.target = target;
      this.inputs = inputs;
      this.args = args;
      this.kwargs = kwargs;
      this.shape = shape;
    }

    buildData(data: BaseNode.Data): Data {
      return {
        ...data,
        [TAG]: {
          version: VERSION,
          kind: this.kind,
          target: this.target,
          inputs: [...this.inputs],
          args: [...this.args],
          kwargs: { ...this.kwargs },
          shape: this.shape ? [...this.shape] : undefined,
        },
      };
    }

    buildScratchData(scratchData: BaseNode.ScratchData): ScratchData {
      return {
        ...scratchData,
        [TAG]: {},
      };
    }
  }

  export const TypeGuard = Node.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

  export interface Data extends BaseNode.Data {
    [TAG]: {
      version: typeof VERSION;
      kind: OperationKind;
      target: string;
      inputs: string[];
      args: ArgValue[];
      kwargs: Record<string, ArgValue>;
      shape?: Shape;
      flags?: NodeFlags;
    };
  }

  export interface ScratchData extends BaseNode.ScratchData {
    [TAG]: {
      featuresCalculator?: FeaturesCalculator;
      inputFeaturesSetBy?: InputFeaturesSetBy;
    };
  }

}

export default OperationNode;
