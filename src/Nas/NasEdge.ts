import BaseEdge from "@specs-feup/flow/graph/BaseEdge";
import Edge from "@specs-feup/flow/graph/Edge";

namespace NasEdge {
    export const TAG = "__features-flow__nas_edge";
    export const VERSION = "1";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseEdge.Class<D, S> {
        // every position of the source in the target's input list
        get inputIndices(): number[] {
            return this.data[TAG].inputIndices;
        }
    }

    export class Builder implements Edge.Builder<Data, ScratchData> {
        private inputIndices: number[];

        constructor(inputIndices: number[]) {
            this.inputIndices = inputIndices;
        }

        buildData(data: BaseEdge.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    inputIndices: [...this.inputIndices],
                },
            };
        }

        buildScratchData(scratchData: BaseEdge.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Edge.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseEdge.Data {
        [TAG]: {
            version: typeof VERSION;
            inputIndices: number[];
        };
    }

    export interface ScratchData extends BaseEdge.ScratchData {}
}
export default NasEdge;
