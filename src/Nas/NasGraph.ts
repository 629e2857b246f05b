import BaseGraph from "@specs-feup/flow/graph/BaseGraph";
import Graph from "@specs-feup/flow/graph/Graph";
import { NodeCollection } from "@specs-feup/flow/graph/NodeCollection";
import OperationNode from "./OperationNode.js";
import NasEdge from "./NasEdge.js";
import { MalformedGraphError } from "./Errors.js";
import type { ModuleRegistry } from "./NasTypes.js";

namespace NasGraph {

    export const TAG = "__features-flow__nas_graph";
    export const VERSION = "1";

    export class Class<
        D extends Data = Data,
        S extends ScratchData = ScratchData,
    > extends BaseGraph.Class<D, S> {

        get name(): string {
            return this.data[TAG].name;
        }

        get modules(): ModuleRegistry {
            return this.data[TAG].modules;
        }

        // Retrieve all OperationNodes
        getOperationNodes(): NodeCollection<OperationNode.Class> {
            return this.nodes.filterIs(OperationNode);
        }

        getOperationNode(id: string): OperationNode.Class | undefined {
            return this.getNodeById(id)?.tryAs(OperationNode);
        }

        hasNode(id: string): boolean {
            return this.getNodeById(id) !== undefined;
        }

        getEdge(sourceId: string, targetId: string): NasEdge.Class | undefined {
            const source = this.getNodeById(sourceId);
            const target = this.getNodeById(targetId);
            if (!source || !target) return undefined;

            return source.outgoers
                .filterIs(NasEdge).toArray()
                .find(edge => edge.target.id === target.id);
        }

        /**
         * Adds an operation and one edge from each of its (distinct) inputs.
         * Every input must already be in the graph.
         */
        addOperation(id: string, builder: OperationNode.Builder): OperationNode.Class {
            const node = this.addNode(id).init(builder).as(OperationNode);

            const positions = new Map<string, number[]>();
            node.inputIds.forEach((inputId, index) => {
                positions.set(inputId, [...(positions.get(inputId) ?? []), index]);
            });

            positions.forEach((indices, inputId) => {
                const source = this.getOperationNode(inputId);
                if (source === undefined) {
                    throw new MalformedGraphError(`Node ${id} reads unknown input '${inputId}'`);
                }
                this.addEdge(source, node).init(new NasEdge.Builder(indices)).as(NasEdge);
            });

            return node;
        }

        /**
         * Nodes without predecessors, in insertion order. Only network inputs
         * may lack predecessors.
         */
        inputNodes(): OperationNode.Class[] {
            return this.getOperationNodes().toArray().filter(node => {
                if (node.inputIds.length > 0) return false;
                if (!node.isInput) {
                    throw new MalformedGraphError(
                        `Node ${node.id} (op: ${node.kind}, target: ${node.target}) has no predecessors`,
                    );
                }
                return true;
            });
        }

        outputNodes(): OperationNode.Class[] {
            return this.getOperationNodes().toArray().filter(node => node.kind === "output");
        }

        // Distinct producers of `node`, in argument order
        predecessors(node: OperationNode.Class): OperationNode.Class[] {
            const result: OperationNode.Class[] = [];
            for (const id of new Set(node.inputIds)) {
                const source = this.getOperationNode(id);
                if (source === undefined) {
                    throw new MalformedGraphError(`Node ${node.id} reads unknown input '${id}'`);
                }
                result.push(source);
            }
            return result;
        }

        /**
         * Producer of every input slot of `node`, repeats included, read back
         * from the positions stored on its incoming edges.
         */
        inputsOf(node: OperationNode.Class): OperationNode.Class[] {
            const slots: (OperationNode.Class | undefined)[] = node.inputIds.map(() => undefined);
            node.getIncomers.forEach(edge => {
                const source = edge.source.tryAs(OperationNode);
                edge.inputIndices.forEach(index => {
                    slots[index] = source;
                });
            });
            return slots.map((source, index) => {
                if (source === undefined) {
                    throw new MalformedGraphError(
                        `Node ${node.id} has no edge for input ${index} ('${node.inputIds[index]}')`,
                    );
                }
                return source;
            });
        }

        successors(node: OperationNode.Class): OperationNode.Class[] {
            const seen = new Set<string>();
            return node.getOutgoers.toArray()
                .map(edge => edge.target.tryAs(OperationNode))
                .filter((target): target is OperationNode.Class => {
                    if (target === undefined || seen.has(target.id)) return false;
                    seen.add(target.id);
                    return true;
                });
        }
    }

    export class Builder implements Graph.Builder<Data, ScratchData> {
        private name: string;
        private modules: ModuleRegistry;

        constructor(name: string = "network", modules: ModuleRegistry = {}) {
            this.name = name;
            this.modules = modules;
        }

        buildData(data: BaseGraph.Data): Data {
            return {
                ...data,
                [TAG]: {
                    version: VERSION,
                    name: this.name,
                    modules: this.modules,
                },
            };
        }
        buildScratchData(scratchData: BaseGraph.ScratchData): ScratchData {
            return {
                ...scratchData,
            };
        }
    }

    export const TypeGuard = Graph.TagTypeGuard<Data, ScratchData>(TAG, VERSION);

    export interface Data extends BaseGraph.Data {
        [TAG]: {
            version: typeof VERSION;
            name: string;
            modules: ModuleRegistry;
        };
    }

    export interface ScratchData extends BaseGraph.ScratchData {}

}
export default NasGraph;
