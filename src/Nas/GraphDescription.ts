import { z } from "zod";
import { OPERATION_KINDS } from "./NasTypes.js";

const ArgValueSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.null(),
  z.array(z.number()),
]);

export const ShapeSchema = z.array(z.number().int().positive());

export const GraphNodeSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(OPERATION_KINDS),
  // defaults to the id
  target: z.string().min(1).optional(),
  inputs: z.array(z.string().min(1)).default([]),
  // positional arguments other than the input tensors
  args: z.array(ArgValueSchema).default([]),
  kwargs: z.record(ArgValueSchema).default({}),
  shape: ShapeSchema.optional(),
});

export const ModuleSpecSchema = z.object({
  type: z.string().min(1),
  config: z.record(ArgValueSchema).default({}),
});

export const GraphDescriptionSchema = z.object({
  name: z.string().min(1).default("network"),
  modules: z.record(ModuleSpecSchema).default({}),
  nodes: z.array(GraphNodeSchema).min(1, "a graph needs at least one node"),
});

export type GraphNodeDescription = z.infer<typeof GraphNodeSchema>;
export type GraphDescription = z.infer<typeof GraphDescriptionSchema>;
export type GraphDescriptionInput = z.input<typeof GraphDescriptionSchema>;
