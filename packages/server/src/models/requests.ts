import { vertexNameSchema } from "@town-sim/routing";
import { z } from "zod";

/** A road weight in a request body: non-negative, or `null` for a closed road */
export const weightSchema = z.number().nonnegative().nullable();

export const addVertexRequestSchema = z.object({
  name: vertexNameSchema,
  position: z.object({ x: z.number(), y: z.number() }).optional(),
});

export const connectRequestSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  weight: weightSchema,
});

export const updateEdgeRequestSchema = z.object({
  weight: weightSchema,
});

export const addCarRequestSchema = z.object({
  origin: z.string().min(1),
  destination: z.string().min(1),
  /** Reject (409 unreachable) instead of adding a stranded car */
  requireRoute: z.boolean().optional(),
});

export const tickRequestSchema = z.object({
  weightChanges: z.array(z.object({ edge: z.string().min(1), weight: weightSchema })).optional(),
  advances: z.array(z.string().min(1)).optional(),
});

export const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().nonnegative().optional(),
});

export const vertexParamsSchema = z.object({ name: z.string().min(1) });
export const edgeParamsSchema = z.object({ from: z.string().min(1), to: z.string().min(1) });
export const carParamsSchema = z.object({ id: z.string().min(1) });

export type AddVertexRequest = z.infer<typeof addVertexRequestSchema>;
export type ConnectRequest = z.infer<typeof connectRequestSchema>;
export type UpdateEdgeRequest = z.infer<typeof updateEdgeRequestSchema>;
export type AddCarRequest = z.infer<typeof addCarRequestSchema>;
export type TickRequestBody = z.infer<typeof tickRequestSchema>;

/** JSON weights use `null` for a closed road */
export function weightFromJson(weight: number | null): number {
  return weight ?? Infinity;
}
