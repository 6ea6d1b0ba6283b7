import { z } from "zod";

const extractionFieldSchema = z
  .object({
    title: z.string().min(1),
    type: z.string().default("string"),
    enum: z.array(z.string()).optional(),
    description: z.string().default("")
  })
  .passthrough();

export const sourceNodeSchema = z
  .object({
    name: z.string().min(1),
    type: z.string().default("conversation"),
    prompt: z.string().default(""),
    isStart: z.boolean().default(false),
    messagePlan: z.object({ firstMessage: z.string().optional() }).passthrough().optional(),
    variableExtractionPlan: z.object({ output: z.array(extractionFieldSchema).default([]) }).passthrough().optional(),
    tool: z.object({ type: z.string().default("unknown") }).passthrough().optional(),
    metadata: z
      .object({ position: z.object({ x: z.coerce.number(), y: z.coerce.number() }).optional() })
      .passthrough()
      .optional()
  })
  .passthrough();

export const sourceEdgeSchema = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
    condition: z
      .object({ type: z.string().default("ai"), prompt: z.string().default("") })
      .passthrough()
      .optional()
  })
  .passthrough();

export const workflowSchema = z
  .object({
    name: z.string().optional(),
    nodes: z.array(sourceNodeSchema),
    edges: z.array(sourceEdgeSchema).default([])
  })
  .passthrough();

export type RawSourceNode = z.infer<typeof sourceNodeSchema>;
export type RawSourceEdge = z.infer<typeof sourceEdgeSchema>;
