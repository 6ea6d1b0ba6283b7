import { z } from "zod";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

/** One entry of a component's configuration map. Keys beyond these are carried through untouched. */
export const fieldSpecSchema = z
  .object({
    value: jsonValueSchema.optional(),
    required: z.boolean().optional(),
    type: z.string().optional()
  })
  .catchall(jsonValueSchema);

export type FieldSpec = z.infer<typeof fieldSpecSchema>;

const inputPortSchema = z.object({
  name: z.string().min(1),
  dataKinds: z.array(z.string().min(1)).min(1),
  fieldType: z.string().min(1).default("str")
});

const outputPortSchema = z.object({
  name: z.string().min(1),
  dataKind: z.string().min(1)
});

export const blueprintDocumentSchema = z.object({
  componentType: z.enum(["EntryPoint", "ConversationAgent", "BinaryGate", "ExitPoint"]),
  runtimeType: z.string().min(1),
  displayName: z.string().min(1),
  description: z.string().default(""),
  template: z.record(fieldSpecSchema),
  inputs: z.array(inputPortSchema).default([]),
  outputs: z.array(outputPortSchema).default([]),
  fieldRoles: z
    .object({
      instruction: z.string().optional(),
      matchText: z.string().optional(),
      operator: z.string().optional(),
      caseSensitive: z.string().optional(),
      defaultRoute: z.string().optional(),
      maxIterations: z.string().optional(),
      implementation: z.string().optional()
    })
    .strict()
    .default({}),
  portRoles: z
    .object({
      primaryInput: z.string().optional(),
      primaryOutput: z.string().optional(),
      trueOutput: z.string().optional(),
      falseOutput: z.string().optional()
    })
    .strict()
    .default({}),
  baseClasses: z.array(z.string()).default([])
});

export type BlueprintDocument = z.infer<typeof blueprintDocumentSchema>;

/** Renders zod issues as "path: message" lines. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}
