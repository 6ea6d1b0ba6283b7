import type { ExtractionField, SourceNode } from "../types/source.js";

export function firstMessageDirective(firstMessage: string): string {
  return [
    "FIRST MESSAGE: When this is the first turn of the conversation, open with exactly this text:",
    `"${firstMessage}"`,
    "",
    "Then continue with your role:"
  ].join("\n");
}

function sketchField(field: ExtractionField, last: boolean): string {
  const comma = last ? "" : ",";
  if (field.kind === "enum" && field.enumValues && field.enumValues.length > 0) {
    return `  "${field.fieldName}": "${field.enumValues[0]}"${comma} // Options: ${field.enumValues.join(", ")}`;
  }
  const placeholder = field.kind === "number" ? "<number>" : `"<${field.kind}>"`;
  const note = field.description ? ` // ${field.description}` : "";
  return `  "${field.fieldName}": ${placeholder}${comma}${note}`;
}

export function extractionDirective(schema: ExtractionField[]): string {
  return [
    "IMPORTANT: After your response, you MUST extract the following information and output it as JSON:",
    "{",
    ...schema.map((f, i) => sketchField(f, i === schema.length - 1)),
    "}",
    "",
    `Variables to extract: ${schema.map(f => f.fieldName).join(", ")}`,
    "Format: First provide your conversational response, then on a new line output ONLY the JSON object with extracted values."
  ].join("\n");
}

/** Instruction text for a conversational node, with first-message and extraction directives applied. */
export function augmentInstruction(node: SourceNode): string {
  let text = node.instructionText;
  if (node.firstMessage) text = `${firstMessageDirective(node.firstMessage)}\n${text}`;
  if (node.extractionSchema && node.extractionSchema.length > 0) {
    text = `${text}\n\n${extractionDirective(node.extractionSchema)}`;
  }
  return text;
}
