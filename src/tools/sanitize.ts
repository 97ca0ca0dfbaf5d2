import type { ToolDescriptor } from "../types.ts";
import { getToolDescriptor, type ToolName } from "./index.ts";
import { isPlainObject, type PhotoGrants, type ToolAmbient, type ToolArguments, type ToolScope } from "./shared.ts";

export type SanitizedCall =
  | { tool: "search"; args: ToolArguments }
  | { tool: "general_knowledge_search"; args: ToolArguments }
  | { tool: "analyze_photo"; args: ToolArguments; grants: PhotoGrants };

/**
 * Parses model-generated arguments and keeps only params declared by the tool with the declared
 * type. Unparsable or non-object JSON yields an empty set; this never throws.
 */
export function parseToolArguments(descriptor: ToolDescriptor, raw: string): Record<string, string | boolean> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (!isPlainObject(parsed)) return {};

  const args: Record<string, string | boolean> = {};
  for (const [param, value] of Object.entries(parsed)) {
    if (!Object.prototype.hasOwnProperty.call(descriptor.parameters, param)) continue;
    const declared = descriptor.parameters[param];
    if (declared.type === "string" && typeof value === "string") args[param] = value;
    if (declared.type === "boolean" && typeof value === "boolean") args[param] = value;
  }
  return args;
}

export function prepareToolArguments(tool: ToolName, rawArguments: string, ambient: ToolAmbient, scope: ToolScope): SanitizedCall {
  const parsed = parseToolArguments(getToolDescriptor(tool), rawArguments);
  const query = typeof parsed.query === "string" ? parsed.query : ambient.userMessage;
  const args: ToolArguments = { ...parsed, query, location: ambient.location ? ambient.location : "unknown" };

  switch (tool) {
    case "search":
    case "general_knowledge_search":
      return { tool, args };
    case "analyze_photo":
      return {
        tool,
        args,
        grants: {
          imageBytes: ambient.imageBytes,
          location: ambient.location,
          localTime: ambient.localTime,
          learnedContext: ambient.learnedContext,
          vision: ambient.vision,
          webSearch: ambient.webSearch,
          prompts: ambient.prompts,
          scope,
        },
      };
  }
}
