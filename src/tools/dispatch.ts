import type { ToolCallDescriptor } from "../types.ts";
import { analyzePhotoTool } from "./analyze_photo.ts";
import { generalKnowledgeTool } from "./general_knowledge.ts";
import { isToolName } from "./index.ts";
import { prepareToolArguments, type SanitizedCall } from "./sanitize.ts";
import { searchTool } from "./search.ts";
import { createToolScope, toolOutputText, type ToolAmbient, type ToolOutput, type ToolScope } from "./shared.ts";

export const HALLUCINATED_TOOL_ERROR =
  "Error: you hallucinated a tool that doesn't exist. Tell user you had trouble interpreting the request and ask them to rephrase it.";

export type ToolUsageRecord = {
  tool: string;
  tool_args: Record<string, unknown>;
  tool_time: number;
  search_result?: string;
};

export type ToolDebugRecord = ToolUsageRecord | { tool: string; hallucinated: "true" };

export type ToolInvocation = {
  output: string;
  debug: ToolDebugRecord;
  scope: ToolScope;
};

/**
 * Runs one model-requested tool call. An unknown tool name is not an error: the returned output
 * tells the model to ask the user to rephrase. Failures inside a handler propagate.
 */
export async function handleTool(call: ToolCallDescriptor, ambient: ToolAmbient): Promise<ToolInvocation> {
  const scope = createToolScope();
  if (!isToolName(call.name)) {
    return { output: HALLUCINATED_TOOL_ERROR, debug: { tool: call.name, hallucinated: "true" }, scope };
  }

  const sanitized = prepareToolArguments(call.name, call.arguments, ambient, scope);
  const started = performance.now();
  const result = await invoke(sanitized, ambient);
  const toolTime = Math.round(performance.now() - started) / 1000;

  // The photo tool records its own capability since it can take more than one path.
  if (sanitized.tool === "search") scope.capabilities.push("web_search");
  else if (sanitized.tool === "general_knowledge_search") scope.capabilities.push("assistant_knowledge");

  const debug: ToolUsageRecord = {
    tool: sanitized.tool,
    tool_args: describeToolArguments(sanitized),
    tool_time: toolTime,
  };
  if (typeof result !== "string" && result.searchProviderMetadata) {
    debug.search_result = result.searchProviderMetadata;
  }
  return { output: toolOutputText(result), debug, scope };
}

async function invoke(call: SanitizedCall, ambient: ToolAmbient): Promise<ToolOutput> {
  switch (call.tool) {
    case "search":
      return searchTool(call.args, ambient.webSearch);
    case "general_knowledge_search":
      return generalKnowledgeTool(call.args);
    case "analyze_photo":
      return analyzePhotoTool(call.args, call.grants);
  }
}

/** Arguments as they appear in the debug trace: image bytes redacted, service handles dropped. */
export function describeToolArguments(call: SanitizedCall): Record<string, unknown> {
  const described: Record<string, unknown> = { ...call.args };
  if (call.tool === "analyze_photo") {
    described.image_bytes = call.grants.imageBytes ? "<bytes>" : null;
    described.local_time = call.grants.localTime;
    described.learned_context = call.grants.learnedContext;
  }
  return described;
}
