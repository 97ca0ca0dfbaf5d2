import { defineTool } from "./catalog.ts";
import type { ToolArguments } from "./shared.ts";

export const generalKnowledgeDefinition = defineTool({
  name: "general_knowledge_search",
  description: "Trivial and general knowledge that would be expected to exist in Wikipedia or an encyclopedia",
  parameters: {
    query: { type: "string", description: "search query", required: true },
  },
});

// Deliberately empty: the follow-up completion answers from the model's own knowledge.
export async function generalKnowledgeTool(_args: ToolArguments): Promise<string> {
  return "";
}
