import type { ToolDefinition, ToolDescriptor } from "../types.ts";
import { analyzePhotoDefinition } from "./analyze_photo.ts";
import { toToolDefinition } from "./catalog.ts";
import { generalKnowledgeDefinition } from "./general_knowledge.ts";
import { searchDefinition } from "./search.ts";

// Order matters: this is the catalog advertised to the model, and names and params are wire contract.
export const toolDescriptors = [generalKnowledgeDefinition, searchDefinition, analyzePhotoDefinition] as const;

export type ToolName = (typeof toolDescriptors)[number]["name"];

export const TOOL_NAMES: readonly ToolName[] = toolDescriptors.map((d) => d.name);

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((known) => known === name);
}

export function getToolDescriptor(name: ToolName): ToolDescriptor<ToolName> {
  switch (name) {
    case "general_knowledge_search":
      return generalKnowledgeDefinition;
    case "search":
      return searchDefinition;
    case "analyze_photo":
      return analyzePhotoDefinition;
  }
}

export const toolDefinitions: ToolDefinition[] = toolDescriptors.map(toToolDefinition);
