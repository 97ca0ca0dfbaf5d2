import type { WebSearch, WebSearchResult } from "../types.ts";
import { defineTool } from "./catalog.ts";
import type { ToolArguments } from "./shared.ts";

export const searchDefinition = defineTool({
  name: "search",
  description: "Provides up to date information on news, retail products, current events, and esoteric knowledge",
  parameters: {
    query: { type: "string", description: "search query", required: true },
  },
});

export async function searchTool(args: ToolArguments, webSearch: WebSearch): Promise<WebSearchResult> {
  return webSearch.search({ query: args.query, location: args.location });
}
