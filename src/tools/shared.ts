import type { Prompts } from "../prompts.ts";
import type { Capability, LearnedContext, TokenUsageByModel, Vision, WebSearch, WebSearchResult } from "../types.ts";

/** Arguments after validation: only declared, correctly typed params plus the injected defaults. */
export type ToolArguments = {
  query: string;
  location: string;
  [param: string]: string | boolean;
};

/**
 * Accumulators owned by a single tool invocation. Concurrent invocations never share one; the
 * assistant folds them into the turn's totals once every call has finished.
 */
export type ToolScope = {
  tokenUsage: TokenUsageByModel;
  capabilities: Capability[];
};

/** Ambient turn state every tool call may draw on. Never exposed in a tool schema. */
export type ToolAmbient = {
  userMessage: string;
  imageBytes: Uint8Array | null;
  location: string | null;
  localTime: string | null;
  learnedContext: LearnedContext;
  webSearch: WebSearch;
  vision: Vision;
  prompts: Prompts;
};

/** Caller-only values handed to the photo tool. */
export type PhotoGrants = {
  imageBytes: Uint8Array | null;
  location: string | null;
  localTime: string | null;
  learnedContext: LearnedContext;
  vision: Vision;
  webSearch: WebSearch;
  prompts: Prompts;
  scope: ToolScope;
};

export type ToolOutput = string | WebSearchResult;

export function createToolScope(): ToolScope {
  return { tokenUsage: {}, capabilities: [] };
}

export function toolOutputText(output: ToolOutput): string {
  return typeof output === "string" ? output : output.summary;
}

export function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

export function envFlag(name: string, fallback: boolean, env: NodeJS.ProcessEnv = process.env) {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return fallback;
}
