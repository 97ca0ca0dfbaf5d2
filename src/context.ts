import { DEFAULT_PROMPTS, LEARNED_CONTEXT_KEY_DESCRIPTIONS, type Prompts } from "./prompts.ts";
import type { LearnedContext, LearnedContextKey, LLMClient, Message, TokenUsageByModel } from "./types.ts";
import { accumulateTokenUsage } from "./usage.ts";

const RESERVED_KEYS = new Set(["current_time", "location"]);
const MAX_USER_MESSAGES_FOR_EXTRACTION = 2;

/**
 * Builds the grounding block the model sees as an extra system message: local time, location,
 * and anything learned about the user. Time and location come first and cannot be replaced by
 * learned entries.
 */
export function createContextMessage(
  localTime: string | null | undefined,
  location: string | null | undefined,
  learnedContext: LearnedContext | null | undefined,
  prompts: Prompts = DEFAULT_PROMPTS,
): string {
  const context = new Map<string, string>();
  context.set("current_time", localTime ? localTime : prompts.unknownTime);
  context.set("location", location ? location : prompts.unknownLocation);
  for (const [key, value] of Object.entries(learnedContext ?? {})) {
    if (RESERVED_KEYS.has(key)) continue;
    if (typeof value === "string") context.set(key, value);
  }
  const tags = [...context.entries()]
    .filter(([, value]) => value.length > 0)
    .map(([key, value]) => `<${key}>${value}</${key}>`);
  return [prompts.contextPrefix, ...tags].join("\n");
}

export function isLearnedContextKey(key: string): key is LearnedContextKey {
  return Object.prototype.hasOwnProperty.call(LEARNED_CONTEXT_KEY_DESCRIPTIONS, key);
}

/** Parses `KEY=VALUE` lines; anything else (including `END`) is ignored. */
export function parseLearnedContext(output: string): LearnedContext {
  const learned: LearnedContext = {};
  for (const line of output.split(/\r?\n/)) {
    const parts = line.split("=");
    if (parts.length !== 2) continue;
    const [key, value] = parts;
    if (isLearnedContextKey(key)) learned[key] = value;
  }
  return learned;
}

export async function extractLearnedContext(args: {
  client: LLMClient;
  model: string;
  history: Message[];
  tokenUsage: TokenUsageByModel;
  prompts?: Prompts;
}): Promise<LearnedContext> {
  const prompts = args.prompts ?? DEFAULT_PROMPTS;
  const recent = args.history
    .filter((m) => m.role === "user")
    .slice(-MAX_USER_MESSAGES_FOR_EXTRACTION);
  const completion = await args.client.generate({
    model: args.model,
    messages: [{ role: "system", content: prompts.learnedContextExtraction }, ...recent],
  });
  accumulateTokenUsage(args.tokenUsage, args.model, completion.usage);
  return parseLearnedContext(completion.content ?? "");
}
