import { envFlag } from "./tools/shared.ts";

export type AssistantConfig = {
  provider: string;
  model: string;
  visionProvider: string;
  visionModel: string;
  searchProvider: string;
  learnContext: boolean;
  promptsFile: string | null;
};

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_VISION_MODEL = "gpt-4o";

export type ConfigOverrides = {
  provider?: string;
  model?: string;
};

/** Command-line overrides win over the environment, and settings derived from them follow. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): AssistantConfig {
  const provider = overrides.provider || env.SIGHTLINE_PROVIDER || "echo";
  return {
    provider,
    model: overrides.model || env.SIGHTLINE_MODEL || DEFAULT_MODEL,
    // Azure deployments are per model, so vision only follows the chat provider when it is OpenAI.
    visionProvider: env.SIGHTLINE_VISION_PROVIDER || (provider === "openai" ? "openai" : "echo"),
    visionModel: env.SIGHTLINE_VISION_MODEL || DEFAULT_VISION_MODEL,
    searchProvider: env.SIGHTLINE_SEARCH_PROVIDER || "echo",
    learnContext: envFlag("SIGHTLINE_LEARN_CONTEXT", false, env),
    promptsFile: env.SIGHTLINE_PROMPTS_FILE || null,
  };
}
