import { promises as fs } from "node:fs";
import path from "node:path";
import type { LearnedContextKey } from "./types.ts";
import { isPlainObject } from "./tools/shared.ts";

export type Prompts = Readonly<{
  system: string;
  photoDescription: string;
  reverseImageSearchQuery: string;
  contextPrefix: string;
  unknownTime: string;
  unknownLocation: string;
  learnedContextExtraction: string;
}>;

export const LEARNED_CONTEXT_KEY_DESCRIPTIONS: Readonly<Record<LearnedContextKey, string>> = Object.freeze({
  UserName: "User's name",
  DOB: "User's date of birth",
  Food: "Foods and drinks user has expressed interest in",
});

const learnedContextExtraction = [
  "Given a transcript of what the user said, look for any of the following information being revealed:",
  "",
  ...Object.entries(LEARNED_CONTEXT_KEY_DESCRIPTIONS).map(([key, description]) => `${key}: ${description}`),
  "",
  "Make sure to list them in this format:",
  "",
  "KEY=VALUE",
  "",
  'If nothing was found, just say "END". ONLY PRODUCE ITEMS WHEN THE USER HAS ACTUALLY REVEALED THEM.',
].join("\n");

export const DEFAULT_PROMPTS: Prompts = Object.freeze({
  system: [
    "You are a smart personal AI assistant inside the user's camera glasses that answers all user",
    "queries and questions. You have access to a photo from the glasses camera of what the user was",
    "seeing at the time they spoke.",
    "",
    "Make your responses short (one or two sentences) and precise. Respond without any preamble when giving",
    "translations, just translate directly. When analyzing the user's view, speak as if you can actually",
    "see and never make references to the photo or image you analyzed.",
  ].join("\n"),
  photoDescription: [
    "You are a smart personal AI assistant inside the user's camera glasses that answers all user",
    "queries and questions. You have access to a photo from the glasses camera of what the user was",
    "seeing at the time they spoke but you NEVER mention the photo or image and instead respond as if you",
    "are actually seeing.",
    "",
    "The camera is VERY low quality but the user is counting on you to interpret the blurry, pixelated",
    "images. NEVER comment on image quality. Do your best with images.",
    "",
    "Make your responses short (one or two sentences) and precise. Respond without any preamble when giving",
    "translations, just translate directly. When analyzing the user's view, speak as if you can actually",
    "see and never make references to the photo or image you analyzed.",
  ].join("\n"),
  reverseImageSearchQuery:
    "You are the photo tool. With help of the photo and the user's query, make a short (1 SENTENCE) and concise search query that can be searched on the internet with reverse image search to answer the user. The query must NEVER mention the photo or image.",
  contextPrefix: "## Additional context about the user:",
  unknownTime: "If asked, tell user you don't know current date or time because clock is broken",
  unknownLocation: "You do not know user's location and if asked, tell them so",
  learnedContextExtraction,
});

/** Reads a JSON object of prompt overrides on top of `base`. Unknown keys and non-string values throw. */
export async function loadPrompts(file?: string | null, base: Prompts = DEFAULT_PROMPTS): Promise<Prompts> {
  if (!file) return base;
  const abs = path.resolve(process.cwd(), file);
  const raw: unknown = JSON.parse(await fs.readFile(abs, "utf8"));
  if (!isPlainObject(raw)) throw new Error(`Prompt overrides in ${file} must be a JSON object`);
  const merged: Record<keyof Prompts, string> = { ...base };
  for (const [key, value] of Object.entries(raw)) {
    if (!isPromptKey(key, base)) throw new Error(`Unknown prompt '${key}' in ${file}`);
    if (typeof value !== "string") throw new Error(`Prompt '${key}' in ${file} must be a string`);
    merged[key] = value;
  }
  return Object.freeze(merged);
}

function isPromptKey(key: string, prompts: Prompts): key is keyof Prompts {
  return Object.prototype.hasOwnProperty.call(prompts, key);
}
