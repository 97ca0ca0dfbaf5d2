import { createContextMessage } from "../context.ts";
import { accumulateTokenUsage } from "../usage.ts";
import { defineTool } from "./catalog.ts";
import type { PhotoGrants, ToolArguments, ToolOutput } from "./shared.ts";

export const REVERSE_IMAGE_SEARCH_PARAM = "google_reverse_image_search";
export const TRANSLATE_PARAM = "translate";

export const NO_PHOTO_ERROR =
  "Error: no photo supplied. Tell user: I think you're referring to something you can see. Can you provide a photo?";

export const analyzePhotoDefinition = defineTool({
  name: "analyze_photo",
  description: [
    "Analyzes or describes the photo you have from the user's current perspective.",
    "Use this tool if user refers to something not identifiable from conversation context, such as with a demonstrative pronoun.",
  ].join("\n"),
  parameters: {
    query: {
      type: "string",
      description:
        "User's query to answer, describing what they want answered, expressed as a command that NEVER refers to the photo or image itself",
      required: true,
    },
    [REVERSE_IMAGE_SEARCH_PARAM]: {
      type: "boolean",
      description:
        "True ONLY if user wants to look up facts about contents of photo online (simply identifying what is in the photo does not count), otherwise always false",
      required: true,
    },
    [TRANSLATE_PARAM]: {
      type: "boolean",
      description: "Translation of something in user's view required",
      required: true,
    },
  },
});

export function stripQuotes(text: string) {
  return text.trim().replace(/^"+|"+$/g, "");
}

/**
 * Answers a question about what the user is looking at. With reverse image search requested the
 * vision model only writes a search query, which is then run against the web together with the
 * image. Translation always goes straight to vision.
 */
export async function analyzePhotoTool(args: ToolArguments, grants: PhotoGrants): Promise<ToolOutput> {
  const { imageBytes, prompts, scope } = grants;
  if (!imageBytes || imageBytes.length === 0) {
    return NO_PHOTO_ERROR;
  }

  const grounding = createContextMessage(grants.localTime, grants.location, grants.learnedContext, prompts);
  const reverseImageSearch = args[REVERSE_IMAGE_SEARCH_PARAM] === true;
  const translate = args[TRANSLATE_PARAM] === true;

  if (reverseImageSearch && !translate) {
    scope.capabilities.push("reverse_image_search");
    const result = await grants.vision.analyze({
      systemPrompt: `${prompts.reverseImageSearchQuery}\n\n${grounding}`,
      query: args.query,
      imageBytes,
    });
    if (result.usage) accumulateTokenUsage(scope.tokenUsage, result.usage.model, result.usage);
    return grants.webSearch.search({
      query: stripQuotes(result.text),
      usePhoto: true,
      imageBytes,
      location: args.location,
    });
  }

  scope.capabilities.push("vision");
  const result = await grants.vision.analyze({
    systemPrompt: `${prompts.photoDescription}\n\n${grounding}`,
    query: args.query,
    imageBytes,
  });
  if (result.usage) accumulateTokenUsage(scope.tokenUsage, result.usage.model, result.usage);
  return result.text;
}
