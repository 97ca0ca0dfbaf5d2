import OpenAI from "openai";
import type { ChatCompletionContentPart } from "openai/resources/chat/completions";
import type { WebSearch, WebSearchRequest, WebSearchResult } from "./types.ts";
import { toDataUrl } from "./vision.ts";

const PERPLEXITY_BASE_URL = "https://api.perplexity.ai";

export class EchoSearch implements WebSearch {
  async search(request: WebSearchRequest): Promise<WebSearchResult> {
    return {
      summary: `Echo: ${request.query}`,
      searchProviderMetadata: JSON.stringify({ provider: "echo", query: request.query }),
    };
  }
}

/** Web search through Perplexity's OpenAI-compatible chat endpoint. */
export class PerplexitySearch implements WebSearch {
  private client: OpenAI;
  private model: string;

  constructor(apiKey: string, model = "sonar") {
    if (!apiKey) {
      throw new Error("SIGHTLINE_PERPLEXITY_API_KEY is required for the perplexity search provider");
    }
    this.client = new OpenAI({ apiKey, baseURL: PERPLEXITY_BASE_URL });
    this.model = model;
  }

  async search(request: WebSearchRequest): Promise<WebSearchResult> {
    const location = request.location && request.location !== "unknown" ? request.location : null;
    const system = [
      "Answer in one or two sentences using current web results.",
      location ? `The user is located at: ${location}.` : "",
    ].filter(Boolean).join(" ");
    const content: ChatCompletionContentPart[] = [{ type: "text", text: request.query }];
    if (request.usePhoto && request.imageBytes) {
      content.push({ type: "image_url", image_url: { url: toDataUrl(request.imageBytes) } });
    }
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content },
      ],
    });
    return {
      summary: completion.choices[0]?.message.content ?? "",
      searchProviderMetadata: JSON.stringify({
        provider: "perplexity",
        model: this.model,
        query: request.query,
        usedPhoto: request.usePhoto === true,
      }),
    };
  }
}

export function buildWebSearch(provider: string, env: NodeJS.ProcessEnv = process.env): WebSearch {
  if (provider === "perplexity") {
    return new PerplexitySearch(env.SIGHTLINE_PERPLEXITY_API_KEY ?? env.PERPLEXITY_API_KEY ?? "", env.SIGHTLINE_PERPLEXITY_MODEL);
  }
  return new EchoSearch();
}
