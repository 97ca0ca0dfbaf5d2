import { Buffer } from "node:buffer";
import OpenAI from "openai";
import type { Vision, VisionRequest, VisionResult } from "./types.ts";

export class EchoVision implements Vision {
  async analyze(request: VisionRequest): Promise<VisionResult> {
    return { text: `Echo: ${request.query}` };
  }
}

export class OpenAIVision implements Vision {
  private client: OpenAI;
  private model: string;

  constructor(model: string, apiKey: string, baseURL?: string) {
    if (!apiKey) {
      throw new Error("SIGHTLINE_OPENAI_API_KEY is required for OpenAI vision");
    }
    this.client = new OpenAI({ apiKey, baseURL });
    this.model = model;
  }

  async analyze(request: VisionRequest): Promise<VisionResult> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: request.systemPrompt },
        {
          role: "user",
          content: [
            { type: "text", text: request.query },
            { type: "image_url", image_url: { url: toDataUrl(request.imageBytes) } },
          ],
        },
      ],
    });
    const text = completion.choices[0]?.message.content ?? "";
    const usage = completion.usage
      ? {
          model: this.model,
          inputTokens: completion.usage.prompt_tokens,
          outputTokens: completion.usage.completion_tokens,
          totalTokens: completion.usage.total_tokens,
        }
      : undefined;
    return { text, usage };
  }
}

export function buildVision(provider: string, model: string, env: NodeJS.ProcessEnv = process.env): Vision {
  if (provider === "openai") {
    const apiKey = env.SIGHTLINE_OPENAI_API_KEY ?? env.OPENAI_API_KEY;
    const baseURL = env.SIGHTLINE_OPENAI_BASE_URL ?? env.OPENAI_BASE_URL;
    return new OpenAIVision(model, apiKey ?? "", baseURL);
  }
  return new EchoVision();
}

/** Camera frames are JPEG; PNG is recognized by its signature for uploads from elsewhere. */
export function guessImageMimeType(bytes: Uint8Array): string {
  const png = [0x89, 0x50, 0x4e, 0x47];
  if (bytes.length >= png.length && png.every((b, i) => bytes[i] === b)) return "image/png";
  return "image/jpeg";
}

export function toDataUrl(bytes: Uint8Array): string {
  return `data:${guessImageMimeType(bytes)};base64,${Buffer.from(bytes).toString("base64")}`;
}
