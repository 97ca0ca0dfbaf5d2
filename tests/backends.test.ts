import { Completions } from "openai/resources/chat/completions";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildVision, EchoVision, guessImageMimeType, OpenAIVision, toDataUrl } from "../src/vision.ts";
import { buildWebSearch, EchoSearch, PerplexitySearch } from "../src/web_search.ts";
import { chatCompletion, IMAGE } from "./test_utils.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("image encoding", () => {
  it("recognizes PNG by signature and assumes JPEG otherwise", () => {
    expect(guessImageMimeType(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toBe("image/png");
    expect(guessImageMimeType(IMAGE)).toBe("image/jpeg");
    expect(guessImageMimeType(new Uint8Array([0x89]))).toBe("image/jpeg");
  });

  it("builds base64 data URLs", () => {
    expect(toDataUrl(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toBe("data:image/png;base64,iVBORw==");
    expect(toDataUrl(IMAGE)).toBe("data:image/jpeg;base64,/9j/4AECAw==");
  });
});

describe("vision backends", () => {
  it("echoes the query offline", async () => {
    const result = await new EchoVision().analyze({ systemPrompt: "s", query: "what is this", imageBytes: IMAGE });
    expect(result).toEqual({ text: "Echo: what is this" });
  });

  it("selects a backend by provider", () => {
    expect(buildVision("echo", "gpt-4o", {})).toBeInstanceOf(EchoVision);
    expect(buildVision("openai", "gpt-4o", { OPENAI_API_KEY: "test-secret" })).toBeInstanceOf(OpenAIVision);
    expect(() => buildVision("openai", "gpt-4o", {})).toThrow("SIGHTLINE_OPENAI_API_KEY is required for OpenAI vision");
  });
});

describe("OpenAIVision", () => {
  it("sends the image as a data URL and tags usage with the vision model", async () => {
    const create = vi.spyOn(Completions.prototype, "create").mockResolvedValue(
      chatCompletion({ content: "A tram." }, { prompt_tokens: 100, completion_tokens: 3, total_tokens: 103 }),
    );
    const result = await new OpenAIVision("gpt-4o", "test-secret").analyze({
      systemPrompt: "describe",
      query: "what is this",
      imageBytes: IMAGE,
    });

    expect(result).toEqual({ text: "A tram.", usage: { model: "gpt-4o", inputTokens: 100, outputTokens: 3, totalTokens: 103 } });
    expect(create.mock.calls[0][0].model).toBe("gpt-4o");
    expect(create.mock.calls[0][0].messages).toEqual([
      { role: "system", content: "describe" },
      {
        role: "user",
        content: [
          { type: "text", text: "what is this" },
          { type: "image_url", image_url: { url: "data:image/jpeg;base64,/9j/4AECAw==" } },
        ],
      },
    ]);
  });

  it("leaves usage out when the endpoint reports none", async () => {
    vi.spyOn(Completions.prototype, "create").mockResolvedValue(chatCompletion({ content: null }));
    const result = await new OpenAIVision("gpt-4o", "test-secret").analyze({ systemPrompt: "s", query: "q", imageBytes: IMAGE });
    expect(result).toEqual({ text: "", usage: undefined });
  });
});

describe("PerplexitySearch", () => {
  it("attaches the photo only when asked to", async () => {
    const create = vi.spyOn(Completions.prototype, "create").mockResolvedValue(chatCompletion({ content: "Tram 28 runs every 10 minutes." }));
    const search = new PerplexitySearch("test-secret");

    const plain = await search.search({ query: "tram 28", location: "Lisbon" });
    await search.search({ query: "tram 28", location: "unknown", usePhoto: true, imageBytes: IMAGE });

    expect(plain).toEqual({
      summary: "Tram 28 runs every 10 minutes.",
      searchProviderMetadata: '{"provider":"perplexity","model":"sonar","query":"tram 28","usedPhoto":false}',
    });
    expect(create.mock.calls[0][0].messages).toEqual([
      { role: "system", content: "Answer in one or two sentences using current web results. The user is located at: Lisbon." },
      { role: "user", content: [{ type: "text", text: "tram 28" }] },
    ]);
    expect(create.mock.calls[1][0].messages).toEqual([
      { role: "system", content: "Answer in one or two sentences using current web results." },
      {
        role: "user",
        content: [
          { type: "text", text: "tram 28" },
          { type: "image_url", image_url: { url: "data:image/jpeg;base64,/9j/4AECAw==" } },
        ],
      },
    ]);
  });
});

describe("web search backends", () => {
  it("echoes the query with provider metadata", async () => {
    const result = await new EchoSearch().search({ query: "ramen", location: "Tokyo" });
    expect(result).toEqual({ summary: "Echo: ramen", searchProviderMetadata: '{"provider":"echo","query":"ramen"}' });
  });

  it("needs a key for perplexity", () => {
    expect(buildWebSearch("echo", {})).toBeInstanceOf(EchoSearch);
    expect(() => buildWebSearch("perplexity", {})).toThrow("SIGHTLINE_PERPLEXITY_API_KEY is required");
  });
});
