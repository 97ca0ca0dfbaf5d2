import OpenAI from "openai";
import type { ChatCompletionMessageParam, ChatCompletionTool } from "openai/resources/chat/completions";
import type { Completion, CompletionRequest, LLMClient, Message, TokenUsage, ToolDefinition } from "./types.ts";

export class EchoClient implements LLMClient {
  async generate(request: CompletionRequest): Promise<Completion> {
    const lastUser = [...request.messages].reverse().find((m) => m.role === "user");
    return {
      content: lastUser?.content ? `Echo: ${lastUser.content}` : "Echo",
      toolCalls: [],
      usage: null,
    };
  }
}

export class OpenAIClient implements LLMClient {
  private client: OpenAI;

  constructor(apiKey: string, baseURL?: string, defaultQuery?: Record<string, string>) {
    if (!apiKey) {
      throw new Error("SIGHTLINE_OPENAI_API_KEY (or Azure key) is required for this provider");
    }
    this.client = new OpenAI({ apiKey, baseURL, defaultQuery });
  }

  async generate(request: CompletionRequest): Promise<Completion> {
    const tools = request.tools?.length ? request.tools : undefined;
    const completion = await this.client.chat.completions.create({
      model: request.model,
      messages: toOpenAIMessages(request.messages),
      tools: tools?.map(toOpenAITool),
      tool_choice: tools ? (request.toolChoice ?? "auto") : undefined,
    });

    const usage: TokenUsage | null = completion.usage
      ? {
          inputTokens: completion.usage.prompt_tokens,
          outputTokens: completion.usage.completion_tokens,
          totalTokens: completion.usage.total_tokens,
        }
      : null;
    const choice = completion.choices[0]?.message;
    if (!choice) return { content: null, toolCalls: [], usage };
    const toolCalls = (choice.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));
    const content = typeof choice.content === "string" ? choice.content : null;
    return { content, toolCalls, usage };
  }
}

export function buildClient(provider: string, env: NodeJS.ProcessEnv = process.env): LLMClient {
  if (provider === "openai") {
    const apiKey = env.SIGHTLINE_OPENAI_API_KEY ?? env.OPENAI_API_KEY;
    const baseURL = env.SIGHTLINE_OPENAI_BASE_URL ?? env.OPENAI_BASE_URL;
    return new OpenAIClient(apiKey ?? "", baseURL);
  }
  if (provider === "azure") {
    const endpoint = env.SIGHTLINE_AZURE_OPENAI_ENDPOINT ?? env.AZURE_OPENAI_ENDPOINT;
    const apiKey = env.SIGHTLINE_AZURE_OPENAI_KEY ?? env.AZURE_OPENAI_KEY;
    const deployment = env.SIGHTLINE_AZURE_OPENAI_DEPLOYMENT ?? env.AZURE_OPENAI_DEPLOYMENT;
    const apiVersion = env.SIGHTLINE_AZURE_OPENAI_API_VERSION ?? env.AZURE_OPENAI_API_VERSION ?? "2024-10-01-preview";
    if (!endpoint || !apiKey || !deployment) {
      throw new Error("Azure provider requires endpoint, key, and deployment (SIGHTLINE_AZURE_OPENAI_ENDPOINT/KEY/DEPLOYMENT)");
    }
    const baseURL = `${endpoint.replace(/\/$/, "")}/openai/deployments/${deployment}`;
    return new OpenAIClient(apiKey, baseURL, { "api-version": apiVersion });
  }
  return new EchoClient();
}

export function toOpenAIMessages(messages: Message[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    if (m.role === "assistant" && m.tool_calls?.length) {
      return {
        role: "assistant",
        content: m.content ?? "",
        tool_calls: m.tool_calls.map((call) => ({
          id: call.id,
          type: "function" as const,
          function: { name: call.name, arguments: call.arguments },
        })),
      };
    }
    if (m.role === "tool") {
      return {
        role: "tool",
        content: m.content ?? "",
        tool_call_id: m.tool_call_id ?? "",
      };
    }
    if (m.role === "assistant") return { role: "assistant", content: m.content ?? "" };
    if (m.role === "system") return { role: "system", content: m.content ?? "" };
    return { role: "user", content: m.content ?? "" };
  });
}

function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  } satisfies ChatCompletionTool;
}
