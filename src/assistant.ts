import { createContextMessage, extractLearnedContext } from "./context.ts";
import { DEFAULT_MODEL } from "./config.ts";
import { DEFAULT_HISTORY_LIMITS, pruneHistory, type HistoryLimits } from "./history.ts";
import { createSilentLogger, type Logger } from "./logger.ts";
import { DEFAULT_PROMPTS, type Prompts } from "./prompts.ts";
import { handleTool, type ToolDebugRecord } from "./tools/dispatch.ts";
import { toolDefinitions } from "./tools/index.ts";
import type { ToolAmbient } from "./tools/shared.ts";
import type {
  AssistantRequest,
  AssistantResponse,
  LearnedContext,
  LLMClient,
  Message,
  Vision,
  WebSearch,
} from "./types.ts";
import { accumulateTokenUsage, mergeTokenUsage } from "./usage.ts";

export type AssistantOptions = {
  client: LLMClient;
  webSearch: WebSearch;
  vision: Vision;
  prompts?: Prompts;
  logger?: Logger;
  defaultModel?: string;
  learnContext?: boolean;
  historyLimits?: HistoryLimits;
};

export type TurnState =
  | "INIT"
  | "HISTORY_PREPARED"
  | "AWAITING_FIRST_COMPLETION"
  | "TOOLS_REQUESTED"
  | "TOOLS_EXECUTING"
  | "AWAITING_SECOND_COMPLETION"
  | "DONE";

export type DebugEntry = ToolDebugRecord | { learned_context: LearnedContext };

/**
 * Copies the caller's history, makes sure it opens with a system message, appends the new user
 * message and prunes the result.
 */
export function prepareHistory(
  prompt: string,
  history: Message[] | null | undefined,
  prompts: Prompts = DEFAULT_PROMPTS,
  limits: HistoryLimits = DEFAULT_HISTORY_LIMITS,
): Message[] {
  const messages = history ? [...history] : [];
  if (messages.length === 0 || messages[0].role !== "system") {
    messages.unshift({ role: "system", content: prompts.system });
  }
  messages.push({ role: "user", content: prompt });
  return pruneHistory(messages, limits);
}

export class Assistant {
  private client: LLMClient;
  private webSearch: WebSearch;
  private vision: Vision;
  private prompts: Prompts;
  private logger: Logger;
  private defaultModel: string;
  private learnContext: boolean;
  private historyLimits: HistoryLimits;

  constructor(options: AssistantOptions) {
    this.client = options.client;
    this.webSearch = options.webSearch;
    this.vision = options.vision;
    this.prompts = options.prompts ?? DEFAULT_PROMPTS;
    this.logger = options.logger ?? createSilentLogger();
    this.defaultModel = options.defaultModel ?? DEFAULT_MODEL;
    this.learnContext = options.learnContext === true;
    this.historyLimits = options.historyLimits ?? DEFAULT_HISTORY_LIMITS;
  }

  /**
   * Runs one turn: a first completion that may request tools, every requested tool in parallel,
   * then a second completion over the tool results. Any failure in a backend aborts the turn.
   */
  async send(request: AssistantRequest): Promise<AssistantResponse> {
    const started = performance.now();
    const model = request.model ?? this.defaultModel;
    const returned: AssistantResponse = { tokenUsageByModel: {}, capabilitiesUsed: [], response: "", debugTools: "" };
    const debugTools: DebugEntry[] = [];
    let state: TurnState = "INIT";
    const transition = async (next: TurnState, detail: Record<string, unknown> = {}) => {
      state = next;
      await this.logger.json({ type: "turn_state", state: next, model, ...detail });
    };

    try {
      await transition("INIT", { prompt: request.prompt, hasImage: Boolean(request.imageBytes?.length) });
      const messages = prepareHistory(request.prompt, request.history, this.prompts, this.historyLimits);

      let learnedContext: LearnedContext = {};
      if (this.learnContext) {
        learnedContext = await this.extractLearnedContext(model, messages, returned);
        debugTools.push({ learned_context: learnedContext });
      }
      messages.push({
        role: "system",
        content: createContextMessage(request.localTime, request.location, learnedContext, this.prompts),
      });
      await transition("HISTORY_PREPARED", { messages: messages.length });

      await transition("AWAITING_FIRST_COMPLETION");
      const first = await this.client.generate({ model, messages, tools: toolDefinitions, toolChoice: "auto" });
      accumulateTokenUsage(returned.tokenUsageByModel, model, first.usage);
      returned.response = first.content ?? "";

      if (first.toolCalls.length > 0) {
        await transition("TOOLS_REQUESTED", { tools: first.toolCalls.map((c) => c.name) });
        this.logger.human({ title: "model", body: `tool calls: ${first.toolCalls.map((c) => c.name).join(", ")}`, variant: "tool" });
        messages.push({ role: "assistant", content: first.content, tool_calls: first.toolCalls });

        const ambient: ToolAmbient = {
          userMessage: request.prompt,
          imageBytes: request.imageBytes ?? null,
          location: request.location ?? null,
          localTime: request.localTime ?? null,
          learnedContext,
          webSearch: this.webSearch,
          vision: this.vision,
          prompts: this.prompts,
        };
        await transition("TOOLS_EXECUTING");
        // TODO: bound each handler with a timeout; a hung backend currently stalls the whole turn.
        const invocations = await Promise.all(first.toolCalls.map((call) => handleTool(call, ambient)));

        for (const [i, invocation] of invocations.entries()) {
          const call = first.toolCalls[i];
          messages.push({ role: "tool", tool_call_id: call.id, name: call.name, content: invocation.output });
          mergeTokenUsage(returned.tokenUsageByModel, invocation.scope.tokenUsage);
          returned.capabilitiesUsed.push(...invocation.scope.capabilities);
          debugTools.push(invocation.debug);
          this.logger.human({ title: call.name, body: invocation.output, variant: "tool" });
          await this.logger.json({ type: "tool_result", tool: call.name, id: call.id, debug: invocation.debug, output: invocation.output });
        }

        await transition("AWAITING_SECOND_COMPLETION");
        const second = await this.client.generate({ model, messages });
        accumulateTokenUsage(returned.tokenUsageByModel, model, second.usage);
        returned.response = second.content ?? "";
      }

      if (returned.capabilitiesUsed.length === 0) {
        returned.capabilitiesUsed.push("assistant_knowledge");
      }
      returned.debugTools = JSON.stringify(debugTools);
      const seconds = ((performance.now() - started) / 1000).toFixed(3);
      await transition("DONE", { seconds, capabilities: returned.capabilitiesUsed });
      this.logger.human({ title: "turn", body: `time taken: ${seconds}s` });
      return returned;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.human({ title: "turn", body: `failed in ${state}: ${message}`, variant: "error" });
      await this.logger.json({ type: "turn_error", state, model, error: message });
      throw err;
    }
  }

  private async extractLearnedContext(model: string, messages: Message[], returned: AssistantResponse): Promise<LearnedContext> {
    try {
      return await extractLearnedContext({
        client: this.client,
        model,
        history: messages,
        tokenUsage: returned.tokenUsageByModel,
        prompts: this.prompts,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.human({ title: "context", body: `learned context extraction failed: ${message}`, variant: "warn" });
      await this.logger.json({ type: "learned_context_error", error: message });
      return {};
    }
  }
}
