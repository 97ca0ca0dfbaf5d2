export type Role = "system" | "user" | "assistant" | "tool";

export type ToolCallDescriptor = {
  id: string;
  name: string;
  // Raw JSON text as generated by the model; untrusted until sanitized.
  arguments: string;
};

export type Message = {
  role: Role;
  content: string | null;
  name?: string;
  tool_call_id?: string;
  tool_calls?: ToolCallDescriptor[];
};

export type ParameterType = "string" | "boolean";

export type ToolParameter = {
  type: ParameterType;
  description: string;
  required: boolean;
};

export type ToolDescriptor<Name extends string = string> = {
  readonly name: Name;
  readonly description: string;
  readonly parameters: Readonly<Record<string, Readonly<ToolParameter>>>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type TokenUsageByModel = Record<string, TokenUsage>;

export type ModelUsage = TokenUsage & { model: string };

export type Capability = "assistant_knowledge" | "web_search" | "vision" | "reverse_image_search";

export type LearnedContextKey = "UserName" | "DOB" | "Food";

export type LearnedContext = Partial<Record<LearnedContextKey, string>>;

export type Completion = {
  content: string | null;
  toolCalls: ToolCallDescriptor[];
  usage: TokenUsage | null;
};

export type CompletionRequest = {
  model: string;
  messages: Message[];
  tools?: ToolDefinition[];
  toolChoice?: "auto" | "none";
};

export interface LLMClient {
  generate(request: CompletionRequest): Promise<Completion>;
}

export type WebSearchRequest = {
  query: string;
  location?: string;
  usePhoto?: boolean;
  imageBytes?: Uint8Array;
};

export type WebSearchResult = {
  summary: string;
  searchProviderMetadata: string;
};

export interface WebSearch {
  search(request: WebSearchRequest): Promise<WebSearchResult>;
}

export type VisionRequest = {
  systemPrompt: string;
  query: string;
  imageBytes: Uint8Array;
};

export type VisionResult = {
  text: string;
  usage?: ModelUsage;
};

export interface Vision {
  analyze(request: VisionRequest): Promise<VisionResult>;
}

export type AssistantRequest = {
  prompt: string;
  imageBytes?: Uint8Array | null;
  history?: Message[];
  location?: string | null;
  localTime?: string | null;
  model?: string;
};

export type AssistantResponse = {
  tokenUsageByModel: TokenUsageByModel;
  capabilitiesUsed: Capability[];
  response: string;
  debugTools: string;
};
