import { isPlainObject } from "./tools/shared.ts";
import type { Message, Role, ToolCallDescriptor } from "./types.ts";

export type HistoryLimits = {
  assistant: number;
  user: number;
};

export const DEFAULT_HISTORY_LIMITS: HistoryLimits = { assistant: 3, user: 5 };

/**
 * Keeps only the most recent user and assistant messages to save tokens. System and tool
 * messages always survive. The array is pruned in place and returned.
 */
export function pruneHistory(messages: Message[], limits: HistoryLimits = DEFAULT_HISTORY_LIMITS): Message[] {
  let assistantRemaining = limits.assistant;
  let userRemaining = limits.user;
  for (let i = messages.length - 1; i >= 0; i--) {
    const role = messages[i].role;
    if (role === "assistant") {
      if (assistantRemaining === 0) messages.splice(i, 1);
      else assistantRemaining--;
    } else if (role === "user") {
      if (userRemaining === 0) messages.splice(i, 1);
      else userRemaining--;
    }
  }
  return messages;
}

const ROLES: readonly Role[] = ["system", "user", "assistant", "tool"];

function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/** Validates history loaded from JSON (e.g. a CLI history file). */
export function parseHistory(raw: unknown): Message[] {
  if (!Array.isArray(raw)) throw new Error("History must be a JSON array of messages");
  return raw.map((entry, index): Message => {
    if (!isPlainObject(entry) || !isRole(entry.role)) {
      throw new Error(`History entry ${index} needs a role of ${ROLES.join("|")}`);
    }
    const message: Message = { role: entry.role, content: typeof entry.content === "string" ? entry.content : null };
    if (typeof entry.name === "string") message.name = entry.name;
    if (typeof entry.tool_call_id === "string") message.tool_call_id = entry.tool_call_id;
    if (Array.isArray(entry.tool_calls)) message.tool_calls = entry.tool_calls.map((call) => parseToolCall(call, index));
    return message;
  });
}

function parseToolCall(raw: unknown, index: number): ToolCallDescriptor {
  if (!isPlainObject(raw) || typeof raw.id !== "string" || typeof raw.name !== "string") {
    throw new Error(`History entry ${index} has a malformed tool call`);
  }
  return { id: raw.id, name: raw.name, arguments: typeof raw.arguments === "string" ? raw.arguments : "{}" };
}
