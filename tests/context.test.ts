import { describe, expect, it } from "vitest";
import { createContextMessage, extractLearnedContext, parseLearnedContext } from "../src/context.ts";
import { DEFAULT_PROMPTS } from "../src/prompts.ts";
import type { Message, TokenUsageByModel } from "../src/types.ts";
import { completion, ScriptedClient } from "./test_utils.ts";

const PREFIX = "## Additional context about the user:";
const NO_TIME = "<current_time>If asked, tell user you don't know current date or time because clock is broken</current_time>";
const NO_LOCATION = "<location>You do not know user's location and if asked, tell them so</location>";

describe("createContextMessage", () => {
  it("substitutes disclaimers for absent time and location", () => {
    expect(createContextMessage(null, undefined, null)).toBe([PREFIX, NO_TIME, NO_LOCATION].join("\n"));
  });

  it("treats empty strings as absent", () => {
    expect(createContextMessage("", "", {})).toBe([PREFIX, NO_TIME, NO_LOCATION].join("\n"));
  });

  it("places values verbatim and learned entries after the fixed keys", () => {
    const message = createContextMessage("Tuesday 10:15", "12 Rue de Rivoli, Paris", { UserName: "Sam", Food: "ramen" });
    expect(message).toBe(
      [
        PREFIX,
        "<current_time>Tuesday 10:15</current_time>",
        "<location>12 Rue de Rivoli, Paris</location>",
        "<UserName>Sam</UserName>",
        "<Food>ramen</Food>",
      ].join("\n"),
    );
  });

  it("does not let learned context override time or location", () => {
    const learned = { location: "Mars", current_time: "never", UserName: "Sam" };
    const message = createContextMessage("noon", null, learned);
    expect(message).toBe([PREFIX, "<current_time>noon</current_time>", NO_LOCATION, "<UserName>Sam</UserName>"].join("\n"));
  });

  it("omits learned entries with empty values", () => {
    expect(createContextMessage("noon", "Oslo", { Food: "" })).toBe(
      [PREFIX, "<current_time>noon</current_time>", "<location>Oslo</location>"].join("\n"),
    );
  });

  it("uses injected prompts", () => {
    const prompts = { ...DEFAULT_PROMPTS, contextPrefix: "CTX", unknownTime: "no clock", unknownLocation: "no map" };
    expect(createContextMessage(null, null, null, prompts)).toBe("CTX\n<current_time>no clock</current_time>\n<location>no map</location>");
  });
});

describe("parseLearnedContext", () => {
  it("keeps only known KEY=VALUE lines", () => {
    expect(parseLearnedContext("UserName=Sam\nDOB=1990-04-01\nPet=cat\nFood=a=b\nEND")).toEqual({
      UserName: "Sam",
      DOB: "1990-04-01",
    });
  });

  it("returns nothing for END", () => {
    expect(parseLearnedContext("END")).toEqual({});
  });
});

describe("extractLearnedContext", () => {
  it("sends the last two user messages and counts tokens", async () => {
    const client = new ScriptedClient([completion("Food=sushi\nEND", [], 4)]);
    const history: Message[] = [
      { role: "system", content: "sys" },
      { role: "user", content: "first" },
      { role: "assistant", content: "ok" },
      { role: "user", content: "second" },
      { role: "user", content: "I love sushi" },
    ];
    const tokenUsage: TokenUsageByModel = {};
    const learned = await extractLearnedContext({ client, model: "gpt-4o-mini", history, tokenUsage });

    expect(learned).toEqual({ Food: "sushi" });
    expect(client.requests[0].messages).toEqual([
      { role: "system", content: DEFAULT_PROMPTS.learnedContextExtraction },
      { role: "user", content: "second" },
      { role: "user", content: "I love sushi" },
    ]);
    expect(client.requests[0].tools).toBeUndefined();
    expect(tokenUsage).toEqual({ "gpt-4o-mini": { inputTokens: 4, outputTokens: 4, totalTokens: 8 } });
  });
});
