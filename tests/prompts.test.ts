import { promises as fs } from "node:fs";
import { describe, expect, it } from "vitest";
import { DEFAULT_PROMPTS, loadPrompts } from "../src/prompts.ts";
import { useSandbox } from "./test_utils.ts";

useSandbox();

describe("loadPrompts", () => {
  it("returns the defaults without a file", async () => {
    expect(await loadPrompts(null)).toBe(DEFAULT_PROMPTS);
    expect(Object.isFrozen(DEFAULT_PROMPTS)).toBe(true);
  });

  it("overrides individual prompts from JSON", async () => {
    await fs.writeFile("prompts.json", JSON.stringify({ contextPrefix: "CTX", unknownTime: "no clock" }), "utf8");
    const prompts = await loadPrompts("prompts.json");
    expect(prompts.contextPrefix).toBe("CTX");
    expect(prompts.unknownTime).toBe("no clock");
    expect(prompts.system).toBe(DEFAULT_PROMPTS.system);
    expect(Object.isFrozen(prompts)).toBe(true);
  });

  it("rejects unknown keys", async () => {
    await fs.writeFile("prompts.json", JSON.stringify({ greeting: "hi" }), "utf8");
    await expect(loadPrompts("prompts.json")).rejects.toThrow("Unknown prompt 'greeting' in prompts.json");
  });

  it("rejects non-string values", async () => {
    await fs.writeFile("prompts.json", JSON.stringify({ system: 3 }), "utf8");
    await expect(loadPrompts("prompts.json")).rejects.toThrow("Prompt 'system' in prompts.json must be a string");
  });

  it("rejects anything but an object", async () => {
    await fs.writeFile("prompts.json", "[]", "utf8");
    await expect(loadPrompts("prompts.json")).rejects.toThrow("Prompt overrides in prompts.json must be a JSON object");
  });
});
