import { promises as fs } from "node:fs";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, createSilentLogger } from "../src/logger.ts";
import { useSandbox } from "./test_utils.ts";

const getSandbox = useSandbox();

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("appends JSON lines with provider and model", async () => {
    const logger = createLogger({ provider: "echo", model: "gpt-4o-mini", logJsonPath: "turns.jsonl", enableHumanLogs: false });
    await logger.json({ type: "turn_state", state: "INIT" });
    await logger.json({ type: "turn_state", state: "DONE" });

    const lines = (await fs.readFile(`${getSandbox()}/turns.jsonl`, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    const first = JSON.parse(lines[0]);
    expect(first).toMatchObject({ provider: "echo", model: "gpt-4o-mini", type: "turn_state", state: "INIT" });
    expect(typeof first.timestamp).toBe("string");
  });

  it("writes nothing with file logs disabled", async () => {
    const logger = createLogger({ logJsonPath: "turns.jsonl", enableFileLogs: false, enableHumanLogs: false });
    await logger.json({ type: "turn_state" });
    await expect(fs.readdir(getSandbox())).resolves.toEqual([]);
  });

  it("prints tagged human lines", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ enableFileLogs: false });
    logger.human({ title: "search", body: "Sunny.", variant: "tool" });
    logger.human({ body: "hello" });
    expect(log.mock.calls).toEqual([["[tool] search Sunny."], ["[info] hello"]]);
  });

  it("hands back the spinner's stop function", () => {
    const logger = createLogger({ enableHumanLogs: false, enableFileLogs: false });
    expect(Object.keys(logger)).toEqual(["human", "json", "startSpinner"]);
    expect(() => logger.startSpinner()()).not.toThrow();
  });

  it("stays quiet when silent", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createSilentLogger();
    logger.human({ body: "hidden" });
    await logger.json({ type: "hidden" });
    expect(log).not.toHaveBeenCalled();
    await expect(fs.readdir(getSandbox())).resolves.toEqual([]);
  });
});
