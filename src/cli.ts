#!/usr/bin/env tsx
import { promises as fs } from "node:fs";
import path from "node:path";
import { Assistant } from "./assistant.ts";
import { loadConfig } from "./config.ts";
import { buildClient } from "./llm.ts";
import { createLogger } from "./logger.ts";
import { loadPrompts } from "./prompts.ts";
import { parseHistory } from "./history.ts";
import type { Message } from "./types.ts";
import { buildVision } from "./vision.ts";
import { buildWebSearch } from "./web_search.ts";

async function main() {
  const args = process.argv.slice(2);
  if (!args.length || args.includes("-h") || args.includes("--help")) {
    printHelp();
    process.exit(0);
  }

  const options = await parseArgs(args);
  const config = loadConfig(process.env, { provider: options.provider, model: options.model });
  const { provider, model } = config;
  const logger = createLogger({
    provider,
    model,
    logJsonPath: options.logJsonPath,
    enableHumanLogs: options.enableHumanLogs,
    enableFileLogs: options.enableFileLogs,
    pretty: options.prettyLogs,
  });

  const assistant = new Assistant({
    client: buildClient(provider),
    vision: buildVision(config.visionProvider, config.visionModel),
    webSearch: buildWebSearch(config.searchProvider),
    prompts: await loadPrompts(options.promptsFile ?? config.promptsFile),
    logger,
    defaultModel: model,
    learnContext: options.learnContext || config.learnContext,
  });

  const imageBytes = options.imagePath ? await fs.readFile(path.resolve(process.cwd(), options.imagePath)) : null;
  const history = options.historyPath ? await readHistory(options.historyPath) : undefined;
  const stopSpinner = logger.startSpinner();
  const result = await assistant
    .send({
      prompt: options.prompt,
      imageBytes,
      history,
      location: options.location,
      localTime: options.localTime,
    })
    .finally(stopSpinner);

  logger.human({ title: "assistant", body: result.response, variant: "model" });
  logger.human({ title: "capabilities", body: result.capabilitiesUsed.join(", ") });
  for (const [usageModel, usage] of Object.entries(result.tokenUsageByModel)) {
    logger.human({ title: "tokens", body: `${usageModel}: in=${usage.inputTokens} out=${usage.outputTokens} total=${usage.totalTokens}` });
  }
  if (!options.enableHumanLogs) console.log(result.response);
}

async function parseArgs(argv: string[]) {
  const promptParts: string[] = [];
  let provider: string | undefined;
  let model: string | undefined;
  let imagePath: string | undefined;
  let historyPath: string | undefined;
  let location: string | undefined;
  let localTime: string | undefined;
  let promptsFile: string | undefined;
  let logJsonPath: string | null | undefined;
  let learnContext = false;
  let enableHumanLogs = true;
  let enableFileLogs = true;
  let prettyLogs = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === "--provider") {
      provider = argv[++i];
      continue;
    }
    if (token === "--model") {
      model = argv[++i];
      continue;
    }
    if (token === "--image") {
      imagePath = argv[++i];
      continue;
    }
    if (token === "--history") {
      historyPath = argv[++i];
      continue;
    }
    if (token === "--location") {
      location = argv[++i];
      continue;
    }
    if (token === "--time") {
      localTime = argv[++i];
      continue;
    }
    if (token === "--prompts") {
      promptsFile = argv[++i];
      continue;
    }
    if (token === "--learn-context") {
      learnContext = true;
      continue;
    }
    if (token === "--log-json") {
      logJsonPath = argv[++i];
      continue;
    }
    if (token === "--no-log-json") {
      enableFileLogs = false;
      continue;
    }
    if (token === "--quiet") {
      enableHumanLogs = false;
      continue;
    }
    if (token === "--pretty") {
      prettyLogs = true;
      continue;
    }
    promptParts.push(token);
  }

  const prompt = promptParts.join(" ").trim();
  if (!prompt) {
    throw new Error("Prompt is required");
  }

  return {
    prompt,
    provider,
    model,
    imagePath,
    historyPath,
    location,
    localTime,
    promptsFile,
    logJsonPath,
    learnContext,
    enableHumanLogs,
    enableFileLogs,
    prettyLogs,
  };
}

async function readHistory(file: string): Promise<Message[]> {
  const raw: unknown = JSON.parse(await fs.readFile(path.resolve(process.cwd(), file), "utf8"));
  return parseHistory(raw);
}

function printHelp() {
  console.log(`sightline <prompt> [options]
Options:
  --provider <echo|openai|azure>   LLM provider (default: echo, or SIGHTLINE_PROVIDER)
  --model <name>             Model name (default: gpt-4o-mini, or SIGHTLINE_MODEL)
  --image <file>             Photo of what the user is looking at
  --history <file>           JSON array of prior messages
  --location <text>          User's location as a readable address
  --time <text>              User's local time
  --learn-context            Extract facts about the user from recent messages
  --prompts <file>           JSON object of prompt overrides
  --log-json <file>          Write JSON logs to file (default: .sightline-log.jsonl)
  --no-log-json              Disable JSONL logging
  --quiet                    Print only the answer
  --pretty                   Enable colored human logs and a spinner
  --help                     Show this help
`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
