import { promises as fs } from "node:fs";
import path from "node:path";
import chalk from "chalk";
import cliTruncate from "cli-truncate";

export type HumanEntry = {
  title?: string;
  body?: string;
  variant?: "info" | "warn" | "error" | "model" | "tool";
};

export type LoggerOptions = {
  provider?: string;
  model?: string;
  logJsonPath?: string | null;
  enableHumanLogs?: boolean;
  enableFileLogs?: boolean;
  pretty?: boolean;
};

export type Logger = {
  human(entry: HumanEntry): void;
  json(entry: Record<string, unknown>): Promise<void>;
  startSpinner(): () => void;
};

export function createLogger(options: LoggerOptions): Logger {
  const logPath = options.enableFileLogs === false
    ? null
    : path.resolve(process.cwd(), options.logJsonPath ?? process.env.SIGHTLINE_LOG_JSON ?? ".sightline-log.jsonl");
  const variantTheme = (entry: HumanEntry) => {
    const variant = entry.variant ?? "info";
    if (variant === "error") return { color: chalk.red, prefix: "[error]" };
    if (variant === "warn") return { color: chalk.yellow, prefix: "[warn]" };
    if (variant === "model") return { color: chalk.cyan, prefix: "[model]" };
    if (variant === "tool") return { color: chalk.green, prefix: "[tool]" };
    return { color: chalk.cyan, prefix: "[info]" };
  };
  const formatPrefix = (entry: HumanEntry) => {
    const theme = variantTheme(entry);
    const tag = entry.title ? `${theme.prefix} ${entry.title}` : theme.prefix;
    return { theme, tag: options.pretty ? theme.color.bold(tag) : tag };
  };

  const spinnerFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  let spinnerTimer: ReturnType<typeof setInterval> | undefined;
  let spinnerFrame = 0;
  const stopSpinner = () => {
    if (!spinnerTimer) return;
    clearInterval(spinnerTimer);
    spinnerTimer = undefined;
    spinnerFrame = 0;
    process.stdout.write("\r\x1b[2K\r");
  };
  const startSpinner = () => {
    if (options.enableHumanLogs === false || options.pretty !== true) return () => {};
    stopSpinner();
    spinnerTimer = setInterval(() => {
      const frame = spinnerFrames[spinnerFrame % spinnerFrames.length];
      spinnerFrame++;
      process.stdout.write(`\r${chalk.gray(`waiting ${frame}`)}`);
    }, 120);
    return stopSpinner;
  };

  const human = options.enableHumanLogs === false
    ? (_entry: HumanEntry) => {}
    : (entry: HumanEntry) => {
        const width = Math.max(40, Math.min(process.stdout.columns ?? 80, 140));
        const { tag, theme } = formatPrefix(entry);
        const rawBody = entry.body ?? "";
        if (entry.variant === "model") {
          // Model answers are shown in full.
          const colored = options.pretty ? theme.color(rawBody) : rawBody;
          console.log(`${tag}\n${colored}`);
          return;
        }
        const body = cliTruncate(rawBody, width - 4);
        console.log(options.pretty ? `${tag} ${theme.color(body)}` : `${tag} ${body}`);
      };

  const json = async (entry: Record<string, unknown>) => {
    if (!logPath) return;
    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      provider: options.provider,
      model: options.model,
      ...entry,
    };
    try {
      await fs.appendFile(logPath, `${JSON.stringify(payload)}\n`, "utf8");
    } catch (err) {
      console.error(`log write failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  };

  return { human, json, startSpinner };
}

/** Discards everything; the default for library use. */
export function createSilentLogger(): Logger {
  return createLogger({ enableHumanLogs: false, enableFileLogs: false });
}
