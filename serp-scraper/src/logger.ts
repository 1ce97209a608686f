import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Output = Pick<Console, "log" | "error">;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const TAG: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.blue("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

export function createLogger(level: LogLevel = "info", output: Output = console): Logger {
  const write = (at: Exclude<LogLevel, "silent">, message: string) => {
    if (RANK[at] < RANK[level]) return;
    const line = `${chalk.gray(new Date().toISOString())} ${TAG[at]} ${message}`;
    if (at === "error" || at === "warn") output.error(line);
    else output.log(line);
  };

  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
  };
}

export const silentLogger: Logger = createLogger("silent");
