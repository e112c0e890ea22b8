import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LoggerConfig = {
  level: LogLevel;
  enableColors?: boolean;
  showTimestamps?: boolean;
};

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  debug(message: string, context?: Record<string, unknown>) {
    if (this.shouldLog("debug")) {
      console.log(this.format("debug", message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>) {
    if (this.shouldLog("info")) {
      console.log(this.format("info", message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>) {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>) {
    if (this.shouldLog("error")) {
      console.error(this.format("error", message, context));
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.config.level);
  }

  private formatLevel(level: LogLevel): string {
    const label = `[${level.toUpperCase()}]`.padEnd(7);

    if (this.config.enableColors === false) {
      return label;
    }

    switch (level) {
      case "debug":
        return chalk.blue(label);
      case "warn":
        return chalk.yellow(label);
      case "error":
        return chalk.red(label);
      default:
        return chalk.white(label);
    }
  }

  private format(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
  ): string {
    const colors = this.config.enableColors !== false;
    let output = "";

    if (this.config.showTimestamps !== false) {
      const time = `[${new Date().toISOString().slice(11, 23)}] `;
      output += colors ? chalk.gray(time) : time;
    }

    output += `${this.formatLevel(level)} ${message}`;

    if (context) {
      const json = ` ${JSON.stringify(context, jsonReplacer)}`;
      output += colors ? chalk.gray(json) : json;
    }

    return output;
  }
}

// bigint keys and values show up in context objects
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function createLogger(level: LogLevel = "warn"): Logger {
  return new Logger({ level });
}
