import { z } from "zod";
import { type TypedValue, float, int, text } from "./encoding.js";
import { UsageError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export const USAGE = `Usage: logkv [options] <command> [args]

Commands:
  put <key> <value>   store a value (text unless --int or --float)
  get <key>           print the value stored under key
  keys                print every live key
  demo                store and read back two sample keys

Options:
  --file <path>       log file (default: $LOGKV_FILE or ./logkv.db)
  --log-level <level> debug, info, warn, error or silent
  --no-recover        do not replay the existing log on open
  --int               store the value as a signed 64-bit integer
  --float             store the value as a 64-bit float
  -h, --help          show this message
  --                  treat every later argument as positional`;

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

const EnvSchema = z.object({
  LOGKV_FILE: z.string().min(1).default("logkv.db"),
  LOGKV_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
});

export type Command =
  | { name: "put"; key: string; value: TypedValue }
  | { name: "get"; key: string }
  | { name: "keys" }
  | { name: "demo" };

export interface CLIOptions {
  readonly file: string;
  readonly recover: boolean;
  readonly logLevel: LogLevel;
  readonly help: boolean;
  readonly command: Command | null;
}

const VALUE_FLAGS = new Set(["--file", "--log-level"]);
const BOOLEAN_FLAGS = new Set([
  "--no-recover",
  "--int",
  "--float",
  "--help",
  "-h",
]);

export class CLIParser {
  /** Arguments before a `--` terminator; only these are read as flags. */
  private readonly args: string[];
  private readonly trailing: string[];
  private readonly env: Record<string, string | undefined>;

  constructor(
    args: string[] = process.argv.slice(2),
    env: Record<string, string | undefined> = process.env,
  ) {
    const terminator = args.indexOf("--");
    this.args = terminator === -1 ? args : args.slice(0, terminator);
    this.trailing = terminator === -1 ? [] : args.slice(terminator + 1);
    this.env = env;
  }

  public parse(): CLIOptions {
    const env = EnvSchema.safeParse(this.env);

    if (!env.success) {
      throw new UsageError(
        env.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      );
    }

    const file = this.getString("--file") ?? env.data.LOGKV_FILE;
    const logLevel = this.parseLogLevel() ?? env.data.LOGKV_LOG_LEVEL;
    const recover = !this.hasFlag("--no-recover");

    if (this.hasFlag("--help") || this.hasFlag("-h")) {
      return { file, recover, logLevel, help: true, command: null };
    }

    return {
      file,
      recover,
      logLevel,
      help: false,
      command: this.parseCommand(),
    };
  }

  private parseCommand(): Command {
    const positionals = this.positionals();
    const name: string | undefined = positionals[0];
    const rest = positionals.slice(1);

    switch (name) {
      case "put": {
        const [key, raw] = this.expectArgs(name, rest, 2);
        return { name, key, value: this.parseValue(raw) };
      }
      case "get": {
        const [key] = this.expectArgs(name, rest, 1);
        return { name, key };
      }
      case "keys":
        this.expectArgs(name, rest, 0);
        return { name };
      case "demo":
        this.expectArgs(name, rest, 0);
        return { name };
      case undefined:
        throw new UsageError("Missing command");
      default:
        throw new UsageError(`Unknown command: ${name}`);
    }
  }

  private parseValue(raw: string): TypedValue {
    const asInt = this.hasFlag("--int");
    const asFloat = this.hasFlag("--float");

    if (asInt && asFloat) {
      throw new UsageError("--int and --float are mutually exclusive");
    }

    if (asInt) {
      if (!/^-?\d+$/.test(raw)) {
        throw new UsageError(`Not an integer: ${raw}`);
      }
      return int(BigInt(raw));
    }

    if (asFloat) {
      const value = Number(raw);
      if (raw.trim() === "" || (Number.isNaN(value) && raw !== "NaN")) {
        throw new UsageError(`Not a number: ${raw}`);
      }
      return float(value);
    }

    return text(raw);
  }

  private parseLogLevel(): LogLevel | undefined {
    const value = this.getString("--log-level");
    if (value === undefined) {
      return undefined;
    }

    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (level === undefined) {
      throw new UsageError(`Invalid log level: ${value}`);
    }
    return level;
  }

  private expectArgs(name: string, args: string[], count: number): string[] {
    if (args.length !== count) {
      throw new UsageError(
        `${name} expects ${count} argument(s), got ${args.length}`,
      );
    }
    return args;
  }

  private positionals(): string[] {
    const result: string[] = [];

    for (let i = 0; i < this.args.length; i++) {
      const arg = this.args[i];

      if (VALUE_FLAGS.has(arg)) {
        i += 1;
      } else if (BOOLEAN_FLAGS.has(arg)) {
        continue;
      } else if (!arg.startsWith("-") || /^-\d/.test(arg)) {
        result.push(arg);
      } else {
        throw new UsageError(`Unknown option: ${arg}`);
      }
    }

    return [...result, ...this.trailing];
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  private getString(flag: string): string | undefined {
    const index = this.args.indexOf(flag);
    if (index === -1) {
      return undefined;
    }

    const value = this.args[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  }
}
