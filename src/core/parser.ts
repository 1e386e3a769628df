import { ConfigParseError } from "../errors";
import {
  type CliOptions,
  type ExecutionPolicy,
  type Platform,
  PLATFORMS,
} from "../types";
import { DEFAULT_TASK_FILE, resolveSection } from "./config-loader";

// Flags that take a value, either as `--flag value` or `--flag=value`
const VALUE_FLAGS = new Set(["cwd", "os", "section", "env", "env-file", "policy"]);

const BOOLEAN_FLAGS = new Set(["dry-run", "quiet", "continue", "verbose", "help"]);

/**
 * Splits `KEY=VALUE` at the first `=`.
 */
export function parseKeyValue(input: string): [string, string] {
  const separator = input.indexOf("=");
  if (separator === -1) {
    throw new ConfigParseError(`invalid --env '${input}': expected KEY=VALUE`);
  }
  const key = input.slice(0, separator);
  if (key === "") {
    throw new ConfigParseError(`invalid --env '${input}': key cannot be empty`);
  }
  return [key, input.slice(separator + 1)];
}

function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

function isPolicy(value: string): value is ExecutionPolicy {
  return value === "fast_fail" || value === "carry_forward";
}

export class Parser {
  parse(args: string[]): CliOptions {
    const result: CliOptions = {
      dryRun: false,
      env: [],
      file: DEFAULT_TASK_FILE,
      help: false,
      quiet: false,
      sections: [],
      verbosity: 0,
    };

    let fileSeen = false;
    for (let i = 0; i < args.length; i++) {
      const arg = args[i] ?? "";

      if (arg.startsWith("--")) {
        const { name, inline } = this.splitLongFlag(arg.substring(2));
        if (VALUE_FLAGS.has(name) && inline === undefined) {
          const value = args[i + 1];
          if (value === undefined) {
            throw new ConfigParseError(`missing value for --${name}`);
          }
          i++;
          this.processValueFlag(name, value, result);
        } else if (inline !== undefined) {
          if (BOOLEAN_FLAGS.has(name)) {
            throw new ConfigParseError(`--${name} does not take a value`);
          }
          this.processValueFlag(name, inline, result);
        } else {
          this.processLongFlag(name, result);
        }
      } else if (arg.startsWith("-") && arg.length > 1) {
        this.processShortFlags(arg.substring(1), result);
      } else if (fileSeen) {
        console.warn(`Ignoring extra argument: ${arg}`);
      } else {
        result.file = arg;
        fileSeen = true;
      }
    }

    return result;
  }

  private splitLongFlag(flag: string): { name: string; inline?: string } {
    const separator = flag.indexOf("=");
    if (separator === -1) {
      return { name: flag };
    }
    return { inline: flag.substring(separator + 1), name: flag.substring(0, separator) };
  }

  private processValueFlag(name: string, value: string, result: CliOptions): void {
    if (name === "cwd") {
      result.cwd = value;
    } else if (name === "os") {
      if (!isPlatform(value)) {
        throw new ConfigParseError(
          `invalid --os '${value}': expected one of ${PLATFORMS.join(", ")}`
        );
      }
      result.os = value;
    } else if (name === "section") {
      const section = resolveSection(value);
      if (!section) {
        throw new ConfigParseError(`invalid --section '${value}'`);
      }
      if (!result.sections.includes(section)) {
        result.sections.push(section);
      }
    } else if (name === "env") {
      result.env.push(parseKeyValue(value));
    } else if (name === "env-file") {
      result.envFile = value;
    } else if (name === "policy") {
      if (!isPolicy(value)) {
        throw new ConfigParseError(
          `invalid --policy '${value}': expected fast_fail or carry_forward`
        );
      }
      result.executionPolicy = value;
    } else {
      console.warn(`Unknown flag: --${name}`);
    }
  }

  private processLongFlag(flag: string, result: CliOptions): void {
    if (flag === "dry-run") {
      result.dryRun = true;
    } else if (flag === "quiet") {
      result.quiet = true;
    } else if (flag === "continue") {
      result.executionPolicy = "carry_forward";
    } else if (flag === "verbose") {
      result.verbosity++;
    } else if (flag === "help") {
      result.help = true;
    } else {
      console.warn(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, result: CliOptions): void {
    for (const flag of flags) {
      if (flag === "q") {
        result.quiet = true;
      } else if (flag === "c") {
        result.executionPolicy = "carry_forward";
      } else if (flag === "v") {
        result.verbosity++;
      } else if (flag === "h") {
        result.help = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
  }
}

export function parseArgs(args: string[]): CliOptions {
  const parser = new Parser();
  return parser.parse(args);
}
