import ansis from "ansis";
import type { LoggerConfig, Section } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
] as const;

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      prefix: true,
      quiet: false,
      verbosity: 0,
      ...config,
    };
  }

  registerScope(scope: string): void {
    if (!this.colorMap.has(scope)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(scope, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, scope.length);
    }
  }

  sectionStarted(section: Section): void {
    if (this.config.quiet) {
      return;
    }
    console.log(ansis.blue(`----- [${section}] -----`));
  }

  blockEntered(scope: string, block: string): void {
    this.registerScope(scope);
    this.log(scope, `${ansis.magenta("↳")} block ${ansis.bold(block)}`);
  }

  command(scope: string, commandLine: string, dryRun = false): void {
    const marker = dryRun ? ansis.gray(" (dry run)") : "";
    this.log(scope, `${ansis.cyan("$")} ${ansis.cyan(commandLine)}${marker}`);
  }

  commandFailed(scope: string, message: string): void {
    this.registerScope(scope);
    const output = this.formatLine(scope, ansis.red(message));
    console.warn(output);
  }

  log(scope: string, message: string): void {
    if (this.config.quiet) {
      return;
    }

    const lines = message.split("\n");
    for (const line of lines) {
      if (!line.trim()) {
        continue;
      }

      const output = this.formatLine(scope, line);
      console.log(output);
    }
  }

  debug(message: string): void {
    if (this.config.quiet || this.config.verbosity < 1) {
      return;
    }
    console.log(ansis.gray(`· ${message}`));
  }

  success(message: string): void {
    if (this.config.quiet) {
      return;
    }
    console.log(`${ansis.green("✓")} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  error(message: string): void {
    for (const line of message.split("\n")) {
      console.error(ansis.red(line));
    }
  }

  private formatLine(scope: string, line: string): string {
    if (!this.config.prefix) {
      return line;
    }

    const color = this.colorMap.get(scope) ?? ansis.white;
    // Pad to align the pipe separator across scopes
    const prefix = `[${scope}]`;
    const paddedPrefix = prefix.padEnd(this.maxPrefixLength + 2);
    return `${color(paddedPrefix)} ${ansis.gray("|")} ${line}`;
  }

  /**
   * Create a child logger bound to one scope
   */
  createScopeLogger(scope: string): ScopeLogger {
    this.registerScope(scope);
    return new ScopeLogger(this, scope);
  }
}

export class ScopeLogger {
  private readonly parent: Logger;
  readonly scope: string;

  constructor(parent: Logger, scope: string) {
    this.parent = parent;
    this.scope = scope;
  }

  command(commandLine: string, dryRun = false): void {
    this.parent.command(this.scope, commandLine, dryRun);
  }

  failed(message: string): void {
    this.parent.commandFailed(this.scope, message);
  }
}
