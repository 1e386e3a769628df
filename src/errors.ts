import type { ZodError } from "zod";

export type RunnerErrorKind =
  | "io"
  | "parse"
  | "constraint"
  | "command_failed"
  | "block_not_found"
  | "execution";

export class RunnerError extends Error {
  readonly kind: RunnerErrorKind;

  constructor(kind: RunnerErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RunnerError";
    this.kind = kind;
  }

  /**
   * Whether the active execution policy decides what happens after this error.
   * Everything else aborts the run.
   */
  get recoverable(): boolean {
    return this.kind === "command_failed" || this.kind === "block_not_found";
  }
}

export class IoError extends RunnerError {
  constructor(message: string, options?: ErrorOptions) {
    super("io", message, options);
    this.name = "IoError";
  }
}

export class ConfigParseError extends RunnerError {
  readonly issues?: ZodError;

  constructor(message: string, issues?: ZodError, options?: ErrorOptions) {
    super("parse", message, options);
    this.name = "ConfigParseError";
    this.issues = issues;
  }

  getDetails(): string {
    if (!this.issues) {
      return this.message;
    }

    const lines = this.issues.errors.map(
      (issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return [this.message, ...lines].join("\n");
  }
}

export class ConstraintError extends RunnerError {
  constructor(message: string) {
    super("constraint", message);
    this.name = "ConstraintError";
  }
}

export class BlockCycleError extends ConstraintError {
  readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    super(`block cycle detected: ${chain.join(" -> ")}`);
    this.name = "BlockCycleError";
    this.chain = chain;
  }
}

export class CommandFailedError extends RunnerError {
  readonly command: string;
  readonly exitCode?: number;
  readonly signal?: string;

  constructor(
    scope: string,
    command: string,
    status: { exitCode?: number; signal?: string }
  ) {
    const detail =
      status.signal === undefined
        ? `exit ${status.exitCode ?? "unknown"}`
        : `signal ${status.signal}`;
    super("command_failed", `${scope}: command failed: '${command}' (${detail})`);
    this.name = "CommandFailedError";
    this.command = command;
    this.exitCode = status.exitCode;
    this.signal = status.signal;
  }
}

export class BlockNotFoundError extends RunnerError {
  readonly block: string;

  constructor(block: string) {
    super("block_not_found", `block '${block}' not found`);
    this.name = "BlockNotFoundError";
    this.block = block;
  }
}

export class ExecutionError extends RunnerError {
  constructor(message: string, options?: ErrorOptions) {
    super("execution", message, options);
    this.name = "ExecutionError";
  }
}

export class AggregateFailureError extends RunnerError {
  readonly failures: readonly string[];

  constructor(failures: readonly string[]) {
    super("command_failed", failures.join("\n"));
    this.name = "AggregateFailureError";
    this.failures = failures;
  }

  override get recoverable(): boolean {
    return false;
  }
}
