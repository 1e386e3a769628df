import debug from "debug";
import { execa } from "execa";
import { Environment } from "../core/environment";
import { ExecutionError } from "../errors";
import type { Platform } from "../types";
import {
  consumeDump,
  createDumpPath,
  discardDump,
  dumpSeparator,
  environmentDumpScript,
  exitCodeOf,
  shellInvocation,
  signalOf,
  VOLATILE_VARIABLES,
  withEnvironmentDump,
} from "../utils/shell";

const log = debug("phaserun:executor");

export type CommandOutcome = {
  exitCode?: number;
  signal?: string;
  /** Variables the command created or changed, tagged as script values. */
  delta: Environment;
};

export interface ShellRunner {
  run(commandLine: string, env: Environment): Promise<CommandOutcome>;
}

export type ShellExecutorOptions = {
  platform: Platform;
  cwd: string;
};

function childEnvironment(
  platform: Platform,
  env: Environment
): Record<string, string> {
  const terminal: Record<string, string> =
    platform === "windows"
      ? { ANSICON: "1", TERM: "xterm-256color" }
      : { TERM: "xterm-256color" };
  return { ...terminal, ...env.toRecord() };
}

/**
 * Runs one command line at a time under the platform's shell and reports the
 * variables it left behind.
 *
 * A child process cannot change its parent's environment, so the command is
 * followed by a trailer that dumps `env -0` (or `set` on Windows) into a
 * transient file. Whatever differs from what the child started with becomes
 * the delta.
 */
export class ShellExecutor implements ShellRunner {
  private readonly options: ShellExecutorOptions;

  constructor(options: ShellExecutorOptions) {
    this.options = options;
  }

  async run(commandLine: string, env: Environment): Promise<CommandOutcome> {
    const { cwd, platform } = this.options;
    const dumpPath = createDumpPath();
    const childEnv = childEnvironment(platform, env);
    const invocation = shellInvocation(
      platform,
      withEnvironmentDump(platform, commandLine, dumpPath)
    );

    log("running %o in %s", commandLine, cwd);

    let exitCode: number | undefined;
    let signal: string | undefined;
    try {
      const result = await execa(invocation.file, invocation.args, {
        cwd,
        env: childEnv,
        extendEnv: false,
        stdio: "inherit",
        windowsVerbatimArguments: invocation.windowsVerbatimArguments,
      });
      exitCode = result.exitCode;
    } catch (error) {
      exitCode = exitCodeOf(error);
      signal = signalOf(error);
      if (exitCode === undefined && signal === undefined) {
        await discardDump(dumpPath);
        const reason = error instanceof Error ? error.message : String(error);
        throw new ExecutionError(
          `could not start ${invocation.file}: ${reason}`,
          { cause: error }
        );
      }
    }

    const dump = await consumeDump(dumpPath);
    if (dump === "" && exitCode === 0) {
      log("%o exited 0 without an environment dump", commandLine);
    }

    const delta = new Environment();
    const dumped = Environment.parse(dump, "script", dumpSeparator(platform));
    for (const [key, { value }] of dumped.entries()) {
      if (!VOLATILE_VARIABLES.has(key) && childEnv[key] !== value) {
        delta.upsert(key, value, "script");
      }
    }

    log("exit %s, %d changed variable(s)", signal ?? exitCode, delta.size);
    return { delta, exitCode, signal };
  }
}

/**
 * Captures the environment the platform's shell starts with, tagged as
 * default values.
 */
export async function captureAmbientEnvironment(
  options: ShellExecutorOptions
): Promise<Environment> {
  const { cwd, platform } = options;
  const dumpPath = createDumpPath();
  const invocation = shellInvocation(
    platform,
    environmentDumpScript(platform, dumpPath)
  );

  try {
    await execa(invocation.file, invocation.args, {
      cwd,
      stdin: "ignore",
      stdout: "inherit",
      stderr: "inherit",
      windowsVerbatimArguments: invocation.windowsVerbatimArguments,
    });
  } catch (error) {
    await discardDump(dumpPath);
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExecutionError(
      `failed to initialize environment variables: ${reason}`,
      { cause: error }
    );
  }

  const env = Environment.parse(
    await consumeDump(dumpPath),
    "default",
    dumpSeparator(platform)
  );
  log("captured %d ambient variable(s)", env.size);
  return env;
}
