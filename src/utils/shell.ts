import { randomUUID } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import debug from "debug";
import type { DumpSeparator } from "../core/environment";
import { IoError } from "../errors";
import type { Platform } from "../types";

const log = debug("phaserun:shell");

// Absolute so a command that replaces PATH cannot hide it from the trailer
const POSIX_ENV = "/usr/bin/env";

// Set by the trailer that carries the command's exit status on Windows
export const STATUS_VARIABLE = "__PHASERUN_STATUS";

// Shell bookkeeping that changes on every invocation
export const VOLATILE_VARIABLES: ReadonlySet<string> = new Set([
  "_",
  "SHLVL",
  "PWD",
  "OLDPWD",
  STATUS_VARIABLE,
]);

export type ShellInvocation = {
  file: string;
  args: string[];
  windowsVerbatimArguments: boolean;
};

export function createDumpPath(): string {
  return join(tmpdir(), `phaserun-env-${process.pid}-${randomUUID()}.vars`);
}

function quotePosix(value: string): string {
  return `'${value.replaceAll("'", "'\\''")}'`;
}

/**
 * Wraps `script` so the platform's native shell runs it.
 */
export function shellInvocation(
  platform: Platform,
  script: string
): ShellInvocation {
  if (platform === "windows") {
    return {
      args: ["/d", "/s", "/c", `"${script}"`],
      file: "cmd",
      windowsVerbatimArguments: true,
    };
  }
  return { args: ["-c", script], file: "sh", windowsVerbatimArguments: false };
}

/**
 * POSIX dumps are NUL-separated so multi-line values survive; `set` on
 * Windows only writes lines.
 */
export function dumpSeparator(platform: Platform): DumpSeparator {
  return platform === "windows" ? "\n" : "\0";
}

/**
 * Command that only prints the environment into `dumpPath`.
 */
export function environmentDumpScript(
  platform: Platform,
  dumpPath: string
): string {
  return platform === "windows"
    ? `set > "${dumpPath}"`
    : `${POSIX_ENV} -0 > ${quotePosix(dumpPath)}`;
}

/**
 * Runs `commandLine`, then dumps the resulting environment into `dumpPath`
 * and exits with the command's own status.
 */
export function withEnvironmentDump(
  platform: Platform,
  commandLine: string,
  dumpPath: string
): string {
  if (platform === "windows") {
    // `%^NAME%` survives the first expansion; `call` expands it after the command ran
    return [
      commandLine,
      `(call set ${STATUS_VARIABLE}=%^ERRORLEVEL%)`,
      environmentDumpScript(platform, dumpPath),
      `call exit %^${STATUS_VARIABLE}%`,
    ].join(" & ");
  }

  // A newline keeps a trailing comment in the command from swallowing the trailer
  return [
    commandLine,
    "__phaserun_status=$?",
    environmentDumpScript(platform, dumpPath),
    "exit $__phaserun_status",
  ].join("\n");
}

/**
 * Reads and removes a dump file. A missing file reads as an empty dump.
 */
export async function consumeDump(dumpPath: string): Promise<string> {
  try {
    return await readFile(dumpPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      log("no environment dump at %s", dumpPath);
      return "";
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new IoError(`cannot read environment dump ${dumpPath}: ${reason}`, {
      cause: error,
    });
  } finally {
    await discardDump(dumpPath);
  }
}

export async function discardDump(dumpPath: string): Promise<void> {
  try {
    await rm(dumpPath, { force: true });
  } catch (error) {
    log("could not remove %s: %O", dumpPath, error);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export function exitCodeOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "exitCode" in error &&
    typeof error.exitCode === "number"
  ) {
    return error.exitCode;
  }
  return undefined;
}

export function signalOf(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "signal" in error &&
    typeof error.signal === "string"
  ) {
    return error.signal;
  }
  return undefined;
}
