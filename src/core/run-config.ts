import { resolve } from "node:path";
import { ExecutionError } from "../errors";
import type { CliOptions, Platform, RunConfig, TaskModel } from "../types";
import type { Logger } from "../utils/logger";

export function detectPlatform(nodePlatform: string = process.platform): Platform {
  if (nodePlatform === "win32") {
    return "windows";
  }
  if (nodePlatform === "linux") {
    return "linux";
  }
  if (nodePlatform === "darwin") {
    return "macos";
  }
  throw new ExecutionError(`unsupported OS detected: ${nodePlatform}`);
}

export type RunConfigContext = {
  host: Platform;
  logger: Logger;
  baseDir?: string;
};

/**
 * Combines command-line options with the task document's global settings.
 * A target platform other than the host forces a dry run.
 */
export function resolveRunConfig(
  cli: CliOptions,
  model: TaskModel,
  context: RunConfigContext
): RunConfig {
  const os = cli.os ?? context.host;
  let dryRun = cli.dryRun;
  if (os !== context.host) {
    context.logger.warn(
      `Overriding detected OS '${context.host}' with user-specified OS '${os}'. Forcing dry-run mode.`
    );
    dryRun = true;
  }

  const baseDir = context.baseDir ?? process.cwd();
  return Object.freeze({
    cwd: resolve(baseDir, cli.cwd ?? "."),
    dryRun,
    env: Object.freeze(Object.fromEntries(cli.env)),
    envFile: cli.envFile === undefined ? undefined : resolve(baseDir, cli.envFile),
    executionPolicy: cli.executionPolicy ?? model.global.executionPolicy ?? "fast_fail",
    os,
    sections: cli.sections.length > 0 ? Object.freeze([...cli.sections]) : undefined,
    skipSections: Object.freeze([...model.global.skipSections]),
  });
}
