import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import debug from "debug";
import { loadTaskModel } from "../core/config-loader";
import { Environment } from "../core/environment";
import { detectPlatform, resolveRunConfig } from "../core/run-config";
import { ConfigParseError, IoError } from "../errors";
import type { CliOptions, Platform, RunConfig, TaskModel } from "../types";
import { Logger } from "../utils/logger";
import {
  captureAmbientEnvironment,
  type ShellExecutorOptions,
  type ShellRunner,
  ShellExecutor,
} from "./executor";
import { Orchestrator } from "./orchestrator";

const log = debug("phaserun:runner");

export type RunnerOptions = {
  logger?: Logger;
  host?: Platform;
  shell?: (options: ShellExecutorOptions) => ShellRunner;
  captureAmbient?: (options: ShellExecutorOptions) => Promise<Environment>;
};

/**
 * Reads an env file: `KEY=VALUE` per line, blank lines and `#` comments ignored.
 */
export async function readEnvFile(filePath: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IoError(`cannot read env file ${filePath}: ${reason}`, { cause: error });
  }
  return content
    .split("\n")
    .filter((line) => !line.trim().startsWith("#"))
    .join("\n");
}

function describeError(error: unknown): string {
  if (error instanceof ConfigParseError) {
    return error.getDetails();
  }
  return error instanceof Error ? error.message : String(error);
}

export class Runner {
  private readonly options: RunnerOptions;

  constructor(options: RunnerOptions = {}) {
    this.options = options;
  }

  /**
   * Loads the task file named on the command line and runs it. Any failure is
   * printed and ends the process with exit code 1.
   */
  async run(cli: CliOptions): Promise<void> {
    const logger =
      this.options.logger ?? new Logger({ quiet: cli.quiet, verbosity: cli.verbosity });
    if (cli.verbosity >= 2) {
      debug.enable("phaserun:*");
    }

    try {
      const model = await loadTaskModel(resolve(cli.file));
      const config = resolveRunConfig(cli, model, {
        host: this.options.host ?? detectPlatform(),
        logger,
      });
      await this.execute(model, config, logger);
      logger.success("All tasks completed successfully.");
    } catch (error) {
      logger.error(`Error: ${describeError(error)}`);
      process.exit(1);
    }
  }

  async execute(
    model: TaskModel,
    config: RunConfig,
    logger: Logger = this.options.logger ?? new Logger()
  ): Promise<Environment> {
    const global = await this.buildEnvironment(model, config, logger);
    const shellOptions = { cwd: config.cwd, platform: config.os };
    const shell = this.options.shell?.(shellOptions) ?? new ShellExecutor(shellOptions);

    const orchestrator = new Orchestrator(model, config, { logger, shell });
    return orchestrator.run(global);
  }

  /**
   * Layers the ambient environment, the task document's global variables and
   * the variables passed on the command line.
   */
  async buildEnvironment(
    model: TaskModel,
    config: RunConfig,
    logger: Logger
  ): Promise<Environment> {
    const shellOptions = { cwd: config.cwd, platform: config.os };
    const capture = this.options.captureAmbient ?? captureAmbientEnvironment;

    let global: Environment;
    try {
      global = await capture(shellOptions);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not capture the ${config.os} shell environment: ${reason}`);
      logger.warn("Falling back to the runner's own environment.");
      global = Environment.fromRecord(process.env, "default");
    }

    for (const [key, value] of Object.entries(model.global.env)) {
      global.upsert(key, value, "global");
    }
    for (const [key, value] of Object.entries(config.env)) {
      global.upsert(key, value, "passed");
    }
    if (config.envFile !== undefined) {
      global.load(await readEnvFile(config.envFile), "passed");
    }

    log("global environment has %d variable(s)", global.size);
    return global;
  }
}
