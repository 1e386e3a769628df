import debug from "debug";
import { Environment } from "../core/environment";
import {
  AggregateFailureError,
  CommandFailedError,
  RunnerError,
} from "../errors";
import { SECTIONS, type RunConfig, type Section, type TaskModel } from "../types";
import type { Logger } from "../utils/logger";
import { applyLocalConfig, BlockResolver, type Scope } from "./block-resolver";
import type { ShellRunner } from "./executor";

const log = debug("phaserun:orchestrator");

export type OrchestratorOptions = {
  shell: ShellRunner;
  logger: Logger;
};

/**
 * Walks the lifecycle sections in order and runs each step of the target
 * platform's list, one process at a time.
 */
export class Orchestrator {
  private readonly model: TaskModel;
  private readonly config: RunConfig;
  private readonly shell: ShellRunner;
  private readonly logger: Logger;
  private readonly blocks: BlockResolver;
  private readonly failures: string[] = [];

  constructor(model: TaskModel, config: RunConfig, options: OrchestratorOptions) {
    this.model = model;
    this.config = config;
    this.shell = options.shell;
    this.logger = options.logger;
    this.blocks = new BlockResolver(model.blocks, options.logger);
  }

  /**
   * Runs every selected section against `global`, merging each section's final
   * environment back into it.
   *
   * @returns the global environment after the last section
   * @throws the first failure under fast-fail, or an {@link AggregateFailureError}
   * listing every failure carried forward
   */
  async run(global: Environment): Promise<Environment> {
    for (const section of SECTIONS) {
      if (!this.isSelected(section)) {
        log("skipping %s", section);
        continue;
      }
      await this.runSection(section, global);
    }

    if (this.failures.length > 0) {
      throw new AggregateFailureError(this.failures);
    }
    return global;
  }

  isSelected(section: Section): boolean {
    if (this.config.skipSections.includes(section)) {
      return false;
    }
    if (this.config.sections) {
      return this.config.sections.includes(section);
    }
    return section !== "Clean";
  }

  private async runSection(section: Section, global: Environment): Promise<void> {
    const stepList = this.model.sections[section]?.[this.config.os];
    if (!stepList || stepList.steps.length === 0) {
      this.logger.debug(`no steps for ${this.config.os} in ${section}`);
      return;
    }

    this.logger.sectionStarted(section);

    const env = global.clone();
    const policy = applyLocalConfig(
      env,
      this.config.executionPolicy,
      stepList.config
    );
    const scope: Scope = { blockStack: [], env, label: section, policy };

    await this.runSteps(stepList.steps, scope);
    global.merge(env);
  }

  private readonly runSteps = async (
    steps: readonly string[],
    scope: Scope
  ): Promise<void> => {
    for (const step of steps) {
      try {
        const delta = await this.dispatch(step, scope);
        scope.env.merge(delta);
      } catch (error) {
        this.settle(error, scope);
      }
    }
  };

  private async dispatch(step: string, scope: Scope): Promise<Environment> {
    if (this.blocks.isBlockReference(step)) {
      return this.blocks.resolve(step, scope, this.runSteps);
    }

    const logger = this.logger.createScopeLogger(scope.label);
    logger.command(step, this.config.dryRun);
    if (this.config.dryRun) {
      return new Environment();
    }

    const outcome = await this.shell.run(step, scope.env);
    // Changes made before the failure still count
    scope.env.merge(outcome.delta);
    if (outcome.exitCode !== 0 || outcome.signal !== undefined) {
      throw new CommandFailedError(scope.label, step, outcome);
    }
    return outcome.delta;
  }

  /**
   * Carries a recoverable failure forward when the scope allows it; rethrows
   * anything else.
   */
  private settle(error: unknown, scope: Scope): void {
    if (
      !(error instanceof RunnerError) ||
      !error.recoverable ||
      scope.policy !== "carry_forward"
    ) {
      throw error;
    }

    this.logger.createScopeLogger(scope.label).failed(error.message);
    this.failures.push(error.message);
  }
}
