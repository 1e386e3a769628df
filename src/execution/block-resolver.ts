import debug from "debug";
import type { Environment } from "../core/environment";
import { BlockCycleError, BlockNotFoundError } from "../errors";
import type { Block, ExecutionPolicy, LocalConfig } from "../types";
import type { Logger } from "../utils/logger";

const log = debug("phaserun:blocks");

const BLOCK_REFERENCE = /^[^\s"'`]+$/;

/**
 * Where a list of steps runs: its own environment copy, the policy that
 * decides what a failure does, and the blocks currently being resolved.
 */
export type Scope = {
  readonly label: string;
  readonly env: Environment;
  readonly policy: ExecutionPolicy;
  readonly blockStack: readonly string[];
};

export type StepListRunner = (
  steps: readonly string[],
  scope: Scope
) => Promise<void>;

/**
 * Applies a local configuration to `env` in place and returns the policy that
 * governs the scope it belongs to.
 */
export function applyLocalConfig(
  env: Environment,
  inherited: ExecutionPolicy,
  config: LocalConfig | undefined
): ExecutionPolicy {
  if (!config) {
    return inherited;
  }
  for (const [key, value] of Object.entries(config.env)) {
    env.upsert(key, value, "local");
  }
  return config.executionPolicy ?? inherited;
}

export class BlockResolver {
  private readonly blocks: ReadonlyMap<string, Block>;
  private readonly logger: Logger;

  constructor(blocks: ReadonlyMap<string, Block>, logger: Logger) {
    this.blocks = blocks;
    this.logger = logger;
  }

  /**
   * A step names a block when it is one unquoted, whitespace-free token that
   * matches a block name. Anything else is a shell command.
   */
  isBlockReference(step: string): boolean {
    const token = step.trim();
    return BLOCK_REFERENCE.test(token) && this.blocks.has(token);
  }

  /**
   * Runs a block on a copy of the caller's environment and returns that copy
   * as the delta for the caller to merge.
   *
   * Failures inside the block are settled by the block's effective policy
   * through `runSteps`; whatever escapes it is for the caller's policy to judge.
   */
  async resolve(
    name: string,
    parent: Scope,
    runSteps: StepListRunner
  ): Promise<Environment> {
    const blockName = name.trim();
    const block = this.blocks.get(blockName);
    if (!block) {
      throw new BlockNotFoundError(blockName);
    }
    if (parent.blockStack.includes(blockName)) {
      throw new BlockCycleError([...parent.blockStack, blockName]);
    }

    const env = parent.env.clone();
    const policy = applyLocalConfig(env, parent.policy, block.config);
    const scope: Scope = {
      blockStack: [...parent.blockStack, blockName],
      env,
      label: `${parent.label} > ${blockName}`,
      policy,
    };

    log("entering %s with policy %s", scope.label, policy);
    this.logger.blockEntered(parent.label, blockName);

    await runSteps(block.steps, scope);

    log("leaving %s", scope.label);
    return env;
  }
}
