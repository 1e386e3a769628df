export { Runner, readEnvFile } from "./execution/runner";
export { Orchestrator } from "./execution/orchestrator";
export { BlockResolver, applyLocalConfig } from "./execution/block-resolver";
export { ShellExecutor, captureAmbientEnvironment } from "./execution/executor";
export { Environment, SOURCE_PRIORITY } from "./core/environment";
export {
  DEFAULT_TASK_FILE,
  loadTaskModel,
  parseTaskDocument,
  resolveSection,
} from "./core/config-loader";
export { Parser, parseArgs, parseKeyValue } from "./core/parser";
export { detectPlatform, resolveRunConfig } from "./core/run-config";
export { Logger, ScopeLogger } from "./utils/logger";
export {
  AggregateFailureError,
  BlockCycleError,
  BlockNotFoundError,
  CommandFailedError,
  ConfigParseError,
  ConstraintError,
  ExecutionError,
  IoError,
  RunnerError,
} from "./errors";
export { PLATFORMS, SECTIONS, SECTION_KEYS } from "./types";

export type { EnvVariable, VariableSource } from "./core/environment";
export type { CommandOutcome, ShellExecutorOptions, ShellRunner } from "./execution/executor";
export type { Scope, StepListRunner } from "./execution/block-resolver";
export type { OrchestratorOptions } from "./execution/orchestrator";
export type { RunnerOptions } from "./execution/runner";
export type { RunConfigContext } from "./core/run-config";
export type { RunnerErrorKind } from "./errors";
export type {
  Block,
  CliOptions,
  ExecutionPolicy,
  GlobalConfig,
  LocalConfig,
  LoggerConfig,
  Platform,
  RunConfig,
  Section,
  SectionDefinition,
  StepList,
  TaskModel,
} from "./types";
