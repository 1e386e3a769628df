export const SECTIONS = [
  "PreBuild",
  "Build",
  "PostBuild",
  "Test",
  "PreDeploy",
  "Deploy",
  "PostDeploy",
  "Clean",
] as const;

export type Section = (typeof SECTIONS)[number];

// Keys used for sections in the task document
export const SECTION_KEYS = {
  Build: "build",
  Clean: "clean",
  Deploy: "deploy",
  PostBuild: "postbuild",
  PostDeploy: "postdeploy",
  PreBuild: "prebuild",
  PreDeploy: "predeploy",
  Test: "test",
} as const satisfies Record<Section, string>;

export const PLATFORMS = ["windows", "linux", "macos"] as const;

export type Platform = (typeof PLATFORMS)[number];

export type ExecutionPolicy = "fast_fail" | "carry_forward";

export type LocalConfig = {
  executionPolicy?: ExecutionPolicy;
  env: Record<string, string>;
};

export type StepList = {
  steps: string[];
  config?: LocalConfig;
};

export type SectionDefinition = Partial<Record<Platform, StepList>>;

export type Block = StepList & {
  name: string;
};

export type GlobalConfig = {
  executionPolicy?: ExecutionPolicy;
  env: Record<string, string>;
  skipSections: Section[];
};

export type TaskModel = {
  sections: Partial<Record<Section, SectionDefinition>>;
  blocks: ReadonlyMap<string, Block>;
  global: GlobalConfig;
};

export type CliOptions = {
  file: string;
  cwd?: string;
  os?: Platform;
  sections: Section[];
  dryRun: boolean;
  env: Array<[string, string]>;
  envFile?: string;
  executionPolicy?: ExecutionPolicy;
  verbosity: number;
  quiet: boolean;
  help: boolean;
};

export type RunConfig = Readonly<{
  os: Platform;
  cwd: string;
  dryRun: boolean;
  /** Explicit allow-list; when absent every section but Clean runs. */
  sections?: readonly Section[];
  skipSections: readonly Section[];
  executionPolicy: ExecutionPolicy;
  env: Readonly<Record<string, string>>;
  envFile?: string;
}>;

export type LoggerConfig = {
  quiet?: boolean;
  verbosity?: number;
  prefix?: boolean;
};
