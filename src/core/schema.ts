import { z } from "zod";

const ExecutionPolicySchema = z.enum(["fast_fail", "carry_forward"]);

// YAML turns `PORT: 8080` into a number; the environment only holds strings
const EnvValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const EnvSchema = z.record(z.string(), EnvValueSchema);

export const LocalConfigSchema = z
  .object({
    execution_policy: ExecutionPolicySchema.optional(),
    env: EnvSchema.optional(),
  })
  .strict();

/**
 * Either `{ steps, config }` or a bare list of steps.
 */
export const StepListSchema = z.union([
  z.array(z.string()),
  z
    .object({
      steps: z.array(z.string()).nullish(),
      config: LocalConfigSchema.optional(),
    })
    .strict(),
]);

export const PlatformStepsSchema = z
  .object({
    windows: StepListSchema.nullish(),
    linux: StepListSchema.nullish(),
    macos: StepListSchema.nullish(),
  })
  .strict();

export const TasksSchema = z
  .object({
    prebuild: PlatformStepsSchema.nullish(),
    build: PlatformStepsSchema.nullish(),
    postbuild: PlatformStepsSchema.nullish(),
    test: PlatformStepsSchema.nullish(),
    predeploy: PlatformStepsSchema.nullish(),
    deploy: PlatformStepsSchema.nullish(),
    postdeploy: PlatformStepsSchema.nullish(),
    clean: PlatformStepsSchema.nullish(),
  })
  .strict();

export const GlobalConfigSchema = z
  .object({
    execution_policy: ExecutionPolicySchema.optional(),
    env: EnvSchema.optional(),
    skip_sections: z.array(z.string()).optional(),
  })
  .strict();

export const TaskDocumentSchema = z
  .object({
    global_config: GlobalConfigSchema.nullish(),
    tasks: TasksSchema.nullish(),
    blocks: z.record(z.string(), StepListSchema).nullish(),
  })
  .strict();

export type LocalConfigDocument = z.infer<typeof LocalConfigSchema>;
export type StepListDocument = z.infer<typeof StepListSchema>;
export type TaskDocument = z.infer<typeof TaskDocumentSchema>;
