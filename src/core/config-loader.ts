import { readFile } from "node:fs/promises";
import debug from "debug";
import { load as yamlLoad, YAMLException } from "js-yaml";
import { ConfigParseError, ConstraintError, IoError } from "../errors";
import {
  type Block,
  type GlobalConfig,
  type LocalConfig,
  PLATFORMS,
  SECTION_KEYS,
  SECTIONS,
  type Section,
  type SectionDefinition,
  type StepList,
  type TaskModel,
} from "../types";
import {
  type LocalConfigDocument,
  type StepListDocument,
  type TaskDocument,
  TaskDocumentSchema,
} from "./schema";

const log = debug("phaserun:config");

export const DEFAULT_TASK_FILE = "phaserun.yml";

/**
 * Matches `Build`, `build`, `post-build` or `post_build` to a section.
 */
export function resolveSection(name: string): Section | undefined {
  const normalized = name.replace(/[-_\s]/g, "").toLowerCase();
  return SECTIONS.find((section) => SECTION_KEYS[section] === normalized);
}

function toLocalConfig(
  document: LocalConfigDocument | undefined
): LocalConfig | undefined {
  if (!document) {
    return undefined;
  }
  return {
    env: document.env ?? {},
    executionPolicy: document.execution_policy,
  };
}

function toStepList(document: StepListDocument): StepList {
  if (Array.isArray(document)) {
    return { steps: document };
  }
  return {
    config: toLocalConfig(document.config),
    steps: document.steps ?? [],
  };
}

function assertNoBlankSteps(steps: readonly string[], owner: string): void {
  if (steps.some((step) => step.trim() === "")) {
    throw new ConstraintError(`Empty step found in ${owner}`);
  }
}

function buildSections(
  tasks: TaskDocument["tasks"]
): Partial<Record<Section, SectionDefinition>> {
  const sections: Partial<Record<Section, SectionDefinition>> = {};
  if (!tasks) {
    return sections;
  }

  for (const section of SECTIONS) {
    const document = tasks[SECTION_KEYS[section]];
    if (!document) {
      continue;
    }

    const definition: SectionDefinition = {};
    for (const platform of PLATFORMS) {
      const steps = document[platform];
      if (steps) {
        const stepList = toStepList(steps);
        assertNoBlankSteps(stepList.steps, `section '${section}' (${platform})`);
        definition[platform] = stepList;
      }
    }
    sections[section] = definition;
  }
  return sections;
}

function buildBlocks(blocks: TaskDocument["blocks"]): Map<string, Block> {
  const table = new Map<string, Block>();
  if (!blocks) {
    return table;
  }

  const reservedSections = new Set<string>(Object.values(SECTION_KEYS));
  const reservedPlatforms = new Set<string>(PLATFORMS);

  for (const [name, document] of Object.entries(blocks)) {
    const lowered = name.toLowerCase();
    if (reservedSections.has(lowered)) {
      throw new ConstraintError(
        `Block name '${name}' conflicts with reserved section name`
      );
    }
    if (reservedPlatforms.has(lowered)) {
      throw new ConstraintError(
        `Block name '${name}' conflicts with reserved operating system name`
      );
    }
    if (!/^\S+$/.test(name)) {
      throw new ConstraintError(
        `Block name '${name}' must be a single word without whitespace`
      );
    }

    const stepList = toStepList(document);
    assertNoBlankSteps(stepList.steps, `block '${name}'`);
    table.set(name, { name, ...stepList });
  }
  return table;
}

function buildGlobalConfig(
  document: TaskDocument["global_config"]
): GlobalConfig {
  const skipSections: Section[] = [];
  for (const name of document?.skip_sections ?? []) {
    const section = resolveSection(name);
    if (!section) {
      throw new ConstraintError(`Unknown section '${name}' in skip_sections`);
    }
    skipSections.push(section);
  }

  return {
    env: document?.env ?? {},
    executionPolicy: document?.execution_policy,
    skipSections,
  };
}

/**
 * Parses and validates a task document (YAML or JSON) into the task model.
 */
export function parseTaskDocument(text: string, origin = "<inline>"): TaskModel {
  let raw: unknown;
  try {
    raw = yamlLoad(text);
  } catch (error) {
    const reason = error instanceof YAMLException ? error.message : String(error);
    throw new ConfigParseError(`failed to parse YAML config ${origin}: ${reason}`, undefined, {
      cause: error,
    });
  }

  const result = TaskDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigParseError(`invalid task document ${origin}`, result.error);
  }

  const model: TaskModel = {
    blocks: buildBlocks(result.data.blocks),
    global: buildGlobalConfig(result.data.global_config),
    sections: buildSections(result.data.tasks),
  };
  log(
    "loaded %s: %d section(s), %d block(s)",
    origin,
    Object.keys(model.sections).length,
    model.blocks.size
  );
  return model;
}

export async function loadTaskModel(filePath: string): Promise<TaskModel> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IoError(`cannot read ${filePath}: ${reason}`, { cause: error });
  }
  return parseTaskDocument(text, filePath);
}
