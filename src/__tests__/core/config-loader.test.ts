import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadTaskModel,
  parseTaskDocument,
  resolveSection,
} from "../../core/config-loader";
import { ConfigParseError, ConstraintError, IoError } from "../../errors";

const FULL_DOCUMENT = `
global_config:
  execution_policy: carry_forward
  env:
    PORT: 8080
    VERBOSE: true
    NAME: app
  skip_sections: [deploy, Post-Deploy]
tasks:
  build:
    linux:
      steps:
        - npm ci
        - compile
      config:
        execution_policy: fast_fail
        env:
          MODE: release
    macos:
      - make
  clean:
    windows:
      steps: [del /q dist]
blocks:
  compile:
    steps:
      - tsc -p .
    config:
      env:
        TARGET: es2022
  lint: [eslint .]
`;

describe("config loader", () => {
  describe("parseTaskDocument", () => {
    it("maps sections, platforms, blocks and global config", () => {
      const model = parseTaskDocument(FULL_DOCUMENT);

      expect(model.sections.Build?.linux).toEqual({
        config: { env: { MODE: "release" }, executionPolicy: "fast_fail" },
        steps: ["npm ci", "compile"],
      });
      expect(model.sections.Build?.macos).toEqual({ steps: ["make"] });
      expect(model.sections.Build?.windows).toBeUndefined();
      expect(model.sections.Clean?.windows?.steps).toEqual(["del /q dist"]);
      expect(model.sections.Test).toBeUndefined();

      expect(model.blocks.get("compile")).toEqual({
        config: { env: { TARGET: "es2022" }, executionPolicy: undefined },
        name: "compile",
        steps: ["tsc -p ."],
      });
      expect(model.blocks.get("lint")).toEqual({ name: "lint", steps: ["eslint ."] });

      expect(model.global).toEqual({
        env: { NAME: "app", PORT: "8080", VERBOSE: "true" },
        executionPolicy: "carry_forward",
        skipSections: ["Deploy", "PostDeploy"],
      });
    });

    it("accepts an empty document", () => {
      const model = parseTaskDocument("");
      expect(model.sections).toEqual({});
      expect(model.blocks.size).toBe(0);
      expect(model.global).toEqual({ env: {}, executionPolicy: undefined, skipSections: [] });
    });

    it("accepts JSON", () => {
      const model = parseTaskDocument(
        JSON.stringify({ tasks: { test: { linux: ["npm test"] } } })
      );
      expect(model.sections.Test?.linux?.steps).toEqual(["npm test"]);
    });

    it("treats a platform without steps as an empty list", () => {
      const model = parseTaskDocument("tasks:\n  build:\n    linux:\n      steps:\n");
      expect(model.sections.Build?.linux).toEqual({ config: undefined, steps: [] });
    });

    it.each(["build", "Build", "windows", "MacOS"])(
      "rejects a block named %s",
      (name) => {
        expect(() =>
          parseTaskDocument(`blocks:\n  ${name}:\n    steps: [echo hi]\n`)
        ).toThrow(ConstraintError);
      }
    );

    it("names the reserved section in the error", () => {
      expect(() =>
        parseTaskDocument("blocks:\n  build:\n    steps: [echo hi]\n")
      ).toThrow("Block name 'build' conflicts with reserved section name");
      expect(() =>
        parseTaskDocument("blocks:\n  windows:\n    steps: [echo hi]\n")
      ).toThrow("Block name 'windows' conflicts with reserved operating system name");
    });

    it("rejects block names containing whitespace", () => {
      expect(() =>
        parseTaskDocument('blocks:\n  "two words": [echo hi]\n')
      ).toThrow(ConstraintError);
    });

    it("rejects blank steps", () => {
      expect(() =>
        parseTaskDocument('blocks:\n  setup: ["echo a", "  "]\n')
      ).toThrow("Empty step found in block 'setup'");
      expect(() =>
        parseTaskDocument('tasks:\n  test:\n    linux: [""]\n')
      ).toThrow("Empty step found in section 'Test' (linux)");
    });

    it("rejects unknown sections in skip_sections", () => {
      expect(() =>
        parseTaskDocument("global_config:\n  skip_sections: [package]\n")
      ).toThrow("Unknown section 'package' in skip_sections");
    });

    it("reports schema violations as parse errors", () => {
      let caught: unknown;
      try {
        parseTaskDocument("tasks:\n  bulid:\n    linux: [make]\n");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigParseError);
      expect(caught instanceof ConfigParseError && caught.kind).toBe("parse");
    });

    it("rejects an unknown execution policy", () => {
      expect(() =>
        parseTaskDocument("global_config:\n  execution_policy: sometimes\n")
      ).toThrow(ConfigParseError);
    });

    it("reports YAML syntax errors as parse errors", () => {
      expect(() => parseTaskDocument("tasks: [unclosed")).toThrow(ConfigParseError);
    });
  });

  describe("resolveSection", () => {
    it.each([
      ["Build", "Build"],
      ["postbuild", "PostBuild"],
      ["pre-deploy", "PreDeploy"],
      ["POST_DEPLOY", "PostDeploy"],
      ["clean", "Clean"],
    ])("resolves %s to %s", (input, expected) => {
      expect(resolveSection(input)).toBe(expected);
    });

    it("returns undefined for unknown names", () => {
      expect(resolveSection("package")).toBeUndefined();
    });
  });

  describe("loadTaskModel", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = mkdtempSync(join(os.tmpdir(), "phaserun-config-"));
    });

    afterEach(() => {
      rmSync(tmpDir, { force: true, recursive: true });
    });

    it("reads a task file from disk", async () => {
      const file = join(tmpDir, "phaserun.yml");
      writeFileSync(file, "tasks:\n  test:\n    linux: [npm test]\n", "utf-8");

      const model = await loadTaskModel(file);
      expect(model.sections.Test?.linux?.steps).toEqual(["npm test"]);
    });

    it("fails with an IoError when the file is missing", async () => {
      await expect(loadTaskModel(join(tmpDir, "missing.yml"))).rejects.toBeInstanceOf(
        IoError
      );
    });
  });
});
