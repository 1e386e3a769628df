import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseTaskDocument } from "../../core/config-loader";
import { parseArgs } from "../../core/parser";
import { detectPlatform, resolveRunConfig } from "../../core/run-config";
import { ExecutionError } from "../../errors";
import { Logger } from "../../utils/logger";

describe("run config", () => {
  const logger = new Logger();

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("detectPlatform", () => {
    it.each([
      ["win32", "windows"],
      ["linux", "linux"],
      ["darwin", "macos"],
    ])("maps %s to %s", (nodePlatform, expected) => {
      expect(detectPlatform(nodePlatform)).toBe(expected);
    });

    it("rejects other platforms", () => {
      expect(() => detectPlatform("aix")).toThrow(ExecutionError);
      expect(() => detectPlatform("aix")).toThrow("unsupported OS detected: aix");
    });
  });

  describe("resolveRunConfig", () => {
    const model = parseTaskDocument(`
global_config:
  execution_policy: carry_forward
  skip_sections: [deploy]
`);

    it("combines command-line options with global settings", () => {
      const config = resolveRunConfig(
        parseArgs(["--cwd", "sub", "--env", "A=1", "--section", "build", "--env-file", ".env"]),
        model,
        { baseDir: "/repo", host: "linux", logger }
      );

      expect(config).toEqual({
        cwd: "/repo/sub",
        dryRun: false,
        env: { A: "1" },
        envFile: "/repo/.env",
        executionPolicy: "carry_forward",
        os: "linux",
        sections: ["Build"],
        skipSections: ["Deploy"],
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it("leaves the allow-list unset when no section is requested", () => {
      const config = resolveRunConfig(parseArgs([]), model, {
        baseDir: "/repo",
        host: "linux",
        logger,
      });
      expect(config.sections).toBeUndefined();
      expect(config.cwd).toBe("/repo");
    });

    it("prefers the command-line policy", () => {
      const config = resolveRunConfig(parseArgs(["--policy", "fast_fail"]), model, {
        host: "linux",
        logger,
      });
      expect(config.executionPolicy).toBe("fast_fail");
    });

    it("defaults to fast-fail", () => {
      const config = resolveRunConfig(parseArgs([]), parseTaskDocument(""), {
        host: "linux",
        logger,
      });
      expect(config.executionPolicy).toBe("fast_fail");
    });

    it("forces a dry run when targeting another platform", () => {
      const config = resolveRunConfig(parseArgs(["--os", "windows"]), model, {
        host: "linux",
        logger,
      });

      expect(config.os).toBe("windows");
      expect(config.dryRun).toBe(true);
      expect(vi.mocked(console.warn)).toHaveBeenCalledTimes(1);
      expect(String(vi.mocked(console.warn).mock.calls[0]?.[0])).toContain(
        "Overriding detected OS 'linux' with user-specified OS 'windows'"
      );
    });

    it("does not warn when the target is the host", () => {
      const config = resolveRunConfig(parseArgs(["--os", "linux"]), model, {
        host: "linux",
        logger,
      });
      expect(config.dryRun).toBe(false);
      expect(vi.mocked(console.warn)).not.toHaveBeenCalled();
    });
  });
});
