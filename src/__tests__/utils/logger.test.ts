import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../../utils/logger";

describe("Logger", () => {
  let logger: Logger;

  const logged = () => vi.mocked(console.log).mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    vi.spyOn(console, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    vi.spyOn(console, "warn").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    logger = new Logger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("log", () => {
    it("prefixes lines with the scope", () => {
      logger.registerScope("Build");
      logger.log("Build", "Hello world");

      const output = logged()[0];
      expect(output).toContain("[Build]");
      expect(output).toContain("Hello world");
    });

    it("respects quiet mode", () => {
      logger = new Logger({ quiet: true });
      logger.log("Build", "Hello");
      logger.success("done");
      logger.sectionStarted("Build");

      expect(console.log).not.toHaveBeenCalled();
    });

    it("prints bare lines without a prefix", () => {
      logger = new Logger({ prefix: false });
      logger.log("Build", "Hello");

      expect(console.log).toHaveBeenCalledWith("Hello");
    });

    it("splits multiline messages and skips empty lines", () => {
      logger.log("Build", "Line 1\n\nLine 2\nLine 3");

      const EXPECTED_LINE_COUNT = 3;
      expect(console.log).toHaveBeenCalledTimes(EXPECTED_LINE_COUNT);
    });

    it("aligns prefixes of different lengths", () => {
      logger.registerScope("Test");
      logger.registerScope("Build > setup");
      logger.log("Test", "a");
      logger.log("Build > setup", "b");

      const [short, long] = logged();
      expect(short?.indexOf("|")).toBe(long?.indexOf("|"));
    });
  });

  describe("events", () => {
    it("prints a section banner", () => {
      logger.sectionStarted("PostDeploy");
      expect(logged()[0]).toContain("----- [PostDeploy] -----");
    });

    it("prints commands and marks dry runs", () => {
      logger = new Logger({ prefix: false });
      logger.command("Build", "make all");
      logger.command("Build", "make dist", true);

      const [real, dry] = logged();
      expect(real).toContain("$");
      expect(real).toContain("make all");
      expect(real).not.toContain("(dry run)");
      expect(dry).toContain("make dist");
      expect(dry).toContain("(dry run)");
    });

    it("prints block entries under the parent scope", () => {
      logger.blockEntered("Build", "setup");
      const output = logged()[0];
      expect(output).toContain("[Build]");
      expect(output).toContain("block");
      expect(output).toContain("setup");
    });

    it("prints failures as warnings even when quiet", () => {
      logger = new Logger({ quiet: true });
      logger.commandFailed("Test", "Test: command failed: 'npm test' (exit 1)");

      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(String(vi.mocked(console.warn).mock.calls[0]?.[0])).toContain("npm test");
    });
  });

  describe("levels", () => {
    it("prints debug lines only when verbose", () => {
      logger.debug("hidden");
      expect(console.log).not.toHaveBeenCalled();

      logger = new Logger({ verbosity: 1 });
      logger.debug("shown");
      expect(logged()[0]).toContain("shown");
    });

    it("prints warnings with an icon", () => {
      logger.warn("careful");
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining("careful"));
    });

    it("prints each line of an error", () => {
      logger.error("first\nsecond");
      expect(console.error).toHaveBeenCalledTimes(2);
    });
  });

  describe("createScopeLogger", () => {
    it("binds messages to the scope", () => {
      const scoped = logger.createScopeLogger("Deploy");
      scoped.command("kubectl apply -f k8s");
      scoped.failed("Deploy: command failed: 'helm upgrade' (exit 1)");

      const [first] = logged();
      expect(scoped.scope).toBe("Deploy");
      expect(first).toContain("[Deploy]");
      expect(first).toContain("kubectl apply -f k8s");
      expect(vi.mocked(console.warn)).toHaveBeenCalledWith(
        expect.stringContaining("[Deploy]")
      );
    });
  });
});
