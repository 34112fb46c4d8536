import { RunLogger, createRunLogger } from "@/debug/RunLogger";
import { beforeEach, describe, expect, it, vi } from "vitest";

function fakeConsole() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("RunLogger", () => {
  let out: ReturnType<typeof fakeConsole>;
  let logger: RunLogger;

  beforeEach(() => {
    out = fakeConsole();
    logger = createRunLogger("info", out);
  });

  describe("levels", () => {
    it("should route each level to its console method", () => {
      logger.info("hello");
      logger.warn("careful");
      logger.error("broken");

      expect(out.log).toHaveBeenCalledWith("hello");
      expect(out.warn).toHaveBeenCalledWith("careful");
      expect(out.error).toHaveBeenCalledWith("broken");
    });

    it("should drop messages below the current level", () => {
      logger.debug("noise");

      expect(out.log).not.toHaveBeenCalled();
      expect(logger.isEnabled("debug")).toBe(false);
    });

    it("should print debug output once enabled", () => {
      logger.setLevel("debug");
      logger.debug("detail");

      expect(logger.getLevel()).toBe("debug");
      expect(out.log).toHaveBeenCalledWith("detail");
    });

    it("should print nothing when silent", () => {
      logger.setLevel("silent");
      logger.error("broken");

      expect(out.error).not.toHaveBeenCalled();
      expect(logger.recent()).toHaveLength(0);
    });
  });

  describe("progress", () => {
    it("should format completed and total frames", () => {
      logger.progress({ completed: 11, total: 360 });

      expect(out.log).toHaveBeenCalledWith("Progress: 11/360 frames");
    });

    it("should accept another unit", () => {
      logger.progress({ completed: 2, total: 5 }, "rows");

      expect(out.log).toHaveBeenCalledWith("Progress: 2/5 rows");
    });
  });

  describe("history", () => {
    it("should keep the last 100 entries", () => {
      const quiet = new RunLogger("info", fakeConsole());
      for (let i = 0; i < 120; i++) {
        quiet.info(`message ${i}`);
      }

      const recent = quiet.recent();
      expect(recent).toHaveLength(100);
      expect(recent[0]?.message).toBe("message 20");
      expect(recent.at(-1)?.level).toBe("info");
    });
  });
});
