import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";

const { mockSpinner, oraMock } = vi.hoisted(() => {
  const mockSpinner = {
    start: vi.fn(),
    succeed: vi.fn(),
    fail: vi.fn(),
  };
  return { mockSpinner, oraMock: vi.fn() };
});

// Mock ora to avoid actual spinner output in tests
vi.mock("ora", () => ({ default: oraMock }));

import { ProgressTracker } from "./progress";

describe("ProgressTracker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-10-19T02:00:00.000Z"));
    // restoreAllMocks in afterEach drops implementations, so arm them per test
    oraMock.mockReset().mockImplementation(() => mockSpinner);
    mockSpinner.start.mockReset().mockReturnValue(mockSpinner);
    mockSpinner.succeed.mockReset();
    mockSpinner.fail.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("with spinner", () => {
    it("should start an ora spinner with the operation text", () => {
      const tracker = new ProgressTracker();
      tracker.start("Deleting inactive customers");

      expect(oraMock).toHaveBeenCalledWith({ text: "Deleting inactive customers", spinner: "dots", color: "cyan" });
      expect(mockSpinner.start).toHaveBeenCalledTimes(1);
    });

    it("should succeed with the elapsed time", () => {
      const tracker = new ProgressTracker();
      tracker.start("Deleting inactive customers");
      vi.advanceTimersByTime(2500);
      tracker.complete("Deleted 3 inactive customers");

      expect(mockSpinner.succeed).toHaveBeenCalledWith("Deleted 3 inactive customers (2s)");
      expect(tracker.getElapsedTime()).toBe(0);
    });

    it("should default the completion message to the operation", () => {
      const tracker = new ProgressTracker();
      tracker.start("Counting inactive customers");
      vi.advanceTimersByTime(120);
      tracker.complete();

      expect(mockSpinner.succeed).toHaveBeenCalledWith("Counting inactive customers complete (120ms)");
    });

    it("should fail the spinner", () => {
      const tracker = new ProgressTracker();
      tracker.start("Deleting inactive customers");
      tracker.fail();

      expect(mockSpinner.fail).toHaveBeenCalledWith("Deleting inactive customers failed");
      expect(tracker.getElapsedTime()).toBe(0);
    });
  });

  describe("without spinner", () => {
    it("should print plain lines", () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      const tracker = new ProgressTracker({ showSpinner: false });

      tracker.start("Deleting inactive customers");
      tracker.fail("Database unreachable");

      expect(oraMock).not.toHaveBeenCalled();
      expect(logSpy).toHaveBeenCalledWith("Deleting inactive customers...");
      expect(errorSpy).toHaveBeenCalledWith("Database unreachable");
    });
  });
});
