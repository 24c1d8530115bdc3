import { afterEach, describe, it, expect, vi } from "vitest";
import { createConsoleLogger } from "../src/core/logger";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints at or above its level, warnings to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("warn");

    logger.info("hidden");
    logger.warn("slow host");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[WARN\] slow host$/);
  });
});
