import { describe, it, expect } from "vitest";
import { LoggingStatusReporter } from "./installation-status";
import { createMockLogger } from "../logging/logging.test-utils";

describe("LoggingStatusReporter", () => {
  it("logs plain transitions at info", () => {
    const logger = createMockLogger();
    new LoggingStatusReporter(logger).setStatus("zls", "downloading");

    expect(logger.info).toHaveBeenCalledWith("Installation status", {
      server: "zls",
      status: "downloading",
    });
  });

  it("logs failures at warn with the message", () => {
    const logger = createMockLogger();
    new LoggingStatusReporter(logger).setStatus("zls", { failed: "no release for zig 0.99.0" });

    expect(logger.warn).toHaveBeenCalledWith("Installation failed", {
      server: "zls",
      error: "no release for zig 0.99.0",
    });
    expect(logger.info).not.toHaveBeenCalled();
  });
});
