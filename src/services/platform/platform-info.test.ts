/**
 * Tests for platform detection.
 */

import { describe, it, expect } from "vitest";
import { mapArch, mapOs, NodePlatformInfo } from "./platform-info";
import { createMockPlatformInfo } from "./platform-info.test-utils";
import { PlatformError, isPlatformErrorWithCode } from "./errors";

describe("mapOs", () => {
  it.each([
    ["darwin", "mac"],
    ["linux", "linux"],
    ["win32", "windows"],
  ] as const)("maps %s to %s", (nodePlatform, expected) => {
    expect(mapOs(nodePlatform)).toBe(expected);
  });

  it("rejects platforms without published binaries", () => {
    expect(() => mapOs("freebsd")).toThrow(PlatformError);
    expect(() => mapOs("freebsd")).toThrow("Unsupported platform: freebsd");
  });
});

describe("mapArch", () => {
  it.each([
    ["arm64", "aarch64"],
    ["ia32", "x86"],
    ["x64", "x86_64"],
  ] as const)("maps %s to %s", (nodeArch, expected) => {
    expect(mapArch(nodeArch)).toBe(expected);
  });

  it("rejects architectures without published binaries", () => {
    let caught: unknown;
    try {
      mapArch("riscv64");
    } catch (error) {
      caught = error;
    }
    expect(isPlatformErrorWithCode(caught, "UNSUPPORTED_ARCHITECTURE")).toBe(true);
  });
});

describe("NodePlatformInfo", () => {
  it("captures the process working directory", () => {
    const info = new NodePlatformInfo();
    expect(info.cwd).toBe(process.cwd());
  });
});

describe("createMockPlatformInfo", () => {
  it("defaults to linux x86_64", () => {
    expect(createMockPlatformInfo().target).toEqual({ os: "linux", arch: "x86_64" });
  });

  it("keeps the default arch when only os is overridden", () => {
    expect(createMockPlatformInfo({ target: { os: "windows" } }).target).toEqual({
      os: "windows",
      arch: "x86_64",
    });
  });
});
