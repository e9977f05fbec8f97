/**
 * Tests for platform token mapping.
 */

import { describe, it, expect } from "vitest";
import {
  archiveKind,
  binaryFileName,
  compatibilityTarget,
  releaseAssetName,
} from "./platform-tokens";
import type { PlatformTarget } from "./platform-info";

describe("compatibilityTarget", () => {
  it.each([
    [{ os: "mac", arch: "aarch64" }, "aarch64-macos"],
    [{ os: "mac", arch: "x86_64" }, "x86_64-macos"],
    [{ os: "linux", arch: "aarch64" }, "aarch64-linux"],
    [{ os: "linux", arch: "x86" }, "x86-linux"],
    [{ os: "linux", arch: "x86_64" }, "x86_64-linux"],
    [{ os: "windows", arch: "aarch64" }, "aarch64-windows"],
    [{ os: "windows", arch: "x86" }, "x86-windows"],
    [{ os: "windows", arch: "x86_64" }, "x86_64-windows"],
  ] satisfies [PlatformTarget, string][])("maps %o to %s", (target, expected) => {
    expect(compatibilityTarget(target)).toBe(expected);
  });
});

describe("releaseAssetName", () => {
  it("puts the architecture first by default convention", () => {
    expect(releaseAssetName({ os: "linux", arch: "x86_64" }, "0.13.0", "arch-os")).toBe(
      "zls-x86_64-linux-0.13.0.tar.gz"
    );
  });

  it("puts the os first under the os-arch convention", () => {
    expect(releaseAssetName({ os: "mac", arch: "aarch64" }, "0.13.0", "os-arch")).toBe(
      "zls-macos-aarch64-0.13.0.tar.gz"
    );
  });

  it("uses zip archives on windows", () => {
    expect(releaseAssetName({ os: "windows", arch: "x86_64" }, "0.14.0", "arch-os")).toBe(
      "zls-x86_64-windows-0.14.0.zip"
    );
  });
});

describe("archiveKind", () => {
  it("selects gzip tar on mac and linux", () => {
    expect(archiveKind("mac")).toBe("gzip-tar");
    expect(archiveKind("linux")).toBe("gzip-tar");
  });

  it("selects zip on windows", () => {
    expect(archiveKind("windows")).toBe("zip");
  });
});

describe("binaryFileName", () => {
  it("adds .exe on windows only", () => {
    expect(binaryFileName("windows")).toBe("zls.exe");
    expect(binaryFileName("linux")).toBe("zls");
  });
});
