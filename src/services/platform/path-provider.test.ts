/**
 * Tests for PathProvider mock factory and DefaultPathProvider.
 */

import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { createMockPathProvider } from "./path-provider.test-utils";
import { DefaultPathProvider } from "./path-provider";
import { createMockPlatformInfo } from "./platform-info.test-utils";

describe("createMockPathProvider", () => {
  it("returns sensible default paths", () => {
    const pathProvider = createMockPathProvider();

    expect(pathProvider.dataRootDir).toBe(join("/test", "app-data"));
    expect(pathProvider.binariesDir).toBe(join("/test", "app-data", "zls"));
    expect(pathProvider.logsDir).toBe(join("/test", "app-data", "logs"));
    expect(pathProvider.configPath).toBe(join("/test", "app-data", "config.json"));
  });

  it("derives the binaries directory from an overridden data root", () => {
    const pathProvider = createMockPathProvider({ dataRootDir: "/custom/root" });

    expect(pathProvider.binaryPath("0.13.0", "linux")).toBe(
      join("/custom/root", "zls", "zls-0.13.0", "zls")
    );
  });
});

describe("DefaultPathProvider", () => {
  it("uses ~/.local/share on linux", () => {
    const pathProvider = new DefaultPathProvider(
      createMockPlatformInfo({ homeDir: "/home/user", target: { os: "linux" } }),
      {}
    );

    expect(pathProvider.dataRootDir).toBe(join("/home/user", ".local", "share", "zls-provisioner"));
  });

  it("uses Application Support on mac", () => {
    const pathProvider = new DefaultPathProvider(
      createMockPlatformInfo({ homeDir: "/Users/user", target: { os: "mac" } }),
      {}
    );

    expect(pathProvider.dataRootDir).toBe(
      join("/Users/user", "Library", "Application Support", "zls-provisioner")
    );
  });

  it("uses AppData/Roaming on windows", () => {
    const pathProvider = new DefaultPathProvider(
      createMockPlatformInfo({ homeDir: "/Users/user", target: { os: "windows" } }),
      {}
    );

    expect(pathProvider.dataRootDir).toBe(join("/Users/user", "AppData", "Roaming", "zls-provisioner"));
  });

  it("prefers ZLS_PROVISIONER_DATA_DIR", () => {
    const pathProvider = new DefaultPathProvider(createMockPlatformInfo(), {
      ZLS_PROVISIONER_DATA_DIR: "/srv/zls-data",
    });

    expect(pathProvider.dataRootDir).toBe("/srv/zls-data");
    expect(pathProvider.logsDir).toBe(join("/srv/zls-data", "logs"));
    expect(pathProvider.configPath).toBe(join("/srv/zls-data", "config.json"));
  });

  it("builds version directories and binary paths", () => {
    const pathProvider = new DefaultPathProvider(createMockPlatformInfo(), {
      ZLS_PROVISIONER_DATA_DIR: "/data",
    });

    expect(pathProvider.versionDir("0.13.0")).toBe(join("/data", "zls", "zls-0.13.0"));
    expect(pathProvider.binaryPath("0.13.0", "linux")).toBe(join("/data", "zls", "zls-0.13.0", "zls"));
    expect(pathProvider.binaryPath("0.13.0", "windows")).toBe(
      join("/data", "zls", "zls-0.13.0", "zls.exe")
    );
  });
});
