/**
 * Tests for createZigExtension wiring, with every boundary layer mocked.
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import { createZigExtension, type ZigExtensionOptions } from "./bootstrap";
import { DEFAULT_PROVISIONER_CONFIG } from "../services/config";
import { createFileSystemMock, file, type MockFileSystemLayer } from "../services/platform/filesystem.state-mock";
import { createMockHttpClient, jsonResponse, type MockHttpClient } from "../services/platform/network.test-utils";
import { createMockPathProvider } from "../services/platform/path-provider.test-utils";
import { createMockPlatformInfo } from "../services/platform/platform-info.test-utils";
import { createMockSpawnedProcess, type MockProcessRunner } from "../services/platform/process.test-utils";
import {
  createMockLoggingService,
  type MockLoggingService,
} from "../services/logging/logging.test-utils";
import {
  createRecordingStatusReporter,
  type RecordingStatusReporter,
} from "../services/host/host.test-utils";

const COMPATIBILITY_URL =
  "https://example.test/select-version?zig_version=0.13.0&compatibility=only-runtime";

/**
 * Runner answering `which <name>` from a lookup table and `zig version` with 0.13.0.
 */
function createRunner(onPath: Readonly<Record<string, string>>): MockProcessRunner {
  return {
    run: vi.fn((command: string, args: readonly string[]) => {
      if (command === "which") {
        const found = onPath[args[0] ?? ""];
        return createMockSpawnedProcess({
          waitResult: found === undefined ? { exitCode: 1 } : { stdout: `${found}\n` },
        });
      }
      if (command === "/usr/bin/zig" && args[0] === "version") {
        return createMockSpawnedProcess({ waitResult: { stdout: "0.13.0\n" } });
      }
      return createMockSpawnedProcess({ waitResult: { exitCode: 1 } });
    }),
  };
}

describe("createZigExtension", () => {
  let fileSystem: MockFileSystemLayer;
  let httpClient: MockHttpClient;
  let loggingService: MockLoggingService;
  let statusReporter: RecordingStatusReporter;

  beforeEach(() => {
    fileSystem = createFileSystemMock();
    httpClient = createMockHttpClient();
    loggingService = createMockLoggingService();
    statusReporter = createRecordingStatusReporter();
  });

  function options(overrides?: Partial<ZigExtensionOptions>): ZigExtensionOptions {
    return {
      env: { PATH: "/usr/bin", HOME: "/home/test" },
      platformInfo: createMockPlatformInfo(),
      pathProvider: createMockPathProvider(),
      loggingService,
      fileSystem,
      httpClient,
      processRunner: createRunner({}),
      statusReporter,
      ...overrides,
    };
  }

  describe("configuration", () => {
    it("writes the default config on first start", async () => {
      const runtime = await createZigExtension(options());

      expect(runtime.config).toEqual(DEFAULT_PROVISIONER_CONFIG);
      expect(fileSystem.$.entries.has("/test/app-data/config.json")).toBe(true);
    });

    it("reads an existing config file", async () => {
      fileSystem.$.setEntry(
        "/test/app-data/config.json",
        file(JSON.stringify({ pruneStaleVersions: false }))
      );

      const runtime = await createZigExtension(options());

      expect(runtime.config).toEqual({ ...DEFAULT_PROVISIONER_CONFIG, pruneStaleVersions: false });
    });

    it("places data under ZLS_PROVISIONER_DATA_DIR", async () => {
      await createZigExtension({
        ...options({ env: { ZLS_PROVISIONER_DATA_DIR: "/custom/data" } }),
        pathProvider: undefined,
      });

      expect(fileSystem.$.entries.has("/custom/data/config.json")).toBe(true);
    });

    it("skips the config file when a config is passed in", async () => {
      await createZigExtension(options({ config: DEFAULT_PROVISIONER_CONFIG }));

      expect(fileSystem.readFile).not.toHaveBeenCalled();
    });
  });

  it("launches zls from PATH with the worktree environment", async () => {
    const processRunner = createRunner({ zls: "/usr/bin/zls" });
    const runtime = await createZigExtension(options({ processRunner }));

    const command = await runtime.extension.languageServerCommand(
      runtime.createWorktree("/home/test/project")
    );

    expect(command).toEqual({
      command: "/usr/bin/zls",
      args: [],
      env: [
        ["PATH", "/usr/bin"],
        ["HOME", "/home/test"],
      ],
    });
    expect(processRunner.run).toHaveBeenCalledWith("which", ["zls"], {
      cwd: "/home/test/project",
      env: { PATH: "/usr/bin", HOME: "/home/test" },
    });
  });

  it("reads workspace configuration from the worktree settings file", async () => {
    fileSystem.$.setEntry(
      "/home/test/project/.zed/settings.json",
      file(JSON.stringify({ lsp: { zls: { settings: { enable_snippets: true } } } }))
    );
    const runtime = await createZigExtension(options());

    const configuration = await runtime.extension.languageServerWorkspaceConfiguration(
      runtime.createWorktree("/home/test/project")
    );

    expect(configuration).toEqual({ enable_snippets: true });
  });

  it("negotiates against the configured compatibility endpoint", async () => {
    fileSystem.$.setEntry(
      "/test/app-data/config.json",
      file(JSON.stringify({ compatibilityEndpoint: "https://example.test/select-version" }))
    );
    httpClient.setResponse(
      COMPATIBILITY_URL,
      jsonResponse({ code: 0, message: "zig 0.13.0 is not supported" })
    );
    const runtime = await createZigExtension(
      options({ processRunner: createRunner({ zig: "/usr/bin/zig" }) })
    );

    await expect(
      runtime.extension.languageServerCommand(runtime.createWorktree("/home/test/project"))
    ).rejects.toThrow("No compatible release for zig 0.13.0: zig 0.13.0 is not supported");

    expect(httpClient.$.urls()).toEqual([COMPATIBILITY_URL]);
    expect(statusReporter.statuses).toEqual([
      "checking-for-update",
      { failed: "No compatible release for zig 0.13.0: zig 0.13.0 is not supported" },
    ]);
  });

  it("creates loggers only for the services it builds", async () => {
    await createZigExtension(options());

    expect(loggingService.getCreatedLoggerNames().sort()).toEqual([
      "config",
      "debug-task",
      "download",
      "extension",
      "host",
      "negotiator",
      "resolver",
      "settings",
    ]);
  });

  it("disposes the logging service", async () => {
    const runtime = await createZigExtension(options());

    runtime.dispose();

    expect(loggingService.dispose).toHaveBeenCalledTimes(1);
  });
});
