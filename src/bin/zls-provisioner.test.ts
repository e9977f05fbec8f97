/**
 * Tests for the zls-provisioner command line.
 */
import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { parseBuildTask, runCli, type CliIo } from "./zls-provisioner";
import { ZigExtension } from "../main/zig-extension";
import type { LanguageServerResolver } from "../services/binary-resolution";
import { TaskTranslator } from "../services/debug-tasks";
import { VersionNegotiationError } from "../services/errors";
import { createMockLspSettingsProvider, createMockWorktree } from "../services/host/host.test-utils";
import { createMockLogger } from "../services/logging/logging.test-utils";
import { createMockPlatformInfo } from "../services/platform/platform-info.test-utils";

interface RecordingIo extends CliIo {
  readonly out: string[];
  readonly err: string[];
}

function createIo(files: Readonly<Record<string, string>> = {}): RecordingIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    readFile: async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: no such file '${path}'`);
      return content;
    },
  };
}

describe("parseBuildTask", () => {
  it("fills defaults and converts env to pairs", () => {
    expect(parseBuildTask({ command: "zig", env: { ZIG_LIB_DIR: "/opt/zig/lib" } })).toEqual({
      label: "",
      command: "zig",
      args: [],
      env: [["ZIG_LIB_DIR", "/opt/zig/lib"]],
      cwd: null,
    });
  });

  it("lists invalid fields", () => {
    expect(() => parseBuildTask({ command: 1, args: "build" })).toThrow(
      "Invalid task file: command: Expected string, received number; args: Expected array, received string"
    );
  });
});

describe("runCli", () => {
  let resolve: Mock<LanguageServerResolver["resolve"]>;
  let runtime: Parameters<typeof runCli>[1];

  beforeEach(() => {
    resolve = vi.fn<LanguageServerResolver["resolve"]>();
    resolve.mockResolvedValue({
      path: "/test/app-data/zls/zls-0.13.0/zls",
      args: null,
      env: [["PATH", "/usr/bin"]],
      source: "download",
    });
    const platformInfo = createMockPlatformInfo({ cwd: "/home/test/project" });
    runtime = {
      platformInfo,
      createWorktree: (rootPath) => createMockWorktree({ rootPath }),
      extension: new ZigExtension({
        resolver: { resolve },
        settingsProvider: createMockLspSettingsProvider({
          zls: { settings: { warn_style: true } },
        }),
        taskTranslator: new TaskTranslator({ platformInfo, logger: createMockLogger() }),
        logger: createMockLogger(),
      }),
    };
  });

  it("prints the language server command", async () => {
    const io = createIo();

    const code = await runCli(["resolve"], runtime, io);

    expect(code).toBe(0);
    expect(JSON.parse(io.out.join(""))).toEqual({
      command: "/test/app-data/zls/zls-0.13.0/zls",
      args: [],
      env: [["PATH", "/usr/bin"]],
    });
  });

  it("resolves the worktree directory against the working directory", async () => {
    await runCli(["resolve", "../other"], runtime, createIo());

    expect(resolve).toHaveBeenCalledWith(expect.objectContaining({ rootPath: "/home/test/other" }));
  });

  it("prints workspace settings", async () => {
    const io = createIo();

    await runCli(["settings"], runtime, io);

    expect(io.out).toEqual([JSON.stringify({ warn_style: true }, null, 2)]);
  });

  it("prints a scenario for a task file", async () => {
    const io = createIo({
      "/home/test/project/task.json": JSON.stringify({
        label: "run app",
        command: "zig",
        args: ["build", "run"],
        cwd: "/home/test/project",
      }),
    });

    const code = await runCli(["scenario", "task.json", "CodeLLDB"], runtime, io);

    expect(code).toBe(0);
    expect(JSON.parse(io.out.join(""))).toEqual({
      label: "run app",
      adapter: "CodeLLDB",
      build: {
        template: {
          label: "zig build",
          command: "zig",
          args: ["build"],
          env: [],
          cwd: "/home/test/project",
        },
        locatorName: "zig",
      },
      config: null,
    });
  });

  it("prints the located program", async () => {
    const io = createIo({
      "/tasks/test.json": JSON.stringify({ command: "zig", args: ["test", "src/main.zig"] }),
    });

    await runCli(["locate", "/tasks/test.json"], runtime, io);

    expect(JSON.parse(io.out.join(""))).toEqual({
      program: "/home/test/project/zig_test",
      args: [],
      cwd: null,
      env: [],
    });
  });

  it("reports failures on stderr", async () => {
    resolve.mockRejectedValue(
      new VersionNegotiationError("Failed to find ZLS asset for x86-linux", "UNSUPPORTED_PLATFORM")
    );
    const io = createIo();

    const code = await runCli(["resolve"], runtime, io);

    expect(code).toBe(2);
    expect(io.err).toEqual(["Error: Failed to find ZLS asset for x86-linux"]);
  });

  it("prints usage for unknown commands and missing arguments", async () => {
    const unknown = createIo();
    const missing = createIo();

    expect(await runCli(["install"], runtime, unknown)).toBe(1);
    expect(await runCli(["scenario", "task.json"], runtime, missing)).toBe(1);
    expect(unknown.err[0]).toMatch(/^Usage:/);
    expect(missing.err[0]).toMatch(/^Usage:/);
  });
});
