/**
 * Tests for TaskTranslator.
 */
import { describe, it, expect } from "vitest";
import { TaskTranslator, classifyBuildTask, projectName } from "./task-translator";
import type { BuildTask } from "./types";
import { DebugTaskError } from "../errors";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils";
import { createMockLogger } from "../logging/logging.test-utils";

const SCENARIO_OPTIONS = {
  resolvedLabel: "Debug: zig build run",
  adapter: "CodeLLDB",
  locatorName: "zig-locator",
};

function task(args: readonly string[], overrides?: Partial<BuildTask>): BuildTask {
  return {
    label: `zig ${args.join(" ")}`,
    command: "zig",
    args,
    env: [["ZIG_GLOBAL_CACHE_DIR", "/home/test/.cache/zig"]],
    cwd: "/home/test/project",
    ...overrides,
  };
}

function linuxTranslator(): TaskTranslator {
  return new TaskTranslator({
    platformInfo: createMockPlatformInfo({ cwd: "/home/test/project" }),
    logger: createMockLogger(),
  });
}

function windowsTranslator(): TaskTranslator {
  return new TaskTranslator({
    platformInfo: createMockPlatformInfo({
      target: { os: "windows" },
      cwd: "C:\\Users\\test\\project",
    }),
    logger: createMockLogger(),
  });
}

describe("classifyBuildTask", () => {
  it("recognizes build run", () => {
    expect(classifyBuildTask({ args: ["build", "run", "--", "-v"] })).toEqual({ kind: "build-run" });
  });

  it("recognizes other build steps", () => {
    expect(classifyBuildTask({ args: ["build", "install"] })).toEqual({
      kind: "build-other",
      step: "install",
    });
    expect(classifyBuildTask({ args: ["build"] })).toEqual({ kind: "build-other", step: null });
  });

  it("recognizes test with its arguments", () => {
    expect(classifyBuildTask({ args: ["test", "src/main.zig"] })).toEqual({
      kind: "test",
      testArgs: ["src/main.zig"],
    });
  });

  it("marks everything else unsupported", () => {
    expect(classifyBuildTask({ args: ["fmt", "."] })).toEqual({
      kind: "unsupported",
      subcommand: "fmt",
    });
    expect(classifyBuildTask({ args: [] })).toEqual({ kind: "unsupported", subcommand: null });
  });

  it("only looks at the leading argument", () => {
    expect(classifyBuildTask({ args: ["run", "build"] }).kind).toBe("unsupported");
  });
});

describe("projectName", () => {
  it("takes the last path segment", () => {
    expect(projectName("/home/u/myproj", false)).toBe("myproj");
    expect(projectName("/home/u/myproj/", false)).toBe("myproj");
  });

  it("normalizes backslashes only on windows", () => {
    expect(projectName("C:\\code\\myproj", true)).toBe("myproj");
    expect(projectName("/tmp/odd\\name", false)).toBe("odd\\name");
  });

  it("returns null for a root directory", () => {
    expect(projectName("/", false)).toBeNull();
  });
});

describe("TaskTranslator", () => {
  describe("testExecutablePath", () => {
    it("places the test binary in the working directory", () => {
      expect(linuxTranslator().testExecutablePath()).toBe("/home/test/project/zig_test");
    });

    it("adds the exe extension on windows", () => {
      expect(windowsTranslator().testExecutablePath()).toBe("C:\\Users\\test\\project\\zig_test.exe");
    });
  });

  describe("createScenario", () => {
    it("builds a zig build template for build run", () => {
      const scenario = linuxTranslator().createScenario(task(["build", "run"]), SCENARIO_OPTIONS);

      expect(scenario).toEqual({
        label: "Debug: zig build run",
        adapter: "CodeLLDB",
        build: {
          template: {
            label: "zig build",
            command: "zig",
            args: ["build"],
            env: [["ZIG_GLOBAL_CACHE_DIR", "/home/test/.cache/zig"]],
            cwd: "/home/test/project",
          },
          locatorName: "zig-locator",
        },
        config: null,
      });
    });

    it("compiles tests without running them", () => {
      const scenario = linuxTranslator().createScenario(task(["test", "foo.zig"]), SCENARIO_OPTIONS);

      expect(scenario?.build.template).toEqual({
        label: "zig test",
        command: "zig",
        args: ["test", "foo.zig", "--test-no-exec", "-femit-bin=/home/test/project/zig_test"],
        env: [["ZIG_GLOBAL_CACHE_DIR", "/home/test/.cache/zig"]],
        cwd: "/home/test/project",
      });
    });

    it("quotes test arguments on windows", () => {
      const scenario = windowsTranslator().createScenario(
        task(["test", "src\\my tests.zig"], { cwd: "C:\\code\\project" }),
        SCENARIO_OPTIONS
      );

      expect(scenario?.build.template.args).toEqual([
        '"test"',
        '"src\\my tests.zig"',
        "--test-no-exec",
        '"-femit-bin=C:\\Users\\test\\project\\zig_test.exe"',
      ]);
    });

    it("does not share the environment array with the task", () => {
      const original = task(["build", "run"]);
      const scenario = linuxTranslator().createScenario(original, SCENARIO_OPTIONS);

      expect(scenario?.build.template.env).toEqual(original.env);
      expect(scenario?.build.template.env).not.toBe(original.env);
    });

    it("produces no scenario for other build steps", () => {
      expect(linuxTranslator().createScenario(task(["build", "install"]), SCENARIO_OPTIONS)).toBeNull();
    });

    it("produces no scenario for unrelated commands", () => {
      expect(linuxTranslator().createScenario(task(["fmt"]), SCENARIO_OPTIONS)).toBeNull();
    });
  });

  describe("createLaunchRequest", () => {
    it("launches the installed binary named after the project", () => {
      const request = linuxTranslator().createLaunchRequest(
        task(["build"], { cwd: "/home/u/myproj", env: [] })
      );

      expect(request).toEqual({
        program: "zig-out/bin/myproj",
        args: [],
        cwd: "/home/u/myproj",
        env: [],
      });
    });

    it("derives the project name from a windows path", () => {
      const request = windowsTranslator().createLaunchRequest(
        task(["build", "run"], { cwd: "C:\\code\\myproj" })
      );

      expect(request.program).toBe("zig-out/bin/myproj");
    });

    it("launches the emitted test binary for test tasks", () => {
      const request = linuxTranslator().createLaunchRequest(task(["test", "foo.zig"]));

      expect(request).toEqual({
        program: "/home/test/project/zig_test",
        args: [],
        cwd: "/home/test/project",
        env: [["ZIG_GLOBAL_CACHE_DIR", "/home/test/.cache/zig"]],
      });
    });

    it("fails for a build task without working directory", () => {
      const translator = linuxTranslator();

      const launch = () => translator.createLaunchRequest(task(["build"], { cwd: null }));

      expect(launch).toThrow(DebugTaskError);
      expect(launch).toThrow(
        'Cannot derive the project name for task "zig build" without a working directory'
      );
    });

    it("fails for unsupported tasks", () => {
      const translator = linuxTranslator();
      let caught: unknown;
      try {
        translator.createLaunchRequest(task(["fmt", "."]));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DebugTaskError);
      expect(caught).toMatchObject({
        message: "Unsupported build task: zig fmt .",
        code: "UNSUPPORTED_BUILD_TASK",
      });
    });
  });
});
