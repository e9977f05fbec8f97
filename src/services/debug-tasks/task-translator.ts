/**
 * TaskTranslator - turns `zig build` / `zig test` tasks into debug scenarios
 * and launch requests.
 */

import * as path from "node:path";
import type { Logger } from "../logging";
import type { PlatformInfo } from "../platform/platform-info";
import { DebugTaskError } from "../errors";
import type {
  BuildTask,
  BuildTaskIntent,
  DebugScenario,
  LaunchRequest,
  ScenarioOptions,
} from "./types";

/** Toolchain command used by build templates */
export const TOOLCHAIN_COMMAND = "zig";

/** File name of the test binary emitted by `--test-no-exec`, without extension */
export const TEST_BINARY_NAME = "zig_test";

interface ClassificationRule {
  readonly matches: (args: readonly string[]) => boolean;
  readonly classify: (args: readonly string[]) => BuildTaskIntent;
}

/**
 * Checked in order; the first matching rule decides.
 */
const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    matches: (args) => args[0] === "build" && args[1] === "run",
    classify: () => ({ kind: "build-run" }),
  },
  {
    matches: (args) => args[0] === "build",
    classify: (args) => ({ kind: "build-other", step: args[1] ?? null }),
  },
  {
    matches: (args) => args[0] === "test",
    classify: (args) => ({ kind: "test", testArgs: args.slice(1) }),
  },
];

/**
 * Classify a task by its first one or two arguments.
 */
export function classifyBuildTask(task: Pick<BuildTask, "args">): BuildTaskIntent {
  const rule = CLASSIFICATION_RULES.find((candidate) => candidate.matches(task.args));
  return rule ? rule.classify(task.args) : { kind: "unsupported", subcommand: task.args[0] ?? null };
}

/**
 * Last non-empty path segment of a working directory.
 */
export function projectName(cwd: string, windows: boolean): string | null {
  const normalized = windows ? cwd.replace(/\\/g, "/") : cwd;
  const segments = normalized.split("/").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? null;
}

function quote(arg: string): string {
  return `"${arg}"`;
}

/**
 * Dependencies for TaskTranslator.
 */
export interface TaskTranslatorDeps {
  readonly platformInfo: Pick<PlatformInfo, "target" | "cwd">;
  readonly logger: Logger;
}

export class TaskTranslator {
  constructor(private readonly deps: TaskTranslatorDeps) {}

  /**
   * Path the test build template emits the test binary to.
   */
  testExecutablePath(): string {
    const { cwd } = this.deps.platformInfo;
    return this.isWindows()
      ? path.win32.join(cwd, `${TEST_BINARY_NAME}.exe`)
      : path.posix.join(cwd, TEST_BINARY_NAME);
  }

  /**
   * Debug scenario for a task, or null when the task is not one this
   * extension knows how to debug.
   */
  createScenario(task: BuildTask, options: ScenarioOptions): DebugScenario | null {
    const intent = classifyBuildTask(task);
    const template = this.buildTemplate(task, intent);
    if (template === null) {
      this.deps.logger.debug("No debug scenario for task", {
        label: task.label,
        kind: intent.kind,
      });
      return null;
    }

    return {
      label: options.resolvedLabel,
      adapter: options.adapter,
      build: { template, locatorName: options.locatorName },
      config: null,
    };
  }

  /**
   * Launch request for a task whose build template already ran.
   *
   * @throws DebugTaskError UNSUPPORTED_BUILD_TASK for tasks other than `build` and `test`
   * @throws DebugTaskError MISSING_PROJECT_NAME when a build task has no usable working directory
   */
  createLaunchRequest(task: BuildTask): LaunchRequest {
    const intent = classifyBuildTask(task);
    const base = { args: [], cwd: task.cwd, env: [...task.env] };

    switch (intent.kind) {
      case "build-run":
      case "build-other":
        return { ...base, program: this.buildProgramPath(task) };
      case "test":
        return { ...base, program: this.testExecutablePath() };
      case "unsupported":
        throw new DebugTaskError(
          `Unsupported build task: ${[task.command, ...task.args].join(" ")}`,
          "UNSUPPORTED_BUILD_TASK"
        );
    }
  }

  private buildTemplate(task: BuildTask, intent: BuildTaskIntent): BuildTask | null {
    const env = [...task.env];
    const { cwd } = task;

    switch (intent.kind) {
      case "build-run":
        return {
          label: `${TOOLCHAIN_COMMAND} build`,
          command: TOOLCHAIN_COMMAND,
          args: ["build"],
          env,
          cwd,
        };
      case "test":
        return {
          label: `${TOOLCHAIN_COMMAND} test`,
          command: TOOLCHAIN_COMMAND,
          args: this.testArgs(task.args),
          env,
          cwd,
        };
      case "build-other":
      case "unsupported":
        return null;
    }
  }

  private testArgs(originalArgs: readonly string[]): string[] {
    const emitFlag = `-femit-bin=${this.testExecutablePath()}`;
    if (this.isWindows()) {
      // The Windows shell re-tokenizes the command line
      return [...originalArgs.map(quote), "--test-no-exec", quote(emitFlag)];
    }
    return [...originalArgs, "--test-no-exec", emitFlag];
  }

  private buildProgramPath(task: BuildTask): string {
    const name = task.cwd === null ? null : projectName(task.cwd, this.isWindows());
    if (name === null) {
      throw new DebugTaskError(
        `Cannot derive the project name for task "${task.label}" without a working directory`,
        "MISSING_PROJECT_NAME"
      );
    }
    return `zig-out/bin/${name}`;
  }

  private isWindows(): boolean {
    return this.deps.platformInfo.target.os === "windows";
  }
}
