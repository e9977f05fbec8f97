/**
 * zls-provisioner command line.
 *
 * Runs the extension operations outside an editor and prints their result as JSON:
 *   zls-provisioner resolve [dir]            language server command for a worktree
 *   zls-provisioner settings [dir]           workspace configuration for the server
 *   zls-provisioner scenario <task.json> <adapter>
 *   zls-provisioner locate <task.json>
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { createZigExtension, type ZigExtensionRuntime } from "../main/bootstrap";
import type { BuildTask } from "../services/debug-tasks";
import { getErrorMessage } from "../services/errors";

// Exit codes
const EXIT_USAGE = 1;
const EXIT_FAILED = 2;

/** Locator name reported in generated scenarios */
export const LOCATOR_NAME = "zig";

const USAGE = [
  "Usage:",
  "  zls-provisioner resolve [dir]",
  "  zls-provisioner settings [dir]",
  "  zls-provisioner scenario <task.json> <adapter>",
  "  zls-provisioner locate <task.json>",
].join("\n");

/**
 * Task file format. `env` is an object; order of its keys is kept.
 */
const BuildTaskFileSchema = z.object({
  label: z.string().default(""),
  command: z.string(),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  cwd: z.string().nullable().default(null),
});

/**
 * Validate a parsed task file.
 *
 * @throws Error listing every invalid field
 */
export function parseBuildTask(json: unknown): BuildTask {
  const result = BuildTaskFileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid task file: ${issues}`);
  }
  const { env, ...task } = result.data;
  return { ...task, env: Object.entries(env) };
}

/**
 * Output and file access of the command line.
 */
export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readFile: (path: string) => Promise<string>;
}

type CliRuntime = Pick<ZigExtensionRuntime, "extension" | "createWorktree" | "platformInfo">;

/**
 * Run one command.
 *
 * @returns Process exit code
 */
export async function runCli(
  argv: readonly string[],
  runtime: CliRuntime,
  io: CliIo
): Promise<number> {
  const [command, first, second] = argv;
  const { extension, platformInfo } = runtime;
  const worktreeAt = (dir: string | undefined) =>
    runtime.createWorktree(resolve(platformInfo.cwd, dir ?? "."));
  const print = (value: unknown): void => io.stdout(JSON.stringify(value, null, 2));

  const readTask = async (path: string): Promise<BuildTask> => {
    const content = await io.readFile(resolve(platformInfo.cwd, path));
    return parseBuildTask(JSON.parse(content) as unknown);
  };

  try {
    switch (command) {
      case "resolve":
        print(await extension.languageServerCommand(worktreeAt(first)));
        return 0;
      case "settings":
        print(await extension.languageServerWorkspaceConfiguration(worktreeAt(first)));
        return 0;
      case "scenario": {
        if (first === undefined || second === undefined) break;
        const task = await readTask(first);
        print(extension.dapLocatorCreateScenario(LOCATOR_NAME, task, task.label, second));
        return 0;
      }
      case "locate": {
        if (first === undefined) break;
        print(extension.runDapLocator(LOCATOR_NAME, await readTask(first)));
        return 0;
      }
    }
  } catch (error) {
    io.stderr(`Error: ${getErrorMessage(error)}`);
    return EXIT_FAILED;
  }

  io.stderr(USAGE);
  return EXIT_USAGE;
}

/**
 * Main entry point.
 */
async function main(): Promise<never> {
  const runtime = await createZigExtension();
  const code = await runCli(process.argv.slice(2), runtime, {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    readFile: (path) => readFile(path, "utf-8"),
  });
  runtime.dispose();
  process.exit(code);
}

// Skip when running in test environment (Vitest sets VITEST env var)
if (!process.env.VITEST) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", getErrorMessage(error));
    process.exit(EXIT_FAILED);
  });
}
