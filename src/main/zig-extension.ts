/**
 * ZigExtension - the operations the editor host calls.
 */

import type { Logger } from "../services/logging";
import type { EnvPair, LspSettingsProvider, Worktree } from "../services/host/types";
import type { LanguageServerResolver } from "../services/binary-resolution";
import type {
  BuildTask,
  DebugScenario,
  LaunchRequest,
  TaskTranslator,
} from "../services/debug-tasks";

/** Server name used for settings lookup, PATH lookup and status reports */
export const LANGUAGE_SERVER_NAME = "zls";

/**
 * Command the host spawns for the language server.
 */
export interface LanguageServerCommand {
  readonly command: string;
  readonly args: readonly string[];
  readonly env: readonly EnvPair[];
}

/**
 * Dependencies for ZigExtension.
 */
export interface ZigExtensionDeps {
  readonly resolver: Pick<LanguageServerResolver, "resolve">;
  readonly settingsProvider: LspSettingsProvider;
  readonly taskTranslator: TaskTranslator;
  readonly logger: Logger;
}

export class ZigExtension {
  constructor(private readonly deps: ZigExtensionDeps) {}

  /**
   * @throws VersionNegotiationError or BinaryDownloadError when no binary could be provisioned
   */
  async languageServerCommand(worktree: Worktree): Promise<LanguageServerCommand> {
    const binary = await this.deps.resolver.resolve(worktree);
    this.deps.logger.info("Language server command", {
      worktree: worktree.rootPath,
      command: binary.path,
      source: binary.source,
    });
    return {
      command: binary.path,
      args: binary.args ?? [],
      env: binary.env ?? [],
    };
  }

  /**
   * The `settings` object of the server's LSP settings, `{}` when there is none.
   */
  async languageServerWorkspaceConfiguration(worktree: Worktree): Promise<unknown> {
    const settings = await this.deps.settingsProvider.forWorktree(LANGUAGE_SERVER_NAME, worktree);
    return settings?.settings ?? {};
  }

  dapLocatorCreateScenario(
    locatorName: string,
    buildTask: BuildTask,
    resolvedLabel: string,
    adapter: string
  ): DebugScenario | null {
    return this.deps.taskTranslator.createScenario(buildTask, {
      resolvedLabel,
      adapter,
      locatorName,
    });
  }

  /**
   * @throws DebugTaskError for tasks that do not produce a debuggable program
   */
  runDapLocator(locatorName: string, buildTask: BuildTask): LaunchRequest {
    this.deps.logger.debug("Locating program", { locator: locatorName, task: buildTask.label });
    return this.deps.taskTranslator.createLaunchRequest(buildTask);
  }
}
