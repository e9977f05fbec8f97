/**
 * LSP settings read from the worktree's `.zed/settings.json`.
 */

import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging";
import { FileSystemError, getErrorMessage } from "../errors";
import type { FileSystemLayer } from "../platform/filesystem";
import type { LspSettings, LspSettingsProvider, Worktree } from "./types";

/**
 * Location of the settings file relative to the worktree root.
 */
export const SETTINGS_FILE_SEGMENTS = [".zed", "settings.json"] as const;

const BinarySettingsSchema = z.object({
  path: z.string().min(1).optional(),
  arguments: z.array(z.string()).optional(),
});

const LspSettingsSchema = z.object({
  binary: BinarySettingsSchema.optional(),
  settings: z.unknown().optional(),
});

const SettingsFileSchema = z.object({
  lsp: z.record(z.string(), LspSettingsSchema).optional(),
});

/**
 * Dependencies for JsonLspSettingsProvider.
 */
export interface JsonLspSettingsProviderDeps {
  readonly fileSystem: FileSystemLayer;
  readonly logger: Logger;
}

/**
 * Reads `lsp.<serverName>` from `<worktree>/.zed/settings.json`.
 *
 * A missing file or server entry yields null. An unreadable or invalid
 * file is logged and also yields null, so resolution falls through to the
 * managed binary.
 */
export class JsonLspSettingsProvider implements LspSettingsProvider {
  private readonly fileSystem: FileSystemLayer;
  private readonly logger: Logger;

  constructor(deps: JsonLspSettingsProviderDeps) {
    this.fileSystem = deps.fileSystem;
    this.logger = deps.logger;
  }

  async forWorktree(serverName: string, worktree: Worktree): Promise<LspSettings | null> {
    const settingsPath = join(worktree.rootPath, ...SETTINGS_FILE_SEGMENTS);

    let content: string;
    try {
      content = await this.fileSystem.readFile(settingsPath);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        return null;
      }
      this.logger.warn("Settings read failed", {
        path: settingsPath,
        error: getErrorMessage(error),
      });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content) as unknown;
    } catch (error) {
      this.logger.warn("Settings are not valid JSON", {
        path: settingsPath,
        error: getErrorMessage(error),
      });
      return null;
    }

    const result = SettingsFileSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn("Settings validation failed", {
        path: settingsPath,
        error: result.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      });
      return null;
    }

    const serverSettings = result.data.lsp?.[serverName] ?? null;
    this.logger.debug("Settings loaded", {
      path: settingsPath,
      server: serverName,
      found: serverSettings !== null,
    });
    return serverSettings;
  }
}
