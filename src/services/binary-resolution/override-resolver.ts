/**
 * User override and PATH lookup, checked before any version logic.
 */

import type { Logger } from "../logging";
import type { LspSettingsProvider, Worktree } from "../host/types";
import type { OverrideResolution } from "./types";

/**
 * Dependencies for OverrideResolver.
 */
export interface OverrideResolverDeps {
  readonly settingsProvider: LspSettingsProvider;
  readonly logger: Logger;
  /** Settings key and executable name, e.g. `zls` */
  readonly serverName: string;
}

/**
 * First match wins:
 * 1. `binary.path` from settings, trusted even if it does not exist
 * 2. the executable found on the worktree's PATH
 *
 * `binary.arguments` are returned in every case so they also apply to a
 * managed binary. Never touches the network.
 */
export class OverrideResolver {
  constructor(private readonly deps: OverrideResolverDeps) {}

  async resolve(worktree: Worktree): Promise<OverrideResolution> {
    const { serverName, logger } = this.deps;
    const settings = await this.deps.settingsProvider.forWorktree(serverName, worktree);
    const args = settings?.binary?.arguments ?? null;

    const configuredPath = settings?.binary?.path;
    if (configuredPath !== undefined) {
      logger.debug("Using configured binary", { path: configuredPath });
      return { binary: { path: configuredPath, source: "override" }, args };
    }

    const found = await worktree.which(serverName);
    if (found !== null) {
      logger.debug("Using binary from PATH", { path: found });
      return { binary: { path: found, source: "path" }, args };
    }

    return { binary: null, args };
  }
}
