/**
 * Installation status reporter writing transitions to the log.
 */

import type { Logger } from "../logging";
import type { InstallationStatus, InstallationStatusReporter } from "./types";

export class LoggingStatusReporter implements InstallationStatusReporter {
  constructor(private readonly logger: Logger) {}

  setStatus(serverName: string, status: InstallationStatus): void {
    if (typeof status === "string") {
      this.logger.info("Installation status", { server: serverName, status });
      return;
    }
    this.logger.warn("Installation failed", { server: serverName, error: status.failed });
  }
}
