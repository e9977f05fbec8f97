/**
 * Build task and debug request shapes exchanged with the host.
 */

import type { EnvPair } from "../host/types";

/**
 * Generic task as the host describes it. Also used as the build template
 * of a debug scenario.
 */
export interface BuildTask {
  readonly label: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly env: readonly EnvPair[];
  readonly cwd: string | null;
}

/**
 * What a task asks the toolchain to do, decided from its leading arguments.
 */
export type BuildTaskIntent =
  | { readonly kind: "build-run" }
  | { readonly kind: "build-other"; readonly step: string | null }
  | { readonly kind: "test"; readonly testArgs: readonly string[] }
  | { readonly kind: "unsupported"; readonly subcommand: string | null };

export type BuildTaskIntentKind = BuildTaskIntent["kind"];

/**
 * Scenario the debugger runs: build with the template, then locate the program.
 */
export interface DebugScenario {
  readonly label: string;
  readonly adapter: string;
  readonly build: {
    readonly template: BuildTask;
    readonly locatorName: string;
  };
  /** Adapter configuration; the locator fills in the launch request later */
  readonly config: null;
}

export interface ScenarioOptions {
  /** Label the host resolved for the task */
  readonly resolvedLabel: string;
  readonly adapter: string;
  readonly locatorName: string;
}

/**
 * Program the debugger launches after the build step.
 */
export interface LaunchRequest {
  readonly program: string;
  readonly args: readonly string[];
  readonly cwd: string | null;
  readonly env: readonly EnvPair[];
}
