/**
 * Test utilities for host collaborators.
 */
import { vi, type Mock } from "vitest";
import type {
  EnvPair,
  InstallationStatus,
  InstallationStatusReporter,
  LspSettings,
  LspSettingsProvider,
  Worktree,
} from "./types";

/**
 * Mock Worktree with vitest spy methods.
 */
export interface MockWorktree extends Worktree {
  which: Mock<(name: string) => Promise<string | null>>;
  shellEnv: Mock<() => Promise<readonly EnvPair[]>>;
}

/**
 * Create a mock Worktree.
 *
 * @param options.executables - Executables found on PATH, by name
 * @param options.env - Shell environment pairs
 *
 * @example
 * const worktree = createMockWorktree({ executables: { zig: "/usr/bin/zig" } });
 */
export function createMockWorktree(options?: {
  rootPath?: string;
  executables?: Readonly<Record<string, string>>;
  env?: readonly EnvPair[];
}): MockWorktree {
  const executables = options?.executables ?? {};
  return {
    rootPath: options?.rootPath ?? "/home/test/project",
    which: vi.fn(async (name: string) => executables[name] ?? null),
    shellEnv: vi.fn(async () => options?.env ?? []),
  };
}

/**
 * Mock LspSettingsProvider returning fixed settings per server name.
 */
export interface MockLspSettingsProvider extends LspSettingsProvider {
  forWorktree: Mock<(serverName: string, worktree: Worktree) => Promise<LspSettings | null>>;
}

export function createMockLspSettingsProvider(
  settings?: Readonly<Record<string, LspSettings>>
): MockLspSettingsProvider {
  return {
    forWorktree: vi.fn(async (serverName: string) => settings?.[serverName] ?? null),
  };
}

/**
 * Status reporter recording every status in order.
 */
export interface RecordingStatusReporter extends InstallationStatusReporter {
  setStatus: Mock<(serverName: string, status: InstallationStatus) => void>;
  /** Statuses reported so far, oldest first */
  readonly statuses: InstallationStatus[];
}

export function createRecordingStatusReporter(): RecordingStatusReporter {
  const statuses: InstallationStatus[] = [];
  return {
    statuses,
    setStatus: vi.fn((_serverName: string, status: InstallationStatus) => {
      statuses.push(status);
    }),
  };
}
