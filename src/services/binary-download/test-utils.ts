/**
 * Test utilities for the binary-download module.
 */

import { vi, type Mock } from "vitest";
import type { ArtifactFetcher, FetchRequest } from "./artifact-fetcher";
import type { NegotiatedRelease, VersionNegotiator } from "./version-negotiator";
import type { PlatformTarget } from "../platform/platform-info";

/**
 * Mock VersionNegotiator with a spy on negotiate.
 */
export interface MockVersionNegotiator extends VersionNegotiator {
  negotiate: Mock<
    (toolchainVersion: string | null, target: PlatformTarget) => Promise<NegotiatedRelease>
  >;
}

/**
 * Create a mock VersionNegotiator.
 *
 * @param result - Release returned for every call, a function of the toolchain version, or an error to throw
 */
export function createMockVersionNegotiator(
  result:
    | NegotiatedRelease
    | Error
    | ((toolchainVersion: string | null) => NegotiatedRelease) = {
    version: "0.13.0",
    downloadUrl: "https://builds.zigtools.org/zls-x86_64-linux-0.13.0.tar.gz",
  }
): MockVersionNegotiator {
  return {
    negotiate: vi.fn(async (toolchainVersion: string | null) => {
      if (result instanceof Error) {
        throw result;
      }
      return typeof result === "function" ? result(toolchainVersion) : result;
    }),
  };
}

/**
 * Mock ArtifactFetcher with a spy on fetch.
 */
export interface MockArtifactFetcher extends ArtifactFetcher {
  fetch: Mock<(request: FetchRequest) => Promise<void>>;
}

/**
 * Create a mock ArtifactFetcher.
 *
 * @param options.onFetch - Called for every fetch, e.g. to put the binary into an in-memory filesystem
 * @param options.error - Error to throw instead
 */
export function createMockArtifactFetcher(options?: {
  onFetch?: (request: FetchRequest) => void | Promise<void>;
  error?: Error;
}): MockArtifactFetcher {
  return {
    fetch: vi.fn(async (request: FetchRequest) => {
      if (options?.error) {
        throw options.error;
      }
      await options?.onFetch?.(request);
    }),
  };
}
