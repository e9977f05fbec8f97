/**
 * Test utilities for ReleaseClient.
 */
import { vi, type Mock } from "vitest";
import type { Release, ReleaseClient, ReleaseQueryOptions } from "./release-client";

export interface MockReleaseClient extends ReleaseClient {
  latestRelease: Mock<(repository: string, options: ReleaseQueryOptions) => Promise<Release>>;
}

/**
 * Create a mock ReleaseClient answering with a fixed release, or failing with an error.
 */
export function createMockReleaseClient(result: Release | Error = { version: "0.13.0", assets: [] }): MockReleaseClient {
  return {
    latestRelease: vi.fn(async () => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }),
  };
}
