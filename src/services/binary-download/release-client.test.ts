/**
 * Tests for GitHubReleaseClient.
 */
import { describe, it, expect } from "vitest";
import { GitHubReleaseClient } from "./release-client";
import { VersionNegotiationError } from "./errors";
import { createMockHttpClient, jsonResponse, type MockHttpClient } from "../platform/network.test-utils";
import { createSilentLogger } from "../logging/logging.test-utils";

const RELEASES_URL = "https://api.github.com/repos/zigtools/zls/releases";

function githubRelease(
  tag: string,
  options: { draft?: boolean; prerelease?: boolean; assets?: string[] } = {}
) {
  return {
    tag_name: tag,
    draft: options.draft ?? false,
    prerelease: options.prerelease ?? false,
    assets: (options.assets ?? [`zls-x86_64-linux-${tag}.tar.xz`]).map((name) => ({
      name,
      browser_download_url: `https://github.com/zigtools/zls/releases/download/${tag}/${name}`,
    })),
  };
}

function createClient(httpClient: MockHttpClient): GitHubReleaseClient {
  return new GitHubReleaseClient({
    httpClient,
    logger: createSilentLogger(),
    apiBaseUrl: "https://api.github.com/",
    timeoutMs: 10000,
  });
}

describe("GitHubReleaseClient", () => {
  it("returns the first stable release with assets", async () => {
    const httpClient = createMockHttpClient({
      responses: {
        [RELEASES_URL]: jsonResponse([
          githubRelease("0.15.0-dev", { prerelease: true }),
          githubRelease("0.14.1", { draft: true }),
          githubRelease("0.14.0", { assets: [] }),
          githubRelease("0.13.0"),
          githubRelease("0.12.0"),
        ]),
      },
    });

    const release = await createClient(httpClient).latestRelease("zigtools/zls", {
      requireAssets: true,
      preRelease: false,
    });

    expect(release).toEqual({
      version: "0.13.0",
      assets: [
        {
          name: "zls-x86_64-linux-0.13.0.tar.xz",
          downloadUrl:
            "https://github.com/zigtools/zls/releases/download/0.13.0/zls-x86_64-linux-0.13.0.tar.xz",
        },
      ],
    });
  });

  it("accepts a release without assets when not required", async () => {
    const httpClient = createMockHttpClient({
      responses: {
        [RELEASES_URL]: jsonResponse([githubRelease("0.14.0", { assets: [] })]),
      },
    });

    const release = await createClient(httpClient).latestRelease("zigtools/zls", {
      requireAssets: false,
      preRelease: false,
    });

    expect(release.version).toBe("0.14.0");
  });

  it("picks pre-releases when asked", async () => {
    const httpClient = createMockHttpClient({
      responses: {
        [RELEASES_URL]: jsonResponse([
          githubRelease("0.14.0"),
          githubRelease("0.15.0-dev.1", { prerelease: true }),
        ]),
      },
    });

    const release = await createClient(httpClient).latestRelease("zigtools/zls", {
      requireAssets: true,
      preRelease: true,
    });

    expect(release.version).toBe("0.15.0-dev.1");
  });

  it("sends the GitHub media type and the timeout", async () => {
    const httpClient = createMockHttpClient({
      responses: { [RELEASES_URL]: jsonResponse([githubRelease("0.13.0")]) },
    });

    await createClient(httpClient).latestRelease("zigtools/zls", {
      requireAssets: true,
      preRelease: false,
    });

    expect(httpClient.$.requests).toEqual([
      {
        url: RELEASES_URL,
        options: { timeout: 10000, headers: { Accept: "application/vnd.github+json" } },
      },
    ]);
  });

  it("fails with NO_MATCHING_RELEASE when nothing matches", async () => {
    const httpClient = createMockHttpClient({
      responses: {
        [RELEASES_URL]: jsonResponse([githubRelease("0.15.0-dev", { prerelease: true })]),
      },
    });

    await expect(
      createClient(httpClient).latestRelease("zigtools/zls", {
        requireAssets: true,
        preRelease: false,
      })
    ).rejects.toMatchObject({ errorCode: "NO_MATCHING_RELEASE" });
  });

  it("fails with FETCH_FAILED on a network error", async () => {
    const httpClient = createMockHttpClient();
    httpClient.simulateNetworkDown();

    const result = createClient(httpClient).latestRelease("zigtools/zls", {
      requireAssets: true,
      preRelease: false,
    });

    await expect(result).rejects.toThrow(VersionNegotiationError);
    await expect(result).rejects.toMatchObject({
      errorCode: "FETCH_FAILED",
      message: "Failed to fetch releases of zigtools/zls: Network is down",
    });
  });

  it("fails with FETCH_FAILED on an HTTP error", async () => {
    const httpClient = createMockHttpClient({
      responses: { [RELEASES_URL]: jsonResponse({ message: "API rate limit exceeded" }, 403) },
    });

    await expect(
      createClient(httpClient).latestRelease("zigtools/zls", {
        requireAssets: true,
        preRelease: false,
      })
    ).rejects.toMatchObject({
      errorCode: "FETCH_FAILED",
      message: "HTTP 403 fetching releases of zigtools/zls",
    });
  });

  it("fails with PARSE_FAILED on an unexpected body", async () => {
    const httpClient = createMockHttpClient({
      responses: { [RELEASES_URL]: jsonResponse({ releases: [] }) },
    });

    await expect(
      createClient(httpClient).latestRelease("zigtools/zls", {
        requireAssets: true,
        preRelease: false,
      })
    ).rejects.toMatchObject({ errorCode: "PARSE_FAILED" });
  });

  it("fails with PARSE_FAILED on a body that is not JSON", async () => {
    const httpClient = createMockHttpClient({
      responses: { [RELEASES_URL]: { body: "<html>", status: 200 } },
    });

    await expect(
      createClient(httpClient).latestRelease("zigtools/zls", {
        requireAssets: true,
        preRelease: false,
      })
    ).rejects.toMatchObject({ errorCode: "PARSE_FAILED" });
  });
});
