/**
 * Platform token mapping for the remote release services.
 *
 * The compatibility endpoint keys its assets by `<arch>-<os>`, while the
 * builds host has named archives both `zls-<arch>-<os>-<version>` and
 * `zls-<os>-<arch>-<version>` over time. Every string derived from a
 * PlatformTarget goes through this table.
 */

import type { PlatformTarget, TargetArch, TargetOs } from "./platform-info";

/**
 * Archive formats the downloader can unpack.
 */
export type ArchiveKind = "gzip-tar" | "zip";

/**
 * Token order used in release asset names on the builds host.
 */
export type AssetNamingConvention = "arch-os" | "os-arch";

const ARCH_TOKENS = {
  aarch64: "aarch64",
  x86: "x86",
  x86_64: "x86_64",
} as const satisfies Record<TargetArch, string>;

const OS_TOKENS = {
  mac: "macos",
  linux: "linux",
  windows: "windows",
} as const satisfies Record<TargetOs, string>;

const ARCHIVE_EXTENSIONS = {
  "gzip-tar": "tar.gz",
  zip: "zip",
} as const satisfies Record<ArchiveKind, string>;

export function archToken(arch: TargetArch): string {
  return ARCH_TOKENS[arch];
}

export function osToken(os: TargetOs): string {
  return OS_TOKENS[os];
}

/**
 * Key of a platform's asset descriptor in a compatibility response, e.g. `aarch64-macos`.
 */
export function compatibilityTarget(target: PlatformTarget): string {
  return `${archToken(target.arch)}-${osToken(target.os)}`;
}

/**
 * Archive format of published binaries. Fixed per OS, never negotiated.
 */
export function archiveKind(os: TargetOs): ArchiveKind {
  return os === "windows" ? "zip" : "gzip-tar";
}

export function archiveExtension(kind: ArchiveKind): string {
  return ARCHIVE_EXTENSIONS[kind];
}

/**
 * File name of the release asset for a version on the builds host.
 *
 * @example
 * releaseAssetName({ os: "linux", arch: "x86_64" }, "0.13.0", "arch-os")
 * // "zls-x86_64-linux-0.13.0.tar.gz"
 */
export function releaseAssetName(
  target: PlatformTarget,
  version: string,
  convention: AssetNamingConvention
): string {
  const arch = archToken(target.arch);
  const os = osToken(target.os);
  const platform = convention === "arch-os" ? `${arch}-${os}` : `${os}-${arch}`;
  const extension = archiveExtension(archiveKind(target.os));
  return `zls-${platform}-${version}.${extension}`;
}

/**
 * Name of the executable inside an unpacked release.
 */
export function binaryFileName(os: TargetOs): string {
  return os === "windows" ? "zls.exe" : "zls";
}
