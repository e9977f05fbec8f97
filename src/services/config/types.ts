/**
 * Configuration types for the provisioner.
 *
 * The config.json file under the data root holds the remote endpoints and
 * behavior switches. Missing fields take their defaults.
 */

import { z } from "zod";

/**
 * Zod schema for config.json.
 * Every field is optional on disk and filled from DEFAULT_PROVISIONER_CONFIG.
 */
export const ProvisionerConfigSchema = z.object({
  /** GitHub repository (`owner/name`) whose releases serve the unpinned path */
  releaseRepository: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "must be <owner>/<name>")
    .default("zigtools/zls"),
  /** Host serving release archives by asset name */
  buildsBaseUrl: z.string().url().default("https://builds.zigtools.org"),
  /** Endpoint answering which server release matches a toolchain version */
  compatibilityEndpoint: z
    .string()
    .url()
    .default("https://releases.zigtools.org/v1/zls/select-version"),
  /** Base URL of the GitHub REST API */
  githubApiBaseUrl: z.string().url().default("https://api.github.com"),
  /** Order of the platform tokens in release asset names */
  assetNamingConvention: z.enum(["arch-os", "os-arch"]).default("arch-os"),
  /** Remove other installed versions after a successful install */
  pruneStaleVersions: z.boolean().default(true),
  /** Timeout for metadata requests */
  requestTimeoutMs: z.number().int().positive().default(10_000),
  /** Timeout for archive downloads */
  downloadTimeoutMs: z.number().int().positive().default(300_000),
});

/**
 * Provisioner configuration stored in config.json.
 */
export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>;

/**
 * Default configuration, written to disk on first run.
 */
export const DEFAULT_PROVISIONER_CONFIG: ProvisionerConfig = ProvisionerConfigSchema.parse({});
