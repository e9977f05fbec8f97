/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Simulates the parts of a real filesystem the resolver relies on:
 * - In-memory file and directory storage with auto-created parents
 * - ENOENT/EISDIR/ENOTDIR errors for missing or mistyped entries
 * - Per-entry injected errors (e.g. an undeletable directory)
 * - vi.fn() spies on every method for call assertions
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/data/zls/zls-0.13.0/zls": file("binary"),
 *   },
 * });
 *
 * await mock.isFile("/data/zls/zls-0.13.0/zls"); // true
 * mock.$.removeEntry("/data/zls/zls-0.13.0");
 */

import * as nodePath from "node:path";
import { vi, type Mock } from "vitest";
import type { DirEntry, FileSystemErrorCode, FileSystemLayer, RmOptions } from "./filesystem";
import { FileSystemError } from "../errors";

/**
 * File entry in the mock filesystem.
 */
export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  readonly executable?: boolean;
  /** If set, accessing or removing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Directory entry in the mock filesystem.
 */
export interface DirectoryEntry {
  readonly type: "directory";
  /** If set, accessing or removing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry;

/**
 * Create a file entry.
 *
 * @example
 * file("hello world")
 * file("content", { executable: true })
 */
export function file(
  content: string | Buffer,
  options?: { executable?: boolean; error?: FileSystemErrorCode }
): FileEntry {
  return { type: "file", content, ...options };
}

/**
 * Create a directory entry.
 *
 * @example
 * directory()
 * directory({ error: "EACCES" })
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return { type: "directory", ...options };
}

/**
 * State interface for the filesystem mock.
 */
export interface FileSystemMockState {
  /** Read-only access to all entries, keyed by normalized path */
  readonly entries: ReadonlyMap<string, Entry>;

  /** Set an entry, auto-creating parent directories */
  setEntry(path: string, entry: Entry): void;

  /** Remove an entry and everything below it */
  removeEntry(path: string): void;

  /** Sorted list of all paths, for readable assertions */
  paths(): string[];
}

/**
 * FileSystemLayer with spies and `$` state access.
 */
export interface MockFileSystemLayer extends FileSystemLayer {
  readonly $: FileSystemMockState;
  readFile: Mock<FileSystemLayer["readFile"]>;
  writeFile: Mock<FileSystemLayer["writeFile"]>;
  writeFileBuffer: Mock<FileSystemLayer["writeFileBuffer"]>;
  mkdir: Mock<FileSystemLayer["mkdir"]>;
  readdir: Mock<FileSystemLayer["readdir"]>;
  rm: Mock<FileSystemLayer["rm"]>;
  makeExecutable: Mock<FileSystemLayer["makeExecutable"]>;
  isFile: Mock<FileSystemLayer["isFile"]>;
}

export interface FileSystemMockOptions {
  readonly entries?: Readonly<Record<string, Entry>>;
}

function normalize(path: string): string {
  return nodePath.posix.normalize(path.replace(/\\/g, "/")).replace(/(.)\/$/, "$1");
}

function fsError(code: FileSystemErrorCode, path: string, action: string): FileSystemError {
  return new FileSystemError(code, path, `${code}: ${action} '${path}'`);
}

/**
 * Create an in-memory FileSystemLayer.
 */
export function createFileSystemMock(options?: FileSystemMockOptions): MockFileSystemLayer {
  const entries = new Map<string, Entry>();

  const ensureParents = (path: string): void => {
    let parent = nodePath.posix.dirname(path);
    while (!entries.has(parent)) {
      entries.set(parent, directory());
      if (parent === "/") break;
      parent = nodePath.posix.dirname(parent);
    }
  };

  const setEntry = (path: string, entry: Entry): void => {
    const normalized = normalize(path);
    ensureParents(normalized);
    entries.set(normalized, entry);
  };

  const removeEntry = (path: string): void => {
    const normalized = normalize(path);
    for (const key of [...entries.keys()]) {
      if (key === normalized || key.startsWith(`${normalized}/`)) {
        entries.delete(key);
      }
    }
  };

  const childrenOf = (dir: string): string[] =>
    [...entries.keys()].filter((key) => key !== dir && nodePath.posix.dirname(key) === dir);

  const requireFile = (path: string, action: string): FileEntry => {
    const normalized = normalize(path);
    const entry = entries.get(normalized);
    if (!entry) throw fsError("ENOENT", normalized, action);
    if (entry.error) throw fsError(entry.error, normalized, action);
    if (entry.type === "directory") throw fsError("EISDIR", normalized, action);
    return entry;
  };

  const requireParentDirectory = (path: string, action: string): void => {
    const parent = nodePath.posix.dirname(normalize(path));
    const entry = entries.get(parent);
    if (!entry) throw fsError("ENOENT", parent, action);
    if (entry.type !== "directory") throw fsError("ENOTDIR", parent, action);
  };

  for (const [path, entry] of Object.entries(options?.entries ?? {})) {
    setEntry(path, entry);
  }

  const state: FileSystemMockState = {
    entries,
    setEntry,
    removeEntry,
    paths: () => [...entries.keys()].sort(),
  };

  return {
    $: state,

    readFile: vi.fn(async (path: string): Promise<string> => {
      const entry = requireFile(path, "open");
      return entry.content.toString();
    }),

    writeFile: vi.fn(async (path: string, content: string): Promise<void> => {
      requireParentDirectory(path, "open");
      entries.set(normalize(path), file(content));
    }),

    writeFileBuffer: vi.fn(async (path: string, content: Buffer): Promise<void> => {
      requireParentDirectory(path, "open");
      entries.set(normalize(path), file(content));
    }),

    mkdir: vi.fn(async (path: string): Promise<void> => {
      const normalized = normalize(path);
      const existing = entries.get(normalized);
      if (existing?.type === "file") throw fsError("EEXIST", normalized, "mkdir");
      if (!existing) setEntry(normalized, directory());
    }),

    readdir: vi.fn(async (path: string): Promise<readonly DirEntry[]> => {
      const normalized = normalize(path);
      const entry = entries.get(normalized);
      if (!entry) throw fsError("ENOENT", normalized, "scandir");
      if (entry.error) throw fsError(entry.error, normalized, "scandir");
      if (entry.type !== "directory") throw fsError("ENOTDIR", normalized, "scandir");
      return childrenOf(normalized)
        .sort()
        .map((child) => {
          const childEntry = entries.get(child);
          return {
            name: nodePath.posix.basename(child),
            isDirectory: childEntry?.type === "directory",
            isFile: childEntry?.type === "file",
            isSymbolicLink: false,
          };
        });
    }),

    rm: vi.fn(async (path: string, rmOptions?: RmOptions): Promise<void> => {
      const normalized = normalize(path);
      const entry = entries.get(normalized);
      if (!entry) {
        if (rmOptions?.force) return;
        throw fsError("ENOENT", normalized, "rm");
      }
      if (entry.error) throw fsError(entry.error, normalized, "rm");
      if (entry.type === "directory" && !rmOptions?.recursive && childrenOf(normalized).length) {
        throw fsError("ENOTEMPTY", normalized, "rm");
      }
      removeEntry(normalized);
    }),

    makeExecutable: vi.fn(async (path: string): Promise<void> => {
      const entry = requireFile(path, "chmod");
      entries.set(normalize(path), { ...entry, executable: true });
    }),

    isFile: vi.fn(async (path: string): Promise<boolean> => {
      const entry = entries.get(normalize(path));
      return entry?.type === "file" && entry.error === undefined;
    }),
  };
}
