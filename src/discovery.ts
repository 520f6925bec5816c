import path from "node:path";
import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { PreconditionError, errorMessage, isErrnoException } from "./errors.js";
import { hasAllowedExtension } from "./utils.js";
import type { DiscoveryResult, DiscoveryWarning } from "./types.js";

export interface DiscoveryOptions {
  extensions: readonly string[];
  recursive: boolean;
  /** Directory listing; swappable so unreadable directories can be reproduced in tests. */
  readdir?: (dir: string) => Promise<string[]>;
}

/** Rejects every path argument that does not exist, all at once. */
export async function assertPathsExist(inputs: readonly string[]): Promise<void> {
  const missing: string[] = [];
  for (const input of inputs) {
    try {
      await fs.stat(input);
    } catch {
      missing.push(input);
    }
  }
  if (missing.length > 0) {
    throw new PreconditionError(`Path does not exist: ${missing.join(", ")}`);
  }
}

function isPermissionError(err: unknown): boolean {
  return isErrnoException(err) && (err.code === "EACCES" || err.code === "EPERM");
}

class Walker {
  readonly files: string[] = [];
  readonly warnings: DiscoveryWarning[] = [];
  private readonly seenFiles = new Set<string>();
  private readonly seenDirs = new Set<string>();

  constructor(private readonly options: DiscoveryOptions) {}

  /** A file reached through a symlink and through its target is one file. */
  async addFile(filePath: string): Promise<void> {
    if (!hasAllowedExtension(filePath, this.options.extensions)) return;
    const key = await fs.realpath(filePath);
    if (this.seenFiles.has(key)) return;
    this.seenFiles.add(key);
    this.files.push(filePath);
  }

  async walk(dir: string): Promise<void> {
    // Symlinked directories are followed; a directory reached twice is not re-entered.
    let real: string;
    try {
      real = await fs.realpath(dir);
    } catch (err) {
      this.warn(dir, err);
      return;
    }
    if (this.seenDirs.has(real)) return;
    this.seenDirs.add(real);

    let entries: string[];
    try {
      entries = await this.readdir(dir);
    } catch (err) {
      if (!isPermissionError(err)) throw err;
      this.warn(dir, err);
      return;
    }

    for (const entry of entries.sort()) {
      const entryPath = path.join(dir, entry);
      let stat: Stats;
      try {
        stat = await fs.stat(entryPath);
      } catch (err) {
        // Dangling symlinks and unreadable entries.
        this.warn(entryPath, err);
        continue;
      }

      if (stat.isFile()) {
        await this.addFile(entryPath);
      } else if (stat.isDirectory() && this.options.recursive) {
        await this.walk(entryPath);
      }
    }
  }

  private readdir(dir: string): Promise<string[]> {
    return this.options.readdir ? this.options.readdir(dir) : fs.readdir(dir);
  }

  private warn(target: string, err: unknown): void {
    this.warnings.push({ path: target, message: errorMessage(err) });
  }
}

/**
 * Expands file and directory arguments into the ordered list of files to
 * process. Arguments keep their order, directory entries are sorted by name.
 */
export async function discoverFiles(inputs: readonly string[], options: DiscoveryOptions): Promise<DiscoveryResult> {
  await assertPathsExist(inputs);

  const walker = new Walker(options);
  for (const input of inputs) {
    const stat = await fs.stat(input);
    if (stat.isFile()) {
      await walker.addFile(input);
    } else if (stat.isDirectory()) {
      await walker.walk(input);
    } else {
      throw new PreconditionError(`Input is neither a file nor a directory: ${input}`);
    }
  }

  return { files: walker.files, warnings: walker.warnings, searched: inputs.length };
}
