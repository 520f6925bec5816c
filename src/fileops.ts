import fs from "node:fs/promises";
import { isErrnoException } from "./errors.js";

/**
 * The filesystem calls reconciliation makes. Swappable so that lock and
 * disk-full conditions can be reproduced in tests.
 */
export interface FileOps {
  mkdir(dir: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  /** Rename, or copy and unlink when source and target are on different devices. */
  moveFile(from: string, to: string): Promise<void>;
}

export const nodeFileOps: FileOps = {
  async mkdir(dir) {
    await fs.mkdir(dir, { recursive: true });
  },

  async copyFile(from, to) {
    await fs.copyFile(from, to);
  },

  async moveFile(from, to) {
    try {
      await fs.rename(from, to);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EXDEV") throw err;
      await fs.copyFile(from, to);
      await fs.unlink(from);
    }
  },
};
