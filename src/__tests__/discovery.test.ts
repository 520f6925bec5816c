import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { assertPathsExist, discoverFiles } from "../discovery.js";
import { PreconditionError } from "../errors.js";
import { cleanup, tmpDir } from "./helpers.js";

async function touch(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, "%PDF-1.7\n");
}

const isRoot = process.getuid?.() === 0;

describe("discoverFiles", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("includes a direct file argument only when its extension is allowed", async () => {
    await touch(path.join(workDir, "a.pdf"));
    await touch(path.join(workDir, "b.txt"));

    const result = await discoverFiles([path.join(workDir, "a.pdf"), path.join(workDir, "b.txt")], {
      extensions: ["pdf"],
      recursive: false,
    });

    expect(result.files).toEqual([path.join(workDir, "a.pdf")]);
    expect(result.searched).toBe(2);
  });

  it("lists only immediate children when not recursive", async () => {
    await touch(path.join(workDir, "b.pdf"));
    await touch(path.join(workDir, "a.PDF"));
    await touch(path.join(workDir, "notes.txt"));
    await touch(path.join(workDir, "sub", "deep.pdf"));

    const result = await discoverFiles([workDir], { extensions: ["pdf"], recursive: false });

    expect(result.files).toEqual([path.join(workDir, "a.PDF"), path.join(workDir, "b.pdf")]);
  });

  it("walks all descendants when recursive", async () => {
    await touch(path.join(workDir, "top.pdf"));
    await touch(path.join(workDir, "sub", "nested.pdf"));
    await touch(path.join(workDir, "sub", "deeper", "deepest.pdf"));
    await touch(path.join(workDir, "sub", "image.png"));

    const result = await discoverFiles([workDir], { extensions: ["pdf"], recursive: true });

    expect(result.files).toEqual([
      path.join(workDir, "sub", "deeper", "deepest.pdf"),
      path.join(workDir, "sub", "nested.pdf"),
      path.join(workDir, "top.pdf"),
    ]);
  });

  it("follows symbolic links to directories without looping", async () => {
    await touch(path.join(workDir, "real", "inside.pdf"));
    await fs.symlink(path.join(workDir, "real"), path.join(workDir, "link"));
    // a link back to the root would loop forever without the cycle guard
    await fs.symlink(workDir, path.join(workDir, "real", "back"));

    const result = await discoverFiles([path.join(workDir, "link")], { extensions: ["pdf"], recursive: true });

    expect(result.files).toEqual([path.join(workDir, "link", "inside.pdf")]);
  });

  it("never yields the same file twice", async () => {
    await touch(path.join(workDir, "a.pdf"));

    const result = await discoverFiles([path.join(workDir, "a.pdf"), workDir], {
      extensions: ["pdf"],
      recursive: false,
    });

    expect(result.files).toEqual([path.join(workDir, "a.pdf")]);
  });

  it("counts a symlinked file and its target once", async () => {
    await touch(path.join(workDir, "a.pdf"));
    await fs.symlink(path.join(workDir, "a.pdf"), path.join(workDir, "b.pdf"));

    const result = await discoverFiles([workDir], { extensions: ["pdf"], recursive: false });

    expect(result.files).toEqual([path.join(workDir, "a.pdf")]);
  });

  it("warns about dangling symlinks and keeps going", async () => {
    await touch(path.join(workDir, "ok.pdf"));
    await fs.symlink(path.join(workDir, "gone.pdf"), path.join(workDir, "ghost.pdf"));

    const result = await discoverFiles([workDir], { extensions: ["pdf"], recursive: false });

    expect(result.files).toEqual([path.join(workDir, "ok.pdf")]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].path).toBe(path.join(workDir, "ghost.pdf"));
    expect(result.warnings[0].message).toMatch(/^ENOENT/);
  });

  it("skips a directory it may not list and reports it", async () => {
    const locked = path.join(workDir, "locked");
    await touch(path.join(workDir, "ok.pdf"));
    await touch(path.join(locked, "hidden.pdf"));
    await touch(path.join(workDir, "z.pdf"));
    const readdir = async (dir: string): Promise<string[]> => {
      if (dir === locked) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: "EACCES" });
      }
      return fs.readdir(dir);
    };

    const result = await discoverFiles([workDir], { extensions: ["pdf"], recursive: true, readdir });

    expect(result.files).toEqual([path.join(workDir, "ok.pdf"), path.join(workDir, "z.pdf")]);
    expect(result.warnings).toEqual([{ path: locked, message: `EACCES: permission denied, scandir '${locked}'` }]);
  });

  it("returns the same ordered list on every run", async () => {
    for (const name of ["c.pdf", "a.pdf", "b.pdf", "x/y.pdf"]) {
      await touch(path.join(workDir, name));
    }
    const options = { extensions: ["pdf"], recursive: true };

    const first = await discoverFiles([workDir], options);
    const second = await discoverFiles([workDir], options);

    expect(second.files).toEqual(first.files);
  });

  it("finds nothing when the filter matches no file", async () => {
    await touch(path.join(workDir, "one.pdf"));
    await touch(path.join(workDir, "two.pdf"));

    const result = await discoverFiles([workDir], { extensions: ["png"], recursive: false });

    expect(result.files).toEqual([]);
    expect(result.searched).toBe(1);
  });

  it("rejects nonexistent paths before looking at anything", async () => {
    await touch(path.join(workDir, "a.pdf"));
    const missing = path.join(workDir, "missing.pdf");

    await expect(discoverFiles([path.join(workDir, "a.pdf"), missing], { extensions: ["pdf"], recursive: false })).rejects.toThrow(
      PreconditionError,
    );
    await expect(assertPathsExist([missing])).rejects.toThrow(`Path does not exist: ${missing}`);
  });

  it.skipIf(isRoot)("warns about unreadable directories and keeps going", async () => {
    await touch(path.join(workDir, "ok.pdf"));
    await touch(path.join(workDir, "locked", "hidden.pdf"));
    await fs.chmod(path.join(workDir, "locked"), 0o000);

    try {
      const result = await discoverFiles([workDir], { extensions: ["pdf"], recursive: true });

      expect(result.files).toEqual([path.join(workDir, "ok.pdf")]);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].path).toBe(path.join(workDir, "locked"));
    } finally {
      await fs.chmod(path.join(workDir, "locked"), 0o755);
    }
  });
});
