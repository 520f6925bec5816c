import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";
import type { EngineSpec } from "../engine.js";
import type { Logger } from "../logger.js";
import type { InputTask } from "../types.js";

export const FAKE_GS = fileURLToPath(new URL("./fixtures/fake-gs.mjs", import.meta.url));

export const fakeEngine: EngineSpec = { command: process.execPath, commandArgs: [FAKE_GS] };

export function tmpDir(): string {
  return path.join(os.tmpdir(), `pdfbatch-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export interface FakePdf {
  pages?: number;
  ratio?: number;
  exit?: number;
  info?: string;
  infoexit?: number;
  sleep?: number;
  /** Total file size in bytes. */
  size?: number;
}

/** Writes a file the fake engine understands, padded to exactly `size` bytes. */
export async function createFakePdf(filePath: string, fake: FakePdf = {}): Promise<number> {
  const { size = 1000, ...directives } = fake;
  const header = Object.entries(directives)
    .map(([key, value]) => `${key}:${String(value)}\n`)
    .join("");
  const padding = size - Buffer.byteLength(header);
  if (padding < 0) {
    throw new Error(`fake PDF header is longer than ${size} bytes`);
  }
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, header + "%".repeat(padding));
  return size;
}

export async function exists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

export function makeTask(overrides: Partial<InputTask> & Pick<InputTask, "sourcePath">): InputTask {
  return {
    id: 0,
    engineArgs: [],
    namingPolicy: { prefix: "", suffix: "" },
    keepSmaller: true,
    overwritePolicy: { allowOverwrite: false },
    onErrorPolicy: "skip",
    timeoutSeconds: 0,
    ...overrides,
  };
}

export interface CapturingLogger extends Logger {
  lines: { level: string; message: string }[];
}

export function capturingLogger(): CapturingLogger {
  const lines: { level: string; message: string }[] = [];
  const push = (level: string) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    lines,
    info: push("info"),
    success: push("success"),
    warn: push("warn"),
    error: push("error"),
    debug: push("debug"),
  };
}
