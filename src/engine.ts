import { spawn, type ChildProcess } from "node:child_process";
import readline from "node:readline";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { EngineError, PreconditionError, errorMessage } from "./errors.js";
import { tokenizeOptions } from "./utils.js";
import type { Logger } from "./logger.js";
import type { TaskProgress } from "./progress.js";
import type { EngineResult, InputTask, Intent } from "./types.js";

export const PAGE_MARKER = "Page ";
export const EXIT_GRACE_MS = 2000;
export const DEFAULT_ICC_PROFILE = "%rom%iccprofiles/srgb.icc";

const PDFA_TEMPLATE = new URL("../assets/PDFA_def.ps", import.meta.url);

/** How to start the engine: the binary plus arguments placed before every invocation. */
export interface EngineSpec {
  command: string;
  commandArgs: readonly string[];
}

export function resolveEngineCommand(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
  env: NodeJS.ProcessEnv = process.env,
): EngineSpec {
  const commandArgs = env.PDFBATCH_GS_ARGS ? tokenizeOptions(env.PDFBATCH_GS_ARGS) : [];
  if (env.PDFBATCH_GS) {
    return { command: env.PDFBATCH_GS, commandArgs };
  }

  switch (platform) {
    case "win32":
      return { command: arch === "x64" || arch === "arm64" ? "gswin64c" : "gswin32c", commandArgs };
    case "linux":
    case "darwin":
    case "freebsd":
    case "openbsd":
    case "sunos":
    case "aix":
      return { command: "gs", commandArgs };
    default:
      throw new PreconditionError(`Unsupported operating system: ${platform}`);
  }
}

export interface ProcessOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  /** Last non-progress lines of stdout and stderr, for error messages. */
  tail: string[];
}

export interface RunProcessOptions {
  /** Epoch ms after which the child is killed. */
  deadline?: number;
  isolateSignals: boolean;
  graceMs?: number;
  onLine?: (line: string) => void;
  /** Called with the live child; the returned function is called once it has exited. */
  track?: (child: ChildProcess) => () => void;
}

const TAIL_LINES = 5;
// setTimeout fires at once for delays above this.
const MAX_TIMER_MS = 2 ** 31 - 1;

export function killProcess(child: ChildProcess, groupKill: boolean): void {
  if (child.exitCode !== null || child.signalCode !== null) return;
  if (groupKill && child.pid !== undefined) {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch {
      // group already gone, fall back to the direct child
    }
  }
  child.kill("SIGKILL");
}

/**
 * Runs one engine invocation. Stdout and stderr are read line by line;
 * once both reach end-of-stream the process has `graceMs` to exit before
 * it is killed.
 */
export function runProcess(engine: EngineSpec, args: readonly string[], options: RunProcessOptions): Promise<ProcessOutcome> {
  const groupKill = options.isolateSignals && process.platform !== "win32";
  const graceMs = options.graceMs ?? EXIT_GRACE_MS;

  return new Promise((resolve, reject) => {
    if (options.deadline !== undefined && Date.now() >= options.deadline) {
      reject(new EngineError("Timed out before the engine was started", "ENGINE_TIMEOUT"));
      return;
    }

    const child = spawn(engine.command, [...engine.commandArgs, ...args], {
      stdio: ["ignore", "pipe", "pipe"],
      detached: groupKill,
      windowsHide: true,
    });
    const untrack = options.track?.(child);

    let stdout = "";
    const tail: string[] = [];
    let timedOut = false;
    let openStreams = 0;
    let deadlineTimer: NodeJS.Timeout | undefined;
    let graceTimer: NodeJS.Timeout | undefined;
    let settled = false;

    const cleanup = (): void => {
      settled = true;
      clearTimeout(deadlineTimer);
      clearTimeout(graceTimer);
      untrack?.();
    };

    const armDeadline = (deadline: number): void => {
      const remaining = deadline - Date.now();
      if (remaining > MAX_TIMER_MS) {
        deadlineTimer = setTimeout(() => armDeadline(deadline), MAX_TIMER_MS);
        return;
      }
      deadlineTimer = setTimeout(() => {
        timedOut = true;
        killProcess(child, groupKill);
      }, remaining);
    };
    if (options.deadline !== undefined) {
      armDeadline(options.deadline);
    }

    const follow = (stream: NodeJS.ReadableStream | null, isStdout: boolean): void => {
      if (!stream) return;
      openStreams++;
      const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
      lines.on("line", (line) => {
        if (isStdout) stdout += `${line}\n`;
        if (!line.startsWith(PAGE_MARKER) && line.trim() !== "") {
          tail.push(line);
          if (tail.length > TAIL_LINES) tail.shift();
        }
        options.onLine?.(line);
      });
      lines.on("close", () => {
        openStreams--;
        if (openStreams === 0 && !settled) {
          graceTimer = setTimeout(() => killProcess(child, groupKill), graceMs);
        }
      });
    };
    follow(child.stdout, true);
    follow(child.stderr, false);

    child.on("error", (err) => {
      cleanup();
      reject(new EngineError(`Could not start ${engine.command}: ${err.message}`, "ENGINE_SPAWN", err));
    });

    child.on("close", (code, signal) => {
      cleanup();
      if (timedOut) {
        reject(new EngineError("Engine timed out and was terminated", "ENGINE_TIMEOUT"));
        return;
      }
      resolve({ code, signal, stdout, tail });
    });
  });
}

/** Fails with a PreconditionError when the engine is missing or broken. */
export async function checkEngine(engine: EngineSpec): Promise<string> {
  let outcome: ProcessOutcome;
  try {
    outcome = await runProcess(engine, ["--version"], { isolateSignals: false });
  } catch (err) {
    throw new PreconditionError(`Ghostscript command '${engine.command}' not found on the system.`, err);
  }
  if (outcome.code !== 0) {
    throw new PreconditionError(`Ghostscript command '${engine.command}' is not working (exit code ${outcome.code ?? outcome.signal}).`);
  }
  return outcome.stdout.trim();
}

export function buildPageCountInvocation(inputPath: string): string[] {
  return ["-dPDFINFO", "-dBATCH", "-dNODISPLAY", inputPath];
}

export function buildMainInvocation(outputPath: string, engineArgs: readonly string[], inputPath: string): string[] {
  return ["-sDEVICE=pdfwrite", "-o", outputPath, ...engineArgs, inputPath];
}

/** The last whitespace-delimited token, dots removed, must be an integer. */
export function parsePageCount(stdout: string): number {
  const tokens = stdout.trim().split(/\s+/);
  const last = (tokens[tokens.length - 1] ?? "").replace(/\./g, "");
  if (!/^\d+$/.test(last)) {
    throw new EngineError(`Could not read the page count from the engine output (got "${last}")`, "PAGE_COUNT");
  }
  return parseInt(last, 10);
}

export interface PdfaResources {
  definitionPath: string;
  iccProfile: string;
}

/**
 * Directives for one intent, in the order the engine should see them:
 * compression, PDF/A conversion, then the raw pass-through options.
 */
export function buildEngineArgs(intent: Intent, pdfa?: PdfaResources): string[] {
  const args: string[] = [];

  if (intent.compress) {
    args.push(`-dPDFSETTINGS=/${intent.compress}`);
  }

  if (intent.pdfa !== undefined) {
    if (!pdfa) {
      throw new Error("PDF/A conversion needs a definition script");
    }
    args.push("-dPDFACompatibilityPolicy=1", "-sColorConversionStrategy=RGB", `-dPDFA=${intent.pdfa}`);
    if (!pdfa.iccProfile.startsWith("%rom%")) {
      args.push(`--permit-file-read=${pdfa.iccProfile}`);
    }
  }

  if (intent.options) {
    args.push(...tokenizeOptions(intent.options));
  }

  if (intent.pdfa !== undefined && pdfa) {
    args.push(pdfa.definitionPath);
  }

  return args;
}

function escapePostScriptString(value: string): string {
  return value.replace(/[\\()]/g, (ch) => `\\${ch}`);
}

/** Renders the PDF/A definition script into `dir` and returns its path. */
export async function writePdfaDefinition(dir: string, iccProfile: string): Promise<string> {
  const template = await fs.readFile(PDFA_TEMPLATE, "utf8");
  const target = path.join(dir, "PDFA_def.ps");
  await fs.writeFile(target, template.replace("__ICC_PROFILE__", escapePostScriptString(iccProfile)));
  return target;
}

export interface EngineRunContext {
  engine: EngineSpec;
  scratchDir: string;
  isolateSignals: boolean;
  progress: TaskProgress;
  logger: Logger;
  track?: (child: ChildProcess) => () => void;
  graceMs?: number;
}

export function scratchFileFor(task: InputTask, scratchDir: string): string {
  return path.join(scratchDir, `task-${task.id}-${crypto.randomBytes(6).toString("hex")}.pdf`);
}

function describeExit(outcome: ProcessOutcome): string {
  const status = outcome.code !== null ? `code ${outcome.code}` : `signal ${outcome.signal ?? "unknown"}`;
  const detail = outcome.tail.length > 0 ? `: ${outcome.tail[outcome.tail.length - 1]}` : "";
  return `${status}${detail}`;
}

/**
 * Page-count query followed by the main invocation. The timeout covers
 * both. On failure the scratch output is removed before returning.
 */
export async function runEngineTask(task: InputTask, ctx: EngineRunContext): Promise<EngineResult> {
  const tempOutput = scratchFileFor(task, ctx.scratchDir);
  const deadline = task.timeoutSeconds > 0 ? Date.now() + task.timeoutSeconds * 1000 : undefined;
  const runOptions = { deadline, isolateSignals: ctx.isolateSignals, track: ctx.track, graceMs: ctx.graceMs };
  let originalSizeBytes = 0;

  try {
    originalSizeBytes = (await fs.stat(task.sourcePath)).size;

    const info = await runProcess(ctx.engine, buildPageCountInvocation(task.sourcePath), runOptions);
    if (info.code !== 0) {
      throw new EngineError(`Page count query failed with ${describeExit(info)}`, "PAGE_COUNT");
    }
    ctx.progress.start(parsePageCount(info.stdout));

    const args = buildMainInvocation(tempOutput, task.engineArgs, task.sourcePath);
    ctx.logger.debug(`[${task.id + 1}] ${[ctx.engine.command, ...ctx.engine.commandArgs, ...args].join(" ")}`);

    const main = await runProcess(ctx.engine, args, {
      ...runOptions,
      onLine: (line) => {
        if (line.startsWith(PAGE_MARKER)) ctx.progress.tick();
      },
    });
    if (main.code !== 0) {
      throw new EngineError(`Ghostscript exited with ${describeExit(main)}`, "ENGINE_EXIT");
    }

    const newSizeBytes = (await fs.stat(tempOutput)).size;
    if (newSizeBytes === 0) {
      throw new EngineError("Generated file is empty", "EMPTY_OUTPUT");
    }

    ctx.progress.finish(true);
    return {
      status: "success",
      taskId: task.id,
      sourcePath: task.sourcePath,
      originalSizeBytes,
      temporaryOutputPath: tempOutput,
      newSizeBytes,
    };
  } catch (err) {
    ctx.progress.finish(false);
    await discardScratch(tempOutput, ctx.logger);
    return {
      status: "engine-failed",
      taskId: task.id,
      sourcePath: task.sourcePath,
      originalSizeBytes,
      error: errorMessage(err),
    };
  }
}

export async function discardScratch(filePath: string, logger: Logger): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (err) {
    logger.warn(`could not remove temporary file ${filePath}: ${errorMessage(err)}`);
  }
}
