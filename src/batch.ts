import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import { discoverFiles } from "./discovery.js";
import {
  DEFAULT_ICC_PROFILE,
  buildEngineArgs,
  checkEngine,
  resolveEngineCommand,
  writePdfaDefinition,
  type EngineSpec,
  type PdfaResources,
} from "./engine.js";
import { InterruptedError, PreconditionError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { EnginePool, defaultConcurrency } from "./pool.js";
import { Reconciler } from "./reconciler.js";
import { fixedPolicy, type RetryPolicy } from "./retry.js";
import { summarize } from "./report.js";
import { defaultExtensions, tokenizeOptions } from "./utils.js";
import type { FileOps } from "./fileops.js";
import type { ProgressBoard } from "./progress.js";
import type { BatchOptions, BatchSummary, DiscoveryResult, InputTask } from "./types.js";

export interface PdfBatchDeps {
  engine?: EngineSpec;
  logger?: Logger;
  progress?: ProgressBoard;
  /** Answers for tasks whose on-error policy is "prompt". Defaults to aborting. */
  interactivePolicy?: RetryPolicy;
  fileOps?: FileOps;
  /** Install SIGINT/SIGTERM handlers while engines run. */
  handleSignals?: boolean;
  iccProfile?: string;
  graceMs?: number;
  /** Where the per-run scratch directory is created. Defaults to the OS temp directory. */
  scratchRoot?: string;
}

export type BatchRun =
  | { kind: "empty"; discovery: DiscoveryResult }
  | { kind: "completed"; discovery: DiscoveryResult; summary: BatchSummary };

export function resolveConfig(options: Partial<BatchOptions> = {}): BatchOptions {
  const intent = options.intent ?? {};

  if (intent.options) {
    try {
      tokenizeOptions(intent.options);
    } catch (err) {
      throw new PreconditionError(errorMessage(err), err);
    }
  }

  const extensions = options.extensions && options.extensions.length > 0 ? options.extensions : defaultExtensions();

  return {
    intent,
    prefix: options.prefix ?? "",
    suffix: options.suffix ?? "",
    // PDF/A output does not compete on size
    keepSmaller: intent.pdfa !== undefined ? false : (options.keepSmaller ?? true),
    force: options.force ?? false,
    recursive: options.recursive ?? false,
    extensions,
    timeoutSeconds: Math.max(0, options.timeoutSeconds ?? 0),
    jobs: Math.max(1, Math.floor(options.jobs ?? defaultConcurrency())),
    onError: options.onError ?? "prompt",
    verbose: options.verbose ?? false,
  };
}

/**
 * Runs a batch in two phases: the engine over every file in parallel, then
 * one file at a time, keeping the original or the new output.
 */
export class PdfBatch {
  readonly config: BatchOptions;
  private readonly logger: Logger;

  constructor(
    options: Partial<BatchOptions> = {},
    private readonly deps: PdfBatchDeps = {},
  ) {
    this.config = resolveConfig(options);
    this.logger = deps.logger ?? createConsoleLogger(this.config.verbose);
  }

  async run(inputs: readonly string[]): Promise<BatchRun> {
    const discovery = await this.discover(inputs);
    if (discovery.files.length === 0) {
      return { kind: "empty", discovery };
    }
    const summary = await this.process(discovery.files);
    return { kind: "completed", discovery, summary };
  }

  async discover(inputs: readonly string[]): Promise<DiscoveryResult> {
    const discovery = await discoverFiles(inputs, {
      extensions: this.config.extensions,
      recursive: this.config.recursive,
    });
    for (const warning of discovery.warnings) {
      this.logger.warn(`skipping ${warning.path}: ${warning.message}`);
    }
    return discovery;
  }

  createTasks(files: readonly string[], engineArgs: readonly string[]): InputTask[] {
    return files.map((sourcePath, id) => ({
      id,
      sourcePath,
      engineArgs,
      namingPolicy: { prefix: this.config.prefix, suffix: this.config.suffix },
      keepSmaller: this.config.keepSmaller,
      overwritePolicy: { allowOverwrite: this.config.force },
      onErrorPolicy: this.config.onError,
      timeoutSeconds: this.config.timeoutSeconds,
    }));
  }

  async process(files: readonly string[]): Promise<BatchSummary> {
    const startTime = Date.now();
    // Until the pool takes over, an interrupt is only recorded and acted on between steps.
    let interrupted: NodeJS.Signals | undefined;
    const stopRecording = this.deps.handleSignals
      ? this.onInterrupt((signal) => {
          interrupted ??= signal;
        })
      : undefined;
    const throwIfInterrupted = (): void => {
      if (interrupted) throw new InterruptedError(interrupted);
    };

    let scratchDir: string | undefined;
    try {
      const engine = this.deps.engine ?? resolveEngineCommand();
      let version: string;
      try {
        version = await checkEngine(engine);
      } catch (err) {
        throwIfInterrupted();
        throw err;
      }
      this.logger.debug(`Using ${engine.command} ${version}`);

      scratchDir = await fs.mkdtemp(path.join(this.deps.scratchRoot ?? os.tmpdir(), "pdfbatch-"));
      let pdfa: PdfaResources | undefined;
      if (this.config.intent.pdfa !== undefined) {
        const iccProfile = this.deps.iccProfile ?? DEFAULT_ICC_PROFILE;
        pdfa = { iccProfile, definitionPath: await writePdfaDefinition(scratchDir, iccProfile) };
      }

      const tasks = this.createTasks(files, buildEngineArgs(this.config.intent, pdfa));
      this.logger.info(`Processing ${tasks.length} file(s) with ${Math.min(this.config.jobs, tasks.length)} worker(s)`);

      const pool = new EnginePool({
        concurrency: this.config.jobs,
        isolateSignals: true,
        handleSignals: this.deps.handleSignals ?? false,
        engine,
        scratchDir,
        logger: this.logger,
        progress: this.deps.progress,
        graceMs: this.deps.graceMs,
      });
      throwIfInterrupted();
      stopRecording?.();
      const engineResults = await pool.run(tasks);

      const reconciler = new Reconciler({
        interactivePolicy: this.deps.interactivePolicy ?? fixedPolicy("abort"),
        logger: this.logger,
        fileOps: this.deps.fileOps,
      });
      // Files are being moved into place; stopping halfway is only possible through the on-error policy.
      const detach = this.deps.handleSignals
        ? this.onInterrupt(() => {
            this.logger.warn("interrupt ignored while writing output files; answer [a] at the next prompt to abort");
          }, ["SIGINT"])
        : undefined;
      try {
        const { results, aborted } = await reconciler.reconcileAll(tasks, engineResults);
        return summarize(results, Date.now() - startTime, aborted);
      } finally {
        detach?.();
      }
    } finally {
      stopRecording?.();
      if (scratchDir) {
        await fs.rm(scratchDir, { recursive: true, force: true });
      }
    }
  }

  private onInterrupt(
    onSignal: (signal: NodeJS.Signals) => void,
    signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
  ): () => void {
    for (const signal of signals) process.on(signal, onSignal);
    return () => {
      for (const signal of signals) process.off(signal, onSignal);
    };
  }
}
