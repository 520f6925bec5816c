import path from "node:path";
import os from "node:os";
import type { ChildProcess } from "node:child_process";
import pLimit from "p-limit";
import { killProcess, runEngineTask, type EngineSpec } from "./engine.js";
import { InterruptedError } from "./errors.js";
import { noProgress, type ProgressBoard } from "./progress.js";
import type { Logger } from "./logger.js";
import type { EngineResult, InputTask } from "./types.js";

export interface EnginePoolOptions {
  concurrency: number;
  /**
   * Worker signal disposition, fixed when each engine child is spawned:
   * children get their own process group so a terminal Ctrl-C reaches
   * only this process.
   */
  isolateSignals: boolean;
  /** Install SIGINT/SIGTERM handlers for the duration of `run`. */
  handleSignals: boolean;
  engine: EngineSpec;
  scratchDir: string;
  logger: Logger;
  progress?: ProgressBoard;
  graceMs?: number;
}

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Runs the engine over every task with bounded parallelism. Results come
 * back in task order whatever order the runs finish in.
 */
export class EnginePool {
  private readonly children = new Set<ChildProcess>();
  private interrupted: NodeJS.Signals | null = null;

  constructor(private readonly options: EnginePoolOptions) {}

  async run(tasks: readonly InputTask[]): Promise<EngineResult[]> {
    const detach = this.options.handleSignals ? this.attachSignalHandlers() : undefined;
    const limit = pLimit(Math.max(1, this.options.concurrency));
    const results = new Map<number, EngineResult>();

    try {
      await Promise.all(
        tasks.map((task) =>
          limit(async () => {
            // Queued tasks drain without running once interrupted.
            if (this.interrupted) return;
            const progress = this.options.progress?.task(task.id, path.basename(task.sourcePath)) ?? noProgress;
            const result = await runEngineTask(task, {
              engine: this.options.engine,
              scratchDir: this.options.scratchDir,
              isolateSignals: this.options.isolateSignals,
              logger: this.options.logger,
              graceMs: this.options.graceMs,
              progress,
              track: (child) => this.track(child),
            });
            results.set(task.id, result);
          }),
        ),
      );
    } finally {
      detach?.();
    }

    if (this.interrupted) {
      throw new InterruptedError(this.interrupted);
    }

    return tasks.map((task) => {
      const result = results.get(task.id);
      if (!result) {
        throw new Error(`No engine result for task ${task.id}`);
      }
      return result;
    });
  }

  /** Kills every running engine and lets the queue drain; `run` then rejects. */
  interrupt(signal: NodeJS.Signals = "SIGINT"): void {
    if (this.interrupted) return;
    this.interrupted = signal;
    const groupKill = this.options.isolateSignals && process.platform !== "win32";
    for (const child of this.children) {
      killProcess(child, groupKill);
    }
  }

  get runningCount(): number {
    return this.children.size;
  }

  private track(child: ChildProcess): () => void {
    this.children.add(child);
    if (this.interrupted) {
      killProcess(child, this.options.isolateSignals && process.platform !== "win32");
    }
    return () => {
      this.children.delete(child);
    };
  }

  private attachSignalHandlers(): () => void {
    const onSignal = (signal: NodeJS.Signals): void => {
      this.options.logger.debug(`Received ${signal}, stopping ${this.children.size} running engine(s)`);
      this.interrupt(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
    return () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    };
  }
}
