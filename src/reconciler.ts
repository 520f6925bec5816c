import path from "node:path";
import { discardScratch } from "./engine.js";
import { errorMessage, isRecoverableFsError } from "./errors.js";
import { nodeFileOps, type FileOps } from "./fileops.js";
import { resolveRetryPolicy, type RetryPolicy } from "./retry.js";
import type { Logger } from "./logger.js";
import type { EngineResult, InputTask, KeepDecision, NamingPolicy, ReconciliationResult } from "./types.js";

export type PlannedAction = "none" | "copy-original" | "move-new" | "refuse";

export interface ActionPlan {
  action: PlannedAction;
  /** Recoverable errors during this action go through the retry policy. */
  retryable: boolean;
  /** What the output path holds once the action has run. */
  kept: KeepDecision;
}

/** Sentinel returned instead of throwing when the operator or policy aborts the batch. */
export type ReconcileOutcome =
  | { kind: "done"; result: ReconciliationResult }
  | { kind: "abort"; result: ReconciliationResult };

type StepOutcome = { kind: "ok" } | { kind: "failed"; message: string } | { kind: "abort"; message: string };

/**
 * `<dir of source>/<prefix><stem><suffix><ext>`. A prefix may contain
 * directories; they are relative to the source file, not the working directory.
 */
export function computeOutputPath(sourcePath: string, naming: NamingPolicy): string {
  const dir = path.dirname(path.resolve(sourcePath));
  const { name, ext } = path.parse(sourcePath);
  return path.resolve(dir, `${naming.prefix}${name}${naming.suffix}${ext}`);
}

export function decideKeep(originalSize: number, newSize: number, keepSmaller: boolean): KeepDecision {
  return keepSmaller && newSize >= originalSize ? "original" : "new";
}

/**
 * | keep     | same path | overwrite | action        |
 * |----------|-----------|-----------|---------------|
 * | original | yes       |           | none          |
 * | original | no        |           | copy-original |
 * | new      | yes       | allowed   | move-new      |
 * | new      | yes       | refused   | refuse        |
 * | new      | no        |           | move-new      |
 */
export function planAction(keep: KeepDecision, samePath: boolean, allowOverwrite: boolean): ActionPlan {
  if (keep === "original") {
    return samePath
      ? { action: "none", retryable: false, kept: "original" }
      : { action: "copy-original", retryable: false, kept: "original" };
  }
  if (samePath && !allowOverwrite) {
    return { action: "refuse", retryable: false, kept: "original" };
  }
  return { action: "move-new", retryable: true, kept: "new" };
}

export interface ReconcilerOptions {
  /** Consulted for tasks whose on-error policy is "prompt". */
  interactivePolicy: RetryPolicy;
  logger: Logger;
  fileOps?: FileOps;
}

export interface ReconcileAllResult {
  results: ReconciliationResult[];
  aborted: boolean;
}

/**
 * Decides between the original and the new file for each task and moves
 * files into place. Runs one task at a time because a decision may wait
 * on the operator.
 */
export class Reconciler {
  private readonly fileOps: FileOps;

  constructor(private readonly options: ReconcilerOptions) {
    this.fileOps = options.fileOps ?? nodeFileOps;
  }

  async reconcileAll(tasks: readonly InputTask[], engineResults: readonly EngineResult[]): Promise<ReconcileAllResult> {
    const byTask = new Map(engineResults.map((result) => [result.taskId, result]));
    const ordered = [...tasks].sort((a, b) => a.id - b.id);
    const results: ReconciliationResult[] = [];
    let aborted = false;

    for (const task of ordered) {
      const engineResult = byTask.get(task.id);
      if (!engineResult) {
        throw new Error(`No engine result for task ${task.id}`);
      }

      if (aborted) {
        if (engineResult.status === "success") {
          await discardScratch(engineResult.temporaryOutputPath, this.options.logger);
        }
        results.push({
          ok: false,
          taskId: task.id,
          finalPath: computeOutputPath(task.sourcePath, task.namingPolicy),
          originalSizeBytes: engineResult.originalSizeBytes,
          errorMessage: "ERROR: not processed, batch aborted",
        });
        continue;
      }

      const outcome = await this.reconcile(task, engineResult);
      results.push(outcome.result);
      if (outcome.kind === "abort") {
        aborted = true;
      }
    }

    return { results, aborted };
  }

  async reconcile(task: InputTask, engineResult: EngineResult): Promise<ReconcileOutcome> {
    const finalPath = computeOutputPath(task.sourcePath, task.namingPolicy);
    const originalSizeBytes = engineResult.originalSizeBytes;
    const failed = (errorMessage: string): ReconciliationResult => ({
      ok: false,
      taskId: task.id,
      finalPath,
      originalSizeBytes,
      errorMessage,
    });

    if (engineResult.status === "engine-failed") {
      return { kind: "done", result: failed(`ERROR: engine processing failed: ${engineResult.error}`) };
    }

    const tempPath = engineResult.temporaryOutputPath;
    let promoted = false;

    try {
      const outputDir = path.dirname(finalPath);
      try {
        await this.fileOps.mkdir(outputDir);
      } catch (err) {
        return { kind: "done", result: failed(`ERROR: could not create directory ${outputDir}: ${errorMessage(err)}`) };
      }

      const newSizeBytes = engineResult.newSizeBytes;
      const keep = decideKeep(originalSizeBytes, newSizeBytes, task.keepSmaller);
      const samePath = path.resolve(task.sourcePath) === finalPath;
      const plan = planAction(keep, samePath, task.overwritePolicy.allowOverwrite);
      this.options.logger.debug(`[${task.id + 1}] keep ${keep}, same path: ${samePath}, action: ${plan.action}`);

      let step: StepOutcome = { kind: "ok" };
      switch (plan.action) {
        case "none":
          break;
        case "refuse":
          this.options.logger.warn(
            `${finalPath} already exists. Use the --force flag to allow overwriting original files.`,
          );
          break;
        case "copy-original":
          step = await this.attempt(task, "copy", plan.retryable, () => this.fileOps.copyFile(task.sourcePath, finalPath));
          break;
        case "move-new":
          step = await this.attempt(task, "move", plan.retryable, () => this.fileOps.moveFile(tempPath, finalPath));
          promoted = step.kind === "ok";
          break;
      }

      if (step.kind !== "ok") {
        return { kind: step.kind === "abort" ? "abort" : "done", result: failed(step.message) };
      }

      const keptNew = plan.kept === "new";
      return {
        kind: "done",
        result: {
          ok: true,
          taskId: task.id,
          finalPath,
          originalSizeBytes,
          newSizeBytes: keptNew ? newSizeBytes : originalSizeBytes,
          ratio: keptNew && originalSizeBytes > 0 ? newSizeBytes / originalSizeBytes : 1,
          kept: plan.kept,
        },
      };
    } finally {
      if (!promoted) {
        await discardScratch(tempPath, this.options.logger);
      }
    }
  }

  private async attempt(
    task: InputTask,
    operation: string,
    retryable: boolean,
    step: () => Promise<void>,
  ): Promise<StepOutcome> {
    const policy = resolveRetryPolicy(task.onErrorPolicy, this.options.interactivePolicy);

    for (let attempt = 1; ; attempt++) {
      try {
        await step();
        return { kind: "ok" };
      } catch (err) {
        const message = `ERROR: ${operation} failed: ${errorMessage(err)}`;
        if (!retryable || !isRecoverableFsError(err)) {
          return { kind: "failed", message };
        }

        const decision = await policy.decide({ task, operation, error: err, attempt });
        this.options.logger.debug(`[${task.id + 1}] ${operation} attempt ${attempt} failed, decision: ${decision}`);
        if (decision === "skip") return { kind: "failed", message };
        if (decision === "abort") return { kind: "abort", message: `${message} (batch aborted)` };
      }
    }
  }
}
