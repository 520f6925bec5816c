import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { InputTask, OnErrorPolicy, RetryDecision } from "./types.js";

export interface RetryContext {
  task: InputTask;
  /** Human-readable name of the step that failed, e.g. "move". */
  operation: string;
  error: unknown;
  /** 1 on the first failure of this step. */
  attempt: number;
}

/** Decides what happens after a recoverable filesystem error. */
export interface RetryPolicy {
  decide(ctx: RetryContext): Promise<RetryDecision>;
}

/** Reads one answer from the terminal; `null` once input has ended. */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function fixedPolicy(decision: Exclude<RetryDecision, "retry">): RetryPolicy {
  return { decide: async () => decision };
}

/**
 * Opens a readline interface for each question and closes it once
 * answered, so the terminal is back in cooked mode (and Ctrl-C raises
 * SIGINT again) while the batch runs. Ctrl-C or end of input while a
 * question is open answers `null`.
 */
export function createReadlinePrompter(
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Prompter {
  let current: readline.Interface | undefined;
  let ended = false;

  return {
    ask(question) {
      if (ended || input.readableEnded) return Promise.resolve(null);
      return new Promise((resolve) => {
        const rl = readline.createInterface({ input, output });
        current = rl;
        let answered = false;
        rl.on("close", () => {
          current = undefined;
          if (answered) return;
          ended = true;
          resolve(null);
        });
        rl.question(question, (answer) => {
          answered = true;
          rl.close();
          resolve(answer);
        });
      });
    },
    close() {
      current?.close();
    },
  };
}

const ANSWERS: Record<string, RetryDecision> = {
  r: "retry",
  retry: "retry",
  s: "skip",
  skip: "skip",
  a: "abort",
  abort: "abort",
};

/** Asks the operator, re-asking on anything it does not understand. End of input aborts. */
export class PromptRetryPolicy implements RetryPolicy {
  constructor(
    private readonly prompter: Prompter,
    private readonly logger: Logger,
  ) {}

  async decide(ctx: RetryContext): Promise<RetryDecision> {
    this.logger.error(`Could not ${ctx.operation} ${ctx.task.sourcePath}: ${errorMessage(ctx.error)}`);
    if (ctx.attempt === 1) {
      this.logger.info("The file may be open in another program or the disk may be full.");
    }

    for (;;) {
      const answer = await this.prompter.ask("[r] Retry  [s] Skip this file  [a] Abort the batch: ");
      if (answer === null) return "abort";
      const decision = ANSWERS[answer.trim().toLowerCase()];
      if (decision) return decision;
      this.logger.warn("Invalid option. Please type r, s or a.");
    }
  }
}

/** Tasks set to "skip" or "abort" never ask; "prompt" defers to the interactive policy. */
export function resolveRetryPolicy(onError: OnErrorPolicy, interactive: RetryPolicy): RetryPolicy {
  return onError === "prompt" ? interactive : fixedPolicy(onError);
}
