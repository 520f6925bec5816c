/**
 * Base error for everything pdfbatch raises on purpose.
 */
export class PdfBatchError extends Error {
  readonly code: string;
  override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = "PdfBatchError";
    this.code = code;
    this.cause = cause;
  }
}

/** Fatal before any task runs: bad path, missing engine, bad option value. */
export class PreconditionError extends PdfBatchError {
  constructor(message: string, cause?: unknown) {
    super(message, "PRECONDITION", cause);
    this.name = "PreconditionError";
  }
}

export type EngineErrorCode = "ENGINE_EXIT" | "ENGINE_TIMEOUT" | "ENGINE_SPAWN" | "PAGE_COUNT" | "EMPTY_OUTPUT";

/** A single task's engine run failed. Never escapes its task. */
export class EngineError extends PdfBatchError {
  declare readonly code: EngineErrorCode;

  constructor(message: string, code: EngineErrorCode, cause?: unknown) {
    super(message, code, cause);
    this.name = "EngineError";
  }
}

export class InterruptedError extends PdfBatchError {
  constructor(signal: NodeJS.Signals) {
    super(`Process interrupted by ${signal}`, "INTERRUPTED");
    this.name = "InterruptedError";
  }
}

const RECOVERABLE_FS_CODES = new Set(["EACCES", "EPERM", "EBUSY", "ENOSPC", "EDQUOT"]);

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/** Lock/permission and disk-full/quota errors are worth offering a retry for. */
export function isRecoverableFsError(err: unknown): boolean {
  return isErrnoException(err) && RECOVERABLE_FS_CODES.has(err.code ?? "");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
