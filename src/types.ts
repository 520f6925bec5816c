export type CompressLevel = "screen" | "ebook" | "printer" | "prepress" | "default";

export type PdfaVersion = 1 | 2 | 3;

export type KeepDecision = "original" | "new";

export type OnErrorPolicy = "prompt" | "skip" | "abort";

export type RetryDecision = "retry" | "skip" | "abort";

export interface NamingPolicy {
  prefix: string;
  suffix: string;
}

export interface OverwritePolicy {
  allowOverwrite: boolean;
}

/** What the engine should do to every file of the batch. */
export interface Intent {
  compress?: CompressLevel;
  pdfa?: PdfaVersion;
  /** Raw option string passed through to the engine after the intent flags. */
  options?: string;
}

export interface InputTask {
  id: number;
  sourcePath: string;
  /** Engine directives in insertion order; later flags override earlier ones. */
  engineArgs: readonly string[];
  namingPolicy: NamingPolicy;
  keepSmaller: boolean;
  overwritePolicy: OverwritePolicy;
  onErrorPolicy: OnErrorPolicy;
  timeoutSeconds: number;
}

export type EngineResult =
  | {
      status: "success";
      taskId: number;
      sourcePath: string;
      originalSizeBytes: number;
      temporaryOutputPath: string;
      newSizeBytes: number;
    }
  | {
      status: "engine-failed";
      taskId: number;
      sourcePath: string;
      originalSizeBytes: number;
      error: string;
    };

export type ReconciliationResult =
  | {
      ok: true;
      taskId: number;
      finalPath: string;
      originalSizeBytes: number;
      newSizeBytes: number;
      ratio: number;
      kept: KeepDecision;
    }
  | {
      ok: false;
      taskId: number;
      finalPath: string;
      originalSizeBytes: number;
      errorMessage: string;
    };

export interface BatchOptions {
  intent: Intent;
  prefix: string;
  suffix: string;
  keepSmaller: boolean;
  force: boolean;
  recursive: boolean;
  extensions: string[];
  timeoutSeconds: number;
  jobs: number;
  onError: OnErrorPolicy;
  verbose: boolean;
}

export interface BatchSummary {
  results: ReconciliationResult[];
  succeeded: number;
  failed: number;
  totalOriginalBytes: number;
  totalNewBytes: number;
  ratio: number;
  elapsedMs: number;
  aborted: boolean;
}

export interface DiscoveryWarning {
  path: string;
  message: string;
}

export interface DiscoveryResult {
  files: string[];
  warnings: DiscoveryWarning[];
  searched: number;
}

export interface ParsedArgs {
  inputs: string[];
  compress?: CompressLevel;
  pdfa?: PdfaVersion;
  options?: string;
  prefix: string;
  suffix: string;
  keepSmaller: boolean;
  force: boolean;
  recursive: boolean;
  filter: string;
  timeout: number;
  jobs?: number;
  onError: OnErrorPolicy;
  verbose: boolean;
  help: boolean;
  version: boolean;
}
