import { PreconditionError } from "./errors.js";
import type { BatchOptions, CompressLevel, OnErrorPolicy, ParsedArgs, PdfaVersion } from "./types.js";
import { parseExtensions } from "./utils.js";

const COMPRESS_LEVELS: readonly CompressLevel[] = ["screen", "ebook", "printer", "prepress", "default"];
const PDFA_VERSIONS: readonly PdfaVersion[] = [1, 2, 3];
const ON_ERROR_POLICIES: readonly OnErrorPolicy[] = ["prompt", "skip", "abort"];

const DEFAULT_COMPRESS: CompressLevel = "ebook";
const DEFAULT_PDFA: PdfaVersion = 2;

export function parseCompressLevel(value: string): CompressLevel | undefined {
  const level = value.replace(/^\//, "").toLowerCase();
  return COMPRESS_LEVELS.find((candidate) => candidate === level);
}

export function parsePdfaVersion(value: string): PdfaVersion | undefined {
  const version = Number(value);
  return PDFA_VERSIONS.find((candidate) => candidate === version);
}

function parseOnError(value: string): OnErrorPolicy | undefined {
  return ON_ERROR_POLICIES.find((candidate) => candidate === value.toLowerCase());
}

function parseNonNegativeInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new PreconditionError(`invalid ${name} value: ${value}`);
  }
  return parsed;
}

/**
 * Parses the argument list (without the node and script entries).
 * Options take `--name value` or `--name=value`; --compress and --pdfa
 * may also stand alone.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    inputs: [],
    prefix: "",
    suffix: "",
    keepSmaller: true,
    force: false,
    recursive: false,
    filter: "pdf",
    timeout: 0,
    onError: "prompt",
    verbose: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const raw = args[i];

    if (raw === "--") {
      result.inputs.push(...args.slice(i + 1));
      break;
    }

    if (!raw.startsWith("-") || raw === "-") {
      result.inputs.push(raw);
      continue;
    }

    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);

    const requireValue = (): string => {
      if (inline !== undefined) return inline;
      const next = args[++i];
      if (next === undefined) {
        throw new PreconditionError(`${arg} requires a value`);
      }
      return next;
    };

    switch (arg) {
      case "-h":
      case "--help":
        result.help = true;
        return result;

      case "-v":
      case "--version":
        result.version = true;
        return result;

      case "-c":
      case "--compress": {
        if (inline !== undefined) {
          const level = parseCompressLevel(inline);
          if (!level) throw new PreconditionError(`invalid compression level: ${inline}`);
          result.compress = level;
        } else {
          const level = args[i + 1] !== undefined ? parseCompressLevel(args[i + 1]) : undefined;
          if (level) i++;
          result.compress = level ?? DEFAULT_COMPRESS;
        }
        break;
      }

      case "-a":
      case "--pdfa": {
        if (inline !== undefined) {
          const version = parsePdfaVersion(inline);
          if (!version) throw new PreconditionError(`invalid PDF/A version: ${inline}`);
          result.pdfa = version;
        } else {
          const version = args[i + 1] !== undefined ? parsePdfaVersion(args[i + 1]) : undefined;
          if (version) i++;
          result.pdfa = version ?? DEFAULT_PDFA;
        }
        break;
      }

      case "--options":
        result.options = requireValue();
        break;

      case "-p":
      case "--prefix":
        result.prefix = requireValue();
        break;

      case "-s":
      case "--suffix":
        result.suffix = requireValue();
        break;

      case "--keep-smaller":
      case "--keep_smaller":
        result.keepSmaller = true;
        break;

      case "--keep-new":
      case "--keep_new":
        result.keepSmaller = false;
        break;

      case "-f":
      case "--force":
        result.force = true;
        break;

      case "-r":
      case "--recursive":
        result.recursive = true;
        break;

      case "--filter":
        result.filter = requireValue();
        break;

      case "-t":
      case "--timeout":
        result.timeout = parseNonNegativeInt("timeout", requireValue());
        break;

      case "-j":
      case "--jobs": {
        const jobs = parseNonNegativeInt("jobs", requireValue());
        if (jobs === 0) throw new PreconditionError("--jobs must be at least 1");
        result.jobs = jobs;
        break;
      }

      case "--on-error":
      case "--on_error": {
        const value = requireValue();
        const policy = parseOnError(value);
        if (!policy) throw new PreconditionError(`invalid --on-error value: ${value} (expected prompt, skip or abort)`);
        result.onError = policy;
        break;
      }

      case "-V":
      case "--verbose":
        result.verbose = true;
        break;

      default:
        throw new PreconditionError(`unknown option: ${arg}`);
    }
  }

  return result;
}

export function toBatchOptions(parsed: ParsedArgs): Partial<BatchOptions> {
  const extensions = parseExtensions(parsed.filter);
  if (extensions.length === 0) {
    throw new PreconditionError(`invalid --filter value: ${parsed.filter}`);
  }

  return {
    intent: { compress: parsed.compress, pdfa: parsed.pdfa, options: parsed.options },
    prefix: parsed.prefix,
    suffix: parsed.suffix,
    keepSmaller: parsed.keepSmaller,
    force: parsed.force,
    recursive: parsed.recursive,
    extensions,
    timeoutSeconds: parsed.timeout,
    jobs: parsed.jobs,
    onError: parsed.onError,
    verbose: parsed.verbose,
  };
}
