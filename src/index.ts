#!/usr/bin/env node

import { createRequire } from "node:module";
import chalk from "chalk";
import { parseArgs, toBatchOptions } from "./args.js";
import { PdfBatch, type PdfBatchDeps } from "./batch.js";
import { InterruptedError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { ProgressBoard } from "./progress.js";
import { renderSummary, renderTable } from "./report.js";
import { PromptRetryPolicy, createReadlinePrompter, type Prompter } from "./retry.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
pdfbatch v${VERSION} — Compress or convert PDF files in parallel with Ghostscript

Usage:
  pdfbatch -c <file...>                   Compress file(s) in place (asks first)
  pdfbatch -c -p out/ <dir>               Write compressed copies to <dir>/out/
  pdfbatch -a 2 -s _pdfa <file...>        Convert to PDF/A-2 next to the source
  pdfbatch -c screen -r -f <dir>          Recursive, overwrite without asking

Options:
  -c, --compress [level]   screen, ebook, printer, prepress or default (alone: ebook)
  -a, --pdfa [version]     PDF/A version 1, 2 or 3 (alone: 2)
      --options <string>   Extra Ghostscript options, passed through as-is
  -p, --prefix <str>       Output name prefix; may contain directories, relative
                           to each file's own directory
  -s, --suffix <str>       Output name suffix, before the extension
      --keep-smaller       Keep whichever of original and new is smaller (default)
      --keep-new           Always keep the new file
  -f, --force              Allow overwriting original files
  -r, --recursive          Search directories recursively
      --filter <exts>      Comma-separated extensions to process (default: pdf)
  -t, --timeout <sec>      Per-file Ghostscript timeout, 0 for none (default: 0)
  -j, --jobs <n>           Files processed in parallel (default: CPU count)
      --on-error <policy>  prompt, skip or abort when a file cannot be written
                           (default: prompt)
  -V, --verbose            Print Ghostscript commands and decisions
  -h, --help               Show this help message
  -v, --version            Show version number

Environment:
  PDFBATCH_GS              Ghostscript binary to use
  PDFBATCH_GS_ARGS         Arguments placed before every Ghostscript argument list
  PDFBATCH_ICC_PROFILE     ICC profile embedded by PDF/A conversion
`.trim();

async function confirmOverwrite(prompter: Prompter, logger: Logger): Promise<boolean> {
  logger.info(
    `${chalk.bgRed.bold("WARNING:")} ${chalk.red.bold("Original files may be overwritten if no --prefix is specified")}`,
  );
  logger.info(chalk.dim("(Use the --force flag to allow overwriting original files and skip this message)"));

  for (;;) {
    const answer = await prompter.ask("Do you want to overwrite original files? [y/N]: ");
    if (answer === null) return false;
    const normalized = answer.trim().toLowerCase();
    if (normalized === "y" || normalized === "yes") return true;
    if (normalized === "" || normalized === "n" || normalized === "no") return false;
    logger.warn("Invalid input. Please type 'y' or 'n'.");
  }
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.help) {
    console.log(HELP);
    return 0;
  }

  if (parsed.version) {
    console.log(VERSION);
    return 0;
  }

  if (parsed.inputs.length === 0) {
    console.error("Error: no input file or directory specified");
    console.error("Run pdfbatch --help for usage");
    return 1;
  }

  const options = toBatchOptions(parsed);
  const logger = createConsoleLogger(parsed.verbose);
  const prompter = createReadlinePrompter();
  const deps: PdfBatchDeps = {
    logger,
    progress: new ProgressBoard(process.stdout),
    interactivePolicy: new PromptRetryPolicy(prompter, logger),
    handleSignals: true,
    iccProfile: process.env.PDFBATCH_ICC_PROFILE,
  };

  try {
    let batch = new PdfBatch(options, deps);
    const discovery = await batch.discover(parsed.inputs);

    if (discovery.files.length === 0) {
      logger.info(
        `No files found matching the specified filter (${discovery.searched} path(s) searched, filter: ${batch.config.extensions.join(", ")})`,
      );
      return 0;
    }

    const { prefix, force, onError } = batch.config;
    if (!prefix && !force) {
      const confirmed = onError !== "abort" && (await confirmOverwrite(prompter, logger));
      if (!confirmed) {
        logger.info("Aborting...");
        return 0;
      }
      batch = new PdfBatch({ ...options, force: true }, deps);
    }

    const summary = await batch.process(discovery.files);

    console.log("");
    const [header, ...rows] = renderTable(summary.results);
    console.log(chalk.bold(header));
    rows.forEach((line) => console.log(line));
    console.log("\nBatch completed:");
    renderSummary(summary).forEach((line) => console.log(line));

    if (summary.aborted) {
      logger.error("\nBatch aborted: remaining files were not processed");
      return 1;
    }
    return 0;
  } finally {
    prompter.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof InterruptedError) {
      console.error("Process interrupted. Terminating...");
    } else {
      console.error("Error:", errorMessage(err));
    }
    process.exit(1);
  });
