/**
 * Command line interface.
 *
 *   pubmed-bulk-fetch run --config config.json [--subject EGFR --subject AXL] [--verbose]
 *   pubmed-bulk-fetch download --config config.json --ids pmcids.txt
 */

import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import yargs from "yargs";
import { loadConfig, type AppConfig } from "./config.js";
import { CredentialPool } from "./credentials.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { runDownloadOnly, runPipeline, uniqueIds } from "./pipeline/orchestrator.js";
import { createSink } from "./sink/index.js";

/** Exit code when a run was interrupted by a signal */
const EXIT_CANCELLED = 130;

export interface CliIo {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

interface GlobalArguments {
  config?: string;
  verbose: boolean;
}

/** Parse an id list: one id per line, blank lines and repeats dropped. */
export function parseIdList(text: string): string[] {
  return uniqueIds(
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  );
}

/**
 * Run `task` with an AbortSignal wired to SIGINT/SIGTERM.
 * In-flight requests finish; no new work starts after the signal.
 */
async function withCancellation<T>(logger: Logger, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn({ signal }, "cancellation_requested");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  try {
    return await task(controller.signal);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

function setup(args: GlobalArguments): { config: AppConfig; logger: Logger; pool: CredentialPool } {
  const config = loadConfig(args.config);
  const logger = createLogger({ verbose: args.verbose });
  const pool = new CredentialPool(config.credentials, {
    selection: config.credentialSelection,
    rotateEvery: config.rotateEvery,
  });
  return { config, logger, pool };
}

async function runCommand(args: GlobalArguments & { subject?: string[] }, io: CliIo): Promise<number> {
  const { config, logger, pool } = setup(args);
  const subjects = args.subject && args.subject.length > 0 ? args.subject : config.subjects;
  if (subjects.length === 0) {
    throw new ConfigError("No subjects to process", ["pass --subject or set subjects in the config file"]);
  }

  const sink = createSink(config);
  logger.info({ subjects: subjects.length, sink: sink.target, reportDir: config.reportDir }, "run_start");

  const run = await withCancellation(logger, (signal) =>
    runPipeline(subjects, { config, pool, sink, logger, signal })
  );
  io.stdout.write(JSON.stringify({ ...run.totals, durationMs: run.durationMs, reportDir: config.reportDir }) + "\n");
  return run.totals.cancelledSubjects > 0 ? EXIT_CANCELLED : 0;
}

async function downloadCommand(args: GlobalArguments & { ids: string }, io: CliIo): Promise<number> {
  const { config, logger, pool } = setup(args);
  const ids = parseIdList(await readFile(args.ids, "utf-8"));
  const label = basename(args.ids, extname(args.ids)) || "download";

  const sink = createSink(config);
  logger.info({ ids: ids.length, sink: sink.target }, "download_start");

  const report = await withCancellation(logger, (signal) =>
    runDownloadOnly(ids, { config, pool, sink, logger, signal }, label)
  );
  io.stdout.write(JSON.stringify({ label, status: report.status, ...report.counts }) + "\n");
  return report.status === "cancelled" ? EXIT_CANCELLED : 0;
}

/**
 * Parse `argv` (without the node and script entries) and run the chosen command.
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIo = process): Promise<number> {
  let exitCode = 0;

  const cli = yargs(argv)
    .scriptName("pubmed-bulk-fetch")
    .usage("$0 <command> [options]")
    .option("config", {
      describe: "JSON configuration file",
      type: "string",
      global: true,
    })
    .option("verbose", {
      describe: "Debug-level JSON logs",
      type: "boolean",
      global: true,
      default: false,
    })
    .command(
      "run",
      "Search, map and download every subject",
      (y) =>
        y.option("subject", {
          describe: "Subject to process (repeatable); overrides the configured list",
          type: "string",
          array: true,
        }),
      async (argv) => {
        exitCode = await runCommand(argv, io);
      }
    )
    .command(
      "download",
      "Download an explicit id list, skipping search and mapping",
      (y) =>
        y.option("ids", {
          describe: "File with one identifier per line",
          type: "string",
          demandOption: true,
        }),
      async (argv) => {
        exitCode = await downloadCommand(argv, io);
      }
    )
    .demandCommand(1)
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .help();

  try {
    await cli.parseAsync();
  } catch (err) {
    const prefix = err instanceof ConfigError ? "configuration error" : "fatal";
    io.stderr.write(`${prefix}: ${errorMessage(err)}\n`);
    return 1;
  }
  return exitCode;
}
