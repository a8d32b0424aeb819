import { parseArgs } from "node:util";
import { ConfigurationError, resolveRunOptions, type Env, type RunOptions } from "./config.js";
import { PipelinePause } from "./executor.js";
import { RunLog } from "./run_log.js";
import { editLockedRecord, FileAgentStateStore, type AgentStateRecord, type AgentStateStore } from "./state_store.js";
import type { ModelInvoker } from "./pipeline/model_invoker.js";
import { acceptPageReview, InvalidTransitionError, requeuePage } from "./pipeline/page_machine.js";
import { runSourcePipeline, summarizeRecord, type PipelineDeps, type SourceRunResult } from "./pipeline/pipeline.js";
import { PdftoppmRasterizer, type PageRasterizer } from "./pipeline/rasterizer.js";
import { computeSourceId, listInputPdfs } from "./pipeline/source_id.js";
import { FileStubStore } from "./pipeline/stub_store.js";
import { errorMessage, projectLayout, type ProjectLayout } from "./pipeline/utils.js";

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  "Usage: manuscript-transcribe <input.pdf|dir> [options]",
  "",
  "  --project-root <dir>            state, work, output, stubs and prompts live here",
  "  --lang <code>                   transcription language (default hu)",
  "  --no-api                        never call the model; use stubs",
  "  --no-hitl                       do not stop for pages flagged for review",
  "  --stub-mode <mode>              off | record | replay | generate",
  "  --normalize-mode <mode>         per_page | document",
  "  --requeue <page> [--force]      send a page back to pending",
  "  --phase <phase>                 diplomatic | normalization (with --requeue)",
  "  --accept <page>                 accept a flagged page after review",
  "  --status                        print page statuses and exit",
  "  --help"
].join("\n");

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type CliOverrides = {
  env?: Env;
  rasterizer?: PageRasterizer;
  createInvoker?: (options: RunOptions) => ModelInvoker;
  /** Echo run log lines to stdout. */
  echo?: boolean;
  signal?: AbortSignal;
};

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export type CliCommand =
  | { kind: "help" }
  | { kind: "run" | "status"; input: string; options: Record<string, unknown> }
  | { kind: "requeue"; input: string; options: Record<string, unknown>; page: number; phase: "diplomatic" | "normalization"; force: boolean }
  | { kind: "accept"; input: string; options: Record<string, unknown>; page: number };

function pageNumber(flag: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new ConfigurationError(`--${flag} expects a page number, got "${raw}"`);
  return n;
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "project-root": { type: "string" },
      lang: { type: "string" },
      "no-api": { type: "boolean" },
      "no-hitl": { type: "boolean" },
      "stub-mode": { type: "string" },
      "normalize-mode": { type: "string" },
      requeue: { type: "string" },
      phase: { type: "string" },
      force: { type: "boolean" },
      accept: { type: "string" },
      status: { type: "boolean" },
      help: { type: "boolean", short: "h" }
    }
  });
}

export function parseCliArgs(argv: string[]): CliCommand {
  let parsed: ReturnType<typeof parseFlags>;
  try {
    parsed = parseFlags(argv);
  } catch (err) {
    throw new ConfigurationError(errorMessage(err));
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: "help" };
  if (positionals.length !== 1) throw new ConfigurationError("Expected exactly one input path");
  const input = positionals[0];

  const options: Record<string, unknown> = {
    useApi: !values["no-api"],
    hitl: !values["no-hitl"]
  };
  if (values["project-root"] !== undefined) options.projectRoot = values["project-root"];
  if (values.lang !== undefined) options.language = values.lang;
  if (values["stub-mode"] !== undefined) options.stubMode = values["stub-mode"];
  if (values["normalize-mode"] !== undefined) options.normalizeMode = values["normalize-mode"];

  if (values.requeue !== undefined) {
    const phase = values.phase ?? "diplomatic";
    if (phase !== "diplomatic" && phase !== "normalization") throw new ConfigurationError(`Unknown phase "${phase}"`);
    return { kind: "requeue", input, options, page: pageNumber("requeue", values.requeue), phase, force: Boolean(values.force) };
  }
  if (values.accept !== undefined) return { kind: "accept", input, options, page: pageNumber("accept", values.accept) };
  return { kind: values.status ? "status" : "run", input, options };
}

function formatCoverage(label: string, result: SourceRunResult, which: "v1Coverage" | "v2Coverage"): string {
  const cov = result[which];
  if (!cov) return `  ${label}: not produced`;
  const missing = cov.missing.length > 0 ? ` missing ${cov.missing.join(", ")}` : "";
  return `  ${label}: ${cov.included.length}/${cov.expected.length} page(s)${cov.complete ? "" : " INCOMPLETE"}${missing}`;
}

function printSummary(io: CliIo, result: SourceRunResult): void {
  io.out(`${result.sourceId}: stage ${result.stage}`);
  for (const p of result.pages) io.out(`  page ${p.page}: ${p.status}`);
  io.out(formatCoverage("v1", result, "v1Coverage"));
  io.out(formatCoverage("v2", result, "v2Coverage"));
  if (result.awaitingReview.length > 0) io.out(`  awaiting review: ${result.awaitingReview.join(", ")}`);
}

async function withRecord(
  store: AgentStateStore,
  sourceId: string,
  edit: (record: AgentStateRecord) => void
): Promise<SourceRunResult> {
  const edited = await editLockedRecord(store, sourceId, edit);
  if (!edited) throw new ConfigurationError(`No agent state for ${sourceId}; run it first`);
  return summarizeRecord(edited.record);
}

/** Returns the process exit code. */
export async function runCli(argv: string[], io: CliIo = consoleIo, overrides: CliOverrides = {}): Promise<number> {
  let command: CliCommand;
  let options: RunOptions;
  let pdfs: string[];
  try {
    command = parseCliArgs(argv);
    if (command.kind === "help") {
      io.out(USAGE);
      return EXIT_OK;
    }
    options = resolveRunOptions(command.options, overrides.env ?? process.env);
    pdfs = await listInputPdfs(command.input);
  } catch (err) {
    io.err(errorMessage(err));
    io.err(USAGE);
    return EXIT_USAGE;
  }

  const env = overrides.env ?? process.env;
  const layout: ProjectLayout = projectLayout(options.projectRoot);
  const store = new FileAgentStateStore(layout);
  const log = new RunLog(layout, { echo: overrides.echo ?? true });
  const deps: PipelineDeps = {
    layout,
    store,
    log,
    stubs: new FileStubStore(layout.stubsDir),
    rasterizer: overrides.rasterizer ?? new PdftoppmRasterizer(env.PDFTOPPM_PATH?.trim() || undefined),
    createInvoker: overrides.createInvoker,
    env
  };
  const signal = overrides.signal ?? new AbortController().signal;

  let exitCode = EXIT_OK;
  for (const pdfPath of pdfs) {
    const sourceId = await computeSourceId(pdfPath);
    try {
      if (command.kind === "status") {
        const record = await store.load(sourceId);
        if (!record) io.out(`${sourceId}: no agent state`);
        else printSummary(io, summarizeRecord(record));
        continue;
      }
      if (command.kind === "requeue") {
        const { page, phase, force } = command;
        const result = await withRecord(store, sourceId, (record) => {
          requeuePage(record, page, { phase, force });
        });
        log.log(sourceId, `Requeued ${phase}${force ? " (forced)" : ""}`, page);
        await log.flush();
        io.out(`${sourceId}: page ${page} requeued (${phase})`);
        printSummary(io, result);
        continue;
      }
      if (command.kind === "accept") {
        const { page } = command;
        const result = await withRecord(store, sourceId, (record) => {
          acceptPageReview(record, page);
        });
        log.log(sourceId, "Review accepted", page);
        await log.flush();
        io.out(`${sourceId}: page ${page} accepted`);
        printSummary(io, result);
        continue;
      }

      const result = await runSourcePipeline({ sourceId, pdfPath }, options, deps, signal);
      printSummary(io, result);
    } catch (err) {
      if (err instanceof PipelinePause) {
        io.out(`${sourceId}: paused (${err.message}); review with --accept <page> then run again`);
        continue;
      }
      io.err(`${sourceId}: ${errorMessage(err)}`);
      if (err instanceof ConfigurationError) return EXIT_USAGE;
      if (err instanceof InvalidTransitionError) io.err("Pass --force to reprocess a succeeded page");
      exitCode = EXIT_RUN_FAILED;
    }
  }
  return exitCode;
}
