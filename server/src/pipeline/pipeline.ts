import fs from "node:fs/promises";
import { needsCredential, requireApiKey, type Env, type RunOptions } from "../config.js";
import { PipelinePause, type PipelineFn } from "../executor.js";
import type { RunLog } from "../run_log.js";
import {
  createPendingPage,
  pageStatuses,
  recoverStaleRecord,
  type AgentStateRecord,
  type AgentStateStore,
  type Coverage,
  type PageStatusEntry,
  type Stage
} from "../state_store.js";
import { assembleV1 } from "./assembler.js";
import { OpenAiAgentsInvoker, type ModelInvoker } from "./model_invoker.js";
import { normalizeDocument, normalizePerPage, type NormalizerContext, type V2Output } from "./normalizer.js";
import { pagesAwaitingReview, processPage, type MachineContext } from "./page_machine.js";
import { loadPromptAssets } from "./prompts.js";
import type { PageRasterizer } from "./rasterizer.js";
import { selectResponseProvider, type ResponseProvider } from "./response_provider.js";
import type { StubStore } from "./stub_store.js";
import { nowIso, writeJsonFile, writeTextFile, type ProjectLayout } from "./utils.js";

export type PipelineDeps = {
  layout: ProjectLayout;
  store: AgentStateStore;
  log: RunLog;
  stubs: StubStore;
  rasterizer: PageRasterizer;
  /** Only called when the run actually talks to the model. */
  createInvoker?: (options: RunOptions) => ModelInvoker;
  env?: Env;
};

export type SourceRunInput = {
  sourceId: string;
  pdfPath: string;
};

export type SourceRunResult = {
  sourceId: string;
  stage: Stage;
  pages: PageStatusEntry[];
  v1Coverage: Coverage | null;
  v2Coverage: Coverage | null;
  awaitingReview: number[];
  /** Every page transcribed and normalized, nothing left for review. */
  publishable: boolean;
};

export const REVIEW_GATE_ID = "page_review";

const STAGE_ORDER: Stage[] = ["init", "images_ready", "transcribing", "v1_ready", "normalizing", "done"];

function stageIndex(stage: Stage): number {
  return STAGE_ORDER.indexOf(stage);
}

function defaultInvoker(options: RunOptions, env: Env | undefined): ModelInvoker {
  return new OpenAiAgentsInvoker({ apiKey: requireApiKey(env), models: options.models });
}

export function summarizeRecord(record: AgentStateRecord): SourceRunResult {
  const v1Coverage = record.v1?.coverage ?? null;
  const v2Coverage = record.v2?.coverage ?? null;
  const awaitingReview = pagesAwaitingReview(record);
  return {
    sourceId: record.source_id,
    stage: record.stage,
    pages: pageStatuses(record),
    v1Coverage,
    v2Coverage,
    awaitingReview,
    publishable:
      Boolean(v1Coverage?.complete) &&
      record.v2?.status === "succeeded" &&
      Boolean(v2Coverage?.complete) &&
      awaitingReview.length === 0
  };
}

async function setStage(record: AgentStateRecord, stage: Stage, deps: PipelineDeps): Promise<void> {
  if (record.stage === stage) return;
  record.stage = stage;
  await deps.store.save(record);
  deps.log.stageChanged(record.source_id, stage);
}

async function ensureImages(record: AgentStateRecord, deps: PipelineDeps, signal: AbortSignal): Promise<void> {
  if (record.stage !== "init" && record.pages.length > 0) return;

  const images = await deps.rasterizer.rasterize({
    pdfPath: record.pdf_path,
    imagesDir: deps.layout.imagesDir(record.source_id),
    sourceId: record.source_id,
    dpi: record.dpi,
    signal
  });
  record.pages = images.map((imagePath, i) => createPendingPage(record.source_id, i + 1, imagePath));
  record.pages_total = images.length;
  deps.log.log(record.source_id, `Rasterized ${images.length} page(s) at ${record.dpi} dpi`);
  await setStage(record, "images_ready", deps);
}

async function writeV2(record: AgentStateRecord, output: V2Output, deps: PipelineDeps): Promise<void> {
  const sourceId = record.source_id;
  const textPath = deps.layout.outputFile(sourceId, "corrected_v2");
  const editLogPath = deps.layout.outputFile(sourceId, "editlog_v2");
  await writeTextFile(textPath, output.text);
  await writeJsonFile(editLogPath, output.editLog);
  if (record.v2) {
    record.v2.text_path = textPath;
    record.v2.editlog_path = editLogPath;
  }
  await deps.store.save(record);
  if (!output.coverage.complete) {
    deps.log.error(sourceId, `v2 incomplete: missing page(s) ${output.coverage.missing.join(", ")}`);
  }
}

/** v2 files left from an earlier v1 must not outlive a failed re-normalization. */
async function removeV2(record: AgentStateRecord, deps: PipelineDeps): Promise<void> {
  const sourceId = record.source_id;
  await fs.rm(deps.layout.outputFile(sourceId, "corrected_v2"), { force: true });
  await fs.rm(deps.layout.outputFile(sourceId, "editlog_v2"), { force: true });
  if (record.v2) {
    delete record.v2.text_path;
    delete record.v2.editlog_path;
    delete record.v2.coverage;
  }
  await deps.store.save(record);
  deps.log.error(sourceId, "v2 not produced: normalization failed");
}

/**
 * Runs one PDF through every stage. Each stage is resumable from the persisted record:
 * succeeded pages and current normalization units are never re-requested.
 */
export async function runSourcePipeline(
  input: SourceRunInput,
  options: RunOptions,
  deps: PipelineDeps,
  signal: AbortSignal
): Promise<SourceRunResult> {
  const { sourceId } = input;

  // Fatal configuration problems surface before any state or page work.
  const prompts = await loadPromptAssets(deps.layout.promptsDir);
  let invoker: ModelInvoker | null = null;
  if (needsCredential(options)) {
    invoker = deps.createInvoker ? deps.createInvoker(options) : defaultInvoker(options, deps.env);
  }
  const provider: ResponseProvider = selectResponseProvider(options, { stubs: deps.stubs, invoker });

  const release = await deps.store.acquireLock(sourceId);
  try {
    const loaded = await deps.store.loadOrCreate({
      sourceId,
      pdfPath: input.pdfPath,
      language: options.language,
      dpi: options.dpi
    });
    const record = recoverStaleRecord(loaded);
    if (record !== loaded) {
      await deps.store.save(record);
      deps.log.log(sourceId, "Recovered units left in_progress by an interrupted run");
    }
    deps.log.log(sourceId, `Run started (provider ${provider.label}, normalize ${options.normalizeMode})`);

    await ensureImages(record, deps, signal);

    // Pages
    const pending = record.pages.filter((p) => p.status !== "succeeded");
    if (pending.length > 0 || stageIndex(record.stage) < stageIndex("transcribing")) {
      await setStage(record, "transcribing", deps);
    }
    const machine: MachineContext = {
      record,
      store: deps.store,
      provider,
      log: deps.log,
      instructions: prompts.diplomatic,
      diplomaticDir: deps.layout.diplomaticDir(sourceId),
      options: {
        language: options.language,
        callTimeoutMs: options.callTimeoutMs,
        maxAttempts: options.maxAttempts,
        retryDelayMs: options.retryDelayMs,
        qualityRetries: provider.label.startsWith("live")
      },
      signal
    };
    for (const page of [...record.pages].sort((a, b) => a.page - b.page)) {
      if (signal.aborted) throw new Error("Cancelled");
      await processPage(machine, page.page);
    }

    // v1
    const v1 = assembleV1(record);
    const v1Path = deps.layout.outputFile(sourceId, "diplomatic_v1");
    await writeTextFile(v1Path, v1.text);
    await writeJsonFile(deps.layout.outputFile(sourceId, "coverage_v1"), { source_id: sourceId, ...v1.coverage });
    record.v1 = { path: v1Path, hash: v1.hash, coverage: v1.coverage, assembled_at: nowIso() };
    await setStage(record, "v1_ready", deps);
    await deps.store.save(record);
    if (!v1.coverage.complete) {
      deps.log.error(sourceId, `v1 incomplete: missing page(s) ${v1.coverage.missing.join(", ")}`);
    }

    const awaiting = pagesAwaitingReview(record);
    if (options.hitl && awaiting.length > 0) {
      throw new PipelinePause(REVIEW_GATE_ID, `Pages awaiting review: ${awaiting.join(", ")}`);
    }

    // v2
    await setStage(record, "normalizing", deps);
    const normalizer: NormalizerContext = {
      record,
      store: deps.store,
      provider,
      log: deps.log,
      instructions: prompts.normalization,
      options: {
        language: options.language,
        callTimeoutMs: options.callTimeoutMs,
        maxAttempts: options.maxAttempts,
        retryDelayMs: options.retryDelayMs
      },
      signal
    };
    const v2 =
      options.normalizeMode === "document" ? await normalizeDocument(normalizer, v1) : await normalizePerPage(normalizer);
    if (v2) await writeV2(record, v2, deps);
    else if (record.v2?.status !== "succeeded") await removeV2(record, deps);

    await setStage(record, "done", deps);
    const result = summarizeRecord(record);
    deps.log.log(
      sourceId,
      `Run finished: ${result.pages.filter((p) => p.status === "succeeded").length}/${result.pages.length} page(s) succeeded` +
        (result.publishable ? "" : " (not publishable)")
    );
    return result;
  } finally {
    await release();
    await deps.log.flush();
  }
}

/** Adapts the per-source pipeline to the executor's job shape. */
export function sourcePipelineFn(deps: PipelineDeps): PipelineFn {
  return async (job, signal) => {
    await runSourcePipeline({ sourceId: job.sourceId, pdfPath: job.pdfPath }, job.options, deps, signal);
  };
}
