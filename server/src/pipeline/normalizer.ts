import type { RunLog } from "../run_log.js";
import type { AgentStateRecord, AgentStateStore, Coverage, NormalizeMode, PageRecord, V2Record } from "../state_store.js";
import { computeCoverage, concatenatePages, expectedPages, type Assembly, type PageText } from "./assembler.js";
import { enterInProgress, isCancellation, markFailed, markSucceeded } from "./page_machine.js";
import { buildNormalizationUserPrompt } from "./prompts.js";
import { parseNormalizationResponse, type EditLogEntry, type NormalizationResponse } from "./response_parser.js";
import { obtainWithTimeout, type ResponseProvider, type ResponseRequest } from "./response_provider.js";
import { errorMessage, nowIso, sha256Hex, wait } from "./utils.js";

export type EditLogFile = {
  source_id: string;
  mode: NormalizeMode;
  /** False when any expected page is missing from v2; a short v2 is then not the whole document. */
  complete: boolean;
  pages_included: number[];
  pages_missing: number[];
  entries: Array<EditLogEntry & { page?: number }>;
  meta: { total_changes: number; total_flags: number; notes: string[] };
};

export type V2Output = {
  text: string;
  editLog: EditLogFile;
  coverage: Coverage;
};

export type NormalizerContext = {
  record: AgentStateRecord;
  store: AgentStateStore;
  provider: ResponseProvider;
  log: RunLog;
  instructions: string;
  options: { language: string; callTimeoutMs: number; maxAttempts: number; retryDelayMs: number };
  signal: AbortSignal;
};

type Unit = { status: PageRecord["status"]; error?: string; attempts: number; input_hash?: string };

/**
 * Runs one normalization unit (a page, or the whole document) up to `maxAttempts` times.
 * `apply` stores the parsed response on the unit before it is marked succeeded.
 */
async function runUnit(
  ctx: NormalizerContext,
  unit: Unit,
  args: { label: string; page?: number; inputHash: string; request: ResponseRequest },
  apply: (response: NormalizationResponse) => void
): Promise<boolean> {
  const sourceId = ctx.record.source_id;
  const maxAttempts = Math.max(1, ctx.options.maxAttempts);

  for (let i = 0; i < maxAttempts; i++) {
    if (i > 0) await wait(ctx.options.retryDelayMs, ctx.signal);

    enterInProgress(unit);
    unit.attempts += 1;
    unit.input_hash = args.inputHash;
    await ctx.store.save(ctx.record);
    if (args.page !== undefined) ctx.log.pageStarted(sourceId, args.page, "normalization", unit.attempts);

    let failure: string;
    try {
      const raw = await obtainWithTimeout(ctx.provider, args.request, ctx.options.callTimeoutMs, ctx.signal);
      const parsed = parseNormalizationResponse(raw);
      if (parsed.ok) {
        apply(parsed.value);
        markSucceeded(unit);
        await ctx.store.save(ctx.record);
        ctx.log.log(sourceId, `Normalized ${args.label} via ${ctx.provider.label}`, args.page);
        if (args.page !== undefined) ctx.log.pageFinished(sourceId, args.page, "normalization", "succeeded");
        return true;
      }
      failure = `Malformed model response: ${parsed.error}`;
    } catch (err) {
      if (isCancellation(err, ctx.signal)) {
        markFailed(unit, "Cancelled");
        await ctx.store.save(ctx.record);
        throw err;
      }
      failure = errorMessage(err);
    }

    markFailed(unit, failure);
    await ctx.store.save(ctx.record);
    ctx.log.error(sourceId, `Normalization of ${args.label} failed (attempt ${unit.attempts}): ${failure}`, args.page);
    if (args.page !== undefined) ctx.log.pageFinished(sourceId, args.page, "normalization", "failed", failure);
  }
  return false;
}

function normalizationRequest(ctx: NormalizerContext, unitId: string, unitLabel: string, text: string): ResponseRequest {
  const sourceId = ctx.record.source_id;
  return {
    key: { sourceId, unitId, phase: "normalization" },
    stub: { phase: "normalization", sourceId, unitId, inputText: text },
    model: {
      phase: "normalization",
      instructions: ctx.instructions,
      userText: buildNormalizationUserPrompt({ language: ctx.options.language, sourceId, unitLabel, text })
    }
  };
}

function emptyV2(mode: NormalizeMode): V2Record {
  return { mode, status: "pending", attempts: 0 };
}

/**
 * Whole-document normalization in a single request over the assembled v1 text.
 * Returns null when the stored v2 already matches this v1 text.
 */
export async function normalizeDocument(ctx: NormalizerContext, v1: Assembly): Promise<V2Output | null> {
  const record = ctx.record;
  const stored = record.v2?.mode === "document" ? record.v2 : emptyV2("document");
  if (stored.status === "succeeded" && stored.input_hash === v1.hash) return null;
  // Paths and coverage describe the previous v1; only the attempt count carries over.
  const v2: V2Record = {
    mode: "document",
    status: stored.status === "succeeded" ? "pending" : stored.status,
    attempts: stored.attempts
  };
  record.v2 = v2;

  let output: V2Output | null = null;
  const ok = await runUnit(
    ctx,
    v2,
    { label: "document", inputHash: v1.hash, request: normalizationRequest(ctx, record.source_id, "document", v1.text) },
    (response) => {
      output = {
        text: response.correctedText,
        coverage: v1.coverage,
        editLog: {
          source_id: record.source_id,
          mode: "document",
          complete: v1.coverage.complete,
          pages_included: v1.coverage.included,
          pages_missing: v1.coverage.missing,
          entries: response.editLog,
          meta: {
            total_changes: response.meta.total_changes,
            total_flags: response.meta.total_flags,
            notes: response.meta.notes.trim().length > 0 ? [response.meta.notes] : []
          }
        }
      };
      v2.coverage = v1.coverage;
      v2.finished_at = nowIso();
    }
  );
  return ok ? output : null;
}

function isCurrent(page: PageRecord): boolean {
  if (page.status !== "succeeded" || !page.diplomatic_text) return false;
  const unit = page.normalization;
  return unit.status === "succeeded" && unit.input_hash === sha256Hex(page.diplomatic_text) && unit.corrected_text !== undefined;
}

/**
 * Per-page normalization: every transcribed page is its own checkpointed unit with its
 * own edit log, then the units are reassembled with the same markers as v1.
 */
export async function normalizePerPage(ctx: NormalizerContext): Promise<V2Output> {
  const record = ctx.record;
  record.v2 = record.v2?.mode === "per_page" ? record.v2 : emptyV2("per_page");

  for (const n of expectedPages(record)) {
    const page = record.pages.find((p) => p.page === n);
    if (!page || page.status !== "succeeded" || !page.diplomatic_text) continue;
    if (isCurrent(page)) continue;

    const text = page.diplomatic_text;
    if (page.normalization.status === "succeeded") {
      // Diplomatic text changed since this page was normalized.
      page.normalization = { status: "pending", attempts: page.normalization.attempts };
    }
    const unit = page.normalization;
    await runUnit(
      ctx,
      unit,
      { label: `page ${n}`, page: n, inputHash: sha256Hex(text), request: normalizationRequest(ctx, page.page_id, `page ${n}`, text) },
      (response) => {
        unit.corrected_text = response.correctedText;
        unit.edit_log = response.editLog;
        unit.meta = response.meta;
      }
    );
  }

  return reassembleV2(record);
}

export function reassembleV2(record: AgentStateRecord): V2Output {
  const texts: PageText[] = [];
  const entries: EditLogFile["entries"] = [];
  const notes: string[] = [];
  let totalChanges = 0;
  let totalFlags = 0;

  for (const n of expectedPages(record)) {
    const page = record.pages.find((p) => p.page === n);
    if (!page || !isCurrent(page)) {
      texts.push({ page: n, text: null });
      continue;
    }
    const unit = page.normalization;
    texts.push({ page: n, text: unit.corrected_text ?? null });
    for (const entry of unit.edit_log ?? []) entries.push({ ...entry, page: n });
    totalChanges += unit.meta?.total_changes ?? 0;
    totalFlags += unit.meta?.total_flags ?? 0;
    const note = unit.meta?.notes.trim();
    if (note) notes.push(`p${n}: ${note}`);
  }

  const coverage = computeCoverage(
    texts.map((t) => t.page),
    texts.filter((t) => t.text !== null).map((t) => t.page)
  );

  const v2 = record.v2 ?? emptyV2("per_page");
  const anyFailed = record.pages.some((p) => p.status === "succeeded" && p.normalization.status === "failed");
  record.v2 = {
    ...v2,
    mode: "per_page",
    status: anyFailed ? "failed" : "succeeded",
    coverage,
    finished_at: nowIso()
  };
  if (!anyFailed) delete record.v2.error;

  return {
    text: concatenatePages(record.source_id, texts),
    coverage,
    editLog: {
      source_id: record.source_id,
      mode: "per_page",
      complete: coverage.complete,
      pages_included: coverage.included,
      pages_missing: coverage.missing,
      entries,
      meta: { total_changes: totalChanges, total_flags: totalFlags, notes }
    }
  };
}
