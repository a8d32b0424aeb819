import path from "node:path";
import type { RunLog } from "../run_log.js";
import {
  findPage,
  type AgentStateRecord,
  type AgentStateStore,
  type AttemptRecord,
  type PageRecord,
  type Phase,
  type UnitStatus
} from "../state_store.js";
import { buildDiplomaticUserPrompt } from "./prompts.js";
import { countMarkers, reviewFlagReasons, shouldRetryForQuality, thresholdsForLanguage } from "./quality_policy.js";
import { parseDiplomaticResponse, type DiplomaticResponse, type ParseResult } from "./response_parser.js";
import { obtainWithTimeout, type ResponseProvider, type ResponseRequest } from "./response_provider.js";
import { errorMessage, nowIso, wait, writeJsonFile, writeRawTextFile } from "./utils.js";

export type PageOutcome = "skipped" | "succeeded" | "failed";

export class InvalidTransitionError extends Error {
  from: UnitStatus;
  to: UnitStatus;
  constructor(from: UnitStatus, to: UnitStatus) {
    super(`Invalid unit transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

const TRANSITIONS: Record<UnitStatus, readonly UnitStatus[]> = {
  pending: ["in_progress"],
  in_progress: ["succeeded", "failed"],
  failed: ["in_progress", "pending"],
  succeeded: []
};

/** `force` is the operator override that sends a finished unit back to `pending`. */
export function canTransition(from: UnitStatus, to: UnitStatus, options: { force?: boolean } = {}): boolean {
  if (TRANSITIONS[from].includes(to)) return true;
  return Boolean(options.force) && from === "succeeded" && to === "pending";
}

export function assertTransition(from: UnitStatus, to: UnitStatus, options: { force?: boolean } = {}): void {
  if (!canTransition(from, to, options)) throw new InvalidTransitionError(from, to);
}

type Unit = { status: UnitStatus; error?: string };

export function enterInProgress(unit: Unit): void {
  assertTransition(unit.status, "in_progress");
  unit.status = "in_progress";
  delete unit.error;
}

export function markSucceeded(unit: Unit): void {
  assertTransition(unit.status, "succeeded");
  unit.status = "succeeded";
  delete unit.error;
}

export function markFailed(unit: Unit, error: string): void {
  assertTransition(unit.status, "failed");
  unit.status = "failed";
  unit.error = error;
}

export function isCancellation(err: unknown, signal: AbortSignal): boolean {
  return signal.aborted || (err instanceof Error && err.message === "Cancelled");
}

export type MachineOptions = {
  language: string;
  callTimeoutMs: number;
  /** Attempts per page within one run; a page still failing stays `failed` for the next run. */
  maxAttempts: number;
  retryDelayMs: number;
  /** Re-request a page whose transcription is too uncertain. Only meaningful against a live model. */
  qualityRetries: boolean;
};

export type MachineContext = {
  record: AgentStateRecord;
  store: AgentStateStore;
  provider: ResponseProvider;
  log: RunLog;
  /** Prompt file text for the phase being driven. */
  instructions: string;
  diplomaticDir: string;
  options: MachineOptions;
  signal: AbortSignal;
};

function diplomaticRequest(ctx: MachineContext, page: PageRecord): ResponseRequest {
  const sourceId = ctx.record.source_id;
  return {
    key: { sourceId, unitId: page.page_id, phase: "diplomatic" },
    stub: { phase: "diplomatic", sourceId, unitId: page.page_id, page: page.page },
    model: {
      phase: "diplomatic",
      instructions: ctx.instructions,
      userText: buildDiplomaticUserPrompt({
        language: ctx.options.language,
        sourceId,
        page: page.page,
        pageId: page.page_id
      }),
      imagePath: page.image_path
    }
  };
}

type Reply = { raw: string; parsed: ParseResult<DiplomaticResponse> };

async function requestTranscription(ctx: MachineContext, page: PageRecord): Promise<Reply> {
  const raw = await obtainWithTimeout(ctx.provider, diplomaticRequest(ctx, page), ctx.options.callTimeoutMs, ctx.signal);
  const parsed = parseDiplomaticResponse(raw);
  return { raw, parsed: parsed.ok ? parsed : { ok: false, error: `Malformed model response: ${parsed.error}` } };
}

/** A failed re-request never costs the page its valid transcription; the marker counts flag it. */
async function keepAfterFailedRetry(ctx: MachineContext, page: PageRecord, kept: Reply, error: string): Promise<void> {
  ctx.log.error(ctx.record.source_id, `Quality retry failed, keeping the previous transcription: ${error}`, page.page);
  // A recording provider stored the failed reply; put back the one being kept.
  await ctx.provider.record?.(diplomaticRequest(ctx, page), kept.raw);
}

async function transcribeWithQualityRetry(ctx: MachineContext, page: PageRecord): Promise<ParseResult<DiplomaticResponse>> {
  const th = thresholdsForLanguage(ctx.options.language);
  let reply = await requestTranscription(ctx, page);

  while (reply.parsed.ok && ctx.options.qualityRetries) {
    const counts = countMarkers(reply.parsed.value.transcription);
    if (!shouldRetryForQuality(counts, page.quality.quality_retries_used, th)) break;
    page.quality.quality_retries_used += 1;
    ctx.log.log(
      ctx.record.source_id,
      `Quality retry ${page.quality.quality_retries_used}/${th.retryBudget} (u=${counts.uncertain}, i=${counts.illegible})`,
      page.page
    );

    let retry: Reply;
    try {
      retry = await requestTranscription(ctx, page);
    } catch (err) {
      if (isCancellation(err, ctx.signal)) throw err;
      await keepAfterFailedRetry(ctx, page, reply, errorMessage(err));
      break;
    }
    if (!retry.parsed.ok) {
      await keepAfterFailedRetry(ctx, page, reply, retry.parsed.error);
      break;
    }
    // The latest valid response wins so a recorded stub matches the accepted text.
    reply = retry;
  }
  return reply.parsed;
}

async function acceptTranscription(ctx: MachineContext, page: PageRecord, response: DiplomaticResponse): Promise<void> {
  const textPath = path.join(ctx.diplomaticDir, `${page.page_id}.txt`);
  const metaPath = path.join(ctx.diplomaticDir, `${page.page_id}.meta.json`);
  await writeRawTextFile(textPath, response.transcription);
  await writeJsonFile(metaPath, response.meta);

  const counts = countMarkers(response.transcription);
  const reasons = reviewFlagReasons(response.meta, counts, thresholdsForLanguage(ctx.options.language));

  page.diplomatic_text = response.transcription;
  page.meta = response.meta;
  page.text_path = textPath;
  page.meta_path = metaPath;
  page.quality = {
    ...page.quality,
    uncertain_count: counts.uncertain,
    illegible_count: counts.illegible,
    flagged: reasons.length > 0,
    flag_reasons: reasons,
    review_accepted: false
  };
}

async function attemptPage(ctx: MachineContext, page: PageRecord): Promise<"succeeded" | "failed"> {
  const sourceId = ctx.record.source_id;
  const attempt: AttemptRecord = {
    attempt: page.attempts.length + 1,
    phase: "diplomatic",
    started_at: nowIso(),
    outcome: "in_progress"
  };

  enterInProgress(page);
  page.attempts.push(attempt);
  // Persist before the call so a crash leaves a recoverable in_progress, not a silent gap.
  await ctx.store.save(ctx.record);
  ctx.log.pageStarted(sourceId, page.page, "diplomatic", attempt.attempt);

  let failure: string;
  try {
    const result = await transcribeWithQualityRetry(ctx, page);
    if (result.ok) {
      await acceptTranscription(ctx, page, result.value);
      markSucceeded(page);
      attempt.outcome = "succeeded";
      attempt.finished_at = nowIso();
      await ctx.store.save(ctx.record);
      const flag = page.quality.flagged ? ` [flagged: ${page.quality.flag_reasons.join(", ")}]` : "";
      ctx.log.log(sourceId, `Transcribed via ${ctx.provider.label} (attempt ${attempt.attempt})${flag}`, page.page);
      ctx.log.pageFinished(sourceId, page.page, "diplomatic", "succeeded");
      return "succeeded";
    }
    failure = result.error;
  } catch (err) {
    // Persisting the result failed; the stored attempt stays in_progress for recovery.
    if (page.status === "succeeded") throw err;
    failure = isCancellation(err, ctx.signal) ? "Cancelled" : errorMessage(err);
    if (failure === "Cancelled") {
      await recordFailure(ctx, page, attempt, failure);
      throw err;
    }
  }

  await recordFailure(ctx, page, attempt, failure);
  return "failed";
}

async function recordFailure(ctx: MachineContext, page: PageRecord, attempt: AttemptRecord, error: string): Promise<void> {
  delete page.diplomatic_text;
  delete page.meta;
  markFailed(page, error);
  attempt.outcome = "failed";
  attempt.error = error;
  attempt.finished_at = nowIso();
  await ctx.store.save(ctx.record);
  ctx.log.error(ctx.record.source_id, `Attempt ${attempt.attempt} failed: ${error}`, page.page);
  ctx.log.pageFinished(ctx.record.source_id, page.page, "diplomatic", "failed", error);
}

/**
 * Drives one page through `pending|failed -> in_progress -> succeeded|failed`.
 * Failures are recorded on the page and never thrown; only cancellation and a state
 * store that cannot save propagate.
 */
export async function processPage(ctx: MachineContext, pageNumber: number): Promise<PageOutcome> {
  const page = findPage(ctx.record, pageNumber);
  if (!page) throw new Error(`Unknown page ${pageNumber} for ${ctx.record.source_id}`);
  if (page.status === "succeeded") return "skipped";

  const maxAttempts = Math.max(1, ctx.options.maxAttempts);
  for (let i = 0; i < maxAttempts; i++) {
    if (i > 0) await wait(ctx.options.retryDelayMs, ctx.signal);
    if ((await attemptPage(ctx, page)) === "succeeded") return "succeeded";
  }
  return "failed";
}

export type RequeueOptions = { phase?: Phase; force?: boolean };

/**
 * Operator re-queue. A failed (or pending) unit goes back to `pending`; a succeeded one
 * only with `force`, which also discards its stored output.
 */
export function requeuePage(record: AgentStateRecord, pageNumber: number, options: RequeueOptions = {}): PageRecord {
  const page = findPage(record, pageNumber);
  if (!page) throw new Error(`Unknown page ${pageNumber} for ${record.source_id}`);
  const phase = options.phase ?? "diplomatic";
  const unit: Unit = phase === "diplomatic" ? page : page.normalization;

  if (unit.status === "pending") return page;
  assertTransition(unit.status, "pending", { force: options.force });

  if (phase === "diplomatic") {
    page.status = "pending";
    delete page.error;
    delete page.diplomatic_text;
    delete page.meta;
    page.quality = {
      uncertain_count: 0,
      illegible_count: 0,
      quality_retries_used: 0,
      flagged: false,
      flag_reasons: [],
      review_accepted: false
    };
    page.normalization = { status: "pending", attempts: page.normalization.attempts };
  } else {
    page.normalization = { status: "pending", attempts: page.normalization.attempts };
  }
  return page;
}

/** Marks a flagged page as reviewed so the review gate lets the run continue. */
export function acceptPageReview(record: AgentStateRecord, pageNumber: number): PageRecord {
  const page = findPage(record, pageNumber);
  if (!page) throw new Error(`Unknown page ${pageNumber} for ${record.source_id}`);
  if (page.status !== "succeeded") throw new Error(`Page ${pageNumber} has no transcription to accept`);
  page.quality.review_accepted = true;
  return page;
}

export function pagesAwaitingReview(record: AgentStateRecord): number[] {
  return record.pages
    .filter((p) => p.status === "succeeded" && p.quality.flagged && !p.quality.review_accepted)
    .map((p) => p.page)
    .sort((a, b) => a - b);
}
