import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir, nowIso, type ProjectLayout } from "./pipeline/utils.js";
import type { Phase, Stage, UnitStatus } from "./state_store.js";

export const RUN_EVENT_TYPES = ["stage_changed", "page_started", "page_finished", "run_finished", "log", "error"] as const;
export type RunEventType = (typeof RUN_EVENT_TYPES)[number];

export type RunEventListener = (type: RunEventType, payload: unknown) => void;

type LogOptions = {
  /** Echo lines to stdout as well as the per-source log file. */
  echo?: boolean;
};

/**
 * Per-source event stream. Every `log`/`error` is also appended to
 * `logs/<source_id>/run.log` so an interrupted run leaves a readable trail.
 */
export class RunLog {
  private readonly emitters = new Map<string, EventEmitter>();
  private readonly echo: boolean;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly layout: ProjectLayout,
    options: LogOptions = {}
  ) {
    this.echo = options.echo ?? false;
  }

  private emitter(sourceId: string): EventEmitter {
    let em = this.emitters.get(sourceId);
    if (!em) {
      em = new EventEmitter();
      // Node treats "error" events specially: if nobody is listening, it throws.
      // Errors are an optional event stream here, never a process crash.
      em.on("error", () => undefined);
      this.emitters.set(sourceId, em);
    }
    return em;
  }

  private append(sourceId: string, line: string): void {
    if (this.echo) console.log(line);
    const file = this.layout.logFile(sourceId);
    this.writes = this.writes
      .then(async () => {
        await ensureDir(path.dirname(file));
        await fs.appendFile(file, `${line}\n`, "utf8");
      })
      .catch((err: unknown) => {
        console.error(`run log write failed for ${sourceId}: ${err instanceof Error ? err.message : String(err)}`);
      });
  }

  /** Resolves once every queued log line has reached disk. */
  async flush(): Promise<void> {
    await this.writes;
  }

  log(sourceId: string, message: string, page?: number): void {
    const at = nowIso();
    this.append(sourceId, `[${at}] ${page !== undefined ? `[p${page}] ` : ""}${message}`);
    this.emitter(sourceId).emit("log", { message, page, at });
  }

  error(sourceId: string, message: string, page?: number): void {
    const at = nowIso();
    this.append(sourceId, `[${at}] ERROR ${page !== undefined ? `[p${page}] ` : ""}${message}`);
    this.emitter(sourceId).emit("error", { message, page, at });
  }

  stageChanged(sourceId: string, stage: Stage): void {
    this.log(sourceId, `Stage: ${stage}`);
    this.emitter(sourceId).emit("stage_changed", { stage, at: nowIso() });
  }

  pageStarted(sourceId: string, page: number, phase: Phase, attempt: number): void {
    this.emitter(sourceId).emit("page_started", { page, phase, attempt, at: nowIso() });
  }

  pageFinished(sourceId: string, page: number, phase: Phase, status: UnitStatus, error?: string): void {
    this.emitter(sourceId).emit("page_finished", { page, phase, status, error, at: nowIso() });
  }

  runFinished(sourceId: string, payload: { status: "done" | "paused" | "error"; message?: string }): void {
    this.emitter(sourceId).emit("run_finished", { ...payload, at: nowIso() });
  }

  subscribe(sourceId: string, onEvent: RunEventListener): () => void {
    const em = this.emitter(sourceId);
    const handlers = RUN_EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      em.on(type, handler);
      return { type, handler };
    });
    return () => {
      for (const { type, handler } of handlers) em.off(type, handler);
    };
  }
}
