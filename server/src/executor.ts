import type { RunOptions } from "./config.js";
import type { RunLog } from "./run_log.js";

export type SourceJob = {
  sourceId: string;
  pdfPath: string;
  options: RunOptions;
};

export type PipelineFn = (job: SourceJob, signal: AbortSignal) => Promise<void>;

export type JobStatus = "queued" | "running" | "paused" | "done" | "error";

export class PipelinePause extends Error {
  gateId: string;
  constructor(gateId: string, message: string) {
    super(message);
    this.name = "PipelinePause";
    this.gateId = gateId;
  }
}

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: SourceJob[] = [];
  private readonly statuses = new Map<string, JobStatus>();

  constructor(
    private readonly log: RunLog,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(sourceId: string): boolean {
    return this.running.has(sourceId);
  }

  statusOf(sourceId: string): JobStatus | null {
    return this.statuses.get(sourceId) ?? null;
  }

  enqueue(job: SourceJob): boolean {
    // One run per source at a time; a second request for the same source is a no-op.
    if (this.queue.some((q) => q.sourceId === job.sourceId) || this.running.has(job.sourceId)) return true;

    this.queue.push(job);
    this.statuses.set(job.sourceId, "queued");
    this.log.log(job.sourceId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(sourceId: string): boolean {
    const ctrl = this.running.get(sourceId);
    if (ctrl) {
      this.log.log(sourceId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.findIndex((q) => q.sourceId === sourceId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.statuses.set(sourceId, "error");
      this.log.error(sourceId, "Cancelled while queued");
      this.log.runFinished(sourceId, { status: "error", message: "Cancelled while queued" });
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;
      void this.start(next);
    }
  }

  private async start(job: SourceJob): Promise<void> {
    const controller = new AbortController();
    this.running.set(job.sourceId, controller);
    this.statuses.set(job.sourceId, "running");

    try {
      await this.pipeline(job, controller.signal);
      this.statuses.set(job.sourceId, "done");
      this.log.runFinished(job.sourceId, { status: "done" });
    } catch (err) {
      if (err instanceof PipelinePause) {
        this.statuses.set(job.sourceId, "paused");
        this.log.log(job.sourceId, `Paused at ${err.gateId}: ${err.message}`);
        this.log.runFinished(job.sourceId, { status: "paused", message: err.message });
        return;
      }

      const msg = controller.signal.aborted ? "Cancelled" : err instanceof Error ? err.message : String(err);
      this.statuses.set(job.sourceId, "error");
      this.log.error(job.sourceId, msg);
      this.log.runFinished(job.sourceId, { status: "error", message: msg });
    } finally {
      this.running.delete(job.sourceId);
      this.drain();
    }
  }
}
