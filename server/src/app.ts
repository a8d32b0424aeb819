import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import archiver from "archiver";
import { z } from "zod";
import { ConfigurationError, resolveRunOptions, RunOptionsSchema } from "./config.js";
import type { RunExecutor } from "./executor.js";
import type { RunLog } from "./run_log.js";
import { editLockedRecord, PHASES, SourceLockedError, type AgentStateRecord, type AgentStateStore } from "./state_store.js";
import { summarizeRecord } from "./pipeline/pipeline.js";
import { acceptPageReview, InvalidTransitionError, requeuePage } from "./pipeline/page_machine.js";
import { DIPLOMATIC_PROMPT_FILE, NORMALIZATION_PROMPT_FILE } from "./pipeline/prompts.js";
import { computeSourceId, isPdfFileName } from "./pipeline/source_id.js";
import { errorMessage, fileExists, isSafeArtifactName, isSafeSourceId, type ProjectLayout } from "./pipeline/utils.js";

export type AppDeps = {
  layout: ProjectLayout;
  store: AgentStateStore;
  log: RunLog;
  executor: RunExecutor;
  env?: Record<string, string | undefined>;
};

const CreateRunBodySchema = z
  .object({
    pdfPath: z.string().trim().min(1),
    options: RunOptionsSchema.omit({ projectRoot: true }).optional()
  })
  .strict();

const RequeueBodySchema = z
  .object({
    phase: z.enum(PHASES).optional(),
    force: z.boolean().optional()
  })
  .strict();

const PageParamSchema = z.coerce.number().int().min(1);

type ArtifactInfo = { name: string; size: number; mtimeMs: number; folder: "output" | "diplomatic" };

function artifactDirs(layout: ProjectLayout, sourceId: string): Array<{ dir: string; folder: ArtifactInfo["folder"] }> {
  return [
    { dir: layout.outputDir(sourceId), folder: "output" },
    { dir: layout.diplomaticDir(sourceId), folder: "diplomatic" }
  ];
}

async function resolveArtifactPath(layout: ProjectLayout, sourceId: string, name: string): Promise<string | null> {
  for (const { dir } of artifactDirs(layout, sourceId)) {
    const candidate = path.join(dir, name);
    if (await fileExists(candidate)) return candidate;
  }
  return null;
}

export function createApp(deps: AppDeps) {
  const { layout, store, log, executor } = deps;
  const env = deps.env ?? process.env;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  function describe(record: AgentStateRecord) {
    return { ...summarizeRecord(record), runStatus: executor.statusOf(record.source_id) };
  }

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      hasKey: Boolean(env.OPENAI_API_KEY && env.OPENAI_API_KEY.trim().length > 0),
      projectRoot: layout.root,
      hasPrompts: [DIPLOMATIC_PROMPT_FILE, NORMALIZATION_PROMPT_FILE].every((f) => existsSync(path.join(layout.promptsDir, f)))
    });
  });

  app.get("/api/sources", async (_req, res) => {
    const records = await store.list();
    res.json(records.map(describe));
  });

  app.get("/api/sources/:sourceId", async (req, res) => {
    const record = await store.load(req.params.sourceId).catch(() => null);
    if (!record) {
      res.status(404).json({ error: "source not found" });
      return;
    }
    res.json({ ...describe(record), record });
  });

  app.get("/api/sources/:sourceId/pages", async (req, res) => {
    const record = await store.load(req.params.sourceId).catch(() => null);
    if (!record) {
      res.status(404).json({ error: "source not found" });
      return;
    }
    res.json(
      [...record.pages]
        .sort((a, b) => a.page - b.page)
        .map((p) => ({
          page: p.page,
          pageId: p.page_id,
          status: p.status,
          error: p.error,
          attempts: p.attempts.length,
          flagged: p.quality.flagged,
          flagReasons: p.quality.flag_reasons,
          reviewAccepted: p.quality.review_accepted,
          normalization: p.normalization.status
        }))
    );
  });

  app.post("/api/sources/:sourceId/pages/:page/requeue", async (req, res) => {
    const sourceId = req.params.sourceId;
    const page = PageParamSchema.safeParse(req.params.page);
    const body = RequeueBodySchema.safeParse(req.body ?? {});
    if (!page.success) {
      res.status(400).json({ error: "invalid page number" });
      return;
    }
    if (!body.success) {
      res.status(400).json({ error: body.error.flatten() });
      return;
    }
    if (executor.isRunning(sourceId)) {
      res.status(409).json({ error: "source is currently running; cancel it first" });
      return;
    }
    if (!isSafeSourceId(sourceId)) {
      res.status(404).json({ error: "source not found" });
      return;
    }

    try {
      const edited = await editLockedRecord(store, sourceId, (record) => requeuePage(record, page.data, body.data));
      if (!edited) {
        res.status(404).json({ error: "source not found" });
        return;
      }
      const updated = edited.result;
      log.log(sourceId, `Requeued ${body.data.phase ?? "diplomatic"}${body.data.force ? " (forced)" : ""}`, page.data);
      res.json({ page: updated.page, status: updated.status, normalization: updated.normalization.status });
    } catch (err) {
      if (err instanceof SourceLockedError) {
        res.status(409).json({ error: err.message });
        return;
      }
      if (err instanceof InvalidTransitionError) {
        res.status(409).json({ error: `${err.message}; pass force to reprocess a succeeded page` });
        return;
      }
      res.status(404).json({ error: errorMessage(err) });
    }
  });

  app.post("/api/sources/:sourceId/pages/:page/accept", async (req, res) => {
    const sourceId = req.params.sourceId;
    const page = PageParamSchema.safeParse(req.params.page);
    if (!page.success) {
      res.status(400).json({ error: "invalid page number" });
      return;
    }
    if (!isSafeSourceId(sourceId)) {
      res.status(404).json({ error: "source not found" });
      return;
    }

    try {
      const edited = await editLockedRecord(store, sourceId, (record) => acceptPageReview(record, page.data));
      if (!edited) {
        res.status(404).json({ error: "source not found" });
        return;
      }
      log.log(sourceId, "Review accepted", page.data);
      res.json({ ok: true, awaitingReview: summarizeRecord(edited.record).awaitingReview });
    } catch (err) {
      res.status(409).json({ error: errorMessage(err) });
    }
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const pdfPath = path.resolve(parsed.data.pdfPath);
    if (!isPdfFileName(pdfPath) || !(await fileExists(pdfPath))) {
      res.status(400).json({ error: `Expected an existing PDF file: ${pdfPath}` });
      return;
    }

    try {
      const options = resolveRunOptions({ ...parsed.data.options, projectRoot: layout.root }, env);
      const sourceId = await computeSourceId(pdfPath);
      executor.enqueue({ sourceId, pdfPath, options });
      res.json({ sourceId });
    } catch (err) {
      res.status(err instanceof ConfigurationError ? 400 : 500).json({ error: errorMessage(err) });
    }
  });

  app.post("/api/sources/:sourceId/cancel", (req, res) => {
    const ok = executor.cancel(req.params.sourceId);
    if (!ok) {
      res.status(409).json({ error: "source not running or queued" });
      return;
    }
    res.json({ ok: true });
  });

  app.get("/api/sources/:sourceId/events", (req, res) => {
    const sourceId = req.params.sourceId;

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = log.subscribe(sourceId, send);
    send("log", { message: "SSE connected", status: executor.statusOf(sourceId) });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe();
      res.end();
    });
  });

  app.get("/api/sources/:sourceId/artifacts", async (req, res) => {
    const sourceId = req.params.sourceId;
    const infos: ArtifactInfo[] = [];
    for (const scan of artifactDirs(layout, sourceId)) {
      const entries = await fs.readdir(scan.dir, { withFileTypes: true }).catch(() => []);
      for (const ent of entries) {
        if (!ent.isFile()) continue;
        const st = await fs.stat(path.join(scan.dir, ent.name)).catch(() => null);
        if (!st) continue;
        infos.push({ name: ent.name, size: st.size, mtimeMs: st.mtimeMs, folder: scan.folder });
      }
    }
    res.json(infos.sort((a, b) => a.name.localeCompare(b.name)));
  });

  app.get("/api/sources/:sourceId/artifacts/:name", async (req, res) => {
    const { sourceId, name } = req.params;

    if (!isSafeArtifactName(name) || !isSafeSourceId(sourceId)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    const filePath = await resolveArtifactPath(layout, sourceId, name);
    if (!filePath) {
      res.status(404).send("artifact not found");
      return;
    }

    try {
      const data = await fs.readFile(filePath);
      if (name.toLowerCase().endsWith(".json")) res.setHeader("Content-Type", "application/json; charset=utf-8");
      else res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.send(data);
    } catch {
      res.status(404).send("artifact not found");
    }
  });

  // Audit bundle: outputs, per-page work files, the state record, the run log and this source's stubs.
  app.get("/api/sources/:sourceId/export", async (req, res) => {
    const sourceId = req.params.sourceId;
    if (!isSafeSourceId(sourceId)) {
      res.status(400).json({ error: "invalid source id" });
      return;
    }
    const record = await store.load(sourceId).catch(() => null);
    if (!record) {
      res.status(404).json({ error: "source not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="${sourceId}-audit.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      log.log(sourceId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      log.error(sourceId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.append(`${JSON.stringify(record, null, 2)}\n`, { name: `agent_state/${sourceId}.state.json` });
    if (existsSync(layout.outputDir(sourceId))) archive.directory(layout.outputDir(sourceId), "output");
    if (existsSync(layout.diplomaticDir(sourceId))) archive.directory(layout.diplomaticDir(sourceId), "work/diplomatic");
    if (existsSync(layout.logFile(sourceId))) archive.file(layout.logFile(sourceId), { name: "logs/run.log" });
    for (const phase of PHASES) {
      const dir = path.join(layout.stubsDir, phase);
      if (existsSync(dir)) archive.glob(`${sourceId}*`, { cwd: dir }, { prefix: `stubs/${phase}` });
    }
    void archive.finalize();
  });

  return app;
}
