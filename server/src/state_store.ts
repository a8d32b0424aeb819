import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  ensureDir,
  nowIso,
  pageId,
  readJsonFile,
  type ProjectLayout,
  writeJsonFile
} from "./pipeline/utils.js";
import { DiplomaticMetaSchema, EditLogEntrySchema, NormalizationMetaSchema } from "./pipeline/response_parser.js";

export const STATE_VERSION = 1;

export const UNIT_STATUSES = ["pending", "in_progress", "succeeded", "failed"] as const;
export const STAGES = ["init", "images_ready", "transcribing", "v1_ready", "normalizing", "done"] as const;
export const PHASES = ["diplomatic", "normalization"] as const;
export const NORMALIZE_MODES = ["document", "per_page"] as const;

const UnitStatusSchema = z.enum(UNIT_STATUSES);
const PhaseSchema = z.enum(PHASES);

const AttemptRecordSchema = z.object({
  attempt: z.number().int().min(1),
  phase: PhaseSchema,
  started_at: z.string(),
  finished_at: z.string().optional(),
  outcome: z.enum(["in_progress", "succeeded", "failed"]),
  error: z.string().optional()
});

const PageQualitySchema = z.object({
  uncertain_count: z.number().int().min(0),
  illegible_count: z.number().int().min(0),
  quality_retries_used: z.number().int().min(0),
  flagged: z.boolean(),
  flag_reasons: z.array(z.string()),
  review_accepted: z.boolean()
});

const NormalizationUnitSchema = z.object({
  status: UnitStatusSchema,
  input_hash: z.string().optional(),
  corrected_text: z.string().optional(),
  edit_log: z.array(EditLogEntrySchema).optional(),
  meta: NormalizationMetaSchema.optional(),
  error: z.string().optional(),
  attempts: z.number().int().min(0)
});

const PageRecordSchema = z.object({
  page: z.number().int().min(1),
  page_id: z.string().min(1),
  image_path: z.string(),
  status: UnitStatusSchema,
  diplomatic_text: z.string().optional(),
  meta: DiplomaticMetaSchema.optional(),
  text_path: z.string().optional(),
  meta_path: z.string().optional(),
  error: z.string().optional(),
  quality: PageQualitySchema,
  attempts: z.array(AttemptRecordSchema),
  normalization: NormalizationUnitSchema
});

const CoverageSchema = z.object({
  expected: z.array(z.number().int()),
  included: z.array(z.number().int()),
  missing: z.array(z.number().int()),
  complete: z.boolean()
});

const V1RecordSchema = z.object({
  path: z.string(),
  hash: z.string(),
  coverage: CoverageSchema,
  assembled_at: z.string()
});

const V2RecordSchema = z.object({
  mode: z.enum(NORMALIZE_MODES),
  status: UnitStatusSchema,
  input_hash: z.string().optional(),
  text_path: z.string().optional(),
  editlog_path: z.string().optional(),
  coverage: CoverageSchema.optional(),
  error: z.string().optional(),
  attempts: z.number().int().min(0),
  finished_at: z.string().optional()
});

export const AgentStateRecordSchema = z.object({
  version: z.literal(STATE_VERSION),
  source_id: z.string().min(1),
  pdf_path: z.string(),
  language: z.string().min(1),
  dpi: z.number().int().min(1),
  stage: z.enum(STAGES),
  pages_total: z.number().int().min(0),
  pages: z.array(PageRecordSchema),
  v1: V1RecordSchema.optional(),
  v2: V2RecordSchema.optional(),
  created_at: z.string(),
  updated_at: z.string()
});

export type UnitStatus = z.infer<typeof UnitStatusSchema>;
export type Phase = z.infer<typeof PhaseSchema>;
export type Stage = (typeof STAGES)[number];
export type NormalizeMode = (typeof NORMALIZE_MODES)[number];
export type AttemptRecord = z.infer<typeof AttemptRecordSchema>;
export type PageQuality = z.infer<typeof PageQualitySchema>;
export type NormalizationUnit = z.infer<typeof NormalizationUnitSchema>;
export type PageRecord = z.infer<typeof PageRecordSchema>;
export type Coverage = z.infer<typeof CoverageSchema>;
export type V1Record = z.infer<typeof V1RecordSchema>;
export type V2Record = z.infer<typeof V2RecordSchema>;
export type AgentStateRecord = z.infer<typeof AgentStateRecordSchema>;

export type RecordSeed = {
  sourceId: string;
  pdfPath: string;
  language: string;
  dpi: number;
};

export type PageStatusEntry = { page: number; status: UnitStatus };

export class SourceLockedError extends Error {
  sourceId: string;
  holderPid: number | null;
  constructor(sourceId: string, holderPid: number | null) {
    super(`Source ${sourceId} is locked by another run${holderPid !== null ? ` (pid ${holderPid})` : ""}`);
    this.name = "SourceLockedError";
    this.sourceId = sourceId;
    this.holderPid = holderPid;
  }
}

export function createEmptyRecord(seed: RecordSeed): AgentStateRecord {
  const at = nowIso();
  return {
    version: STATE_VERSION,
    source_id: seed.sourceId,
    pdf_path: seed.pdfPath,
    language: seed.language,
    dpi: seed.dpi,
    stage: "init",
    pages_total: 0,
    pages: [],
    created_at: at,
    updated_at: at
  };
}

export function createPendingPage(sourceId: string, page: number, imagePath: string): PageRecord {
  return {
    page,
    page_id: pageId(sourceId, page),
    image_path: imagePath,
    status: "pending",
    quality: {
      uncertain_count: 0,
      illegible_count: 0,
      quality_retries_used: 0,
      flagged: false,
      flag_reasons: [],
      review_accepted: false
    },
    attempts: [],
    normalization: { status: "pending", attempts: 0 }
  };
}

export function pageStatuses(record: AgentStateRecord): PageStatusEntry[] {
  return [...record.pages].sort((a, b) => a.page - b.page).map((p) => ({ page: p.page, status: p.status }));
}

export function findPage(record: AgentStateRecord, page: number): PageRecord | undefined {
  return record.pages.find((p) => p.page === page);
}

/**
 * Only meaningful while holding the source lock: `in_progress` units then belong to a
 * process that died mid-attempt, and become `failed` so the next run retries them.
 * Plain reads leave them as persisted, since a live run elsewhere may own them.
 */
export function recoverStaleRecord(record: AgentStateRecord): AgentStateRecord {
  const recoveredAt = nowIso();
  let changed = false;

  const pages = record.pages.map((page) => {
    let next = page;
    if (page.status === "in_progress") {
      changed = true;
      next = {
        ...next,
        status: "failed",
        error: "Recovered after interrupted attempt",
        attempts: next.attempts.map((a) =>
          a.outcome === "in_progress"
            ? { ...a, outcome: "failed", finished_at: recoveredAt, error: "Recovered after interrupted attempt" }
            : a
        )
      };
    }
    if (page.normalization.status === "in_progress") {
      changed = true;
      next = {
        ...next,
        normalization: { ...next.normalization, status: "failed", error: "Recovered after interrupted attempt" }
      };
    }
    return next;
  });

  let v2 = record.v2;
  if (v2?.status === "in_progress") {
    changed = true;
    v2 = { ...v2, status: "failed", error: "Recovered after interrupted attempt" };
  }

  if (!changed) return record;
  return { ...record, pages, v2 };
}

export type LockedEdit<T> = { record: AgentStateRecord; result: T };

/**
 * Loads a record under the source lock, recovers stale units, applies `edit` and saves.
 * Returns null when the source has no state. Nothing is saved when `edit` throws.
 */
export async function editLockedRecord<T>(
  store: AgentStateStore,
  sourceId: string,
  edit: (record: AgentStateRecord) => T
): Promise<LockedEdit<T> | null> {
  const release = await store.acquireLock(sourceId);
  try {
    const loaded = await store.load(sourceId);
    if (!loaded) return null;
    const record = recoverStaleRecord(loaded);
    const result = edit(record);
    await store.save(record);
    return { record, result };
  } finally {
    await release();
  }
}

export interface AgentStateStore {
  load(sourceId: string): Promise<AgentStateRecord | null>;
  loadOrCreate(seed: RecordSeed): Promise<AgentStateRecord>;
  save(record: AgentStateRecord): Promise<void>;
  list(): Promise<AgentStateRecord[]>;
  acquireLock(sourceId: string): Promise<() => Promise<void>>;
}

export class FileAgentStateStore implements AgentStateStore {
  constructor(private readonly layout: ProjectLayout) {}

  async load(sourceId: string): Promise<AgentStateRecord | null> {
    const filePath = this.layout.stateFile(sourceId);
    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new Error(`Unreadable agent state ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = AgentStateRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid agent state ${filePath}: ${parsed.error.issues[0]?.message ?? "schema mismatch"}`);
    }
    return parsed.data;
  }

  async loadOrCreate(seed: RecordSeed): Promise<AgentStateRecord> {
    const existing = await this.load(seed.sourceId);
    if (existing) return existing;
    const record = createEmptyRecord(seed);
    await this.save(record);
    return record;
  }

  async save(record: AgentStateRecord): Promise<void> {
    record.updated_at = nowIso();
    await writeJsonFile(this.layout.stateFile(record.source_id), record);
  }

  async list(): Promise<AgentStateRecord[]> {
    const entries = await fs.readdir(this.layout.agentStateDir, { withFileTypes: true }).catch(() => []);
    const out: AgentStateRecord[] = [];
    for (const ent of entries) {
      if (!ent.isFile() || !ent.name.endsWith(".state.json")) continue;
      const sourceId = ent.name.slice(0, -".state.json".length);
      const record = await this.load(sourceId).catch(() => null);
      if (record) out.push(record);
    }
    return out.sort((a, b) => a.source_id.localeCompare(b.source_id));
  }

  async acquireLock(sourceId: string): Promise<() => Promise<void>> {
    const lockPath = this.layout.lockFile(sourceId);
    await ensureDir(path.dirname(lockPath));

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const handle = await fs.open(lockPath, "wx");
        await handle.writeFile(`${process.pid}\n`, "utf8");
        await handle.close();
        return async () => {
          await fs.rm(lockPath, { force: true });
        };
      } catch (err) {
        if (!isAlreadyExists(err)) throw err;
        const holderPid = await readLockPid(lockPath);
        if (holderPid !== null && isProcessAlive(holderPid)) throw new SourceLockedError(sourceId, holderPid);
        // Holder is gone; take the lock over.
        await fs.rm(lockPath, { force: true });
      }
    }
    throw new SourceLockedError(sourceId, null);
  }
}

/** Keeps records in memory; handed to components in tests instead of the file store. */
export class InMemoryAgentStateStore implements AgentStateStore {
  private readonly records = new Map<string, string>();
  private readonly locks = new Set<string>();
  saves = 0;

  async load(sourceId: string): Promise<AgentStateRecord | null> {
    const raw = this.records.get(sourceId);
    if (raw === undefined) return null;
    return AgentStateRecordSchema.parse(JSON.parse(raw));
  }

  async loadOrCreate(seed: RecordSeed): Promise<AgentStateRecord> {
    const existing = await this.load(seed.sourceId);
    if (existing) return existing;
    const record = createEmptyRecord(seed);
    await this.save(record);
    return record;
  }

  async save(record: AgentStateRecord): Promise<void> {
    record.updated_at = nowIso();
    this.saves += 1;
    this.records.set(record.source_id, JSON.stringify(record));
  }

  /** Last persisted copy, read synchronously. */
  peek(sourceId: string): AgentStateRecord | null {
    const raw = this.records.get(sourceId);
    return raw === undefined ? null : AgentStateRecordSchema.parse(JSON.parse(raw));
  }

  async list(): Promise<AgentStateRecord[]> {
    const out: AgentStateRecord[] = [];
    for (const sourceId of [...this.records.keys()].sort()) {
      const record = await this.load(sourceId);
      if (record) out.push(record);
    }
    return out;
  }

  async acquireLock(sourceId: string): Promise<() => Promise<void>> {
    if (this.locks.has(sourceId)) throw new SourceLockedError(sourceId, process.pid);
    this.locks.add(sourceId);
    return async () => {
      this.locks.delete(sourceId);
    };
  }
}

function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function isMissingFile(err: unknown): boolean {
  return errnoCode(err) === "ENOENT";
}

function isAlreadyExists(err: unknown): boolean {
  return errnoCode(err) === "EEXIST";
}

async function readLockPid(lockPath: string): Promise<number | null> {
  const raw = await fs.readFile(lockPath, "utf8").catch(() => "");
  const pid = Number(raw.trim());
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return errnoCode(err) === "EPERM";
  }
}
